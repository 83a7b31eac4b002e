import assert from 'node:assert/strict';
import test from 'node:test';
import {
  detectSubtitleFormat,
  parseSrt,
  parseSubtitles,
  parseTimestamp,
  parseWebVtt,
  renderSrt,
  renderSubtitles,
  renderWebVtt,
  toSrtTimestamp,
  toVttTimestamp
} from '../../src/services/subtitle-translation/subtitle-format';

const SRT = [
  '1',
  '00:00:01,000 --> 00:00:02,500',
  '你好',
  '',
  '2',
  '00:00:03,000 --> 00:00:04,000',
  '第一行',
  '第二行',
  ''
].join('\n');

test('timestamps format with millisecond precision', () => {
  assert.equal(toSrtTimestamp(3723.5), '01:02:03,500');
  assert.equal(toVttTimestamp(3723.5), '01:02:03.500');
  assert.equal(toSrtTimestamp(0), '00:00:00,000');
});

test('parseTimestamp accepts each format and rejects the other', () => {
  assert.equal(parseTimestamp('01:02:03,500', 'srt'), 3723.5);
  assert.equal(parseTimestamp('02:03.500', 'vtt'), 123.5);
  assert.equal(parseTimestamp('01:02:03.500', 'srt'), null);
  assert.equal(parseTimestamp('1:02:03,500', 'srt'), null);
});

test('parseSrt reads indexes, timings and multi-line text', () => {
  const document = parseSrt(SRT);
  assert.deepEqual(document.entries, [
    { index: 1, startTime: 1, endTime: 2.5, text: '你好' },
    { index: 2, startTime: 3, endTime: 4, text: '第一行\n第二行' }
  ]);
});

test('renderSrt reproduces the source file when nothing is translated', () => {
  assert.equal(renderSrt(parseSrt(SRT)), SRT);
});

test('renderSrt writes translations and leaves timings untouched', () => {
  const document = parseSrt(SRT);
  const translated = {
    entries: document.entries.map((entry) => ({ ...entry, translatedText: `vi:${entry.index}` }))
  };
  assert.equal(
    renderSubtitles(translated, 'srt'),
    '1\n00:00:01,000 --> 00:00:02,500\nvi:1\n\n2\n00:00:03,000 --> 00:00:04,000\nvi:2\n'
  );
});

test('parseSrt strips a byte order mark and CRLF line endings', () => {
  const document = parseSrt('\uFEFF7\r\n00:00:01,000 --> 00:00:02,000\r\nHi\r\n');
  assert.deepEqual(document.entries, [{ index: 7, startTime: 1, endTime: 2, text: 'Hi' }]);
});

test('parseSrt rejects a block with no timing line', () => {
  assert.throws(() => parseSrt('1\nno timing here\n'), {
    name: 'InvalidDocumentError',
    message: 'SRT block without timing line: "1 / no timing here".'
  });
});

test('parseWebVtt skips notes, ignores cue ids and cue settings', () => {
  const content = [
    'WEBVTT',
    '',
    'NOTE written by hand',
    '',
    'intro',
    '00:01.000 --> 00:02.000 align:start',
    'Hello',
    '',
    '00:00:03.500 --> 00:00:04.000',
    'World',
    ''
  ].join('\n');

  const document = parseSubtitles(content, 'vtt');
  assert.deepEqual(document.entries, [
    { index: 1, startTime: 1, endTime: 2, text: 'Hello' },
    { index: 2, startTime: 3.5, endTime: 4, text: 'World' }
  ]);
  assert.equal(
    renderWebVtt(document),
    'WEBVTT\n\n00:00:01.000 --> 00:00:02.000\nHello\n\n00:00:03.500 --> 00:00:04.000\nWorld\n\n'
  );
});

test('parseWebVtt requires the WEBVTT header', () => {
  assert.throws(() => parseWebVtt('00:01.000 --> 00:02.000\nHello\n'), {
    message: 'WebVTT content must start with a WEBVTT header.'
  });
});

test('detectSubtitleFormat maps extensions', () => {
  assert.equal(detectSubtitleFormat('/videos/Episode.SRT'), 'srt');
  assert.equal(detectSubtitleFormat('captions.vtt'), 'vtt');
  assert.throws(() => detectSubtitleFormat('movie.ass'), {
    message: 'Unsupported subtitle file extension ".ass".'
  });
});
