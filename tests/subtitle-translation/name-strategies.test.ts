import assert from 'node:assert/strict';
import test from 'node:test';
import {
  CapitalizedNameStrategy,
  CjkNameStrategy,
  DictionaryOnlyStrategy,
  FrequentNameStrategy,
  createNameStrategy
} from '../../src/services/subtitle-translation/name-strategies';

test('CjkNameStrategy finds short Han runs that are not common words', () => {
  const strategy = new CjkNameStrategy(new Set(['你好']));
  assert.deepEqual(strategy.find('李明，你好。王芳！'), [
    { name: '李明', start: 0, end: 2 },
    { name: '王芳', start: 6, end: 8 }
  ]);
  assert.deepEqual(strategy.find('我，好'), []);
});

test('CjkNameStrategy finds names written with extension-block ideographs', () => {
  const strategy = new CjkNameStrategy(new Set());
  // '𠮷' lies outside the basic CJK block and takes two UTF-16 code units.
  assert.deepEqual(strategy.find('𠮷田，好'), [{ name: '𠮷田', start: 0, end: 3 }]);
});

test('CjkNameStrategy loads the bundled common word list by default', () => {
  const strategy = new CjkNameStrategy();
  assert.deepEqual(strategy.find('谢谢，师父！'), []);
});

test('CapitalizedNameStrategy skips stop words and sentence openers', () => {
  const strategy = new CapitalizedNameStrategy(new Set(['Hello']));
  assert.deepEqual(strategy.find('Hello Anna, meet Captain Rex Morgan. Paris is lovely.'), [
    { name: 'Anna', start: 6, end: 10 },
    { name: 'Captain Rex Morgan', start: 17, end: 35 }
  ]);
});

test('CapitalizedNameStrategy keeps accented names whole', () => {
  const strategy = new CapitalizedNameStrategy(new Set());
  assert.deepEqual(strategy.find('we saw Zoë Ångström'), [
    { name: 'Zoë Ångström', start: 7, end: 19 }
  ]);
});

test('DictionaryOnlyStrategy proposes nothing', () => {
  assert.deepEqual(new DictionaryOnlyStrategy().find('Anna 李明'), []);
});

test('FrequentNameStrategy keeps candidates that repeat across the document', () => {
  const strategy = new FrequentNameStrategy(new CjkNameStrategy(new Set()), 2);
  assert.equal(strategy.id, 'frequent(cjk)');

  assert.deepEqual(
    strategy.find('李明，王芳').map((span) => span.name),
    ['李明', '王芳']
  );

  strategy.prime(['李明，走', '李明！', '王芳。']);
  assert.deepEqual(strategy.find('李明，王芳'), [{ name: '李明', start: 0, end: 2 }]);
});

test('createNameStrategy picks a strategy from the source language', () => {
  assert.equal(createNameStrategy('zh-Hans').id, 'frequent(cjk)');
  assert.equal(createNameStrategy('en').id, 'frequent(capitalized)');
  assert.equal(createNameStrategy('ar').id, 'dictionary');
});
