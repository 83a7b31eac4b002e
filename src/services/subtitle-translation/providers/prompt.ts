import { ProviderError } from '@/services/subtitle-translation/errors';
import type { TranslationRequest } from '@/services/subtitle-translation/types';

const languageNames = new Intl.DisplayNames(['en'], { type: 'language' });

export function describeLanguage(code: string): string {
  try {
    const name = languageNames.of(code);
    return name && name !== code ? `${name} (${code})` : code;
  } catch {
    return code;
  }
}

export function buildTranslationPrompt(
  texts: string[],
  request: TranslationRequest
): { systemPrompt: string; userPrompt: string } {
  const source = request.sourceLanguage ? describeLanguage(request.sourceLanguage) : 'the source language';
  const target = describeLanguage(request.targetLanguage);

  const systemPrompt = [
    `You are a subtitle translator. Translate each subtitle line from ${source} into ${target}.`,
    'Preserve the original meaning and tone, and use natural, fluent phrasing.',
    'Tokens of the form [[N<number>]] are proper names: copy them unchanged.',
    'Keep line breaks inside a line as \\n.',
    `Return JSON only: {"translations":[string, ...]} with exactly ${texts.length} items in input order.`
  ].join(' ');

  const userPrompt = [
    `Context: ${request.contextHint ?? 'No specific context provided'}`,
    'Input lines JSON:',
    JSON.stringify(texts)
  ].join('\n\n');

  return { systemPrompt, userPrompt };
}

function parseJsonBlock(content: string): unknown {
  try {
    return JSON.parse(content);
  } catch {
    const fenced = content.match(/```(?:json)?\s*([\s\S]*?)\s*```/i)?.[1] ?? content;
    return JSON.parse(fenced);
  }
}

export function parseTranslationsPayload(
  content: string,
  expected: number,
  providerId: string
): string[] {
  let payload: unknown;
  try {
    payload = parseJsonBlock(content);
  } catch (error) {
    throw new ProviderError({
      kind: 'MalformedResponse',
      providerId,
      message: `${providerId} returned content that is not JSON.`,
      cause: error
    });
  }

  const translations =
    typeof payload === 'object' && payload !== null && 'translations' in payload
      ? payload.translations
      : undefined;

  if (!Array.isArray(translations) || !translations.every((item) => typeof item === 'string')) {
    throw new ProviderError({
      kind: 'MalformedResponse',
      providerId,
      message: `${providerId} response did not include a string "translations" array.`
    });
  }

  if (translations.length !== expected) {
    throw new ProviderError({
      kind: 'MalformedResponse',
      providerId,
      message: `${providerId} returned ${translations.length} translations for ${expected} lines.`
    });
  }

  return translations.map((item) => String(item));
}
