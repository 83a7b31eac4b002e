export type ScriptClass = 'han' | 'cased' | 'uncased';

const HAN_LANGS = new Set(['zh', 'yue', 'wuu', 'ja']);
const UNCASED_LANGS = new Set(['ar', 'he', 'fa', 'ur', 'ko', 'th', 'lo', 'km', 'my', 'hi', 'bn', 'ta', 'te', 'ka', 'am']);

const HAN_SCRIPTS = new Set(['hans', 'hant', 'hani', 'jpan']);
const UNCASED_SCRIPTS = new Set(['arab', 'hebr', 'hang', 'kore', 'thai', 'deva', 'beng', 'taml']);
const CASED_SCRIPTS = new Set(['latn', 'cyrl', 'grek', 'armn']);

export interface ParsedBcp47 {
  language: string;
  script?: string;
}

export function parseBcp47(value: string): ParsedBcp47 {
  const normalized = value.trim().replace(/_/g, '-');
  if (!normalized) {
    return { language: 'und' };
  }

  const parts = normalized.split('-').filter(Boolean);
  const language = (parts[0] ?? 'und').toLowerCase();

  let script: string | undefined;
  for (const part of parts.slice(1)) {
    if (part.length === 4) {
      script = part.toLowerCase();
      break;
    }
  }

  return { language, script };
}

export function classifyScript(bcp47: string): ScriptClass {
  const parsed = parseBcp47(bcp47);

  if (parsed.script) {
    if (HAN_SCRIPTS.has(parsed.script)) {
      return 'han';
    }
    if (UNCASED_SCRIPTS.has(parsed.script)) {
      return 'uncased';
    }
    if (CASED_SCRIPTS.has(parsed.script)) {
      return 'cased';
    }
  }

  if (HAN_LANGS.has(parsed.language)) {
    return 'han';
  }

  if (UNCASED_LANGS.has(parsed.language)) {
    return 'uncased';
  }

  return 'cased';
}
