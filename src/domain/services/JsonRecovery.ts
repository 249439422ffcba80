import { MalformedExtractionError } from '../errors/ExtractionErrors.js';

export type RecoveredRecord = Record<string, unknown>;

export type RecoveryStrategy =
  | 'direct'
  | 'fence-stripped'
  | 'fenced-block'
  | 'fenced-block-repaired'
  | 'balanced-object'
  | 'balanced-object-repaired'
  | 'repaired-text';

export interface RecoveryResult {
  record: RecoveredRecord;
  strategy: RecoveryStrategy;
}

const leadingFence = /^```[\w-]*[ \t]*(?:\r?\n)?/;
const trailingFence = /(?:\r?\n)?[ \t]*```$/;
const jsonFencedBlock = /```[ \t]*json[ \t]*\r?\n([\s\S]*?)```/i;
const anyFencedBlock = /```[ \t]*\r?\n([\s\S]*?)```/;
const trailingComma = /,\s*([}\]])/g;
const groupedNumber = /\d{1,3}(?:,\d{3})+(?:\.\d+)?(?![\w"'])/y;

interface Segment {
  text: string;
  quoted: boolean;
}

/**
 * Splits text into runs inside and outside of double-quoted JSON strings, honoring backslash
 * escapes. An unterminated string runs to the end of the text.
 */
const splitByStrings = (content: string): Segment[] => {
  const segments: Segment[] = [];
  let start = 0;
  let inString = false;
  let escaped = false;

  for (let idx = 0; idx < content.length; idx++) {
    const ch = content[idx];

    if (inString) {
      if (escaped) {
        escaped = false;
      } else if (ch === '\\') {
        escaped = true;
      } else if (ch === '"') {
        segments.push({ text: content.slice(start, idx + 1), quoted: true });
        start = idx + 1;
        inString = false;
      }
      continue;
    }

    if (ch === '"') {
      if (idx > start) {
        segments.push({ text: content.slice(start, idx), quoted: false });
      }
      start = idx;
      inString = true;
    }
  }

  if (start < content.length) {
    segments.push({ text: content.slice(start), quoted: inString });
  }

  return segments;
};

const rewriteOutsideStrings = (content: string, rewrite: (segment: string) => string): string =>
  splitByStrings(content)
    .map((segment) => (segment.quoted ? segment.text : rewrite(segment.text)))
    .join('');

export const stripCodeFences = (content: string): string =>
  content.trim().replace(leadingFence, '').replace(trailingFence, '').trim();

export const extractFencedBlock = (content: string): string | null => {
  const match = jsonFencedBlock.exec(content) ?? anyFencedBlock.exec(content);
  return match ? match[1].trim() : null;
};

export const extractFirstJsonObject = (content: string): string | null => {
  const start = content.indexOf('{');
  if (start === -1) {
    return null;
  }

  let depth = 0;
  let inString = false;
  let escaped = false;

  for (let idx = start; idx < content.length; idx++) {
    const ch = content[idx];

    if (inString) {
      if (escaped) {
        escaped = false;
      } else if (ch === '\\') {
        escaped = true;
      } else if (ch === '"') {
        inString = false;
      }
      continue;
    }

    if (ch === '"') {
      inString = true;
    } else if (ch === '{') {
      depth++;
    } else if (ch === '}') {
      depth--;
      if (depth === 0) {
        return content.slice(start, idx + 1);
      }
    }
  }

  return null;
};

export const removeTrailingCommas = (content: string): string =>
  rewriteOutsideStrings(content, (segment) => {
    let previous: string;
    let current = segment;
    do {
      previous = current;
      current = current.replace(trailingComma, '$1');
    } while (current !== previous);
    return current;
  });

/**
 * Drops thousands separators from bare numbers such as `12,345.67`. Tokens touching a word
 * character or a quote are left alone.
 */
export const normalizeNumberSeparators = (content: string): string =>
  rewriteOutsideStrings(content, (segment) => {
    let output = '';
    let idx = 0;

    while (idx < segment.length) {
      const previous = idx > 0 ? segment[idx - 1] : '';
      if (/\d/.test(segment[idx]) && !/[\w"']/.test(previous)) {
        groupedNumber.lastIndex = idx;
        const match = groupedNumber.exec(segment);
        if (match) {
          output += match[0].replace(/,/g, '');
          idx += match[0].length;
          continue;
        }
      }

      output += segment[idx];
      idx++;
    }

    return output;
  });

const isRecord = (value: unknown): value is RecoveredRecord =>
  typeof value === 'object' && value !== null && !Array.isArray(value);

const tryParseObject = (candidate: string): RecoveredRecord | null => {
  try {
    const parsed: unknown = JSON.parse(candidate);
    return isRecord(parsed) ? parsed : null;
  } catch {
    return null;
  }
};

const tryParseRepaired = (candidate: string): RecoveredRecord | null => {
  const withoutCommas = removeTrailingCommas(candidate);
  return tryParseObject(withoutCommas) ?? tryParseObject(normalizeNumberSeparators(withoutCommas));
};

/**
 * Recovers a JSON object from free-form model output. Strategies run in a fixed order and the
 * first that yields an object wins; the winning strategy is reported back for diagnostics.
 */
export const recoverJson = (content: string): RecoveryResult => {
  const direct = tryParseObject(content);
  if (direct) {
    return { record: direct, strategy: 'direct' };
  }

  const cleaned = stripCodeFences(content);
  const fenceStripped = tryParseObject(cleaned);
  if (fenceStripped) {
    return { record: fenceStripped, strategy: 'fence-stripped' };
  }

  const fenced = extractFencedBlock(content);
  if (fenced) {
    const record = tryParseObject(fenced);
    if (record) {
      return { record, strategy: 'fenced-block' };
    }

    const repaired = tryParseRepaired(fenced);
    if (repaired) {
      return { record: repaired, strategy: 'fenced-block-repaired' };
    }
  }

  const balanced = extractFirstJsonObject(cleaned);
  if (balanced) {
    const record = tryParseObject(balanced);
    if (record) {
      return { record, strategy: 'balanced-object' };
    }

    const repaired = tryParseRepaired(balanced);
    if (repaired) {
      return { record: repaired, strategy: 'balanced-object-repaired' };
    }
  }

  const repairedText = tryParseRepaired(cleaned);
  if (repairedText) {
    return { record: repairedText, strategy: 'repaired-text' };
  }

  throw new MalformedExtractionError(content);
};

export const recoverJsonRecord = (content: string): RecoveredRecord => recoverJson(content).record;
