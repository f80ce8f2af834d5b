/**
 * Robust JSON recovery for LLM output
 *
 * An ordered chain of pure strategies, each `string -> record | null`,
 * composed with first-success semantics. Negative signals and the fallback
 * record are terminal steps after every strategy failed.
 */

import { type ExtractionRecord, type JsonObject, type JsonValue, type ParseResult } from '@/types/extraction';

export type ParseStrategy = (text: string) => ExtractionRecord | null;

export const EMPTY_OUTPUT = 'empty output';
export const NO_INFORMATION = 'no information found';
export const FALLBACK_USED = 'used fallback structure';

const RAW_OUTPUT_LIMIT = 500;

const PREAMBLES = ['Here is the JSON:', 'JSON:', 'Result:', 'Output:'];

const NEGATIVE_EXACT = new Set(['no', 'no.', 'none', 'none.']);
const NEGATIVE_PREFIXES = ['no.', 'no,', 'no '];
const NEGATIVE_PHRASES = ['no database', 'no server', 'none found'];

export const isJsonValue = (value: unknown): value is JsonValue => {
  if (value === null || typeof value === 'string' || typeof value === 'boolean') {
    return true;
  }
  if (typeof value === 'number') {
    return Number.isFinite(value);
  }
  if (Array.isArray(value)) {
    return value.every(isJsonValue);
  }
  if (typeof value === 'object') {
    return Object.values(value).every(isJsonValue);
  }
  return false;
};

export const isJsonObject = (value: unknown): value is JsonObject => {
  return typeof value === 'object' && value !== null && !Array.isArray(value) && isJsonValue(value);
};

const tryParse = (text: string): unknown => {
  try {
    return JSON.parse(text) as unknown;
  } catch {
    return undefined;
  }
};

/**
 * Accept objects as-is, wrap arrays as `{ items }`, reject scalars.
 * Empty objects are rejected: an empty record is never produced.
 */
const toRecord = (value: unknown): ExtractionRecord | null => {
  if (Array.isArray(value)) {
    return value.length > 0 && value.every(isJsonValue) ? { items: value } : null;
  }
  if (isJsonObject(value)) {
    return Object.keys(value).length > 0 ? value : null;
  }
  return null;
};

export const directParse: ParseStrategy = (text) => toRecord(tryParse(text.trim()));

export const fencedBlock: ParseStrategy = (text) => {
  const match = /```(?:json)?\s*([\s\S]*?)```/i.exec(text);
  if (!match?.[1]) {
    return null;
  }
  return toRecord(tryParse(match[1].trim()));
};

/**
 * Locate the first balanced `{...}` span, ignoring braces inside string literals
 */
export const findBalancedObject = (text: string): string | null => {
  const start = text.indexOf('{');
  if (start === -1) {
    return null;
  }

  let depth = 0;
  let inString = false;
  let escaped = false;

  for (let i = start; i < text.length; i++) {
    const char = text[i];

    if (inString) {
      if (escaped) {
        escaped = false;
      } else if (char === '\\') {
        escaped = true;
      } else if (char === '"') {
        inString = false;
      }
      continue;
    }

    if (char === '"') {
      inString = true;
    } else if (char === '{') {
      depth++;
    } else if (char === '}') {
      depth--;
      if (depth === 0) {
        return text.slice(start, i + 1);
      }
    }
  }

  return null;
};

export const balancedBraces: ParseStrategy = (text) => {
  const span = findBalancedObject(text);
  return span === null ? null : toRecord(tryParse(span));
};

export const preambleStrip: ParseStrategy = (text) => {
  let cleaned = text.trim();
  for (const prefix of PREAMBLES) {
    if (cleaned.startsWith(prefix)) {
      cleaned = cleaned.slice(prefix.length).trim();
    }
  }

  const start = cleaned.indexOf('{');
  const end = cleaned.lastIndexOf('}');
  if (start === -1 || end <= start) {
    return null;
  }
  return toRecord(tryParse(cleaned.slice(start, end + 1)));
};

/**
 * Strategies in the order they are attempted
 */
export const PARSE_STRATEGIES: readonly ParseStrategy[] = [directParse, fencedBlock, balancedBraces, preambleStrip];

/**
 * Whether the text says the LLM found nothing.
 * Exact answers, a leading "no" followed by punctuation or a space, or a
 * negative phrase; "no" inside other words never matches.
 */
export const isNegativeSignal = (text: string): boolean => {
  const normalized = text.trim().toLowerCase();
  if (NEGATIVE_EXACT.has(normalized)) {
    return true;
  }
  if (NEGATIVE_PREFIXES.some((prefix) => normalized.startsWith(prefix))) {
    return true;
  }
  return NEGATIVE_PHRASES.some((phrase) => normalized.includes(phrase));
};

/**
 * `{}`, `[]` and `null` carry no information
 */
const isEmptyJson = (text: string): boolean => {
  const value = tryParse(text.trim());
  if (value === null) {
    return true;
  }
  if (Array.isArray(value)) {
    return value.length === 0;
  }
  return typeof value === 'object' && value !== null && Object.keys(value).length === 0;
};

/**
 * Record that preserves unparsable output under its source file
 */
export const fallbackRecord = (text: string, sourceLabel: string): ExtractionRecord => ({
  source_file: sourceLabel,
  raw_llm_output: text.length > RAW_OUTPUT_LIMIT ? `${text.slice(0, RAW_OUTPUT_LIMIT)}...` : text,
  parsing_error: true,
  extraction_status: 'partial',
});

export const isFallbackRecord = (record: ExtractionRecord): boolean => record.parsing_error === true;

/**
 * Recover a structured record from LLM output
 *
 * @param text - Raw LLM output
 * @param sourceLabel - Source file recorded in a fallback record
 * @returns Record and diagnostic; a null record with a diagnostic is a valid terminal state
 */
export const parseLlmOutput = (text: string, sourceLabel: string): ParseResult => {
  if (text.trim() === '') {
    return { record: null, diagnostic: EMPTY_OUTPUT };
  }

  for (const strategy of PARSE_STRATEGIES) {
    const record = strategy(text);
    if (record !== null) {
      return { record, diagnostic: null };
    }
  }

  if (isEmptyJson(text) || isNegativeSignal(text)) {
    return { record: null, diagnostic: NO_INFORMATION };
  }

  return { record: fallbackRecord(text, sourceLabel), diagnostic: FALLBACK_USED };
};
