/**
 * Classification of open-ended extraction records
 *
 * Records are resolved once, at the normalization boundary, into a tagged
 * union by key-name heuristics. Downstream code switches on `kind` instead
 * of probing keys.
 */
import { type ExtractionRecord, type JsonObject, type JsonValue } from '@/types/extraction';

import { isFallbackRecord } from '@extraction/json-parser';

const TABLE_KEY = /table|schema|model|entit/i;
const COLUMN_KEY = /column|field|attribute/i;
const SERVER_KEY = /^(?:host|hostname|hosts|server|port|ports|endpoints?|urls?|db|database|databasename|dbname|dbhost|dbport)$/;

/**
 * A table named by a record, with the key it came from
 */
export interface TableReference {
  name: string;
  key: string;
  /** The key held a list of names rather than a single one */
  fromList: boolean;
  /** Columns listed on the table object itself */
  columns: string[];
}

export type ClassifiedRecord =
  | { kind: 'table'; tables: TableReference[]; columns: string[]; record: ExtractionRecord }
  | { kind: 'server'; record: ExtractionRecord }
  | { kind: 'unrecognized'; raw: ExtractionRecord };

/**
 * Lowercase a key and drop separators: 'Database Name' -> 'databasename'
 */
export const compactKey = (key: string): string => key.toLowerCase().replace(/[^a-z0-9]/g, '');

const isObject = (value: JsonValue): value is JsonObject =>
  typeof value === 'object' && value !== null && !Array.isArray(value);

const nameOf = (value: JsonValue): string | null => {
  if (typeof value === 'string') {
    return value.trim() || null;
  }
  if (isObject(value)) {
    for (const key of ['name', 'table_name', 'column_name', 'table', 'column']) {
      const candidate = value[key];
      if (typeof candidate === 'string' && candidate.trim()) {
        return candidate.trim();
      }
    }
  }
  return null;
};

/**
 * Column names held by a value: a string, or a list of strings or named objects
 */
export const namesIn = (value: JsonValue): string[] => {
  const values = Array.isArray(value) ? value : [value];
  return values.map(nameOf).filter((name): name is string => name !== null);
};

const columnsOf = (value: JsonValue): string[] => {
  if (!isObject(value)) {
    return [];
  }
  return Object.entries(value)
    .filter(([key]) => COLUMN_KEY.test(key))
    .flatMap(([, inner]) => namesIn(inner));
};

const tablesUnder = (key: string, value: JsonValue): TableReference[] => {
  if (Array.isArray(value)) {
    return value.flatMap((item) => {
      const name = nameOf(item);
      return name === null ? [] : [{ name, key, fromList: true, columns: columnsOf(item) }];
    });
  }
  const name = nameOf(value);
  if (name !== null) {
    return [{ name, key, fromList: false, columns: columnsOf(value) }];
  }
  // { "users": ["id", "email"] } or { "users": { "columns": [...] } }
  if (isObject(value)) {
    return Object.entries(value).map(([table, inner]) => ({
      name: table,
      key,
      fromList: true,
      columns: Array.isArray(inner) ? namesIn(inner) : columnsOf(inner),
    }));
  }
  return [];
};

/**
 * Resolve a record into a table, server or unrecognized variant
 */
export const classifyRecord = (record: ExtractionRecord): ClassifiedRecord => {
  if (isFallbackRecord(record)) {
    return { kind: 'unrecognized', raw: record };
  }

  const entries = Object.entries(record).filter(([key]) => key !== 'source_file');

  const tables = entries
    .filter(([key]) => TABLE_KEY.test(key) && !COLUMN_KEY.test(key))
    .flatMap(([key, value]) => tablesUnder(key, value));
  if (tables.length > 0) {
    const columns = entries.filter(([key]) => COLUMN_KEY.test(key)).flatMap(([, value]) => namesIn(value));
    return { kind: 'table', tables, columns, record };
  }

  if (entries.some(([key]) => SERVER_KEY.test(compactKey(key)))) {
    return { kind: 'server', record };
  }

  return { kind: 'unrecognized', raw: record };
};
