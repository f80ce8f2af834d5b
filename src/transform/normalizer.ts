/**
 * Database specification normalizer
 *
 * Folds database extraction records into the `Table Information`,
 * `SQL_QUERIES` and `Invalid_SQL_Queries` structure. Deterministic:
 * normalizing the same records twice yields the same lists.
 */
import { type ExtractionRecord, type JsonValue, type RetrievedChunk } from '@/types/extraction';
import {
  type DatabaseSpecification,
  type FieldInformation,
  type TableDefinition,
  type TableInformationEntry,
} from '@/types/specification';

import { inferCrudOperations } from './crud-inference';
import { classifyRecord, type TableReference } from './record-classifier';
import { checkCandidateQuery, extractSqlFromSource, mentionsSql } from './sql-detector';
import { inferDataType } from './type-inference';

export const emptyDatabaseSpecification = (): DatabaseSpecification => ({
  'Table Information': [],
  SQL_QUERIES: [],
  Invalid_SQL_Queries: [],
});

/**
 * Resolve the source file of the record at `index`
 */
export const resolveSourceFile = (record: ExtractionRecord, index: number, chunks: RetrievedChunk[]): string => {
  const explicit = record.source_file;
  if (typeof explicit === 'string' && explicit.trim()) {
    return explicit;
  }
  return chunks[index]?.source_path ?? `extracted_data_${String(index + 1)}.unknown`;
};

const stringValues = (value: JsonValue): string[] => {
  if (typeof value === 'string') {
    return [value];
  }
  if (Array.isArray(value)) {
    return value.filter((item): item is string => typeof item === 'string');
  }
  return [];
};

const tableDefinition = (table: TableReference, recordColumns: string[], source: string): TableDefinition => {
  const crud = inferCrudOperations(source, table.name);
  const names = [...new Set([...table.columns, ...recordColumns])];

  const fields: FieldInformation[] =
    names.length > 0
      ? names.map((column) => ({ column_name: column, data_type: inferDataType(column, column), CRUD: crud }))
      : [
          {
            column_name: table.fromList ? `from_${table.key}` : `extracted_from_${table.key}`,
            data_type: inferDataType(table.key, table.name),
            CRUD: crud,
          },
        ];

  return { 'Field Information': fields };
};

/**
 * Build the database specification from extraction records
 *
 * @param records - Database extraction records
 * @param chunks - Source chunks, `chunks[i]` being the chunk `records[i]` came from
 */
export const normalize = (records: ExtractionRecord[], chunks: RetrievedChunk[]): DatabaseSpecification => {
  const spec = emptyDatabaseSpecification();
  const invalidKeys = new Set<string>();

  const addQuery = (query: string): void => {
    if (!spec.SQL_QUERIES.includes(query)) {
      spec.SQL_QUERIES.push(query);
    }
  };

  const addInvalid = (sourceFile: string, query: string, reason: string): void => {
    const key = `${sourceFile}\u0000${query}`;
    if (!invalidKeys.has(key)) {
      invalidKeys.add(key);
      spec.Invalid_SQL_Queries.push({ source_file: sourceFile, query, reason });
    }
  };

  records.forEach((record, index) => {
    const sourceFile = resolveSourceFile(record, index, chunks);
    const source = chunks[index]?.content ?? '';
    const classified = classifyRecord(record);

    if (classified.kind === 'table') {
      // Table names are data: `constructor` or `__proto__` must become own keys
      const tables = new Map<string, TableDefinition>();
      for (const table of classified.tables) {
        if (!tables.has(table.name)) {
          tables.set(table.name, tableDefinition(table, classified.columns, source));
        }
      }
      const entry: TableInformationEntry = { [sourceFile]: Object.fromEntries(tables) };
      spec['Table Information'].push(entry);
    }

    for (const [key, value] of Object.entries(record)) {
      if (key === 'source_file') {
        continue;
      }
      for (const text of stringValues(value)) {
        if (!mentionsSql(text)) {
          continue;
        }
        const query = text.trim();
        const check = checkCandidateQuery(query);
        if (check.valid) {
          addQuery(query);
        } else {
          addInvalid(sourceFile, query, check.reason);
        }
      }
    }

    for (const statement of extractSqlFromSource(source)) {
      addQuery(statement);
    }
  });

  return spec;
};
