/**
 * Unit tests for record classification and database normalization
 */

import { describe, expect, it } from '@jest/globals';

import { type JsonObject } from '@/types/extraction';
import { fallbackRecord } from '@extraction/json-parser';
import { normalize, resolveSourceFile } from '@transform/normalizer';
import { classifyRecord } from '@transform/record-classifier';

import { chunk } from '../../helpers/fakes';

describe('classifyRecord', () => {
  it('should treat fallback records as unrecognized', () => {
    expect(classifyRecord(fallbackRecord('garbled', 'a.ts')).kind).toBe('unrecognized');
  });

  it('should recognize server records by compacted key names', () => {
    expect(classifyRecord({ host: 'db', port: 5432 }).kind).toBe('server');
    expect(classifyRecord({ 'Database Name': 'orders' }).kind).toBe('server');
  });

  it('should leave unknown shapes unrecognized', () => {
    expect(classifyRecord({ note: 'uses an ORM' })).toEqual({ kind: 'unrecognized', raw: { note: 'uses an ORM' } });
  });

  it('should read a named table object with its fields', () => {
    const record = { table: { name: 'users', fields: ['id', 'email'] } };

    expect(classifyRecord(record)).toEqual({
      kind: 'table',
      tables: [{ name: 'users', key: 'table', fromList: false, columns: ['id', 'email'] }],
      columns: [],
      record,
    });
  });

  it('should read lists of named tables and tables keyed by name', () => {
    const listed = classifyRecord({ tables: [{ table_name: 'a', columns: [{ column_name: 'x' }] }] });
    const keyed = classifyRecord({ entities: { payments: ['amount'] } });

    expect(listed.kind === 'table' && listed.tables).toEqual([
      { name: 'a', key: 'tables', fromList: true, columns: ['x'] },
    ]);
    expect(keyed.kind === 'table' && keyed.tables).toEqual([
      { name: 'payments', key: 'entities', fromList: true, columns: ['amount'] },
    ]);
  });
});

describe('resolveSourceFile', () => {
  const chunks = [chunk('content', 'src/a.ts')];

  it('should prefer an explicit source file', () => {
    expect(resolveSourceFile({ source_file: 'schema.sql' }, 0, chunks)).toBe('schema.sql');
  });

  it('should use the chunk at the same position', () => {
    expect(resolveSourceFile({ tables: ['a'] }, 0, chunks)).toBe('src/a.ts');
  });

  it('should number records without a chunk', () => {
    expect(resolveSourceFile({ tables: ['a'] }, 2, chunks)).toBe('extracted_data_3.unknown');
  });
});

describe('normalize', () => {
  const chunks = [
    chunk('String q = "SELECT id, email FROM users WHERE active = 1";', 'src/UserRepo.java'),
    chunk('orders.save(order)', 'src/OrderService.ts'),
  ];
  const records: JsonObject[] = [
    { tables: ['users'], columns: ['id', 'email', 'created_at'], query: 'SELECT id, email FROM users WHERE active = 1' },
    { table_name: 'orders', sql: 'SELECT name' },
    { source_file: 'schema.sql', entities: { payments: ['amount', 'status'] }, statement: 'DROP x' },
  ];

  it('should build table information, queries and invalid queries', () => {
    expect(normalize(records, chunks)).toEqual({
      'Table Information': [
        {
          'src/UserRepo.java': {
            users: {
              'Field Information': [
                { column_name: 'id', data_type: 'integer', CRUD: 'READ' },
                { column_name: 'email', data_type: 'string', CRUD: 'READ' },
                { column_name: 'created_at', data_type: 'datetime', CRUD: 'READ' },
              ],
            },
          },
        },
        {
          'src/OrderService.ts': {
            orders: {
              'Field Information': [{ column_name: 'extracted_from_table_name', data_type: 'string', CRUD: 'CREATE' }],
            },
          },
        },
        {
          'schema.sql': {
            payments: {
              'Field Information': [
                { column_name: 'amount', data_type: 'decimal', CRUD: 'UNKNOWN' },
                { column_name: 'status', data_type: 'string', CRUD: 'UNKNOWN' },
              ],
            },
          },
        },
      ],
      SQL_QUERIES: ['SELECT id, email FROM users WHERE active = 1'],
      Invalid_SQL_Queries: [
        { source_file: 'src/OrderService.ts', query: 'SELECT name', reason: 'SELECT without FROM' },
        { source_file: 'schema.sql', query: 'DROP x', reason: 'Invalid SQL syntax or too short' },
      ],
    });
  });

  it('should name the placeholder column after a list key', () => {
    const spec = normalize([{ tables: ['audit_log'] }], [chunk('audit trail', 'audit.ts')]);

    expect(spec['Table Information']).toEqual([
      {
        'audit.ts': {
          audit_log: { 'Field Information': [{ column_name: 'from_tables', data_type: 'string', CRUD: 'READ' }] },
        },
      },
    ]);
  });

  it('should keep tables whose names collide with object members', () => {
    const spec = normalize(
      [{ table_name: 'constructor' }, { table_name: '__proto__' }],
      [chunk('audit trail', 'a.sql'), chunk('audit trail', 'b.sql')]
    );
    const field = { 'Field Information': [{ column_name: 'extracted_from_table_name', data_type: 'string', CRUD: 'READ' }] };

    expect(spec['Table Information']).toEqual([{ 'a.sql': { constructor: field } }, { 'b.sql': { ['__proto__']: field } }]);
    expect(Object.keys(spec['Table Information'][1]?.['b.sql'] ?? {})).toEqual(['__proto__']);
  });

  it('should report each invalid query once per source file', () => {
    const spec = normalize(
      [
        { source_file: 'a.sql', q1: 'UPDATE users', q2: 'UPDATE users' },
        { source_file: 'b.sql', q: 'UPDATE users' },
      ],
      []
    );

    expect(spec.Invalid_SQL_Queries).toEqual([
      { source_file: 'a.sql', query: 'UPDATE users', reason: 'UPDATE without SET' },
      { source_file: 'b.sql', query: 'UPDATE users', reason: 'UPDATE without SET' },
    ]);
  });

  it('should be deterministic', () => {
    expect(normalize(records, chunks)).toEqual(normalize(records, chunks));
  });

  it('should return an empty specification for no records', () => {
    expect(normalize([], [])).toEqual({ 'Table Information': [], SQL_QUERIES: [], Invalid_SQL_Queries: [] });
  });
});
