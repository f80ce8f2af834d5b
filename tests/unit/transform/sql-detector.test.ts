/**
 * Unit tests for SQL recognition
 */

import { describe, expect, it } from '@jest/globals';

import {
  checkCandidateQuery,
  checkSql,
  extractSqlFromSource,
  isValidSql,
  mentionsSql,
  TOO_SHORT_REASON,
} from '@transform/sql-detector';

describe('checkSql', () => {
  it.each<[string, string]>([
    ['SELECT name FROM users', ''],
    ['INSERT INTO audit (id) SELECT id FROM users', ''],
    ['CREATE TABLE users (id INT)', ''],
    ['SELECT name', 'SELECT without FROM'],
    ['INSERT audit VALUES (1)', 'INSERT without INTO and VALUES or SELECT'],
    ['UPDATE users', 'UPDATE without SET'],
    ['DELETE users', 'DELETE without FROM'],
    ['DROP TABLE x', 'DDL statement too short'],
    ['GRANT ALL ON users', 'Not a recognized SQL statement'],
  ])('should check %p', (query, reason) => {
    expect(checkSql(query)).toEqual({ valid: reason === '', reason });
  });

  it('should match keywords as whole words', () => {
    expect(isValidSql('SELECT fromage FROM cheeses')).toBe(true);
    expect(isValidSql('SELECT fromage')).toBe(false);
  });
});

describe('checkCandidateQuery', () => {
  it('should reject values of ten characters or fewer', () => {
    expect(checkCandidateQuery('SELECT 1')).toEqual({ valid: false, reason: TOO_SHORT_REASON });
  });

  it('should check longer values structurally', () => {
    expect(checkCandidateQuery('SELECT name FROM users').valid).toBe(true);
  });
});

describe('mentionsSql', () => {
  it('should require a whole keyword', () => {
    expect(mentionsSql('please select a row')).toBe(true);
    expect(mentionsSql('selection and updates')).toBe(false);
  });
});

describe('extractSqlFromSource', () => {
  it('should find statements embedded in string literals', () => {
    const source = [
      'String q = "SELECT id, email FROM users WHERE active = 1";',
      'String d = "DELETE FROM sessions WHERE expired = 1";',
    ].join('\n');

    expect(extractSqlFromSource(source)).toEqual([
      'SELECT id, email FROM users WHERE active = 1',
      'DELETE FROM sessions WHERE expired = 1',
    ]);
  });

  it('should keep INSERT statements through their VALUES list', () => {
    expect(extractSqlFromSource('db.exec("INSERT INTO users (id, name) VALUES (?, ?)")')).toEqual([
      'INSERT INTO users (id, name) VALUES (?, ?)',
    ]);
  });

  it('should collapse whitespace and end a statement at a line starting a new word', () => {
    const source = 'const sql = `SELECT id\n  FROM orders\n  WHERE total > 10`;';

    expect(extractSqlFromSource(source)).toEqual(['SELECT id FROM orders']);
  });

  it('should return nothing for source without SQL', () => {
    expect(extractSqlFromSource('const total = items.length;')).toEqual([]);
  });
});
