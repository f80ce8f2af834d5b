/**
 * Unit tests for the pgvector backend and the read-only guard
 */

import { afterEach, describe, expect, it, jest } from '@jest/globals';

import { assertReadOnly, DatabaseClient } from '@database/client';
import { PgVectorSearchBackend } from '@retrieval/pgvector-backend';
import { DEFAULT_CONFIG } from '@/types/config';
import { DatabaseNotConnectedError } from '@utils/errors';
import { OllamaClient } from '@utils/ollama';
import { SINGLE_ATTEMPT } from '@utils/retry';

describe('assertReadOnly', () => {
  it.each(['SELECT 1', '  with x as (select 1) select * from x', 'SELECT 1;'])('accepts %p', (sql) => {
    expect(() => {
      assertReadOnly(sql);
    }).not.toThrow();
  });

  it.each(['DELETE FROM langchain_pg_embedding', 'SELECT 1; DROP TABLE t'])('rejects %p', (sql) => {
    expect(() => {
      assertReadOnly(sql);
    }).toThrow();
  });
});

describe('PgVectorSearchBackend', () => {
  afterEach(() => {
    jest.restoreAllMocks();
  });

  it('refuses queries before connect', async () => {
    const db = new DatabaseClient(DEFAULT_CONFIG.database);
    await expect(db.query('SELECT 1', [])).rejects.toBeInstanceOf(DatabaseNotConnectedError);
  });

  it('embeds the query, searches the named collection and converts distance to score', async () => {
    const db = new DatabaseClient(DEFAULT_CONFIG.database);
    const ollama = new OllamaClient(DEFAULT_CONFIG.ollama, SINGLE_ATTEMPT);
    jest.spyOn(ollama, 'generateEmbedding').mockResolvedValue([0.5, 0.25]);
    const query = jest.spyOn(db, 'query').mockResolvedValue({
      command: 'SELECT',
      rowCount: 2,
      oid: 0,
      fields: [],
      rows: [
        { document: 'CREATE TABLE orders (id int)', source: 'db/schema.sql', distance: 0.25 },
        { document: null, source: null, distance: '0.5' },
      ],
    });

    const backend = new PgVectorSearchBackend(db, ollama, 'postgresql://localhost:5432/vector_store');
    const results = await backend.search('orders-external-files', 'database tables', 5);

    expect(query.mock.calls[0][1]).toEqual(['[0.5,0.25]', 'orders-external-files', 5]);
    expect(results).toEqual([
      { page_content: 'CREATE TABLE orders (id int)', source: 'db/schema.sql', score: 0.75 },
      { page_content: '', source: 'unknown', score: 0.5 },
    ]);
  });
});
