/**
 * Direct similarity search against a pgvector store
 *
 * Collections and embeddings live in the tables written by the embedding
 * service. The query is embedded with the same model before searching.
 */
import { type DatabaseClient } from '@database/client';
import { type OllamaClient } from '@utils/ollama';

import { type BackendResult, type VectorSearchBackend } from './vector-search';

interface EmbeddingRow {
  document: string | null;
  source: string | null;
  distance: number;
}

const SEARCH_SQL = `
  SELECT
    e.document,
    e.cmetadata->>'source' AS source,
    e.embedding <=> $1::vector AS distance
  FROM langchain_pg_embedding e
  JOIN langchain_pg_collection c ON e.collection_id = c.uuid
  WHERE c.name = $2
  ORDER BY e.embedding <=> $1::vector
  LIMIT $3
`;

export class PgVectorSearchBackend implements VectorSearchBackend {
  constructor(
    private readonly db: DatabaseClient,
    private readonly ollama: OllamaClient,
    public readonly url: string
  ) {}

  async search(collection: string, query: string, k: number): Promise<BackendResult[]> {
    const embedding = await this.ollama.generateEmbedding(query);

    const result = await this.db.query<EmbeddingRow>(SEARCH_SQL, [`[${embedding.join(',')}]`, collection, k]);

    return result.rows.map((row) => ({
      page_content: row.document ?? '',
      source: row.source ?? 'unknown',
      // Cosine distance to similarity
      score: 1 - Number(row.distance),
    }));
  }
}
