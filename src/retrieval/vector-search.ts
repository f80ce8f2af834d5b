/**
 * Vector retrieval across a codebase's collections
 *
 * One backend call per collection suffix; results are merged, tagged with the
 * collection they came from and optionally sorted by score. Retrieval never
 * throws: a failing collection contributes zero results and is logged.
 */
/* eslint-disable @typescript-eslint/naming-convention */
import { z } from 'zod';

import { type ErrorLog } from '@utils/error-log';
import {
  HttpStatusError,
  InvalidResponseError,
  RequestTimeoutError,
  ServiceConnectionError,
  toError,
} from '@utils/errors';
import { postJson } from '@utils/http';
import { logger } from '@utils/logger';
import { retryWithPolicy, SINGLE_ATTEMPT, type RetryPolicy } from '@utils/retry';
import { type RetrievedChunk } from '@/types/extraction';

import { isExcludedSource } from './deduplicator';

/**
 * One result as returned by a search backend, before tagging
 */
export interface BackendResult {
  page_content: string;
  source: string;
  score?: number;
}

/**
 * Similarity search over one named collection
 */
export interface VectorSearchBackend {
  /** Endpoint or connection recorded in error log entries */
  readonly url: string;
  /**
   * @throws On any failure; the adapter converts failures to empty results
   */
  search(collection: string, query: string, k: number): Promise<BackendResult[]>;
}

export interface CollectionSearchSummary {
  collection: string;
  results_count: number;
  success: boolean;
}

export interface SearchOutcome {
  chunks: RetrievedChunk[];
  summary: CollectionSearchSummary[];
}

const VectorSearchResponseSchema = z.object({
  results: z.array(
    z.object({
      page_content: z.string(),
      metadata: z
        .object({
          source: z.unknown().optional(),
          score: z.unknown().optional(),
        })
        .passthrough()
        .nullish(),
      similarity_score: z.unknown().optional(),
    })
  ),
});

/** Non-numeric scores (null, strings) leave the result in retrieval order. */
const finiteScore = (value: unknown): number | undefined =>
  typeof value === 'number' && Number.isFinite(value) ? value : undefined;

/**
 * Backend for the `/vector-search` endpoint
 */
export class HttpVectorSearchBackend implements VectorSearchBackend {
  constructor(
    public readonly url: string,
    private readonly timeoutMs: number,
    private readonly similarityThreshold?: number,
    private readonly retryPolicy: RetryPolicy = SINGLE_ATTEMPT
  ) {}

  async search(collection: string, query: string, k: number): Promise<BackendResult[]> {
    return retryWithPolicy(
      async () => {
        const response = await postJson(
          this.url,
          {
            codebase: collection,
            query,
            vector_results_count: k,
            ...(this.similarityThreshold !== undefined && { similarity_threshold: this.similarityThreshold }),
          },
          this.timeoutMs,
          'vector search service'
        );

        if (response.status !== 200) {
          throw new HttpStatusError(this.url, response.status, response.text);
        }

        const parsed = VectorSearchResponseSchema.safeParse(response.body);
        if (!parsed.success) {
          throw new InvalidResponseError('vector search service', this.url, response.text);
        }

        return parsed.data.results.map((result) => ({
          page_content: result.page_content,
          source: typeof result.metadata?.source === 'string' ? result.metadata.source : 'unknown',
          score: finiteScore(result.similarity_score) ?? finiteScore(result.metadata?.score),
        }));
      },
      this.retryPolicy,
      `Vector search in ${collection}`
    );
  }
}

export interface RetrievalOptions {
  /** Suffixes appended to the codebase name, '' for the main collection */
  collectionSuffixes: string[];
  /** Results requested per collection */
  resultsCount: number;
  /** Sort merged results by descending score */
  sortByScore: boolean;
}

/**
 * Map a retrieval failure to its error log type
 */
const errorTypeFor = (error: Error): { type: string; status?: number } => {
  if (error instanceof HttpStatusError) {
    return { type: `vector_search_${String(error.status)}`, status: error.status };
  }
  if (error instanceof RequestTimeoutError) {
    return { type: 'vector_timeout_error' };
  }
  if (error instanceof ServiceConnectionError) {
    return { type: 'vector_connection_error' };
  }
  if (error instanceof InvalidResponseError) {
    return { type: 'vector_json_parse_error' };
  }
  return { type: 'vector_general_error' };
};

/**
 * Stable descending sort when every chunk carries a numeric score;
 * otherwise retrieval order is kept
 */
export const sortByScore = (chunks: RetrievedChunk[]): RetrievedChunk[] => {
  const scored = chunks.every(
    (chunk) => typeof chunk.similarity_score === 'number' && Number.isFinite(chunk.similarity_score)
  );
  if (!scored) {
    logger.debug('Skipping score sort: not every result carries a score');
    return chunks;
  }
  return [...chunks].sort((a, b) => (b.similarity_score ?? 0) - (a.similarity_score ?? 0));
};

export class VectorRetrievalAdapter {
  constructor(
    private readonly backend: VectorSearchBackend,
    private readonly errorLog: ErrorLog,
    private readonly options: RetrievalOptions
  ) {}

  /**
   * Search every collection of a codebase
   *
   * @param codebase - Codebase (main collection) name
   * @param query - Similarity query
   * @param k - Results per collection (defaults to the configured count)
   * @param suffixes - Collection suffixes (defaults to the configured list)
   * @returns Merged chunks, possibly empty
   */
  async search(codebase: string, query: string, k?: number, suffixes?: string[]): Promise<RetrievedChunk[]> {
    return (await this.searchWithSummary(codebase, query, k, suffixes)).chunks;
  }

  /**
   * Search every collection and report per-collection counts
   */
  async searchWithSummary(codebase: string, query: string, k?: number, suffixes?: string[]): Promise<SearchOutcome> {
    const chunks: RetrievedChunk[] = [];
    const summary: CollectionSearchSummary[] = [];
    const count = k ?? this.options.resultsCount;

    for (const suffix of suffixes ?? this.options.collectionSuffixes) {
      const collection = `${codebase}${suffix}`;

      try {
        const results = (await this.backend.search(collection, query, count)).filter(
          (result) => !isExcludedSource(result.source)
        );
        for (const result of results) {
          chunks.push({
            content: result.page_content,
            source_path: result.source,
            collection,
            ...(result.score !== undefined && { similarity_score: result.score }),
          });
        }
        summary.push({ collection, results_count: results.length, success: true });
      } catch (error) {
        const err = toError(error);
        const { type, status } = errorTypeFor(err);

        logger.warn(`Vector search failed for ${collection}`, { error: err.message, type });
        this.errorLog.append({
          error_type: type,
          status_code: status,
          response_text: err.message,
          file_source: collection,
          url: this.backend.url,
          system_prompt: 'Vector search system',
          user_prompt: `Query: ${query}`,
          codebase: collection,
        });
        summary.push({ collection, results_count: 0, success: false });
      }
    }

    return {
      chunks: this.options.sortByScore ? sortByScore(chunks) : chunks,
      summary,
    };
  }
}
