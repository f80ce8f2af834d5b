/**
 * In-process stand-ins for the LLM API, the vector store and the sinks
 */

import { DEFAULT_CONFIG, type CodespecConfig } from '@/types/config';
import { type RetrievedChunk } from '@/types/extraction';
import { type SpecificationDocument } from '@/types/specification';
import { type LlmClient, type LlmRequest, type LlmResponse } from '@llm/client';
import { type BackendResult, type VectorSearchBackend } from '@retrieval/vector-search';
import { type CommitResult, type CommitSink } from '@services/commit-sink';

export type LlmResponder = (request: LlmRequest) => LlmResponse | Promise<LlmResponse>;

/**
 * Successful LLM response carrying the given output
 */
export const ok = (output: string): LlmResponse => ({ transportStatus: 200, applicationStatus: 200, output });

/**
 * LLM client answering from a function and recording every request
 */
export class FakeLlmClient implements LlmClient {
  readonly url = 'http://llm.test/LLM-API';
  readonly requests: LlmRequest[] = [];

  constructor(private readonly responder: LlmResponder) {}

  async call(request: LlmRequest, _timeoutMs: number): Promise<LlmResponse> {
    this.requests.push(request);
    return this.responder(request);
  }
}

/**
 * Vector backend serving fixed results per collection; an Error entry fails that collection
 */
export class FakeVectorBackend implements VectorSearchBackend {
  readonly url = 'http://vector.test/vector-search';
  readonly searches: { collection: string; query: string; k: number }[] = [];

  constructor(private readonly collections: Record<string, BackendResult[] | Error>) {}

  async search(collection: string, query: string, k: number): Promise<BackendResult[]> {
    this.searches.push({ collection, query, k });
    const entry = this.collections[collection] ?? [];
    if (entry instanceof Error) {
      throw entry;
    }
    return entry.slice(0, k);
  }
}

/**
 * Sink that records commits
 */
export class RecordingSink implements CommitSink {
  readonly commits: { codebase: string; document: SpecificationDocument }[] = [];

  constructor(private readonly result: CommitResult = { ok: true, message: 'stored' }) {}

  async commit(codebase: string, document: SpecificationDocument): Promise<CommitResult> {
    this.commits.push({ codebase, document });
    return this.result;
  }
}

/**
 * Minimal completed document for sink and batch tests
 */
export const sampleDocument = (codebase: string): SpecificationDocument => ({
  extraction_metadata: {
    run_id: 'run-1',
    extraction_timestamp: '2024-01-02T03:04:05.678Z',
    codebase,
    extraction_type: 'vector_llm',
  },
  Application: {},
  'Server Information': [{ host: 'db.local', hosts: [], ports: [], endpoints: [], configuration: {} }],
  'Database Information': { 'Table Information': [], SQL_QUERIES: [], Invalid_SQL_Queries: [] },
  'API Endpoints': ['/health'],
  Dependencies: [],
  summary: {
    codebase,
    status: 'completed',
    chunks_processed: 2,
    statistics: {
      server_entries: 1,
      tables: 0,
      sql_queries: 0,
      invalid_sql_queries: 0,
      api_endpoints: 1,
      dependencies: 0,
    },
    coverage: {
      percentage: 40,
      areas_found: 2,
      total_areas: 5,
      areas: { database: false, server: true, api: true, dependencies: false, configuration: false },
    },
  },
});

export const chunk = (content: string, sourcePath: string, collection = 'orders'): RetrievedChunk => ({
  content,
  source_path: sourcePath,
  collection,
});

/**
 * Default configuration with validation off, single collection and no redaction
 */
export const testConfig = (): CodespecConfig => ({
  ...DEFAULT_CONFIG,
  retrieval: { ...DEFAULT_CONFIG.retrieval, collection_suffixes: [''] },
  extraction: { ...DEFAULT_CONFIG.extraction, enable_validation: false, redaction_rules: [] },
  retry: { max_attempts: 1, base_delay_ms: 0, rate_limit_delay_ms: 0 },
});
