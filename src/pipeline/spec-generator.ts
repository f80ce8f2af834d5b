/**
 * Specification generator
 *
 * Runs one codebase end to end: metadata, then server, database, API
 * endpoint and dependency extraction, then the summary. Each step is
 * isolated; a step that throws leaves its section empty.
 */
import { v4 as uuidv4 } from 'uuid';

import { toError } from '@utils/errors';
import { logger } from '@utils/logger';
import { type BatchStage } from '@utils/progress';
import { type ExecutionMode } from '@/types/config';
import {
  type ChunkExtraction,
  type ChunkOutcome,
  type ExtractionKind,
  type ExtractionRecord,
  type JsonValue,
  type RetrievedChunk,
} from '@/types/extraction';
import {
  type ApplicationMetadata,
  type CoverageSummary,
  type DatabaseSpecification,
  type ExtractionSummary,
  type ServerInfo,
  type SpecificationDocument,
} from '@/types/specification';
import { canonicalJson, deduplicateServers, uniqueStrings } from '@extraction/deduplicator';
import { EXTRACTION_PROMPTS } from '@extraction/prompts';
import { extractApiEndpoints, extractDependencies, extractServerInfo } from '@extraction/regex-fallback';
import { deduplicateChunks } from '@retrieval/deduplicator';
import { emptyDatabaseSpecification, normalize } from '@transform/normalizer';
import { refineDatabaseSpecification } from '@transform/refinement';
import { toServerInfos } from '@transform/server-normalizer';

import { type PipelineContext } from './context';

export interface GenerateOptions {
  /** Stops submission of further chunks */
  signal?: AbortSignal;
  /** Called when the generator moves to the next step */
  onStage?: (stage: BatchStage) => void;
  /** Overrides the configured execution mode */
  mode?: ExecutionMode;
}

/**
 * Chunks and their extraction results for one kind
 */
export interface KindPass {
  chunks: RetrievedChunk[];
  results: ChunkExtraction[];
}

export interface DatabaseExtraction {
  spec: DatabaseSpecification;
  refined?: ExtractionRecord;
  refinement?: 'applied' | 'fallback';
}

/** Outcomes where the LLM left nothing usable and the server patterns are tried instead */
const SERVER_REGEX_OUTCOMES: ReadonlySet<ChunkOutcome> = new Set(['transport_error', 'filtered', 'failed', 'timeout']);

/** Same for list kinds, where an unparsable reply is not kept */
const LIST_REGEX_OUTCOMES: ReadonlySet<ChunkOutcome> = new Set([...SERVER_REGEX_OUTCOMES, 'fallback']);

const COVERAGE_AREAS = ['database', 'server', 'api', 'dependencies', 'configuration'] as const;

/**
 * Records with their source chunks, structurally duplicate records dropped
 */
export const uniqueRecords = (results: ChunkExtraction[]): Array<{ record: ExtractionRecord; chunk: RetrievedChunk }> => {
  const seen = new Set<string>();
  const unique: Array<{ record: ExtractionRecord; chunk: RetrievedChunk }> = [];

  for (const { record, chunk } of results) {
    if (record === null) {
      continue;
    }
    const key = canonicalJson(record);
    if (!seen.has(key)) {
      seen.add(key);
      unique.push({ record, chunk });
    }
  }

  return unique;
};

const itemText = (value: JsonValue): string | null => {
  if (typeof value === 'string') {
    return value.trim() || null;
  }
  if (typeof value === 'object' && value !== null && !Array.isArray(value)) {
    const parts = Object.values(value).filter((part): part is string => typeof part === 'string' && part.trim() !== '');
    return parts.length > 0 ? parts.join(' ') : null;
  }
  return null;
};

/**
 * Strings carried by an API endpoint or dependency record
 */
export const listItems = (record: ExtractionRecord): string[] =>
  Object.entries(record)
    .filter(([key]) => key !== 'source_file')
    .flatMap(([, value]) => (Array.isArray(value) ? value : [value]))
    .map(itemText)
    .filter((item): item is string => item !== null);

/**
 * @returns Coverage over the five extraction areas
 */
export const calculateCoverage = (
  servers: ServerInfo[],
  database: DatabaseSpecification,
  apiEndpoints: string[],
  dependencies: string[]
): CoverageSummary => {
  const areas: Record<(typeof COVERAGE_AREAS)[number], boolean> = {
    database: database['Table Information'].length > 0 || database.SQL_QUERIES.length > 0,
    server: servers.length > 0,
    api: apiEndpoints.length > 0,
    dependencies: dependencies.length > 0,
    configuration: servers.some((server) => Object.keys(server.configuration).length > 0),
  };
  const found = COVERAGE_AREAS.filter((area) => areas[area]).length;

  return {
    percentage: (found / COVERAGE_AREAS.length) * 100,
    areas_found: found,
    total_areas: COVERAGE_AREAS.length,
    areas,
  };
};

const countTables = (database: DatabaseSpecification): number =>
  database['Table Information'].reduce(
    (total, entry) => total + Object.values(entry).reduce((sum, tables) => sum + Object.keys(tables).length, 0),
    0
  );

export class SpecificationGenerator {
  constructor(private readonly context: PipelineContext) {}

  /**
   * Produce the specification document for one codebase
   *
   * @param codebase - Codebase (main collection) name
   * @param options - Cancellation and stage reporting
   */
  async generate(codebase: string, options: GenerateOptions = {}): Promise<SpecificationDocument> {
    const started = Date.now();
    let chunksProcessed = 0;
    const count = (pass: KindPass): void => {
      chunksProcessed += pass.chunks.length;
    };

    options.onStage?.('metadata');
    const application = await this.step<ApplicationMetadata | Record<string, never>>(
      codebase,
      'metadata',
      () => this.fetchMetadata(codebase),
      {}
    );

    options.onStage?.('server');
    const servers = await this.step(codebase, 'server', () => this.extractServers(codebase, options, count), []);

    options.onStage?.('database');
    const database = await this.step<DatabaseExtraction>(
      codebase,
      'database',
      () => this.extractDatabase(codebase, options, count),
      { spec: emptyDatabaseSpecification() }
    );

    options.onStage?.('api');
    const apiEndpoints = await this.step(codebase, 'api', () => this.extractList(codebase, 'api', options, count), []);

    options.onStage?.('dependencies');
    const dependencies = await this.step(
      codebase,
      'dependencies',
      () => this.extractList(codebase, 'dependencies', options, count),
      []
    );

    const summary: ExtractionSummary = {
      codebase,
      status: chunksProcessed === 0 ? 'no_documents' : 'completed',
      chunks_processed: chunksProcessed,
      statistics: {
        server_entries: servers.length,
        tables: countTables(database.spec),
        sql_queries: database.spec.SQL_QUERIES.length,
        invalid_sql_queries: database.spec.Invalid_SQL_Queries.length,
        api_endpoints: apiEndpoints.length,
        dependencies: dependencies.length,
      },
      coverage: calculateCoverage(servers, database.spec, apiEndpoints, dependencies),
      ...(database.refinement !== undefined && { refinement: database.refinement }),
    };

    if (summary.status === 'no_documents') {
      logger.warn(`No documents found for codebase '${codebase}'`);
    }
    logger.stage(codebase, 'complete', {
      duration_ms: Date.now() - started,
      coverage: `${String(summary.coverage.areas_found)}/${String(summary.coverage.total_areas)}`,
      errors: this.context.errorLog.size,
    });

    return {
      extraction_metadata: {
        run_id: uuidv4(),
        extraction_timestamp: new Date().toISOString(),
        codebase,
        extraction_type: 'vector_llm',
      },
      Application: application,
      'Server Information': servers,
      'Database Information': database.spec,
      'API Endpoints': apiEndpoints,
      Dependencies: dependencies,
      ...(database.refined !== undefined && { 'Refined Database Information': database.refined }),
      summary,
    };
  }

  /**
   * Retrieve chunks for a kind and run the workers over them
   */
  async runKind(codebase: string, kind: ExtractionKind, options: GenerateOptions = {}): Promise<KindPass> {
    const prompts = EXTRACTION_PROMPTS[kind];
    const chunks = deduplicateChunks(await this.context.retrieval.search(codebase, prompts.query));
    logger.stage(codebase, kind, { chunks: chunks.length });

    const results = await this.context.orchestrator.run(chunks, prompts, {
      ...(options.signal !== undefined && { signal: options.signal }),
      ...(options.mode !== undefined && { mode: options.mode }),
      onProgress: (completed, total, result) => {
        logger.debug(`[${codebase}] ${kind} ${String(completed)}/${String(total)}`, {
          source: result.chunk.source_path,
          outcome: result.outcome,
        });
      },
    });

    return { chunks, results };
  }

  async extractServers(
    codebase: string,
    options: GenerateOptions = {},
    onPass?: (pass: KindPass) => void
  ): Promise<ServerInfo[]> {
    const pass = await this.runKind(codebase, 'server', options);
    onPass?.(pass);

    const fromRecords = uniqueRecords(pass.results).flatMap(({ record }) => toServerInfos(record));
    const fromPatterns = pass.results
      .filter((result) => SERVER_REGEX_OUTCOMES.has(result.outcome))
      .map((result) => extractServerInfo(result.chunk.content))
      .filter((server): server is ServerInfo => server !== null);

    return deduplicateServers([...fromRecords, ...fromPatterns]);
  }

  async extractDatabase(
    codebase: string,
    options: GenerateOptions = {},
    onPass?: (pass: KindPass) => void
  ): Promise<DatabaseExtraction> {
    const pass = await this.runKind(codebase, 'database', options);
    onPass?.(pass);

    const pairs = uniqueRecords(pass.results);
    const spec = normalize(
      pairs.map(({ record }) => record),
      pairs.map(({ chunk }) => chunk)
    );

    if (!this.context.config.extraction.enable_refinement) {
      return { spec };
    }

    const refinement = await refineDatabaseSpecification(spec, this.context.llm, {
      timeoutMs: this.context.config.llm.transformation_timeout,
      policy: this.context.retryPolicy,
    });
    return refinement.status === 'applied'
      ? { spec, refined: refinement.document, refinement: 'applied' }
      : { spec, refinement: 'fallback' };
  }

  async extractList(
    codebase: string,
    kind: 'api' | 'dependencies',
    options: GenerateOptions = {},
    onPass?: (pass: KindPass) => void
  ): Promise<string[]> {
    const pass = await this.runKind(codebase, kind, options);
    onPass?.(pass);

    const fallback = kind === 'api' ? extractApiEndpoints : extractDependencies;
    const items = pass.results.flatMap((result) => {
      if (result.record !== null && result.outcome === 'extracted') {
        return listItems(result.record);
      }
      return LIST_REGEX_OUTCOMES.has(result.outcome) ? fallback(result.chunk.content) : [];
    });

    return uniqueStrings(items);
  }

  private async fetchMetadata(codebase: string): Promise<ApplicationMetadata | Record<string, never>> {
    if (this.context.metadata === undefined) {
      return {};
    }
    return (await this.context.metadata.fetch(codebase)) ?? {};
  }

  private async step<T>(codebase: string, name: string, run: () => Promise<T>, fallback: T): Promise<T> {
    try {
      return await run();
    } catch (error) {
      logger.errorWithStack(`${name} step failed for ${codebase}`, toError(error));
      return fallback;
    }
  }
}
