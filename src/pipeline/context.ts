/**
 * Pipeline context
 *
 * Every stage receives its collaborators and the session error log through
 * this object; nothing is read from ambient state.
 */
import { DatabaseClient } from '@database/client';
import { ErrorLog } from '@utils/error-log';
import { logger } from '@utils/logger';
import { createOllamaClient, type OllamaClient } from '@utils/ollama';
import { createRetryPolicy, type RetryPolicy } from '@utils/retry';
import { type CodespecConfig } from '@/types/config';
import { HttpLlmClient, OllamaLlmClient, type LlmClient } from '@llm/client';
import { ExtractionOrchestrator } from '@extraction/orchestrator';
import { ExtractionWorker } from '@extraction/worker';
import { PgVectorSearchBackend } from '@retrieval/pgvector-backend';
import { HttpVectorSearchBackend, VectorRetrievalAdapter, type VectorSearchBackend } from '@retrieval/vector-search';
import { CompositeSink, FileExportSink, HttpCommitSink, type CommitSink } from '@services/commit-sink';
import { MetadataClient, type MetadataSource } from '@services/metadata-client';

export interface PipelineContext {
  config: CodespecConfig;
  errorLog: ErrorLog;
  llm: LlmClient;
  retrieval: VectorRetrievalAdapter;
  orchestrator: ExtractionOrchestrator;
  retryPolicy: RetryPolicy;
  metadata?: MetadataSource;
  sink?: CommitSink;
}

/**
 * Collaborators that replace the configured ones
 */
export interface ContextOverrides {
  errorLog?: ErrorLog;
  llm?: LlmClient;
  backend?: VectorSearchBackend;
  /** Pass null to run without metadata */
  metadata?: MetadataSource | null;
  /** Pass null to run without a sink */
  sink?: CommitSink | null;
  retryPolicy?: RetryPolicy;
}

/**
 * Context plus the connections it owns
 */
export interface PipelineRuntime {
  context: PipelineContext;
  ollama: OllamaClient | null;
  database: DatabaseClient | null;
  close(): Promise<void>;
}

const serviceUrl = (config: CodespecConfig, path: string): string => `${config.services.base_url}${path}`;

const configuredSink = (config: CodespecConfig): CommitSink | undefined => {
  const sinks: CommitSink[] = [];
  if (config.services.commit_url) {
    sinks.push(new HttpCommitSink(config.services.commit_url, config.retrieval.timeout));
  }
  if (config.services.export_dir) {
    sinks.push(new FileExportSink(config.services.export_dir));
  }
  if (sinks.length === 0) {
    return undefined;
  }
  return sinks.length === 1 ? sinks[0] : new CompositeSink(sinks);
};

/**
 * Build a context from configuration
 *
 * Connections (Ollama, PostgreSQL) are created but not opened; call
 * `connectRuntime` before running against the pgvector backend.
 */
export const createPipelineRuntime = (config: CodespecConfig, overrides: ContextOverrides = {}): PipelineRuntime => {
  const errorLog = overrides.errorLog ?? new ErrorLog();
  const retryPolicy = overrides.retryPolicy ?? createRetryPolicy(config.retry);

  const needsOllama =
    (overrides.llm === undefined && config.llm.backend === 'ollama') ||
    (overrides.backend === undefined && config.retrieval.backend === 'pgvector');
  const ollama = needsOllama ? createOllamaClient(config.ollama, retryPolicy) : null;

  let llm: LlmClient;
  if (overrides.llm !== undefined) {
    llm = overrides.llm;
  } else if (ollama !== null && config.llm.backend === 'ollama') {
    llm = new OllamaLlmClient(ollama);
  } else {
    llm = new HttpLlmClient(serviceUrl(config, config.services.llm_path));
  }

  let database: DatabaseClient | null = null;
  let backend: VectorSearchBackend;
  if (overrides.backend !== undefined) {
    backend = overrides.backend;
  } else if (ollama !== null && config.retrieval.backend === 'pgvector') {
    database = new DatabaseClient(config.database);
    backend = new PgVectorSearchBackend(
      database,
      ollama,
      `postgresql://${config.database.host}:${String(config.database.port)}/${config.database.database}`
    );
  } else {
    backend = new HttpVectorSearchBackend(
      serviceUrl(config, config.services.vector_search_path),
      config.retrieval.timeout,
      config.retrieval.similarity_threshold
    );
  }

  const retrieval = new VectorRetrievalAdapter(backend, errorLog, {
    collectionSuffixes: config.retrieval.collection_suffixes,
    resultsCount: config.retrieval.results_count,
    sortByScore: config.retrieval.sort_by_score,
  });

  const worker = new ExtractionWorker(llm, errorLog, {
    minContentLength: config.extraction.min_content_length,
    redactionRules: config.extraction.redaction_rules,
    enableValidation: config.extraction.enable_validation,
    detectionTimeoutMs: config.llm.detection_timeout,
    validationTimeoutMs: config.llm.validation_timeout,
  });

  const orchestrator = new ExtractionOrchestrator(
    worker,
    {
      mode: config.extraction.mode,
      concurrency: config.extraction.concurrency,
      taskTimeoutMs: config.extraction.task_timeout,
    },
    errorLog
  );

  const metadata =
    overrides.metadata === null
      ? undefined
      : (overrides.metadata ??
        new MetadataClient(serviceUrl(config, config.services.metadata_path), config.retrieval.timeout));
  const sink = overrides.sink === null ? undefined : (overrides.sink ?? configuredSink(config));

  const context: PipelineContext = {
    config,
    errorLog,
    llm,
    retrieval,
    orchestrator,
    retryPolicy,
    ...(metadata !== undefined && { metadata }),
    ...(sink !== undefined && { sink }),
  };

  return {
    context,
    ollama,
    database,
    close: async () => {
      if (database !== null) {
        await database.close();
      }
    },
  };
};

/**
 * Open and verify the connections a runtime owns
 *
 * @throws {DatabaseConnectionError} If PostgreSQL is unreachable
 * @throws {ModelNotFoundError} If a configured Ollama model is missing
 */
export const connectRuntime = async (runtime: PipelineRuntime): Promise<void> => {
  const { config } = runtime.context;

  if (runtime.ollama !== null) {
    const models = [
      ...(config.llm.backend === 'ollama' ? [config.ollama.model] : []),
      ...(config.retrieval.backend === 'pgvector' ? [config.ollama.embedding_model] : []),
    ];
    await runtime.ollama.healthCheck(models);
  }

  if (runtime.database !== null) {
    await runtime.database.connect();
    await runtime.database.healthCheck();
  }

  logger.debug('Pipeline runtime connected', {
    llm: runtime.context.llm.url,
    retrieval: config.retrieval.backend,
  });
};
