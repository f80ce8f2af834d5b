/**
 * Environment configuration loader and validator
 * Loads configuration from environment variables with validation and defaults
 */

import { ConfigurationError } from '@utils/errors';
import { logger } from '@utils/logger';
import {
  DEFAULT_CONFIG,
  ENV_VARS,
  type CodespecConfig,
  type ExecutionMode,
  type LlmBackend,
  type RedactionRule,
  type RetrievalBackend,
} from '@/types/config';

const getEnv = (key: string, defaultValue?: string): string | undefined => {
  return process.env[key] ?? defaultValue;
};

/** Throws ConfigurationError when unset or empty. */
const getEnvRequired = (key: string): string => {
  const value = process.env[key];
  if (!value) {
    throw ConfigurationError.missingRequired(key);
  }
  return value;
};

/** Integer with optional inclusive bounds; unset means `defaultValue`. */
const parseEnvInt = (key: string, defaultValue: number, min?: number, max?: number): number => {
  const value = getEnv(key);
  if (!value) {
    return defaultValue;
  }

  const parsed = parseInt(value, 10);
  if (isNaN(parsed)) {
    throw ConfigurationError.invalidValue(key, value, 'valid integer');
  }

  if (min !== undefined && parsed < min) {
    throw ConfigurationError.invalidValue(key, String(parsed), `>= ${String(min)}`);
  }

  if (max !== undefined && parsed > max) {
    throw ConfigurationError.invalidValue(key, String(parsed), `<= ${String(max)}`);
  }

  return parsed;
};

/** Optional float within [min, max]. */
const parseEnvFloat = (key: string, min: number, max: number): number | undefined => {
  const value = getEnv(key);
  if (!value) {
    return undefined;
  }

  const parsed = parseFloat(value);
  if (isNaN(parsed)) {
    throw ConfigurationError.invalidValue(key, value, 'valid number');
  }
  if (parsed < min || parsed > max) {
    throw ConfigurationError.invalidValue(key, String(parsed), `between ${String(min)} and ${String(max)}`);
  }

  return parsed;
};

/** true/false, 1/0 or yes/no in any case. */
const parseEnvBool = (key: string, defaultValue: boolean): boolean => {
  const value = getEnv(key);
  if (!value) {
    return defaultValue;
  }

  const lower = value.toLowerCase();
  if (lower === 'true' || lower === '1' || lower === 'yes') {
    return true;
  }
  if (lower === 'false' || lower === '0' || lower === 'no') {
    return false;
  }

  throw ConfigurationError.invalidValue(key, value, 'true/false, 1/0, or yes/no');
};

/**
 * Parse a value restricted to a fixed set of choices
 */
const parseEnvChoice = <T extends string>(key: string, choices: readonly T[], defaultValue: T): T => {
  const value = getEnv(key);
  if (!value) {
    return defaultValue;
  }

  const match = choices.find((choice) => choice === value.toLowerCase());
  if (match === undefined) {
    throw ConfigurationError.invalidValue(key, value, `one of ${choices.join(', ')}`);
  }
  return match;
};

/**
 * Parse a comma-separated list; an empty entry is kept (e.g. ",-external-files")
 */
const parseEnvList = (key: string, defaultValue: string[]): string[] => {
  const value = getEnv(key);
  if (value === undefined) {
    return defaultValue;
  }
  return value.split(',').map((item) => item.trim());
};

/**
 * Parse redaction rules written as "search=replace" pairs separated by commas
 * (e.g. "@aexp=@aexps,@=,aimid=")
 */
const parseRedactionRules = (key: string, defaultValue: RedactionRule[]): RedactionRule[] => {
  const value = getEnv(key);
  if (value === undefined) {
    return defaultValue;
  }

  const rules: RedactionRule[] = [];
  for (const pair of value.split(',')) {
    if (pair.trim() === '') {
      continue;
    }
    const separator = pair.indexOf('=');
    if (separator <= 0) {
      throw ConfigurationError.invalidValue(key, pair, '"search=replace" pairs separated by commas');
    }
    rules.push({ search: pair.slice(0, separator), replace: pair.slice(separator + 1) });
  }
  return rules;
};

/**
 * Read every setting in ENV_VARS, falling back to DEFAULT_CONFIG.
 *
 * @throws {ConfigurationError} on malformed or out-of-range values
 */
export const loadConfig = (): CodespecConfig => {
  // Load service endpoints
  const baseUrl = getEnv(ENV_VARS.BACKEND_URL, DEFAULT_CONFIG.services.base_url) ?? DEFAULT_CONFIG.services.base_url;
  const llmPath = getEnv(ENV_VARS.LLM_API_PATH) ?? DEFAULT_CONFIG.services.llm_path;
  const vectorSearchPath = getEnv(ENV_VARS.VECTOR_SEARCH_PATH) ?? DEFAULT_CONFIG.services.vector_search_path;
  const metadataPath = getEnv(ENV_VARS.METADATA_PATH) ?? DEFAULT_CONFIG.services.metadata_path;
  const commitUrl = getEnv(ENV_VARS.COMMIT_URL);
  const exportDir = getEnv(ENV_VARS.EXPORT_DIR);

  // Load LLM configuration
  // Timeout range: 1 second to 15 minutes
  const llmBackend = parseEnvChoice<LlmBackend>(ENV_VARS.LLM_BACKEND, ['http', 'ollama'], DEFAULT_CONFIG.llm.backend);
  const detectionTimeout = parseEnvInt(
    ENV_VARS.LLM_DETECTION_TIMEOUT,
    DEFAULT_CONFIG.llm.detection_timeout,
    1000,
    900000
  );
  const validationTimeout = parseEnvInt(
    ENV_VARS.LLM_VALIDATION_TIMEOUT,
    DEFAULT_CONFIG.llm.validation_timeout,
    1000,
    900000
  );
  const transformationTimeout = parseEnvInt(
    ENV_VARS.LLM_TRANSFORMATION_TIMEOUT,
    DEFAULT_CONFIG.llm.transformation_timeout,
    1000,
    900000
  );

  // Load Ollama configuration
  const ollamaHost = getEnv(ENV_VARS.OLLAMA_HOST, DEFAULT_CONFIG.ollama.host) ?? DEFAULT_CONFIG.ollama.host;
  const ollamaTimeout = parseEnvInt(ENV_VARS.OLLAMA_TIMEOUT, DEFAULT_CONFIG.ollama.timeout, 1000, 900000);
  const ollamaModel = getEnv(ENV_VARS.OLLAMA_MODEL) ?? DEFAULT_CONFIG.ollama.model;
  const embeddingModel = getEnv(ENV_VARS.EMBEDDING_MODEL) ?? DEFAULT_CONFIG.ollama.embedding_model;
  const embeddingDimensions = parseEnvInt(
    ENV_VARS.EMBEDDING_DIMENSIONS,
    DEFAULT_CONFIG.ollama.embedding_dimensions,
    1,
    4096
  );

  // Load retrieval configuration
  const retrievalBackend = parseEnvChoice<RetrievalBackend>(
    ENV_VARS.RETRIEVAL_BACKEND,
    ['http', 'pgvector'],
    DEFAULT_CONFIG.retrieval.backend
  );
  const resultsCount = parseEnvInt(ENV_VARS.VECTOR_RESULTS_COUNT, DEFAULT_CONFIG.retrieval.results_count, 1, 1000);
  // Similarity thresholds: 0.0 (no filtering) to 1.0 (exact match)
  const similarityThreshold = parseEnvFloat(ENV_VARS.SIMILARITY_THRESHOLD, 0.0, 1.0);
  const collectionSuffixes = parseEnvList(ENV_VARS.COLLECTION_SUFFIXES, DEFAULT_CONFIG.retrieval.collection_suffixes);
  const sortByScore = parseEnvBool(ENV_VARS.SORT_BY_SCORE, DEFAULT_CONFIG.retrieval.sort_by_score);
  const retrievalTimeout = parseEnvInt(ENV_VARS.RETRIEVAL_TIMEOUT, DEFAULT_CONFIG.retrieval.timeout, 1000, 900000);

  // Load database configuration (password is required only for the pgvector backend)
  const postgresHost = getEnv(ENV_VARS.POSTGRES_HOST, DEFAULT_CONFIG.database.host) ?? DEFAULT_CONFIG.database.host;
  const postgresPort = parseEnvInt(ENV_VARS.POSTGRES_PORT, DEFAULT_CONFIG.database.port, 1, 65535);
  const postgresDb = getEnv(ENV_VARS.POSTGRES_DB, DEFAULT_CONFIG.database.database) ?? DEFAULT_CONFIG.database.database;
  const postgresUser = getEnv(ENV_VARS.POSTGRES_USER, DEFAULT_CONFIG.database.user) ?? DEFAULT_CONFIG.database.user;
  const postgresPassword =
    retrievalBackend === 'pgvector'
      ? getEnvRequired(ENV_VARS.POSTGRES_PASSWORD)
      : (getEnv(ENV_VARS.POSTGRES_PASSWORD) ?? DEFAULT_CONFIG.database.password);
  const maxConnections = parseEnvInt(
    ENV_VARS.POSTGRES_MAX_CONNECTIONS,
    DEFAULT_CONFIG.database.max_connections,
    1,
    100
  );

  // Load extraction configuration
  const mode = parseEnvChoice<ExecutionMode>(
    ENV_VARS.EXTRACTION_MODE,
    ['sequential', 'pool'],
    DEFAULT_CONFIG.extraction.mode
  );
  const concurrency = parseEnvInt(ENV_VARS.EXTRACTION_CONCURRENCY, DEFAULT_CONFIG.extraction.concurrency, 1, 32);
  const taskTimeout = parseEnvInt(
    ENV_VARS.EXTRACTION_TASK_TIMEOUT,
    DEFAULT_CONFIG.extraction.task_timeout,
    1000,
    900000
  );
  const minContentLength = parseEnvInt(
    ENV_VARS.MIN_CONTENT_LENGTH,
    DEFAULT_CONFIG.extraction.min_content_length,
    0,
    10000
  );
  const enableValidation = parseEnvBool(ENV_VARS.ENABLE_VALIDATION, DEFAULT_CONFIG.extraction.enable_validation);
  const enableRefinement = parseEnvBool(ENV_VARS.ENABLE_REFINEMENT, DEFAULT_CONFIG.extraction.enable_refinement);
  const redactionRules = parseRedactionRules(ENV_VARS.REDACTION_RULES, DEFAULT_CONFIG.extraction.redaction_rules);

  // Load retry configuration
  const maxAttempts = parseEnvInt(ENV_VARS.RETRY_MAX_ATTEMPTS, DEFAULT_CONFIG.retry.max_attempts, 1, 10);
  const baseDelay = parseEnvInt(ENV_VARS.RETRY_BASE_DELAY, DEFAULT_CONFIG.retry.base_delay_ms, 0, 60000);
  const rateLimitDelay = parseEnvInt(
    ENV_VARS.RETRY_RATE_LIMIT_DELAY,
    DEFAULT_CONFIG.retry.rate_limit_delay_ms,
    0,
    300000
  );

  const config: CodespecConfig = {
    services: {
      base_url: baseUrl.replace(/\/+$/, ''),
      llm_path: llmPath,
      vector_search_path: vectorSearchPath,
      metadata_path: metadataPath,
      ...(commitUrl && { commit_url: commitUrl }),
      ...(exportDir && { export_dir: exportDir }),
    },
    llm: {
      backend: llmBackend,
      detection_timeout: detectionTimeout,
      validation_timeout: validationTimeout,
      transformation_timeout: transformationTimeout,
    },
    ollama: {
      host: ollamaHost,
      timeout: ollamaTimeout,
      model: ollamaModel,
      embedding_model: embeddingModel,
      embedding_dimensions: embeddingDimensions,
    },
    retrieval: {
      backend: retrievalBackend,
      results_count: resultsCount,
      ...(similarityThreshold !== undefined && { similarity_threshold: similarityThreshold }),
      collection_suffixes: collectionSuffixes,
      sort_by_score: sortByScore,
      timeout: retrievalTimeout,
    },
    database: {
      host: postgresHost,
      port: postgresPort,
      database: postgresDb,
      user: postgresUser,
      password: postgresPassword,
      max_connections: maxConnections,
      idle_timeout: DEFAULT_CONFIG.database.idle_timeout,
    },
    extraction: {
      mode,
      concurrency,
      task_timeout: taskTimeout,
      min_content_length: minContentLength,
      enable_validation: enableValidation,
      enable_refinement: enableRefinement,
      redaction_rules: redactionRules,
    },
    retry: {
      max_attempts: maxAttempts,
      base_delay_ms: baseDelay,
      rate_limit_delay_ms: rateLimitDelay,
    },
  };

  return config;
};

/**
 * Validate configuration for semantic correctness beyond type checking
 * Performs cross-field validation and checks for common misconfigurations
 * @param config - Configuration object to validate
 * @throws {ConfigurationError} If configuration contains semantic errors
 */
export const validateConfig = (config: CodespecConfig): void => {
  // Backend URL must be absolute
  if (!/^https?:\/\//.test(config.services.base_url)) {
    throw new ConfigurationError(
      `Invalid BACKEND_URL: ${config.services.base_url}`,
      { base_url: config.services.base_url },
      'Use an absolute http(s) URL such as http://localhost:5000'
    );
  }

  // At least one collection must be searched
  if (config.retrieval.collection_suffixes.length === 0) {
    throw new ConfigurationError(
      'COLLECTION_SUFFIXES must name at least one collection suffix',
      { collection_suffixes: config.retrieval.collection_suffixes },
      'Use "-external-files," to search the companion collection and the main collection'
    );
  }

  // The pool timeout should not undercut the detection call it wraps
  if (config.extraction.mode === 'pool' && config.extraction.task_timeout > config.llm.detection_timeout) {
    logger.warn(
      `EXTRACTION_TASK_TIMEOUT (${String(config.extraction.task_timeout)}) exceeds LLM_DETECTION_TIMEOUT (${String(config.llm.detection_timeout)}).`
    );
  }

  if (config.retry.rate_limit_delay_ms * (config.retry.max_attempts - 1) > 300000) {
    logger.warn(
      `Retry settings allow up to ${String(config.retry.rate_limit_delay_ms * (config.retry.max_attempts - 1))}ms of rate-limit backoff per call`
    );
  }
};
