/**
 * Configuration types for codespec
 *
 * Defines environment variables, runtime configuration, and pipeline options
 */

/**
 * Main configuration loaded from environment variables
 */
export interface CodespecConfig {
  /** External service endpoints */
  services: ServicesConfig;
  /** LLM invocation settings */
  llm: LlmConfig;
  /** Ollama API settings (LLM backend and query embeddings) */
  ollama: OllamaConfig;
  /** Vector retrieval settings */
  retrieval: RetrievalConfig;
  /** PostgreSQL settings for the pgvector backend */
  database: DatabaseConfig;
  /** Extraction pipeline settings */
  extraction: ExtractionConfig;
  /** Retry policy for external calls */
  retry: RetryConfig;
}

/**
 * HTTP endpoints of the collaborating services
 */
export interface ServicesConfig {
  /** Backend base URL (default: 'http://localhost:5000') */
  base_url: string;
  /** LLM invocation path (default: '/LLM-API') */
  llm_path: string;
  /** Vector search path (default: '/vector-search') */
  vector_search_path: string;
  /** Metadata path (default: '/fetch-metadata') */
  metadata_path: string;
  /** Commit sink URL, commits are skipped when unset */
  commit_url?: string;
  /** Directory for JSON file exports, exports are skipped when unset */
  export_dir?: string;
}

export type LlmBackend = 'http' | 'ollama';

/**
 * LLM call configuration
 */
export interface LlmConfig {
  /** Which LLM backend to call (default: 'http') */
  backend: LlmBackend;
  /** Detection call timeout in milliseconds (default: 300000) */
  detection_timeout: number;
  /** Validation call timeout in milliseconds (default: 300000) */
  validation_timeout: number;
  /** Final transformation call timeout in milliseconds (default: 300000) */
  transformation_timeout: number;
}

/**
 * Ollama API client configuration
 */
export interface OllamaConfig {
  /** Ollama server URL (default: 'http://localhost:11434') */
  host: string;
  /** Request timeout in milliseconds (default: 120000) */
  timeout: number;
  /** Generation model (default: 'qwen2.5-coder:7b') */
  model: string;
  /** Embedding model used for pgvector queries (default: 'bge-m3:567m') */
  embedding_model: string;
  /** Expected embedding dimensions (default: 1024) */
  embedding_dimensions: number;
}

export type RetrievalBackend = 'http' | 'pgvector';

/**
 * Vector retrieval configuration
 */
export interface RetrievalConfig {
  /** Which retrieval backend to use (default: 'http') */
  backend: RetrievalBackend;
  /** Results requested per collection (default: 10) */
  results_count: number;
  /** Optional minimum similarity forwarded to the search service */
  similarity_threshold?: number;
  /** Collection suffixes searched per codebase (default: ['-external-files', '']) */
  collection_suffixes: string[];
  /** Sort merged results by descending score (default: true) */
  sort_by_score: boolean;
  /** Retrieval call timeout in milliseconds (default: 60000) */
  timeout: number;
}

/**
 * PostgreSQL database connection configuration
 */
export interface DatabaseConfig {
  /** Database host (default: 'localhost') */
  host: string;
  /** Database port (default: 5432) */
  port: number;
  /** Database name (default: 'vector_store') */
  database: string;
  /** Database user (default: 'postgres') */
  user: string;
  /** Database password (required for the pgvector backend) */
  password: string;
  /** Maximum connection pool size (default: 10) */
  max_connections: number;
  /** Idle connection timeout in milliseconds (default: 30000) */
  idle_timeout: number;
}

export type ExecutionMode = 'sequential' | 'pool';

/**
 * Literal substitution applied to chunk content before it is sent to the LLM
 */
export interface RedactionRule {
  search: string;
  replace: string;
}

/**
 * Extraction pipeline configuration
 */
export interface ExtractionConfig {
  /** Sequential or bounded worker pool (default: 'sequential') */
  mode: ExecutionMode;
  /** Worker pool size (default: 4) */
  concurrency: number;
  /** Per-task timeout in pool mode, milliseconds (default: 45000) */
  task_timeout: number;
  /** Minimum cleaned content length (default: 4) */
  min_content_length: number;
  /** Run the advisory validation call (default: true) */
  enable_validation: boolean;
  /** Run the final LLM transformation pass (default: false) */
  enable_refinement: boolean;
  /** Redaction rules applied in order */
  redaction_rules: RedactionRule[];
}

/**
 * Retry policy configuration
 */
export interface RetryConfig {
  /** Maximum attempts per call (default: 3) */
  max_attempts: number;
  /** Base delay for exponential backoff in milliseconds (default: 1000, doubled per attempt) */
  base_delay_ms: number;
  /** Fixed delay after a 429 response in milliseconds (default: 30000) */
  rate_limit_delay_ms: number;
}

/**
 * Environment variable keys
 */
export const ENV_VARS = {
  // Services
  BACKEND_URL: 'BACKEND_URL',
  LLM_API_PATH: 'LLM_API_PATH',
  VECTOR_SEARCH_PATH: 'VECTOR_SEARCH_PATH',
  METADATA_PATH: 'METADATA_PATH',
  COMMIT_URL: 'COMMIT_URL',
  EXPORT_DIR: 'EXPORT_DIR',

  // LLM
  LLM_BACKEND: 'LLM_BACKEND',
  LLM_DETECTION_TIMEOUT: 'LLM_DETECTION_TIMEOUT',
  LLM_VALIDATION_TIMEOUT: 'LLM_VALIDATION_TIMEOUT',
  LLM_TRANSFORMATION_TIMEOUT: 'LLM_TRANSFORMATION_TIMEOUT',

  // Ollama
  OLLAMA_HOST: 'OLLAMA_HOST',
  OLLAMA_TIMEOUT: 'OLLAMA_TIMEOUT',
  OLLAMA_MODEL: 'OLLAMA_MODEL',
  EMBEDDING_MODEL: 'EMBEDDING_MODEL',
  EMBEDDING_DIMENSIONS: 'EMBEDDING_DIMENSIONS',

  // Retrieval
  RETRIEVAL_BACKEND: 'RETRIEVAL_BACKEND',
  VECTOR_RESULTS_COUNT: 'VECTOR_RESULTS_COUNT',
  SIMILARITY_THRESHOLD: 'SIMILARITY_THRESHOLD',
  COLLECTION_SUFFIXES: 'COLLECTION_SUFFIXES',
  SORT_BY_SCORE: 'SORT_BY_SCORE',
  RETRIEVAL_TIMEOUT: 'RETRIEVAL_TIMEOUT',

  // Database
  POSTGRES_HOST: 'POSTGRES_HOST',
  POSTGRES_PORT: 'POSTGRES_PORT',
  POSTGRES_DB: 'POSTGRES_DB',
  POSTGRES_USER: 'POSTGRES_USER',
  POSTGRES_PASSWORD: 'POSTGRES_PASSWORD',
  POSTGRES_MAX_CONNECTIONS: 'POSTGRES_MAX_CONNECTIONS',

  // Extraction
  EXTRACTION_MODE: 'EXTRACTION_MODE',
  EXTRACTION_CONCURRENCY: 'EXTRACTION_CONCURRENCY',
  EXTRACTION_TASK_TIMEOUT: 'EXTRACTION_TASK_TIMEOUT',
  MIN_CONTENT_LENGTH: 'MIN_CONTENT_LENGTH',
  ENABLE_VALIDATION: 'ENABLE_VALIDATION',
  ENABLE_REFINEMENT: 'ENABLE_REFINEMENT',
  REDACTION_RULES: 'REDACTION_RULES',

  // Retry
  RETRY_MAX_ATTEMPTS: 'RETRY_MAX_ATTEMPTS',
  RETRY_BASE_DELAY: 'RETRY_BASE_DELAY',
  RETRY_RATE_LIMIT_DELAY: 'RETRY_RATE_LIMIT_DELAY',
} as const;

/**
 * Default configuration values
 */
export const DEFAULT_CONFIG: CodespecConfig = {
  services: {
    base_url: 'http://localhost:5000',
    llm_path: '/LLM-API',
    vector_search_path: '/vector-search',
    metadata_path: '/fetch-metadata',
  },
  llm: {
    backend: 'http',
    detection_timeout: 300000,
    validation_timeout: 300000,
    transformation_timeout: 300000,
  },
  ollama: {
    host: 'http://localhost:11434',
    timeout: 120000,
    model: 'qwen2.5-coder:7b',
    embedding_model: 'bge-m3:567m',
    embedding_dimensions: 1024,
  },
  retrieval: {
    backend: 'http',
    results_count: 10,
    collection_suffixes: ['-external-files', ''],
    sort_by_score: true,
    timeout: 60000,
  },
  database: {
    host: 'localhost',
    port: 5432,
    database: 'vector_store',
    user: 'postgres',
    password: '', // Required only for the pgvector backend
    max_connections: 10,
    idle_timeout: 30000,
  },
  extraction: {
    mode: 'sequential',
    concurrency: 4,
    task_timeout: 45000,
    min_content_length: 4,
    enable_validation: true,
    enable_refinement: false,
    redaction_rules: [
      { search: '@aexp', replace: '@aexps' },
      { search: '@', replace: '' },
      { search: 'aimid', replace: '' },
    ],
  },
  retry: {
    max_attempts: 3,
    base_delay_ms: 1000,
    rate_limit_delay_ms: 30000,
  },
};
