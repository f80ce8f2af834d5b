/**
 * Extraction pipeline types
 *
 * Retrieved chunks flow into extraction workers, which produce open-ended
 * records keyed by whatever the LLM chose to emit.
 */

export type JsonPrimitive = string | number | boolean | null;

export type JsonValue = JsonPrimitive | JsonValue[] | JsonObject;

export interface JsonObject {
  [key: string]: JsonValue;
}

/**
 * One LLM reading of one chunk. Never empty: "no information" is represented
 * by the absence of a record.
 */
export type ExtractionRecord = JsonObject;

/**
 * One retrieved unit of source content
 */
export interface RetrievedChunk {
  /** Chunk text as stored in the vector store */
  content: string;
  /** Originating file path (metadata.source) */
  source_path: string;
  /** Collection the chunk came from (e.g. 'orders' or 'orders-external-files') */
  collection: string;
  /** Similarity score reported by the search backend, if any */
  similarity_score?: number;
}

/**
 * What to extract from a chunk
 */
export type ExtractionKind = 'server' | 'database' | 'api' | 'dependencies';

/**
 * Terminal state of one chunk's extraction
 */
export type ChunkOutcome =
  | 'extracted' // Parsed into a record
  | 'fallback' // Unparsable output kept as a fallback record
  | 'no_information' // LLM answered with a negative signal or empty output
  | 'skipped' // Content below the minimum length
  | 'transport_error' // Non-200 transport status, connection error or timeout
  | 'filtered' // Non-200 application status (content firewall)
  | 'timeout' // Task exceeded the orchestrator timeout
  | 'failed'; // Unexpected exception at the chunk boundary

/**
 * Outcome of the advisory validation call
 */
export type ValidationOutcome = 'confirmed' | 'disputed' | 'unavailable' | 'skipped';

/**
 * Per-chunk result, tagged with its source chunk for attribution
 */
export interface ChunkExtraction {
  /** Position of the chunk in the submitted list */
  index: number;
  chunk: RetrievedChunk;
  record: ExtractionRecord | null;
  outcome: ChunkOutcome;
  validation: ValidationOutcome;
  /** Parser diagnostic or error message */
  diagnostic?: string;
}

/**
 * Result of the robust JSON parser
 */
export interface ParseResult {
  record: ExtractionRecord | null;
  diagnostic: string | null;
}

/**
 * Prompts used for one extraction kind
 */
export interface ExtractionPrompts {
  system: string;
  detection: string;
  /** Yes/no confirmation prompt; kinds without one skip validation */
  validation?: string;
  /** Vector search query used to retrieve candidate chunks */
  query: string;
}
