/**
 * Structured error log types
 */

export type ErrorSeverity = 'HIGH' | 'MEDIUM' | 'LOW';

/**
 * One logged failure with the full prompt and response context.
 * Entries are frozen on creation.
 */
export interface ErrorLogEntry {
  readonly id: string;
  readonly timestamp: string;
  readonly error_type: string;
  readonly status_code?: number;
  readonly response_text: string;
  readonly file_source: string;
  readonly url: string;
  readonly system_prompt: string;
  readonly user_prompt: string;
  /** First 500 characters of the content sent, with '...' when truncated */
  readonly codebase_snippet: string;
  readonly full_codebase_length: number;
  readonly severity: ErrorSeverity;
}

/**
 * Input for a new log entry; id, timestamp, snippet and severity are derived
 */
export interface ErrorLogInput {
  error_type: string;
  status_code?: number;
  response_text: string;
  file_source: string;
  url: string;
  system_prompt: string;
  user_prompt: string;
  codebase: string;
}

/**
 * Condensed entry used in the downloadable grouped log
 */
export interface StructuredErrorItem {
  system: string;
  user: string;
  codebase: string;
  error: string;
  timestamp: string;
  status_code: number | null;
  error_severity: ErrorSeverity;
  response_text: string;
  full_codebase_length: number;
  url_attempted: string;
}

/**
 * Errors grouped by status code ('404', '500', 'unknown', ...)
 */
export interface StructuredErrorLog {
  Errors: Record<string, StructuredErrorItem[]>;
}
