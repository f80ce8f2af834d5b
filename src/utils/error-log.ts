/**
 * Session-scoped structured error log
 *
 * Append-only collector passed explicitly into each pipeline stage. Entries
 * carry the full prompt and response context so content-policy blocks can be
 * audited after a run.
 */

import { v4 as uuidv4 } from 'uuid';

import {
  type ErrorLogEntry,
  type ErrorLogInput,
  type ErrorSeverity,
  type StructuredErrorItem,
  type StructuredErrorLog,
} from '@/types/error-log';

const SNIPPET_LENGTH = 500;

/**
 * Derive severity from an HTTP status code
 */
export const severityFor = (statusCode?: number): ErrorSeverity => {
  if (statusCode === undefined) {
    return 'LOW';
  }
  if (statusCode >= 500) {
    return 'HIGH';
  }
  if (statusCode >= 400) {
    return 'MEDIUM';
  }
  return 'LOW';
};

const snippetOf = (codebase: string): string => {
  return codebase.length > SNIPPET_LENGTH ? `${codebase.slice(0, SNIPPET_LENGTH)}...` : codebase;
};

export class ErrorLog {
  private readonly items: ErrorLogEntry[] = [];

  /**
   * Append a new entry
   *
   * @returns The frozen entry
   */
  append(input: ErrorLogInput): ErrorLogEntry {
    const entry: ErrorLogEntry = Object.freeze({
      id: uuidv4(),
      timestamp: new Date().toISOString(),
      error_type: input.error_type,
      status_code: input.status_code,
      response_text: input.response_text,
      file_source: input.file_source,
      url: input.url,
      system_prompt: input.system_prompt,
      user_prompt: input.user_prompt,
      codebase_snippet: snippetOf(input.codebase),
      full_codebase_length: input.codebase.length,
      severity: severityFor(input.status_code),
    });
    this.items.push(entry);
    return entry;
  }

  /**
   * Snapshot of all entries in insertion order
   */
  entries(): readonly ErrorLogEntry[] {
    return [...this.items];
  }

  get size(): number {
    return this.items.length;
  }

  /**
   * Remove every entry, returning how many were removed
   */
  clear(): number {
    const removed = this.items.length;
    this.items.length = 0;
    return removed;
  }

  /**
   * Entries grouped by status code ('404', '500', ..., 'unknown')
   *
   * @param filter - Only include matching entries
   */
  toStructuredJson(filter?: (entry: ErrorLogEntry) => boolean): StructuredErrorLog {
    const grouped: Record<string, StructuredErrorItem[]> = {};

    for (const entry of filter ? this.items.filter(filter) : this.items) {
      const key = entry.status_code === undefined ? 'unknown' : String(entry.status_code);
      const bucket = grouped[key] ?? [];
      bucket.push({
        system: entry.system_prompt,
        user: entry.user_prompt,
        codebase: entry.codebase_snippet,
        error: entry.error_type,
        timestamp: entry.timestamp,
        status_code: entry.status_code ?? null,
        error_severity: entry.severity,
        response_text: entry.response_text,
        full_codebase_length: entry.full_codebase_length,
        url_attempted: entry.url,
      });
      grouped[key] = bucket;
    }

    return { Errors: grouped };
  }
}
