/**
 * Destinations for finished specification documents
 */
import { mkdir, writeFile } from 'node:fs/promises';
import { join } from 'node:path';

import { toError } from '@utils/errors';
import { postJson } from '@utils/http';
import { logger } from '@utils/logger';
import { type SpecificationDocument } from '@/types/specification';

export interface CommitResult {
  ok: boolean;
  message: string;
}

export interface CommitSink {
  /**
   * Persist a document. Failures are reported in the result, never thrown.
   */
  commit(codebase: string, document: SpecificationDocument): Promise<CommitResult>;
}

/**
 * Posts `{ codebase, content }` to a commit endpoint
 */
export class HttpCommitSink implements CommitSink {
  constructor(
    private readonly url: string,
    private readonly timeoutMs: number
  ) {}

  async commit(codebase: string, document: SpecificationDocument): Promise<CommitResult> {
    try {
      const response = await postJson(this.url, { codebase, content: document }, this.timeoutMs, 'commit service');
      if (!response.ok) {
        logger.warn(`Commit failed for ${codebase}`, { status: response.status });
        return { ok: false, message: `HTTP ${String(response.status)}: ${response.text.slice(0, 200)}` };
      }
      return { ok: true, message: `Committed ${codebase}` };
    } catch (error) {
      const err = toError(error);
      logger.warn(`Commit failed for ${codebase}`, { error: err.message });
      return { ok: false, message: err.message };
    }
  }
}

/**
 * File-safe timestamp: 2024-01-02T03-04-05-678Z
 */
export const fileTimestamp = (date: Date): string => date.toISOString().replace(/[:.]/g, '-');

/**
 * Writes `<dir>/<codebase>_<timestamp>.json`
 */
export class FileExportSink implements CommitSink {
  constructor(
    private readonly directory: string,
    private readonly now: () => Date = () => new Date()
  ) {}

  async commit(codebase: string, document: SpecificationDocument): Promise<CommitResult> {
    const safeName = codebase.replace(/[^\w.-]/g, '_');
    const path = join(this.directory, `${safeName}_${fileTimestamp(this.now())}.json`);

    try {
      await mkdir(this.directory, { recursive: true });
      await writeFile(path, `${JSON.stringify(document, null, 2)}\n`, 'utf-8');
      logger.info(`Exported ${codebase}`, { path });
      return { ok: true, message: path };
    } catch (error) {
      const err = toError(error);
      logger.warn(`Export failed for ${codebase}`, { path, error: err.message });
      return { ok: false, message: err.message };
    }
  }
}

/**
 * Runs every sink; succeeds only when all of them did
 */
export class CompositeSink implements CommitSink {
  constructor(private readonly sinks: CommitSink[]) {}

  async commit(codebase: string, document: SpecificationDocument): Promise<CommitResult> {
    const results: CommitResult[] = [];
    for (const sink of this.sinks) {
      results.push(await sink.commit(codebase, document));
    }
    return {
      ok: results.every((result) => result.ok),
      message: results.map((result) => result.message).join('; '),
    };
  }
}
