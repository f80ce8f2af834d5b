/**
 * Runs extraction workers over a list of chunks
 *
 * Sequential mode processes one chunk at a time and reports progress after
 * each. Pool mode runs a fixed number of lanes, bounds every task with a
 * timeout and merges only after every submitted task has settled. An abort
 * signal stops further submissions; calls already in flight run to completion.
 */
import { type ErrorLog } from '@utils/error-log';
import { logger } from '@utils/logger';
import { type ExecutionMode } from '@/types/config';
import { type ChunkExtraction, type ExtractionPrompts, type RetrievedChunk } from '@/types/extraction';

import { type ExtractionWorker } from './worker';

export interface OrchestratorOptions {
  mode: ExecutionMode;
  /** Pool size in pool mode */
  concurrency: number;
  /** Per-task timeout in pool mode, milliseconds */
  taskTimeoutMs: number;
}

export interface RunOptions {
  /** Stops submission of further chunks when aborted */
  signal?: AbortSignal;
  /** Called after each chunk settles */
  onProgress?: (completed: number, total: number, result: ChunkExtraction) => void;
  /** Overrides the configured execution mode for this run */
  mode?: ExecutionMode;
}

export class ExtractionOrchestrator {
  constructor(
    private readonly worker: ExtractionWorker,
    private readonly options: OrchestratorOptions,
    private readonly errorLog: ErrorLog
  ) {}

  /**
   * Extract from every chunk
   *
   * @param chunks - Retrieved chunks
   * @param prompts - Prompts for the extraction kind
   * @param runOptions - Cancellation, progress and mode override
   * @returns One result per submitted chunk, in chunk order
   */
  async run(
    chunks: RetrievedChunk[],
    prompts: ExtractionPrompts,
    runOptions: RunOptions = {}
  ): Promise<ChunkExtraction[]> {
    const mode = runOptions.mode ?? this.options.mode;
    const results =
      mode === 'pool'
        ? await this.runPool(chunks, prompts, runOptions)
        : await this.runSequential(chunks, prompts, runOptions);

    const counts: Record<string, number> = {};
    for (const result of results) {
      counts[result.outcome] = (counts[result.outcome] ?? 0) + 1;
    }
    logger.debug('Extraction pass complete', { mode, submitted: results.length, total: chunks.length, ...counts });

    return results;
  }

  private async runSequential(
    chunks: RetrievedChunk[],
    prompts: ExtractionPrompts,
    { signal, onProgress }: RunOptions
  ): Promise<ChunkExtraction[]> {
    const results: ChunkExtraction[] = [];

    for (const [index, chunk] of chunks.entries()) {
      if (signal?.aborted) {
        logger.info(`Extraction cancelled after ${String(results.length)} of ${String(chunks.length)} chunks`);
        break;
      }
      const result = await this.worker.extract(chunk, index, prompts);
      results.push(result);
      onProgress?.(results.length, chunks.length, result);
    }

    return results;
  }

  private async runPool(
    chunks: RetrievedChunk[],
    prompts: ExtractionPrompts,
    { signal, onProgress }: RunOptions
  ): Promise<ChunkExtraction[]> {
    const settled: ChunkExtraction[] = [];
    let next = 0;

    const lane = async (): Promise<void> => {
      while (next < chunks.length && !signal?.aborted) {
        const index = next++;
        const chunk = chunks[index];
        if (chunk === undefined) {
          break;
        }
        const result = await this.withTimeout(this.worker.extract(chunk, index, prompts), chunk, index, prompts);
        settled.push(result);
        onProgress?.(settled.length, chunks.length, result);
      }
    };

    const laneCount = Math.max(1, Math.min(this.options.concurrency, chunks.length));
    await Promise.all(Array.from({ length: laneCount }, lane));

    if (signal?.aborted && next < chunks.length) {
      logger.info(`Extraction cancelled after ${String(next)} of ${String(chunks.length)} chunks were submitted`);
    }

    return settled.sort((a, b) => a.index - b.index);
  }

  /**
   * Resolve with the task's result, or with a timeout result once the limit passes.
   * A timeout is appended to the error log as `task_timeout`.
   */
  private async withTimeout(
    task: Promise<ChunkExtraction>,
    chunk: RetrievedChunk,
    index: number,
    prompts: ExtractionPrompts
  ): Promise<ChunkExtraction> {
    let timer: NodeJS.Timeout | undefined;
    const timeout = new Promise<ChunkExtraction>((resolve) => {
      timer = setTimeout(() => {
        logger.warn(`Extraction timed out for ${chunk.source_path}`, { timeoutMs: this.options.taskTimeoutMs });
        this.errorLog.append({
          error_type: 'task_timeout',
          response_text: `Task exceeded ${String(this.options.taskTimeoutMs)}ms`,
          file_source: chunk.source_path,
          url: this.worker.url,
          system_prompt: prompts.system,
          user_prompt: prompts.detection,
          codebase: chunk.content,
        });
        resolve({
          index,
          chunk,
          record: null,
          outcome: 'timeout',
          validation: 'skipped',
          diagnostic: `timed out after ${String(this.options.taskTimeoutMs)}ms`,
        });
      }, this.options.taskTimeoutMs);
    });

    try {
      return await Promise.race([task, timeout]);
    } finally {
      clearTimeout(timer);
    }
  }
}
