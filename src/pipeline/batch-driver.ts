/**
 * Batch driver
 *
 * Runs codebases strictly in order, each to completion before the next.
 * A codebase that throws is recorded as null and the batch continues.
 */
import { toError } from '@utils/errors';
import { logger } from '@utils/logger';
import { createProgressTracker, type BatchStats } from '@utils/progress';
import { type ExecutionMode } from '@/types/config';
import { type BatchResult, type SpecificationDocument } from '@/types/specification';

import { type PipelineContext } from './context';
import { SpecificationGenerator, type GenerateOptions } from './spec-generator';

/**
 * Anything that turns a codebase name into a document
 */
export interface DocumentGenerator {
  generate(codebase: string, options?: GenerateOptions): Promise<SpecificationDocument>;
}

export interface BatchOptions {
  /** Commit each finished document through the context's sink (default: true when a sink is configured) */
  commit?: boolean;
  /** Stops the batch before the next codebase, and the running codebase before its next chunk */
  signal?: AbortSignal;
  /** Overrides the configured execution mode */
  mode?: ExecutionMode;
  /** Called after each codebase */
  onResult?: (codebase: string, result: BatchResult | null) => void;
}

export const toBatchResult = (document: SpecificationDocument): BatchResult => ({
  codebase: document.extraction_metadata.codebase,
  Application: document.Application,
  ServerInfo: document['Server Information'],
  DatabaseSpecification: document['Database Information'],
  status: 'completed',
  document,
});

export class BatchDriver {
  private readonly generator: DocumentGenerator;
  private stats: BatchStats | null = null;

  constructor(
    private readonly context: PipelineContext,
    generator?: DocumentGenerator
  ) {
    this.generator = generator ?? new SpecificationGenerator(context);
  }

  /**
   * Process every codebase
   *
   * @param codebases - Codebase names, processed in order; duplicates run once
   * @returns Fresh map of codebase to result, null for codebases that failed
   */
  async runBatch(codebases: string[], options: BatchOptions = {}): Promise<Map<string, BatchResult | null>> {
    const queue = [...new Set(codebases.map((codebase) => codebase.trim()).filter(Boolean))];
    const results = new Map<string, BatchResult | null>();
    const tracker = createProgressTracker();
    const sink = options.commit === false ? undefined : this.context.sink;

    tracker.start(queue.length);

    for (const codebase of queue) {
      if (options.signal?.aborted) {
        logger.info(`Batch cancelled before ${codebase}`);
        break;
      }

      tracker.begin(codebase);
      let result: BatchResult | null;

      try {
        const document = await this.generator.generate(codebase, {
          ...(options.signal !== undefined && { signal: options.signal }),
          ...(options.mode !== undefined && { mode: options.mode }),
          onStage: tracker.setStage,
        });
        result = toBatchResult(document);
        tracker.finish(codebase);
      } catch (error) {
        const err = toError(error);
        logger.errorWithStack(`Codebase ${codebase} failed`, err);
        result = null;
        tracker.finish(codebase, err.message);
      }

      if (result !== null && sink !== undefined) {
        tracker.setStage('commit');
        const commit = await sink.commit(codebase, result.document);
        result.commit = commit;
        if (!commit.ok) {
          tracker.recordCommitFailure(codebase, commit.message);
        }
      }

      results.set(codebase, result);
      options.onResult?.(codebase, result);
    }

    tracker.logFinalReport();
    this.stats = tracker.getStats();
    return results;
  }

  /**
   * Statistics of the most recent run, null before the first one
   */
  get lastStats(): BatchStats | null {
    return this.stats;
  }
}
