/**
 * Per-chunk extraction
 *
 * Cleans one chunk, asks the LLM to detect and extract information, checks
 * the transport and application statuses separately, parses the output and
 * optionally asks for a yes/no confirmation. Every failure is caught here and
 * recorded on the result; nothing propagates to the caller.
 */
import { type ErrorLog } from '@utils/error-log';
import { RequestTimeoutError, ServiceConnectionError, toError } from '@utils/errors';
import { logger } from '@utils/logger';
import { type RedactionRule } from '@/types/config';
import {
  type ChunkExtraction,
  type ChunkOutcome,
  type ExtractionPrompts,
  type ExtractionRecord,
  type RetrievedChunk,
  type ValidationOutcome,
} from '@/types/extraction';
import { type LlmClient, type LlmRequest, type LlmResponse } from '@llm/client';

import { isFallbackRecord, parseLlmOutput } from './json-parser';
import { cleanContent } from './text-cleaning';

export interface WorkerOptions {
  minContentLength: number;
  redactionRules: RedactionRule[];
  enableValidation: boolean;
  detectionTimeoutMs: number;
  validationTimeoutMs: number;
}

/**
 * Failure raised inside the worker and converted to an outcome at the chunk boundary
 */
class ChunkFailure extends Error {
  constructor(
    public readonly outcome: ChunkOutcome,
    message: string
  ) {
    super(message);
  }
}

export class ExtractionWorker {
  constructor(
    private readonly llm: LlmClient,
    private readonly errorLog: ErrorLog,
    private readonly options: WorkerOptions
  ) {}

  /** Endpoint of the LLM this worker calls */
  get url(): string {
    return this.llm.url;
  }

  /**
   * Extract a record from one chunk
   *
   * @param chunk - Retrieved chunk
   * @param index - Position of the chunk in the submitted list
   * @param prompts - Prompts for the extraction kind
   * @returns Result tagged with the chunk; `record` is null when nothing was extracted
   */
  async extract(chunk: RetrievedChunk, index: number, prompts: ExtractionPrompts): Promise<ChunkExtraction> {
    const result = (
      outcome: ChunkOutcome,
      record: ExtractionRecord | null,
      validation: ValidationOutcome,
      diagnostic?: string
    ): ChunkExtraction => ({
      index,
      chunk,
      record,
      outcome,
      validation,
      ...(diagnostic !== undefined && { diagnostic }),
    });

    const cleaned = cleanContent(chunk.content, this.options.redactionRules);
    if (cleaned.trim().length < this.options.minContentLength) {
      return result('skipped', null, 'skipped', 'content below minimum length');
    }

    const request: LlmRequest = {
      system_prompt: prompts.system,
      user_prompt: prompts.detection,
      codebase: cleaned,
    };

    try {
      const output = await this.detect(chunk, request);
      const { record, diagnostic } = parseLlmOutput(output, chunk.source_path);

      if (record === null) {
        logger.debug(`No information in ${chunk.source_path}`, { diagnostic });
        return result('no_information', null, 'skipped', diagnostic ?? undefined);
      }

      if (isFallbackRecord(record)) {
        logger.warn(`Kept unparsable output from ${chunk.source_path}`, { diagnostic });
        return result('fallback', record, 'skipped', diagnostic ?? undefined);
      }

      const validation =
        this.options.enableValidation && prompts.validation !== undefined
          ? await this.validate(chunk, record, prompts.system, prompts.validation)
          : 'skipped';

      return result('extracted', record, validation);
    } catch (error) {
      if (error instanceof ChunkFailure) {
        return result(error.outcome, null, 'skipped', error.message);
      }

      const err = toError(error);
      logger.errorWithStack(`Unexpected failure extracting ${chunk.source_path}`, err);
      this.logFailure(chunk, request, 'unexpected_error', err.message);
      return result('failed', null, 'skipped', err.message);
    }
  }

  /**
   * Run the detection call and return its output
   *
   * @throws {ChunkFailure} On transport failure, non-200 status or filtered content
   */
  private async detect(chunk: RetrievedChunk, request: LlmRequest): Promise<string> {
    let response: LlmResponse;
    try {
      response = await this.llm.call(request, this.options.detectionTimeoutMs);
    } catch (error) {
      const err = toError(error);
      const type =
        err instanceof RequestTimeoutError
          ? 'timeout'
          : err instanceof ServiceConnectionError
            ? 'connection_error'
            : 'unexpected_error';
      logger.warn(`LLM call failed for ${chunk.source_path}`, { error: err.message });
      this.logFailure(chunk, request, type, err.message);
      throw new ChunkFailure('transport_error', err.message);
    }

    if (response.transportStatus !== 200) {
      const status = response.transportStatus;
      logger.warn(`LLM API returned HTTP ${String(status)} for ${chunk.source_path}`);
      const type = status === 404 ? '404_firewall_block' : `http_${String(status)}`;
      this.logFailure(chunk, request, type, response.output, status);
      throw new ChunkFailure('transport_error', `HTTP ${String(status)}`);
    }

    if (response.applicationStatus === null) {
      logger.warn(`LLM API returned an unreadable body for ${chunk.source_path}`);
      this.logFailure(chunk, request, 'invalid_json_response', response.output, response.transportStatus);
      throw new ChunkFailure('transport_error', 'invalid JSON response');
    }

    if (response.applicationStatus !== 200) {
      const status = response.applicationStatus;
      logger.warn(`LLM output filtered with status ${String(status)} for ${chunk.source_path}`);
      this.logFailure(chunk, request, `llm_internal_${String(status)}`, response.output, status);
      throw new ChunkFailure('filtered', `application status ${String(status)}`);
    }

    return response.output;
  }

  /**
   * Ask the LLM to confirm a record. Advisory: the record is kept whatever the answer.
   */
  private async validate(
    chunk: RetrievedChunk,
    record: ExtractionRecord,
    systemPrompt: string,
    validationPrompt: string
  ): Promise<ValidationOutcome> {
    const request: LlmRequest = {
      system_prompt: systemPrompt,
      user_prompt: validationPrompt,
      codebase: JSON.stringify(record),
    };

    try {
      const response = await this.llm.call(request, this.options.validationTimeoutMs);

      if (response.transportStatus !== 200) {
        this.logFailure(
          chunk,
          request,
          `validation_api_${String(response.transportStatus)}`,
          response.output,
          response.transportStatus
        );
        return 'unavailable';
      }
      if (response.applicationStatus !== 200) {
        const status = response.applicationStatus ?? undefined;
        this.logFailure(chunk, request, `validation_internal_${String(status ?? 'unknown')}`, response.output, status);
        return 'unavailable';
      }

      return response.output.toLowerCase().includes('yes') ? 'confirmed' : 'disputed';
    } catch (error) {
      logger.warn(`Validation failed for ${chunk.source_path}, keeping record`, { error: toError(error).message });
      return 'unavailable';
    }
  }

  private logFailure(
    chunk: RetrievedChunk,
    request: LlmRequest,
    errorType: string,
    responseText: string,
    statusCode?: number
  ): void {
    this.errorLog.append({
      error_type: errorType,
      status_code: statusCode,
      response_text: responseText,
      file_source: chunk.source_path,
      url: this.llm.url,
      system_prompt: request.system_prompt,
      user_prompt: request.user_prompt,
      codebase: request.codebase,
    });
  }
}
