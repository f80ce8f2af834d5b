/**
 * LLM invocation adapter
 *
 * The LLM API wraps an inner application status inside an outer transport
 * status. A 200 transport response can still carry a filtered application
 * status, so both are surfaced to callers.
 */
/* eslint-disable @typescript-eslint/naming-convention */
import { z } from 'zod';

import { ContentFilteredError, HttpStatusError, UnparsableOutputError } from '@utils/errors';
import { postJson } from '@utils/http';
import { type OllamaClient } from '@utils/ollama';
import { retryWithPolicy, SINGLE_ATTEMPT, type RetryPolicy } from '@utils/retry';
import { type JsonObject } from '@/types/extraction';
import { parseLlmOutput } from '@extraction/json-parser';

/**
 * Payload of one LLM call
 */
export interface LlmRequest {
  system_prompt: string;
  user_prompt: string;
  /** Content the prompt refers to */
  codebase: string;
}

export interface LlmResponse {
  /** Outer HTTP status */
  transportStatus: number;
  /** Inner status from the response body; null when the body could not be read */
  applicationStatus: number | null;
  /** Model output, or the raw body when the call failed */
  output: string;
}

export interface LlmClient {
  /** Endpoint recorded in error log entries */
  readonly url: string;
  /**
   * Perform one call. Non-200 statuses are returned, not thrown.
   *
   * @throws {RequestTimeoutError} If the call times out
   * @throws {ServiceConnectionError} If the service is unreachable
   */
  call(request: LlmRequest, timeoutMs: number): Promise<LlmResponse>;
}

const LlmApiResponseSchema = z.object({
  status_code: z.coerce.number().int().optional(),
  output: z.unknown().optional(),
});

const outputText = (output: unknown): string => {
  if (output === undefined || output === null) {
    return '';
  }
  return typeof output === 'string' ? output : JSON.stringify(output);
};

/**
 * Client for the `/LLM-API` endpoint
 */
export class HttpLlmClient implements LlmClient {
  constructor(public readonly url: string) {}

  async call(request: LlmRequest, timeoutMs: number): Promise<LlmResponse> {
    const response = await postJson(this.url, request, timeoutMs, 'LLM API');

    if (response.status !== 200) {
      return { transportStatus: response.status, applicationStatus: null, output: response.text };
    }

    const parsed = LlmApiResponseSchema.safeParse(response.body);
    if (!parsed.success) {
      return { transportStatus: response.status, applicationStatus: null, output: response.text };
    }

    return {
      transportStatus: response.status,
      // A body without an inner status inherits the transport status
      applicationStatus: parsed.data.status_code ?? response.status,
      output: outputText(parsed.data.output),
    };
  }
}

/**
 * Client that sends prompts to a local Ollama model.
 * Ollama has no content filter, so the application status mirrors the transport status.
 */
export class OllamaLlmClient implements LlmClient {
  constructor(private readonly ollama: OllamaClient) {}

  get url(): string {
    return `${this.ollama.host}/api/generate`;
  }

  async call(request: LlmRequest, timeoutMs: number): Promise<LlmResponse> {
    const { status, output } = await this.ollama.generate(
      request.system_prompt,
      `${request.user_prompt}\n\n${request.codebase}`,
      timeoutMs
    );
    return { transportStatus: status, applicationStatus: status, output };
  }
}

/**
 * Call the LLM under a retry policy and require a JSON document back
 *
 * Transport and application failures become typed errors so the policy can
 * classify them; unparsable output is retried as a transient failure.
 *
 * @returns Parsed JSON object
 * @throws {HttpStatusError} On a non-200 transport status
 * @throws {ContentFilteredError} On a non-200 application status
 * @throws {UnparsableOutputError} When no parsing strategy recovers a document
 */
export const callForJson = async (
  client: LlmClient,
  request: LlmRequest,
  timeoutMs: number,
  operation: string,
  policy: RetryPolicy = SINGLE_ATTEMPT
): Promise<JsonObject> => {
  return retryWithPolicy(
    async () => {
      const response = await client.call(request, timeoutMs);
      if (response.transportStatus !== 200) {
        throw new HttpStatusError(client.url, response.transportStatus, response.output);
      }
      if (response.applicationStatus === null) {
        throw new UnparsableOutputError(operation, response.output);
      }
      if (response.applicationStatus !== 200) {
        throw new ContentFilteredError(response.applicationStatus, response.output);
      }

      const { record, diagnostic } = parseLlmOutput(response.output, operation);
      if (record === null || diagnostic !== null) {
        throw new UnparsableOutputError(operation, response.output);
      }
      return record;
    },
    policy,
    operation
  );
};
