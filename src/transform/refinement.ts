/**
 * Final LLM transformation of the assembled database specification
 */
import { toError } from '@utils/errors';
import { logger } from '@utils/logger';
import { type RetryPolicy } from '@utils/retry';
import { type JsonObject } from '@/types/extraction';
import { type DatabaseSpecification } from '@/types/specification';
import { callForJson, type LlmClient } from '@llm/client';
import { REFINEMENT_SYSTEM_PROMPT, REFINEMENT_USER_PROMPT } from '@extraction/prompts';

export type RefinementResult = { status: 'applied'; document: JsonObject } | { status: 'fallback'; error: string };

export interface RefinementOptions {
  timeoutMs: number;
  policy: RetryPolicy;
  systemPrompt?: string;
}

/**
 * Ask the LLM to restructure a database specification
 *
 * Never throws: once the retry policy gives up the caller keeps the
 * deterministic specification.
 */
export const refineDatabaseSpecification = async (
  spec: DatabaseSpecification,
  llm: LlmClient,
  options: RefinementOptions
): Promise<RefinementResult> => {
  try {
    const document = await callForJson(
      llm,
      {
        system_prompt: options.systemPrompt ?? REFINEMENT_SYSTEM_PROMPT,
        user_prompt: REFINEMENT_USER_PROMPT,
        codebase: JSON.stringify(spec),
      },
      options.timeoutMs,
      'Database specification refinement',
      options.policy
    );
    return { status: 'applied', document };
  } catch (error) {
    const err = toError(error);
    logger.warn('Refinement failed, keeping the deterministic specification', { error: err.message });
    return { status: 'fallback', error: err.message };
  }
};
