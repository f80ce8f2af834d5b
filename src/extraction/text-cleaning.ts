/**
 * Tenant token redaction applied to chunk content before it reaches the LLM
 */

import { type RedactionRule } from '@/types/config';

/**
 * Apply literal substitutions in order; every occurrence is replaced
 *
 * @param content - Raw chunk content
 * @param rules - Ordered redaction rules
 * @returns Content with all rules applied
 */
export const cleanContent = (content: string, rules: readonly RedactionRule[]): string => {
  return rules.reduce((text, rule) => (rule.search === '' ? text : text.split(rule.search).join(rule.replace)), content);
};
