/**
 * Zod schemas for MCP tool inputs
 */
/* eslint-disable @typescript-eslint/naming-convention */
import { z } from 'zod';

const codebase = z.string().min(1, 'Codebase name is required').max(200);

/**
 * Zod schema for search_chunks MCP tool
 *
 * @property codebase - Codebase (main collection) name
 * @property query - Similarity query (minimum 2 characters)
 * @property k - Results per collection (1-100, default: configured count)
 * @property collection_suffixes - Collection suffixes to search (default: configured list)
 */
export const SearchChunksSchema = z.object({
  codebase,
  query: z.string().min(2, 'Query must be at least 2 characters'),
  k: z.number().int().min(1).max(100).optional(),
  collection_suffixes: z.array(z.string()).min(1).optional(),
});

/**
 * Zod schema for extract_specification MCP tool
 *
 * @property codebase - Codebase (main collection) name
 * @property mode - Sequential or pooled extraction (default: configured mode)
 * @property commit - Send the document to the configured sinks (default: false)
 */
export const ExtractSpecificationSchema = z.object({
  codebase,
  mode: z.enum(['sequential', 'pool']).optional(),
  commit: z.boolean().optional(),
});

/**
 * Zod schema for run_batch MCP tool
 *
 * @property codebases - Codebase names, processed in order (1-100)
 * @property mode - Sequential or pooled extraction per codebase
 * @property commit - Send each document to the configured sinks (default: true)
 */
export const RunBatchSchema = z.object({
  codebases: z.array(codebase).min(1, 'Provide at least one codebase').max(100),
  mode: z.enum(['sequential', 'pool']).optional(),
  commit: z.boolean().optional(),
});

/**
 * Zod schema for get_error_log MCP tool
 *
 * @property error_type - Only entries of this type (e.g. '404_firewall_block')
 * @property limit - Maximum entries listed in the text output (1-200, default: 20)
 */
export const GetErrorLogSchema = z.object({
  error_type: z.string().min(1).optional(),
  limit: z.number().int().min(1).max(200).optional(),
});

/**
 * Zod schema for clear_error_log MCP tool
 */
export const ClearErrorLogSchema = z.object({});

export type SearchChunksInput = z.infer<typeof SearchChunksSchema>;
export type ExtractSpecificationInput = z.infer<typeof ExtractSpecificationSchema>;
export type RunBatchInput = z.infer<typeof RunBatchSchema>;
export type GetErrorLogInput = z.infer<typeof GetErrorLogSchema>;
export type ClearErrorLogInput = z.infer<typeof ClearErrorLogSchema>;
