/**
 * MCP-compliant tool wrappers
 * Converts pipeline operations to MCP SDK format
 */
import {
  formatBatchResults,
  formatErrorLog,
  formatSearchResults,
  formatSpecification,
} from '@mcp/formatter';
import {
  type ClearErrorLogInput,
  type ExtractSpecificationInput,
  type GetErrorLogInput,
  type RunBatchInput,
  type SearchChunksInput,
} from '@mcp/schemas';
import { validateCodebaseList, validateCodebaseName } from '@mcp/validator';
import { logger } from '@utils/logger';
import { type ErrorLogEntry } from '@/types/error-log';
import { BatchDriver } from '@pipeline/batch-driver';
import { type PipelineContext } from '@pipeline/context';
import { SpecificationGenerator } from '@pipeline/spec-generator';

/**
 * MCP tool return type
 */
export type McpToolResult = {
  content: { type: 'text'; text: string }[];
  structuredContent?: Record<string, unknown>;
};

const DEFAULT_ERROR_LIMIT = 20;

/**
 * search_chunks MCP wrapper
 */
export const searchChunksMCP = async (context: PipelineContext, input: SearchChunksInput): Promise<McpToolResult> => {
  try {
    const codebase = validateCodebaseName('codebase', input.codebase);
    const outcome = await context.retrieval.searchWithSummary(codebase, input.query, input.k, input.collection_suffixes);

    return {
      content: [{ type: 'text', text: formatSearchResults(codebase, input.query, outcome) }],
      structuredContent: {
        codebase,
        query: input.query,
        total_chunks: outcome.chunks.length,
        collections: outcome.summary,
        chunks: outcome.chunks.map((chunk) => ({
          source_path: chunk.source_path,
          collection: chunk.collection,
          similarity_score: chunk.similarity_score,
          length: chunk.content.length,
        })),
      },
    };
  } catch (error) {
    logger.error('search_chunks tool failed', { error });
    throw error;
  }
};

/**
 * extract_specification MCP wrapper
 */
export const extractSpecificationMCP = async (
  context: PipelineContext,
  input: ExtractSpecificationInput
): Promise<McpToolResult> => {
  try {
    const codebase = validateCodebaseName('codebase', input.codebase);
    const document = await new SpecificationGenerator(context).generate(codebase, {
      ...(input.mode !== undefined && { mode: input.mode }),
    });

    let text = formatSpecification(document);
    let commit: { ok: boolean; message: string } | undefined;
    if (input.commit === true && context.sink !== undefined) {
      commit = await context.sink.commit(codebase, document);
      text += `\n\n**Commit:** ${commit.ok ? 'ok' : 'failed'} - ${commit.message}`;
    }

    return {
      content: [{ type: 'text', text }],
      structuredContent: {
        document,
        errors_logged: context.errorLog.size,
        ...(commit !== undefined && { commit }),
      },
    };
  } catch (error) {
    logger.error('extract_specification tool failed', { error });
    throw error;
  }
};

/**
 * run_batch MCP wrapper
 */
export const runBatchMCP = async (context: PipelineContext, input: RunBatchInput): Promise<McpToolResult> => {
  try {
    const codebases = validateCodebaseList('codebases', input.codebases);
    const driver = new BatchDriver(context);
    const results = await driver.runBatch(codebases, {
      ...(input.commit !== undefined && { commit: input.commit }),
      ...(input.mode !== undefined && { mode: input.mode }),
    });

    return {
      content: [{ type: 'text', text: formatBatchResults(results) }],
      structuredContent: {
        results: Object.fromEntries(
          [...results].map(([codebase, result]) => [
            codebase,
            result === null
              ? null
              : {
                  codebase: result.codebase,
                  status: result.status,
                  Application: result.Application,
                  ServerInfo: result.ServerInfo,
                  DatabaseSpecification: result.DatabaseSpecification,
                  ...(result.commit !== undefined && { commit: result.commit }),
                },
          ])
        ),
        stats: driver.lastStats,
      },
    };
  } catch (error) {
    logger.error('run_batch tool failed', { error });
    throw error;
  }
};

/**
 * get_error_log MCP wrapper
 */
export const getErrorLogMCP = (context: PipelineContext, input: GetErrorLogInput): McpToolResult => {
  const matches = (entry: ErrorLogEntry): boolean =>
    input.error_type === undefined || entry.error_type === input.error_type;
  const entries = context.errorLog.entries().filter(matches);

  return {
    content: [{ type: 'text', text: formatErrorLog(entries, input.limit ?? DEFAULT_ERROR_LIMIT) }],
    structuredContent: {
      total: entries.length,
      ...context.errorLog.toStructuredJson(matches),
    },
  };
};

/**
 * clear_error_log MCP wrapper
 */
export const clearErrorLogMCP = (context: PipelineContext, _input: ClearErrorLogInput): McpToolResult => {
  const removed = context.errorLog.clear();
  logger.info('Error log cleared', { removed });

  return {
    content: [{ type: 'text', text: `Cleared ${String(removed)} error log entries.` }],
    structuredContent: { removed },
  };
};
