#!/usr/bin/env node

/**
 * codespec - MCP Server for LLM-based extraction of code specifications.
 *
 * Features:
 * - Vector retrieval over pre-embedded codebase collections (HTTP or pgvector)
 * - Per-chunk LLM extraction with robust JSON recovery and regex fallbacks
 * - Database, server, API endpoint and dependency specifications per codebase
 * - Sequential batch runs with commit and file export sinks
 */
import { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import { config as loadDotenv } from 'dotenv';

import { loadConfig, validateConfig } from '@config/env';
import { toMcpSchema } from '@mcp/schema-adapter';
import {
  ClearErrorLogSchema,
  ExtractSpecificationSchema,
  GetErrorLogSchema,
  RunBatchSchema,
  SearchChunksSchema,
  type ClearErrorLogInput,
  type ExtractSpecificationInput,
  type GetErrorLogInput,
  type RunBatchInput,
  type SearchChunksInput,
} from '@mcp/schemas';
import { clearErrorLogMCP, extractSpecificationMCP, getErrorLogMCP, runBatchMCP, searchChunksMCP } from '@mcp/tools-mcp';
import { CodespecError, toError } from '@utils/errors';
import { initLogger, logger } from '@utils/logger';
import { connectRuntime, createPipelineRuntime, type PipelineRuntime } from '@pipeline/context';

const VERSION = '0.1.0';

/** Application state - initialized during startup */
interface AppState {
  runtime: PipelineRuntime;
  server: McpServer;
}

let appState: AppState | null = null;

/**
 * Initialize MCP server and all dependencies.
 *
 * Startup sequence:
 * 1. Load and validate environment configuration
 * 2. Build the pipeline runtime (LLM, retrieval, metadata, sinks)
 * 3. Health checks for Ollama and PostgreSQL where configured
 * 4. Register the MCP tools
 */
const initializeServer = async (): Promise<AppState> => {
  logger.info('Loading configuration...');
  loadDotenv();
  const config = loadConfig();
  validateConfig(config);
  initLogger(process.env.LOG_LEVEL);

  logger.startup({
    version: VERSION,
    llmBackend: config.llm.backend,
    retrievalBackend: config.retrieval.backend,
  });

  logger.info('Initializing pipeline...');
  const runtime = createPipelineRuntime(config);
  await connectRuntime(runtime);

  const { context } = runtime;
  const server = new McpServer({ name: 'codespec', version: VERSION }, { capabilities: { tools: {}, logging: {} } });

  logger.debug('Registering MCP tools...');

  // 1. search_chunks - Raw retrieval, for inspecting what the extractors will see
  server.registerTool(
    'search_chunks',
    {
      description:
        'Search the vector collections of a codebase and return the matching chunks with source file, collection and similarity score. Use to check that a codebase is embedded before extracting its specification.',
      inputSchema: toMcpSchema(SearchChunksSchema),
    },
    async (params: SearchChunksInput) => searchChunksMCP(context, params)
  );

  // 2. extract_specification - One codebase end to end
  server.registerTool(
    'extract_specification',
    {
      description:
        'Extract the specification of one codebase: application metadata, server information, database tables and SQL queries, API endpoints and dependencies. Calls the LLM once per retrieved chunk, so it can take several minutes.',
      inputSchema: toMcpSchema(ExtractSpecificationSchema),
    },
    async (params: ExtractSpecificationInput) => extractSpecificationMCP(context, params)
  );

  // 3. run_batch - Many codebases, strictly in order
  server.registerTool(
    'run_batch',
    {
      description:
        'Extract specifications for several codebases one after another. A failing codebase is reported as failed and the batch continues. Each finished document is committed to the configured sinks unless commit is false.',
      inputSchema: toMcpSchema(RunBatchSchema),
    },
    async (params: RunBatchInput) => {
      const result = await runBatchMCP(context, params);
      server
        .sendLoggingMessage({
          level: 'info',
          logger: 'codespec.batch',
          data: { type: 'batch_complete', codebases: params.codebases.length, timestamp: new Date().toISOString() },
        })
        .catch((err: unknown) => {
          logger.error('Failed to send batch notification', { error: err });
        });
      return result;
    }
  );

  // 4. get_error_log - Failures recorded this session
  server.registerTool(
    'get_error_log',
    {
      description:
        'Show the errors recorded this session, with the prompts and content that triggered them. Entries are grouped by HTTP status in the structured output; a 404 from the LLM API usually means the firewall blocked the content.',
      inputSchema: toMcpSchema(GetErrorLogSchema),
    },
    (params: GetErrorLogInput) => getErrorLogMCP(context, params)
  );

  // 5. clear_error_log - Reset the session log
  server.registerTool(
    'clear_error_log',
    {
      description: 'Remove every entry from the session error log.',
      inputSchema: toMcpSchema(ClearErrorLogSchema),
    },
    (params: ClearErrorLogInput) => clearErrorLogMCP(context, params)
  );

  logger.info('MCP server initialized successfully');
  return { runtime, server };
};

/** Graceful shutdown handler - closes database connections and flushes logs */
const shutdown = async (signal: string): Promise<void> => {
  logger.info(`Received ${signal}, shutting down...`);

  if (appState) {
    try {
      await appState.runtime.close();
    } catch (error) {
      logger.errorWithStack('Error closing database', toError(error));
    }
  }

  logger.shutdown();
  process.exit(0);
};

/** Main entry point - initialize server and connect stdio transport */
const main = async (): Promise<void> => {
  try {
    appState = await initializeServer();

    process.on('SIGINT', () => void shutdown('SIGINT'));
    process.on('SIGTERM', () => void shutdown('SIGTERM'));

    const transport = new StdioServerTransport();
    await appState.server.connect(transport);

    logger.info('codespec MCP server is ready');
    logger.info('Waiting for requests...');
  } catch (error) {
    if (error instanceof CodespecError) {
      console.error('\n' + error.getFormattedMessage());
    } else {
      logger.errorWithStack('Unexpected error during initialization', toError(error));
    }
    process.exit(1);
  }
};

void main();
