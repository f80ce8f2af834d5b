/**
 * MCP Tool Output Formatting
 * Provides Markdown formatters for all MCP tool outputs
 */
import { type SearchOutcome } from '@retrieval/vector-search';
import { type ErrorLogEntry } from '@/types/error-log';
import { type BatchResult, type SpecificationDocument } from '@/types/specification';

const PREVIEW_LENGTH = 300;

/**
 * Format file path as inline code with bold styling
 *
 * @param filePath - Absolute or relative file path
 * @returns Markdown-formatted file path string (**`path/to/file`**)
 */
export const formatFilePath = (filePath: string): string => {
  return `**\`${filePath}\`**`;
};

/**
 * Format code block with language syntax highlighting
 *
 * Sanitizes triple backticks in the code to prevent breaking the fence.
 *
 * @param code - Raw code content to format
 * @param language - Language identifier (e.g., 'json', 'sql'), empty for none
 * @returns Markdown code fence
 */
export const formatCodeBlock = (code: string, language: string): string => {
  // Ensure code doesn't contain triple backticks that would break the block
  const sanitizedCode = code.replace(/```/g, '\\`\\`\\`');
  return `\`\`\`${language}\n${sanitizedCode}\n\`\`\``;
};

const preview = (text: string): string =>
  text.length > PREVIEW_LENGTH ? `${text.slice(0, PREVIEW_LENGTH)}...` : text;

/**
 * Format search_chunks output
 *
 * Lists per-collection counts, then each chunk with its source, collection
 * and score, and a truncated preview of its content.
 */
export const formatSearchResults = (codebase: string, query: string, outcome: SearchOutcome): string => {
  const lines: string[] = [`# Search: ${codebase}`, '', `**Query:** ${query}`, ''];

  lines.push('## Collections', '');
  for (const entry of outcome.summary) {
    const status = entry.success ? 'ok' : 'failed';
    lines.push(`- \`${entry.collection}\`: ${String(entry.results_count)} results (${status})`);
  }
  lines.push('');

  if (outcome.chunks.length === 0) {
    lines.push('_No chunks found._');
    return lines.join('\n');
  }

  lines.push(`## Chunks (${String(outcome.chunks.length)})`, '');
  outcome.chunks.forEach((chunk, index) => {
    const score = chunk.similarity_score !== undefined ? ` - score ${chunk.similarity_score.toFixed(3)}` : '';
    lines.push(`### ${String(index + 1)}. ${formatFilePath(chunk.source_path)}`);
    lines.push(`_Collection:_ \`${chunk.collection}\`${score}`, '');
    lines.push(formatCodeBlock(preview(chunk.content), ''), '');
  });

  return lines.join('\n');
};

/**
 * Format extract_specification output
 */
export const formatSpecification = (document: SpecificationDocument): string => {
  const { summary } = document;
  const database = document['Database Information'];
  const lines: string[] = [
    `# Specification: ${summary.codebase}`,
    '',
    `**Status:** ${summary.status}`,
    `**Chunks processed:** ${String(summary.chunks_processed)}`,
    `**Coverage:** ${summary.coverage.percentage.toFixed(0)}% (${String(summary.coverage.areas_found)}/${String(summary.coverage.total_areas)} areas)`,
  ];
  if (summary.refinement !== undefined) {
    lines.push(`**Refinement:** ${summary.refinement}`);
  }
  lines.push('');

  lines.push('## Statistics', '');
  lines.push('| Section | Count |', '| --- | --- |');
  lines.push(`| Servers | ${String(summary.statistics.server_entries)} |`);
  lines.push(`| Tables | ${String(summary.statistics.tables)} |`);
  lines.push(`| SQL queries | ${String(summary.statistics.sql_queries)} |`);
  lines.push(`| Invalid SQL queries | ${String(summary.statistics.invalid_sql_queries)} |`);
  lines.push(`| API endpoints | ${String(summary.statistics.api_endpoints)} |`);
  lines.push(`| Dependencies | ${String(summary.statistics.dependencies)} |`);
  lines.push('');

  const servers = document['Server Information'].filter((server) => server.host ?? server.database_name);
  if (servers.length > 0) {
    lines.push('## Servers', '');
    for (const server of servers) {
      const address = [server.host ?? '?', server.port].filter(Boolean).join(':');
      lines.push(`- ${address}${server.database_name ? ` (${server.database_name})` : ''}`);
    }
    lines.push('');
  }

  if (database.SQL_QUERIES.length > 0) {
    lines.push('## SQL Queries', '');
    lines.push(formatCodeBlock(database.SQL_QUERIES.join(';\n'), 'sql'), '');
  }

  if (document['API Endpoints'].length > 0) {
    lines.push('## API Endpoints', '');
    lines.push(...document['API Endpoints'].map((endpoint) => `- \`${endpoint}\``), '');
  }

  return lines.join('\n');
};

/**
 * Format run_batch output
 */
export const formatBatchResults = (results: Map<string, BatchResult | null>): string => {
  const lines: string[] = ['# Batch Results', '', '| Codebase | Status | Servers | Tables | Commit |', '| --- | --- | --- | --- | --- |'];

  for (const [codebase, result] of results) {
    if (result === null) {
      lines.push(`| ${codebase} | failed | - | - | - |`);
      continue;
    }
    const commit = result.commit === undefined ? '-' : result.commit.ok ? 'ok' : `failed: ${result.commit.message}`;
    lines.push(
      `| ${codebase} | ${result.status} | ${String(result.ServerInfo.length)} | ${String(result.document.summary.statistics.tables)} | ${commit} |`
    );
  }

  const failed = [...results.values()].filter((result) => result === null).length;
  lines.push('', `**Processed:** ${String(results.size)}, **failed:** ${String(failed)}`);

  return lines.join('\n');
};

/**
 * Format get_error_log output, newest entries last
 */
export const formatErrorLog = (entries: readonly ErrorLogEntry[], limit: number): string => {
  if (entries.length === 0) {
    return '# Error Log\n\n_No errors recorded._';
  }

  const lines: string[] = ['# Error Log', '', `**Entries:** ${String(entries.length)}`, ''];
  const shown = entries.slice(-limit);
  if (shown.length < entries.length) {
    lines.push(`_Showing the last ${String(shown.length)}._`, '');
  }

  for (const entry of shown) {
    const status = entry.status_code !== undefined ? ` ${String(entry.status_code)}` : '';
    lines.push(`### [${entry.severity}] ${entry.error_type}${status}`);
    lines.push(`- **File:** ${formatFilePath(entry.file_source)}`);
    lines.push(`- **URL:** ${entry.url}`);
    lines.push(`- **Time:** ${entry.timestamp}`);
    lines.push(`- **Response:** ${preview(entry.response_text)}`, '');
  }

  return lines.join('\n');
};
