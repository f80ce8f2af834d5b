/**
 * SQL recognition and the structural validity gate
 */

export interface SqlCheck {
  valid: boolean;
  reason: string;
}

/** Minimum length for a record value to be considered a query */
const MIN_VALUE_QUERY_LENGTH = 10;
/** Minimum length for a statement found by scanning source text, and for DDL */
const MIN_STATEMENT_LENGTH = 15;

export const TOO_SHORT_REASON = 'Invalid SQL syntax or too short';

const SQL_KEYWORD = /\b(?:select|insert|update|delete|create|drop)\b/i;

/**
 * Statement patterns for scanning raw source. A statement ends at a line
 * break, a semicolon followed by another statement, or a blank line.
 */
const SOURCE_PATTERNS: readonly RegExp[] = [
  /(SELECT\s+[\s\S]*?FROM\s+[\s\S]*?)(?=[;\n]\s*[A-Z]|\n\s*\n|$)/gim,
  /(INSERT\s+INTO\s+[\s\S]*?VALUES\s*\([^)]*\))/gi,
  /(UPDATE\s+\w+\s+SET\s+[\s\S]*?)(?=[;\n]\s*[A-Z]|\n\s*\n|$)/gim,
  /(DELETE\s+FROM\s+[\s\S]*?)(?=[;\n]\s*[A-Z]|\n\s*\n|$)/gim,
  /(CREATE\s+TABLE\s+[\s\S]*?)(?=[;\n]\s*[A-Z]|\n\s*\n|$)/gim,
];

const hasWord = (text: string, word: string): boolean => new RegExp(`\\b${word}\\b`).test(text);

/**
 * Structural check of a single statement
 */
export const checkSql = (query: string): SqlCheck => {
  const text = query.trim().toLowerCase();

  if (text.startsWith('select')) {
    return hasWord(text, 'from') ? { valid: true, reason: '' } : { valid: false, reason: 'SELECT without FROM' };
  }
  if (text.startsWith('insert')) {
    return hasWord(text, 'into') && (hasWord(text, 'values') || hasWord(text, 'select'))
      ? { valid: true, reason: '' }
      : { valid: false, reason: 'INSERT without INTO and VALUES or SELECT' };
  }
  if (text.startsWith('update')) {
    return hasWord(text, 'set') ? { valid: true, reason: '' } : { valid: false, reason: 'UPDATE without SET' };
  }
  if (text.startsWith('delete')) {
    return hasWord(text, 'from') ? { valid: true, reason: '' } : { valid: false, reason: 'DELETE without FROM' };
  }
  if (text.startsWith('create') || text.startsWith('drop') || text.startsWith('alter')) {
    return text.length > MIN_STATEMENT_LENGTH
      ? { valid: true, reason: '' }
      : { valid: false, reason: 'DDL statement too short' };
  }

  return { valid: false, reason: 'Not a recognized SQL statement' };
};

export const isValidSql = (query: string): boolean => checkSql(query).valid;

/**
 * Whether a record value looks like it is meant to be a query
 */
export const mentionsSql = (value: string): boolean => SQL_KEYWORD.test(value);

/**
 * Gate a query-like record value
 *
 * @returns Check result; values of 10 characters or fewer always fail
 */
export const checkCandidateQuery = (value: string): SqlCheck => {
  if (value.trim().length <= MIN_VALUE_QUERY_LENGTH) {
    return { valid: false, reason: TOO_SHORT_REASON };
  }
  return checkSql(value);
};

const cleanStatement = (statement: string): string =>
  statement
    .replace(/\s+/g, ' ')
    .trim()
    .replace(/["'`+;\s]+$/, '');

/**
 * Scan raw source text for SQL statements
 *
 * @returns Whitespace-collapsed statements that pass the gate, in pattern then position order
 */
export const extractSqlFromSource = (source: string): string[] => {
  const statements: string[] = [];

  for (const pattern of SOURCE_PATTERNS) {
    for (const match of source.matchAll(pattern)) {
      const statement = cleanStatement(match[1] ?? '');
      if (statement.length > MIN_STATEMENT_LENGTH && isValidSql(statement) && !statements.includes(statement)) {
        statements.push(statement);
      }
    }
  }

  return statements;
};
