/**
 * CRUD inference from raw source text
 */

export type CrudOperation = 'CREATE' | 'READ' | 'UPDATE' | 'DELETE';

const escapeRegExp = (text: string): string => text.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');

/** Optional quote or bracket, then an optional schema prefix, before a table name */
const TABLE_PREFIX = '[`"\'\\[]?(?:\\w+\\.)?';

const ORM_VERBS: ReadonlyArray<readonly [CrudOperation, string]> = [
  ['READ', 'find|get|select|query|fetch'],
  ['CREATE', 'create|insert|save|add'],
  ['UPDATE', 'update|upsert|patch'],
  ['DELETE', 'delete|remove|destroy'],
];

/**
 * Infer the operations performed on a table
 *
 * @param source - Source text the table was extracted from
 * @param table - Table name
 * @returns Sorted comma-joined operations, 'READ' when nothing matched, 'UNKNOWN' for empty source
 */
export const inferCrudOperations = (source: string, table: string): string => {
  if (source.trim() === '') {
    return 'UNKNOWN';
  }

  const text = source.toLowerCase();
  const name = escapeRegExp(table.toLowerCase());
  const operations = new Set<CrudOperation>();

  if (/\bselect\b/.test(text) && new RegExp(`\\b${name}\\b`).test(text)) {
    operations.add('READ');
  }
  if (new RegExp(`\\binsert\\s+into\\s+${TABLE_PREFIX}${name}\\b`).test(text)) {
    operations.add('CREATE');
  }
  if (new RegExp(`\\bupdate\\s+${TABLE_PREFIX}${name}\\b`).test(text)) {
    operations.add('UPDATE');
  }
  if (new RegExp(`\\bdelete\\s+from\\s+${TABLE_PREFIX}${name}\\b`).test(text)) {
    operations.add('DELETE');
  }

  for (const [operation, verbs] of ORM_VERBS) {
    if (new RegExp(`\\b${name}\\.(?:${verbs})\\w*\\s*\\(`).test(text)) {
      operations.add(operation);
    }
  }

  if (operations.size === 0) {
    return 'READ';
  }
  return [...operations].sort().join(',');
};
