/**
 * Lexical data type inference for extracted columns
 */
import { type JsonValue } from '@/types/extraction';
import { type DataType } from '@/types/specification';

/**
 * Indicators per type, checked in declaration order
 */
export const TYPE_INDICATORS: ReadonlyArray<readonly [DataType, readonly string[]]> = [
  ['string', ['name', 'title', 'description', 'text', 'varchar', 'char']],
  ['integer', ['id', 'count', 'number', 'int', 'age', 'year']],
  ['boolean', ['is_', 'has_', 'active', 'enabled', 'bool']],
  ['datetime', ['date', 'time', 'created', 'updated', 'timestamp']],
  ['decimal', ['price', 'amount', 'rate', 'decimal', 'float']],
  ['json', ['config', 'settings', 'data', 'json']],
];

const valueText = (value: JsonValue): string => (typeof value === 'string' ? value : JSON.stringify(value));

/**
 * Infer a column type from its key and value.
 * For each type the key is checked before the value; the first hit wins.
 *
 * @returns Inferred type, 'string' when nothing matches
 */
export const inferDataType = (key: string, value: JsonValue): DataType => {
  const keyLower = key.toLowerCase();
  const valueLower = valueText(value).toLowerCase();

  for (const [type, indicators] of TYPE_INDICATORS) {
    if (indicators.some((indicator) => keyLower.includes(indicator))) {
      return type;
    }
    if (indicators.some((indicator) => valueLower.includes(indicator))) {
      return type;
    }
  }

  return 'string';
};
