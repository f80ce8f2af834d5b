/**
 * Unit tests for column type inference
 */

import { describe, expect, it } from '@jest/globals';

import { type JsonValue } from '@/types/extraction';
import { type DataType } from '@/types/specification';
import { inferDataType } from '@transform/type-inference';

describe('inferDataType', () => {
  it.each<[string, JsonValue, DataType]>([
    ['user_name', 'x', 'string'],
    ['order_count', 5, 'integer'],
    ['is_deleted', false, 'boolean'],
    ['updated_on', 'x', 'datetime'],
    ['unit_price', 9.5, 'decimal'],
    ['metadata', 'x', 'json'],
  ])('should infer %p from its key', (key, value, type) => {
    expect(inferDataType(key, value)).toBe(type);
  });

  it('should fall back to the value when the key says nothing', () => {
    expect(inferDataType('col1', 'varchar(255)')).toBe('string');
    expect(inferDataType('total', 'amount')).toBe('decimal');
  });

  it('should check earlier types first', () => {
    // 'id' (integer) is checked before 'created' (datetime)
    expect(inferDataType('created_by_id', 'x')).toBe('integer');
  });

  it('should default to string', () => {
    expect(inferDataType('x', 'y')).toBe('string');
  });
});
