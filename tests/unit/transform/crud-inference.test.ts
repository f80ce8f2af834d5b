/**
 * Unit tests for CRUD inference
 */

import { describe, expect, it } from '@jest/globals';

import { inferCrudOperations } from '@transform/crud-inference';

describe('inferCrudOperations', () => {
  it('should return UNKNOWN for empty source', () => {
    expect(inferCrudOperations('', 'users')).toBe('UNKNOWN');
    expect(inferCrudOperations('  \n ', 'users')).toBe('UNKNOWN');
  });

  it('should default to READ when nothing matches', () => {
    expect(inferCrudOperations('const x = 1;', 'users')).toBe('READ');
  });

  it('should find SQL operations and sort them', () => {
    const source = 'INSERT INTO users (id) VALUES (1); SELECT * FROM users';

    expect(inferCrudOperations(source, 'users')).toBe('CREATE,READ');
  });

  it('should accept schema prefixes and quoted names', () => {
    const source = 'UPDATE public.users SET name = ?; DELETE FROM `users` WHERE id = ?';

    expect(inferCrudOperations(source, 'users')).toBe('DELETE,UPDATE');
  });

  it('should ignore statements on other tables', () => {
    expect(inferCrudOperations('INSERT INTO orders (id) VALUES (1)', 'users')).toBe('READ');
  });

  it('should recognize ORM calls on the table', () => {
    expect(inferCrudOperations('usersRepository.findAll(); users.destroy(1);', 'users')).toBe('DELETE');
    expect(inferCrudOperations('Orders.save(order); orders.findById(id)', 'orders')).toBe('CREATE,READ');
  });
});
