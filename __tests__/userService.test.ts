/**
 * User Service Tests
 *
 * Sign-up inserts against a stubbed query(), including the unique-index
 * violation a concurrent sign-up produces.
 */

import { describe, it, expect, beforeEach, vi } from 'vitest';
import { query } from '../src/config/db';
import { UserService } from '../src/services/UserService';

vi.mock('../src/config/db', async (importOriginal) => ({
  ...(await importOriginal<typeof import('../src/config/db')>()),
  query: vi.fn(),
}));

const input = {
  username: 'newbie',
  email: 'New@Example.com',
  password: 'long-enough',
  role: 'buyer' as const,
};

const uniqueViolation = () =>
  Object.assign(
    new Error('duplicate key value violates unique constraint "users_username_lower_idx"'),
    { code: '23505' }
  );

describe('UserService', () => {
  const users = new UserService();

  beforeEach(() => {
    vi.mocked(query).mockReset();
  });

  describe('create()', () => {
    it('should store a lowercased email and a bcrypt hash', async () => {
      const created = { id: 12, username: 'newbie', email: 'new@example.com', role: 'buyer', is_active: true };
      vi.mocked(query).mockResolvedValueOnce({
        rows: [created],
        rowCount: 1,
        command: 'INSERT',
        oid: 0,
        fields: [],
      });

      expect(await users.create(input)).toEqual(created);

      const [, values] = vi.mocked(query).mock.calls[0];
      expect(values?.slice(0, 2)).toEqual(['newbie', 'new@example.com']);
      expect(values?.[2]).toMatch(/^\$2[aby]\$10\$/);
      expect(values?.[3]).toBe('buyer');
    });

    it('should return null when the unique index rejects the insert', async () => {
      vi.mocked(query).mockRejectedValueOnce(uniqueViolation());
      expect(await users.create(input)).toBeNull();
    });

    it('should rethrow other database errors', async () => {
      vi.mocked(query).mockRejectedValueOnce(
        Object.assign(new Error('connection terminated'), { code: '57P01' })
      );
      await expect(users.create(input)).rejects.toThrow('connection terminated');
    });
  });
});
