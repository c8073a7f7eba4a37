import { describe, it, expect } from 'vitest';
import { hashPassword, verifyPassword } from './password.js';

describe('password hashing', () => {
  it('verifies the original password and rejects another', async () => {
    const hash = await hashPassword('test-password');

    expect(hash.startsWith('$argon2id$')).toBe(true);
    await expect(verifyPassword(hash, 'test-password')).resolves.toBe(true);
    await expect(verifyPassword(hash, 'wrong-password')).resolves.toBe(false);
  });

  it('treats a non-argon2 hash as a mismatch', async () => {
    await expect(verifyPassword('plain-text', 'plain-text')).resolves.toBe(false);
  });
});
