import argon2 from 'argon2';

/** Hash a password using argon2id. */
export async function hashPassword(password: string): Promise<string> {
  return argon2.hash(password, {
    type: argon2.argon2id,
    memoryCost: 19456, // 19 MiB
    timeCost: 2,
    parallelism: 1,
  });
}

/**
 * Check a password against a stored hash. A malformed hash counts as a
 * mismatch rather than an error.
 */
export async function verifyPassword(hash: string, password: string): Promise<boolean> {
  if (!hash.startsWith('$argon2')) return false;
  return argon2.verify(hash, password);
}
