import { createLogger } from '@stockroom/config';
import type { RequisitionStore, UserRow } from '@stockroom/db';
import { generateAccessToken, verifyPassword } from '@stockroom/auth-utils';
import type { UserRole } from '@stockroom/shared-types';
import { AppError } from '../middleware/error-handler.js';

const log = createLogger('auth');

export interface PublicUser {
  id: string;
  username: string;
  fullName: string;
  role: UserRole;
  createdAt: Date;
  updatedAt: Date;
}

export interface LoginResult {
  accessToken: string;
  user: PublicUser;
}

/** Everything about a user except the password hash. */
export function toPublicUser(user: UserRow): PublicUser {
  return {
    id: user.id,
    username: user.username,
    fullName: user.fullName,
    role: user.role,
    createdAt: user.createdAt,
    updatedAt: user.updatedAt,
  };
}

export async function login(
  store: RequisitionStore,
  credentials: { username: string; password: string },
): Promise<LoginResult> {
  const user = await store.findUserByUsername(credentials.username);
  const valid = user ? await verifyPassword(user.passwordHash, credentials.password) : false;

  if (!user || !valid) {
    log.info({ username: credentials.username }, 'Login failed');
    throw new AppError(401, 'Invalid username or password', 'UNAUTHORIZED');
  }

  return {
    accessToken: generateAccessToken({ sub: user.id, username: user.username, role: user.role }),
    user: toPublicUser(user),
  };
}

export async function getCurrentUser(store: RequisitionStore, userId: string): Promise<PublicUser> {
  const user = await store.findUser(userId);
  if (!user) throw new AppError(401, 'User no longer exists', 'UNAUTHORIZED');
  return toPublicUser(user);
}
