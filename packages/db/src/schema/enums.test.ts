import { describe, it, expect } from 'vitest';
import { getTableConfig } from 'drizzle-orm/pg-core';
import { REQUISITION_STATUSES, USER_ROLES } from '@stockroom/shared-types';
import { requisitionStatusEnum, requisitions } from './requisitions.js';
import { userRoleEnum, users } from './users.js';

describe('schema enums', () => {
  it('should live in the same pg schema as the table that uses them', () => {
    expect(requisitionStatusEnum.schema).toBe('requisitions');
    expect(getTableConfig(requisitions).schema).toBe('requisitions');
    expect(userRoleEnum.schema).toBe('auth');
    expect(getTableConfig(users).schema).toBe('auth');
  });

  it('should carry every status and role', () => {
    expect(requisitionStatusEnum.enumValues).toEqual([...REQUISITION_STATUSES]);
    expect(userRoleEnum.enumValues).toEqual([...USER_ROLES]);
  });
});
