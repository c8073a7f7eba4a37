import { describe, it, expect } from 'vitest';
import { config, corsOrigins, durationToSeconds, jwtExpirySeconds } from './index.js';

describe('durationToSeconds', () => {
  it('should convert each unit', () => {
    expect(durationToSeconds('45s')).toBe(45);
    expect(durationToSeconds('15m')).toBe(900);
    expect(durationToSeconds('8h')).toBe(28800);
    expect(durationToSeconds('1d')).toBe(86400);
  });

  it('should reject unknown units and missing amounts', () => {
    expect(() => durationToSeconds('8w')).toThrow('Invalid duration "8w"');
    expect(() => durationToSeconds('h')).toThrow('Invalid duration "h"');
  });
});

describe('config', () => {
  it('should apply defaults for unset variables', () => {
    expect(config.JWT_EXPIRY).toBe('8h');
    expect(jwtExpirySeconds).toBe(28800);
    expect(config.REQUISITION_CODE_MAX_ATTEMPTS).toBe(5);
    expect(config.HISTORY_MAX_LIMIT).toBe(500);
  });

  it('should allow the app URL through CORS', () => {
    expect(corsOrigins[0]).toBe(config.APP_URL);
  });
});
