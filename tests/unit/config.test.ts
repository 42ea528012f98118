import { describe, it, expect } from 'vitest';
import {
  resolveConfig,
  DEFAULT_SESSION_TIMEOUT_SECONDS,
  DEFAULT_MAX_LOGIN_ATTEMPTS,
  DEFAULT_LOCKOUT_DURATION_SECONDS,
  DEFAULT_FAILURE_WINDOW_SECONDS,
} from '../../src/config.js';
import { isAccessControlError } from '../../src/errors.js';
import { ErrorCode } from '../../src/codes.js';

function errorOf(fn: () => unknown): unknown {
  try {
    fn();
  } catch (error) {
    return error;
  }
  throw new Error('expected a throw');
}

describe('resolveConfig', () => {
  it('applies defaults', () => {
    const config = resolveConfig({ salt: 'test-secret' });

    expect(config.sessionTimeoutMs).toBe(3_600_000);
    expect(config.maxLoginAttempts).toBe(3);
    expect(config.lockoutDurationMs).toBe(300_000);
    expect(config.failureWindowMs).toBe(900_000);
    expect(config.roleChangePolicy).toBe('retain-sessions');
    expect(config.customRoles).toEqual([]);
    expect(config.audit).toEqual({});
    expect(config.logger).toBeNull();
    expect(config.now).toBe(Date.now);
  });

  it('exposes the default values', () => {
    expect(DEFAULT_SESSION_TIMEOUT_SECONDS).toBe(3600);
    expect(DEFAULT_MAX_LOGIN_ATTEMPTS).toBe(3);
    expect(DEFAULT_LOCKOUT_DURATION_SECONDS).toBe(300);
    expect(DEFAULT_FAILURE_WINDOW_SECONDS).toBe(900);
  });

  it('converts seconds to milliseconds', () => {
    const config = resolveConfig({
      salt: 'test-secret',
      sessionTimeoutSeconds: 60,
      lockoutDurationSeconds: 10,
      failureWindowSeconds: 30,
    });

    expect(config.sessionTimeoutMs).toBe(60_000);
    expect(config.lockoutDurationMs).toBe(10_000);
    expect(config.failureWindowMs).toBe(30_000);
  });

  it('keeps the injected clock', () => {
    const now = (): number => 7;
    expect(resolveConfig({ salt: 'test-secret', now }).now).toBe(now);
  });

  it('rejects an empty salt', () => {
    const error = errorOf(() => resolveConfig({ salt: '' }));

    expect(isAccessControlError(error, ErrorCode.VALIDATION_ERROR)).toBe(true);
    if (isAccessControlError(error)) {
      expect(error.message).toBe('Invalid access-control configuration: salt: salt must not be empty');
    }
  });

  it('rejects more than 10 login attempts', () => {
    const error = errorOf(() => resolveConfig({ salt: 'test-secret', maxLoginAttempts: 11 }));
    expect(isAccessControlError(error, ErrorCode.VALIDATION_ERROR)).toBe(true);
  });

  it('rejects zero login attempts', () => {
    const error = errorOf(() => resolveConfig({ salt: 'test-secret', maxLoginAttempts: 0 }));
    expect(isAccessControlError(error, ErrorCode.VALIDATION_ERROR)).toBe(true);
  });

  it('rejects a non-positive session timeout', () => {
    const error = errorOf(() => resolveConfig({ salt: 'test-secret', sessionTimeoutSeconds: 0 }));
    expect(isAccessControlError(error, ErrorCode.VALIDATION_ERROR)).toBe(true);
  });
});
