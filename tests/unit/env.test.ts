import { describe, it, expect } from 'vitest';
import { loadEnvConfig } from '../../src/env.js';
import { isAccessControlError } from '../../src/errors.js';
import { ErrorCode } from '../../src/codes.js';

describe('loadEnvConfig', () => {
  it('reads only the salt when nothing else is set', () => {
    expect(loadEnvConfig({ AUTH_SALT: 'test-secret' })).toEqual({ salt: 'test-secret' });
  });

  it('coerces numeric settings', () => {
    const settings = loadEnvConfig({
      AUTH_SALT: 'test-secret',
      SESSION_TIMEOUT_SECONDS: '1800',
      MAX_LOGIN_ATTEMPTS: '5',
      LOCKOUT_DURATION_SECONDS: '600',
      FAILURE_WINDOW_SECONDS: '120',
      ROLE_CHANGE_POLICY: 'revoke-sessions',
    });

    expect(settings).toEqual({
      salt: 'test-secret',
      sessionTimeoutSeconds: 1800,
      maxLoginAttempts: 5,
      lockoutDurationSeconds: 600,
      failureWindowSeconds: 120,
      roleChangePolicy: 'revoke-sessions',
    });
  });

  it('requires AUTH_SALT', () => {
    try {
      loadEnvConfig({});
      expect.unreachable('loadEnvConfig should throw');
    } catch (error) {
      expect(isAccessControlError(error, ErrorCode.VALIDATION_ERROR)).toBe(true);
      if (isAccessControlError(error)) {
        expect(error.message.startsWith('Invalid environment variables: AUTH_SALT:')).toBe(true);
      }
    }
  });

  it('rejects an unknown role change policy', () => {
    expect(() =>
      loadEnvConfig({ AUTH_SALT: 'test-secret', ROLE_CHANGE_POLICY: 'sometimes' }),
    ).toThrow(/ROLE_CHANGE_POLICY/);
  });

  it('rejects non-numeric values', () => {
    expect(() => loadEnvConfig({ AUTH_SALT: 'test-secret', MAX_LOGIN_ATTEMPTS: 'three' })).toThrow(
      /MAX_LOGIN_ATTEMPTS/,
    );
  });
});
