import { loadAuthConfig, validateAuthConfig } from '../src/config/auth-config';
import { testConfig } from './helpers/test-config';

describe('Authentication Configuration', () => {
  it('should apply defaults when nothing is set', () => {
    const config = loadAuthConfig({});

    expect(config.biometric).toEqual({ maxAttempts: 3, resetWindowMs: 86400000, promptTimeoutMs: 3000 });
    expect(config.pin).toEqual({ maxAttempts: 5, lockoutMs: 300000, minLength: 4, maxLength: 8 });
    expect(config.passwordMinLength).toBe(8);
    expect(config.hashSaltRounds).toBe(12);
    expect(config.api).toEqual({
      baseUrls: ['http://localhost:5000'],
      timeoutMs: 10000,
      probeTimeoutMs: 2000,
      endpointCacheMs: 300000
    });
    expect(config.jwt.expiresInSeconds).toBe(3600);
    expect(config.jwt.refreshExpiresInSeconds).toBe(604800);
    expect(config.logLevel).toBe('info');
  });

  it('should read overrides from the environment', () => {
    const config = loadAuthConfig({
      BIOMETRIC_PROMPT_TIMEOUT_MS: '8000',
      PIN_LOCKOUT_MINUTES: '15',
      API_BASE_URLS: 'https://primary.test/, https://backup.test',
      LOG_LEVEL: 'WARN'
    });

    expect(config.biometric.promptTimeoutMs).toBe(8000);
    expect(config.pin.lockoutMs).toBe(900000);
    expect(config.api.baseUrls).toEqual(['https://primary.test', 'https://backup.test']);
    expect(config.logLevel).toBe('warn');
  });

  it('should reject non-numeric values', () => {
    expect(() => loadAuthConfig({ PIN_MAX_ATTEMPTS: 'five' })).toThrow(
      'Invalid authentication configuration: PIN_MAX_ATTEMPTS must be an integer'
    );
  });

  it('should reject an unknown log level', () => {
    expect(() => loadAuthConfig({ LOG_LEVEL: 'loud' })).toThrow(
      'Invalid authentication configuration: unknown LOG_LEVEL "loud"'
    );
  });

  it('should reject attempt limits that defeat the lockout', () => {
    expect(() => loadAuthConfig({ BIOMETRIC_MAX_ATTEMPTS: '1000' })).toThrow('Configuration values are not secure');
  });

  it('should require a JWT secret in production', () => {
    expect(() => loadAuthConfig({ NODE_ENV: 'production' })).toThrow(
      'JWT_SECRET environment variable is required in production'
    );
  });

  it('should enforce a minimum secret length in production', () => {
    expect(() => loadAuthConfig({ NODE_ENV: 'production', JWT_SECRET: 'short' })).toThrow(
      'JWT secret must be at least 32 characters long'
    );
  });

  it('should reject inconsistent PIN bounds', () => {
    const config = testConfig({ pin: { maxAttempts: 5, lockoutMs: 1000, minLength: 6, maxLength: 4 } });

    expect(() => validateAuthConfig(config)).toThrow(
      'Invalid authentication configuration: PIN length bounds are inconsistent'
    );
  });
});
