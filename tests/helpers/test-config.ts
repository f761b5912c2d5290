import { AuthConfig } from '../../src/config/auth-config';
import { HOUR, MINUTE } from './fake-clock';

export function testConfig(overrides: Partial<AuthConfig> = {}): AuthConfig {
  return {
    biometric: { maxAttempts: 3, resetWindowMs: 24 * HOUR, promptTimeoutMs: 50 },
    pin: { maxAttempts: 5, lockoutMs: 5 * MINUTE, minLength: 4, maxLength: 8 },
    passwordMinLength: 8,
    hashSaltRounds: 4,
    api: {
      baseUrls: ['http://auth.test'],
      timeoutMs: 1000,
      probeTimeoutMs: 200,
      endpointCacheMs: 5 * MINUTE
    },
    jwt: { secret: 'test-secret', expiresInSeconds: 3600, refreshExpiresInSeconds: 604800 },
    logLevel: 'silent',
    ...overrides
  };
}
