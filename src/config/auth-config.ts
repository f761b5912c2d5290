export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

export interface AuthConfig {
  biometric: {
    maxAttempts: number;
    resetWindowMs: number;
    promptTimeoutMs: number;
  };
  pin: {
    maxAttempts: number;
    lockoutMs: number;
    minLength: number;
    maxLength: number;
  };
  passwordMinLength: number;
  hashSaltRounds: number;
  api: {
    baseUrls: string[];
    timeoutMs: number;
    probeTimeoutMs: number;
    endpointCacheMs: number;
  };
  jwt: {
    secret: string;
    expiresInSeconds: number;
    refreshExpiresInSeconds: number;
  };
  logLevel: LogLevel;
}

const LOG_LEVELS: readonly LogLevel[] = ['debug', 'info', 'warn', 'error', 'silent'];
const DEV_JWT_SECRET = 'development-only-secret-change-me-now';

function readInt(env: NodeJS.ProcessEnv, name: string, fallback: number): number {
  const raw = env[name];
  if (raw === undefined || raw.trim() === '') {
    return fallback;
  }
  const value = parseInt(raw, 10);
  if (Number.isNaN(value)) {
    throw new Error(`Invalid authentication configuration: ${name} must be an integer`);
  }
  return value;
}

function readLogLevel(env: NodeJS.ProcessEnv): LogLevel {
  const raw = (env.LOG_LEVEL || 'info').toLowerCase();
  const level = LOG_LEVELS.find(candidate => candidate === raw);
  if (!level) {
    throw new Error(`Invalid authentication configuration: unknown LOG_LEVEL "${raw}"`);
  }
  return level;
}

export function loadAuthConfig(env: NodeJS.ProcessEnv = process.env): AuthConfig {
  if (!env.JWT_SECRET && env.NODE_ENV === 'production') {
    throw new Error('JWT_SECRET environment variable is required in production');
  }

  const config: AuthConfig = {
    biometric: {
      maxAttempts: readInt(env, 'BIOMETRIC_MAX_ATTEMPTS', 3),
      resetWindowMs: readInt(env, 'BIOMETRIC_RESET_WINDOW_HOURS', 24) * 60 * 60 * 1000,
      promptTimeoutMs: readInt(env, 'BIOMETRIC_PROMPT_TIMEOUT_MS', 3000)
    },
    pin: {
      maxAttempts: readInt(env, 'PIN_MAX_ATTEMPTS', 5),
      lockoutMs: readInt(env, 'PIN_LOCKOUT_MINUTES', 5) * 60 * 1000,
      minLength: readInt(env, 'PIN_MIN_LENGTH', 4),
      maxLength: readInt(env, 'PIN_MAX_LENGTH', 8)
    },
    passwordMinLength: readInt(env, 'PASSWORD_MIN_LENGTH', 8),
    hashSaltRounds: readInt(env, 'HASH_SALT_ROUNDS', 12),
    api: {
      baseUrls: (env.API_BASE_URLS || 'http://localhost:5000')
        .split(',')
        .map(url => url.trim().replace(/\/+$/, ''))
        .filter(url => url.length > 0),
      timeoutMs: readInt(env, 'API_TIMEOUT_MS', 10000),
      probeTimeoutMs: readInt(env, 'API_PROBE_TIMEOUT_MS', 2000),
      endpointCacheMs: readInt(env, 'API_ENDPOINT_CACHE_MINUTES', 5) * 60 * 1000
    },
    jwt: {
      secret: env.JWT_SECRET || DEV_JWT_SECRET,
      expiresInSeconds: readInt(env, 'JWT_EXPIRES_IN_SECONDS', 60 * 60),
      refreshExpiresInSeconds: readInt(env, 'JWT_REFRESH_EXPIRES_IN_SECONDS', 7 * 24 * 60 * 60)
    },
    logLevel: readLogLevel(env)
  };

  validateAuthConfig(config, env.NODE_ENV === 'production');
  return config;
}

export function validateAuthConfig(config: AuthConfig, production = false): void {
  if (config.biometric.maxAttempts < 1 || config.pin.maxAttempts < 1) {
    throw new Error('Invalid authentication configuration: attempt limits must be at least 1');
  }
  if (config.biometric.maxAttempts > 100 || config.pin.maxAttempts > 100) {
    throw new Error('Configuration values are not secure');
  }
  if (config.biometric.resetWindowMs <= 0 || config.pin.lockoutMs <= 0) {
    throw new Error('Invalid authentication configuration: windows must be positive');
  }
  if (config.biometric.promptTimeoutMs <= 0) {
    throw new Error('Invalid authentication configuration: prompt timeout must be positive');
  }
  if (config.pin.minLength < 4 || config.pin.maxLength < config.pin.minLength) {
    throw new Error('Invalid authentication configuration: PIN length bounds are inconsistent');
  }
  if (config.hashSaltRounds < 4 || config.hashSaltRounds > 31) {
    throw new Error('Invalid authentication configuration: HASH_SALT_ROUNDS must be between 4 and 31');
  }
  if (config.api.baseUrls.length === 0) {
    throw new Error('Invalid authentication configuration: API_BASE_URLS is empty');
  }
  if (production && config.jwt.secret.length < 32) {
    throw new Error('JWT secret must be at least 32 characters long');
  }
}
