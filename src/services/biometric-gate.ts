import { AttemptCounterStore } from './attempt-counter';
import { AuditLogger } from './audit-logger';
import { fail, succeed, succeedEmpty } from './auth-result';
import { SecureStorageService, isRecord } from './secure-storage-service';
import {
  AttemptCounterState,
  AuthResult,
  BiometricBinding,
  BiometricPlatform,
  BiometricStatus,
  BiometricType,
  BoundIdentity
} from '../types';

export const BIOMETRIC_BINDING_KEY = 'biometric_binding';
export const BIOMETRIC_ATTEMPTS_KEY = 'biometric_attempts';

export interface BiometricGateOptions {
  maxAttempts: number;
  resetWindowMs: number;
  promptTimeoutMs: number;
}

/** Answers whether a PIN is configured, so a lockout can point at it. */
export interface PinAvailability {
  isEnabled(): Promise<boolean>;
}

const TYPE_NAMES: Record<BiometricType, string> = {
  fingerprint: 'Fingerprint',
  face: 'Face Recognition',
  iris: 'Iris',
  strong: 'Strong Biometric',
  weak: 'Weak Biometric'
};

function parseBinding(value: unknown): BiometricBinding | null {
  if (!isRecord(value)) return null;
  const { enabled, email, token, userId, name } = value;
  if (typeof email !== 'string' || typeof token !== 'string' || typeof userId !== 'string' || typeof name !== 'string') {
    return null;
  }
  return { enabled: enabled === true, email, token, userId, name };
}

/**
 * Biometric shortcut sign-in. A successful prompt re-presents the identity
 * bound at enable time; it is not a separate trust root.
 *
 * Callers are expected to keep the prompt trigger disabled while
 * `authenticate()` is pending. A second concurrent call is not prompted
 * again: it receives the result of the call already in flight.
 */
export class BiometricGate {
  private readonly attempts: AttemptCounterStore;
  private inFlight: Promise<AuthResult<BoundIdentity>> | null = null;

  constructor(
    private readonly storage: SecureStorageService,
    private readonly platform: BiometricPlatform,
    private readonly pinAvailability: PinAvailability,
    private readonly options: BiometricGateOptions,
    private readonly logger: AuditLogger,
    private readonly now: () => number = Date.now
  ) {
    this.attempts = new AttemptCounterStore(storage, BIOMETRIC_ATTEMPTS_KEY, options.resetWindowMs, now);
  }

  async isAvailable(): Promise<boolean> {
    try {
      const [canCheck, supported] = await Promise.all([
        this.platform.canCheckBiometrics(),
        this.platform.isDeviceSupported()
      ]);
      if (!canCheck || !supported) {
        return false;
      }
      const enrolled = await this.platform.availableBiometricTypes();
      return enrolled.size > 0;
    } catch (error) {
      this.logger.logError({ event: 'biometric_availability_check_failed' }, error);
      return false;
    }
  }

  async isEnabled(): Promise<boolean> {
    const binding = await this.readBinding();
    return binding?.enabled ?? false;
  }

  async enable(email: string, token: string, userId: string, name: string): Promise<AuthResult> {
    if (!email || !token || !userId || !name) {
      return fail('Email, token, user id and name are required to enable biometric sign-in', {
        kind: 'ValidationError'
      });
    }

    if (!(await this.isAvailable())) {
      return fail('Biometric authentication is not available on this device', {
        kind: 'NotConfigured',
        factor: 'biometric'
      });
    }

    const existing = await this.readBinding();
    if (
      existing?.enabled &&
      existing.email === email &&
      existing.token === token &&
      existing.userId === userId &&
      existing.name === name
    ) {
      return succeedEmpty('Biometric sign-in is already enabled');
    }

    const binding: BiometricBinding = { enabled: true, email, token, userId, name };
    await this.storage.setJson(BIOMETRIC_BINDING_KEY, binding);
    this.logger.logAuthenticationEvent({ event: 'biometric_enabled', userId });
    return succeedEmpty('Biometric sign-in enabled');
  }

  async disable(): Promise<AuthResult> {
    await this.storage.delete(BIOMETRIC_BINDING_KEY);
    this.logger.logAuthenticationEvent({ event: 'biometric_disabled' });
    return succeedEmpty('Biometric sign-in disabled');
  }

  authenticate(reason = 'Use biometric to sign in securely'): Promise<AuthResult<BoundIdentity>> {
    if (this.inFlight) {
      return this.inFlight;
    }
    this.inFlight = this.runAuthentication(reason).finally(() => {
      this.inFlight = null;
    });
    return this.inFlight;
  }

  async getAvailableTypes(): Promise<BiometricType[]> {
    try {
      return [...(await this.platform.availableBiometricTypes())];
    } catch (error) {
      this.logger.logError({ event: 'biometric_types_query_failed' }, error);
      return [];
    }
  }

  async getPrimaryTypeName(): Promise<string> {
    const types = await this.getAvailableTypes();
    if (types.includes('fingerprint')) return TYPE_NAMES.fingerprint;
    if (types.includes('face')) return TYPE_NAMES.face;
    return types.length > 0 ? TYPE_NAMES[types[0]] : 'Biometric';
  }

  async getStatus(): Promise<BiometricStatus> {
    const [available, enabled, counter] = await Promise.all([
      this.isAvailable(),
      this.isEnabled(),
      this.attempts.read()
    ]);
    return {
      available,
      enabled,
      attempts: counter.count,
      remainingAttempts: Math.max(0, this.options.maxAttempts - counter.count),
      resetAt: counter.resetAt
    };
  }

  private async runAuthentication(reason: string): Promise<AuthResult<BoundIdentity>> {
    const binding = await this.readBinding();
    if (!binding || !binding.enabled) {
      return fail('Biometric authentication is not enabled', { kind: 'NotConfigured', factor: 'biometric' });
    }

    const counter = await this.attempts.read();
    if (counter.count >= this.options.maxAttempts) {
      return this.lockedOut(counter);
    }

    if (!(await this.isAvailable())) {
      return fail('Biometric authentication is not available on this device', {
        kind: 'NotConfigured',
        factor: 'biometric'
      });
    }

    const passed = await this.prompt(reason);

    if (passed) {
      await this.attempts.reset();
      this.logger.logAuthenticationEvent({ event: 'biometric_success', userId: binding.userId });
      return succeed('Authentication successful', {
        email: binding.email,
        token: binding.token,
        userId: binding.userId,
        name: binding.name
      });
    }

    const next = await this.attempts.increment();
    this.logger.logSecurityEvent({
      event: 'biometric_failed',
      userId: binding.userId,
      attemptNumber: next.count
    });

    if (next.count >= this.options.maxAttempts) {
      return this.lockedOut(next);
    }

    const remaining = this.options.maxAttempts - next.count;
    return fail(`Biometric authentication failed. ${remaining} attempt(s) remaining`, {
      kind: 'InvalidCredentials',
      remainingAttempts: remaining
    });
  }

  /** One platform prompt, resolved as a failure once the timeout elapses. */
  private async prompt(reason: string): Promise<boolean> {
    let timer: NodeJS.Timeout | undefined;
    const timeout = new Promise<'timeout'>(resolve => {
      timer = setTimeout(() => resolve('timeout'), this.options.promptTimeoutMs);
    });

    try {
      const outcome = await Promise.race([
        this.platform.authenticate(reason, { biometricOnly: true, stickyAuth: true }),
        timeout
      ]);
      if (outcome === 'timeout') {
        this.logger.logSecurityEvent({ event: 'biometric_prompt_timeout', timeoutMs: this.options.promptTimeoutMs });
        await this.stopPrompt();
        return false;
      }
      return outcome;
    } catch (error) {
      this.logger.logError({ event: 'biometric_prompt_error' }, error);
      return false;
    } finally {
      clearTimeout(timer);
    }
  }

  private async stopPrompt(): Promise<void> {
    try {
      await this.platform.stopAuthentication();
    } catch (error) {
      this.logger.logError({ event: 'biometric_prompt_stop_failed' }, error);
    }
  }

  private async lockedOut(counter: AttemptCounterState): Promise<AuthResult<BoundIdentity>> {
    const pinFallbackAvailable = await this.pinAvailability.isEnabled();
    const retryAfterSeconds = counter.resetAt
      ? Math.max(0, Math.ceil((Date.parse(counter.resetAt) - this.now()) / 1000))
      : 0;

    this.logger.logSecurityEvent({ event: 'biometric_locked_out', pinFallbackAvailable });

    const message = pinFallbackAvailable
      ? 'Too many failed biometric attempts. Please use your PIN to continue.'
      : 'Too many failed biometric attempts. Please sign in with your email and password.';

    return fail(message, {
      kind: 'LockedOut',
      factor: 'biometric',
      remainingAttempts: 0,
      unlockAt: counter.resetAt,
      retryAfterSeconds,
      pinFallbackAvailable
    });
  }

  private readBinding(): Promise<BiometricBinding | null> {
    return this.storage.getJson(BIOMETRIC_BINDING_KEY, parseBinding);
  }
}
