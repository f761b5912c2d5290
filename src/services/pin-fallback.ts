import { AuditLogger } from './audit-logger';
import { fail, succeed, succeedEmpty } from './auth-result';
import { HashService } from './hash-service';
import { SecureStorageService, isRecord, stringOrNull } from './secure-storage-service';
import { CredentialRepository } from '../repositories/credential-repository';
import { AuthResult, BoundIdentity, PinRecord, PinStatus } from '../types';

export const PIN_RECORD_KEY = 'pin_record';

export interface PinFallbackOptions {
  maxAttempts: number;
  lockoutMs: number;
  minLength: number;
  maxLength: number;
}

function parsePinRecord(value: unknown): PinRecord | null {
  if (!isRecord(value) || typeof value.hash !== 'string' || typeof value.attempts !== 'number') {
    return null;
  }
  return { hash: value.hash, attempts: value.attempts, lockUntil: stringOrNull(value.lockUntil) };
}

/**
 * PIN factor with its own retry budget, independent of the biometric
 * counter. As with the biometric gate, callers must not start a second
 * `verify()` while one is pending.
 */
export class PinFallback {
  constructor(
    private readonly storage: SecureStorageService,
    private readonly credentials: CredentialRepository,
    private readonly hasher: HashService,
    private readonly options: PinFallbackOptions,
    private readonly logger: AuditLogger,
    private readonly now: () => number = Date.now
  ) {}

  async isEnabled(): Promise<boolean> {
    return (await this.readRecord()) !== null;
  }

  async isLocked(): Promise<boolean> {
    const record = await this.readRecord();
    return record?.lockUntil != null;
  }

  async remainingAttempts(): Promise<number> {
    const record = await this.readRecord();
    if (!record) return this.options.maxAttempts;
    return Math.max(0, this.options.maxAttempts - record.attempts);
  }

  /** Seconds until the lockout lifts; 0 when not locked. */
  async lockoutTimeRemaining(): Promise<number> {
    const record = await this.readRecord();
    return record?.lockUntil ? this.secondsUntil(record.lockUntil) : 0;
  }

  async getStatus(): Promise<PinStatus> {
    const record = await this.readRecord();
    return {
      isEnabled: record !== null,
      isLocked: record?.lockUntil != null,
      remainingAttempts: record ? Math.max(0, this.options.maxAttempts - record.attempts) : this.options.maxAttempts,
      lockoutTimeRemaining: record?.lockUntil ? this.secondsUntil(record.lockUntil) : 0
    };
  }

  async setupPin(pin: string): Promise<AuthResult> {
    const invalid = this.validatePinFormat(pin);
    if (invalid) {
      return fail(invalid, { kind: 'ValidationError' });
    }

    const hash = await this.hasher.hash(pin);
    const record: PinRecord = { hash, attempts: 0, lockUntil: null };
    await this.storage.setJson(PIN_RECORD_KEY, record);
    this.logger.logAuthenticationEvent({ event: 'pin_setup' });
    return succeedEmpty('PIN setup successful');
  }

  async verify(pin: string): Promise<AuthResult<BoundIdentity>> {
    const stored = await this.storage.getJson(PIN_RECORD_KEY, parsePinRecord);
    const record = stored && this.liftExpiredLock(stored);
    if (!stored || !record) {
      return fail('PIN authentication is not enabled. Please set up a PIN in settings.', {
        kind: 'NotConfigured',
        factor: 'pin'
      });
    }

    if (record.lockUntil) {
      return this.lockedOut<BoundIdentity>(record.lockUntil);
    }

    if (!pin) {
      return fail('Please enter a valid PIN', { kind: 'ValidationError' });
    }

    const matches = await this.hasher.verify(pin, record.hash);

    if (!matches) {
      const attempts = record.attempts + 1;
      if (attempts >= this.options.maxAttempts) {
        const lockUntil = new Date(this.now() + this.options.lockoutMs).toISOString();
        await this.storage.setJson(PIN_RECORD_KEY, { ...record, attempts, lockUntil });
        this.logger.logSecurityEvent({ event: 'pin_locked_out', attemptNumber: attempts, lockUntil });
        return this.lockedOut<BoundIdentity>(lockUntil);
      }

      await this.storage.setJson(PIN_RECORD_KEY, { ...record, attempts });
      this.logger.logSecurityEvent({ event: 'pin_failed', attemptNumber: attempts });
      const remaining = this.options.maxAttempts - attempts;
      return fail(`Incorrect PIN. ${remaining} attempts remaining`, {
        kind: 'InvalidCredentials',
        remainingAttempts: remaining
      });
    }

    if (stored.attempts > 0 || stored.lockUntil !== null) {
      await this.storage.setJson(PIN_RECORD_KEY, { ...record, attempts: 0, lockUntil: null });
    }

    // PIN unlocks the primary Credential Record, not the biometric binding
    const credentialRecord = await this.credentials.readAll();
    if (!credentialRecord.email || !credentialRecord.userId || !credentialRecord.name || !credentialRecord.accessToken) {
      return fail('User credentials not found. Please sign in with email and password first.', {
        kind: 'NotAuthenticated'
      });
    }

    this.logger.logAuthenticationEvent({ event: 'pin_success', userId: credentialRecord.userId });
    return succeed('PIN verification successful', {
      email: credentialRecord.email,
      token: credentialRecord.accessToken,
      userId: credentialRecord.userId,
      name: credentialRecord.name
    });
  }

  async changePin(currentPin: string, newPin: string): Promise<AuthResult> {
    const invalid = this.validatePinFormat(newPin);
    if (invalid) {
      return fail(invalid, { kind: 'ValidationError' });
    }

    const verified = await this.verifyPinOnly(currentPin);
    if (!verified.success) {
      return verified;
    }
    return this.setupPin(newPin);
  }

  async disablePin(currentPin: string): Promise<AuthResult> {
    const verified = await this.verifyPinOnly(currentPin);
    if (!verified.success) {
      return verified;
    }

    await this.storage.delete(PIN_RECORD_KEY);
    this.logger.logAuthenticationEvent({ event: 'pin_disabled' });
    return succeedEmpty('PIN disabled successfully');
  }

  /** Clears the PIN without asking for it. Only sign-up of a new identity may call this. */
  async resetForNewUser(): Promise<void> {
    await this.storage.delete(PIN_RECORD_KEY);
    this.logger.logAuthenticationEvent({ event: 'pin_reset_for_new_user' });
  }

  private async verifyPinOnly(pin: string): Promise<AuthResult> {
    const result = await this.verify(pin);
    if (result.success) {
      return succeedEmpty(result.message);
    }
    // A correct PIN without a stored session still proves knowledge of the PIN
    if (result.error.kind === 'NotAuthenticated') {
      return succeedEmpty('PIN verification successful');
    }
    return fail(result.message, result.error);
  }

  /**
   * Reads never write: an expired lock is lifted in the returned view only.
   * The stored record catches up on the next `verify()`.
   */
  private async readRecord(): Promise<PinRecord | null> {
    const record = await this.storage.getJson(PIN_RECORD_KEY, parsePinRecord);
    return record && this.liftExpiredLock(record);
  }

  private liftExpiredLock(record: PinRecord): PinRecord {
    if (record.lockUntil && this.now() >= Date.parse(record.lockUntil)) {
      return { ...record, attempts: 0, lockUntil: null };
    }
    return record;
  }

  private lockedOut<T>(lockUntil: string): AuthResult<T> {
    const retryAfterSeconds = this.secondsUntil(lockUntil);
    return fail<T>(`PIN is locked due to too many failed attempts. Try again in ${retryAfterSeconds}s`, {
      kind: 'LockedOut',
      factor: 'pin',
      remainingAttempts: 0,
      unlockAt: lockUntil,
      retryAfterSeconds,
      pinFallbackAvailable: false
    });
  }

  private secondsUntil(iso: string): number {
    return Math.max(0, Math.ceil((Date.parse(iso) - this.now()) / 1000));
  }

  private validatePinFormat(pin: string): string | null {
    if (!pin || !/^\d+$/.test(pin)) {
      return 'PIN must contain digits only';
    }
    if (pin.length < this.options.minLength) {
      return `PIN must be at least ${this.options.minLength} digits`;
    }
    if (pin.length > this.options.maxLength) {
      return `PIN must be no more than ${this.options.maxLength} digits`;
    }
    return null;
  }
}
