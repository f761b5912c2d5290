import validator from 'validator';
import { AuditLogger } from './audit-logger';
import { fail, storageFailure, succeed, succeedEmpty } from './auth-result';
import { isDuplicateAccount, isTransportFailure, parseBackendTokens, parseBackendUser } from './backend-response';
import { BiometricGate } from './biometric-gate';
import { DeviceIdentityService } from './device-identity-service';
import { PinFallback } from './pin-fallback';
import { SecureStorageService, isStorageError } from './secure-storage-service';
import { SessionStateMachine } from './session-state';
import { CredentialRepository } from '../repositories/credential-repository';
import { LockoutStateRepository } from '../repositories/lockout-state-repository';
import {
  AuthResult,
  AuthenticationStatus,
  BackendResponse,
  BoundIdentity,
  IdentityBackend,
  SessionState,
  TokenPair,
  UserProfile
} from '../types';

export interface AuthOrchestratorDeps {
  storage: SecureStorageService;
  credentials: CredentialRepository;
  lockoutState: LockoutStateRepository;
  biometricGate: BiometricGate;
  pinFallback: PinFallback;
  backend: IdentityBackend;
  deviceIdentity: DeviceIdentityService;
  session: SessionStateMachine;
  logger: AuditLogger;
  passwordMinLength: number;
}

const CONNECTIVITY_MESSAGE = 'Unable to reach the authentication server. Please check your connection and try again.';

// Some backends omit fields the client already knows
function withDefaults(
  data: Record<string, unknown> | null,
  defaults: Record<string, string>
): Record<string, unknown> | null {
  return data ? { ...defaults, ...data } : null;
}

function toProfile(identity: BoundIdentity): UserProfile {
  return { userId: identity.userId, name: identity.name, email: identity.email };
}

/**
 * Single entry point for every sign-in path. Talks to one IdentityBackend
 * and never needs to know which implementation it is.
 *
 * Vault faults are caught here and reported as a `StorageError` result; the
 * session is never treated as authenticated when the vault cannot be read.
 */
export class AuthenticationOrchestrator {
  constructor(private readonly deps: AuthOrchestratorDeps) {}

  getSessionState(): SessionState {
    return this.deps.session.state;
  }

  async signIn(email: string, password: string): Promise<AuthResult<UserProfile>> {
    if (!email || !password) {
      return fail('Please enter both email and password', { kind: 'ValidationError' });
    }

    return this.guard('sign_in', async () => {
      const { backend, credentials, session, logger } = this.deps;

      if (!(await backend.isReachable())) {
        logger.logSecurityEvent({ event: 'sign_in_backend_unreachable', backend: backend.name });
        return fail<UserProfile>(CONNECTIVITY_MESSAGE, { kind: 'ConnectivityError' });
      }

      const response = await backend.login(email.trim(), password);
      if (isTransportFailure(response)) {
        return fail<UserProfile>(response.message, { kind: 'ConnectivityError' });
      }

      const user = parseBackendUser(withDefaults(response.data, { email: email.trim() }));
      const tokens = parseBackendTokens(response.data);
      if (!response.success || !user || !tokens) {
        logger.logSecurityEvent({ event: 'sign_in_failed', email: email.trim(), statusCode: response.statusCode });
        return fail<UserProfile>('Invalid email or password', { kind: 'InvalidCredentials' });
      }

      await credentials.storeCredentials({
        email: user.email,
        password,
        name: user.name,
        userId: user.userId,
        accessToken: tokens.accessToken,
        refreshToken: tokens.refreshToken
      });
      session.authenticate();

      logger.logAuthenticationEvent({ event: 'sign_in_success', userId: user.userId, backend: backend.name });
      return succeed('Sign in successful', user);
    });
  }

  async signUp(email: string, password: string, name: string): Promise<AuthResult<UserProfile>> {
    if (!email || !password || !name) {
      return fail('Please fill in all fields', { kind: 'ValidationError' });
    }
    if (!validator.isEmail(email.trim())) {
      return fail('Please enter a valid email address', { kind: 'ValidationError' });
    }
    if (password.length < this.deps.passwordMinLength) {
      return fail(`Password must be at least ${this.deps.passwordMinLength} characters`, { kind: 'ValidationError' });
    }

    return this.guard('sign_up', async () => {
      const { backend, credentials, biometricGate, pinFallback, session, logger } = this.deps;

      if (!(await backend.isReachable())) {
        return fail<UserProfile>(CONNECTIVITY_MESSAGE, { kind: 'ConnectivityError' });
      }

      const response = await backend.register(name.trim(), email.trim(), password);
      if (isTransportFailure(response)) {
        return fail<UserProfile>(response.message, { kind: 'ConnectivityError' });
      }
      if (!response.success && isDuplicateAccount(response)) {
        return fail<UserProfile>('An account with this email already exists', { kind: 'InvalidCredentials' });
      }

      const user = parseBackendUser(withDefaults(response.data, { email: email.trim(), name: name.trim() }));
      const tokens = parseBackendTokens(response.data);
      if (!response.success || !user || !tokens) {
        return fail<UserProfile>(response.message || 'Registration failed', { kind: 'InvalidCredentials' });
      }

      // A new identity must not inherit the previous occupant's shortcuts
      await biometricGate.disable();
      await pinFallback.resetForNewUser();

      await credentials.storeCredentials({
        email: user.email,
        password,
        name: user.name,
        userId: user.userId,
        accessToken: tokens.accessToken,
        refreshToken: tokens.refreshToken
      });
      session.authenticate();

      logger.logAuthenticationEvent({ event: 'sign_up_success', userId: user.userId, backend: backend.name });
      return succeed('Account created successfully', user);
    });
  }

  /**
   * Clears the session. The biometric binding is kept for the next sign-in.
   * The record is marked signed out before it is deleted, so a failed delete
   * cannot bring the session back on the next start.
   */
  async signOut(): Promise<AuthResult> {
    this.deps.session.signOut();
    return this.guard('sign_out', async () => {
      await this.deps.credentials.markSignedOut();
      await this.deps.credentials.clear();
      await this.deps.lockoutState.clear();
      this.deps.logger.logAuthenticationEvent({ event: 'sign_out' });
      return succeedEmpty('Signed out successfully');
    });
  }

  async signInWithBiometric(reason?: string): Promise<AuthResult<UserProfile>> {
    return this.guard('biometric_sign_in', async () => {
      const result = await this.deps.biometricGate.authenticate(reason);
      if (!result.success) {
        return fail<UserProfile>(result.message, result.error);
      }
      return this.adopt(result.message, result.data);
    });
  }

  async signInWithPin(pin: string): Promise<AuthResult<UserProfile>> {
    return this.guard('pin_sign_in', async () => {
      const result = await this.deps.pinFallback.verify(pin);
      if (!result.success) {
        return fail<UserProfile>(result.message, result.error);
      }
      return this.adopt(result.message, result.data);
    });
  }

  async refreshToken(): Promise<AuthResult<TokenPair>> {
    return this.guard('token_refresh', async () => {
      const { backend, credentials, logger } = this.deps;
      const record = await credentials.readAll();
      if (!record.refreshToken) {
        return fail<TokenPair>('No refresh token available', { kind: 'NotAuthenticated' });
      }

      const response = await backend.refresh(record.refreshToken);
      if (isTransportFailure(response)) {
        return fail<TokenPair>(response.message, { kind: 'ConnectivityError' });
      }

      const tokens = parseBackendTokens(response.data);
      if (!response.success || !tokens) {
        logger.logSecurityEvent({ event: 'token_refresh_rejected', statusCode: response.statusCode });
        return fail<TokenPair>('Token refresh failed', { kind: 'NotAuthenticated' });
      }

      const updated = await credentials.updateTokens(tokens);
      logger.logAuthenticationEvent({ event: 'token_refreshed', userId: updated.userId });
      return succeed('Token refreshed', { accessToken: tokens.accessToken, refreshToken: updated.refreshToken });
    });
  }

  async isLoggedIn(): Promise<boolean> {
    try {
      return await this.deps.credentials.isLoggedIn();
    } catch (error) {
      if (!isStorageError(error)) throw error;
      this.deps.logger.logError({ event: 'is_logged_in_storage_failure' }, error);
      return false;
    }
  }

  async getCurrentUser(): Promise<UserProfile | null> {
    try {
      const record = await this.deps.credentials.readAll();
      if (!record.loggedIn || !record.email || !record.userId) return null;
      return { userId: record.userId, email: record.email, name: record.name ?? '' };
    } catch (error) {
      if (!isStorageError(error)) throw error;
      this.deps.logger.logError({ event: 'current_user_storage_failure' }, error);
      return null;
    }
  }

  /** Re-presents the stored email and password through `signIn`. */
  async autoLogin(): Promise<AuthResult<UserProfile>> {
    let email: string | null;
    let password: string | null;
    try {
      const record = await this.deps.credentials.readAll();
      email = record.loggedIn ? record.email : null;
      password = record.loggedIn ? record.password : null;
    } catch (error) {
      if (!isStorageError(error)) throw error;
      this.deps.logger.logError({ event: 'auto_login_storage_failure' }, error);
      return storageFailure<UserProfile>();
    }

    if (!email || !password) {
      return fail('No saved credentials for automatic sign-in', { kind: 'NotAuthenticated' });
    }
    return this.signIn(email, password);
  }

  /** Binds the current password session to the device biometric. */
  async enableBiometric(): Promise<AuthResult> {
    return this.guard('enable_biometric', async () => {
      const record = await this.deps.credentials.readAll();
      if (!record.loggedIn || !record.email || !record.password || !record.userId || !record.accessToken) {
        return fail('Please sign in with your email and password before enabling biometric sign-in', {
          kind: 'NotAuthenticated'
        });
      }
      return this.deps.biometricGate.enable(record.email, record.accessToken, record.userId, record.name || record.email);
    });
  }

  async disableBiometric(): Promise<AuthResult> {
    return this.guard('disable_biometric', () => this.deps.biometricGate.disable());
  }

  async setupPin(pin: string): Promise<AuthResult> {
    return this.guard('setup_pin', async () => {
      if (!(await this.deps.credentials.isLoggedIn())) {
        return fail('Please sign in before setting up a PIN', { kind: 'NotAuthenticated' });
      }
      return this.deps.pinFallback.setupPin(pin);
    });
  }

  async changePin(currentPin: string, newPin: string): Promise<AuthResult> {
    return this.guard('change_pin', () => this.deps.pinFallback.changePin(currentPin, newPin));
  }

  async disablePin(currentPin: string): Promise<AuthResult> {
    return this.guard('disable_pin', () => this.deps.pinFallback.disablePin(currentPin));
  }

  async fetchProfile(): Promise<AuthResult<UserProfile>> {
    return this.guard('fetch_profile', async () => {
      const record = await this.deps.credentials.readAll();
      if (!record.loggedIn || !record.userId || !record.accessToken) {
        return fail<UserProfile>('Not signed in', { kind: 'NotAuthenticated' });
      }

      const response: BackendResponse = await this.deps.backend.getUser(record.userId, record.accessToken);
      if (isTransportFailure(response)) {
        return fail<UserProfile>(response.message, { kind: 'ConnectivityError' });
      }

      const user = parseBackendUser(response.data);
      if (!response.success || !user) {
        return fail<UserProfile>(response.message, { kind: 'NotAuthenticated' });
      }
      return succeed('Profile retrieved', user);
    });
  }

  async getAuthenticationStatus(): Promise<AuthResult<AuthenticationStatus>> {
    return this.guard('authentication_status', async () => {
      const [biometric, pin] = await Promise.all([
        this.deps.biometricGate.getStatus(),
        this.deps.pinFallback.getStatus()
      ]);
      return succeed('Authentication status retrieved', {
        biometricAvailable: biometric.available,
        biometricEnabled: biometric.enabled,
        pinEnabled: pin.isEnabled,
        pinLocked: pin.isLocked,
        pinRemainingAttempts: pin.remainingAttempts,
        hasAnyAuth: (biometric.available && biometric.enabled) || pin.isEnabled
      });
    });
  }

  /** Signs out and wipes every record in the vault, binding and PIN included. */
  async signOutAndForget(): Promise<AuthResult> {
    this.deps.session.signOut();
    return this.guard('sign_out_and_forget', async () => {
      await this.deps.storage.clearAll();
      await this.deps.deviceIdentity.clearDeviceId();
      this.deps.logger.logAuthenticationEvent({ event: 'vault_cleared' });
      return succeedEmpty('All stored data cleared');
    });
  }

  /** Rebuilds the in-memory session from the vault at startup. */
  async restoreSession(): Promise<SessionState> {
    const { credentials, lockoutState, session, logger } = this.deps;
    try {
      const [record, lock] = await Promise.all([credentials.readAll(), lockoutState.read()]);
      session.hydrate(record.loggedIn, lock.isLocked);
    } catch (error) {
      if (!isStorageError(error)) throw error;
      logger.logError({ event: 'session_restore_storage_failure' }, error);
      session.signOut();
    }
    return session.state;
  }

  private async adopt(message: string, identity: BoundIdentity): Promise<AuthResult<UserProfile>> {
    await this.deps.credentials.adoptIdentity(identity);
    this.deps.session.authenticate();
    return succeed(message, toProfile(identity));
  }

  private async guard<T>(operation: string, run: () => Promise<AuthResult<T>>): Promise<AuthResult<T>> {
    try {
      return await run();
    } catch (error) {
      if (!isStorageError(error)) throw error;
      this.deps.logger.logError({ event: `${operation}_storage_failure` }, error);
      return storageFailure<T>();
    }
  }
}
