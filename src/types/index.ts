export interface CredentialRecord {
  email: string | null;
  password: string | null;
  name: string | null;
  userId: string | null;
  accessToken: string | null;
  refreshToken: string | null;
  loggedIn: boolean;
}

export interface CredentialInput {
  email: string;
  password?: string | null;
  name?: string | null;
  userId?: string | null;
  accessToken?: string | null;
  refreshToken?: string | null;
}

/**
 * Identity re-presented by a biometric or PIN shortcut. It is whatever the
 * last password sign-in produced, never re-validated against the backend.
 */
export interface BoundIdentity {
  email: string;
  token: string;
  userId: string;
  name: string;
}

export interface BiometricBinding extends BoundIdentity {
  enabled: boolean;
}

export interface AttemptCounterState {
  count: number;
  // ISO timestamp; null while the counter is empty
  resetAt: string | null;
}

export interface PinRecord {
  hash: string;
  attempts: number;
  lockUntil: string | null;
}

export interface LockoutState {
  isLocked: boolean;
  wasAuthenticated: boolean;
}

export type SessionState = 'SignedOut' | 'SignedIn' | 'Locked';

export type AppLifecycleState = 'resumed' | 'inactive' | 'hidden' | 'paused' | 'detached';

export type AuthFactor = 'password' | 'biometric' | 'pin';

export type AuthErrorKind =
  | 'ValidationError'
  | 'ConnectivityError'
  | 'InvalidCredentials'
  | 'NotConfigured'
  | 'LockedOut'
  | 'NotAuthenticated'
  | 'StorageError';

export type AuthFailure =
  | { kind: 'ValidationError' }
  | { kind: 'ConnectivityError' }
  | { kind: 'InvalidCredentials'; remainingAttempts?: number }
  | { kind: 'NotConfigured'; factor: AuthFactor }
  | {
      kind: 'LockedOut';
      factor: AuthFactor;
      remainingAttempts: number;
      unlockAt: string | null;
      retryAfterSeconds: number;
      pinFallbackAvailable: boolean;
    }
  | { kind: 'NotAuthenticated' }
  | { kind: 'StorageError' };

export type AuthResult<T = undefined> =
  | { success: true; message: string; data: T }
  | { success: false; message: string; error: AuthFailure };

export interface UserProfile {
  userId: string;
  name: string;
  email: string;
}

export interface TokenPair {
  accessToken: string;
  refreshToken: string | null;
}

/**
 * Encrypted key/value store provided by the host platform. Single-key
 * operations are atomic; nothing spans keys.
 */
export interface CredentialVault {
  get(key: string): Promise<string | null>;
  set(key: string, value: string): Promise<void>;
  delete(key: string): Promise<void>;
  clear(): Promise<void>;
}

export interface BackendResponse {
  success: boolean;
  statusCode: number;
  message: string;
  data: Record<string, unknown> | null;
}

export interface IdentityBackend {
  readonly name: string;
  isReachable(): Promise<boolean>;
  login(email: string, password: string): Promise<BackendResponse>;
  register(name: string, email: string, password: string): Promise<BackendResponse>;
  getUser(userId: string, accessToken?: string): Promise<BackendResponse>;
  refresh(refreshToken: string): Promise<BackendResponse>;
}

export type BiometricType = 'fingerprint' | 'face' | 'iris' | 'strong' | 'weak';

export interface BiometricPromptOptions {
  biometricOnly: boolean;
  stickyAuth: boolean;
}

/**
 * Host biometric capability. The gate calls `authenticate` at most once per
 * `BiometricGate.authenticate()` and relies on the caller not re-invoking it
 * while a prompt is outstanding.
 */
export interface BiometricPlatform {
  canCheckBiometrics(): Promise<boolean>;
  isDeviceSupported(): Promise<boolean>;
  availableBiometricTypes(): Promise<Set<BiometricType>>;
  authenticate(reason: string, options: BiometricPromptOptions): Promise<boolean>;
  stopAuthentication(): Promise<boolean>;
}

export interface LifecycleEventSource {
  on(event: 'change', listener: (state: AppLifecycleState) => void): unknown;
  off(event: 'change', listener: (state: AppLifecycleState) => void): unknown;
}

export interface BiometricStatus {
  available: boolean;
  enabled: boolean;
  attempts: number;
  remainingAttempts: number;
  resetAt: string | null;
}

export interface PinStatus {
  isEnabled: boolean;
  isLocked: boolean;
  remainingAttempts: number;
  lockoutTimeRemaining: number;
}

export interface AuthenticationStatus {
  biometricAvailable: boolean;
  biometricEnabled: boolean;
  pinEnabled: boolean;
  pinLocked: boolean;
  pinRemainingAttempts: number;
  hasAnyAuth: boolean;
}

export interface UnlockResult {
  success: boolean;
  message: string;
}
