import { AuthConfig, loadAuthConfig, validateAuthConfig } from './config/auth-config';
import { CredentialRepository } from './repositories/credential-repository';
import { LockoutStateRepository } from './repositories/lockout-state-repository';
import { UserRepository } from './repositories/user-repository';
import { AuditLogger } from './services/audit-logger';
import { AuthenticationOrchestrator } from './services/auth-orchestrator';
import { BiometricGate } from './services/biometric-gate';
import { DeviceIdentityService } from './services/device-identity-service';
import { HashService } from './services/hash-service';
import { LocalIdentityBackend } from './services/local-identity-backend';
import { LockoutController } from './services/lockout-controller';
import { PinFallback } from './services/pin-fallback';
import { RemoteIdentityBackend } from './services/remote-identity-backend';
import { SecureStorageService } from './services/secure-storage-service';
import { SessionStateMachine } from './services/session-state';
import { TokenService } from './services/token-service';
import { BiometricPlatform, CredentialVault, IdentityBackend } from './types';

export * from './types';
export type { AuthConfig, LogLevel } from './config/auth-config';
export { loadAuthConfig, validateAuthConfig } from './config/auth-config';
export { CredentialRepository, CREDENTIAL_RECORD_KEY } from './repositories/credential-repository';
export { LockoutStateRepository, LOCKOUT_STATE_KEY } from './repositories/lockout-state-repository';
export { InMemoryVault } from './repositories/in-memory-vault';
export { UserRepository } from './repositories/user-repository';
export type { LocalUser } from './repositories/user-repository';
export { AuditLogger } from './services/audit-logger';
export type { AuditEvent } from './services/audit-logger';
export { AuthenticationOrchestrator } from './services/auth-orchestrator';
export type { AuthOrchestratorDeps } from './services/auth-orchestrator';
export { BiometricGate } from './services/biometric-gate';
export type { BiometricGateOptions } from './services/biometric-gate';
export { DeviceIdentityService } from './services/device-identity-service';
export type { DeviceInfo } from './services/device-identity-service';
export { HashService } from './services/hash-service';
export { LocalIdentityBackend } from './services/local-identity-backend';
export { LockoutController } from './services/lockout-controller';
export { PinFallback } from './services/pin-fallback';
export type { PinFallbackOptions } from './services/pin-fallback';
export { EndpointResolver, RemoteIdentityBackend } from './services/remote-identity-backend';
export type { RemoteBackendOptions } from './services/remote-identity-backend';
export { SecureStorageService, StorageError, isStorageError } from './services/secure-storage-service';
export { SessionStateMachine } from './services/session-state';
export type { SessionTransition } from './services/session-state';
export { TokenService } from './services/token-service';

export type BackendChoice = 'local' | 'remote' | IdentityBackend;

export interface AuthContextOptions {
  vault: CredentialVault;
  biometricPlatform: BiometricPlatform;
  backend?: BackendChoice;
  config?: AuthConfig;
  logger?: AuditLogger;
  fetchImpl?: typeof fetch;
  now?: () => number;
}

export interface AuthContext {
  config: AuthConfig;
  logger: AuditLogger;
  storage: SecureStorageService;
  credentials: CredentialRepository;
  deviceIdentity: DeviceIdentityService;
  session: SessionStateMachine;
  biometricGate: BiometricGate;
  pinFallback: PinFallback;
  backend: IdentityBackend;
  orchestrator: AuthenticationOrchestrator;
  lockoutController: LockoutController;
}

/**
 * Wires one isolated set of services around a vault. Nothing is shared
 * between two contexts.
 */
export function createAuthContext(options: AuthContextOptions): AuthContext {
  const config = options.config ?? loadAuthConfig();
  if (options.config) {
    validateAuthConfig(config);
  }

  const now = options.now ?? Date.now;
  const logger = options.logger ?? new AuditLogger(config.logLevel);
  const storage = new SecureStorageService(options.vault);
  const credentials = new CredentialRepository(storage);
  const lockoutState = new LockoutStateRepository(storage);
  const deviceIdentity = new DeviceIdentityService(storage);
  const hasher = new HashService(config.hashSaltRounds);
  const session = new SessionStateMachine();

  const pinFallback = new PinFallback(storage, credentials, hasher, config.pin, logger, now);
  const biometricGate = new BiometricGate(storage, options.biometricPlatform, pinFallback, config.biometric, logger, now);

  const backend = resolveBackend(options.backend ?? 'local', {
    config,
    storage,
    hasher,
    deviceIdentity,
    logger,
    fetchImpl: options.fetchImpl ?? fetch,
    now
  });

  const orchestrator = new AuthenticationOrchestrator({
    storage,
    credentials,
    lockoutState,
    biometricGate,
    pinFallback,
    backend,
    deviceIdentity,
    session,
    logger,
    passwordMinLength: config.passwordMinLength
  });
  const lockoutController = new LockoutController(orchestrator, session, lockoutState, logger);

  return {
    config,
    logger,
    storage,
    credentials,
    deviceIdentity,
    session,
    biometricGate,
    pinFallback,
    backend,
    orchestrator,
    lockoutController
  };
}

interface BackendParts {
  config: AuthConfig;
  storage: SecureStorageService;
  hasher: HashService;
  deviceIdentity: DeviceIdentityService;
  logger: AuditLogger;
  fetchImpl: typeof fetch;
  now: () => number;
}

function resolveBackend(choice: BackendChoice, parts: BackendParts): IdentityBackend {
  if (choice === 'local') {
    return new LocalIdentityBackend(
      new UserRepository(parts.storage),
      parts.hasher,
      new TokenService(parts.config.jwt),
      parts.deviceIdentity
    );
  }
  if (choice === 'remote') {
    return new RemoteIdentityBackend(parts.config.api, parts.deviceIdentity, parts.logger, parts.fetchImpl, parts.now);
  }
  return choice;
}
