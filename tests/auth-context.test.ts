import { InMemoryVault, LocalIdentityBackend, RemoteIdentityBackend, createAuthContext } from '../src';
import { AuditLogger } from '../src/services/audit-logger';
import { FakeBiometricPlatform } from './helpers/fake-biometric-platform';
import { testConfig } from './helpers/test-config';

describe('Auth Context', () => {
  const baseOptions = () => ({
    vault: new InMemoryVault(),
    biometricPlatform: new FakeBiometricPlatform(),
    config: testConfig(),
    logger: new AuditLogger('silent')
  });

  it('should use the on-device backend by default', () => {
    const ctx = createAuthContext(baseOptions());

    expect(ctx.backend).toBeInstanceOf(LocalIdentityBackend);
    expect(ctx.backend.name).toBe('local');
  });

  it('should build the HTTP backend on request', () => {
    const ctx = createAuthContext({ ...baseOptions(), backend: 'remote' });

    expect(ctx.backend).toBeInstanceOf(RemoteIdentityBackend);
  });

  it('should keep two contexts fully isolated', async () => {
    const first = createAuthContext(baseOptions());
    const second = createAuthContext(baseOptions());

    await first.orchestrator.signUp('ana@example.com', 'correct-horse', 'Ana');

    expect(first.orchestrator.getSessionState()).toBe('SignedIn');
    expect(second.orchestrator.getSessionState()).toBe('SignedOut');
    expect(await second.orchestrator.isLoggedIn()).toBe(false);
  });

  it('should reject an invalid configuration', () => {
    expect(() =>
      createAuthContext({ ...baseOptions(), config: testConfig({ hashSaltRounds: 2 }) })
    ).toThrow('Invalid authentication configuration: HASH_SALT_ROUNDS must be between 4 and 31');
  });
});
