import { CREDENTIAL_RECORD_KEY, CredentialRepository } from '../src/repositories/credential-repository';
import { InMemoryVault } from '../src/repositories/in-memory-vault';
import { LOCKOUT_STATE_KEY, LockoutStateRepository } from '../src/repositories/lockout-state-repository';
import { SecureStorageService } from '../src/services/secure-storage-service';

describe('Credential Repository', () => {
  let vault: InMemoryVault;
  let repository: CredentialRepository;

  const signedIn = {
    email: 'ana@example.com',
    password: 'correct-horse',
    name: 'Ana',
    userId: 'user-1',
    accessToken: 'access-1',
    refreshToken: 'refresh-1'
  };

  beforeEach(() => {
    vault = new InMemoryVault();
    repository = new CredentialRepository(new SecureStorageService(vault));
  });

  it('should return an empty signed-out record when nothing is stored', async () => {
    expect(await repository.readAll()).toEqual({
      email: null,
      password: null,
      name: null,
      userId: null,
      accessToken: null,
      refreshToken: null,
      loggedIn: false
    });
  });

  it('should store every field under a single vault key', async () => {
    await repository.storeCredentials(signedIn);

    expect(vault.keys()).toEqual([CREDENTIAL_RECORD_KEY]);
    expect(await repository.readAll()).toEqual({ ...signedIn, loggedIn: true });
    expect(await repository.isLoggedIn()).toBe(true);
    expect(await repository.hasStoredCredentials()).toBe(true);
  });

  it('should keep password and refresh token when adopting the same identity', async () => {
    await repository.storeCredentials(signedIn);

    const adopted = await repository.adoptIdentity({
      email: 'ana@example.com',
      token: 'access-2',
      userId: 'user-1',
      name: 'Ana'
    });

    expect(adopted).toEqual({ ...signedIn, accessToken: 'access-2', loggedIn: true });
  });

  it('should drop password and refresh token when adopting a different identity', async () => {
    await repository.storeCredentials(signedIn);

    const adopted = await repository.adoptIdentity({
      email: 'ben@example.com',
      token: 'access-b',
      userId: 'user-2',
      name: 'Ben'
    });

    expect(adopted).toEqual({
      email: 'ben@example.com',
      password: null,
      name: 'Ben',
      userId: 'user-2',
      accessToken: 'access-b',
      refreshToken: null,
      loggedIn: true
    });
  });

  it('should keep the old refresh token when the backend does not rotate it', async () => {
    await repository.storeCredentials(signedIn);

    const updated = await repository.updateTokens({ accessToken: 'access-3', refreshToken: null });

    expect(updated.accessToken).toBe('access-3');
    expect(updated.refreshToken).toBe('refresh-1');
  });

  it('should clear the record', async () => {
    await repository.storeCredentials(signedIn);
    await repository.clear();

    expect(await repository.isLoggedIn()).toBe(false);
    expect(vault.has(CREDENTIAL_RECORD_KEY)).toBe(false);
  });
});

describe('Lockout State Repository', () => {
  it('should default to unlocked and round-trip writes', async () => {
    const vault = new InMemoryVault();
    const repository = new LockoutStateRepository(new SecureStorageService(vault));

    expect(await repository.read()).toEqual({ isLocked: false, wasAuthenticated: false });

    await repository.write({ isLocked: true, wasAuthenticated: true });
    expect(vault.entries()[LOCKOUT_STATE_KEY]).toBe('{"isLocked":true,"wasAuthenticated":true}');

    await repository.clear();
    expect(await repository.read()).toEqual({ isLocked: false, wasAuthenticated: false });
  });

  it('should reach the vault before the write promise is awaited', () => {
    const vault = new InMemoryVault();
    const repository = new LockoutStateRepository(new SecureStorageService(vault));

    const pending = repository.write({ isLocked: true, wasAuthenticated: true });

    expect(vault.has(LOCKOUT_STATE_KEY)).toBe(true);
    return pending;
  });
});
