import { SecureStorageService, isRecord, stringOrNull } from '../services/secure-storage-service';
import { BoundIdentity, CredentialInput, CredentialRecord, TokenPair } from '../types';

export const CREDENTIAL_RECORD_KEY = 'credential_record';

const EMPTY_RECORD: CredentialRecord = {
  email: null,
  password: null,
  name: null,
  userId: null,
  accessToken: null,
  refreshToken: null,
  loggedIn: false
};

function parseCredentialRecord(value: unknown): CredentialRecord | null {
  if (!isRecord(value)) return null;
  return {
    email: stringOrNull(value.email),
    password: stringOrNull(value.password),
    name: stringOrNull(value.name),
    userId: stringOrNull(value.userId),
    accessToken: stringOrNull(value.accessToken),
    refreshToken: stringOrNull(value.refreshToken),
    loggedIn: value.loggedIn === true
  };
}

/**
 * The Credential Record lives under a single vault key, so every update is
 * one atomic write. A process killed mid-update leaves either the old or the
 * new record, never a mix of both.
 */
export class CredentialRepository {
  constructor(private readonly storage: SecureStorageService) {}

  async storeCredentials(input: CredentialInput): Promise<CredentialRecord> {
    const record: CredentialRecord = {
      email: input.email,
      password: input.password ?? null,
      name: input.name ?? null,
      userId: input.userId ?? null,
      accessToken: input.accessToken ?? null,
      refreshToken: input.refreshToken ?? null,
      loggedIn: true
    };
    await this.storage.setJson(CREDENTIAL_RECORD_KEY, record);
    return record;
  }

  async readAll(): Promise<CredentialRecord> {
    const record = await this.storage.getJson(CREDENTIAL_RECORD_KEY, parseCredentialRecord);
    return record ?? { ...EMPTY_RECORD };
  }

  /**
   * Writes a shortcut identity as-is. Password and refresh token survive only
   * when the shortcut belongs to the identity already on record.
   */
  async adoptIdentity(identity: BoundIdentity): Promise<CredentialRecord> {
    const current = await this.readAll();
    const sameUser = current.email === identity.email && current.userId === identity.userId;
    return this.storeCredentials({
      email: identity.email,
      password: sameUser ? current.password : null,
      name: identity.name,
      userId: identity.userId,
      accessToken: identity.token,
      refreshToken: sameUser ? current.refreshToken : null
    });
  }

  async updateTokens(tokens: TokenPair): Promise<CredentialRecord> {
    const current = await this.readAll();
    const next: CredentialRecord = {
      ...current,
      accessToken: tokens.accessToken,
      refreshToken: tokens.refreshToken ?? current.refreshToken
    };
    await this.storage.setJson(CREDENTIAL_RECORD_KEY, next);
    return next;
  }

  async isLoggedIn(): Promise<boolean> {
    const record = await this.readAll();
    return record.loggedIn;
  }

  async hasStoredCredentials(): Promise<boolean> {
    const record = await this.readAll();
    return record.email !== null && record.password !== null;
  }

  async markSignedOut(): Promise<void> {
    await this.storage.setJson(CREDENTIAL_RECORD_KEY, { ...EMPTY_RECORD });
  }

  async clear(): Promise<void> {
    await this.storage.delete(CREDENTIAL_RECORD_KEY);
  }
}
