import { CredentialVault } from '../types';

/**
 * Raised when the underlying vault fails. Callers above this adapter must
 * treat it as "not authenticated", never as a pass.
 */
export class StorageError extends Error {
  constructor(
    public readonly operation: 'get' | 'set' | 'delete' | 'clear' | 'decode',
    public readonly key: string | null,
    cause?: unknown
  ) {
    const reason = cause instanceof Error ? cause.message : cause === undefined ? 'unknown error' : String(cause);
    super(`Secure storage ${operation} failed${key ? ` for "${key}"` : ''}: ${reason}`);
    this.name = 'StorageError';
  }
}

export function isStorageError(error: unknown): error is StorageError {
  return error instanceof StorageError;
}

/**
 * Typed access to the host vault. Every low-level fault is rethrown as a
 * StorageError so nothing above this class sees vault-specific exceptions.
 */
export class SecureStorageService {
  constructor(private readonly vault: CredentialVault) {}

  async getString(key: string): Promise<string | null> {
    try {
      return await this.vault.get(key);
    } catch (error) {
      throw new StorageError('get', key, error);
    }
  }

  async setString(key: string, value: string): Promise<void> {
    try {
      await this.vault.set(key, value);
    } catch (error) {
      throw new StorageError('set', key, error);
    }
  }

  async delete(key: string): Promise<void> {
    try {
      await this.vault.delete(key);
    } catch (error) {
      throw new StorageError('delete', key, error);
    }
  }

  async clearAll(): Promise<void> {
    try {
      await this.vault.clear();
    } catch (error) {
      throw new StorageError('clear', null, error);
    }
  }

  async getBool(key: string): Promise<boolean | null> {
    const value = await this.getString(key);
    if (value === null) return null;
    return value === 'true';
  }

  async setBool(key: string, value: boolean): Promise<void> {
    await this.setString(key, value ? 'true' : 'false');
  }

  /**
   * Reads a JSON record and runs it through `parse`. A record that fails to
   * decode is reported as a StorageError rather than silently dropped.
   */
  async getJson<T>(key: string, parse: (value: unknown) => T | null): Promise<T | null> {
    const raw = await this.getString(key);
    if (raw === null) return null;

    let decoded: unknown;
    try {
      decoded = JSON.parse(raw);
    } catch (error) {
      throw new StorageError('decode', key, error);
    }

    const parsed = parse(decoded);
    if (parsed === null) {
      throw new StorageError('decode', key, 'unexpected record shape');
    }
    return parsed;
  }

  async setJson(key: string, value: unknown): Promise<void> {
    await this.setString(key, JSON.stringify(value));
  }
}

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export function stringOrNull(value: unknown): string | null {
  return typeof value === 'string' ? value : null;
}
