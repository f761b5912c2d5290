import { CredentialVault } from '../types';

/**
 * Process-local vault. Suitable for tests and for hosts that wrap their own
 * encrypted store around a snapshot of `entries()`.
 */
export class InMemoryVault implements CredentialVault {
  private store = new Map<string, string>();

  constructor(initial?: Record<string, string>) {
    if (initial) {
      for (const [key, value] of Object.entries(initial)) {
        this.store.set(key, value);
      }
    }
  }

  async get(key: string): Promise<string | null> {
    return this.store.get(key) ?? null;
  }

  async set(key: string, value: string): Promise<void> {
    this.store.set(key, value);
  }

  async delete(key: string): Promise<void> {
    this.store.delete(key);
  }

  async clear(): Promise<void> {
    this.store.clear();
  }

  has(key: string): boolean {
    return this.store.has(key);
  }

  keys(): string[] {
    return [...this.store.keys()];
  }

  entries(): Record<string, string> {
    return Object.fromEntries(this.store);
  }
}
