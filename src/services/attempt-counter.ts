import { SecureStorageService, isRecord, stringOrNull } from './secure-storage-service';
import { AttemptCounterState } from '../types';

function parseCounter(value: unknown): AttemptCounterState | null {
  if (!isRecord(value) || typeof value.count !== 'number') return null;
  return { count: value.count, resetAt: stringOrNull(value.resetAt) };
}

/**
 * Failure counter with a reset window that opens on the first failure of a
 * streak. Expiry is evaluated lazily: a read at or after `resetAt` clears the
 * stored counter before returning it. Nothing runs in the background.
 */
export class AttemptCounterStore {
  constructor(
    private readonly storage: SecureStorageService,
    private readonly key: string,
    private readonly windowMs: number,
    private readonly now: () => number = Date.now
  ) {}

  async read(): Promise<AttemptCounterState> {
    const stored = await this.storage.getJson(this.key, parseCounter);
    if (!stored) {
      return { count: 0, resetAt: null };
    }

    if (stored.resetAt !== null && this.now() >= Date.parse(stored.resetAt)) {
      await this.storage.delete(this.key);
      return { count: 0, resetAt: null };
    }

    return stored;
  }

  async increment(): Promise<AttemptCounterState> {
    const current = await this.read();
    const next: AttemptCounterState = {
      count: current.count + 1,
      resetAt: current.resetAt ?? new Date(this.now() + this.windowMs).toISOString()
    };
    await this.storage.setJson(this.key, next);
    return next;
  }

  async reset(): Promise<void> {
    await this.storage.delete(this.key);
  }
}
