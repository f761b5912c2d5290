import { SecureStorageService, isRecord } from '../services/secure-storage-service';
import { LockoutState } from '../types';

export const LOCKOUT_STATE_KEY = 'lockout_state';

function parseLockoutState(value: unknown): LockoutState | null {
  if (!isRecord(value)) return null;
  return {
    isLocked: value.isLocked === true,
    wasAuthenticated: value.wasAuthenticated === true
  };
}

export class LockoutStateRepository {
  constructor(private readonly storage: SecureStorageService) {}

  async read(): Promise<LockoutState> {
    const state = await this.storage.getJson(LOCKOUT_STATE_KEY, parseLockoutState);
    return state ?? { isLocked: false, wasAuthenticated: false };
  }

  write(state: LockoutState): Promise<void> {
    return this.storage.setJson(LOCKOUT_STATE_KEY, state);
  }

  async clear(): Promise<void> {
    await this.storage.delete(LOCKOUT_STATE_KEY);
  }
}
