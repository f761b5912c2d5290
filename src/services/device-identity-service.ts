import crypto from 'crypto';
import os from 'os';
import { SecureStorageService } from './secure-storage-service';

export const DEVICE_ID_KEY = 'device_unique_id';

export interface DeviceInfo {
  platform: string;
  arch: string;
  release: string;
  hostname: string;
}

/**
 * One stable identifier per install. Host characteristics are mixed with
 * random bytes so two installs on the same machine still differ.
 */
export class DeviceIdentityService {
  private cachedId: string | null = null;
  private pending: Promise<string> | null = null;

  constructor(private readonly storage: SecureStorageService) {}

  async getDeviceId(): Promise<string> {
    if (this.cachedId) {
      return this.cachedId;
    }
    // Concurrent first calls must not mint two different ids
    if (!this.pending) {
      this.pending = this.loadOrCreate().finally(() => {
        this.pending = null;
      });
    }
    return this.pending;
  }

  async hasDeviceId(): Promise<boolean> {
    const stored = await this.storage.getString(DEVICE_ID_KEY);
    return stored !== null && stored.length > 0;
  }

  async clearDeviceId(): Promise<void> {
    this.cachedId = null;
    await this.storage.delete(DEVICE_ID_KEY);
  }

  getDeviceInfo(): DeviceInfo {
    return {
      platform: os.platform(),
      arch: os.arch(),
      release: os.release(),
      hostname: os.hostname()
    };
  }

  private async loadOrCreate(): Promise<string> {
    const stored = await this.storage.getString(DEVICE_ID_KEY);
    if (stored) {
      this.cachedId = stored;
      return stored;
    }

    const deviceId = this.generateDeviceId();
    await this.storage.setString(DEVICE_ID_KEY, deviceId);
    this.cachedId = deviceId;
    return deviceId;
  }

  private generateDeviceId(): string {
    const info = this.getDeviceInfo();
    const characteristics = [info.platform, info.arch, info.release, info.hostname].join('|');
    const digest = crypto
      .createHash('sha256')
      .update(characteristics)
      .update(crypto.randomBytes(16))
      .digest('hex');
    return `device_${digest.slice(0, 32)}`;
  }
}
