import { BiometricPlatform, BiometricPromptOptions, BiometricType } from '../../src/types';

/**
 * Scripted biometric hardware. Each prompt consumes the next queued
 * outcome; `'hang'` never answers, so only the gate timeout ends it.
 */
export class FakeBiometricPlatform implements BiometricPlatform {
  canCheck = true;
  supported = true;
  types = new Set<BiometricType>(['fingerprint']);
  outcomes: Array<boolean | 'hang'> = [];
  defaultOutcome: boolean | 'hang' = true;

  prompts: Array<{ reason: string; options: BiometricPromptOptions }> = [];
  stopCalls = 0;
  private release: ((passed: boolean) => void) | null = null;

  async canCheckBiometrics(): Promise<boolean> {
    return this.canCheck;
  }

  async isDeviceSupported(): Promise<boolean> {
    return this.supported;
  }

  async availableBiometricTypes(): Promise<Set<BiometricType>> {
    return new Set(this.types);
  }

  authenticate(reason: string, options: BiometricPromptOptions): Promise<boolean> {
    this.prompts.push({ reason, options });
    const outcome = this.outcomes.length > 0 ? this.outcomes.shift() : this.defaultOutcome;
    if (outcome === 'hang' || outcome === undefined) {
      return new Promise<boolean>(resolve => {
        this.release = resolve;
      });
    }
    return Promise.resolve(outcome);
  }

  async stopAuthentication(): Promise<boolean> {
    this.stopCalls += 1;
    return true;
  }

  /** Answers a prompt left hanging. */
  answer(passed: boolean): void {
    this.release?.(passed);
    this.release = null;
  }
}
