import { EventEmitter } from 'events';
import { AuthContext, createAuthContext } from '../src';
import { InMemoryVault } from '../src/repositories/in-memory-vault';
import { LOCKOUT_STATE_KEY } from '../src/repositories/lockout-state-repository';
import { AuditLogger } from '../src/services/audit-logger';
import { LockoutController } from '../src/services/lockout-controller';
import { SessionTransition } from '../src/services/session-state';
import { LockoutState } from '../src/types';
import { FakeBiometricPlatform } from './helpers/fake-biometric-platform';
import { FakeClock } from './helpers/fake-clock';
import { FlakyVault } from './helpers/flaky-vault';
import { testConfig } from './helpers/test-config';

const LOCKED = '{"isLocked":true,"wasAuthenticated":true}';
const UNLOCKED = '{"isLocked":false,"wasAuthenticated":true}';

describe('Lockout Controller', () => {
  let vault: InMemoryVault;
  let platform: FakeBiometricPlatform;
  let ctx: AuthContext;
  let controller: LockoutController;

  function buildContext(targetVault: InMemoryVault): AuthContext {
    return createAuthContext({
      vault: targetVault,
      biometricPlatform: platform,
      backend: 'local',
      config: testConfig(),
      logger: new AuditLogger('silent'),
      now: new FakeClock().now
    });
  }

  async function signInAna(): Promise<void> {
    const result = await ctx.orchestrator.signUp('ana@example.com', 'correct-horse', 'Ana');
    if (!result.success) {
      throw new Error(`sign-up failed: ${result.message}`);
    }
  }

  beforeEach(() => {
    vault = new InMemoryVault();
    platform = new FakeBiometricPlatform();
    ctx = buildContext(vault);
    controller = ctx.lockoutController;
  });

  describe('Backgrounding', () => {
    it('should persist the lock before anything is awaited', async () => {
      await signInAna();

      const pending = controller.handleLifecycleChange('paused');

      expect(vault.entries()[LOCKOUT_STATE_KEY]).toBe(LOCKED);
      expect(controller.isLocked).toBe(true);
      expect(ctx.session.state).toBe('Locked');
      await pending;
    });

    it('should lock on detach as well', async () => {
      await signInAna();

      await controller.handleLifecycleChange('detached');

      expect(controller.currentState).toEqual({ isLocked: true, wasAuthenticated: true });
    });

    it('should not lock a signed-out app', async () => {
      await controller.handleLifecycleChange('paused');

      expect(controller.isLocked).toBe(false);
      expect(vault.has(LOCKOUT_STATE_KEY)).toBe(false);
      expect(ctx.session.state).toBe('SignedOut');
    });

    it.each(['inactive', 'hidden'] as const)('should ignore %s', async state => {
      await signInAna();

      await controller.handleLifecycleChange(state);

      expect(controller.isLocked).toBe(false);
      expect(vault.has(LOCKOUT_STATE_KEY)).toBe(false);
      expect(ctx.session.state).toBe('SignedIn');
    });

    it('should stay locked in memory when the lock cannot be persisted', async () => {
      const flaky = new FlakyVault();
      ctx = buildContext(flaky);
      controller = ctx.lockoutController;
      await signInAna();
      flaky.failOn('set');

      await controller.handleLifecycleChange('paused');

      expect(controller.isLocked).toBe(true);
      expect(ctx.session.state).toBe('Locked');
    });
  });

  describe('Resuming', () => {
    it('should report the persisted lock without rewriting it', async () => {
      await signInAna();
      await controller.handleLifecycleChange('paused');
      const setSpy = jest.spyOn(vault, 'set');

      await controller.handleLifecycleChange('resumed');

      expect(controller.isLocked).toBe(true);
      expect(vault.entries()[LOCKOUT_STATE_KEY]).toBe(LOCKED);
      expect(setSpy).not.toHaveBeenCalled();
    });

    it('should report an unreadable lock state as locked without touching the session', async () => {
      const flaky = new FlakyVault();
      ctx = buildContext(flaky);
      controller = ctx.lockoutController;
      await signInAna();
      flaky.failOn('get');

      await controller.handleLifecycleChange('resumed');

      expect(controller.isLocked).toBe(true);
      expect(ctx.session.state).toBe('SignedIn');
    });

    it('should not re-lock a session that signed in again while paused', async () => {
      await signInAna();
      await ctx.orchestrator.setupPin('4821');
      await controller.handleLifecycleChange('paused');
      const seen: SessionTransition[] = [];
      ctx.session.on('change', (change: SessionTransition) => seen.push(change));

      const result = await ctx.orchestrator.signInWithPin('4821');
      await controller.handleLifecycleChange('resumed');

      expect(result.success).toBe(true);
      expect(ctx.session.state).toBe('SignedIn');
      expect(controller.currentState).toEqual({ isLocked: false, wasAuthenticated: true });
      expect(vault.entries()[LOCKOUT_STATE_KEY]).toBe(UNLOCKED);
      expect(seen).toEqual([{ from: 'Locked', to: 'SignedIn' }]);
    });
  });

  describe('Unlocking', () => {
    beforeEach(async () => {
      await signInAna();
      await ctx.orchestrator.enableBiometric();
      await ctx.orchestrator.setupPin('4821');
      await controller.handleLifecycleChange('paused');
    });

    it('should unlock after a biometric match', async () => {
      const result = await controller.unlockWithBiometric();

      expect(result).toEqual({ success: true, message: 'Authentication successful' });
      expect(controller.isLocked).toBe(false);
      expect(vault.entries()[LOCKOUT_STATE_KEY]).toBe(UNLOCKED);
      expect(ctx.session.state).toBe('SignedIn');
    });

    it('should surface a biometric failure verbatim and stay locked', async () => {
      platform.outcomes = [false];

      const result = await controller.unlockWithBiometric();

      expect(result).toEqual({ success: false, message: 'Biometric authentication failed. 2 attempt(s) remaining' });
      expect(controller.isLocked).toBe(true);
      expect(vault.entries()[LOCKOUT_STATE_KEY]).toBe(LOCKED);
    });

    it('should unlock with the right password only', async () => {
      const wrong = await controller.unlockWithCredentials('ana@example.com', 'wrong-horse');
      expect(wrong).toEqual({ success: false, message: 'Invalid email or password' });
      expect(controller.isLocked).toBe(true);

      const right = await controller.unlockWithCredentials('ana@example.com', 'correct-horse');
      expect(right).toEqual({ success: true, message: 'Sign in successful' });
      expect(controller.isLocked).toBe(false);
    });

    it('should unlock with the PIN', async () => {
      expect(await controller.unlockWithPin('0000')).toEqual({
        success: false,
        message: 'Incorrect PIN. 4 attempts remaining'
      });
      expect(await controller.unlockWithPin('4821')).toEqual({
        success: true,
        message: 'PIN verification successful'
      });
      expect(await controller.isAppLocked()).toBe(false);
    });

    it('should clear everything on sign-out', async () => {
      const result = await controller.signOut();

      expect(result).toEqual({ success: true, message: 'Signed out successfully' });
      expect(controller.currentState).toEqual({ isLocked: false, wasAuthenticated: false });
      expect(vault.has(LOCKOUT_STATE_KEY)).toBe(false);
      expect(ctx.session.state).toBe('SignedOut');
    });
  });

  describe('Failed sign-out', () => {
    it('should stay locked when the vault cannot delete', async () => {
      const flaky = new FlakyVault();
      ctx = buildContext(flaky);
      controller = ctx.lockoutController;
      await signInAna();
      await controller.handleLifecycleChange('paused');
      flaky.failOn('delete');

      const result = await controller.signOut();

      expect(result).toEqual({ success: false, message: 'Secure storage is unavailable. Please sign in again.' });
      expect(controller.currentState).toEqual({ isLocked: true, wasAuthenticated: true });
    });
  });

  describe('Startup and subscriptions', () => {
    it('should restore a persisted lock on initialize', async () => {
      await signInAna();
      await vault.set(LOCKOUT_STATE_KEY, LOCKED);
      ctx = buildContext(vault);

      const state = await ctx.lockoutController.initialize();

      expect(state).toEqual({ isLocked: true, wasAuthenticated: true });
      expect(ctx.session.state).toBe('Locked');
    });

    it('should not report a signed-out to locked change when restoring a lock', async () => {
      await signInAna();
      await controller.handleLifecycleChange('paused');
      ctx = buildContext(vault);
      const seen: SessionTransition[] = [];
      ctx.session.on('change', (change: SessionTransition) => seen.push(change));

      await ctx.lockoutController.initialize();

      expect(ctx.session.state).toBe('Locked');
      expect(seen).toEqual([]);
    });

    it('should follow a lifecycle stream until detached', async () => {
      await signInAna();
      const source = new EventEmitter();
      const changes: LockoutState[] = [];
      controller.on('lockStateChanged', (state: LockoutState) => changes.push(state));

      const detach = controller.attach(source);
      source.emit('change', 'paused');
      expect(controller.isLocked).toBe(true);

      await controller.unlockWithCredentials('ana@example.com', 'correct-horse');
      detach();
      source.emit('change', 'paused');

      expect(controller.isLocked).toBe(false);
      expect(changes).toEqual([
        { isLocked: true, wasAuthenticated: true },
        { isLocked: false, wasAuthenticated: true }
      ]);
    });

    it('should lock on demand', async () => {
      await signInAna();

      await controller.lockApp();

      expect(await controller.isAppLocked()).toBe(true);
    });
  });
});
