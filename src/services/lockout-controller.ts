import { EventEmitter } from 'events';
import { AuditLogger } from './audit-logger';
import { AuthenticationOrchestrator } from './auth-orchestrator';
import { isStorageError } from './secure-storage-service';
import { SessionStateMachine, SessionTransition } from './session-state';
import { LockoutStateRepository } from '../repositories/lockout-state-repository';
import { AppLifecycleState, AuthResult, LifecycleEventSource, LockoutState, UnlockResult } from '../types';

/**
 * Locks the app when it is backgrounded with a signed-in session and
 * reports the persisted lock when it comes back.
 *
 * Emits `lockStateChanged` with the new LockoutState whenever the in-memory
 * state changes. Any re-authentication of a locked session clears the lock,
 * whether it went through this controller or straight through the orchestrator.
 */
export class LockoutController extends EventEmitter {
  private current: LockoutState = { isLocked: false, wasAuthenticated: false };

  constructor(
    private readonly orchestrator: AuthenticationOrchestrator,
    private readonly session: SessionStateMachine,
    private readonly lockoutState: LockoutStateRepository,
    private readonly logger: AuditLogger
  ) {
    super();
    session.on('change', this.onSessionChange);
  }

  get isLocked(): boolean {
    return this.current.isLocked;
  }

  get wasAuthenticated(): boolean {
    return this.current.wasAuthenticated;
  }

  get currentState(): LockoutState {
    return { ...this.current };
  }

  /** Restores session and lock state at startup. An unreadable vault leaves the app locked. */
  async initialize(): Promise<LockoutState> {
    await this.orchestrator.restoreSession();
    await this.reload();
    return this.currentState;
  }

  /** Subscribes to a lifecycle stream. Returns the matching unsubscribe. */
  attach(source: LifecycleEventSource): () => void {
    const listener = (state: AppLifecycleState): void => {
      this.handleLifecycleChange(state).catch(error => {
        this.logger.logError({ event: 'lifecycle_handler_failed', state }, error);
      });
    };
    source.on('change', listener);
    return () => {
      source.off('change', listener);
    };
  }

  handleLifecycleChange(state: AppLifecycleState): Promise<void> {
    switch (state) {
      case 'paused':
      case 'detached':
        return this.lockOnBackground(state);
      case 'resumed':
        return this.reload();
      case 'inactive':
      case 'hidden':
        return Promise.resolve();
    }
  }

  async lockApp(): Promise<void> {
    await this.lockOnBackground('manual');
  }

  async isAppLocked(): Promise<boolean> {
    await this.reload();
    return this.current.isLocked;
  }

  async unlockWithBiometric(reason?: string): Promise<UnlockResult> {
    return this.unlockWith('biometric', await this.orchestrator.signInWithBiometric(reason));
  }

  async unlockWithPin(pin: string): Promise<UnlockResult> {
    return this.unlockWith('pin', await this.orchestrator.signInWithPin(pin));
  }

  async unlockWithCredentials(email: string, password: string): Promise<UnlockResult> {
    return this.unlockWith('password', await this.orchestrator.signIn(email, password));
  }

  async signOut(): Promise<UnlockResult> {
    const result = await this.orchestrator.signOut();
    if (result.success) {
      this.setState({ isLocked: false, wasAuthenticated: false });
    } else {
      this.setState({ isLocked: true, wasAuthenticated: this.current.wasAuthenticated });
    }
    return { success: result.success, message: result.message };
  }

  /**
   * The vault write is started before anything is awaited: the host may kill
   * the process right after backgrounding.
   */
  private lockOnBackground(trigger: string): Promise<void> {
    if (this.session.state !== 'SignedIn') {
      return Promise.resolve();
    }

    const locked: LockoutState = { isLocked: true, wasAuthenticated: true };
    const write = this.lockoutState.write(locked);
    this.session.lock();
    this.setState(locked);
    this.logger.logSecurityEvent({ event: 'app_locked', trigger });

    return write.catch(error => {
      if (!isStorageError(error)) throw error;
      // Memory stays locked; the next resume re-reads whatever was persisted
      this.logger.logError({ event: 'lock_write_failed', trigger }, error);
    });
  }

  /** Re-reads the persisted lock. The session itself is left alone. */
  private async reload(): Promise<void> {
    try {
      this.setState(await this.lockoutState.read());
    } catch (error) {
      if (!isStorageError(error)) throw error;
      this.logger.logError({ event: 'lock_state_read_failed' }, error);
      this.setState({ isLocked: true, wasAuthenticated: this.current.wasAuthenticated });
    }
  }

  private readonly onSessionChange = (change: SessionTransition): void => {
    if (change.from !== 'Locked' || change.to !== 'SignedIn') return;

    const unlocked: LockoutState = { isLocked: false, wasAuthenticated: true };
    this.setState(unlocked);
    this.lockoutState.write(unlocked).catch(error => {
      this.logger.logError({ event: 'unlock_write_failed', trigger: 'session_change' }, error);
    });
  };

  private async unlockWith<T>(factor: string, result: AuthResult<T>): Promise<UnlockResult> {
    if (!result.success) {
      this.logger.logSecurityEvent({ event: 'unlock_failed', factor, reason: result.error.kind });
      return { success: false, message: result.message };
    }

    const unlocked: LockoutState = { isLocked: false, wasAuthenticated: true };
    try {
      await this.lockoutState.write(unlocked);
    } catch (error) {
      if (!isStorageError(error)) throw error;
      this.logger.logError({ event: 'unlock_write_failed', factor }, error);
      this.session.lock();
      this.setState({ isLocked: true, wasAuthenticated: true });
      return { success: false, message: 'Secure storage is unavailable. Please sign in again.' };
    }

    this.setState(unlocked);
    this.logger.logAuthenticationEvent({ event: 'app_unlocked', factor });
    return { success: true, message: result.message };
  }

  private setState(next: LockoutState): void {
    const changed = next.isLocked !== this.current.isLocked || next.wasAuthenticated !== this.current.wasAuthenticated;
    this.current = { ...next };
    if (changed) {
      this.emit('lockStateChanged', this.currentState);
    }
  }
}
