import { EventEmitter } from 'events';
import { SessionState } from '../types';

export interface SessionTransition {
  from: SessionState;
  to: SessionState;
}

/**
 * SignedOut -> SignedIn on any successful authentication.
 * SignedIn  -> Locked only when backgrounded while authenticated.
 * Locked    -> SignedIn on re-authentication.
 * SignedIn | Locked -> SignedOut on sign-out.
 * There is no SignedOut -> Locked edge.
 */
export class SessionStateMachine extends EventEmitter {
  private current: SessionState = 'SignedOut';

  get state(): SessionState {
    return this.current;
  }

  isAuthenticated(): boolean {
    return this.current !== 'SignedOut';
  }

  authenticate(): void {
    this.transition('SignedIn');
  }

  /** Returns false when there is no signed-in session to lock. */
  lock(): boolean {
    if (this.current !== 'SignedIn') {
      return this.current === 'Locked';
    }
    this.transition('Locked');
    return true;
  }

  signOut(): void {
    this.transition('SignedOut');
  }

  /** Startup rehydration from the vault. Sets the state without emitting `change`. */
  hydrate(loggedIn: boolean, locked: boolean): void {
    if (!loggedIn) {
      this.current = 'SignedOut';
    } else {
      this.current = locked ? 'Locked' : 'SignedIn';
    }
  }

  private transition(to: SessionState): void {
    const from = this.current;
    if (from === to) return;
    this.current = to;
    const change: SessionTransition = { from, to };
    this.emit('change', change);
  }
}
