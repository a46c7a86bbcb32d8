/**
 * Sync State Machine for FutureProof
 *
 * Holds the coordinator's status and enforces the allowed transitions.
 *
 * State Machine:
 *
 *   IDLE ──(schedule)──► SCHEDULED ──(timer)──► SYNCING
 *     │                     │                     │
 *     │                     └─(cancel)─► IDLE     ├──► SUCCESS ──(2 s)──► IDLE
 *     │                                           │
 *     └──────────(force)─────────────────────►    └──► ERROR ────(5 s)──► IDLE
 *
 *   SUCCESS / ERROR may also go straight to SCHEDULED or SYNCING when new
 *   work arrives before the status decays.
 *
 * Re-entering the current status is a no-op and is not published.
 */

import type {
  SyncStatus,
  SyncStatusListener,
  Unsubscribe,
} from '@/types/sync';

// ============================================
// Valid Transitions
// ============================================

const VALID_TRANSITIONS: Record<SyncStatus, readonly SyncStatus[]> = {
  idle: ['scheduled', 'syncing'],
  scheduled: ['syncing', 'idle'],
  syncing: ['success', 'error'],
  success: ['idle', 'scheduled', 'syncing'],
  error: ['idle', 'scheduled', 'syncing'],
};

/** State machine context */
export interface SyncStateContext {
  status: SyncStatus;

  /** Previous status (for debugging) */
  previousStatus: SyncStatus | null;

  /** Time entered current status */
  statusEnteredAt: Date;
}

// ============================================
// Sync State Machine Class
// ============================================

export class SyncStateMachine {
  private context: SyncStateContext;
  private listeners: Set<SyncStatusListener> = new Set();

  constructor(initialStatus: SyncStatus = 'idle') {
    this.context = {
      status: initialStatus,
      previousStatus: null,
      statusEnteredAt: new Date(),
    };
  }

  getStatus(): SyncStatus {
    return this.context.status;
  }

  getContext(): Readonly<SyncStateContext> {
    return { ...this.context };
  }

  is(status: SyncStatus): boolean {
    return this.context.status === status;
  }

  /**
   * Move to `next` and publish it.
   *
   * @returns false when the transition is not allowed
   */
  transition(next: SyncStatus): boolean {
    const current = this.context.status;

    if (current === next) {
      return true;
    }

    if (!VALID_TRANSITIONS[current].includes(next)) {
      console.warn(
        `[SyncStateMachine] Invalid transition: ${current} ─► ${next}`
      );
      return false;
    }

    this.context = {
      status: next,
      previousStatus: current,
      statusEnteredAt: new Date(),
    };

    console.log(`[SyncStateMachine] ${current} ─► ${next}`);
    this.notifyListeners(next);
    return true;
  }

  /** Get time in current status (in ms) */
  getTimeInState(): number {
    return Date.now() - this.context.statusEnteredAt.getTime();
  }

  // ============================================
  // Event Listeners
  // ============================================

  onStatusChange(listener: SyncStatusListener): Unsubscribe {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  get listenerCount(): number {
    return this.listeners.size;
  }

  private notifyListeners(status: SyncStatus): void {
    // Copy so a listener may unsubscribe itself mid-broadcast
    for (const listener of [...this.listeners]) {
      try {
        listener(status);
      } catch (error) {
        console.error(
          '[SyncStateMachine] Error in status change listener:',
          error
        );
      }
    }
  }

  /** Drop all listeners */
  clearListeners(): void {
    this.listeners.clear();
  }

  toString(): string {
    return `SyncStateMachine(status=${this.context.status}, previous=${this.context.previousStatus ?? 'none'})`;
  }
}

/**
 * Check if a status transition is allowed.
 */
export function isValidTransition(from: SyncStatus, to: SyncStatus): boolean {
  return VALID_TRANSITIONS[from].includes(to);
}

/**
 * Statuses reachable from `status`.
 */
export function getValidTransitions(status: SyncStatus): readonly SyncStatus[] {
  return VALID_TRANSITIONS[status];
}
