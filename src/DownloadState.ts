/**
 * Lifecycle of one download run.
 *
 * planning → resuming → downloading → merging → completed, with failed and cancelled as
 * the other terminal states. Anything not listed in TRANSITIONS is rejected.
 */
export const STATE = {
  PLANNING: 'planning',
  RESUMING: 'resuming',
  DOWNLOADING: 'downloading',
  MERGING: 'merging',
  COMPLETED: 'completed',
  FAILED: 'failed',
  CANCELLED: 'cancelled',
} as const;

export type SessionState = (typeof STATE)[keyof typeof STATE];

const TRANSITIONS: Record<SessionState, readonly SessionState[]> = {
  [STATE.PLANNING]: [STATE.RESUMING, STATE.FAILED, STATE.CANCELLED],
  [STATE.RESUMING]: [STATE.DOWNLOADING, STATE.MERGING, STATE.FAILED, STATE.CANCELLED],
  [STATE.DOWNLOADING]: [STATE.MERGING, STATE.FAILED, STATE.CANCELLED],
  [STATE.MERGING]: [STATE.COMPLETED, STATE.FAILED],
  [STATE.COMPLETED]: [],
  [STATE.FAILED]: [],
  [STATE.CANCELLED]: [],
};

export function canTransition(from: SessionState, to: SessionState): boolean {
  return TRANSITIONS[from].includes(to);
}

export function isTerminalState(state: SessionState): boolean {
  return TRANSITIONS[state].length === 0;
}

export class DownloadStateMachine {
  private current: SessionState = STATE.PLANNING;
  private listeners: Array<(from: SessionState, to: SessionState) => void> = [];

  public get state(): SessionState {
    return this.current;
  }

  public onTransition(listener: (from: SessionState, to: SessionState) => void): void {
    this.listeners.push(listener);
  }

  public transition(to: SessionState): void {
    const from = this.current;
    if (!canTransition(from, to)) {
      throw new Error(`Invalid download state transition: ${from} -> ${to}`);
    }
    this.current = to;
    for (const listener of this.listeners) {
      listener(from, to);
    }
  }
}
