export type LifecyclePhase = 'running' | 'draining' | 'stopped';

export type LifecycleState = {
  phase: LifecyclePhase;
  /** ISO time the current phase began. */
  since: string;
  signal: string | null;
};

let state: LifecycleState = { phase: 'running', since: new Date().toISOString(), signal: null };

/** Moves running → draining. Returns false when a shutdown is already under way. */
export function beginDrain(signal: string): boolean {
  if (state.phase !== 'running') return false;
  state = { phase: 'draining', since: new Date().toISOString(), signal };
  return true;
}

export function markStopped(): void {
  state = { ...state, phase: 'stopped', since: new Date().toISOString() };
}

export function lifecycleState(): LifecycleState {
  return { ...state };
}
