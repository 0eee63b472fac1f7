import type { StateRecord } from './state.js';

export type SessionStatus = 'fresh' | 'boundary';
export type BoundaryReason = 'first-run' | 'gap' | 'content-changed' | 'forced';

export interface SessionCheck {
  status: SessionStatus;
  reason: BoundaryReason | null;
  /** Milliseconds since the last activity, or null on first run. */
  elapsedMs: number | null;
}

export interface SessionInputs {
  now: Date;
  fingerprint: string;
  gapMs: number;
  force?: boolean;
}

/**
 * Decide whether this call starts a new session. A gap counts only when the
 * elapsed time strictly exceeds `gapMs`.
 */
export function evaluateSession(state: StateRecord, inputs: SessionInputs): SessionCheck {
  const last = state.lastActivity ? Date.parse(state.lastActivity) : NaN;
  const elapsedMs = Number.isNaN(last) ? null : inputs.now.getTime() - last;

  if (inputs.force) return { status: 'boundary', reason: 'forced', elapsedMs };
  if (elapsedMs === null) return { status: 'boundary', reason: 'first-run', elapsedMs };
  if (elapsedMs > inputs.gapMs) return { status: 'boundary', reason: 'gap', elapsedMs };
  if (state.contentFingerprint !== inputs.fingerprint) {
    return { status: 'boundary', reason: 'content-changed', elapsedMs };
  }
  return { status: 'fresh', reason: null, elapsedMs };
}

export function touchState(state: StateRecord, now: Date, fingerprint: string): StateRecord {
  return { ...state, lastActivity: now.toISOString(), contentFingerprint: fingerprint };
}
