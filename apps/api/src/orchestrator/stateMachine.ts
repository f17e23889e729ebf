import { InvalidTransitionError } from '../errors.js';
import type { Session, SessionPhase } from '../types.js';

const TRANSITIONS: Record<SessionPhase, readonly SessionPhase[]> = {
  // Self-loop while clarifying; FINALIZED directly for general questions.
  COLLECTING_REQUIREMENTS: ['COLLECTING_REQUIREMENTS', 'SEARCHING', 'FINALIZED'],
  // FINALIZED directly when the search fails or finds nothing.
  SEARCHING: ['ENRICHING', 'FINALIZED'],
  ENRICHING: ['FINALIZED'],
  FINALIZED: ['COLLECTING_REQUIREMENTS', 'ENRICHING']
};

export function canTransition(from: SessionPhase, to: SessionPhase): boolean {
  return TRANSITIONS[from].includes(to);
}

export function transition(session: Session, to: SessionPhase): void {
  if (!canTransition(session.phase, to)) {
    throw new InvalidTransitionError(session.phase, to);
  }
  session.phase = to;
}

/**
 * Re-enters the machine from FINALIZED for the next user turn. Clears the
 * single-fire flag and the per-turn dispatch ledger, and forgets resolutions
 * older than the previous turn; replies for those read as stale. Outstanding
 * requests must already have been retired by the caller.
 */
export function beginTurn(session: Session, to: 'COLLECTING_REQUIREMENTS' | 'ENRICHING'): void {
  transition(session, to);
  session.turn += 1;
  session.finalizedThisTurn = false;
  session.dispatchedThisTurn.clear();
  session.enrichmentDeadline = undefined;
  for (const [correlationId, resolved] of session.resolved) {
    if (resolved.turn < session.turn - 1) session.resolved.delete(correlationId);
  }
}
