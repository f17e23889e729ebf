import type { SessionPhase } from './types.js';
import type { WorkerKind } from './workers/contracts.js';

export type CoordinatorErrorCode = 'SESSION_NOT_FOUND' | 'INVALID_TRANSITION' | 'WORKER_UNAVAILABLE';

export class CoordinatorError extends Error {
  readonly code: CoordinatorErrorCode;

  constructor(code: CoordinatorErrorCode, message: string) {
    super(message);
    this.name = new.target.name;
    this.code = code;
  }
}

// A correlated reply whose session is gone points at a correlation bug, not a worker failure.
export class SessionNotFoundError extends CoordinatorError {
  readonly sessionId: string;

  constructor(sessionId: string) {
    super('SESSION_NOT_FOUND', `Session ${sessionId} not found`);
    this.sessionId = sessionId;
  }
}

export class InvalidTransitionError extends CoordinatorError {
  constructor(from: SessionPhase, to: SessionPhase) {
    super('INVALID_TRANSITION', `Invalid session transition ${from} -> ${to}`);
  }
}

export class WorkerUnavailableError extends CoordinatorError {
  readonly kind: WorkerKind;

  constructor(kind: WorkerKind, detail?: string) {
    super('WORKER_UNAVAILABLE', detail ? `Worker ${kind} unavailable: ${detail}` : `Worker ${kind} unavailable`);
    this.kind = kind;
  }
}

export function errorMessage(err: unknown): string {
  if (err instanceof Error) return err.message;
  return String(err);
}
