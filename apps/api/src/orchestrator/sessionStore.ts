import type { EnrichmentKind } from '../workers/contracts.js';
import type { Session } from '../types.js';

export function createSession(id: string, now: number, enrichments: readonly EnrichmentKind[]): Session {
  return {
    id,
    phase: 'COLLECTING_REQUIREMENTS',
    turn: 1,
    finalizedThisTurn: false,
    requirements: {},
    enrichments: [...enrichments],
    properties: [],
    commentary: {},
    outstanding: new Map(),
    resolved: new Map(),
    dispatchedThisTurn: new Set(),
    pendingTurns: [],
    createdAt: now,
    lastActivityAt: now
  };
}

/**
 * Process-lifetime session map. Work for one session runs strictly in order
 * through `run`; different sessions never wait on each other.
 */
export class SessionStore {
  private readonly sessions = new Map<string, Session>();
  private readonly queues = new Map<string, Promise<void>>();

  get(sessionId: string): Session | undefined {
    return this.sessions.get(sessionId);
  }

  set(session: Session): void {
    this.sessions.set(session.id, session);
  }

  delete(sessionId: string): boolean {
    return this.sessions.delete(sessionId);
  }

  ids(): string[] {
    return [...this.sessions.keys()];
  }

  get size(): number {
    return this.sessions.size;
  }

  run<T>(sessionId: string, task: () => T | Promise<T>): Promise<T> {
    const previous = this.queues.get(sessionId) ?? Promise.resolve();
    const result = previous.then(task);

    const release = () => {
      if (this.queues.get(sessionId) === tail) this.queues.delete(sessionId);
    };
    const tail: Promise<void> = result.then(release, release);
    this.queues.set(sessionId, tail);

    return result;
  }

  async idle(): Promise<void> {
    await Promise.all([...this.queues.values()]);
  }
}
