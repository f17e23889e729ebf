import { SessionNotFoundError, errorMessage } from '../errors.js';
import type { CoordinatorConfig } from '../env.js';
import type { UserChannel } from '../channels/outbox.js';
import type { TurnArchive } from '../repositories/turnRepository.js';
import type { WorkerDirectory } from '../workers/directory.js';
import type { WorkerReply, WorkerRequest } from '../workers/contracts.js';
import type {
  CompositeResponse,
  CompositeResponseKind,
  OutboundMessage,
  OutstandingRequest,
  RefineRequest,
  Session,
  SessionPhase,
  SessionSnapshot,
  UserTurn
} from '../types.js';
import {
  acceptReply,
  applyToRecord,
  createPropertyRecords,
  expireAll,
  expireRequest,
  failure,
  isEnrichmentComplete,
  resolveRequest,
  retireAll,
  type FailedReply,
  type SettledRequest
} from './aggregator.js';
import { Dispatcher, type Dispatch } from './dispatcher.js';
import { composeMap } from './mapComposer.js';
import { clarifyingQuestion, isComplete, mergeRequirements, missingRequirements } from './requirements.js';
import { assembleResponse, toPropertySummary } from './responseAssembler.js';
import { SessionStore, createSession } from './sessionStore.js';
import { beginTurn, transition } from './stateMachine.js';

export interface CoordinatorOptions {
  config: CoordinatorConfig;
  directory: WorkerDirectory;
  channel: UserChannel;
  archive?: TurnArchive;
  now?: () => number;
  createId?: () => string;
}

export type SubmitStatus = 'accepted' | 'queued';

export interface SubmitResult {
  sessionId: string;
  status: SubmitStatus;
  phase: SessionPhase;
}

export type ReplyStatus = 'applied' | 'duplicate' | 'stale';

type Settled<K extends SettledRequest['kind']> = Extract<SettledRequest, { kind: K; ok: true }> | FailedReply;

const STATUS_TEXT = {
  processing: 'Processing your request...',
  searching: 'Searching for properties...',
  answering: 'Answering your question...',
  refining: 'Updating your results...',
  queued: 'Still working on your previous request. I will get to your new message next.'
} as const;

const SCOPING_FAILED_TEXT = 'Sorry, I could not process that just now. Could you describe what you are looking for again?';
const INTERN_FAILED_TEXT = 'Sorry, I am unable to answer that question at the moment.';

/**
 * Orchestrates worker agents for each user session. Every mutation of a
 * session happens inside `SessionStore.run`, so replies, timeouts and user
 * messages for one session are applied one at a time.
 */
export class Coordinator {
  private readonly store = new SessionStore();
  private readonly dispatcher: Dispatcher;
  private readonly config: CoordinatorConfig;
  private readonly channel: UserChannel;
  private readonly archive?: TurnArchive;
  private readonly now: () => number;

  private readonly requestTimers = new Map<string, NodeJS.Timeout>();
  private readonly windowTimers = new Map<string, NodeJS.Timeout>();
  private readonly background = new Set<Promise<void>>();
  private sweeper?: NodeJS.Timeout;

  constructor(options: CoordinatorOptions) {
    this.config = options.config;
    this.channel = options.channel;
    this.archive = options.archive;
    this.now = options.now ?? (() => Date.now());

    this.dispatcher = new Dispatcher({
      directory: options.directory,
      retryLimit: options.config.retryLimit,
      retryBackoffMs: options.config.retryBackoffMs,
      requestTimeoutMs: options.config.requestTimeoutMs,
      now: this.now,
      createId: options.createId,
      isOutstanding: (request) => this.store.get(request.sessionId)?.outstanding.has(request.correlationId) ?? false,
      onDispatchFailure: (request, error) => this.onDispatchFailure(request, error)
    });
  }

  // --- lifecycle ------------------------------------------------------------

  start(): void {
    if (this.sweeper) return;
    this.sweeper = setInterval(() => {
      this.track(this.sweepIdleSessions());
    }, this.config.sweepIntervalMs);
    this.sweeper.unref();
  }

  stop(): void {
    if (this.sweeper) clearInterval(this.sweeper);
    this.sweeper = undefined;
    for (const timer of this.requestTimers.values()) clearTimeout(timer);
    for (const timer of this.windowTimers.values()) clearTimeout(timer);
    this.requestTimers.clear();
    this.windowTimers.clear();
  }

  async drain(): Promise<void> {
    while (this.background.size > 0) {
      await Promise.all([...this.background]);
    }
    await this.store.idle();
  }

  // --- inbound --------------------------------------------------------------

  submitUserMessage(sessionId: string, turn: UserTurn): Promise<SubmitResult> {
    return this.store.run<SubmitResult>(sessionId, () => {
      let session = this.store.get(sessionId);
      if (!session) {
        session = createSession(sessionId, this.now(), this.config.enrichments);
        this.store.set(session);
        console.info('[sessions] session created', { sessionId });
      }
      session.lastActivityAt = this.now();

      if (this.isBusy(session)) {
        session.pendingTurns.push(turn);
        this.notify(session, STATUS_TEXT.queued);
        return { sessionId, status: 'queued', phase: session.phase };
      }

      this.startTurn(session, turn);
      return { sessionId, status: 'accepted', phase: session.phase };
    });
  }

  submitWorkerReply(reply: WorkerReply): Promise<{ status: ReplyStatus }> {
    return this.store.run<{ status: ReplyStatus }>(reply.sessionId, () => {
      const session = this.store.get(reply.sessionId);
      if (!session) {
        console.error('[coordinator] reply for unknown session', {
          sessionId: reply.sessionId,
          correlationId: reply.correlationId,
          sender: reply.sender
        });
        throw new SessionNotFoundError(reply.sessionId);
      }

      const outcome = acceptReply(session, reply);
      if (outcome.status !== 'applied') {
        console.info('[aggregate] reply ignored', {
          sessionId: session.id,
          correlationId: reply.correlationId,
          status: outcome.status
        });
        return { status: outcome.status };
      }

      this.clearRequestTimer(reply.correlationId);
      session.lastActivityAt = this.now();
      this.handleSettled(session, outcome.settled);
      return { status: 'applied' };
    });
  }

  // --- queries --------------------------------------------------------------

  getSnapshot(sessionId: string): SessionSnapshot | null {
    const session = this.store.get(sessionId);
    if (!session) return null;
    return {
      id: session.id,
      phase: session.phase,
      turn: session.turn,
      requirements: { ...session.requirements },
      ...(session.resultSetId ? { resultSetId: session.resultSetId } : {}),
      properties: session.properties.map(toPropertySummary),
      outstanding: session.outstanding.size,
      queued: session.pendingTurns.length,
      createdAt: new Date(session.createdAt).toISOString(),
      lastActivityAt: new Date(session.lastActivityAt).toISOString()
    };
  }

  getLastResponse(sessionId: string): CompositeResponse | null {
    return this.store.get(sessionId)?.lastResponse ?? null;
  }

  get sessionCount(): number {
    return this.store.size;
  }

  // --- eviction -------------------------------------------------------------

  evictSession(sessionId: string): Promise<boolean> {
    return this.store.run(sessionId, () => {
      const session = this.store.get(sessionId);
      if (!session) return false;
      this.dispose(session);
      console.info('[sessions] session evicted', { sessionId });
      return true;
    });
  }

  async sweepIdleSessions(): Promise<string[]> {
    const cutoff = this.now() - this.config.sessionIdleTtlMs;
    const evicted = await Promise.all(
      this.store.ids().map((sessionId) =>
        this.store.run(sessionId, () => {
          const session = this.store.get(sessionId);
          if (!session || this.isBusy(session) || session.lastActivityAt > cutoff) return null;
          this.dispose(session);
          return sessionId;
        })
      )
    );
    const ids = evicted.filter((id): id is string => id !== null);
    if (ids.length > 0) console.info('[sessions] evicted idle sessions', { count: ids.length });
    return ids;
  }

  private dispose(session: Session): void {
    for (const request of retireAll(session)) this.clearRequestTimer(request.correlationId);
    this.clearWindowTimer(session.id);
    this.store.delete(session.id);
    this.channel.forget(session.id);
  }

  // --- turn flow ------------------------------------------------------------

  private isBusy(session: Session): boolean {
    return session.outstanding.size > 0 || session.phase === 'SEARCHING' || session.phase === 'ENRICHING';
  }

  private startTurn(session: Session, turn: UserTurn): void {
    if (session.phase === 'FINALIZED') {
      if (turn.refine && session.properties.length > 0) {
        this.refine(session, turn, turn.refine);
        return;
      }
      beginTurn(session, 'COLLECTING_REQUIREMENTS');
      session.commentary = {};
    }

    session.enrichments = [...(turn.enrichments ?? this.config.enrichments)];
    this.notify(session, STATUS_TEXT.processing);
    this.launch(session, this.dispatcher.planScoping(session, turn.text));
  }

  private refine(session: Session, turn: UserTurn, refine: RefineRequest): void {
    beginTurn(session, 'ENRICHING');
    const { searchSummary, totalFound } = session.commentary;
    session.commentary = {
      ...(searchSummary !== undefined ? { searchSummary } : {}),
      ...(totalFound !== undefined ? { totalFound } : {}),
      ...(session.commentary.negotiation ? { negotiation: session.commentary.negotiation } : {})
    };
    session.enrichments = [...(refine.enrichments ?? turn.enrichments ?? this.config.enrichments)];

    this.openEnrichmentWindow(session);
    this.notify(session, STATUS_TEXT.refining);
    this.launch(
      session,
      this.dispatcher.planEnrichment(session, {
        enrichments: session.enrichments,
        indices: refine.indices,
        onlyMissing: true
      })
    );
    this.checkCompletion(session);
  }

  private handleSettled(session: Session, settled: SettledRequest): void {
    if (settled.request.turn !== session.turn) return;

    switch (settled.kind) {
      case 'scoping':
        this.onScoping(session, settled);
        return;
      case 'research':
        this.onResearch(session, settled);
        return;
      case 'intern':
        this.onIntern(session, settled);
        return;
      default:
        this.onEnrichment(session, settled);
    }
  }

  private onScoping(session: Session, settled: Settled<'scoping'>): void {
    if (!settled.ok) {
      console.warn('[coordinator] scoping failed', { sessionId: session.id, error: settled.error });
      this.clarify(session, SCOPING_FAILED_TEXT);
      return;
    }

    const verdict = settled.result;
    session.requirements = mergeRequirements(session.requirements, verdict.requirements);
    if (verdict.communityName) session.communityName = verdict.communityName;

    if (verdict.isGeneralQuestion && verdict.generalQuestion) {
      this.notify(session, STATUS_TEXT.answering);
      this.launch(session, this.dispatcher.planIntern(session, verdict.generalQuestion));
      return;
    }

    const requirements = session.requirements;
    if (verdict.isComplete && isComplete(requirements)) {
      transition(session, 'SEARCHING');
      this.notify(session, STATUS_TEXT.searching);
      this.launch(session, this.dispatcher.planResearch(session, requirements));
      return;
    }

    this.clarify(session, verdict.agentMessage ?? clarifyingQuestion(missingRequirements(requirements)));
  }

  private onResearch(session: Session, settled: Settled<'research'>): void {
    if (!settled.ok) {
      console.warn('[coordinator] research failed', { sessionId: session.id, error: settled.error });
      session.commentary = {};
      this.finalizeWithoutResults(session);
      return;
    }

    const { listings, searchSummary, totalFound } = settled.result;
    session.commentary = {
      ...(searchSummary !== undefined ? { searchSummary } : {}),
      totalFound: totalFound ?? listings.length
    };

    if (listings.length === 0) {
      this.finalizeWithoutResults(session);
      return;
    }

    const records = createPropertyRecords(session, listings, this.config.maxProperties);
    transition(session, 'ENRICHING');
    this.openEnrichmentWindow(session);
    this.notify(
      session,
      `Found ${session.commentary.totalFound ?? records.length} properties! Gathering location details...`
    );
    this.launch(session, this.dispatcher.planEnrichment(session, { enrichments: session.enrichments }));
    this.checkCompletion(session);
  }

  // The previous result set goes too, so a follow-up cannot refine it.
  private finalizeWithoutResults(session: Session): void {
    session.properties = [];
    session.resultSetId = undefined;
    this.finalize(session, 'no_results');
  }

  private onIntern(session: Session, settled: Settled<'intern'>): void {
    if (!settled.ok) {
      console.warn('[coordinator] intern failed', { sessionId: session.id, error: settled.error });
    }
    session.commentary = { answer: settled.ok ? settled.result.answer : INTERN_FAILED_TEXT };
    this.finalize(session, 'answer');
  }

  private onEnrichment(session: Session, settled: SettledRequest): void {
    if (session.phase !== 'ENRICHING') return;

    if (!settled.ok) {
      console.warn('[aggregate] enrichment failed', {
        sessionId: session.id,
        kind: settled.kind,
        target: settled.request.target,
        expired: settled.expired,
        error: settled.error
      });
    } else if (settled.kind === 'negotiator') {
      session.commentary.negotiation = settled.result;
    } else {
      const record = applyToRecord(session, settled);
      if (record && settled.kind === 'geocoding') {
        this.launch(session, this.dispatcher.planLocalDiscovery(session, record, session.enrichments));
      }
    }

    if (settled.kind === 'prober') {
      this.launch(session, this.dispatcher.planNegotiation(session, session.enrichments));
    }

    this.checkCompletion(session);
  }

  private clarify(session: Session, text: string): void {
    transition(session, 'COLLECTING_REQUIREMENTS');
    this.emit({
      type: 'clarification',
      sessionId: session.id,
      text,
      missing: missingRequirements(session.requirements),
      at: this.timestamp()
    });
    this.drainPending(session);
  }

  private checkCompletion(session: Session): void {
    if (isEnrichmentComplete(session, this.now())) this.finalize(session, 'results');
  }

  // Single-fire per turn.
  private finalize(session: Session, kind: CompositeResponseKind): void {
    if (session.finalizedThisTurn) return;
    session.finalizedThisTurn = true;

    const expired = expireAll(session);
    for (const request of expired) this.clearRequestTimer(request.correlationId);
    if (expired.length > 0) {
      console.warn('[aggregate] enrichment window closed with requests outstanding', {
        sessionId: session.id,
        expired: expired.map((r) => ({ kind: r.kind, target: r.target }))
      });
    }
    this.clearWindowTimer(session.id);
    transition(session, 'FINALIZED');

    const map = kind === 'results' ? composeMap(session.properties, this.config.map) : null;
    const response = assembleResponse({ session, kind, map, now: this.now() });
    session.lastResponse = response;

    this.emit({ type: 'response', sessionId: session.id, response, at: this.timestamp() });
    console.info('[coordinator] turn finalized', {
      sessionId: session.id,
      turn: session.turn,
      kind,
      properties: response.properties.length,
      markers: response.map?.markers.length ?? 0
    });

    if (this.archive) this.track(this.archiveTurn(this.archive, response));
    this.drainPending(session);
  }

  private drainPending(session: Session): void {
    const next = session.pendingTurns.shift();
    if (next) this.startTurn(session, next);
  }

  // --- dispatch & timers ----------------------------------------------------

  private launch(session: Session, dispatches: Dispatch[]): void {
    for (const { request, outstanding } of dispatches) {
      this.scheduleDeadline(session.id, outstanding);
      console.info('[dispatch] request dispatched', {
        sessionId: session.id,
        correlationId: request.correlationId,
        kind: request.kind,
        propertyIndex: request.propertyIndex
      });
      this.track(this.dispatcher.deliver(request));
    }
  }

  private onDispatchFailure(request: WorkerRequest, error: unknown): Promise<void> {
    return this.store.run(request.sessionId, () => {
      const session = this.store.get(request.sessionId);
      if (!session) return;
      const outstanding = resolveRequest(session, request.correlationId, 'failed');
      if (!outstanding) return;
      this.clearRequestTimer(request.correlationId);
      this.handleSettled(session, failure(outstanding, `Dispatch failed: ${errorMessage(error)}`));
    });
  }

  private scheduleDeadline(sessionId: string, outstanding: OutstandingRequest): void {
    const { correlationId } = outstanding;
    const delay = Math.max(0, outstanding.deadline - this.now());
    const timer = setTimeout(() => {
      this.requestTimers.delete(correlationId);
      this.track(this.store.run(sessionId, () => this.expire(sessionId, correlationId)));
    }, delay);
    this.requestTimers.set(correlationId, timer);
  }

  private expire(sessionId: string, correlationId: string): void {
    const session = this.store.get(sessionId);
    if (!session) return;
    const settled = expireRequest(session, correlationId);
    if (!settled) return;
    this.handleSettled(session, settled);
  }

  private openEnrichmentWindow(session: Session): void {
    session.enrichmentDeadline = this.now() + this.config.enrichmentWindowMs;
    const turn = session.turn;
    this.clearWindowTimer(session.id);
    const timer = setTimeout(() => {
      this.windowTimers.delete(session.id);
      this.track(
        this.store.run(session.id, () => {
          const current = this.store.get(session.id);
          if (current && current.turn === turn && current.phase === 'ENRICHING') this.finalize(current, 'results');
        })
      );
    }, this.config.enrichmentWindowMs);
    this.windowTimers.set(session.id, timer);
  }

  private clearRequestTimer(correlationId: string): void {
    const timer = this.requestTimers.get(correlationId);
    if (timer) clearTimeout(timer);
    this.requestTimers.delete(correlationId);
  }

  private clearWindowTimer(sessionId: string): void {
    const timer = this.windowTimers.get(sessionId);
    if (timer) clearTimeout(timer);
    this.windowTimers.delete(sessionId);
  }

  // --- outbound -------------------------------------------------------------

  private timestamp(): string {
    return new Date(this.now()).toISOString();
  }

  private notify(session: Session, text: string): void {
    this.emit({ type: 'status', sessionId: session.id, text, at: this.timestamp() });
  }

  private emit(message: OutboundMessage): void {
    this.channel.deliver(message);
  }

  private async archiveTurn(archive: TurnArchive, response: CompositeResponse): Promise<void> {
    try {
      await archive.recordTurn(response);
    } catch (err) {
      // Best-effort: the user already has the response.
      console.warn('[archive] failed to record turn', {
        sessionId: response.sessionId,
        turn: response.turn,
        error: errorMessage(err)
      });
    }
  }

  private track(task: Promise<unknown>): void {
    const done = () => {
      this.background.delete(tracked);
    };
    const tracked: Promise<void> = task.then(done, (err: unknown) => {
      console.error('[coordinator] background task failed', { error: errorMessage(err) });
      done();
    });
    this.background.add(tracked);
  }
}
