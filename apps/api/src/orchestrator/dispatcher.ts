import { randomUUID } from 'node:crypto';
import { WorkerUnavailableError, errorMessage } from '../errors.js';
import type { WorkerDirectory } from '../workers/directory.js';
import type {
  CompleteRequirements,
  EnrichmentKind,
  NegotiationCandidate,
  WorkerKind,
  WorkerPayloads,
  WorkerRequest
} from '../workers/contracts.js';
import type { OutstandingRequest, PropertyRecord, RequestTarget, Session } from '../types.js';
import { hasOutstanding } from './aggregator.js';

export interface DispatcherOptions {
  directory: WorkerDirectory;
  retryLimit: number;
  retryBackoffMs: number;
  requestTimeoutMs: number;
  now: () => number;
  createId?: () => string;
  /** Whether the request still awaits a reply; retries stop once it does not. */
  isOutstanding: (request: WorkerRequest) => boolean;
  onDispatchFailure: (request: WorkerRequest, error: unknown) => Promise<void>;
}

export interface Dispatch {
  request: WorkerRequest;
  outstanding: OutstandingRequest;
}

export interface EnrichmentPlan {
  enrichments: readonly EnrichmentKind[];
  indices?: readonly number[];
  /** Skip fields a record already holds (follow-up turns). */
  onlyMissing?: boolean;
}

export function requestKey(kind: WorkerKind, target: RequestTarget): string {
  return target.scope === 'property' ? `${kind}:${target.index}` : `${kind}:session`;
}

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

/**
 * Decides which workers to invoke and hands requests to them. Registration is
 * synchronous and happens on the session's serialized path; delivery is
 * fire-and-forget with a bounded retry.
 */
export class Dispatcher {
  private readonly createId: () => string;

  constructor(private readonly options: DispatcherOptions) {
    this.createId = options.createId ?? randomUUID;
  }

  /**
   * Registers an OutstandingRequest unless one of the same kind is already
   * unresolved for the same target. Apart from scoping, a kind goes out at
   * most once per target per turn.
   */
  register<K extends WorkerKind>(session: Session, kind: K, target: RequestTarget, payload: WorkerPayloads[K]): Dispatch | null {
    const key = requestKey(kind, target);
    for (const pending of session.outstanding.values()) {
      if (requestKey(pending.kind, pending.target) === key) return null;
    }
    if (kind !== 'scoping' && session.dispatchedThisTurn.has(key)) return null;

    const now = this.options.now();
    const outstanding: OutstandingRequest = {
      correlationId: this.createId(),
      kind,
      target,
      turn: session.turn,
      ...(target.scope === 'property' && session.resultSetId ? { resultSetId: session.resultSetId } : {}),
      dispatchedAt: now,
      deadline: now + this.options.requestTimeoutMs
    };
    session.outstanding.set(outstanding.correlationId, outstanding);
    session.dispatchedThisTurn.add(key);

    const request: WorkerRequest<K> = {
      correlationId: outstanding.correlationId,
      sessionId: session.id,
      kind,
      ...(target.scope === 'property' ? { propertyIndex: target.index } : {}),
      payload
    };
    return { request, outstanding };
  }

  planScoping(session: Session, userMessage: string): Dispatch[] {
    const dispatch = this.register(session, 'scoping', { scope: 'session' }, { userMessage, requirements: session.requirements });
    return dispatch ? [dispatch] : [];
  }

  planResearch(session: Session, requirements: CompleteRequirements): Dispatch[] {
    const dispatch = this.register(session, 'research', { scope: 'session' }, { requirements });
    return dispatch ? [dispatch] : [];
  }

  planIntern(session: Session, question: string): Dispatch[] {
    const dispatch = this.register(session, 'intern', { scope: 'session' }, { question });
    return dispatch ? [dispatch] : [];
  }

  planEnrichment(session: Session, plan: EnrichmentPlan): Dispatch[] {
    const enabled = new Set(plan.enrichments);
    const wanted = plan.indices ? new Set(plan.indices) : undefined;
    const dispatches: Dispatch[] = [];
    const push = (dispatch: Dispatch | null) => {
      if (dispatch) dispatches.push(dispatch);
    };

    for (const record of session.properties) {
      if (wanted && !wanted.has(record.index)) continue;
      const target: RequestTarget = { scope: 'property', index: record.index };
      const address = record.listing.address;

      if (!plan.onlyMissing || !record.coordinates) {
        push(this.register(session, 'geocoding', target, { address }));
      } else if (enabled.has('localDiscovery') && !record.pois) {
        dispatches.push(...this.planLocalDiscovery(session, record, plan.enrichments));
      }
      if (enabled.has('communityAnalysis') && (!plan.onlyMissing || !record.community)) {
        push(this.register(session, 'communityAnalysis', target, { location: session.communityName ?? address }));
      }
      if (enabled.has('prober') && (!plan.onlyMissing || !record.leverage)) {
        push(
          this.register(session, 'prober', target, {
            address,
            ...(record.listing.price !== undefined ? { price: record.listing.price } : {}),
            ...(record.listing.link !== undefined ? { link: record.listing.link } : {})
          })
        );
      }
    }

    dispatches.push(...this.planNegotiation(session, plan.enrichments));
    return dispatches;
  }

  /** POI discovery needs coordinates, so it follows a successful geocode. */
  planLocalDiscovery(session: Session, record: PropertyRecord, enrichments: readonly EnrichmentKind[]): Dispatch[] {
    if (!enrichments.includes('localDiscovery') || !record.coordinates) return [];
    const dispatch = this.register(
      session,
      'localDiscovery',
      { scope: 'property', index: record.index },
      { latitude: record.coordinates.latitude, longitude: record.coordinates.longitude }
    );
    return dispatch ? [dispatch] : [];
  }

  /**
   * The negotiator sees every leverage finding of the turn, so it waits until
   * no prober request is outstanding and at least one produced findings.
   */
  planNegotiation(session: Session, enrichments: readonly EnrichmentKind[]): Dispatch[] {
    if (!enrichments.includes('negotiator') || session.commentary.negotiation) return [];
    if (hasOutstanding(session, 'prober')) return [];

    const candidates: NegotiationCandidate[] = session.properties.flatMap((record) =>
      record.leverage
        ? [
            {
              index: record.index,
              address: record.listing.address,
              leverageScore: record.leverage.leverageScore,
              ...(record.leverage.overallAssessment ? { overallAssessment: record.leverage.overallAssessment } : {})
            }
          ]
        : []
    );
    if (candidates.length === 0) return [];

    const dispatch = this.register(session, 'negotiator', { scope: 'session' }, { properties: candidates });
    return dispatch ? [dispatch] : [];
  }

  async deliver(request: WorkerRequest): Promise<void> {
    const handle = this.options.directory.resolve(request.kind);
    if (!handle) {
      // Nothing to retry against without an endpoint.
      await this.options.onDispatchFailure(request, new WorkerUnavailableError(request.kind, 'no endpoint registered'));
      return;
    }

    for (let attempt = 0; ; attempt += 1) {
      if (!this.options.isOutstanding(request)) return;

      try {
        await handle.send(request);
        return;
      } catch (err) {
        const context = {
          sessionId: request.sessionId,
          correlationId: request.correlationId,
          kind: request.kind,
          attempt: attempt + 1,
          error: errorMessage(err)
        };

        if (attempt >= this.options.retryLimit) {
          console.warn('[dispatch] giving up on request', context);
          await this.options.onDispatchFailure(request, err);
          return;
        }

        console.warn('[dispatch] send failed, retrying', context);
        await sleep(this.options.retryBackoffMs * 2 ** attempt);
      }
    }
  }
}
