import { randomUUID } from 'node:crypto';
import {
  communityAnalysisResultSchema,
  geocodingResultSchema,
  internResultSchema,
  localDiscoveryResultSchema,
  negotiatorResultSchema,
  proberResultSchema,
  researchResultSchema,
  scopingResultSchema,
  type Listing,
  type WorkerKind,
  type WorkerReply,
  type WorkerResults
} from '../workers/contracts.js';
import type { OutstandingRequest, PropertyRecord, Resolution, Session } from '../types.js';

type SucceededReply = {
  [K in WorkerKind]: { kind: K; request: OutstandingRequest; ok: true; result: WorkerResults[K] };
}[WorkerKind];

export interface FailedReply {
  kind: WorkerKind;
  request: OutstandingRequest;
  ok: false;
  error: string;
  expired: boolean;
}

export type SettledRequest = SucceededReply | FailedReply;

export type ReplyOutcome =
  | { status: 'applied'; settled: SettledRequest }
  | { status: 'duplicate' }
  | { status: 'stale' };

export function failure(request: OutstandingRequest, error: string, expired = false): FailedReply {
  return { kind: request.kind, request, ok: false, error, expired };
}

function invalidResult(request: OutstandingRequest, issues: string): FailedReply {
  return failure(request, `Invalid ${request.kind} result: ${issues}`);
}

function parseResult(request: OutstandingRequest, raw: unknown): SettledRequest {
  switch (request.kind) {
    case 'scoping': {
      const parsed = scopingResultSchema.safeParse(raw);
      return parsed.success ? { kind: 'scoping', request, ok: true, result: parsed.data } : invalidResult(request, parsed.error.message);
    }
    case 'research': {
      const parsed = researchResultSchema.safeParse(raw);
      return parsed.success ? { kind: 'research', request, ok: true, result: parsed.data } : invalidResult(request, parsed.error.message);
    }
    case 'intern': {
      const parsed = internResultSchema.safeParse(raw);
      return parsed.success ? { kind: 'intern', request, ok: true, result: parsed.data } : invalidResult(request, parsed.error.message);
    }
    case 'geocoding': {
      const parsed = geocodingResultSchema.safeParse(raw);
      return parsed.success ? { kind: 'geocoding', request, ok: true, result: parsed.data } : invalidResult(request, parsed.error.message);
    }
    case 'localDiscovery': {
      const parsed = localDiscoveryResultSchema.safeParse(raw);
      return parsed.success
        ? { kind: 'localDiscovery', request, ok: true, result: parsed.data }
        : invalidResult(request, parsed.error.message);
    }
    case 'communityAnalysis': {
      const parsed = communityAnalysisResultSchema.safeParse(raw);
      return parsed.success
        ? { kind: 'communityAnalysis', request, ok: true, result: parsed.data }
        : invalidResult(request, parsed.error.message);
    }
    case 'prober': {
      const parsed = proberResultSchema.safeParse(raw);
      return parsed.success ? { kind: 'prober', request, ok: true, result: parsed.data } : invalidResult(request, parsed.error.message);
    }
    case 'negotiator': {
      const parsed = negotiatorResultSchema.safeParse(raw);
      return parsed.success
        ? { kind: 'negotiator', request, ok: true, result: parsed.data }
        : invalidResult(request, parsed.error.message);
    }
  }
}

export function resolveRequest(session: Session, correlationId: string, resolution: Resolution): OutstandingRequest | undefined {
  const request = session.outstanding.get(correlationId);
  if (!request) return undefined;
  session.outstanding.delete(correlationId);
  session.resolved.set(correlationId, { resolution, turn: request.turn });
  return request;
}

/**
 * Correlates a reply with its outstanding request. A second delivery of the
 * same correlation id finds nothing outstanding and changes nothing.
 */
export function acceptReply(session: Session, reply: WorkerReply): ReplyOutcome {
  const request = session.outstanding.get(reply.correlationId);
  if (!request) {
    return session.resolved.has(reply.correlationId) ? { status: 'duplicate' } : { status: 'stale' };
  }

  const settled = reply.ok ? parseResult(request, reply.result) : failure(request, reply.error);
  resolveRequest(session, request.correlationId, settled.ok ? 'succeeded' : 'failed');
  return { status: 'applied', settled };
}

export function expireRequest(session: Session, correlationId: string): FailedReply | undefined {
  const request = resolveRequest(session, correlationId, 'expired');
  return request ? failure(request, 'Timed out waiting for reply', true) : undefined;
}

export function expireAll(session: Session): OutstandingRequest[] {
  const expired = [...session.outstanding.values()];
  for (const request of expired) resolveRequest(session, request.correlationId, 'expired');
  return expired;
}

export function retireAll(session: Session): OutstandingRequest[] {
  const retired = [...session.outstanding.values()];
  for (const request of retired) resolveRequest(session, request.correlationId, 'retired');
  return retired;
}

export function createPropertyRecords(session: Session, listings: readonly Listing[], maxProperties: number): PropertyRecord[] {
  const resultSetId = randomUUID();
  const records = listings.slice(0, maxProperties).map((listing, index) => ({ index, resultSetId, listing }));
  session.resultSetId = resultSetId;
  session.properties = records;
  return records;
}

function targetRecord(session: Session, request: OutstandingRequest): PropertyRecord | undefined {
  if (request.target.scope !== 'property') return undefined;
  if (request.resultSetId !== session.resultSetId) return undefined;
  return session.properties[request.target.index];
}

/**
 * Writes a property-scoped result into its record. Failed enrichments leave
 * the field absent. Returns the record written, if any.
 */
export function applyToRecord(session: Session, settled: SettledRequest): PropertyRecord | undefined {
  if (!settled.ok) return undefined;
  const record = targetRecord(session, settled.request);
  if (!record) return undefined;

  switch (settled.kind) {
    case 'geocoding':
      record.coordinates = {
        latitude: settled.result.latitude,
        longitude: settled.result.longitude,
        ...(settled.result.address ? { address: settled.result.address } : {})
      };
      return record;
    case 'localDiscovery':
      record.pois = settled.result.pois;
      return record;
    case 'communityAnalysis':
      record.community = settled.result;
      return record;
    case 'prober':
      record.leverage = settled.result;
      return record;
    default:
      return undefined;
  }
}

/**
 * Completion predicate for ENRICHING: nothing left outstanding, or the
 * enrichment window has closed.
 */
export function isEnrichmentComplete(session: Session, now: number): boolean {
  if (session.phase !== 'ENRICHING' || session.finalizedThisTurn) return false;
  if (session.outstanding.size === 0) return true;
  return session.enrichmentDeadline !== undefined && now >= session.enrichmentDeadline;
}

export function hasOutstanding(session: Session, kind: WorkerKind): boolean {
  for (const request of session.outstanding.values()) {
    if (request.kind === kind) return true;
  }
  return false;
}
