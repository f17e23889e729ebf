import { InMemoryOutbox } from '../src/channels/outbox.js';
import type { CoordinatorConfig } from '../src/env.js';
import { WorkerUnavailableError } from '../src/errors.js';
import { Coordinator } from '../src/orchestrator/coordinator.js';
import type { TurnArchive } from '../src/repositories/turnRepository.js';
import type { CompositeResponse, OutboundMessage } from '../src/types.js';
import type { WorkerHandle, WorkerDirectory } from '../src/workers/directory.js';
import type { Listing, WorkerKind, WorkerReply, WorkerRequest } from '../src/workers/contracts.js';

export function testConfig(overrides: Partial<CoordinatorConfig> = {}): CoordinatorConfig {
  return {
    enrichmentWindowMs: 30_000,
    requestTimeoutMs: 30_000,
    retryLimit: 1,
    retryBackoffMs: 500,
    enrichments: ['localDiscovery', 'communityAnalysis', 'prober', 'negotiator'],
    maxProperties: 5,
    sessionIdleTtlMs: 30 * 60 * 1000,
    sweepIntervalMs: 60_000,
    map: { accessToken: 'test-token', style: 'mapbox/streets-v12' },
    ...overrides
  };
}

/** Records every request handed to a worker; can be told to fail sends. */
export class FakeDirectory implements WorkerDirectory {
  readonly sent: WorkerRequest[] = [];
  readonly attempts: WorkerKind[] = [];
  private readonly failures = new Map<WorkerKind, number>();
  private readonly missing = new Set<WorkerKind>();

  failSends(kind: WorkerKind, times: number): void {
    this.failures.set(kind, times);
  }

  unregister(kind: WorkerKind): void {
    this.missing.add(kind);
  }

  resolve(kind: WorkerKind): WorkerHandle | undefined {
    if (this.missing.has(kind)) return undefined;
    return {
      send: async (request) => {
        this.attempts.push(kind);
        const remaining = this.failures.get(kind) ?? 0;
        if (remaining > 0) {
          this.failures.set(kind, remaining - 1);
          throw new WorkerUnavailableError(kind, 'connection refused');
        }
        this.sent.push(request);
      }
    };
  }

  ofKind<K extends WorkerKind>(kind: K): WorkerRequest<K>[] {
    return this.sent.filter((r): r is WorkerRequest<K> => r.kind === kind);
  }

  last<K extends WorkerKind>(kind: K): WorkerRequest<K> {
    const requests = this.ofKind(kind);
    const request = requests[requests.length - 1];
    if (!request) throw new Error(`no ${kind} request was sent`);
    return request;
  }

  forProperty<K extends WorkerKind>(kind: K, index: number): WorkerRequest<K> {
    const request = this.ofKind(kind).find((r) => r.propertyIndex === index);
    if (!request) throw new Error(`no ${kind} request was sent for property ${index}`);
    return request;
  }
}

export function ok(request: WorkerRequest, result: unknown): WorkerReply {
  return { correlationId: request.correlationId, sessionId: request.sessionId, ok: true, result };
}

export function failed(request: WorkerRequest, error: string): WorkerReply {
  return { correlationId: request.correlationId, sessionId: request.sessionId, ok: false, error };
}

export function sequentialIds(prefix = 'req'): () => string {
  let next = 0;
  return () => {
    next += 1;
    return `${prefix}-${next}`;
  };
}

export function makeHarness(
  params: { config?: Partial<CoordinatorConfig>; archive?: TurnArchive; now?: () => number } = {}
) {
  const directory = new FakeDirectory();
  const outbox = new InMemoryOutbox();
  const coordinator = new Coordinator({
    config: testConfig(params.config),
    directory,
    channel: outbox,
    archive: params.archive,
    now: params.now,
    createId: sequentialIds()
  });
  return { directory, outbox, coordinator };
}

export function responsesOf(outbox: InMemoryOutbox, sessionId: string): CompositeResponse[] {
  return outbox.list(sessionId).flatMap((m: OutboundMessage) => (m.type === 'response' ? [m.response] : []));
}

export function lastResponse(outbox: InMemoryOutbox, sessionId: string): CompositeResponse {
  const responses = responsesOf(outbox, sessionId);
  const response = responses[responses.length - 1];
  if (!response) throw new Error(`no response for ${sessionId}`);
  return response;
}

export function textsOf(outbox: InMemoryOutbox, sessionId: string, type: 'status' | 'clarification'): string[] {
  return outbox.list(sessionId).flatMap((m) => (m.type !== 'response' && m.type === type ? [m.text] : []));
}

export const COMPLETE_SCOPING = {
  isComplete: true,
  requirements: {
    budget: { max: 650000 },
    location: 'Austin, TX',
    bedrooms: 3,
    bathrooms: 2
  }
};

export function listings(count: number): Listing[] {
  return Array.from({ length: count }, (_, i) => ({
    address: `${100 + i} Oak St, Austin, TX`,
    title: `Home ${i + 1}`,
    price: 500000 + i * 10000,
    link: `https://listings.example/${i + 1}`,
    images: [],
    beds: 3,
    baths: 2
  }));
}

const COORDINATES = [
  { latitude: 30.27, longitude: -97.74 },
  { latitude: 30.28, longitude: -97.75 },
  { latitude: 30.29, longitude: -97.76 },
  { latitude: 30.3, longitude: -97.77 },
  { latitude: 30.31, longitude: -97.78 }
];

export function coordinatesFor(index: number): { latitude: number; longitude: number } {
  const coordinates = COORDINATES[index];
  if (!coordinates) throw new Error(`no test coordinates for property ${index}`);
  return coordinates;
}
