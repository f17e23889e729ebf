import { z } from 'zod';
import { ENRICHMENT_KINDS, enrichmentKindSchema, type EnrichmentKind, type WorkerKind } from './workers/contracts.js';

// dotenv leaves `KEY=` as an empty string; treat it as unset.
function optional<T extends z.ZodTypeAny>(schema: T) {
  return z.preprocess((v) => (v === '' ? undefined : v), schema.optional());
}

const booleanFlag = z
  .preprocess((v) => (v === '' ? undefined : v), z.enum(['true', 'false', '1', '0']).default('false'))
  .transform((v) => v === 'true' || v === '1');

const enrichmentList = z
  .string()
  .default(ENRICHMENT_KINDS.join(','))
  .transform((value) =>
    value
      .split(',')
      .map((v) => v.trim())
      .filter(Boolean)
  )
  .pipe(z.array(enrichmentKindSchema));

const envSchema = z.object({
  PORT: z.coerce.number().int().positive().default(4000),
  CORS_ORIGIN: z.string().optional(),
  COORDINATOR_PUBLIC_URL: optional(z.string().url()),

  ENRICHMENT_WINDOW_MS: z.coerce.number().int().positive().default(30_000),
  REQUEST_TIMEOUT_MS: optional(z.coerce.number().int().positive()),
  DISPATCH_RETRY_LIMIT: z.coerce.number().int().min(0).default(1),
  DISPATCH_RETRY_BACKOFF_MS: z.coerce.number().int().min(0).default(500),
  ENRICHMENTS: enrichmentList,
  MAX_PROPERTIES: z.coerce.number().int().min(1).max(99).default(5),
  SESSION_IDLE_TTL_MS: z.coerce.number().int().positive().default(30 * 60 * 1000),
  SESSION_SWEEP_INTERVAL_MS: z.coerce.number().int().positive().default(60 * 1000),

  MAPBOX_ACCESS_TOKEN: optional(z.string()),
  MAPBOX_STYLE: z.string().min(1).default('mapbox/streets-v12'),

  WORKER_SCOPING_URL: optional(z.string().url()),
  WORKER_RESEARCH_URL: optional(z.string().url()),
  WORKER_INTERN_URL: optional(z.string().url()),
  WORKER_GEOCODING_URL: optional(z.string().url()),
  WORKER_LOCAL_DISCOVERY_URL: optional(z.string().url()),
  WORKER_COMMUNITY_ANALYSIS_URL: optional(z.string().url()),
  WORKER_PROBER_URL: optional(z.string().url()),
  WORKER_NEGOTIATOR_URL: optional(z.string().url()),

  TURN_ARCHIVE_ENABLED: booleanFlag,
  FIREBASE_PROJECT_ID: z.string().optional(),
  FIREBASE_SERVICE_ACCOUNT_JSON: z.string().optional(),
  FIREBASE_SERVICE_ACCOUNT_PATH: z.string().optional()
});

export type Env = z.infer<typeof envSchema>;

export function getEnv(): Env {
  const parsed = envSchema.safeParse(process.env);
  if (!parsed.success) {
    throw new Error(`Invalid environment variables: ${parsed.error.message}`);
  }
  return parsed.data;
}

export interface CoordinatorConfig {
  enrichmentWindowMs: number;
  requestTimeoutMs: number;
  retryLimit: number;
  retryBackoffMs: number;
  enrichments: EnrichmentKind[];
  maxProperties: number;
  sessionIdleTtlMs: number;
  sweepIntervalMs: number;
  map: { accessToken?: string; style: string };
}

export function getCoordinatorConfig(env: Env = getEnv()): CoordinatorConfig {
  return {
    enrichmentWindowMs: env.ENRICHMENT_WINDOW_MS,
    requestTimeoutMs: env.REQUEST_TIMEOUT_MS ?? env.ENRICHMENT_WINDOW_MS,
    retryLimit: env.DISPATCH_RETRY_LIMIT,
    retryBackoffMs: env.DISPATCH_RETRY_BACKOFF_MS,
    enrichments: [...new Set(env.ENRICHMENTS)],
    maxProperties: env.MAX_PROPERTIES,
    sessionIdleTtlMs: env.SESSION_IDLE_TTL_MS,
    sweepIntervalMs: env.SESSION_SWEEP_INTERVAL_MS,
    map: { accessToken: env.MAPBOX_ACCESS_TOKEN, style: env.MAPBOX_STYLE }
  };
}

export function getWorkerEndpoints(env: Env = getEnv()): Partial<Record<WorkerKind, string>> {
  return {
    scoping: env.WORKER_SCOPING_URL,
    research: env.WORKER_RESEARCH_URL,
    intern: env.WORKER_INTERN_URL,
    geocoding: env.WORKER_GEOCODING_URL,
    localDiscovery: env.WORKER_LOCAL_DISCOVERY_URL,
    communityAnalysis: env.WORKER_COMMUNITY_ANALYSIS_URL,
    prober: env.WORKER_PROBER_URL,
    negotiator: env.WORKER_NEGOTIATOR_URL
  };
}

export function getReplyToUrl(env: Env = getEnv()): string {
  const base = env.COORDINATOR_PUBLIC_URL ?? `http://localhost:${env.PORT}`;
  return new URL('/v1/replies', base).toString();
}
