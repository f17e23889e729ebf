import type {
  CommunityAnalysisResult,
  EnrichmentKind,
  Listing,
  NegotiatorResult,
  PointOfInterest,
  ProberResult,
  Requirements,
  WorkerKind
} from './workers/contracts.js';

export const SESSION_PHASES = ['COLLECTING_REQUIREMENTS', 'SEARCHING', 'ENRICHING', 'FINALIZED'] as const;

export type SessionPhase = (typeof SESSION_PHASES)[number];

export type RequirementField = 'budget' | 'location' | 'bedrooms' | 'bathrooms';

export interface Coordinates {
  latitude: number;
  longitude: number;
  address?: string;
}

export interface PropertyRecord {
  index: number; // 0-based, also the map marker (index + 1)
  resultSetId: string;
  listing: Listing;

  coordinates?: Coordinates;
  pois?: PointOfInterest[];
  community?: CommunityAnalysisResult;
  leverage?: ProberResult;
}

export type RequestTarget = { scope: 'session' } | { scope: 'property'; index: number };

export interface OutstandingRequest {
  correlationId: string;
  kind: WorkerKind;
  target: RequestTarget;
  turn: number;
  resultSetId?: string;
  dispatchedAt: number;
  deadline: number;
}

export type Resolution = 'succeeded' | 'failed' | 'expired' | 'retired';

export interface ResolvedRequest {
  resolution: Resolution;
  turn: number;
}

export interface RefineRequest {
  enrichments?: EnrichmentKind[];
  indices?: number[];
}

export interface UserTurn {
  text: string;
  enrichments?: EnrichmentKind[];
  refine?: RefineRequest;
}

export interface SessionCommentary {
  searchSummary?: string;
  totalFound?: number;
  answer?: string;
  negotiation?: NegotiatorResult;
}

export interface Session {
  id: string;
  phase: SessionPhase;
  turn: number;
  finalizedThisTurn: boolean;

  requirements: Requirements;
  communityName?: string;
  enrichments: EnrichmentKind[];

  resultSetId?: string;
  properties: PropertyRecord[];
  commentary: SessionCommentary;

  outstanding: Map<string, OutstandingRequest>;
  resolved: Map<string, ResolvedRequest>;
  dispatchedThisTurn: Set<string>;
  enrichmentDeadline?: number;

  pendingTurns: UserTurn[];
  lastResponse?: CompositeResponse;

  createdAt: number;
  lastActivityAt: number;
}

export interface MapMarker {
  index: number;
  label: string;
  color: string;
  latitude: number;
  longitude: number;
}

export interface MapComposition {
  markers: readonly MapMarker[];
  url?: string;
}

export interface PropertySummary {
  index: number;
  marker: number;
  address: string;
  title?: string;
  price?: string | number;
  link?: string;
  images: readonly string[];
  beds?: number;
  baths?: number;
  sqft?: number;

  coordinates?: Coordinates;
  pois?: readonly PointOfInterest[];
  community?: CommunityAnalysisResult;
  leverage?: ProberResult;
}

export type CompositeResponseKind = 'results' | 'no_results' | 'answer';

export interface CompositeCommentary {
  answer?: string;
  communities: readonly CommunityAnalysisResult[];
  negotiation?: NegotiatorResult;
}

export interface CompositeResponse {
  sessionId: string;
  turn: number;
  kind: CompositeResponseKind;
  summary?: string;
  totalFound: number;
  properties: readonly PropertySummary[];
  map: MapComposition | null;
  commentary: CompositeCommentary;
  text: string;
  createdAt: string; // ISO
}

export type OutboundMessage =
  | { type: 'status'; sessionId: string; text: string; at: string }
  | { type: 'clarification'; sessionId: string; text: string; missing: RequirementField[]; at: string }
  | { type: 'response'; sessionId: string; response: CompositeResponse; at: string };

export interface SessionSnapshot {
  id: string;
  phase: SessionPhase;
  turn: number;
  requirements: Requirements;
  resultSetId?: string;
  properties: PropertySummary[];
  outstanding: number;
  queued: number;
  createdAt: string; // ISO
  lastActivityAt: string; // ISO
}
