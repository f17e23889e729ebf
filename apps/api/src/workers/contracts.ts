import { z } from 'zod';

export const WORKER_KINDS = [
  'scoping',
  'research',
  'intern',
  'geocoding',
  'localDiscovery',
  'communityAnalysis',
  'prober',
  'negotiator'
] as const;

export type WorkerKind = (typeof WORKER_KINDS)[number];

// Optional per-turn enrichments. Geocoding always runs and is not listed here.
export const ENRICHMENT_KINDS = ['localDiscovery', 'communityAnalysis', 'prober', 'negotiator'] as const;

export type EnrichmentKind = (typeof ENRICHMENT_KINDS)[number];

export const enrichmentKindSchema = z.enum(ENRICHMENT_KINDS);

// --- Requirements -----------------------------------------------------------

export const budgetSchema = z.object({
  min: z.number().nonnegative().optional(),
  max: z.number().positive().optional()
});

export const requirementsSchema = z.object({
  budget: budgetSchema.optional(),
  location: z.string().trim().min(1).optional(),
  bedrooms: z.number().int().nonnegative().optional(),
  bathrooms: z.number().nonnegative().optional(),
  propertyType: z.string().trim().min(1).optional()
});

export type Budget = z.infer<typeof budgetSchema>;
export type Requirements = z.infer<typeof requirementsSchema>;

export interface CompleteRequirements extends Requirements {
  budget: Budget;
  location: string;
  bedrooms: number;
  bathrooms: number;
}

// --- Worker results ---------------------------------------------------------

export const scopingResultSchema = z.object({
  isComplete: z.boolean(),
  requirements: requirementsSchema.optional(),
  agentMessage: z.string().optional(),
  isGeneralQuestion: z.boolean().optional(),
  generalQuestion: z.string().optional(),
  communityName: z.string().trim().min(1).optional()
});

export const listingSchema = z.object({
  address: z.string().trim().min(1),
  title: z.string().optional(),
  price: z.union([z.number(), z.string()]).optional(),
  link: z.string().optional(),
  images: z.array(z.string()).default([]),
  beds: z.number().optional(),
  baths: z.number().optional(),
  sqft: z.number().optional()
});

export const researchResultSchema = z.object({
  listings: z.array(listingSchema),
  searchSummary: z.string().optional(),
  totalFound: z.number().int().nonnegative().optional()
});

export const internResultSchema = z.object({
  answer: z.string().min(1)
});

export const geocodingResultSchema = z.object({
  latitude: z.number().min(-90).max(90),
  longitude: z.number().min(-180).max(180),
  address: z.string().optional()
});

export const pointOfInterestSchema = z.object({
  name: z.string(),
  category: z.string(),
  latitude: z.number(),
  longitude: z.number(),
  address: z.string().optional(),
  distanceMeters: z.number().optional()
});

export const localDiscoveryResultSchema = z.object({
  pois: z.array(pointOfInterestSchema)
});

const storySchema = z.union([
  z.string(),
  z.object({
    title: z.string().optional(),
    summary: z.string().optional(),
    url: z.string().optional()
  })
]);

export const communityAnalysisResultSchema = z.object({
  location: z.string(),
  overallScore: z.number().optional(),
  overallExplanation: z.string().optional(),
  safetyScore: z.number().optional(),
  schoolRating: z.number().optional(),
  schoolExplanation: z.string().optional(),
  housingPricePerSquareFoot: z.number().optional(),
  averageHouseSizeSquareFoot: z.number().optional(),
  positiveStories: z.array(storySchema).default([]),
  negativeStories: z.array(storySchema).default([])
});

export const leverageFindingSchema = z.object({
  category: z.string(),
  summary: z.string(),
  leverageScore: z.number(),
  details: z.string().optional(),
  sourceUrl: z.string().optional()
});

export const proberResultSchema = z.object({
  findings: z.array(leverageFindingSchema).default([]),
  overallAssessment: z.string().optional(),
  leverageScore: z.number()
});

export const negotiatorResultSchema = z.object({
  summary: z.string().min(1),
  callId: z.string().optional(),
  status: z.string().optional()
});

export type ScopingResult = z.infer<typeof scopingResultSchema>;
export type Listing = z.infer<typeof listingSchema>;
export type ResearchResult = z.infer<typeof researchResultSchema>;
export type InternResult = z.infer<typeof internResultSchema>;
export type GeocodingResult = z.infer<typeof geocodingResultSchema>;
export type PointOfInterest = z.infer<typeof pointOfInterestSchema>;
export type LocalDiscoveryResult = z.infer<typeof localDiscoveryResultSchema>;
export type CommunityStory = z.infer<typeof storySchema>;
export type CommunityAnalysisResult = z.infer<typeof communityAnalysisResultSchema>;
export type LeverageFinding = z.infer<typeof leverageFindingSchema>;
export type ProberResult = z.infer<typeof proberResultSchema>;
export type NegotiatorResult = z.infer<typeof negotiatorResultSchema>;

export interface WorkerResults {
  scoping: ScopingResult;
  research: ResearchResult;
  intern: InternResult;
  geocoding: GeocodingResult;
  localDiscovery: LocalDiscoveryResult;
  communityAnalysis: CommunityAnalysisResult;
  prober: ProberResult;
  negotiator: NegotiatorResult;
}

// --- Requests ---------------------------------------------------------------

export interface NegotiationCandidate {
  index: number;
  address: string;
  leverageScore: number;
  overallAssessment?: string;
}

export interface WorkerPayloads {
  scoping: { userMessage: string; requirements: Requirements };
  research: { requirements: CompleteRequirements };
  intern: { question: string };
  geocoding: { address: string };
  localDiscovery: { latitude: number; longitude: number };
  communityAnalysis: { location: string };
  prober: { address: string; price?: string | number; link?: string };
  negotiator: { properties: NegotiationCandidate[] };
}

export interface WorkerRequest<K extends WorkerKind = WorkerKind> {
  correlationId: string;
  sessionId: string;
  kind: K;
  propertyIndex?: number;
  payload: WorkerPayloads[K];
}

// --- Replies ----------------------------------------------------------------

const replyBase = {
  correlationId: z.string().trim().min(1),
  sessionId: z.string().trim().min(1),
  sender: z.string().optional()
};

export const workerReplySchema = z.discriminatedUnion('ok', [
  z.object({ ...replyBase, ok: z.literal(true), result: z.unknown() }),
  z.object({ ...replyBase, ok: z.literal(false), error: z.string().min(1) })
]);

export type WorkerReply = z.infer<typeof workerReplySchema>;
