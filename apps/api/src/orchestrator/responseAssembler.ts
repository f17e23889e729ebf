import type { CommunityAnalysisResult, CommunityStory } from '../workers/contracts.js';
import type {
  CompositeCommentary,
  CompositeResponse,
  CompositeResponseKind,
  MapComposition,
  PropertyRecord,
  PropertySummary,
  Session
} from '../types.js';

const MAX_STORIES = 3;
const MAX_POIS = 5;

function deepFreeze<T>(value: T): T {
  if (typeof value === 'object' && value !== null && !Object.isFrozen(value)) {
    Object.freeze(value);
    for (const nested of Object.values(value)) deepFreeze(nested);
  }
  return value;
}

export function toPropertySummary(record: PropertyRecord): PropertySummary {
  const { listing } = record;
  return {
    index: record.index,
    marker: record.index + 1,
    address: listing.address,
    ...(listing.title !== undefined ? { title: listing.title } : {}),
    ...(listing.price !== undefined ? { price: listing.price } : {}),
    ...(listing.link !== undefined ? { link: listing.link } : {}),
    images: [...listing.images],
    ...(listing.beds !== undefined ? { beds: listing.beds } : {}),
    ...(listing.baths !== undefined ? { baths: listing.baths } : {}),
    ...(listing.sqft !== undefined ? { sqft: listing.sqft } : {}),
    ...(record.coordinates ? { coordinates: { ...record.coordinates } } : {}),
    ...(record.pois ? { pois: [...record.pois] } : {}),
    ...(record.community ? { community: record.community } : {}),
    ...(record.leverage ? { leverage: record.leverage } : {})
  };
}

/** Distinct community analyses in property order, keyed by location. */
function collectCommunities(records: readonly PropertyRecord[]): CommunityAnalysisResult[] {
  const seen = new Map<string, CommunityAnalysisResult>();
  for (const record of records) {
    const community = record.community;
    if (!community) continue;
    const key = community.location.trim().toLowerCase();
    if (!seen.has(key)) seen.set(key, community);
  }
  return [...seen.values()];
}

function buildCommentary(session: Session, records: readonly PropertyRecord[]): CompositeCommentary {
  return {
    ...(session.commentary.answer ? { answer: session.commentary.answer } : {}),
    communities: collectCommunities(records),
    ...(session.commentary.negotiation ? { negotiation: session.commentary.negotiation } : {})
  };
}

function formatStory(story: CommunityStory): string {
  if (typeof story === 'string') return `- ${story}`;
  const lines = [`- **${story.title ?? 'News'}**`];
  if (story.summary) lines.push(`  ${story.summary}`);
  if (story.url) lines.push(`  [Read more](${story.url})`);
  return lines.join('\n');
}

function renderProperty(summary: PropertySummary): string {
  const lines = [`## Property ${summary.marker}`, '', `### ${summary.title ?? summary.address}`, ''];

  const image = summary.images[0];
  if (image) lines.push(`![Property Image](${image})`, '');
  if (summary.price !== undefined) lines.push(`**Price:** ${summary.price}`, '');

  const details = [
    summary.beds !== undefined ? `${summary.beds} beds` : undefined,
    summary.baths !== undefined ? `${summary.baths} baths` : undefined,
    summary.sqft !== undefined ? `${summary.sqft} sqft` : undefined
  ].filter((d): d is string => typeof d === 'string');
  if (details.length > 0) lines.push(`**Details:** ${details.join(' | ')}`, '');

  if (summary.coordinates) {
    lines.push(`**Coordinates:** ${summary.coordinates.latitude}, ${summary.coordinates.longitude}`, '');
  }
  if (summary.pois && summary.pois.length > 0) {
    const nearby = summary.pois.slice(0, MAX_POIS).map((poi) => `${poi.name} (${poi.category})`);
    lines.push(`**Nearby:** ${nearby.join(', ')}`, '');
  }
  if (summary.community?.overallScore !== undefined) {
    lines.push(`**Community Score:** ${summary.community.overallScore}/10`, '');
  }
  if (summary.leverage) {
    const assessment = summary.leverage.overallAssessment ? ` (${summary.leverage.overallAssessment})` : '';
    lines.push(`**Negotiation Leverage:** ${summary.leverage.leverageScore}/10${assessment}`, '');
  }
  if (summary.link) lines.push(`**Listing:** ${summary.link}`, '');

  lines.push('---', '');
  return lines.join('\n');
}

function renderCommunity(community: CommunityAnalysisResult): string {
  const lines = [`## Community Analysis: ${community.location}`, ''];
  if (community.overallScore !== undefined) lines.push(`**Overall Score:** ${community.overallScore}/10`, '');
  if (community.overallExplanation) lines.push(`**Overview:** ${community.overallExplanation}`, '');
  if (community.safetyScore !== undefined) lines.push(`**Safety Score:** ${community.safetyScore}/10`, '');
  if (community.schoolRating !== undefined) {
    lines.push(`**School Rating:** ${community.schoolRating}/10`);
    if (community.schoolExplanation) lines.push(`*${community.schoolExplanation}*`);
    lines.push('');
  }
  if (community.housingPricePerSquareFoot !== undefined) {
    lines.push(`**Housing Price per Sqft:** $${community.housingPricePerSquareFoot}`, '');
  }
  if (community.averageHouseSizeSquareFoot !== undefined) {
    lines.push(`**Average House Size:** ${community.averageHouseSizeSquareFoot} sqft`, '');
  }
  if (community.positiveStories.length > 0) {
    lines.push('**Positive Highlights:**', '', ...community.positiveStories.slice(0, MAX_STORIES).map(formatStory), '');
  }
  if (community.negativeStories.length > 0) {
    lines.push('**Considerations:**', '', ...community.negativeStories.slice(0, MAX_STORIES).map(formatStory), '');
  }
  return lines.join('\n');
}

export function renderResponseText(response: Omit<CompositeResponse, 'text'>): string {
  if (response.kind === 'answer') {
    return response.commentary.answer ?? '';
  }

  const parts = ['# Property Search Results', ''];
  if (response.summary) parts.push(`**${response.summary}**`, '');

  if (response.kind === 'no_results') {
    parts.push('No properties matched your criteria. Try widening your budget or location.', '');
    return parts.join('\n');
  }

  parts.push(`Found **${response.totalFound}** properties matching your criteria.`, '');

  if (response.map?.url) {
    parts.push('## Map View', '', `![Properties Map](${response.map.url})`, '');
    parts.push('*Numbered markers correspond to properties listed below*', '');
  }
  parts.push('---', '');

  for (const property of response.properties) parts.push(renderProperty(property));
  for (const community of response.commentary.communities) parts.push(renderCommunity(community));

  if (response.commentary.negotiation) {
    parts.push('## Negotiation Summary', '', response.commentary.negotiation.summary, '');
  }

  return parts.join('\n');
}

/**
 * Builds the turn's CompositeResponse from what the session holds right now.
 * The result is frozen.
 */
export function assembleResponse(params: {
  session: Session;
  kind: CompositeResponseKind;
  map: MapComposition | null;
  now: number;
}): CompositeResponse {
  const { session, kind } = params;
  const records = kind === 'results' ? session.properties : [];
  const properties = records.map(toPropertySummary);

  const base: Omit<CompositeResponse, 'text'> = {
    sessionId: session.id,
    turn: session.turn,
    kind,
    ...(session.commentary.searchSummary && kind !== 'answer' ? { summary: session.commentary.searchSummary } : {}),
    totalFound: kind === 'results' ? session.commentary.totalFound ?? properties.length : 0,
    properties,
    map: kind === 'results' ? params.map : null,
    commentary: buildCommentary(session, records),
    createdAt: new Date(params.now).toISOString()
  };

  return deepFreeze({ ...base, text: renderResponseText(base) });
}
