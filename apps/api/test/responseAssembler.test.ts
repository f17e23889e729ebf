import { describe, expect, it } from 'vitest';
import { createPropertyRecords } from '../src/orchestrator/aggregator.js';
import { composeMap } from '../src/orchestrator/mapComposer.js';
import { assembleResponse } from '../src/orchestrator/responseAssembler.js';
import { createSession } from '../src/orchestrator/sessionStore.js';
import type { Session } from '../src/types.js';

const NOW = Date.parse('2026-03-01T12:00:00.000Z');

function sessionWithResults(): Session {
  const session = createSession('s1', 0, []);
  session.phase = 'FINALIZED';
  createPropertyRecords(
    session,
    [
      {
        address: '100 Oak St, Austin, TX',
        title: 'Bungalow on Oak',
        price: '$525,000',
        link: 'https://listings.example/1',
        images: ['https://img.example/1.jpg'],
        beds: 3,
        baths: 2,
        sqft: 1500
      },
      { address: '200 Elm St, Austin, TX', images: [] }
    ],
    5
  );
  session.commentary = { searchSummary: 'Two homes in Austin', totalFound: 14 };
  return session;
}

describe('assembleResponse', () => {
  it('renders every property, the map and the commentary', () => {
    const session = sessionWithResults();
    const [first, second] = session.properties;
    if (!first || !second) throw new Error('expected records');
    first.coordinates = { latitude: 30.27, longitude: -97.74 };
    first.pois = [{ name: 'Zilker Park', category: 'park', latitude: 30.26, longitude: -97.77 }];
    first.leverage = { findings: [], overallAssessment: 'Price cut twice', leverageScore: 7 };
    first.community = {
      location: 'Travis Heights',
      overallScore: 8,
      positiveStories: ['New library opened'],
      negativeStories: []
    };
    second.community = first.community;
    session.commentary.negotiation = { summary: 'Offer 5% under asking.' };

    const map = composeMap(session.properties, { accessToken: 'test-token', style: 'mapbox/streets-v12' });
    const response = assembleResponse({ session, kind: 'results', map, now: NOW });

    expect(response.totalFound).toBe(14);
    expect(response.createdAt).toBe('2026-03-01T12:00:00.000Z');
    expect(response.commentary.communities).toHaveLength(1);
    expect(response.text).toBe(
      [
        '# Property Search Results',
        '',
        '**Two homes in Austin**',
        '',
        'Found **14** properties matching your criteria.',
        '',
        '## Map View',
        '',
        `![Properties Map](${map?.url ?? ''})`,
        '',
        '*Numbered markers correspond to properties listed below*',
        '',
        '---',
        '',
        '## Property 1',
        '',
        '### Bungalow on Oak',
        '',
        '![Property Image](https://img.example/1.jpg)',
        '',
        '**Price:** $525,000',
        '',
        '**Details:** 3 beds | 2 baths | 1500 sqft',
        '',
        '**Coordinates:** 30.27, -97.74',
        '',
        '**Nearby:** Zilker Park (park)',
        '',
        '**Community Score:** 8/10',
        '',
        '**Negotiation Leverage:** 7/10 (Price cut twice)',
        '',
        '**Listing:** https://listings.example/1',
        '',
        '---',
        '',
        '## Property 2',
        '',
        '### 200 Elm St, Austin, TX',
        '',
        '**Community Score:** 8/10',
        '',
        '---',
        '',
        '## Community Analysis: Travis Heights',
        '',
        '**Overall Score:** 8/10',
        '',
        '**Positive Highlights:**',
        '',
        '- New library opened',
        '',
        '## Negotiation Summary',
        '',
        'Offer 5% under asking.',
        ''
      ].join('\n')
    );
  });

  it('leaves properties and the map out of an answer', () => {
    const session = sessionWithResults();
    session.commentary = { answer: 'Closing costs are usually 2-5%.' };

    const response = assembleResponse({ session, kind: 'answer', map: null, now: NOW });

    expect(response).toMatchObject({
      kind: 'answer',
      totalFound: 0,
      properties: [],
      map: null,
      text: 'Closing costs are usually 2-5%.',
      commentary: { answer: 'Closing costs are usually 2-5%.', communities: [] }
    });
    expect(response.summary).toBeUndefined();
  });

  it('freezes the response', () => {
    const response = assembleResponse({ session: sessionWithResults(), kind: 'results', map: null, now: NOW });

    expect(Object.isFrozen(response)).toBe(true);
    expect(Object.isFrozen(response.commentary.communities)).toBe(true);
    expect(Object.isFrozen(response.properties[0]?.images)).toBe(true);
  });
});
