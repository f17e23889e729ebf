import { describe, expect, it } from 'vitest';
import { InvalidTransitionError } from '../src/errors.js';
import { createSession } from '../src/orchestrator/sessionStore.js';
import { beginTurn, canTransition, transition } from '../src/orchestrator/stateMachine.js';

describe('session state machine', () => {
  it('allows the search path and its short cuts', () => {
    expect(canTransition('COLLECTING_REQUIREMENTS', 'COLLECTING_REQUIREMENTS')).toBe(true);
    expect(canTransition('COLLECTING_REQUIREMENTS', 'SEARCHING')).toBe(true);
    expect(canTransition('COLLECTING_REQUIREMENTS', 'FINALIZED')).toBe(true);
    expect(canTransition('SEARCHING', 'ENRICHING')).toBe(true);
    expect(canTransition('SEARCHING', 'FINALIZED')).toBe(true);
    expect(canTransition('ENRICHING', 'FINALIZED')).toBe(true);
  });

  it('rejects skipping ahead or going backwards', () => {
    expect(canTransition('COLLECTING_REQUIREMENTS', 'ENRICHING')).toBe(false);
    expect(canTransition('ENRICHING', 'SEARCHING')).toBe(false);
    expect(canTransition('FINALIZED', 'SEARCHING')).toBe(false);

    const session = createSession('s1', 0, []);
    expect(() => transition(session, 'ENRICHING')).toThrow(InvalidTransitionError);
    expect(session.phase).toBe('COLLECTING_REQUIREMENTS');
  });

  it('starts a new turn from FINALIZED', () => {
    const session = createSession('s1', 0, []);
    transition(session, 'SEARCHING');
    transition(session, 'ENRICHING');
    session.dispatchedThisTurn.add('geocoding:0');
    session.enrichmentDeadline = 30_000;
    transition(session, 'FINALIZED');
    session.finalizedThisTurn = true;

    beginTurn(session, 'ENRICHING');

    expect(session).toMatchObject({ phase: 'ENRICHING', turn: 2, finalizedThisTurn: false });
    expect(session.dispatchedThisTurn.size).toBe(0);
    expect(session.enrichmentDeadline).toBeUndefined();
  });

  it('forgets resolutions from before the previous turn', () => {
    const session = createSession('s1', 0, []);
    session.resolved.set('c1', { resolution: 'succeeded', turn: 1 });
    transition(session, 'FINALIZED');

    beginTurn(session, 'COLLECTING_REQUIREMENTS');
    session.resolved.set('c2', { resolution: 'expired', turn: 2 });
    expect([...session.resolved.keys()]).toEqual(['c1', 'c2']);

    transition(session, 'FINALIZED');
    beginTurn(session, 'COLLECTING_REQUIREMENTS');

    expect(session.turn).toBe(3);
    expect([...session.resolved.keys()]).toEqual(['c2']);
  });

  it('cannot begin a turn mid-search', () => {
    const session = createSession('s1', 0, []);
    transition(session, 'SEARCHING');

    expect(() => beginTurn(session, 'COLLECTING_REQUIREMENTS')).toThrow('Invalid session transition SEARCHING -> COLLECTING_REQUIREMENTS');
    expect(session.turn).toBe(1);
  });
});
