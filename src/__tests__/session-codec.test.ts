import { describe, it, expect } from 'vitest';
import { rollDice } from '../dice/diceRoller.js';
import { parseNotation } from '../dice/notationParser.js';
import { createSeededRandom } from '../dice/randomSource.js';
import { StorageFailureError } from '../errors.js';
import { toDiceRollPayload } from '../log/eventFormat.js';
import { SessionLog } from '../log/sessionLog.js';
import type { Session } from '../log/types.js';
import { decodeSession, deserializeSession, encodeSession, serializeSession } from '../storage/sessionCodec.js';

function buildSession(): Session {
  let clock = 0;
  let ids = 0;
  const log = SessionLog.create({
    sessionId: 'codec',
    now: () => new Date(Date.UTC(2024, 2, 1, 18, 0, clock++)),
    generateId: (kind) => `${kind}-${++ids}`
  });
  log.startScene({ title: 'Crypt', location: 'Old chapel', participants: ['Aria'] });
  log.logEvent('narration', null, { text: 'Dust hangs in the air.' });
  log.logEvent('player_action', 'Aria', { text: 'I search the altar.' });
  log.logEvent('dice_roll', 'Aria', toDiceRollPayload(rollDice(parseNotation('1d20adv+3'), createSeededRandom(5))));
  log.endScene('Aria found a key.');
  log.startScene({ title: 'Stairs' });
  log.logEvent('npc_dialogue', 'Ghost', { text: 'Leave.', listener: 'Aria', extensions: { mood: 'cold' } });
  log.logEvent('tool_call', 'narrator', { name: 'roll_dice', arguments: { notation: '2d6' }, result: { totals: [7] } });
  log.logEvent('state_change', null, { path: 'aria.hp', previous: 12, next: 9 }, { source: 'trap' });
  log.logEvent('npc_action', 'Ghost', { text: 'The ghost fades.' });
  log.logEvent('system', null, { text: 'Checkpoint.' });
  return log.snapshot();
}

describe('session codec', () => {
  it('round-trips a session with two scenes and mixed events', () => {
    const session = buildSession();
    expect(deserializeSession(serializeSession(session))).toEqual(session);
  });

  it('writes a versioned document with extensions flattened into the payload', () => {
    const doc = encodeSession(buildSession());
    expect(doc.formatVersion).toBe(1);
    expect(doc.activeSceneIndex).toBe(1);
    expect(doc.scenes[1].events[0].payload).toEqual({ mood: 'cold', text: 'Leave.', listener: 'Aria' });
    expect(doc.scenes[1].events[2].metadata).toEqual({ source: 'trap' });
  });

  it('restores unknown payload fields as extensions', () => {
    const session = decodeSession(encodeSession(buildSession()));
    expect(session.scenes[1].events[0].payload).toEqual({ text: 'Leave.', listener: 'Aria', extensions: { mood: 'cold' } });
  });

  it('decodes events frozen without freezing the source document', () => {
    const doc = encodeSession(buildSession());
    const session = decodeSession(doc);
    const event = session.scenes[1].events[1];
    expect(Object.isFrozen(event)).toBe(true);
    expect(Object.isFrozen(event.payload)).toBe(true);
    expect(Object.isFrozen(event.metadata)).toBe(true);
    expect(Object.isFrozen(doc.scenes[1].events[1].payload)).toBe(false);
  });

  it('rejects text that is not JSON', () => {
    expect(() => deserializeSession('{oops', 'broken')).toThrow(StorageFailureError);
    expect(() => deserializeSession('{oops', 'broken')).toThrow(/^Session document is not valid JSON/);
  });

  it('rejects an unsupported format version', () => {
    const doc = { ...encodeSession(buildSession()), formatVersion: 2 };
    expect(() => decodeSession(doc)).toThrow(StorageFailureError);
  });

  it('rejects an unknown event type', () => {
    const doc = encodeSession(buildSession());
    const broken = JSON.parse(JSON.stringify(doc));
    broken.scenes[0].events[0].type = 'teleport';
    expect(() => decodeSession(broken)).toThrow(/^Invalid session document/);
  });

  it('rejects a payload missing required fields', () => {
    const broken = JSON.parse(JSON.stringify(encodeSession(buildSession())));
    delete broken.scenes[0].events[2].payload.total;
    expect(() => decodeSession(broken)).toThrow(StorageFailureError);
  });

  it('rejects inconsistent active scene state', () => {
    const doc = { ...encodeSession(buildSession()), activeSceneIndex: null };
    expect(() => decodeSession(doc)).toThrow(/inconsistent active scene state/);
  });
});
