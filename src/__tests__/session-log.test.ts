import { describe, it, expect, beforeEach } from 'vitest';
import { NoActiveSceneError, StorageFailureError } from '../errors.js';
import { SessionLog, SessionLogOptions } from '../log/sessionLog.js';
import type { Session } from '../log/types.js';
import { MemorySessionStore } from '../storage/memoryStore.js';
import type { SessionStore } from '../storage/types.js';

function testOptions(): SessionLogOptions {
  let clock = 0;
  const counters = { session: 0, scene: 0, event: 0 };
  return {
    now: () => new Date(Date.UTC(2024, 0, 1, 0, 0, clock++)),
    generateId: (kind) => `${kind}-${++counters[kind]}`
  };
}

class FlakyStore implements SessionStore {
  readonly inner = new MemorySessionStore();
  failures = 0;

  load(sessionId: string): Session | undefined {
    return this.inner.load(sessionId);
  }

  save(session: Session): void {
    if (this.failures > 0) {
      this.failures--;
      throw new Error('disk full');
    }
    this.inner.save(session);
  }

  list(): string[] {
    return this.inner.list();
  }
}

describe('SessionLog', () => {
  let log: SessionLog;

  beforeEach(() => {
    log = SessionLog.create({ ...testOptions(), sessionId: 'campaign' });
  });

  it('refuses to log events before a scene starts', () => {
    expect(() => log.logEvent('narration', null, { text: 'Dawn breaks.' })).toThrow(NoActiveSceneError);
    try {
      log.logEvent('narration', null, { text: 'Dawn breaks.' });
    } catch (e) {
      expect(e).toBeInstanceOf(NoActiveSceneError);
      if (e instanceof NoActiveSceneError) {
        expect(e.code).toBe('NO_ACTIVE_SCENE');
        expect(e.message).toBe('Cannot log event: no active scene. Start a scene first.');
      }
    }
  });

  it('refuses to end a scene when none is active', () => {
    expect(() => log.endScene()).toThrow('Cannot end scene: no active scene. Start a scene first.');
  });

  it('appends events in order and returns their ids', () => {
    log.startScene({ title: 'Tavern', location: 'Inn' });
    const ids = [
      log.logEvent('narration', null, { text: 'The fire crackles.' }),
      log.logEvent('player_action', 'Aria', { text: 'I order an ale.' }),
      log.logEvent('npc_dialogue', 'Barkeep', { text: 'Two coppers.', listener: 'Aria' })
    ];
    expect(ids).toEqual(['event-1', 'event-2', 'event-3']);
    expect(Array.from(log.queryEvents()).map((e) => e.id)).toEqual(ids);
  });

  it('keeps exactly one active scene and freezes the previous one', () => {
    const first = log.startScene({ title: 'Road' });
    log.logEvent('narration', null, { text: 'Rain.' });
    log.endScene('They walked.');
    const second = log.startScene({ title: 'Gate' });
    log.logEvent('narration', null, { text: 'Guards.' });

    expect(log.scenes.filter((s) => s.active).map((s) => s.id)).toEqual([second]);
    const previous = log.getScene(first);
    expect(previous?.active).toBe(false);
    expect(previous?.endedAt).toBe('2024-01-01T00:00:03.000Z');
    expect(previous?.summary).toBe('They walked.');
    expect(previous?.events).toHaveLength(1);
    expect(Object.isFrozen(previous?.events[0])).toBe(true);
  });

  it('seals the events and participants of an ended scene', () => {
    const first = log.startScene({ title: 'Road', participants: ['Aria'] });
    log.logEvent('narration', null, { text: 'Rain.' });
    expect(Object.isFrozen(log.activeScene?.events)).toBe(false);
    log.endScene();

    const ended = log.getScene(first);
    expect(Object.isFrozen(ended?.events)).toBe(true);
    expect(Object.isFrozen(ended?.participants)).toBe(true);
    log.recordSummary(first, 'They walked.');
    expect(log.getScene(first)?.summary).toBe('They walked.');
    expect(log.getScene(first)?.events).toHaveLength(1);
  });

  it('ends the active scene without a summary when a new one starts', () => {
    const first = log.startScene({ title: 'Road' });
    log.startScene({ title: 'Gate' });
    expect(log.getScene(first)).toMatchObject({ active: false, summary: null });
    expect(log.getScene(first)?.endedAt).not.toBeNull();
    expect(log.activeScene?.title).toBe('Gate');
  });

  it('tracks participants without duplicates', () => {
    log.startScene({ participants: ['Aria', 'Bram', 'Aria'] });
    log.logEvent('npc_action', 'Cole', { text: 'Cole waves.' });
    log.logEvent('player_action', 'Aria', { text: 'Aria waves back.' });
    log.logEvent('system', null, { text: 'Initiative reset.' });
    expect(log.activeScene?.participants).toEqual(['Aria', 'Bram', 'Cole']);
  });

  it('keeps unknown payload fields in extensions', () => {
    log.startScene();
    log.logEvent('npc_dialogue', 'Barkeep', { text: 'Hm.', extensions: { mood: 'wry' } });
    expect(log.activeScene?.events[0].payload).toEqual({ text: 'Hm.', extensions: { mood: 'wry' } });
  });

  it('rejects payloads that do not match the event type', () => {
    log.startScene();
    const payload = JSON.parse('{"txt":"missing text"}');
    expect(() => log.logEvent('narration', null, payload)).toThrow(TypeError);
    expect(log.activeScene?.events).toHaveLength(0);
  });

  it('rejects extension fields that shadow known payload fields', () => {
    log.startScene();
    expect(() => log.logEvent('narration', null, { text: 'real', extensions: { text: 'shadow' } })).toThrow(
      /^Invalid narration event: .*\/payload\/extensions/
    );
    expect(() =>
      log.logEvent('npc_dialogue', 'Ghost', { text: 'Hush.', extensions: { listener: 'Aria', mood: 'cold' } })
    ).toThrow(TypeError);
    expect(log.activeScene?.events).toHaveLength(0);
  });

  it('does not share payload objects with the caller', () => {
    log.startScene();
    const payload = { path: 'party.gold', next: { amount: 5 } };
    log.logEvent('state_change', null, payload);
    payload.next.amount = 50;
    const [event] = Array.from(log.queryEvents({ type: 'state_change' }));
    expect(event.payload).toEqual({ path: 'party.gold', next: { amount: 5 } });
  });

  describe('queryEvents', () => {
    let sceneA: string;
    let sceneB: string;

    beforeEach(() => {
      sceneA = log.startScene({ title: 'A' });
      log.logEvent('narration', null, { text: 'one' });
      log.logEvent('player_action', 'Aria', { text: 'two' });
      sceneB = log.startScene({ title: 'B' });
      log.logEvent('player_action', 'Bram', { text: 'three' });
      log.logEvent('system', null, { text: 'four' });
    });

    const texts = (events: Iterable<{ payload: object }>) =>
      Array.from(events).map((e) => ('text' in e.payload ? e.payload.text : null));

    it('filters by type', () => {
      expect(texts(log.queryEvents({ type: 'player_action' }))).toEqual(['two', 'three']);
      expect(texts(log.queryEvents({ type: ['narration', 'system'] }))).toEqual(['one', 'four']);
    });

    it('filters by actor, including the null actor', () => {
      expect(texts(log.queryEvents({ actor: 'Bram' }))).toEqual(['three']);
      expect(texts(log.queryEvents({ actor: null }))).toEqual(['one', 'four']);
    });

    it('filters by scene', () => {
      expect(texts(log.queryEvents({ sceneId: sceneA }))).toEqual(['one', 'two']);
      expect(texts(log.queryEvents({ sceneId: sceneB }))).toEqual(['three', 'four']);
    });

    it('filters by an inclusive time range', () => {
      const all = Array.from(log.queryEvents());
      const range = { from: all[1].timestamp, to: new Date(all[2].timestamp) };
      expect(texts(log.queryEvents({ timeRange: range }))).toEqual(['two', 'three']);
    });

    it('can be iterated more than once', () => {
      const query = log.queryEvents({ type: 'player_action' });
      expect(texts(query)).toEqual(texts(query));
    });
  });

  describe('recordSummary', () => {
    it('attaches a summary to an ended scene once', () => {
      const id = log.startScene();
      log.endScene();
      log.recordSummary(id, 'A quiet night.');
      expect(log.getScene(id)?.summary).toBe('A quiet night.');
      expect(() => log.recordSummary(id, 'Another.')).toThrow(`Scene ${id} already has a summary`);
    });

    it('rejects active and unknown scenes', () => {
      const id = log.startScene();
      expect(() => log.recordSummary(id, 'Too early.')).toThrow(RangeError);
      expect(() => log.recordSummary('scene-99', 'Nope.')).toThrow('Unknown scene scene-99');
    });
  });

  it('reports stats', () => {
    log.startScene({ title: 'A', location: 'Hill' });
    log.logEvent('narration', null, { text: 'one' });
    log.logEvent('narration', null, { text: 'two' });
    log.startScene({ title: 'B' });
    log.logEvent('system', null, { text: 'three' });

    const stats = log.getStats();
    expect(stats.sessionId).toBe('campaign');
    expect(stats.sceneCount).toBe(2);
    expect(stats.eventCount).toBe(3);
    expect(stats.activeSceneId).toBe('scene-2');
    expect(stats.eventTypes).toEqual({ narration: 2, system: 1 });
    expect(stats.scenes).toEqual([
      { id: 'scene-1', title: 'A', location: 'Hill', eventCount: 2, active: false },
      { id: 'scene-2', title: 'B', location: '', eventCount: 1, active: true }
    ]);
  });

  it('hands out frozen snapshots detached from the log', () => {
    log.startScene();
    log.logEvent('narration', null, { text: 'one' });
    const snap = log.snapshot();
    log.logEvent('narration', null, { text: 'two' });
    expect(Object.isFrozen(snap)).toBe(true);
    expect(snap.scenes[0].events).toHaveLength(1);
    expect(log.activeScene?.events).toHaveLength(2);
  });
});

describe('SessionLog persistence', () => {
  it('saves after every mutation and reopens from the store', () => {
    const store = new MemorySessionStore();
    const log = SessionLog.open(store, 'saga', testOptions());
    expect(store.list()).toEqual([]);
    log.startScene({ title: 'Harbor' });
    log.logEvent('narration', null, { text: 'Gulls.' });
    expect(store.list()).toEqual(['saga']);

    const reopened = SessionLog.open(store, 'saga', testOptions());
    expect(reopened.snapshot()).toEqual(log.snapshot());
  });

  it('hands back frozen events after a reload', () => {
    const store = new MemorySessionStore();
    const log = SessionLog.open(store, 'saga', testOptions());
    const first = log.startScene({ title: 'Harbor', participants: ['Aria'] });
    log.logEvent('narration', null, { text: 'Gulls.' });
    log.endScene();
    log.startScene({ title: 'Docks' });

    const reopened = SessionLog.open(store, 'saga', testOptions());
    const [event] = Array.from(reopened.queryEvents());
    expect(Object.isFrozen(event)).toBe(true);
    expect(Object.isFrozen(event.payload)).toBe(true);
    expect(Reflect.set(event.payload, 'text', 'rewritten')).toBe(false);
    expect(event.payload).toEqual({ text: 'Gulls.' });
    expect(Object.isFrozen(reopened.getScene(first)?.events)).toBe(true);
    expect(Object.isFrozen(reopened.getScene(first)?.participants)).toBe(true);
    expect(Object.isFrozen(reopened.activeScene?.events)).toBe(false);
  });

  it('freezes events of a session handed to the constructor', () => {
    const session: Session = {
      id: 'loose',
      createdAt: '2024-01-01T00:00:00.000Z',
      activeSceneIndex: null,
      scenes: [
        {
          id: 'scene-1',
          title: 'Crypt',
          location: '',
          participants: [],
          startedAt: '2024-01-01T00:00:00.000Z',
          endedAt: '2024-01-01T00:10:00.000Z',
          summary: null,
          active: false,
          events: [
            {
              id: 'event-1',
              timestamp: '2024-01-01T00:01:00.000Z',
              type: 'system',
              actor: null,
              payload: { text: 'Torches gutter.' },
              metadata: {}
            }
          ]
        }
      ]
    };
    const log = new SessionLog(session);
    const [event] = Array.from(log.queryEvents());
    expect(Object.isFrozen(event.payload)).toBe(true);
    expect(Object.isFrozen(log.getScene('scene-1')?.events)).toBe(true);
  });

  it('keeps the change in memory and marks the log dirty when a save fails', () => {
    const store = new FlakyStore();
    const log = SessionLog.create({ ...testOptions(), store, sessionId: 'saga' });
    log.startScene();
    store.failures = 1;

    let failure: unknown;
    try {
      log.logEvent('narration', null, { text: 'Thunder.' });
    } catch (e) {
      failure = e;
    }
    expect(failure).toBeInstanceOf(StorageFailureError);
    if (failure instanceof StorageFailureError) {
      expect(failure.appliedId).toBe('event-1');
      expect(failure.sessionId).toBe('saga');
      expect(failure.message).toBe('Failed to save session saga: disk full');
    }
    expect(log.isDirty).toBe(true);
    expect(log.activeScene?.events.map((e) => e.id)).toEqual(['event-1']);
    expect(store.inner.load('saga')?.scenes[0].events).toHaveLength(0);

    log.flush();
    expect(log.isDirty).toBe(false);
    expect(store.inner.load('saga')?.scenes[0].events).toHaveLength(1);
  });

  it('leaves saving to the caller when auto-save is off', () => {
    const store = new MemorySessionStore();
    const log = SessionLog.create({ ...testOptions(), store, autoSave: false, sessionId: 'manual' });
    log.startScene();
    expect(log.isDirty).toBe(true);
    expect(store.list()).toEqual([]);
    log.flush();
    expect(store.list()).toEqual(['manual']);
  });

  it('opens a fresh session when no id is given', () => {
    const store = new MemorySessionStore();
    const log = SessionLog.open(store, undefined, testOptions());
    expect(log.id).toBe('session-1');
    log.startScene();
    expect(store.list()).toEqual(['session-1']);
  });

  it('wraps load errors', () => {
    const store = new MemorySessionStore();
    store.load = () => {
      throw new Error('unreadable');
    };
    expect(() => SessionLog.open(store, 'saga')).toThrow('Failed to load session saga: unreadable');
  });
});
