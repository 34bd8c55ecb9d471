import { randomUUID } from 'crypto';
import { describeError, NoActiveSceneError, StorageFailureError } from '../errors.js';
import { createLogger, NAMESPACES } from '../logging.js';
import type { SessionStore } from '../storage/types.js';
import { deepFreeze } from '../utils/freeze.js';
import { formatSchemaErrors, validateSessionEvent } from './eventSchemas.js';
import {
  EventFilter,
  EventPayloadMap,
  EventType,
  isEventType,
  JsonObject,
  Scene,
  SceneView,
  Session,
  SessionEvent,
  SessionStats
} from './types.js';

const sessionLogger = createLogger(NAMESPACES.log.session);

export type IdKind = 'session' | 'scene' | 'event';

export interface SessionLogOptions {
  store?: SessionStore;
  /** Save after every mutation. Defaults to true when a store is given. */
  autoSave?: boolean;
  now?: () => Date;
  generateId?: (kind: IdKind) => string;
}

export interface StartSceneInput {
  title?: string;
  location?: string;
  participants?: Iterable<string>;
}

function toTime(value: string | Date): number {
  return value instanceof Date ? value.getTime() : Date.parse(value);
}

function matchesFilter(scene: Scene, event: SessionEvent, filter: EventFilter): boolean {
  if (filter.sceneId && scene.id !== filter.sceneId) return false;
  if (filter.type) {
    const types = Array.isArray(filter.type) ? filter.type : [filter.type];
    if (!types.includes(event.type)) return false;
  }
  if (filter.actor !== undefined && event.actor !== filter.actor) return false;
  if (filter.timeRange) {
    const at = Date.parse(event.timestamp);
    if (filter.timeRange.from !== undefined && at < toTime(filter.timeRange.from)) return false;
    if (filter.timeRange.to !== undefined && at > toTime(filter.timeRange.to)) return false;
  }
  return true;
}

/** Ended scenes keep their events and participants exactly as they were. */
function sealScene(scene: Scene): void {
  for (const event of scene.events) deepFreeze(event);
  if (!scene.active) {
    Object.freeze(scene.events);
    Object.freeze(scene.participants);
  }
}

function addParticipant(scene: Scene, actor: string | null): void {
  if (actor && !scene.participants.includes(actor)) {
    scene.participants.push(actor);
  }
}

/**
 * Owner of one play-through. Append-only at the event level and
 * transition-only at the scene level: nothing is deleted or reordered.
 */
export class SessionLog {
  private readonly session: Session;
  private readonly store?: SessionStore;
  private readonly autoSave: boolean;
  private readonly now: () => Date;
  private readonly generateId: (kind: IdKind) => string;
  private dirty = false;

  constructor(session: Session, options: SessionLogOptions = {}) {
    this.session = session;
    session.scenes.forEach(sealScene);
    this.store = options.store;
    this.autoSave = options.autoSave ?? Boolean(options.store);
    this.now = options.now ?? (() => new Date());
    this.generateId = options.generateId ?? (() => randomUUID());
  }

  /** Fresh, empty session. Nothing is written until the first mutation. */
  static create(options: SessionLogOptions & { sessionId?: string } = {}): SessionLog {
    const now = options.now ?? (() => new Date());
    const id = options.sessionId ?? (options.generateId ? options.generateId('session') : randomUUID());
    const session: Session = {
      id,
      createdAt: now().toISOString(),
      scenes: [],
      activeSceneIndex: null
    };
    sessionLogger(`created session ${id}`);
    return new SessionLog(session, options);
  }

  /** Load a session from the store, or start a new one under that id (or a fresh id). */
  static open(store: SessionStore, sessionId?: string, options: Omit<SessionLogOptions, 'store'> = {}): SessionLog {
    if (sessionId === undefined) return SessionLog.create({ ...options, store });
    let existing: Session | undefined;
    try {
      existing = store.load(sessionId);
    } catch (e) {
      if (e instanceof StorageFailureError) throw e;
      throw new StorageFailureError(`Failed to load session ${sessionId}: ${describeError(e)}`, sessionId, e);
    }
    if (existing) {
      sessionLogger(`loaded session ${sessionId} with ${existing.scenes.length} scenes`);
      return new SessionLog(existing, { ...options, store });
    }
    return SessionLog.create({ ...options, store, sessionId });
  }

  get id(): string {
    return this.session.id;
  }

  get isDirty(): boolean {
    return this.dirty;
  }

  get scenes(): readonly SceneView[] {
    return this.session.scenes;
  }

  get activeScene(): SceneView | undefined {
    const index = this.session.activeSceneIndex;
    return index === null ? undefined : this.session.scenes[index];
  }

  getScene(sceneId: string): SceneView | undefined {
    return this.session.scenes.find((scene) => scene.id === sceneId);
  }

  startScene(input: StartSceneInput = {}): string {
    const previous = this.activeScene;
    if (previous) {
      this.closeActiveScene(null);
      sessionLogger(`implicitly ended scene ${previous.id}`);
    }

    const participants: string[] = [];
    for (const actor of input.participants ?? []) {
      if (!participants.includes(actor)) participants.push(actor);
    }

    const scene: Scene = {
      id: this.generateId('scene'),
      title: input.title ?? '',
      location: input.location ?? '',
      participants,
      startedAt: this.now().toISOString(),
      endedAt: null,
      summary: null,
      events: [],
      active: true
    };
    this.session.scenes.push(scene);
    this.session.activeSceneIndex = this.session.scenes.length - 1;
    sessionLogger(`started scene ${scene.id} "${scene.title}"`);

    this.persist(scene.id);
    return scene.id;
  }

  endScene(summary?: string): void {
    const scene = this.activeScene;
    if (!scene) throw new NoActiveSceneError('end scene');
    this.closeActiveScene(summary ?? null);
    sessionLogger(`ended scene ${scene.id}`);
    this.persist(scene.id);
  }

  logEvent<K extends EventType>(
    type: K,
    actor: string | null,
    payload: EventPayloadMap[K],
    metadata: JsonObject = {}
  ): string {
    if (!isEventType(type)) {
      throw new TypeError(`Unknown event type: ${String(type)}`);
    }
    const index = this.session.activeSceneIndex;
    if (index === null) throw new NoActiveSceneError('log event');
    const scene = this.session.scenes[index];

    const candidate = {
      id: this.generateId('event'),
      timestamp: this.now().toISOString(),
      type,
      actor,
      payload: structuredClone(payload),
      metadata: structuredClone(metadata)
    };
    if (!validateSessionEvent(candidate)) {
      const problems = formatSchemaErrors(validateSessionEvent.errors).join('; ');
      throw new TypeError(`Invalid ${type} event: ${problems}`);
    }
    const event = deepFreeze(candidate);
    scene.events.push(event);
    addParticipant(scene, actor);

    this.persist(event.id);
    return event.id;
  }

  /**
   * Attach a summary, produced after the fact, to an ended scene that has
   * none. Events are untouched and an existing summary is never replaced.
   */
  recordSummary(sceneId: string, summary: string): void {
    const scene = this.session.scenes.find((s) => s.id === sceneId);
    if (!scene) throw new RangeError(`Unknown scene ${sceneId}`);
    if (scene.active) throw new RangeError(`Scene ${sceneId} is still active; end it with a summary instead`);
    if (scene.summary !== null) throw new RangeError(`Scene ${sceneId} already has a summary`);
    scene.summary = summary;
    this.persist(scene.id);
  }

  /** Lazy and restartable: every iteration walks the log from the start. */
  queryEvents(filter: EventFilter = {}): Iterable<SessionEvent> {
    const scenes = this.session.scenes;
    return {
      *[Symbol.iterator]() {
        for (const scene of scenes) {
          if (filter.sceneId && scene.id !== filter.sceneId) continue;
          for (const event of scene.events) {
            if (matchesFilter(scene, event, filter)) yield event;
          }
        }
      }
    };
  }

  getStats(): SessionStats {
    const eventTypes: SessionStats['eventTypes'] = {};
    let eventCount = 0;
    let firstEventAt: string | null = null;
    let lastEventAt: string | null = null;
    for (const scene of this.session.scenes) {
      for (const event of scene.events) {
        eventCount++;
        eventTypes[event.type] = (eventTypes[event.type] ?? 0) + 1;
        firstEventAt ??= event.timestamp;
        lastEventAt = event.timestamp;
      }
    }
    return {
      sessionId: this.session.id,
      sceneCount: this.session.scenes.length,
      eventCount,
      activeSceneId: this.activeScene?.id ?? null,
      firstEventAt,
      lastEventAt,
      eventTypes,
      scenes: this.session.scenes.map((scene) => ({
        id: scene.id,
        title: scene.title,
        location: scene.location,
        eventCount: scene.events.length,
        active: scene.active
      }))
    };
  }

  /** Deep, frozen copy for readers such as the context assembler. */
  snapshot(): Session {
    return deepFreeze(structuredClone(this.session));
  }

  /** Retry a save that failed earlier. No-op when nothing is pending. */
  flush(): void {
    if (this.store && this.dirty) this.save();
  }

  private closeActiveScene(summary: string | null): void {
    const index = this.session.activeSceneIndex;
    if (index === null) return;
    const scene = this.session.scenes[index];
    scene.active = false;
    scene.endedAt = this.now().toISOString();
    if (summary !== null) scene.summary = summary;
    sealScene(scene);
    this.session.activeSceneIndex = null;
  }

  private persist(appliedId: string): void {
    if (!this.store) return;
    this.dirty = true;
    if (this.autoSave) this.save(appliedId);
  }

  private save(appliedId?: string): void {
    if (!this.store) return;
    try {
      this.store.save(this.session);
      this.dirty = false;
    } catch (e) {
      sessionLogger(`save of session ${this.session.id} failed: ${describeError(e)}`);
      const reason = e instanceof StorageFailureError ? e.reason ?? e : e;
      throw new StorageFailureError(
        `Failed to save session ${this.session.id}: ${describeError(e)}`,
        this.session.id,
        reason,
        appliedId
      );
    }
  }
}
