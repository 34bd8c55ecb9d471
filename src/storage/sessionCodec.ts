import { describeError, StorageFailureError } from '../errors.js';
import { ajv, buildEventSchema, formatSchemaErrors, knownPayloadKeys, validateSessionEvent } from '../log/eventSchemas.js';
import type { EventType, JsonObject, Scene, Session, SessionEvent } from '../log/types.js';
import { deepFreeze } from '../utils/freeze.js';

export const FORMAT_VERSION = 1;

export interface EventDocument {
  id: string;
  timestamp: string;
  type: EventType;
  actor: string | null;
  payload: JsonObject;
  metadata: JsonObject;
}

export interface SceneDocument {
  id: string;
  title: string;
  location: string;
  participants: string[];
  startedAt: string;
  endedAt: string | null;
  summary: string | null;
  active: boolean;
  events: EventDocument[];
}

export interface SessionDocument {
  formatVersion: typeof FORMAT_VERSION;
  id: string;
  createdAt: string;
  activeSceneIndex: number | null;
  scenes: SceneDocument[];
}

const NULLABLE_STRING = { type: ['string', 'null'] };

const sessionDocumentSchema = {
  type: 'object',
  required: ['formatVersion', 'id', 'createdAt', 'activeSceneIndex', 'scenes'],
  properties: {
    formatVersion: { const: FORMAT_VERSION },
    id: { type: 'string', minLength: 1 },
    createdAt: { type: 'string' },
    activeSceneIndex: { type: ['integer', 'null'], minimum: 0 },
    scenes: {
      type: 'array',
      items: {
        type: 'object',
        required: ['id', 'title', 'location', 'participants', 'startedAt', 'endedAt', 'summary', 'active', 'events'],
        properties: {
          id: { type: 'string' },
          title: { type: 'string' },
          location: { type: 'string' },
          participants: { type: 'array', items: { type: 'string' }, uniqueItems: true },
          startedAt: { type: 'string' },
          endedAt: NULLABLE_STRING,
          summary: NULLABLE_STRING,
          active: { type: 'boolean' },
          events: { type: 'array', items: buildEventSchema(true) }
        },
        additionalProperties: false
      }
    }
  },
  additionalProperties: false
};

const validateSessionDocument = ajv.compile<SessionDocument>(sessionDocumentSchema);

function encodeEvent(event: SessionEvent): EventDocument {
  const payload: JsonObject = { ...(event.payload.extensions ?? {}) };
  for (const [key, value] of Object.entries(event.payload)) {
    if (key === 'extensions' || value === undefined) continue;
    payload[key] = value;
  }
  return {
    id: event.id,
    timestamp: event.timestamp,
    type: event.type,
    actor: event.actor,
    payload,
    metadata: structuredClone(event.metadata)
  };
}

function encodeScene(scene: Scene): SceneDocument {
  return {
    id: scene.id,
    title: scene.title,
    location: scene.location,
    participants: [...scene.participants],
    startedAt: scene.startedAt,
    endedAt: scene.endedAt,
    summary: scene.summary,
    active: scene.active,
    events: scene.events.map(encodeEvent)
  };
}

export function encodeSession(session: Session): SessionDocument {
  return {
    formatVersion: FORMAT_VERSION,
    id: session.id,
    createdAt: session.createdAt,
    activeSceneIndex: session.activeSceneIndex,
    scenes: session.scenes.map(encodeScene)
  };
}

function decodeEvent(sessionId: string, doc: EventDocument): SessionEvent {
  const known = knownPayloadKeys(doc.type);
  const payload: JsonObject = {};
  const extensions: JsonObject = {};
  for (const [key, value] of Object.entries(doc.payload)) {
    if (known.includes(key)) payload[key] = value;
    else extensions[key] = value;
  }
  if (Object.keys(extensions).length > 0) payload.extensions = extensions;

  const candidate = { ...doc, payload };
  if (!validateSessionEvent(candidate)) {
    const problems = formatSchemaErrors(validateSessionEvent.errors).join('; ');
    throw new StorageFailureError(`Invalid event ${doc.id} in session ${sessionId}: ${problems}`, sessionId);
  }
  return deepFreeze(structuredClone(candidate));
}

function checkActiveScene(doc: SessionDocument): void {
  const activeIndexes = doc.scenes.flatMap((scene, index) => (scene.active ? [index] : []));
  const expected = doc.activeSceneIndex === null ? [] : [doc.activeSceneIndex];
  if (activeIndexes.length !== expected.length || activeIndexes.some((index, i) => index !== expected[i])) {
    throw new StorageFailureError(
      `Session ${doc.id} has inconsistent active scene state (index ${doc.activeSceneIndex}, active scenes [${activeIndexes.join(', ')}])`,
      doc.id
    );
  }
  for (const scene of doc.scenes) {
    if (!scene.active && scene.endedAt === null) {
      throw new StorageFailureError(`Scene ${scene.id} in session ${doc.id} is inactive but has no end time`, doc.id);
    }
  }
}

/** Validate a stored document and rebuild the in-memory session from it. */
export function decodeSession(input: unknown, sessionIdHint = 'unknown'): Session {
  if (!validateSessionDocument(input)) {
    const problems = formatSchemaErrors(validateSessionDocument.errors).join('; ');
    throw new StorageFailureError(`Invalid session document: ${problems}`, sessionIdHint);
  }
  checkActiveScene(input);
  return {
    id: input.id,
    createdAt: input.createdAt,
    activeSceneIndex: input.activeSceneIndex,
    scenes: input.scenes.map((scene) => ({
      id: scene.id,
      title: scene.title,
      location: scene.location,
      participants: [...scene.participants],
      startedAt: scene.startedAt,
      endedAt: scene.endedAt,
      summary: scene.summary,
      active: scene.active,
      events: scene.events.map((event) => decodeEvent(input.id, event))
    }))
  };
}

export function serializeSession(session: Session): string {
  return JSON.stringify(encodeSession(session), null, 2);
}

export function deserializeSession(text: string, sessionIdHint = 'unknown'): Session {
  let parsed: unknown;
  try {
    parsed = JSON.parse(text);
  } catch (e) {
    throw new StorageFailureError(`Session document is not valid JSON: ${describeError(e)}`, sessionIdHint, e);
  }
  return decodeSession(parsed, sessionIdHint);
}
