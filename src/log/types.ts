import type { RollMode } from '../dice/types.js';

export type JsonPrimitive = string | number | boolean | null;
export type JsonValue = JsonPrimitive | JsonValue[] | { [key: string]: JsonValue };
export type JsonObject = { [key: string]: JsonValue };

interface PayloadBase {
  /** Fields outside the type's schema, kept so they survive a save/load cycle. */
  extensions?: JsonObject;
}

export interface TextPayload extends PayloadBase {
  text: string;
}

export interface DialoguePayload extends TextPayload {
  listener?: string;
}

export interface DiceRollPayload extends PayloadBase {
  notation: string;
  mode: RollMode;
  total: number;
  rolls: number[][];
  kept: number[][];
  details: string;
  seed?: number;
}

export interface ToolCallPayload extends PayloadBase {
  name: string;
  arguments: JsonObject;
  result?: JsonValue;
}

export interface StateChangePayload extends PayloadBase {
  path: string;
  previous?: JsonValue;
  next: JsonValue;
}

export interface EventPayloadMap {
  narration: TextPayload;
  player_action: TextPayload;
  dice_roll: DiceRollPayload;
  npc_action: TextPayload;
  npc_dialogue: DialoguePayload;
  system: TextPayload;
  tool_call: ToolCallPayload;
  state_change: StateChangePayload;
}

export type EventType = keyof EventPayloadMap;

export const EVENT_TYPES: readonly EventType[] = [
  'narration',
  'player_action',
  'dice_roll',
  'npc_action',
  'npc_dialogue',
  'system',
  'tool_call',
  'state_change'
];

export function isEventType(value: unknown): value is EventType {
  return typeof value === 'string' && EVENT_TYPES.some((type) => type === value);
}

export interface EventRecord<K extends EventType = EventType> {
  id: string;
  timestamp: string;
  type: K;
  actor: string | null;
  payload: EventPayloadMap[K];
  metadata: JsonObject;
}

/** Discriminated on `type`, so narrowing the type narrows the payload. */
export type SessionEvent = { [K in EventType]: EventRecord<K> }[EventType];

export interface Scene {
  id: string;
  title: string;
  location: string;
  /** Unique actor ids in order of first appearance. */
  participants: string[];
  startedAt: string;
  endedAt: string | null;
  summary: string | null;
  events: SessionEvent[];
  active: boolean;
}

/** What the log hands out: nothing reachable from it can be edited in place. */
export type SceneView = Readonly<Omit<Scene, 'participants' | 'events'>> & {
  readonly participants: readonly string[];
  readonly events: readonly SessionEvent[];
};

export interface Session {
  id: string;
  createdAt: string;
  scenes: Scene[];
  activeSceneIndex: number | null;
}

export interface EventFilter {
  type?: EventType | EventType[];
  /** `null` matches events with no actor. */
  actor?: string | null;
  sceneId?: string;
  timeRange?: { from?: string | Date; to?: string | Date };
}

export interface SessionStats {
  sessionId: string;
  sceneCount: number;
  eventCount: number;
  activeSceneId: string | null;
  firstEventAt: string | null;
  lastEventAt: string | null;
  eventTypes: Partial<Record<EventType, number>>;
  scenes: Array<{ id: string; title: string; location: string; eventCount: number; active: boolean }>;
}
