import { Ajv, ErrorObject, SchemaObject } from 'ajv';
import { EVENT_TYPES, EventType, SessionEvent } from './types.js';

export const ajv = new Ajv({ allErrors: true, strict: false });

type SchemaNode = SchemaObject;

interface PayloadSchema {
  required: string[];
  properties: Record<string, SchemaNode>;
}

const ANY: SchemaNode = {};
const STRING: SchemaNode = { type: 'string' };
const INT_MATRIX: SchemaNode = { type: 'array', items: { type: 'array', items: { type: 'integer' } } };
const TEXT: PayloadSchema = { required: ['text'], properties: { text: STRING } };

/** Fields each event type's payload is allowed to carry. */
export const PAYLOAD_SCHEMAS: Record<EventType, PayloadSchema> = {
  narration: TEXT,
  player_action: TEXT,
  npc_action: TEXT,
  system: TEXT,
  npc_dialogue: { required: ['text'], properties: { text: STRING, listener: STRING } },
  dice_roll: {
    required: ['notation', 'mode', 'total', 'rolls', 'kept', 'details'],
    properties: {
      notation: STRING,
      mode: { enum: ['normal', 'advantage', 'disadvantage'] },
      total: { type: 'integer' },
      rolls: INT_MATRIX,
      kept: INT_MATRIX,
      details: STRING,
      seed: { type: 'integer' }
    }
  },
  tool_call: {
    required: ['name', 'arguments'],
    properties: { name: STRING, arguments: { type: 'object' }, result: ANY }
  },
  state_change: {
    required: ['path', 'next'],
    properties: { path: STRING, previous: ANY, next: ANY }
  }
};

export function knownPayloadKeys(type: EventType): string[] {
  return Object.keys(PAYLOAD_SCHEMAS[type].properties);
}

/**
 * Event schema. In memory, unknown payload fields must sit in `extensions`;
 * in a stored document they are flattened into the payload itself.
 */
export function buildEventSchema(flattenedExtensions: boolean): SchemaNode {
  const branches = EVENT_TYPES.map((type) => {
    const payload = PAYLOAD_SCHEMAS[type];
    // Stored documents share one namespace, so an extension may not shadow a known field.
    const properties: Record<string, SchemaNode> = flattenedExtensions
      ? payload.properties
      : {
          ...payload.properties,
          extensions: {
            type: 'object',
            propertyNames: { not: { enum: [...Object.keys(payload.properties), 'extensions'] } }
          }
        };
    return {
      if: { properties: { type: { const: type } } },
      then: {
        properties: {
          payload: {
            type: 'object',
            required: payload.required,
            properties,
            additionalProperties: flattenedExtensions
          }
        }
      }
    };
  });

  return {
    type: 'object',
    required: ['id', 'timestamp', 'type', 'actor', 'payload', 'metadata'],
    properties: {
      id: STRING,
      timestamp: STRING,
      type: { enum: [...EVENT_TYPES] },
      actor: { type: ['string', 'null'] },
      payload: { type: 'object' },
      metadata: { type: 'object' }
    },
    additionalProperties: false,
    allOf: branches
  };
}

export const validateSessionEvent = ajv.compile<SessionEvent>(buildEventSchema(false));

export function formatSchemaErrors(errors: ErrorObject[] | null | undefined): string[] {
  return (errors || []).map((err) => `${err.instancePath || '(root)'} ${err.message || ''}`.trim());
}
