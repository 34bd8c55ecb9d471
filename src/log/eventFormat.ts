import type { RollResult } from '../dice/types.js';
import type { DiceRollPayload, JsonValue, SessionEvent } from './types.js';

function json(value: JsonValue | undefined): string {
  return value === undefined ? 'undefined' : JSON.stringify(value);
}

/** Build the payload of a `dice_roll` event from a roller result. */
export function toDiceRollPayload(result: RollResult): DiceRollPayload {
  const payload: DiceRollPayload = {
    notation: result.spec.notation,
    mode: result.spec.mode,
    total: result.total,
    rolls: result.terms.filter((t) => t.term.kind === 'roll').map((t) => [...t.rolls]),
    kept: result.terms.filter((t) => t.term.kind === 'roll').map((t) => [...t.kept]),
    details: result.details
  };
  if (result.seed !== undefined) payload.seed = result.seed;
  return payload;
}

function describeBody(event: SessionEvent): string {
  switch (event.type) {
    case 'narration':
    case 'player_action':
    case 'npc_action':
    case 'system':
      return event.payload.text;
    case 'npc_dialogue':
      return event.payload.listener
        ? `(to ${event.payload.listener}) "${event.payload.text}"`
        : `"${event.payload.text}"`;
    case 'dice_roll': {
      const mode = event.payload.mode === 'normal' ? '' : ` (${event.payload.mode})`;
      return `rolled ${event.payload.details}${mode}`;
    }
    case 'tool_call': {
      const call = `called ${event.payload.name}(${json(event.payload.arguments)})`;
      return event.payload.result === undefined ? call : `${call} -> ${json(event.payload.result)}`;
    }
    case 'state_change':
      return event.payload.previous === undefined
        ? `${event.payload.path} = ${json(event.payload.next)}`
        : `${event.payload.path}: ${json(event.payload.previous)} -> ${json(event.payload.next)}`;
  }
}

/** One line per event, `[actor] text`, as fed to the generation service. */
export function describeEvent(event: SessionEvent): string {
  const actor = event.actor ? `[${event.actor}] ` : '';
  return `${actor}${describeBody(event)}`;
}
