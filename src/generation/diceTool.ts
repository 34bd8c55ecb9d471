import { rollRepeated } from '../dice/diceRoller.js';
import { DiceLimits, parseNotation } from '../dice/notationParser.js';
import type { RandomSource } from '../dice/types.js';
import { toDiceRollPayload } from '../log/eventFormat.js';
import type { ToolDefinition } from './toolRegistry.js';

export const DICE_TOOL_NAME = 'roll_dice';

type DiceToolArgs = { notation: string };

/**
 * The built-in `roll_dice` tool. Each repetition is emitted as its own
 * `dice_roll` event; the tool result carries the totals for the model.
 */
export function createDiceTool(rng: RandomSource, limits?: Partial<DiceLimits>): ToolDefinition<DiceToolArgs> {
  return {
    name: DICE_TOOL_NAME,
    description: 'Roll dice using standard notation such as 1d20+5, 4d6kh3, d20adv or 6#4d6kh3.',
    parameters: {
      type: 'object',
      required: ['notation'],
      properties: {
        notation: { type: 'string', minLength: 1 },
        reason: { type: 'string' }
      },
      additionalProperties: false
    },
    handler: (args, context) => {
      const spec = parseNotation(args.notation, limits);
      const results = rollRepeated(spec, rng);
      for (const result of results) {
        context.emit('dice_roll', toDiceRollPayload(result));
      }
      return {
        notation: spec.notation,
        mode: spec.mode,
        totals: results.map((result) => result.total),
        details: results.map((result) => result.details)
      };
    }
  };
}
