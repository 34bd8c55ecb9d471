import { createLogger, NAMESPACES } from '../logging.js';
import { deepFreeze } from '../utils/freeze.js';
import { DiceLimits, formatNotation, parseNotation } from './notationParser.js';
import { DiceSpec, DiceTerm, RandomSource, RollResult, RollTerm, TermRoll } from './types.js';

const rollerLog = createLogger(NAMESPACES.dice.roller);

export interface RollOptions {
  now?: () => Date;
}

/**
 * Advantage and disadvantage are sugar: a single die becomes two dice keeping
 * the highest or lowest one. Every roll goes through this reduction so that
 * `1d20adv` and `2d20kh1` share one code path.
 */
export function expandTerm(term: RollTerm): RollTerm {
  if (!term.mode) return term;
  if (term.count !== 1) {
    throw new RangeError(`${term.mode} applies to a single die, got ${term.count}`);
  }
  return {
    kind: 'roll',
    count: 2,
    sides: term.sides,
    keep: { mode: term.mode === 'advantage' ? 'highest' : 'lowest', n: 1 },
    sign: term.sign
  };
}

function rollTerm(term: RollTerm, rng: RandomSource): TermRoll {
  if (!Number.isSafeInteger(term.count) || term.count < 1) {
    throw new RangeError(`Dice count must be a positive integer, got ${term.count}`);
  }
  if (!Number.isSafeInteger(term.sides) || term.sides < 1) {
    throw new RangeError(`Die size must be a positive integer, got ${term.sides}`);
  }

  const rolls: number[] = [];
  for (let i = 0; i < term.count; i++) {
    rolls.push(rng.nextInt(1, term.sides));
  }

  let kept = [...rolls];
  if (term.keep) {
    const ordered = [...rolls].sort((a, b) => (term.keep?.mode === 'lowest' ? a - b : b - a));
    kept = ordered.slice(0, Math.min(term.keep.n, term.count));
  }
  const subtotal = kept.reduce((sum, value) => sum + value, 0);
  return { term, rolls, kept, subtotal };
}

function termLabel(term: DiceTerm): string {
  if (term.kind === 'modifier') return String(Math.abs(term.value));
  return formatNotation({ terms: [{ ...term, sign: 1 }], repeat: 1 });
}

function describeTerms(spec: DiceSpec, terms: TermRoll[], total: number): string {
  const parts = terms.map((entry, index) => {
    const original = spec.terms[index];
    const negative = original.kind === 'modifier' ? original.value < 0 : original.sign < 0;
    const prefix = index === 0 ? (negative ? '-' : '') : negative ? ' - ' : ' + ';
    if (original.kind === 'modifier') return `${prefix}${termLabel(original)}`;
    let text = `${prefix}${termLabel(original)}: [${entry.rolls.join(', ')}]`;
    if (entry.term.kind === 'roll' && entry.term.keep) text += ` kept [${entry.kept.join(', ')}]`;
    return text;
  });
  return `${parts.join('')} = ${total}`;
}

/**
 * Evaluate one instance of a spec. `repeat` is ignored here; use
 * `rollRepeated` for `N#...` notation.
 */
export function rollDice(spec: DiceSpec, rng: RandomSource, options: RollOptions = {}): RollResult {
  const terms: TermRoll[] = [];
  let total = 0;

  for (const term of spec.terms) {
    if (term.kind === 'modifier') {
      terms.push({ term, rolls: [], kept: [], subtotal: term.value });
      total += term.value;
      continue;
    }
    const entry = rollTerm(expandTerm(term), rng);
    terms.push(entry);
    total += term.sign * entry.subtotal;
  }

  const result: RollResult = {
    spec,
    terms,
    total,
    timestamp: (options.now ? options.now() : new Date()).toISOString(),
    details: describeTerms(spec, terms, total)
  };
  if (rng.seed !== undefined) result.seed = rng.seed;

  rollerLog(`rolled ${spec.notation}: ${result.details}`);
  return deepFreeze(result);
}

/** Independent results for each repetition, e.g. six scores from `6#4d6kh3`. */
export function rollRepeated(spec: DiceSpec, rng: RandomSource, options: RollOptions = {}): RollResult[] {
  const results: RollResult[] = [];
  for (let i = 0; i < spec.repeat; i++) {
    results.push(rollDice(spec, rng, options));
  }
  return results;
}

export function rollNotation(
  notation: string,
  rng: RandomSource,
  options: RollOptions & { limits?: Partial<DiceLimits> } = {}
): RollResult[] {
  return rollRepeated(parseNotation(notation, options.limits), rng, options);
}

export function describeRoll(result: RollResult): string {
  const prefix = result.spec.mode === 'normal' ? '' : `(${result.spec.mode}) `;
  return `${prefix}${result.details}`;
}
