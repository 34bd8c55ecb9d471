import { InvalidNotationError } from '../errors.js';
import { createLogger, NAMESPACES } from '../logging.js';
import { DiceSpec, DiceTerm, KeepClause, RollMode, RollTerm } from './types.js';

const parserLog = createLogger(NAMESPACES.dice.parser);

export interface DiceLimits {
  maxDice: number;
  maxSides: number;
}

export const DEFAULT_DICE_LIMITS: DiceLimits = {
  maxDice: 1000,
  maxSides: 1_000_000
};

interface ScannedChar {
  ch: string;
  at: number;
}

/**
 * Left-to-right scanner over the notation with whitespace removed.
 * Positions reported in errors refer to the caller's original string.
 */
class NotationScanner {
  private readonly chars: ScannedChar[];
  private index = 0;

  constructor(private readonly source: string) {
    this.chars = [];
    for (let i = 0; i < source.length; i++) {
      const ch = source[i];
      if (/\s/.test(ch)) continue;
      this.chars.push({ ch: ch.toLowerCase(), at: i });
    }
  }

  get isEmpty(): boolean {
    return this.chars.length === 0;
  }

  get atEnd(): boolean {
    return this.index >= this.chars.length;
  }

  get mark(): number {
    return this.index;
  }

  /** Position in the original string of the next unread character. */
  get position(): number {
    return this.atEnd ? this.source.length : this.chars[this.index].at;
  }

  peek(offset = 0): string | undefined {
    return this.chars[this.index + offset]?.ch;
  }

  next(): string | undefined {
    const ch = this.peek();
    if (ch !== undefined) this.index++;
    return ch;
  }

  accept(literal: string): boolean {
    for (let i = 0; i < literal.length; i++) {
      if (this.peek(i) !== literal[i]) return false;
    }
    this.index += literal.length;
    return true;
  }

  rewind(mark: number): void {
    this.index = mark;
  }

  readDigits(): { value: number; at: number } | undefined {
    const at = this.position;
    let digits = '';
    while (this.peek() !== undefined && /[0-9]/.test(this.peek() ?? '')) {
      digits += this.next();
    }
    if (!digits) return undefined;
    const value = Number.parseInt(digits, 10);
    if (!Number.isSafeInteger(value)) {
      throw new InvalidNotationError(`number ${digits} is too large`, this.source, at);
    }
    return { value, at };
  }

  fail(message: string, at: number = this.position): never {
    throw new InvalidNotationError(message, this.source, at);
  }
}

function parseDiceTerm(
  scanner: NotationScanner,
  sign: 1 | -1,
  countToken: { value: number; at: number } | undefined,
  limits: DiceLimits
): RollTerm {
  scanner.next(); // 'd'
  const sidesToken = scanner.readDigits();
  if (!sidesToken) scanner.fail('missing die size after "d"');

  const count = countToken ? countToken.value : 1;
  const countAt = countToken ? countToken.at : sidesToken.at;
  if (count < 1) scanner.fail('dice count must be at least 1', countAt);
  if (count > limits.maxDice) scanner.fail(`dice count exceeds the limit of ${limits.maxDice}`, countAt);
  if (sidesToken.value < 2) scanner.fail('a die needs at least 2 sides', sidesToken.at);
  if (sidesToken.value > limits.maxSides) scanner.fail(`die size exceeds the limit of ${limits.maxSides}`, sidesToken.at);

  let keep: KeepClause | undefined;
  if (scanner.peek() === 'k') {
    const keepAt = scanner.position;
    scanner.next();
    const which = scanner.next();
    if (which !== 'h' && which !== 'l') scanner.fail('keep clause must be "kh" or "kl"', keepAt);
    const n = scanner.readDigits();
    if (!n) scanner.fail('keep clause needs a number of dice', scanner.position);
    if (n.value < 1) scanner.fail('must keep at least one die', n.at);
    if (n.value > count) scanner.fail(`cannot keep ${n.value} of ${count} dice`, n.at);
    keep = { mode: which === 'h' ? 'highest' : 'lowest', n: n.value };
  }

  let mode: RollTerm['mode'];
  const modeAt = scanner.position;
  if (scanner.accept('adv')) mode = 'advantage';
  else if (scanner.accept('dis')) mode = 'disadvantage';
  if (mode) {
    if (keep) scanner.fail(`${mode} cannot be combined with a keep clause`, modeAt);
    if (count !== 1) scanner.fail(`${mode} applies to a single die`, modeAt);
  }

  const term: RollTerm = { kind: 'roll', count, sides: sidesToken.value, sign };
  if (keep) term.keep = keep;
  if (mode) term.mode = mode;
  return term;
}

function parseTerm(scanner: NotationScanner, sign: 1 | -1, limits: DiceLimits): DiceTerm {
  const countToken = scanner.readDigits();
  if (scanner.peek() === 'd') {
    return parseDiceTerm(scanner, sign, countToken, limits);
  }
  if (countToken) {
    return { kind: 'modifier', value: sign * countToken.value };
  }
  if (scanner.atEnd) scanner.fail('expected a dice term or a number but the notation ended');
  return scanner.fail(`unexpected "${scanner.peek()}"`);
}

function resolveMode(scanner: NotationScanner, terms: DiceTerm[]): RollMode {
  let mode: RollMode = 'normal';
  for (const term of terms) {
    if (term.kind !== 'roll' || !term.mode) continue;
    if (mode !== 'normal' && mode !== term.mode) {
      scanner.fail('cannot mix advantage and disadvantage in one notation', 0);
    }
    mode = term.mode;
  }
  return mode;
}

/** Canonical text for a parsed spec, e.g. `6#4d6kh3+2`. */
export function formatNotation(spec: Pick<DiceSpec, 'terms' | 'repeat'>): string {
  let text = spec.repeat > 1 ? `${spec.repeat}#` : '';
  spec.terms.forEach((term, index) => {
    if (term.kind === 'modifier') {
      if (term.value < 0) text += `-${Math.abs(term.value)}`;
      else text += index === 0 ? `${term.value}` : `+${term.value}`;
      return;
    }
    if (term.sign < 0) text += '-';
    else if (index > 0) text += '+';
    text += `${term.count}d${term.sides}`;
    if (term.keep) text += `${term.keep.mode === 'highest' ? 'kh' : 'kl'}${term.keep.n}`;
    if (term.mode) text += term.mode === 'advantage' ? 'adv' : 'dis';
  });
  return text;
}

/**
 * Parse dice notation such as `4d6kh3`, `2d20+5`, `d20adv` or `6#4d6kh3`.
 * Pure and deterministic: the same text always yields an equal spec.
 */
export function parseNotation(text: string, limits: Partial<DiceLimits> = {}): DiceSpec {
  const resolvedLimits: DiceLimits = { ...DEFAULT_DICE_LIMITS, ...limits };
  const scanner: NotationScanner = new NotationScanner(text);
  if (scanner.isEmpty) scanner.fail('notation is empty', 0);

  let repeat = 1;
  const start = scanner.mark;
  const repeatToken = scanner.readDigits();
  if (repeatToken && scanner.peek() === '#') {
    scanner.next();
    if (repeatToken.value < 1) scanner.fail('repeat count must be at least 1', repeatToken.at);
    repeat = repeatToken.value;
  } else {
    scanner.rewind(start);
  }

  const terms: DiceTerm[] = [];
  let sign: 1 | -1 = 1;
  if (scanner.peek() === '-' || scanner.peek() === '+') {
    sign = scanner.next() === '-' ? -1 : 1;
  }
  terms.push(parseTerm(scanner, sign, resolvedLimits));

  while (scanner.peek() === '+' || scanner.peek() === '-') {
    sign = scanner.next() === '-' ? -1 : 1;
    terms.push(parseTerm(scanner, sign, resolvedLimits));
  }

  if (!scanner.atEnd) scanner.fail(`unexpected "${scanner.peek()}"`);
  if (!terms.some((term) => term.kind === 'roll')) {
    scanner.fail('notation must contain at least one dice term', 0);
  }

  const mode = resolveMode(scanner, terms);
  const spec: DiceSpec = { notation: formatNotation({ terms, repeat }), terms, mode, repeat };
  parserLog(`parsed "${text}" -> ${spec.notation}`);
  return spec;
}

/** Non-throwing variant for callers that re-prompt on bad input. */
export function tryParseNotation(text: string, limits?: Partial<DiceLimits>): DiceSpec | null {
  try {
    return parseNotation(text, limits);
  } catch (e) {
    if (e instanceof InvalidNotationError) return null;
    throw e;
  }
}
