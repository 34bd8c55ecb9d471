export type KeepMode = 'highest' | 'lowest';
export type RollMode = 'normal' | 'advantage' | 'disadvantage';

export interface KeepClause {
  mode: KeepMode;
  n: number;
}

export interface RollTerm {
  kind: 'roll';
  count: number;
  sides: number;
  keep?: KeepClause;
  /** Set when the term carried an `adv`/`dis` suffix. */
  mode?: Exclude<RollMode, 'normal'>;
  sign: 1 | -1;
}

export interface ModifierTerm {
  kind: 'modifier';
  value: number;
}

export type DiceTerm = RollTerm | ModifierTerm;

export interface DiceSpec {
  notation: string;
  terms: DiceTerm[];
  mode: RollMode;
  repeat: number;
}

/**
 * Source of uniform integers. Implementations may be seeded for reproducible
 * rolls or backed by a cryptographic generator for live play.
 */
export interface RandomSource {
  nextInt(low: number, highInclusive: number): number;
  readonly seed?: number;
}

export interface TermRoll {
  term: DiceTerm;
  rolls: number[];
  kept: number[];
  subtotal: number;
}

export interface RollResult {
  spec: DiceSpec;
  terms: TermRoll[];
  total: number;
  seed?: number;
  timestamp: string;
  details: string;
}
