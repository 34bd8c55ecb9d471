import { encode } from 'gpt-tokenizer';
import { describeError } from '../errors.js';
import { createLogger, NAMESPACES } from '../logging.js';
import type { SizeEstimator } from './types.js';

const estimatorLog = createLogger(NAMESPACES.context.estimator);

export type EstimatorKind = 'chars' | 'tokenizer';

/**
 * Rough size in tokens: about four characters per token for English prose.
 */
export function createCharEstimator(charsPerToken: number = 4): SizeEstimator {
  if (!Number.isFinite(charsPerToken) || charsPerToken <= 0) {
    throw new RangeError(`charsPerToken must be a positive number, got ${charsPerToken}`);
  }
  return (text: string) => (text ? Math.ceil(text.length / charsPerToken) : 0);
}

export interface TokenizerEstimatorOptions {
  /** Defaults to gpt-tokenizer's `encode`. */
  encode?: (text: string) => ArrayLike<number>;
  /** Sizes any text the encoder throws on. */
  fallback?: SizeEstimator;
}

export function createTokenizerEstimator(options: TokenizerEstimatorOptions = {}): SizeEstimator {
  const tokenize = options.encode ?? encode;
  const fallback = options.fallback ?? createCharEstimator();
  return (text: string) => {
    if (text === '') return 0;
    try {
      return tokenize(text).length;
    } catch (e) {
      estimatorLog(`encoder rejected a ${text.length}-character text, sizing it by characters: ${describeError(e)}`);
      return fallback(text);
    }
  };
}

/** The char ratio also sizes whatever the tokenizer cannot encode. */
export function createEstimator(kind: EstimatorKind, charsPerToken?: number): SizeEstimator {
  const chars = createCharEstimator(charsPerToken);
  return kind === 'tokenizer' ? createTokenizerEstimator({ fallback: chars }) : chars;
}

/**
 * Wraps an estimator so every answer is checked: budget accounting relies on
 * sizes being finite and non-negative.
 */
export function checkedEstimator(estimator: SizeEstimator): SizeEstimator {
  return (text: string) => {
    const size = estimator(text);
    if (!Number.isFinite(size) || size < 0) {
      throw new RangeError(`Size estimator returned ${size} for a ${text.length}-character text`);
    }
    return size;
  };
}
