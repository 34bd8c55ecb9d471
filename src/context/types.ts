import type { BudgetExhaustedWarning } from '../errors.js';
import type { SessionEvent } from '../log/types.js';

/** Maps a piece of text to abstract budget units (tokens, characters, ...). */
export type SizeEstimator = (text: string) => number;

export interface TokenBudget {
  maxTokens: number;
  /** How many of the latest ended scenes may be included verbatim. */
  recentScenes: number;
}

export interface SummaryBlock {
  kind: 'summary';
  sceneId: string;
  title: string;
  text: string;
  cost: number;
}

export interface SceneBlock {
  kind: 'recent_scene' | 'current_scene';
  sceneId: string;
  title: string;
  location: string;
  events: SessionEvent[];
  /** One rendered line per event, in append order. */
  lines: string[];
  cost: number;
}

export type ContextBlock = SummaryBlock | SceneBlock;

export interface ContextUsage {
  current: number;
  recent: number;
  summaries: number;
}

export interface ContextPackage {
  sessionId: string;
  /** Chronological: older summaries, then recent scenes, then the active scene. */
  blocks: ContextBlock[];
  consumed: number;
  budget: TokenBudget;
  usage: ContextUsage;
  warnings: BudgetExhaustedWarning[];
}
