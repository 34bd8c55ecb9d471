import type { BudgetExhaustedWarning } from '../errors.js';
import { describeEvent } from '../log/eventFormat.js';
import type { Scene, Session } from '../log/types.js';
import { createLogger, NAMESPACES } from '../logging.js';
import type { ContextTelemetry } from './contextTelemetry.js';
import { checkedEstimator, createCharEstimator } from './sizeEstimators.js';
import type { ContextPackage, SceneBlock, SizeEstimator, SummaryBlock, TokenBudget } from './types.js';

const assemblerLog = createLogger(NAMESPACES.context.assembler);

export interface BuildContextOptions {
  estimator?: SizeEstimator;
  /** Usage is recorded only when a collector is passed. */
  telemetry?: ContextTelemetry;
  now?: () => Date;
}

function validateBudget(budget: TokenBudget): void {
  if (!Number.isFinite(budget.maxTokens) || budget.maxTokens < 0) {
    throw new RangeError(`maxTokens must be a non-negative number, got ${budget.maxTokens}`);
  }
  if (!Number.isInteger(budget.recentScenes) || budget.recentScenes < 0) {
    throw new RangeError(`recentScenes must be a non-negative integer, got ${budget.recentScenes}`);
  }
}

function toSceneBlock(scene: Scene, kind: SceneBlock['kind'], estimate: SizeEstimator): SceneBlock {
  const lines = scene.events.map(describeEvent);
  const cost = lines.reduce((total, line) => total + estimate(line), 0);
  return {
    kind,
    sceneId: scene.id,
    title: scene.title,
    location: scene.location,
    events: [...scene.events],
    lines,
    cost
  };
}

/**
 * Select which history a generation call sees.
 *
 * 1. The active scene, always whole, even when it alone exceeds the budget.
 * 2. Up to `recentScenes` ended scenes, newest first, each whole or not at all.
 * 3. Summaries of the remaining ended scenes, newest first while they fit.
 *
 * Selection walks backward from the present; the returned blocks are put back
 * into chronological order.
 */
export function buildContext(session: Session, budget: TokenBudget, options: BuildContextOptions = {}): ContextPackage {
  validateBudget(budget);
  const estimate = checkedEstimator(options.estimator ?? createCharEstimator());
  const warnings: BudgetExhaustedWarning[] = [];
  const usage = { current: 0, recent: 0, summaries: 0 };
  let consumed = 0;
  const exhausted = () => consumed >= budget.maxTokens;

  let current: SceneBlock | undefined;
  const activeIndex = session.activeSceneIndex;
  if (activeIndex !== null && session.scenes[activeIndex]) {
    current = toSceneBlock(session.scenes[activeIndex], 'current_scene', estimate);
    consumed += current.cost;
    usage.current = current.cost;
    if (current.cost > budget.maxTokens) {
      warnings.push({
        kind: 'budget_exhausted',
        sceneId: current.sceneId,
        required: current.cost,
        budget: budget.maxTokens,
        message: `Active scene needs ${current.cost} units, over the budget of ${budget.maxTokens}; included in full`
      });
    }
  }

  const ended = session.scenes.filter((scene) => !scene.active);
  const recent: SceneBlock[] = [];
  const verbatim = new Set<string>();
  for (let i = ended.length - 1; i >= 0 && recent.length < budget.recentScenes; i--) {
    if (exhausted()) break;
    const block = toSceneBlock(ended[i], 'recent_scene', estimate);
    if (consumed + block.cost > budget.maxTokens) break;
    recent.push(block);
    verbatim.add(block.sceneId);
    consumed += block.cost;
    usage.recent += block.cost;
  }

  const summaries: SummaryBlock[] = [];
  for (let i = ended.length - 1; i >= 0; i--) {
    const scene = ended[i];
    if (verbatim.has(scene.id) || scene.summary === null) continue;
    if (exhausted()) break;
    const cost = estimate(scene.summary);
    if (consumed + cost > budget.maxTokens) break;
    summaries.push({ kind: 'summary', sceneId: scene.id, title: scene.title, text: scene.summary, cost });
    consumed += cost;
    usage.summaries += cost;
  }

  const blocks = [...summaries.reverse(), ...recent.reverse(), ...(current ? [current] : [])];
  const pkg: ContextPackage = { sessionId: session.id, blocks, consumed, budget: { ...budget }, usage, warnings };

  assemblerLog(
    `session ${session.id}: ${blocks.length} blocks, ${consumed}/${budget.maxTokens} units ` +
      `(current ${usage.current}, recent ${usage.recent}, summaries ${usage.summaries})`
  );
  if (options.telemetry) {
    options.telemetry.record({
      sessionId: session.id,
      timestamp: (options.now ? options.now() : new Date()).toISOString(),
      maxTokens: budget.maxTokens,
      consumed,
      usage: { ...usage },
      overBudget: warnings.length > 0
    });
  }
  return pkg;
}
