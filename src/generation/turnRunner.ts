import { buildContext } from '../context/contextAssembler.js';
import type { ContextTelemetry } from '../context/contextTelemetry.js';
import type { ContextPackage, SizeEstimator, TokenBudget } from '../context/types.js';
import { describeError, StorageFailureError, ToolDispatchError } from '../errors.js';
import type { SessionLog } from '../log/sessionLog.js';
import { createLogger, NAMESPACES } from '../logging.js';
import type { ToolContext, ToolRegistry } from './toolRegistry.js';
import type { GenerationService, ToolOutcome } from './types.js';

const turnLog = createLogger(NAMESPACES.generation.turn);

export interface TurnRunnerOptions {
  service: GenerationService;
  registry: ToolRegistry;
  budget: TokenBudget;
  estimator?: SizeEstimator;
  telemetry?: ContextTelemetry;
  /** Actor recorded for narration when the service names none. */
  narrator?: string;
}

export type TurnOutcome =
  | { kind: 'narration'; context: ContextPackage; eventId: string }
  | { kind: 'tool'; context: ContextPackage; outcome: ToolOutcome; eventIds: string[] }
  | { kind: 'tool_error'; context: ContextPackage; error: ToolDispatchError; eventId: string };

/**
 * One round trip to the generation service. The service only sees a frozen
 * snapshot of the log, and everything it produces is written back through
 * the log's own operations.
 */
export class TurnRunner {
  private readonly narrator: string;

  constructor(
    private readonly log: SessionLog,
    private readonly options: TurnRunnerOptions
  ) {
    this.narrator = options.narrator ?? 'narrator';
  }

  /**
   * Record the player's action, then let the service respond to it. The
   * action reaches the service through the current scene, not the prompt.
   */
  async playerTurn(actor: string, text: string): Promise<TurnOutcome> {
    this.log.logEvent('player_action', actor, { text });
    return this.step();
  }

  async step(prompt = ''): Promise<TurnOutcome> {
    const { service, registry, budget, estimator, telemetry } = this.options;
    const context = buildContext(this.log.snapshot(), budget, { estimator, telemetry });
    const generated = await service.generate({ context, prompt, tools: registry.describe() });

    if (generated.kind === 'text') {
      const eventId = this.log.logEvent('narration', generated.actor ?? this.narrator, { text: generated.text });
      turnLog(`narration ${eventId} (${generated.text.length} chars)`);
      return { kind: 'narration', context, eventId };
    }

    const actor = generated.actor ?? this.narrator;
    // Follow-up events wait until the tool_call itself is logged.
    const pending: Array<() => string> = [];
    const toolContext: ToolContext = {
      actor,
      emit: (type, payload) => {
        pending.push(() => this.log.logEvent(type, actor, payload));
      }
    };

    let outcome: ToolOutcome;
    try {
      outcome = registry.dispatch(generated.name, generated.arguments, toolContext);
    } catch (e) {
      const error =
        e instanceof ToolDispatchError ? e : new ToolDispatchError(describeError(e), generated.name, [describeError(e)]);
      const eventId = this.log.logEvent(
        'system',
        null,
        { text: `Tool ${generated.name} failed: ${error.message}` },
        { tool: generated.name, details: error.details }
      );
      turnLog(`tool ${generated.name} failed: ${error.message}`);
      return { kind: 'tool_error', context, error, eventId };
    }

    // A failed save still applies the event, so the rest are appended before
    // the first failure is passed on.
    const writes: Array<() => string> = [
      () =>
        this.log.logEvent('tool_call', actor, {
          name: outcome.name,
          arguments: outcome.arguments,
          result: outcome.result
        }),
      ...pending
    ];
    const eventIds: string[] = [];
    const failures: StorageFailureError[] = [];
    for (const write of writes) {
      try {
        eventIds.push(write());
      } catch (e) {
        if (!(e instanceof StorageFailureError)) throw e;
        failures.push(e);
        if (e.appliedId !== undefined) eventIds.push(e.appliedId);
      }
    }
    turnLog(`tool ${outcome.name} produced ${eventIds.length} events`);
    if (failures.length > 0) throw failures[0];
    return { kind: 'tool', context, outcome, eventIds };
  }
}
