export * from './errors.js';
export { createLogger, enableNamespaces, NAMESPACES } from './logging.js';
export { ConfigManager, DEFAULT_CONFIG } from './configManager.js';
export type { Config, ContextDefaults, StorageConfig } from './configManager.js';

export * from './dice/types.js';
export { DEFAULT_DICE_LIMITS, formatNotation, parseNotation, tryParseNotation } from './dice/notationParser.js';
export type { DiceLimits } from './dice/notationParser.js';
export { describeRoll, expandTerm, rollDice, rollNotation, rollRepeated } from './dice/diceRoller.js';
export { createCryptoRandom, createFixedSequence, createSeededRandom, hashSeed } from './dice/randomSource.js';

export * from './log/types.js';
export { SessionLog } from './log/sessionLog.js';
export type { IdKind, SessionLogOptions, StartSceneInput } from './log/sessionLog.js';
export { describeEvent, toDiceRollPayload } from './log/eventFormat.js';

export * from './context/types.js';
export { buildContext } from './context/contextAssembler.js';
export type { BuildContextOptions } from './context/contextAssembler.js';
export { ContextRenderer, renderContext } from './context/contextRenderer.js';
export { contextTelemetry, ContextTelemetry } from './context/contextTelemetry.js';
export type { ContextUsageRecord, ContextUsageSummary } from './context/contextTelemetry.js';
export {
  checkedEstimator,
  createCharEstimator,
  createEstimator,
  createTokenizerEstimator
} from './context/sizeEstimators.js';
export type { EstimatorKind, TokenizerEstimatorOptions } from './context/sizeEstimators.js';

export type { SessionStore, SessionStoreDriver } from './storage/types.js';
export {
  decodeSession,
  deserializeSession,
  encodeSession,
  FORMAT_VERSION,
  serializeSession
} from './storage/sessionCodec.js';
export type { EventDocument, SceneDocument, SessionDocument } from './storage/sessionCodec.js';
export { MemorySessionStore } from './storage/memoryStore.js';
export { JsonFileSessionStore } from './storage/jsonFileStore.js';
export { SqliteSessionStore } from './storage/sqliteStore.js';
export { createSessionStore } from './storage/storeFactory.js';

export * from './generation/types.js';
export { parseToolArguments, ToolRegistry } from './generation/toolRegistry.js';
export type { ToolContext, ToolDefinition } from './generation/toolRegistry.js';
export { createDiceTool, DICE_TOOL_NAME } from './generation/diceTool.js';
export { TurnRunner } from './generation/turnRunner.js';
export type { TurnOutcome, TurnRunnerOptions } from './generation/turnRunner.js';
