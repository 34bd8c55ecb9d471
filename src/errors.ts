export type ChronicleErrorCode =
  | 'INVALID_NOTATION'
  | 'NO_ACTIVE_SCENE'
  | 'STORAGE_FAILURE'
  | 'TOOL_DISPATCH';

export class InvalidNotationError extends Error {
  readonly code: ChronicleErrorCode = 'INVALID_NOTATION';

  constructor(
    message: string,
    public readonly notation: string,
    public readonly position: number,
  ) {
    super(`${message} (at position ${position} in "${notation}")`);
    this.name = 'InvalidNotationError';
  }
}

export class NoActiveSceneError extends Error {
  readonly code: ChronicleErrorCode = 'NO_ACTIVE_SCENE';

  constructor(public readonly operation: string) {
    super(`Cannot ${operation}: no active scene. Start a scene first.`);
    this.name = 'NoActiveSceneError';
  }
}

/**
 * Raised when a session could not be written to or read from its store.
 * For writes, the in-memory log already holds the change identified by
 * `appliedId`; the next mutation or an explicit flush retries the save.
 */
export class StorageFailureError extends Error {
  readonly code: ChronicleErrorCode = 'STORAGE_FAILURE';

  constructor(
    message: string,
    public readonly sessionId: string,
    public readonly reason?: unknown,
    public readonly appliedId?: string,
  ) {
    super(message);
    this.name = 'StorageFailureError';
  }
}

export class ToolDispatchError extends Error {
  readonly code: ChronicleErrorCode = 'TOOL_DISPATCH';

  constructor(
    message: string,
    public readonly toolName: string,
    public readonly details: string[] = [],
  ) {
    super(message);
    this.name = 'ToolDispatchError';
  }
}

/** Informational only; attached to a context package, never thrown. */
export interface BudgetExhaustedWarning {
  kind: 'budget_exhausted';
  sceneId: string;
  required: number;
  budget: number;
  message: string;
}

export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
