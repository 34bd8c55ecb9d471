import type { Session } from '../log/types.js';

/**
 * Persistence sink for whole sessions. Implementations are synchronous and
 * must copy what they are given: the log keeps mutating its session after a
 * save returns.
 */
export interface SessionStore {
  load(sessionId: string): Session | undefined;
  save(session: Session): void;
  list(): string[];
}

export type SessionStoreDriver = 'memory' | 'json' | 'sqlite';
