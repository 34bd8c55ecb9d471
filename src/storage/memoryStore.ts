import type { Session } from '../log/types.js';
import { deserializeSession, serializeSession } from './sessionCodec.js';
import type { SessionStore } from './types.js';

/** Keeps serialized documents in a map, so callers never share objects with it. */
export class MemorySessionStore implements SessionStore {
  private readonly documents = new Map<string, string>();

  load(sessionId: string): Session | undefined {
    const text = this.documents.get(sessionId);
    return text === undefined ? undefined : deserializeSession(text, sessionId);
  }

  save(session: Session): void {
    this.documents.set(session.id, serializeSession(session));
  }

  list(): string[] {
    return Array.from(this.documents.keys()).sort();
  }

  /** Raw stored text, for inspection in tests and tooling. */
  raw(sessionId: string): string | undefined {
    return this.documents.get(sessionId);
  }
}
