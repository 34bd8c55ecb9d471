import fs from 'fs';
import path from 'path';
import { describeError, StorageFailureError } from '../errors.js';
import type { Session } from '../log/types.js';
import { createLogger, NAMESPACES } from '../logging.js';
import { deserializeSession, serializeSession } from './sessionCodec.js';
import type { SessionStore } from './types.js';

const jsonStoreLog = createLogger(NAMESPACES.storage.json);

const SESSION_ID_PATTERN = /^[A-Za-z0-9_-]+$/;

/**
 * One pretty-printed JSON document per session under `<baseDir>/<id>.json`.
 * Writes go to a temporary file first and are renamed into place.
 */
export class JsonFileSessionStore implements SessionStore {
  constructor(private readonly baseDir: string) {}

  filePath(sessionId: string): string {
    if (!SESSION_ID_PATTERN.test(sessionId)) {
      throw new StorageFailureError(`Session id "${sessionId}" cannot be used as a file name`, sessionId);
    }
    return path.join(this.baseDir, `${sessionId}.json`);
  }

  load(sessionId: string): Session | undefined {
    const file = this.filePath(sessionId);
    let content: string;
    try {
      if (!fs.existsSync(file)) return undefined;
      content = fs.readFileSync(file, 'utf-8');
    } catch (e) {
      throw new StorageFailureError(`Failed to read ${file}: ${describeError(e)}`, sessionId, e);
    }

    try {
      return deserializeSession(content, sessionId);
    } catch (parseErr) {
      const bakPath = `${file}.corrupt.${Date.now()}`;
      try {
        fs.writeFileSync(bakPath, content, 'utf-8');
        jsonStoreLog(`${file} was malformed; backed up to ${bakPath}`);
      } catch (bakErr) {
        jsonStoreLog(`failed to back up malformed ${file}: ${describeError(bakErr)}`);
      }
      throw new StorageFailureError(
        `Session file ${file} is malformed (backup at ${bakPath}): ${describeError(parseErr)}`,
        sessionId,
        parseErr
      );
    }
  }

  save(session: Session): void {
    const file = this.filePath(session.id);
    const tmp = `${file}.tmp`;
    try {
      fs.mkdirSync(this.baseDir, { recursive: true });
      fs.writeFileSync(tmp, serializeSession(session), 'utf-8');
      fs.renameSync(tmp, file);
      jsonStoreLog(`saved session ${session.id} to ${file}`);
    } catch (e) {
      throw new StorageFailureError(`Failed to write ${file}: ${describeError(e)}`, session.id, e);
    }
  }

  list(): string[] {
    if (!fs.existsSync(this.baseDir)) return [];
    return fs
      .readdirSync(this.baseDir)
      .filter((name) => name.endsWith('.json'))
      .map((name) => name.slice(0, -'.json'.length))
      .filter((id) => SESSION_ID_PATTERN.test(id))
      .sort();
  }
}
