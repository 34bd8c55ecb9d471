import type { StorageConfig } from '../configManager.js';
import { createLogger, NAMESPACES } from '../logging.js';
import { JsonFileSessionStore } from './jsonFileStore.js';
import { MemorySessionStore } from './memoryStore.js';
import { SqliteSessionStore } from './sqliteStore.js';
import type { SessionStore } from './types.js';

const factoryLog = createLogger(NAMESPACES.storage.factory);

export function createSessionStore(config: StorageConfig): SessionStore {
  factoryLog(`creating ${config.driver} session store`);
  switch (config.driver) {
    case 'memory':
      return new MemorySessionStore();
    case 'json':
      return new JsonFileSessionStore(config.jsonDir);
    case 'sqlite':
      return SqliteSessionStore.open(config.sqlitePath);
  }
}
