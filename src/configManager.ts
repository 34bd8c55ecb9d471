import * as fs from 'fs';
import * as path from 'path';
import { fileURLToPath } from 'url';
import { dirname } from 'path';
import { Ajv } from 'ajv';
import type { EstimatorKind } from './context/sizeEstimators.js';
import { DEFAULT_DICE_LIMITS, DiceLimits } from './dice/notationParser.js';
import { describeError } from './errors.js';
import { formatSchemaErrors } from './log/eventSchemas.js';
import { createLogger, enableNamespaces, NAMESPACES } from './logging.js';
import type { SessionStoreDriver } from './storage/types.js';

const __filename = fileURLToPath(import.meta.url);
const __dirname = dirname(__filename);

const configLog = createLogger(NAMESPACES.config);

export const DEFAULT_CONFIG_PATH = path.join(__dirname, '..', 'localConfig', 'config.json');

export interface StorageConfig {
  driver: SessionStoreDriver;
  /** Directory for the json driver, resolved against the config file's directory. */
  jsonDir: string;
  /** Database file for the sqlite driver; `:memory:` is passed through. */
  sqlitePath: string;
}

export interface ContextDefaults {
  maxTokens: number;
  recentScenes: number;
  estimator: EstimatorKind;
  charsPerToken: number;
}

export interface DebugSettings {
  enabledNamespaces?: string;
}

export interface Config {
  storage: StorageConfig;
  context: ContextDefaults;
  dice: DiceLimits;
  debug: DebugSettings;
}

interface ConfigFile {
  storage?: Partial<StorageConfig>;
  context?: Partial<ContextDefaults>;
  dice?: Partial<DiceLimits>;
  debug?: DebugSettings;
}

export const DEFAULT_CONFIG: Config = {
  storage: { driver: 'json', jsonDir: '../data/sessions', sqlitePath: '../data/chronicle.db' },
  context: { maxTokens: 2000, recentScenes: 2, estimator: 'chars', charsPerToken: 4 },
  dice: { ...DEFAULT_DICE_LIMITS },
  debug: {}
};

const ajv = new Ajv({ allErrors: true, strict: false });

const positiveInteger = { type: 'integer', minimum: 1 };

const validateConfigFile = ajv.compile<ConfigFile>({
  type: 'object',
  properties: {
    storage: {
      type: 'object',
      properties: {
        driver: { enum: ['memory', 'json', 'sqlite'] },
        jsonDir: { type: 'string', minLength: 1 },
        sqlitePath: { type: 'string', minLength: 1 }
      },
      additionalProperties: false
    },
    context: {
      type: 'object',
      properties: {
        maxTokens: { type: 'number', minimum: 0 },
        recentScenes: { type: 'integer', minimum: 0 },
        estimator: { enum: ['chars', 'tokenizer'] },
        charsPerToken: { type: 'number', exclusiveMinimum: 0 }
      },
      additionalProperties: false
    },
    dice: {
      type: 'object',
      properties: { maxDice: positiveInteger, maxSides: { type: 'integer', minimum: 2 } },
      additionalProperties: false
    },
    debug: {
      type: 'object',
      properties: { enabledNamespaces: { type: 'string' } }
    }
  },
  additionalProperties: false
});

export class ConfigManager {
  private config: Config;
  private readonly configPath: string;

  constructor(configPath: string = DEFAULT_CONFIG_PATH) {
    this.configPath = configPath;
    this.config = this.loadConfig(configPath);
    enableNamespaces(this.config.debug.enabledNamespaces);
  }

  private loadConfig(configPath: string): Config {
    if (!fs.existsSync(configPath)) {
      configLog(`no config at ${configPath}, using defaults`);
      return this.resolvePaths(structuredClone(DEFAULT_CONFIG));
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(fs.readFileSync(configPath, 'utf-8'));
    } catch (e) {
      throw new Error(`Failed to read config ${configPath}: ${describeError(e)}`);
    }
    if (!validateConfigFile(parsed)) {
      throw new Error(`Invalid config ${configPath}: ${formatSchemaErrors(validateConfigFile.errors).join('; ')}`);
    }

    const merged: Config = {
      storage: { ...DEFAULT_CONFIG.storage, ...parsed.storage },
      context: { ...DEFAULT_CONFIG.context, ...parsed.context },
      dice: { ...DEFAULT_CONFIG.dice, ...parsed.dice },
      debug: { ...DEFAULT_CONFIG.debug, ...parsed.debug }
    };
    configLog(`loaded config from ${configPath} (storage driver ${merged.storage.driver})`);
    return this.resolvePaths(merged);
  }

  private resolvePaths(config: Config): Config {
    const base = path.dirname(this.configPath);
    const { jsonDir, sqlitePath } = config.storage;
    config.storage.jsonDir = path.resolve(base, jsonDir);
    config.storage.sqlitePath = sqlitePath === ':memory:' ? sqlitePath : path.resolve(base, sqlitePath);
    return config;
  }

  getConfig(): Config {
    return structuredClone(this.config);
  }

  getStorageConfig(): StorageConfig {
    return { ...this.config.storage };
  }

  getContextDefaults(): ContextDefaults {
    return { ...this.config.context };
  }

  getDiceLimits(): DiceLimits {
    return { ...this.config.dice };
  }

  reload(): void {
    this.config = this.loadConfig(this.configPath);
    enableNamespaces(this.config.debug.enabledNamespaces);
  }
}
