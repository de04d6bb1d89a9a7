/**
 * Configuration system with YAML and JSON support
 */

import { getHashes } from 'crypto';
import { readFileSync, writeFileSync, existsSync, mkdirSync } from 'fs';
import { dirname } from 'path';
import YAML from 'js-yaml';
import { LogLevel, logger } from './logger.js';
import { CATEGORIES, DuplicatePolicy, TransferMode } from './types.js';

export interface OrganizerConfig {
  mode: TransferMode;
  dryRun: boolean;
  duplicatePolicy: DuplicatePolicy;
  quarantineDir: string;
  hashAlgorithm: string;
  chunkSizeBytes: number;
  hashConcurrency: number;
  verifyCopies: boolean;
  includeGlobs: string[];
  excludeGlobs: string[];
}

export interface PathsConfig {
  reportsDir: string;
  /** No persisted index when unset */
  duplicateIndexPath?: string;
}

export interface ApiConfig {
  host: string;
  port: number;
}

export interface AppConfig {
  organizer: OrganizerConfig;
  paths: PathsConfig;
  api: ApiConfig;
  logLevel: LogLevel;
}

export interface ValidationResult {
  valid: boolean;
  errors: string[];
}

type ConfigTree = Record<string, unknown>;

export const DEFAULT_CONFIG_PATH = './organizer.config.yaml';

export const DEFAULT_CONFIG: AppConfig = {
  organizer: {
    mode: 'move',
    dryRun: false,
    duplicatePolicy: 'report',
    quarantineDir: 'duplicates',
    hashAlgorithm: 'sha256',
    chunkSizeBytes: 65536,
    hashConcurrency: 4,
    verifyCopies: true,
    includeGlobs: ['**/*'],
    excludeGlobs: [],
  },
  paths: {
    reportsDir: './data/reports',
  },
  api: {
    host: 'localhost',
    port: 3000,
  },
  logLevel: 'info',
};

const MODES: readonly TransferMode[] = ['move', 'copy'];
const POLICIES: readonly DuplicatePolicy[] = ['report', 'quarantine'];
const LOG_LEVELS: readonly LogLevel[] = ['debug', 'info', 'warn', 'error'];

function isRecord(value: unknown): value is ConfigTree {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function defaultTree(): ConfigTree {
  const { organizer, paths, api, logLevel } = DEFAULT_CONFIG;
  return {
    organizer: { ...organizer, includeGlobs: [...organizer.includeGlobs], excludeGlobs: [...organizer.excludeGlobs] },
    paths: { ...paths },
    api: { ...api },
    logLevel,
  };
}

/**
 * Merge user config over defaults (user config takes precedence). Nested
 * sections merge key by key; arrays and scalars replace.
 */
function mergeTrees(base: ConfigTree, override: ConfigTree): ConfigTree {
  const merged: ConfigTree = { ...base };

  for (const [key, value] of Object.entries(override)) {
    if (value === null || value === undefined) continue;

    const current = merged[key];
    merged[key] = isRecord(value) && isRecord(current) ? mergeTrees(current, value) : value;
  }

  return merged;
}

function section(tree: ConfigTree, key: string): ConfigTree {
  const value = tree[key];
  return isRecord(value) ? value : {};
}

/**
 * Reads typed values out of the raw tree, noting every value that does not
 * fit and falling back to the default for it.
 */
class ConfigReader {
  readonly errors: string[] = [];

  oneOf<T extends string>(value: unknown, allowed: readonly T[], key: string, fallback: T): T {
    if (value === undefined) return fallback;
    const match = allowed.find(option => option === value);
    if (match === undefined) {
      this.errors.push(`${key} must be one of: ${allowed.join(', ')}`);
      return fallback;
    }
    return match;
  }

  boolean(value: unknown, key: string, fallback: boolean): boolean {
    if (value === undefined) return fallback;
    if (typeof value === 'boolean') return value;
    if (value === 'true' || value === 'false') return value === 'true';
    this.errors.push(`${key} must be a boolean`);
    return fallback;
  }

  string(value: unknown, key: string, fallback: string): string {
    if (value === undefined) return fallback;
    if (typeof value === 'string' && value.length > 0) return value;
    this.errors.push(`${key} must be a non-empty string`);
    return fallback;
  }

  optionalString(value: unknown, key: string): string | undefined {
    if (value === undefined || value === '') return undefined;
    if (typeof value === 'string') return value;
    this.errors.push(`${key} must be a string`);
    return undefined;
  }

  integer(value: unknown, key: string, fallback: number, min: number, max = Number.MAX_SAFE_INTEGER): number {
    if (value === undefined) return fallback;
    const numeric = typeof value === 'string' && value.trim() !== '' ? Number(value) : value;
    if (typeof numeric === 'number' && Number.isInteger(numeric) && numeric >= min && numeric <= max) {
      return numeric;
    }
    this.errors.push(
      max === Number.MAX_SAFE_INTEGER ? `${key} must be an integer >= ${min}` : `${key} must be an integer between ${min} and ${max}`
    );
    return fallback;
  }

  stringList(value: unknown, key: string, fallback: string[]): string[] {
    if (value === undefined) return [...fallback];
    if (Array.isArray(value) && value.every(item => typeof item === 'string')) {
      return value.map(item => String(item));
    }
    this.errors.push(`${key} must be a list of strings`);
    return [...fallback];
  }
}

function resolveConfig(tree: ConfigTree): { config: AppConfig; errors: string[] } {
  const reader = new ConfigReader();
  const defaults = DEFAULT_CONFIG;
  const organizer = section(tree, 'organizer');
  const paths = section(tree, 'paths');
  const api = section(tree, 'api');

  const quarantineDir = reader.string(organizer.quarantineDir, 'organizer.quarantineDir', defaults.organizer.quarantineDir);
  if (/[\\/]/.test(quarantineDir) || quarantineDir === '.' || quarantineDir === '..') {
    reader.errors.push('organizer.quarantineDir must be a single directory name');
  }
  if (CATEGORIES.some(category => category === quarantineDir)) {
    reader.errors.push('organizer.quarantineDir must not be a category name');
  }

  const hashAlgorithm = reader.string(organizer.hashAlgorithm, 'organizer.hashAlgorithm', defaults.organizer.hashAlgorithm);
  if (!getHashes().includes(hashAlgorithm.toLowerCase())) {
    reader.errors.push(`organizer.hashAlgorithm is not supported: ${hashAlgorithm}`);
  }

  const config: AppConfig = {
    organizer: {
      mode: reader.oneOf(organizer.mode, MODES, 'organizer.mode', defaults.organizer.mode),
      dryRun: reader.boolean(organizer.dryRun, 'organizer.dryRun', defaults.organizer.dryRun),
      duplicatePolicy: reader.oneOf(
        organizer.duplicatePolicy,
        POLICIES,
        'organizer.duplicatePolicy',
        defaults.organizer.duplicatePolicy
      ),
      quarantineDir,
      hashAlgorithm,
      chunkSizeBytes: reader.integer(organizer.chunkSizeBytes, 'organizer.chunkSizeBytes', defaults.organizer.chunkSizeBytes, 1),
      hashConcurrency: reader.integer(
        organizer.hashConcurrency,
        'organizer.hashConcurrency',
        defaults.organizer.hashConcurrency,
        1
      ),
      verifyCopies: reader.boolean(organizer.verifyCopies, 'organizer.verifyCopies', defaults.organizer.verifyCopies),
      includeGlobs: reader.stringList(organizer.includeGlobs, 'organizer.includeGlobs', defaults.organizer.includeGlobs),
      excludeGlobs: reader.stringList(organizer.excludeGlobs, 'organizer.excludeGlobs', defaults.organizer.excludeGlobs),
    },
    paths: {
      reportsDir: reader.string(paths.reportsDir, 'paths.reportsDir', defaults.paths.reportsDir),
      duplicateIndexPath: reader.optionalString(paths.duplicateIndexPath, 'paths.duplicateIndexPath'),
    },
    api: {
      host: reader.string(api.host, 'api.host', defaults.api.host),
      port: reader.integer(api.port, 'api.port', defaults.api.port, 1, 65535),
    },
    logLevel: reader.oneOf(tree.logLevel, LOG_LEVELS, 'logLevel', defaults.logLevel),
  };

  return { config, errors: reader.errors };
}

/**
 * Environment variables that override file settings, as dotted paths.
 */
export const ENV_OVERRIDES: ReadonlyArray<[string, string]> = [
  ['ORGANIZER_MODE', 'organizer.mode'],
  ['ORGANIZER_DUPLICATE_POLICY', 'organizer.duplicatePolicy'],
  ['ORGANIZER_HASH_CONCURRENCY', 'organizer.hashConcurrency'],
  ['ORGANIZER_REPORTS_DIR', 'paths.reportsDir'],
  ['ORGANIZER_INDEX_PATH', 'paths.duplicateIndexPath'],
  ['LOG_LEVEL', 'logLevel'],
  ['PORT', 'api.port'],
];

/**
 * Configuration manager
 */
export class ConfigManager {
  private tree: ConfigTree;
  private configPath: string;
  private isDirty = false;

  constructor(configPath: string = DEFAULT_CONFIG_PATH, env: NodeJS.ProcessEnv = process.env) {
    this.configPath = configPath;
    this.tree = this.loadConfig();
    this.applyEnvironment(env);
  }

  /**
   * Load configuration from file or use defaults
   */
  private loadConfig(): ConfigTree {
    if (!existsSync(this.configPath)) {
      logger.info(`Config file not found: ${this.configPath}, using defaults`, { path: this.configPath }, 'ConfigManager');
      return defaultTree();
    }

    try {
      const content = readFileSync(this.configPath, 'utf-8');
      let parsed: unknown;

      if (this.configPath.endsWith('.json')) {
        parsed = JSON.parse(content);
      } else if (this.configPath.endsWith('.yaml') || this.configPath.endsWith('.yml')) {
        parsed = YAML.load(content);
      } else {
        throw new Error(`Unsupported config format: ${this.configPath}`);
      }

      if (parsed === undefined || parsed === null) {
        return defaultTree();
      }
      if (!isRecord(parsed)) {
        throw new Error('Config root must be a mapping');
      }

      logger.info(`Loaded configuration from ${this.configPath}`, undefined, 'ConfigManager');
      return mergeTrees(defaultTree(), parsed);
    } catch (error) {
      logger.warn(
        `Failed to load config: ${error instanceof Error ? error.message : String(error)}`,
        undefined,
        'ConfigManager'
      );
      return defaultTree();
    }
  }

  private applyEnvironment(env: NodeJS.ProcessEnv): void {
    for (const [variable, path] of ENV_OVERRIDES) {
      const value = env[variable];
      if (value !== undefined && value !== '') {
        this.setValue(path, value);
      }
    }
  }

  /**
   * Get complete, typed configuration. Values that fail validation fall
   * back to their defaults here; `validate()` lists them.
   */
  getAll(): AppConfig {
    return resolveConfig(this.tree).config;
  }

  /**
   * Get nested configuration value
   */
  get(path: string, defaultValue?: unknown): unknown {
    let value: unknown = this.tree;

    for (const part of path.split('.')) {
      if (!isRecord(value)) return defaultValue;
      value = value[part];
    }

    return value ?? defaultValue;
  }

  /**
   * Set configuration value
   */
  set(path: string, value: unknown): void {
    this.setValue(path, value);
    this.isDirty = true;
    logger.debug(`Config updated: ${path}`, { value }, 'ConfigManager');
  }

  private setValue(path: string, value: unknown): void {
    const parts = path.split('.');
    const lastKey = parts.pop();

    if (!lastKey) return;

    let node = this.tree;
    for (const part of parts) {
      const child = node[part];
      if (isRecord(child)) {
        node = child;
      } else {
        const created: ConfigTree = {};
        node[part] = created;
        node = created;
      }
    }

    node[lastKey] = value;
  }

  /**
   * Save configuration to file
   */
  save(): void {
    if (!this.isDirty) return;

    mkdirSync(dirname(this.configPath), { recursive: true });
    const content = this.configPath.endsWith('.json') ? `${this.toJSON()}\n` : this.toYAML();
    writeFileSync(this.configPath, content);
    this.isDirty = false;

    logger.info(`Configuration saved to ${this.configPath}`, undefined, 'ConfigManager');
  }

  /**
   * Reset to defaults
   */
  reset(): void {
    this.tree = defaultTree();
    this.isDirty = true;
    logger.info('Configuration reset to defaults', undefined, 'ConfigManager');
  }

  validate(): ValidationResult {
    const { errors } = resolveConfig(this.tree);
    return { valid: errors.length === 0, errors };
  }

  toJSON(): string {
    return JSON.stringify(this.tree, null, 2);
  }

  toYAML(): string {
    return YAML.dump(this.tree, { indent: 2 });
  }

  getPath(): string {
    return this.configPath;
  }
}

/**
 * Global config instance
 */
let globalConfig: ConfigManager | null = null;

export function getConfig(path?: string): ConfigManager {
  if (!globalConfig) {
    globalConfig = new ConfigManager(path);
  }
  return globalConfig;
}
