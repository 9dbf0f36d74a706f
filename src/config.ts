/**
 * Configuration system with YAML and JSON support
 */

import { readFileSync, writeFileSync, existsSync, mkdirSync } from 'fs';
import { dirname } from 'path';
import YAML from 'js-yaml';
import { logger, type LogLevel } from './logger.js';

export interface PathsConfig {
  entityTable?: string;
  sourceStore?: string;
  referenceIndex?: string;
  masterDocument?: string;
  destinationRoot?: string;
}

export interface NamingConfig {
  candidateTable: string;
  mergedOutput: string;
  backupSuffix: string;
  cacheSidecar: string;
  duplicateInfix: string;
}

export type CopyIdentity = 'size' | 'content';

export interface CopyConfig {
  identity: CopyIdentity;
}

export interface SourceStoreConfig {
  recursive: boolean;
}

export interface MergeConfig {
  skipDuplicatePages: boolean;
}

export interface LoggingConfig {
  level: LogLevel;
  actionLog: string;
  errorReport: string;
  console: boolean;
}

export interface AppConfig {
  paths: PathsConfig;
  naming: NamingConfig;
  copy: CopyConfig;
  sourceStore: SourceStoreConfig;
  merge: MergeConfig;
  logging: LoggingConfig;
}

export type ConfigSection = keyof AppConfig;

export const DEFAULT_CONFIG: AppConfig = {
  paths: {},
  naming: {
    candidateTable: 'output.xlsx',
    mergedOutput: 'Combined.pdf',
    backupSuffix: '_FRI',
    cacheSidecar: '.merge-cache.json',
    duplicateInfix: '_dup'
  },
  copy: {
    identity: 'size'
  },
  sourceStore: {
    recursive: false
  },
  merge: {
    skipDuplicatePages: true
  },
  logging: {
    level: 'info',
    actionLog: './orchestrator_log.txt',
    errorReport: './error_report.txt',
    console: true
  }
};

const ENV_PATHS = [
  ['entityTable', 'SYNC_ENTITY_TABLE'],
  ['sourceStore', 'SYNC_SOURCE_STORE'],
  ['referenceIndex', 'SYNC_REFERENCE_INDEX'],
  ['masterDocument', 'SYNC_MASTER_DOCUMENT'],
  ['destinationRoot', 'SYNC_DESTINATION_ROOT']
] as const;

function cloneConfig(config: AppConfig): AppConfig {
  return structuredClone(config);
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function sectionOf(config: AppConfig, section: string): Record<string, unknown> | undefined {
  const value: unknown = Reflect.get(config, section);
  return isRecord(value) ? value : undefined;
}

/**
 * Configuration manager
 */
export class ConfigManager {
  private config: AppConfig;
  private configPath: string;
  private isDirty = false;

  constructor(configPath: string = './sync.config.yaml') {
    this.configPath = configPath;
    this.config = this.loadConfig();
  }

  /**
   * Load configuration from file or use defaults
   */
  private loadConfig(): AppConfig {
    if (!existsSync(this.configPath)) {
      logger.debug(`Config file not found: ${this.configPath}, using defaults`, { path: this.configPath });
      return cloneConfig(DEFAULT_CONFIG);
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

      logger.info(`Loaded configuration from ${this.configPath}`);

      return this.mergeConfigs(cloneConfig(DEFAULT_CONFIG), isRecord(parsed) ? parsed : {});
    } catch (error) {
      logger.warn(`Failed to load config: ${error instanceof Error ? error.message : String(error)}`);
      return cloneConfig(DEFAULT_CONFIG);
    }
  }

  /**
   * Merge user config into a fresh copy of the defaults (user config takes
   * precedence). Unknown sections and keys are ignored.
   */
  private mergeConfigs(defaults: AppConfig, user: Record<string, unknown>): AppConfig {
    const pathKeys: string[] = ENV_PATHS.map(([key]) => key);

    for (const section of Object.keys(defaults)) {
      const value = user[section];
      const target = sectionOf(defaults, section);
      if (!isRecord(value) || !target) continue;

      const known = new Set(section === 'paths' ? pathKeys : Object.keys(target));
      for (const [key, entry] of Object.entries(value)) {
        if (entry === null || entry === undefined || !known.has(key)) continue;
        target[key] = entry;
      }
    }

    return defaults;
  }

  /**
   * Apply SYNC_* environment variables on top of the file configuration
   */
  applyEnvironment(env: NodeJS.ProcessEnv = process.env): this {
    for (const [key, variable] of ENV_PATHS) {
      const value = env[variable]?.trim();
      if (value) {
        this.config.paths[key] = value;
      }
    }
    const level = env.LOG_LEVEL?.trim().toLowerCase();
    if (level === 'debug' || level === 'info' || level === 'warn' || level === 'error') {
      this.config.logging.level = level;
    }
    return this;
  }

  /**
   * Get complete configuration
   */
  getAll(): AppConfig {
    return cloneConfig(this.config);
  }

  /**
   * Get one section of the configuration
   */
  getSection<K extends ConfigSection>(section: K): AppConfig[K] {
    return structuredClone(this.config[section]);
  }

  /**
   * Get nested configuration value
   */
  get(path: string): unknown {
    let value: unknown = this.config;

    for (const part of path.split('.')) {
      if (!isRecord(value)) return undefined;
      value = value[part];
    }

    return value;
  }

  /**
   * Set a value inside an existing section, e.g. `naming.backupSuffix`
   */
  set(path: string, value: unknown): void {
    const [section, key, ...rest] = path.split('.');
    const target = section ? sectionOf(this.config, section) : undefined;
    if (!target || !key || rest.length > 0) {
      throw new Error(`Unknown config path: ${path}`);
    }

    target[key] = value;
    this.isDirty = true;

    logger.debug(`Config updated: ${path}`, { value });
  }

  /**
   * Save configuration to file
   */
  save(): void {
    if (!this.isDirty) return;

    mkdirSync(dirname(this.configPath), { recursive: true });
    const content = this.configPath.endsWith('.json')
      ? JSON.stringify(this.config, null, 2)
      : YAML.dump(this.config, { indent: 2 });

    writeFileSync(this.configPath, content);
    this.isDirty = false;

    logger.info(`Configuration saved to ${this.configPath}`);
  }

  /**
   * Reset to defaults
   */
  reset(): void {
    this.config = cloneConfig(DEFAULT_CONFIG);
    this.isDirty = true;
  }

  /**
   * Validate configuration
   */
  validate(): { valid: boolean; errors: string[] } {
    const errors: string[] = [];
    const { naming, copy, sourceStore, merge, logging } = this.config;

    if (typeof naming.backupSuffix !== 'string' || !naming.backupSuffix.trim()) {
      errors.push('Backup suffix must not be empty');
    }
    if (typeof naming.mergedOutput !== 'string' || !naming.mergedOutput.toLowerCase().endsWith('.pdf')) {
      errors.push('Merged output must be a .pdf file name');
    }
    if (/^\d+\.pdf$/i.test(naming.mergedOutput)) {
      errors.push('Merged output name collides with extracted page names');
    }
    if (typeof naming.candidateTable !== 'string' || !naming.candidateTable.toLowerCase().endsWith('.xlsx')) {
      errors.push('Candidate table must be an .xlsx file name');
    }
    if (!naming.duplicateInfix) {
      errors.push('Duplicate infix must not be empty');
    }
    if (copy.identity !== 'size' && copy.identity !== 'content') {
      errors.push('Copy identity must be "size" or "content"');
    }
    if (typeof sourceStore.recursive !== 'boolean') {
      errors.push('Source store recursive must be true or false');
    }
    if (typeof merge.skipDuplicatePages !== 'boolean') {
      errors.push('Skip duplicate pages must be true or false');
    }
    if (typeof logging.console !== 'boolean') {
      errors.push('Console logging must be true or false');
    }
    if (!['debug', 'info', 'warn', 'error'].includes(logging.level)) {
      errors.push('Log level must be debug, info, warn or error');
    }

    return {
      valid: errors.length === 0,
      errors
    };
  }

  /**
   * Get config file path
   */
  getPath(): string {
    return this.configPath;
  }
}

/**
 * Create example config file
 */
export function createExampleConfig(outputPath: string = './sync.config.example.yaml'): void {
  const exampleConfig: AppConfig = {
    ...cloneConfig(DEFAULT_CONFIG),
    paths: {
      entityTable: './loops.xlsx',
      sourceStore: './server/iso',
      referenceIndex: './master-index.txt',
      masterDocument: './master.pdf',
      destinationRoot: './loops'
    }
  };

  mkdirSync(dirname(outputPath), { recursive: true });
  writeFileSync(outputPath, YAML.dump(exampleConfig, { indent: 2 }));
  logger.info(`Example config created: ${outputPath}`);
}
