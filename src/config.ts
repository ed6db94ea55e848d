/**
 * Configuration system with YAML and JSON support
 *
 * Precedence: CLI flags > environment > config file > defaults.
 */

import { existsSync, readFileSync } from 'fs';
import { join, resolve } from 'path';
import YAML from 'js-yaml';
import { DEFAULT_ARCHIVE_EXTENSIONS, DEFAULT_MEDIA_EXTENSIONS, normalizeExtension } from './classifier.js';
import { DEFAULT_MAX_ARCHIVE_PASSES } from './archive-expander.js';
import { AppError, isLogLevel, logger, type LogLevel } from './logger.js';
import type { PlanMode, SorterConfig } from './types.js';

export interface AppConfig {
  sourceRoot?: string;
  /** Defaults to <sourceRoot>/NonMedia */
  backupRoot?: string;
  mode: PlanMode;
  dryRun: boolean;
  mediaExtensions: string[];
  archiveExtensions: string[];
  maxArchivePasses: number;
  /** Where run logs are written; defaults to the backup root */
  logDir?: string;
  logLevel: LogLevel;
}

export const DEFAULT_BACKUP_DIRNAME = 'NonMedia';

export const DEFAULT_CONFIG: AppConfig = {
  mode: 'preserve',
  dryRun: false,
  mediaExtensions: [...DEFAULT_MEDIA_EXTENSIONS],
  archiveExtensions: [...DEFAULT_ARCHIVE_EXTENSIONS],
  maxArchivePasses: DEFAULT_MAX_ARCHIVE_PASSES,
  logLevel: 'info'
};

const PLAN_MODES: readonly PlanMode[] = ['preserve', 'flatten-by-scope'];

export function isPlanMode(value: unknown): value is PlanMode {
  return typeof value === 'string' && (PLAN_MODES as readonly string[]).includes(value);
}

function cloneConfig(config: AppConfig): AppConfig {
  return structuredClone(config);
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isStringArray(value: unknown): value is string[] {
  return Array.isArray(value) && value.every(item => typeof item === 'string');
}

/**
 * Known keys of an untyped config object; wrongly typed values are reported
 * and dropped.
 */
export function parseConfigObject(raw: unknown, issues: string[] = []): Partial<AppConfig> {
  if (raw === undefined || raw === null) return {};
  if (!isRecord(raw)) {
    issues.push('Configuration must be a mapping of keys to values');
    return {};
  }

  const parsed: Partial<AppConfig> = {};
  const stringKeys = ['sourceRoot', 'backupRoot', 'logDir'] as const;

  for (const key of stringKeys) {
    const value = raw[key];
    if (value === undefined || value === null) continue;
    if (typeof value === 'string') parsed[key] = value;
    else issues.push(`${key} must be a string`);
  }

  if (raw.mode !== undefined) {
    if (isPlanMode(raw.mode)) parsed.mode = raw.mode;
    else issues.push(`mode must be one of ${PLAN_MODES.join(', ')}`);
  }

  if (raw.dryRun !== undefined) {
    if (typeof raw.dryRun === 'boolean') parsed.dryRun = raw.dryRun;
    else issues.push('dryRun must be a boolean');
  }

  for (const key of ['mediaExtensions', 'archiveExtensions'] as const) {
    const value = raw[key];
    if (value === undefined) continue;
    if (isStringArray(value)) parsed[key] = value.map(normalizeExtension).filter(Boolean);
    else issues.push(`${key} must be a list of extensions`);
  }

  if (raw.maxArchivePasses !== undefined) {
    if (typeof raw.maxArchivePasses === 'number' && Number.isInteger(raw.maxArchivePasses)) {
      parsed.maxArchivePasses = raw.maxArchivePasses;
    } else {
      issues.push('maxArchivePasses must be an integer');
    }
  }

  if (raw.logLevel !== undefined) {
    if (isLogLevel(raw.logLevel)) parsed.logLevel = raw.logLevel;
    else issues.push('logLevel must be one of debug, info, warn, error');
  }

  return parsed;
}

/**
 * Overrides from MEDIASIFT_* variables and LOG_LEVEL
 */
export function configFromEnv(env: NodeJS.ProcessEnv = process.env, issues: string[] = []): Partial<AppConfig> {
  const parsed: Partial<AppConfig> = {};

  if (env.MEDIASIFT_SOURCE?.trim()) parsed.sourceRoot = env.MEDIASIFT_SOURCE.trim();
  if (env.MEDIASIFT_BACKUP?.trim()) parsed.backupRoot = env.MEDIASIFT_BACKUP.trim();
  if (env.MEDIASIFT_LOG_DIR?.trim()) parsed.logDir = env.MEDIASIFT_LOG_DIR.trim();

  const mode = env.MEDIASIFT_MODE?.trim();
  if (mode) {
    if (isPlanMode(mode)) parsed.mode = mode;
    else issues.push(`MEDIASIFT_MODE must be one of ${PLAN_MODES.join(', ')}`);
  }

  const dryRun = env.MEDIASIFT_DRY_RUN?.trim().toLowerCase();
  if (dryRun) parsed.dryRun = dryRun === '1' || dryRun === 'true' || dryRun === 'yes';

  const level = env.LOG_LEVEL?.trim();
  if (level && isLogLevel(level)) parsed.logLevel = level;

  return parsed;
}

/**
 * Configuration manager
 */
export class ConfigManager {
  private config: AppConfig;
  private configPath: string;
  private issues: string[] = [];

  constructor(configPath: string = './mediasift.yaml') {
    this.configPath = configPath;
    this.config = this.loadConfig();
  }

  /**
   * Load configuration from file or use defaults
   */
  private loadConfig(): AppConfig {
    if (!existsSync(this.configPath)) {
      logger.debug(
        `Config file not found: ${this.configPath}, using defaults`,
        { path: this.configPath },
        'ConfigManager'
      );
      return cloneConfig(DEFAULT_CONFIG);
    }

    try {
      const content = readFileSync(this.configPath, 'utf-8');
      let raw: unknown;

      if (this.configPath.endsWith('.json')) {
        raw = JSON.parse(content);
      } else if (this.configPath.endsWith('.yaml') || this.configPath.endsWith('.yml')) {
        raw = YAML.load(content);
      } else {
        throw new Error(`Unsupported config format: ${this.configPath}`);
      }

      logger.info(
        `Loaded configuration from ${this.configPath}`,
        undefined,
        'ConfigManager'
      );

      return this.mergeConfigs(cloneConfig(DEFAULT_CONFIG), parseConfigObject(raw, this.issues));
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      this.issues.push(`Failed to load ${this.configPath}: ${message}`);
      logger.warn(`Failed to load config: ${message}`, undefined, 'ConfigManager');
      return cloneConfig(DEFAULT_CONFIG);
    }
  }

  /**
   * Merge overrides into a config (override values take precedence)
   */
  private mergeConfigs(base: AppConfig, override: Partial<AppConfig>): AppConfig {
    const merged: AppConfig = { ...base };

    for (const [key, value] of Object.entries(override)) {
      if (value === null || value === undefined) continue;
      Object.assign(merged, { [key]: value });
    }

    return merged;
  }

  /**
   * Layer further overrides (environment, CLI flags) on top of the file
   */
  apply(override: Partial<AppConfig>): this {
    this.config = this.mergeConfigs(this.config, override);
    return this;
  }

  /**
   * Record problems found while reading an override source
   */
  addIssues(issues: readonly string[]): this {
    this.issues.push(...issues);
    return this;
  }

  /**
   * Get complete configuration
   */
  getAll(): AppConfig {
    return cloneConfig(this.config);
  }

  /**
   * Validate configuration
   */
  validate(): { valid: boolean; errors: string[] } {
    const errors: string[] = [...this.issues];

    if (!this.config.sourceRoot?.trim()) {
      errors.push('sourceRoot is required');
    }

    if (this.config.maxArchivePasses < 1) {
      errors.push('maxArchivePasses must be at least 1');
    }

    if (this.config.mediaExtensions.length === 0) {
      errors.push('mediaExtensions must not be empty');
    }

    const media = new Set(this.config.mediaExtensions);
    const overlap = this.config.archiveExtensions.filter(extension => media.has(extension));
    if (overlap.length > 0) {
      errors.push(`Extensions cannot be both media and archive: ${overlap.join(', ')}`);
    }

    return {
      valid: errors.length === 0,
      errors
    };
  }

  /**
   * Engine configuration with every path resolved
   */
  toSorterConfig(): SorterConfig {
    const { valid, errors } = this.validate();
    const sourceRoot = this.config.sourceRoot?.trim();
    if (!valid || !sourceRoot) {
      throw new AppError(`Invalid configuration: ${errors.join('; ')}`, 'INVALID_CONFIG', { errors });
    }

    const resolvedSource = resolve(sourceRoot);
    return {
      sourceRoot: resolvedSource,
      backupRoot: resolve(this.config.backupRoot?.trim() || join(resolvedSource, DEFAULT_BACKUP_DIRNAME)),
      mode: this.config.mode,
      dryRun: this.config.dryRun,
      mediaExtensions: new Set(this.config.mediaExtensions.map(normalizeExtension)),
      archiveExtensions: new Set(this.config.archiveExtensions.map(normalizeExtension)),
      maxArchivePasses: this.config.maxArchivePasses
    };
  }

  /**
   * Export configuration as YAML
   */
  toYAML(): string {
    return YAML.dump(this.config);
  }

  /**
   * Get config file path
   */
  getPath(): string {
    return this.configPath;
  }
}
