/**
 * Complaints Desk CLI Configuration Management
 *
 * Loads configuration from .complaints-deskrc (YAML or JSON) with environment
 * variable overrides and defaults.
 *
 * Configuration precedence (highest to lowest):
 * 1. Command-line options
 * 2. Environment variables (COMPLAINTS_DESK_*)
 * 3. Config file (.complaints-deskrc or --config path)
 * 4. Default values
 *
 * @module cli/lib/config
 */

import { readFileSync, existsSync } from 'node:fs';
import { join, resolve } from 'node:path';
import { parse as parseYaml } from 'yaml';
import { z } from 'zod';
import { ConfigError, errorMessage } from '../../core/types/errors.js';
import type { DatasetName, DatasetSources } from '../../ingestion/ingest.js';

// ============================================================================
// Configuration Types
// ============================================================================

/**
 * Paths configuration; relative entries resolve against the config file's
 * directory, or the working directory when no file was read
 */
export interface PathsConfig {
  /** SQLite database file */
  readonly database: string;
  readonly residents: string;
  readonly categories: string;
  readonly complaints: string;
  readonly statusLogs: string;
}

export interface ReportsConfig {
  /** Age in days after which an unresolved complaint is overdue */
  readonly overdueDays: number;
  /** Row limit for the top residents report */
  readonly topResidents: number;
}

export interface LoggingConfig {
  /** Emit JSON log lines instead of coloured text */
  readonly json: boolean;
}

/**
 * Full CLI configuration
 */
export interface CLIConfig {
  readonly paths: PathsConfig;
  readonly reports: ReportsConfig;
  readonly logging: LoggingConfig;
  /** Enable debug logging */
  readonly verbose: boolean;
  /** Resolved config file path */
  readonly configPath: string | null;
}

const PositiveInteger = z.number().int().positive();

/**
 * Config file structure; every key optional
 */
const ConfigFileSchema = z
  .object({
    paths: z
      .object({
        database: z.string().min(1),
        residents: z.string().min(1),
        categories: z.string().min(1),
        complaints: z.string().min(1),
        statusLogs: z.string().min(1),
      })
      .partial()
      .strict()
      .optional(),
    reports: z
      .object({
        overdueDays: PositiveInteger,
        topResidents: PositiveInteger,
      })
      .partial()
      .strict()
      .optional(),
    logging: z.object({ json: z.boolean() }).partial().strict().optional(),
    verbose: z.boolean().optional(),
  })
  .strict();

type ConfigFile = z.infer<typeof ConfigFileSchema>;

// ============================================================================
// Default Configuration
// ============================================================================

export const DEFAULT_CONFIG: Omit<CLIConfig, 'verbose' | 'configPath'> = {
  paths: {
    database: 'complaints.db',
    residents: 'residents.csv',
    categories: 'service_categories.csv',
    complaints: 'complaints.csv',
    statusLogs: 'status_logs.csv',
  },

  reports: {
    overdueDays: 30,
    topResidents: 5,
  },

  logging: {
    json: false,
  },
};

// ============================================================================
// Configuration Loading
// ============================================================================

export const ENV_PREFIX = 'COMPLAINTS_DESK_';

/**
 * Standard config file names to search for
 */
const CONFIG_FILE_NAMES = [
  '.complaints-deskrc',
  '.complaints-deskrc.yaml',
  '.complaints-deskrc.yml',
  '.complaints-deskrc.json',
];

/**
 * Find config file in a directory or its parents
 */
function findConfigFile(startDir: string): string | null {
  let dir = resolve(startDir);

  for (;;) {
    for (const fileName of CONFIG_FILE_NAMES) {
      const filePath = join(dir, fileName);
      if (existsSync(filePath)) {
        return filePath;
      }
    }
    const parent = resolve(dir, '..');
    if (parent === dir) return null;
    dir = parent;
  }
}

/**
 * Parse and validate config file content
 */
function parseConfigFile(filePath: string): ConfigFile {
  let raw: unknown;
  try {
    const content = readFileSync(filePath, 'utf-8');
    // YAML is a superset of JSON
    raw = parseYaml(content);
  } catch (error) {
    throw new ConfigError(`Cannot read config file: ${errorMessage(error)}`, filePath);
  }

  // An empty file parses to null
  const result = ConfigFileSchema.safeParse(raw ?? {});
  if (!result.success) {
    const issue = result.error.errors[0];
    const where = issue && issue.path.length > 0 ? `${issue.path.join('.')}: ` : '';
    throw new ConfigError(`${where}${issue?.message ?? 'Invalid configuration'}`, filePath);
  }
  return result.data;
}

type Environment = Readonly<Record<string, string | undefined>>;

/**
 * Load configuration options
 */
export interface LoadConfigOptions {
  /** Explicit config file path */
  configPath?: string;
  /** Directory the config search starts from (default: process.cwd()) */
  cwd?: string;
  /** Environment to read COMPLAINTS_DESK_* variables from (default: process.env) */
  env?: Environment;
  /** CLI flag overrides */
  overrides?: {
    verbose?: boolean;
  };
}

/**
 * Load and merge configuration from all sources
 *
 * @throws ConfigError on an unreadable or invalid file or environment value
 */
export async function loadConfig(options: LoadConfigOptions = {}): Promise<CLIConfig> {
  const cwd = options.cwd ?? process.cwd();
  const env = options.env ?? process.env;

  const getEnvVar = (name: string): string | undefined => {
    const value = env[`${ENV_PREFIX}${name}`];
    return value === undefined || value === '' ? undefined : value;
  };

  const getEnvBool = (name: string): boolean | undefined => {
    const value = getEnvVar(name);
    if (value === undefined) return undefined;
    return value.toLowerCase() === 'true' || value === '1';
  };

  const getEnvNumber = (name: string): number | undefined => {
    const value = getEnvVar(name);
    if (value === undefined) return undefined;
    const result = PositiveInteger.safeParse(Number(value));
    if (!result.success) {
      throw new ConfigError(`${ENV_PREFIX}${name} must be a positive integer, got "${value}"`);
    }
    return result.data;
  };

  let configPath: string | null = null;
  let fileConfig: ConfigFile = {};

  if (options.configPath) {
    configPath = resolve(cwd, options.configPath);
    if (!existsSync(configPath)) {
      throw new ConfigError(`Config file not found: ${configPath}`, configPath);
    }
    fileConfig = parseConfigFile(configPath);
  } else {
    const envConfigPath = getEnvVar('CONFIG');
    if (envConfigPath) {
      configPath = resolve(cwd, envConfigPath);
      if (existsSync(configPath)) {
        fileConfig = parseConfigFile(configPath);
      } else {
        configPath = null;
      }
    } else {
      configPath = findConfigFile(cwd);
      if (configPath) {
        fileConfig = parseConfigFile(configPath);
      }
    }
  }

  const basePath = configPath ? resolve(configPath, '..') : resolve(cwd);
  const path = (envName: string, fromFile: string | undefined, fallback: string): string =>
    resolve(basePath, getEnvVar(envName) ?? fromFile ?? fallback);

  const config: CLIConfig = {
    paths: {
      database: path('DATABASE', fileConfig.paths?.database, DEFAULT_CONFIG.paths.database),
      residents: path('RESIDENTS_FILE', fileConfig.paths?.residents, DEFAULT_CONFIG.paths.residents),
      categories: path(
        'CATEGORIES_FILE',
        fileConfig.paths?.categories,
        DEFAULT_CONFIG.paths.categories
      ),
      complaints: path(
        'COMPLAINTS_FILE',
        fileConfig.paths?.complaints,
        DEFAULT_CONFIG.paths.complaints
      ),
      statusLogs: path(
        'STATUS_LOGS_FILE',
        fileConfig.paths?.statusLogs,
        DEFAULT_CONFIG.paths.statusLogs
      ),
    },

    reports: {
      overdueDays:
        getEnvNumber('OVERDUE_DAYS') ??
        fileConfig.reports?.overdueDays ??
        DEFAULT_CONFIG.reports.overdueDays,
      topResidents:
        getEnvNumber('TOP_RESIDENTS') ??
        fileConfig.reports?.topResidents ??
        DEFAULT_CONFIG.reports.topResidents,
    },

    logging: {
      json: getEnvBool('LOG_JSON') ?? fileConfig.logging?.json ?? DEFAULT_CONFIG.logging.json,
    },

    verbose: options.overrides?.verbose ?? getEnvBool('VERBOSE') ?? fileConfig.verbose ?? false,
    configPath,
  };

  return config;
}

/**
 * Ingestion sources named by the configuration
 */
export function datasetSources(config: CLIConfig): DatasetSources {
  const sources: Record<DatasetName, string> = {
    residents: config.paths.residents,
    categories: config.paths.categories,
    complaints: config.paths.complaints,
    statusLogs: config.paths.statusLogs,
  };
  return sources;
}
