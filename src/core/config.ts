/**
 * Configuration Management with Priority Resolution
 * Loads from environment, user settings, and project settings
 */

import { z } from 'zod';
import { homedir } from 'os';
import { join } from 'path';
import { existsSync, readFileSync } from 'fs';
import { ConfigSchema, LogLevelSchema, PlacementPolicySchema, type Config } from './types';
import { InvalidConfigurationError } from './errors';

// ---------------------------------------------------------------------------
// Settings File Schema (subset of full config)
// ---------------------------------------------------------------------------

const SettingsFileSchema = z.object({
  debug: z.boolean().optional(),
  logLevel: LogLevelSchema.optional(),
  maxTicks: z.number().int().positive().optional(),
  placement: PlacementPolicySchema.optional(),
  moveConcurrency: z.number().int().min(1).max(64).optional(),
  moveChunkSize: z.number().int().positive().optional(),
  seed: z.string().min(1).optional(),
}).passthrough();

export type SettingsFile = z.infer<typeof SettingsFileSchema>;

const SETTINGS_KEYS = [
  'debug', 'logLevel', 'maxTicks', 'placement',
  'moveConcurrency', 'moveChunkSize', 'seed',
] as const satisfies ReadonlyArray<keyof SettingsFile & keyof Config>;

// ---------------------------------------------------------------------------
// Config Loader Options
// ---------------------------------------------------------------------------

export interface ConfigLoaderOptions {
  projectDir?: string;
  /** Overrides the home directory used for user settings and the default data dir. */
  homeDir?: string;
  envPrefix?: string;
  skipEnv?: boolean;
  skipUser?: boolean;
  skipProject?: boolean;
}

// ---------------------------------------------------------------------------
// Default Values
// ---------------------------------------------------------------------------

const DEFAULT_CONFIG: Omit<Config, 'dataDir' | 'seed'> = {
  debug: false,
  logLevel: 'info',
  maxTicks: 10_000,
  placement: 'distinct',
  moveConcurrency: 4,
  moveChunkSize: 1024,
};

// ---------------------------------------------------------------------------
// File Loading Helpers
// ---------------------------------------------------------------------------

function loadJsonFile<T>(path: string, schema: z.ZodSchema<T>): T | null {
  if (!existsSync(path)) return null;

  let data: unknown;
  try {
    data = JSON.parse(readFileSync(path, 'utf-8'));
  } catch (err) {
    const reason = err instanceof Error ? err.message : String(err);
    throw new InvalidConfigurationError(`Cannot read settings from ${path}: ${reason}`);
  }

  const result = schema.safeParse(data);
  if (!result.success) {
    const issues = result.error.issues.map(i => `${i.path.join('.') || '(root)'}: ${i.message}`).join('; ');
    throw new InvalidConfigurationError(`Invalid settings in ${path}: ${issues}`);
  }
  return result.data;
}

const getUserSettingsPath = (home: string) => join(home, '.colonysim', 'settings.json');
const getProjectSettingsPath = (projectDir: string) => join(projectDir, '.colonysim', 'settings.json');
const getProjectLocalSettingsPath = (projectDir: string) => join(projectDir, '.colonysim', 'settings.local.json');

// ---------------------------------------------------------------------------
// Environment Variable Mapping
// ---------------------------------------------------------------------------

interface EnvMapping {
  envKey: string;
  configKey: keyof Config;
  transform: (value: string) => unknown;
}

const parseFlag = (v: string) => v === 'true' || v === '1';
const parseInteger = (v: string) => (/^-?\d+$/.test(v.trim()) ? parseInt(v, 10) : NaN);

const ENV_MAPPINGS: EnvMapping[] = [
  { envKey: 'COLONYSIM_DEBUG', configKey: 'debug', transform: parseFlag },
  { envKey: 'COLONYSIM_LOG_LEVEL', configKey: 'logLevel', transform: (v) => v.toLowerCase() },
  { envKey: 'COLONYSIM_MAX_TICKS', configKey: 'maxTicks', transform: parseInteger },
  { envKey: 'COLONYSIM_PLACEMENT', configKey: 'placement', transform: (v) => v.toLowerCase() },
  { envKey: 'COLONYSIM_MOVE_CONCURRENCY', configKey: 'moveConcurrency', transform: parseInteger },
  { envKey: 'COLONYSIM_MOVE_CHUNK_SIZE', configKey: 'moveChunkSize', transform: parseInteger },
  { envKey: 'COLONYSIM_SEED', configKey: 'seed', transform: (v) => v },
  { envKey: 'COLONYSIM_DATA_DIR', configKey: 'dataDir', transform: (v) => v },
];

function loadEnvConfig(prefix?: string): Record<string, unknown> {
  const config: Record<string, unknown> = {};

  for (const mapping of ENV_MAPPINGS) {
    const envKey = prefix ? `${prefix}_${mapping.envKey}` : mapping.envKey;
    const value = process.env[envKey];
    if (value === undefined || value === '') continue;

    const transformed = mapping.transform(value);
    if (typeof transformed === 'number' && Number.isNaN(transformed)) {
      throw new InvalidConfigurationError(`${envKey} must be an integer, got '${value}'`);
    }
    config[mapping.configKey] = transformed;
  }

  return config;
}

function validate(candidate: unknown): Config {
  const result = ConfigSchema.safeParse(candidate);
  if (!result.success) {
    const issues = result.error.issues.map(i => `${i.path.join('.')}: ${i.message}`).join('; ');
    throw new InvalidConfigurationError(issues);
  }
  return result.data;
}

// ---------------------------------------------------------------------------
// Config Loader Class
// ---------------------------------------------------------------------------

export class ConfigLoader {
  private projectDir: string;
  private homeDir: string;
  private options: ConfigLoaderOptions;

  constructor(options: ConfigLoaderOptions = {}) {
    this.projectDir = options.projectDir ?? process.cwd();
    this.homeDir = options.homeDir ?? homedir();
    this.options = options;
  }

  /**
   * Load and merge configuration from all sources
   * Priority (highest to lowest):
   * 1. Environment variables
   * 2. Project local settings (.colonysim/settings.local.json) - git-ignored
   * 3. Project settings (.colonysim/settings.json)
   * 4. User settings (~/.colonysim/settings.json)
   * 5. Default values
   */
  load(): Config {
    let config: Record<string, unknown> = { ...DEFAULT_CONFIG };

    if (!this.options.skipUser) {
      const userSettings = loadJsonFile(getUserSettingsPath(this.homeDir), SettingsFileSchema);
      if (userSettings) {
        config = { ...config, ...this.mapSettingsToConfig(userSettings) };
      }
    }

    if (!this.options.skipProject) {
      const projectSettings = loadJsonFile(getProjectSettingsPath(this.projectDir), SettingsFileSchema);
      if (projectSettings) {
        config = { ...config, ...this.mapSettingsToConfig(projectSettings) };
      }

      const localSettings = loadJsonFile(getProjectLocalSettingsPath(this.projectDir), SettingsFileSchema);
      if (localSettings) {
        config = { ...config, ...this.mapSettingsToConfig(localSettings) };
      }
    }

    if (!this.options.skipEnv) {
      config = { ...config, ...loadEnvConfig(this.options.envPrefix) };
    }

    if (config.dataDir === undefined) {
      config.dataDir = this.getDataDir();
    }

    return validate(config);
  }

  /**
   * Get the resolved data directory
   */
  getDataDir(): string {
    const envDir = this.options.skipEnv ? undefined : process.env.COLONYSIM_DATA_DIR;
    if (envDir) return envDir;

    const projectDataDir = join(this.projectDir, '.colonysim');
    if (existsSync(projectDataDir)) {
      return projectDataDir;
    }

    return join(this.homeDir, '.colonysim');
  }

  private mapSettingsToConfig(settings: SettingsFile): Record<string, unknown> {
    const config: Record<string, unknown> = {};
    for (const key of SETTINGS_KEYS) {
      if (settings[key] !== undefined) {
        config[key] = settings[key];
      }
    }
    return config;
  }
}

// ---------------------------------------------------------------------------
// Convenience Functions
// ---------------------------------------------------------------------------

let globalConfig: Config | null = null;

export function loadConfig(options?: ConfigLoaderOptions): Config {
  const loader = new ConfigLoader(options);
  globalConfig = loader.load();
  return globalConfig;
}

export function getConfig(): Config {
  if (!globalConfig) {
    return loadConfig();
  }
  return globalConfig;
}

/** Merge overrides (typically CLI flags) over the loaded config and re-validate. */
export function setConfig(overrides: Partial<Config>): Config {
  const merged: Record<string, unknown> = { ...getConfig() };
  for (const [key, value] of Object.entries(overrides)) {
    if (value !== undefined) merged[key] = value;
  }
  globalConfig = validate(merged);
  return globalConfig;
}

export function resetConfig(): void {
  globalConfig = null;
}
