/**
 * Configuration loader for the cairn shell
 * Handles locating, parsing, validating and interpolating cairn.config.json files
 */

import * as fs from 'node:fs/promises';
import * as os from 'node:os';
import * as path from 'node:path';

/**
 * Cairn configuration file format
 */
export interface CairnConfig {
  $schema?: string;
  /** Directory holding catalog.meta and the table files */
  dataDir?: string;
  color?: boolean;
}

export const CONFIG_ENV_VAR = 'CAIRN_CONFIG';
export const CONFIG_FILE_NAME = 'cairn.config.json';

/** Where resolveConfigPath looks, overridable for tests. */
export interface ConfigLocations {
  env?: NodeJS.ProcessEnv;
  cwd?: string;
  homeDir?: string;
}

async function fileExists(filePath: string): Promise<boolean> {
  return fs.access(filePath).then(() => true, () => false);
}

/**
 * Resolve config file path following the resolution strategy:
 * --config, then CAIRN_CONFIG, then ./cairn.config.json, then ~/.cairn/config.json
 */
export async function resolveConfigPath(configOption?: string, locations: ConfigLocations = {}): Promise<string | undefined> {
  const env = locations.env ?? process.env;
  const cwd = locations.cwd ?? process.cwd();

  if (configOption) {
    return path.resolve(cwd, configOption);
  }

  const fromEnv = env[CONFIG_ENV_VAR];
  if (fromEnv) {
    return path.resolve(cwd, fromEnv);
  }

  const cwdConfig = path.join(cwd, CONFIG_FILE_NAME);
  if (await fileExists(cwdConfig)) {
    return cwdConfig;
  }

  const homeConfig = path.join(locations.homeDir ?? os.homedir(), '.cairn', 'config.json');
  if (await fileExists(homeConfig)) {
    return homeConfig;
  }

  return undefined;
}

/**
 * Interpolate environment variables in a string
 * Supports ${VAR_NAME} and ${VAR_NAME:-default} syntax; unknown variables without a default are left as written
 */
export function interpolateEnvVars(value: string, env: Record<string, string | undefined> = {}): string {
  return value.replace(/\$\{([^}]+)\}/g, (match: string, varSpec: string) => {
    const [varName, defaultValue] = varSpec.split(':-');
    return env[varName.trim()] ?? defaultValue ?? match;
  });
}

/**
 * Interpolate environment variables in the string fields of a config object
 */
export function interpolateConfigEnvVars(config: CairnConfig, env: Record<string, string | undefined> = process.env): CairnConfig {
  const result: CairnConfig = { ...config };
  if (config.dataDir !== undefined) {
    result.dataDir = interpolateEnvVars(config.dataDir, env);
  }
  return result;
}

/**
 * Validate a config object
 */
export function validateConfig(config: unknown): config is CairnConfig {
  if (typeof config !== 'object' || config === null || Array.isArray(config)) {
    return false;
  }

  if ('$schema' in config && typeof config.$schema !== 'string') {
    return false;
  }
  if ('dataDir' in config && typeof config.dataDir !== 'string') {
    return false;
  }
  if ('color' in config && typeof config.color !== 'boolean') {
    return false;
  }

  return true;
}

/**
 * Load, validate and interpolate a config file
 */
export async function loadConfig(configPath: string, env?: Record<string, string | undefined>): Promise<CairnConfig> {
  let parsed: unknown;
  try {
    const content = await fs.readFile(configPath, 'utf-8');
    parsed = JSON.parse(content);
  } catch (error) {
    throw new Error(`Failed to load config from '${configPath}': ${error instanceof Error ? error.message : String(error)}`);
  }

  if (!validateConfig(parsed)) {
    throw new Error(`Invalid config file at ${configPath}`);
  }
  return interpolateConfigEnvVars(parsed, env);
}
