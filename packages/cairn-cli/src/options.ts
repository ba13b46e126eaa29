import { DEFAULT_DATA_DIR } from '@cairndb/engine';
import { loadConfig, resolveConfigPath, type CairnConfig, type ConfigLocations } from './config.js';

/** Parsed command-line flags. `color` is false only under --no-color. */
export type CliOptions = {
  file?: string;
  lines?: string;
  watch?: string;
  dataDir?: string;
  config?: string;
  color: boolean;
};

/** Effective settings after flags and config file are merged. */
export interface ShellSettings {
  dataDir: string;
  color: boolean;
}

/**
 * Rejects flag combinations that have no meaning together.
 * @throws Error naming the conflicting flags
 */
export function checkOptionCombination(options: CliOptions): void {
  if (options.watch !== undefined && options.file !== undefined) {
    throw new Error('Cannot use --watch and --file together');
  }
  if (options.watch !== undefined && options.lines !== undefined) {
    throw new Error('Cannot use --watch and --lines together');
  }
  if (options.lines !== undefined && options.file === undefined) {
    throw new Error('--lines requires --file');
  }
}

/**
 * Flags win over the config file, which wins over the defaults.
 * Colour stays on unless either --no-color or `color: false` turns it off.
 */
export function resolveSettings(options: CliOptions, config: CairnConfig): ShellSettings {
  return {
    dataDir: options.dataDir ?? config.dataDir ?? DEFAULT_DATA_DIR,
    color: options.color && (config.color ?? true),
  };
}

/**
 * Locates and loads the config file. A file that cannot be read or is invalid
 * is reported through `warn` and the shell carries on without it.
 */
export async function readConfig(
  configOption: string | undefined,
  warn: (message: string) => void,
  locations?: ConfigLocations,
): Promise<CairnConfig> {
  const configPath = await resolveConfigPath(configOption, locations);
  if (!configPath) {
    return {};
  }
  try {
    return await loadConfig(configPath, locations?.env);
  } catch (error) {
    warn(error instanceof Error ? error.message : 'Failed to load config');
    return {};
  }
}
