export { REPL, PROMPT, CONTINUATION_PROMPT } from './repl.js';
export type { LineOutcome } from './repl.js';
export { ScriptRunner, UNTERMINATED_SCRIPT_MESSAGE } from './script-runner.js';
export type { ScriptSummary } from './script-runner.js';
export { StatementBuffer, stripComment } from './statement-buffer.js';
export { Watcher } from './watch.js';
export { parseLineRange, selectLines } from './lines.js';
export type { LineRange } from './lines.js';
export {
  resolveConfigPath,
  loadConfig,
  validateConfig,
  interpolateEnvVars,
  interpolateConfigEnvVars,
  CONFIG_ENV_VAR,
  CONFIG_FILE_NAME,
} from './config.js';
export type { CairnConfig, ConfigLocations } from './config.js';
export { DotCommands } from './commands/dot-commands.js';
export type { DotCommandOutcome } from './commands/dot-commands.js';
export { consoleOutput, createChalk, BufferedOutput } from './output.js';
export type { Output } from './output.js';
export { checkOptionCombination, resolveSettings, readConfig } from './options.js';
export type { CliOptions, ShellSettings } from './options.js';
