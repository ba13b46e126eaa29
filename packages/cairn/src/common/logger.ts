import debug from 'debug';

const ROOT = 'cairn';

/** Writer debug uses when no sink is installed. */
const defaultSink = debug.log;

export type Logger = debug.Debugger;

/**
 * Returns the logger for one engine subsystem, namespaced under `cairn:`.
 * Subsystems nest with colons: `storage:csv`, `schema:file-catalog`.
 * Failures go to `log.extend('error')`, recoverable oddities to `log.extend('warn')`.
 */
export function createLogger(subsystem: string): Logger {
	return debug(`${ROOT}:${subsystem}`);
}

/**
 * Turns logging on for the given subsystems and everything nested under them,
 * or for the whole engine when none are named. Returns the pattern handed to debug.
 */
export function enableLogging(subsystems: readonly string[] = [], sink?: (...args: unknown[]) => void): string {
	const pattern = subsystems.length === 0
		? `${ROOT}:*`
		: subsystems.map(name => `${ROOT}:${name}*`).join(',');
	debug.log = sink ?? defaultSink;
	debug.enable(pattern);
	return pattern;
}

/** Turns all logging off and restores the default writer. Returns the previous pattern. */
export function disableLogging(): string {
	debug.log = defaultSink;
	return debug.disable();
}

export function isLoggingEnabled(subsystem: string): boolean {
	return debug.enabled(`${ROOT}:${subsystem}`);
}
