/**
 * Log levels, from most to least verbose
 */
export const LOG_LEVELS = <const> ['debug', 'info', 'warn', 'error', 'silent'];

export type LogLevel = typeof LOG_LEVELS[number];

/**
 * Logger used by the server
 */
export interface Logger {
	debug(message: string): void;
	info(message: string): void;
	warn(message: string): void;
	error(message: string, err?: unknown): void;
}

/**
 * Check if a string is a known log level
 *
 * @param value - value to check
 * @returns true if value is a log level
 */
export function isLogLevel(value: string): value is LogLevel {
	return LOG_LEVELS.some(level => level === value);
}

/**
 * Create a logger writing to the console
 *
 * @param level - minimum level to write
 * @returns the logger
 */
export function createConsoleLogger(level: LogLevel = 'info'): Logger {
	const threshold = LOG_LEVELS.indexOf(level);
	const enabled = (messageLevel: LogLevel) => LOG_LEVELS.indexOf(messageLevel) >= threshold;
	return {
		debug(message) {
			if (enabled('debug')) {
				console.debug(message);
			}
		},
		info(message) {
			if (enabled('info')) {
				console.info(message);
			}
		},
		warn(message) {
			if (enabled('warn')) {
				console.warn(message);
			}
		},
		error(message, err) {
			if (!enabled('error')) {
				return;
			}
			if (err === undefined) {
				console.error(message);
			} else {
				console.error(message, err);
			}
		},
	};
}

/**
 * Logger discarding everything
 */
export const silentLogger: Logger = createConsoleLogger('silent');
