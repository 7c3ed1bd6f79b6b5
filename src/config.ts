import { resolve } from 'node:path';
import { parseArgs } from 'node:util';

import { ConfigurationError } from './errors';
import type { Logger, LogLevel } from './logger';
import { isLogLevel, silentLogger } from './logger';
import { DEFAULT_CHUNK_SIZE } from './streams';
import type { FileSystem } from './types';
import { nodeFileSystem, statelessPattern } from './utils';
import { DEFAULT_WORKERS, QUEUE_CAPACITY_PER_WORKER } from './worker-pool';

export const DEFAULT_PORT = 8123;
export const DEFAULT_HOST = '127.0.0.1';
export const DEFAULT_READ_TIMEOUT_MS = 5000;
export const DEFAULT_MAX_HEADER_BYTES = 8 * 1024;
export const DEFAULT_LINGER_TIMEOUT_MS = 2000;
export const DEFAULT_ACCEPT_BACKLOG = 128;

/**
 * File server options
 */
export interface ServerOptions {
	/**
	 * Served root directory (working directory by default)
	 */
	root?: string;
	/**
	 * Address to bind ('127.0.0.1' by default)
	 */
	host?: string;
	/**
	 * Port to listen on (8123 by default, 0 for an ephemeral port)
	 */
	port?: number;
	/**
	 * Number of workers (4 by default)
	 */
	workers?: number;
	/**
	 * Maximum number of accepted connections waiting for a worker
	 * (4 × workers by default, 'unbounded' to disable the limit)
	 */
	queueCapacity?: number | 'unbounded';
	/**
	 * Maximum number of accepted connections waiting for room in the queue,
	 * connections beyond it are refused (128 by default)
	 */
	acceptBacklog?: number;
	/**
	 * Time allowed to receive the request head, in milliseconds (5000 by default)
	 */
	readTimeoutMs?: number;
	/**
	 * Maximum size of the request head in bytes (8192 by default)
	 */
	maxHeaderBytes?: number;
	/**
	 * Maximum size of streamed file chunks in bytes (65536 by default)
	 */
	chunkSize?: number;
	/**
	 * Time to wait for the client to close after the response, in milliseconds (2000 by default)
	 */
	lingerTimeoutMs?: number;
	/**
	 * Pattern of path segments never served nor listed (RegExp, RegExp source or false, false by default)
	 */
	ignorePattern?: RegExp | string | false;
	/**
	 * Logger (silent by default)
	 */
	logger?: Logger;
	/**
	 * File system ("node:fs/promises" by default)
	 */
	fileSystem?: FileSystem;
}

/**
 * File server options with defaults applied
 */
export interface ResolvedServerOptions {
	root: string;
	host: string;
	port: number;
	workers: number;
	queueCapacity: number;
	acceptBacklog: number;
	readTimeoutMs: number;
	maxHeaderBytes: number;
	chunkSize: number;
	lingerTimeoutMs: number;
	ignorePattern: RegExp | false;
	logger: Logger;
	fileSystem: FileSystem;
}

/**
 * Command line parsing result
 */
export interface CommandLine {
	/**
	 * Server options from the command line
	 */
	options: ServerOptions;
	/**
	 * Log level
	 */
	logLevel: LogLevel;
	/**
	 * True when usage was requested
	 */
	help: boolean;
}

export const USAGE = `Usage: pool-file-server [port] [workers] [options]

Options:
  -p, --port <port>             port to listen on (default ${ DEFAULT_PORT })
  -w, --workers <count>         number of workers (default ${ DEFAULT_WORKERS })
  -r, --root <dir>              served directory (default: working directory)
      --host <address>          address to bind (default ${ DEFAULT_HOST })
      --queue <size|unbounded>  accepted connections waiting for a worker (default ${
	QUEUE_CAPACITY_PER_WORKER
} × workers)
      --accept-backlog <n>      accepted connections waiting for room in the queue (default ${
	DEFAULT_ACCEPT_BACKLOG
})
      --read-timeout <ms>       time allowed to receive the request head (default ${ DEFAULT_READ_TIMEOUT_MS })
      --max-header-bytes <n>    maximum request head size (default ${ DEFAULT_MAX_HEADER_BYTES })
      --chunk-size <n>          file chunk size (default ${ DEFAULT_CHUNK_SIZE })
      --hide-dotfiles           do not serve nor list names starting with '.'
      --log-level <level>       debug, info, warn, error or silent (default: $LOG_LEVEL or info)
  -h, --help                    show this help
`;

/**
 * Check that an option is an integer within bounds
 *
 * @param option - option name
 * @param value - option value
 * @param min - minimum value
 * @param max - maximum value
 * @returns the value
 * @throws ConfigurationError when the value is invalid
 */
function checkInteger(option: string, value: number, min: number, max = Number.MAX_SAFE_INTEGER) {
	if (!Number.isInteger(value) || value < min || value > max) {
		throw new ConfigurationError(`${ option } should be an integer between ${ min } and ${ max } (got ${ value })`, option);
	}
	return value;
}

/**
 * Parse an integer command-line value
 *
 * @param option - option name
 * @param value - raw value
 * @returns the number
 * @throws ConfigurationError when the value is not a decimal integer
 */
function parseInteger(option: string, value: string) {
	if (!/^\d+$/u.test(value)) {
		throw new ConfigurationError(`${ option } should be an integer (got '${ value }')`, option);
	}
	return Number(value);
}

/**
 * Validate options and apply defaults
 *
 * @param opts - server options
 * @param cwd - working directory used as default root
 * @returns the resolved options
 * @throws ConfigurationError when an option is invalid
 */
export function resolveServerOptions(opts: ServerOptions = {}, cwd = process.cwd()): ResolvedServerOptions {
	const workers = checkInteger('workers', opts.workers ?? DEFAULT_WORKERS, 1, 1024);
	const { queueCapacity: rawQueueCapacity = workers * QUEUE_CAPACITY_PER_WORKER } = opts;
	const queueCapacity = rawQueueCapacity === 'unbounded'
		? Number.POSITIVE_INFINITY
		: checkInteger('queueCapacity', rawQueueCapacity, 1);
	const { ignorePattern } = opts;
	let pattern: RegExp | false;
	if (ignorePattern === undefined || ignorePattern === false) {
		pattern = false;
	} else if (ignorePattern instanceof RegExp) {
		pattern = statelessPattern(ignorePattern);
	} else {
		try {
			pattern = new RegExp(ignorePattern, 'u');
		} catch (err: unknown) {
			throw new ConfigurationError(`ignorePattern is not a valid pattern: ${ String(err) }`, 'ignorePattern');
		}
	}
	return {
		root: resolve(cwd, opts.root ?? '.'),
		host: opts.host ?? DEFAULT_HOST,
		port: checkInteger('port', opts.port ?? DEFAULT_PORT, 0, 65_535),
		workers,
		queueCapacity,
		acceptBacklog: checkInteger('acceptBacklog', opts.acceptBacklog ?? DEFAULT_ACCEPT_BACKLOG, 1),
		readTimeoutMs: checkInteger('readTimeoutMs', opts.readTimeoutMs ?? DEFAULT_READ_TIMEOUT_MS, 1),
		maxHeaderBytes: checkInteger('maxHeaderBytes', opts.maxHeaderBytes ?? DEFAULT_MAX_HEADER_BYTES, 16),
		chunkSize: checkInteger('chunkSize', opts.chunkSize ?? DEFAULT_CHUNK_SIZE, 1),
		lingerTimeoutMs: checkInteger('lingerTimeoutMs', opts.lingerTimeoutMs ?? DEFAULT_LINGER_TIMEOUT_MS, 1),
		ignorePattern: pattern,
		logger: opts.logger ?? silentLogger,
		fileSystem: opts.fileSystem ?? nodeFileSystem,
	};
}

/**
 * Parse command-line arguments
 *
 * Positional arguments are the port then the worker count, flags take precedence over them.
 *
 * @param argv - arguments (without node and script paths)
 * @param env - environment variables
 * @returns the parsed command line
 * @throws ConfigurationError when an argument is invalid
 */
export function parseCommandLine(argv: readonly string[], env: NodeJS.ProcessEnv = {}): CommandLine {
	let parsed;
	try {
		parsed = parseArgs({
			args: [...argv],
			allowPositionals: true,
			strict: true,
			options: {
				'port': { type: 'string', short: 'p' },
				'workers': { type: 'string', short: 'w' },
				'root': { type: 'string', short: 'r' },
				'host': { type: 'string' },
				'queue': { type: 'string' },
				'accept-backlog': { type: 'string' },
				'read-timeout': { type: 'string' },
				'max-header-bytes': { type: 'string' },
				'chunk-size': { type: 'string' },
				'hide-dotfiles': { type: 'boolean' },
				'log-level': { type: 'string' },
				'help': { type: 'boolean', short: 'h' },
			},
		});
	} catch (err: unknown) {
		throw new ConfigurationError(err instanceof Error ? err.message : String(err), 'argv');
	}
	const { values, positionals } = parsed;
	if (positionals.length > 2) {
		throw new ConfigurationError(`unexpected argument '${ positionals[2] }'`, 'argv');
	}
	const [positionalPort, positionalWorkers] = positionals;

	const options: ServerOptions = {};
	const port = values.port ?? positionalPort;
	if (port !== undefined) {
		options.port = parseInteger('port', port);
	}
	const workers = values.workers ?? positionalWorkers;
	if (workers !== undefined) {
		options.workers = parseInteger('workers', workers);
	}
	if (values.root !== undefined) {
		options.root = values.root;
	}
	if (values.host !== undefined) {
		options.host = values.host;
	}
	const { queue } = values;
	if (queue !== undefined) {
		options.queueCapacity = queue === 'unbounded' ? 'unbounded' : parseInteger('queue', queue);
	}
	if (values['accept-backlog'] !== undefined) {
		options.acceptBacklog = parseInteger('accept-backlog', values['accept-backlog']);
	}
	if (values['read-timeout'] !== undefined) {
		options.readTimeoutMs = parseInteger('read-timeout', values['read-timeout']);
	}
	if (values['max-header-bytes'] !== undefined) {
		options.maxHeaderBytes = parseInteger('max-header-bytes', values['max-header-bytes']);
	}
	if (values['chunk-size'] !== undefined) {
		options.chunkSize = parseInteger('chunk-size', values['chunk-size']);
	}
	if (values['hide-dotfiles'] === true) {
		options.ignorePattern = /^\./u;
	}

	const logLevel = values['log-level'] ?? env['LOG_LEVEL'] ?? 'info';
	if (!isLogLevel(logLevel)) {
		throw new ConfigurationError(`unknown log level '${ logLevel }'`, 'log-level');
	}

	return { options, logLevel, help: values.help === true };
}
