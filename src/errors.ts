/**
 * Error mapped to an HTTP status code
 */
export class HttpError extends Error {
	/**
	 * HTTP status code of the response produced for this error
	 */
	readonly statusCode: number;

	/**
	 * Create an HTTP error
	 *
	 * @param message - error message
	 * @param statusCode - response status code
	 */
	constructor(message: string, statusCode: number) {
		super(message);
		this.name = 'HttpError';
		this.statusCode = statusCode;
	}
}

/**
 * Request line, header or target can not be parsed
 */
export class MalformedRequestError extends HttpError {
	/**
	 * Create malformed request error
	 *
	 * @param message - error message
	 */
	constructor(message: string) {
		super(message, 400);
		this.name = 'MalformedRequestError';
	}
}

/**
 * Request head not received before the read timeout
 */
export class RequestTimeoutError extends HttpError {
	/**
	 * Timeout which expired, in milliseconds
	 */
	readonly timeoutMs: number;

	/**
	 * Create request timeout error
	 *
	 * @param timeoutMs - timeout in milliseconds
	 */
	constructor(timeoutMs: number) {
		super(`request head not received within ${ timeoutMs }ms`, 408);
		this.name = 'RequestTimeoutError';
		this.timeoutMs = timeoutMs;
	}
}

/**
 * Request head bigger than the allowed byte budget
 */
export class RequestTooLargeError extends HttpError {
	/**
	 * Byte budget which was exceeded
	 */
	readonly maxHeaderBytes: number;

	/**
	 * Create request too large error
	 *
	 * @param maxHeaderBytes - byte budget for the request head
	 */
	constructor(maxHeaderBytes: number) {
		super(`request head exceeds ${ maxHeaderBytes } bytes`, 413);
		this.name = 'RequestTooLargeError';
		this.maxHeaderBytes = maxHeaderBytes;
	}
}

/**
 * Request target escapes the served root
 */
export class TraversalError extends HttpError {
	/**
	 * Raw request target
	 */
	readonly target: string;

	/**
	 * Create traversal error
	 *
	 * @param message - error message
	 * @param target - raw request target
	 */
	constructor(message: string, target: string) {
		super(message, 403);
		this.name = 'TraversalError';
		this.target = target;
	}
}

/**
 * Requested entry does not exist (or is not served)
 */
export class NotFoundError extends HttpError {
	/**
	 * Filesystem path (or raw target when resolution stopped before joining with root)
	 */
	readonly path: string;

	/**
	 * Create not found error
	 *
	 * @param message - error message
	 * @param path - filesystem path or raw target
	 */
	constructor(message: string, path: string) {
		super(message, 404);
		this.name = 'NotFoundError';
		this.path = path;
	}
}

/**
 * Request method is not served
 */
export class MethodNotAllowedError extends HttpError {
	/**
	 * Request method
	 */
	readonly method: string;

	/**
	 * Methods to list in the Allow header
	 */
	readonly allowedMethods: readonly string[];

	/**
	 * Create method not allowed error
	 *
	 * @param method - request method
	 * @param allowedMethods - allowed methods
	 */
	constructor(method: string, allowedMethods: readonly string[]) {
		super(`${ method } is not allowed`, 405);
		this.name = 'MethodNotAllowedError';
		this.method = method;
		this.allowedMethods = allowedMethods;
	}
}

/**
 * Filesystem failure other than a missing entry
 */
export class FileSystemError extends HttpError {
	/**
	 * Filesystem path
	 */
	readonly path: string;

	/**
	 * System error code (EACCES, EIO, ...) when known
	 */
	readonly code: string | undefined;

	/**
	 * Create filesystem error
	 *
	 * @param message - error message
	 * @param path - filesystem path
	 * @param code - system error code
	 */
	constructor(message: string, path: string, code?: string) {
		super(message, 500);
		this.name = 'FileSystemError';
		this.path = path;
		this.code = code;
	}
}

/**
 * Connection read or write failure, never answered
 */
export class TransportError extends Error {
	/**
	 * Create transport error
	 *
	 * @param message - error message
	 * @param code - system error code when known
	 */
	constructor(message: string, readonly code?: string) {
		super(message);
		this.name = 'TransportError';
	}
}

/**
 * Work queue closed while submitting
 */
export class QueueClosedError extends Error {
	constructor() {
		super('work queue is closed');
		this.name = 'QueueClosedError';
	}
}

/**
 * Invalid server option or command-line value
 */
export class ConfigurationError extends Error {
	/**
	 * Option name
	 */
	readonly option: string;

	/**
	 * Create configuration error
	 *
	 * @param message - error message
	 * @param option - option name
	 */
	constructor(message: string, option: string) {
		super(message);
		this.name = 'ConfigurationError';
		this.option = option;
	}
}

/**
 * Get the system error code of an unknown thrown value
 *
 * @param err - thrown value
 * @returns the code or undefined
 */
export function errorCode(err: unknown) {
	if (err instanceof Error && 'code' in err && typeof err.code === 'string') {
		return err.code;
	}
	return undefined;
}
