import type { Connection } from './connection';
import { MethodNotAllowedError, TraversalError, TransportError } from './errors';
import type { Logger } from './logger';
import type { PathResolver } from './path-resolver';
import { readRequest } from './request-parser';
import type { ReadRequestOptions } from './request-parser';
import type { StreamResponse } from './response';
import type { ResponseWriter } from './response-writer';
import type { HttpRequest } from './types';

/**
 * Methods served
 */
export const ALLOWED_METHODS = <const> ['GET'];

/**
 * Connection handler options
 */
export interface ConnectionHandlerOptions extends ReadRequestOptions {
	resolver: PathResolver;
	writer: ResponseWriter;
	logger: Logger;
}

/**
 * Runs the read-request, resolve, render and write pipeline of one connection
 */
export class ConnectionHandler {
	readonly resolver: PathResolver;
	readonly writer: ResponseWriter;
	readonly logger: Logger;
	readonly readOptions: ReadRequestOptions;

	/**
	 * Create connection handler
	 *
	 * @param opts - handler options
	 */
	constructor({ resolver, writer, logger, maxHeaderBytes, timeoutMs }: ConnectionHandlerOptions) {
		this.resolver = resolver;
		this.writer = writer;
		this.logger = logger;
		this.readOptions = { maxHeaderBytes, timeoutMs };
	}

	/**
	 * Handle one connection to completion, the connection is closed on every path
	 *
	 * Failures are answered when possible, errors while writing truncate the response.
	 *
	 * @param connection - the accepted connection
	 */
	async handle(connection: Connection): Promise<void> {
		let response: StreamResponse | undefined;
		let request: HttpRequest | undefined;
		let closeError: unknown;
		try {
			connection.transition('read-request');
			const read = await readRequest(connection.socket, this.readOptions);
			if (!read.ok) {
				if (read.error instanceof TransportError) {
					this.logger.debug(`connection #${ connection.id } (${
						connection.remoteAddress
					}) closed without request: ${ read.error.message }`);
					closeError = read.error;
					return;
				}
				response = this.writer.createErrorResponse(read.error);
			} else {
				request = read.value;
				response = await this.respond(connection, request);
			}

			connection.transition('write');
			try {
				await response.send(connection);
			} catch (err: unknown) {
				closeError = err;
				this.logger.warn(`connection #${ connection.id } (${
					connection.remoteAddress
				}) response truncated: ${ err instanceof Error ? err.message : String(err) }`);
			}
			this.logAccess(connection, request, response, closeError !== undefined);
		} catch (err: unknown) {
			closeError = err;
			throw err;
		} finally {
			try {
				await response?.dispose();
			} finally {
				connection.close(closeError);
			}
		}
	}

	/**
	 * Create the response of a parsed request
	 *
	 * @param connection - the connection
	 * @param request - the parsed request
	 * @returns the response (an error response for every failure)
	 */
	async respond(connection: Connection, request: HttpRequest): Promise<StreamResponse> {
		const { method, target } = request;
		if (!ALLOWED_METHODS.some(allowed => allowed === method)) {
			return this.writer.createErrorResponse(new MethodNotAllowedError(method, ALLOWED_METHODS));
		}

		connection.transition('resolve');
		const resolved = await this.resolver.resolve(target);
		if (!resolved.ok) {
			const { error } = resolved;
			if (error instanceof TraversalError) {
				this.logger.warn(`connection #${ connection.id } (${
					connection.remoteAddress
				}) potential path traversal attack: ${ JSON.stringify(target) }`);
			}
			return this.writer.createErrorResponse(error);
		}

		connection.transition('render');
		const rendered = await this.writer.render(resolved.value);
		if (!rendered.ok) {
			if (rendered.error.statusCode >= 500) {
				this.logger.error(`connection #${ connection.id }: ${ rendered.error.message }`);
			}
			return this.writer.createErrorResponse(rendered.error);
		}
		return rendered.value;
	}

	private logAccess(
		connection: Connection,
		request: HttpRequest | undefined,
		response: StreamResponse,
		truncated: boolean,
	) {
		const requestLine = request
			? `${ request.method } ${ request.target } HTTP/${ request.version }`
			: '-';
		const errorName = response.error ? ` ${ response.error.name }` : '';
		this.logger.info(`${ connection.remoteAddress } "${ requestLine }" ${ response.statusCode } ${
			connection.bytesWritten
		}${ truncated ? ' truncated' : '' }${ errorName }`);
	}
}
