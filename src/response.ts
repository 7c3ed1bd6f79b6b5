import type { Connection } from './connection';
import type { HttpError } from './errors';
import type { ResponseBody, ResponseHeaders } from './types';
import { serializeResponseHead } from './utils';

/**
 * Stream response
 */
export class StreamResponse {
	private disposed = false;

	/**
	 * Create stream response
	 *
	 * @param statusCode - the status code
	 * @param headers - the response headers
	 * @param body - in-memory buffers or lazy chunk sequence (consumed once)
	 * @param error - the error answered by this response, if any
	 * @param onDispose - function releasing the body resources
	 */
	constructor(
		readonly statusCode: number,
		readonly headers: ResponseHeaders,
		readonly body: ResponseBody,
		readonly error?: HttpError,
		private readonly onDispose?: () => Promise<void>,
	) {}

	/**
	 * Write status line, headers and body to the connection, one chunk at a time
	 *
	 * @param connection - the connection
	 * @throws TransportError when writing fails, or the body error when reading it fails
	 */
	async send(connection: Connection) {
		await connection.write(serializeResponseHead(this.statusCode, this.headers));
		for await (const chunk of this.body) {
			if (chunk.byteLength === 0) {
				continue;
			}
			await connection.write(chunk);
		}
	}

	/**
	 * Release the body resources (noop after the first call)
	 */
	async dispose() {
		if (this.disposed) {
			return;
		}
		this.disposed = true;
		if (this.onDispose) {
			await this.onDispose();
		}
	}
}
