import type { Socket } from 'node:net';

import type { HttpRequest, Outcome } from './types';
import { success, failure } from './types';
import {
	MalformedRequestError,
	RequestTimeoutError,
	RequestTooLargeError,
	TransportError,
	errorCode,
} from './errors';

/**
 * Errors produced while reading the request head
 */
export type ReadRequestError = MalformedRequestError | RequestTimeoutError | RequestTooLargeError | TransportError;

/**
 * Request head reading options
 */
export interface ReadRequestOptions {
	/**
	 * Maximum number of bytes of the head (request line, headers and terminating empty line)
	 */
	maxHeaderBytes: number;
	/**
	 * Maximum time to receive the complete head, in milliseconds
	 */
	timeoutMs: number;
}

const HEAD_TERMINATOR = Buffer.from('\r\n\r\n');

// tchar from RFC 9110
const TOKEN = /^[!#$%&'*+\-.^_`|~0-9A-Za-z]+$/u;
const REQUEST_LINE = /^(?<method>[^ ]+) (?<target>[^ ]+) HTTP\/(?<version>\d\.\d)$/u;

/**
 * Read the request head from a paused socket
 *
 * The socket is paused again and every listener added here is removed before the promise resolves,
 * bytes following the head are ignored.
 *
 * @param socket - the connection socket (paused)
 * @param opts - reading options
 * @returns the head bytes (terminating empty line included) or the reading error
 */
export async function readRequestHead(
	socket: Socket,
	{ maxHeaderBytes, timeoutMs }: ReadRequestOptions,
): Promise<Outcome<Buffer, ReadRequestError>> {
	// a destroyed socket emits no more events
	if (socket.destroyed) {
		return failure(new TransportError('connection closed before the request head was read'));
	}
	return new Promise(resolve => {
		const chunks: Buffer[] = [];
		let length = 0;

		const finish = (outcome: Outcome<Buffer, ReadRequestError>) => {
			clearTimeout(timer);
			socket.off('data', onData);
			socket.off('end', onEnd);
			socket.off('error', onError);
			socket.off('close', onClose);
			socket.pause();
			resolve(outcome);
		};

		const onData = (chunk: Buffer) => {
			// search again from the end of the previous chunk in case the terminator is split
			const searchFrom = Math.max(0, length - HEAD_TERMINATOR.length + 1);
			chunks.push(chunk);
			length += chunk.length;
			const buffer = chunks.length === 1 ? chunk : Buffer.concat(chunks, length);
			if (chunks.length > 1) {
				chunks.splice(0, chunks.length, buffer);
			}
			const index = buffer.indexOf(HEAD_TERMINATOR, searchFrom);
			const headLength = index === -1 ? -1 : index + HEAD_TERMINATOR.length;
			if (headLength !== -1 && headLength <= maxHeaderBytes) {
				finish(success(buffer.subarray(0, headLength)));
				return;
			}
			if (headLength !== -1 || length > maxHeaderBytes) {
				finish(failure(new RequestTooLargeError(maxHeaderBytes)));
			}
		};

		const onEnd = () => {
			finish(failure(
				length === 0
					? new TransportError('connection ended before sending a request')
					: new MalformedRequestError('connection ended before the end of the request head'),
			));
		};

		const onError = (err: Error) => {
			finish(failure(new TransportError(err.message, errorCode(err))));
		};

		const onClose = () => {
			finish(failure(new TransportError('connection closed while reading the request head')));
		};

		const timer = setTimeout(() => {
			finish(failure(new RequestTimeoutError(timeoutMs)));
		}, timeoutMs);

		socket.on('data', onData);
		socket.on('end', onEnd);
		socket.on('error', onError);
		socket.on('close', onClose);
		socket.resume();
	});
}

/**
 * Parse the request head
 *
 * @param head - head bytes, terminating empty line included
 * @returns the request or a malformed request error
 */
export function parseRequestHead(head: Buffer): Outcome<HttpRequest, MalformedRequestError> {
	const lines = head.toString('latin1').split('\r\n');
	// drop the two empty strings produced by the terminating CRLF CRLF
	lines.splice(-2, 2);
	const [requestLine, ...headerLines] = lines;

	const match = REQUEST_LINE.exec(requestLine ?? '');
	if (!match?.groups) {
		return failure(new MalformedRequestError(`malformed request line: ${ JSON.stringify(requestLine) }`));
	}
	const { groups: { method, target, version } } = match;
	if (!TOKEN.test(method)) {
		return failure(new MalformedRequestError(`malformed method: ${ JSON.stringify(method) }`));
	}

	const headers: Record<string, string> = {};
	for (const line of headerLines) {
		const colon = line.indexOf(':');
		const name = colon === -1 ? '' : line.slice(0, colon);
		if (!TOKEN.test(name)) {
			return failure(new MalformedRequestError(`malformed header line: ${ JSON.stringify(line) }`));
		}
		const key = name.toLowerCase();
		const value = line.slice(colon + 1).trim();
		const { [key]: previous } = headers;
		headers[key] = previous === undefined ? value : `${ previous }, ${ value }`;
	}

	return success({ method, target, version, headers });
}

/**
 * Read and parse the request of a connection
 *
 * @param socket - the connection socket (paused)
 * @param opts - reading options
 * @returns the request or the reading or parsing error
 */
export async function readRequest(
	socket: Socket,
	opts: ReadRequestOptions,
): Promise<Outcome<HttpRequest, ReadRequestError>> {
	const head = await readRequestHead(socket, opts);
	if (!head.ok) {
		return head;
	}
	return parseRequestHead(head.value);
}
