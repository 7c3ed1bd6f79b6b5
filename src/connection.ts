import type { Socket } from 'node:net';

import { TransportError, errorCode } from './errors';
import type { Logger } from './logger';

/**
 * Connection pipeline states
 */
export type ConnectionState = 'accepted' | 'read-request' | 'resolve' | 'render' | 'write' | 'closed';

const TRANSITIONS: Readonly<Record<ConnectionState, readonly ConnectionState[]>> = {
	'accepted': ['read-request', 'closed'],
	'read-request': ['resolve', 'write', 'closed'],
	'resolve': ['render', 'write', 'closed'],
	'render': ['write', 'closed'],
	'write': ['closed'],
	'closed': [],
};

/**
 * Accepted client connection
 *
 * Owned by one worker at a time, closed exactly once.
 */
export class Connection {
	/**
	 * Current pipeline state
	 */
	private currentState: ConnectionState = 'accepted';

	/**
	 * Number of bytes written (head and body)
	 */
	bytesWritten = 0;

	/**
	 * Peer address as "host:port"
	 */
	readonly remoteAddress: string;

	private readonly closeListeners: (() => void)[] = [];

	/**
	 * Wrap an accepted socket
	 *
	 * @param socket - the accepted socket (paused)
	 * @param id - connection id
	 * @param logger - logger
	 * @param lingerTimeoutMs - time to wait for the peer to close after the response, in milliseconds
	 */
	constructor(
		readonly socket: Socket,
		readonly id: number,
		private readonly logger: Logger,
		private readonly lingerTimeoutMs = 2000,
	) {
		const { remoteAddress = 'unknown', remotePort } = socket;
		this.remoteAddress = remotePort === undefined ? remoteAddress : `${ remoteAddress }:${ remotePort }`;
		// a socket without error listener would crash the process
		socket.on('error', err => {
			this.logger.debug(`connection #${ id } (${ this.remoteAddress }) error: ${ err.message }`);
		});
	}

	/**
	 * Current pipeline state
	 */
	get state() {
		return this.currentState;
	}

	/**
	 * True once the connection is closed
	 */
	get closed() {
		return this.currentState === 'closed';
	}

	/**
	 * Move to the next pipeline state
	 *
	 * @param next - next state
	 * @throws when the transition is not allowed
	 */
	transition(next: Exclude<ConnectionState, 'accepted' | 'closed'>) {
		if (!TRANSITIONS[this.currentState].includes(next)) {
			throw new Error(`connection #${ this.id }: invalid transition from ${ this.currentState } to ${ next }`);
		}
		this.currentState = next;
	}

	/**
	 * Register a function called once the connection is closed
	 *
	 * @param listener - close listener
	 */
	onClose(listener: () => void) {
		if (this.closed) {
			listener();
			return;
		}
		this.closeListeners.push(listener);
	}

	/**
	 * Write bytes and wait until they are handed to the operating system
	 *
	 * @param chunk - bytes to write
	 * @throws TransportError when the socket is closed or fails
	 */
	async write(chunk: Uint8Array) {
		const { socket } = this;
		if (this.closed || socket.destroyed || !socket.writable) {
			throw new TransportError(`connection #${ this.id } is not writable`);
		}
		await new Promise<void>((resolve, reject) => {
			socket.write(chunk, err => {
				if (err) {
					reject(new TransportError(err.message, errorCode(err)));
					return;
				}
				resolve();
			});
		});
		this.bytesWritten += chunk.byteLength;
	}

	/**
	 * Close the connection (noop if already closed)
	 *
	 * Without error the socket is ended and destroyed if the peer does not close it within the linger timeout.
	 * With an error the socket is destroyed immediately (truncating any partial response).
	 *
	 * @param error - the failure ending the connection, if any
	 */
	close(error?: unknown) {
		if (this.closed) {
			return;
		}
		const { socket } = this;
		this.currentState = 'closed';
		for (const listener of this.closeListeners.splice(0)) {
			listener();
		}
		if (error !== undefined || socket.destroyed) {
			socket.destroy();
			return;
		}
		socket.setTimeout(this.lingerTimeoutMs, () => {
			socket.destroy();
		});
		socket.end();
		// discard unread bytes so the peer's end is noticed
		socket.resume();
	}
}
