import type { AddressInfo, Server, Socket } from 'node:net';
import { createServer } from 'node:net';

import type { ResolvedServerOptions, ServerOptions } from './config';
import { resolveServerOptions } from './config';
import { Connection } from './connection';
import { ConnectionHandler } from './connection-handler';
import type { Logger } from './logger';
import { PathResolver } from './path-resolver';
import { ResponseWriter } from './response-writer';
import { WorkerPool } from './worker-pool';

/**
 * Unit of work submitted to the pool
 */
export interface Job {
	/**
	 * Accepted connection
	 */
	connection: Connection;
	/**
	 * Accept time in milliseconds
	 */
	acceptedAt: number;
}

/**
 * File server: accept loop, worker pool and connection handler
 */
export class FileServer {
	/**
	 * Resolved options
	 */
	readonly options: ResolvedServerOptions;

	/**
	 * Connection handler used by the workers
	 */
	readonly handler: ConnectionHandler;

	/**
	 * Worker pool
	 */
	readonly pool: WorkerPool<Job>;

	private readonly server: Server;
	private readonly logger: Logger;
	private readonly sockets = new Set<Socket>();
	private acceptLoop: Promise<void> = Promise.resolve();
	private pendingDispatches = 0;
	private nextConnectionId = 1;
	private closing: Promise<void> | undefined;

	/**
	 * Create file server
	 *
	 * @param opts - server options
	 * @throws ConfigurationError when an option is invalid
	 */
	constructor(opts: ServerOptions = {}) {
		const options = resolveServerOptions(opts);
		this.options = options;
		const { logger, fileSystem, ignorePattern } = options;
		this.logger = logger;
		this.handler = new ConnectionHandler({
			resolver: new PathResolver(options.root, { fileSystem, ignorePattern }),
			writer: new ResponseWriter({ fileSystem, chunkSize: options.chunkSize, ignorePattern }),
			logger,
			maxHeaderBytes: options.maxHeaderBytes,
			timeoutMs: options.readTimeoutMs,
		});
		this.pool = new WorkerPool<Job>(
			async ({ connection }) => this.processJob(connection),
			{
				queueCapacity: options.queueCapacity,
				logger,
				onDiscard: ({ connection }) => {
					logger.debug(`connection #${ connection.id } discarded at shutdown`);
					connection.close(new Error('server shutting down'));
				},
			},
		);
		this.server = createServer({ pauseOnConnect: true, allowHalfOpen: true }, socket => {
			this.accept(socket);
		});
	}

	/**
	 * True while the server accepts connections
	 */
	get listening() {
		return this.server.listening;
	}

	/**
	 * Number of accepted connections not closed yet (being processed, queued or waiting for the queue)
	 */
	get connections() {
		return this.sockets.size;
	}

	/**
	 * Bound address
	 *
	 * @returns the address
	 * @throws when the server is not listening
	 */
	address(): AddressInfo {
		const address = this.server.address();
		if (address === null || typeof address === 'string') {
			throw new Error('server is not listening on a TCP address');
		}
		return address;
	}

	/**
	 * Start the workers and listen
	 *
	 * @returns the bound address
	 */
	async listen(): Promise<AddressInfo> {
		const { host, port, workers } = this.options;
		this.pool.start(workers);
		await new Promise<void>((resolve, reject) => {
			const onError = (err: Error) => {
				reject(err);
			};
			this.server.once('error', onError);
			this.server.listen(port, host, () => {
				this.server.off('error', onError);
				resolve();
			});
		});
		this.server.on('error', err => {
			this.logger.error('server error', err);
		});
		return this.address();
	}

	/**
	 * Stop accepting, finish or discard queued connections, stop the workers
	 *
	 * @param opts - close options
	 * @param opts.discardPending - close queued connections without answering them
	 */
	async close({ discardPending = false } = {}): Promise<void> {
		this.closing ??= this.shutdown(discardPending);
		await this.closing;
	}

	private async shutdown(discardPending: boolean) {
		const serverClosed = new Promise<void>(resolve => {
			if (!this.server.listening) {
				resolve();
				return;
			}
			this.server.close(() => {
				resolve();
			});
		});
		await this.pool.shutdown({ discardPending });
		await this.acceptLoop;
		for (const socket of this.sockets) {
			socket.destroy();
		}
		await serverClosed;
		this.logger.debug('server closed');
	}

	private accept(socket: Socket) {
		const connection = new Connection(socket, this.nextConnectionId++, this.logger, this.options.lingerTimeoutMs);
		if (this.closing) {
			connection.close(new Error('server shutting down'));
			return;
		}
		const { acceptBacklog } = this.options;
		if (this.pendingDispatches >= acceptBacklog) {
			this.logger.warn(`connection #${ connection.id } (${
				connection.remoteAddress
			}) refused: ${ acceptBacklog } connections already waiting for the queue`);
			connection.close(new Error('accept backlog full'));
			return;
		}
		this.sockets.add(socket);
		socket.once('close', () => {
			this.sockets.delete(socket);
		});
		// submissions are chained to keep accept order, at most acceptBacklog of them wait for room
		this.pendingDispatches++;
		this.acceptLoop = this.acceptLoop.then(async () => this.dispatch({ connection, acceptedAt: Date.now() }));
	}

	private async dispatch(job: Job) {
		try {
			await this.pool.submit(job);
		} catch (err: unknown) {
			this.logger.debug(`connection #${ job.connection.id } rejected: ${ String(err) }`);
			job.connection.close(err);
		} finally {
			this.pendingDispatches--;
		}
	}

	private async processJob(connection: Connection) {
		try {
			await this.handler.handle(connection);
		} finally {
			connection.close(new Error('connection handler exited without closing'));
		}
	}
}
