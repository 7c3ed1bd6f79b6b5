/* eslint-disable jsdoc/require-jsdoc */
import type { AddressInfo, Socket } from 'node:net';
import { connect, createServer } from 'node:net';
import { join } from 'node:path';

import type {
	DirectoryEntry,
	FileSystem,
	Logger,
	ReadableFile,
	ServerOptions,
	StreamResponse,
} from '../src/pool-file-server';
import { FileServer } from '../src/pool-file-server';

export const fixtures = join(__dirname, 'fixtures');

export interface RawResponse {
	statusCode: number;
	statusLine: string;
	headers: Record<string, string>;
	body: Buffer;
}

export function serverUrl(server: FileServer) {
	const { address, port } = server.address();
	return `http://${ address }:${ port }`;
}

export async function createTestServer(opts: ServerOptions = {}) {
	const server = new FileServer({ root: fixtures, port: 0, ...opts });
	await server.listen();
	return server;
}

/**
 * Send raw bytes and collect everything until the server closes the connection
 */
export async function rawExchange(
	address: AddressInfo,
	data: string | Buffer | undefined,
	{ end = false } = {},
): Promise<Buffer> {
	return new Promise((resolve, reject) => {
		const chunks: Buffer[] = [];
		const socket = connect(address.port, address.address, () => {
			if (data !== undefined) {
				socket.write(data);
			}
			if (end) {
				socket.end();
			}
		});
		socket.on('data', (chunk: Buffer) => {
			chunks.push(chunk);
		});
		socket.on('error', err => {
			if ('code' in err && err.code === 'ECONNRESET') {
				resolve(Buffer.concat(chunks));
				return;
			}
			reject(err);
		});
		socket.on('close', () => {
			resolve(Buffer.concat(chunks));
		});
	});
}

export function parseRawResponse(raw: Buffer): RawResponse {
	const headEnd = raw.indexOf('\r\n\r\n');
	if (headEnd === -1) {
		throw new Error(`incomplete response: ${ JSON.stringify(raw.toString('latin1')) }`);
	}
	const [statusLine, ...headerLines] = raw.subarray(0, headEnd).toString('latin1').split('\r\n');
	const match = /^HTTP\/1\.1 (?<code>\d{3}) /u.exec(statusLine);
	if (!match?.groups) {
		throw new Error(`unexpected status line: ${ statusLine }`);
	}
	const headers: Record<string, string> = {};
	for (const line of headerLines) {
		const colon = line.indexOf(':');
		headers[line.slice(0, colon).toLowerCase()] = line.slice(colon + 1).trim();
	}
	return {
		statusCode: Number(match.groups.code),
		statusLine,
		headers,
		body: raw.subarray(headEnd + 4),
	};
}

export async function rawRequest(
	server: FileServer,
	data: string | Buffer,
	opts: { end?: boolean } = {},
): Promise<RawResponse> {
	return parseRawResponse(await rawExchange(server.address(), data, opts));
}

export async function rawGet(server: FileServer, target: string, method = 'GET') {
	return rawRequest(server, `${ method } ${ target } HTTP/1.0\r\nHost: localhost\r\n\r\n`);
}

export interface RecordedLog {
	level: 'debug' | 'info' | 'warn' | 'error';
	message: string;
	err?: unknown;
}

export function createRecordingLogger(): Logger & { records: RecordedLog[] } {
	const records: RecordedLog[] = [];
	return {
		records,
		debug(message) {
			records.push({ level: 'debug', message });
		},
		info(message) {
			records.push({ level: 'info', message });
		},
		warn(message) {
			records.push({ level: 'warn', message });
		},
		error(message, err) {
			records.push({ level: 'error', message, err });
		},
	};
}

export interface Deferred<T> {
	promise: Promise<T>;
	resolve: (value: T) => void;
	reject: (err: Error) => void;
}

export function deferred<T = void>(): Deferred<T> {
	let resolve: ((value: T) => void) | undefined;
	let reject: ((err: Error) => void) | undefined;
	const promise = new Promise<T>((res, rej) => {
		resolve = res;
		reject = rej;
	});
	if (!resolve || !reject) {
		throw new Error('promise executor not called');
	}
	return { promise, resolve, reject };
}

export async function delay(ms: number) {
	await new Promise(resolve => {
		setTimeout(resolve, ms);
	});
}

export async function tick() {
	await new Promise(resolve => {
		setImmediate(resolve);
	});
}

/**
 * Connected socket pair, the server side is paused as accepted sockets are
 */
export async function socketPair(): Promise<{ server: Socket; client: Socket; close: () => Promise<void> }> {
	const listener = createServer({ pauseOnConnect: true, allowHalfOpen: true });
	await new Promise<void>(resolve => {
		listener.listen(0, '127.0.0.1', resolve);
	});
	const address = listener.address();
	if (address === null || typeof address === 'string') {
		throw new Error('unexpected listener address');
	}
	const accepted = new Promise<Socket>(resolve => {
		listener.once('connection', resolve);
	});
	const client = connect(address.port, address.address);
	client.on('error', () => {
		// noop, tests destroy the server side on purpose
	});
	const server = await accepted;
	server.on('error', () => {
		// noop
	});
	return {
		server,
		client,
		close: async () => {
			client.destroy();
			server.destroy();
			await new Promise(resolve => {
				listener.close(resolve);
			});
		},
	};
}

export function systemError(code: string) {
	return Object.assign(new Error(`${ code }: simulated failure`), { code });
}

/**
 * File system where every call fails with ENOENT unless overridden
 */
export function fakeFileSystem(overrides: Partial<FileSystem> = {}): FileSystem {
	const missing = async () => {
		throw systemError('ENOENT');
	};
	return { stat: missing, open: missing, readdir: missing, ...overrides };
}

export function fakeEntry(name: string, kind: 'file' | 'directory' | 'other'): DirectoryEntry {
	return {
		name,
		isFile: () => kind === 'file',
		isDirectory: () => kind === 'directory',
	};
}

export interface MemoryFile extends ReadableFile {
	closeCount: number;
	readLengths: number[];
}

/**
 * Open file backed by a buffer, `size` can announce more bytes than the content has
 */
export function memoryFile(content: Uint8Array, { isFile = true, size = content.byteLength } = {}): MemoryFile {
	const file: MemoryFile = {
		closeCount: 0,
		readLengths: [],
		async read(buffer, offset, length, position) {
			file.readLengths.push(length);
			const bytes = content.subarray(position, position + length);
			buffer.set(bytes, offset);
			return { bytesRead: bytes.byteLength };
		},
		async stat() {
			return { size, isFile: () => isFile, isDirectory: () => !isFile };
		},
		async close() {
			file.closeCount++;
		},
	};
	return file;
}

export async function collectBody(response: StreamResponse) {
	const chunks: Uint8Array[] = [];
	for await (const chunk of response.body) {
		chunks.push(chunk);
	}
	return Buffer.concat(chunks);
}
