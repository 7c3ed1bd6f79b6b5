import type { HttpError } from './errors';

/**
 * Result of a pipeline stage: a value, or the error to answer with
 */
export type Outcome<T, E extends Error = HttpError> =
	| { readonly ok: true; readonly value: T }
	| { readonly ok: false; readonly error: E };

/**
 * Create a successful outcome
 *
 * @param value - stage value
 * @returns the outcome
 */
export function success<T>(value: T): Outcome<T, never> {
	return { ok: true, value };
}

/**
 * Create a failed outcome
 *
 * @param error - stage error
 * @returns the outcome
 */
export function failure<E extends Error>(error: E): Outcome<never, E> {
	return { ok: false, error };
}

/**
 * Parsed request head
 */
export interface HttpRequest {
	/**
	 * Request method, case preserved
	 */
	readonly method: string;
	/**
	 * Raw request target
	 */
	readonly target: string;
	/**
	 * HTTP version (for example '1.0')
	 */
	readonly version: string;
	/**
	 * Headers keyed by lowercase name (repeated headers are joined with ', ')
	 */
	readonly headers: Readonly<Record<string, string>>;
}

/**
 * Kind of a resolved entry
 */
export type EntryKind = 'file' | 'directory';

/**
 * Path proven to lie within the served root
 */
export interface ResolvedPath {
	/**
	 * Absolute filesystem path
	 */
	readonly absolutePath: string;
	/**
	 * Decoded path segments relative to root
	 */
	readonly segments: readonly string[];
	/**
	 * Normalized url path ('/' for root, trailing slash for directories)
	 */
	readonly urlPath: string;
	/**
	 * Entry kind at stat time
	 */
	readonly kind: EntryKind;
	/**
	 * Size in bytes at stat time
	 */
	readonly size: number;
}

/**
 * Response headers
 */
export interface ResponseHeaders {
	[header: string]: string | undefined;
	// eslint-disable-next-line @typescript-eslint/naming-convention
	'Content-Type'?: string;
	// eslint-disable-next-line @typescript-eslint/naming-convention
	'Content-Length'?: string;
	// eslint-disable-next-line @typescript-eslint/naming-convention
	'Connection'?: string;
	// eslint-disable-next-line @typescript-eslint/naming-convention
	'Allow'?: string;
	// eslint-disable-next-line @typescript-eslint/naming-convention
	'X-Content-Type-Options'?: string;
}

/**
 * Response body: in-memory buffers or a lazy single-pass chunk sequence
 */
export type ResponseBody = Iterable<Uint8Array> | AsyncIterable<Uint8Array>;

/**
 * Stats subset used by the server
 */
export interface FileStats {
	size: number;
	isFile(): boolean;
	isDirectory(): boolean;
}

/**
 * Directory entry subset used by the server
 */
export interface DirectoryEntry {
	name: string;
	isFile(): boolean;
	isDirectory(): boolean;
}

/**
 * Open file subset used by the server
 */
export interface ReadableFile {
	read(buffer: Uint8Array, offset: number, length: number, position: number): Promise<{ bytesRead: number }>;
	stat(): Promise<FileStats>;
	close(): Promise<void>;
}

/**
 * "fs/promises" module like type used by this server
 */
export interface FileSystem {
	stat(path: string): Promise<FileStats>;
	open(path: string, flags: 'r'): Promise<ReadableFile>;
	readdir(path: string, options: { withFileTypes: true }): Promise<DirectoryEntry[]>;
}
