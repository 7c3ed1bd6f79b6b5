import { join } from 'node:path';

import { lookup, charset } from 'mime-types';

import type { EntryKind, FileSystem, Outcome, ReadableFile, ResolvedPath, ResponseHeaders } from './types';
import { success, failure } from './types';
import type { HttpError } from './errors';
import { NotFoundError, FileSystemError, MethodNotAllowedError, errorCode } from './errors';
import { StreamResponse } from './response';
import { readFileChunks, DEFAULT_CHUNK_SIZE } from './streams';
import { escapeHTML, statelessPattern, statusMessage } from './utils';

/**
 * Errors produced while rendering a resolved path
 */
export type RenderError = NotFoundError | FileSystemError;

/**
 * Directory listing entry
 */
export interface ListedEntry {
	name: string;
	kind: EntryKind;
	/**
	 * Size in bytes (0 for directories)
	 */
	size: number;
}

/**
 * Response writer options
 */
export interface ResponseWriterOptions {
	/**
	 * File system used to list directories and open files
	 */
	fileSystem: FileSystem;
	/**
	 * Maximum size of streamed file chunks
	 */
	chunkSize?: number;
	/**
	 * Pattern of entry names hidden from listings (or false)
	 */
	ignorePattern?: RegExp | false;
}

/**
 * Default content type for unknown extensions
 */
export const DEFAULT_MIME_TYPE = 'application/octet-stream';

const HTML_CONTENT_TYPE = 'text/html; charset=UTF-8';
const TEXT_CONTENT_TYPE = 'text/plain; charset=UTF-8';

/**
 * Create content-type header value from a file name
 *
 * @param fileName - file name
 * @returns content-type header value
 */
export function contentTypeFromName(fileName: string) {
	const mimeType = lookup(fileName);
	if (!mimeType) {
		return DEFAULT_MIME_TYPE;
	}
	const mimeTypeCharset = charset(mimeType);
	return mimeTypeCharset ? `${ mimeType }; charset=${ mimeTypeCharset }` : mimeType;
}

/**
 * Compare names in code unit order
 *
 * @param a - first name
 * @param b - second name
 * @returns comparison result
 */
function compareNames(a: ListedEntry, b: ListedEntry) {
	if (a.name < b.name) {
		return -1;
	}
	return a.name > b.name ? 1 : 0;
}

/**
 * Renders resolved paths and errors as responses
 */
export class ResponseWriter {
	/**
	 * File system used to list directories and open files
	 */
	readonly fileSystem: FileSystem;

	/**
	 * Maximum size of streamed file chunks
	 */
	readonly chunkSize: number;

	/**
	 * Ignore pattern (or false if disabled)
	 */
	readonly ignorePattern: RegExp | false;

	/**
	 * Create response writer
	 *
	 * @param opts - response writer options
	 */
	constructor(opts: ResponseWriterOptions) {
		this.fileSystem = opts.fileSystem;
		this.chunkSize = opts.chunkSize ?? DEFAULT_CHUNK_SIZE;
		this.ignorePattern = statelessPattern(opts.ignorePattern ?? false);
	}

	/**
	 * Render a resolved path as a directory listing or a file
	 *
	 * @param resolved - resolved path
	 * @returns the response or the rendering error
	 */
	async render(resolved: ResolvedPath): Promise<Outcome<StreamResponse, RenderError>> {
		return resolved.kind === 'directory'
			? this.renderDirectory(resolved)
			: this.renderFile(resolved);
	}

	/**
	 * Sorted directory entries which can be listed, with file sizes
	 *
	 * Files removed between reading the directory and their stat are left out.
	 *
	 * @param resolved - resolved directory
	 * @returns the entries
	 * @throws when the directory or one of its files can not be read
	 */
	async listEntries(resolved: ResolvedPath): Promise<ListedEntry[]> {
		const { ignorePattern, fileSystem } = this;
		const { absolutePath } = resolved;
		const entries = await fileSystem.readdir(absolutePath, { withFileTypes: true });
		const listed = await Promise.all(entries.map(async (entry): Promise<ListedEntry | undefined> => {
			if (ignorePattern && ignorePattern.test(entry.name)) {
				return undefined;
			}
			if (entry.isDirectory()) {
				return { name: entry.name, kind: 'directory', size: 0 };
			}
			if (!entry.isFile()) {
				return undefined;
			}
			try {
				const { size } = await fileSystem.stat(join(absolutePath, entry.name));
				return { name: entry.name, kind: 'file', size };
			} catch (err: unknown) {
				if (errorCode(err) === 'ENOENT') {
					return undefined;
				}
				throw err;
			}
		}));
		return listed
			.filter((entry): entry is ListedEntry => entry !== undefined)
			.sort(compareNames);
	}

	/**
	 * Render the HTML listing of a directory
	 *
	 * @param resolved - resolved directory
	 * @returns the listing response or a filesystem error
	 */
	async renderDirectory(resolved: ResolvedPath): Promise<Outcome<StreamResponse, RenderError>> {
		let entries;
		try {
			entries = await this.listEntries(resolved);
		} catch (err: unknown) {
			const { absolutePath } = resolved;
			const code = errorCode(err);
			if (code === 'ENOENT' || code === 'ENOTDIR') {
				return failure(new NotFoundError(`${ absolutePath } does not exist anymore`, absolutePath));
			}
			return failure(new FileSystemError(`cannot list ${ absolutePath }: ${ String(err) }`, absolutePath, code));
		}

		const { urlPath, segments } = resolved;
		const display = escapeHTML(`/${ segments.map(segment => `${ segment }/`).join('') }`);
		let html = `<!DOCTYPE html><html lang="en"><head><meta charset="utf-8"><title>Index of ${
			display
		}</title><base href="${ escapeHTML(urlPath) }"></head><body><h1>Index of ${ display }</h1><ul>`;
		if (segments.length > 0) {
			html += '<li><a href="../">../</a></li>';
		}
		for (const entry of entries) {
			const isDirectory = entry.kind === 'directory';
			const suffix = isDirectory ? '/' : '';
			const href = escapeHTML(`${ encodeURIComponent(entry.name) }${ suffix }`);
			const size = isDirectory ? '&lt;DIR&gt;' : `${ entry.size } bytes`;
			html += `<li><a href="${ href }">${ escapeHTML(entry.name) }${ suffix }</a> <span class="size">${
				size
			}</span></li>`;
		}
		html += '</ul></body></html>';

		const body = Buffer.from(html);
		return success(new StreamResponse(
			200,
			this.createHeaders(HTML_CONTENT_TYPE, body.byteLength),
			[body],
		));
	}

	/**
	 * Open a file and create its streaming response
	 *
	 * @param resolved - resolved file
	 * @returns the file response or the opening error
	 */
	async renderFile(resolved: ResolvedPath): Promise<Outcome<StreamResponse, RenderError>> {
		const { absolutePath } = resolved;
		let file: ReadableFile;
		try {
			file = await this.fileSystem.open(absolutePath, 'r');
		} catch (err: unknown) {
			const code = errorCode(err);
			if (code === 'ENOENT' || code === 'ENOTDIR') {
				return failure(new NotFoundError(`${ absolutePath } does not exist anymore`, absolutePath));
			}
			return failure(new FileSystemError(`cannot open ${ absolutePath }: ${ String(err) }`, absolutePath, code));
		}

		let size;
		try {
			const stats = await file.stat();
			if (!stats.isFile()) {
				await file.close();
				return failure(new NotFoundError(`${ absolutePath } is not a file anymore`, absolutePath));
			}
			({ size } = stats);
		} catch (err: unknown) {
			await file.close();
			return failure(new FileSystemError(`cannot stat ${ absolutePath }: ${ String(err) }`, absolutePath, errorCode(err)));
		}

		const fileName = resolved.segments[resolved.segments.length - 1] ?? '';
		return success(new StreamResponse(
			200,
			this.createHeaders(contentTypeFromName(fileName), size),
			readFileChunks(file, size, this.chunkSize, absolutePath),
			undefined,
			async () => file.close(),
		));
	}

	/**
	 * Create the response answering an error
	 *
	 * @param error - the error
	 * @returns the error response (without body for 405)
	 */
	createErrorResponse(error: HttpError) {
		const { statusCode } = error;
		if (error instanceof MethodNotAllowedError) {
			return new StreamResponse(
				statusCode,
				{
					...this.createHeaders(undefined, 0),
					// eslint-disable-next-line @typescript-eslint/naming-convention
					Allow: error.allowedMethods.join(', '),
				},
				[],
				error,
			);
		}
		const body = Buffer.from(statusMessage(statusCode));
		return new StreamResponse(
			statusCode,
			this.createHeaders(TEXT_CONTENT_TYPE, body.byteLength),
			[body],
			error,
		);
	}

	/**
	 * Create the headers shared by every response
	 *
	 * @param contentType - content-type header value
	 * @param contentLength - body length
	 * @returns the headers
	 */
	createHeaders(contentType: string | undefined, contentLength: number): ResponseHeaders {
		return {
			// eslint-disable-next-line @typescript-eslint/naming-convention
			'Content-Type': contentType,
			// eslint-disable-next-line @typescript-eslint/naming-convention
			'Content-Length': String(contentLength),
			// eslint-disable-next-line @typescript-eslint/naming-convention
			'X-Content-Type-Options': 'nosniff',
			// eslint-disable-next-line @typescript-eslint/naming-convention
			'Connection': 'close',
		};
	}
}
