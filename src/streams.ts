import type { ReadableFile } from './types';
import { FileSystemError } from './errors';

/**
 * Default chunk size used to stream files
 */
export const DEFAULT_CHUNK_SIZE = 64 * 1024;

/**
 * Async generator reading a file in chunks of at most `chunkSize` bytes
 *
 * Stops after `size` bytes even if the file grew since it was opened. The file is not closed.
 *
 * @param file - the open file
 * @param size - number of bytes announced to the client
 * @param chunkSize - maximum chunk size
 * @param path - file path (for error messages)
 * @yields file chunks
 * @throws FileSystemError when the file is shorter than `size`
 */
export async function *readFileChunks(
	file: ReadableFile,
	size: number,
	chunkSize: number = DEFAULT_CHUNK_SIZE,
	path = '<file>',
): AsyncGenerator<Buffer, void, undefined> {
	let position = 0;
	while (position < size) {
		const buffer = Buffer.allocUnsafe(Math.min(chunkSize, size - position));
		// eslint-disable-next-line no-await-in-loop
		const { bytesRead } = await file.read(buffer, 0, buffer.length, position);
		if (bytesRead === 0) {
			throw new FileSystemError(
				`${ path } was truncated while being sent (${ position } of ${ size } bytes read)`,
				path,
			);
		}
		position += bytesRead;
		yield bytesRead === buffer.length ? buffer : buffer.subarray(0, bytesRead);
	}
}
