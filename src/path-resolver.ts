import { join, resolve as resolvePath, sep } from 'node:path';

import type { FileSystem, Outcome, ResolvedPath } from './types';
import { success, failure } from './types';
import {
	MalformedRequestError,
	TraversalError,
	NotFoundError,
	FileSystemError,
	errorCode,
} from './errors';
import { encodeUrlPath, statelessPattern } from './utils';

/**
 * Errors produced while resolving a request target
 */
export type ResolveError = MalformedRequestError | TraversalError | NotFoundError | FileSystemError;

/**
 * Path resolver options
 */
export interface PathResolverOptions {
	/**
	 * File system used to stat resolved paths
	 */
	fileSystem: FileSystem;
	/**
	 * Pattern of path segments which are never served (or false)
	 */
	ignorePattern?: RegExp | false;
}

/**
 * Decoded and normalized target, not yet checked against the filesystem
 */
export interface NormalizedTarget {
	/**
	 * Decoded path segments relative to root
	 */
	segments: string[];
	/**
	 * True if the target path ends with a slash
	 */
	trailingSlash: boolean;
}

const ABSOLUTE_FORM = /^[a-z][a-z0-9+.-]*:\/\/[^/?#]*(?<path>[^?#]*)/iu;

/**
 * Decode and lexically normalize a request target
 *
 * @param target - raw request target (origin-form or absolute-form)
 * @returns the decoded segments relative to root or the rejection
 */
export function normalizeTarget(target: string): Outcome<NormalizedTarget, MalformedRequestError | TraversalError> {
	let rawPath;
	const absoluteForm = ABSOLUTE_FORM.exec(target);
	if (absoluteForm?.groups) {
		rawPath = absoluteForm.groups.path || '/';
	} else if (target.startsWith('/')) {
		rawPath = target.replace(/[?#].*$/su, '');
	} else {
		return failure(new MalformedRequestError(`'${ target }' is not a valid request target (should start with '/')`));
	}

	let decoded;
	try {
		decoded = decodeURIComponent(rawPath);
	} catch {
		return failure(new MalformedRequestError(`'${ target }' has an invalid percent-encoding`));
	}
	if (decoded.includes('\0')) {
		return failure(new MalformedRequestError(`'${ target }' contains a null byte`));
	}
	if (decoded.includes('\\')) {
		return failure(new TraversalError(`'${ target }' contains a backslash`, target));
	}

	const segments: string[] = [];
	for (const segment of decoded.split('/')) {
		if (segment === '' || segment === '.') {
			continue;
		}
		if (segment === '..') {
			if (segments.length === 0) {
				return failure(new TraversalError(`'${ target }' escapes the root directory`, target));
			}
			segments.pop();
			continue;
		}
		segments.push(segment);
	}

	return success({ segments, trailingSlash: decoded.endsWith('/') });
}

/**
 * Maps request targets to paths inside a root directory
 */
export class PathResolver {
	/**
	 * Absolute root directory
	 */
	readonly root: string;

	/**
	 * File system used to stat resolved paths
	 */
	readonly fileSystem: FileSystem;

	/**
	 * Ignore pattern (or false if disabled)
	 */
	readonly ignorePattern: RegExp | false;

	/**
	 * Create path resolver
	 *
	 * @param root - root directory (made absolute)
	 * @param opts - resolver options
	 */
	constructor(root: string, opts: PathResolverOptions) {
		this.root = resolvePath(root);
		this.fileSystem = opts.fileSystem;
		this.ignorePattern = statelessPattern(opts.ignorePattern ?? false);
	}

	/**
	 * Check that an absolute path is the root or one of its descendants
	 *
	 * @param path - absolute path
	 * @returns true if the path lies within root
	 */
	contains(path: string) {
		const { root } = this;
		return path === root || path.startsWith(root.endsWith(sep) ? root : `${ root }${ sep }`);
	}

	/**
	 * Resolve a request target to a file or directory within root
	 *
	 * @param target - raw request target
	 * @returns the resolved path or the resolution error
	 */
	async resolve(target: string): Promise<Outcome<ResolvedPath, ResolveError>> {
		const normalized = normalizeTarget(target);
		if (!normalized.ok) {
			return normalized;
		}
		const { value: { segments, trailingSlash } } = normalized;

		const { ignorePattern } = this;
		if (ignorePattern && segments.some(segment => ignorePattern.test(segment))) {
			return failure(new NotFoundError(`'${ target }' is ignored`, target));
		}

		const absolutePath = join(this.root, ...segments);
		if (!this.contains(absolutePath)) {
			return failure(new TraversalError(`'${ target }' resolves outside of the root directory`, target));
		}

		let stats;
		try {
			stats = await this.fileSystem.stat(absolutePath);
		} catch (err: unknown) {
			const code = errorCode(err);
			if (code === 'ENOENT' || code === 'ENOTDIR') {
				return failure(new NotFoundError(`${ absolutePath } does not exist`, absolutePath));
			}
			return failure(new FileSystemError(`cannot stat ${ absolutePath }: ${ String(err) }`, absolutePath, code));
		}

		if (stats.isDirectory()) {
			return success({
				absolutePath,
				segments,
				urlPath: encodeUrlPath(segments, true),
				kind: 'directory',
				size: stats.size,
			});
		}
		if (!stats.isFile()) {
			return failure(new NotFoundError(`${ absolutePath } is neither a file nor a directory`, absolutePath));
		}
		if (trailingSlash) {
			return failure(new NotFoundError(`${ absolutePath } is not a directory`, absolutePath));
		}
		return success({
			absolutePath,
			segments,
			urlPath: encodeUrlPath(segments, false),
			kind: 'file',
			size: stats.size,
		});
	}
}
