/* eslint-env node, mocha */

import { deepStrictEqual, ok, strictEqual } from 'node:assert';
import { join } from 'node:path';

import {
	FileSystemError,
	MalformedRequestError,
	NotFoundError,
	PathResolver,
	TraversalError,
	nodeFileSystem,
	normalizeTarget,
} from '../src/pool-file-server';

import { fakeFileSystem, fixtures, systemError } from './utils';

describe('path resolver', () => {
	describe('normalizeTarget()', () => {
		it('should decode and normalize segments', () => {
			deepStrictEqual(normalizeTarget('/a/./b/../c%20d/'), {
				ok: true,
				value: { segments: ['a', 'c d'], trailingSlash: true },
			});
		});

		it('should map the root to no segments', () => {
			deepStrictEqual(normalizeTarget('/'), { ok: true, value: { segments: [], trailingSlash: true } });
		});

		it('should collapse consecutive slashes', () => {
			deepStrictEqual(normalizeTarget('//sub///b.txt'), {
				ok: true,
				value: { segments: ['sub', 'b.txt'], trailingSlash: false },
			});
		});

		it('should ignore query and fragment', () => {
			deepStrictEqual(normalizeTarget('/a?b=/../..#c'), {
				ok: true,
				value: { segments: ['a'], trailingSlash: false },
			});
		});

		it('should decode multi-byte characters', () => {
			deepStrictEqual(normalizeTarget('/%E2%82%AC.txt'), {
				ok: true,
				value: { segments: ['€.txt'], trailingSlash: false },
			});
		});

		it('should take the path of absolute-form targets', () => {
			deepStrictEqual(normalizeTarget('http://example.test:8123/sub/b.txt?x'), {
				ok: true,
				value: { segments: ['sub', 'b.txt'], trailingSlash: false },
			});
			deepStrictEqual(normalizeTarget('http://example.test'), {
				ok: true,
				value: { segments: [], trailingSlash: true },
			});
		});

		for (const target of ['a.txt', '*', '', '%2Fa.txt']) {
			it(`should reject '${ target }' as malformed`, () => {
				const result = normalizeTarget(target);
				ok(!result.ok && result.error instanceof MalformedRequestError);
			});
		}

		it('should reject invalid percent-encodings and null bytes', () => {
			for (const target of ['/%', '/%zz', '/%C3', '/a%00b']) {
				const result = normalizeTarget(target);
				ok(!result.ok && result.error instanceof MalformedRequestError, target);
			}
		});

		it('should reject targets escaping the root', () => {
			for (const target of ['/..', '/../a.txt', '/a/../../b', '/%2e%2e/x', '/a/..%2F..%2Fb', '/a%5Cb', '/a\\b']) {
				const result = normalizeTarget(target);
				ok(!result.ok && result.error instanceof TraversalError, target);
				strictEqual(!result.ok && result.error.statusCode, 403);
			}
		});

		it('should keep the raw target on traversal errors', () => {
			const result = normalizeTarget('/../etc/passwd');
			ok(!result.ok && result.error instanceof TraversalError);
			strictEqual(result.error.target, '/../etc/passwd');
		});
	});

	describe('PathResolver', () => {
		const resolver = new PathResolver(fixtures, { fileSystem: nodeFileSystem });

		it('should check containment on segment boundaries', () => {
			const other = new PathResolver('/srv/www', { fileSystem: nodeFileSystem });
			strictEqual(other.contains('/srv/www'), true);
			strictEqual(other.contains('/srv/www/a.txt'), true);
			strictEqual(other.contains('/srv/wwwx/a.txt'), false);
			strictEqual(other.contains('/srv'), false);
		});

		it('should resolve the root directory', async () => {
			const result = await resolver.resolve('/');
			ok(result.ok);
			strictEqual(result.value.kind, 'directory');
			strictEqual(result.value.absolutePath, fixtures);
			strictEqual(result.value.urlPath, '/');
			deepStrictEqual(result.value.segments, []);
		});

		it('should resolve a directory without trailing slash', async () => {
			const result = await resolver.resolve('/sub');
			ok(result.ok);
			strictEqual(result.value.kind, 'directory');
			strictEqual(result.value.urlPath, '/sub/');
			strictEqual(result.value.absolutePath, join(fixtures, 'sub'));
		});

		it('should resolve a file', async () => {
			const result = await resolver.resolve('/foo%20bar.txt');
			deepStrictEqual(result, {
				ok: true,
				value: {
					absolutePath: join(fixtures, 'foo bar.txt'),
					segments: ['foo bar.txt'],
					urlPath: '/foo%20bar.txt',
					kind: 'file',
					size: 3,
				},
			});
		});

		it('should not find missing entries', async () => {
			for (const target of ['/missing.txt', '/a.txt/', '/a.txt/child', '/sub/missing/']) {
				// eslint-disable-next-line no-await-in-loop
				const result = await resolver.resolve(target);
				ok(!result.ok && result.error instanceof NotFoundError, target);
			}
		});

		it('should not find ignored segments', async () => {
			const hiding = new PathResolver(fixtures, { fileSystem: nodeFileSystem, ignorePattern: /^\./u });
			for (const target of ['/.hidden', '/sub/../.hidden', '/.git/config']) {
				// eslint-disable-next-line no-await-in-loop
				const result = await hiding.resolve(target);
				ok(!result.ok && result.error instanceof NotFoundError, target);
			}
			const visible = await hiding.resolve('/a.txt');
			strictEqual(visible.ok, true);
		});

		it('should hide ignored segments on every call with a global pattern', async () => {
			const hiding = new PathResolver(fixtures, { fileSystem: nodeFileSystem, ignorePattern: /^\./gu });
			for (let i = 0; i < 3; i++) {
				// eslint-disable-next-line no-await-in-loop
				const result = await hiding.resolve('/.hidden');
				ok(!result.ok && result.error instanceof NotFoundError, `call ${ i }`);
			}
		});

		it('should report stat failures as filesystem errors', async () => {
			const failing = new PathResolver('/srv/www', {
				fileSystem: fakeFileSystem({
					stat: async () => {
						throw systemError('EACCES');
					},
				}),
			});
			const result = await failing.resolve('/secret.txt');
			ok(!result.ok && result.error instanceof FileSystemError);
			strictEqual(result.error.statusCode, 500);
			strictEqual(result.error.code, 'EACCES');
			strictEqual(result.error.path, '/srv/www/secret.txt');
		});

		it('should not find entries which are neither files nor directories', async () => {
			const special = new PathResolver('/srv/www', {
				fileSystem: fakeFileSystem({
					stat: async () => ({ size: 0, isFile: () => false, isDirectory: () => false }),
				}),
			});
			const result = await special.resolve('/fifo');
			ok(!result.ok && result.error instanceof NotFoundError);
		});

		it('should not touch the filesystem for rejected targets', async () => {
			let calls = 0;
			const counting = new PathResolver('/srv/www', {
				fileSystem: fakeFileSystem({
					stat: async () => {
						calls++;
						throw systemError('ENOENT');
					},
				}),
			});
			const result = await counting.resolve('/../etc/passwd');
			ok(!result.ok && result.error instanceof TraversalError);
			strictEqual(calls, 0);
		});
	});
});
