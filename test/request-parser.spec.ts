/* eslint-env node, mocha */

import { deepStrictEqual, ok, strictEqual } from 'node:assert';

import {
	MalformedRequestError,
	RequestTimeoutError,
	RequestTooLargeError,
	TransportError,
	parseRequestHead,
	readRequestHead,
} from '../src/pool-file-server';

import { socketPair } from './utils';

describe('request parser', () => {
	describe('parseRequestHead()', () => {
		it('should parse method, target, version and headers', () => {
			const result = parseRequestHead(Buffer.from(
				'GET /docs/a.txt?x=1 HTTP/1.1\r\nHost: localhost\r\nAccept: text/plain\r\naccept: text/html\r\n\r\n',
			));
			deepStrictEqual(result, {
				ok: true,
				value: {
					method: 'GET',
					target: '/docs/a.txt?x=1',
					version: '1.1',
					headers: { host: 'localhost', accept: 'text/plain, text/html' },
				},
			});
		});

		it('should accept other methods structurally', () => {
			const result = parseRequestHead(Buffer.from('PROPFIND / HTTP/1.0\r\n\r\n'));
			ok(result.ok);
			strictEqual(result.value.method, 'PROPFIND');
		});

		for (const [title, head] of [
			['missing version', 'GET /a.txt\r\n\r\n'],
			['extra space', 'GET  /a.txt HTTP/1.1\r\n\r\n'],
			['lowercase protocol', 'GET /a.txt http/1.1\r\n\r\n'],
			['invalid method', 'G(T /a.txt HTTP/1.1\r\n\r\n'],
			['empty request line', '\r\n\r\n'],
			['header without colon', 'GET / HTTP/1.1\r\nHost\r\n\r\n'],
			['header with space in name', 'GET / HTTP/1.1\r\nBad Name: x\r\n\r\n'],
		]) {
			it(`should reject ${ title }`, () => {
				const result = parseRequestHead(Buffer.from(head));
				strictEqual(result.ok, false);
				ok(!result.ok && result.error instanceof MalformedRequestError);
				strictEqual(!result.ok && result.error.statusCode, 400);
			});
		}
	});

	describe('readRequestHead()', () => {
		const opts = { maxHeaderBytes: 64, timeoutMs: 200 };
		let pair: Awaited<ReturnType<typeof socketPair>>;

		beforeEach(async () => {
			pair = await socketPair();
		});
		afterEach(async () => {
			await pair.close();
		});

		it('should read a head split over several writes', async () => {
			const reading = readRequestHead(pair.server, opts);
			pair.client.write('GET / HTTP/1.0\r\nHost: a\r');
			setTimeout(() => {
				pair.client.write('\n\r\nbody bytes');
			}, 20);
			const result = await reading;
			ok(result.ok);
			strictEqual(result.value.toString(), 'GET / HTTP/1.0\r\nHost: a\r\n\r\n');
			strictEqual(pair.server.listenerCount('data'), 0);
			strictEqual(pair.server.isPaused(), true);
		});

		it('should fail when the head exceeds the byte budget', async () => {
			const reading = readRequestHead(pair.server, opts);
			pair.client.write(`GET / HTTP/1.0\r\nX-Long: ${ 'a'.repeat(80) }`);
			const result = await reading;
			ok(!result.ok && result.error instanceof RequestTooLargeError);
		});

		it('should fail after the timeout', async () => {
			const reading = readRequestHead(pair.server, { ...opts, timeoutMs: 50 });
			pair.client.write('GET / HTTP/1.0\r\n');
			const result = await reading;
			ok(!result.ok && result.error instanceof RequestTimeoutError);
			strictEqual(!result.ok && result.error.statusCode, 408);
		});

		it('should fail as malformed when the peer ends in the middle of the head', async () => {
			const reading = readRequestHead(pair.server, opts);
			pair.client.end('GET / HTTP/1.0\r\n');
			const result = await reading;
			ok(!result.ok && result.error instanceof MalformedRequestError);
		});

		it('should fail as transport error when the peer ends without sending anything', async () => {
			const reading = readRequestHead(pair.server, opts);
			pair.client.end();
			const result = await reading;
			ok(!result.ok && result.error instanceof TransportError);
		});

		it('should fail at once on a destroyed socket', async () => {
			pair.server.destroy();
			const started = Date.now();
			const result = await readRequestHead(pair.server, { maxHeaderBytes: 64, timeoutMs: 10_000 });
			ok(!result.ok && result.error instanceof TransportError);
			ok(Date.now() - started < 1000);
		});
	});
});
