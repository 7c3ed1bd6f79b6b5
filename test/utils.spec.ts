/* eslint-env node, mocha */

import { strictEqual } from 'node:assert';

import {
	LOG_LEVELS,
	encodeUrlPath,
	escapeHTML,
	isLogLevel,
	serializeResponseHead,
	statelessPattern,
	statusMessage,
} from '../src/pool-file-server';

describe('utils', () => {
	describe('escapeHTML()', () => {
		it('should escape markup characters', () => {
			strictEqual(escapeHTML('<a href="x">\'&\'</a>'), '&lt;a href=&quot;x&quot;&gt;&#39;&amp;&#39;&lt;/a&gt;');
		});

		it('should keep other characters', () => {
			strictEqual(escapeHTML('plain é text'), 'plain é text');
		});
	});

	describe('encodeUrlPath()', () => {
		it('should map no segments to the root', () => {
			strictEqual(encodeUrlPath([], true), '/');
			strictEqual(encodeUrlPath([], false), '/');
		});

		it('should percent-encode each segment', () => {
			strictEqual(encodeUrlPath(['a b', 'c'], true), '/a%20b/c/');
			strictEqual(encodeUrlPath(['x?#'], false), '/x%3F%23');
		});
	});

	describe('statusMessage()', () => {
		it('should give the reason phrase', () => {
			strictEqual(statusMessage(200), 'OK');
			strictEqual(statusMessage(404), 'Not Found');
			strictEqual(statusMessage(413), 'Payload Too Large');
			strictEqual(statusMessage(599), 'Unknown');
		});
	});

	describe('serializeResponseHead()', () => {
		it('should write status line and defined headers', () => {
			const head = serializeResponseHead(200, {
				'Content-Type': 'text/plain',
				'Content-Length': '5',
				'X-Content-Type-Options': undefined,
				'Connection': 'close',
			});
			strictEqual(
				head.toString('latin1'),
				'HTTP/1.1 200 OK\r\nContent-Type: text/plain\r\nContent-Length: 5\r\nConnection: close\r\n\r\n',
			);
		});
	});

	describe('statelessPattern()', () => {
		it('should keep patterns without global or sticky flag', () => {
			const pattern = /^\./iu;
			strictEqual(statelessPattern(pattern), pattern);
			strictEqual(statelessPattern(false), false);
		});

		it('should drop the global and sticky flags', () => {
			const pattern = statelessPattern(/^\./giuy);
			strictEqual(pattern instanceof RegExp ? pattern.flags : '', 'iu');
			strictEqual(pattern instanceof RegExp && pattern.test('.a') && pattern.test('.a'), true);
		});
	});

	describe('isLogLevel()', () => {
		it('should accept the known levels only', () => {
			for (const level of LOG_LEVELS) {
				strictEqual(isLogLevel(level), true);
			}
			strictEqual(isLogLevel('trace'), false);
			strictEqual(isLogLevel('INFO'), false);
		});
	});
});
