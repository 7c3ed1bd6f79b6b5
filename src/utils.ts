import { STATUS_CODES } from 'node:http';
import { stat, open, readdir } from 'node:fs/promises';

import type { FileSystem, ResponseHeaders } from './types';

/**
 * File system backed by "node:fs/promises"
 */
export const nodeFileSystem: FileSystem = { stat, open, readdir };

const HTML_ESCAPES: Readonly<Record<string, string>> = {
	'&': '&amp;',
	'<': '&lt;',
	'>': '&gt;',
	'"': '&quot;',
	'\'': '&#39;',
};

/**
 * Escape HTML special characters
 *
 * @param value - the text to escape
 * @returns the escaped text
 */
export function escapeHTML(value: string) {
	return value.replace(/[&<>"']/gu, char => HTML_ESCAPES[char] ?? char);
}

/**
 * Percent-encode decoded path segments into an url path
 *
 * @param segments - decoded segments relative to root
 * @param trailingSlash - append a trailing slash
 * @returns the url path, always starting with '/'
 */
export function encodeUrlPath(segments: readonly string[], trailingSlash: boolean) {
	if (segments.length === 0) {
		return '/';
	}
	return `/${ segments.map(encodeURIComponent).join('/') }${ trailingSlash ? '/' : '' }`;
}

/**
 * Copy a pattern without the global and sticky flags, whose `lastIndex` would carry over between `test` calls
 *
 * @param pattern - the pattern (or false)
 * @returns the pattern itself when it has neither flag
 */
export function statelessPattern(pattern: RegExp | false) {
	if (!pattern || !(pattern.global || pattern.sticky)) {
		return pattern;
	}
	return new RegExp(pattern.source, pattern.flags.replace(/[gy]/gu, ''));
}

/**
 * Get the reason phrase of a status code
 *
 * @param statusCode - status code
 * @returns reason phrase
 */
export function statusMessage(statusCode: number) {
	return STATUS_CODES[statusCode] ?? 'Unknown';
}

/**
 * Serialize the status line and headers of a response
 *
 * @param statusCode - status code
 * @param headers - response headers (undefined values are skipped)
 * @returns the response head, terminated by an empty line
 */
export function serializeResponseHead(statusCode: number, headers: ResponseHeaders) {
	let head = `HTTP/1.1 ${ statusCode } ${ statusMessage(statusCode) }\r\n`;
	for (const [name, value] of Object.entries(headers)) {
		if (value === undefined) {
			continue;
		}
		head += `${ name }: ${ value }\r\n`;
	}
	return Buffer.from(`${ head }\r\n`, 'latin1');
}
