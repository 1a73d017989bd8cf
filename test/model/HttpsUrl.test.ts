import { describe, test, expect } from 'vitest';
import { HttpsUrl } from '../../src/model/HttpsUrl';
import { ValidationError } from '../../src/model/Errors';

describe('HttpsUrl', () => {
	test('accepts https URLs and keeps them verbatim', () => {
		const url = HttpsUrl.from('https://Example.com/cb?k1=abc&k1=def&tag=login');
		expect(url.href).toBe('https://Example.com/cb?k1=abc&k1=def&tag=login');
		expect(url.hostname).toBe('example.com');
		expect(url.pathname).toBe('/cb');
		expect(url.queryParams).toEqual({ k1: 'abc', tag: 'login' });
		expect(url.isOnion).toBe(false);
		expect(JSON.stringify(url)).toBe('"https://Example.com/cb?k1=abc&k1=def&tag=login"');
	});

	test('accepts http only for onion hosts', () => {
		expect(HttpsUrl.from('http://abcdefghij234567.onion/').protocol).toBe('http:');
		expect(() => HttpsUrl.from('http://example.com/')).toThrow(ValidationError);
	});

	test('rejects other schemes and garbage', () => {
		expect(() => HttpsUrl.from('ftp://example.com/')).toThrow(ValidationError);
		expect(() => HttpsUrl.from('not a url')).toThrow(ValidationError);
		expect(() => HttpsUrl.from('')).toThrow(ValidationError);
		expect(() => HttpsUrl.from(42)).toThrow(ValidationError);
		expect(HttpsUrl.isValid('https://example.com')).toBe(true);
		expect(HttpsUrl.isValid('mailto:alice@example.com')).toBe(false);
	});

	test('rejects URLs longer than 2047 characters', () => {
		const base = 'https://example.com/';
		expect(HttpsUrl.isValid(base + 'a'.repeat(2047 - base.length))).toBe(true);
		expect(HttpsUrl.isValid(base + 'a'.repeat(2048 - base.length))).toBe(false);
	});

	test('names the field in errors', () => {
		expect(() => HttpsUrl.from('http://example.com/', 'callback')).toThrow(
			'callback: must use https (http is allowed for .onion hosts only)',
		);
	});
});
