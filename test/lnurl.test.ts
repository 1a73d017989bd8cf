import { describe, test, expect } from 'vitest';
import { decode, encode, Lnurl } from '../src/lnurl';
import { HttpsUrl } from '../src/model/HttpsUrl';
import { InvalidPrefixError, ValidationError } from '../src/model/Errors';
import { LnurlAuthResponse } from '../src/model/LnurlResponse';

const PAY_URL = 'https://example.com/pay';
const PAY_LNURL = 'LNURL1DP68GURN8GHJ7ETCV9KHQMR99E3K7MF0WPSHJFSW80U';
const HTTP_LNURL = 'LNURL1DP68GUP69UHK27RPD4CXCEFWVDHK6TMSV9USHV9N5V';
const ONION_URL = 'http://abcdefghij234567.onion/pay';
const ONION_LNURL = 'LNURL1DP68GUP69UHKZCNRV3JKVEMGD94RYVE5X5MRWTN0DE5K7M30WPSHJGNU09K';
const K1 = 'e2af6254a8df433264fa23f67eb8188635d15ce883e8fc020989d5f82ae6f11e';
const LOGIN_URL = `https://example.com/auth?tag=login&k1=${K1}&action=login`;
const LOGIN_LNURL =
	'LNURL1DP68GURN8GHJ7ETCV9KHQMR99E3K7MF0V96HG6PLW3SKW0TVDANKJM3XDVCN6EFJV9NRVV34X3SNSERXXSENXV3KX3NXZV3NVCMRWETZ8QCNSWPKXV6KGVF4VDJNSWPNV5UXVCESXGCRJWPEVS6KVWPJV9JNVE33X9JJVCTRW35K7M3AD3HKW6TWFLJDUE';

describe('decode', () => {
	test('returns a validated https URL', () => {
		const url = decode(PAY_LNURL);
		expect(url).toBeInstanceOf(HttpsUrl);
		expect(url.href).toBe(PAY_URL);
		expect(url.host).toBe('example.com');
	});

	test('rejects plain http', () => {
		expect(() => decode(HTTP_LNURL)).toThrow(ValidationError);
	});

	test('accepts plain http for onion hosts', () => {
		const url = decode(ONION_LNURL);
		expect(url.href).toBe(ONION_URL);
		expect(url.protocol).toBe('http:');
		expect(url.isOnion).toBe(true);
	});

	test('keeps codec errors', () => {
		expect(() => decode('bc1dp68gurn8ghj7etcv9khqmr99e3k7mf0wpshjztlvvf')).toThrow(
			InvalidPrefixError,
		);
	});
});

describe('encode', () => {
	test('validates then encodes', () => {
		const lnurl = encode(PAY_URL);
		expect(lnurl.bech32).toBe(PAY_LNURL);
		expect(lnurl.url.href).toBe(PAY_URL);
		expect(String(lnurl)).toBe(PAY_LNURL);
		expect(JSON.stringify({ lnurl })).toBe(`{"lnurl":"${PAY_LNURL}"}`);
	});

	test('refuses plain http', () => {
		expect(() => encode('http://example.com/pay')).toThrow(ValidationError);
	});

	test('round-trips the longest accepted URL', () => {
		const url = 'https://example.com/' + 'a'.repeat(2027);
		const lnurl = encode(url);
		expect(decode(lnurl.bech32).href).toBe(url);
		expect(Lnurl.from(lnurl.bech32).bech32).toBe(lnurl.bech32);
	});
});

describe('Lnurl', () => {
	test('normalizes to uppercase and drops the scheme', () => {
		const lnurl = Lnurl.from(`lightning:${PAY_LNURL.toLowerCase()}`);
		expect(lnurl.bech32).toBe(PAY_LNURL);
		expect(lnurl.url.href).toBe(PAY_URL);
		expect(lnurl.isLogin).toBe(false);
		expect(Object.isFrozen(lnurl)).toBe(true);
	});

	test('detects login links and builds their auth request', () => {
		const lnurl = Lnurl.from(LOGIN_LNURL);
		expect(lnurl.url.href).toBe(LOGIN_URL);
		expect(lnurl.isLogin).toBe(true);

		const auth = lnurl.toAuthRequest();
		expect(auth).toBeInstanceOf(LnurlAuthResponse);
		expect(auth.k1).toBe(K1);
		expect(auth.toJSON()).toEqual({ tag: 'login', callback: LOGIN_URL, k1: K1 });
	});

	test('builds from a validated URL', () => {
		const lnurl = Lnurl.fromUrl(PAY_URL);
		expect(lnurl.bech32).toBe(PAY_LNURL);
		expect(() => Lnurl.fromUrl('http://example.com/pay')).toThrow(ValidationError);
	});

	test('cannot build an auth request from a pay link', () => {
		expect(() => Lnurl.from(PAY_LNURL).toAuthRequest()).toThrow(ValidationError);
	});
});
