import { describe, test, expect } from 'vitest';
import { MilliSatoshi } from '../../src/model/MilliSatoshi';
import { ValidationError } from '../../src/model/Errors';

describe('MilliSatoshi', () => {
	test('accepts non-negative integers and decimal strings', () => {
		expect(MilliSatoshi.from(0).value).toBe(0);
		expect(MilliSatoshi.from(21000).value).toBe(21000);
		expect(MilliSatoshi.from('21000').value).toBe(21000);
	});

	test('returns the same instance', () => {
		const amount = MilliSatoshi.from(5);
		expect(MilliSatoshi.from(amount)).toBe(amount);
	});

	test('rejects negative, fractional, unsafe and non-numeric input', () => {
		expect(() => MilliSatoshi.from(-1)).toThrow(ValidationError);
		expect(() => MilliSatoshi.from(1.5)).toThrow(ValidationError);
		expect(() => MilliSatoshi.from(Number.MAX_SAFE_INTEGER + 1)).toThrow(ValidationError);
		expect(() => MilliSatoshi.from('01')).toThrow(ValidationError);
		expect(() => MilliSatoshi.from('-5')).toThrow(ValidationError);
		expect(() => MilliSatoshi.from(null)).toThrow(ValidationError);
		expect(MilliSatoshi.isValid(true)).toBe(false);
		expect(MilliSatoshi.isValid('1000')).toBe(true);
	});

	test('reports the field name', () => {
		try {
			MilliSatoshi.from(-1, 'minSendable');
			expect.unreachable();
		} catch (e) {
			expect(e).toBeInstanceOf(ValidationError);
			if (!(e instanceof ValidationError)) throw e;
			expect(e.field).toBe('minSendable');
			expect(e.message).toBe('minSendable: must be >= 0, got -1');
		}
	});

	test('converts to satoshis', () => {
		expect(MilliSatoshi.from(1500).toSatsCeil()).toBe(2);
		expect(MilliSatoshi.from(1500).toSats()).toBe(1);
		expect(MilliSatoshi.from(2999).toSats()).toBe(2);
		expect(MilliSatoshi.from(3000).toSatsCeil()).toBe(3);
		expect(MilliSatoshi.fromSats(21).value).toBe(21000);
	});

	test('serializes as a JSON number', () => {
		expect(JSON.stringify({ amount: MilliSatoshi.from(5) })).toBe('{"amount":5}');
		expect(String(MilliSatoshi.from(1234))).toBe('1234');
	});
});
