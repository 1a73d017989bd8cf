import { describe, test, expect } from 'vitest';
import { parseSuccessAction, successActionToJSON } from '../../src/model/SuccessAction';
import { ValidationError } from '../../src/model/Errors';

const IV = 'AAAAAAAAAAAAAAAAAAAAAA==';

describe('parseSuccessAction', () => {
	test('parses a message action', () => {
		const action = parseSuccessAction({ tag: 'message', message: 'Thanks!' });
		expect(action).toEqual({ tag: 'message', message: 'Thanks!' });
		expect(Object.isFrozen(action)).toBe(true);
	});

	test('parses a url action', () => {
		const action = parseSuccessAction({
			tag: 'url',
			description: 'Your receipt',
			url: 'https://example.com/receipt/1',
		});
		expect(action.tag).toBe('url');
		expect(successActionToJSON(action)).toEqual({
			tag: 'url',
			description: 'Your receipt',
			url: 'https://example.com/receipt/1',
		});
	});

	test('parses an aes action', () => {
		const raw = { tag: 'aes', description: 'Code', ciphertext: 'c2VjcmV0IGNvZGU=', iv: IV };
		expect(successActionToJSON(parseSuccessAction(raw))).toEqual(raw);
	});

	test('enforces lengths and formats', () => {
		expect(() => parseSuccessAction({ tag: 'message', message: 'x'.repeat(145) })).toThrow(
			'successAction.message: must be at most 144 characters',
		);
		expect(() =>
			parseSuccessAction({ tag: 'url', description: 'd', url: 'http://example.com' }),
		).toThrow(ValidationError);
		expect(() =>
			parseSuccessAction({ tag: 'aes', description: 'd', ciphertext: 'c2VjcmV0', iv: 'AAAA' }),
		).toThrow('successAction.iv: must be 24 characters');
		expect(() =>
			parseSuccessAction({ tag: 'aes', description: 'd', ciphertext: 'not base64!', iv: IV }),
		).toThrow('successAction.ciphertext: must be base64');
	});

	test('passes unknown tags through', () => {
		const raw = { tag: 'confetti', colors: ['red', 'gold'] };
		const action = parseSuccessAction(raw);
		expect(action).toEqual({ tag: 'unknown', raw });
		expect(Object.isFrozen(action)).toBe(true);
		expect(successActionToJSON(action)).toEqual(raw);
	});

	test('passes actions without a tag through', () => {
		expect(parseSuccessAction({ note: 1 })).toEqual({ tag: 'unknown', raw: { note: 1 } });
	});

	test('rejects non-objects', () => {
		expect(() => parseSuccessAction('message')).toThrow('successAction: must be an object');
		expect(() => parseSuccessAction([])).toThrow(ValidationError);
	});
});
