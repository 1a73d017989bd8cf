import { ValidationError } from './Errors';
import { HttpsUrl } from './HttpsUrl';

const MAX_TEXT_LENGTH = 144;
const MAX_CIPHERTEXT_LENGTH = 4096;
const IV_LENGTH = 24;
const BASE64 = /^[A-Za-z0-9+/]*={0,2}$/;

export type MessageSuccessAction = {
	readonly tag: 'message';
	readonly message: string;
};

export type UrlSuccessAction = {
	readonly tag: 'url';
	readonly description: string;
	readonly url: HttpsUrl;
};

/** Ciphertext is AES-256-CBC under the payment preimage; decrypting it is up to the wallet. */
export type AesSuccessAction = {
	readonly tag: 'aes';
	readonly description: string;
	readonly ciphertext: string;
	readonly iv: string;
};

/** A success action under a tag this library does not know, kept as sent. */
export type UnknownSuccessAction = {
	readonly tag: 'unknown';
	readonly raw: Readonly<Record<string, unknown>>;
};

/** Action a wallet performs once an LNURL-pay invoice is settled. */
export type LnurlPaySuccessAction =
	| MessageSuccessAction
	| UrlSuccessAction
	| AesSuccessAction
	| UnknownSuccessAction;

function boundedText(value: unknown, field: string, max: number): string {
	if (typeof value !== 'string') {
		throw new ValidationError(field, 'must be a string');
	}
	if (value.length > max) {
		throw new ValidationError(field, `must be at most ${max} characters`);
	}
	return value;
}

function base64(value: unknown, field: string, max: number): string {
	const text = boundedText(value, field, max);
	if (!BASE64.test(text) || text.length % 4 !== 0) {
		throw new ValidationError(field, 'must be base64');
	}
	return text;
}

/**
 * Validates a raw `successAction` object. Tags other than `message`, `url` and `aes` are passed
 * through as {@link UnknownSuccessAction}.
 *
 * @throws {ValidationError} When a known action breaks a length or format rule.
 */
export function parseSuccessAction(raw: unknown, field = 'successAction'): LnurlPaySuccessAction {
	if (typeof raw !== 'object' || raw === null || Array.isArray(raw)) {
		throw new ValidationError(field, 'must be an object');
	}
	const obj: Record<string, unknown> = { ...raw };
	switch (obj.tag) {
		case 'message':
			return Object.freeze({
				tag: 'message',
				message: boundedText(obj.message, `${field}.message`, MAX_TEXT_LENGTH),
			});
		case 'url':
			return Object.freeze({
				tag: 'url',
				description: boundedText(obj.description, `${field}.description`, MAX_TEXT_LENGTH),
				url: HttpsUrl.from(obj.url, `${field}.url`),
			});
		case 'aes': {
			const iv = base64(obj.iv, `${field}.iv`, IV_LENGTH);
			if (iv.length !== IV_LENGTH) {
				throw new ValidationError(`${field}.iv`, `must be ${IV_LENGTH} characters`);
			}
			return Object.freeze({
				tag: 'aes',
				description: boundedText(obj.description, `${field}.description`, MAX_TEXT_LENGTH),
				ciphertext: base64(obj.ciphertext, `${field}.ciphertext`, MAX_CIPHERTEXT_LENGTH),
				iv,
			});
		}
		default:
			return Object.freeze({ tag: 'unknown', raw: Object.freeze(obj) });
	}
}

export function successActionToJSON(action: LnurlPaySuccessAction): Record<string, unknown> {
	switch (action.tag) {
		case 'message':
			return { tag: action.tag, message: action.message };
		case 'url':
			return { tag: action.tag, description: action.description, url: action.url.toJSON() };
		case 'aes':
			return {
				tag: action.tag,
				description: action.description,
				ciphertext: action.ciphertext,
				iv: action.iv,
			};
		case 'unknown':
			return { ...action.raw };
	}
}
