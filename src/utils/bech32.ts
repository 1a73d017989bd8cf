import { bech32 } from '@scure/base';
import { utf8ToBytes } from '@noble/hashes/utils';
import { fail, type Logger, NULL_LOGGER } from '../logger';
import {
	InvalidBech32Error,
	InvalidLnurlError,
	InvalidPrefixError,
	InvalidUrlError,
} from '../model/Errors';
import { MAX_URL_LENGTH } from '../model/HttpsUrl';

type Bech32String = `${string}1${string}`;

export const LNURL_HRP = 'lnurl';
export const LIGHTNING_SCHEME = 'lightning:';

/**
 * BIP-173 caps addresses at 90 characters, LNURLs are longer. The default decode ceiling fits the
 * longest URL {@link HttpsUrl} accepts, at up to 3 UTF-8 bytes per UTF-16 code unit.
 */
const LIMIT_LENGTH = LNURL_HRP.length + 1 + Math.ceil((MAX_URL_LENGTH * 3 * 8) / 5) + 6;

export type CodecOptions = {
	logger?: Logger;
	/** Length ceiling handed to the bech32 decoder; `false` lifts it. Encoding has none. */
	limitLength?: number | false;
};

const LONE_SURROGATE = /[\uD800-\uDBFF](?![\uDC00-\uDFFF])|(?<![\uD800-\uDBFF])[\uDC00-\uDFFF]/;

function isBech32Format(str: string): str is Bech32String {
	const separatorIndex = str.lastIndexOf('1');
	return separatorIndex >= 1 && separatorIndex < str.length - 1;
}

/**
 * Decodes a bech32 string into its prefix and 8-bit payload.
 *
 * @throws {InvalidBech32Error} on a bad checksum, charset, separator, mixed case or length.
 * @throws {InvalidLnurlError} when the 5-bit words do not regroup into whole bytes.
 */
export function decodeBech32(
	encoded: string,
	{ logger = NULL_LOGGER, limitLength = LIMIT_LENGTH }: CodecOptions = {},
): { hrp: string; data: Uint8Array } {
	if (!isBech32Format(encoded)) {
		const detail = 'missing or misplaced separator';
		return fail(`Invalid bech32 string: ${detail}`, logger, { encoded }, () => {
			return new InvalidBech32Error(encoded, detail);
		});
	}
	let prefix: string;
	let words: number[];
	try {
		({ prefix, words } = bech32.decode(encoded, limitLength));
	} catch (e) {
		const detail = e instanceof Error ? e.message : String(e);
		return fail(`Invalid bech32 string: ${detail}`, logger, { encoded }, () => {
			return new InvalidBech32Error(encoded, detail);
		});
	}
	const data = bech32.fromWordsUnsafe(words);
	if (!data) {
		return fail('Invalid LNURL.', logger, { encoded }, () => new InvalidLnurlError(encoded));
	}
	return { hrp: prefix, data };
}

/**
 * Decodes an LNURL into the URL it carries, without validating that URL.
 *
 * A leading `lightning:` scheme is stripped first. Use `decode` from the package root to obtain a
 * validated {@link HttpsUrl} instead.
 *
 * @param lnurl - Bech32 LNURL, upper or lower case, optionally `lightning:` prefixed.
 * @returns The URL string.
 */
export function decodeLnurl(lnurl: string, options: CodecOptions = {}): string {
	const logger = options.logger ?? NULL_LOGGER;
	const bare = lnurl.startsWith(LIGHTNING_SCHEME) ? lnurl.slice(LIGHTNING_SCHEME.length) : lnurl;
	const { hrp, data } = decodeBech32(bare, options);
	if (hrp !== LNURL_HRP) {
		return fail(`Invalid Human Readable Prefix (HRP): ${hrp}.`, logger, { hrp }, () => {
			return new InvalidPrefixError(lnurl, hrp);
		});
	}
	try {
		return new TextDecoder('utf-8', { fatal: true }).decode(data);
	} catch (e) {
		return fail('Invalid LNURL.', logger, { lnurl, error: e }, () => new InvalidLnurlError(lnurl));
	}
}

/**
 * Encodes a URL into an uppercase LNURL, without validating that URL.
 *
 * @param url - Any string that can be UTF-8 encoded.
 * @returns `LNURL1…`
 */
export function encodeLnurl(url: string, options: CodecOptions = {}): string {
	const logger = options.logger ?? NULL_LOGGER;
	if (LONE_SURROGATE.test(url)) {
		return fail('Invalid URL.', logger, { url }, () => new InvalidUrlError(url));
	}
	const words = bech32.toWords(utf8ToBytes(url));
	let encoded: string;
	try {
		encoded = bech32.encode(LNURL_HRP, words, false);
	} catch (e) {
		return fail('Invalid URL.', logger, { url, error: e }, () => new InvalidUrlError(url));
	}
	return encoded.toUpperCase();
}

/**
 * Checks if a string is a well-formed LNURL.
 */
export function isLnurl(str: string, limitLength: number | false = LIMIT_LENGTH): boolean {
	try {
		decodeLnurl(str, { limitLength });
		return true;
	} catch {
		return false;
	}
}
