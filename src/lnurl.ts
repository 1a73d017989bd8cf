import { NULL_LOGGER } from './logger';
import { HttpsUrl } from './model/HttpsUrl';
import { LnurlAuthResponse } from './model/LnurlResponse';
import { type CodecOptions, decodeLnurl, encodeLnurl } from './utils/bech32';

/**
 * Decodes an LNURL into a validated {@link HttpsUrl}.
 *
 * @throws {LnurlCodecError} When the string is not an LNURL.
 * @throws {ValidationError} When the embedded URL is not https (or onion http).
 */
export function decode(lnurl: string, options: CodecOptions = {}): HttpsUrl {
	const url = decodeLnurl(lnurl, options);
	try {
		return HttpsUrl.from(url);
	} catch (e) {
		(options.logger ?? NULL_LOGGER).error('LNURL does not embed an https URL', { url, error: e });
		throw e;
	}
}

/**
 * Validates a URL and encodes it as an {@link Lnurl}.
 */
export function encode(url: string | HttpsUrl, options: CodecOptions = {}): Lnurl {
	return Lnurl.fromUrl(url, options);
}

/**
 * An LNURL together with the https URL it embeds.
 */
export class Lnurl {
	/** Uppercase bech32 form, as rendered in QR codes. */
	readonly bech32: string;
	readonly url: HttpsUrl;

	private constructor(bech32: string, url: HttpsUrl) {
		this.bech32 = bech32;
		this.url = url;
		Object.freeze(this);
	}

	static from(lnurl: string, options: CodecOptions = {}): Lnurl {
		const url = decode(lnurl, options);
		return new Lnurl(encodeLnurl(url.href, options), url);
	}

	static fromUrl(url: string | HttpsUrl, options: CodecOptions = {}): Lnurl {
		const valid = HttpsUrl.from(url);
		return new Lnurl(encodeLnurl(valid.href, options), valid);
	}

	/** LNURL-auth links carry `tag=login` in their query string. */
	get isLogin(): boolean {
		return this.url.queryParams.tag === 'login';
	}

	/**
	 * The LNURL-auth request of a login link. Nothing is fetched.
	 */
	toAuthRequest(): LnurlAuthResponse {
		return LnurlAuthResponse.fromUrl(this.url);
	}

	toString(): string {
		return this.bech32;
	}

	toJSON(): string {
		return this.bech32;
	}
}
