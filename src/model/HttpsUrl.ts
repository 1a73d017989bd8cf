import { ValidationError } from './Errors';

export const MAX_URL_LENGTH = 2047;

/**
 * A URL that uses the `https` scheme. Hidden services (`*.onion`) may use plain `http`, since the
 * onion transport already authenticates and encrypts.
 */
export class HttpsUrl {
	readonly href: string;
	readonly protocol: 'https:' | 'http:';
	readonly host: string;
	readonly hostname: string;
	readonly pathname: string;
	/** First value of each query parameter. */
	readonly queryParams: Readonly<Record<string, string>>;

	private constructor(href: string, url: URL, protocol: 'https:' | 'http:') {
		this.href = href;
		this.protocol = protocol;
		this.host = url.host;
		this.hostname = url.hostname;
		this.pathname = url.pathname;
		const params: Record<string, string> = {};
		for (const [key, value] of url.searchParams) {
			if (!(key in params)) params[key] = value;
		}
		this.queryParams = Object.freeze(params);
		Object.freeze(this);
	}

	/**
	 * @param field - Wire name reported when validation fails.
	 * @throws {ValidationError} When the value is not an absolute https (or onion http) URL.
	 */
	static from(input: unknown, field = 'url'): HttpsUrl {
		if (input instanceof HttpsUrl) return input;
		if (typeof input !== 'string') {
			throw new ValidationError(field, 'must be a string');
		}
		if (input.length === 0 || input.length > MAX_URL_LENGTH) {
			throw new ValidationError(field, `length must be between 1 and ${MAX_URL_LENGTH}`);
		}
		let url: URL;
		try {
			url = new URL(input);
		} catch {
			throw new ValidationError(field, `"${input}" is not a valid URL`);
		}
		if (!url.hostname) {
			throw new ValidationError(field, 'host is required');
		}
		if (url.protocol === 'https:') {
			return new HttpsUrl(input, url, 'https:');
		}
		if (url.protocol === 'http:' && url.hostname.endsWith('.onion')) {
			return new HttpsUrl(input, url, 'http:');
		}
		throw new ValidationError(field, 'must use https (http is allowed for .onion hosts only)');
	}

	static isValid(input: unknown): boolean {
		try {
			HttpsUrl.from(input);
			return true;
		} catch {
			return false;
		}
	}

	get isOnion(): boolean {
		return this.hostname.endsWith('.onion');
	}

	toString(): string {
		return this.href;
	}

	toJSON(): string {
		return this.href;
	}
}
