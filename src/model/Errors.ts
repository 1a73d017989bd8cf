/** Base class of every failure raised while encoding or decoding an LNURL string. */
export class LnurlCodecError extends Error {
	/** The offending input. */
	value: string;
	constructor(message: string, value: string) {
		super(message);
		this.value = value;
		this.name = 'LnurlCodecError';
		Object.setPrototypeOf(this, LnurlCodecError.prototype);
	}
}

/** This error is thrown when a string is not valid bech32 (checksum, charset, case or length). */
export class InvalidBech32Error extends LnurlCodecError {
	constructor(value: string, detail?: string) {
		super(detail ? `Invalid bech32 string: ${detail}` : 'Invalid bech32 string.', value);
		this.name = 'InvalidBech32Error';
		Object.setPrototypeOf(this, InvalidBech32Error.prototype);
	}
}

/** This error is thrown when a bech32 string carries a human-readable prefix other than `lnurl`. */
export class InvalidPrefixError extends LnurlCodecError {
	prefix: string;
	constructor(value: string, prefix: string) {
		super(`Invalid Human Readable Prefix (HRP): ${prefix}.`, value);
		this.prefix = prefix;
		this.name = 'InvalidPrefixError';
		Object.setPrototypeOf(this, InvalidPrefixError.prototype);
	}
}

/** This error is thrown when the decoded payload is not a UTF-8 byte sequence. */
export class InvalidLnurlError extends LnurlCodecError {
	constructor(value: string) {
		super('Invalid LNURL.', value);
		this.name = 'InvalidLnurlError';
		Object.setPrototypeOf(this, InvalidLnurlError.prototype);
	}
}

/** This error is thrown when a URL cannot be UTF-8 encoded. */
export class InvalidUrlError extends LnurlCodecError {
	constructor(value: string) {
		super('Invalid URL.', value);
		this.name = 'InvalidUrlError';
		Object.setPrototypeOf(this, InvalidUrlError.prototype);
	}
}

/** This error is thrown when a field does not satisfy the contract of its type. */
export class ValidationError extends Error {
	/** Wire name of the offending field. */
	field: string;
	reason: string;
	constructor(field: string, reason: string) {
		super(`${field}: ${reason}`);
		this.field = field;
		this.reason = reason;
		this.name = 'ValidationError';
		Object.setPrototypeOf(this, ValidationError.prototype);
	}
}

export type LnurlResponseErrorReason = 'unknown-tag' | 'invalid-field' | 'malformed-payload';

/**
 * This error is thrown when a payload cannot be classified as an LNURL response.
 *
 * Every failure inside classification surfaces as this one class. `reason` tells an unknown tag
 * apart from a field that failed validation, and `cause` keeps the underlying error.
 */
export class LnurlResponseError extends Error {
	reason: LnurlResponseErrorReason;
	payload: unknown;
	constructor(reason: LnurlResponseErrorReason, payload: unknown, cause?: unknown) {
		super(`Invalid LNURL response (${reason}).`, { cause });
		this.reason = reason;
		this.payload = payload;
		this.name = 'LnurlResponseError';
		Object.setPrototypeOf(this, LnurlResponseError.prototype);
	}
}
