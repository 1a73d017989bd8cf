import { bytesToHex, utf8ToBytes } from '@noble/hashes/utils';
import { sha256 } from '@noble/hashes/sha2';
import { ValidationError } from './Errors';

export type MetadataEntry = readonly [type: string, content: string];

export const IMAGE_TYPES = ['image/png;base64', 'image/jpeg;base64'] as const;

function isEntry(value: unknown): value is [string, string] {
	return (
		Array.isArray(value) &&
		value.length >= 2 &&
		typeof value[0] === 'string' &&
		typeof value[1] === 'string'
	);
}

/**
 * The `metadata` string of an LNURL-pay response: a JSON array of `[type, content]` pairs.
 *
 * The string is kept verbatim, since wallets commit to its SHA-256 as the invoice description hash.
 */
export class LnurlPayMetadata {
	readonly raw: string;
	private readonly _entries: readonly MetadataEntry[];

	private constructor(raw: string, entries: readonly MetadataEntry[]) {
		this.raw = raw;
		this._entries = entries;
		Object.freeze(this);
	}

	static from(input: unknown, field = 'metadata'): LnurlPayMetadata {
		if (input instanceof LnurlPayMetadata) return input;
		if (typeof input !== 'string') {
			throw new ValidationError(field, 'must be a string');
		}
		let parsed: unknown;
		try {
			parsed = JSON.parse(input);
		} catch {
			throw new ValidationError(field, 'is not valid JSON');
		}
		if (!Array.isArray(parsed)) {
			throw new ValidationError(field, 'must be a JSON array');
		}
		const entries = parsed.filter(isEntry).map(([type, content]): MetadataEntry => [type, content]);
		if (!entries.some(([type]) => type === 'text/plain')) {
			throw new ValidationError(field, 'must contain a `text/plain` entry');
		}
		return new LnurlPayMetadata(input, Object.freeze(entries));
	}

	/** Short description shown to the payer. */
	get text(): string {
		return this.first('text/plain') ?? '';
	}

	get longDescription(): string | undefined {
		return this.first('text/long-desc');
	}

	/** Internet identifier (`text/identifier` or `text/email`) of the payee, if any. */
	get identifier(): string | undefined {
		return this.first('text/identifier') ?? this.first('text/email');
	}

	get images(): MetadataEntry[] {
		return this._entries.filter(([type]) => IMAGE_TYPES.some((t) => t === type));
	}

	/** SHA-256 hex digest of the UTF-8 metadata string. */
	get hash(): string {
		return bytesToHex(sha256(utf8ToBytes(this.raw)));
	}

	entries(): MetadataEntry[] {
		return [...this._entries];
	}

	private first(type: string): string | undefined {
		return this._entries.find(([t]) => t === type)?.[1];
	}

	toString(): string {
		return this.raw;
	}

	toJSON(): string {
		return this.raw;
	}
}
