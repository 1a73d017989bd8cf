import { bech32 } from '@scure/base';
import { ValidationError } from './Errors';
import { MilliSatoshi } from './MilliSatoshi';

// BOLT-11 invoices carry long tagged fields, so the bech32 address limit does not apply.
const LIMIT_LENGTH = 7089;
// 35-bit timestamp + 520-bit signature and recovery id, both in 5-bit words
const MIN_DATA_WORDS = 7 + 104;
const HRP = /^ln(bcrt|bc|tbs|tb|sbs|sb)(?:(\d+)([munp])?)?$/;

const MSAT_PER_UNIT: Record<'m' | 'u' | 'n', bigint> = {
	m: 100_000_000n,
	u: 100_000n,
	n: 100n,
};
const MSAT_PER_BTC = 100_000_000_000n;

function parseAmount(digits: string, multiplier: string | undefined, field: string): MilliSatoshi {
	const value = BigInt(digits);
	let msat: bigint;
	if (multiplier === undefined) {
		msat = value * MSAT_PER_BTC;
	} else if (multiplier === 'p') {
		if (value % 10n !== 0n) {
			throw new ValidationError(field, 'pico-bitcoin amount must be a multiple of 10');
		}
		msat = value / 10n;
	} else if (multiplier === 'm' || multiplier === 'u' || multiplier === 'n') {
		msat = value * MSAT_PER_UNIT[multiplier];
	} else {
		throw new ValidationError(field, `unknown amount multiplier "${multiplier}"`);
	}
	if (msat > BigInt(Number.MAX_SAFE_INTEGER)) {
		throw new ValidationError(field, 'amount is too large');
	}
	return MilliSatoshi.from(Number(msat), field);
}

/**
 * A BOLT-11 payment request. Only the encoding is checked: bech32 checksum, currency prefix,
 * amount and minimal data length. The signature is not verified.
 */
export class LightningInvoice {
	readonly bech32: string;
	/** `bc`, `tb`, `bcrt`, `sb`, `tbs` or `sbs`. */
	readonly currency: string;
	/** Amount encoded in the prefix, when the invoice is not open-amount. */
	readonly amount?: MilliSatoshi;

	private constructor(encoded: string, currency: string, amount?: MilliSatoshi) {
		this.bech32 = encoded;
		this.currency = currency;
		this.amount = amount;
		Object.freeze(this);
	}

	static from(input: unknown, field = 'pr'): LightningInvoice {
		if (input instanceof LightningInvoice) return input;
		if (typeof input !== 'string') {
			throw new ValidationError(field, 'must be a string');
		}
		const decoded = bech32.decodeUnsafe(input, LIMIT_LENGTH);
		if (!decoded) {
			throw new ValidationError(field, 'is not a valid bech32 string');
		}
		const match = HRP.exec(decoded.prefix);
		if (!match) {
			throw new ValidationError(field, `unknown invoice prefix "${decoded.prefix}"`);
		}
		if (decoded.words.length < MIN_DATA_WORDS) {
			throw new ValidationError(field, 'data part is too short');
		}
		const [, currency, digits, multiplier] = match;
		const amount = digits === undefined ? undefined : parseAmount(digits, multiplier, field);
		return new LightningInvoice(input, currency, amount);
	}

	static isValid(input: unknown): boolean {
		try {
			LightningInvoice.from(input);
			return true;
		} catch {
			return false;
		}
	}

	toString(): string {
		return this.bech32;
	}

	toJSON(): string {
		return this.bech32;
	}
}
