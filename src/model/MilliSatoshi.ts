import { ValidationError } from './Errors';

export type MilliSatoshiLike = number | string | MilliSatoshi;

/**
 * Immutable, non-negative integer amount denominated in thousandths of a satoshi.
 *
 * @example
 *
 *     MilliSatoshi.from(21000); // number
 *     MilliSatoshi.from('21000'); // decimal string
 *     MilliSatoshi.fromSats(21).value; // 21000
 */
export class MilliSatoshi {
	readonly value: number;

	private constructor(value: number) {
		this.value = value;
		Object.freeze(this);
	}

	/**
	 * Parse/normalize supported inputs into a MilliSatoshi.
	 *
	 * @param field - Wire name reported when validation fails.
	 */
	static from(input: unknown, field = 'amount'): MilliSatoshi {
		if (input instanceof MilliSatoshi) return input;

		if (typeof input === 'number') {
			if (!Number.isInteger(input)) {
				throw new ValidationError(field, `must be an integer, got ${input}`);
			}
			if (input < 0) {
				throw new ValidationError(field, `must be >= 0, got ${input}`);
			}
			if (!Number.isSafeInteger(input)) {
				throw new ValidationError(field, `unsafe integer ${input}`);
			}
			return new MilliSatoshi(input);
		}

		if (typeof input === 'string') {
			// Decimal-only canonical form
			if (!/^(0|[1-9]\d*)$/.test(input)) {
				throw new ValidationError(field, `"${input}" is not a non-negative decimal integer`);
			}
			return MilliSatoshi.from(Number(input), field);
		}

		throw new ValidationError(field, 'must be a number');
	}

	static fromSats(sats: number): MilliSatoshi {
		return MilliSatoshi.from(sats * 1000, 'sats');
	}

	static isValid(input: unknown): input is MilliSatoshiLike {
		try {
			MilliSatoshi.from(input);
			return true;
		} catch {
			return false;
		}
	}

	/**
	 * Whole satoshis, rounded down.
	 */
	toSats(): number {
		return Math.floor(this.value / 1000);
	}

	/**
	 * Whole satoshis, rounded up.
	 */
	toSatsCeil(): number {
		return Math.ceil(this.value / 1000);
	}

	lessThan(other: MilliSatoshi): boolean {
		return this.value < other.value;
	}

	toString(): string {
		return this.value.toString(10);
	}

	toJSON(): number {
		return this.value;
	}
}
