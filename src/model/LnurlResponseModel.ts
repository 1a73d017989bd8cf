import { ValidationError } from './Errors';

export type LnurlResponseKind =
	| 'error'
	| 'success'
	| 'login'
	| 'channelRequest'
	| 'hostedChannelRequest'
	| 'payRequest'
	| 'payAction'
	| 'withdrawRequest';

/**
 * One row of a variant's alias table: property name, protocol (wire) name, and the legacy
 * snake_case name that is still accepted on input.
 */
export type FieldAlias<P extends string> = readonly [property: P, wire: string, legacy?: string];

export type AliasTable<P extends string> = ReadonlyArray<FieldAlias<P>>;

/**
 * Reads the raw value of a property from a payload through an alias table. The wire name wins over
 * the legacy name when both are present.
 */
export function aliasReader<P extends string>(
	payload: Record<string, unknown>,
	table: AliasTable<P>,
): (property: P) => unknown {
	return (property) => {
		const row = table.find(([p]) => p === property);
		if (!row) return undefined;
		const [, wire, legacy] = row;
		if (payload[wire] !== undefined) return payload[wire];
		return legacy === undefined ? undefined : payload[legacy];
	};
}

/**
 * Serializes property values under their wire names, in table order. Absent optional values are
 * left out.
 */
export function writeAliased<P extends string>(
	values: Readonly<Record<P, unknown>>,
	table: AliasTable<P>,
): Record<string, unknown> {
	const out: Record<string, unknown> = {};
	for (const [property, wire] of table) {
		const value = values[property];
		if (value !== undefined) out[wire] = value;
	}
	return out;
}

export function toRecord(payload: unknown): Record<string, unknown> {
	if (typeof payload !== 'object' || payload === null || Array.isArray(payload)) {
		throw new ValidationError('payload', 'must be a JSON object');
	}
	return { ...payload };
}

export function requireString(value: unknown, field: string): string {
	if (typeof value !== 'string') {
		throw new ValidationError(field, 'must be a string');
	}
	return value;
}

export function requireCount(value: unknown, field: string): number {
	if (typeof value !== 'number' || !Number.isSafeInteger(value) || value < 0) {
		throw new ValidationError(field, 'must be a non-negative integer');
	}
	return value;
}

export function optional<T>(value: unknown, parse: (value: unknown) => T): T | undefined {
	return value === undefined || value === null ? undefined : parse(value);
}

/**
 * Checks a discriminator: when present, it must hold the expected literal.
 */
export function expectLiteral(value: unknown, expected: string, field: string): void {
	if (value !== undefined && value !== expected) {
		throw new ValidationError(field, `must be "${expected}", got ${JSON.stringify(value)}`);
	}
}

/**
 * Contract shared by every LNURL response variant.
 *
 * Instances are immutable and valid by construction; `toJSON()` renders them with protocol field
 * names whatever their property names.
 */
export abstract class LnurlResponseModel<P extends string = string> {
	abstract readonly kind: LnurlResponseKind;

	protected abstract readonly aliases: AliasTable<P>;

	/** `{ status }` or `{ tag }`, rendered ahead of the fields. */
	protected abstract discriminator(): Record<string, string>;

	/** Property values in their JSON form. */
	protected abstract values(): Readonly<Record<P, unknown>>;

	/** `false` only for an error response. */
	get ok(): boolean {
		return true;
	}

	toJSON(): Record<string, unknown> {
		return { ...this.discriminator(), ...writeAliased(this.values(), this.aliases) };
	}

	json(): string {
		return JSON.stringify(this.toJSON());
	}
}
