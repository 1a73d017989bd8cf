import { fail, type Logger, NULL_LOGGER } from '../logger';
import { LnurlResponseError, ValidationError } from './Errors';
import { HttpsUrl } from './HttpsUrl';
import { LightningInvoice } from './LightningInvoice';
import { LightningNodeUri } from './LightningNodeUri';
import { LnurlPayMetadata } from './LnurlPayMetadata';
import {
	type AliasTable,
	aliasReader,
	expectLiteral,
	LnurlResponseModel,
	optional,
	requireCount,
	requireString,
	toRecord,
} from './LnurlResponseModel';
import { MilliSatoshi } from './MilliSatoshi';
import {
	type LnurlPaySuccessAction,
	parseSuccessAction,
	successActionToJSON,
} from './SuccessAction';

export type ParseOptions = {
	logger?: Logger;
};

function assertBounds(min: MilliSatoshi, max: MilliSatoshi, minField: string, maxField: string) {
	if (max.lessThan(min)) {
		throw new ValidationError(maxField, `\`${maxField}\` cannot be less than \`${minField}\`.`);
	}
}

// -----------------------------------------------------------------
// Section: Error / Success
// -----------------------------------------------------------------

type ErrorProps = 'reason';
const ERROR_ALIASES: AliasTable<ErrorProps> = [['reason', 'reason']];

export class LnurlErrorResponse extends LnurlResponseModel<ErrorProps> {
	readonly kind = 'error';
	readonly status = 'ERROR';
	readonly reason: string;
	protected readonly aliases = ERROR_ALIASES;

	private constructor(reason: string) {
		super();
		this.reason = reason;
		Object.freeze(this);
	}

	static from(payload: unknown): LnurlErrorResponse {
		const d = toRecord(payload);
		expectLiteral(d.status, 'ERROR', 'status');
		const read = aliasReader(d, ERROR_ALIASES);
		return new LnurlErrorResponse(requireString(read('reason'), 'reason'));
	}

	override get ok(): boolean {
		return false;
	}

	get errorMessage(): string {
		return this.reason;
	}

	protected discriminator() {
		return { status: this.status };
	}

	protected values() {
		return { reason: this.reason };
	}
}

export class LnurlSuccessResponse extends LnurlResponseModel<never> {
	readonly kind = 'success';
	readonly status = 'OK';
	protected readonly aliases: AliasTable<never> = [];

	private constructor() {
		super();
		Object.freeze(this);
	}

	static from(payload: unknown = {}): LnurlSuccessResponse {
		const d = toRecord(payload);
		expectLiteral(d.status, 'OK', 'status');
		return new LnurlSuccessResponse();
	}

	protected discriminator() {
		return { status: this.status };
	}

	protected values() {
		return {};
	}
}

// -----------------------------------------------------------------
// Section: Auth / Channel
// -----------------------------------------------------------------

type AuthProps = 'callback' | 'k1';
const AUTH_ALIASES: AliasTable<AuthProps> = [
	['callback', 'callback'],
	['k1', 'k1'],
];

/**
 * LNURL-auth request. It is not served as JSON: the callback URL itself carries `tag=login` and the
 * `k1` challenge, see {@link LnurlAuthResponse.fromUrl}.
 */
export class LnurlAuthResponse extends LnurlResponseModel<AuthProps> {
	readonly kind = 'login';
	readonly tag = 'login';
	readonly callback: HttpsUrl;
	readonly k1: string;
	protected readonly aliases = AUTH_ALIASES;

	private constructor(callback: HttpsUrl, k1: string) {
		super();
		this.callback = callback;
		this.k1 = k1;
		Object.freeze(this);
	}

	static from(payload: unknown): LnurlAuthResponse {
		const d = toRecord(payload);
		expectLiteral(d.tag, 'login', 'tag');
		const read = aliasReader(d, AUTH_ALIASES);
		return new LnurlAuthResponse(
			HttpsUrl.from(read('callback'), 'callback'),
			requireString(read('k1'), 'k1'),
		);
	}

	/**
	 * Builds the request from a decoded `tag=login` URL.
	 */
	static fromUrl(url: HttpsUrl | string): LnurlAuthResponse {
		const callback = HttpsUrl.from(url, 'callback');
		expectLiteral(callback.queryParams.tag ?? '', 'login', 'tag');
		return new LnurlAuthResponse(callback, requireString(callback.queryParams.k1, 'k1'));
	}

	protected discriminator() {
		return { tag: this.tag };
	}

	protected values() {
		return { callback: this.callback.toJSON(), k1: this.k1 };
	}
}

type ChannelProps = 'uri' | 'callback' | 'k1';
const CHANNEL_ALIASES: AliasTable<ChannelProps> = [
	['uri', 'uri'],
	['callback', 'callback'],
	['k1', 'k1'],
];

export class LnurlChannelResponse extends LnurlResponseModel<ChannelProps> {
	readonly kind = 'channelRequest';
	readonly tag = 'channelRequest';
	readonly uri: LightningNodeUri;
	readonly callback: HttpsUrl;
	readonly k1: string;
	protected readonly aliases = CHANNEL_ALIASES;

	private constructor(uri: LightningNodeUri, callback: HttpsUrl, k1: string) {
		super();
		this.uri = uri;
		this.callback = callback;
		this.k1 = k1;
		Object.freeze(this);
	}

	static from(payload: unknown): LnurlChannelResponse {
		const d = toRecord(payload);
		expectLiteral(d.tag, 'channelRequest', 'tag');
		const read = aliasReader(d, CHANNEL_ALIASES);
		return new LnurlChannelResponse(
			LightningNodeUri.from(read('uri'), 'uri'),
			HttpsUrl.from(read('callback'), 'callback'),
			requireString(read('k1'), 'k1'),
		);
	}

	protected discriminator() {
		return { tag: this.tag };
	}

	protected values() {
		return { uri: this.uri.toJSON(), callback: this.callback.toJSON(), k1: this.k1 };
	}
}

type HostedChannelProps = 'uri' | 'k1' | 'alias';
const HOSTED_CHANNEL_ALIASES: AliasTable<HostedChannelProps> = [
	['uri', 'uri'],
	['k1', 'k1'],
	['alias', 'alias'],
];

export class LnurlHostedChannelResponse extends LnurlResponseModel<HostedChannelProps> {
	readonly kind = 'hostedChannelRequest';
	readonly tag = 'hostedChannelRequest';
	readonly uri: LightningNodeUri;
	readonly k1: string;
	readonly alias?: string;
	protected readonly aliases = HOSTED_CHANNEL_ALIASES;

	private constructor(uri: LightningNodeUri, k1: string, alias?: string) {
		super();
		this.uri = uri;
		this.k1 = k1;
		this.alias = alias;
		Object.freeze(this);
	}

	static from(payload: unknown): LnurlHostedChannelResponse {
		const d = toRecord(payload);
		expectLiteral(d.tag, 'hostedChannelRequest', 'tag');
		const read = aliasReader(d, HOSTED_CHANNEL_ALIASES);
		return new LnurlHostedChannelResponse(
			LightningNodeUri.from(read('uri'), 'uri'),
			requireString(read('k1'), 'k1'),
			optional(read('alias'), (v) => requireString(v, 'alias')),
		);
	}

	protected discriminator() {
		return { tag: this.tag };
	}

	protected values() {
		return { uri: this.uri.toJSON(), k1: this.k1, alias: this.alias };
	}
}

// -----------------------------------------------------------------
// Section: Pay
// -----------------------------------------------------------------

type PayProps = 'callback' | 'minSendable' | 'maxSendable' | 'metadata' | 'commentAllowed';
const PAY_ALIASES: AliasTable<PayProps> = [
	['callback', 'callback'],
	['minSendable', 'minSendable', 'min_sendable'],
	['maxSendable', 'maxSendable', 'max_sendable'],
	['metadata', 'metadata'],
	['commentAllowed', 'commentAllowed', 'comment_allowed'],
];

export class LnurlPayResponse extends LnurlResponseModel<PayProps> {
	readonly kind = 'payRequest';
	readonly tag = 'payRequest';
	readonly callback: HttpsUrl;
	readonly minSendable: MilliSatoshi;
	readonly maxSendable: MilliSatoshi;
	readonly metadata: LnurlPayMetadata;
	/** Longest comment the service accepts (LUD-12). */
	readonly commentAllowed?: number;
	protected readonly aliases = PAY_ALIASES;

	private constructor(
		callback: HttpsUrl,
		minSendable: MilliSatoshi,
		maxSendable: MilliSatoshi,
		metadata: LnurlPayMetadata,
		commentAllowed?: number,
	) {
		super();
		this.callback = callback;
		this.minSendable = minSendable;
		this.maxSendable = maxSendable;
		this.metadata = metadata;
		this.commentAllowed = commentAllowed;
		Object.freeze(this);
	}

	static from(payload: unknown): LnurlPayResponse {
		const d = toRecord(payload);
		expectLiteral(d.tag, 'payRequest', 'tag');
		const read = aliasReader(d, PAY_ALIASES);
		const callback = HttpsUrl.from(read('callback'), 'callback');
		const min = MilliSatoshi.from(read('minSendable'), 'minSendable');
		const max = MilliSatoshi.from(read('maxSendable'), 'maxSendable');
		assertBounds(min, max, 'minSendable', 'maxSendable');
		const metadata = LnurlPayMetadata.from(read('metadata'), 'metadata');
		const commentAllowed = optional(read('commentAllowed'), (v) => {
			return requireCount(v, 'commentAllowed');
		});
		return new LnurlPayResponse(callback, min, max, metadata, commentAllowed);
	}

	/** SHA-256 hex digest of `metadata`, the description hash the invoice must commit to. */
	get h(): string {
		return this.metadata.hash;
	}

	get contentHash(): string {
		return this.h;
	}

	get minSats(): number {
		return this.minSendable.toSatsCeil();
	}

	get maxSats(): number {
		return this.maxSendable.toSats();
	}

	protected discriminator() {
		return { tag: this.tag };
	}

	protected values() {
		return {
			callback: this.callback.toJSON(),
			minSendable: this.minSendable.toJSON(),
			maxSendable: this.maxSendable.toJSON(),
			metadata: this.metadata.toJSON(),
			commentAllowed: this.commentAllowed,
		};
	}
}

type PayActionProps = 'pr' | 'successAction' | 'routes';
const PAY_ACTION_ALIASES: AliasTable<PayActionProps> = [
	['pr', 'pr'],
	['successAction', 'successAction', 'success_action'],
	['routes', 'routes'],
];

function parseRoutes(value: unknown): readonly unknown[] {
	if (value === undefined || value === null) return Object.freeze([]);
	if (!Array.isArray(value)) {
		throw new ValidationError('routes', 'must be an array');
	}
	value.forEach((route, i) => {
		if (typeof route !== 'object' || route === null) {
			throw new ValidationError(`routes[${i}]`, 'must be an object or an array');
		}
	});
	return Object.freeze([...value]);
}

/**
 * Answer of an LNURL-pay callback: the invoice to pay and what to show once it is paid.
 */
export class LnurlPayActionResponse extends LnurlResponseModel<PayActionProps> {
	readonly kind = 'payAction';
	readonly pr: LightningInvoice;
	readonly successAction?: LnurlPaySuccessAction;
	readonly routes: readonly unknown[];
	protected readonly aliases = PAY_ACTION_ALIASES;

	private constructor(
		pr: LightningInvoice,
		routes: readonly unknown[],
		successAction?: LnurlPaySuccessAction,
	) {
		super();
		this.pr = pr;
		this.routes = routes;
		this.successAction = successAction;
		Object.freeze(this);
	}

	static from(payload: unknown): LnurlPayActionResponse {
		const d = toRecord(payload);
		const read = aliasReader(d, PAY_ACTION_ALIASES);
		return new LnurlPayActionResponse(
			LightningInvoice.from(read('pr'), 'pr'),
			parseRoutes(read('routes')),
			optional(read('successAction'), (v) => parseSuccessAction(v)),
		);
	}

	protected discriminator() {
		return {};
	}

	protected values() {
		return {
			pr: this.pr.toJSON(),
			successAction: this.successAction && successActionToJSON(this.successAction),
			routes: [...this.routes],
		};
	}
}

// -----------------------------------------------------------------
// Section: Withdraw
// -----------------------------------------------------------------

type WithdrawProps =
	| 'callback'
	| 'k1'
	| 'minWithdrawable'
	| 'maxWithdrawable'
	| 'defaultDescription'
	| 'balanceCheck'
	| 'payLink';
const WITHDRAW_ALIASES: AliasTable<WithdrawProps> = [
	['callback', 'callback'],
	['k1', 'k1'],
	['minWithdrawable', 'minWithdrawable', 'min_withdrawable'],
	['maxWithdrawable', 'maxWithdrawable', 'max_withdrawable'],
	['defaultDescription', 'defaultDescription', 'default_description'],
	['balanceCheck', 'balanceCheck', 'balance_check'],
	['payLink', 'payLink', 'pay_link'],
];

type WithdrawFields = {
	callback: HttpsUrl;
	k1: string;
	minWithdrawable: MilliSatoshi;
	maxWithdrawable: MilliSatoshi;
	defaultDescription: string;
	balanceCheck?: HttpsUrl;
	payLink?: string;
};

export class LnurlWithdrawResponse extends LnurlResponseModel<WithdrawProps> {
	readonly kind = 'withdrawRequest';
	readonly tag = 'withdrawRequest';
	readonly callback: HttpsUrl;
	readonly k1: string;
	readonly minWithdrawable: MilliSatoshi;
	readonly maxWithdrawable: MilliSatoshi;
	readonly defaultDescription: string;
	/** URL to query for a refreshed withdraw request (LUD-14). */
	readonly balanceCheck?: HttpsUrl;
	/** LNURL-pay link to top the balance back up (LUD-19). */
	readonly payLink?: string;
	protected readonly aliases = WITHDRAW_ALIASES;

	private constructor(fields: WithdrawFields) {
		super();
		this.callback = fields.callback;
		this.k1 = fields.k1;
		this.minWithdrawable = fields.minWithdrawable;
		this.maxWithdrawable = fields.maxWithdrawable;
		this.defaultDescription = fields.defaultDescription;
		this.balanceCheck = fields.balanceCheck;
		this.payLink = fields.payLink;
		Object.freeze(this);
	}

	static from(payload: unknown): LnurlWithdrawResponse {
		const d = toRecord(payload);
		expectLiteral(d.tag, 'withdrawRequest', 'tag');
		const read = aliasReader(d, WITHDRAW_ALIASES);
		const minWithdrawable = MilliSatoshi.from(read('minWithdrawable'), 'minWithdrawable');
		const maxWithdrawable = MilliSatoshi.from(read('maxWithdrawable'), 'maxWithdrawable');
		assertBounds(minWithdrawable, maxWithdrawable, 'minWithdrawable', 'maxWithdrawable');
		return new LnurlWithdrawResponse({
			callback: HttpsUrl.from(read('callback'), 'callback'),
			k1: requireString(read('k1'), 'k1'),
			minWithdrawable,
			maxWithdrawable,
			defaultDescription:
				optional(read('defaultDescription'), (v) => requireString(v, 'defaultDescription')) ?? '',
			balanceCheck: optional(read('balanceCheck'), (v) => HttpsUrl.from(v, 'balanceCheck')),
			payLink: optional(read('payLink'), (v) => requireString(v, 'payLink')),
		});
	}

	get minSats(): number {
		return this.minWithdrawable.toSatsCeil();
	}

	get maxSats(): number {
		return this.maxWithdrawable.toSats();
	}

	protected discriminator() {
		return { tag: this.tag };
	}

	protected values() {
		return {
			callback: this.callback.toJSON(),
			k1: this.k1,
			minWithdrawable: this.minWithdrawable.toJSON(),
			maxWithdrawable: this.maxWithdrawable.toJSON(),
			defaultDescription: this.defaultDescription,
			balanceCheck: this.balanceCheck?.toJSON(),
			payLink: this.payLink,
		};
	}
}

// -----------------------------------------------------------------
// Section: Classification
// -----------------------------------------------------------------

export type LnurlResponse =
	| LnurlErrorResponse
	| LnurlSuccessResponse
	| LnurlAuthResponse
	| LnurlChannelResponse
	| LnurlHostedChannelResponse
	| LnurlPayResponse
	| LnurlPayActionResponse
	| LnurlWithdrawResponse;

type Build = (payload: unknown) => LnurlResponse;

const TAGGED_RESPONSES: ReadonlyMap<string, Build> = new Map<string, Build>([
	['channelRequest', (d: unknown) => LnurlChannelResponse.from(d)],
	['hostedChannelRequest', (d: unknown) => LnurlHostedChannelResponse.from(d)],
	['payRequest', (d: unknown) => LnurlPayResponse.from(d)],
	['withdrawRequest', (d: unknown) => LnurlWithdrawResponse.from(d)],
]);

function classify(d: Record<string, unknown>): LnurlResponse {
	if (typeof d.status === 'string' && d.status.toUpperCase() === 'ERROR') {
		// some services answer with a lowercase status
		return LnurlErrorResponse.from({ ...d, status: 'ERROR' });
	}
	if ('tag' in d) {
		// some services send a `status` alongside the tag
		const tagged = { ...d };
		delete tagged.status;
		const build = typeof tagged.tag === 'string' ? TAGGED_RESPONSES.get(tagged.tag) : undefined;
		if (!build) {
			throw new LnurlResponseError('unknown-tag', d);
		}
		return build(tagged);
	}
	if ('successAction' in d || 'success_action' in d) {
		return LnurlPayActionResponse.from(d);
	}
	return LnurlSuccessResponse.from(d);
}

function reject(error: LnurlResponseError, logger: Logger): never {
	const context: Record<string, unknown> = { reason: error.reason };
	if (error.cause instanceof ValidationError) context.field = error.cause.field;
	return fail(error.message, logger, context, () => error);
}

/**
 * Classifies a JSON-decoded LNURL response into exactly one response variant.
 *
 * The first matching rule wins:
 *
 * 1. `status` is `ERROR` in any letter case: {@link LnurlErrorResponse}.
 * 2. A `tag` is present: the tagged variant (a stray `status` is dropped).
 * 3. A `successAction` key is present: {@link LnurlPayActionResponse}.
 * 4. Otherwise: {@link LnurlSuccessResponse}.
 *
 * The payload is not mutated.
 *
 * @throws {LnurlResponseError} For any failure; `reason` and `cause` tell what went wrong.
 */
function fromDict(payload: unknown, { logger = NULL_LOGGER }: ParseOptions = {}): LnurlResponse {
	if (typeof payload !== 'object' || payload === null || Array.isArray(payload)) {
		return reject(new LnurlResponseError('malformed-payload', payload), logger);
	}
	let response: LnurlResponse;
	try {
		response = classify({ ...payload });
	} catch (e) {
		const error =
			e instanceof LnurlResponseError ? e : new LnurlResponseError('invalid-field', payload, e);
		return reject(error, logger);
	}
	logger.debug('Classified LNURL response as {kind}', { kind: response.kind });
	return response;
}

export const LnurlResponse = {
	fromDict,
	/** Tags recognized by {@link LnurlResponse.fromDict}. */
	tags: Object.freeze([...TAGGED_RESPONSES.keys()]),
};
