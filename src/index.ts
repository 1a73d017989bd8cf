// ==========================
// Public API Surface
// ==========================

// Codec
export { decode, encode, Lnurl } from './lnurl';
export {
	decodeLnurl,
	encodeLnurl,
	isLnurl,
	LNURL_HRP,
	LIGHTNING_SCHEME,
	type CodecOptions,
} from './utils/bech32';

// Responses
export {
	LnurlResponse,
	LnurlErrorResponse,
	LnurlSuccessResponse,
	LnurlAuthResponse,
	LnurlChannelResponse,
	LnurlHostedChannelResponse,
	LnurlPayResponse,
	LnurlPayActionResponse,
	LnurlWithdrawResponse,
	type ParseOptions,
} from './model/LnurlResponse';
export {
	LnurlResponseModel,
	type LnurlResponseKind,
	type AliasTable,
	type FieldAlias,
} from './model/LnurlResponseModel';
export type {
	LnurlPaySuccessAction,
	MessageSuccessAction,
	UrlSuccessAction,
	AesSuccessAction,
	UnknownSuccessAction,
} from './model/SuccessAction';

// Value objects
export { HttpsUrl } from './model/HttpsUrl';
export { MilliSatoshi, type MilliSatoshiLike } from './model/MilliSatoshi';
export { LightningInvoice } from './model/LightningInvoice';
export { LightningNodeUri } from './model/LightningNodeUri';
export { LnurlPayMetadata, type MetadataEntry } from './model/LnurlPayMetadata';

// Logging & errors
export { type LogLevel, ConsoleLogger, type Logger, NULL_LOGGER } from './logger';
export {
	LnurlCodecError,
	InvalidBech32Error,
	InvalidPrefixError,
	InvalidLnurlError,
	InvalidUrlError,
	ValidationError,
	LnurlResponseError,
	type LnurlResponseErrorReason,
} from './model/Errors';
