import { type Logger } from './Logger';
import { NULL_LOGGER } from './NullLogger';

/**
 * Builds the error thrown by {@link fail}. Defaults to a plain `Error`.
 */
export type ErrorFactory = (message: string) => Error;

const plainError: ErrorFactory = (message) => new Error(message);

/**
 * Log at ERROR and throw. Always throws.
 *
 * @param message - Error message to log and throw.
 * @param logger - Logger to use, defaults to NULL_LOGGER.
 * @param context - Optional structured context for the log.
 * @param makeError - Builds the thrown error from the message.
 * @throws {Error} Always throws the error built by `makeError`.
 */
export function fail(
	message: string,
	logger: Logger = NULL_LOGGER,
	context?: Record<string, unknown>,
	makeError: ErrorFactory = plainError,
): never {
	logger.error(message, context);
	throw makeError(message);
}
