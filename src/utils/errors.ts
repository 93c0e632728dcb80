/**
 * Error taxonomy
 *
 * Every failure the pipeline raises carries a stable `kind` and, where one
 * exists, the underlying `cause`, so the CLI can print the causal chain and
 * emit a structured error event without string matching.
 */

export type ErrorKind =
	| 'setup'
	| 'auth-integrity'
	| 'auth-denied'
	| 'callback-timeout'
	| 'token-exchange'
	| 'api-invariant'
	| 'transport'
	| 'local-io'
	| 'download-batch'

export abstract class MagpieError extends Error {
	abstract readonly kind: ErrorKind

	constructor(message: string, options?: { cause?: unknown }) {
		super(message, options)
		this.name = new.target.name
	}
}

/** Cannot bind the callback port, cannot create the output directory */
export class SetupError extends MagpieError {
	readonly kind = 'setup'
}

/** CSRF state mismatch, or an authorization state consumed twice */
export class AuthIntegrityError extends MagpieError {
	readonly kind = 'auth-integrity'
}

/** The provider redirected back with an error, or with an unreadable query */
export class AuthorizationDeniedError extends MagpieError {
	readonly kind = 'auth-denied'

	constructor(
		message: string,
		readonly errorCode: string | undefined,
		readonly description?: string,
		readonly uri?: string,
	) {
		super(message)
	}
}

export class CallbackTimeoutError extends MagpieError {
	readonly kind = 'callback-timeout'

	constructor(readonly timeoutMs: number) {
		super(`No OAuth2 callback received within ${timeoutMs}ms`)
	}
}

export class TokenExchangeError extends MagpieError {
	readonly kind = 'token-exchange'

	constructor(
		message: string,
		options?: { cause?: unknown; status?: number; errorCode?: string },
	) {
		super(message, options)
		this.status = options?.status
		this.errorCode = options?.errorCode
	}

	readonly status: number | undefined
	readonly errorCode: string | undefined
}

/** A field the request shape guarantees is missing: upstream contract drift */
export class ApiInvariantError extends MagpieError {
	readonly kind = 'api-invariant'
}

export class TransportError extends MagpieError {
	readonly kind = 'transport'

	constructor(
		message: string,
		options?: { cause?: unknown; status?: number; url?: string },
	) {
		super(message, options)
		this.status = options?.status
		this.url = options?.url
	}

	readonly status: number | undefined
	readonly url: string | undefined
}

export class LocalIOError extends MagpieError {
	readonly kind = 'local-io'

	constructor(
		message: string,
		readonly path: string,
		options?: { cause?: unknown },
	) {
		super(message, options)
	}
}

export class DownloadBatchError extends MagpieError {
	readonly kind = 'download-batch'

	constructor(
		readonly failures: ReadonlyArray<{ url: string; message: string }>,
		readonly attempted: number,
	) {
		super(`${failures.length} of ${attempted} downloads failed`)
	}
}

export function isMagpieError(error: unknown): error is MagpieError {
	return error instanceof MagpieError
}

/**
 * Messages along the `cause` chain, outermost first.
 *
 * @example
 * errorChain(new SetupError('Output directory', { cause: new Error('EEXIST') }))
 * // => ['Output directory', 'EEXIST']
 */
export function errorChain(error: unknown): string[] {
	const messages: string[] = []
	const seen = new Set<unknown>()
	let current: unknown = error
	while (current !== undefined && current !== null && !seen.has(current)) {
		seen.add(current)
		if (current instanceof Error) {
			messages.push(current.message)
			current = current.cause
		} else {
			messages.push(String(current))
			break
		}
	}
	return messages
}

export function describeError(error: unknown): string {
	return error instanceof Error ? error.message : String(error)
}
