/**
 * Browser login flow
 *
 * listen for the redirect → beginLogin → verify state → exchange the code.
 * The authorization URL is built only once the listener is bound, so its
 * redirect_uri names the port actually in use (port 0 picks one) and a fast
 * redirect can never arrive before anyone is listening.
 */

import type { AddressInfo } from 'node:net'

import {
	AuthIntegrityError,
	AuthorizationDeniedError,
} from '#utils/errors'
import { createLogger } from '#utils/logger'
import type { RedactedSecret } from '#utils/redacted'

import { catchCallback } from './callback-server.js'
import {
	type AuthorizationState,
	type OAuth2PkceClient,
	callbackRedirectUri,
} from './credential-exchange.js'

const logger = createLogger('auth:login')

export type LoginOptions = {
	client: OAuth2PkceClient
	port: number
	host?: string
	callbackTimeoutMs?: number
	signal?: AbortSignal
	/** Show or open the URL; called once the callback listener is ready */
	onAuthorizationUrl: (url: string, address: AddressInfo) => void
}

export async function login(options: LoginOptions): Promise<RedactedSecret> {
	const attempt: { authorization?: AuthorizationState } = {}

	const outcome = await catchCallback({
		port: options.port,
		host: options.host,
		timeoutMs: options.callbackTimeoutMs,
		signal: options.signal,
		onListening: (address) => {
			const authorization = options.client.beginLogin(
				callbackRedirectUri(address.port),
			)
			attempt.authorization = authorization
			options.onAuthorizationUrl(authorization.authorizationUrl, address)
		},
	})

	if (outcome.kind === 'malformed') {
		throw new AuthorizationDeniedError(
			`Received an invalid OAuth2 redirect: ${outcome.reason}`,
			undefined,
		)
	}
	if (outcome.kind === 'provider-error') {
		throw new AuthorizationDeniedError(
			`Authorization was refused by the provider: ${outcome.errorCode}${outcome.description ? ` (${outcome.description})` : ''}`,
			outcome.errorCode,
			outcome.description,
			outcome.uri,
		)
	}

	const { authorization } = attempt
	if (!authorization) {
		throw new AuthIntegrityError(
			'OAuth2 callback arrived before the login attempt started',
		)
	}
	if (!authorization.matchesState(outcome.state)) {
		logger.error('OAuth2 state mismatch; refusing to exchange the code')
		throw new AuthIntegrityError(
			'OAuth2 state returned by the provider does not match this login attempt',
		)
	}

	logger.debug('Callback verified, exchanging authorization code')
	return await options.client.completeLogin(
		outcome.code,
		authorization.takeVerifier(),
		authorization.redirectUri,
	)
}
