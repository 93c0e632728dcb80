/**
 * OAuth2 Authorization Code + PKCE
 *
 * - beginLogin: fresh S256 challenge/verifier pair and anti-forgery state,
 *   packed into a single-use AuthorizationState
 * - completeLogin: exchanges code + verifier for a bearer token, exactly once
 *
 * No retries: the provider rejects replayed codes, so a failed exchange is
 * final for the run.
 */

import { createHash, randomBytes, timingSafeEqual } from 'node:crypto'

import {
	AuthIntegrityError,
	TokenExchangeError,
	describeError,
} from '#utils/errors'
import { createLogger } from '#utils/logger'
import { RedactedSecret } from '#utils/redacted'

import {
	OAuthErrorResponseSchema,
	TokenResponseSchema,
} from '../schema/twitter.js'

const logger = createLogger('auth:credential-exchange')

export const AUTHORIZE_URL = 'https://twitter.com/i/oauth2/authorize'
export const TOKEN_URL = 'https://api.twitter.com/2/oauth2/token'

/** Read tweets, read users, read likes */
export const DEFAULT_SCOPES = ['tweet.read', 'users.read', 'like.read'] as const

export function callbackRedirectUri(port: number): string {
	return `http://localhost:${port}/oauth2/callback`
}

export type PkcePair = {
	verifier: string
	challenge: string
}

/** RFC 7636 S256: 32 random bytes give a 43-character verifier */
export function createPkcePair(): PkcePair {
	const verifier = randomBytes(32).toString('base64url')
	const challenge = createHash('sha256').update(verifier).digest('base64url')
	return { verifier, challenge }
}

export function createCsrfToken(): string {
	return randomBytes(24).toString('base64url')
}

/**
 * Everything one login attempt needs to remember between building the
 * authorization URL and exchanging the code. The verifier can be taken once.
 */
export class AuthorizationState {
	private verifier: string | undefined

	constructor(
		readonly authorizationUrl: string,
		readonly csrfToken: string,
		pkceVerifier: string,
		/** Sent again with the code; the provider compares the two */
		readonly redirectUri: string,
	) {
		this.verifier = pkceVerifier
	}

	get consumed(): boolean {
		return this.verifier === undefined
	}

	/** Constant-time comparison against the `state` the provider echoed back */
	matchesState(returnedState: string): boolean {
		const expected = Buffer.from(this.csrfToken)
		const actual = Buffer.from(returnedState)
		return expected.length === actual.length && timingSafeEqual(expected, actual)
	}

	takeVerifier(): string {
		const verifier = this.verifier
		if (verifier === undefined) {
			throw new AuthIntegrityError(
				'PKCE verifier already used; start a new login attempt',
			)
		}
		this.verifier = undefined
		return verifier
	}
}

export type OAuth2PkceClientConfig = {
	clientId: string
	/** Confidential clients authenticate to the token endpoint with HTTP Basic */
	clientSecret?: RedactedSecret
	redirectUri: string
	scopes?: readonly string[]
	authorizeUrl?: string
	tokenUrl?: string
	fetch?: typeof fetch
}

export class OAuth2PkceClient {
	private readonly config: Required<
		Omit<OAuth2PkceClientConfig, 'clientSecret'>
	> & { clientSecret?: RedactedSecret }

	constructor(config: OAuth2PkceClientConfig) {
		this.config = {
			clientId: config.clientId,
			clientSecret: config.clientSecret,
			redirectUri: config.redirectUri,
			scopes: config.scopes ?? DEFAULT_SCOPES,
			authorizeUrl: config.authorizeUrl ?? AUTHORIZE_URL,
			tokenUrl: config.tokenUrl ?? TOKEN_URL,
			fetch: config.fetch ?? fetch,
		}
	}

	/**
	 * @param redirectUri overrides the configured one, e.g. once an
	 * ephemeral listener knows its port
	 */
	beginLogin(redirectUri = this.config.redirectUri): AuthorizationState {
		const { verifier, challenge } = createPkcePair()
		const csrfToken = createCsrfToken()

		const url = new URL(this.config.authorizeUrl)
		url.searchParams.set('response_type', 'code')
		url.searchParams.set('client_id', this.config.clientId)
		url.searchParams.set('redirect_uri', redirectUri)
		url.searchParams.set('scope', this.config.scopes.join(' '))
		url.searchParams.set('state', csrfToken)
		url.searchParams.set('code_challenge', challenge)
		url.searchParams.set('code_challenge_method', 'S256')

		logger.debug('Built authorization URL', {
			scopes: this.config.scopes,
			redirectUri,
		})
		return new AuthorizationState(url.toString(), csrfToken, verifier, redirectUri)
	}

	async completeLogin(
		code: string,
		verifier: string,
		redirectUri = this.config.redirectUri,
	): Promise<RedactedSecret> {
		const body = new URLSearchParams({
			code,
			grant_type: 'authorization_code',
			client_id: this.config.clientId,
			redirect_uri: redirectUri,
			code_verifier: verifier,
		})
		const headers: Record<string, string> = {
			'Content-Type': 'application/x-www-form-urlencoded',
			Accept: 'application/json',
		}
		if (this.config.clientSecret) {
			const basic = Buffer.from(
				`${this.config.clientId}:${this.config.clientSecret.reveal()}`,
			).toString('base64')
			headers.Authorization = `Basic ${basic}`
		}

		let response: Response
		try {
			response = await this.config.fetch(this.config.tokenUrl, {
				method: 'POST',
				headers,
				body,
			})
		} catch (error) {
			throw new TokenExchangeError(
				`Could not reach the token endpoint: ${describeError(error)}`,
				{ cause: error },
			)
		}

		let text: string
		try {
			text = await response.text()
		} catch (error) {
			throw new TokenExchangeError('Token endpoint response was cut off', {
				cause: error,
				status: response.status,
			})
		}
		const json = parseJson(text)

		if (!response.ok) {
			const problem = OAuthErrorResponseSchema.safeParse(json)
			const detail = problem.success
				? [problem.data.error, problem.data.error_description]
						.filter(Boolean)
						.join(': ')
				: text.slice(0, 200)
			logger.warn('Token exchange rejected', { status: response.status })
			throw new TokenExchangeError(
				`Token endpoint rejected the authorization code (${response.status})${detail ? `: ${detail}` : ''}`,
				{
					status: response.status,
					errorCode: problem.success ? problem.data.error : undefined,
				},
			)
		}

		const token = TokenResponseSchema.safeParse(json)
		if (!token.success) {
			throw new TokenExchangeError(
				'Token endpoint returned a response without an access token',
				{ status: response.status, cause: token.error },
			)
		}

		logger.info('Obtained access token', {
			tokenType: token.data.token_type,
			scope: token.data.scope,
			expiresIn: token.data.expires_in,
		})
		return new RedactedSecret(token.data.access_token)
	}
}

function parseJson(text: string): unknown {
	try {
		return JSON.parse(text)
	} catch {
		return undefined
	}
}
