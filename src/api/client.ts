/**
 * X/Twitter v2 API client
 *
 * Thin typed wrapper over the four endpoints the pipeline needs. Every
 * response body is validated with zod; a body that does not match is an
 * upstream contract change and surfaces as ApiInvariantError, while network
 * failures and non-2xx statuses surface as TransportError.
 */

import type { z } from 'zod'

import {
	ApiInvariantError,
	TransportError,
	describeError,
} from '#utils/errors'
import { createLogger } from '#utils/logger'
import type { RedactedSecret } from '#utils/redacted'

import {
	type ApiProblem,
	ApiProblemSchema,
	type LikedTweetsPage,
	LikedTweetsResponseSchema,
	type User,
	UserResponseSchema,
	toLikedTweetsPage,
} from '../schema/twitter.js'

const logger = createLogger('api:client')

export const DEFAULT_API_BASE_URL = 'https://api.twitter.com/2'

/** Fields requested for every liked-tweets page */
export const LIKED_TWEET_QUERY = {
	'tweet.fields': 'id,attachments,text,author_id,entities,created_at',
	expansions: 'attachments.media_keys',
	'media.fields': 'type,url',
} as const

export type RequestOptions = {
	signal?: AbortSignal
}

export type LikedTweetsOptions = RequestOptions & {
	paginationToken?: string
	/** 5–100, API default 100 */
	maxResults?: number
}

/**
 * The capability the feed walker and enricher consume.
 */
export interface LikesApi {
	getMe(options?: RequestOptions): Promise<User>
	getUser(id: string, options?: RequestOptions): Promise<User>
	getUserByUsername(username: string, options?: RequestOptions): Promise<User>
	getLikedTweets(
		userId: string,
		options?: LikedTweetsOptions,
	): Promise<LikedTweetsPage>
}

export type FetchLike = typeof fetch

export type TwitterApiClientConfig = {
	accessToken: RedactedSecret
	baseUrl?: string
	fetch?: FetchLike
}

export class TwitterApiClient implements LikesApi {
	private readonly accessToken: RedactedSecret
	private readonly baseUrl: string
	private readonly fetchImpl: FetchLike

	constructor(config: TwitterApiClientConfig) {
		this.accessToken = config.accessToken
		this.baseUrl = (config.baseUrl ?? DEFAULT_API_BASE_URL).replace(/\/+$/, '')
		this.fetchImpl = config.fetch ?? fetch
	}

	async getMe(options: RequestOptions = {}): Promise<User> {
		const body = await this.get(
			'/users/me',
			{ 'user.fields': 'username' },
			UserResponseSchema,
			options,
		)
		return requireUser(body, 'authenticated user')
	}

	async getUser(id: string, options: RequestOptions = {}): Promise<User> {
		const body = await this.get(
			`/users/${encodeURIComponent(id)}`,
			{ 'user.fields': 'username' },
			UserResponseSchema,
			options,
		)
		return requireUser(body, `user ${id}`)
	}

	async getUserByUsername(
		username: string,
		options: RequestOptions = {},
	): Promise<User> {
		const handle = username.replace(/^@/, '')
		const body = await this.get(
			`/users/by/username/${encodeURIComponent(handle)}`,
			{ 'user.fields': 'username' },
			UserResponseSchema,
			options,
		)
		return requireUser(body, `user @${handle}`)
	}

	async getLikedTweets(
		userId: string,
		options: LikedTweetsOptions = {},
	): Promise<LikedTweetsPage> {
		const query: Record<string, string> = { ...LIKED_TWEET_QUERY }
		if (options.maxResults !== undefined) {
			query.max_results = String(options.maxResults)
		}
		if (options.paginationToken !== undefined) {
			query.pagination_token = options.paginationToken
		}
		const body = await this.get(
			`/users/${encodeURIComponent(userId)}/liked_tweets`,
			query,
			LikedTweetsResponseSchema,
			options,
		)
		return toLikedTweetsPage(body)
	}

	private async get<T extends z.ZodTypeAny>(
		path: string,
		query: Record<string, string>,
		schema: T,
		options: RequestOptions,
	): Promise<z.infer<T>> {
		const url = new URL(`${this.baseUrl}${path}`)
		for (const [key, value] of Object.entries(query)) {
			url.searchParams.set(key, value)
		}
		const endpoint = `${url.origin}${url.pathname}`

		logger.debug('GET', { endpoint, query })

		let response: Response
		try {
			response = await this.fetchImpl(url, {
				method: 'GET',
				headers: {
					Authorization: `Bearer ${this.accessToken.reveal()}`,
					Accept: 'application/json',
				},
				signal: options.signal,
			})
		} catch (error) {
			throw new TransportError(`Request to ${endpoint} failed`, {
				cause: error,
				url: endpoint,
			})
		}

		if (!response.ok) {
			const detail = await readProblem(response)
			logger.warn('API request rejected', {
				endpoint,
				status: response.status,
				detail,
			})
			throw new TransportError(
				`${endpoint} responded ${response.status} ${response.statusText}${detail ? `: ${detail}` : ''}`,
				{ status: response.status, url: endpoint },
			)
		}

		let json: unknown
		try {
			json = await response.json()
		} catch (error) {
			throw new ApiInvariantError(`${endpoint} returned a non-JSON body`, {
				cause: error,
			})
		}

		const parsed = schema.safeParse(json)
		if (!parsed.success) {
			const issues = parsed.error.errors
				.map((issue) => `${issue.path.join('.') || '<root>'}: ${issue.message}`)
				.join('; ')
			throw new ApiInvariantError(
				`${endpoint} returned an unexpected response shape (${issues})`,
			)
		}
		return parsed.data
	}
}

function requireUser(
	body: { data?: User; errors?: ApiProblem[] },
	what: string,
): User {
	if (body.data) return body.data
	const problem = body.errors?.[0]
	throw new ApiInvariantError(
		`Response for ${what} contains no user data${problem ? `: ${formatProblem(problem)}` : ''}`,
	)
}

function formatProblem(problem: ApiProblem): string {
	return [problem.title, problem.detail].filter(Boolean).join(': ')
}

async function readProblem(response: Response): Promise<string> {
	let text: string
	try {
		text = await response.text()
	} catch (error) {
		return `unreadable body (${describeError(error)})`
	}
	const problem = ApiProblemSchema.safeParse(parseJson(text))
	if (problem.success) {
		const formatted = formatProblem(problem.data)
		if (formatted) return formatted
	}
	return text.slice(0, 200)
}

function parseJson(text: string): unknown {
	try {
		return JSON.parse(text)
	} catch {
		return undefined
	}
}
