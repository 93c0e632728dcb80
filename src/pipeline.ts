/**
 * Fetch pipeline: login → resolve the account → walk likes → enrich → download
 *
 * Pure orchestration over the modules below; all I/O endpoints (fetch, token
 * and authorize URLs, callback host) can be swapped so the whole run can be
 * driven in-process.
 */

import type { AddressInfo } from 'node:net'

import { createLogger } from '#utils/logger'
import { RedactedSecret } from '#utils/redacted'

import { type FetchLike, TwitterApiClient } from './api/client.js'
import { OAuth2PkceClient, callbackRedirectUri } from './auth/credential-exchange.js'
import { login } from './auth/login.js'
import type { Config } from './config/schema.js'
import {
	type DownloadOutcome,
	countFailures,
	downloadAll,
} from './download/bounded-downloader.js'
import { walkLikedTweets } from './feed/feed-walker.js'
import { MetadataEnricher } from './feed/metadata-enricher.js'
import { UsernameCache } from './feed/username-cache.js'
import type { ImageReference } from './schema/image-reference.js'
import type { User } from './schema/twitter.js'

const logger = createLogger('pipeline')

export type PageProgress = {
	page: number
	tweets: number
	images: number
	totalImages: number
}

export type PipelineHooks = {
	/** Show the URL to the user; the callback listener is already bound */
	onAuthorizationUrl: (url: string, address: AddressInfo) => void
	onAuthenticated?: (user: User) => void
	onPage?: (progress: PageProgress) => void
	onDownloadStart?: (total: number) => void
	onOutcome?: (outcome: DownloadOutcome) => void
}

export type PipelineOptions = {
	config: Config
	/** Only the first page of likes */
	sample?: boolean
	/** Walk this account's likes instead of the authenticated user's */
	username?: string
	signal?: AbortSignal
	hooks: PipelineHooks
	fetch?: FetchLike
	callbackHost?: string
	authorizeUrl?: string
	tokenUrl?: string
}

export type PipelineSummary = {
	account: User
	pages: number
	tweets: number
	references: ImageReference[]
	outcomes: DownloadOutcome[]
	failed: number
	authorLookups: number
}

export async function runPipeline(options: PipelineOptions): Promise<PipelineSummary> {
	const { config, hooks, signal } = options
	const fetchImpl = options.fetch ?? globalThis.fetch

	const oauth = new OAuth2PkceClient({
		clientId: config.auth.clientId,
		clientSecret:
			config.auth.clientSecret !== undefined
				? new RedactedSecret(config.auth.clientSecret)
				: undefined,
		redirectUri: callbackRedirectUri(config.auth.port),
		scopes: config.auth.scopes,
		authorizeUrl: options.authorizeUrl,
		tokenUrl: options.tokenUrl,
		fetch: fetchImpl,
	})

	const accessToken = await login({
		client: oauth,
		port: config.auth.port,
		host: options.callbackHost,
		callbackTimeoutMs: config.auth.callbackTimeoutMs,
		signal,
		onAuthorizationUrl: hooks.onAuthorizationUrl,
	})
	logger.info('Logged in')

	const api = new TwitterApiClient({
		accessToken,
		baseUrl: config.api.baseUrl,
		fetch: fetchImpl,
	})

	const account = options.username
		? await api.getUserByUsername(options.username, { signal })
		: await api.getMe({ signal })
	hooks.onAuthenticated?.(account)
	logger.info('Walking liked tweets', {
		userId: account.id,
		username: account.username,
		sample: Boolean(options.sample),
	})

	const cache = new UsernameCache()
	const enricher = new MetadataEnricher(api, cache, { signal })
	const references: ImageReference[] = []
	let pages = 0
	let tweets = 0

	for await (const page of walkLikedTweets(api, account.id, {
		maxPages: options.sample ? 1 : undefined,
		pageSize: config.api.pageSize,
		signal,
	})) {
		const pageReferences = await enricher.processPage(page)
		references.push(...pageReferences)
		pages++
		tweets += page.tweets?.length ?? 0
		hooks.onPage?.({
			page: pages,
			tweets: page.tweets?.length ?? 0,
			images: pageReferences.length,
			totalImages: references.length,
		})
	}

	hooks.onDownloadStart?.(references.length)
	const outcomes = await downloadAll(references, {
		concurrency: config.download.concurrency,
		destinationDir: config.download.outDir,
		fetch: fetchImpl,
		signal,
		onOutcome: hooks.onOutcome,
	})

	return {
		account,
		pages,
		tweets,
		references,
		outcomes,
		failed: countFailures(outcomes),
		authorLookups: cache.lookups,
	}
}
