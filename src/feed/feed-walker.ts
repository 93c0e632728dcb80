/**
 * Liked-tweets pagination
 *
 * A pull-based async generator: each `next()` performs at most one request,
 * and page N+1 is only requested with the cursor page N returned. Walks are
 * not restartable; iterating again issues fresh requests.
 */

import { ApiInvariantError } from '#utils/errors'
import { createLogger } from '#utils/logger'

import type { LikesApi } from '../api/client.js'
import type { LikedTweetsPage } from '../schema/twitter.js'

const logger = createLogger('feed:walker')

export type WalkOptions = {
	/** Stop after this many non-empty pages (sample mode uses 1) */
	maxPages?: number
	/** `max_results` per request, 5–100 */
	pageSize?: number
	signal?: AbortSignal
}

export async function* walkLikedTweets(
	api: Pick<LikesApi, 'getLikedTweets'>,
	userId: string,
	options: WalkOptions = {},
): AsyncGenerator<LikedTweetsPage, void, undefined> {
	const { maxPages, pageSize, signal } = options
	const followed = new Set<string>()
	let cursor: string | undefined
	let pageCount = 0

	while (true) {
		signal?.throwIfAborted()

		logger.debug('Requesting liked tweets page', {
			page: pageCount + 1,
			hasCursor: cursor !== undefined,
		})
		const page = await api.getLikedTweets(userId, {
			paginationToken: cursor,
			maxResults: pageSize,
			signal,
		})

		if (page.tweets === undefined || page.tweets.length === 0) {
			// No data is the normal end of the feed, but only without a cursor
			if (page.nextToken !== undefined) {
				throw new ApiInvariantError(
					`Liked tweets page ${pageCount + 1} has no data but advertises a next page`,
				)
			}
			logger.debug('Reached end of liked tweets', { pages: pageCount })
			return
		}

		pageCount++
		yield page

		if (page.nextToken === undefined) {
			logger.debug('Reached end of liked tweets', { pages: pageCount })
			return
		}
		if (maxPages !== undefined && pageCount >= maxPages) {
			logger.debug('Stopping at page limit', { maxPages })
			return
		}
		if (followed.has(page.nextToken)) {
			throw new ApiInvariantError(
				`Liked tweets pagination returned cursor "${page.nextToken}" twice`,
			)
		}
		followed.add(page.nextToken)
		cursor = page.nextToken
	}
}
