/**
 * Page → image references
 *
 * - Authors resolve through the walk's UsernameCache; distinct authors on a
 *   page are looked up concurrently and all settle before the page returns
 * - Attached photos come from the page's `includes.media` side table; keys
 *   with no entry are skipped (the API may omit unrelated media)
 * - Link-preview cards contribute their tallest image
 *
 * Fields the request shape guarantees (author_id, created_at, includes.media
 * when media keys are referenced, photo url and its path) are checked before
 * any lookup. A missing one fails the whole page with ApiInvariantError: it
 * means the response contract changed, not that a tweet lacks an image.
 */

import { ApiInvariantError } from '#utils/errors'
import { createLogger } from '#utils/logger'

import type { LikesApi } from '../api/client.js'
import type { ImageReference } from '../schema/image-reference.js'
import type {
	LikedTweetsPage,
	Media,
	MediaKey,
	Tweet,
	UrlEntity,
} from '../schema/twitter.js'
import { UsernameCache } from './username-cache.js'

const logger = createLogger('feed:enricher')

type ResolvedTweet = {
	tweet: Tweet
	authorId: string
	createdAt: Date
}

type PendingImage = Omit<ImageReference, 'authorDisplayName'> & {
	authorId: string
}

export type MetadataEnricherOptions = {
	signal?: AbortSignal
}

export class MetadataEnricher {
	readonly cache: UsernameCache
	private readonly api: Pick<LikesApi, 'getUser'>
	private readonly signal: AbortSignal | undefined

	constructor(
		api: Pick<LikesApi, 'getUser'>,
		cache: UsernameCache = new UsernameCache(),
		options: MetadataEnricherOptions = {},
	) {
		this.api = api
		this.cache = cache
		this.signal = options.signal
	}

	async processPage(page: LikedTweetsPage): Promise<ImageReference[]> {
		const tweets = page.tweets ?? []
		const resolved = tweets.map(requireTweetFields)
		const mediaByKey = indexIncludedMedia(page, resolved)

		const pendingImages: PendingImage[] = []
		for (const entry of resolved) {
			pendingImages.push(...attachedPhotos(entry, mediaByKey))
			pendingImages.push(...linkPreviewImages(entry))
		}

		const authorIds = [...new Set(resolved.map((entry) => entry.authorId))]
		const names = new Map<string, string>()
		await Promise.all(
			authorIds.map(async (authorId) => {
				names.set(authorId, await this.resolveUsername(authorId))
			}),
		)

		const references = pendingImages.map(({ authorId, ...image }) => ({
			...image,
			authorDisplayName: lookupName(names, authorId),
		}))

		logger.debug('Processed page', {
			tweets: tweets.length,
			images: references.length,
			cachedAuthors: this.cache.size,
		})
		return references
	}

	private resolveUsername(authorId: string): Promise<string> {
		return this.cache.resolve(authorId, async (id) => {
			logger.debug('Looking up author', { authorId: id })
			const user = await this.api.getUser(id, { signal: this.signal })
			return user.username
		})
	}
}

function lookupName(names: Map<string, string>, authorId: string): string {
	const name = names.get(authorId)
	if (name === undefined) {
		throw new ApiInvariantError(`Author ${authorId} was not resolved`)
	}
	return name
}

function requireTweetFields(tweet: Tweet): ResolvedTweet {
	if (!tweet.author_id) {
		throw new ApiInvariantError(
			`Tweet ${tweet.id} has no author_id although it was requested`,
		)
	}
	if (!tweet.created_at) {
		throw new ApiInvariantError(
			`Tweet ${tweet.id} has no created_at although it was requested`,
		)
	}
	const createdAt = new Date(tweet.created_at)
	if (Number.isNaN(createdAt.getTime())) {
		throw new ApiInvariantError(
			`Tweet ${tweet.id} has an unparseable created_at "${tweet.created_at}"`,
		)
	}
	return { tweet, authorId: tweet.author_id, createdAt }
}

function mediaKeysOf(tweet: Tweet): MediaKey[] {
	return tweet.attachments?.media_keys ?? []
}

function indexIncludedMedia(
	page: LikedTweetsPage,
	resolved: ResolvedTweet[],
): Map<MediaKey, Media> {
	const referencesMedia = resolved.some(
		({ tweet }) => mediaKeysOf(tweet).length > 0,
	)
	if (page.includedMedia === undefined) {
		if (referencesMedia) {
			throw new ApiInvariantError(
				'Page references media keys but carries no includes.media table',
			)
		}
		return new Map()
	}
	return new Map(page.includedMedia.map((media) => [media.media_key, media]))
}

function attachedPhotos(
	{ tweet, authorId, createdAt }: ResolvedTweet,
	mediaByKey: Map<MediaKey, Media>,
): PendingImage[] {
	const images: PendingImage[] = []
	for (const key of mediaKeysOf(tweet)) {
		const media = mediaByKey.get(key)
		if (!media) {
			logger.debug('Skipping media key missing from includes', {
				tweetId: tweet.id,
				mediaKey: key,
			})
			continue
		}
		if (media.type !== 'photo') continue

		if (!media.url) {
			throw new ApiInvariantError(
				`Photo ${media.media_key} on tweet ${tweet.id} has no url`,
			)
		}
		images.push({
			authorId,
			itemId: tweet.id,
			createdAt,
			internalFilename: lastPathSegment(media.url, media.media_key),
			url: media.url,
			source: 'media',
		})
	}
	return images
}

function lastPathSegment(rawUrl: string, mediaKey: string): string {
	let url: URL
	try {
		url = new URL(rawUrl)
	} catch (error) {
		throw new ApiInvariantError(
			`Photo ${mediaKey} has an invalid url "${rawUrl}"`,
			{ cause: error },
		)
	}
	const segment = url.pathname.split('/').at(-1)
	if (!segment) {
		throw new ApiInvariantError(
			`Photo ${mediaKey} url "${rawUrl}" has no path segments`,
		)
	}
	return decodeURIComponentSafe(segment)
}

function decodeURIComponentSafe(segment: string): string {
	try {
		return decodeURIComponent(segment)
	} catch {
		return segment
	}
}

/**
 * Tallest preview image of each link card, named `url-link-<n>.<ext>`
 * where `ext` comes from the image URL's `format` parameter.
 */
function linkPreviewImages({
	tweet,
	authorId,
	createdAt,
}: ResolvedTweet): PendingImage[] {
	const urls: UrlEntity[] = tweet.entities?.urls ?? []
	const images: PendingImage[] = []
	urls.forEach((entity, index) => {
		const tallest = [...(entity.images ?? [])].sort(
			(a, b) => (b.height ?? 0) - (a.height ?? 0),
		)[0]
		if (!tallest) return

		let extension = 'jpg'
		try {
			extension = new URL(tallest.url).searchParams.get('format') ?? 'jpg'
		} catch (error) {
			logger.warn('Skipping link preview with invalid url', {
				tweetId: tweet.id,
				url: tallest.url,
				error: error instanceof Error ? error.message : String(error),
			})
			return
		}
		images.push({
			authorId,
			itemId: tweet.id,
			createdAt,
			internalFilename: `url-link-${index}.${extension}`,
			url: tallest.url,
			source: 'link-preview',
		})
	})
	return images
}
