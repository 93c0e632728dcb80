import { describe, expect, it, vi } from 'vitest'

import { ApiInvariantError } from '#utils/errors'

import {
	pageBuilder,
	photo,
	tweetBuilder,
	video,
} from '../../../tests/helpers/index.js'
import type { LikesApi } from '../../api/client.js'
import type { User } from '../../schema/twitter.js'
import { MetadataEnricher } from '../metadata-enricher.js'
import { UsernameCache } from '../username-cache.js'

const USERS: Record<string, string> = {
	'42': 'birdwatcher',
	'43': 'owl_fan',
}

function userApi() {
	const getUser = vi.fn(async (id: string): Promise<User> => {
		const username = USERS[id]
		if (!username) throw new Error(`unknown user ${id}`)
		return { id, username }
	})
	const api: Pick<LikesApi, 'getUser'> = { getUser }
	return { api, getUser }
}

const CREATED_AT = '2023-04-05T06:07:08.000Z'

describe('MetadataEnricher.processPage', () => {
	it('turns attached photos into image references', async () => {
		const { api } = userApi()
		const page = pageBuilder()
			.withTweets(tweetBuilder('1643').author('42').createdAt(CREATED_AT).media('3_1'))
			.withMedia(photo('3_1', 'https://pbs.example.test/media/Fs1aBc.jpg'))
			.build()

		const references = await new MetadataEnricher(api).processPage(page)

		expect(references).toEqual([
			{
				authorDisplayName: 'birdwatcher',
				itemId: '1643',
				createdAt: new Date(CREATED_AT),
				internalFilename: 'Fs1aBc.jpg',
				url: 'https://pbs.example.test/media/Fs1aBc.jpg',
				source: 'media',
			},
		])
	})

	it('skips media keys missing from the side table and keeps the rest', async () => {
		const { api } = userApi()
		const page = pageBuilder()
			.withTweets(tweetBuilder('1').author('42').media('3_1', '3_missing', '3_2'))
			.withMedia(
				photo('3_1', 'https://pbs.example.test/media/one.jpg'),
				photo('3_2', 'https://pbs.example.test/media/two.png'),
			)
			.build()

		const references = await new MetadataEnricher(api).processPage(page)

		expect(references.map((reference) => reference.internalFilename)).toEqual([
			'one.jpg',
			'two.png',
		])
	})

	it('ignores media that is not a photo', async () => {
		const { api } = userApi()
		const page = pageBuilder()
			.withTweets(tweetBuilder('1').author('42').media('7_1', '3_1'))
			.withMedia(video('7_1'), photo('3_1', 'https://pbs.example.test/media/one.jpg'))
			.build()

		const references = await new MetadataEnricher(api).processPage(page)

		expect(references.map((reference) => reference.url)).toEqual([
			'https://pbs.example.test/media/one.jpg',
		])
	})

	it('treats attachments without media keys as no media', async () => {
		const { api } = userApi()
		const page = pageBuilder()
			.withTweets(tweetBuilder('1').author('42').pollOnly())
			.build()

		await expect(new MetadataEnricher(api).processPage(page)).resolves.toEqual([])
	})

	it('takes the tallest link-preview image of each url entity', async () => {
		const { api } = userApi()
		const page = pageBuilder()
			.withTweets(
				tweetBuilder('9')
					.author('43')
					.link({ url: 'https://t.co/none' })
					.link({
						url: 'https://t.co/card',
						images: [
							{ url: 'https://pbs.example.test/card_img/1?format=jpg&name=150x150', width: 150, height: 150 },
							{ url: 'https://pbs.example.test/card_img/1?format=png&name=orig', width: 1200, height: 627 },
						],
					}),
			)
			.build()

		const references = await new MetadataEnricher(api).processPage(page)

		expect(references).toEqual([
			{
				authorDisplayName: 'owl_fan',
				itemId: '9',
				createdAt: new Date(CREATED_AT),
				internalFilename: 'url-link-1.png',
				url: 'https://pbs.example.test/card_img/1?format=png&name=orig',
				source: 'link-preview',
			},
		])
	})

	it('defaults the link-preview extension to jpg', async () => {
		const { api } = userApi()
		const page = pageBuilder()
			.withTweets(
				tweetBuilder('9').link({
					url: 'https://t.co/card',
					images: [{ url: 'https://pbs.example.test/card_img/2', height: 100 }],
				}),
			)
			.build()

		const [reference] = await new MetadataEnricher(api).processPage(page)

		expect(reference?.internalFilename).toBe('url-link-0.jpg')
	})

	it('looks up each distinct author once per walk', async () => {
		const { api, getUser } = userApi()
		const enricher = new MetadataEnricher(api, new UsernameCache())
		const firstPage = pageBuilder()
			.withTweets(
				tweetBuilder('1').author('42'),
				tweetBuilder('2').author('43'),
				tweetBuilder('3').author('42'),
			)
			.build()
		const secondPage = pageBuilder()
			.withTweets(tweetBuilder('4').author('42'), tweetBuilder('5').author('43'))
			.build()

		await enricher.processPage(firstPage)
		await enricher.processPage(secondPage)

		expect(getUser).toHaveBeenCalledTimes(2)
		expect(getUser.mock.calls.map(([id]) => id).sort()).toEqual(['42', '43'])
		expect(enricher.cache.lookups).toBe(2)
	})

	it('fails the page when author_id is missing', async () => {
		const { api, getUser } = userApi()
		const page = pageBuilder()
			.withTweets(tweetBuilder('1').author('42'), tweetBuilder('2').author(undefined))
			.build()

		await expect(new MetadataEnricher(api).processPage(page)).rejects.toThrow(
			new ApiInvariantError('Tweet 2 has no author_id although it was requested'),
		)
		expect(getUser).not.toHaveBeenCalled()
	})

	it('fails the page when created_at is missing or unparseable', async () => {
		const { api } = userApi()
		const missing = pageBuilder().withTweets(tweetBuilder('1').createdAt(undefined)).build()
		const garbled = pageBuilder().withTweets(tweetBuilder('2').createdAt('yesterday')).build()

		await expect(new MetadataEnricher(api).processPage(missing)).rejects.toThrow(
			'Tweet 1 has no created_at although it was requested',
		)
		await expect(new MetadataEnricher(api).processPage(garbled)).rejects.toThrow(
			'Tweet 2 has an unparseable created_at "yesterday"',
		)
	})

	it('fails the page when media keys are referenced but includes.media is absent', async () => {
		const { api } = userApi()
		const page = pageBuilder().withTweets(tweetBuilder('1').media('3_1')).build()

		await expect(new MetadataEnricher(api).processPage(page)).rejects.toThrow(
			'Page references media keys but carries no includes.media table',
		)
	})

	it('fails the page when a photo has no url', async () => {
		const { api } = userApi()
		const page = pageBuilder()
			.withTweets(tweetBuilder('1').media('3_1'))
			.withMedia({ media_key: '3_1', type: 'photo' })
			.build()

		await expect(new MetadataEnricher(api).processPage(page)).rejects.toThrow(
			'Photo 3_1 on tweet 1 has no url',
		)
	})

	it('fails the page when a photo url has no last path segment', async () => {
		const { api } = userApi()
		const page = pageBuilder()
			.withTweets(tweetBuilder('1').media('3_1'))
			.withMedia(photo('3_1', 'https://pbs.example.test/'))
			.build()

		await expect(new MetadataEnricher(api).processPage(page)).rejects.toThrow(
			'Photo 3_1 url "https://pbs.example.test/" has no path segments',
		)
	})

	it('propagates a failed author lookup', async () => {
		const { api } = userApi()
		const page = pageBuilder().withTweets(tweetBuilder('1').author('999')).build()

		await expect(new MetadataEnricher(api).processPage(page)).rejects.toThrow(
			'unknown user 999',
		)
	})
})
