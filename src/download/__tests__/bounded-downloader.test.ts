import { mkdir, mkdtemp, readFile, readdir, rm, writeFile } from 'node:fs/promises'
import { tmpdir } from 'node:os'
import { join } from 'node:path'

import { afterEach, beforeEach, describe, expect, it } from 'vitest'

import { DownloadBatchError, SetupError } from '#utils/errors'

import {
	bytesResponse,
	createFakeFetch,
	imageReference,
} from '../../../tests/helpers/index.js'
import type { ImageReference } from '../../schema/image-reference.js'
import { imageFilename } from '../../schema/image-reference.js'
import {
	type DownloadOutcome,
	assertAllDownloaded,
	downloadAll,
} from '../bounded-downloader.js'

function references(count: number): ImageReference[] {
	return Array.from({ length: count }, (_, index) =>
		imageReference({
			itemId: String(1000 + index),
			internalFilename: `img${index}.jpg`,
			url: `https://pbs.example.test/media/img${index}.jpg`,
		}),
	)
}

function sleep(ms: number): Promise<void> {
	return new Promise((resolve) => setTimeout(resolve, ms))
}

const encode = (text: string): Uint8Array => new TextEncoder().encode(text)

describe('downloadAll', () => {
	let dir: string

	beforeEach(async () => {
		dir = await mkdtemp(join(tmpdir(), 'magpie-download-'))
	})

	afterEach(async () => {
		await rm(dir, { recursive: true, force: true })
	})

	it('writes every image under its composite filename', async () => {
		const refs = references(3)
		const images = createFakeFetch({}, (call) => bytesResponse(`bytes of ${call.url.pathname}`))

		const outcomes = await downloadAll(refs, {
			concurrency: 2,
			destinationDir: join(dir, 'nested', 'likes'),
			fetch: images.fetch,
		})

		expect(outcomes.map((outcome) => outcome.reference)).toEqual(refs)
		expect(outcomes.every((outcome) => outcome.result.ok)).toBe(true)
		expect((await readdir(join(dir, 'nested', 'likes'))).sort()).toEqual(
			refs.map(imageFilename).sort(),
		)
		const first = outcomes[0]
		expect(first?.path).toBe(join(dir, 'nested', 'likes', imageFilename(refs[0] ?? imageReference())))
		await expect(readFile(first?.path ?? '', 'utf-8')).resolves.toBe(
			'bytes of /media/img0.jpg',
		)
		expect(first?.result).toEqual({ ok: true, bytes: 'bytes of /media/img0.jpg'.length })
	})

	it('never has more than `concurrency` downloads in flight', async () => {
		let inFlight = 0
		let peak = 0
		const images = createFakeFetch({}, async () => {
			inFlight++
			peak = Math.max(peak, inFlight)
			await sleep(5)
			inFlight--
			return bytesResponse('x')
		})

		const outcomes = await downloadAll(references(20), {
			concurrency: 3,
			destinationDir: dir,
			fetch: images.fetch,
		})

		expect(outcomes).toHaveLength(20)
		expect(images.calls).toHaveLength(20)
		expect(peak).toBe(3)
	})

	it('attempts every item and reports failures per item', async () => {
		const refs = references(4)
		const images = createFakeFetch({}, (call) => {
			if (call.url.pathname.endsWith('img1.jpg')) return new Response('gone', { status: 404 })
			if (call.url.pathname.endsWith('img2.jpg')) throw new TypeError('fetch failed')
			return bytesResponse('x')
		})

		const outcomes = await downloadAll(refs, {
			concurrency: 2,
			destinationDir: dir,
			fetch: images.fetch,
		})

		expect(outcomes.map((outcome) => outcome.result.ok)).toEqual([true, false, false, true])
		expect(outcomes[1]?.result).toMatchObject({
			ok: false,
			reason: { kind: 'remote', status: 404, message: 'Server responded 404' },
		})
		expect(outcomes[2]?.result).toMatchObject({
			ok: false,
			reason: {
				kind: 'remote',
				message: `Failed to download 'https://pbs.example.test/media/img2.jpg': fetch failed`,
			},
		})
		expect((await readdir(dir)).sort()).toEqual(
			[imageFilename(refs[0] ?? imageReference()), imageFilename(refs[3] ?? imageReference())].sort(),
		)
	})

	it('streams a chunked body into place', async () => {
		const [ref = imageReference()] = references(1)
		const images = createFakeFetch({}, () =>
			new Response(
				new ReadableStream<Uint8Array>({
					start(stream) {
						stream.enqueue(encode('first,'))
						stream.enqueue(encode('second,'))
						stream.enqueue(encode('third'))
						stream.close()
					},
				}),
			),
		)

		const [outcome] = await downloadAll([ref], { destinationDir: dir, fetch: images.fetch })

		expect(outcome?.result).toEqual({ ok: true, bytes: 'first,second,third'.length })
		await expect(readFile(join(dir, imageFilename(ref)), 'utf-8')).resolves.toBe(
			'first,second,third',
		)
		expect(await readdir(dir)).toEqual([imageFilename(ref)])
	})

	it('cancels the unread body of a non-2xx response', async () => {
		let bodyCancelled = false
		const images = createFakeFetch({}, () =>
			new Response(
				new ReadableStream<Uint8Array>({
					cancel() {
						bodyCancelled = true
					},
				}),
				{ status: 503 },
			),
		)

		const [outcome] = await downloadAll(references(1), { destinationDir: dir, fetch: images.fetch })

		expect(outcome?.result).toMatchObject({
			ok: false,
			reason: { kind: 'remote', status: 503, message: 'Server responded 503' },
		})
		expect(bodyCancelled).toBe(true)
	})

	it('reports a body that breaks off as remote and removes the partial file', async () => {
		const [ref = imageReference()] = references(1)
		let pulls = 0
		const images = createFakeFetch({}, () =>
			new Response(
				new ReadableStream<Uint8Array>({
					pull(stream) {
						pulls++
						if (pulls === 1) stream.enqueue(encode('partial'))
						else stream.error(new Error('connection reset'))
					},
				}),
			),
		)

		const [outcome] = await downloadAll([ref], { destinationDir: dir, fetch: images.fetch })

		expect(outcome?.result).toMatchObject({
			ok: false,
			reason: {
				kind: 'remote',
				message: `Failed to download '${ref.url}': connection reset`,
			},
		})
		expect(await readdir(dir)).toEqual([])
	})

	it('reports a response without a body as remote', async () => {
		const [ref = imageReference()] = references(1)
		const images = createFakeFetch({}, () => new Response(null, { status: 200 }))

		const [outcome] = await downloadAll([ref], { destinationDir: dir, fetch: images.fetch })

		expect(outcome?.result).toMatchObject({
			ok: false,
			reason: { kind: 'remote', status: 200, message: `Server sent no body for '${ref.url}'` },
		})
		expect(await readdir(dir)).toEqual([])
	})

	it('reports a local write failure and removes the partial file', async () => {
		const [ref = imageReference()] = references(1)
		// A directory squatting on the final name makes the rename fail
		await mkdir(join(dir, imageFilename(ref)))
		const images = createFakeFetch({}, () => bytesResponse('x'))

		const [outcome] = await downloadAll([ref], { destinationDir: dir, fetch: images.fetch })

		expect(outcome?.result).toMatchObject({ ok: false, reason: { kind: 'local' } })
		expect(await readdir(dir)).toEqual([imageFilename(ref)])
	})

	it('fails with SetupError before fetching when the directory cannot be created', async () => {
		const blocker = join(dir, 'not-a-directory')
		await writeFile(blocker, 'regular file')
		const images = createFakeFetch({}, () => bytesResponse('x'))

		const attempt = downloadAll(references(3), {
			destinationDir: join(blocker, 'likes'),
			fetch: images.fetch,
		})

		await expect(attempt).rejects.toBeInstanceOf(SetupError)
		await expect(attempt).rejects.toThrow(
			`Failed to create output directory '${join(blocker, 'likes')}'`,
		)
		expect(images.calls).toHaveLength(0)
	})

	it('rejects a concurrency below one', async () => {
		await expect(
			downloadAll(references(1), { concurrency: 0, destinationDir: dir }),
		).rejects.toBeInstanceOf(SetupError)
	})

	it('reports every item as cancelled when the signal is already aborted', async () => {
		const images = createFakeFetch({}, () => bytesResponse('x'))

		const outcomes = await downloadAll(references(3), {
			destinationDir: dir,
			fetch: images.fetch,
			signal: AbortSignal.abort(),
		})

		expect(outcomes.map((outcome) => outcome.result)).toEqual([
			{ ok: false, reason: { kind: 'cancelled', message: 'Cancelled before the download started' } },
			{ ok: false, reason: { kind: 'cancelled', message: 'Cancelled before the download started' } },
			{ ok: false, reason: { kind: 'cancelled', message: 'Cancelled before the download started' } },
		])
		expect(images.calls).toHaveLength(0)
	})

	it('cancels the in-flight download and the ones not yet started', async () => {
		const controller = new AbortController()
		const images = createFakeFetch({}, () => {
			controller.abort(new Error('Interrupted'))
			throw new DOMException('This operation was aborted', 'AbortError')
		})

		const outcomes = await downloadAll(references(2), {
			concurrency: 1,
			destinationDir: dir,
			fetch: images.fetch,
			signal: controller.signal,
		})

		expect(outcomes.map((outcome) => outcome.result)).toEqual([
			{ ok: false, reason: { kind: 'cancelled', message: 'Cancelled while downloading' } },
			{ ok: false, reason: { kind: 'cancelled', message: 'Cancelled before the download started' } },
		])
		expect(images.calls).toHaveLength(1)
		expect(await readdir(dir)).toEqual([])
	})

	it('stops streaming a body when cancelled part-way', async () => {
		const controller = new AbortController()
		let pulls = 0
		const images = createFakeFetch({}, () =>
			new Response(
				new ReadableStream<Uint8Array>({
					pull(stream) {
						pulls++
						if (pulls === 2) controller.abort(new Error('Interrupted'))
						stream.enqueue(encode('chunk'))
					},
				}),
			),
		)

		const [outcome] = await downloadAll(references(1), {
			destinationDir: dir,
			fetch: images.fetch,
			signal: controller.signal,
		})

		expect(outcome?.result).toEqual({
			ok: false,
			reason: { kind: 'cancelled', message: 'Cancelled while downloading' },
		})
		expect(await readdir(dir)).toEqual([])
	})

	it('reports each outcome as it settles', async () => {
		const seen: DownloadOutcome[] = []
		const images = createFakeFetch({}, () => bytesResponse('x'))

		await downloadAll(references(3), {
			destinationDir: dir,
			fetch: images.fetch,
			onOutcome: (outcome) => seen.push(outcome),
		})

		expect(seen.map((outcome) => outcome.reference.itemId).sort()).toEqual([
			'1000',
			'1001',
			'1002',
		])
	})
})

describe('assertAllDownloaded', () => {
	it('passes when every item succeeded', () => {
		const outcome: DownloadOutcome = {
			reference: imageReference(),
			path: '/tmp/x',
			result: { ok: true, bytes: 1 },
		}

		expect(() => assertAllDownloaded([outcome])).not.toThrow()
	})

	it('aggregates the failures into DownloadBatchError', () => {
		const ok: DownloadOutcome = {
			reference: imageReference({ url: 'https://pbs.example.test/a.jpg' }),
			path: '/tmp/a',
			result: { ok: true, bytes: 1 },
		}
		const failed: DownloadOutcome = {
			reference: imageReference({ url: 'https://pbs.example.test/b.jpg' }),
			path: '/tmp/b',
			result: { ok: false, reason: { kind: 'cancelled', message: 'Cancelled while downloading' } },
		}

		let caught: unknown
		try {
			assertAllDownloaded([ok, failed])
		} catch (error) {
			caught = error
		}

		expect(caught).toBeInstanceOf(DownloadBatchError)
		expect(caught).toMatchObject({
			message: '1 of 2 downloads failed',
			attempted: 2,
			failures: [{ url: 'https://pbs.example.test/b.jpg', message: 'Cancelled while downloading' }],
		})
	})
})
