/**
 * Bounded image downloader
 *
 * Every reference is attempted exactly once with at most `concurrency`
 * requests in flight; one item failing never stops the others. The result
 * lists one outcome per reference, in input order.
 *
 * Bodies are streamed into `<file>.part` and renamed into place, so a file
 * under its final name is always complete.
 */

import { type FileHandle, mkdir, open, rename, rm } from 'node:fs/promises'
import { join } from 'node:path'

import PQueue from 'p-queue'

import {
	DownloadBatchError,
	LocalIOError,
	SetupError,
	TransportError,
	describeError,
	errorChain,
} from '#utils/errors'
import { createLogger } from '#utils/logger'

import type { FetchLike } from '../api/client.js'
import { type ImageReference, imageFilename } from '../schema/image-reference.js'

const logger = createLogger('download')

export const DEFAULT_DOWNLOAD_CONCURRENCY = 8

export type DownloadFailureReason =
	| { kind: 'remote'; message: string; status?: number; error: TransportError }
	| { kind: 'local'; message: string; error: LocalIOError }
	| { kind: 'cancelled'; message: string }

export type DownloadResult =
	| { ok: true; bytes: number }
	| { ok: false; reason: DownloadFailureReason }

export type DownloadOutcome = {
	reference: ImageReference
	path: string
	result: DownloadResult
}

export type DownloadOptions = {
	concurrency?: number
	destinationDir: string
	fetch?: FetchLike
	signal?: AbortSignal
	/** Called as each item settles, in completion order */
	onOutcome?: (outcome: DownloadOutcome) => void
}

/**
 * @throws SetupError when `destinationDir` cannot be created; nothing is
 * fetched in that case
 */
export async function downloadAll(
	references: ReadonlyArray<ImageReference>,
	options: DownloadOptions,
): Promise<DownloadOutcome[]> {
	const concurrency = options.concurrency ?? DEFAULT_DOWNLOAD_CONCURRENCY
	if (!Number.isInteger(concurrency) || concurrency < 1) {
		throw new SetupError(
			`Download concurrency must be a positive integer, got ${concurrency}`,
		)
	}

	try {
		await mkdir(options.destinationDir, { recursive: true })
	} catch (error) {
		throw new SetupError(
			`Failed to create output directory '${options.destinationDir}'`,
			{ cause: error },
		)
	}

	const fetchImpl = options.fetch ?? globalThis.fetch
	const queue = new PQueue({ concurrency })
	const outcomes: DownloadOutcome[] = new Array(references.length)

	logger.info('Downloading images', {
		count: references.length,
		concurrency,
		destinationDir: options.destinationDir,
	})

	await Promise.all(
		references.map((reference, index) =>
			queue.add(async () => {
				const path = join(options.destinationDir, imageFilename(reference))
				const result = await downloadOne(
					fetchImpl,
					reference.url,
					path,
					options.signal,
				)
				const outcome: DownloadOutcome = { reference, path, result }
				outcomes[index] = outcome
				if (!result.ok) {
					logger.warn('Download failed', {
						url: reference.url,
						path,
						reason: result.reason.kind,
						message: result.reason.message,
					})
				}
				options.onOutcome?.(outcome)
			}),
		),
	)

	const failed = outcomes.filter((outcome) => !outcome.result.ok).length
	logger.info('Downloads finished', {
		succeeded: outcomes.length - failed,
		failed,
	})
	return outcomes
}

type ResponseBody = NonNullable<Response['body']>

async function downloadOne(
	fetchImpl: FetchLike,
	url: string,
	path: string,
	signal: AbortSignal | undefined,
): Promise<DownloadResult> {
	if (signal?.aborted) {
		return cancelled('Cancelled before the download started')
	}

	let response: Response
	try {
		response = await fetchImpl(url, { signal })
	} catch (error) {
		if (signal?.aborted) return cancelled('Cancelled while downloading')
		return remoteFailure(
			new TransportError(`Failed to download '${url}'`, { cause: error, url }),
		)
	}
	if (!response.ok) {
		await discardBody(response.body, url)
		return remoteFailure(
			new TransportError(
				`Server responded ${response.status} ${response.statusText}`.trim(),
				{ status: response.status, url },
			),
		)
	}
	if (response.body === null) {
		return remoteFailure(
			new TransportError(`Server sent no body for '${url}'`, {
				status: response.status,
				url,
			}),
		)
	}

	const partPath = `${path}.part`
	const written = await streamToFile(response.body, partPath, url, path, signal)
	if (!written.ok) {
		await removePartial(partPath)
		return written
	}
	try {
		await rename(partPath, path)
	} catch (error) {
		await removePartial(partPath)
		return localFailure(url, path, error)
	}
	return written
}

async function streamToFile(
	body: ResponseBody,
	partPath: string,
	url: string,
	path: string,
	signal: AbortSignal | undefined,
): Promise<DownloadResult> {
	let handle: FileHandle
	try {
		handle = await open(partPath, 'w')
	} catch (error) {
		await discardBody(body, url)
		return localFailure(url, path, error)
	}

	const result = await copyChunks(body, handle, url, path, signal)
	try {
		await handle.close()
	} catch (error) {
		return result.ok ? localFailure(url, path, error) : result
	}
	return result
}

/** Leaving the loop early cancels the body */
async function copyChunks(
	body: ResponseBody,
	handle: FileHandle,
	url: string,
	path: string,
	signal: AbortSignal | undefined,
): Promise<DownloadResult> {
	let bytes = 0
	try {
		for await (const chunk of body) {
			if (signal?.aborted) return cancelled('Cancelled while downloading')
			try {
				await handle.write(chunk)
			} catch (error) {
				return localFailure(url, path, error)
			}
			bytes += chunk.byteLength
		}
	} catch (error) {
		if (signal?.aborted) return cancelled('Cancelled while downloading')
		return remoteFailure(
			new TransportError(`Failed to download '${url}'`, { cause: error, url }),
		)
	}
	return { ok: true, bytes }
}

/** Releases the connection of a response whose body is not wanted */
async function discardBody(body: ResponseBody | null, url: string): Promise<void> {
	try {
		await body?.cancel()
	} catch (error) {
		logger.debug('Could not discard response body', {
			url,
			error: describeError(error),
		})
	}
}

function localFailure(url: string, path: string, cause: unknown): DownloadResult {
	const failure = new LocalIOError(`Failed writing '${url}' to '${path}'`, path, {
		cause,
	})
	return {
		ok: false,
		reason: { kind: 'local', message: errorChain(failure).join(': '), error: failure },
	}
}

function remoteFailure(error: TransportError): DownloadResult {
	return {
		ok: false,
		reason: {
			kind: 'remote',
			message: errorChain(error).join(': '),
			status: error.status,
			error,
		},
	}
}

function cancelled(message: string): DownloadResult {
	return { ok: false, reason: { kind: 'cancelled', message } }
}

async function removePartial(partPath: string): Promise<void> {
	try {
		await rm(partPath, { force: true })
	} catch (error) {
		logger.warn('Could not remove partial download', {
			path: partPath,
			error: describeError(error),
		})
	}
}

/**
 * All-or-nothing view over the outcomes.
 *
 * @throws DownloadBatchError listing every failed item
 */
export function assertAllDownloaded(
	outcomes: ReadonlyArray<DownloadOutcome>,
): void {
	const failures = outcomes.flatMap((outcome) =>
		outcome.result.ok
			? []
			: [{ url: outcome.reference.url, message: outcome.result.reason.message }],
	)
	if (failures.length > 0) {
		throw new DownloadBatchError(failures, outcomes.length)
	}
}

export function countFailures(outcomes: ReadonlyArray<DownloadOutcome>): number {
	return outcomes.filter((outcome) => !outcome.result.ok).length
}
