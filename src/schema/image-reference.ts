// src/schema/image-reference.ts

export type ImageSource = 'media' | 'link-preview'

/**
 * A downloadable image found on a liked tweet.
 *
 * Produced by the metadata enricher, consumed once by the downloader.
 */
export type ImageReference = {
	readonly authorDisplayName: string
	readonly itemId: string
	readonly createdAt: Date
	/** Last path segment of the media URL, or `url-link-<n>.<ext>` */
	readonly internalFilename: string
	readonly url: string
	readonly source: ImageSource
}

// `%` first so already-escaped sequences stay distinguishable
const RESERVED = /[% /\\\0]/g

function escapeComponent(value: string): string {
	return value.replace(
		RESERVED,
		(char) => `%${char.charCodeAt(0).toString(16).toUpperCase().padStart(2, '0')}`,
	)
}

/**
 * On-disk identity of a reference:
 * `<createdAt ISO-8601> <author> <itemId> <internalFilename>`.
 *
 * Components are percent-escaped for `%`, space and path separators, so the
 * space-joined result is injective over the four fields and never escapes the
 * destination directory.
 *
 * @example
 * imageFilename({
 *   createdAt: new Date('2023-04-05T06:07:08.000Z'),
 *   authorDisplayName: 'birdwatcher',
 *   itemId: '1643',
 *   internalFilename: 'Fs1aBc.jpg',
 *   ...
 * })
 * // => '2023-04-05T06:07:08.000Z birdwatcher 1643 Fs1aBc.jpg'
 */
export function imageFilename(
	reference: Pick<
		ImageReference,
		'createdAt' | 'authorDisplayName' | 'itemId' | 'internalFilename'
	>,
): string {
	return [
		reference.createdAt.toISOString(),
		reference.authorDisplayName,
		reference.itemId,
		reference.internalFilename,
	]
		.map(escapeComponent)
		.join(' ')
}
