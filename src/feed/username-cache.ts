import type { AuthorId } from '../schema/twitter.js'

/**
 * Author id → username for the duration of one feed walk.
 *
 * The first value stored for an id is final. Concurrent misses on the same
 * id share one in-flight lookup instead of racing; a failed lookup is not
 * remembered, so a later page may try again.
 */
export class UsernameCache {
	private readonly names = new Map<AuthorId, string>()
	private readonly pending = new Map<AuthorId, Promise<string>>()
	private lookupCount = 0

	get size(): number {
		return this.names.size
	}

	/** Lookups actually issued through `resolve` */
	get lookups(): number {
		return this.lookupCount
	}

	get(authorId: AuthorId): string | undefined {
		return this.names.get(authorId)
	}

	has(authorId: AuthorId): boolean {
		return this.names.has(authorId)
	}

	/** Stores `username` unless the id is already known; returns the stored value */
	set(authorId: AuthorId, username: string): string {
		const existing = this.names.get(authorId)
		if (existing !== undefined) return existing
		this.names.set(authorId, username)
		return username
	}

	async resolve(
		authorId: AuthorId,
		lookup: (authorId: AuthorId) => Promise<string>,
	): Promise<string> {
		const cached = this.names.get(authorId)
		if (cached !== undefined) return cached

		const inFlight = this.pending.get(authorId)
		if (inFlight) return await inFlight

		this.lookupCount++
		const request = lookup(authorId).then(
			(username) => this.set(authorId, username),
		)
		this.pending.set(authorId, request)
		try {
			return await request
		} finally {
			this.pending.delete(authorId)
		}
	}
}
