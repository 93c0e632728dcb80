// src/schema/twitter.ts
import { z } from 'zod'

// ============================================================================
// Entities
// ============================================================================

/**
 * Fields are optional where the v2 API omits them unless requested through
 * `tweet.fields` / `media.fields`; the enricher decides which absences are
 * contract violations for the request shape it issued.
 */
export const UrlImageSchema = z.object({
	url: z.string(),
	width: z.number().int().nonnegative().optional(),
	height: z.number().int().nonnegative().optional(),
})

export const UrlEntitySchema = z.object({
	url: z.string().optional(),
	expanded_url: z.string().optional(),
	images: z.array(UrlImageSchema).optional(),
})

export const TweetSchema = z.object({
	id: z.string().min(1),
	text: z.string().optional(),
	author_id: z.string().optional(),
	created_at: z.string().optional(),
	attachments: z
		.object({
			media_keys: z.array(z.string()).optional(),
			poll_ids: z.array(z.string()).optional(),
		})
		.optional(),
	entities: z
		.object({
			urls: z.array(UrlEntitySchema).optional(),
		})
		.optional(),
})

export const MediaSchema = z.object({
	media_key: z.string().min(1),
	type: z.string(),
	url: z.string().optional(),
	preview_image_url: z.string().optional(),
	width: z.number().optional(),
	height: z.number().optional(),
})

export const UserSchema = z.object({
	id: z.string().min(1),
	name: z.string().optional(),
	username: z.string().min(1),
})

export const ApiProblemSchema = z.object({
	title: z.string().optional(),
	detail: z.string().optional(),
	type: z.string().optional(),
	status: z.number().optional(),
})

// ============================================================================
// Responses
// ============================================================================

export const LikedTweetsResponseSchema = z.object({
	data: z.array(TweetSchema).optional(),
	includes: z
		.object({
			media: z.array(MediaSchema).optional(),
			users: z.array(UserSchema).optional(),
		})
		.optional(),
	meta: z
		.object({
			result_count: z.number().optional(),
			next_token: z.string().optional(),
			previous_token: z.string().optional(),
		})
		.optional(),
	errors: z.array(ApiProblemSchema).optional(),
})

export const UserResponseSchema = z.object({
	data: UserSchema.optional(),
	errors: z.array(ApiProblemSchema).optional(),
})

export const TokenResponseSchema = z.object({
	access_token: z.string().min(1),
	token_type: z.string(),
	expires_in: z.number().optional(),
	scope: z.string().optional(),
	refresh_token: z.string().optional(),
})

export const OAuthErrorResponseSchema = z.object({
	error: z.string().min(1),
	error_description: z.string().optional(),
	error_uri: z.string().optional(),
})

// ============================================================================
// Types
// ============================================================================

export type Tweet = z.infer<typeof TweetSchema>
export type Media = z.infer<typeof MediaSchema>
export type User = z.infer<typeof UserSchema>
export type UrlEntity = z.infer<typeof UrlEntitySchema>
export type ApiProblem = z.infer<typeof ApiProblemSchema>
export type LikedTweetsResponse = z.infer<typeof LikedTweetsResponseSchema>
export type TokenResponse = z.infer<typeof TokenResponseSchema>

export type MediaKey = string
export type AuthorId = string

/**
 * One page of the liked-tweets feed. `nextToken` undefined is the terminal
 * condition.
 */
export type LikedTweetsPage = {
	tweets: Tweet[] | undefined
	includedMedia: Media[] | undefined
	nextToken: string | undefined
	resultCount: number
}

export function toLikedTweetsPage(
	response: LikedTweetsResponse,
): LikedTweetsPage {
	return {
		tweets: response.data,
		includedMedia: response.includes?.media,
		nextToken: response.meta?.next_token,
		resultCount: response.meta?.result_count ?? response.data?.length ?? 0,
	}
}
