/**
 * OAuth2 redirect payload decoding
 *
 * The provider redirects to the callback with either a success shape
 * (`code`, `state`) or an error shape (`error`, optional
 * `error_description`, `error_uri`, `state`) and no discriminant field.
 *
 * Precedence is fixed: success schema first, then error schema, else
 * malformed. A query carrying both `code`+`state` and `error` therefore
 * decodes as success; swapping the order would change that.
 */

import { z } from 'zod'

export type CallbackOutcome =
	| { kind: 'success'; code: string; state: string }
	| {
			kind: 'provider-error'
			errorCode: string
			description?: string
			uri?: string
			state?: string
	  }
	| { kind: 'malformed'; reason: string }

const SuccessPayloadSchema = z.object({
	code: z.string().min(1),
	state: z.string().min(1),
})

const ErrorPayloadSchema = z.object({
	error: z.string().min(1),
	error_description: z.string().optional(),
	error_uri: z.string().optional(),
	state: z.string().optional(),
})

/**
 * Decode the raw query string (with or without the leading `?`).
 * Never throws.
 */
export function decodeCallbackQuery(
	rawQuery: string | null | undefined,
): CallbackOutcome {
	const query = rawQuery?.replace(/^\?/, '') ?? ''
	if (query.length === 0) {
		return { kind: 'malformed', reason: 'empty query string' }
	}

	const fields = Object.fromEntries(new URLSearchParams(query))

	const success = SuccessPayloadSchema.safeParse(fields)
	if (success.success) {
		return { kind: 'success', ...success.data }
	}

	const failure = ErrorPayloadSchema.safeParse(fields)
	if (failure.success) {
		const { error, error_description, error_uri, state } = failure.data
		return {
			kind: 'provider-error',
			errorCode: error,
			...(error_description !== undefined ? { description: error_description } : {}),
			...(error_uri !== undefined ? { uri: error_uri } : {}),
			...(state !== undefined ? { state } : {}),
		}
	}

	return {
		kind: 'malformed',
		reason: `query matches neither the authorization nor the error response (keys: ${Object.keys(fields).join(', ') || 'none'})`,
	}
}

export type Headings = {
	title: string
	subheader: string
}

export function outcomeHeadings(outcome: CallbackOutcome): Headings {
	switch (outcome.kind) {
		case 'success':
			return {
				title: 'You are now logged in.',
				subheader: 'Please close the window.',
			}
		case 'provider-error': {
			let subheader = outcome.errorCode
			if (outcome.description) subheader += `: ${outcome.description}`
			if (outcome.uri) subheader += ` (${outcome.uri})`
			return { title: 'Login failed.', subheader }
		}
		case 'malformed':
			return {
				title: 'Login failed.',
				subheader: 'Received invalid OAuth2 response.',
			}
	}
}
