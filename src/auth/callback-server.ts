/**
 * One-shot OAuth2 redirect listener
 *
 * Idle → Listening → Fulfilled → Terminated, one instance per login attempt.
 *
 * - The first request to /oauth2/callback is decoded and stored; the server
 *   stops accepting connections at once, answers that request with an HTML
 *   acknowledgment, then closes
 * - The caller is released only after the listener has terminated
 * - State is created per call and injected into the Hono app, so nothing
 *   leaks between attempts (or between tests)
 */

import { type Server, createServer } from 'node:http'
import type { AddressInfo } from 'node:net'

import { getRequestListener } from '@hono/node-server'
import { Hono } from 'hono'
import { html } from 'hono/html'

import { CallbackTimeoutError, SetupError } from '#utils/errors'
import { createLogger } from '#utils/logger'

import {
	type CallbackOutcome,
	decodeCallbackQuery,
	outcomeHeadings,
} from './callback-outcome.js'

const logger = createLogger('auth:callback-server')

export const CALLBACK_PATH = '/oauth2/callback'
export const DEFAULT_CALLBACK_HOST = '127.0.0.1'

/** Connections still open this long after fulfilment are dropped */
const SHUTDOWN_GRACE_MS = 2000

export type RendezvousPhase = 'idle' | 'listening' | 'fulfilled' | 'terminated'

/**
 * Request-scoped rendezvous state shared between the HTTP handler and the
 * waiting caller. Accepts exactly one outcome.
 */
export class CallbackState {
	private phaseValue: RendezvousPhase = 'idle'
	private outcomeValue: CallbackOutcome | undefined
	private readonly fulfilledListeners: Array<(outcome: CallbackOutcome) => void> =
		[]

	get phase(): RendezvousPhase {
		return this.phaseValue
	}

	get outcome(): CallbackOutcome | undefined {
		return this.outcomeValue
	}

	markListening(): void {
		if (this.phaseValue === 'idle') this.phaseValue = 'listening'
	}

	markTerminated(): void {
		this.phaseValue = 'terminated'
	}

	/** Returns false when an outcome was already recorded */
	fulfil(outcome: CallbackOutcome): boolean {
		if (this.outcomeValue !== undefined) return false
		this.outcomeValue = outcome
		this.phaseValue = 'fulfilled'
		for (const listener of this.fulfilledListeners) listener(outcome)
		return true
	}

	onFulfilled(listener: (outcome: CallbackOutcome) => void): void {
		this.fulfilledListeners.push(listener)
	}
}

export function renderAcknowledgment(outcome: CallbackOutcome) {
	const { title, subheader } = outcomeHeadings(outcome)
	return html`<!doctype html>
<html>
	<head><title>${title}</title></head>
	<body>
		<div style="width: 100%; margin-top: 100px; text-align: center; font-family: sans-serif;">
			<h1>${title}</h1>
			<h2>${subheader}</h2>
		</div>
	</body>
</html>`
}

export function createCallbackApp(state: CallbackState): Hono {
	const app = new Hono()

	// Late requests on a lingering keep-alive connection
	app.use('*', async (c, next) => {
		if (state.outcome !== undefined) {
			c.header('Connection', 'close')
			return c.text('callback already received', 410)
		}
		await next()
	})

	app.get('/', (c) => c.text('waiting for callback'))
	app.get('/health', (c) => c.text('ok'))

	app.get(CALLBACK_PATH, (c) => {
		const outcome = decodeCallbackQuery(new URL(c.req.url).search)
		logger.debug('Received OAuth2 callback', { kind: outcome.kind })
		state.fulfil(outcome)
		c.header('Connection', 'close')
		return c.html(
			renderAcknowledgment(outcome),
			outcome.kind === 'malformed' ? 400 : 200,
		)
	})

	return app
}

export type CatchCallbackOptions = {
	port: number
	host?: string
	/** Absent: wait as long as the user takes */
	timeoutMs?: number
	signal?: AbortSignal
	onListening?: (address: AddressInfo) => void
}

/**
 * Serve the callback routes until one redirect arrives, then shut down and
 * resolve with the decoded outcome.
 *
 * @throws SetupError when the port cannot be bound
 * @throws CallbackTimeoutError when `timeoutMs` elapses first
 */
export function catchCallback(
	options: CatchCallbackOptions,
): Promise<CallbackOutcome> {
	const host = options.host ?? DEFAULT_CALLBACK_HOST
	const { port, timeoutMs, signal, onListening } = options

	const state = new CallbackState()
	const server: Server = createServer(
		getRequestListener(createCallbackApp(state).fetch, {
			overrideGlobalObjects: false,
		}),
	)

	return new Promise<CallbackOutcome>((resolve, reject) => {
		let timer: NodeJS.Timeout | undefined
		let settled = false

		const release = (): void => {
			if (timer) clearTimeout(timer)
			signal?.removeEventListener('abort', onAbort)
		}

		const terminate = (settle: () => void): void => {
			if (settled) return
			settled = true
			release()
			server.close(() => {
				state.markTerminated()
				logger.debug('Callback listener terminated')
				settle()
			})
			server.closeIdleConnections()
			setTimeout(() => server.closeAllConnections(), SHUTDOWN_GRACE_MS).unref()
		}

		function onAbort(): void {
			terminate(() => reject(signal?.reason))
		}

		state.onFulfilled((outcome) => {
			terminate(() => resolve(outcome))
		})

		server.once('error', (error) => {
			if (settled) return
			settled = true
			release()
			reject(
				new SetupError(
					`Cannot listen for the OAuth2 callback on ${host}:${port}`,
					{ cause: error },
				),
			)
		})

		if (signal?.aborted) {
			settled = true
			reject(signal.reason)
			return
		}
		signal?.addEventListener('abort', onAbort, { once: true })

		server.listen(port, host, () => {
			state.markListening()
			const address = server.address()
			if (address !== null && typeof address === 'object') {
				logger.debug('Listening for OAuth2 callback', {
					host: address.address,
					port: address.port,
				})
				onListening?.(address)
			}
			if (timeoutMs !== undefined) {
				timer = setTimeout(() => {
					terminate(() => reject(new CallbackTimeoutError(timeoutMs)))
				}, timeoutMs)
			}
		})
	})
}
