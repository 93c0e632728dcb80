/**
 * Fetch Command
 *
 * Log in through the browser, walk the liked tweets and download every
 * attached photo and link-preview image.
 */

import type { Command } from 'commander'
import open from 'open'

import { describeError } from '#utils/errors'
import { humanInfo, humanWarn } from '#utils/human'
import { setCorrelationId } from '#utils/logger'

import { loadConfig } from '../../config/loader.js'
import type { Config, PartialConfig } from '../../config/schema.js'
import { type PipelineSummary, runPipeline } from '../../pipeline.js'
import { FetchProgressTracker } from '../../progress/fetch-progress.js'
import { imageFilename } from '../../schema/image-reference.js'
import type { ExitCode, FetchOptions, GlobalOptions } from '../types.js'
import {
	applyLogLevel,
	logEvent,
	parseIntegerOption,
	reportCommandError,
} from '../utils.js'

export type FetchDependencies = {
	fetch?: typeof fetch
	callbackHost?: string
	authorizeUrl?: string
	tokenUrl?: string
	/** Defaults to the system browser */
	openBrowser?: (url: string) => Promise<unknown>
	onAuthorizationUrl?: (url: string, port: number) => void
}

async function openInSystemBrowser(url: string): Promise<void> {
	const child = await open(url)
	child.once('error', (error) => warnBrowserUnavailable(error))
}

function warnBrowserUnavailable(error: unknown): void {
	humanWarn(
		`⚠️  Could not open a browser (${describeError(error)}); open the URL above yourself`,
	)
}

function toCliConfig(options: FetchOptions): PartialConfig {
	return {
		auth: {
			port: options.port,
			callbackTimeoutMs: options.callbackTimeout,
		},
		download: {
			outDir: options.outDir,
			concurrency: options.concurrency,
		},
	}
}

/**
 * Execute the fetch command logic
 */
export async function executeFetch(
	options: FetchOptions,
	globalOptions: GlobalOptions,
	deps: FetchDependencies = {},
): Promise<ExitCode> {
	const { verbose, quiet } = globalOptions
	applyLogLevel(verbose, quiet)
	setCorrelationId(`fetch:${Date.now().toString(36)}`)

	let config: Config
	try {
		config = await loadConfig({
			configPath: globalOptions.config,
			cliOptions: toCliConfig(options),
		})
	} catch (error) {
		return reportCommandError('load config', error, verbose, 1)
	}

	logEvent('fetch-start', {
		command: 'fetch',
		phase: 'start',
		options: {
			outDir: config.download.outDir,
			port: config.auth.port,
			concurrency: config.download.concurrency,
			sample: options.sample,
			username: options.username,
			open: options.open,
		},
	})

	const interrupt = new AbortController()
	const onSigint = (): void => {
		humanWarn('\n⚠️  Interrupted, stopping...')
		interrupt.abort(new Error('Interrupted by SIGINT'))
	}
	process.once('SIGINT', onSigint)
	const signal = interrupt.signal

	const openBrowser = deps.openBrowser ?? openInSystemBrowser
	const progress = new FetchProgressTracker({ quiet: quiet || !!globalOptions.json })
	let summary: PipelineSummary
	try {
		summary = await runPipeline({
			config,
			sample: options.sample,
			username: options.username,
			signal,
			fetch: deps.fetch,
			callbackHost: deps.callbackHost,
			authorizeUrl: deps.authorizeUrl,
			tokenUrl: deps.tokenUrl,
			hooks: {
				onAuthorizationUrl: (url, address) => {
					humanInfo(
						options.open
							? '🔑 Opening your browser to log in. If nothing opens, visit:'
							: '🔑 Open this URL in your browser to log in:',
					)
					humanInfo(`\n  ${url}\n`)
					if (options.open) {
						void openBrowser(url).catch(warnBrowserUnavailable)
					}
					deps.onAuthorizationUrl?.(url, address.port)
				},
				onAuthenticated: (user) => {
					humanInfo(`✓ Logged in, fetching likes of @${user.username}`)
					progress.startSpinner('Fetching liked tweets...')
				},
				onPage: ({ tweets, images }) => progress.recordPage(tweets, images),
				onDownloadStart: (total) => progress.startDownloads(total),
				onOutcome: (outcome) =>
					progress.recordDownload(
						outcome.result.ok,
						imageFilename(outcome.reference),
					),
			},
		})
	} catch (error) {
		return reportCommandError('fetch', error, verbose)
	} finally {
		progress.stop()
		process.off('SIGINT', onSigint)
	}

	progress.showFinalSummary(config.download.outDir)

	const exitCode: ExitCode = summary.failed > 0 ? 3 : 0
	for (const outcome of summary.outcomes) {
		if (!outcome.result.ok) {
			humanWarn(
				`  ✗ ${outcome.reference.url} (${outcome.result.reason.kind}): ${outcome.result.reason.message}`,
			)
		}
	}
	logEvent('fetch-summary', {
		command: 'fetch',
		phase: 'summary',
		metrics: {
			account: summary.account.username,
			pages: summary.pages,
			tweets: summary.tweets,
			images: summary.references.length,
			downloaded: summary.outcomes.length - summary.failed,
			failed: summary.failed,
			authorLookups: summary.authorLookups,
		},
		exitCode,
	})
	return exitCode
}

/**
 * Register the fetch command with Commander
 */
export function registerFetchCommand(
	program: Command,
	getGlobalOptions: () => GlobalOptions,
): void {
	program
		.command('fetch')
		.description('Log in and download images from liked tweets')
		.option('-o, --out-dir <path>', 'directory to write images into')
		.option(
			'-p, --port <number>',
			'local port for the OAuth2 redirect',
			parseIntegerOption(0, 65535),
		)
		.option(
			'-n, --concurrency <number>',
			'number of images to download in parallel',
			parseIntegerOption(1, 64),
		)
		.option(
			'--callback-timeout <ms>',
			'give up waiting for the browser redirect after this many ms',
			parseIntegerOption(1, Number.MAX_SAFE_INTEGER),
		)
		.option('--no-open', 'print the login URL without opening a browser')
		.option('--sample', 'only fetch the first page of likes', false)
		.option(
			'-u, --username <handle>',
			"download another account's likes instead of your own",
		)
		.action(async (options: FetchOptions) => {
			process.exitCode = await executeFetch(options, getGlobalOptions())
		})
}
