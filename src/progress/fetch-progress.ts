import { humanInfo } from '#utils/human'

import { ProgressManager } from './progress-manager.js'

const SPINNER_FRAMES = ['⠋', '⠙', '⠹', '⠸', '⠼', '⠴', '⠦', '⠧', '⠇', '⠏']

const DOWNLOAD_BAR = 'Download'

export type FetchProgressConfig = {
	quiet?: boolean
	/** Where spinner frames go (default: process.stdout) */
	stream?: NodeJS.WritableStream
}

export type FetchStats = {
	pages: number
	tweets: number
	images: number
	downloaded: number
	failed: number
	startTime: number
	endTime?: number
}

/**
 * Progress for one `fetch` run: a spinner while pages are walked (the total
 * is unknown up front), then a bar over the downloads.
 */
export class FetchProgressTracker {
	private progressManager: ProgressManager
	private quiet: boolean
	private stream: NodeJS.WritableStream
	private stats: FetchStats
	private spinnerIndex = 0
	private spinnerInterval: NodeJS.Timeout | null = null
	private spinnerMessage = ''

	constructor(config: FetchProgressConfig = {}) {
		this.quiet = config.quiet ?? false
		this.stream = config.stream ?? process.stdout
		this.progressManager = new ProgressManager({ quiet: this.quiet })
		this.stats = {
			pages: 0,
			tweets: 0,
			images: 0,
			downloaded: 0,
			failed: 0,
			startTime: Date.now(),
		}
	}

	public startSpinner(message: string): void {
		this.spinnerMessage = message
		if (this.quiet || this.spinnerInterval) return

		this.spinnerIndex = 0
		this.showSpinnerFrame()
		this.spinnerInterval = setInterval(() => {
			this.spinnerIndex = (this.spinnerIndex + 1) % SPINNER_FRAMES.length
			this.showSpinnerFrame()
		}, 80)
		this.spinnerInterval.unref()
	}

	private showSpinnerFrame(): void {
		const frame = SPINNER_FRAMES[this.spinnerIndex] ?? ''
		this.stream.write(`\r${frame} ${this.spinnerMessage} `)
	}

	public stopSpinner(): void {
		if (this.spinnerInterval) {
			clearInterval(this.spinnerInterval)
			this.spinnerInterval = null
			this.stream.write(`\r${' '.repeat(80)}\r`)
		}
	}

	public recordPage(tweets: number, imagesOnPage: number): void {
		this.stats.pages++
		this.stats.tweets += tweets
		this.stats.images += imagesOnPage
		this.spinnerMessage = `Processing tweets... found ${this.stats.images} images`
	}

	public startDownloads(total: number): void {
		this.stopSpinner()
		this.progressManager.createBar(DOWNLOAD_BAR, total)
	}

	public recordDownload(ok: boolean, label: string): void {
		if (ok) this.stats.downloaded++
		else this.stats.failed++
		this.progressManager.increment(DOWNLOAD_BAR, 1, label)
	}

	/**
	 * Printed even in quiet mode; suppressed only with JSON-only output
	 */
	public showFinalSummary(outDir: string): void {
		const duration = (this.stats.endTime ?? Date.now()) - this.stats.startTime
		const durationSeconds = (duration / 1000).toFixed(2)

		humanInfo('')
		humanInfo('═'.repeat(60))
		humanInfo(this.stats.failed > 0 ? '⚠️  Fetch finished with failures' : '✓ Fetch complete')
		humanInfo('═'.repeat(60))
		humanInfo(`  Pages:                 ${this.stats.pages}`)
		humanInfo(`  Liked tweets:          ${this.stats.tweets}`)
		humanInfo(`  Images found:          ${this.stats.images}`)
		humanInfo(`  Downloaded:            ${this.stats.downloaded}`)
		if (this.stats.failed > 0) {
			humanInfo(`  Failed:                ${this.stats.failed}`)
		}
		humanInfo(`  Output directory:      ${outDir}`)
		humanInfo(`  Duration:              ${durationSeconds}s`)
		humanInfo('═'.repeat(60))
	}

	public stop(): void {
		this.stopSpinner()
		this.progressManager.stopAll()
		this.stats.endTime = Date.now()
	}

	public getStats(): Readonly<FetchStats> {
		return Object.freeze({ ...this.stats })
	}

	public isVisible(): boolean {
		return !this.quiet && this.progressManager.isVisible()
	}
}
