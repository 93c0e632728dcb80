import cliProgress from 'cli-progress'

/**
 * Configuration for progress bar display
 */
export type ProgressConfig = {
	/** Disable progress bars entirely */
	quiet?: boolean
	/** Custom format string for progress bars */
	format?: string
	/** Width of progress bar in characters (default: 40) */
	barSize?: number
	/** Frequency of progress updates in ms (default: 500) */
	updateFrequency?: number
}

type TrackedBar = {
	bar: cliProgress.SingleBar | undefined
	value: number
	total: number
}

/**
 * Progress bars with consistent styling. In quiet mode nothing is rendered
 * but values are still tracked, so callers never branch on visibility.
 */
export class ProgressManager {
	private multiBar: cliProgress.MultiBar | null = null
	private bars: Map<string, TrackedBar> = new Map()
	private isQuiet: boolean
	private format: string
	private barSize: number
	private updateFrequency: number

	constructor(config: ProgressConfig = {}) {
		this.isQuiet = config.quiet ?? false
		this.barSize = config.barSize ?? 40
		this.updateFrequency = config.updateFrequency ?? 500

		// Shows: Download [████████░░░░░░░░] 35% | 12/34 | ETA: 12s | 1643 Fs1aBc.jpg
		this.format =
			config.format ?? `{name} [{bar}] {percentage}% | {value}/{total} | ETA: {eta}s | {current}`
	}

	public createBar(name: string, total: number): void {
		let bar: cliProgress.SingleBar | undefined
		if (!this.isQuiet) {
			if (!this.multiBar) {
				this.multiBar = new cliProgress.MultiBar(
					{
						clearOnComplete: false,
						hideCursor: true,
						format: this.format,
						barCompleteChar: '█',
						barIncompleteChar: '░',
						barsize: this.barSize,
						fps: 1000 / this.updateFrequency,
					},
					cliProgress.Presets.shades_classic,
				)
			}
			bar = this.multiBar.create(total, 0, {
				name: this.padName(name),
				current: 'starting...',
			})
		}

		this.bars.set(name, { bar, value: 0, total })
	}

	/**
	 * Increment progress by value
	 */
	public increment(barName: string, value: number = 1, current?: string): void {
		const tracked = this.bars.get(barName)
		if (!tracked) return
		tracked.value = Math.min(tracked.value + value, tracked.total)
		tracked.bar?.update(tracked.value, {
			current: current ? this.truncate(current, 40) : undefined,
		})
	}

	/**
	 * Stop and remove a progress bar
	 */
	public stopBar(barName: string): void {
		this.bars.get(barName)?.bar?.stop()
		this.bars.delete(barName)
	}

	/**
	 * Stop all progress bars and cleanup
	 */
	public stopAll(): void {
		for (const [name] of this.bars) {
			this.stopBar(name)
		}
		this.multiBar?.stop()
		this.multiBar = null
		this.bars.clear()
	}

	/**
	 * Current value for a bar (0 to total)
	 */
	public getProgress(barName: string): number {
		return this.bars.get(barName)?.value ?? 0
	}

	public getTotal(barName: string): number {
		return this.bars.get(barName)?.total ?? 0
	}

	public isVisible(): boolean {
		return !this.isQuiet
	}

	private padName(name: string): string {
		const maxLen = 12
		if (name.length >= maxLen) {
			return `${name.substring(0, maxLen - 3)}...`
		}
		return name.padEnd(maxLen)
	}

	private truncate(str: string, maxLen: number): string {
		if (str.length <= maxLen) {
			return str
		}
		return `${str.substring(0, maxLen - 3)}...`
	}
}
