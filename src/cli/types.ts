/**
 * CLI Option Types
 *
 * Shared type definitions for all CLI command options.
 */

export type FetchOptions = {
	outDir?: string
	port?: number
	concurrency?: number
	callbackTimeout?: number
	/** Cleared by --no-open */
	open: boolean
	sample: boolean
	username?: string
}

export type InitOptions = {
	format: 'json' | 'yaml'
	force: boolean
	output?: string
}

/**
 * CLI Log Event Metadata
 */
export type CLILogMeta = {
	command: string
	phase: 'start' | 'progress' | 'summary' | 'warning' | 'error'
	message?: string
	options?: Record<string, unknown>
	metrics?: Record<string, unknown>
	error?: { type?: string; kind?: string; message: string; causes?: string[]; stack?: string }
	context?: Record<string, unknown>
	exitCode?: number
}

/**
 * Global CLI options from Commander program
 */
export type GlobalOptions = {
	verbose: boolean
	quiet: boolean
	config?: string
	json?: boolean
}

/** 0 ok, 1 usage or input, 2 runtime failure, 3 some downloads failed */
export type ExitCode = 0 | 1 | 2 | 3
