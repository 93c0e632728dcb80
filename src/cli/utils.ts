/**
 * CLI Utility Functions
 *
 * Shared utilities for CLI command handling including logging,
 * error reporting, and option parsing.
 */

import { InvalidArgumentError } from 'commander'

import { errorChain, isMagpieError } from '#utils/errors'
import { humanError } from '#utils/human'
import { createLogger, setLogLevel } from '#utils/logger'

import type { CLILogMeta, ExitCode } from './types.js'

export const cliLogger = createLogger('cli')

/**
 * Apply log level based on verbose/quiet flags
 */
export function applyLogLevel(verbose: boolean, quiet: boolean): void {
	const level = quiet ? 'error' : verbose ? 'debug' : 'info'
	setLogLevel(level)
}

/**
 * Emit structured CLI events for logging
 */
export function logEvent(event: string, meta: CLILogMeta): void {
	cliLogger.info(event, meta)
}

export function formatErrorMeta(error: unknown): CLILogMeta['error'] {
	const [message = String(error), ...causes] = errorChain(error)
	return {
		type: error instanceof Error ? error.name : 'Unknown',
		...(isMagpieError(error) ? { kind: error.kind } : {}),
		message,
		...(causes.length > 0 ? { causes } : {}),
		...(error instanceof Error && error.stack ? { stack: error.stack } : {}),
	}
}

/**
 * Print `❌ <summary>` and one `--> <message>` line per cause.
 *
 * @example
 * // ❌ Failed to fetch: Failed to create output directory './likes'
 * // --> EEXIST: file already exists, mkdir './likes'
 */
export function printErrorChain(
	summary: string,
	error: unknown,
	verbose: boolean,
): void {
	const [message, ...causes] = errorChain(error)
	humanError(`❌ ${summary}: ${message ?? 'unknown error'}`)
	for (const cause of causes) {
		humanError(`--> ${cause}`)
	}
	if (verbose && error instanceof Error && error.stack) {
		humanError(error.stack)
	}
}

/**
 * Standard command error handler: report, emit the error event, and return
 * the exit code for the caller to set
 */
export function reportCommandError(
	commandName: string,
	error: unknown,
	verbose: boolean,
	exitCode: ExitCode = 2,
): ExitCode {
	printErrorChain(`Failed to ${commandName}`, error, verbose)
	logEvent(`${commandName}-error`, {
		command: commandName,
		phase: 'error',
		error: formatErrorMeta(error),
		exitCode,
	})
	return exitCode
}

/** Commander argParser for integer flags */
export function parseIntegerOption(
	min: number,
	max: number,
): (value: string) => number {
	return (value) => {
		const parsed = Number(value)
		if (!/^\d+$/.test(value.trim()) || parsed < min || parsed > max) {
			throw new InvalidArgumentError(
				`Expected an integer between ${min} and ${max}.`,
			)
		}
		return parsed
	}
}
