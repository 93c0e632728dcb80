/**
 * magpie CLI program
 *
 * Registers all commands and global options. The executable entry point is
 * ./index.ts; keeping the program here lets tests build it without running it.
 */

import { readFileSync } from 'node:fs'
import { fileURLToPath } from 'node:url'

import { Command, type CommanderError } from 'commander'

import { humanError, setHumanLoggingEnabled } from '#utils/human'

import { registerFetchCommand, registerInitCommand } from './commands/index.js'
import type { GlobalOptions } from './types.js'
import { cliLogger } from './utils.js'

const JSON_ENV_VALUES = ['1', 'true', 'yes', 'y', 'json', 'json-only']

// src/cli and dist/cli are both two levels below the package root
function readVersion(): string {
	const packageJsonPath = fileURLToPath(new URL('../../package.json', import.meta.url))
	const parsed: unknown = JSON.parse(readFileSync(packageJsonPath, 'utf-8'))
	return typeof parsed === 'object' &&
		parsed !== null &&
		'version' in parsed &&
		typeof parsed.version === 'string'
		? parsed.version
		: '0.0.0'
}

export function isJsonOnly(
	flag: boolean | undefined,
	env: NodeJS.ProcessEnv = process.env,
): boolean {
	const envJson = String(env.MAGPIE_JSON ?? '').toLowerCase()
	return Boolean(flag) || JSON_ENV_VALUES.includes(envJson)
}

/**
 * Creates and configures the main CLI program with all commands.
 */
export function createProgram(): Command {
	const program = new Command()

	program
		.name('magpie')
		.description('Download the images from the tweets you liked')
		.version(readVersion())

	program
		.option('-v, --verbose', 'enable verbose logging', false)
		.option('-q, --quiet', 'suppress non-error output', false)
		.option(
			'-c, --config <path>',
			'path to config file (default: magpie.config.{yaml,yml,json})',
		)
		.option(
			'--json',
			'emit structured JSON log events only (machine-readable)',
			false,
		)

	// Toggle human logging before each command action
	program.hook('preAction', () => {
		const opts = program.opts<{ json?: boolean }>()
		setHumanLoggingEnabled(!isJsonOnly(opts.json))
	})

	program.configureOutput({
		outputError: (str: string, write: (msg: string) => void) => {
			write(str.replace(/^error: /, '❌ Error: '))
			cliLogger.error('Commander output error', { raw: str })
		},
	})

	program.exitOverride((err: CommanderError) => {
		if (
			err.code === 'commander.help' ||
			err.code === 'commander.helpDisplayed' ||
			err.code === 'commander.version'
		) {
			process.exit(0)
		}
		if (err.code === 'commander.unknownCommand') {
			humanError(`\nRun 'magpie --help' to see available commands`)
		}
		cliLogger.error('CLI exit override error', {
			code: err.code,
			message: err.message,
		})
		process.exit(1)
	})

	const getGlobalOptions = (): GlobalOptions => program.opts<GlobalOptions>()

	registerFetchCommand(program, getGlobalOptions)
	registerInitCommand(program, getGlobalOptions)

	return program
}
