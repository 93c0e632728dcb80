/**
 * Init Command
 *
 * Generate starter configuration file.
 */

import type { Command } from 'commander'

import { humanError, humanInfo } from '#utils/human'

import {
	configFileExists,
	generateConfigFile,
	getDefaultConfigPath,
} from '../../config/generator.js'
import { ENV_CLIENT_ID, ENV_CLIENT_SECRET } from '../../config/loader.js'
import type { ExitCode, GlobalOptions, InitOptions } from '../types.js'
import { applyLogLevel, logEvent, reportCommandError } from '../utils.js'

/**
 * Execute the init command logic
 */
export async function executeInit(
	options: InitOptions,
	globalOptions: GlobalOptions,
): Promise<ExitCode> {
	const { format, force, output } = options
	const { verbose, quiet } = globalOptions

	applyLogLevel(verbose, quiet)

	if (format !== 'json' && format !== 'yaml') {
		humanError(`❌ Invalid format: ${String(format)}`)
		humanError('Supported formats: json, yaml')
		return 1
	}

	const filePath = output || getDefaultConfigPath(format)

	if (!force && (await configFileExists(filePath))) {
		humanError(`❌ Config file already exists: ${filePath}`)
		humanError('\nOptions:')
		humanError('  • Use --force to overwrite')
		humanError('  • Use --output to specify different path')
		return 1
	}

	const result = await generateConfigFile({ filePath, format, force })

	if (!result.success) {
		humanError(`❌ ${result.message}`)
		logEvent('init-error', {
			command: 'init',
			phase: 'error',
			options: { format, filePath, force },
			message: result.message,
			exitCode: 2,
		})
		return 2
	}

	humanInfo(result.message)
	humanInfo('\n📝 Next steps:')
	humanInfo(`  1. Set ${ENV_CLIENT_ID} (and ${ENV_CLIENT_SECRET} for a confidential app)`)
	humanInfo(
		`  2. Register http://localhost:<port>/oauth2/callback as the app's redirect URI`,
	)
	humanInfo('  3. Run `magpie fetch --sample` to try a single page')
	logEvent('init-summary', {
		command: 'init',
		phase: 'summary',
		options: { format, filePath, force },
		message: result.message,
		exitCode: 0,
	})
	return 0
}

/**
 * Register the init command with Commander
 */
export function registerInitCommand(
	program: Command,
	getGlobalOptions: () => GlobalOptions,
): void {
	program
		.command('init')
		.description('Generate starter configuration file')
		.option('-f, --format <type>', 'config file format (json|yaml)', 'yaml')
		.option('--force', 'overwrite existing config file', false)
		.option(
			'-o, --output <path>',
			'output file path (default: auto-detected from format)',
		)
		.action(async (options: InitOptions) => {
			const globalOptions = getGlobalOptions()
			try {
				process.exitCode = await executeInit(options, globalOptions)
			} catch (error) {
				process.exitCode = reportCommandError(
					'generate config',
					error,
					globalOptions.verbose,
				)
			}
		})
}
