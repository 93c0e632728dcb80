/**
 * Starter config generator for `magpie init`
 */

import { constants } from 'node:fs'
import { access, writeFile } from 'node:fs/promises'

import yaml from 'js-yaml'

import { DEFAULT_API_BASE_URL } from '../api/client.js'
import { DEFAULT_SCOPES } from '../auth/credential-exchange.js'
import { ENV_CLIENT_ID, ENV_CLIENT_SECRET } from './loader.js'
import { type ConfigFormat, DEFAULT_CALLBACK_PORT } from './schema.js'

export type GenerateConfigOptions = {
	filePath: string
	format: ConfigFormat
	force?: boolean
}

export type GenerateConfigResult = {
	success: boolean
	message: string
	filePath: string
}

/** Values are written as `${VAR}` references so secrets stay out of the file */
export function starterConfig(): Record<string, unknown> {
	return {
		auth: {
			clientId: `\${${ENV_CLIENT_ID}}`,
			clientSecret: `\${${ENV_CLIENT_SECRET}}`,
			port: DEFAULT_CALLBACK_PORT,
			scopes: [...DEFAULT_SCOPES],
		},
		api: {
			baseUrl: DEFAULT_API_BASE_URL,
			pageSize: 100,
		},
		download: {
			outDir: './likes',
			concurrency: 8,
		},
	}
}

const YAML_HEADER = `# magpie configuration
#
# auth.clientId / auth.clientSecret: OAuth2 app credentials; \${VAR} is
#   replaced from the environment when the file is loaded. Drop clientSecret
#   for a public client.
# auth.port: must match the redirect URI registered for the app
#   (http://localhost:<port>/oauth2/callback)
# auth.callbackTimeoutMs: optional; without it the login waits indefinitely
`

export function renderStarterConfig(format: ConfigFormat): string {
	const config = starterConfig()
	if (format === 'json') {
		return `${JSON.stringify(config, null, 2)}\n`
	}
	return `${YAML_HEADER}\n${yaml.dump(config, { lineWidth: 80 })}`
}

export function getDefaultConfigPath(format: ConfigFormat): string {
	return format === 'json' ? './magpie.config.json' : './magpie.config.yaml'
}

export async function configFileExists(filePath: string): Promise<boolean> {
	try {
		await access(filePath, constants.F_OK)
		return true
	} catch {
		return false
	}
}

export async function generateConfigFile(
	options: GenerateConfigOptions,
): Promise<GenerateConfigResult> {
	const { filePath, format, force = false } = options

	if (!force && (await configFileExists(filePath))) {
		return {
			success: false,
			message: `Config file already exists: ${filePath}`,
			filePath,
		}
	}

	try {
		await writeFile(filePath, renderStarterConfig(format), 'utf-8')
	} catch (error) {
		return {
			success: false,
			message: `Failed to write config file ${filePath}: ${
				error instanceof Error ? error.message : String(error)
			}`,
			filePath,
		}
	}

	return {
		success: true,
		message: `✅ Created ${format.toUpperCase()} config at ${filePath}`,
		filePath,
	}
}
