/**
 * Configuration loader
 *
 * Loads config from YAML/JSON files with env var substitution and precedence
 */

import { constants } from 'node:fs'
import { access, readFile } from 'node:fs/promises'
import { join } from 'node:path'

import yaml from 'js-yaml'

import {
	CONFIG_FILE_NAMES,
	type Config,
	type PartialConfig,
	PartialConfigSchema,
	detectConfigFormat,
	validateConfigSafe,
} from './schema.js'

/** Environment fallbacks for the OAuth2 app credentials */
export const ENV_CLIENT_ID = 'TWITTER_OAUTH_CLIENT_ID'
export const ENV_CLIENT_SECRET = 'TWITTER_OAUTH_CLIENT_SECRET'

/**
 * Discover config file in directory
 *
 * @param baseDir - Directory to search in (defaults to current directory)
 * @returns Path to first existing config file, or null if none found
 */
export async function discoverConfigFile(
	baseDir: string = process.cwd(),
): Promise<string | null> {
	for (const fileName of CONFIG_FILE_NAMES) {
		const filePath = join(baseDir, fileName)
		if (await isReadable(filePath)) {
			return filePath
		}
	}

	return null
}

async function isReadable(filePath: string): Promise<boolean> {
	try {
		await access(filePath, constants.R_OK)
		return true
	} catch {
		return false
	}
}

/**
 * Load and parse config file
 *
 * @returns Parsed config object (unvalidated)
 * @throws Error if file cannot be read or parsed
 */
export async function loadConfigFile(filePath: string): Promise<unknown> {
	const content = await readFile(filePath, 'utf-8')
	const format = detectConfigFormat(filePath)

	if (format === 'json') {
		try {
			return JSON.parse(content)
		} catch (error) {
			throw new Error(`Failed to parse JSON config file ${filePath}`, {
				cause: error,
			})
		}
	}

	try {
		// JSON_SCHEMA keeps YAML to plain data (no dates, no custom tags)
		return yaml.load(content, { schema: yaml.JSON_SCHEMA })
	} catch (error) {
		throw new Error(`Failed to parse YAML config file ${filePath}`, {
			cause: error,
		})
	}
}

/**
 * Substitute environment variables in config
 *
 * Recursively replaces ${VAR_NAME} patterns with environment variable values
 *
 * @example
 * ```typescript
 * // With process.env.TWITTER_OAUTH_CLIENT_SECRET = 'test-secret'
 * substituteEnvVars({ clientSecret: '${TWITTER_OAUTH_CLIENT_SECRET}' })
 * // => { clientSecret: 'test-secret' }
 * ```
 */
export function substituteEnvVars(
	obj: unknown,
	env: NodeJS.ProcessEnv = process.env,
): unknown {
	if (typeof obj === 'string') {
		return obj.replace(/\$\{(\w+)\}/g, (_match, envVar: string) => {
			const value = env[envVar]
			if (value === undefined) {
				throw new Error(
					`Environment variable ${envVar} is not set but referenced in config`,
				)
			}
			return value
		})
	}

	if (Array.isArray(obj)) {
		return obj.map((item) => substituteEnvVars(item, env))
	}

	if (typeof obj === 'object' && obj !== null) {
		return Object.fromEntries(
			Object.entries(obj).map(([key, value]) => [
				key,
				substituteEnvVars(value, env),
			]),
		)
	}

	return obj
}

/**
 * Credentials taken from the environment when neither the file nor the
 * command line provides them.
 */
export function configFromEnv(env: NodeJS.ProcessEnv = process.env): PartialConfig {
	const auth: PartialConfig['auth'] = {}
	const clientId = env[ENV_CLIENT_ID]
	const clientSecret = env[ENV_CLIENT_SECRET]
	if (clientId) auth.clientId = clientId
	if (clientSecret) auth.clientSecret = clientSecret
	return Object.keys(auth).length > 0 ? { auth } : {}
}

/**
 * Merge configuration layers, later layers winning per field.
 *
 * `undefined` values never override: an absent CLI flag leaves the file's
 * value in place.
 */
export function mergeConfig(...layers: PartialConfig[]): PartialConfig {
	const merged: PartialConfig = {}
	for (const layer of layers) {
		if (layer.auth) merged.auth = { ...merged.auth, ...definedOnly(layer.auth) }
		if (layer.api) merged.api = { ...merged.api, ...definedOnly(layer.api) }
		if (layer.download) {
			merged.download = { ...merged.download, ...definedOnly(layer.download) }
		}
	}
	return merged
}

function definedOnly<T extends object>(section: T): Partial<T> {
	const result: Partial<T> = {}
	for (const key of Object.keys(section)) {
		if (!isKeyOf(section, key)) continue
		const value = section[key]
		if (value !== undefined) result[key] = value
	}
	return result
}

function isKeyOf<T extends object>(obj: T, key: PropertyKey): key is keyof T {
	return key in obj
}

export type LoadConfigOptions = {
	/** Explicit config file path; otherwise discovered in `baseDir` */
	configPath?: string
	baseDir?: string
	cliOptions?: PartialConfig
	env?: NodeJS.ProcessEnv
}

/**
 * Loads configuration with the following precedence:
 * 1. CLI options (highest priority)
 * 2. Config file
 * 3. Environment (`TWITTER_OAUTH_CLIENT_ID`, `TWITTER_OAUTH_CLIENT_SECRET`)
 * 4. Defaults from schema (lowest priority)
 *
 * @throws Error if the file cannot be loaded or the merged config is invalid
 *
 * @example
 * ```typescript
 * const config = await loadConfig({
 *   cliOptions: { download: { outDir: './out' } },
 * })
 * ```
 */
export async function loadConfig(options: LoadConfigOptions = {}): Promise<Config> {
	const {
		configPath,
		baseDir,
		cliOptions = {},
		env = process.env,
	} = options

	const filePath = configPath ?? (await discoverConfigFile(baseDir))

	let fileConfig: PartialConfig = {}
	if (filePath) {
		try {
			const rawConfig = await loadConfigFile(filePath)
			fileConfig = PartialConfigSchema.parse(
				substituteEnvVars(rawConfig ?? {}, env),
			)
		} catch (error) {
			throw new Error(`Failed to load config from ${filePath}`, {
				cause: error,
			})
		}
	}

	const merged = mergeConfig(configFromEnv(env), fileConfig, cliOptions)

	const result = validateConfigSafe(merged)
	if (!result.success || !result.data) {
		const details = (result.errors ?? [])
			.map((err) => `${err.path || '(root)'}: ${err.message}`)
			.join('; ')
		throw new Error(`Config validation failed: ${details}`)
	}

	return result.data
}
