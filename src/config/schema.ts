/**
 * Configuration schema
 *
 * Supports both JSON and YAML formats with Zod validation
 */

import { z } from 'zod'

import { DEFAULT_API_BASE_URL } from '../api/client.js'
import { DEFAULT_SCOPES } from '../auth/credential-exchange.js'

/** Port registered as the redirect URI of the default app */
export const DEFAULT_CALLBACK_PORT = 49277

/**
 * OAuth2 app credentials and the local callback listener
 */
const AuthConfigSchema = z.object({
	clientId: z.string().min(1, 'OAuth2 client id is required'),
	clientSecret: z.string().min(1).optional(),
	port: z.number().int().min(0).max(65535).default(DEFAULT_CALLBACK_PORT),
	/** Absent: wait for the browser redirect indefinitely */
	callbackTimeoutMs: z.number().int().positive().optional(),
	scopes: z
		.array(z.string().min(1))
		.min(1, 'At least one scope is required')
		.default([...DEFAULT_SCOPES]),
})

const ApiConfigSchema = z.object({
	baseUrl: z.string().url().default(DEFAULT_API_BASE_URL),
	pageSize: z.number().int().min(5).max(100).default(100),
})

const DownloadConfigSchema = z.object({
	outDir: z.string().min(1).default('./likes'),
	concurrency: z.number().int().min(1).max(64).default(8),
})

export type Config = {
	auth: {
		clientId: string
		clientSecret?: string
		port: number
		callbackTimeoutMs?: number
		scopes: string[]
	}
	api: {
		baseUrl: string
		pageSize: number
	}
	download: {
		outDir: string
		concurrency: number
	}
}

/** Any subset of the config, as read from a file or given on the command line */
export type PartialConfig = {
	auth?: Partial<Config['auth']>
	api?: Partial<Config['api']>
	download?: Partial<Config['download']>
}

export const ConfigSchema: z.ZodType<Config, z.ZodTypeDef, unknown> = z.object({
	auth: AuthConfigSchema,
	api: ApiConfigSchema.default({}),
	download: DownloadConfigSchema.default({}),
})

/**
 * Shape check for a raw config file before defaults apply; every field is
 * optional so file values can be merged with flags and the environment.
 */
export const PartialConfigSchema: z.ZodType<
	PartialConfig,
	z.ZodTypeDef,
	unknown
> = z.object({
	auth: AuthConfigSchema.partial().optional(),
	api: ApiConfigSchema.partial().optional(),
	download: DownloadConfigSchema.partial().optional(),
})

/**
 * Validate config with detailed error messages
 *
 * @throws ZodError with field paths and expected types
 */
export function validateConfig(config: unknown): Config {
	return ConfigSchema.parse(config)
}

/**
 * Validate config and return result with detailed errors
 */
export function validateConfigSafe(config: unknown): {
	success: boolean
	data?: Config
	errors?: Array<{ path: string; message: string }>
} {
	const result = ConfigSchema.safeParse(config)

	if (result.success) {
		return { success: true, data: result.data }
	}

	return {
		success: false,
		errors: result.error.errors.map((err) => ({
			path: err.path.join('.'),
			message: err.message,
		})),
	}
}

/**
 * Checked in order:
 * 1. ./magpie.config.yaml
 * 2. ./magpie.config.yml
 * 3. ./magpie.config.json
 */
export const CONFIG_FILE_NAMES = [
	'magpie.config.yaml',
	'magpie.config.yml',
	'magpie.config.json',
] as const

export type ConfigFormat = 'json' | 'yaml'

export function detectConfigFormat(filePath: string): ConfigFormat {
	if (filePath.endsWith('.json')) {
		return 'json'
	}
	if (filePath.endsWith('.yaml') || filePath.endsWith('.yml')) {
		return 'yaml'
	}

	throw new Error(
		`Unsupported config file format: ${filePath}. Supported formats: .json, .yaml, .yml`,
	)
}
