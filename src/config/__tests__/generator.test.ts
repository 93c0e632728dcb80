import { mkdtemp, readFile, rm, writeFile } from 'node:fs/promises'
import { tmpdir } from 'node:os'
import { join } from 'node:path'

import yaml from 'js-yaml'
import { afterEach, beforeEach, describe, expect, it } from 'vitest'

import {
	configFileExists,
	generateConfigFile,
	getDefaultConfigPath,
	renderStarterConfig,
	starterConfig,
} from '../generator.js'
import { loadConfig } from '../loader.js'

describe('renderStarterConfig', () => {
	it('writes credentials as environment references', () => {
		expect(starterConfig()).toMatchObject({
			auth: {
				clientId: '${TWITTER_OAUTH_CLIENT_ID}',
				clientSecret: '${TWITTER_OAUTH_CLIENT_SECRET}',
			},
		})
	})

	it('renders JSON that parses back to the starter config', () => {
		expect(JSON.parse(renderStarterConfig('json'))).toEqual(starterConfig())
	})

	it('renders commented YAML that parses back to the starter config', () => {
		const rendered = renderStarterConfig('yaml')

		expect(rendered.startsWith('# magpie configuration\n')).toBe(true)
		expect(yaml.load(rendered)).toEqual(starterConfig())
	})
})

describe('getDefaultConfigPath', () => {
	it('names the file after the format', () => {
		expect(getDefaultConfigPath('json')).toBe('./magpie.config.json')
		expect(getDefaultConfigPath('yaml')).toBe('./magpie.config.yaml')
	})
})

describe('generateConfigFile', () => {
	let dir: string

	beforeEach(async () => {
		dir = await mkdtemp(join(tmpdir(), 'magpie-init-'))
	})

	afterEach(async () => {
		await rm(dir, { recursive: true, force: true })
	})

	it('creates a file that loads once the environment is set', async () => {
		const filePath = join(dir, 'magpie.config.yaml')

		const result = await generateConfigFile({ filePath, format: 'yaml' })

		expect(result).toEqual({
			success: true,
			message: `✅ Created YAML config at ${filePath}`,
			filePath,
		})
		const config = await loadConfig({
			configPath: filePath,
			env: {
				TWITTER_OAUTH_CLIENT_ID: 'test-client',
				TWITTER_OAUTH_CLIENT_SECRET: 'test-secret',
			},
		})
		expect(config.auth.clientId).toBe('test-client')
		expect(config.download.outDir).toBe('./likes')
	})

	it('refuses to overwrite without force', async () => {
		const filePath = join(dir, 'magpie.config.json')
		await writeFile(filePath, '{"keep": true}')

		const result = await generateConfigFile({ filePath, format: 'json' })

		expect(result).toEqual({
			success: false,
			message: `Config file already exists: ${filePath}`,
			filePath,
		})
		await expect(readFile(filePath, 'utf-8')).resolves.toBe('{"keep": true}')
	})

	it('overwrites with force', async () => {
		const filePath = join(dir, 'magpie.config.json')
		await writeFile(filePath, '{"keep": true}')

		const result = await generateConfigFile({ filePath, format: 'json', force: true })

		expect(result.success).toBe(true)
		await expect(readFile(filePath, 'utf-8')).resolves.toBe(renderStarterConfig('json'))
	})

	it('reports a write failure', async () => {
		const filePath = join(dir, 'missing', 'magpie.config.json')

		const result = await generateConfigFile({ filePath, format: 'json' })

		expect(result.success).toBe(false)
		expect(result.message.startsWith(`Failed to write config file ${filePath}: `)).toBe(true)
		await expect(configFileExists(filePath)).resolves.toBe(false)
	})
})
