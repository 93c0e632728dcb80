import { access, readFile } from 'node:fs/promises'

import { describe, expect, it } from 'vitest'
import { z } from 'zod'

const root = new URL('../../', import.meta.url)

const TsconfigSchema = z.object({
	compilerOptions: z.object({ rootDir: z.string().optional() }),
	include: z.array(z.string()),
})

const PackageImportsSchema = z.object({
	imports: z.record(z.object({ types: z.string(), default: z.string() })),
})

async function readJson(file: string): Promise<unknown> {
	return JSON.parse(await readFile(new URL(file, root), 'utf-8'))
}

describe('root typecheck project', () => {
	it('pins the project root so #utils/* resolves in tests as well as sources', async () => {
		const tsconfig = TsconfigSchema.parse(await readJson('tsconfig.json'))

		expect(tsconfig.compilerOptions.rootDir).toBe('.')
		expect(tsconfig.include).toEqual(['src/**/*.ts', 'tests/**/*.ts', 'vitest.config.ts'])
	})

	it.each(['errors', 'human', 'logger', 'redacted'])(
		'maps #utils/%s onto a source file',
		async (name) => {
			const { imports } = PackageImportsSchema.parse(await readJson('package.json'))
			const target = imports['#utils/*']?.types.replace('*', name)

			expect(target).toBe(`./src/utils/${name}.ts`)
			await expect(access(new URL(target ?? '', root))).resolves.toBeUndefined()
		},
	)
})
