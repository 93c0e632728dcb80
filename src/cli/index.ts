#!/usr/bin/env node
/**
 * magpie CLI entry point
 */

import { describeError } from '#utils/errors'

import { createProgram } from './program.js'

async function main(): Promise<void> {
	await createProgram().parseAsync(process.argv)
}

main().catch((error: unknown) => {
	console.error(`Unexpected error: ${describeError(error)}`)
	process.exitCode = 2
})
