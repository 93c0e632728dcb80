/**
 * CLI Commands Index
 *
 * Barrel export for all CLI command modules.
 */

export { executeFetch, registerFetchCommand } from './fetch.js'
export { executeInit, registerInitCommand } from './init.js'
