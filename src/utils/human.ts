/**
 * Human Output Helper
 *
 * Centralizes human-facing console output so it can be toggled globally
 * (suppressed when --json or MAGPIE_JSON is active). The structured logger
 * is unaffected by this switch.
 */

let humanEnabled = true

export function setHumanLoggingEnabled(enabled: boolean): void {
	humanEnabled = enabled
}

export function isHumanLoggingEnabled(): boolean {
	return humanEnabled
}

function safeConsole(
	kind: 'info' | 'warn' | 'error' | 'log',
	...args: Array<unknown>
): void {
	if (!humanEnabled) return
	console[kind](...args)
}

export function humanInfo(...args: Array<unknown>): void {
	safeConsole('info', ...args)
}

export function humanWarn(...args: Array<unknown>): void {
	safeConsole('warn', ...args)
}

export function humanError(...args: Array<unknown>): void {
	safeConsole('error', ...args)
}
