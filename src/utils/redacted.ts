import { inspect } from 'node:util'

/**
 * Wraps a credential so it never leaks through logs, JSON or util.inspect.
 * Only the first four characters are ever shown.
 */
export class RedactedSecret {
	private readonly value: string

	constructor(value: string) {
		this.value = value
	}

	/** The raw secret, for the one place that must send it */
	reveal(): string {
		return this.value
	}

	toString(): string {
		return `RedactedSecret("${this.value.slice(0, 4)}***")`
	}

	toJSON(): string {
		return this.toString()
	}

	[inspect.custom](): string {
		return this.toString()
	}
}
