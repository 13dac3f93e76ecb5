/**
 * arbor-dom — Logging
 *
 * The library reports soft failures through whichever `Logger` is current.
 * Applications route these into their own logging with `setLogger`.
 */

export interface Logger {
	debug(message: string, ...attributes: unknown[]): void;
	warn(message: string, ...attributes: unknown[]): void;
}

export class ConsoleLogger implements Logger {
	private readonly context: string | undefined;

	constructor(context?: string) {
		this.context = context;
	}

	debug(message: string, ...attributes: unknown[]): void {
		if (this.context) console.debug(this.context, message, ...attributes);
		else console.debug(message, ...attributes);
	}

	warn(message: string, ...attributes: unknown[]): void {
		if (this.context) console.warn(this.context, message, ...attributes);
		else console.warn(message, ...attributes);
	}
}

let current: Logger = new ConsoleLogger('[arbor-dom]');

export function getLogger(): Logger {
	return current;
}

/** Installs `logger` and returns the one it replaced. */
export function setLogger(logger: Logger): Logger {
	const previous = current;
	current = logger;
	return previous;
}
