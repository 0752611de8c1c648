// src/unifi/logger.ts

/**
 * Very small logger interface so we can accept either the Homebridge log
 * object or console.* functions in tests.
 */
export interface UnifiLogger {
	debug(message: string, ...args: unknown[]): void;
	info(message: string, ...args: unknown[]): void;
	warn(message: string, ...args: unknown[]): void;
	error(message: string, ...args: unknown[]): void;
}

export function createConsoleLogger(prefix: string): UnifiLogger {
	const tag = `[${prefix}]`;
	return {
		debug: (...args: unknown[]) => console.debug(tag, ...args),
		info: (...args: unknown[]) => console.info(tag, ...args),
		warn: (...args: unknown[]) => console.warn(tag, ...args),
		error: (...args: unknown[]) => console.error(tag, ...args),
	};
}

/** Logger that drops everything; handy for tests. */
export const silentLogger: UnifiLogger = {
	debug: () => undefined,
	info: () => undefined,
	warn: () => undefined,
	error: () => undefined,
};
