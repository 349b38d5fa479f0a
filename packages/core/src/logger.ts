// ============================================================================
// Logger
// ============================================================================

export type LogContext = Record<string, unknown>;

/**
 * Minimal logging surface accepted by sessions and adapters.
 * Hosts plug in their own logger; the library default is silent.
 */
export interface Logger {
	debug(message: string, context?: LogContext): void;
	info(message: string, context?: LogContext): void;
	warn(message: string, context?: LogContext): void;
	error(message: string, context?: LogContext): void;
}

const noop = (): void => {};

export const silentLogger: Logger = {
	debug: noop,
	info: noop,
	warn: noop,
	error: noop,
};

/**
 * Logger writing `[scope] message` lines with a context object through `console`.
 *
 * @example
 * ```ts
 * const logger = createConsoleLogger("reconcile");
 * logger.info("session finalized", { sessionId, rulesWritten: 3 });
 * // [reconcile] session finalized { sessionId: "...", rulesWritten: 3 }
 * ```
 */
export function createConsoleLogger(scope = "sheetrecon"): Logger {
	const write =
		(method: "debug" | "info" | "warn" | "error") =>
		(message: string, context?: LogContext): void => {
			if (context) {
				console[method](`[${scope}] ${message}`, context);
			} else {
				console[method](`[${scope}] ${message}`);
			}
		};

	return {
		debug: write("debug"),
		info: write("info"),
		warn: write("warn"),
		error: write("error"),
	};
}

/** Serializes an unknown error for a log context. */
export function errorContext(error: unknown): LogContext {
	if (error instanceof Error) {
		return { error: error.message, name: error.name };
	}
	return { error: String(error) };
}
