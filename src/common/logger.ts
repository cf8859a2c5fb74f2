import debug from 'debug';

// Base namespace for the project
const BASE_NAMESPACE = 'relquery';

/**
 * Creates a namespaced debug logger instance.
 *
 * Example: createLogger('parser') -> returns a debugger for 'relquery:parser'
 * Example: createLogger('runtime:join') -> returns a debugger for 'relquery:runtime:join'
 *
 * Usage:
 * const log = createLogger('planner');
 * log('Generating plan for %s', table);
 * const errorLog = log.extend('error'); // Creates 'relquery:planner:error'
 * errorLog('Generation failed: %O', error);
 *
 * @param subNamespace The specific subsystem namespace (e.g., 'parser', 'runtime:executor')
 * @returns A debug instance.
 */
export function createLogger(subNamespace: string): debug.Debugger {
	return debug(`${BASE_NAMESPACE}:${subNamespace}`);
}

/**
 * Enable debug logging programmatically.
 *
 * @param pattern - Debug pattern to enable (default: 'relquery:*')
 *   Examples:
 *   - 'relquery:*' - everything
 *   - 'relquery:runtime:*' - executor operators only
 *   - 'relquery:*,-relquery:lexer' - all except the token stream
 * @param logFn - Optional custom log function. Defaults to the debug package's stderr writer.
 *
 * @example
 * ```typescript
 * import { enableLogging } from 'relquery';
 *
 * enableLogging('relquery:runtime:*', console.log.bind(console));
 * ```
 */
export function enableLogging(
	pattern: string = `${BASE_NAMESPACE}:*`,
	logFn?: (...args: unknown[]) => void
): void {
	if (logFn) {
		debug.log = logFn;
	}
	debug.enable(pattern);
}

/** Disable all debug logging. */
export function disableLogging(): void {
	debug.disable();
}

/**
 * Check if logging is enabled for a specific namespace.
 *
 * @param namespace - The namespace to check (without the 'relquery:' prefix)
 */
export function isLoggingEnabled(namespace: string): boolean {
	return debug.enabled(`${BASE_NAMESPACE}:${namespace}`);
}
