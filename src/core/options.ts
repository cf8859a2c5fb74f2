import { createLogger } from '../common/logger.js';
import { MisuseError } from '../common/errors.js';

const log = createLogger('core:options');

/**
 * Settings for one call to execute().
 */
export interface ExecutionOptions {
	/**
	 * Maximum nesting of subqueries and set-operation branches
	 * @default 32
	 */
	maxDepth?: number;

	/**
	 * Whether LIKE patterns match case-sensitively
	 * @default true
	 */
	caseSensitiveLike?: boolean;

	/**
	 * Raise a TypeMismatch when text that is not numeric is compared with a number.
	 * When off, such comparisons are simply false.
	 * @default true
	 */
	strictTypes?: boolean;
}

export type ResolvedExecutionOptions = Readonly<Required<ExecutionOptions>>;

export const DEFAULT_EXECUTION_OPTIONS: ResolvedExecutionOptions = Object.freeze({
	maxDepth: 32,
	caseSensitiveLike: true,
	strictTypes: true,
});

/**
 * Merges caller options over the defaults, validating each supplied value.
 */
export function resolveOptions(options?: ExecutionOptions): ResolvedExecutionOptions {
	if (!options) return DEFAULT_EXECUTION_OPTIONS;

	const resolved: Required<ExecutionOptions> = { ...DEFAULT_EXECUTION_OPTIONS };
	if (options.maxDepth !== undefined) {
		if (!Number.isInteger(options.maxDepth) || options.maxDepth < 1) {
			throw new MisuseError(`Option maxDepth must be a positive integer (got ${options.maxDepth})`);
		}
		resolved.maxDepth = options.maxDepth;
	}
	if (options.caseSensitiveLike !== undefined) {
		resolved.caseSensitiveLike = expectBoolean('caseSensitiveLike', options.caseSensitiveLike);
	}
	if (options.strictTypes !== undefined) {
		resolved.strictTypes = expectBoolean('strictTypes', options.strictTypes);
	}

	log('Resolved options %j', resolved);
	return Object.freeze(resolved);
}

function expectBoolean(key: string, value: unknown): boolean {
	if (typeof value !== 'boolean') {
		throw new MisuseError(`Option ${key} must be a boolean (got ${typeof value})`);
	}
	return value;
}
