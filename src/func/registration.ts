import { createLogger } from '../common/logger.js';
import type { SqlValue } from '../common/types.js';

const log = createLogger('func:registration');

/**
 * Type for a scalar function implementation.
 */
export type ScalarFunc = (...args: SqlValue[]) => SqlValue;

/**
 * Schema for scalar functions that return a single value per row.
 */
export interface ScalarFunctionSchema {
	/** Function name (lowercase for consistent lookup) */
	name: string;
	/** Number of arguments, or -1 for variable */
	numArgs: number;
	/** Fewest arguments a variable-argument function takes */
	minArgs: number;
	/** Most arguments a variable-argument function takes; undefined means unbounded */
	maxArgs?: number;
	/** Whether null arguments short-circuit to a null result */
	nullPropagating: boolean;
	implementation: ScalarFunc;
}

/**
 * Schema for aggregate functions. The accumulator type is closed over by `reduce`.
 */
export interface AggregateFunctionSchema {
	name: string;
	/** Folds the non-null values of one partition into a result */
	reduce(values: readonly SqlValue[]): SqlValue;
}

/**
 * Configuration options for scalar functions
 */
interface ScalarFuncOptions {
	/** Function name as it will be called in SQL */
	name: string;
	/** Number of arguments, or -1 for variable number */
	numArgs: number;
	minArgs?: number;
	maxArgs?: number;
	/**
	 * Return null whenever any argument is null, without calling the implementation
	 * @default true
	 */
	nullPropagating?: boolean;
}

/**
 * Configuration options for aggregate functions
 */
interface AggregateFuncOptions<T> {
	name: string;
	/** Produces a fresh accumulator for each partition */
	initialValue: () => T;
}

/**
 * Creates a function schema for a scalar SQL function.
 *
 * @param options Configuration options for the function
 * @param jsFunc The JavaScript implementation function
 */
export function createScalarFunction(options: ScalarFuncOptions, jsFunc: ScalarFunc): ScalarFunctionSchema {
	const variable = options.numArgs < 0;
	log('Defining scalar function %s/%d', options.name, options.numArgs);
	return {
		name: options.name.toLowerCase(),
		numArgs: options.numArgs,
		minArgs: variable ? (options.minArgs ?? 0) : options.numArgs,
		maxArgs: variable ? options.maxArgs : options.numArgs,
		nullPropagating: options.nullPropagating ?? true,
		implementation: jsFunc,
	};
}

/**
 * Creates a function schema for an aggregate function.
 * Aggregate functions use a step/finalize pattern to accumulate values.
 *
 * @param options Configuration options for the function
 * @param stepFunc Function called for each non-null value
 * @param finalizeFunc Function called to get final result
 */
export function createAggregateFunction<T>(
	options: AggregateFuncOptions<T>,
	stepFunc: (accumulator: T, value: SqlValue) => T,
	finalizeFunc: (accumulator: T) => SqlValue
): AggregateFunctionSchema {
	log('Defining aggregate function %s', options.name);
	return {
		name: options.name.toLowerCase(),
		reduce(values: readonly SqlValue[]): SqlValue {
			let acc = options.initialValue();
			for (const value of values) {
				if (value === null) continue;
				acc = stepFunc(acc, value);
			}
			return finalizeFunc(acc);
		},
	};
}

/** Whether a call with `count` arguments fits the function's arity. */
export function acceptsArgCount(schema: ScalarFunctionSchema, count: number): boolean {
	if (count < schema.minArgs) return false;
	return schema.maxArgs === undefined || count <= schema.maxArgs;
}
