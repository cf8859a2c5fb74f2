import { absFunc, roundFunc, floorFunc, ceilFunc, ceilingFunc, coalesceFunc } from './scalar.js';
import { upperFunc, lowerFunc, lengthFunc, concatFunc, substrFunc, substringFunc } from './string.js';
import { countFunc, sumFunc, avgFunc, minFunc, maxFunc } from './aggregate.js';
import type { AggregateFunctionSchema, ScalarFunctionSchema } from '../registration.js';

// Combine all built-in scalar function definitions into a single array
export const BUILTIN_FUNCTIONS: readonly ScalarFunctionSchema[] = [
	// Numeric
	absFunc,
	roundFunc,
	floorFunc,
	ceilFunc,
	ceilingFunc,
	coalesceFunc,
	// String
	upperFunc,
	lowerFunc,
	lengthFunc,
	concatFunc,
	substrFunc,
	substringFunc,
];

export const BUILTIN_AGGREGATES: readonly AggregateFunctionSchema[] = [
	countFunc,
	sumFunc,
	avgFunc,
	minFunc,
	maxFunc,
];

const scalarByName = new Map(BUILTIN_FUNCTIONS.map(f => [f.name, f]));
const aggregateByName = new Map(BUILTIN_AGGREGATES.map(f => [f.name, f]));

/** Looks up a scalar function by name, case-insensitively. */
export function getScalarFunction(name: string): ScalarFunctionSchema | undefined {
	return scalarByName.get(name.toLowerCase());
}

/** Looks up an aggregate function by name, case-insensitively. */
export function getAggregateFunction(name: string): AggregateFunctionSchema | undefined {
	return aggregateByName.get(name.toLowerCase());
}
