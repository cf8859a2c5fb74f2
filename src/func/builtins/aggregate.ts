import type { SqlValue } from '../../common/types.js';
import { createAggregateFunction } from '../registration.js';
import { compareSqlValues } from '../../util/comparison.js';
import { numericArg } from './numeric-args.js';

// Steps only ever see non-null values; the registration layer skips nulls.

// --- COUNT(X) ---
export const countFunc = createAggregateFunction(
	{ name: 'count', initialValue: () => 0 },
	(acc: number): number => acc + 1,
	(acc: number): number => acc
);

// --- SUM(X) ---
// Empty input sums to 0
export const sumFunc = createAggregateFunction(
	{ name: 'sum', initialValue: () => 0 },
	(acc: number, value: SqlValue): number => value === null ? acc : acc + numericArg('sum', value),
	(acc: number): number => acc
);

// --- AVG(X) ---
interface AvgAccumulator { sum: number; count: number }
export const avgFunc = createAggregateFunction(
	{ name: 'avg', initialValue: (): AvgAccumulator => ({ sum: 0, count: 0 }) },
	(acc: AvgAccumulator, value: SqlValue): AvgAccumulator => {
		if (value === null) return acc;
		return { sum: acc.sum + numericArg('avg', value), count: acc.count + 1 };
	},
	(acc: AvgAccumulator): number | null => {
		if (acc.count === 0) return null; // NULL for empty set
		return acc.sum / acc.count;
	}
);

// --- MIN(X) ---
export const minFunc = createAggregateFunction(
	{ name: 'min', initialValue: (): SqlValue => null },
	(acc: SqlValue, value: SqlValue): SqlValue => {
		if (acc === null) return value; // First non-null value
		return compareSqlValues(value, acc) < 0 ? value : acc;
	},
	(acc: SqlValue): SqlValue => acc
);

// --- MAX(X) ---
export const maxFunc = createAggregateFunction(
	{ name: 'max', initialValue: (): SqlValue => null },
	(acc: SqlValue, value: SqlValue): SqlValue => {
		if (acc === null) return value; // First non-null value
		return compareSqlValues(value, acc) > 0 ? value : acc;
	},
	(acc: SqlValue): SqlValue => acc
);
