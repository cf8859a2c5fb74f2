import type { SqlValue } from '../common/types.js';

/** Storage classes in their sort order. */
enum StorageClass {
	NULL = 0,
	NUMERIC = 1, // integers, floats and booleans
	TEXT = 2,
}

function getStorageClass(v: SqlValue): StorageClass {
	if (v === null) return StorageClass.NULL;
	if (typeof v === 'string') return StorageClass.TEXT;
	return StorageClass.NUMERIC;
}

/** Booleans take part in numeric comparison as 0 and 1. */
export function numericValue(v: number | boolean): number {
	return typeof v === 'boolean' ? (v ? 1 : 0) : v;
}

/**
 * Total order over values, used for sorting and for keyed row sets.
 * Order: NULL < numeric (booleans as 0/1) < TEXT; text compares by code unit.
 * @returns negative if a < b, 0 if equal, positive if a > b
 */
export function compareSqlValues(a: SqlValue, b: SqlValue): number {
	const classA = getStorageClass(a);
	const classB = getStorageClass(b);

	if (classA !== classB) {
		return classA - classB;
	}

	if (typeof a === 'string' && typeof b === 'string') {
		return a < b ? -1 : a > b ? 1 : 0;
	}
	if (a === null || b === null || typeof a === 'string' || typeof b === 'string') {
		return 0;
	}

	const numA = numericValue(a);
	const numB = numericValue(b);
	return numA < numB ? -1 : numA > numB ? 1 : 0;
}

/**
 * Like compareSqlValues, but never equates a boolean with a number,
 * so that TRUE and 1 stay distinct as set members and grouping keys.
 */
export function compareSqlValuesStrict(a: SqlValue, b: SqlValue): number {
	const cmp = compareSqlValues(a, b);
	if (cmp !== 0) return cmp;
	const boolA = typeof a === 'boolean';
	const boolB = typeof b === 'boolean';
	return boolA === boolB ? 0 : boolA ? -1 : 1;
}

/**
 * Compares two rows column by column. Shorter rows sort first on a common prefix.
 */
export function compareRows(a: readonly SqlValue[], b: readonly SqlValue[]): number {
	const len = Math.min(a.length, b.length);
	for (let i = 0; i < len; i++) {
		const cmp = compareSqlValuesStrict(a[i], b[i]);
		if (cmp !== 0) return cmp;
	}
	return a.length - b.length;
}
