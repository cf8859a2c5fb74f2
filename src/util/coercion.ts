import type { SqlValue } from '../common/types.js';

/**
 * SQL type coercion utilities.
 * Comparison and arithmetic both accept text that spells a number.
 */

/**
 * Parses text as a number, or returns undefined when it is not numeric.
 * Surrounding whitespace is ignored; an empty string is not numeric.
 */
export function parseNumericText(value: string): number | undefined {
	const trimmed = value.trim();
	if (trimmed === '') return undefined;
	const asNumber = Number(trimmed);
	if (isNaN(asNumber) || !isFinite(asNumber)) return undefined;
	return asNumber;
}

/**
 * Converts a value to a number for arithmetic.
 * @returns the number, null for a null input, or undefined for text that is not numeric
 */
export function toArithmeticOperand(value: SqlValue): number | null | undefined {
	if (value === null) return null;
	if (typeof value === 'number') return value;
	if (typeof value === 'boolean') return value ? 1 : 0;
	return parseNumericText(value);
}

export type ComparablePair =
	| { kind: 'number'; left: number; right: number }
	| { kind: 'text'; left: string; right: string };

/**
 * Brings two non-null values into a common domain for comparison.
 * Numbers and booleans compare numerically, text with text lexically,
 * and text against a number numerically when the text is numeric.
 * @returns the coerced pair, or undefined when the values cannot be compared
 */
export function coerceForComparison(v1: Exclude<SqlValue, null>, v2: Exclude<SqlValue, null>): ComparablePair | undefined {
	if (typeof v1 === 'string' && typeof v2 === 'string') {
		return { kind: 'text', left: v1, right: v2 };
	}

	const left = typeof v1 === 'string' ? parseNumericText(v1) : (typeof v1 === 'boolean' ? (v1 ? 1 : 0) : v1);
	const right = typeof v2 === 'string' ? parseNumericText(v2) : (typeof v2 === 'boolean' ? (v2 ? 1 : 0) : v2);
	if (left === undefined || right === undefined) return undefined;
	return { kind: 'number', left, right };
}

/** Renders a value the way CONCAT and error messages show it. */
export function valueToText(value: SqlValue): string {
	if (value === null) return 'NULL';
	if (typeof value === 'boolean') return value ? 'TRUE' : 'FALSE';
	return String(value);
}
