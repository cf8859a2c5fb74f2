import type { SqlValue } from '../../common/types.js';
import { createScalarFunction } from '../registration.js';
import { valueToText } from '../../util/coercion.js';
import { numericArg } from './numeric-args.js';

// --- upper(X) / lower(X) ---
export const upperFunc = createScalarFunction(
	{ name: 'upper', numArgs: 1 },
	(arg: SqlValue): SqlValue => arg === null ? null : valueToText(arg).toUpperCase()
);

export const lowerFunc = createScalarFunction(
	{ name: 'lower', numArgs: 1 },
	(arg: SqlValue): SqlValue => arg === null ? null : valueToText(arg).toLowerCase()
);

// --- length(X) ---
export const lengthFunc = createScalarFunction(
	{ name: 'length', numArgs: 1 },
	(arg: SqlValue): SqlValue => arg === null ? null : valueToText(arg).length
);

// --- concat(X, ...) ---
// Null arguments contribute nothing
export const concatFunc = createScalarFunction(
	{ name: 'concat', numArgs: -1, minArgs: 1, nullPropagating: false },
	(...args: SqlValue[]): SqlValue => args
		.filter(arg => arg !== null)
		.map(valueToText)
		.join('')
);

// --- substr(X, Y, Z?) --- Also SUBSTRING
// 1-based start; a start at or below zero counts as 1 and shortens the length accordingly
const substrImpl = (str: SqlValue, start: SqlValue, len?: SqlValue): SqlValue => {
	if (str === null || start === null || len === null) return null;

	const s = valueToText(str);
	const y = Math.trunc(numericArg('substr', start));
	const z = len === undefined ? undefined : Math.trunc(numericArg('substr', len));

	let begin = y - 1;
	let end = z === undefined ? s.length : begin + Math.max(0, z);
	if (begin < 0) {
		begin = 0;
		end = Math.max(0, end);
	}

	return s.substring(begin, end);
};

export const substrFunc = createScalarFunction({ name: 'substr', numArgs: -1, minArgs: 2, maxArgs: 3 }, substrImpl);
export const substringFunc = createScalarFunction({ name: 'substring', numArgs: -1, minArgs: 2, maxArgs: 3 }, substrImpl);
