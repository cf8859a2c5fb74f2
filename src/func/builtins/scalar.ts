import type { SqlValue } from '../../common/types.js';
import { createScalarFunction } from '../registration.js';
import { numericArg } from './numeric-args.js';

// --- abs(X) ---
export const absFunc = createScalarFunction(
	{ name: 'abs', numArgs: 1 },
	(arg: SqlValue): SqlValue => {
		if (arg === null) return null;
		return Math.abs(numericArg('abs', arg));
	}
);

// --- round(X, Y?) ---
// Halves round to the even neighbour
export const roundFunc = createScalarFunction(
	{ name: 'round', numArgs: -1, minArgs: 1, maxArgs: 2 },
	(numArg: SqlValue, decimalsArg: SqlValue = 0): SqlValue => {
		if (numArg === null || decimalsArg === null) return null;
		const x = numericArg('round', numArg);
		const decimals = Math.max(0, Math.trunc(numericArg('round', decimalsArg)));
		const factor = Math.pow(10, decimals);
		return roundHalfEven(x * factor) / factor;
	}
);

function roundHalfEven(value: number): number {
	const floor = Math.floor(value);
	const fraction = value - floor;
	if (fraction < 0.5) return floor;
	if (fraction > 0.5) return floor + 1;
	return floor % 2 === 0 ? floor : floor + 1;
}

// --- floor(X) ---
export const floorFunc = createScalarFunction(
	{ name: 'floor', numArgs: 1 },
	(arg: SqlValue): SqlValue => {
		if (arg === null) return null;
		return Math.floor(numericArg('floor', arg));
	}
);

const ceilImpl = (arg: SqlValue): SqlValue => {
	if (arg === null) return null;
	return Math.ceil(numericArg('ceil', arg));
};

// --- ceil(X) / ceiling(X) ---
export const ceilFunc = createScalarFunction({ name: 'ceil', numArgs: 1 }, ceilImpl);
export const ceilingFunc = createScalarFunction({ name: 'ceiling', numArgs: 1 }, ceilImpl);

// --- coalesce(X, Y, ...) ---
// Returns the first non-null argument
export const coalesceFunc = createScalarFunction(
	{ name: 'coalesce', numArgs: -1, minArgs: 1, nullPropagating: false },
	(...args: SqlValue[]): SqlValue => {
		for (const arg of args) {
			if (arg !== null) return arg;
		}
		return null;
	}
);
