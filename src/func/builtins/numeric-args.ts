import { ExecutionError } from '../../common/errors.js';
import type { SqlValue } from '../../common/types.js';
import { toArithmeticOperand, valueToText } from '../../util/coercion.js';

/**
 * Reads a non-null argument as a number, accepting numeric text.
 * @throws ExecutionError(TypeMismatch) for text that is not numeric
 */
export function numericArg(funcName: string, value: Exclude<SqlValue, null>): number {
	const num = toArithmeticOperand(value);
	if (num === null || num === undefined) {
		throw new ExecutionError('TypeMismatch', `${funcName.toUpperCase()}() expects a number, got '${valueToText(value)}'`);
	}
	return num;
}
