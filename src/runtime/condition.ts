import { createLogger } from '../common/logger.js';
import { ExecutionError, RelqueryError } from '../common/errors.js';
import { StatusCode, type SqlValue } from '../common/types.js';
import type { ResolvedExecutionOptions } from '../core/options.js';
import type { PlanCondition, PlanExpr, PlanOperand } from '../planner/plan.js';
import { coerceForComparison, valueToText } from '../util/coercion.js';
import { evaluateExpr, type EvalContext } from './expression.js';

const log = createLogger('runtime:condition');

/**
 * Compares two values for a predicate.
 * @returns the ordering, or undefined when either side is null or the pair cannot be compared
 * @throws ExecutionError(TypeMismatch) for text against a number under strictTypes
 */
export function compareForPredicate(a: SqlValue, b: SqlValue, options: ResolvedExecutionOptions): number | undefined {
	if (a === null || b === null) return undefined;
	const pair = coerceForComparison(a, b);
	if (!pair) {
		if (options.strictTypes) {
			throw new ExecutionError('TypeMismatch', `Cannot compare '${valueToText(a)}' with '${valueToText(b)}'`);
		}
		return undefined;
	}
	return order(pair.left, pair.right);
}

function order<T extends number | string>(a: T, b: T): number {
	return a < b ? -1 : a > b ? 1 : 0;
}

/** Equality as CASE matches it: null never matches and incomparable values differ. */
export function valuesEqual(a: SqlValue, b: SqlValue): boolean {
	if (a === null || b === null) return false;
	const pair = coerceForComparison(a, b);
	return pair !== undefined && pair.left === pair.right;
}

/**
 * Evaluates a condition for one row. Comparisons involving null are false;
 * only IS [NOT] NULL tests for null. NOT is plain negation.
 */
export function evaluateCondition(cond: PlanCondition, ctx: EvalContext): boolean {
	switch (cond.kind) {
		case 'logical':
			return cond.op === 'and'
				? evaluateCondition(cond.left, ctx) && evaluateCondition(cond.right, ctx)
				: evaluateCondition(cond.left, ctx) || evaluateCondition(cond.right, ctx);

		case 'not':
			return !evaluateCondition(cond.condition, ctx);

		case 'compare':
			return evaluateComparison(cond, ctx);
	}
}

function evaluateComparison(cond: Extract<PlanCondition, { kind: 'compare' }>, ctx: EvalContext): boolean {
	const left = evaluateExpr(cond.left, ctx);
	const options = ctx.scope.options;

	switch (cond.op) {
		case 'is_null':
			return left === null;
		case 'is_not_null':
			return left !== null;

		case 'eq':
		case 'ne':
		case 'lt':
		case 'gt':
		case 'le':
		case 'ge': {
			const cmp = compareForPredicate(left, operandValue(cond.right, ctx), options);
			if (cmp === undefined) return false;
			return relational(cond.op, cmp);
		}

		case 'in':
		case 'not_in': {
			if (left === null) return false;
			const candidates = operandList(cond.right, ctx);
			let sawNull = false;
			for (const candidate of candidates) {
				if (candidate === null) {
					sawNull = true;
					continue;
				}
				if (compareForPredicate(left, candidate, options) === 0) {
					return cond.op === 'in';
				}
			}
			// No match: NOT IN against a list holding null is unknown, hence false
			return cond.op === 'not_in' && !sawNull;
		}

		case 'like':
		case 'not_like': {
			const pattern = operandValue(cond.right, ctx);
			if (left === null || pattern === null) return false;
			const matched = ctx.scope.likePattern(valueToText(pattern)).test(valueToText(left));
			return cond.op === 'like' ? matched : !matched;
		}

		case 'between':
		case 'not_between': {
			const [lowExpr, highExpr] = boundExprs(cond.right);
			const low = compareForPredicate(left, evaluateExpr(lowExpr, ctx), options);
			const high = compareForPredicate(left, evaluateExpr(highExpr, ctx), options);
			if (low === undefined || high === undefined) return false;
			const inside = low >= 0 && high <= 0;
			return cond.op === 'between' ? inside : !inside;
		}
	}
}

function relational(op: 'eq' | 'ne' | 'lt' | 'gt' | 'le' | 'ge', cmp: number): boolean {
	switch (op) {
		case 'eq': return cmp === 0;
		case 'ne': return cmp !== 0;
		case 'lt': return cmp < 0;
		case 'gt': return cmp > 0;
		case 'le': return cmp <= 0;
		case 'ge': return cmp >= 0;
	}
}

/** Value of a scalar right-hand operand. */
function operandValue(operand: PlanOperand | undefined, ctx: EvalContext): SqlValue {
	if (!operand) {
		throw new RelqueryError('Comparison is missing its right-hand operand', StatusCode.INTERNAL);
	}
	switch (operand.valueType) {
		case 'integer':
		case 'float':
		case 'string':
		case 'boolean':
		case 'null':
			return operand.value;
		case 'expression':
			return evaluateExpr(operand.expr, ctx);
		case 'subquery':
			return scalarSubquery(operand.plan, ctx);
		case 'list':
			throw new ExecutionError('TypeMismatch', 'A value list cannot be compared as a single value');
	}
}

/** Candidate values for IN. */
function operandList(operand: PlanOperand | undefined, ctx: EvalContext): SqlValue[] {
	if (operand?.valueType === 'list') {
		return operand.items.map(item => evaluateExpr(item, ctx));
	}
	if (operand?.valueType === 'subquery') {
		const result = ctx.scope.runSubquery(operand.plan);
		if (result.columns.length !== 1) {
			throw new ExecutionError('AggregateShapeError', `IN subquery must return exactly one column, got ${result.columns.length}`);
		}
		return result.rows.map(row => row[0]);
	}
	return [operandValue(operand, ctx)];
}

function boundExprs(operand: PlanOperand | undefined): [PlanExpr, PlanExpr] {
	if (operand?.valueType !== 'list' || operand.items.length !== 2) {
		throw new RelqueryError('BETWEEN needs exactly two bounds', StatusCode.INTERNAL);
	}
	return [operand.items[0], operand.items[1]];
}

function scalarSubquery(plan: Extract<PlanOperand, { valueType: 'subquery' }>['plan'], ctx: EvalContext): SqlValue {
	const result = ctx.scope.runSubquery(plan);
	if (result.columns.length !== 1 || result.rows.length !== 1) {
		log('Scalar subquery returned %d columns and %d rows', result.columns.length, result.rows.length);
		throw new ExecutionError('AggregateShapeError',
			`Scalar subquery must return one row and one column, got ${result.rows.length} rows and ${result.columns.length} columns`);
	}
	return result.rows[0][0];
}
