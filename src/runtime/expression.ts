import { BTree } from 'inheritree';
import { ExecutionError } from '../common/errors.js';
import type { Row, SqlValue } from '../common/types.js';
import { getAggregateFunction, getScalarFunction } from '../func/builtins/index.js';
import type { ArithPlanExpr, FunctionPlanExpr, PlanExpr } from '../planner/plan.js';
import { compareSqlValuesStrict } from '../util/comparison.js';
import { toArithmeticOperand, valueToText } from '../util/coercion.js';
import { evaluateCondition, valuesEqual } from './condition.js';
import type { ColumnResolver } from './relation.js';
import type { ExecutionScope } from './scope.js';

/** The rows behind one aggregated output row. */
export interface GroupContext {
	readonly resolver: ColumnResolver;
	readonly rows: readonly Row[];
}

/**
 * Everything an expression can see while it is evaluated for one row.
 */
export interface EvalContext {
	readonly scope: ExecutionScope;
	readonly resolver: ColumnResolver;
	readonly row: Row;
	/** Present when aggregates may be computed over a partition */
	readonly group?: GroupContext;
	/** Aggregates already computed into the current row, by rendered call text */
	readonly aggregateColumns?: ReadonlyMap<string, number>;
}

export function evaluateExpr(expr: PlanExpr, ctx: EvalContext): SqlValue {
	switch (expr.kind) {
		case 'literal':
			return expr.value;

		case 'column':
			return ctx.row[ctx.resolver.resolve(expr)];

		case 'function':
			return expr.aggregate ? evaluateAggregate(expr, ctx) : evaluateScalarFunction(expr, ctx);

		case 'arith':
			return evaluateArithmetic(expr, ctx);

		case 'negate': {
			const value = evaluateExpr(expr.expr, ctx);
			const operand = toArithmeticOperand(value);
			if (operand === undefined) {
				throw new ExecutionError('TypeMismatch', `Cannot negate non-numeric value '${valueToText(value)}'`);
			}
			return operand === null ? null : -operand;
		}

		case 'case':
			if (expr.form === 'simple') {
				const subject = evaluateExpr(expr.subject, ctx);
				for (const clause of expr.whens) {
					if (valuesEqual(subject, evaluateExpr(clause.when, ctx))) {
						return evaluateExpr(clause.then, ctx);
					}
				}
			} else {
				for (const clause of expr.whens) {
					if (evaluateCondition(clause.when, ctx)) {
						return evaluateExpr(clause.then, ctx);
					}
				}
			}
			return expr.elseExpr ? evaluateExpr(expr.elseExpr, ctx) : null;
	}
}

function evaluateScalarFunction(expr: FunctionPlanExpr, ctx: EvalContext): SqlValue {
	const schema = getScalarFunction(expr.name);
	if (!schema) {
		throw new ExecutionError('UnknownFunction', `Unknown function '${expr.name}'`);
	}
	const args = expr.args.map(arg => evaluateExpr(arg, ctx));
	if (schema.nullPropagating && args.some(arg => arg === null)) {
		return null;
	}
	return schema.implementation(...args);
}

/**
 * Aggregates read a value already computed for the row when one exists,
 * otherwise fold the argument over the current partition.
 */
function evaluateAggregate(expr: FunctionPlanExpr, ctx: EvalContext): SqlValue {
	const precomputed = ctx.aggregateColumns?.get(expr.text);
	if (precomputed !== undefined) {
		return ctx.row[precomputed];
	}

	const group = ctx.group;
	if (!group) {
		throw new ExecutionError('AggregateShapeError', `Aggregate ${expr.text} is not allowed outside an aggregate query`);
	}
	return computeAggregate(expr, group, ctx.scope);
}

export function computeAggregate(expr: FunctionPlanExpr, group: GroupContext, scope: ExecutionScope): SqlValue {
	const schema = getAggregateFunction(expr.name);
	if (!schema) {
		throw new ExecutionError('UnknownFunction', `Unknown aggregate function '${expr.name}'`);
	}

	if (expr.star) {
		return schema.reduce(group.rows.map(() => 1));
	}

	const arg = expr.args[0];
	let values = group.rows
		.map(row => evaluateExpr(arg, { scope, resolver: group.resolver, row }))
		.filter(value => value !== null);

	if (expr.distinct) {
		const seen = new BTree<SqlValue, SqlValue>((value: SqlValue) => value, compareSqlValuesStrict);
		values = values.filter(value => seen.insert(value).on);
	}

	return schema.reduce(values);
}

function evaluateArithmetic(expr: ArithPlanExpr, ctx: EvalContext): SqlValue {
	const leftValue = evaluateExpr(expr.left, ctx);
	const rightValue = evaluateExpr(expr.right, ctx);
	const left = toArithmeticOperand(leftValue);
	const right = toArithmeticOperand(rightValue);

	if (left === undefined || right === undefined) {
		const bad = left === undefined ? leftValue : rightValue;
		throw new ExecutionError('TypeMismatch', `Cannot apply '${expr.op}' to non-numeric value '${valueToText(bad)}'`);
	}
	if (left === null || right === null) return null;

	switch (expr.op) {
		case '+': return left + right;
		case '-': return left - right;
		case '*': return left * right;
		case '/':
			if (right === 0) return null;
			return left / right;
		case '%':
			if (right === 0) return null;
			return left % right;
	}
}
