import { createLogger } from '../common/logger.js';
import { semanticError } from '../common/errors.js';
import { StatusCode } from '../common/types.js';
import type * as AST from '../parser/ast.js';
import { AGGREGATE_FUNCTIONS } from '../parser/ast.js';
import { getScalarFunction } from '../func/builtins/index.js';
import { acceptsArgCount } from '../func/registration.js';
import { expressionToString } from '../util/ast-stringify.js';
import { conditionHasAggregate, exprHasAggregate } from './analysis.js';
import type {
	ColumnPlanExpr, LiteralValueType, Plan, PlanColumn, PlanCondition,
	PlanExpr, PlanOperand, PlanOrderKey,
} from './plan.js';

const log = createLogger('planner:generator');

const aggregateNames: readonly string[] = AGGREGATE_FUNCTIONS;

/**
 * Lowers a parsed SELECT into a Plan.
 * Operators are normalised to canonical tags, right-hand operands are classified,
 * select-list items are flattened, and subqueries and set-operation branches
 * become nested Plans. The returned Plan is deeply frozen.
 *
 * @throws SemanticError for constructs the plan cannot represent
 */
export function generate(ast: AST.SelectStmt): Plan {
	const plan = deepFreeze(buildSelectPlan(ast));
	log('Generated plan over %s: %d columns, %d joins, %d set operations, aggregate=%s',
		plan.source.table, plan.columns.length, plan.joins.length, plan.setOperations.length, plan.aggregate);
	return plan;
}

function buildSelectPlan(stmt: AST.SelectStmt): Plan {
	if (stmt.type !== 'select') {
		semanticError('Expected a SELECT statement node', StatusCode.INTERNAL, stmt);
	}

	const columns = stmt.columns.map(buildColumn);

	const groupBy = (stmt.groupBy ?? []).map((expr): ColumnPlanExpr => {
		if (expr.type !== 'column') {
			semanticError(`GROUP BY items must be column references, found '${expressionToString(expr)}'`, StatusCode.ERROR, expr);
		}
		return { kind: 'column', name: expr.name, table: expr.table };
	});

	const where = stmt.where ? buildCondition(stmt.where) : undefined;
	if (where && conditionHasAggregate(where)) {
		semanticError('Aggregate functions are not allowed in WHERE', StatusCode.ERROR, stmt.where);
	}

	const joins = stmt.from.joins.map(join => {
		const condition = join.condition ? buildCondition(join.condition) : undefined;
		if (condition && conditionHasAggregate(condition)) {
			semanticError('Aggregate functions are not allowed in a join condition', StatusCode.ERROR, join.condition);
		}
		if (join.joinType === 'cross' ? condition !== undefined : condition === undefined) {
			semanticError(`${join.joinType.toUpperCase()} JOIN ${join.joinType === 'cross' ? 'cannot have' : 'requires'} an ON condition`, StatusCode.ERROR);
		}
		return { joinType: join.joinType, table: join.table, alias: join.alias, condition };
	});

	const orderBy = (stmt.orderBy ?? []).map((clause): PlanOrderKey => ({
		expr: buildExpr(clause.expr),
		name: clause.expr.type === 'column' ? clause.expr.name : expressionToString(clause.expr),
		direction: clause.direction,
	}));

	const having = stmt.having ? buildCondition(stmt.having) : undefined;

	const aggregate = groupBy.length > 0 ||
		columns.some(col => col.kind === 'column' && col.hasAggregate) ||
		(having !== undefined && conditionHasAggregate(having));

	return {
		source: { table: stmt.from.table, alias: stmt.from.alias },
		joins,
		columns,
		where,
		groupBy,
		having,
		orderBy,
		limit: stmt.limit ? { count: stmt.limit.count, offset: stmt.limit.offset } : undefined,
		distinct: stmt.distinct,
		aggregate,
		setOperations: stmt.setOperations.map(setOp => ({
			op: setOp.op,
			all: setOp.all,
			plan: buildSelectPlan(setOp.select),
		})),
	};
}

function buildColumn(column: AST.ResultColumn): PlanColumn {
	if (column.type === 'all') {
		return { kind: 'all', table: column.table };
	}

	const expr = column.expr;
	const expression = buildExpr(expr);
	return {
		kind: 'column',
		name: expr.type === 'column' ? expr.name : expressionToString(expr),
		alias: column.alias,
		function: expr.type === 'function' ? expr.name : undefined,
		tableAlias: expr.type === 'column' ? expr.table : undefined,
		expression,
		distinct: expr.type === 'function' && expr.distinct === true,
		hasAggregate: exprHasAggregate(expression),
	};
}

function buildExpr(expr: AST.Expression): PlanExpr {
	switch (expr.type) {
		case 'literal':
			return { kind: 'literal', valueType: classifyLiteral(expr), value: expr.value };

		case 'column':
			return { kind: 'column', name: expr.name, table: expr.table };

		case 'function':
			return buildFunction(expr);

		case 'binary':
			return { kind: 'arith', op: expr.operator, left: buildExpr(expr.left), right: buildExpr(expr.right) };

		case 'unary': {
			const inner = buildExpr(expr.expr);
			return expr.operator === '-' ? { kind: 'negate', expr: inner } : inner;
		}

		case 'case':
			if (expr.form === 'simple') {
				return {
					kind: 'case',
					form: 'simple',
					subject: buildExpr(expr.subject),
					whens: expr.whenClauses.map(clause => ({ when: buildExpr(clause.when), then: buildExpr(clause.then) })),
					elseExpr: expr.elseExpr ? buildExpr(expr.elseExpr) : undefined,
				};
			}
			return {
				kind: 'case',
				form: 'searched',
				whens: expr.whenClauses.map(clause => ({ when: buildCondition(clause.when), then: buildExpr(clause.then) })),
				elseExpr: expr.elseExpr ? buildExpr(expr.elseExpr) : undefined,
			};

		default:
			return unclassifiable(expr, 'expression');
	}
}

function buildFunction(expr: AST.FunctionExpr): PlanExpr {
	const name = expr.name.toLowerCase();
	const aggregate = aggregateNames.includes(name);
	const args = expr.args.map(buildExpr);

	if (aggregate) {
		if (expr.star ? args.length !== 0 : args.length !== 1) {
			semanticError(`${name.toUpperCase()}() takes exactly one argument`, StatusCode.ERROR, expr);
		}
		if (args.some(exprHasAggregate)) {
			semanticError(`Aggregate function calls cannot be nested in ${name.toUpperCase()}()`, StatusCode.ERROR, expr);
		}
	} else {
		if (expr.star || expr.distinct) {
			semanticError(`${name.toUpperCase()}() is not an aggregate function`, StatusCode.ERROR, expr);
		}
		// Unknown names are left for the executor to report
		const schema = getScalarFunction(name);
		if (schema && !acceptsArgCount(schema, args.length)) {
			semanticError(`Wrong number of arguments to ${name.toUpperCase()}(): ${args.length}`, StatusCode.ERROR, expr);
		}
	}

	return {
		kind: 'function',
		name,
		aggregate,
		args,
		star: expr.star === true,
		distinct: expr.distinct === true,
		text: expressionToString(expr),
	};
}

function buildCondition(cond: AST.Condition): PlanCondition {
	switch (cond.type) {
		case 'logical':
			return {
				kind: 'logical',
				op: cond.operator === 'AND' ? 'and' : 'or',
				left: buildCondition(cond.left),
				right: buildCondition(cond.right),
			};

		case 'not':
			return { kind: 'not', condition: buildCondition(cond.condition) };

		case 'comparison':
			return buildComparison(cond);

		default:
			return unclassifiable(cond, 'condition');
	}
}

function buildComparison(cond: AST.ComparisonCondition): PlanCondition {
	const left = buildExpr(cond.left);
	const op = cond.operator;
	const right = cond.right;

	if (op === 'is_null' || op === 'is_not_null') {
		return { kind: 'compare', left, op };
	}
	if (!right) {
		return semanticError(`Comparison '${op}' has no right-hand operand`, StatusCode.INTERNAL, cond);
	}
	if ((op === 'between' || op === 'not_between') && (right.kind !== 'list' || right.items.length !== 2)) {
		semanticError('BETWEEN requires a lower and an upper bound', StatusCode.INTERNAL, cond);
	}
	if ((op === 'in' || op === 'not_in') && right.kind === 'scalar') {
		semanticError('IN requires a list or a subquery', StatusCode.INTERNAL, cond);
	}

	return { kind: 'compare', left, op, right: classifyOperand(right) };
}

function classifyOperand(operand: AST.ComparisonOperand): PlanOperand {
	switch (operand.kind) {
		case 'list':
			return { valueType: 'list', items: operand.items.map(buildExpr) };
		case 'subquery':
			return { valueType: 'subquery', plan: buildSelectPlan(operand.query) };
		case 'scalar': {
			const expr = operand.expr;
			if (expr.type !== 'literal') {
				return { valueType: 'expression', expr: buildExpr(expr) };
			}
			const value = expr.value;
			if (value === null) return { valueType: 'null', value };
			if (typeof value === 'string') return { valueType: 'string', value };
			if (typeof value === 'boolean') return { valueType: 'boolean', value };
			return { valueType: classifyLiteral(expr) === 'float' ? 'float' : 'integer', value };
		}
	}
}

function classifyLiteral(expr: AST.LiteralExpr): LiteralValueType {
	const value = expr.value;
	if (value === null) return 'null';
	if (typeof value === 'string') return 'string';
	if (typeof value === 'boolean') return 'boolean';
	// 2.0 is written as a float even though its value is integral
	if (expr.lexeme !== undefined ? expr.lexeme.includes('.') : !Number.isInteger(value)) return 'float';
	return 'integer';
}

function unclassifiable(node: never, what: string): never {
	const described: unknown = node;
	const type = typeof described === 'object' && described !== null && 'type' in described ? String(described.type) : typeof described;
	return semanticError(`Cannot classify ${what} node of type '${type}'`, StatusCode.INTERNAL);
}

function deepFreeze<T>(value: T): T {
	if (typeof value === 'object' && value !== null && !Object.isFrozen(value)) {
		for (const child of Object.values(value)) {
			deepFreeze(child);
		}
		Object.freeze(value);
	}
	return value;
}
