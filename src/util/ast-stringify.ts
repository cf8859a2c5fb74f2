/**
 * Renders AST expressions and conditions back into SQL text.
 * The result names computed output columns, so it is stable and compact:
 * lowercase keywords and function names, single spaces around operators,
 * parentheses only where precedence needs them.
 */
import type * as AST from '../parser/ast.js';

const COMPARISON_SYMBOLS: Record<'eq' | 'ne' | 'lt' | 'gt' | 'le' | 'ge', string> = {
	eq: '=',
	ne: '!=',
	lt: '<',
	gt: '>',
	le: '<=',
	ge: '>=',
};

export function expressionToString(expr: AST.Expression): string {
	switch (expr.type) {
		case 'literal':
			// Prefer original lexeme for numbers so 2.0 stays 2.0
			if (typeof expr.value === 'number') return expr.lexeme ?? String(expr.value);
			if (expr.value === null) return 'null';
			if (typeof expr.value === 'string') return `'${expr.value}'`;
			return expr.value ? 'true' : 'false';

		case 'column':
			return expr.table ? `${expr.table}.${expr.name}` : expr.name;

		case 'binary': {
			const leftStr = needsParens(expr.left, expr.operator, 'left')
				? `(${expressionToString(expr.left)})`
				: expressionToString(expr.left);
			const rightStr = needsParens(expr.right, expr.operator, 'right')
				? `(${expressionToString(expr.right)})`
				: expressionToString(expr.right);
			return `${leftStr} ${expr.operator} ${rightStr}`;
		}

		case 'unary': {
			const exprStr = expr.expr.type === 'binary'
				? `(${expressionToString(expr.expr)})`
				: expressionToString(expr.expr);
			return `${expr.operator}${exprStr}`;
		}

		case 'function': {
			if (expr.star) {
				return `${expr.name}(*)`;
			}
			const argsStr = expr.args.map(arg => expressionToString(arg)).join(', ');
			return `${expr.name}(${expr.distinct ? 'distinct ' : ''}${argsStr})`;
		}

		case 'case': {
			let caseStr = 'case';
			if (expr.form === 'simple') {
				caseStr += ` ${expressionToString(expr.subject)}`;
				for (const clause of expr.whenClauses) {
					caseStr += ` when ${expressionToString(clause.when)} then ${expressionToString(clause.then)}`;
				}
			} else {
				for (const clause of expr.whenClauses) {
					caseStr += ` when ${conditionToString(clause.when)} then ${expressionToString(clause.then)}`;
				}
			}
			if (expr.elseExpr) {
				caseStr += ` else ${expressionToString(expr.elseExpr)}`;
			}
			return `${caseStr} end`;
		}
	}
}

export function conditionToString(cond: AST.Condition): string {
	switch (cond.type) {
		case 'logical': {
			const op = cond.operator === 'AND' ? 'and' : 'or';
			// OR under AND needs grouping to read back the same way
			const wrap = (side: AST.Condition): string =>
				side.type === 'logical' && op === 'and' && side.operator === 'OR'
					? `(${conditionToString(side)})`
					: conditionToString(side);
			return `${wrap(cond.left)} ${op} ${wrap(cond.right)}`;
		}
		case 'not':
			return `not (${conditionToString(cond.condition)})`;
		case 'comparison':
			return comparisonToString(cond);
	}
}

function comparisonToString(cond: AST.ComparisonCondition): string {
	const left = expressionToString(cond.left);
	const right = cond.right;
	switch (cond.operator) {
		case 'is_null':
			return `${left} is null`;
		case 'is_not_null':
			return `${left} is not null`;
		case 'between':
		case 'not_between': {
			const items = right?.kind === 'list' ? right.items.map(expressionToString) : [];
			const keyword = cond.operator === 'between' ? 'between' : 'not between';
			return `${left} ${keyword} ${items[0] ?? ''} and ${items[1] ?? ''}`;
		}
		case 'in':
		case 'not_in':
			return `${left} ${cond.operator === 'in' ? 'in' : 'not in'} ${operandToString(right)}`;
		case 'like':
		case 'not_like':
			return `${left} ${cond.operator === 'like' ? 'like' : 'not like'} ${operandToString(right)}`;
		default:
			return `${left} ${COMPARISON_SYMBOLS[cond.operator]} ${operandToString(right)}`;
	}
}

function operandToString(operand: AST.ComparisonOperand | undefined): string {
	if (!operand) return '';
	switch (operand.kind) {
		case 'scalar':
			return expressionToString(operand.expr);
		case 'list':
			return `(${operand.items.map(expressionToString).join(', ')})`;
		case 'subquery':
			return '(select ...)';
	}
}

const PRECEDENCE: Record<AST.ArithmeticOperator, number> = {
	'+': 1,
	'-': 1,
	'*': 2,
	'/': 2,
	'%': 2,
};

// Helper to determine if parentheses are needed for binary operations
function needsParens(expr: AST.Expression, parentOp: AST.ArithmeticOperator, side: 'left' | 'right'): boolean {
	if (expr.type !== 'binary') return false;
	const childPrec = PRECEDENCE[expr.operator];
	const parentPrec = PRECEDENCE[parentOp];
	if (childPrec !== parentPrec) return childPrec < parentPrec;
	// Same level: the right side regroups, the left reads back naturally
	return side === 'right';
}
