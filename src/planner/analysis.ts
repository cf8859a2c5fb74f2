import type { ColumnPlanExpr, PlanCondition, PlanExpr } from './plan.js';

/** Whether an aggregate call appears anywhere in the expression. */
export function exprHasAggregate(expr: PlanExpr): boolean {
	switch (expr.kind) {
		case 'literal':
		case 'column':
			return false;
		case 'function':
			return expr.aggregate || expr.args.some(exprHasAggregate);
		case 'arith':
			return exprHasAggregate(expr.left) || exprHasAggregate(expr.right);
		case 'negate':
			return exprHasAggregate(expr.expr);
		case 'case':
			if (expr.elseExpr && exprHasAggregate(expr.elseExpr)) return true;
			if (expr.form === 'simple') {
				return exprHasAggregate(expr.subject) ||
					expr.whens.some(w => exprHasAggregate(w.when) || exprHasAggregate(w.then));
			}
			return expr.whens.some(w => conditionHasAggregate(w.when) || exprHasAggregate(w.then));
	}
}

export function conditionHasAggregate(cond: PlanCondition): boolean {
	switch (cond.kind) {
		case 'logical':
			return conditionHasAggregate(cond.left) || conditionHasAggregate(cond.right);
		case 'not':
			return conditionHasAggregate(cond.condition);
		case 'compare': {
			if (exprHasAggregate(cond.left)) return true;
			const right = cond.right;
			if (!right) return false;
			if (right.valueType === 'list') return right.items.some(exprHasAggregate);
			if (right.valueType === 'expression') return exprHasAggregate(right.expr);
			return false;
		}
	}
}

/**
 * Column references in an expression, in reading order.
 * References inside aggregate arguments are skipped.
 */
export function columnRefs(expr: PlanExpr): ColumnPlanExpr[] {
	const refs: ColumnPlanExpr[] = [];
	const visitExpr = (e: PlanExpr): void => {
		switch (e.kind) {
			case 'literal':
				return;
			case 'column':
				refs.push(e);
				return;
			case 'function':
				if (!e.aggregate) e.args.forEach(visitExpr);
				return;
			case 'arith':
				visitExpr(e.left);
				visitExpr(e.right);
				return;
			case 'negate':
				visitExpr(e.expr);
				return;
			case 'case':
				if (e.form === 'simple') {
					visitExpr(e.subject);
					e.whens.forEach(w => { visitExpr(w.when); visitExpr(w.then); });
				} else {
					e.whens.forEach(w => { visitCondition(w.when); visitExpr(w.then); });
				}
				if (e.elseExpr) visitExpr(e.elseExpr);
				return;
		}
	};
	const visitCondition = (c: PlanCondition): void => {
		switch (c.kind) {
			case 'logical':
				visitCondition(c.left);
				visitCondition(c.right);
				return;
			case 'not':
				visitCondition(c.condition);
				return;
			case 'compare':
				visitExpr(c.left);
				if (c.right?.valueType === 'list') c.right.items.forEach(visitExpr);
				if (c.right?.valueType === 'expression') visitExpr(c.right.expr);
				return;
		}
	};
	visitExpr(expr);
	return refs;
}
