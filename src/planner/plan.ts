import type { SqlValue } from '../common/types.js';
import type { ArithmeticOperator, ComparisonOperator, JoinType } from '../parser/ast.js';

/**
 * The canonical, syntax-free form of a query. Produced by generate() and
 * consumed only by the executor. Every Plan is deeply frozen.
 */

export type LiteralValueType = 'integer' | 'float' | 'string' | 'boolean' | 'null';

export interface LiteralPlanExpr {
	kind: 'literal';
	valueType: LiteralValueType;
	value: SqlValue;
}

export interface ColumnPlanExpr {
	kind: 'column';
	name: string;
	table?: string;
}

export interface FunctionPlanExpr {
	kind: 'function';
	name: string;
	/** One of count, sum, avg, max, min */
	aggregate: boolean;
	args: PlanExpr[];
	/** COUNT(*) */
	star: boolean;
	distinct: boolean;
	/** Rendered call text, e.g. count(*) or avg(age) */
	text: string;
}

export interface ArithPlanExpr {
	kind: 'arith';
	op: ArithmeticOperator;
	left: PlanExpr;
	right: PlanExpr;
}

export interface NegatePlanExpr {
	kind: 'negate';
	expr: PlanExpr;
}

export interface SimpleCasePlanExpr {
	kind: 'case';
	form: 'simple';
	subject: PlanExpr;
	whens: { when: PlanExpr; then: PlanExpr }[];
	elseExpr?: PlanExpr;
}

export interface SearchedCasePlanExpr {
	kind: 'case';
	form: 'searched';
	whens: { when: PlanCondition; then: PlanExpr }[];
	elseExpr?: PlanExpr;
}

export type PlanExpr =
	| LiteralPlanExpr
	| ColumnPlanExpr
	| FunctionPlanExpr
	| ArithPlanExpr
	| NegatePlanExpr
	| SimpleCasePlanExpr
	| SearchedCasePlanExpr;

/** Right-hand side of a comparison, classified by what it holds. */
export type PlanOperand =
	| { valueType: 'integer' | 'float'; value: number }
	| { valueType: 'string'; value: string }
	| { valueType: 'boolean'; value: boolean }
	| { valueType: 'null'; value: null }
	| { valueType: 'list'; items: PlanExpr[] }
	| { valueType: 'subquery'; plan: Plan }
	| { valueType: 'expression'; expr: PlanExpr };

export type PlanCondition =
	| { kind: 'logical'; op: 'and' | 'or'; left: PlanCondition; right: PlanCondition }
	| { kind: 'not'; condition: PlanCondition }
	| { kind: 'compare'; left: PlanExpr; op: ComparisonOperator; right?: PlanOperand };

/** `*` or `t.*` */
export interface PlanStarColumn {
	kind: 'all';
	table?: string;
}

/** A flattened select-list item. */
export interface PlanValueColumn {
	kind: 'column';
	/** Column name for a plain reference, else the rendered expression */
	name: string;
	alias?: string;
	/** Outermost function name when the item is a call */
	function?: string;
	/** Qualifier of a plain column reference */
	tableAlias?: string;
	expression: PlanExpr;
	/** DISTINCT inside an aggregate call */
	distinct: boolean;
	/** Whether an aggregate appears anywhere in the expression */
	hasAggregate: boolean;
}

export type PlanColumn = PlanStarColumn | PlanValueColumn;

export interface PlanJoin {
	joinType: JoinType;
	table: string;
	alias?: string;
	condition?: PlanCondition;
}

export interface PlanOrderKey {
	expr: PlanExpr;
	/** Rendered expression, matched against output column names */
	name: string;
	direction: 'asc' | 'desc';
}

export interface PlanSetOperation {
	op: 'union' | 'intersect' | 'except';
	all: boolean;
	plan: Plan;
}

export interface Plan {
	source: { table: string; alias?: string };
	joins: PlanJoin[];
	columns: PlanColumn[];
	where?: PlanCondition;
	groupBy: ColumnPlanExpr[];
	having?: PlanCondition;
	orderBy: PlanOrderKey[];
	limit?: { count: number; offset: number };
	distinct: boolean;
	/** GROUP BY present, or an aggregate in the select list or HAVING */
	aggregate: boolean;
	setOperations: PlanSetOperation[];
}
