import type { SqlValue } from '../common/types.js';

/**
 * SQL Abstract Syntax Tree (AST) definitions
 * These interfaces define the structure of a parsed SELECT query
 */

// Base for all AST nodes
export interface AstNode {
	type: 'literal' | 'column' | 'function' | 'case' | 'binary' | 'unary'
		| 'logical' | 'not' | 'comparison' | 'select';
	loc?: {
		start: { line: number, column: number, offset: number };
		end: { line: number, column: number, offset: number };
	};
}

// Expression types
export type Expression = LiteralExpr | ColumnExpr | FunctionExpr | CaseExpr | BinaryExpr | UnaryExpr;

// Literal value expression (number, string, boolean, null)
export interface LiteralExpr extends AstNode {
	type: 'literal';
	value: SqlValue;
	lexeme?: string; // Original text, e.g. '2.0' for a float
}

// Column reference expression
export interface ColumnExpr extends AstNode {
	type: 'column';
	name: string;
	table?: string;  // Optional table qualifier
}

export const AGGREGATE_FUNCTIONS = ['count', 'sum', 'avg', 'max', 'min'] as const;
export type AggregateFunctionName = typeof AGGREGATE_FUNCTIONS[number];

// Function call expression (aggregate or scalar)
export interface FunctionExpr extends AstNode {
	type: 'function';
	name: string;     // Lowercased
	args: Expression[];
	star?: boolean;   // COUNT(*)
	distinct?: boolean; // COUNT(DISTINCT col)
}

export interface SimpleCaseExpr extends AstNode {
	type: 'case';
	form: 'simple';
	subject: Expression;
	whenClauses: { when: Expression; then: Expression }[];
	elseExpr?: Expression;
}

export interface SearchedCaseExpr extends AstNode {
	type: 'case';
	form: 'searched';
	whenClauses: { when: Condition; then: Expression }[];
	elseExpr?: Expression;
}

export type CaseExpr = SimpleCaseExpr | SearchedCaseExpr;

export type ArithmeticOperator = '+' | '-' | '*' | '/' | '%';

// Arithmetic between two expressions
export interface BinaryExpr extends AstNode {
	type: 'binary';
	operator: ArithmeticOperator;
	left: Expression;
	right: Expression;
}

// Unary minus / plus
export interface UnaryExpr extends AstNode {
	type: 'unary';
	operator: '-' | '+';
	expr: Expression;
}

// --- Conditions ---

export type Condition = LogicalCondition | NotCondition | ComparisonCondition;

export interface LogicalCondition extends AstNode {
	type: 'logical';
	operator: 'AND' | 'OR';
	left: Condition;
	right: Condition;
}

// NOT applied to a parenthesized condition
export interface NotCondition extends AstNode {
	type: 'not';
	condition: Condition;
}

export type ComparisonOperator =
	| 'eq' | 'ne' | 'lt' | 'gt' | 'le' | 'ge'
	| 'in' | 'not_in'
	| 'like' | 'not_like'
	| 'between' | 'not_between'
	| 'is_null' | 'is_not_null';

export type ComparisonOperand =
	| { kind: 'scalar'; expr: Expression }
	| { kind: 'list'; items: Expression[] }
	| { kind: 'subquery'; query: SelectStmt };

// Leaf comparison; right is absent for IS [NOT] NULL
export interface ComparisonCondition extends AstNode {
	type: 'comparison';
	left: Expression;
	operator: ComparisonOperator;
	right?: ComparisonOperand;
}

// --- Statement ---

export type ResultColumn =
	| { type: 'all'; table?: string }
	| { type: 'column'; expr: Expression; alias?: string };

export type JoinType = 'inner' | 'left' | 'right' | 'full' | 'cross';

export interface JoinClause {
	joinType: JoinType;
	table: string;
	alias?: string;
	condition?: Condition; // Never present on cross joins
}

export interface FromClause {
	table: string;
	alias?: string;
	joins: JoinClause[];
}

export interface OrderByClause {
	expr: Expression;
	direction: 'asc' | 'desc';
}

export interface LimitClause {
	count: number;
	offset: number;
}

export interface SetOperation {
	op: 'union' | 'intersect' | 'except';
	all: boolean;
	select: SelectStmt;
}

// SELECT statement
export interface SelectStmt extends AstNode {
	type: 'select';
	columns: ResultColumn[];
	from: FromClause;
	where?: Condition;
	groupBy?: Expression[];
	having?: Condition;
	orderBy?: OrderByClause[];
	limit?: LimitClause;
	distinct: boolean;
	setOperations: SetOperation[];
}
