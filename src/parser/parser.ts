import { createLogger } from '../common/logger.js';
import { ParseError } from '../common/errors.js';
import { type Token, TokenType } from './lexer.js';
import * as AST from './ast.js';

const log = createLogger('parser');

export { ParseError };

// Helper function to create the location object
function _createLoc(startToken: Token, endToken: Token): AST.AstNode['loc'] {
	return {
		start: {
			line: startToken.startLine,
			column: startToken.startColumn,
			offset: startToken.startOffset,
		},
		end: {
			line: endToken.endLine,
			column: endToken.endColumn,
			offset: endToken.endOffset,
		},
	};
}

const NEGATED_OPERATORS: Partial<Record<AST.ComparisonOperator, AST.ComparisonOperator>> = {
	eq: 'ne',
	ne: 'eq',
	in: 'not_in',
	not_in: 'in',
	like: 'not_like',
	not_like: 'like',
	between: 'not_between',
	not_between: 'between',
	is_null: 'is_not_null',
	is_not_null: 'is_null',
};

const RELATIONAL_OPERATORS: Partial<Record<TokenType, AST.ComparisonOperator>> = {
	[TokenType.EQUAL]: 'eq',
	[TokenType.NOT_EQUAL]: 'ne',
	[TokenType.LESS]: 'lt',
	[TokenType.GREATER]: 'gt',
	[TokenType.LESS_EQUAL]: 'le',
	[TokenType.GREATER_EQUAL]: 'ge',
};

const AGGREGATE_TOKENS = [TokenType.COUNT, TokenType.SUM, TokenType.AVG, TokenType.MAX, TokenType.MIN];

/**
 * Recursive descent parser for a single SELECT query, with one token of lookahead.
 */
export class Parser {
	private tokens: Token[] = [];
	private current = 0;

	/**
	 * Initialize the parser with a token stream
	 * @param tokens Tokens as produced by the lexer, ending in EOF
	 * @returns this parser instance for chaining
	 */
	initialize(tokens: Token[]): Parser {
		this.tokens = tokens;
		this.current = 0;
		if (tokens.length === 0 || tokens[tokens.length - 1].type !== TokenType.EOF) {
			this.tokens = [...tokens, this.syntheticEof()];
		}
		return this;
	}

	/**
	 * Parse the token stream as exactly one SELECT query.
	 * A trailing semicolon is allowed; anything after it is not.
	 */
	parse(): AST.SelectStmt {
		const startToken = this.peek();
		if (this.check(TokenType.INSERT) || this.check(TokenType.UPDATE) || this.check(TokenType.DELETE)) {
			throw this.error(startToken, 'SELECT', `Only SELECT queries are supported, found '${startToken.lexeme}'`);
		}

		const select = this.selectStatement();

		this.match(TokenType.SEMICOLON);
		if (!this.isAtEnd()) {
			throw this.error(this.peek(), 'end of query');
		}

		log('Parsed SELECT with %d columns and %d set operations', select.columns.length, select.setOperations.length);
		return select;
	}

	/**
	 * Parse a SELECT followed by any chain of UNION / INTERSECT / EXCEPT branches.
	 * Branches are collected left to right onto the first SELECT.
	 */
	selectStatement(): AST.SelectStmt {
		const startToken = this.consume(TokenType.SELECT, "'SELECT'");
		const first = this.selectCore(startToken);

		while (this.match(TokenType.UNION, TokenType.INTERSECT, TokenType.EXCEPT)) {
			const tok = this.previous();
			const op = tok.type === TokenType.UNION ? 'union' : tok.type === TokenType.INTERSECT ? 'intersect' : 'except';
			const all = this.match(TokenType.ALL);

			let select: AST.SelectStmt;
			if (this.match(TokenType.LPAREN)) {
				const selectToken = this.consume(TokenType.SELECT, "'SELECT' in parenthesized set operation");
				select = this.selectCore(selectToken);
				this.consume(TokenType.RPAREN, "')' after parenthesized set operation");
			} else {
				const selectToken = this.consume(TokenType.SELECT, `'SELECT' or '(' after ${tok.lexeme.toUpperCase()}`);
				select = this.selectCore(selectToken);
			}

			first.setOperations.push({ op, all, select });
		}

		return first;
	}

	/**
	 * Parse one SELECT body, the SELECT keyword having been consumed.
	 */
	private selectCore(startToken: Token): AST.SelectStmt {
		const distinct = this.match(TokenType.DISTINCT);
		if (!distinct) this.match(TokenType.ALL);

		const columns = this.columnList();

		this.consume(TokenType.FROM, "'FROM'");
		const from = this.fromClause();

		let where: AST.Condition | undefined;
		if (this.match(TokenType.WHERE)) {
			where = this.condition();
		}

		let groupBy: AST.Expression[] | undefined;
		if (this.match(TokenType.GROUP)) {
			this.consume(TokenType.BY, "'BY' after 'GROUP'");
			groupBy = [];
			do {
				groupBy.push(this.expression());
			} while (this.match(TokenType.COMMA));
		}

		let having: AST.Condition | undefined;
		if (this.match(TokenType.HAVING)) {
			having = this.condition();
		}

		let orderBy: AST.OrderByClause[] | undefined;
		if (this.match(TokenType.ORDER)) {
			this.consume(TokenType.BY, "'BY' after 'ORDER'");
			orderBy = [];
			do {
				const expr = this.expression();
				let direction: AST.OrderByClause['direction'] = 'asc';
				if (this.match(TokenType.DESC)) {
					direction = 'desc';
				} else {
					this.match(TokenType.ASC);
				}
				orderBy.push({ expr, direction });
			} while (this.match(TokenType.COMMA));
		}

		let limit: AST.LimitClause | undefined;
		if (this.match(TokenType.LIMIT)) {
			const count = this.integerLiteral('row count after LIMIT');
			const offset = this.match(TokenType.OFFSET) ? this.integerLiteral('row count after OFFSET') : 0;
			limit = { count, offset };
		}

		return {
			type: 'select',
			columns,
			from,
			where,
			groupBy,
			having,
			orderBy,
			limit,
			distinct,
			setOperations: [],
			loc: _createLoc(startToken, this.previous()),
		};
	}

	/**
	 * Parse a comma-separated list of result columns for SELECT
	 */
	private columnList(): AST.ResultColumn[] {
		const columns: AST.ResultColumn[] = [];

		do {
			// Handle wildcard: * or table.*
			if (this.match(TokenType.ASTERISK)) {
				columns.push({ type: 'all' });
			} else if (this.check(TokenType.IDENTIFIER) && this.checkNext(1, TokenType.DOT) && this.checkNext(2, TokenType.ASTERISK)) {
				const table = this.advance().lexeme;
				this.advance(); // consume DOT
				this.advance(); // consume ASTERISK
				columns.push({ type: 'all', table });
			} else {
				const expr = this.expression();
				let alias: string | undefined;

				if (this.match(TokenType.AS)) {
					if (!this.check(TokenType.IDENTIFIER) && !this.check(TokenType.STRING)) {
						throw this.error(this.peek(), "alias after 'AS'");
					}
					const aliasToken = this.advance();
					alias = aliasToken.type === TokenType.STRING ? String(aliasToken.literal) : aliasToken.lexeme;
				} else if (this.check(TokenType.IDENTIFIER)) {
					// Implicit alias; clause words are keywords so cannot land here
					alias = this.advance().lexeme;
				}

				columns.push({ type: 'column', expr, alias });
			}
		} while (this.match(TokenType.COMMA));

		return columns;
	}

	private fromClause(): AST.FromClause {
		const table = this.consume(TokenType.IDENTIFIER, 'table name').lexeme;
		const alias = this.tableAlias();

		const joins: AST.JoinClause[] = [];
		while (this.isJoinToken()) {
			joins.push(this.joinClause());
		}

		return { table, alias, joins };
	}

	private tableAlias(): string | undefined {
		if (this.match(TokenType.AS)) {
			return this.consume(TokenType.IDENTIFIER, "alias after 'AS'").lexeme;
		}
		if (this.check(TokenType.IDENTIFIER)) {
			return this.advance().lexeme;
		}
		return undefined;
	}

	/**
	 * Parse a JOIN clause
	 */
	private joinClause(): AST.JoinClause {
		let joinType: AST.JoinType = 'inner';

		if (this.match(TokenType.LEFT)) {
			this.match(TokenType.OUTER); // optional
			joinType = 'left';
		} else if (this.match(TokenType.RIGHT)) {
			this.match(TokenType.OUTER); // optional
			joinType = 'right';
		} else if (this.match(TokenType.FULL)) {
			this.match(TokenType.OUTER); // optional
			joinType = 'full';
		} else if (this.match(TokenType.CROSS)) {
			joinType = 'cross';
		} else {
			this.match(TokenType.INNER);
		}

		this.consume(TokenType.JOIN, "'JOIN'");

		const table = this.consume(TokenType.IDENTIFIER, 'table name after JOIN').lexeme;
		const alias = this.tableAlias();

		if (joinType === 'cross') {
			if (this.check(TokenType.ON)) {
				throw this.error(this.peek(), 'no ON condition', 'CROSS JOIN does not take an ON condition');
			}
			return { joinType, table, alias };
		}

		this.consume(TokenType.ON, "'ON' after joined table");
		const condition = this.condition();
		return { joinType, table, alias, condition };
	}

	// --- Conditions ---

	/**
	 * Parse a boolean condition; OR binds loosest.
	 */
	private condition(): AST.Condition {
		const startToken = this.peek();
		let cond = this.andCondition();

		while (this.match(TokenType.OR)) {
			const right = this.andCondition();
			cond = { type: 'logical', operator: 'OR', left: cond, right, loc: _createLoc(startToken, this.previous()) };
		}

		return cond;
	}

	private andCondition(): AST.Condition {
		const startToken = this.peek();
		let cond = this.notCondition();

		while (this.match(TokenType.AND)) {
			const right = this.notCondition();
			cond = { type: 'logical', operator: 'AND', left: cond, right, loc: _createLoc(startToken, this.previous()) };
		}

		return cond;
	}

	/**
	 * Unary NOT. In front of a comparison it folds into the negated operator where one exists.
	 */
	private notCondition(): AST.Condition {
		const startToken = this.peek();
		if (this.match(TokenType.NOT)) {
			const inner = this.notCondition();
			if (inner.type === 'comparison') {
				const negated = NEGATED_OPERATORS[inner.operator];
				if (negated) {
					return { ...inner, operator: negated, loc: _createLoc(startToken, this.previous()) };
				}
			}
			return { type: 'not', condition: inner, loc: _createLoc(startToken, this.previous()) };
		}
		return this.primaryCondition();
	}

	private primaryCondition(): AST.Condition {
		// A parenthesis may open a nested condition or an arithmetic operand such as (a + b) > 3
		if (this.check(TokenType.LPAREN) && !this.checkNext(1, TokenType.SELECT)) {
			const saved = this.current;
			try {
				this.advance();
				const inner = this.condition();
				this.consume(TokenType.RPAREN, "')' after condition");
				if (!this.isOperatorToken()) {
					return inner;
				}
			} catch (e) {
				if (!(e instanceof ParseError)) throw e;
				log('Parenthesized group at offset %d is not a condition, reparsing as expression', this.tokens[saved].startOffset);
			}
			this.current = saved;
		}
		return this.comparison();
	}

	private comparison(): AST.ComparisonCondition {
		const startToken = this.peek();
		const left = this.expression();

		const negated = this.match(TokenType.NOT);

		if (this.match(TokenType.IN)) {
			this.consume(TokenType.LPAREN, "'(' after IN");
			let right: AST.ComparisonOperand;
			if (this.check(TokenType.SELECT)) {
				right = { kind: 'subquery', query: this.selectStatement() };
			} else {
				const items: AST.Expression[] = [];
				do {
					items.push(this.expression());
				} while (this.match(TokenType.COMMA));
				right = { kind: 'list', items };
			}
			this.consume(TokenType.RPAREN, "')' after IN list");
			return this.leaf(startToken, left, negated ? 'not_in' : 'in', right);
		}

		if (this.match(TokenType.LIKE)) {
			const pattern = this.expression();
			return this.leaf(startToken, left, negated ? 'not_like' : 'like', { kind: 'scalar', expr: pattern });
		}

		if (this.match(TokenType.BETWEEN)) {
			const low = this.expression();
			this.consume(TokenType.AND, "'AND' in BETWEEN");
			const high = this.expression();
			return this.leaf(startToken, left, negated ? 'not_between' : 'between', { kind: 'list', items: [low, high] });
		}

		if (negated) {
			throw this.error(this.peek(), "IN, LIKE or BETWEEN after 'NOT'");
		}

		if (this.match(TokenType.IS)) {
			const isNot = this.match(TokenType.NOT);
			this.consume(TokenType.NULL, isNot ? "'NULL' after 'IS NOT'" : "'NULL' after 'IS'");
			return this.leaf(startToken, left, isNot ? 'is_not_null' : 'is_null');
		}

		const operator = RELATIONAL_OPERATORS[this.peek().type];
		if (operator) {
			this.advance();
			if (this.check(TokenType.LPAREN) && this.checkNext(1, TokenType.SELECT)) {
				this.advance();
				const query = this.selectStatement();
				this.consume(TokenType.RPAREN, "')' after subquery");
				return this.leaf(startToken, left, operator, { kind: 'subquery', query });
			}
			return this.leaf(startToken, left, operator, { kind: 'scalar', expr: this.expression() });
		}

		throw this.error(this.peek(), 'comparison operator');
	}

	private leaf(startToken: Token, left: AST.Expression, operator: AST.ComparisonOperator, right?: AST.ComparisonOperand): AST.ComparisonCondition {
		return { type: 'comparison', left, operator, right, loc: _createLoc(startToken, this.previous()) };
	}

	// --- Expressions ---

	/**
	 * Parse an arithmetic expression
	 */
	private expression(): AST.Expression {
		return this.term();
	}

	/**
	 * Parse addition and subtraction
	 */
	private term(): AST.Expression {
		const startToken = this.peek();
		let expr = this.factor();

		while (this.match(TokenType.PLUS, TokenType.MINUS)) {
			const operator = this.previous().type === TokenType.PLUS ? '+' : '-';
			const right = this.factor();
			expr = { type: 'binary', operator, left: expr, right, loc: _createLoc(startToken, this.previous()) };
		}

		return expr;
	}

	/**
	 * Parse multiplication, division and modulo
	 */
	private factor(): AST.Expression {
		const startToken = this.peek();
		let expr = this.unary();

		while (this.match(TokenType.ASTERISK, TokenType.SLASH, TokenType.PERCENT)) {
			const opType = this.previous().type;
			const operator = opType === TokenType.ASTERISK ? '*' : opType === TokenType.SLASH ? '/' : '%';
			const right = this.unary();
			expr = { type: 'binary', operator, left: expr, right, loc: _createLoc(startToken, this.previous()) };
		}

		return expr;
	}

	private unary(): AST.Expression {
		if (this.match(TokenType.MINUS, TokenType.PLUS)) {
			const operatorToken = this.previous();
			const operand = this.unary();
			const operator = operatorToken.type === TokenType.MINUS ? '-' : '+';
			// Fold a sign straight into a numeric literal
			if (operand.type === 'literal' && typeof operand.value === 'number') {
				return {
					...operand,
					value: operator === '-' ? -operand.value : operand.value,
					lexeme: operand.lexeme !== undefined && operator === '-' ? `-${operand.lexeme}` : operand.lexeme,
					loc: _createLoc(operatorToken, this.previous()),
				};
			}
			return { type: 'unary', operator, expr: operand, loc: _createLoc(operatorToken, this.previous()) };
		}
		return this.primary();
	}

	/**
	 * Parse primary expressions (literals, columns, function calls, CASE, parentheses)
	 */
	private primary(): AST.Expression {
		const startToken = this.peek();

		if (this.match(TokenType.CASE)) {
			return this.caseExpression(startToken);
		}

		if (this.match(TokenType.INTEGER, TokenType.FLOAT, TokenType.STRING)) {
			const token = this.previous();
			return { type: 'literal', value: token.literal ?? null, lexeme: token.lexeme, loc: _createLoc(token, token) };
		}
		if (this.match(TokenType.NULL)) {
			return { type: 'literal', value: null, loc: _createLoc(startToken, startToken) };
		}
		if (this.match(TokenType.TRUE, TokenType.FALSE)) {
			return { type: 'literal', value: startToken.type === TokenType.TRUE, loc: _createLoc(startToken, startToken) };
		}

		if (AGGREGATE_TOKENS.includes(startToken.type) && this.checkNext(1, TokenType.LPAREN)) {
			this.advance();
			return this.aggregateCall(startToken);
		}

		if (this.check(TokenType.IDENTIFIER)) {
			if (this.checkNext(1, TokenType.LPAREN)) {
				this.advance();
				return this.functionCall(startToken);
			}
			const first = this.advance().lexeme;
			if (this.match(TokenType.DOT)) {
				const name = this.consume(TokenType.IDENTIFIER, "column name after '.'").lexeme;
				return { type: 'column', table: first, name, loc: _createLoc(startToken, this.previous()) };
			}
			return { type: 'column', name: first, loc: _createLoc(startToken, startToken) };
		}

		if (this.match(TokenType.LPAREN)) {
			const expr = this.expression();
			this.consume(TokenType.RPAREN, "')' after expression");
			return expr;
		}

		throw this.error(startToken, 'expression');
	}

	/** COUNT(*), or FUNC([DISTINCT] expr); the name token has been consumed. */
	private aggregateCall(nameToken: Token): AST.FunctionExpr {
		const name = nameToken.lexeme.toLowerCase();
		this.consume(TokenType.LPAREN, `'(' after ${name.toUpperCase()}`);

		if (nameToken.type === TokenType.COUNT && this.match(TokenType.ASTERISK)) {
			this.consume(TokenType.RPAREN, "')' after '*'");
			return { type: 'function', name, args: [], star: true, loc: _createLoc(nameToken, this.previous()) };
		}

		const distinct = this.match(TokenType.DISTINCT);
		const arg = this.expression();
		this.consume(TokenType.RPAREN, `')' after ${name.toUpperCase()} argument`);
		return { type: 'function', name, args: [arg], distinct, loc: _createLoc(nameToken, this.previous()) };
	}

	/** Scalar function call; the name token has been consumed. */
	private functionCall(nameToken: Token): AST.FunctionExpr {
		this.consume(TokenType.LPAREN, "'(' after function name");
		const args: AST.Expression[] = [];
		if (!this.check(TokenType.RPAREN)) {
			do {
				args.push(this.expression());
			} while (this.match(TokenType.COMMA));
		}
		this.consume(TokenType.RPAREN, "')' after function arguments");
		return { type: 'function', name: nameToken.lexeme.toLowerCase(), args, loc: _createLoc(nameToken, this.previous()) };
	}

	/**
	 * CASE subject WHEN value THEN result ... END, or CASE WHEN condition THEN result ... END.
	 * The CASE token has been consumed.
	 */
	private caseExpression(startToken: Token): AST.CaseExpr {
		if (this.check(TokenType.WHEN)) {
			const whenClauses: AST.SearchedCaseExpr['whenClauses'] = [];
			while (this.match(TokenType.WHEN)) {
				const when = this.condition();
				this.consume(TokenType.THEN, "'THEN' after WHEN condition");
				whenClauses.push({ when, then: this.expression() });
			}
			const elseExpr = this.match(TokenType.ELSE) ? this.expression() : undefined;
			this.consume(TokenType.END, "'END' to close CASE");
			return { type: 'case', form: 'searched', whenClauses, elseExpr, loc: _createLoc(startToken, this.previous()) };
		}

		const subject = this.expression();
		const whenClauses: AST.SimpleCaseExpr['whenClauses'] = [];
		if (!this.check(TokenType.WHEN)) {
			throw this.error(this.peek(), "'WHEN' in CASE");
		}
		while (this.match(TokenType.WHEN)) {
			const when = this.expression();
			this.consume(TokenType.THEN, "'THEN' after WHEN value");
			whenClauses.push({ when, then: this.expression() });
		}
		const elseExpr = this.match(TokenType.ELSE) ? this.expression() : undefined;
		this.consume(TokenType.END, "'END' to close CASE");
		return { type: 'case', form: 'simple', subject, whenClauses, elseExpr, loc: _createLoc(startToken, this.previous()) };
	}

	private integerLiteral(expected: string): number {
		const token = this.consume(TokenType.INTEGER, expected);
		return typeof token.literal === 'number' ? token.literal : parseInt(token.lexeme, 10);
	}

	// --- Token helpers ---

	private match(...types: TokenType[]): boolean {
		for (const type of types) {
			if (this.check(type)) {
				this.advance();
				return true;
			}
		}
		return false;
	}

	private consume(type: TokenType, expected: string): Token {
		if (this.check(type)) return this.advance();
		throw this.error(this.peek(), expected);
	}

	private check(type: TokenType): boolean {
		if (this.isAtEnd()) return type === TokenType.EOF;
		return this.peek().type === type;
	}

	private checkNext(n: number, type: TokenType): boolean {
		const index = this.current + n;
		if (index >= this.tokens.length) return false;
		return this.tokens[index].type === type;
	}

	private advance(): Token {
		if (!this.isAtEnd()) this.current++;
		return this.previous();
	}

	private isAtEnd(): boolean {
		return this.peek().type === TokenType.EOF;
	}

	private peek(): Token {
		return this.tokens[this.current];
	}

	private previous(): Token {
		return this.tokens[Math.max(0, this.current - 1)];
	}

	private error(token: Token, expected: string, message?: string): ParseError {
		return new ParseError(expected, token, message);
	}

	private isJoinToken(): boolean {
		return this.check(TokenType.JOIN) ||
			this.check(TokenType.INNER) ||
			this.check(TokenType.LEFT) ||
			this.check(TokenType.RIGHT) ||
			this.check(TokenType.FULL) ||
			this.check(TokenType.CROSS);
	}

	/** True when the next token continues an expression or comparison. */
	private isOperatorToken(): boolean {
		const type = this.peek().type;
		return RELATIONAL_OPERATORS[type] !== undefined ||
			type === TokenType.PLUS || type === TokenType.MINUS ||
			type === TokenType.ASTERISK || type === TokenType.SLASH || type === TokenType.PERCENT ||
			type === TokenType.IN || type === TokenType.LIKE || type === TokenType.BETWEEN ||
			type === TokenType.IS || type === TokenType.NOT;
	}

	private syntheticEof(): Token {
		const last = this.tokens[this.tokens.length - 1];
		const offset = last ? last.endOffset : 0;
		return {
			type: TokenType.EOF,
			lexeme: '',
			startLine: last ? last.endLine : 1,
			startColumn: last ? last.endColumn + 1 : 1,
			startOffset: offset,
			endLine: last ? last.endLine : 1,
			endColumn: last ? last.endColumn + 1 : 1,
			endOffset: offset,
		};
	}
}
