import { createLogger } from '../common/logger.js';
import { LexError } from '../common/errors.js';
import type { SqlValue } from '../common/types.js';

const log = createLogger('lexer');

export enum TokenType {
	// Literals
	INTEGER = 'INTEGER',
	FLOAT = 'FLOAT',
	STRING = 'STRING',
	IDENTIFIER = 'IDENTIFIER',

	// Keywords
	SELECT = 'SELECT',
	FROM = 'FROM',
	WHERE = 'WHERE',
	AND = 'AND',
	OR = 'OR',
	NOT = 'NOT',
	JOIN = 'JOIN',
	INNER = 'INNER',
	LEFT = 'LEFT',
	RIGHT = 'RIGHT',
	FULL = 'FULL',
	OUTER = 'OUTER',
	CROSS = 'CROSS',
	ON = 'ON',
	IN = 'IN',
	LIKE = 'LIKE',
	BETWEEN = 'BETWEEN',
	IS = 'IS',
	NULL = 'NULL',
	TRUE = 'TRUE',
	FALSE = 'FALSE',
	COUNT = 'COUNT',
	SUM = 'SUM',
	AVG = 'AVG',
	MAX = 'MAX',
	MIN = 'MIN',
	DISTINCT = 'DISTINCT',
	GROUP = 'GROUP',
	BY = 'BY',
	HAVING = 'HAVING',
	ORDER = 'ORDER',
	ASC = 'ASC',
	DESC = 'DESC',
	LIMIT = 'LIMIT',
	OFFSET = 'OFFSET',
	CASE = 'CASE',
	WHEN = 'WHEN',
	THEN = 'THEN',
	ELSE = 'ELSE',
	END = 'END',
	UNION = 'UNION',
	INTERSECT = 'INTERSECT',
	EXCEPT = 'EXCEPT',
	ALL = 'ALL',
	AS = 'AS',
	// Recognised only so they can be rejected with a clear message
	INSERT = 'INSERT',
	UPDATE = 'UPDATE',
	DELETE = 'DELETE',

	// Operators and punctuation
	PLUS = 'PLUS',               // +
	MINUS = 'MINUS',             // -
	ASTERISK = 'ASTERISK',       // *
	SLASH = 'SLASH',             // /
	PERCENT = 'PERCENT',         // %
	EQUAL = 'EQUAL',             // =
	NOT_EQUAL = 'NOT_EQUAL',     // != or <>
	LESS = 'LESS',               // <
	LESS_EQUAL = 'LESS_EQUAL',   // <=
	GREATER = 'GREATER',         // >
	GREATER_EQUAL = 'GREATER_EQUAL', // >=
	LPAREN = 'LPAREN',           // (
	RPAREN = 'RPAREN',           // )
	COMMA = 'COMMA',             // ,
	DOT = 'DOT',                 // .
	SEMICOLON = 'SEMICOLON',     // ;

	// Special
	EOF = 'EOF',
}

// Token represents a lexical token from the SQL input
export interface Token {
	readonly type: TokenType;
	readonly lexeme: string;
	readonly literal?: SqlValue;
	readonly startLine: number;
	readonly startColumn: number;
	readonly startOffset: number;
	readonly endLine: number;
	readonly endColumn: number;
	readonly endOffset: number;
}

// Reserved keywords mapping
export const KEYWORDS: Readonly<Record<string, TokenType>> = {
	'select': TokenType.SELECT,
	'from': TokenType.FROM,
	'where': TokenType.WHERE,
	'and': TokenType.AND,
	'or': TokenType.OR,
	'not': TokenType.NOT,
	'join': TokenType.JOIN,
	'inner': TokenType.INNER,
	'left': TokenType.LEFT,
	'right': TokenType.RIGHT,
	'full': TokenType.FULL,
	'outer': TokenType.OUTER,
	'cross': TokenType.CROSS,
	'on': TokenType.ON,
	'in': TokenType.IN,
	'like': TokenType.LIKE,
	'between': TokenType.BETWEEN,
	'is': TokenType.IS,
	'null': TokenType.NULL,
	'true': TokenType.TRUE,
	'false': TokenType.FALSE,
	'count': TokenType.COUNT,
	'sum': TokenType.SUM,
	'avg': TokenType.AVG,
	'max': TokenType.MAX,
	'min': TokenType.MIN,
	'distinct': TokenType.DISTINCT,
	'group': TokenType.GROUP,
	'by': TokenType.BY,
	'having': TokenType.HAVING,
	'order': TokenType.ORDER,
	'asc': TokenType.ASC,
	'desc': TokenType.DESC,
	'limit': TokenType.LIMIT,
	'offset': TokenType.OFFSET,
	'case': TokenType.CASE,
	'when': TokenType.WHEN,
	'then': TokenType.THEN,
	'else': TokenType.ELSE,
	'end': TokenType.END,
	'union': TokenType.UNION,
	'intersect': TokenType.INTERSECT,
	'except': TokenType.EXCEPT,
	'all': TokenType.ALL,
	'as': TokenType.AS,
	'insert': TokenType.INSERT,
	'update': TokenType.UPDATE,
	'delete': TokenType.DELETE,
};

/**
 * Lexer class for tokenizing SQL statements
 */
export class Lexer {
	private source: string;
	private tokens: Token[] = [];
	private start = 0;
	private current = 0;
	private line = 1;
	private column = 1;
	private startLine = 1;
	private startColumn = 1;

	constructor(source: string) {
		this.source = source;
	}

	/**
	 * Scans the input and returns all tokens, ending with an EOF token.
	 * @throws LexError on a character no token can start with
	 */
	scanTokens(): Token[] {
		while (!this.isAtEnd()) {
			this.start = this.current;
			this.startLine = this.line;
			this.startColumn = this.column;
			this.scanToken();
		}

		this.tokens.push({
			type: TokenType.EOF,
			lexeme: '',
			startLine: this.line,
			startColumn: this.column,
			startOffset: this.source.length,
			endLine: this.line,
			endColumn: this.column,
			endOffset: this.source.length,
		});

		log('Scanned %d tokens', this.tokens.length);
		return this.tokens;
	}

	private isAtEnd(): boolean {
		return this.current >= this.source.length;
	}

	private scanToken(): void {
		const c = this.advance();

		switch (c) {
			// Single-character tokens
			case '(': this.addToken(TokenType.LPAREN); break;
			case ')': this.addToken(TokenType.RPAREN); break;
			case ',': this.addToken(TokenType.COMMA); break;
			case '.': this.addToken(TokenType.DOT); break;
			case ';': this.addToken(TokenType.SEMICOLON); break;
			case '+': this.addToken(TokenType.PLUS); break;
			case '-':
				if (this.match('-')) {
					// SQL-style line comment
					while (this.peek() !== '\n' && !this.isAtEnd()) {
						this.advance();
					}
				} else {
					this.addToken(TokenType.MINUS);
				}
				break;
			case '*': this.addToken(TokenType.ASTERISK); break;
			case '/': this.addToken(TokenType.SLASH); break;
			case '%': this.addToken(TokenType.PERCENT); break;
			case '=': this.addToken(TokenType.EQUAL); break;

			// Two character operators take precedence
			case '!':
				if (!this.match('=')) {
					this.fail(c);
				}
				this.addToken(TokenType.NOT_EQUAL);
				break;
			case '<':
				if (this.match('=')) {
					this.addToken(TokenType.LESS_EQUAL);
				} else if (this.match('>')) {
					this.addToken(TokenType.NOT_EQUAL);
				} else {
					this.addToken(TokenType.LESS);
				}
				break;
			case '>':
				this.addToken(this.match('=') ? TokenType.GREATER_EQUAL : TokenType.GREATER);
				break;

			// String literals
			case '\'': this.string('\''); break;
			case '"': this.string('"'); break;

			// Whitespace
			case ' ':
			case '\r':
			case '\t':
			case '\n':
				break;

			default:
				if (this.isDigit(c)) {
					this.number();
				} else if (this.isAlpha(c)) {
					this.identifier();
				} else {
					this.fail(c);
				}
				break;
		}
	}

	private advance(): string {
		const char = this.source.charAt(this.current);
		this.current++;
		if (char === '\n') {
			this.line++;
			this.column = 1;
		} else {
			this.column++;
		}
		return char;
	}

	private match(expected: string): boolean {
		if (this.isAtEnd()) return false;
		if (this.source.charAt(this.current) !== expected) return false;

		this.current++;
		this.column++;
		return true;
	}

	private peek(): string {
		if (this.isAtEnd()) return '\0';
		return this.source.charAt(this.current);
	}

	private peekNext(): string {
		if (this.current + 1 >= this.source.length) return '\0';
		return this.source.charAt(this.current + 1);
	}

	/** Consumes up to the matching quote; there are no escape sequences. */
	private string(quote: string): void {
		while (!this.isAtEnd() && this.peek() !== quote) {
			this.advance();
		}

		if (this.isAtEnd()) {
			throw new LexError(`Unterminated string literal`, quote, this.startLine, this.startColumn);
		}

		// Consume the closing quote
		this.advance();

		this.addToken(TokenType.STRING, this.source.substring(this.start + 1, this.current - 1));
	}

	private number(): void {
		let isFloat = false;

		while (this.isDigit(this.peek())) {
			this.advance();
		}

		// A single fractional part; no exponent
		if (this.peek() === '.' && this.isDigit(this.peekNext())) {
			isFloat = true;
			this.advance();
			while (this.isDigit(this.peek())) {
				this.advance();
			}
		}

		const lexeme = this.source.substring(this.start, this.current);
		if (isFloat) {
			this.addToken(TokenType.FLOAT, parseFloat(lexeme));
		} else {
			const value = parseInt(lexeme, 10);
			if (!Number.isSafeInteger(value)) {
				throw new LexError(`Integer literal ${lexeme} is out of range`, lexeme, this.startLine, this.startColumn);
			}
			this.addToken(TokenType.INTEGER, value);
		}
	}

	private identifier(): void {
		while (this.isAlphaNumeric(this.peek())) {
			this.advance();
		}

		// Check if the identifier is a keyword
		const text = this.source.substring(this.start, this.current).toLowerCase();
		const type = Object.prototype.hasOwnProperty.call(KEYWORDS, text) ? KEYWORDS[text] : TokenType.IDENTIFIER;

		this.addToken(type);
	}

	private isDigit(c: string): boolean {
		return c >= '0' && c <= '9';
	}

	private isAlpha(c: string): boolean {
		return (c >= 'a' && c <= 'z') ||
			(c >= 'A' && c <= 'Z') ||
			c === '_';
	}

	private isAlphaNumeric(c: string): boolean {
		return this.isAlpha(c) || this.isDigit(c);
	}

	private addToken(type: TokenType, literal?: SqlValue): void {
		const lexeme = this.source.substring(this.start, this.current);
		this.tokens.push({
			type,
			lexeme,
			literal,
			startLine: this.startLine,
			startColumn: this.startColumn,
			startOffset: this.start,
			endLine: this.line,
			endColumn: this.column - 1,
			endOffset: this.current,
		});
	}

	private fail(character: string): never {
		throw new LexError(`Unexpected character: ${character}`, character, this.startLine, this.startColumn);
	}
}

/**
 * Splits SQL text into tokens, ending with an EOF token.
 */
export function tokenize(text: string): Token[] {
	return new Lexer(text).scanTokens();
}
