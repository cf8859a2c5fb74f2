import { StatusCode } from './types.js';
import type { Token } from '../parser/lexer.js';

/**
 * Base class for all engine errors.
 * Provides location information and status code support
 */
export class RelqueryError extends Error {
	public code: number;
	public line?: number;
	public column?: number;

	constructor(message: string, code: number = StatusCode.ERROR, cause?: Error, line?: number, column?: number) {
		super(message, cause ? { cause } : undefined);
		this.code = code;
		this.name = 'RelqueryError';
		this.line = line;
		this.column = column;

		// Enhance message with location if available
		if (line !== undefined && column !== undefined) {
			this.message = `${message} (at line ${line}, column ${column})`;
		}

		// Maintain stack trace in V8
		if (Error.captureStackTrace) {
			Error.captureStackTrace(this, RelqueryError);
		}
	}
}

/**
 * Any failure while turning query text into a plan.
 */
export class CompileError extends RelqueryError {
	constructor(message: string, code: number = StatusCode.ERROR, cause?: Error, line?: number, column?: number) {
		super(message, code, cause, line, column);
		this.name = 'CompileError';
	}
}

/**
 * Raised by the lexer on a character it cannot start a token with,
 * or a string literal that never closes.
 */
export class LexError extends CompileError {
	public character: string;

	constructor(message: string, character: string, line: number, column: number) {
		super(message, StatusCode.SYNTAX, undefined, line, column);
		this.character = character;
		this.name = 'LexError';
	}
}

/**
 * Parser-specific error that includes token information
 * Used during SQL parsing to provide precise error locations
 */
export class ParseError extends CompileError {
	public token: Token;
	public expected: string;
	public found: string;

	constructor(expected: string, token: Token, message?: string) {
		const found = describeToken(token);
		super(message ?? `Expected ${expected}, found ${found}`, StatusCode.ERROR, undefined, token.startLine, token.startColumn);
		this.token = token;
		this.expected = expected;
		this.found = found;
		this.name = 'ParseError';
	}

	/** Zero-based character offset of the offending token. */
	get position(): number {
		return this.token.startOffset;
	}
}

/**
 * Raised while lowering an AST into a plan, for constructs the plan cannot represent.
 */
export class SemanticError extends CompileError {
	constructor(message: string, code: number = StatusCode.ERROR, line?: number, column?: number) {
		super(message, code, undefined, line, column);
		this.name = 'SemanticError';
	}
}

export type ExecutionErrorKind =
	| 'UnknownTable'
	| 'UnknownColumn'
	| 'UnknownFunction'
	| 'TypeMismatch'
	| 'AmbiguousColumn'
	| 'AggregateShapeError'
	| 'RecursionLimitExceeded';

const kindCodes: Record<ExecutionErrorKind, StatusCode> = {
	UnknownTable: StatusCode.NOTFOUND,
	UnknownColumn: StatusCode.NOTFOUND,
	UnknownFunction: StatusCode.ERROR,
	TypeMismatch: StatusCode.MISMATCH,
	AmbiguousColumn: StatusCode.ERROR,
	AggregateShapeError: StatusCode.MISMATCH,
	RecursionLimitExceeded: StatusCode.TOOBIG,
};

/**
 * Error thrown while evaluating a plan against tables
 */
export class ExecutionError extends RelqueryError {
	public kind: ExecutionErrorKind;

	constructor(kind: ExecutionErrorKind, message: string, cause?: Error) {
		super(message, kindCodes[kind], cause);
		this.kind = kind;
		this.name = 'ExecutionError';
	}
}

/**
 * Error thrown when the API is used incorrectly
 */
export class MisuseError extends RelqueryError {
	constructor(message: string = "API misuse") {
		super(message, StatusCode.MISUSE);
		this.name = 'MisuseError';
		Object.setPrototypeOf(this, MisuseError.prototype);
	}
}

/**
 * Helper function to throw a SemanticError with optional location information from AST nodes
 * @returns Never (always throws)
 */
export function semanticError(
	message: string,
	code: StatusCode = StatusCode.ERROR,
	astNode?: { loc?: { start: { line: number; column: number } } }
): never {
	throw new SemanticError(
		message,
		code,
		astNode?.loc?.start.line,
		astNode?.loc?.start.column
	);
}

export interface ErrorInfo {
	message: string;
	code?: number;
	line?: number;
	column?: number;
	name: string;
}

/**
 * Walks the cause chain of an error, outermost first.
 */
export function unwrapError(error: unknown): ErrorInfo[] {
	const chain: ErrorInfo[] = [];
	let current: unknown = error;
	while (current instanceof Error) {
		chain.push({
			message: current.message,
			code: current instanceof RelqueryError ? current.code : undefined,
			line: current instanceof RelqueryError ? current.line : undefined,
			column: current instanceof RelqueryError ? current.column : undefined,
			name: current.name,
		});
		current = current.cause;
	}
	if (current !== undefined && chain.length === 0) {
		chain.push({ message: String(current), name: 'Unknown' });
	}
	return chain;
}

/** Renders an error and its causes, one per line. */
export function formatErrorChain(error: unknown): string {
	return unwrapError(error)
		.map((info, depth) => `${'  '.repeat(depth)}${depth > 0 ? 'caused by ' : ''}${info.name}: ${info.message}`)
		.join('\n');
}

function describeToken(token: Token): string {
	if (token.lexeme.length === 0) return 'end of input';
	return `'${token.lexeme}'`;
}
