export * from './ast.js';
export * from './lexer.js';
export { Parser } from './parser.js';

import { Parser } from './parser.js';
import { tokenize, type Token } from './lexer.js';
import type { SelectStmt } from './ast.js';

/**
 * Parse a token stream as one SELECT query
 * @param tokens Tokens from the lexer
 * @returns AST for the SELECT query
 */
export function parse(tokens: Token[]): SelectStmt {
	return new Parser().initialize(tokens).parse();
}

/**
 * Tokenize and parse SQL text as one SELECT query
 * @param sql SQL text
 * @returns AST for the SELECT query
 */
export function parseSelect(sql: string): SelectStmt {
	return parse(tokenize(sql));
}
