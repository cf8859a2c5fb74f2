/**
 * relquery - SQL SELECT queries over in-memory tables
 *
 * Query text is tokenized, parsed into an AST, lowered into an immutable Plan
 * and interpreted against named Tables. Nothing is persisted.
 */

import { createLogger } from './common/logger.js';
import type { ExecutionOptions } from './core/options.js';
import { tokenize } from './parser/lexer.js';
import { parse } from './parser/index.js';
import { generate } from './planner/generator.js';
import type { Plan } from './planner/plan.js';
import { execute, type InputTables } from './runtime/executor.js';
import type { Table } from './runtime/table.js';

const log = createLogger('compile');

/**
 * Compiles one SELECT query into a Plan.
 * @throws LexError | ParseError | SemanticError, all CompileError subclasses
 */
export function compile(sql: string): Plan {
	const tokens = tokenize(sql);
	log('Tokenized %d tokens', tokens.length);
	const ast = parse(tokens);
	return generate(ast);
}

/**
 * Compiles and executes a query in one call.
 */
export function query(sql: string, tables: InputTables, options?: ExecutionOptions): Table {
	return execute(compile(sql), tables, options);
}

export { execute };
export type { InputTables };

// Data
export { Table } from './runtime/table.js';
export type { TableColumn, TableRecord } from './runtime/table.js';
export { StatusCode } from './common/types.js';
export type { SqlValue, Row } from './common/types.js';

// Configuration
export { DEFAULT_EXECUTION_OPTIONS, resolveOptions } from './core/options.js';
export type { ExecutionOptions, ResolvedExecutionOptions } from './core/options.js';

// Errors
export {
	RelqueryError, CompileError, LexError, ParseError, SemanticError,
	ExecutionError, MisuseError, unwrapError, formatErrorChain,
} from './common/errors.js';
export type { ExecutionErrorKind, ErrorInfo } from './common/errors.js';

// Logging
export { enableLogging, disableLogging, isLoggingEnabled } from './common/logger.js';

// Pipeline stages
export { tokenize, TokenType } from './parser/lexer.js';
export type { Token } from './parser/lexer.js';
export { parse } from './parser/index.js';
export type { SelectStmt } from './parser/ast.js';
export { generate } from './planner/generator.js';
export type * from './planner/plan.js';
