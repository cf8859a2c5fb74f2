import { expect } from 'chai';
import {
	compile, execute, query, formatErrorChain, unwrapError, CompileError, ExecutionError, LexError,
	ParseError, RelqueryError, SemanticError, StatusCode,
} from '../../src/index.js';
import type { Plan } from '../../src/index.js';
import { tables } from '../helpers/fixtures.js';

function thrown(fn: () => unknown): unknown {
	try {
		fn();
	} catch (e) {
		return e;
	}
	throw new Error('Expected an error');
}

describe('Errors', () => {
	it('should derive every compile error from CompileError', () => {
		const lex = thrown(() => compile('SELECT ` FROM t'));
		const parse = thrown(() => compile('SELECT FROM t'));
		const semantic = thrown(() => compile('SELECT a FROM t WHERE SUM(a) > 1'));

		expect(lex).to.be.instanceOf(LexError);
		expect(parse).to.be.instanceOf(ParseError);
		expect(semantic).to.be.instanceOf(SemanticError);
		for (const error of [lex, parse, semantic]) {
			expect(error).to.be.instanceOf(CompileError);
			expect(error).to.be.instanceOf(RelqueryError);
		}
	});

	it('should carry status codes', () => {
		const lex = thrown(() => compile('SELECT ` FROM t'));
		const parse = thrown(() => compile('SELECT FROM t'));
		expect(lex instanceof RelqueryError && lex.code).to.equal(StatusCode.SYNTAX);
		expect(parse instanceof RelqueryError && parse.code).to.equal(StatusCode.ERROR);
	});

	it('should not turn execution failures into compile errors', () => {
		const error = thrown(() => query('SELECT nope FROM students', tables));
		expect(error).to.be.instanceOf(ExecutionError);
		expect(error).not.to.be.instanceOf(CompileError);
	});

	it('should append the location to the message', () => {
		const error = thrown(() => compile('SELECT a\nFROM t WHERE'));
		expect(error).to.be.instanceOf(ParseError);
		if (error instanceof ParseError) {
			expect(error.line).to.equal(2);
			expect(error.column).to.equal(13);
			expect(error.message).to.equal('Expected expression, found end of input (at line 2, column 13)');
		}
	});

	it('should walk and render the cause chain', () => {
		const inner = new ExecutionError('TypeMismatch', 'inner failure');
		const outer = new RelqueryError('outer failure', StatusCode.INTERNAL, inner);

		const chain = unwrapError(outer);
		expect(chain.map(info => info.name)).to.deep.equal(['RelqueryError', 'ExecutionError']);
		expect(chain[1].code).to.equal(StatusCode.MISMATCH);
		expect(formatErrorChain(outer)).to.equal('RelqueryError: outer failure\n  caused by ExecutionError: inner failure');
	});

	it('should report a malformed comparison in a plan as an internal error', () => {
		const plan = compile('SELECT name FROM students WHERE age > 20');
		const where = plan.where;
		if (where?.kind !== 'compare') throw new Error('Expected a comparison');

		const noOperand: Plan = { ...plan, where: { kind: 'compare', left: where.left, op: 'gt' } };
		const oneBound: Plan = {
			...plan,
			where: { kind: 'compare', left: where.left, op: 'between', right: { valueType: 'list', items: [where.left] } },
		};

		for (const [broken, message] of [
			[noOperand, 'Comparison is missing its right-hand operand'],
			[oneBound, 'BETWEEN needs exactly two bounds'],
		] as const) {
			const error = thrown(() => execute(broken, tables));
			expect(error).to.be.instanceOf(RelqueryError);
			expect(error).not.to.be.instanceOf(ExecutionError);
			if (error instanceof RelqueryError) {
				expect(error.code).to.equal(StatusCode.INTERNAL);
				expect(error.message).to.equal(message);
			}
		}
	});

	it('should describe a non-error value', () => {
		expect(unwrapError('plain')).to.deep.equal([{ message: 'plain', name: 'Unknown' }]);
	});
});
