import { expect } from 'chai';
import { compile, SemanticError, StatusCode } from '../../src/index.js';
import type { Plan, PlanCondition, PlanOperand } from '../../src/index.js';

function whereOperand(plan: Plan): PlanOperand | undefined {
	const where: PlanCondition | undefined = plan.where;
	if (where?.kind !== 'compare') throw new Error('Expected a comparison');
	return where.right;
}

describe('Plan generator', () => {
	it('should flatten select-list items', () => {
		const plan = compile('SELECT s.name AS n, COUNT(*) FROM students s GROUP BY s.name');
		expect(plan.columns[0]).to.include({ kind: 'column', name: 'name', alias: 'n', tableAlias: 's', hasAggregate: false });
		expect(plan.columns[1]).to.include({ kind: 'column', name: 'count(*)', function: 'count', hasAggregate: true });
		expect(plan.groupBy).to.deep.equal([{ kind: 'column', name: 'name', table: 's' }]);
		expect(plan.source).to.deep.equal({ table: 'students', alias: 's' });
		expect(plan.aggregate).to.equal(true);
	});

	it('should synthesize names for nested calls', () => {
		const plan = compile('SELECT ROUND(AVG(age), 1), age * 2 + 1 FROM students');
		expect(plan.columns.map(c => c.kind === 'column' ? c.name : '*')).to.deep.equal(['round(avg(age), 1)', 'age * 2 + 1']);
	});

	it('should classify right-hand operands', () => {
		expect(whereOperand(compile('SELECT a FROM t WHERE a > 20'))).to.deep.equal({ valueType: 'integer', value: 20 });
		expect(whereOperand(compile('SELECT a FROM t WHERE a > 2.0'))).to.deep.equal({ valueType: 'float', value: 2 });
		expect(whereOperand(compile(`SELECT a FROM t WHERE a = 'A'`))).to.deep.equal({ valueType: 'string', value: 'A' });
		expect(whereOperand(compile('SELECT a FROM t WHERE a = TRUE'))).to.deep.equal({ valueType: 'boolean', value: true });
		expect(whereOperand(compile('SELECT a FROM t WHERE a = NULL'))).to.deep.equal({ valueType: 'null', value: null });
		expect(whereOperand(compile('SELECT a FROM t WHERE a = b'))).to.deep.equal({ valueType: 'expression', expr: { kind: 'column', name: 'b', table: undefined } });
		expect(whereOperand(compile('SELECT a FROM t WHERE a IN (1, 2)'))?.valueType).to.equal('list');
		expect(whereOperand(compile('SELECT a FROM t WHERE a IN (SELECT b FROM u)'))?.valueType).to.equal('subquery');
	});

	it('should normalise NOT folded into a comparison', () => {
		const where = compile('SELECT a FROM t WHERE NOT a LIKE \'x%\'').where;
		expect(where).to.include({ kind: 'compare', op: 'not_like' });
	});

	it('should mark aggregate queries from HAVING alone', () => {
		expect(compile('SELECT grade FROM t HAVING COUNT(*) > 1').aggregate).to.equal(true);
		expect(compile('SELECT grade FROM t HAVING grade = \'A\'').aggregate).to.equal(false);
		expect(compile('SELECT grade FROM t').aggregate).to.equal(false);
	});

	it('should name ORDER BY keys', () => {
		const plan = compile('SELECT name FROM t ORDER BY age DESC, COUNT(*)');
		expect(plan.orderBy.map(k => [k.name, k.direction])).to.deep.equal([['age', 'desc'], ['count(*)', 'asc']]);
	});

	it('should lower set-operation branches into nested plans', () => {
		const plan = compile('SELECT a FROM t INTERSECT ALL SELECT a FROM u');
		expect(plan.setOperations).to.have.length(1);
		expect(plan.setOperations[0]).to.include({ op: 'intersect', all: true });
		expect(plan.setOperations[0].plan.source.table).to.equal('u');
	});

	it('should freeze the whole plan', () => {
		const plan = compile('SELECT a FROM t WHERE a IN (SELECT b FROM u)');
		expect(Object.isFrozen(plan)).to.equal(true);
		expect(Object.isFrozen(plan.columns[0])).to.equal(true);
		const operand = whereOperand(plan);
		expect(operand?.valueType === 'subquery' && Object.isFrozen(operand.plan)).to.equal(true);
	});

	describe('semantic errors', () => {
		it('should reject aggregates in WHERE', () => {
			expect(() => compile('SELECT a FROM t WHERE COUNT(*) > 1')).to.throw(SemanticError, 'Aggregate functions are not allowed in WHERE');
		});

		it('should reject aggregates in a join condition', () => {
			expect(() => compile('SELECT * FROM t JOIN u ON MAX(t.a) = u.a')).to.throw(SemanticError, 'not allowed in a join condition');
		});

		it('should reject GROUP BY on an expression', () => {
			expect(() => compile('SELECT a FROM t GROUP BY a + 1')).to.throw(SemanticError, `GROUP BY items must be column references, found 'a + 1'`);
		});

		it('should reject nested aggregates', () => {
			expect(() => compile('SELECT SUM(MAX(a)) FROM t')).to.throw(SemanticError, 'cannot be nested');
		});

		it('should reject a wrong argument count for a known function', () => {
			try {
				compile('SELECT UPPER(a, b) FROM t');
				expect.fail('should have thrown');
			} catch (e) {
				expect(e).to.be.instanceOf(SemanticError);
				if (e instanceof SemanticError) {
					expect(e.code).to.equal(StatusCode.ERROR);
					expect(e.message).to.equal('Wrong number of arguments to UPPER(): 2 (at line 1, column 8)');
				}
			}
		});

		it('should leave unknown functions to execution', () => {
			expect(() => compile('SELECT nope(a) FROM t')).not.to.throw();
		});
	});
});
