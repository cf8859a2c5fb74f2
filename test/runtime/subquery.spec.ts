import { expect } from 'chai';
import { compile, execute, query, StatusCode, Table } from '../../src/index.js';
import type { ExecutionOptions } from '../../src/index.js';
import { columnValues, expectExecutionError, tables } from '../helpers/fixtures.js';

const run = (sql: string, options?: ExecutionOptions): Table => query(sql, tables, options);

describe('Subqueries', () => {
	it('should compare against a scalar subquery', () => {
		const result = run('SELECT name FROM students WHERE age > (SELECT AVG(age) FROM students)');
		expect(columnValues(result, 'name')).to.deep.equal(['Alice', 'Carl']);
	});

	it('should match IN and NOT IN against a subquery column', () => {
		expect(columnValues(run('SELECT name FROM students WHERE id IN (SELECT student_id FROM courses)'), 'name'))
			.to.deep.equal(['Alice', 'Carl']);
		expect(columnValues(run('SELECT name FROM students WHERE id NOT IN (SELECT student_id FROM courses)'), 'name'))
			.to.deep.equal(['Bob']);
	});

	it('should accept a set operation inside a subquery', () => {
		const result = run('SELECT name FROM students WHERE id IN (SELECT student_id FROM courses EXCEPT SELECT 1 FROM courses)');
		expect(columnValues(result, 'name')).to.deep.equal(['Carl']);
	});

	it('should reject a scalar subquery that is not one row and one column', () => {
		const error = expectExecutionError(() => run('SELECT name FROM students WHERE age > (SELECT age FROM students)'), 'AggregateShapeError');
		expect(error.message).to.equal('Scalar subquery must return one row and one column, got 3 rows and 1 columns');
	});

	it('should reject an IN subquery with more than one column', () => {
		expectExecutionError(() => run('SELECT name FROM students WHERE id IN (SELECT student_id, course FROM courses)'), 'AggregateShapeError');
	});

	it('should run nested subqueries within the depth limit', () => {
		const sql = 'SELECT name FROM students WHERE id IN (SELECT id FROM students WHERE age > (SELECT MIN(age) FROM students))';
		expect(columnValues(run(sql), 'name')).to.deep.equal(['Alice', 'Carl']);
		expect(columnValues(run(sql, { maxDepth: 2 }), 'name')).to.deep.equal(['Alice', 'Carl']);
	});

	it('should stop past the depth limit', () => {
		const sql = 'SELECT name FROM students WHERE id IN (SELECT id FROM students WHERE age > (SELECT MIN(age) FROM students))';
		const error = expectExecutionError(() => run(sql, { maxDepth: 1 }), 'RecursionLimitExceeded');
		expect(error.code).to.equal(StatusCode.TOOBIG);
	});

	it('should count set-operation branches toward the depth', () => {
		const plan = compile('SELECT name FROM students UNION SELECT name FROM students WHERE age > (SELECT MIN(age) FROM students)');
		expectExecutionError(() => execute(plan, tables, { maxDepth: 1 }), 'RecursionLimitExceeded');
		expect(execute(plan, tables, { maxDepth: 2 }).rowCount).to.equal(3);
	});

	it('should report an unknown table inside a subquery', () => {
		expectExecutionError(() => run('SELECT name FROM students WHERE id IN (SELECT id FROM nope)'), 'UnknownTable');
	});
});
