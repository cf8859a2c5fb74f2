import { expect } from 'chai';
import { query, Table } from '../../src/index.js';
import { columnValues, expectExecutionError, tables } from '../helpers/fixtures.js';

const run = (sql: string): Table => query(sql, tables);

describe('Set operations', () => {
	it('should remove duplicates in UNION and keep them in UNION ALL', () => {
		expect(run('SELECT name FROM students UNION SELECT name FROM students').rowCount).to.equal(3);
		expect(run('SELECT name FROM students UNION ALL SELECT name FROM students').rowCount).to.equal(6);
	});

	it('should take column names from the left side', () => {
		const result = run('SELECT name FROM students UNION SELECT grade FROM students');
		expect(result.columnNames).to.deep.equal(['name']);
		expect(columnValues(result, 'name')).to.deep.equal(['Alice', 'Bob', 'Carl', 'A', 'B']);
	});

	it('should keep distinct rows present on both sides in INTERSECT', () => {
		const result = run('SELECT grade FROM students INTERSECT SELECT grade FROM students WHERE age > 20');
		expect(columnValues(result, 'grade')).to.deep.equal(['A']);
	});

	it('should keep the smaller count in INTERSECT ALL', () => {
		const once = run('SELECT grade FROM students INTERSECT ALL SELECT grade FROM students WHERE age > 21');
		expect(columnValues(once, 'grade')).to.deep.equal(['A']);
		const twice = run('SELECT grade FROM students INTERSECT ALL SELECT grade FROM students');
		expect(columnValues(twice, 'grade')).to.deep.equal(['A', 'B', 'A']);
	});

	it('should keep distinct left rows absent on the right in EXCEPT', () => {
		const result = run('SELECT grade FROM students EXCEPT SELECT grade FROM students WHERE age > 20');
		expect(columnValues(result, 'grade')).to.deep.equal(['B']);
	});

	it('should subtract counts in EXCEPT ALL', () => {
		const result = run('SELECT grade FROM students EXCEPT ALL SELECT grade FROM students WHERE age > 21');
		expect(columnValues(result, 'grade')).to.deep.equal(['B', 'A']);
	});

	it('should evaluate chains left to right', () => {
		const result = run('SELECT grade FROM students UNION SELECT grade FROM students EXCEPT SELECT grade FROM students WHERE id = 2');
		expect(columnValues(result, 'grade')).to.deep.equal(['A']);
	});

	it('should apply ORDER BY and LIMIT within each branch', () => {
		const result = run('SELECT name FROM students WHERE id = 2 UNION ALL SELECT name FROM students ORDER BY age DESC LIMIT 1');
		expect(columnValues(result, 'name')).to.deep.equal(['Bob', 'Alice']);
	});

	it('should keep booleans and numbers apart', () => {
		const t = Table.fromRecords([{ v: 1 }, { v: true }]);
		expect(query('SELECT v FROM t UNION SELECT v FROM t', { t }).rowCount).to.equal(2);
	});

	it('should reject operands of different widths', () => {
		expectExecutionError(() => run('SELECT name, age FROM students UNION SELECT name FROM students'), 'TypeMismatch');
	});
});
