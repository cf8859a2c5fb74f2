import { expect } from 'chai';
import { compile, execute, query, Table, StatusCode } from '../../src/index.js';
import type { ExecutionOptions } from '../../src/index.js';
import { columnValues, expectExecutionError, students, tables } from '../helpers/fixtures.js';

const run = (sql: string, options?: ExecutionOptions): Table => query(sql, tables, options);

const sparse = Table.fromRecords([{ v: 2 }, { v: null }, { v: 1 }]);

describe('Executor', () => {
	describe('FROM and projection', () => {
		it('should round-trip a table through SELECT *', () => {
			expect(run('SELECT * FROM students').equals(students)).to.equal(true);
		});

		it('should accept tables as a Map', () => {
			const result = query('SELECT name FROM students', new Map([['students', students]]));
			expect(columnValues(result, 'name')).to.deep.equal(['Alice', 'Bob', 'Carl']);
		});

		it('should pass t.* through for an alias', () => {
			expect(run('SELECT s.* FROM students s').equals(students)).to.equal(true);
		});

		it('should rename columns by alias and evaluate expressions', () => {
			const result = run('SELECT name, age + 1 AS next FROM students WHERE id = 1');
			expect(result.toRecords()).to.deep.equal([{ name: 'Alice', next: 23 }]);
		});

		it('should name an unaliased expression by its text', () => {
			const result = run('SELECT age * 2 FROM students WHERE id = 2');
			expect(result.columnNames).to.deep.equal(['age * 2']);
			expect(result.row(0)).to.deep.equal([38]);
		});

		it('should suffix duplicate output names', () => {
			expect(run('SELECT name, name FROM students').columnNames).to.deep.equal(['name', 'name_1']);
		});

		it('should resolve an unbound qualifier by the bare column name', () => {
			expect(columnValues(run('SELECT q.name FROM students'), 'name')).to.deep.equal(['Alice', 'Bob', 'Carl']);
		});

		it('should give the same result for the same plan twice', () => {
			const plan = compile('SELECT name FROM students WHERE age > 20 ORDER BY name DESC');
			expect(execute(plan, tables).equals(execute(plan, tables))).to.equal(true);
		});
	});

	describe('WHERE', () => {
		it('should filter rows', () => {
			expect(columnValues(run('SELECT name FROM students WHERE age > 20'), 'name')).to.deep.equal(['Alice', 'Carl']);
		});

		it('should coerce numeric text compared with a number', () => {
			expect(columnValues(run(`SELECT name FROM students WHERE age = '22'`), 'name')).to.deep.equal(['Alice']);
		});

		it('should raise TypeMismatch for text compared with a number', () => {
			const error = expectExecutionError(() => run('SELECT name FROM students WHERE name > 5'), 'TypeMismatch');
			expect(error.code).to.equal(StatusCode.MISMATCH);
		});

		it('should treat the same comparison as false when strictTypes is off', () => {
			expect(run('SELECT name FROM students WHERE name > 5', { strictTypes: false }).rowCount).to.equal(0);
		});

		it('should treat comparisons with null as false', () => {
			const result = query('SELECT v FROM t WHERE v = NULL', { t: sparse });
			expect(result.rowCount).to.equal(0);
			expect(columnValues(query('SELECT v FROM t WHERE v != 1', { t: sparse }), 'v')).to.deep.equal([2]);
		});

		it('should test nullness with IS NULL and IS NOT NULL', () => {
			expect(columnValues(query('SELECT v FROM t WHERE v IS NULL', { t: sparse }), 'v')).to.deep.equal([null]);
			expect(columnValues(query('SELECT v FROM t WHERE v IS NOT NULL', { t: sparse }), 'v')).to.deep.equal([2, 1]);
		});

		it('should negate a grouped condition as plain boolean negation', () => {
			const result = query('SELECT v FROM t WHERE NOT (v = 1 OR v = 5)', { t: sparse });
			expect(columnValues(result, 'v')).to.deep.equal([2, null]);
		});

		it('should match IN lists and treat NOT IN against a null as false', () => {
			expect(columnValues(run('SELECT name FROM students WHERE id IN (1, 3)'), 'name')).to.deep.equal(['Alice', 'Carl']);
			expect(run('SELECT name FROM students WHERE id NOT IN (1, NULL)').rowCount).to.equal(0);
			expect(columnValues(run('SELECT name FROM students WHERE id NOT IN (1, 3)'), 'name')).to.deep.equal(['Bob']);
		});

		it('should match LIKE case-sensitively by default', () => {
			expect(columnValues(run(`SELECT name FROM students WHERE name LIKE 'A%'`), 'name')).to.deep.equal(['Alice']);
			expect(run(`SELECT name FROM students WHERE name LIKE 'a%'`).rowCount).to.equal(0);
			expect(columnValues(run(`SELECT name FROM students WHERE name LIKE 'a%'`, { caseSensitiveLike: false }), 'name')).to.deep.equal(['Alice']);
			expect(columnValues(run(`SELECT name FROM students WHERE name LIKE '_ob'`), 'name')).to.deep.equal(['Bob']);
		});

		it('should apply HAVING as a row filter without aggregation', () => {
			expect(columnValues(run('SELECT name FROM students HAVING age > 20'), 'name')).to.deep.equal(['Alice', 'Carl']);
		});
	});

	describe('ORDER BY', () => {
		it('should sort descending within a BETWEEN filter', () => {
			const result = run('SELECT name, age FROM students WHERE age BETWEEN 20 AND 25 ORDER BY age DESC');
			expect(result.toRecords()).to.deep.equal([{ name: 'Alice', age: 22 }, { name: 'Carl', age: 21 }]);
		});

		it('should keep the original order among ties', () => {
			expect(columnValues(run('SELECT name, grade FROM students ORDER BY grade'), 'name')).to.deep.equal(['Alice', 'Carl', 'Bob']);
		});

		it('should break ties on later keys', () => {
			expect(columnValues(run('SELECT name FROM students ORDER BY grade, age'), 'name')).to.deep.equal(['Carl', 'Alice', 'Bob']);
		});

		it('should sort on a column that is not selected', () => {
			expect(columnValues(run('SELECT name FROM students ORDER BY age'), 'name')).to.deep.equal(['Bob', 'Carl', 'Alice']);
		});

		it('should sort on an alias or on the aliased column', () => {
			expect(columnValues(run('SELECT name, age AS years FROM students ORDER BY years DESC'), 'name')).to.deep.equal(['Alice', 'Carl', 'Bob']);
			expect(columnValues(run('SELECT age AS years FROM students ORDER BY age'), 'years')).to.deep.equal([19, 21, 22]);
		});

		it('should sort on an expression', () => {
			expect(columnValues(run('SELECT name FROM students ORDER BY 0 - age'), 'name')).to.deep.equal(['Alice', 'Carl', 'Bob']);
		});

		it('should put nulls first ascending and last descending', () => {
			expect(columnValues(query('SELECT v FROM t ORDER BY v', { t: sparse }), 'v')).to.deep.equal([null, 1, 2]);
			expect(columnValues(query('SELECT v FROM t ORDER BY v DESC', { t: sparse }), 'v')).to.deep.equal([2, 1, null]);
		});

		it('should reject an unknown sort key', () => {
			expectExecutionError(() => run('SELECT name FROM students ORDER BY height'), 'UnknownColumn');
		});

		it('should not reach past DISTINCT for a sort key', () => {
			expectExecutionError(() => run('SELECT DISTINCT grade FROM students ORDER BY age'), 'UnknownColumn');
		});
	});

	describe('DISTINCT and LIMIT', () => {
		it('should keep the first occurrence of each row', () => {
			expect(columnValues(run('SELECT DISTINCT grade FROM students'), 'grade')).to.deep.equal(['A', 'B']);
		});

		it('should slice with LIMIT and OFFSET', () => {
			expect(columnValues(run('SELECT id FROM students LIMIT 2 OFFSET 1'), 'id')).to.deep.equal([2, 3]);
			expect(columnValues(run('SELECT id FROM students LIMIT 2'), 'id')).to.deep.equal([1, 2]);
		});

		it('should keep the schema for LIMIT 0 and an offset past the end', () => {
			const zero = run('SELECT id, name FROM students LIMIT 0');
			expect(zero.rowCount).to.equal(0);
			expect(zero.columnNames).to.deep.equal(['id', 'name']);
			const past = run('SELECT id FROM students LIMIT 5 OFFSET 10');
			expect(past.rowCount).to.equal(0);
			expect(past.columnNames).to.deep.equal(['id']);
		});
	});

	describe('resolution errors', () => {
		it('should report an unknown table', () => {
			const error = expectExecutionError(() => run('SELECT * FROM nope'), 'UnknownTable');
			expect(error.code).to.equal(StatusCode.NOTFOUND);
		});

		it('should report an unknown column', () => {
			const error = expectExecutionError(() => run('SELECT nickname FROM students'), 'UnknownColumn');
			expect(error.message).to.equal(`Unknown column 'nickname'`);
		});

		it('should report t.* for a table not in FROM', () => {
			expectExecutionError(() => run('SELECT x.* FROM students'), 'UnknownTable');
		});
	});
});
