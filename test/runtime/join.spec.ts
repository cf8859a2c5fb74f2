import { expect } from 'chai';
import { query, Table } from '../../src/index.js';
import { expectExecutionError, tables } from '../helpers/fixtures.js';

const run = (sql: string): Table => query(sql, tables);

describe('Joins', () => {
	it('should inner join on an equality key', () => {
		const result = run('SELECT s.name, c.course FROM students s JOIN courses c ON s.id = c.student_id');
		expect(result.rows()).to.deep.equal([['Alice', 'Math'], ['Alice', 'Art'], ['Carl', 'Math']]);
	});

	it('should accept the key columns in either order', () => {
		const result = run('SELECT s.name, c.course FROM students s INNER JOIN courses c ON c.student_id = s.id');
		expect(result.rows()).to.deep.equal([['Alice', 'Math'], ['Alice', 'Art'], ['Carl', 'Math']]);
	});

	it('should pad unmatched left rows in a left join', () => {
		const result = run('SELECT s.name, c.course FROM students s LEFT JOIN courses c ON s.id = c.student_id');
		expect(result.rows()).to.deep.equal([['Alice', 'Math'], ['Alice', 'Art'], ['Bob', null], ['Carl', 'Math']]);
	});

	it('should append unmatched right rows in a right join', () => {
		const result = run('SELECT s.name, c.course FROM students s RIGHT JOIN courses c ON s.id = c.student_id');
		expect(result.rows()).to.deep.equal([['Alice', 'Math'], ['Alice', 'Art'], ['Carl', 'Math'], [null, 'Music']]);
	});

	it('should pad both sides in a full join', () => {
		const result = run('SELECT s.name, c.course FROM students s FULL OUTER JOIN courses c ON s.id = c.student_id');
		expect(result.rows()).to.deep.equal([
			['Alice', 'Math'], ['Alice', 'Art'], ['Bob', null], ['Carl', 'Math'], [null, 'Music'],
		]);
	});

	it('should produce every pairing in a cross join', () => {
		const result = run('SELECT * FROM students CROSS JOIN courses');
		expect(result.rowCount).to.equal(12);
		expect(result.columnNames).to.deep.equal(['id', 'name', 'age', 'grade', 'student_id', 'course']);
		expect(result.row(1)).to.deep.equal([1, 'Alice', 22, 'A', 1, 'Art']);
	});

	it('should suffix right-side names that collide', () => {
		const result = run('SELECT * FROM students a JOIN students b ON a.id = b.id');
		expect(result.columnNames).to.deep.equal(['id', 'name', 'age', 'grade', 'id_y', 'name_y', 'age_y', 'grade_y']);
		expect(result.rowCount).to.equal(3);
	});

	it('should number further collisions', () => {
		const result = run('SELECT * FROM students a JOIN students b ON a.id = b.id JOIN students c ON a.id = c.id');
		expect(result.columnNames.slice(8)).to.deep.equal(['id_y2', 'name_y2', 'age_y2', 'grade_y2']);
	});

	it('should resolve a qualified column to its own side after suffixing', () => {
		const result = run('SELECT a.name, b.age FROM students a JOIN students b ON a.id = b.id WHERE b.age < 22');
		expect(result.toRecords()).to.deep.equal([{ name: 'Bob', age: 19 }, { name: 'Carl', age: 21 }]);
	});

	it('should fall back to a row-pair predicate for other conditions', () => {
		const result = run('SELECT s.name, c.course FROM students s JOIN courses c ON s.id < c.student_id');
		expect(result.rows()).to.deep.equal([
			['Alice', 'Math'], ['Alice', 'Music'], ['Bob', 'Math'], ['Bob', 'Music'], ['Carl', 'Music'],
		]);
	});

	it('should use every equality leaf joined by AND', () => {
		const result = run('SELECT a.name FROM students a JOIN students b ON a.id = b.id AND a.grade = b.grade');
		expect(result.rowCount).to.equal(3);
	});

	it('should never match null keys', () => {
		const left = Table.fromRecords([{ k: 1 }, { k: null }]);
		const right = Table.fromRecords([{ j: null }, { j: 1 }]);
		const result = query('SELECT l.k, r.j FROM l LEFT JOIN r ON l.k = r.j', { l: left, r: right });
		expect(result.rows()).to.deep.equal([[1, 1], [null, null]]);
	});

	it('should match equality keys the way predicates compare them', () => {
		const inputs = {
			l: Table.fromRecords([{ k: '1' }, { k: '2' }]),
			r: Table.fromRecords([{ j: 1 }, { j: 3 }]),
		};
		const keyed = query('SELECT l.k, r.j FROM l JOIN r ON l.k = r.j', inputs);
		const predicate = query('SELECT l.k, r.j FROM l JOIN r ON l.k = r.j AND 1 = 1', inputs);
		const filtered = query('SELECT l.k, r.j FROM l CROSS JOIN r WHERE l.k = r.j', inputs);

		expect(keyed.rows()).to.deep.equal([['1', 1]]);
		expect(predicate.rows()).to.deep.equal(keyed.rows());
		expect(filtered.rows()).to.deep.equal(keyed.rows());
	});

	it('should join booleans against 0 and 1', () => {
		const inputs = {
			l: Table.fromRecords([{ flag: true }, { flag: false }]),
			r: Table.fromRecords([{ n: 1 }, { n: 0 }, { n: 2 }]),
		};
		const result = query('SELECT l.flag, r.n FROM l JOIN r ON l.flag = r.n', inputs);
		expect(result.rows()).to.deep.equal([[true, 1], [false, 0]]);
	});

	it('should reject a key pair that cannot be compared under strictTypes', () => {
		const inputs = {
			l: Table.fromRecords([{ k: 'abc' }]),
			r: Table.fromRecords([{ j: 1 }]),
		};
		const sql = 'SELECT l.k, r.j FROM l JOIN r ON l.k = r.j';
		expectExecutionError(() => query(sql, inputs), 'TypeMismatch');
		expect(query(sql, inputs, { strictTypes: false }).rowCount).to.equal(0);
	});

	it('should reject an unqualified key present on both sides', () => {
		expectExecutionError(() => run('SELECT * FROM students a JOIN students b ON id = b.id'), 'AmbiguousColumn');
	});

	it('should report an unknown joined table', () => {
		expectExecutionError(() => run('SELECT * FROM students JOIN missing m ON students.id = m.id'), 'UnknownTable');
	});
});
