import { expect } from 'chai';
import { query, Table } from '../../src/index.js';
import { columnValues, expectExecutionError, tables } from '../helpers/fixtures.js';

const run = (sql: string): Table => query(sql, tables);

describe('Aggregation', () => {
	it('should group, count and filter with HAVING', () => {
		const result = run('SELECT grade, COUNT(*) FROM students GROUP BY grade HAVING COUNT(*) > 1');
		expect(result.columnNames).to.deep.equal(['grade', 'count(*)']);
		expect(result.rows()).to.deep.equal([['A', 2]]);
	});

	it('should keep partitions in first-seen order', () => {
		const result = run('SELECT grade, COUNT(*), ROUND(AVG(age), 1) FROM students GROUP BY grade');
		expect(result.columnNames).to.deep.equal(['grade', 'count(*)', 'round(avg(age), 1)']);
		expect(result.rows()).to.deep.equal([['A', 2, 21.5], ['B', 1, 19]]);
	});

	it('should treat the whole input as one partition without GROUP BY', () => {
		const result = run('SELECT COUNT(*), SUM(age), MIN(name), MAX(age) FROM students');
		expect(result.rows()).to.deep.equal([[3, 62, 'Alice', 22]]);
		const avg = run('SELECT AVG(age) FROM students').row(0)[0];
		expect(avg).to.be.closeTo(62 / 3, 1e-9);
	});

	it('should give one row of empty results over no input', () => {
		const result = run('SELECT COUNT(*), SUM(age), AVG(age), MAX(age) FROM students WHERE age > 100');
		expect(result.rows()).to.deep.equal([[0, 0, null, null]]);
	});

	it('should give no rows when grouping no input', () => {
		expect(run('SELECT grade, COUNT(*) FROM students WHERE age > 100 GROUP BY grade').rowCount).to.equal(0);
	});

	it('should skip nulls in aggregates over a column', () => {
		const t = Table.fromRecords([{ v: 1 }, { v: null }, { v: 3 }]);
		const result = query('SELECT COUNT(*), COUNT(v), AVG(v) FROM t', { t });
		expect(result.rows()).to.deep.equal([[3, 2, 2]]);
	});

	it('should group null keys together', () => {
		const t = Table.fromRecords([{ k: null, v: 1 }, { k: 'x', v: 2 }, { k: null, v: 3 }]);
		const result = query('SELECT k, SUM(v) AS total FROM t GROUP BY k', { t });
		expect(result.toRecords()).to.deep.equal([{ k: null, total: 4 }, { k: 'x', total: 2 }]);
	});

	it('should deduplicate DISTINCT aggregate arguments', () => {
		expect(run('SELECT COUNT(DISTINCT grade) FROM students').row(0)).to.deep.equal([2]);
	});

	it('should aggregate an expression evaluated per row', () => {
		const result = run('SELECT grade, AVG(CASE WHEN age > 20 THEN 1 ELSE 0 END) AS share FROM students GROUP BY grade');
		expect(result.toRecords()).to.deep.equal([{ grade: 'A', share: 1 }, { grade: 'B', share: 0 }]);
	});

	it('should resolve HAVING through a select-list alias', () => {
		const result = run('SELECT grade, COUNT(*) AS n FROM students GROUP BY grade HAVING n = 1');
		expect(result.toRecords()).to.deep.equal([{ grade: 'B', n: 1 }]);
	});

	it('should compute a HAVING aggregate that is not selected', () => {
		expect(columnValues(run('SELECT grade FROM students GROUP BY grade HAVING MAX(age) > 21'), 'grade')).to.deep.equal(['A']);
	});

	it('should see a grouping column under its name when it is aliased', () => {
		const result = run(`SELECT grade AS g, COUNT(*) FROM students GROUP BY grade HAVING grade = 'A'`);
		expect(result.rows()).to.deep.equal([['A', 2]]);
	});

	it('should order by an aggregate or a grouping column', () => {
		expect(columnValues(run('SELECT grade, COUNT(*) FROM students GROUP BY grade ORDER BY COUNT(*)'), 'grade')).to.deep.equal(['B', 'A']);
		expect(columnValues(run('SELECT COUNT(*) AS n FROM students GROUP BY grade ORDER BY grade DESC'), 'n')).to.deep.equal([1, 2]);
	});

	it('should reject a column that is neither grouped nor aggregated', () => {
		const error = expectExecutionError(() => run('SELECT name, COUNT(*) FROM students GROUP BY grade'), 'AggregateShapeError');
		expect(error.message).to.equal(`Column 'name' must appear in GROUP BY or inside an aggregate function`);
		expectExecutionError(() => run('SELECT * FROM students GROUP BY grade'), 'AggregateShapeError');
	});

	it('should reject a non-numeric SUM argument', () => {
		expectExecutionError(() => run('SELECT SUM(name) FROM students'), 'TypeMismatch');
	});

	it('should reject an aggregate outside an aggregate query', () => {
		expectExecutionError(() => run('SELECT name FROM students ORDER BY COUNT(*)'), 'AggregateShapeError');
	});
});
