import { expect } from 'chai';
import { ExecutionError, Table } from '../../src/index.js';
import type { ExecutionErrorKind, SqlValue } from '../../src/index.js';

export const students = Table.fromRecords([
	{ id: 1, name: 'Alice', age: 22, grade: 'A' },
	{ id: 2, name: 'Bob', age: 19, grade: 'B' },
	{ id: 3, name: 'Carl', age: 21, grade: 'A' },
]);

export const courses = Table.fromRecords([
	{ student_id: 1, course: 'Math' },
	{ student_id: 1, course: 'Art' },
	{ student_id: 3, course: 'Math' },
	{ student_id: 4, course: 'Music' },
]);

export const tables = { students, courses };

/** Runs `fn`, asserting it throws an ExecutionError of the given kind. */
export function expectExecutionError(fn: () => unknown, kind: ExecutionErrorKind): ExecutionError {
	try {
		fn();
	} catch (e) {
		expect(e).to.be.instanceOf(ExecutionError);
		if (e instanceof ExecutionError) {
			expect(e.kind).to.equal(kind);
			return e;
		}
	}
	throw new Error(`Expected an ExecutionError of kind ${kind}`);
}

/** Values of one column of a table, in row order. */
export function columnValues(table: Table, name: string): readonly SqlValue[] {
	const values = table.column(name);
	if (!values) throw new Error(`No column '${name}' in [${table.columnNames.join(', ')}]`);
	return values;
}
