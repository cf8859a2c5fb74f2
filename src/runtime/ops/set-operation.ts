import { BTree } from 'inheritree';
import { createLogger } from '../../common/logger.js';
import { ExecutionError } from '../../common/errors.js';
import type { Row } from '../../common/types.js';
import type { PlanSetOperation } from '../../planner/plan.js';
import { compareRows } from '../../util/comparison.js';
import type { Relation } from '../relation.js';
import { distinctRowIndexes } from './distinct.js';

const log = createLogger('runtime:set-operation');

interface RowCount {
	row: Row;
	count: number;
}

/**
 * Combines two relations of equal arity. Column names come from the left side.
 * Without ALL the result holds distinct rows in first-seen order; with ALL,
 * duplicates are kept (UNION), kept up to the smaller count (INTERSECT) or
 * removed once per right-side occurrence (EXCEPT).
 *
 * @throws ExecutionError(TypeMismatch) when the column counts differ
 */
export function runSetOperation(left: Relation, right: Relation, operation: Pick<PlanSetOperation, 'op' | 'all'>): Relation {
	if (left.columns.length !== right.columns.length) {
		throw new ExecutionError('TypeMismatch',
			`${operation.op.toUpperCase()} operands have ${left.columns.length} and ${right.columns.length} columns`);
	}

	let rows: Row[];
	switch (operation.op) {
		case 'union': {
			const combined = [...left.rows, ...right.rows];
			rows = operation.all ? combined : distinctRowIndexes(combined).map(i => combined[i]);
			break;
		}
		case 'intersect': {
			const counts = countRows(right.rows);
			rows = operation.all
				? left.rows.filter(row => take(counts, row))
				: distinct(left.rows).filter(row => counts.get(row) !== undefined);
			break;
		}
		case 'except': {
			const counts = countRows(right.rows);
			rows = operation.all
				? left.rows.filter(row => !take(counts, row))
				: distinct(left.rows).filter(row => counts.get(row) === undefined);
			break;
		}
	}

	log('%s%s: %d and %d rows -> %d', operation.op, operation.all ? ' all' : '', left.rows.length, right.rows.length, rows.length);
	return { columns: left.columns, rows };
}

function distinct(rows: readonly Row[]): Row[] {
	return distinctRowIndexes(rows).map(i => rows[i]);
}

function countRows(rows: readonly Row[]): BTree<Row, RowCount> {
	const counts = new BTree<Row, RowCount>((entry: RowCount) => entry.row, compareRows);
	for (const row of rows) {
		const existing = counts.get(row);
		if (existing) {
			existing.count++;
		} else {
			counts.insert({ row, count: 1 });
		}
	}
	return counts;
}

/** Consumes one occurrence of the row; false when none remain. */
function take(counts: BTree<Row, RowCount>, row: Row): boolean {
	const entry = counts.get(row);
	if (!entry || entry.count === 0) return false;
	entry.count--;
	return true;
}
