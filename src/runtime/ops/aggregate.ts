import { BTree } from 'inheritree';
import { createLogger } from '../../common/logger.js';
import { ExecutionError } from '../../common/errors.js';
import type { Row, SqlValue } from '../../common/types.js';
import type { ColumnPlanExpr, Plan, PlanValueColumn } from '../../planner/plan.js';
import { columnRefs } from '../../planner/analysis.js';
import { compareRows } from '../../util/comparison.js';
import { evaluateExpr, type GroupContext } from '../expression.js';
import { ColumnResolver, uniqueNames, type Relation, type RelationColumn } from '../relation.js';
import type { ExecutionScope } from '../scope.js';

const log = createLogger('runtime:aggregate');

interface Partition {
	key: Row;
	rows: Row[];
}

export interface AggregateResult {
	relation: Relation;
	/** Source rows behind each output row, parallel to relation.rows */
	groups: GroupContext[];
	/** Output position of each aggregate computed by the select list, by rendered call text */
	aggregateColumns: ReadonlyMap<string, number>;
	/** Input positions of the GROUP BY columns */
	groupIndexes: readonly number[];
}

/**
 * Partitions rows on the GROUP BY values in first-seen order and evaluates the
 * select list once per partition. Without GROUP BY the whole input is one partition.
 *
 * @throws ExecutionError(AggregateShapeError) for a plain column that is neither grouped nor aggregated
 */
export function runAggregate(input: Relation, plan: Plan, scope: ExecutionScope): AggregateResult {
	const resolver = new ColumnResolver(input.columns);
	const groupIndexes = plan.groupBy.map(ref => resolver.resolve(ref));
	const columns = expandColumns(plan, input.columns, groupIndexes);

	checkShape(columns, resolver, groupIndexes);

	const partitions = partition(input.rows, groupIndexes);
	log('Aggregating %d rows into %d partitions', input.rows.length, partitions.length);

	const emptyRow: Row = input.columns.map(() => null);
	const groups: GroupContext[] = partitions.map(p => ({ resolver, rows: p.rows }));
	const rows = groups.map(group => {
		const row = group.rows[0] ?? emptyRow;
		return columns.map(column => evaluateExpr(column.expression, { scope, resolver, row, group }));
	});

	const names = uniqueNames(columns.map(column => column.alias ?? column.name));
	const outputColumns: RelationColumn[] = columns.map((column, index) => {
		const sourceIndex = column.expression.kind === 'column' ? resolver.resolve(column.expression) : undefined;
		const source = sourceIndex === undefined ? undefined : input.columns[sourceIndex];
		return {
			name: names[index],
			origin: source?.origin,
			bindings: source?.bindings ?? [],
			exprName: column.name,
		};
	});

	const aggregateColumns = new Map<string, number>();
	columns.forEach((column, index) => {
		const expr = column.expression;
		if (expr.kind === 'function' && expr.aggregate && !aggregateColumns.has(expr.text)) {
			aggregateColumns.set(expr.text, index);
		}
	});

	return { relation: { columns: outputColumns, rows }, groups, aggregateColumns, groupIndexes };
}

/** `*` and `t.*` stand for every matching input column, each of which must be grouped. */
function expandColumns(plan: Plan, inputColumns: readonly RelationColumn[], groupIndexes: readonly number[]): PlanValueColumn[] {
	const result: PlanValueColumn[] = [];
	for (const column of plan.columns) {
		if (column.kind === 'column') {
			result.push(column);
			continue;
		}
		inputColumns.forEach((inputColumn, index) => {
			if (column.table !== undefined && !inputColumn.bindings.includes(column.table)) return;
			if (!groupIndexes.includes(index)) {
				throw new ExecutionError('AggregateShapeError',
					`Column '${inputColumn.name}' must appear in GROUP BY or inside an aggregate function`);
			}
			const expression: ColumnPlanExpr = { kind: 'column', name: inputColumn.name };
			result.push({ kind: 'column', name: inputColumn.name, expression, distinct: false, hasAggregate: false });
		});
	}
	return result;
}

function checkShape(columns: readonly PlanValueColumn[], resolver: ColumnResolver, groupIndexes: readonly number[]): void {
	for (const column of columns) {
		for (const ref of columnRefs(column.expression)) {
			if (!groupIndexes.includes(resolver.resolve(ref))) {
				const shown = ref.table ? `${ref.table}.${ref.name}` : ref.name;
				throw new ExecutionError('AggregateShapeError',
					`Column '${shown}' must appear in GROUP BY or inside an aggregate function`);
			}
		}
	}
}

function partition(rows: readonly Row[], groupIndexes: readonly number[]): Partition[] {
	if (groupIndexes.length === 0) {
		return [{ key: [], rows: [...rows] }];
	}

	const index = new BTree<Row, Partition>((p: Partition) => p.key, compareRows);
	const ordered: Partition[] = [];
	for (const row of rows) {
		const key: SqlValue[] = groupIndexes.map(i => row[i]);
		const existing = index.get(key);
		if (existing) {
			existing.rows.push(row);
		} else {
			const created: Partition = { key, rows: [row] };
			index.insert(created);
			ordered.push(created);
		}
	}
	return ordered;
}
