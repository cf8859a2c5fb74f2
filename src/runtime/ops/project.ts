import { createLogger } from '../../common/logger.js';
import { ExecutionError } from '../../common/errors.js';
import type { Row, SqlValue } from '../../common/types.js';
import type { PlanColumn } from '../../planner/plan.js';
import { evaluateExpr } from '../expression.js';
import { ColumnResolver, uniqueNames, type Relation, type RelationColumn } from '../relation.js';
import type { ExecutionScope } from '../scope.js';

const log = createLogger('runtime:project');

type Projector = (row: Row) => SqlValue;

/**
 * Evaluates the select list per row. Output rows stay parallel to input rows.
 * Duplicate output names are suffixed _1, _2, ...
 */
export function runProject(input: Relation, columns: readonly PlanColumn[], scope: ExecutionScope): Relation {
	const resolver = new ColumnResolver(input.columns);
	const outputColumns: RelationColumn[] = [];
	const projectors: Projector[] = [];

	for (const column of columns) {
		if (column.kind === 'all') {
			let matched = 0;
			input.columns.forEach((inputColumn, index) => {
				if (column.table !== undefined && !inputColumn.bindings.includes(column.table)) return;
				matched++;
				outputColumns.push(inputColumn);
				projectors.push(row => row[index]);
			});
			if (column.table !== undefined && matched === 0) {
				throw new ExecutionError('UnknownTable', `No table named '${column.table}' in FROM for '${column.table}.*'`);
			}
			continue;
		}

		const expr = column.expression;
		if (expr.kind === 'column') {
			const index = resolver.resolve(expr);
			const source = input.columns[index];
			outputColumns.push({ name: column.alias ?? column.name, origin: source.origin, bindings: source.bindings, exprName: column.name });
			projectors.push(row => row[index]);
		} else {
			outputColumns.push({ name: column.alias ?? column.name, bindings: [], exprName: column.name });
			projectors.push(row => evaluateExpr(expr, { scope, resolver, row }));
		}
	}

	const names = uniqueNames(outputColumns.map(column => column.name));
	const renamed = outputColumns.map((column, index) => names[index] === column.name ? column : { ...column, name: names[index] });
	const rows = input.rows.map(row => projectors.map(project => project(row)));

	log('Projected %d rows to %d columns', rows.length, renamed.length);
	return { columns: renamed, rows };
}
