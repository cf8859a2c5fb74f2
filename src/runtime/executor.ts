import { createLogger } from '../common/logger.js';
import { MisuseError } from '../common/errors.js';
import type { Row } from '../common/types.js';
import { resolveOptions, type ExecutionOptions } from '../core/options.js';
import type { Plan } from '../planner/plan.js';
import type { EvalContext, GroupContext } from './expression.js';
import { ColumnResolver, relationFromTable, relationToTable, type Relation } from './relation.js';
import { ExecutionScope } from './scope.js';
import { Table } from './table.js';
import { runAggregate } from './ops/aggregate.js';
import { distinctRowIndexes } from './ops/distinct.js';
import { runFilter } from './ops/filter.js';
import { runJoin } from './ops/join.js';
import { limitRange } from './ops/limit-offset.js';
import { runProject } from './ops/project.js';
import { runSetOperation } from './ops/set-operation.js';
import { reorder, sortRowIndexes } from './ops/sort.js';

const log = createLogger('runtime:executor');

export type InputTables = ReadonlyMap<string, Table> | Readonly<Record<string, Table>>;

/**
 * Output rows together with what ORDER BY may still need to see:
 * the partition behind each row of an aggregate query, or the row
 * before projection otherwise. Every array stays parallel to `output.rows`.
 */
interface Staged {
	output: Relation;
	groups?: readonly GroupContext[];
	aggregateColumns?: ReadonlyMap<string, number>;
	groupIndexes?: readonly number[];
	preProjection?: Relation;
}

/**
 * Runs a plan over named input tables. Inputs are never modified.
 *
 * @throws ExecutionError for any failure while evaluating the query
 * @throws MisuseError when `tables` holds something other than a Table
 */
export function execute(plan: Plan, tables: InputTables, options?: ExecutionOptions): Table {
	const resolved = resolveOptions(options);
	const scope = ExecutionScope.root(toTableMap(tables), resolved, executePlan);
	const result = executePlan(plan, scope);
	log('Query produced %d rows x %d columns', result.rows.length, result.columns.length);
	return relationToTable(result);
}

function isTableMap(tables: InputTables): tables is ReadonlyMap<string, Table> {
	return tables instanceof Map;
}

function toTableMap(tables: InputTables): ReadonlyMap<string, Table> {
	const entries: [string, unknown][] = isTableMap(tables) ? [...tables.entries()] : Object.entries(tables);
	const map = new Map<string, Table>();
	for (const [name, table] of entries) {
		if (typeof name !== 'string' || !(table instanceof Table)) {
			throw new MisuseError(`Input '${String(name)}' is not a Table bound to a string name`);
		}
		map.set(name, table);
	}
	return map;
}

/**
 * One SELECT and its chained set operations, evaluated in the given scope.
 */
export function executePlan(plan: Plan, scope: ExecutionScope): Relation {
	let result = executeSelect(plan, scope);
	for (const operation of plan.setOperations) {
		const right = scope.runBranch(operation.plan);
		result = runSetOperation(result, right, operation);
	}
	return result;
}

function executeSelect(plan: Plan, scope: ExecutionScope): Relation {
	const source = scope.lookupTable(plan.source.table);
	let current = relationFromTable(source, bindingsFor(plan.source.table, plan.source.alias));
	log('FROM %s: %d rows', plan.source.table, current.rows.length);

	for (const join of plan.joins) {
		const right = relationFromTable(scope.lookupTable(join.table), bindingsFor(join.table, join.alias));
		current = runJoin(current, right, join, scope);
	}

	if (plan.where) {
		const resolver = new ColumnResolver(current.columns);
		current = runFilter(current, plan.where, row => ({ scope, resolver, row })).relation;
	}

	let staged = plan.aggregate ? aggregateStage(current, plan, scope) : projectStage(current, plan, scope);

	if (plan.distinct) {
		const kept = distinctRowIndexes(staged.output.rows);
		staged = select(staged, kept);
		// Positions no longer map onto single source rows
		staged = { ...staged, preProjection: undefined };
	}

	if (plan.orderBy.length > 0) {
		const order = sortRowIndexes(plan.orderBy, {
			scope,
			output: staged.output,
			outputContext: outputContext(staged, scope),
			preProjection: staged.preProjection,
		});
		staged = select(staged, order);
	}

	let rows = staged.output.rows;
	if (plan.limit) {
		const { start, end } = limitRange(rows.length, plan.limit);
		rows = rows.slice(start, end);
	}
	return { columns: staged.output.columns, rows };
}

function bindingsFor(table: string, alias: string | undefined): string[] {
	return alias !== undefined && alias !== table ? [alias, table] : [table];
}

/** GROUP BY and aggregates, then HAVING over the aggregated rows. */
function aggregateStage(input: Relation, plan: Plan, scope: ExecutionScope): Staged {
	const aggregated = runAggregate(input, plan, scope);
	let staged: Staged = {
		output: aggregated.relation,
		groups: aggregated.groups,
		aggregateColumns: aggregated.aggregateColumns,
		groupIndexes: aggregated.groupIndexes,
	};

	if (plan.having) {
		const contextFor = outputContext(staged, scope);
		const { kept } = runFilter(staged.output, plan.having, (_row, index) => contextFor(index));
		staged = select(staged, kept);
	}
	return staged;
}

/** HAVING without aggregation filters rows like WHERE; then the select list is evaluated. */
function projectStage(input: Relation, plan: Plan, scope: ExecutionScope): Staged {
	let rows = input;
	if (plan.having) {
		const resolver = new ColumnResolver(input.columns);
		rows = runFilter(input, plan.having, row => ({ scope, resolver, row })).relation;
	}
	return { output: runProject(rows, plan.columns, scope), preProjection: rows };
}

/**
 * Context for evaluating against an output row. For aggregate queries the
 * output columns are followed by the grouping columns of the partition, so
 * those stay reachable under their source names.
 */
function outputContext(staged: Staged, scope: ExecutionScope): (index: number) => EvalContext {
	const { output, groups, aggregateColumns } = staged;
	if (!groups) {
		const resolver = new ColumnResolver(output.columns);
		return index => ({ scope, resolver, row: output.rows[index] });
	}

	const groupIndexes = staged.groupIndexes ?? [];
	const sourceColumns = groups[0]?.resolver.columns ?? [];
	const resolver = new ColumnResolver([...output.columns, ...groupIndexes.map(i => sourceColumns[i])]);
	return index => {
		const group = groups[index];
		const first: Row | undefined = group.rows[0];
		const row = [...output.rows[index], ...groupIndexes.map(i => first ? first[i] : null)];
		return { scope, resolver, row, group, aggregateColumns };
	};
}

function select(staged: Staged, indexes: readonly number[]): Staged {
	return {
		output: { columns: staged.output.columns, rows: reorder(staged.output.rows, indexes) },
		groups: staged.groups ? reorder(staged.groups, indexes) : undefined,
		aggregateColumns: staged.aggregateColumns,
		groupIndexes: staged.groupIndexes,
		preProjection: staged.preProjection
			? { columns: staged.preProjection.columns, rows: reorder(staged.preProjection.rows, indexes) }
			: undefined,
	};
}
