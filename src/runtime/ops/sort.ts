import { createLogger } from '../../common/logger.js';
import type { SqlValue } from '../../common/types.js';
import type { PlanOrderKey } from '../../planner/plan.js';
import { columnRefs } from '../../planner/analysis.js';
import { compareSqlValues } from '../../util/comparison.js';
import { evaluateExpr, type EvalContext } from '../expression.js';
import { ColumnResolver, type Relation } from '../relation.js';
import type { ExecutionScope } from '../scope.js';

const log = createLogger('runtime:sort');

export interface SortSources {
	scope: ExecutionScope;
	output: Relation;
	/** Evaluation context for an output row, aggregate partitions included */
	outputContext: (index: number) => EvalContext;
	/** Rows before projection, parallel to the output; absent for grouped or distinct queries */
	preProjection?: Relation;
}

/**
 * Stable multi-key sort. Nulls sort first ascending and last descending;
 * ties fall to the next key, then to the original order.
 * @returns output positions in sorted order
 */
export function sortRowIndexes(keys: readonly PlanOrderKey[], sources: SortSources): number[] {
	const indexes = sources.output.rows.map((_, i) => i);
	if (keys.length === 0) return indexes;

	const readers = keys.map(key => keyReader(key, sources));
	const keyed = indexes.map(index => ({ index, values: readers.map(read => read(index)) }));

	keyed.sort((a, b) => {
		for (let i = 0; i < keys.length; i++) {
			const cmp = compareSqlValues(a.values[i], b.values[i]);
			if (cmp !== 0) {
				return keys[i].direction === 'desc' ? -cmp : cmp;
			}
		}
		return a.index - b.index;
	});

	log('Sorted %d rows on %d keys', keyed.length, keys.length);
	return keyed.map(entry => entry.index);
}

/**
 * Resolves a key against output names first (alias or column name, then the
 * rendered expression), then by evaluating it over the output row, then over
 * the row before projection.
 */
function keyReader(key: PlanOrderKey, sources: SortSources): (index: number) => SqlValue {
	const { output } = sources;
	const rows = output.rows;
	const outputResolver = new ColumnResolver(output.columns);

	let position = -1;
	if (key.expr.kind === 'column' && key.expr.table !== undefined) {
		position = outputResolver.tryResolve(key.expr) ?? -1;
	} else {
		position = output.columns.findIndex(column => column.name === key.name);
		if (position < 0) {
			position = output.columns.findIndex(column => column.exprName === key.name);
		}
	}
	if (position >= 0) {
		return index => rows[index][position];
	}

	const expr = key.expr;
	const resolvesOnOutput = columnRefs(expr).every(ref => outputResolver.tryResolve(ref) !== undefined);
	const pre = sources.preProjection;
	if (!resolvesOnOutput && pre) {
		const preResolver = new ColumnResolver(pre.columns);
		const scope = sources.scope;
		return index => evaluateExpr(expr, { scope, resolver: preResolver, row: pre.rows[index] });
	}
	// Unresolvable references surface as UnknownColumn here
	return index => evaluateExpr(expr, sources.outputContext(index));
}

export function reorder<T>(items: readonly T[], indexes: readonly number[]): T[] {
	return indexes.map(i => items[i]);
}
