import { BTree } from 'inheritree';
import { createLogger } from '../../common/logger.js';
import { ExecutionError } from '../../common/errors.js';
import type { Row, SqlValue } from '../../common/types.js';
import type { ColumnPlanExpr, PlanCondition, PlanJoin } from '../../planner/plan.js';
import { compareRows, numericValue } from '../../util/comparison.js';
import { evaluateCondition } from '../condition.js';
import { ColumnResolver, type Relation, type RelationColumn } from '../relation.js';
import type { ExecutionScope } from '../scope.js';

const log = createLogger('runtime:join');

export const JOIN_SUFFIX = '_y';

/** Column positions on each side whose values must be equal. */
interface JoinKeys {
	left: number[];
	right: number[];
}

interface KeyBucket {
	key: Row;
	rows: number[];
}

/**
 * Combines the accumulated left relation with the right input by join kind.
 * Output order: each left row in order followed by its matches in right order;
 * right and full joins then append unmatched right rows in right order.
 */
export function runJoin(left: Relation, right: Relation, join: PlanJoin, scope: ExecutionScope): Relation {
	const columns = combineColumns(left.columns, right.columns);
	const leftWidth = left.columns.length;
	const rightWidth = right.columns.length;

	if (join.joinType === 'cross' || !join.condition) {
		const rows: Row[] = [];
		for (const leftRow of left.rows) {
			for (const rightRow of right.rows) {
				rows.push([...leftRow, ...rightRow]);
			}
		}
		log('cross join %s: %d x %d -> %d rows', join.table, left.rows.length, right.rows.length, rows.length);
		return { columns, rows };
	}

	const extracted = extractJoinKeys(join.condition, left.columns, right.columns);
	const keys = extracted && keysComparable(extracted, left.rows, right.rows) ? extracted : undefined;
	const matchesFor = keys
		? keyMatcher(keys, right.rows)
		: predicateMatcher(join.condition, columns, right.rows, scope);
	log('%s join %s using %s', join.joinType, join.table, keys ? `${keys.left.length} equality keys` : 'row-pair predicate');

	const rows: Row[] = [];
	const rightMatched = new Array<boolean>(right.rows.length).fill(false);
	const leftNulls: Row = new Array(leftWidth).fill(null);
	const rightNulls: Row = new Array(rightWidth).fill(null);

	for (const leftRow of left.rows) {
		const matches = matchesFor(leftRow);
		for (const rightIndex of matches) {
			rightMatched[rightIndex] = true;
			rows.push([...leftRow, ...right.rows[rightIndex]]);
		}
		if (matches.length === 0 && (join.joinType === 'left' || join.joinType === 'full')) {
			rows.push([...leftRow, ...rightNulls]);
		}
	}

	if (join.joinType === 'right' || join.joinType === 'full') {
		right.rows.forEach((rightRow, index) => {
			if (!rightMatched[index]) {
				rows.push([...leftNulls, ...rightRow]);
			}
		});
	}

	log('%s join %s: %d x %d -> %d rows', join.joinType, join.table, left.rows.length, right.rows.length, rows.length);
	return { columns, rows };
}

/**
 * Right-side columns keep their bindings; a name already used on the left
 * becomes name_y, then name_y2, name_y3, ...
 */
export function combineColumns(left: readonly RelationColumn[], right: readonly RelationColumn[]): RelationColumn[] {
	const taken = new Set(left.map(column => column.name));
	const renamed = right.map(column => {
		let name = column.name;
		if (taken.has(name)) {
			name = `${column.name}${JOIN_SUFFIX}`;
			for (let n = 2; taken.has(name); n++) {
				name = `${column.name}${JOIN_SUFFIX}${n}`;
			}
		}
		taken.add(name);
		return name === column.name ? column : { ...column, name };
	});
	return [...left, ...renamed];
}

/**
 * Reads equality leaves joined by AND, each comparing a column of one side
 * with a column of the other.
 * @returns the key positions, or undefined when the condition has any other shape
 * @throws ExecutionError(AmbiguousColumn) for an unqualified name present on both sides
 */
export function extractJoinKeys(
	condition: PlanCondition,
	leftColumns: readonly RelationColumn[],
	rightColumns: readonly RelationColumn[],
): JoinKeys | undefined {
	const leaves: PlanCondition[] = [];
	const collect = (cond: PlanCondition): boolean => {
		if (cond.kind === 'logical' && cond.op === 'and') {
			return collect(cond.left) && collect(cond.right);
		}
		leaves.push(cond);
		return cond.kind === 'compare';
	};
	if (!collect(condition)) return undefined;

	const keys: JoinKeys = { left: [], right: [] };
	const leftResolver = new ColumnResolver(leftColumns);
	const rightResolver = new ColumnResolver(rightColumns);

	for (const leaf of leaves) {
		if (leaf.kind !== 'compare' || leaf.op !== 'eq') return undefined;
		if (leaf.left.kind !== 'column' || leaf.right?.valueType !== 'expression' || leaf.right.expr.kind !== 'column') {
			return undefined;
		}

		const a = locate(leaf.left, leftResolver, rightResolver);
		const b = locate(leaf.right.expr, leftResolver, rightResolver);
		if (a.side === b.side) return undefined;

		const [l, r] = a.side === 'left' ? [a, b] : [b, a];
		keys.left.push(l.index);
		keys.right.push(r.index);
	}
	return keys;
}

function locate(ref: ColumnPlanExpr, leftResolver: ColumnResolver, rightResolver: ColumnResolver): { side: 'left' | 'right'; index: number } {
	if (ref.table !== undefined) {
		const qualifier = ref.table;
		const leftBound = leftResolver.columns.some(column => column.bindings.includes(qualifier));
		const rightBound = rightResolver.columns.some(column => column.bindings.includes(qualifier));
		if (leftBound !== rightBound) {
			return leftBound
				? { side: 'left', index: leftResolver.resolve(ref) }
				: { side: 'right', index: rightResolver.resolve(ref) };
		}
		// Unbound or bound on both sides: fall through to the bare name
	}

	const bare: ColumnPlanExpr = { kind: 'column', name: ref.name };
	const inLeft = leftResolver.tryResolve(bare);
	const inRight = rightResolver.tryResolve(bare);
	if (inLeft !== undefined && inRight !== undefined) {
		throw new ExecutionError('AmbiguousColumn', `Column '${ref.name}' exists on both sides of the join`);
	}
	if (inLeft !== undefined) return { side: 'left', index: inLeft };
	if (inRight !== undefined) return { side: 'right', index: inRight };
	const shown = ref.table ? `${ref.table}.${ref.name}` : ref.name;
	throw new ExecutionError('UnknownColumn', `Unknown column '${shown}' in join condition`);
}

type KeyDomain = 'number' | 'text';

/**
 * Index lookup agrees with predicate evaluation only when each key column pair
 * holds a single domain on both sides: numbers (booleans as 0/1) or text.
 * Anything mixed goes through the predicate, which coerces or rejects the pair.
 */
function keysComparable(keys: JoinKeys, leftRows: readonly Row[], rightRows: readonly Row[]): boolean {
	for (let k = 0; k < keys.left.length; k++) {
		const domains = new Set<KeyDomain>();
		for (const row of leftRows) addDomain(domains, row[keys.left[k]]);
		for (const row of rightRows) addDomain(domains, row[keys.right[k]]);
		if (domains.size > 1) {
			log('Key column %d mixes text and numbers; matching by predicate', k);
			return false;
		}
	}
	return true;
}

function addDomain(domains: Set<KeyDomain>, value: SqlValue): void {
	if (value === null) return;
	domains.add(typeof value === 'string' ? 'text' : 'number');
}

/** Booleans join as 0 and 1, as they compare in predicates. */
function keyOf(row: Row, positions: readonly number[]): Row {
	return positions.map(i => {
		const value = row[i];
		return typeof value === 'boolean' ? numericValue(value) : value;
	});
}

/** Indexes right rows by key tuple; rows with a null key never match. */
function keyMatcher(keys: JoinKeys, rightRows: readonly Row[]): (leftRow: Row) => number[] {
	const index = new BTree<Row, KeyBucket>((bucket: KeyBucket) => bucket.key, compareRows);
	rightRows.forEach((row, rowIndex) => {
		const key = keyOf(row, keys.right);
		if (key.some(value => value === null)) return;
		const bucket = index.get(key);
		if (bucket) {
			bucket.rows.push(rowIndex);
		} else {
			index.insert({ key, rows: [rowIndex] });
		}
	});

	return (leftRow: Row) => {
		const key = keyOf(leftRow, keys.left);
		if (key.some(value => value === null)) return [];
		return index.get(key)?.rows ?? [];
	};
}

/** Evaluates the ON condition for every right row. */
function predicateMatcher(
	condition: PlanCondition,
	columns: readonly RelationColumn[],
	rightRows: readonly Row[],
	scope: ExecutionScope,
): (leftRow: Row) => number[] {
	const resolver = new ColumnResolver(columns);
	return (leftRow: Row) => {
		const matches: number[] = [];
		rightRows.forEach((rightRow, rightIndex) => {
			if (evaluateCondition(condition, { scope, resolver, row: [...leftRow, ...rightRow] })) {
				matches.push(rightIndex);
			}
		});
		return matches;
	};
}
