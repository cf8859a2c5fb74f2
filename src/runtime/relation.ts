import { ExecutionError } from '../common/errors.js';
import type { Row } from '../common/types.js';
import type { ColumnPlanExpr } from '../planner/plan.js';
import { Table } from './table.js';

/**
 * A column of an intermediate result, with enough provenance to resolve
 * qualified references after joins and projection.
 */
export interface RelationColumn {
	/** Current name, unique within the relation */
	readonly name: string;
	/** Name in the table it was read from, before any join suffix */
	readonly origin?: string;
	/** Table names and aliases that qualify this column */
	readonly bindings: readonly string[];
	/** Rendered select-list expression that produced the column */
	readonly exprName?: string;
}

/** Row-major intermediate result passed between operators. Never mutated. */
export interface Relation {
	readonly columns: readonly RelationColumn[];
	readonly rows: readonly Row[];
}

/** Reads a bound input table as a relation whose columns answer to `bindings`. */
export function relationFromTable(table: Table, bindings: readonly string[]): Relation {
	return {
		columns: table.columns.map(column => ({ name: column.name, origin: column.name, bindings })),
		rows: table.rows(),
	};
}

export function relationToTable(relation: Relation): Table {
	return Table.fromRows(relation.columns.map(column => column.name), relation.rows);
}

/**
 * Suffixes later duplicates as name_1, name_2, ... skipping names already taken.
 */
export function uniqueNames(names: readonly string[]): string[] {
	const taken = new Set(names);
	const used = new Set<string>();
	return names.map(name => {
		if (!used.has(name)) {
			used.add(name);
			return name;
		}
		let n = 1;
		while (taken.has(`${name}_${n}`) || used.has(`${name}_${n}`)) n++;
		const renamed = `${name}_${n}`;
		used.add(renamed);
		return renamed;
	});
}

/**
 * Resolves column references against one relation's columns, memoising by reference node.
 */
export class ColumnResolver {
	private readonly cache = new Map<ColumnPlanExpr, number>();

	constructor(readonly columns: readonly RelationColumn[]) {}

	/**
	 * @throws ExecutionError(UnknownColumn) or ExecutionError(AmbiguousColumn)
	 */
	resolve(ref: ColumnPlanExpr): number {
		const cached = this.cache.get(ref);
		if (cached !== undefined) return cached;

		const index = this.find(ref);
		if (index === undefined) {
			const shown = ref.table ? `${ref.table}.${ref.name}` : ref.name;
			throw new ExecutionError('UnknownColumn', `Unknown column '${shown}'`);
		}
		this.cache.set(ref, index);
		return index;
	}

	/** Like resolve, but undefined when the column does not exist. */
	tryResolve(ref: ColumnPlanExpr): number | undefined {
		const cached = this.cache.get(ref);
		if (cached !== undefined) return cached;
		const index = this.find(ref);
		if (index !== undefined) this.cache.set(ref, index);
		return index;
	}

	private find(ref: ColumnPlanExpr): number | undefined {
		if (ref.table !== undefined) {
			const qualifier = ref.table;
			const bound = this.matching(column => column.bindings.includes(qualifier));
			if (bound.length > 0) {
				const byOrigin = bound.filter(i => this.columns[i].origin === ref.name);
				const candidates = byOrigin.length > 0 ? byOrigin : bound.filter(i => this.columns[i].name === ref.name);
				if (candidates.length > 1) {
					throw new ExecutionError('AmbiguousColumn', `Column reference '${qualifier}.${ref.name}' is ambiguous`);
				}
				return candidates[0];
			}
			// Unbound qualifier: resolve by the bare name
		}

		const exact = this.matching(column => column.name === ref.name);
		return exact[0];
	}

	private matching(predicate: (column: RelationColumn) => boolean): number[] {
		const result: number[] = [];
		this.columns.forEach((column, index) => {
			if (predicate(column)) result.push(index);
		});
		return result;
	}
}
