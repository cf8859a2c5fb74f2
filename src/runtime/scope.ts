import { createLogger } from '../common/logger.js';
import { ExecutionError } from '../common/errors.js';
import type { ResolvedExecutionOptions } from '../core/options.js';
import type { Plan } from '../planner/plan.js';
import { likeToRegExp } from '../util/patterns.js';
import type { Relation } from './relation.js';
import type { Table } from './table.js';

const log = createLogger('runtime:scope');

/** Evaluates a nested plan in the given scope. */
export type PlanRunner = (plan: Plan, scope: ExecutionScope) => Relation;

/**
 * Transient state for one call to execute(): the bound input tables, options,
 * nesting depth, the results of subqueries already run and compiled LIKE patterns.
 * Child scopes share both caches and are discarded with their parent.
 */
export class ExecutionScope {
	private constructor(
		private readonly tables: ReadonlyMap<string, Table>,
		readonly options: ResolvedExecutionOptions,
		readonly depth: number,
		private readonly runner: PlanRunner,
		private readonly subqueryResults: Map<Plan, Relation>,
		private readonly likePatterns: Map<string, RegExp>,
	) {}

	static root(tables: ReadonlyMap<string, Table>, options: ResolvedExecutionOptions, runner: PlanRunner): ExecutionScope {
		return new ExecutionScope(tables, options, 0, runner, new Map(), new Map());
	}

	/**
	 * @throws ExecutionError(UnknownTable)
	 */
	lookupTable(name: string): Table {
		const table = this.tables.get(name);
		if (!table) {
			throw new ExecutionError('UnknownTable', `Unknown table '${name}'`);
		}
		return table;
	}

	/**
	 * Scope for a subquery or set-operation branch, one level deeper.
	 * @throws ExecutionError(RecursionLimitExceeded) past options.maxDepth
	 */
	child(): ExecutionScope {
		const depth = this.depth + 1;
		if (depth > this.options.maxDepth) {
			throw new ExecutionError('RecursionLimitExceeded', `Query nesting exceeds the maximum depth of ${this.options.maxDepth}`);
		}
		return new ExecutionScope(this.tables, this.options, depth, this.runner, this.subqueryResults, this.likePatterns);
	}

	/** Runs a set-operation branch one level deeper. */
	runBranch(plan: Plan): Relation {
		return this.runner(plan, this.child());
	}

	/** LIKE pattern compiled under the case sensitivity of the options. */
	likePattern(pattern: string): RegExp {
		let regex = this.likePatterns.get(pattern);
		if (!regex) {
			regex = likeToRegExp(pattern, this.options.caseSensitiveLike);
			this.likePatterns.set(pattern, regex);
		}
		return regex;
	}

	/**
	 * Runs an uncorrelated subquery once per execution and reuses its result.
	 */
	runSubquery(plan: Plan): Relation {
		const cached = this.subqueryResults.get(plan);
		if (cached) {
			log('Reusing subquery result (%d rows)', cached.rows.length);
			return cached;
		}
		const result = this.runner(plan, this.child());
		this.subqueryResults.set(plan, result);
		return result;
	}
}
