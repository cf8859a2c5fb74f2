import { createLogger } from '../../common/logger.js';
import type { Row } from '../../common/types.js';
import type { PlanCondition } from '../../planner/plan.js';
import { evaluateCondition } from '../condition.js';
import type { EvalContext } from '../expression.js';
import type { Relation } from '../relation.js';

const log = createLogger('runtime:filter');

export interface FilterResult {
	relation: Relation;
	/** Input positions of the rows kept, in order */
	kept: number[];
}

/**
 * Keeps the rows for which the condition holds.
 * @param contextFor Builds the evaluation context for one input row
 */
export function runFilter(
	input: Relation,
	condition: PlanCondition,
	contextFor: (row: Row, index: number) => EvalContext,
): FilterResult {
	const kept: number[] = [];
	input.rows.forEach((row, index) => {
		if (evaluateCondition(condition, contextFor(row, index))) {
			kept.push(index);
		}
	});
	log('Filter kept %d of %d rows', kept.length, input.rows.length);
	return { relation: { columns: input.columns, rows: kept.map(i => input.rows[i]) }, kept };
}
