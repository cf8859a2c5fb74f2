import { BTree } from 'inheritree';
import { createLogger } from '../../common/logger.js';
import type { Row } from '../../common/types.js';
import { compareRows } from '../../util/comparison.js';

const log = createLogger('runtime:distinct');

/**
 * Positions of the first occurrence of each distinct row, in order.
 */
export function distinctRowIndexes(rows: readonly Row[]): number[] {
	const distinctTree = new BTree<Row, Row>((row: Row) => row, compareRows);
	const kept: number[] = [];
	rows.forEach((row, index) => {
		if (distinctTree.insert(row).on) {
			kept.push(index);
		}
	});
	log('Distinct kept %d of %d rows', kept.length, rows.length);
	return kept;
}
