/**
 * Positions [offset, offset + count) clipped to the row count.
 * An offset past the end gives no rows.
 */
export function limitRange(rowCount: number, limit: { count: number; offset: number }): { start: number; end: number } {
	const start = Math.min(Math.max(0, limit.offset), rowCount);
	const end = Math.min(start + Math.max(0, limit.count), rowCount);
	return { start, end };
}
