import { MisuseError } from '../common/errors.js';
import type { Row, SqlValue } from '../common/types.js';

/** One named column of a Table. */
export interface TableColumn {
	readonly name: string;
	readonly values: readonly SqlValue[];
}

export type TableRecord = Record<string, SqlValue>;

function isSqlValue(value: unknown): value is SqlValue {
	return value === null ||
		typeof value === 'string' ||
		typeof value === 'boolean' ||
		(typeof value === 'number' && !Number.isNaN(value));
}

function checkValue(value: unknown, column: string, rowIndex: number): SqlValue {
	if (!isSqlValue(value)) {
		throw new MisuseError(`Column '${column}' row ${rowIndex} holds an unsupported value of type ${typeof value}`);
	}
	return value;
}

/**
 * An immutable, column-ordered table of SqlValue cells.
 * All columns have the same length and column names are unique.
 * Tables are frozen on construction; operators always build new ones.
 */
export class Table {
	readonly columns: readonly TableColumn[];
	readonly rowCount: number;
	private readonly indexByName: ReadonlyMap<string, number>;

	/**
	 * @throws MisuseError on duplicate or empty names, ragged columns or unsupported cell values
	 */
	constructor(columns: readonly { name: string; values: readonly unknown[] }[]) {
		const indexByName = new Map<string, number>();
		const frozen: TableColumn[] = [];
		const rowCount = columns.length > 0 ? columns[0].values.length : 0;

		columns.forEach((column, index) => {
			if (typeof column.name !== 'string' || column.name === '') {
				throw new MisuseError(`Column ${index} needs a non-empty name`);
			}
			if (indexByName.has(column.name)) {
				throw new MisuseError(`Duplicate column name '${column.name}'`);
			}
			if (column.values.length !== rowCount) {
				throw new MisuseError(`Column '${column.name}' has ${column.values.length} values, expected ${rowCount}`);
			}
			indexByName.set(column.name, index);
			const values = column.values.map((value, rowIndex) => checkValue(value, column.name, rowIndex));
			frozen.push(Object.freeze({ name: column.name, values: Object.freeze(values) }));
		});

		this.columns = Object.freeze(frozen);
		this.rowCount = rowCount;
		this.indexByName = indexByName;
		Object.freeze(this);
	}

	/**
	 * Builds a table from row objects. Columns appear in first-seen key order;
	 * a key missing from a record reads as null.
	 */
	static fromRecords(records: readonly Readonly<Record<string, unknown>>[]): Table {
		const names: string[] = [];
		const seen = new Set<string>();
		for (const record of records) {
			for (const key of Object.keys(record)) {
				if (!seen.has(key)) {
					seen.add(key);
					names.push(key);
				}
			}
		}
		return new Table(names.map(name => ({
			name,
			values: records.map(record => Object.prototype.hasOwnProperty.call(record, name) ? record[name] : null),
		})));
	}

	/**
	 * Builds a table from positional rows.
	 * @throws MisuseError when a row's length differs from the column count
	 */
	static fromRows(columnNames: readonly string[], rows: readonly (readonly unknown[])[]): Table {
		rows.forEach((row, rowIndex) => {
			if (row.length !== columnNames.length) {
				throw new MisuseError(`Row ${rowIndex} has ${row.length} values, expected ${columnNames.length}`);
			}
		});
		return new Table(columnNames.map((name, index) => ({
			name,
			values: rows.map(row => row[index]),
		})));
	}

	/** A table with the given columns and no rows. */
	static empty(columnNames: readonly string[]): Table {
		return new Table(columnNames.map(name => ({ name, values: [] })));
	}

	get columnNames(): string[] {
		return this.columns.map(column => column.name);
	}

	get columnCount(): number {
		return this.columns.length;
	}

	/** Position of a column, or -1. */
	columnIndex(name: string): number {
		return this.indexByName.get(name) ?? -1;
	}

	/** Values of a named column, or undefined when there is no such column. */
	column(name: string): readonly SqlValue[] | undefined {
		const index = this.indexByName.get(name);
		return index === undefined ? undefined : this.columns[index].values;
	}

	row(index: number): Row {
		if (!Number.isInteger(index) || index < 0 || index >= this.rowCount) {
			throw new MisuseError(`Row index ${index} out of range 0..${this.rowCount - 1}`);
		}
		return this.columns.map(column => column.values[index]);
	}

	/** Fresh row arrays, in order. */
	rows(): Row[] {
		const result: Row[] = [];
		for (let i = 0; i < this.rowCount; i++) {
			result.push(this.columns.map(column => column.values[i]));
		}
		return result;
	}

	toRecords(): TableRecord[] {
		const result: TableRecord[] = [];
		for (let i = 0; i < this.rowCount; i++) {
			const record: TableRecord = {};
			for (const column of this.columns) {
				record[column.name] = column.values[i];
			}
			result.push(record);
		}
		return result;
	}

	/** Same column names in the same order and equal cells throughout. */
	equals(other: Table): boolean {
		if (other.columnCount !== this.columnCount || other.rowCount !== this.rowCount) return false;
		return this.columns.every((column, index) => {
			const otherColumn = other.columns[index];
			return column.name === otherColumn.name &&
				column.values.every((value, rowIndex) => value === otherColumn.values[rowIndex]);
		});
	}
}
