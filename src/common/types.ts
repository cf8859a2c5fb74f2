/**
 * The scalar values a table cell, literal or expression result can hold.
 * Integral numbers stand in for 64-bit integers, all other numbers are doubles.
 */
export type SqlValue = string | number | boolean | null;

/** A row of cells, positionally aligned with a table's columns. */
export type Row = SqlValue[];

/**
 * Status codes carried on every error; the numbering follows SQLite's result codes.
 */
export enum StatusCode {
	OK = 0,
	ERROR = 1,
	INTERNAL = 2,
	NOTFOUND = 12,
	TOOBIG = 18,
	MISMATCH = 20,
	MISUSE = 21,
	SYNTAX = 29,
}
