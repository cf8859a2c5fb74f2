/**
 * Students Example
 *
 * Runs a few queries over a small in-memory table and prints the results.
 * Set DEBUG=relquery:* to watch each pipeline stage.
 */

import { Table, query, formatErrorChain } from '../src/index.js';

const students = Table.fromRecords([
	{ id: 1, name: 'Alice', age: 22, grade: 'A' },
	{ id: 2, name: 'Bob', age: 19, grade: 'B' },
	{ id: 3, name: 'Carl', age: 21, grade: 'A' },
]);

const queries = [
	`SELECT name, age FROM students WHERE age BETWEEN 20 AND 25 ORDER BY age DESC`,
	`SELECT grade, COUNT(*), ROUND(AVG(age), 1) FROM students GROUP BY grade`,
	`SELECT grade, COUNT(*) FROM students GROUP BY grade HAVING COUNT(*) > 1`,
	`SELECT name, CASE WHEN age >= 21 THEN 'senior' ELSE 'junior' END AS band FROM students`,
	`SELECT nickname FROM students`,
];

for (const sql of queries) {
	console.log(`\n${sql}`);
	try {
		console.table(query(sql, { students }).toRecords());
	} catch (error) {
		console.error(formatErrorChain(error));
	}
}
