import { expect } from 'chai';
import debug from 'debug';
import { format } from 'node:util';
import { disableLogging, enableLogging, isLoggingEnabled, query } from '../../src/index.js';
import { tables } from '../helpers/fixtures.js';

describe('Logging', () => {
	const originalLog = debug.log;

	afterEach(() => {
		disableLogging();
		debug.log = originalLog;
	});

	it('should be off until enabled', () => {
		expect(isLoggingEnabled('runtime:executor')).to.equal(false);
	});

	it('should route enabled namespaces to the given sink', () => {
		const lines: string[] = [];
		enableLogging('relquery:runtime:executor', (...args: unknown[]) => lines.push(format(...args)));

		expect(isLoggingEnabled('runtime:executor')).to.equal(true);
		expect(isLoggingEnabled('lexer')).to.equal(false);

		query('SELECT * FROM students', tables);
		expect(lines.some(line => line.includes('Query produced 3 rows x 4 columns'))).to.equal(true);
		expect(lines.some(line => line.includes('Scanned'))).to.equal(false);
	});
});
