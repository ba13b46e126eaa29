import { expect } from 'chai';
import type { CairnError, ExecutionResult, Result } from '../src/index.js';
import { Database, resultText } from '../src/index.js';

/** Unwraps a successful result, failing the test with the error message otherwise. */
export function expectOk<T>(result: Result<T>): T {
	if (!result.ok) {
		expect.fail(`Expected success but got: ${result.error.message}`);
	}
	return result.value;
}

/** Unwraps a failed result. */
export function expectErr<T>(result: Result<T>): CairnError {
	if (result.ok) {
		expect.fail('Expected an error result');
	}
	return result.error;
}

/** Runs a statement that must succeed and returns its printable text. */
export function run(db: Database, sql: string): string {
	return resultText(expectOk(db.exec(sql)));
}

/** Runs a SELECT and returns its header and rows. */
export function query(db: Database, sql: string): { columns: string[]; rows: string[][] } {
	const result: ExecutionResult = expectOk(db.exec(sql));
	if (result.kind !== 'rows') {
		expect.fail(`Expected rows but got ${result.kind}`);
	}
	return { columns: result.columns, rows: result.rows };
}

/** Message of a statement that must fail. */
export function failure(db: Database, sql: string): string {
	return expectErr(db.exec(sql)).message;
}
