export * from './ast.js';
export * from './lexer.js';
export * from './cursor.js';
export * from './parser.js';

import { asCairnError } from '../common/errors.js';
import { err, ok, type Result } from '../common/types.js';
import { Parser } from './parser.js';
import type { Statement } from './ast.js';

/**
 * Parse one SQL statement.
 *
 * @param sql statement text, optionally ending in ';'
 * @returns the statement, or the lexical or syntax error that stopped parsing
 */
export function parse(sql: string): Result<Statement> {
	try {
		return ok(new Parser().parse(sql));
	} catch (e) {
		return err(asCairnError(e));
	}
}
