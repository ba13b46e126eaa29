import { createLogger } from '../common/logger.js';
import type { Row } from '../common/types.js';
import type { Expression, JoinClause, TableReference } from '../parser/ast.js';
import { EvaluationContext, NameScope, type TableSource } from './context.js';
import { evaluateCondition } from './evaluate.js';

const log = createLogger('runtime:join');

/** A table's schema and every stored row, as loaded for one statement. */
export interface LoadedTable {
	source: TableSource;
	rows: Row[];
}

/** Loads the table at `position` in FROM/JOIN order (0 is the FROM table). */
export type TableLoader = (ref: TableReference, position: number) => LoadedTable;

/** One row per table of the scope, in FROM/JOIN order. */
export type RowGroup = Row[];

export interface JoinResult {
	scope: NameScope;
	groups: RowGroup[];
}

/**
 * Nested-loop inner join in written order.
 * Each joined table is loaded once; every surviving group is paired with every
 * one of its rows and kept when the ON condition holds over the whole candidate.
 */
export function executeJoins(from: TableReference, joins: readonly JoinClause[], load: TableLoader): JoinResult {
	const primary = load(from, 0);
	let scope = new NameScope([primary.source]);
	let groups: RowGroup[] = primary.rows.map(row => [row]);

	for (const [i, join] of joins.entries()) {
		const joined = load(join.table, i + 1);
		scope = scope.extend(joined.source);

		const next: RowGroup[] = [];
		for (const group of groups) {
			for (const row of joined.rows) {
				const candidate = [...group, row];
				if (evaluateCondition(join.condition, new EvaluationContext(scope, candidate))) {
					next.push(candidate);
				}
			}
		}
		log('Join %s: %d x %d -> %d group(s)', joined.source.alias, groups.length, joined.rows.length, next.length);
		groups = next;
	}

	return { scope, groups };
}

/** Keeps the groups for which the condition holds over all joined tables. */
export function filterGroups(scope: NameScope, groups: readonly RowGroup[], where: Expression | undefined): RowGroup[] {
	if (!where) {
		return [...groups];
	}
	return groups.filter(group => evaluateCondition(where, new EvaluationContext(scope, group)));
}
