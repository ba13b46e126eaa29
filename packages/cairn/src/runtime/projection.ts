import { EvaluationError } from '../common/errors.js';
import type { Row } from '../common/types.js';
import type { ResultColumn } from '../parser/ast.js';
import type { NameScope } from './context.js';
import type { RowGroup } from './join.js';

/** Where an output cell comes from: table position in the scope and column position in that table. */
interface CellSource {
	source: number;
	index: number;
}

export interface Projection {
	headers: string[];
	cells: CellSource[];
}

function expandTable(scope: NameScope, source: number, projection: Projection): void {
	const table = scope.sources[source];
	table.schema.columns.forEach((column, index) => {
		projection.headers.push(`${table.alias}.${column.name}`);
		projection.cells.push({ source, index });
	});
}

/**
 * Resolves the SELECT list against the joined tables' schemas.
 * Runs before any row is read, so unknown or ambiguous columns fail even on empty tables.
 */
export function planProjection(columns: readonly ResultColumn[], scope: NameScope): Projection {
	const projection: Projection = { headers: [], cells: [] };

	for (const item of columns) {
		if (item.type === 'all') {
			if (item.table === undefined) {
				scope.sources.forEach((_, source) => expandTable(scope, source, projection));
				continue;
			}
			const source = scope.findTable(item.table);
			if (source === undefined) {
				throw new EvaluationError(`Unknown table alias in wildcard: ${item.table}`);
			}
			expandTable(scope, source, projection);
			continue;
		}

		const ref = scope.resolveColumn(item.expr);
		const { table, name } = item.expr;
		projection.headers.push(item.alias ?? (table !== undefined ? `${table}.${name}` : name));
		projection.cells.push({ source: ref.source, index: ref.index });
	}

	return projection;
}

/** Copies the projected cells out of one row group. */
export function projectRow(projection: Projection, group: RowGroup): Row {
	return projection.cells.map(cell => group[cell.source]?.[cell.index] ?? '');
}
