import { EvaluationError } from '../common/errors.js';
import type { Row } from '../common/types.js';
import type { ColumnExpr } from '../parser/ast.js';
import type { ColumnSchema, TableSchema } from '../schema/table.js';

/** One table of a FROM/JOIN chain, before any row is attached. */
export interface TableSource {
	schema: TableSchema;
	tableName: string;
	/** Exposed name: the alias when one was written, else the table name */
	alias: string;
}

/** A row's typed view under one name. */
export interface TableBinding extends TableSource {
	row: Row;
}

/** A column resolved to its table's position in the scope and its position in that table. */
export interface ColumnRef {
	source: number;
	index: number;
	column: ColumnSchema;
}

/**
 * Name lookup for an ordered list of tables. Exposed names must be unique;
 * a qualifier that matches no exposed name may still name a table by its real name.
 */
export class NameScope {
	private readonly byAlias = new Map<string, number>();
	private readonly byTable = new Map<string, number[]>();

	constructor(readonly sources: readonly TableSource[]) {
		sources.forEach((source, i) => {
			if (this.byAlias.has(source.alias)) {
				throw new EvaluationError(`Duplicate table name or alias: ${source.alias}`);
			}
			this.byAlias.set(source.alias, i);
			const sameTable = this.byTable.get(source.tableName);
			if (sameTable) {
				sameTable.push(i);
			} else {
				this.byTable.set(source.tableName, [i]);
			}
		});
	}

	/** A scope with one more table appended. */
	extend(source: TableSource): NameScope {
		return new NameScope([...this.sources, source]);
	}

	/**
	 * Position of the table a qualifier refers to, or undefined when nothing matches.
	 * @throws EvaluationError when the name is the real name of several aliased tables
	 */
	findTable(name: string): number | undefined {
		const exposed = this.byAlias.get(name);
		if (exposed !== undefined) {
			return exposed;
		}
		const matches = this.byTable.get(name) ?? [];
		if (matches.length > 1) {
			throw new EvaluationError(`Ambiguous table reference: ${name}`);
		}
		return matches[0];
	}

	resolveTable(name: string): number {
		const source = this.findTable(name);
		if (source === undefined) {
			throw new EvaluationError(`Unknown table or alias: ${name}`);
		}
		return source;
	}

	/**
	 * Resolves a column reference. Unqualified names must occur in exactly one table.
	 * @throws EvaluationError for unknown or ambiguous columns
	 */
	resolveColumn(expr: ColumnExpr): ColumnRef {
		if (expr.table !== undefined) {
			const source = this.resolveTable(expr.table);
			const columns = this.sources[source].schema.columns;
			const index = columns.findIndex(col => col.name === expr.name);
			if (index < 0) {
				throw new EvaluationError(`Column not found: ${expr.table}.${expr.name}`);
			}
			return { source, index, column: columns[index] };
		}

		let found: ColumnRef | undefined;
		for (let source = 0; source < this.sources.length; source++) {
			const columns = this.sources[source].schema.columns;
			const index = columns.findIndex(col => col.name === expr.name);
			if (index < 0) continue;
			if (found) {
				throw new EvaluationError(`Ambiguous column: ${expr.name}`);
			}
			found = { source, index, column: columns[index] };
		}
		if (!found) {
			throw new EvaluationError(`Column not found: ${expr.name}`);
		}
		return found;
	}
}

/**
 * The bindings visible while evaluating one candidate row group.
 * Built per candidate; the name lookup is shared through the scope.
 */
export class EvaluationContext {
	readonly bindings: readonly TableBinding[];

	constructor(readonly scope: NameScope, rows: readonly Row[]) {
		this.bindings = scope.sources.map((source, i) => ({ ...source, row: rows[i] ?? [] }));
	}

	/** Builds a scope and context for standalone bindings, such as one table's row in UPDATE. */
	static of(bindings: readonly TableBinding[]): EvaluationContext {
		return new EvaluationContext(new NameScope(bindings), bindings.map(b => b.row));
	}

	/** Raw stored text of a resolved column. */
	cell(ref: ColumnRef): string {
		return this.bindings[ref.source].row[ref.index] ?? '';
	}
}
