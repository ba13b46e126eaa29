import type { Row } from '../common/types.js';
import type { ColumnSchema, TableSchema } from '../schema/table.js';

/**
 * Row data keyed by table name. Cells are untyped text in schema column order;
 * typing is the engine's concern.
 */
export interface TableStorage {
	/** Creates empty storage for the table, replacing anything already there. */
	createTableStorage(schema: TableSchema): void;
	/** Removes the table's rows. A missing table is not an error. */
	dropTableStorage(name: string): void;
	/** Moves the table's rows to a new name. A missing table is not an error. */
	renameTableStorage(oldName: string, newName: string): void;
	readAllRows(name: string): Row[];
	appendRow(name: string, values: Row): void;
	/** Replaces every row of the table. */
	writeAllRows(name: string, schema: TableSchema, rows: Row[]): void;
	/** Appends an empty cell for the new column to every row. */
	addColumn(name: string, column: ColumnSchema): void;
	/** Removes the named column's cell from every row. */
	dropColumn(name: string, columnName: string): void;
	/** Rewrites the table under the column's new definition; cell text is kept as is. */
	modifyColumn(name: string, column: ColumnSchema): void;
}
