import { DataType } from '../common/datatype.js';

/**
 * Represents the schema definition of a single column in a table.
 */
export interface ColumnSchema {
	/** Column name, compared case-sensitively */
	name: string;
	dataType: DataType;
	/** Declared maximum length; only enforced for VARCHAR */
	length: number;
}

/**
 * Represents the schema of a table: its name and ordered columns.
 */
export interface TableSchema {
	name: string;
	columns: ColumnSchema[];
}

/** Index of the named column, or -1. */
export function findColumnIndex(schema: TableSchema, name: string): number {
	return schema.columns.findIndex(col => col.name === name);
}

export function hasColumn(schema: TableSchema, name: string): boolean {
	return findColumnIndex(schema, name) >= 0;
}

export function cloneTableSchema(schema: TableSchema): TableSchema {
	return {
		name: schema.name,
		columns: schema.columns.map(col => ({ ...col })),
	};
}

/** Renders a column the way it is declared, e.g. `name VARCHAR(32)`. */
export function columnToString(column: ColumnSchema): string {
	return column.dataType === DataType.Varchar
		? `${column.name} VARCHAR(${column.length})`
		: `${column.name} ${column.dataType}`;
}

/** Renders the CREATE TABLE statement that would produce this schema. */
export function createTableToString(schema: TableSchema): string {
	return `CREATE TABLE ${schema.name} (${schema.columns.map(columnToString).join(', ')})`;
}
