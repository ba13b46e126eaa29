import { CatalogError } from '../common/errors.js';
import { createLogger } from '../common/logger.js';
import { cloneTableSchema, findColumnIndex, type ColumnSchema, type TableSchema } from './table.js';

const log = createLogger('schema:catalog');

/**
 * Schema metadata keyed by table name.
 * Each mutating operation fails with a CatalogError when its precondition does not hold.
 */
export interface Catalog {
	tableExists(name: string): boolean;
	/** A copy of the table's schema, or undefined when there is no such table. */
	getTable(name: string): TableSchema | undefined;
	/** Table names in ascending order. */
	listTables(): string[];
	createTable(schema: TableSchema): void;
	dropTable(name: string): void;
	renameTable(oldName: string, newName: string): void;
	addColumn(table: string, column: ColumnSchema): void;
	dropColumn(table: string, columnName: string): void;
	/** Replaces type and length of the existing column with `column.name`. */
	modifyColumn(table: string, column: ColumnSchema): void;
}

/**
 * Map-backed catalog. Schemas are copied on the way in and out so callers
 * cannot alter the stored metadata.
 */
export class MemoryCatalog implements Catalog {
	protected tables = new Map<string, TableSchema>();

	tableExists(name: string): boolean {
		return this.tables.has(name);
	}

	getTable(name: string): TableSchema | undefined {
		const schema = this.tables.get(name);
		return schema ? cloneTableSchema(schema) : undefined;
	}

	listTables(): string[] {
		return [...this.tables.keys()].sort();
	}

	createTable(schema: TableSchema): void {
		if (this.tables.has(schema.name)) {
			throw new CatalogError(`Table already exists: ${schema.name}`);
		}
		this.tables.set(schema.name, cloneTableSchema(schema));
		log('Created table %s', schema.name);
		this.changed();
	}

	dropTable(name: string): void {
		this.require(name);
		this.tables.delete(name);
		log('Dropped table %s', name);
		this.changed();
	}

	renameTable(oldName: string, newName: string): void {
		const schema = this.require(oldName);
		if (this.tables.has(newName)) {
			throw new CatalogError(`Target table already exists: ${newName}`);
		}
		this.tables.delete(oldName);
		this.tables.set(newName, { ...schema, name: newName });
		log('Renamed table %s to %s', oldName, newName);
		this.changed();
	}

	addColumn(table: string, column: ColumnSchema): void {
		const schema = this.require(table);
		if (findColumnIndex(schema, column.name) >= 0) {
			throw new CatalogError(`Column already exists: ${column.name}`);
		}
		schema.columns.push({ ...column });
		this.changed();
	}

	dropColumn(table: string, columnName: string): void {
		const schema = this.require(table);
		const index = findColumnIndex(schema, columnName);
		if (index < 0) {
			throw new CatalogError(`Column does not exist: ${columnName}`);
		}
		schema.columns.splice(index, 1);
		this.changed();
	}

	modifyColumn(table: string, column: ColumnSchema): void {
		const schema = this.require(table);
		const index = findColumnIndex(schema, column.name);
		if (index < 0) {
			throw new CatalogError(`Column does not exist: ${column.name}`);
		}
		schema.columns[index] = { ...column };
		this.changed();
	}

	/** Called after every successful mutation. */
	protected changed(): void {
		// Nothing to persist in memory
	}

	private require(name: string): TableSchema {
		const schema = this.tables.get(name);
		if (!schema) {
			throw new CatalogError(`Table does not exist: ${name}`);
		}
		return schema;
	}
}
