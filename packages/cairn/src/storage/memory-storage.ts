import { StorageError } from '../common/errors.js';
import { createLogger } from '../common/logger.js';
import type { Row } from '../common/types.js';
import type { ColumnSchema, TableSchema } from '../schema/table.js';
import type { TableStorage } from './table-storage.js';

const log = createLogger('storage:memory');

interface MemoryTable {
	header: string[];
	rows: Row[];
}

/**
 * In-memory table storage. Used when no data directory is configured,
 * and as the stand-in for file storage in tests.
 */
export class MemoryTableStorage implements TableStorage {
	private tables = new Map<string, MemoryTable>();

	createTableStorage(schema: TableSchema): void {
		this.tables.set(schema.name, { header: schema.columns.map(col => col.name), rows: [] });
		log('Created storage for %s', schema.name);
	}

	dropTableStorage(name: string): void {
		this.tables.delete(name);
	}

	renameTableStorage(oldName: string, newName: string): void {
		const table = this.tables.get(oldName);
		if (!table) return;
		this.tables.delete(oldName);
		this.tables.set(newName, table);
	}

	readAllRows(name: string): Row[] {
		return this.require(name).rows.map(row => [...row]);
	}

	appendRow(name: string, values: Row): void {
		this.require(name).rows.push([...values]);
	}

	writeAllRows(name: string, schema: TableSchema, rows: Row[]): void {
		this.tables.set(name, {
			header: schema.columns.map(col => col.name),
			rows: rows.map(row => [...row]),
		});
	}

	addColumn(name: string, column: ColumnSchema): void {
		const table = this.require(name);
		table.header.push(column.name);
		for (const row of table.rows) {
			row.push('');
		}
	}

	dropColumn(name: string, columnName: string): void {
		const table = this.require(name);
		const index = this.columnIndex(table, columnName);
		table.header.splice(index, 1);
		for (const row of table.rows) {
			row.splice(index, 1);
		}
	}

	modifyColumn(name: string, column: ColumnSchema): void {
		this.columnIndex(this.require(name), column.name);
	}

	private columnIndex(table: MemoryTable, columnName: string): number {
		const index = table.header.indexOf(columnName);
		if (index < 0) {
			throw new StorageError(`Column not found in storage: ${columnName}`);
		}
		return index;
	}

	private require(name: string): MemoryTable {
		const table = this.tables.get(name);
		if (!table) {
			throw new StorageError(`No storage for table: ${name}`);
		}
		return table;
	}
}
