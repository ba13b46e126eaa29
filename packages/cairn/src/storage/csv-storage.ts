import * as fs from 'node:fs';
import * as path from 'node:path';
import Papa from 'papaparse';
import { StorageError, toError } from '../common/errors.js';
import { createLogger } from '../common/logger.js';
import type { Row } from '../common/types.js';
import type { ColumnSchema, TableSchema } from '../schema/table.js';
import type { TableStorage } from './table-storage.js';

const log = createLogger('storage:csv');

interface CsvTable {
	header: string[];
	rows: Row[];
}

/** Encodes rows as CSV lines; every field is quoted so empty cells survive. */
export function encodeCsv(rows: Row[]): string {
	if (rows.length === 0) return '';
	return Papa.unparse(rows, { quotes: true, newline: '\n' }) + '\n';
}

/** Decodes CSV text into rows of cells; the first row is the header. */
export function decodeCsv(text: string, source: string): Row[] {
	// Only the final line terminator is dropped, so a lone empty cell still reads as a row
	const body = text.replace(/\r?\n$/, '');
	if (body === '') return [];

	const result = Papa.parse<string[]>(body, { delimiter: ',' });
	if (result.errors.length > 0) {
		const first = result.errors[0];
		throw new StorageError(`Malformed CSV in ${source} at row ${first.row}: ${first.message}`);
	}
	return result.data;
}

/**
 * Table storage with one CSV file per table in the data directory.
 * The first line of each file is the header of column names.
 * Files are read and written whole and synchronously.
 */
export class CsvTableStorage implements TableStorage {
	constructor(readonly dataDir: string) {
		try {
			fs.mkdirSync(dataDir, { recursive: true });
		} catch (e) {
			throw new StorageError(`Failed to create data directory: ${dataDir}`, toError(e));
		}
	}

	/** Path of the table's backing file. */
	tablePath(name: string): string {
		return path.join(this.dataDir, `${name}.csv`);
	}

	createTableStorage(schema: TableSchema): void {
		this.write(schema.name, { header: schema.columns.map(col => col.name), rows: [] });
		log('Created %s', this.tablePath(schema.name));
	}

	dropTableStorage(name: string): void {
		const file = this.tablePath(name);
		if (!fs.existsSync(file)) return;
		try {
			fs.rmSync(file);
		} catch (e) {
			throw new StorageError(`Failed to remove storage file: ${file}`, toError(e));
		}
		log('Removed %s', file);
	}

	renameTableStorage(oldName: string, newName: string): void {
		const from = this.tablePath(oldName);
		if (!fs.existsSync(from)) return;
		try {
			fs.renameSync(from, this.tablePath(newName));
		} catch (e) {
			throw new StorageError(`Failed to rename storage file: ${from}`, toError(e));
		}
	}

	readAllRows(name: string): Row[] {
		return this.read(name).rows;
	}

	appendRow(name: string, values: Row): void {
		const file = this.tablePath(name);
		if (!fs.existsSync(file)) {
			throw new StorageError(`Failed to open table file for append: ${file}`);
		}
		try {
			fs.appendFileSync(file, encodeCsv([values]), 'utf8');
		} catch (e) {
			throw new StorageError(`Failed to open table file for append: ${file}`, toError(e));
		}
	}

	writeAllRows(name: string, schema: TableSchema, rows: Row[]): void {
		this.write(name, { header: schema.columns.map(col => col.name), rows });
	}

	addColumn(name: string, column: ColumnSchema): void {
		const table = this.read(name);
		table.header.push(column.name);
		for (const row of table.rows) {
			row.push('');
		}
		this.write(name, table);
	}

	dropColumn(name: string, columnName: string): void {
		const table = this.read(name);
		const index = this.columnIndex(table, columnName);
		table.header.splice(index, 1);
		for (const row of table.rows) {
			row.splice(index, 1);
		}
		this.write(name, table);
	}

	modifyColumn(name: string, column: ColumnSchema): void {
		const table = this.read(name);
		this.columnIndex(table, column.name);
		this.write(name, table);
	}

	private columnIndex(table: CsvTable, columnName: string): number {
		const index = table.header.indexOf(columnName);
		if (index < 0) {
			throw new StorageError(`Column not found in storage: ${columnName}`);
		}
		return index;
	}

	private read(name: string): CsvTable {
		const file = this.tablePath(name);
		let text: string;
		try {
			text = fs.readFileSync(file, 'utf8');
		} catch (e) {
			throw new StorageError(`Failed to open table file for reading: ${file}`, toError(e));
		}
		const [header = [], ...rows] = decodeCsv(text, file);
		return { header, rows };
	}

	private write(name: string, table: CsvTable): void {
		const file = this.tablePath(name);
		try {
			fs.writeFileSync(file, encodeCsv([table.header, ...table.rows]), 'utf8');
		} catch (e) {
			throw new StorageError(`Failed to write table file: ${file}`, toError(e));
		}
	}
}
