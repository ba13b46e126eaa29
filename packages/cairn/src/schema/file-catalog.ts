import * as fs from 'node:fs';
import * as path from 'node:path';
import { createLogger } from '../common/logger.js';
import { StorageError, toError } from '../common/errors.js';
import { defaultLength, parseDataType } from '../common/datatype.js';
import { MemoryCatalog } from './catalog.js';
import type { ColumnSchema, TableSchema } from './table.js';

const log = createLogger('schema:file-catalog');
const warnLog = log.extend('warn');

export const CATALOG_FILE_NAME = 'catalog.meta';

/**
 * Parses one catalog line: `name|col:TYPE:len,col:TYPE:len`.
 * Returns undefined for lines without a table name or column section.
 */
export function parseCatalogLine(line: string): TableSchema | undefined {
	const parts = line.split('|');
	if (parts.length < 2 || parts[0] === '') {
		return undefined;
	}

	const columns: ColumnSchema[] = [];
	for (const entry of parts[1].split(',')) {
		if (entry === '') continue;
		const [name, typeName, lengthText] = entry.split(':');
		const dataType = typeName === undefined ? undefined : parseDataType(typeName);
		if (!name || dataType === undefined) {
			warnLog('Skipping column entry %s in catalog line %s', entry, line);
			continue;
		}
		const length = lengthText === undefined ? Number.NaN : Number.parseInt(lengthText, 10);
		columns.push({ name, dataType, length: Number.isNaN(length) ? defaultLength(dataType) : length });
	}

	return { name: parts[0], columns };
}

export function formatCatalogLine(schema: TableSchema): string {
	const columns = schema.columns.map(col => `${col.name}:${col.dataType}:${col.length}`);
	return `${schema.name}|${columns.join(',')}`;
}

/**
 * Catalog persisted as `catalog.meta` in the data directory.
 * The whole file is rewritten, ordered by table name, after every change.
 */
export class FileCatalog extends MemoryCatalog {
	readonly filePath: string;

	constructor(dataDir: string) {
		super();
		this.filePath = path.join(dataDir, CATALOG_FILE_NAME);
		try {
			fs.mkdirSync(dataDir, { recursive: true });
		} catch (e) {
			throw new StorageError(`Failed to create data directory: ${dataDir}`, toError(e));
		}
		this.load();
	}

	/** Discards in-memory state and re-reads the catalog file. */
	refresh(): void {
		this.load();
	}

	protected override changed(): void {
		const lines = this.listTables().map(name => {
			const schema = this.getTable(name);
			return schema ? formatCatalogLine(schema) + '\n' : '';
		});
		try {
			fs.writeFileSync(this.filePath, lines.join(''), 'utf8');
		} catch (e) {
			throw new StorageError('Failed to open catalog file for writing', toError(e));
		}
	}

	private load(): void {
		this.tables.clear();
		if (!fs.existsSync(this.filePath)) {
			log('No catalog file at %s', this.filePath);
			return;
		}

		let text: string;
		try {
			text = fs.readFileSync(this.filePath, 'utf8');
		} catch (e) {
			throw new StorageError(`Failed to read catalog file: ${this.filePath}`, toError(e));
		}

		for (const line of text.split(/\r?\n/)) {
			if (line === '') continue;
			const schema = parseCatalogLine(line);
			if (!schema) {
				warnLog('Skipping malformed catalog line: %s', line);
				continue;
			}
			this.tables.set(schema.name, schema);
		}
		log('Loaded %d table(s) from %s', this.tables.size, this.filePath);
	}
}
