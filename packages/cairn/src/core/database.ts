import { createLogger } from '../common/logger.js';
import { err, type Result } from '../common/types.js';
import { parse } from '../parser/index.js';
import { MemoryCatalog, type Catalog } from '../schema/catalog.js';
import { FileCatalog } from '../schema/file-catalog.js';
import type { TableSchema } from '../schema/table.js';
import { MemoryTableStorage } from '../storage/memory-storage.js';
import { CsvTableStorage } from '../storage/csv-storage.js';
import type { TableStorage } from '../storage/table-storage.js';
import { Engine, type ExecutionResult } from './engine.js';
import type { DatabaseOptions } from './database-options.js';

const log = createLogger('core:database');

/**
 * Entry point for running SQL text. Pairs a catalog with a table storage;
 * memory-backed unless a data directory or explicit collaborators are given.
 */
export class Database {
	readonly catalog: Catalog;
	readonly storage: TableStorage;
	private readonly engine: Engine;

	constructor(options: DatabaseOptions = {}) {
		const { dataDir } = options;
		this.catalog = options.catalog ?? (dataDir !== undefined ? new FileCatalog(dataDir) : new MemoryCatalog());
		this.storage = options.storage ?? (dataDir !== undefined ? new CsvTableStorage(dataDir) : new MemoryTableStorage());
		this.engine = new Engine(this.catalog, this.storage);
		log('Database instance created (%s)', dataDir ?? 'in memory');
	}

	/**
	 * Parses and executes one statement.
	 *
	 * @example
	 * ```typescript
	 * const db = new Database();
	 * db.exec('CREATE TABLE t (id INT, name VARCHAR(16))');
	 * const result = db.exec('SELECT * FROM t');
	 * if (result.ok) console.log(resultText(result.value));
	 * ```
	 */
	exec(sql: string): Result<ExecutionResult> {
		const stmt = parse(sql);
		if (!stmt.ok) {
			log('Parse failed: %s', stmt.error.message);
			return err(stmt.error);
		}
		return this.engine.execute(stmt.value);
	}

	/** Table names in ascending order. */
	listTables(): string[] {
		return this.catalog.listTables();
	}

	getTable(name: string): TableSchema | undefined {
		return this.catalog.getTable(name);
	}
}
