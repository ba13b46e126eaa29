import type { Catalog } from '../schema/catalog.js';
import type { TableStorage } from '../storage/table-storage.js';

/**
 * Options for opening a database.
 * With `dataDir`, the catalog and rows live in files under that directory;
 * explicit `catalog` / `storage` collaborators take precedence over it.
 */
export interface DatabaseOptions {
	dataDir?: string;
	catalog?: Catalog;
	storage?: TableStorage;
}

/** Data directory used by the command line when none is configured. */
export const DEFAULT_DATA_DIR = 'data';
