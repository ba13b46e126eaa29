/**
 * Cairn - a small embedded SQL engine
 *
 * Compiles one SQL statement at a time into an AST and runs it against a
 * catalog of table schemas and a storage of text rows.
 */

// Core database functionality
export { Database } from './core/database.js';
export { Engine, resultText } from './core/engine.js';
export type { ExecutionResult } from './core/engine.js';
export { DEFAULT_DATA_DIR } from './core/database-options.js';
export type { DatabaseOptions } from './core/database-options.js';

// Common data types and errors
export { StatusCode, ok, err } from './common/types.js';
export type { Result, Row } from './common/types.js';
export { DataType, DEFAULT_LENGTHS, defaultLength, parseDataType } from './common/datatype.js';
export {
	CairnError,
	LexError,
	ParseError,
	CatalogError,
	EvaluationError,
	StorageError,
	asCairnError,
} from './common/errors.js';

// SQL parser
export { parse } from './parser/index.js';
export { Parser, RESERVED_WORDS, isReservedWord } from './parser/parser.js';
export { Lexer, TokenKind, tokenize } from './parser/lexer.js';
export type { Token } from './parser/lexer.js';
export { TokenCursor } from './parser/cursor.js';
export type * as AST from './parser/ast.js';

// Schema and storage collaborators
export { MemoryCatalog } from './schema/catalog.js';
export type { Catalog } from './schema/catalog.js';
export { FileCatalog, CATALOG_FILE_NAME } from './schema/file-catalog.js';
export type { TableSchema, ColumnSchema } from './schema/table.js';
export { createTableToString, columnToString } from './schema/table.js';
export type { TableStorage } from './storage/table-storage.js';
export { MemoryTableStorage } from './storage/memory-storage.js';
export { CsvTableStorage } from './storage/csv-storage.js';

// Runtime
export { formatResultTable } from './runtime/format.js';
export { storageToLiteral, literalToStorage, compareLiterals } from './runtime/literal.js';

// Debug logging utilities
export { enableLogging, disableLogging, isLoggingEnabled } from './common/logger.js';
