import { createLogger } from '../common/logger.js';
import { CatalogError, EvaluationError, asCairnError } from '../common/errors.js';
import { err, ok, StatusCode, type Result, type Row } from '../common/types.js';
import type * as AST from '../parser/ast.js';
import type { Catalog } from '../schema/catalog.js';
import { findColumnIndex, hasColumn, type TableSchema } from '../schema/table.js';
import type { TableStorage } from '../storage/table-storage.js';
import { EvaluationContext, NameScope, type TableSource } from '../runtime/context.js';
import { evaluateCondition } from '../runtime/evaluate.js';
import { executeJoins, filterGroups, type LoadedTable } from '../runtime/join.js';
import { literalToStorage, storageToLiteral } from '../runtime/literal.js';
import { planProjection, projectRow } from '../runtime/projection.js';
import { formatResultTable } from '../runtime/format.js';

const log = createLogger('engine');
const errorLog = log.extend('error');

/** Outcome of one executed statement. */
export type ExecutionResult =
	| { kind: 'rows'; columns: string[]; rows: Row[]; text: string }
	| { kind: 'count'; affected: number; message: string }
	| { kind: 'ddl'; message: string };

function success(message: string): string {
	return `OK: ${message}`;
}

/** Text a front end prints for a result. */
export function resultText(result: ExecutionResult): string {
	return result.kind === 'rows' ? result.text : result.message;
}

/**
 * Runs parsed statements against a catalog and a table storage.
 * Every statement is independent; all state lives in the two collaborators.
 */
export class Engine {
	constructor(
		readonly catalog: Catalog,
		readonly storage: TableStorage,
	) {}

	/**
	 * Executes one statement. Failures abort only this statement and are
	 * returned, never thrown.
	 */
	execute(stmt: AST.Statement): Result<ExecutionResult> {
		log('Executing %s', stmt.type);
		try {
			return ok(this.dispatch(stmt));
		} catch (e) {
			const error = asCairnError(e);
			errorLog('%s failed: %s', stmt.type, error.message);
			return err(error);
		}
	}

	private dispatch(stmt: AST.Statement): ExecutionResult {
		switch (stmt.type) {
			case 'createTable': return this.createTable(stmt);
			case 'dropTable': return this.dropTable(stmt);
			case 'alterTable': return this.alterTable(stmt);
			case 'insert': return this.insert(stmt);
			case 'update': return this.update(stmt);
			case 'delete': return this.delete(stmt);
			case 'select': return this.select(stmt);
			default: {
				const exhaustiveCheck: never = stmt;
				throw new EvaluationError(`Unsupported statement type: ${JSON.stringify(exhaustiveCheck)}`, StatusCode.INTERNAL);
			}
		}
	}

	private requireTable(name: string): TableSchema {
		const schema = this.catalog.getTable(name);
		if (!schema) {
			throw new CatalogError(`Table does not exist: ${name}`);
		}
		return schema;
	}

	private createTable(stmt: AST.CreateTableStmt): ExecutionResult {
		const schema: TableSchema = {
			name: stmt.table,
			columns: stmt.columns.map(col => ({ name: col.name, dataType: col.dataType, length: col.length })),
		};
		const seen = new Set<string>();
		for (const col of schema.columns) {
			if (seen.has(col.name)) {
				throw new CatalogError(`Column already exists: ${col.name}`);
			}
			seen.add(col.name);
		}

		this.catalog.createTable(schema);
		this.storage.createTableStorage(schema);
		return { kind: 'ddl', message: success(`Table created: ${schema.name}`) };
	}

	private dropTable(stmt: AST.DropTableStmt): ExecutionResult {
		this.catalog.dropTable(stmt.table);
		this.storage.dropTableStorage(stmt.table);
		return { kind: 'ddl', message: success(`Table dropped: ${stmt.table}`) };
	}

	private alterTable(stmt: AST.AlterTableStmt): ExecutionResult {
		const { table, action } = stmt;
		switch (action.type) {
			case 'renameTable': {
				if (!this.catalog.tableExists(table)) {
					throw new CatalogError(`Table does not exist: ${table}`);
				}
				if (this.catalog.tableExists(action.newName)) {
					throw new CatalogError(`Target table already exists: ${action.newName}`);
				}
				this.storage.renameTableStorage(table, action.newName);
				this.catalog.renameTable(table, action.newName);
				return { kind: 'ddl', message: success(`Table renamed: ${table} -> ${action.newName}`) };
			}

			case 'addColumn': {
				const schema = this.requireTable(table);
				if (hasColumn(schema, action.column.name)) {
					throw new CatalogError(`Column already exists: ${action.column.name}`);
				}
				this.storage.addColumn(table, action.column);
				this.catalog.addColumn(table, action.column);
				return { kind: 'ddl', message: success(`Column added: ${table}.${action.column.name}`) };
			}

			case 'dropColumn': {
				const schema = this.requireTable(table);
				if (!hasColumn(schema, action.name)) {
					throw new CatalogError(`Column does not exist: ${action.name}`);
				}
				if (schema.columns.length <= 1) {
					throw new CatalogError(`Cannot drop the last column from table: ${table}`);
				}
				this.storage.dropColumn(table, action.name);
				this.catalog.dropColumn(table, action.name);
				return { kind: 'ddl', message: success(`Column dropped: ${table}.${action.name}`) };
			}

			case 'modifyColumn': {
				const schema = this.requireTable(table);
				const index = findColumnIndex(schema, action.column.name);
				if (index < 0) {
					throw new CatalogError(`Column does not exist: ${action.column.name}`);
				}
				// Stored text is kept as is, so it must already be valid under the new type
				for (const row of this.storage.readAllRows(table)) {
					const cell = row[index] ?? '';
					if (cell !== '') {
						literalToStorage(storageToLiteral(action.column, cell), action.column);
					}
				}
				this.storage.modifyColumn(table, action.column);
				this.catalog.modifyColumn(table, action.column);
				return { kind: 'ddl', message: success(`Column modified: ${table}.${action.column.name}`) };
			}

			default: {
				const exhaustiveCheck: never = action;
				throw new EvaluationError(`Unsupported ALTER TABLE action: ${JSON.stringify(exhaustiveCheck)}`, StatusCode.INTERNAL);
			}
		}
	}

	private insert(stmt: AST.InsertStmt): ExecutionResult {
		const schema = this.requireTable(stmt.table);
		if (schema.columns.length !== stmt.values.length) {
			throw new EvaluationError(`Values count does not match table schema for table ${stmt.table}`);
		}

		const values = schema.columns.map((col, i) => literalToStorage(stmt.values[i], col));
		this.storage.appendRow(stmt.table, values);
		return { kind: 'count', affected: 1, message: success(`1 row inserted into ${stmt.table}`) };
	}

	private update(stmt: AST.UpdateStmt): ExecutionResult {
		const schema = this.requireTable(stmt.table);

		const assignments = stmt.assignments.map(assignment => {
			const index = findColumnIndex(schema, assignment.column);
			if (index < 0) {
				throw new CatalogError(`Column does not exist: ${assignment.column}`);
			}
			return { index, value: literalToStorage(assignment.value, schema.columns[index]) };
		});

		const rows = this.storage.readAllRows(stmt.table);
		let affected = 0;
		for (const row of rows) {
			if (evaluateCondition(stmt.where, this.singleTableContext(schema, row))) {
				for (const { index, value } of assignments) {
					row[index] = value;
				}
				affected++;
			}
		}

		if (affected > 0) {
			this.storage.writeAllRows(stmt.table, schema, rows);
		}
		return { kind: 'count', affected, message: success(`${affected} row(s) updated in ${stmt.table}`) };
	}

	private delete(stmt: AST.DeleteStmt): ExecutionResult {
		const schema = this.requireTable(stmt.table);

		const kept: Row[] = [];
		let removed = 0;
		for (const row of this.storage.readAllRows(stmt.table)) {
			if (evaluateCondition(stmt.where, this.singleTableContext(schema, row))) {
				removed++;
			} else {
				kept.push(row);
			}
		}

		if (removed > 0) {
			this.storage.writeAllRows(stmt.table, schema, kept);
		}
		return { kind: 'count', affected: removed, message: success(`${removed} row(s) deleted from ${stmt.table}`) };
	}

	private select(stmt: AST.SelectStmt): ExecutionResult {
		// Schemas first: the select list is checked before any row is read
		const sources: TableSource[] = [stmt.from, ...stmt.joins.map(join => join.table)].map(ref => ({
			schema: this.requireTable(ref.name),
			tableName: ref.name,
			alias: ref.alias ?? ref.name,
		}));
		const projection = planProjection(stmt.columns, new NameScope(sources));

		const load = (ref: AST.TableReference, position: number): LoadedTable => ({
			source: sources[position],
			rows: this.storage.readAllRows(ref.name),
		});
		const { scope, groups } = executeJoins(stmt.from, stmt.joins, load);
		const matched = filterGroups(scope, groups, stmt.where);

		const rows = matched.map(group => projectRow(projection, group));
		log('Selected %d row(s)', rows.length);
		return {
			kind: 'rows',
			columns: projection.headers,
			rows,
			text: formatResultTable(projection.headers, rows),
		};
	}

	private singleTableContext(schema: TableSchema, row: Row): EvaluationContext {
		return EvaluationContext.of([{ schema, tableName: schema.name, alias: schema.name, row }]);
	}
}
