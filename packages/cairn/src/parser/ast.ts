import type { DataType } from '../common/datatype.js';

/**
 * SQL Abstract Syntax Tree (AST) definitions.
 * Nodes are plain objects discriminated by `type`; each node owns its children.
 */

export type Statement =
	| CreateTableStmt
	| DropTableStmt
	| AlterTableStmt
	| InsertStmt
	| UpdateStmt
	| DeleteStmt
	| SelectStmt;

export type StatementType = Statement['type'];

// Literal value as written in SQL, or rebuilt from a stored cell
export type LiteralValue =
	| { type: 'int'; value: bigint }
	| { type: 'string'; value: string };

// Expression types
export type Expression = ColumnExpr | LiteralExpr | ComparisonExpr | AndExpr;

export type ComparisonOperator = '=' | '<>' | '<' | '>' | '<=' | '>=';

// Column reference, optionally qualified by a table name or alias
export interface ColumnExpr {
	type: 'column';
	name: string;
	table?: string;
}

export interface LiteralExpr {
	type: 'literal';
	value: LiteralValue;
}

export interface ComparisonExpr {
	type: 'comparison';
	operator: ComparisonOperator;
	left: Expression;
	right: Expression;
}

// Conjunction of two or more terms, evaluated left to right
export interface AndExpr {
	type: 'and';
	terms: Expression[];
}

// Column definition in CREATE TABLE / ADD COLUMN
export interface ColumnDef {
	name: string;
	dataType: DataType;
	length: number;
}

// Table named in FROM or JOIN
export interface TableReference {
	name: string;
	alias?: string;
}

export interface JoinClause {
	table: TableReference;
	condition: Expression;
}

// SELECT list item
export type ResultColumn =
	| { type: 'all'; table?: string }
	| { type: 'column'; expr: ColumnExpr; alias?: string };

// CREATE TABLE statement
export interface CreateTableStmt {
	type: 'createTable';
	table: string;
	columns: ColumnDef[];
}

// DROP TABLE statement
export interface DropTableStmt {
	type: 'dropTable';
	table: string;
}

// ALTER TABLE actions
export type AlterTableAction =
	| { type: 'renameTable'; newName: string }
	| { type: 'addColumn'; column: ColumnDef }
	| { type: 'dropColumn'; name: string }
	| { type: 'modifyColumn'; column: ColumnDef };

// ALTER TABLE statement
export interface AlterTableStmt {
	type: 'alterTable';
	table: string;
	action: AlterTableAction;
}

// INSERT statement (one row of literals)
export interface InsertStmt {
	type: 'insert';
	table: string;
	values: LiteralValue[];
}

export interface Assignment {
	column: string;
	value: LiteralValue;
}

// UPDATE statement
export interface UpdateStmt {
	type: 'update';
	table: string;
	assignments: Assignment[];
	where?: Expression;
}

// DELETE statement
export interface DeleteStmt {
	type: 'delete';
	table: string;
	where?: Expression;
}

// SELECT statement
export interface SelectStmt {
	type: 'select';
	columns: ResultColumn[];
	from: TableReference;
	joins: JoinClause[];
	where?: Expression;
}
