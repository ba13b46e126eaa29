import { createLogger } from '../common/logger.js';
import { ParseError } from '../common/errors.js';
import { DataType, defaultLength, parseDataType } from '../common/datatype.js';
import { TokenKind, tokenize } from './lexer.js';
import { TokenCursor } from './cursor.js';
import type * as AST from './ast.js';

const log = createLogger('parser');

const I64_MIN = -(2n ** 63n);
const I64_MAX = 2n ** 63n - 1n;

/** Words never taken as an implicit table or column alias. */
export const RESERVED_WORDS: ReadonlySet<string> = new Set([
	'SELECT', 'FROM', 'WHERE', 'INNER', 'JOIN', 'LEFT', 'ON', 'AS', 'AND',
	'OR', 'INSERT', 'INTO', 'VALUES', 'UPDATE', 'SET', 'DELETE', 'CREATE', 'TABLE',
	'DROP', 'ALTER', 'DISTINCT',
]);

export function isReservedWord(word: string): boolean {
	return RESERVED_WORDS.has(word.toUpperCase());
}

const COMPARISON_OPERATORS: ReadonlySet<string> = new Set(['=', '<>', '<', '>', '<=', '>=']);

function isComparisonOperator(text: string): text is AST.ComparisonOperator {
	return COMPARISON_OPERATORS.has(text);
}

/** Parses digit text (with an optional leading '-') into a signed 64-bit integer. */
function toInt64(text: string): bigint {
	const value = BigInt(text);
	if (value < I64_MIN || value > I64_MAX) {
		throw new ParseError(`Invalid INTEGER literal: ${text}`, text);
	}
	return value;
}

/**
 * Recursive-descent parser for one statement.
 * Grammar rules throw ParseError; `parse()` in the parser index turns that into a Result.
 */
export class Parser {
	private cursor = new TokenCursor([]);

	/**
	 * Parses a single statement. A single trailing ';' is allowed.
	 * @throws CairnError on lexical or grammar failure
	 */
	parse(sql: string): AST.Statement {
		let text = sql.trim();
		if (text.length === 0) {
			throw new ParseError('Empty statement');
		}
		if (text.endsWith(';')) {
			text = text.slice(0, -1).trim();
		}

		const tokens = tokenize(text);
		if (!tokens.ok) {
			throw tokens.error;
		}
		this.cursor = new TokenCursor(tokens.value);

		const stmt = this.statement();
		log('Parsed %s statement', stmt.type);
		return stmt;
	}

	private statement(): AST.Statement {
		const first = this.cursor.peek();
		if (first.kind === TokenKind.Identifier) {
			switch (first.text.toUpperCase()) {
				case 'CREATE': return this.createTableStatement();
				case 'DROP': return this.dropTableStatement();
				case 'ALTER': return this.alterTableStatement();
				case 'INSERT': return this.insertStatement();
				case 'UPDATE': return this.updateStatement();
				case 'DELETE': return this.deleteStatement();
				case 'SELECT': return this.selectStatement();
			}
		}
		throw new ParseError('Unsupported SQL statement', first.text);
	}

	/** CREATE TABLE name ( coldef [, coldef]* ) */
	private createTableStatement(): AST.CreateTableStmt {
		const c = this.cursor;
		c.expectKeyword('CREATE');
		c.expectKeyword('TABLE');
		const table = c.expectIdentifier('table name');
		c.expectSymbol('(');

		const columns: AST.ColumnDef[] = [];
		do {
			columns.push(this.columnDefinition());
		} while (c.matchSymbol(','));
		c.expectSymbol(')');
		c.expectEnd();

		return { type: 'createTable', table, columns };
	}

	private dropTableStatement(): AST.DropTableStmt {
		const c = this.cursor;
		c.expectKeyword('DROP');
		c.expectKeyword('TABLE');
		const table = c.expectIdentifier('table name');
		c.expectEnd();
		return { type: 'dropTable', table };
	}

	private alterTableStatement(): AST.AlterTableStmt {
		const c = this.cursor;
		c.expectKeyword('ALTER');
		c.expectKeyword('TABLE');
		const table = c.expectIdentifier('table name');

		let action: AST.AlterTableAction;
		if (c.matchKeyword('RENAME')) {
			c.expectKeyword('TO');
			action = { type: 'renameTable', newName: c.expectIdentifier('new table name') };
		} else if (c.matchKeyword('ADD')) {
			c.expectKeyword('COLUMN');
			action = { type: 'addColumn', column: this.columnDefinition() };
		} else if (c.matchKeyword('DROP')) {
			c.expectKeyword('COLUMN');
			action = { type: 'dropColumn', name: c.expectIdentifier('column name') };
		} else if (c.matchKeyword('MODIFY')) {
			c.expectKeyword('COLUMN');
			action = { type: 'modifyColumn', column: this.columnDefinition() };
		} else {
			throw new ParseError('Unsupported ALTER TABLE action', c.peek().text);
		}

		c.expectEnd();
		return { type: 'alterTable', table, action };
	}

	/** INSERT INTO name VALUES ( literal [, literal]* ) */
	private insertStatement(): AST.InsertStmt {
		const c = this.cursor;
		c.expectKeyword('INSERT');
		c.expectKeyword('INTO');
		const table = c.expectIdentifier('table name');
		c.expectKeyword('VALUES');
		c.expectSymbol('(');

		const values: AST.LiteralValue[] = [];
		do {
			values.push(this.literal());
		} while (c.matchSymbol(','));
		c.expectSymbol(')');
		c.expectEnd();

		return { type: 'insert', table, values };
	}

	private updateStatement(): AST.UpdateStmt {
		const c = this.cursor;
		c.expectKeyword('UPDATE');
		const table = c.expectIdentifier('table name');
		c.expectKeyword('SET');

		const assignments: AST.Assignment[] = [];
		do {
			const column = c.expectIdentifier('column name');
			c.expectSymbol('=');
			assignments.push({ column, value: this.literal() });
		} while (c.matchSymbol(','));

		const where = c.matchKeyword('WHERE') ? this.condition() : undefined;
		c.expectEnd();

		return { type: 'update', table, assignments, where };
	}

	private deleteStatement(): AST.DeleteStmt {
		const c = this.cursor;
		c.expectKeyword('DELETE');
		c.expectKeyword('FROM');
		const table = c.expectIdentifier('table name');
		const where = c.matchKeyword('WHERE') ? this.condition() : undefined;
		c.expectEnd();
		return { type: 'delete', table, where };
	}

	private selectStatement(): AST.SelectStmt {
		const c = this.cursor;
		c.expectKeyword('SELECT');
		if (c.checkKeyword('DISTINCT')) {
			throw new ParseError('DISTINCT is not supported', c.peek().text);
		}

		const columns: AST.ResultColumn[] = [];
		do {
			columns.push(this.resultColumn());
		} while (c.matchSymbol(','));

		c.expectKeyword('FROM');
		const from = this.tableReference();

		const joins: AST.JoinClause[] = [];
		for (;;) {
			if (c.matchKeyword('INNER')) {
				c.expectKeyword('JOIN');
			} else if (c.checkKeyword('LEFT')) {
				throw new ParseError('LEFT JOIN is not supported', c.peek().text);
			} else if (!c.matchKeyword('JOIN')) {
				break;
			}
			const table = this.tableReference();
			c.expectKeyword('ON');
			joins.push({ table, condition: this.condition() });
		}

		const where = c.matchKeyword('WHERE') ? this.condition() : undefined;
		c.expectEnd();

		return { type: 'select', columns, from, joins, where };
	}

	/** `*`, `alias.*`, or a column reference with an optional alias */
	private resultColumn(): AST.ResultColumn {
		const c = this.cursor;
		if (c.matchSymbol('*')) {
			return { type: 'all' };
		}
		if (c.peek().kind === TokenKind.Identifier && c.checkSymbol('.', 1) && c.checkSymbol('*', 2)) {
			const table = c.advance().text;
			c.advance();
			c.advance();
			return { type: 'all', table };
		}

		const expr = this.operand();
		if (expr.type !== 'column') {
			throw new ParseError('SELECT list only supports column references');
		}
		return { type: 'column', expr, alias: this.optionalAlias('alias') };
	}

	private tableReference(): AST.TableReference {
		const name = this.cursor.expectIdentifier('table name');
		return { name, alias: this.optionalAlias('table alias') };
	}

	/** `AS ident`, or a bare identifier that is not a reserved word. */
	private optionalAlias(context: string): string | undefined {
		const c = this.cursor;
		if (c.matchKeyword('AS')) {
			return c.expectIdentifier(context);
		}
		const next = c.peek();
		if (next.kind === TokenKind.Identifier && !isReservedWord(next.text)) {
			return c.advance().text;
		}
		return undefined;
	}

	/** ident type, where type is INT or VARCHAR [ ( n ) ] */
	private columnDefinition(): AST.ColumnDef {
		const c = this.cursor;
		const name = c.expectIdentifier('column name');
		const typeName = c.expectIdentifier('column type');
		const dataType = parseDataType(typeName);
		if (dataType === undefined) {
			throw new ParseError(`Unsupported column type: ${typeName}`, typeName);
		}

		let length = defaultLength(dataType);
		if (dataType === DataType.Varchar && c.matchSymbol('(')) {
			length = Number.parseInt(c.expectNumber('VARCHAR length'), 10);
			c.expectSymbol(')');
		}
		return { name, dataType, length };
	}

	/** comparison [AND comparison]* - a lone comparison is returned unwrapped */
	private condition(): AST.Expression {
		const first = this.comparison();
		if (!this.cursor.matchKeyword('AND')) {
			return first;
		}
		const terms: AST.Expression[] = [first];
		do {
			terms.push(this.comparison());
		} while (this.cursor.matchKeyword('AND'));
		return { type: 'and', terms };
	}

	private comparison(): AST.ComparisonExpr {
		const left = this.operand();
		const text = this.cursor.peek().text;
		if (this.cursor.peek().kind !== TokenKind.Symbol || !isComparisonOperator(text)) {
			throw new ParseError(`Expected comparison operator, found: ${text || 'end of input'}`, text);
		}
		const operator: AST.ComparisonOperator = text;
		this.cursor.advance();
		const right = this.operand();
		return { type: 'comparison', operator, left, right };
	}

	/** literal, or `name` / `qualifier.name` */
	private operand(): AST.Expression {
		const c = this.cursor;
		const token = c.peek();
		if (this.atLiteral()) {
			return { type: 'literal', value: this.literal() };
		}
		if (token.kind !== TokenKind.Identifier) {
			throw new ParseError(`Expected column reference or literal, found: ${token.text || 'end of input'}`, token.text);
		}

		const first = c.advance().text;
		if (c.matchSymbol('.')) {
			return { type: 'column', table: first, name: c.expectIdentifier('column name') };
		}
		return { type: 'column', name: first };
	}

	private atLiteral(): boolean {
		const token = this.cursor.peek();
		return token.kind === TokenKind.String
			|| token.kind === TokenKind.Number
			|| (this.cursor.checkSymbol('-') && this.cursor.peek(1).kind === TokenKind.Number);
	}

	/** 'text', digits, or '-' digits */
	private literal(): AST.LiteralValue {
		const c = this.cursor;
		const token = c.peek();
		if (token.kind === TokenKind.String) {
			return { type: 'string', value: c.expectString() };
		}
		if (c.checkSymbol('-') && c.peek(1).kind === TokenKind.Number) {
			c.advance();
			return { type: 'int', value: toInt64('-' + c.expectNumber('numeric literal')) };
		}
		if (token.kind === TokenKind.Number) {
			return { type: 'int', value: toInt64(c.expectNumber('numeric literal')) };
		}
		throw c.error('Expected literal value');
	}
}
