import { expect } from 'chai';
import { parse, type Statement } from '../src/parser/index.js';
import { ParseError } from '../src/common/errors.js';
import { DataType } from '../src/common/datatype.js';
import { expectErr, expectOk } from './helpers.js';

function parseOk(sql: string): Statement {
	return expectOk(parse(sql));
}

function parseFailure(sql: string): string {
	return expectErr(parse(sql)).message;
}

const int = (value: bigint) => ({ type: 'literal', value: { type: 'int', value } });
const col = (name: string, table?: string) => table === undefined ? { type: 'column', name } : { type: 'column', table, name };

describe('Parser', () => {

	describe('Statement framing', () => {
		it('rejects empty input', () => {
			expect(parseFailure('   \n ')).to.equal('Empty statement');
		});

		it('drops one trailing semicolon', () => {
			expect(parseOk('DROP TABLE t ;  ')).to.deep.equal({ type: 'dropTable', table: 't' });
		});

		it('rejects a second semicolon as trailing input', () => {
			expect(parseFailure('DROP TABLE t;;')).to.equal("Expected end of statement but found ';'");
		});

		it('matches statement keywords case-insensitively', () => {
			expect(parseOk('drop Table t')).to.deep.equal({ type: 'dropTable', table: 't' });
		});

		it('rejects unknown statements', () => {
			expect(parseFailure('VACUUM')).to.equal('Unsupported SQL statement');
			expect(parseFailure('42')).to.equal('Unsupported SQL statement');
		});

		it('rejects trailing tokens', () => {
			const error = expectErr(parse('DROP TABLE t extra'));
			expect(error).to.be.instanceOf(ParseError);
			expect(error.message).to.equal("Expected end of statement but found 'extra'");
		});

		it('names expected and actual tokens', () => {
			expect(parseFailure('CREATE t (id INT)')).to.equal("Expected keyword TABLE but found 't'");
			expect(parseFailure('INSERT INTO t VALUES (1')).to.equal("Expected ')' but found end of input");
			expect(parseFailure('DROP TABLE')).to.equal('Expected identifier for table name but found end of input');
		});

		it('surfaces lexical errors', () => {
			expect(parseFailure('SELECT * FROM t WHERE a = #')).to.equal("Unexpected character '#'");
		});
	});

	describe('CREATE TABLE', () => {
		it('applies default lengths', () => {
			expect(parseOk('CREATE TABLE t (id INT, name VARCHAR)')).to.deep.equal({
				type: 'createTable',
				table: 't',
				columns: [
					{ name: 'id', dataType: DataType.Int, length: 4 },
					{ name: 'name', dataType: DataType.Varchar, length: 255 },
				],
			});
		});

		it('reads an explicit VARCHAR length', () => {
			const stmt = parseOk('create table t (name varchar(12))');
			expect(stmt).to.deep.equal({
				type: 'createTable',
				table: 't',
				columns: [{ name: 'name', dataType: DataType.Varchar, length: 12 }],
			});
		});

		it('does not accept a length on INT', () => {
			expect(parseFailure('CREATE TABLE t (id INT(8))')).to.equal("Expected ')' but found '('");
		});

		it('rejects unknown column types', () => {
			expect(parseFailure('CREATE TABLE t (price REAL)')).to.equal('Unsupported column type: REAL');
		});

		it('requires at least one column', () => {
			expect(parseFailure('CREATE TABLE t ()')).to.equal("Expected identifier for column name but found ')'");
		});
	});

	describe('ALTER TABLE', () => {
		it('parses each action', () => {
			expect(parseOk('ALTER TABLE a RENAME TO b')).to.deep.equal({
				type: 'alterTable', table: 'a', action: { type: 'renameTable', newName: 'b' },
			});
			expect(parseOk('ALTER TABLE a ADD COLUMN note VARCHAR(5)')).to.deep.equal({
				type: 'alterTable', table: 'a',
				action: { type: 'addColumn', column: { name: 'note', dataType: DataType.Varchar, length: 5 } },
			});
			expect(parseOk('ALTER TABLE a DROP COLUMN note')).to.deep.equal({
				type: 'alterTable', table: 'a', action: { type: 'dropColumn', name: 'note' },
			});
			expect(parseOk('ALTER TABLE a MODIFY COLUMN id VARCHAR')).to.deep.equal({
				type: 'alterTable', table: 'a',
				action: { type: 'modifyColumn', column: { name: 'id', dataType: DataType.Varchar, length: 255 } },
			});
		});

		it('rejects other actions', () => {
			expect(parseFailure('ALTER TABLE a TRUNCATE')).to.equal('Unsupported ALTER TABLE action');
		});

		it('requires COLUMN after ADD', () => {
			expect(parseFailure('ALTER TABLE a ADD note INT')).to.equal("Expected keyword COLUMN but found 'note'");
		});
	});

	describe('INSERT / UPDATE / DELETE', () => {
		it('parses insert literals including negatives and escaped strings', () => {
			expect(parseOk("INSERT INTO t VALUES (-5, 'O''Neil', 0)")).to.deep.equal({
				type: 'insert',
				table: 't',
				values: [
					{ type: 'int', value: -5n },
					{ type: 'string', value: "O'Neil" },
					{ type: 'int', value: 0n },
				],
			});
		});

		it('accepts the 64-bit integer bounds', () => {
			expect(parseOk('INSERT INTO t VALUES (-9223372036854775808, 9223372036854775807)')).to.deep.equal({
				type: 'insert',
				table: 't',
				values: [
					{ type: 'int', value: -9223372036854775808n },
					{ type: 'int', value: 9223372036854775807n },
				],
			});
		});

		it('rejects integers outside 64 bits', () => {
			expect(parseFailure('INSERT INTO t VALUES (9223372036854775808)')).to.equal('Invalid INTEGER literal: 9223372036854775808');
			expect(parseFailure('INSERT INTO t VALUES (-9223372036854775809)')).to.equal('Invalid INTEGER literal: -9223372036854775809');
		});

		it('rejects column references among VALUES', () => {
			expect(parseFailure('INSERT INTO t VALUES (id)')).to.equal("Expected literal value but found 'id'");
		});

		it('parses update assignments and a WHERE conjunction', () => {
			expect(parseOk("UPDATE t SET name = 'Bob', age = 3 WHERE id = 1 AND age >= 2")).to.deep.equal({
				type: 'update',
				table: 't',
				assignments: [
					{ column: 'name', value: { type: 'string', value: 'Bob' } },
					{ column: 'age', value: { type: 'int', value: 3n } },
				],
				where: {
					type: 'and',
					terms: [
						{ type: 'comparison', operator: '=', left: col('id'), right: int(1n) },
						{ type: 'comparison', operator: '>=', left: col('age'), right: int(2n) },
					],
				},
			});
		});

		it('parses delete without WHERE', () => {
			expect(parseOk('DELETE FROM t')).to.deep.equal({ type: 'delete', table: 't', where: undefined });
		});
	});

	describe('SELECT', () => {
		it('parses wildcards, qualified columns and aliases', () => {
			expect(parseOk('SELECT *, a.*, a.id AS ident, name label, b.tag FROM a')).to.deep.equal({
				type: 'select',
				columns: [
					{ type: 'all' },
					{ type: 'all', table: 'a' },
					{ type: 'column', expr: col('id', 'a'), alias: 'ident' },
					{ type: 'column', expr: col('name'), alias: 'label' },
					{ type: 'column', expr: col('tag', 'b'), alias: undefined },
				],
				from: { name: 'a', alias: undefined },
				joins: [],
				where: undefined,
			});
		});

		it('never takes a reserved word as an implicit alias', () => {
			const stmt = parseOk('SELECT id FROM t WHERE id = 1');
			expect(stmt).to.deep.equal({
				type: 'select',
				columns: [{ type: 'column', expr: col('id'), alias: undefined }],
				from: { name: 't', alias: undefined },
				joins: [],
				where: { type: 'comparison', operator: '=', left: col('id'), right: int(1n) },
			});
		});

		it('does not give wildcards an alias', () => {
			expect(parseFailure('SELECT * everything FROM t')).to.equal("Expected keyword FROM but found 'everything'");
		});

		it('parses table aliases with and without AS and a join chain', () => {
			const stmt = parseOk('SELECT x.id FROM a AS x JOIN b y ON x.id = y.aid INNER JOIN c ON c.id = y.cid');
			expect(stmt).to.deep.equal({
				type: 'select',
				columns: [{ type: 'column', expr: col('id', 'x'), alias: undefined }],
				from: { name: 'a', alias: 'x' },
				joins: [
					{
						table: { name: 'b', alias: 'y' },
						condition: { type: 'comparison', operator: '=', left: col('id', 'x'), right: col('aid', 'y') },
					},
					{
						table: { name: 'c', alias: undefined },
						condition: { type: 'comparison', operator: '=', left: col('id', 'c'), right: col('cid', 'y') },
					},
				],
				where: undefined,
			});
		});

		it('returns a lone comparison unwrapped and flattens AND chains', () => {
			const single = parseOk('SELECT id FROM t WHERE 1 <> id');
			expect(single.type === 'select' && single.where).to.deep.equal(
				{ type: 'comparison', operator: '<>', left: int(1n), right: col('id') },
			);

			const chain = parseOk("SELECT id FROM t WHERE a = 1 AND b < -2 AND c = 'z'");
			expect(chain.type === 'select' && chain.where).to.deep.equal({
				type: 'and',
				terms: [
					{ type: 'comparison', operator: '=', left: col('a'), right: int(1n) },
					{ type: 'comparison', operator: '<', left: col('b'), right: int(-2n) },
					{ type: 'comparison', operator: '=', left: col('c'), right: { type: 'literal', value: { type: 'string', value: 'z' } } },
				],
			});
		});

		it('rejects LEFT JOIN instead of treating it as inner', () => {
			expect(parseFailure('SELECT * FROM a LEFT JOIN b ON a.id = b.id')).to.equal('LEFT JOIN is not supported');
		});

		it('rejects DISTINCT', () => {
			expect(parseFailure('SELECT DISTINCT id FROM t')).to.equal('DISTINCT is not supported');
		});

		it('rejects literals in the select list', () => {
			expect(parseFailure('SELECT 1 FROM t')).to.equal('SELECT list only supports column references');
		});

		it('rejects OR and parenthesized conditions', () => {
			expect(parseFailure('SELECT id FROM t WHERE a = 1 OR b = 2')).to.equal("Expected end of statement but found 'OR'");
			expect(parseFailure('SELECT id FROM t WHERE (a = 1)')).to.equal('Expected column reference or literal, found: (');
		});

		it('requires a comparison operator', () => {
			expect(parseFailure('SELECT id FROM t WHERE a')).to.equal('Expected comparison operator, found: end of input');
			expect(parseFailure('SELECT id FROM t WHERE a b')).to.equal('Expected comparison operator, found: b');
		});

		it('requires ON after a join', () => {
			expect(parseFailure('SELECT * FROM a JOIN b')).to.equal('Expected keyword ON but found end of input');
		});
	});
});
