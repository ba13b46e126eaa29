import { expect } from 'chai';
import { tokenize, TokenKind, type Token } from '../src/parser/lexer.js';
import { LexError } from '../src/common/errors.js';
import { expectErr, expectOk } from './helpers.js';

function kinds(tokens: Token[]): TokenKind[] {
	return tokens.map(t => t.kind);
}

describe('Lexer', () => {
	it('classifies identifiers, numbers, strings and symbols', () => {
		const tokens = expectOk(tokenize("SELECT name, 42 FROM t WHERE x = 'hi'"));
		expect(tokens.map(t => t.text)).to.deep.equal(['SELECT', 'name', ',', '42', 'FROM', 't', 'WHERE', 'x', '=', 'hi', '']);
		expect(kinds(tokens)).to.deep.equal([
			TokenKind.Identifier, TokenKind.Identifier, TokenKind.Symbol, TokenKind.Number,
			TokenKind.Identifier, TokenKind.Identifier, TokenKind.Identifier, TokenKind.Identifier,
			TokenKind.Symbol, TokenKind.String, TokenKind.End,
		]);
	});

	it('ends with exactly one End token', () => {
		const tokens = expectOk(tokenize('   '));
		expect(tokens).to.deep.equal([{ kind: TokenKind.End, text: '' }]);
	});

	it('keeps identifier case and allows underscores and digits', () => {
		const tokens = expectOk(tokenize('_Tbl_2 selECT'));
		expect(tokens.slice(0, 2)).to.deep.equal([
			{ kind: TokenKind.Identifier, text: '_Tbl_2' },
			{ kind: TokenKind.Identifier, text: 'selECT' },
		]);
	});

	it('matches two-character operators before single characters', () => {
		const tokens = expectOk(tokenize('a<>b<=c>=d<e>f'));
		expect(tokens.filter(t => t.kind === TokenKind.Symbol).map(t => t.text))
			.to.deep.equal(['<>', '<=', '>=', '<', '>']);
	});

	it('reads a negative number as a minus symbol followed by digits', () => {
		const tokens = expectOk(tokenize('-17'));
		expect(tokens.slice(0, 2)).to.deep.equal([
			{ kind: TokenKind.Symbol, text: '-' },
			{ kind: TokenKind.Number, text: '17' },
		]);
	});

	it('does not check digit runs for overflow', () => {
		const tokens = expectOk(tokenize('99999999999999999999999'));
		expect(tokens[0]).to.deep.equal({ kind: TokenKind.Number, text: '99999999999999999999999' });
	});

	it('unescapes doubled quotes inside strings', () => {
		const tokens = expectOk(tokenize("'it''s' ''"));
		expect(tokens.slice(0, 2)).to.deep.equal([
			{ kind: TokenKind.String, text: "it's" },
			{ kind: TokenKind.String, text: '' },
		]);
	});

	it('keeps whitespace and symbols inside strings', () => {
		const tokens = expectOk(tokenize("'a, b; (c)'"));
		expect(tokens[0]).to.deep.equal({ kind: TokenKind.String, text: 'a, b; (c)' });
	});

	it('rejects an unterminated string', () => {
		const error = expectErr(tokenize("'open"));
		expect(error).to.be.instanceOf(LexError);
		expect(error.message).to.equal('Unterminated string literal');
	});

	it('rejects a string whose closing quote is escaped', () => {
		expect(expectErr(tokenize("'abc''")).message).to.equal('Unterminated string literal');
	});

	it('reports the offending character', () => {
		const error = expectErr(tokenize('SELECT a + b FROM t'));
		expect(error).to.be.instanceOf(LexError);
		expect(error.message).to.equal("Unexpected character '+'");
	});

	it('rejects double-quoted identifiers', () => {
		expect(expectErr(tokenize('"name"')).message).to.equal(`Unexpected character '"'`);
	});
});
