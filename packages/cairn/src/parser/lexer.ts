import { LexError } from '../common/errors.js';
import { err, ok, type Result } from '../common/types.js';
import { createLogger } from '../common/logger.js';

const log = createLogger('lexer');

export enum TokenKind {
	Identifier = 'IDENTIFIER',
	Number = 'NUMBER',
	String = 'STRING',
	Symbol = 'SYMBOL',
	End = 'END',
}

/**
 * A lexical token. Keywords are plain identifiers here; the parser matches
 * them case-insensitively. String tokens hold the unescaped text.
 */
export interface Token {
	kind: TokenKind;
	text: string;
}

// Checked before single characters so that '<' never splits '<>' or '<='
const MULTI_CHAR_SYMBOLS = ['<>', '<=', '>='];
const SINGLE_CHAR_SYMBOLS = new Set(['(', ')', ',', '.', ';', '*', '=', '<', '>', '-']);

/**
 * Lexer class for tokenizing SQL statements
 */
export class Lexer {
	private source: string;
	private tokens: Token[] = [];
	private start = 0;
	private current = 0;
	private error?: LexError;

	constructor(source: string) {
		this.source = source;
	}

	/**
	 * Scans the input. The token list always ends with one End token;
	 * the first lexical failure stops the scan.
	 */
	scanTokens(): Result<Token[]> {
		while (!this.isAtEnd() && !this.error) {
			this.start = this.current;
			this.scanToken();
		}

		if (this.error) {
			log('Lexing failed: %s', this.error.message);
			return err(this.error);
		}

		this.tokens.push({ kind: TokenKind.End, text: '' });
		return ok(this.tokens);
	}

	private isAtEnd(): boolean {
		return this.current >= this.source.length;
	}

	private scanToken(): void {
		const c = this.advance();

		if (this.isWhitespace(c)) {
			return;
		}
		if (this.isAlpha(c)) {
			this.identifier();
		} else if (this.isDigit(c)) {
			this.number();
		} else if (c === '\'') {
			this.string();
		} else {
			this.symbol(c);
		}
	}

	private advance(): string {
		return this.source.charAt(this.current++);
	}

	private peek(): string {
		if (this.isAtEnd()) return '\0';
		return this.source.charAt(this.current);
	}

	private string(): void {
		let value = '';

		for (;;) {
			if (this.isAtEnd()) {
				this.error = new LexError('Unterminated string literal');
				return;
			}
			const c = this.advance();
			if (c === '\'') {
				if (this.peek() !== '\'') {
					break;
				}
				// Doubled quote is an escaped quote
				this.advance();
			}
			value += c;
		}

		this.tokens.push({ kind: TokenKind.String, text: value });
	}

	private number(): void {
		while (this.isDigit(this.peek())) {
			this.advance();
		}
		this.addToken(TokenKind.Number);
	}

	private identifier(): void {
		while (this.isAlphaNumeric(this.peek())) {
			this.advance();
		}
		this.addToken(TokenKind.Identifier);
	}

	private symbol(c: string): void {
		const pair = c + this.peek();
		if (MULTI_CHAR_SYMBOLS.includes(pair)) {
			this.advance();
			this.addToken(TokenKind.Symbol);
		} else if (SINGLE_CHAR_SYMBOLS.has(c)) {
			this.addToken(TokenKind.Symbol);
		} else {
			this.error = new LexError(`Unexpected character '${c}'`);
		}
	}

	private isDigit(c: string): boolean {
		return c >= '0' && c <= '9';
	}

	private isAlpha(c: string): boolean {
		return (c >= 'a' && c <= 'z') ||
			(c >= 'A' && c <= 'Z') ||
			c === '_';
	}

	private isAlphaNumeric(c: string): boolean {
		return this.isAlpha(c) || this.isDigit(c);
	}

	private isWhitespace(c: string): boolean {
		return c === ' ' || c === '\r' || c === '\n' || c === '\t' || c === '\f' || c === '\v';
	}

	private addToken(kind: TokenKind): void {
		this.tokens.push({ kind, text: this.source.substring(this.start, this.current) });
	}
}

/** Tokenizes one statement's text. */
export function tokenize(source: string): Result<Token[]> {
	return new Lexer(source).scanTokens();
}
