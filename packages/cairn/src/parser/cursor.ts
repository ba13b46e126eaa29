import { ParseError } from '../common/errors.js';
import { TokenKind, type Token } from './lexer.js';

const END: Token = { kind: TokenKind.End, text: '' };

/** Renders a token for diagnostics. */
export function describeToken(token: Token): string {
	return token.kind === TokenKind.End ? 'end of input' : `'${token.text}'`;
}

/**
 * Read-only, position-tracked view over a token list.
 * `check*` look ahead, `match*` consume when they succeed, `expect*` consume or throw.
 */
export class TokenCursor {
	private position = 0;

	constructor(private readonly tokens: readonly Token[]) {}

	/** Token `offset` places ahead; End once past the last token. */
	peek(offset = 0): Token {
		return this.tokens[this.position + offset] ?? END;
	}

	advance(): Token {
		const token = this.peek();
		if (this.position < this.tokens.length) {
			this.position++;
		}
		return token;
	}

	isAtEnd(): boolean {
		return this.peek().kind === TokenKind.End;
	}

	checkSymbol(symbol: string, offset = 0): boolean {
		const token = this.peek(offset);
		return token.kind === TokenKind.Symbol && token.text === symbol;
	}

	checkKeyword(keyword: string, offset = 0): boolean {
		const token = this.peek(offset);
		return token.kind === TokenKind.Identifier && token.text.toUpperCase() === keyword;
	}

	matchSymbol(symbol: string): boolean {
		if (!this.checkSymbol(symbol)) return false;
		this.advance();
		return true;
	}

	matchKeyword(keyword: string): boolean {
		if (!this.checkKeyword(keyword)) return false;
		this.advance();
		return true;
	}

	expectSymbol(symbol: string): Token {
		if (!this.checkSymbol(symbol)) {
			throw this.error(`Expected '${symbol}'`);
		}
		return this.advance();
	}

	expectKeyword(keyword: string): Token {
		if (!this.checkKeyword(keyword)) {
			throw this.error(`Expected keyword ${keyword}`);
		}
		return this.advance();
	}

	/** @param context what the identifier names, e.g. "table name" */
	expectIdentifier(context: string): string {
		if (this.peek().kind !== TokenKind.Identifier) {
			throw this.error(`Expected identifier for ${context}`);
		}
		return this.advance().text;
	}

	expectNumber(context: string): string {
		if (this.peek().kind !== TokenKind.Number) {
			throw this.error(`Expected numeric literal for ${context}`);
		}
		return this.advance().text;
	}

	expectString(): string {
		if (this.peek().kind !== TokenKind.String) {
			throw this.error('Expected string literal');
		}
		return this.advance().text;
	}

	/** Trailing tokens after a complete statement are a syntax error. */
	expectEnd(): void {
		if (!this.isAtEnd()) {
			throw this.error('Expected end of statement');
		}
	}

	/** Builds a ParseError naming what was expected and the current token. */
	error(expected: string): ParseError {
		const token = this.peek();
		const found = token.kind === TokenKind.End ? undefined : token.text;
		return new ParseError(`${expected} but found ${describeToken(token)}`, found);
	}
}
