import { StatusCode } from './types.js';

/**
 * Base class for engine errors.
 * Carries a status code and, when wrapping a lower-level failure, its cause.
 */
export class CairnError extends Error {
	public code: StatusCode;
	public override cause?: Error;

	constructor(message: string, code: StatusCode = StatusCode.ERROR, cause?: Error) {
		super(message);
		this.code = code;
		this.name = 'CairnError';
		this.cause = cause;

		// Maintain stack trace in V8
		if (Error.captureStackTrace) {
			Error.captureStackTrace(this, CairnError);
		}
	}
}

/**
 * Raised by the tokenizer for characters it cannot classify and for
 * unterminated string literals.
 */
export class LexError extends CairnError {
	constructor(message: string) {
		super(message, StatusCode.SYNTAX);
		this.name = 'LexError';
		Object.setPrototypeOf(this, LexError.prototype);
	}
}

/**
 * Grammar failure. `found` holds the text of the offending token,
 * or undefined when the parser ran out of input.
 */
export class ParseError extends CairnError {
	public found?: string;

	constructor(message: string, found?: string) {
		super(message, StatusCode.SYNTAX);
		this.name = 'ParseError';
		this.found = found;
		Object.setPrototypeOf(this, ParseError.prototype);
	}
}

/**
 * Table or column precondition violated (exists / does not exist / last column).
 */
export class CatalogError extends CairnError {
	constructor(message: string, code: StatusCode = StatusCode.SCHEMA) {
		super(message, code);
		this.name = 'CatalogError';
		Object.setPrototypeOf(this, CatalogError.prototype);
	}
}

/**
 * Runtime failure while binding columns, converting or comparing values.
 */
export class EvaluationError extends CairnError {
	constructor(message: string, code: StatusCode = StatusCode.MISMATCH) {
		super(message, code);
		this.name = 'EvaluationError';
		Object.setPrototypeOf(this, EvaluationError.prototype);
	}
}

/**
 * I/O failure in a storage or catalog backend.
 */
export class StorageError extends CairnError {
	constructor(message: string, cause?: Error) {
		super(message, StatusCode.IOERR, cause);
		this.name = 'StorageError';
		Object.setPrototypeOf(this, StorageError.prototype);
	}
}

/** Normalizes any thrown value into an Error instance. */
export function toError(value: unknown): Error {
	return value instanceof Error ? value : new Error(String(value));
}

/**
 * Converts anything caught at a public boundary into a CairnError.
 * Foreign errors are wrapped as INTERNAL with the original kept as cause.
 */
export function asCairnError(value: unknown): CairnError {
	if (value instanceof CairnError) {
		return value;
	}
	const cause = toError(value);
	return new CairnError(cause.message, StatusCode.INTERNAL, cause);
}
