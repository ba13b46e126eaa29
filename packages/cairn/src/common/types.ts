import type { CairnError } from './errors.js';

/**
 * Status codes, numbered after SQLite's primary result codes.
 */
export enum StatusCode {
	ERROR = 1,
	INTERNAL = 2,
	IOERR = 10,
	SCHEMA = 17,
	MISMATCH = 20,
	SYNTAX = 29,
}

/** One stored row: column values as untyped text, in schema column order. */
export type Row = string[];

/**
 * Outcome of a public operation. Failures carry the error instead of throwing it.
 */
export type Result<T, E = CairnError> =
	| { readonly ok: true; readonly value: T }
	| { readonly ok: false; readonly error: E };

export function ok<T>(value: T): { readonly ok: true; readonly value: T } {
	return { ok: true, value };
}

export function err<E>(error: E): { readonly ok: false; readonly error: E } {
	return { ok: false, error };
}
