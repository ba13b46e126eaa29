import { DataType } from '../common/datatype.js';
import { EvaluationError } from '../common/errors.js';
import type { LiteralValue } from '../parser/ast.js';
import type { ColumnSchema } from '../schema/table.js';

const I64_MIN = -(2n ** 63n);
const I64_MAX = 2n ** 63n - 1n;
const INT_TEXT = /^-?\d+$/;

export function intLiteral(value: bigint): LiteralValue {
	return { type: 'int', value };
}

export function stringLiteral(value: string): LiteralValue {
	return { type: 'string', value };
}

/**
 * Rebuilds a typed literal from a stored cell using the column's declared type.
 * @throws EvaluationError for empty or non-integer text in an INT column
 */
export function storageToLiteral(column: ColumnSchema, text: string): LiteralValue {
	if (column.dataType === DataType.Varchar) {
		return stringLiteral(text);
	}
	if (text === '') {
		throw new EvaluationError(`Empty value encountered for INT column: ${column.name}`);
	}
	const value = INT_TEXT.test(text) ? BigInt(text) : undefined;
	if (value === undefined || value < I64_MIN || value > I64_MAX) {
		throw new EvaluationError(`Failed to parse INT value for column ${column.name}: ${text}`);
	}
	return intLiteral(value);
}

/**
 * Checks a literal against a column and renders it as stored text.
 * @throws EvaluationError on a type mismatch or a VARCHAR value over the declared length
 */
export function literalToStorage(literal: LiteralValue, column: ColumnSchema): string {
	if (column.dataType === DataType.Int) {
		if (literal.type !== 'int') {
			throw new EvaluationError(`Type mismatch: column ${column.name} expects INT`);
		}
		return literal.value.toString();
	}

	if (literal.type !== 'string') {
		throw new EvaluationError(`Type mismatch: column ${column.name} expects VARCHAR`);
	}
	if (column.length > 0 && literal.value.length > column.length) {
		throw new EvaluationError(`Value for column ${column.name} exceeds maximum length`);
	}
	return literal.value;
}

/**
 * Three-way comparison of two literals of the same type.
 * @throws EvaluationError when the types differ
 */
export function compareLiterals(left: LiteralValue, right: LiteralValue): number {
	if (left.type === 'int' && right.type === 'int') {
		return left.value < right.value ? -1 : left.value > right.value ? 1 : 0;
	}
	if (left.type === 'string' && right.type === 'string') {
		return left.value < right.value ? -1 : left.value > right.value ? 1 : 0;
	}
	throw new EvaluationError('Cannot compare values of different types');
}
