import { EvaluationError } from '../common/errors.js';
import { StatusCode } from '../common/types.js';
import type { ComparisonExpr, Expression, LiteralValue } from '../parser/ast.js';
import { compareLiterals, storageToLiteral } from './literal.js';
import type { EvaluationContext } from './context.js';

/** Value of a column reference or literal under the context. */
export function evaluateOperand(expr: Expression, ctx: EvaluationContext): LiteralValue {
	switch (expr.type) {
		case 'literal':
			return expr.value;
		case 'column': {
			const ref = ctx.scope.resolveColumn(expr);
			return storageToLiteral(ref.column, ctx.cell(ref));
		}
		default:
			throw new EvaluationError(`Unsupported operand in expression evaluation: ${expr.type}`, StatusCode.INTERNAL);
	}
}

/** Operands of an ordering comparison, which only INT values support. */
function intOperands(operator: string, left: LiteralValue, right: LiteralValue): [bigint, bigint] {
	if (left.type !== 'int' || right.type !== 'int') {
		throw new EvaluationError(`${operator} comparisons require INT operands`);
	}
	return [left.value, right.value];
}

function evaluateComparison(expr: ComparisonExpr, ctx: EvaluationContext): boolean {
	const left = evaluateOperand(expr.left, ctx);
	const right = evaluateOperand(expr.right, ctx);

	switch (expr.operator) {
		case '=': return compareLiterals(left, right) === 0;
		case '<>': return compareLiterals(left, right) !== 0;
		case '<': {
			const [l, r] = intOperands(expr.operator, left, right);
			return l < r;
		}
		case '>': {
			const [l, r] = intOperands(expr.operator, left, right);
			return l > r;
		}
		case '<=': {
			const [l, r] = intOperands(expr.operator, left, right);
			return l <= r;
		}
		case '>=': {
			const [l, r] = intOperands(expr.operator, left, right);
			return l >= r;
		}
		default: {
			const exhaustiveCheck: never = expr.operator;
			throw new EvaluationError(`Unsupported comparison operator: ${exhaustiveCheck}`, StatusCode.INTERNAL);
		}
	}
}

/**
 * Evaluates a WHERE or ON condition. An absent condition holds.
 * AND terms run left to right and stop at the first false one.
 */
export function evaluateCondition(expr: Expression | undefined, ctx: EvaluationContext): boolean {
	if (!expr) {
		return true;
	}

	switch (expr.type) {
		case 'comparison':
			return evaluateComparison(expr, ctx);
		case 'and':
			return expr.terms.every(term => evaluateCondition(term, ctx));
		default:
			throw new EvaluationError(`Unsupported condition expression: ${expr.type}`, StatusCode.INTERNAL);
	}
}
