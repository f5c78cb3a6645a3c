/**
 * Expression binder.
 *
 * Gives every expression a type and, where all its operands are constant, a
 * folded value. Errors are reported once; anything built on a bad operand is
 * bad itself and reports nothing more.
 */

import type { CompilationContext } from '../core/context.ts'
import { unreachable } from '../core/errors.ts'
import type {
	BasedLiteralSyntax,
	BinaryExpressionSyntax,
	BinaryOperator,
	ExpressionSyntax,
	IdentifierSyntax,
	IntegerLiteralSyntax,
	UnaryExpressionSyntax,
} from '../syntax/nodes.ts'
import { typeToString } from '../types/printer.ts'
import { getIntegral, isError, isFloating, isNumeric } from '../types/queries.ts'
import { BuiltinTypeId } from '../types/store.ts'
import { IntegralFlags, type IntegralFlagSet, MAX_BIT_WIDTH, type TypeId } from '../types/types.ts'
import { type ConstantValue, SVInt } from '../types/values.ts'
import { lookupName, reportLookup } from './lookup.ts'
import { type LookupLocation, SymbolKind } from './stores.ts'

export interface BoundExpression {
	readonly syntax: ExpressionSyntax
	readonly typeId: TypeId
	/** Folded value, or null when any operand is not constant */
	readonly constant: ConstantValue | null
	/** True once an error has been reported for this expression */
	readonly bad: boolean
}

function bad(syntax: ExpressionSyntax): BoundExpression {
	return { bad: true, constant: null, syntax, typeId: BuiltinTypeId.Error }
}

function ok(syntax: ExpressionSyntax, typeId: TypeId, constant: ConstantValue | null): BoundExpression {
	return { bad: false, constant, syntax, typeId }
}

function integer(value: SVInt): ConstantValue {
	return { kind: 'integer', value }
}

function integralType(context: CompilationContext, bitWidth: number, isSigned: boolean, isFourState: boolean): TypeId {
	let flags: IntegralFlagSet = IntegralFlags.None
	if (isSigned) flags |= IntegralFlags.Signed
	if (isFourState) flags |= IntegralFlags.FourState
	return context.types.getType(bitWidth, flags)
}

function toReal(value: ConstantValue): number | null {
	if (value.kind === 'real') return value.value
	if (value.kind === 'integer') return value.value.toNumber()
	return null
}

export function bindExpression(
	context: CompilationContext,
	syntax: ExpressionSyntax,
	location: LookupLocation
): BoundExpression {
	switch (syntax.kind) {
		case 'IntegerLiteral':
			return bindIntegerLiteral(context, syntax)
		case 'BasedLiteral':
			return bindBasedLiteral(context, syntax)
		case 'RealLiteral':
			return ok(syntax, BuiltinTypeId.Real, { kind: 'real', value: syntax.value })
		case 'StringLiteral':
			return ok(syntax, BuiltinTypeId.String, { kind: 'string', value: syntax.value })
		case 'Identifier':
			return bindIdentifier(context, syntax, location)
		case 'UnaryExpression':
			return bindUnary(context, syntax, location)
		case 'BinaryExpression':
			return bindBinary(context, syntax, location)
		default:
			return unreachable(syntax, 'expression kind')
	}
}

const INT_MAX = 2n ** 31n - 1n

/**
 * An unsized decimal number is a signed `int` when it fits, and otherwise
 * the narrowest signed two-state vector that holds it.
 */
function bindIntegerLiteral(context: CompilationContext, syntax: IntegerLiteralSyntax): BoundExpression {
	const numeric = BigInt(syntax.text)
	if (numeric <= INT_MAX) return ok(syntax, BuiltinTypeId.Int, integer(SVInt.from(32, numeric, true)))

	const bitWidth = numeric.toString(2).length + 1
	if (bitWidth > MAX_BIT_WIDTH) {
		context.emit('SVTYPE022', syntax.loc, { max: MAX_BIT_WIDTH, width: bitWidth })
		return bad(syntax)
	}
	const typeId = integralType(context, bitWidth, true, false)
	return ok(syntax, typeId, integer(SVInt.from(bitWidth, numeric, true)))
}

const BASE_NAMES = { b: 'binary', d: 'decimal', h: 'hexadecimal', o: 'octal' } as const
const BASE_DIGITS = { b: '01', d: '0123456789', h: '0123456789abcdef', o: '01234567' } as const

function isUnknownDigit(digit: string): boolean {
	return digit === 'x' || digit === 'z' || digit === '?'
}

/**
 * Why the digits of a based literal are malformed, or null when they are
 * well formed.
 */
function digitError(base: BasedLiteralSyntax['base'], digits: string): string | null {
	for (const digit of digits) {
		if (isUnknownDigit(digit)) continue
		if (!BASE_DIGITS[base].includes(digit)) return `'${digit}' is not a valid ${BASE_NAMES[base]} digit`
	}
	if (base === 'd' && digits.length > 1 && [...digits].some(isUnknownDigit)) {
		return 'an x or z decimal digit must stand alone'
	}
	return null
}

function bindBasedLiteral(context: CompilationContext, syntax: BasedLiteralSyntax): BoundExpression {
	const bitWidth = syntax.size ?? 32
	if (bitWidth === 0) {
		context.emit('SVTYPE021', syntax.loc, { detail: 'size must be at least one bit', text: syntax.text })
		return bad(syntax)
	}
	if (bitWidth > MAX_BIT_WIDTH) {
		context.emit('SVTYPE022', syntax.loc, { max: MAX_BIT_WIDTH, width: bitWidth })
		return bad(syntax)
	}
	const detail = digitError(syntax.base, syntax.digits)
	if (detail !== null) {
		context.emit('SVTYPE021', syntax.loc, { detail, text: syntax.text })
		return bad(syntax)
	}

	const value = SVInt.fromDigits(bitWidth, syntax.signed, syntax.base, syntax.digits)
	const typeId = integralType(context, bitWidth, syntax.signed, value.hasUnknown)
	return ok(syntax, typeId, integer(value))
}

function bindIdentifier(
	context: CompilationContext,
	syntax: IdentifierSyntax,
	location: LookupLocation
): BoundExpression {
	const result = lookupName(context, syntax.name, location)
	if (result.symbol === null) {
		reportLookup(context, result, syntax.loc)
		return bad(syntax)
	}

	const symbol = context.symbols.get(result.symbol)
	switch (symbol.kind) {
		case SymbolKind.Parameter: {
			const { typeId, value } = symbol.resolved.get()
			if (isError(context.types, typeId)) return bad(syntax)
			return ok(syntax, typeId, value)
		}
		case SymbolKind.EnumValue:
			// The member's own initializer already reported why it has no value
			if (symbol.value === null) return bad(syntax)
			return ok(syntax, symbol.typeId, integer(symbol.value))
		case SymbolKind.Variable:
		case SymbolKind.Net: {
			const typeId = symbol.typeId.get()
			if (isError(context.types, typeId)) return bad(syntax)
			return ok(syntax, typeId, null)
		}
		case SymbolKind.TypeAlias:
		case SymbolKind.ForwardTypedef:
		case SymbolKind.NetType:
		case SymbolKind.Subroutine:
			context.emit('SVTYPE017', syntax.loc, { name: syntax.name })
			return bad(syntax)
		default:
			return unreachable(symbol, 'symbol kind')
	}
}

function bindUnary(
	context: CompilationContext,
	syntax: UnaryExpressionSyntax,
	location: LookupLocation
): BoundExpression {
	const operand = bindExpression(context, syntax.operand, location)
	if (operand.bad) return bad(syntax)

	const { types } = context
	if (isFloating(types, operand.typeId) && syntax.op !== '~') {
		const value = operand.constant ? toReal(operand.constant) : null
		const folded: ConstantValue | null =
			value === null ? null : { kind: 'real', value: syntax.op === '-' ? -value : value }
		return ok(syntax, operand.typeId, folded)
	}

	const info = getIntegral(types, operand.typeId)
	if (!info) {
		context.emit('SVTYPE019', syntax.loc, { op: syntax.op, type: typeToString(types, operand.typeId) })
		return bad(syntax)
	}

	const typeId = integralType(context, info.bitWidth, info.isSigned, info.isFourState)
	if (operand.constant?.kind !== 'integer') return ok(syntax, typeId, null)

	const value = operand.constant.value.convert(info.bitWidth, info.isSigned)
	switch (syntax.op) {
		case '+':
			return ok(syntax, typeId, integer(value))
		case '-': {
			const numeric = value.toBigInt()
			const negated =
				numeric === null
					? SVInt.fillX(info.bitWidth, info.isSigned)
					: SVInt.from(info.bitWidth, -numeric, info.isSigned)
			return ok(syntax, typeId, integer(negated))
		}
		case '~':
			return ok(syntax, typeId, integer(value.not()))
		default:
			return unreachable(syntax.op, 'unary operator')
	}
}

const SHIFT_OPERATORS: ReadonlySet<BinaryOperator> = new Set(['<<', '>>'])
const BITWISE_OPERATORS: ReadonlySet<BinaryOperator> = new Set(['&', '^', '|'])

function bindBinary(
	context: CompilationContext,
	syntax: BinaryExpressionSyntax,
	location: LookupLocation
): BoundExpression {
	const left = bindExpression(context, syntax.left, location)
	const right = bindExpression(context, syntax.right, location)
	if (left.bad || right.bad) return bad(syntax)

	const { types } = context
	const integralOnly = SHIFT_OPERATORS.has(syntax.op) || BITWISE_OPERATORS.has(syntax.op)
	const leftInfo = getIntegral(types, left.typeId)
	const rightInfo = getIntegral(types, right.typeId)

	if (leftInfo && rightInfo) {
		const shift = SHIFT_OPERATORS.has(syntax.op)
		const bitWidth = shift ? leftInfo.bitWidth : Math.max(leftInfo.bitWidth, rightInfo.bitWidth)
		const isSigned = shift ? leftInfo.isSigned : leftInfo.isSigned && rightInfo.isSigned
		const typeId = integralType(context, bitWidth, isSigned, leftInfo.isFourState || rightInfo.isFourState)
		if (left.constant?.kind !== 'integer' || right.constant?.kind !== 'integer') {
			return ok(syntax, typeId, null)
		}
		const folded = foldIntegral(syntax.op, left.constant.value, right.constant.value, bitWidth, isSigned)
		return ok(syntax, typeId, integer(folded))
	}

	if (!integralOnly && isNumeric(types, left.typeId) && isNumeric(types, right.typeId)) {
		const a = left.constant ? toReal(left.constant) : null
		const b = right.constant ? toReal(right.constant) : null
		const folded: ConstantValue | null =
			a === null || b === null ? null : { kind: 'real', value: foldReal(syntax.op, a, b) }
		return ok(syntax, BuiltinTypeId.Real, folded)
	}

	context.emit('SVTYPE018', syntax.loc, {
		left: typeToString(types, left.typeId),
		op: syntax.op,
		right: typeToString(types, right.typeId),
	})
	return bad(syntax)
}

function foldIntegral(op: BinaryOperator, left: SVInt, right: SVInt, bitWidth: number, isSigned: boolean): SVInt {
	if (left.hasUnknown || right.hasUnknown) return SVInt.fillX(bitWidth, isSigned)

	if (op === '<<' || op === '>>') {
		const amount = right.value
		if (amount >= BigInt(bitWidth)) return SVInt.zero(bitWidth, isSigned)
		const shifted = left.convert(bitWidth, isSigned).value
		return SVInt.from(bitWidth, op === '<<' ? shifted << amount : shifted >> amount, isSigned)
	}

	const a = left.convert(bitWidth, isSigned)
	const b = right.convert(bitWidth, isSigned)
	const x = a.toBigInt()
	const y = b.toBigInt()
	if (x === null || y === null) return SVInt.fillX(bitWidth, isSigned)

	switch (op) {
		case '+':
			return SVInt.from(bitWidth, x + y, isSigned)
		case '-':
			return SVInt.from(bitWidth, x - y, isSigned)
		case '*':
			return SVInt.from(bitWidth, x * y, isSigned)
		case '/':
			return y === 0n ? SVInt.fillX(bitWidth, isSigned) : SVInt.from(bitWidth, x / y, isSigned)
		case '%':
			return y === 0n ? SVInt.fillX(bitWidth, isSigned) : SVInt.from(bitWidth, x % y, isSigned)
		case '&':
			return SVInt.from(bitWidth, a.value & b.value, isSigned)
		case '^':
			return SVInt.from(bitWidth, a.value ^ b.value, isSigned)
		case '|':
			return SVInt.from(bitWidth, a.value | b.value, isSigned)
		default:
			return unreachable(op, 'binary operator')
	}
}

function foldReal(op: BinaryOperator, a: number, b: number): number {
	switch (op) {
		case '+':
			return a + b
		case '-':
			return a - b
		case '*':
			return a * b
		case '/':
			return a / b
		case '%':
			return a % b
		default:
			return Number.NaN
	}
}
