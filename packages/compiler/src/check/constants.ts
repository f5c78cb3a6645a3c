/**
 * Constant evaluation for dimensions and initializers.
 */

import type { CompilationContext } from '../core/context.ts'
import type { DimensionSyntax, ExpressionSyntax } from '../syntax/nodes.ts'
import { getIntegral, isFloating } from '../types/queries.ts'
import type { ConstantRange, TypeId } from '../types/types.ts'
import { type ConstantValue, SVInt } from '../types/values.ts'
import { bindExpression } from './expressions.ts'
import type { LookupLocation } from './stores.ts'

/**
 * Binds `syntax` and requires a constant result. Returns null after
 * reporting when it is not one.
 */
export function evaluateConstant(
	context: CompilationContext,
	syntax: ExpressionSyntax,
	location: LookupLocation
): ConstantValue | null {
	const bound = bindExpression(context, syntax, location)
	if (bound.bad) return null
	if (bound.constant === null) {
		context.emit('SVTYPE008', syntax.loc)
		return null
	}
	return bound.constant
}

/**
 * A constant integer with no X or Z bits, as a JS number.
 */
export function evaluateInteger(
	context: CompilationContext,
	syntax: ExpressionSyntax,
	location: LookupLocation
): number | null {
	const value = evaluateConstant(context, syntax, location)
	if (value === null) return null

	const numeric = value.kind === 'integer' ? value.value.toNumber() : null
	if (numeric === null || !Number.isSafeInteger(numeric)) {
		context.emit('SVTYPE008', syntax.loc)
		return null
	}
	return numeric
}

/**
 * A packed dimension must be a `[left:right]` range.
 */
export function evalPackedDimension(
	context: CompilationContext,
	dim: DimensionSyntax,
	location: LookupLocation
): ConstantRange | null {
	if (dim.kind === 'SizeDimension') {
		const size = evaluateInteger(context, dim.size, location)
		if (size !== null) context.emit('SVTYPE009', dim.loc, { msb: size - 1, size })
		return null
	}
	return evalRange(context, dim.left, dim.right, location)
}

/**
 * An unpacked dimension is a range, or a size `[n]` meaning `[0:n-1]`.
 */
export function evalUnpackedDimension(
	context: CompilationContext,
	dim: DimensionSyntax,
	location: LookupLocation
): ConstantRange | null {
	if (dim.kind === 'RangeDimension') return evalRange(context, dim.left, dim.right, location)

	const size = evaluateInteger(context, dim.size, location)
	if (size === null) return null
	if (size <= 0) {
		context.emit('SVTYPE016', dim.size.loc, { size })
		return null
	}
	return { left: 0, right: size - 1 }
}

function evalRange(
	context: CompilationContext,
	leftSyntax: ExpressionSyntax,
	rightSyntax: ExpressionSyntax,
	location: LookupLocation
): ConstantRange | null {
	const left = evaluateInteger(context, leftSyntax, location)
	const right = evaluateInteger(context, rightSyntax, location)
	if (left === null || right === null) return null
	return { left, right }
}

/**
 * Converts a constant to the representation of `typeId`: integers are
 * resized to integral targets, and cross between integer and real.
 */
export function convertConstant(context: CompilationContext, value: ConstantValue, typeId: TypeId): ConstantValue {
	const { types } = context
	const integral = getIntegral(types, typeId)
	if (integral) {
		if (value.kind === 'integer') {
			return { kind: 'integer', value: value.value.convert(integral.bitWidth, integral.isSigned) }
		}
		if (value.kind === 'real' && Number.isFinite(value.value)) {
			const rounded = BigInt(Math.round(value.value))
			return { kind: 'integer', value: SVInt.from(integral.bitWidth, rounded, integral.isSigned) }
		}
		return value
	}

	if (isFloating(types, typeId) && value.kind === 'integer') {
		const numeric = value.value.toNumber()
		return numeric === null ? value : { kind: 'real', value: numeric }
	}
	return value
}
