import type { CompilationContext } from '../core/context.ts'
import { InternalCompilerError } from '../core/errors.ts'
import type { DimensionSyntax } from '../syntax/nodes.ts'
import { typeToString } from '../types/printer.ts'
import { getBitWidth, getIntegral, isError, isIntegral } from '../types/queries.ts'
import { BuiltinTypeId } from '../types/store.ts'
import { type ConstantRange, MAX_BIT_WIDTH, rangeWidth, type TypeId, TypeKind } from '../types/types.ts'
import { evalPackedDimension, evalUnpackedDimension } from './constants.ts'
import type { LookupLocation } from './stores.ts'

/**
 * A packed array of `elementType`, which must be integral. Width, sign and
 * four-state-ness come from the element.
 */
export function makePackedArray(
	context: CompilationContext,
	elementType: TypeId,
	range: ConstantRange,
	syntax?: DimensionSyntax
): TypeId {
	const element = getIntegral(context.types, elementType)
	if (!element) {
		throw new InternalCompilerError(`packed array of non-integral type ${elementType}`)
	}
	return context.types.add({
		bitWidth: element.bitWidth * rangeWidth(range),
		elementType,
		isFourState: element.isFourState,
		isSigned: element.isSigned,
		kind: TypeKind.PackedArray,
		range,
		...(syntax ? { syntax } : {}),
	})
}

export function makeUnpackedArray(
	context: CompilationContext,
	elementType: TypeId,
	range: ConstantRange,
	syntax?: DimensionSyntax
): TypeId {
	return context.types.add({
		elementType,
		kind: TypeKind.UnpackedArray,
		range,
		...(syntax ? { syntax } : {}),
	})
}

/**
 * Wraps `elementType` in packed dimensions. The last dimension varies
 * fastest, so dimensions are applied right to left.
 */
export function applyPackedDimensions(
	context: CompilationContext,
	elementType: TypeId,
	dims: readonly DimensionSyntax[],
	location: LookupLocation
): TypeId {
	const [first] = dims
	if (first === undefined) return elementType
	if (isError(context.types, elementType)) return BuiltinTypeId.Error

	if (!isIntegral(context.types, elementType)) {
		context.emit('SVTYPE010', first.loc, { type: typeToString(context.types, elementType) })
		return BuiltinTypeId.Error
	}

	const ranges = dims.map((dim) => evalPackedDimension(context, dim, location))
	return wrapPackedRanges(context, elementType, ranges, dims)
}

/**
 * Wraps an integral `elementType` in evaluated packed ranges, right to left.
 * A null range has already been reported.
 */
export function wrapPackedRanges(
	context: CompilationContext,
	elementType: TypeId,
	ranges: readonly (ConstantRange | null)[],
	dims: readonly DimensionSyntax[]
): TypeId {
	let result = elementType
	for (let i = dims.length - 1; i >= 0; i--) {
		const range = ranges[i]
		const dim = dims[i]
		if (!range || !dim) return BuiltinTypeId.Error
		const width = getBitWidth(context.types, result) * rangeWidth(range)
		if (width > MAX_BIT_WIDTH) {
			context.emit('SVTYPE022', dim.loc, { max: MAX_BIT_WIDTH, width })
			return BuiltinTypeId.Error
		}
		result = makePackedArray(context, result, range, dim)
	}
	return result
}

/**
 * Wraps `elementType` in unpacked dimensions, right to left.
 */
export function applyUnpackedDimensions(
	context: CompilationContext,
	elementType: TypeId,
	dims: readonly DimensionSyntax[],
	location: LookupLocation
): TypeId {
	if (dims.length === 0) return elementType
	if (isError(context.types, elementType)) return BuiltinTypeId.Error

	const ranges = dims.map((dim) => evalUnpackedDimension(context, dim, location))
	let result = elementType
	for (let i = dims.length - 1; i >= 0; i--) {
		const range = ranges[i]
		if (!range) return BuiltinTypeId.Error
		result = makeUnpackedArray(context, result, range, dims[i])
	}
	return result
}
