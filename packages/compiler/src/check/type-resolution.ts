/**
 * Type resolution: turns data type syntax into TypeIds.
 *
 * Every path that fails reports once and returns BuiltinTypeId.Error; callers
 * that receive Error pass it on without reporting again.
 */

import type { CompilationContext } from '../core/context.ts'
import { unreachable } from '../core/errors.ts'
import type {
	DataTypeSyntax,
	DimensionSyntax,
	IntegerAtomTypeSyntax,
	IntegerVectorKeyword,
	NamedTypeSyntax,
	Signing,
} from '../syntax/nodes.ts'
import { BuiltinTypeId } from '../types/store.ts'
import { IntegralFlags, type IntegralFlagSet, MAX_BIT_WIDTH, type TypeId } from '../types/types.ts'
import { applyPackedDimensions, wrapPackedRanges } from './arrays.ts'
import { evalPackedDimension } from './constants.ts'
import { resolveEnumType } from './enums.ts'
import { LookupFlags, lookupName, reportLookup } from './lookup.ts'
import { type LookupLocation, SymbolKind } from './stores.ts'
import { resolvePackedStruct, resolveUnpackedStruct } from './structs.ts'

const VECTOR_FLAGS: Readonly<Record<IntegerVectorKeyword, IntegralFlagSet>> = {
	bit: IntegralFlags.None,
	logic: IntegralFlags.FourState,
	reg: IntegralFlags.FourState | IntegralFlags.Reg,
}

/**
 * Resolves a data type as seen from `location`.
 */
export function resolveType(context: CompilationContext, syntax: DataTypeSyntax, location: LookupLocation): TypeId {
	switch (syntax.kind) {
		case 'IntegerVectorType':
			return resolveIntegerVector(context, syntax.keyword, syntax.signing, syntax.packedDims, location)
		case 'ImplicitType':
			return resolveIntegerVector(context, 'logic', syntax.signing, syntax.packedDims, location)
		case 'IntegerAtomType':
			return resolveIntegerAtom(context, syntax)
		case 'NonIntegerType':
		case 'SimpleType':
			return context.types.getBuiltin(syntax.keyword)
		case 'EnumType':
			return resolveEnumType(context, syntax, location)
		case 'StructType':
			return syntax.packed
				? resolvePackedStruct(context, syntax, location)
				: resolveUnpackedStruct(context, syntax, location)
		case 'NamedType':
			return applyPackedDimensions(
				context,
				lookupNamedType(context, syntax, location),
				syntax.packedDims,
				location
			)
		default:
			return unreachable(syntax, 'data type kind')
	}
}

/**
 * `bit`, `logic` and `reg` with optional signing and packed dimensions.
 * A single `[n:0]` dimension yields the shared vector of that width.
 */
function resolveIntegerVector(
	context: CompilationContext,
	keyword: IntegerVectorKeyword,
	signing: Signing | null,
	dims: readonly DimensionSyntax[],
	location: LookupLocation
): TypeId {
	const signed = signing === 'signed'
	if (dims.length === 0) return context.types.getPredefinedType(keyword, signed)

	const flags = VECTOR_FLAGS[keyword] | (signed ? IntegralFlags.Signed : IntegralFlags.None)
	const ranges = dims.map((dim) => evalPackedDimension(context, dim, location))
	const [only] = ranges
	if (ranges.length === 1 && only && only.right === 0 && only.left >= 0 && only.left < MAX_BIT_WIDTH) {
		return context.types.getType(only.left + 1, flags)
	}
	return wrapPackedRanges(context, context.types.getScalarType(flags), ranges, dims)
}

/**
 * `byte`, `int` and friends. Packed dimensions are reported and dropped.
 */
function resolveIntegerAtom(context: CompilationContext, syntax: IntegerAtomTypeSyntax): TypeId {
	const [dim] = syntax.packedDims
	if (dim) context.emit('SVTYPE001', dim.loc, { type: syntax.keyword })

	if (syntax.signing === null) return context.types.getBuiltin(syntax.keyword)
	return context.types.getPredefinedType(syntax.keyword, syntax.signing === 'signed')
}

/**
 * Resolves a type name. A forward typedef stands for the full typedef of
 * its scope. The alias's canonical form is computed here so that a
 * definition that depends on itself is reported at the point of use.
 */
export function lookupNamedType(
	context: CompilationContext,
	syntax: NamedTypeSyntax,
	location: LookupLocation
): TypeId {
	const result = lookupName(context, syntax.name, location, LookupFlags.Type)
	if (result.symbol === null) {
		reportLookup(context, result, syntax.loc)
		return BuiltinTypeId.Error
	}

	const symbol = context.symbols.get(result.symbol)
	switch (symbol.kind) {
		case SymbolKind.TypeAlias:
			context.types.getCanonical(symbol.typeId)
			return symbol.typeId
		case SymbolKind.ForwardTypedef:
			// Reported once at the forward declaration
			return BuiltinTypeId.Error
		default:
			context.emit('SVTYPE002', syntax.loc, { name: syntax.name })
			return BuiltinTypeId.Error
	}
}
