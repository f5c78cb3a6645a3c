/**
 * Enum type builder.
 *
 * Members without an initializer take the previous value plus one, the first
 * taking zero. A member whose initializer is rejected has no value, and
 * counting carries on from the member before it. Values are held in the
 * base type's width and signedness.
 *
 * Members are declared twice: in the enum's own scope while the body is
 * elaborated, where they carry the base type, and then in the scope
 * enclosing the enum with the enum type itself.
 */

import type { CompilationContext } from '../core/context.ts'
import type { EnumTypeSyntax } from '../syntax/nodes.ts'
import { typeToString } from '../types/printer.ts'
import { getIntegral, isError, isIntegral, isSimpleBitVector } from '../types/queries.ts'
import { BuiltinTypeId } from '../types/store.ts'
import { type EnumMember, type TypeId, TypeKind } from '../types/types.ts'
import { SVInt } from '../types/values.ts'
import { applyPackedDimensions } from './arrays.ts'
import { bindExpression } from './expressions.ts'
import { declareSymbol, nextLocation } from './lookup.ts'
import { type LookupLocation, ScopeKind, SymbolKind } from './stores.ts'
import { resolveType } from './type-resolution.ts'

function resolveBase(context: CompilationContext, syntax: EnumTypeSyntax, location: LookupLocation): TypeId {
	if (syntax.baseType === null) return BuiltinTypeId.Int

	const { types } = context
	const base = resolveType(context, syntax.baseType, location)
	if (isError(types, base)) return base
	if (!isSimpleBitVector(types, base)) {
		context.emit('SVTYPE003', syntax.baseType.loc, { type: typeToString(types, base) })
		return BuiltinTypeId.Error
	}
	return base
}

export function resolveEnumType(
	context: CompilationContext,
	syntax: EnumTypeSyntax,
	location: LookupLocation
): TypeId {
	const { types } = context
	const baseType = resolveBase(context, syntax, location)
	const base = getIntegral(types, baseType)
	if (!base) return BuiltinTypeId.Error

	const { bitWidth, isSigned } = base
	const scope = context.scopes.add(ScopeKind.Enum, location)
	const members: EnumMember[] = []
	const one = SVInt.from(bitWidth, 1, isSigned)
	let next = SVInt.zero(bitWidth, isSigned)

	for (const member of syntax.members) {
		let value: SVInt | null = next
		if (member.initializer) {
			value = null
			const bound = bindExpression(context, member.initializer, nextLocation(context, scope))
			if (!bound.bad) {
				if (!isIntegral(types, bound.typeId)) {
					context.emit('SVTYPE013', member.initializer.loc, { type: typeToString(types, bound.typeId) })
				} else if (bound.constant?.kind !== 'integer') {
					context.emit('SVTYPE008', member.initializer.loc)
				} else {
					value = bound.constant.value.convert(bitWidth, isSigned)
				}
			}
		}

		members.push({ location: member.loc, name: member.name, value })
		declareSymbol(context, scope, {
			kind: SymbolKind.EnumValue,
			location: member.loc,
			name: member.name,
			typeId: baseType,
			value,
		})
		next = (value ?? next).add(one)
	}

	const enumType = types.add({
		baseType,
		bitWidth,
		isFourState: base.isFourState,
		isSigned,
		kind: TypeKind.Enum,
		location: syntax.loc,
		members,
		scope,
		syntax,
	})

	const mirrored = new Set<string>()
	for (const member of members) {
		if (mirrored.has(member.name)) continue
		mirrored.add(member.name)
		declareSymbol(
			context,
			location.scope,
			{
				kind: SymbolKind.EnumValue,
				location: member.location,
				name: member.name,
				typeId: enumType,
				value: member.value,
			},
			location.index
		)
	}

	return applyPackedDimensions(context, enumType, syntax.packedDims, location)
}
