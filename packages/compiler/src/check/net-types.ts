/**
 * User-defined net types.
 *
 * A `nettype` is declared unresolved. The first query for its data type,
 * alias target or resolution function resolves it, once.
 */

import type { CompilationContext } from '../core/context.ts'
import { InternalCompilerError } from '../core/errors.ts'
import type { NetTypeDeclarationSyntax } from '../syntax/nodes.ts'
import { Lazy } from '../types/lazy.ts'
import { NetKind, type NetTypeId, type NetTypeResolution } from '../types/nets.ts'
import { BuiltinTypeId } from '../types/store.ts'
import type { TypeId } from '../types/types.ts'
import { declareSymbol, LookupFlags, lookupName, nextLocation, reportLookup } from './lookup.ts'
import { type LookupLocation, type ScopeId, type SymbolId, SymbolKind } from './stores.ts'
import { resolveType } from './type-resolution.ts'

/**
 * Declares `nettype <type> name [with fn];`. An enum data type is built now
 * so its members are visible to the declarations that follow.
 */
export function declareNetType(
	context: CompilationContext,
	syntax: NetTypeDeclarationSyntax,
	scope: ScopeId
): SymbolId | null {
	const location = nextLocation(context, scope)
	const eagerType = syntax.type.kind === 'EnumType' ? resolveType(context, syntax.type, location) : null

	const netTypeId = context.netTypes.add({
		location: syntax.nameLoc,
		name: syntax.name,
		netKind: NetKind.UserDefined,
		resolution: new Lazy(
			() => resolveNetType(context, syntax, location, eagerType),
			() => {
				context.emit('SVTYPE014', syntax.nameLoc, { name: syntax.name })
				return { alias: null, dataType: BuiltinTypeId.Error, resolver: null }
			}
		),
		syntax,
	})

	return declareSymbol(context, scope, {
		kind: SymbolKind.NetType,
		location: syntax.nameLoc,
		name: syntax.name,
		netTypeId,
	})
}

function resolveNetType(
	context: CompilationContext,
	syntax: NetTypeDeclarationSyntax,
	location: LookupLocation,
	eagerType: TypeId | null
): NetTypeResolution {
	let dataType: TypeId
	let alias: NetTypeId | null = null

	if (eagerType !== null) {
		dataType = eagerType
	} else {
		alias = findNetTypeAlias(context, syntax, location)
		dataType =
			alias === null
				? resolveType(context, syntax.type, location)
				: getNetDataType(context, getCanonicalNetType(context, alias))
	}

	return { alias, dataType, resolver: resolveWithFunction(context, syntax, location) }
}

/**
 * `nettype other_t name;` renames another net type rather than wrapping a
 * data type.
 */
function findNetTypeAlias(
	context: CompilationContext,
	syntax: NetTypeDeclarationSyntax,
	location: LookupLocation
): NetTypeId | null {
	const { type } = syntax
	if (type.kind !== 'NamedType' || type.packedDims.length > 0) return null

	const result = lookupName(context, type.name, location, LookupFlags.Type)
	if (result.symbol === null) return null
	const symbol = context.symbols.get(result.symbol)
	return symbol.kind === SymbolKind.NetType ? symbol.netTypeId : null
}

function resolveWithFunction(
	context: CompilationContext,
	syntax: NetTypeDeclarationSyntax,
	location: LookupLocation
): SymbolId | null {
	const { withFunction } = syntax
	if (withFunction === null) return null

	const result = lookupName(context, withFunction.name, location)
	if (result.symbol === null) {
		reportLookup(context, result, withFunction.loc)
		return null
	}
	if (context.symbols.get(result.symbol).kind !== SymbolKind.Subroutine) {
		context.emit('SVTYPE012', withFunction.loc, { name: withFunction.name })
		return null
	}
	return result.symbol
}

export function getNetDataType(context: CompilationContext, id: NetTypeId): TypeId {
	return context.netTypes.get(id).resolution.get().dataType
}

/** The net type `id` renames, or null */
export function getNetAliasTarget(context: CompilationContext, id: NetTypeId): NetTypeId | null {
	return context.netTypes.get(id).resolution.get().alias
}

/** The `with` function symbol, or null */
export function getResolutionFunction(context: CompilationContext, id: NetTypeId): SymbolId | null {
	return context.netTypes.get(id).resolution.get().resolver
}

/**
 * Follows alias targets to the net type that declares a data type.
 */
export function getCanonicalNetType(context: CompilationContext, id: NetTypeId): NetTypeId {
	const visited = new Set<NetTypeId>()
	let current = id
	for (;;) {
		if (visited.has(current)) {
			throw new InternalCompilerError(`net type alias cycle through '${context.netTypes.get(current).name}'`)
		}
		visited.add(current)
		const target = getNetAliasTarget(context, current)
		if (target === null) return current
		current = target
	}
}
