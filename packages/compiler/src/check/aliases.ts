/**
 * Typedefs and forward typedefs.
 */

import type { CompilationContext } from '../core/context.ts'
import { InternalCompilerError } from '../core/errors.ts'
import type {
	ForwardTypedefCategory,
	ForwardTypedefDeclarationSyntax,
	TypedefDeclarationSyntax,
} from '../syntax/nodes.ts'
import { BuiltinTypeId } from '../types/store.ts'
import { type TypeId, type TypeInfo, TypeKind } from '../types/types.ts'
import { applyUnpackedDimensions } from './arrays.ts'
import { declareSymbol, findTypedefFor, lookupLocal, nextLocation } from './lookup.ts'
import { type ScopeId, type SymbolId, SymbolKind } from './stores.ts'
import { resolveType } from './type-resolution.ts'

/**
 * Declares `typedef <type> name <dims>;`. The target is resolved on first
 * use. Forward typedefs of the same name already in the scope are attached
 * to the new alias.
 */
export function declareTypeAlias(
	context: CompilationContext,
	syntax: TypedefDeclarationSyntax,
	scope: ScopeId
): SymbolId | null {
	const location = nextLocation(context, scope)
	const aliasId = context.types.addAlias({
		location: syntax.nameLoc,
		name: syntax.name,
		onCycle: () => {
			context.emit('SVTYPE014', syntax.nameLoc, { name: syntax.name })
			return BuiltinTypeId.Error
		},
		resolveTarget: () => {
			const base = resolveType(context, syntax.type, location)
			return applyUnpackedDimensions(context, base, syntax.dims, location)
		},
		syntax,
	})

	for (const id of lookupLocal(context, scope, syntax.name)) {
		const previous = context.symbols.get(id)
		if (previous.kind === SymbolKind.ForwardTypedef) {
			context.types.addForwardDecl(aliasId, previous.category, previous.location)
		}
	}

	return declareSymbol(context, scope, {
		kind: SymbolKind.TypeAlias,
		location: syntax.nameLoc,
		name: syntax.name,
		typeId: aliasId,
	})
}

/**
 * Declares `typedef [category] name;`. When the full typedef came first the
 * forward declaration is attached to it straight away.
 */
export function declareForwardTypedef(
	context: CompilationContext,
	syntax: ForwardTypedefDeclarationSyntax,
	scope: ScopeId
): SymbolId | null {
	const id = declareSymbol(context, scope, {
		category: syntax.category,
		kind: SymbolKind.ForwardTypedef,
		location: syntax.nameLoc,
		name: syntax.name,
	})
	if (id === null) return null

	const typedef = findTypedefFor(context, context.symbols.get(id))
	if (typedef !== null) {
		const alias = context.symbols.get(typedef)
		if (alias.kind === SymbolKind.TypeAlias) {
			context.types.addForwardDecl(alias.typeId, syntax.category, syntax.nameLoc)
		}
	}
	return id
}

function categoryMatches(category: ForwardTypedefCategory, target: TypeInfo): boolean {
	switch (category) {
		case 'enum':
			return target.kind === TypeKind.Enum
		case 'struct':
			return target.kind === TypeKind.PackedStruct || target.kind === TypeKind.UnpackedStruct
		case 'union':
		case 'class':
		case 'interface class':
			return false
	}
}

/**
 * Checks each forward declaration of `aliasId` against the canonical type
 * it ended up naming. Forward typedefs without a category match anything.
 */
export function checkForwardDecls(context: CompilationContext, aliasId: TypeId): void {
	const alias = context.types.get(aliasId)
	if (alias.kind !== TypeKind.TypeAlias) {
		throw new InternalCompilerError(`TypeId ${aliasId} is not an alias`)
	}

	const target = context.types.canonicalInfo(aliasId)
	if (target.kind === TypeKind.Error) return

	for (const forward of alias.forwardDecls) {
		if (forward.category === null || categoryMatches(forward.category, target)) continue
		const diagnostic = context.emit('SVTYPE006', forward.location, {
			category: forward.category,
			name: alias.name,
		})
		context.addNote(diagnostic, 'SVTYPE050', alias.location, { name: alias.name })
	}
}
