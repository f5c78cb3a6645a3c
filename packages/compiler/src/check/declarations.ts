/**
 * Declaration pass.
 *
 * Walks the members of a source file in order and places a symbol for every
 * name they introduce. Types, values and net types are attached as lazy
 * cells; nothing is resolved here except enum-typed net types.
 */

import type { CompilationContext, SourceLocation } from '../core/context.ts'
import { unreachable } from '../core/errors.ts'
import type {
	AlwaysBlockSyntax,
	DataDeclarationSyntax,
	DataTypeSyntax,
	DeclaratorSyntax,
	FunctionDeclarationSyntax,
	NetDeclarationSyntax,
	ParameterDeclarationSyntax,
	SourceFileSyntax,
} from '../syntax/nodes.ts'
import { isAssignmentCompatible } from '../types/compatibility.ts'
import { Lazy } from '../types/lazy.ts'
import type { NetTypeId } from '../types/nets.ts'
import { typeToString } from '../types/printer.ts'
import { isError } from '../types/queries.ts'
import { BuiltinTypeId } from '../types/store.ts'
import type { TypeId } from '../types/types.ts'
import { declareForwardTypedef, declareTypeAlias } from './aliases.ts'
import { applyUnpackedDimensions } from './arrays.ts'
import { convertConstant } from './constants.ts'
import { bindExpression } from './expressions.ts'
import { declareSymbol, lookupName, nextLocation } from './lookup.ts'
import { declareNetType, getNetDataType } from './net-types.ts'
import { type LookupLocation, type ParameterValue, type ScopeId, SymbolKind } from './stores.ts'
import { resolveType } from './type-resolution.ts'

/**
 * An `always` block waiting to have its timing control bound.
 */
export interface PendingProcess {
	readonly syntax: AlwaysBlockSyntax
	readonly location: LookupLocation
}

/**
 * The fallback a lazy cell takes when computing it requires itself.
 */
function recursive<T>(context: CompilationContext, name: string, loc: SourceLocation, fallback: T): () => T {
	return () => {
		context.emit('SVTYPE014', loc, { name })
		return fallback
	}
}

/**
 * A type resolved once and shared by every declarator of a declaration.
 */
function sharedType(
	context: CompilationContext,
	syntax: DataTypeSyntax,
	location: LookupLocation,
	name: string,
	loc: SourceLocation
): Lazy<TypeId> {
	return new Lazy(
		() => resolveType(context, syntax, location),
		recursive(context, name, loc, BuiltinTypeId.Error)
	)
}

function declaratorType(
	context: CompilationContext,
	base: Lazy<TypeId>,
	declarator: DeclaratorSyntax,
	location: LookupLocation
): Lazy<TypeId> {
	return new Lazy(
		() => applyUnpackedDimensions(context, base.get(), declarator.dims, location),
		recursive(context, declarator.name, declarator.loc, BuiltinTypeId.Error)
	)
}

/**
 * Declares every member of `file` in `scope`. Returns the `always` blocks
 * with the point in declaration order they appear at.
 */
export function declareMembers(
	context: CompilationContext,
	file: SourceFileSyntax,
	scope: ScopeId
): PendingProcess[] {
	const processes: PendingProcess[] = []
	for (const member of file.members) {
		switch (member.kind) {
			case 'TypedefDeclaration':
				declareTypeAlias(context, member, scope)
				break
			case 'ForwardTypedefDeclaration':
				declareForwardTypedef(context, member, scope)
				break
			case 'NetTypeDeclaration':
				declareNetType(context, member, scope)
				break
			case 'ParameterDeclaration':
				declareParameters(context, member, scope)
				break
			case 'DataDeclaration':
				declareData(context, member, scope)
				break
			case 'NetDeclaration':
				declareNets(context, member, scope)
				break
			case 'FunctionDeclaration':
				declareFunction(context, member, scope)
				break
			case 'AlwaysBlock':
				processes.push({ location: nextLocation(context, scope), syntax: member })
				break
			default:
				unreachable(member, 'member kind')
		}
	}
	return processes
}

// ============================================================================
// Parameters
// ============================================================================

/**
 * A parameter without a data type, signing or dimensions takes the type of
 * its initializer.
 */
function isUntyped(syntax: DataTypeSyntax): boolean {
	return syntax.kind === 'ImplicitType' && syntax.signing === null && syntax.packedDims.length === 0
}

function declareParameters(
	context: CompilationContext,
	syntax: ParameterDeclarationSyntax,
	scope: ScopeId
): void {
	const first = syntax.declarators[0]
	const location = nextLocation(context, scope)
	const declared = isUntyped(syntax.type)
		? null
		: sharedType(context, syntax.type, location, first?.name ?? '', syntax.type.loc)

	for (const declarator of syntax.declarators) {
		const own = nextLocation(context, scope)
		declareSymbol(context, scope, {
			kind: SymbolKind.Parameter,
			location: declarator.loc,
			name: declarator.name,
			resolved: new Lazy(
				() => resolveParameter(context, declarator, declared, own),
				recursive(context, declarator.name, declarator.loc, {
					typeId: BuiltinTypeId.Error,
					value: null,
				})
			),
		})
	}
}

function resolveParameter(
	context: CompilationContext,
	declarator: DeclaratorSyntax,
	declared: Lazy<TypeId> | null,
	location: LookupLocation
): ParameterValue {
	const { types } = context
	const explicitType = declared
		? applyUnpackedDimensions(context, declared.get(), declarator.dims, location)
		: null

	if (declarator.initializer === null) {
		return { typeId: explicitType ?? BuiltinTypeId.Logic, value: null }
	}

	const bound = bindExpression(context, declarator.initializer, location)
	const typeId = explicitType ?? bound.typeId
	if (bound.bad || isError(types, typeId)) return { typeId, value: null }

	if (!isAssignmentCompatible(types, typeId, bound.typeId)) {
		context.emit('SVTYPE020', declarator.initializer.loc, {
			left: typeToString(types, typeId),
			name: declarator.name,
			right: typeToString(types, bound.typeId),
		})
		return { typeId, value: null }
	}
	if (bound.constant === null) {
		context.emit('SVTYPE008', declarator.initializer.loc)
		return { typeId, value: null }
	}
	return { typeId, value: convertConstant(context, bound.constant, typeId) }
}

// ============================================================================
// Variables and nets
// ============================================================================

/**
 * The user-defined net type a data declaration names, if any. Such a
 * declaration declares nets rather than variables.
 */
function findNetType(
	context: CompilationContext,
	syntax: DataTypeSyntax,
	location: LookupLocation
): NetTypeId | null {
	if (syntax.kind !== 'NamedType' || syntax.packedDims.length > 0) return null
	const result = lookupName(context, syntax.name, location)
	if (result.symbol === null) return null
	const symbol = context.symbols.get(result.symbol)
	return symbol.kind === SymbolKind.NetType ? symbol.netTypeId : null
}

function declareData(context: CompilationContext, syntax: DataDeclarationSyntax, scope: ScopeId): void {
	const location = nextLocation(context, scope)
	const netTypeId = findNetType(context, syntax.type, location)
	if (netTypeId !== null) {
		const netType = context.netTypes.get(netTypeId)
		const base = new Lazy(
			() => getNetDataType(context, netTypeId),
			recursive(context, netType.name, syntax.type.loc, BuiltinTypeId.Error)
		)
		declareNetDeclarators(context, syntax.declarators, netTypeId, base, location, scope)
		return
	}

	const base = sharedType(context, syntax.type, location, syntax.declarators[0]?.name ?? '', syntax.type.loc)
	for (const declarator of syntax.declarators) {
		declareSymbol(context, scope, {
			initializer: declarator.initializer,
			kind: SymbolKind.Variable,
			location: declarator.loc,
			name: declarator.name,
			typeId: declaratorType(context, base, declarator, location),
		})
	}
}

function declareNets(context: CompilationContext, syntax: NetDeclarationSyntax, scope: ScopeId): void {
	const location = nextLocation(context, scope)
	const base = sharedType(context, syntax.type, location, syntax.declarators[0]?.name ?? '', syntax.type.loc)
	const netTypeId = context.netTypes.getBuiltin(syntax.netKind)
	declareNetDeclarators(context, syntax.declarators, netTypeId, base, location, scope)
}

function declareNetDeclarators(
	context: CompilationContext,
	declarators: readonly DeclaratorSyntax[],
	netTypeId: NetTypeId,
	base: Lazy<TypeId>,
	location: LookupLocation,
	scope: ScopeId
): void {
	for (const declarator of declarators) {
		declareSymbol(context, scope, {
			initializer: declarator.initializer,
			kind: SymbolKind.Net,
			location: declarator.loc,
			name: declarator.name,
			netTypeId,
			typeId: declaratorType(context, base, declarator, location),
		})
	}
}

// ============================================================================
// Functions
// ============================================================================

function declareFunction(context: CompilationContext, syntax: FunctionDeclarationSyntax, scope: ScopeId): void {
	const location = nextLocation(context, scope)
	declareSymbol(context, scope, {
		kind: SymbolKind.Subroutine,
		location: syntax.nameLoc,
		name: syntax.name,
		returnType: sharedType(context, syntax.returnType, location, syntax.name, syntax.nameLoc),
	})
}
