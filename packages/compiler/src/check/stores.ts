/**
 * Dense array stores for scopes and symbols.
 */

import type { SourceLocation } from '../core/context.ts'
import { InternalCompilerError } from '../core/errors.ts'
import type { ExpressionSyntax, ForwardTypedefCategory } from '../syntax/nodes.ts'
import type { Lazy } from '../types/lazy.ts'
import type { NetTypeId } from '../types/nets.ts'
import type { TypeId } from '../types/types.ts'
import type { ConstantValue, SVInt } from '../types/values.ts'

export type ScopeId = number & { readonly __brand: 'ScopeId' }

export function scopeId(n: number): ScopeId {
	return n as ScopeId
}

export type SymbolId = number & { readonly __brand: 'SymbolId' }

export function symbolId(n: number): SymbolId {
	return n as SymbolId
}

/**
 * A point in a scope's declaration order. Names declared at an index below
 * `index` are visible from here.
 */
export interface LookupLocation {
	readonly scope: ScopeId
	readonly index: number
}

export const ScopeKind = {
	CompilationUnit: 0,
	Enum: 1,
} as const

export type ScopeKind = (typeof ScopeKind)[keyof typeof ScopeKind]

/**
 * A scope in the program.
 */
export interface Scope {
	readonly id: ScopeId
	readonly kind: ScopeKind
	/** Where this scope sits in its parent, or null for the compilation unit */
	readonly parent: LookupLocation | null
	/** Every declaration of each name, in declaration order */
	readonly names: Map<string, SymbolId[]>
	/** Index the next declaration will get */
	nextIndex: number
}

export const SymbolKind = {
	EnumValue: 6,
	ForwardTypedef: 1,
	Net: 5,
	NetType: 2,
	Parameter: 3,
	Subroutine: 7,
	TypeAlias: 0,
	Variable: 4,
} as const

export type SymbolKind = (typeof SymbolKind)[keyof typeof SymbolKind]

interface SymbolBase {
	readonly name: string
	readonly location: SourceLocation
	readonly scope: ScopeId
	/** Declaration order within the scope */
	readonly index: number
}

export interface TypeAliasSymbol extends SymbolBase {
	readonly kind: typeof SymbolKind.TypeAlias
	readonly typeId: TypeId
}

export interface ForwardTypedefSymbol extends SymbolBase {
	readonly kind: typeof SymbolKind.ForwardTypedef
	readonly category: ForwardTypedefCategory | null
}

export interface NetTypeSymbol extends SymbolBase {
	readonly kind: typeof SymbolKind.NetType
	readonly netTypeId: NetTypeId
}

export interface ParameterValue {
	readonly typeId: TypeId
	/** Null when there is no initializer or it failed to evaluate */
	readonly value: ConstantValue | null
}

export interface ParameterSymbol extends SymbolBase {
	readonly kind: typeof SymbolKind.Parameter
	/** Type and value are computed together from the initializer */
	readonly resolved: Lazy<ParameterValue>
}

export interface VariableSymbol extends SymbolBase {
	readonly kind: typeof SymbolKind.Variable
	readonly typeId: Lazy<TypeId>
	readonly initializer: ExpressionSyntax | null
}

export interface NetSymbol extends SymbolBase {
	readonly kind: typeof SymbolKind.Net
	readonly netTypeId: NetTypeId
	readonly typeId: Lazy<TypeId>
	readonly initializer: ExpressionSyntax | null
}

/**
 * An enum member. Declared in the enum's own scope and mirrored into the
 * scope enclosing the enum.
 */
export interface EnumValueSymbol extends SymbolBase {
	readonly kind: typeof SymbolKind.EnumValue
	readonly typeId: TypeId
	readonly value: SVInt | null
}

export interface SubroutineSymbol extends SymbolBase {
	readonly kind: typeof SymbolKind.Subroutine
	readonly returnType: Lazy<TypeId>
}

export type SymbolInfo =
	| TypeAliasSymbol
	| ForwardTypedefSymbol
	| NetTypeSymbol
	| ParameterSymbol
	| VariableSymbol
	| NetSymbol
	| EnumValueSymbol
	| SubroutineSymbol

/**
 * Storage for scopes.
 */
export class ScopeStore {
	private readonly scopes: Scope[] = []

	add(kind: ScopeKind, parent: LookupLocation | null): ScopeId {
		const id = scopeId(this.scopes.length)
		this.scopes.push({ id, kind, names: new Map(), nextIndex: 0, parent })
		return id
	}

	get(id: ScopeId): Scope {
		const scope = this.scopes[id]
		if (scope === undefined) {
			throw new InternalCompilerError(`Invalid ScopeId: ${id}`)
		}
		return scope
	}

	count(): number {
		return this.scopes.length
	}

	createRootScope(): ScopeId {
		return this.add(ScopeKind.CompilationUnit, null)
	}

	*[Symbol.iterator](): Generator<[ScopeId, Scope]> {
		for (let i = 0; i < this.scopes.length; i++) {
			const scope = this.scopes[i]
			if (scope !== undefined) yield [scopeId(i), scope]
		}
	}
}

/**
 * Storage for declared symbols.
 * Append-only during the declaration pass.
 */
export class SymbolStore {
	private readonly symbols: SymbolInfo[] = []

	add(symbol: SymbolInfo): SymbolId {
		const id = symbolId(this.symbols.length)
		this.symbols.push(symbol)
		return id
	}

	get(id: SymbolId): SymbolInfo {
		const symbol = this.symbols[id]
		if (symbol === undefined) {
			throw new InternalCompilerError(`Invalid SymbolId: ${id}`)
		}
		return symbol
	}

	count(): number {
		return this.symbols.length
	}

	*[Symbol.iterator](): Generator<[SymbolId, SymbolInfo]> {
		for (let i = 0; i < this.symbols.length; i++) {
			const symbol = this.symbols[i]
			if (symbol !== undefined) yield [symbolId(i), symbol]
		}
	}
}
