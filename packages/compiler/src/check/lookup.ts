/**
 * Declaration and ordered name lookup.
 */

import type { CompilationContext, SourceLocation } from '../core/context.ts'
import type { DiagnosticArgs, DiagnosticCode } from '../core/diagnostics.ts'
import {
	type LookupLocation,
	type ScopeId,
	type SymbolId,
	type SymbolInfo,
	SymbolKind,
} from './stores.ts'

type DistributiveOmit<T, K extends PropertyKey> = T extends unknown ? Omit<T, K> : never

/** A symbol before it is placed in a scope */
export type PendingSymbol = DistributiveOmit<SymbolInfo, 'scope' | 'index'>

export const LookupFlags = {
	None: 0,
	/** Follow a forward typedef to the full typedef in its scope */
	Type: 1,
} as const

export type LookupFlagSet = number

export interface LookupDiagnostic {
	readonly code: DiagnosticCode
	readonly args: DiagnosticArgs
}

export interface LookupResult {
	readonly symbol: SymbolId | null
	readonly diagnostics: readonly LookupDiagnostic[]
}

function canCoexist(existing: SymbolInfo, incoming: PendingSymbol): boolean {
	if (existing.kind === SymbolKind.ForwardTypedef) {
		return incoming.kind === SymbolKind.ForwardTypedef || incoming.kind === SymbolKind.TypeAlias
	}
	return existing.kind === SymbolKind.TypeAlias && incoming.kind === SymbolKind.ForwardTypedef
}

/**
 * The index the next declaration in `scope` will take.
 */
export function nextLocation(context: CompilationContext, scope: ScopeId): LookupLocation {
	return { index: context.scopes.get(scope).nextIndex, scope }
}

/**
 * Places a symbol in `scope`. Without an explicit index it takes the next
 * one in declaration order. Reports a redefinition and returns null when the
 * name is taken.
 */
export function declareSymbol(
	context: CompilationContext,
	scope: ScopeId,
	pending: PendingSymbol,
	index?: number
): SymbolId | null {
	const target = context.scopes.get(scope)
	const existing = target.names.get(pending.name) ?? []
	for (const id of existing) {
		if (!canCoexist(context.symbols.get(id), pending)) {
			context.emit('SVTYPE011', pending.location, { name: pending.name })
			return null
		}
	}

	const symbol: SymbolInfo = { ...pending, index: index ?? target.nextIndex, scope }
	if (index === undefined) target.nextIndex++
	const id = context.symbols.add(symbol)
	target.names.set(pending.name, [...existing, id])
	return id
}

/**
 * Every declaration of `name` made directly in `scope`, regardless of order.
 */
export function lookupLocal(context: CompilationContext, scope: ScopeId, name: string): readonly SymbolId[] {
	return context.scopes.get(scope).names.get(name) ?? []
}

/**
 * The full typedef completing a forward typedef, searched for in the forward
 * declaration's own scope.
 */
export function findTypedefFor(context: CompilationContext, forward: SymbolInfo): SymbolId | null {
	for (const id of lookupLocal(context, forward.scope, forward.name)) {
		if (context.symbols.get(id).kind === SymbolKind.TypeAlias) return id
	}
	return null
}

/**
 * Finds the latest declaration of `name` visible from `location`, walking
 * outward through parent scopes.
 */
export function lookupName(
	context: CompilationContext,
	name: string,
	location: LookupLocation,
	flags: LookupFlagSet = LookupFlags.None
): LookupResult {
	let current: LookupLocation | null = location
	while (current) {
		const scope = context.scopes.get(current.scope)
		const candidates = scope.names.get(name) ?? []
		let found: SymbolId | null = null
		for (const id of candidates) {
			if (context.symbols.get(id).index < current.index) found = id
		}

		if (found !== null) {
			const symbol = context.symbols.get(found)
			if (flags & LookupFlags.Type && symbol.kind === SymbolKind.ForwardTypedef) {
				return { diagnostics: [], symbol: findTypedefFor(context, symbol) ?? found }
			}
			return { diagnostics: [], symbol: found }
		}

		// An enum scope sees what its enclosing declaration sees
		current = scope.parent
	}

	return { diagnostics: [{ args: { name }, code: 'SVTYPE007' }], symbol: null }
}

/**
 * Reports a lookup's diagnostics at `loc`.
 */
export function reportLookup(context: CompilationContext, result: LookupResult, loc: SourceLocation): void {
	for (const diagnostic of result.diagnostics) {
		context.emit(diagnostic.code, loc, diagnostic.args)
	}
}
