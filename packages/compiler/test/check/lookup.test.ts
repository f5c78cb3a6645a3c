import assert from 'node:assert'
import { describe, it } from 'node:test'
import {
	declareSymbol,
	findTypedefFor,
	LookupFlags,
	lookupLocal,
	lookupName,
	nextLocation,
	reportLookup,
} from '../../src/check/lookup.ts'
import { ScopeKind, SymbolKind } from '../../src/check/stores.ts'
import { CompilationContext } from '../../src/core/context.ts'
import { Lazy } from '../../src/types/lazy.ts'
import { BuiltinTypeId } from '../../src/types/store.ts'

const loc = { column: 1, line: 1, offset: 0 }

function forward(name: string) {
	return { category: null, kind: SymbolKind.ForwardTypedef, location: loc, name } as const
}

function alias(name: string) {
	return { kind: SymbolKind.TypeAlias, location: loc, name, typeId: BuiltinTypeId.Int } as const
}

function variable(name: string) {
	return {
		initializer: null,
		kind: SymbolKind.Variable,
		location: loc,
		name,
		typeId: Lazy.resolved(BuiltinTypeId.Int),
	} as const
}

describe('check/lookup', () => {
	describe('declareSymbol', () => {
		it('should number declarations in order', () => {
			const context = new CompilationContext('')
			const scope = context.rootScope
			const a = declareSymbol(context, scope, variable('a'))
			const b = declareSymbol(context, scope, variable('b'))
			assert.ok(a !== null && b !== null)
			assert.strictEqual(context.symbols.get(a).index, 0)
			assert.strictEqual(context.symbols.get(b).index, 1)
			assert.deepStrictEqual(nextLocation(context, scope), { index: 2, scope })
		})

		it('should place a symbol at an explicit index without advancing', () => {
			const context = new CompilationContext('')
			const scope = context.rootScope
			declareSymbol(context, scope, variable('a'))
			const id = declareSymbol(context, scope, variable('b'), 0)
			assert.ok(id !== null)
			assert.strictEqual(context.symbols.get(id).index, 0)
			assert.strictEqual(nextLocation(context, scope).index, 1)
		})

		it('should report a redefinition', () => {
			const context = new CompilationContext('')
			declareSymbol(context, context.rootScope, variable('a'))
			const id = declareSymbol(context, context.rootScope, variable('a'))
			assert.strictEqual(id, null)
			assert.deepStrictEqual(
				context.getDiagnostics().map((d) => d.message),
				["redefinition of 'a'"]
			)
		})

		it('should let forward typedefs and a typedef share a name', () => {
			const context = new CompilationContext('')
			const scope = context.rootScope
			declareSymbol(context, scope, forward('T'))
			declareSymbol(context, scope, forward('T'))
			declareSymbol(context, scope, alias('T'))
			declareSymbol(context, scope, forward('T'))
			assert.strictEqual(lookupLocal(context, scope, 'T').length, 4)
			assert.strictEqual(context.hasErrors(), false)
		})

		it('should not let a variable share a forward typedef name', () => {
			const context = new CompilationContext('')
			declareSymbol(context, context.rootScope, forward('T'))
			assert.strictEqual(declareSymbol(context, context.rootScope, variable('T')), null)
			assert.strictEqual(context.getErrorCount(), 1)
		})
	})

	describe('lookupName', () => {
		it('should only see names declared before the location', () => {
			const context = new CompilationContext('')
			const scope = context.rootScope
			const id = declareSymbol(context, scope, variable('a'))
			assert.strictEqual(lookupName(context, 'a', { index: 0, scope }).symbol, null)
			assert.strictEqual(lookupName(context, 'a', { index: 1, scope }).symbol, id)
		})

		it('should return an undeclared identifier diagnostic when nothing is found', () => {
			const context = new CompilationContext('')
			const result = lookupName(context, 'missing', nextLocation(context, context.rootScope))
			assert.deepStrictEqual(result.diagnostics, [{ args: { name: 'missing' }, code: 'SVTYPE007' }])
			assert.strictEqual(context.hasErrors(), false)
			reportLookup(context, result, loc)
			assert.strictEqual(context.getDiagnostics()[0]?.message, "use of undeclared identifier 'missing'")
		})

		it('should search the enclosing scope from its declaration point', () => {
			const context = new CompilationContext('')
			const root = context.rootScope
			const before = declareSymbol(context, root, variable('a'))
			const enumScope = context.scopes.add(ScopeKind.Enum, nextLocation(context, root))
			declareSymbol(context, root, variable('b'))
			assert.strictEqual(lookupName(context, 'a', { index: 0, scope: enumScope }).symbol, before)
			assert.strictEqual(lookupName(context, 'b', { index: 0, scope: enumScope }).symbol, null)
		})

		it('should prefer the innermost declaration', () => {
			const context = new CompilationContext('')
			const root = context.rootScope
			declareSymbol(context, root, variable('a'))
			const enumScope = context.scopes.add(ScopeKind.Enum, nextLocation(context, root))
			const inner = declareSymbol(context, enumScope, variable('x'))
			declareSymbol(context, root, variable('x'), 0)
			assert.strictEqual(lookupName(context, 'x', { index: 1, scope: enumScope }).symbol, inner)
		})

		it('should follow a forward typedef to its typedef for type lookups', () => {
			const context = new CompilationContext('')
			const scope = context.rootScope
			const fwd = declareSymbol(context, scope, forward('T'))
			declareSymbol(context, scope, variable('x'))
			const full = declareSymbol(context, scope, alias('T'))
			const at = { index: 1, scope }
			assert.strictEqual(lookupName(context, 'T', at).symbol, fwd)
			assert.strictEqual(lookupName(context, 'T', at, LookupFlags.Type).symbol, full)
		})

		it('should keep an unresolved forward typedef for type lookups', () => {
			const context = new CompilationContext('')
			const scope = context.rootScope
			const fwd = declareSymbol(context, scope, forward('T'))
			assert.strictEqual(lookupName(context, 'T', { index: 1, scope }, LookupFlags.Type).symbol, fwd)
		})
	})

	describe('findTypedefFor', () => {
		it('should find a typedef declared later in the same scope', () => {
			const context = new CompilationContext('')
			const scope = context.rootScope
			const fwd = declareSymbol(context, scope, forward('T'))
			const full = declareSymbol(context, scope, alias('T'))
			assert.ok(fwd !== null)
			assert.strictEqual(findTypedefFor(context, context.symbols.get(fwd)), full)
		})
	})
})
