import assert from 'node:assert'
import { describe, it } from 'node:test'
import { InternalCompilerError } from '../../src/core/errors.ts'
import type { TypedefDeclarationSyntax } from '../../src/syntax/nodes.ts'
import { typeToString } from '../../src/types/printer.ts'
import { BuiltinTypeId, TypeStore } from '../../src/types/store.ts'
import { IntegralFlags, MAX_BIT_WIDTH, ScalarKind, type TypeId, TypeKind, typeId } from '../../src/types/types.ts'

const loc = { column: 1, line: 1, offset: 0 }

function typedefSyntax(name: string): TypedefDeclarationSyntax {
	return {
		dims: [],
		kind: 'TypedefDeclaration',
		loc,
		name,
		nameLoc: loc,
		type: { keyword: 'string', kind: 'SimpleType', loc },
	}
}

describe('types/TypeStore', () => {
	describe('builtin bootstrapping', () => {
		it('should initialize with 18 builtin types', () => {
			const store = new TypeStore()
			assert.strictEqual(store.count(), 18)
		})

		it('should have the error type at index 0', () => {
			const store = new TypeStore()
			assert.strictEqual(store.get(BuiltinTypeId.Error).kind, TypeKind.Error)
		})

		it('should shape int as 32-bit signed two-state', () => {
			const store = new TypeStore()
			const info = store.get(BuiltinTypeId.Int)
			assert.strictEqual(info.kind, TypeKind.PredefinedInteger)
			if (info.kind !== TypeKind.PredefinedInteger) return
			assert.strictEqual(info.bitWidth, 32)
			assert.strictEqual(info.isSigned, true)
			assert.strictEqual(info.isFourState, false)
		})

		it('should shape time as 64-bit unsigned four-state', () => {
			const store = new TypeStore()
			const info = store.get(BuiltinTypeId.Time)
			assert.strictEqual(info.kind, TypeKind.PredefinedInteger)
			if (info.kind !== TypeKind.PredefinedInteger) return
			assert.strictEqual(info.bitWidth, 64)
			assert.strictEqual(info.isSigned, false)
			assert.strictEqual(info.isFourState, true)
		})

		it('should map keywords to builtins', () => {
			const store = new TypeStore()
			assert.strictEqual(store.getBuiltin('logic'), BuiltinTypeId.Logic)
			assert.strictEqual(store.getBuiltin('shortreal'), BuiltinTypeId.ShortReal)
			assert.strictEqual(store.getBuiltin('null'), BuiltinTypeId.Null)
		})
	})

	describe('get', () => {
		it('should throw InternalCompilerError for an unknown id', () => {
			const store = new TypeStore()
			assert.throws(() => store.get(typeId(999)), InternalCompilerError)
		})

		it('should report validity', () => {
			const store = new TypeStore()
			assert.strictEqual(store.isValid(BuiltinTypeId.Event), true)
			assert.strictEqual(store.isValid(typeId(18)), false)
		})
	})

	describe('getType', () => {
		it('should return the same id for the same shape', () => {
			const store = new TypeStore()
			const a = store.getType(8, IntegralFlags.FourState)
			const b = store.getType(8, IntegralFlags.FourState)
			assert.strictEqual(a, b)
		})

		it('should return different ids for different flags', () => {
			const store = new TypeStore()
			const a = store.getType(8, IntegralFlags.None)
			const b = store.getType(8, IntegralFlags.Signed)
			assert.notStrictEqual(a, b)
		})

		it('should build a [width-1:0] vector of the matching scalar', () => {
			const store = new TypeStore()
			const id = store.getType(16, IntegralFlags.FourState | IntegralFlags.Reg)
			const info = store.get(id)
			assert.strictEqual(info.kind, TypeKind.PackedArray)
			if (info.kind !== TypeKind.PackedArray) return
			assert.deepStrictEqual(info.range, { left: 15, right: 0 })
			assert.strictEqual(info.elementType, BuiltinTypeId.Reg)
			assert.strictEqual(info.bitWidth, 16)
			assert.strictEqual(info.isFourState, true)
			assert.strictEqual(typeToString(store, id), 'reg[15:0]')
		})

		it('should reject a zero width', () => {
			const store = new TypeStore()
			assert.throws(() => store.getType(0, IntegralFlags.None), InternalCompilerError)
		})

		it('should accept the widest vector and reject anything wider', () => {
			const store = new TypeStore()
			const id = store.getType(MAX_BIT_WIDTH, IntegralFlags.None)
			assert.strictEqual(store.getType(MAX_BIT_WIDTH, IntegralFlags.None), id)
			assert.notStrictEqual(store.getType(MAX_BIT_WIDTH, IntegralFlags.Signed), id)
			assert.throws(() => store.getType(MAX_BIT_WIDTH + 1, IntegralFlags.None), InternalCompilerError)
		})
	})

	describe('getCanonical', () => {
		it('should follow an alias chain to its end', () => {
			const store = new TypeStore()
			const inner = store.addAlias({
				location: loc,
				name: 'inner_t',
				onCycle: () => BuiltinTypeId.Error,
				resolveTarget: () => BuiltinTypeId.String,
				syntax: typedefSyntax('inner_t'),
			})
			const outer = store.addAlias({
				location: loc,
				name: 'outer_t',
				onCycle: () => BuiltinTypeId.Error,
				resolveTarget: () => inner,
				syntax: typedefSyntax('outer_t'),
			})
			assert.strictEqual(store.getCanonical(outer), BuiltinTypeId.String)
			assert.strictEqual(store.getCanonical(inner), BuiltinTypeId.String)
		})

		it('should throw on aliases that target each other', () => {
			const store = new TypeStore()
			let second: TypeId = BuiltinTypeId.Error
			const first = store.addAlias({
				location: loc,
				name: 'a_t',
				onCycle: () => BuiltinTypeId.Error,
				resolveTarget: () => second,
				syntax: typedefSyntax('a_t'),
			})
			second = store.addAlias({
				location: loc,
				name: 'b_t',
				onCycle: () => BuiltinTypeId.Error,
				resolveTarget: () => first,
				syntax: typedefSyntax('b_t'),
			})
			assert.throws(() => store.getCanonical(first), {
				message: "type alias cycle through 'a_t'",
				name: 'InternalCompilerError',
			})
		})
	})

	describe('getScalarType', () => {
		it('should return the builtin scalars when unsigned', () => {
			const store = new TypeStore()
			assert.strictEqual(store.getScalarType(IntegralFlags.None), BuiltinTypeId.Bit)
			assert.strictEqual(store.getScalarType(IntegralFlags.FourState), BuiltinTypeId.Logic)
			assert.strictEqual(store.getScalarType(IntegralFlags.FourState | IntegralFlags.Reg), BuiltinTypeId.Reg)
		})

		it('should cache signed scalars', () => {
			const store = new TypeStore()
			const a = store.getScalarType(IntegralFlags.Signed | IntegralFlags.FourState)
			const b = store.getScalarType(IntegralFlags.Signed | IntegralFlags.FourState)
			assert.strictEqual(a, b)
			const info = store.get(a)
			assert.strictEqual(info.kind, TypeKind.Scalar)
			if (info.kind !== TypeKind.Scalar) return
			assert.strictEqual(info.scalarKind, ScalarKind.Logic)
			assert.strictEqual(info.isSigned, true)
		})
	})

	describe('getPredefinedType', () => {
		it('should return the builtin for the default signedness', () => {
			const store = new TypeStore()
			assert.strictEqual(store.getPredefinedType('int', true), BuiltinTypeId.Int)
			assert.strictEqual(store.getPredefinedType('logic', false), BuiltinTypeId.Logic)
		})

		it('should build a vector for the other signedness', () => {
			const store = new TypeStore()
			const id = store.getPredefinedType('int', false)
			assert.strictEqual(id, store.getType(32, IntegralFlags.None))
			assert.strictEqual(typeToString(store, id), 'bit[31:0]')
		})

		it('should build a signed scalar for signed logic', () => {
			const store = new TypeStore()
			const id = store.getPredefinedType('logic', true)
			assert.strictEqual(typeToString(store, id), 'logic signed')
		})
	})
})
