import { describe, it } from 'node:test'
import fc from 'fast-check'
import {
	isAssignmentCompatible,
	isCastCompatible,
	isEquivalent,
	isMatching,
} from '../../src/types/compatibility.ts'
import { BuiltinTypeId, TypeStore } from '../../src/types/store.ts'
import { type TypeId, TypeKind } from '../../src/types/types.ts'

/**
 * Builtins, shared vectors of a few shapes and unpacked arrays over them.
 */
function typePool(store: TypeStore): TypeId[] {
	const pool: TypeId[] = Object.values(BuiltinTypeId).filter((id) => id !== BuiltinTypeId.Error)
	for (const width of [1, 8, 16, 32, 64]) {
		for (let flags = 0; flags < 8; flags++) pool.push(store.getType(width, flags))
	}
	for (const elementType of [BuiltinTypeId.Int, BuiltinTypeId.Logic, store.getType(8, 0)]) {
		pool.push(store.add({ elementType, kind: TypeKind.UnpackedArray, range: { left: 0, right: 3 } }))
		pool.push(store.add({ elementType, kind: TypeKind.UnpackedArray, range: { left: 3, right: 0 } }))
	}
	return pool
}

const store = new TypeStore()
const pool = typePool(store)
const pair = fc.tuple(fc.constantFrom(...pool), fc.constantFrom(...pool))

describe('types/compatibility properties', () => {
	it('matching implies equivalent', () => {
		fc.assert(fc.property(pair, ([a, b]) => !isMatching(store, a, b) || isEquivalent(store, a, b)))
	})

	it('equivalent implies assignment compatible', () => {
		fc.assert(fc.property(pair, ([a, b]) => !isEquivalent(store, a, b) || isAssignmentCompatible(store, a, b)))
	})

	it('assignment compatible implies cast compatible', () => {
		fc.assert(
			fc.property(pair, ([a, b]) => !isAssignmentCompatible(store, a, b) || isCastCompatible(store, a, b))
		)
	})

	it('matching is symmetric', () => {
		fc.assert(fc.property(pair, ([a, b]) => isMatching(store, a, b) === isMatching(store, b, a)))
	})

	it('equivalence is symmetric', () => {
		fc.assert(fc.property(pair, ([a, b]) => isEquivalent(store, a, b) === isEquivalent(store, b, a)))
	})

	it('every type matches itself', () => {
		fc.assert(fc.property(fc.constantFrom(...pool), (a) => isMatching(store, a, a)))
	})
})
