/**
 * Default value synthesis, cached per type.
 */

import { InternalCompilerError, unreachable } from '../core/errors.ts'
import type { TypeStore } from './store.ts'
import { rangeWidth, type TypeId, type TypeInfo, TypeKind } from './types.ts'
import { type ConstantValue, SVInt } from './values.ts'

const NULL_VALUE: ConstantValue = { kind: 'null' }

const caches = new WeakMap<TypeStore, Map<TypeId, ConstantValue>>()

function cacheFor(store: TypeStore): Map<TypeId, ConstantValue> {
	let cache = caches.get(store)
	if (!cache) {
		cache = new Map()
		caches.set(store, cache)
	}
	return cache
}

/**
 * The value a variable of type `id` holds before any assignment.
 *
 * Four-state integrals start as all X, two-state integrals and reals as
 * zero. Strings start empty; unpacked arrays and structs hold the defaults
 * of their elements. Void and the error type have no value.
 */
export function getDefaultValue(store: TypeStore, id: TypeId): ConstantValue {
	const cache = cacheFor(store)
	const cached = cache.get(id)
	if (cached !== undefined) return cached

	const value = computeDefault(store, store.get(id))
	cache.set(id, value)
	return value
}

function computeDefault(store: TypeStore, info: TypeInfo): ConstantValue {
	switch (info.kind) {
		case TypeKind.PredefinedInteger:
		case TypeKind.Scalar:
		case TypeKind.PackedArray:
		case TypeKind.PackedStruct: {
			const value = info.isFourState
				? SVInt.fillX(info.bitWidth, info.isSigned)
				: SVInt.zero(info.bitWidth, info.isSigned)
			return { kind: 'integer', value }
		}
		case TypeKind.Enum:
			return getDefaultValue(store, info.baseType)
		case TypeKind.Floating:
			return { kind: 'real', value: 0 }
		case TypeKind.Null:
		case TypeKind.CHandle:
		case TypeKind.Event:
			return NULL_VALUE
		case TypeKind.String:
			return { kind: 'string', value: '' }
		case TypeKind.UnpackedArray: {
			const element = getDefaultValue(store, info.elementType)
			return { elements: Array.from({ length: rangeWidth(info.range) }, () => element), kind: 'unpacked' }
		}
		case TypeKind.UnpackedStruct:
			return {
				elements: info.fields.map((field) => getDefaultValue(store, field.typeId)),
				kind: 'unpacked',
			}
		case TypeKind.TypeAlias:
			return getDefaultValue(store, info.target.get())
		case TypeKind.Void:
		case TypeKind.Error:
			throw new InternalCompilerError(`type kind ${info.kind} has no default value`)
		default:
			return unreachable(info, 'type kind')
	}
}
