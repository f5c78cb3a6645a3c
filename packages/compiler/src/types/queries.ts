/**
 * Classification queries. Every query looks at the canonical form.
 */

import { unreachable } from '../core/errors.ts'
import type { TypeStore } from './store.ts'
import {
	type ConstantRange,
	FloatKind,
	type IntegralType,
	isIntegralInfo,
	ScalarKind,
	type TypeId,
	type TypeInfo,
	TypeKind,
} from './types.ts'

export function isError(store: TypeStore, id: TypeId): boolean {
	return store.canonicalInfo(id).kind === TypeKind.Error
}

export function isAlias(store: TypeStore, id: TypeId): boolean {
	return store.get(id).kind === TypeKind.TypeAlias
}

export function isIntegral(store: TypeStore, id: TypeId): boolean {
	return isIntegralInfo(store.canonicalInfo(id))
}

export function isFloating(store: TypeStore, id: TypeId): boolean {
	return store.canonicalInfo(id).kind === TypeKind.Floating
}

export function isNumeric(store: TypeStore, id: TypeId): boolean {
	return isIntegral(store, id) || isFloating(store, id)
}

export function isEnum(store: TypeStore, id: TypeId): boolean {
	return store.canonicalInfo(id).kind === TypeKind.Enum
}

export function isScalar(store: TypeStore, id: TypeId): boolean {
	return store.canonicalInfo(id).kind === TypeKind.Scalar
}

export function isPredefinedInteger(store: TypeStore, id: TypeId): boolean {
	return store.canonicalInfo(id).kind === TypeKind.PredefinedInteger
}

export function isPackedArray(store: TypeStore, id: TypeId): boolean {
	return store.canonicalInfo(id).kind === TypeKind.PackedArray
}

export function isUnpackedArray(store: TypeStore, id: TypeId): boolean {
	return store.canonicalInfo(id).kind === TypeKind.UnpackedArray
}

export function isVoid(store: TypeStore, id: TypeId): boolean {
	return store.canonicalInfo(id).kind === TypeKind.Void
}

/**
 * Unpacked arrays and unpacked structs.
 */
export function isAggregate(store: TypeStore, id: TypeId): boolean {
	const kind = store.canonicalInfo(id).kind
	return kind === TypeKind.UnpackedArray || kind === TypeKind.UnpackedStruct
}

/**
 * Predefined integers, scalars, and packed arrays whose element is a scalar.
 */
export function isSimpleBitVector(store: TypeStore, id: TypeId): boolean {
	const info = store.canonicalInfo(id)
	if (info.kind === TypeKind.PredefinedInteger || info.kind === TypeKind.Scalar) return true
	return info.kind === TypeKind.PackedArray && isScalar(store, info.elementType)
}

export function isBooleanConvertible(store: TypeStore, id: TypeId): boolean {
	switch (store.canonicalInfo(id).kind) {
		case TypeKind.Null:
		case TypeKind.CHandle:
		case TypeKind.String:
		case TypeKind.Event:
			return true
		default:
			return isNumeric(store, id)
	}
}

export function isStructUnion(store: TypeStore, id: TypeId): boolean {
	const kind = store.canonicalInfo(id).kind
	return kind === TypeKind.PackedStruct || kind === TypeKind.UnpackedStruct
}

/**
 * Bit width of integral types, 32 or 64 for floating types, 0 otherwise.
 */
export function getBitWidth(store: TypeStore, id: TypeId): number {
	const info = store.canonicalInfo(id)
	if (isIntegralInfo(info)) return info.bitWidth
	if (info.kind === TypeKind.Floating) {
		switch (info.floatKind) {
			case FloatKind.Real:
			case FloatKind.RealTime:
				return 64
			case FloatKind.ShortReal:
				return 32
			default:
				return unreachable(info.floatKind, 'float kind')
		}
	}
	return 0
}

export function isSigned(store: TypeStore, id: TypeId): boolean {
	const info = store.canonicalInfo(id)
	return isIntegralInfo(info) && info.isSigned
}

/**
 * Integral types carry the flag; unpacked arrays and structs derive it from
 * their elements.
 */
export function isFourState(store: TypeStore, id: TypeId): boolean {
	const info = store.canonicalInfo(id)
	if (isIntegralInfo(info)) return info.isFourState
	if (info.kind === TypeKind.UnpackedArray) return isFourState(store, info.elementType)
	if (info.kind === TypeKind.UnpackedStruct) {
		return info.fields.some((field) => isFourState(store, field.typeId))
	}
	return false
}

/**
 * The canonical integral entry for `id`, or null.
 */
export function getIntegral(store: TypeStore, id: TypeId): IntegralType | null {
	const info = store.canonicalInfo(id)
	return isIntegralInfo(info) ? info : null
}

export function getBitVectorRange(info: IntegralType): ConstantRange {
	if (info.kind === TypeKind.PackedArray) return info.range
	return { left: info.bitWidth - 1, right: 0 }
}

/**
 * Declared range of an integral or unpacked array type; `[0:0]` for others.
 */
export function getArrayRange(store: TypeStore, id: TypeId): ConstantRange {
	const info = store.canonicalInfo(id)
	if (isIntegralInfo(info)) return getBitVectorRange(info)
	if (info.kind === TypeKind.UnpackedArray) return info.range
	return { left: 0, right: 0 }
}

/**
 * True when the innermost packed element is a `reg` scalar.
 */
export function isDeclaredReg(store: TypeStore, id: TypeId): boolean {
	let info: TypeInfo = store.canonicalInfo(id)
	while (info.kind === TypeKind.PackedArray) {
		info = store.canonicalInfo(info.elementType)
	}
	return info.kind === TypeKind.Scalar && info.scalarKind === ScalarKind.Reg
}
