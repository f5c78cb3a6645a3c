/**
 * The four nested compatibility relations:
 * matching ⊆ equivalent ⊆ assignment-compatible ⊆ cast-compatible.
 *
 * Each relation is evaluated on canonical forms and starts from the
 * previous one.
 */

import {
	getBitVectorRange,
	isDeclaredReg,
	isFloating,
	isIntegral,
	isSimpleBitVector,
} from './queries.ts'
import type { TypeStore } from './store.ts'
import {
	FloatKind,
	IntegralFlags,
	type IntegralFlagSet,
	isIntegralInfo,
	rangesEqual,
	rangeWidth,
	ScalarKind,
	type TypeId,
	TypeKind,
} from './types.ts'

function isLogicOrReg(kind: ScalarKind): boolean {
	return kind === ScalarKind.Logic || kind === ScalarKind.Reg
}

function isRealOrRealTime(kind: FloatKind): boolean {
	return kind === FloatKind.Real || kind === FloatKind.RealTime
}

/**
 * Matching types are interchangeable everywhere.
 */
export function isMatching(store: TypeStore, left: TypeId, right: TypeId): boolean {
	const lid = store.getCanonical(left)
	const rid = store.getCanonical(right)
	const l = store.get(lid)
	const r = store.get(rid)

	// Shared builtins and uniquified vectors compare by identity.
	if (lid === rid || (l.syntax !== undefined && l.syntax === r.syntax)) return true

	if (l.kind === TypeKind.Scalar && r.kind === TypeKind.Scalar) {
		return isLogicOrReg(l.scalarKind) && isLogicOrReg(r.scalarKind)
	}

	if (l.kind === TypeKind.Floating && r.kind === TypeKind.Floating) {
		return isRealOrRealTime(l.floatKind) && isRealOrRealTime(r.floatKind)
	}

	// A predefined integer matches a vector of the same shape.
	if (
		isIntegralInfo(l) &&
		isIntegralInfo(r) &&
		isSimpleBitVector(store, lid) &&
		isSimpleBitVector(store, rid) &&
		(l.kind === TypeKind.PredefinedInteger) !== (r.kind === TypeKind.PredefinedInteger)
	) {
		return (
			l.isSigned === r.isSigned &&
			l.isFourState === r.isFourState &&
			rangesEqual(getBitVectorRange(l), getBitVectorRange(r))
		)
	}

	if (
		(l.kind === TypeKind.PackedArray && r.kind === TypeKind.PackedArray) ||
		(l.kind === TypeKind.UnpackedArray && r.kind === TypeKind.UnpackedArray)
	) {
		return rangesEqual(l.range, r.range) && isMatching(store, l.elementType, r.elementType)
	}

	return false
}

/**
 * Equivalent types hold the same values. Integral non-enums compare by
 * width, signedness and four-state-ness only; unpacked arrays by element
 * count.
 */
export function isEquivalent(store: TypeStore, left: TypeId, right: TypeId): boolean {
	if (isMatching(store, left, right)) return true

	const l = store.canonicalInfo(left)
	const r = store.canonicalInfo(right)

	if (isIntegralInfo(l) && isIntegralInfo(r) && l.kind !== TypeKind.Enum && r.kind !== TypeKind.Enum) {
		return l.isSigned === r.isSigned && l.isFourState === r.isFourState && l.bitWidth === r.bitWidth
	}

	if (l.kind === TypeKind.UnpackedArray && r.kind === TypeKind.UnpackedArray) {
		return (
			rangeWidth(l.range) === rangeWidth(r.range) &&
			isEquivalent(store, l.elementType, r.elementType)
		)
	}

	return false
}

/**
 * Whether a value of type `right` may be assigned to `left` implicitly. Any
 * numeric value converts to a non-enum integral or floating target.
 */
export function isAssignmentCompatible(store: TypeStore, left: TypeId, right: TypeId): boolean {
	if (isEquivalent(store, left, right)) return true

	const l = store.canonicalInfo(left)
	if ((isIntegralInfo(l) && l.kind !== TypeKind.Enum) || l.kind === TypeKind.Floating) {
		return isIntegral(store, right) || isFloating(store, right)
	}

	return false
}

/**
 * Whether `right` may be cast to `left`. Additionally admits numeric values
 * cast to an enum.
 */
export function isCastCompatible(store: TypeStore, left: TypeId, right: TypeId): boolean {
	if (isAssignmentCompatible(store, left, right)) return true

	if (store.canonicalInfo(left).kind === TypeKind.Enum) {
		return isIntegral(store, right) || isFloating(store, right)
	}

	return false
}

/**
 * Projects an integral type onto its {Signed, FourState, Reg} flags. Empty
 * for non-integral types.
 */
export function getIntegralFlags(store: TypeStore, id: TypeId): IntegralFlagSet {
	const info = store.canonicalInfo(id)
	if (!isIntegralInfo(info)) return IntegralFlags.None

	let flags: IntegralFlagSet = IntegralFlags.None
	if (info.isSigned) flags |= IntegralFlags.Signed
	if (info.isFourState) flags |= IntegralFlags.FourState
	if (isDeclaredReg(store, id)) flags |= IntegralFlags.Reg
	return flags
}
