/**
 * Type node model.
 *
 * Every type is a `TypeInfo` entry in the TypeStore arena, addressed by a
 * branded `TypeId`. The union is closed: switches over `kind` end in
 * `unreachable()` so that adding a kind fails to type-check until every
 * query handles it.
 */

import type { ScopeId } from '../check/stores.ts'
import type { SourceLocation } from '../core/context.ts'
import type { ForwardTypedefCategory, TypeOriginSyntax } from '../syntax/nodes.ts'
import type { Lazy, Memo } from './lazy.ts'
import type { SVInt } from './values.ts'

export type TypeId = number & { readonly __brand: 'TypeId' }

export function typeId(n: number): TypeId {
	return n as TypeId
}

/**
 * Type kinds.
 */
export const TypeKind = {
	CHandle: 10,
	Enum: 4,
	Error: 0,
	Event: 12,
	Floating: 3,
	Null: 9,
	PackedArray: 5,
	PackedStruct: 7,
	PredefinedInteger: 1,
	Scalar: 2,
	String: 11,
	TypeAlias: 14,
	UnpackedArray: 6,
	UnpackedStruct: 8,
	Void: 13,
} as const

export type TypeKind = (typeof TypeKind)[keyof typeof TypeKind]

export const PredefinedIntegerKind = {
	Byte: 3,
	Int: 1,
	Integer: 4,
	LongInt: 2,
	ShortInt: 0,
	Time: 5,
} as const

export type PredefinedIntegerKind = (typeof PredefinedIntegerKind)[keyof typeof PredefinedIntegerKind]

export const ScalarKind = {
	Bit: 0,
	Logic: 1,
	Reg: 2,
} as const

export type ScalarKind = (typeof ScalarKind)[keyof typeof ScalarKind]

export const FloatKind = {
	Real: 0,
	RealTime: 1,
	ShortReal: 2,
} as const

export type FloatKind = (typeof FloatKind)[keyof typeof FloatKind]

/**
 * Bit set describing an integral type's shape independent of its width.
 */
export const IntegralFlags = {
	FourState: 2,
	None: 0,
	Reg: 4,
	Signed: 1,
} as const

export type IntegralFlagSet = number

/**
 * A `[left:right]` index range. Either bound may be the larger.
 */
export interface ConstantRange {
	readonly left: number
	readonly right: number
}

/** Widest packed type or sized literal, in bits */
export const MAX_BIT_WIDTH = (1 << 24) - 1

export function rangeWidth(range: ConstantRange): number {
	return Math.abs(range.left - range.right) + 1
}

export function rangesEqual(a: ConstantRange, b: ConstantRange): boolean {
	return a.left === b.left && a.right === b.right
}

// =============================================================================
// VARIANTS
// =============================================================================

interface TypeBase {
	readonly name?: string
	readonly location?: SourceLocation
	/** Originating declaration, compared by identity when matching */
	readonly syntax?: TypeOriginSyntax
}

interface IntegralBase extends TypeBase {
	readonly bitWidth: number
	readonly isSigned: boolean
	readonly isFourState: boolean
}

export interface ErrorType extends TypeBase {
	readonly kind: typeof TypeKind.Error
}

export interface PredefinedIntegerType extends IntegralBase {
	readonly kind: typeof TypeKind.PredefinedInteger
	readonly integerKind: PredefinedIntegerKind
}

export interface ScalarType extends IntegralBase {
	readonly kind: typeof TypeKind.Scalar
	readonly scalarKind: ScalarKind
}

export interface FloatingType extends TypeBase {
	readonly kind: typeof TypeKind.Floating
	readonly floatKind: FloatKind
}

export interface EnumMember {
	readonly name: string
	/** Null when the initializer could not be evaluated */
	readonly value: SVInt | null
	readonly location: SourceLocation
}

export interface EnumType extends IntegralBase {
	readonly kind: typeof TypeKind.Enum
	readonly baseType: TypeId
	readonly members: readonly EnumMember[]
	/** The scope enum members are declared in */
	readonly scope: ScopeId
}

export interface PackedArrayType extends IntegralBase {
	readonly kind: typeof TypeKind.PackedArray
	readonly elementType: TypeId
	readonly range: ConstantRange
}

export interface UnpackedArrayType extends TypeBase {
	readonly kind: typeof TypeKind.UnpackedArray
	readonly elementType: TypeId
	readonly range: ConstantRange
}

/**
 * A struct member. `offset` is a bit offset in packed structs and the
 * sequential member index in unpacked ones.
 */
export interface Field {
	readonly name: string
	readonly typeId: TypeId
	readonly offset: number
	readonly location: SourceLocation
}

export interface PackedStructType extends IntegralBase {
	readonly kind: typeof TypeKind.PackedStruct
	/** In declaration order, most significant first */
	readonly fields: readonly Field[]
}

export interface UnpackedStructType extends TypeBase {
	readonly kind: typeof TypeKind.UnpackedStruct
	readonly fields: readonly Field[]
}

export interface NullType extends TypeBase {
	readonly kind: typeof TypeKind.Null
}

export interface CHandleType extends TypeBase {
	readonly kind: typeof TypeKind.CHandle
}

export interface StringType extends TypeBase {
	readonly kind: typeof TypeKind.String
}

export interface EventType extends TypeBase {
	readonly kind: typeof TypeKind.Event
}

export interface VoidType extends TypeBase {
	readonly kind: typeof TypeKind.Void
}

/**
 * A forward typedef attached to the alias that completes it.
 */
export interface ForwardDeclaration {
	readonly category: ForwardTypedefCategory | null
	readonly location: SourceLocation
}

export interface TypeAliasType extends TypeBase {
	readonly kind: typeof TypeKind.TypeAlias
	readonly name: string
	readonly location: SourceLocation
	readonly target: Lazy<TypeId>
	readonly canonical: Memo<TypeId>
	/** Forward typedefs in declaration order; appended during declaration */
	readonly forwardDecls: ForwardDeclaration[]
}

export type TypeInfo =
	| ErrorType
	| PredefinedIntegerType
	| ScalarType
	| FloatingType
	| EnumType
	| PackedArrayType
	| UnpackedArrayType
	| PackedStructType
	| UnpackedStructType
	| NullType
	| CHandleType
	| StringType
	| EventType
	| VoidType
	| TypeAliasType

export type IntegralType =
	| PredefinedIntegerType
	| ScalarType
	| EnumType
	| PackedArrayType
	| PackedStructType

export function isIntegralInfo(info: TypeInfo): info is IntegralType {
	switch (info.kind) {
		case TypeKind.PredefinedInteger:
		case TypeKind.Scalar:
		case TypeKind.Enum:
		case TypeKind.PackedArray:
		case TypeKind.PackedStruct:
			return true
		default:
			return false
	}
}
