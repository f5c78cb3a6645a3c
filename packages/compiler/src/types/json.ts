import { typeToString } from './printer.ts'
import { getBitWidth, isFourState, isSigned } from './queries.ts'
import type { TypeStore } from './store.ts'
import { type ConstantRange, type TypeId, TypeKind } from './types.ts'

export interface FieldJson {
	readonly name: string
	readonly offset: number
	readonly type: TypeJson
}

export interface TypeJson {
	readonly kind: string
	readonly text: string
	readonly bitWidth: number
	readonly signed: boolean
	readonly fourState: boolean
	readonly name?: string
	readonly range?: ConstantRange
	readonly element?: TypeJson
	readonly base?: TypeJson
	readonly members?: readonly { readonly name: string; readonly value: string | null }[]
	readonly fields?: readonly FieldJson[]
	readonly target?: TypeJson
	readonly forward?: readonly string[]
}

const KIND_NAMES: Readonly<Record<TypeKind, string>> = {
	[TypeKind.Error]: 'Error',
	[TypeKind.PredefinedInteger]: 'PredefinedInteger',
	[TypeKind.Scalar]: 'Scalar',
	[TypeKind.Floating]: 'Floating',
	[TypeKind.Enum]: 'Enum',
	[TypeKind.PackedArray]: 'PackedArray',
	[TypeKind.UnpackedArray]: 'UnpackedArray',
	[TypeKind.PackedStruct]: 'PackedStruct',
	[TypeKind.UnpackedStruct]: 'UnpackedStruct',
	[TypeKind.Null]: 'Null',
	[TypeKind.CHandle]: 'CHandle',
	[TypeKind.String]: 'String',
	[TypeKind.Event]: 'Event',
	[TypeKind.Void]: 'Void',
	[TypeKind.TypeAlias]: 'TypeAlias',
}

export function typeKindName(kind: TypeKind): string {
	return KIND_NAMES[kind]
}

/**
 * Serializes a type and everything it is built from.
 */
export function typeToJson(store: TypeStore, id: TypeId): TypeJson {
	const info = store.get(id)
	const common = {
		bitWidth: getBitWidth(store, id),
		fourState: isFourState(store, id),
		kind: KIND_NAMES[info.kind],
		signed: isSigned(store, id),
		text: typeToString(store, id),
		...(info.name ? { name: info.name } : {}),
	}

	switch (info.kind) {
		case TypeKind.Enum:
			return {
				...common,
				base: typeToJson(store, info.baseType),
				members: info.members.map((m) => ({ name: m.name, value: m.value?.toString() ?? null })),
			}
		case TypeKind.PackedArray:
		case TypeKind.UnpackedArray:
			return { ...common, element: typeToJson(store, info.elementType), range: info.range }
		case TypeKind.PackedStruct:
		case TypeKind.UnpackedStruct:
			return {
				...common,
				fields: info.fields.map((f) => ({
					name: f.name,
					offset: f.offset,
					type: typeToJson(store, f.typeId),
				})),
			}
		case TypeKind.TypeAlias:
			return {
				...common,
				target: typeToJson(store, info.target.get()),
				...(info.forwardDecls.length > 0
					? { forward: info.forwardDecls.map((f) => f.category ?? 'none') }
					: {}),
			}
		default:
			return common
	}
}
