import { unreachable } from '../core/errors.ts'
import type { TypeStore } from './store.ts'
import { type ConstantRange, FloatKind, PredefinedIntegerKind, ScalarKind, type TypeId, TypeKind } from './types.ts'

const INTEGER_NAMES: Readonly<Record<PredefinedIntegerKind, string>> = {
	[PredefinedIntegerKind.ShortInt]: 'shortint',
	[PredefinedIntegerKind.Int]: 'int',
	[PredefinedIntegerKind.LongInt]: 'longint',
	[PredefinedIntegerKind.Byte]: 'byte',
	[PredefinedIntegerKind.Integer]: 'integer',
	[PredefinedIntegerKind.Time]: 'time',
}

const SCALAR_NAMES: Readonly<Record<ScalarKind, string>> = {
	[ScalarKind.Bit]: 'bit',
	[ScalarKind.Logic]: 'logic',
	[ScalarKind.Reg]: 'reg',
}

const FLOAT_NAMES: Readonly<Record<FloatKind, string>> = {
	[FloatKind.Real]: 'real',
	[FloatKind.RealTime]: 'realtime',
	[FloatKind.ShortReal]: 'shortreal',
}

function dims(ranges: readonly ConstantRange[]): string {
	return ranges.map((r) => `[${r.left}:${r.right}]`).join('')
}

/**
 * Renders a type the way it would be written in source, e.g. `logic[7:0]`,
 * `struct packed{byte a;int b;}` or `int$[0:3]`. Aliases print their name.
 */
export function typeToString(store: TypeStore, id: TypeId): string {
	const info = store.get(id)
	switch (info.kind) {
		case TypeKind.Error:
			return '<error>'
		case TypeKind.PredefinedInteger:
			return INTEGER_NAMES[info.integerKind]
		case TypeKind.Scalar:
			return info.isSigned ? `${SCALAR_NAMES[info.scalarKind]} signed` : SCALAR_NAMES[info.scalarKind]
		case TypeKind.Floating:
			return FLOAT_NAMES[info.floatKind]
		case TypeKind.Enum: {
			if (info.name) return info.name
			const members = info.members.map((m) => (m.value ? `${m.name}=${m.value.toString()}` : m.name))
			return `enum{${members.join(',')}}`
		}
		case TypeKind.PackedArray: {
			if (info.name) return info.name
			const ranges: ConstantRange[] = [info.range]
			let elementId = info.elementType
			let element = store.get(elementId)
			while (element.kind === TypeKind.PackedArray && !element.name) {
				ranges.push(element.range)
				elementId = element.elementType
				element = store.get(elementId)
			}
			return `${typeToString(store, elementId)}${dims(ranges)}`
		}
		case TypeKind.UnpackedArray: {
			if (info.name) return info.name
			const ranges: ConstantRange[] = [info.range]
			let elementId = info.elementType
			let element = store.get(elementId)
			while (element.kind === TypeKind.UnpackedArray && !element.name) {
				ranges.push(element.range)
				elementId = element.elementType
				element = store.get(elementId)
			}
			return `${typeToString(store, elementId)}$${dims(ranges)}`
		}
		case TypeKind.PackedStruct: {
			if (info.name) return info.name
			const fields = info.fields.map((f) => `${typeToString(store, f.typeId)} ${f.name};`)
			return `struct packed${info.isSigned ? ' signed' : ''}{${fields.join('')}}`
		}
		case TypeKind.UnpackedStruct: {
			if (info.name) return info.name
			const fields = info.fields.map((f) => `${typeToString(store, f.typeId)} ${f.name};`)
			return `struct{${fields.join('')}}`
		}
		case TypeKind.Null:
			return 'null'
		case TypeKind.CHandle:
			return 'chandle'
		case TypeKind.String:
			return 'string'
		case TypeKind.Event:
			return 'event'
		case TypeKind.Void:
			return 'void'
		case TypeKind.TypeAlias:
			return info.name
		default:
			return unreachable(info, 'type kind')
	}
}
