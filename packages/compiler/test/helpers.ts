import { getNetDataType } from '../src/check/net-types.ts'
import { type SymbolInfo, SymbolKind } from '../src/check/stores.ts'
import { InternalCompilerError } from '../src/core/errors.ts'
import { type ElaborationResult, elaborate } from '../src/index.ts'
import { typeToString } from '../src/types/printer.ts'
import type { TypeId } from '../src/types/types.ts'

export function run(source: string): ElaborationResult {
	return elaborate(source, { filename: 'test.sv' })
}

/** Diagnostic codes in the order they were reported */
export function codes(result: ElaborationResult): string[] {
	return result.context.getDiagnostics().map((d) => d.def.code)
}

/**
 * The last declaration of `name` in the compilation unit.
 */
export function symbol(result: ElaborationResult, name: string): SymbolInfo {
	const { context } = result
	const ids = context.scopes.get(context.rootScope).names.get(name) ?? []
	const id = ids[ids.length - 1]
	if (id === undefined) throw new InternalCompilerError(`no symbol '${name}'`)
	return context.symbols.get(id)
}

/**
 * The type a declaration gives its name. Typedefs give their alias.
 */
export function typeOf(result: ElaborationResult, name: string): TypeId {
	const info = symbol(result, name)
	switch (info.kind) {
		case SymbolKind.TypeAlias:
			return info.typeId
		case SymbolKind.Parameter:
			return info.resolved.get().typeId
		case SymbolKind.Variable:
		case SymbolKind.Net:
			return info.typeId.get()
		case SymbolKind.EnumValue:
			return info.typeId
		case SymbolKind.Subroutine:
			return info.returnType.get()
		case SymbolKind.NetType:
			return getNetDataType(result.context, info.netTypeId)
		case SymbolKind.ForwardTypedef:
			throw new InternalCompilerError(`'${name}' has no type`)
	}
}

/** Printed canonical type of `name` */
export function textOf(result: ElaborationResult, name: string): string {
	const { types } = result.context
	return typeToString(types, types.getCanonical(typeOf(result, name)))
}
