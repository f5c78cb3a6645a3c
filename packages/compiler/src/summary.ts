/**
 * Per-declaration summaries of an elaborated compilation unit.
 */

import { getNetDataType } from './check/net-types.ts'
import { type SymbolInfo, SymbolKind } from './check/stores.ts'
import type { CompilationContext } from './core/context.ts'
import { unreachable } from './core/errors.ts'
import { type TypeJson, typeToJson } from './types/json.ts'
import type { TypeId } from './types/types.ts'
import { constantToString } from './types/values.ts'

export type DeclarationKind =
	| 'typedef'
	| 'forward typedef'
	| 'nettype'
	| 'parameter'
	| 'variable'
	| 'net'
	| 'function'
	| 'enum value'

export interface DeclarationSummary {
	readonly name: string
	readonly kind: DeclarationKind
	readonly line: number
	readonly column: number
	/** Null for forward typedefs, which have no type of their own */
	readonly type: TypeJson | null
	readonly value?: string
}

function describe(context: CompilationContext, symbol: SymbolInfo): {
	kind: DeclarationKind
	typeId: TypeId | null
	value?: string
} {
	switch (symbol.kind) {
		case SymbolKind.TypeAlias:
			return { kind: 'typedef', typeId: context.types.getCanonical(symbol.typeId) }
		case SymbolKind.ForwardTypedef:
			return { kind: 'forward typedef', typeId: null }
		case SymbolKind.NetType:
			return { kind: 'nettype', typeId: getNetDataType(context, symbol.netTypeId) }
		case SymbolKind.Parameter: {
			const { typeId, value } = symbol.resolved.get()
			return { kind: 'parameter', typeId, ...(value ? { value: constantToString(value) } : {}) }
		}
		case SymbolKind.Variable:
			return { kind: 'variable', typeId: symbol.typeId.get() }
		case SymbolKind.Net:
			return { kind: 'net', typeId: symbol.typeId.get() }
		case SymbolKind.Subroutine:
			return { kind: 'function', typeId: symbol.returnType.get() }
		case SymbolKind.EnumValue:
			return {
				kind: 'enum value',
				typeId: symbol.typeId,
				...(symbol.value ? { value: symbol.value.toString() } : {}),
			}
		default:
			return unreachable(symbol, 'symbol kind')
	}
}

/**
 * Summaries of the compilation unit's declarations in declaration order.
 * Enum members follow the declaration that introduced them.
 */
export function summarizeDeclarations(context: CompilationContext): DeclarationSummary[] {
	const symbols = [...context.symbols]
		.map(([, symbol]) => symbol)
		.filter((symbol) => symbol.scope === context.rootScope)
		.sort((a, b) => a.index - b.index)

	return symbols.map((symbol) => {
		const { kind, typeId, value } = describe(context, symbol)
		return {
			column: symbol.location.column,
			kind,
			line: symbol.location.line,
			name: symbol.name,
			type: typeId === null ? null : typeToJson(context.types, typeId),
			...(value !== undefined ? { value } : {}),
		}
	})
}

/**
 * One line per declaration: `name: type (width N, signed, 4-state)`, with
 * ` = value` for parameters and enum members.
 */
export function formatDeclaration(summary: DeclarationSummary): string {
	if (summary.type === null) return `${summary.name}: forward typedef`

	const traits = [`width ${summary.type.bitWidth}`]
	if (summary.type.signed) traits.push('signed')
	if (summary.type.fourState) traits.push('4-state')
	const value = summary.value === undefined ? '' : ` = ${summary.value}`
	return `${summary.name}: ${summary.type.text} (${traits.join(', ')})${value}`
}
