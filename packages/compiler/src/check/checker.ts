/**
 * Check phase: elaboration after the declaration pass.
 *
 * Performs:
 * - Forcing every lazy type, parameter value and net type in declaration order
 * - Forward typedef validation
 * - Initializer compatibility checks
 * - Timing control binding for `always` blocks
 */

import type { CompilationContext } from '../core/context.ts'
import { unreachable } from '../core/errors.ts'
import type { ExpressionSyntax, SourceFileSyntax } from '../syntax/nodes.ts'
import { isAssignmentCompatible } from '../types/compatibility.ts'
import { typeToString } from '../types/printer.ts'
import { isError } from '../types/queries.ts'
import type { TypeId } from '../types/types.ts'
import { checkForwardDecls } from './aliases.ts'
import { declareMembers } from './declarations.ts'
import { bindExpression } from './expressions.ts'
import { findTypedefFor } from './lookup.ts'
import { type SymbolInfo, SymbolKind } from './stores.ts'
import { bindTimingControl, type TimingControl } from './timing.ts'

/**
 * Result of the check phase.
 */
export interface CheckResult {
	readonly succeeded: boolean
	/** One entry per `always` block, in source order */
	readonly timing: readonly TimingControl[]
}

function checkInitializer(
	context: CompilationContext,
	symbol: SymbolInfo,
	typeId: TypeId,
	initializer: ExpressionSyntax
): void {
	const { types } = context
	const bound = bindExpression(context, initializer, { index: symbol.index, scope: symbol.scope })
	if (bound.bad || isError(types, typeId)) return
	if (!isAssignmentCompatible(types, typeId, bound.typeId)) {
		context.emit('SVTYPE020', initializer.loc, {
			left: typeToString(types, typeId),
			name: symbol.name,
			right: typeToString(types, bound.typeId),
		})
	}
}

function elaborateSymbol(context: CompilationContext, symbol: SymbolInfo): void {
	switch (symbol.kind) {
		case SymbolKind.TypeAlias:
			context.types.getCanonical(symbol.typeId)
			checkForwardDecls(context, symbol.typeId)
			break
		case SymbolKind.ForwardTypedef:
			if (findTypedefFor(context, symbol) === null) {
				context.emit('SVTYPE015', symbol.location, { name: symbol.name })
			}
			break
		case SymbolKind.NetType:
			context.netTypes.get(symbol.netTypeId).resolution.get()
			break
		case SymbolKind.Parameter:
			symbol.resolved.get()
			break
		case SymbolKind.Variable:
		case SymbolKind.Net: {
			const typeId = symbol.typeId.get()
			if (symbol.initializer) checkInitializer(context, symbol, typeId, symbol.initializer)
			break
		}
		case SymbolKind.Subroutine:
			symbol.returnType.get()
			break
		case SymbolKind.EnumValue:
			break
		default:
			unreachable(symbol, 'symbol kind')
	}
}

/**
 * Declares and elaborates every member of `file` in the compilation unit.
 */
export function check(context: CompilationContext, file: SourceFileSyntax): CheckResult {
	const processes = declareMembers(context, file, context.rootScope)

	// Symbols added while elaborating, such as enum members, are visited too
	for (const [, symbol] of context.symbols) {
		elaborateSymbol(context, symbol)
	}

	const timing = processes.map((process) => bindTimingControl(context, process.syntax.timing, process.location))
	return { succeeded: !context.hasErrors(), timing }
}
