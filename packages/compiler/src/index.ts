/**
 * svtype compiler public API
 *
 * Data-oriented architecture:
 * - Dense arrays with integer IDs (TypeStore, NetTypeStore, SymbolStore)
 * - Lazily resolved declarations, forced in declaration order
 * - Unified CompilationContext flowing through all phases
 */

import { type CheckResult, check } from './check/checker.ts'
import type { TimingControl } from './check/timing.ts'
import { CompilationContext } from './core/context.ts'
import { CompileError } from './core/errors.ts'
import type { SourceFileSyntax } from './syntax/nodes.ts'
import { parse } from './syntax/parser.ts'

export * from './check/index.ts'
export {
	CompilationContext,
	type Diagnostic,
	DiagnosticSeverity,
	type SourceLocation,
} from './core/context.ts'
export { CompileError, InternalCompilerError } from './core/errors.ts'
export type * from './syntax/nodes.ts'
export { LineTable, matchOnly, parse } from './syntax/parser.ts'
export {
	type DeclarationKind,
	type DeclarationSummary,
	formatDeclaration,
	summarizeDeclarations,
} from './summary.ts'
export {
	getIntegralFlags,
	isAssignmentCompatible,
	isCastCompatible,
	isEquivalent,
	isMatching,
} from './types/compatibility.ts'
export { getDefaultValue } from './types/defaults.ts'
export { type FieldJson, type TypeJson, typeKindName, typeToJson } from './types/json.ts'
export { Lazy, Memo } from './types/lazy.ts'
export {
	NetKind,
	type NetTypeId,
	type NetTypeInfo,
	type NetTypeResolution,
	NetTypeStore,
	netTypeId,
} from './types/nets.ts'
export { typeToString } from './types/printer.ts'
export * from './types/queries.ts'
export { type BuiltinKeyword, BuiltinTypeId, PREDEFINED_INTEGER_SHAPES, TypeStore } from './types/store.ts'
export {
	type ConstantRange,
	type EnumMember,
	type Field,
	FloatKind,
	IntegralFlags,
	type IntegralFlagSet,
	type IntegralType,
	PredefinedIntegerKind,
	rangesEqual,
	rangeWidth,
	ScalarKind,
	type TypeId,
	type TypeInfo,
	TypeKind,
	typeId,
} from './types/types.ts'
export { type ConstantValue, constantToString, SVInt } from './types/values.ts'

/**
 * Options for the elaborate function.
 */
export interface ElaborateOptions {
	/** Path to the source file (for error messages) */
	filename?: string
	/** Throw a CompileError carrying the formatted diagnostics when any error was reported */
	failOnError?: boolean
}

/**
 * Everything elaboration produced. The context owns the type, net type,
 * scope and symbol arenas as well as the diagnostics.
 */
export interface ElaborationResult {
	readonly context: CompilationContext
	/** Null when the source failed to parse */
	readonly syntax: SourceFileSyntax | null
	readonly timing: readonly TimingControl[]
	readonly succeeded: boolean
}

/**
 * Elaborate SystemVerilog declarations.
 *
 * Chains the phases:
 * 1. Parsing (source → syntax tree)
 * 2. Declaration (syntax → symbols with lazy types)
 * 3. Elaboration (forcing every declaration, timing controls)
 *
 * @throws {CompileError} If `failOnError` is set and errors were reported
 */
export function elaborate(source: string, options: ElaborateOptions = {}): ElaborationResult {
	const context = new CompilationContext(source, options.filename)

	const syntax = parse(context)
	let checkResult: CheckResult = { succeeded: false, timing: [] }
	if (syntax) checkResult = check(context, syntax)

	if (options.failOnError && context.hasErrors()) {
		throw new CompileError(context.formatAllDiagnostics())
	}

	return {
		context,
		succeeded: syntax !== null && checkResult.succeeded,
		syntax,
		timing: checkResult.timing,
	}
}
