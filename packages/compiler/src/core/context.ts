/**
 * Unified compilation context that flows through all phases.
 * Owns every arena (types, net types, scopes, symbols) and diagnostic collection.
 */

import { ScopeStore, type ScopeId, SymbolStore } from '../check/stores.ts'
import { NetTypeStore } from '../types/nets.ts'
import { TypeStore } from '../types/store.ts'
import {
	type DiagnosticArgs,
	type DiagnosticCode,
	type DiagnosticDef,
	DiagnosticSeverity,
	formatHeader,
	getDiagnostic,
	interpolateMessage,
	severityLabel,
} from './diagnostics.ts'

export { DiagnosticSeverity } from './diagnostics.ts'

/**
 * A position in the source text. Line and column are 1-indexed.
 */
export interface SourceLocation {
	readonly line: number
	readonly column: number
	/** Character offset from the start of the source */
	readonly offset: number
}

/**
 * A diagnostic message with location information.
 */
export interface Diagnostic {
	/** The diagnostic definition from the catalog */
	readonly def: DiagnosticDef
	/** Interpolated message with arguments applied */
	readonly message: string
	/** Line number (1-indexed) */
	readonly line: number
	/** Column number (1-indexed) */
	readonly column: number
	/** Template arguments used for message interpolation */
	readonly args?: DiagnosticArgs
	/** Notes attached after the diagnostic was emitted */
	readonly notes: Diagnostic[]
}

/**
 * The unified compilation context.
 * Passed through all elaboration phases.
 *
 * Design principles:
 * - Append-only: phases add to stores, never mutate previous entries
 * - Centralized diagnostics: all errors collected in one place
 * - No ownership games: stores are plain arrays with integer IDs
 */
export class CompilationContext {
	/** Original source code */
	readonly source: string

	/** Source filename for error messages */
	readonly filename: string

	/** Type arena and uniquification cache */
	readonly types: TypeStore

	/** Net type arena, bootstrapped with the built-in net kinds */
	readonly netTypes: NetTypeStore

	/** Scope storage */
	readonly scopes: ScopeStore

	/** Symbol storage for declarations */
	readonly symbols: SymbolStore

	/** The compilation-unit scope every top-level declaration lives in */
	readonly rootScope: ScopeId

	/** Collected diagnostics */
	private readonly diagnostics: Diagnostic[] = []

	/** Track if any errors have been reported */
	private errorCount = 0

	constructor(source: string, filename = '<input>') {
		this.source = source
		this.filename = filename
		this.types = new TypeStore()
		this.netTypes = new NetTypeStore()
		this.scopes = new ScopeStore()
		this.symbols = new SymbolStore()
		this.rootScope = this.scopes.createRootScope()
	}

	// ===========================================================================
	// EMIT
	// ===========================================================================

	/**
	 * Emit a diagnostic by code at a source location.
	 * Returns the record so that notes can be attached to it.
	 */
	emit(code: DiagnosticCode, location: SourceLocation, args?: DiagnosticArgs): Diagnostic {
		const diagnostic = this.createDiagnostic(code, location, args)
		this.diagnostics.push(diagnostic)
		if (diagnostic.def.severity === DiagnosticSeverity.Error) {
			this.errorCount++
		}
		return diagnostic
	}

	/**
	 * Attach a note to a previously emitted diagnostic.
	 */
	addNote(
		parent: Diagnostic,
		code: DiagnosticCode,
		location: SourceLocation,
		args?: DiagnosticArgs
	): void {
		parent.notes.push(this.createDiagnostic(code, location, args))
	}

	private createDiagnostic(
		code: DiagnosticCode,
		location: SourceLocation,
		args?: DiagnosticArgs
	): Diagnostic {
		const def = getDiagnostic(code)
		return {
			column: location.column,
			def,
			line: location.line,
			message: interpolateMessage(def.message, args),
			notes: [],
			...(args ? { args } : {}),
		}
	}

	// ===========================================================================
	// QUERY METHODS
	// ===========================================================================

	hasErrors(): boolean {
		return this.errorCount > 0
	}

	getErrorCount(): number {
		return this.errorCount
	}

	getDiagnostics(): readonly Diagnostic[] {
		return this.diagnostics
	}

	getErrors(): Diagnostic[] {
		return this.diagnostics.filter((d) => d.def.severity === DiagnosticSeverity.Error)
	}

	getSourceLine(line: number): string | undefined {
		const lines = this.source.split('\n')
		return lines[line - 1]
	}

	// ===========================================================================
	// FORMATTING
	// ===========================================================================

	private buildSourceContext(
		diagnostic: Diagnostic,
		sourceLine: string
	): { emptyPrefix: string; lines: string[] } {
		const lineNumWidth = String(diagnostic.line).length
		const pad = ' '.repeat(lineNumWidth)
		const linePrefix = ` ${diagnostic.line} | `
		const emptyPrefix = ` ${pad} | `
		const pointer = `${' '.repeat(diagnostic.column - 1)}^`

		return {
			emptyPrefix,
			lines: [emptyPrefix, `${linePrefix}${sourceLine}`, `${emptyPrefix}${pointer}`],
		}
	}

	/**
	 * Format a diagnostic for display (Rust-style output).
	 *
	 * Example:
	 * ```
	 * error[SVTYPE003]: invalid enum base type 'real'
	 *   --> top.sv:1:14
	 *    |
	 *  1 | typedef enum real { A } e_t;
	 *    |              ^
	 *    |
	 *    = help: Use a base like `int`, `byte` or `logic [7:0]`.
	 * ```
	 */
	formatDiagnostic(diagnostic: Diagnostic): string {
		const { def } = diagnostic
		const header = formatHeader(def, diagnostic.args)
		const location = `  --> ${this.filename}:${diagnostic.line}:${diagnostic.column}`

		const lines = [header, location]
		const sourceLine = this.getSourceLine(diagnostic.line)
		if (sourceLine !== undefined) {
			const { emptyPrefix, lines: contextLines } = this.buildSourceContext(diagnostic, sourceLine)
			lines.push(...contextLines)
			if (def.suggestion) {
				const suggestion = interpolateMessage(def.suggestion, diagnostic.args)
				lines.push(emptyPrefix, `   = help: ${suggestion}`)
			}
		}

		for (const note of diagnostic.notes) {
			lines.push(
				`${severityLabel(note.def.severity)}: ${note.message}`,
				`  --> ${this.filename}:${note.line}:${note.column}`
			)
		}

		return lines.join('\n')
	}

	formatAllDiagnostics(): string {
		return this.diagnostics.map((d) => this.formatDiagnostic(d)).join('\n\n')
	}
}
