/**
 * How serious a diagnostic is. Only errors fail elaboration.
 */
export const DiagnosticSeverity = {
	Error: 0,
	Note: 2,
	Warning: 1,
} as const

export type DiagnosticSeverity = (typeof DiagnosticSeverity)[keyof typeof DiagnosticSeverity]

/**
 * Phase prefix of a code: `SVPARSE` for the parser, `SVTYPE` for type
 * elaboration, `SVTIME` for timing controls and `SVCLI` for the command line.
 */
export type DiagnosticFamily = 'CLI' | 'PARSE' | 'TIME' | 'TYPE'

export type DiagnosticCodeFormat = `SV${DiagnosticFamily}${string}`

export interface DiagnosticDef {
	readonly code: DiagnosticCodeFormat
	/** Symbolic name, stable across code renumbering */
	readonly name: string
	readonly severity: DiagnosticSeverity
	/** Template with `{placeholder}` arguments */
	readonly message: string
	/** Longer explanation of when the diagnostic fires */
	readonly description: string
	/** Rendered as `= help:` under the source excerpt */
	readonly suggestion?: string
}

/**
 * Values substituted into a message template, keyed by placeholder.
 */
export type DiagnosticArgs = Readonly<Record<string, string | number>>
