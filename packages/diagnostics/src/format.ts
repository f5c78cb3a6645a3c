import { type DiagnosticArgs, type DiagnosticDef, DiagnosticSeverity } from './types.ts'

/**
 * Interpolate template arguments into a message.
 * Replaces {key} with the corresponding value from args; unknown keys are left in place.
 */
export function interpolateMessage(message: string, args?: DiagnosticArgs): string {
	if (!args) return message
	return message.replace(/\{(\w+)\}/g, (placeholder, key: string) => {
		const value = args[key]
		return value === undefined ? placeholder : String(value)
	})
}

const SEVERITY_LABELS: Record<DiagnosticSeverity, string> = {
	[DiagnosticSeverity.Error]: 'error',
	[DiagnosticSeverity.Warning]: 'warning',
	[DiagnosticSeverity.Note]: 'note',
}

export function severityLabel(severity: DiagnosticSeverity): string {
	return SEVERITY_LABELS[severity]
}

/**
 * First line of a rendered diagnostic, e.g. `error[SVTYPE003]: invalid enum base type 'real'`.
 */
export function formatHeader(def: DiagnosticDef, args?: DiagnosticArgs): string {
	return `${severityLabel(def.severity)}[${def.code}]: ${interpolateMessage(def.message, args)}`
}
