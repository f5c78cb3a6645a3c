import {
	type DeclarationSummary,
	type ElaborationResult,
	formatDeclaration,
	summarizeDeclarations,
} from '@svtype/compiler'
import { formatHeader, SVCLI001, SVCLI002, SVCLI003 } from '@svtype/diagnostics'

export function isNodeError(error: unknown): error is NodeJS.ErrnoException {
	return error instanceof Error && 'code' in error
}

export function getErrorMessage(error: unknown): string {
	return error instanceof Error ? error.message : String(error)
}

export function formatReadError(filePath: string, error: unknown): string {
	if (isNodeError(error) && error.code === 'ENOENT') {
		return formatHeader(SVCLI001, { path: filePath })
	}
	return formatHeader(SVCLI002, { reason: getErrorMessage(error) })
}

/**
 * Anything thrown out of elaboration is a defect: user mistakes are diagnostics.
 */
export function formatInternalError(error: unknown): string {
	return formatHeader(SVCLI003, { reason: getErrorMessage(error) })
}

export function renderDeclarations(summaries: readonly DeclarationSummary[], json: boolean): string {
	if (json) return JSON.stringify(summaries, null, 2)
	return summaries.map(formatDeclaration).join('\n')
}

/**
 * The text `svtype check` prints for one elaborated file: declarations,
 * then diagnostics separated by a blank line.
 */
export function renderReport(result: ElaborationResult, json: boolean): string {
	const sections: string[] = []
	const summaries = summarizeDeclarations(result.context)
	if (json || summaries.length > 0) sections.push(renderDeclarations(summaries, json))
	if (result.context.getDiagnostics().length > 0) {
		sections.push(result.context.formatAllDiagnostics())
	}
	return sections.join('\n\n')
}
