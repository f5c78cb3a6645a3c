/**
 * CLI diagnostic definitions.
 *
 * Error code format: SVCLI<NUMBER>
 */

import { type DiagnosticDef, DiagnosticSeverity } from './types.ts'

export const SVCLI001: DiagnosticDef = {
	code: 'SVCLI001',
	description: "There's no file at this path.",
	message: 'file not found: {path}',
	name: 'FileNotFound',
	severity: DiagnosticSeverity.Error,
	suggestion: 'Double-check the path and make sure the file exists.',
}

export const SVCLI002: DiagnosticDef = {
	code: 'SVCLI002',
	description: "The file exists but can't be opened.",
	message: 'cannot read file: {reason}',
	name: 'FileNotReadable',
	severity: DiagnosticSeverity.Error,
	suggestion: 'Check that you have read permission for this file.',
}

export const SVCLI003: DiagnosticDef = {
	code: 'SVCLI003',
	description: 'Elaboration hit a state that should be impossible. This is a bug in svtype.',
	message: 'internal error: {reason}',
	name: 'InternalError',
	severity: DiagnosticSeverity.Error,
	suggestion: 'Please report this together with the input file.',
}

export const CLI_DIAGNOSTICS = {
	SVCLI001,
	SVCLI002,
	SVCLI003,
} as const

export type CliDiagnosticCode = keyof typeof CLI_DIAGNOSTICS
