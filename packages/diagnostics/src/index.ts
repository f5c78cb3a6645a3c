/**
 * @svtype/diagnostics
 *
 * Shared diagnostic types and definitions for svtype packages.
 */

export { CLI_DIAGNOSTICS, type CliDiagnosticCode, SVCLI001, SVCLI002, SVCLI003 } from './cli.ts'
export {
	COMPILER_DIAGNOSTICS,
	type CompilerDiagnosticCode,
	SVPARSE001,
	SVTIME001,
	SVTIME002,
	SVTIME003,
	SVTIME004,
	SVTIME005,
	SVTYPE001,
	SVTYPE002,
	SVTYPE003,
	SVTYPE004,
	SVTYPE005,
	SVTYPE006,
	SVTYPE007,
	SVTYPE008,
	SVTYPE009,
	SVTYPE010,
	SVTYPE011,
	SVTYPE012,
	SVTYPE013,
	SVTYPE014,
	SVTYPE015,
	SVTYPE016,
	SVTYPE017,
	SVTYPE018,
	SVTYPE019,
	SVTYPE020,
	SVTYPE021,
	SVTYPE022,
	SVTYPE050,
} from './compiler.ts'
export { formatHeader, interpolateMessage, severityLabel } from './format.ts'
export {
	type DiagnosticArgs,
	type DiagnosticCodeFormat,
	type DiagnosticDef,
	type DiagnosticFamily,
	DiagnosticSeverity,
} from './types.ts'

import { CLI_DIAGNOSTICS } from './cli.ts'
import { COMPILER_DIAGNOSTICS } from './compiler.ts'
import type { DiagnosticDef } from './types.ts'

/**
 * All diagnostics from all packages.
 */
export const DIAGNOSTICS = {
	...COMPILER_DIAGNOSTICS,
	...CLI_DIAGNOSTICS,
} as const

/**
 * All valid diagnostic codes.
 */
export type DiagnosticCode = keyof typeof DIAGNOSTICS

/**
 * Get a diagnostic definition by code.
 */
export function getDiagnostic(code: DiagnosticCode): DiagnosticDef {
	return DIAGNOSTICS[code]
}

/**
 * Check if a code is a valid diagnostic code.
 */
export function isValidDiagnosticCode(code: string): code is DiagnosticCode {
	return code in DIAGNOSTICS
}

/**
 * Find a diagnostic definition by its symbolic name (e.g. `InvalidEnumBase`).
 */
export function findDiagnosticByName(name: string): DiagnosticDef | undefined {
	return Object.values(DIAGNOSTICS).find((def) => def.name === name)
}
