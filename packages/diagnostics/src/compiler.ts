/**
 * Compiler diagnostic definitions.
 *
 * Error code format: SV<PHASE><NUMBER>
 * - SVPARSE: Parser errors (001-099)
 * - SVTYPE: Type elaboration errors (001-049), notes (050-099)
 * - SVTIME: Timing control errors (001-049)
 */

import { type DiagnosticDef, DiagnosticSeverity } from './types.ts'

// =============================================================================
// PARSER ERRORS (SVPARSE001-099)
// =============================================================================

export const SVPARSE001: DiagnosticDef = {
	code: 'SVPARSE001',
	description: "The parser couldn't understand this part of the source.",
	message: 'syntax error: {detail}',
	name: 'SyntaxError',
	severity: DiagnosticSeverity.Error,
	suggestion: 'Check for a missing semicolon, bracket or keyword.',
}

// =============================================================================
// TYPE ERRORS (SVTYPE001-049)
// =============================================================================

export const SVTYPE001: DiagnosticDef = {
	code: 'SVTYPE001',
	description:
		'Predefined integer types like `int` and `byte` already have a fixed width, so packed dimensions cannot be applied to them.',
	message: "packed dimensions not allowed on predefined integer type '{type}'",
	name: 'PackedDimsOnPredefinedType',
	severity: DiagnosticSeverity.Error,
	suggestion: 'Use `bit` or `logic` with a range instead, e.g. `bit signed [31:0]`.',
}

export const SVTYPE002: DiagnosticDef = {
	code: 'SVTYPE002',
	description: 'The name was found, but it refers to something other than a type.',
	message: "'{name}' is not a type",
	name: 'NotAType',
	severity: DiagnosticSeverity.Error,
}

export const SVTYPE003: DiagnosticDef = {
	code: 'SVTYPE003',
	description:
		'An enum base type must be an integer atom or a one-dimensional vector of bit, logic or reg.',
	message: "invalid enum base type '{type}'",
	name: 'InvalidEnumBase',
	severity: DiagnosticSeverity.Error,
	suggestion: 'Use a base like `int`, `byte` or `logic [7:0]`.',
}

export const SVTYPE004: DiagnosticDef = {
	code: 'SVTYPE004',
	description: 'Every member of a packed struct must itself be a packed (integral) type.',
	message: "packed struct member type '{type}' is not integral",
	name: 'PackedMemberNotIntegral',
	severity: DiagnosticSeverity.Error,
	suggestion: 'Make the member packed, or remove `packed` from the struct.',
}

export const SVTYPE005: DiagnosticDef = {
	code: 'SVTYPE005',
	description: 'Members of a packed struct cannot declare default values.',
	message: "packed struct member '{name}' cannot have an initializer",
	name: 'PackedMemberHasInitializer',
	severity: DiagnosticSeverity.Error,
	suggestion: 'Remove the initializer.',
}

export const SVTYPE006: DiagnosticDef = {
	code: 'SVTYPE006',
	description: 'A forward typedef promised one kind of type, but the real definition is another.',
	message: "forward typedef '{name}' declared as {category} does not match its definition",
	name: 'ForwardTypedefDoesNotMatch',
	severity: DiagnosticSeverity.Error,
	suggestion: 'Change the forward declaration to match the definition.',
}

export const SVTYPE007: DiagnosticDef = {
	code: 'SVTYPE007',
	description: 'Nothing with this name is declared before this point.',
	message: "use of undeclared identifier '{name}'",
	name: 'UndeclaredIdentifier',
	severity: DiagnosticSeverity.Error,
	suggestion: 'Declare the name before it is used.',
}

export const SVTYPE008: DiagnosticDef = {
	code: 'SVTYPE008',
	description: 'Dimensions and enum values must be known when the design is elaborated.',
	message: 'expression is not constant',
	name: 'ConstantExpressionRequired',
	severity: DiagnosticSeverity.Error,
	suggestion: 'Use literals, parameters or enum values here.',
}

export const SVTYPE009: DiagnosticDef = {
	code: 'SVTYPE009',
	description: 'Packed dimensions must be written as a full `[msb:lsb]` range.',
	message: 'packed dimension requires a range',
	name: 'PackedDimRequiresRange',
	severity: DiagnosticSeverity.Error,
	suggestion: 'Write `[{msb}:0]` instead of `[{size}]`.',
}

export const SVTYPE010: DiagnosticDef = {
	code: 'SVTYPE010',
	description: 'Only integral types can be used as the element of a packed array.',
	message: "packed array element type '{type}' is not integral",
	name: 'PackedArrayNotIntegral',
	severity: DiagnosticSeverity.Error,
}

export const SVTYPE011: DiagnosticDef = {
	code: 'SVTYPE011',
	description: 'Each name can be declared only once in a scope.',
	message: "redefinition of '{name}'",
	name: 'Redefinition',
	severity: DiagnosticSeverity.Error,
	suggestion: 'Rename one of the declarations.',
}

export const SVTYPE012: DiagnosticDef = {
	code: 'SVTYPE012',
	description: 'The `with` clause of a nettype must name a function.',
	message: "'{name}' is not a function",
	name: 'NotASubroutine',
	severity: DiagnosticSeverity.Error,
}

export const SVTYPE013: DiagnosticDef = {
	code: 'SVTYPE013',
	description: 'Enum values must be integers.',
	message: "enum value of type '{type}' is not integral",
	name: 'EnumValueNotIntegral',
	severity: DiagnosticSeverity.Error,
}

export const SVTYPE014: DiagnosticDef = {
	code: 'SVTYPE014',
	description: 'A type cannot be defined in terms of itself.',
	message: "'{name}' is defined recursively",
	name: 'RecursiveDefinition',
	severity: DiagnosticSeverity.Error,
}

export const SVTYPE015: DiagnosticDef = {
	code: 'SVTYPE015',
	description: 'A forward typedef was used, but the full typedef never appears in the same scope.',
	message: "forward typedef '{name}' is never defined",
	name: 'UnresolvedForwardTypedef',
	severity: DiagnosticSeverity.Error,
	suggestion: 'Add `typedef <type> {name};` to the same scope.',
}

export const SVTYPE016: DiagnosticDef = {
	code: 'SVTYPE016',
	description: 'An array dimension written as a size must have at least one element.',
	message: 'array dimension size {size} must be positive',
	name: 'InvalidDimensionSize',
	severity: DiagnosticSeverity.Error,
}

export const SVTYPE017: DiagnosticDef = {
	code: 'SVTYPE017',
	description: 'A type or net type name was used where a value is expected.',
	message: "'{name}' cannot be used as a value",
	name: 'NotAValue',
	severity: DiagnosticSeverity.Error,
}

export const SVTYPE018: DiagnosticDef = {
	code: 'SVTYPE018',
	description: 'Arithmetic and bitwise operators need numeric operands.',
	message: "invalid operands to '{op}': '{left}' and '{right}'",
	name: 'InvalidOperands',
	severity: DiagnosticSeverity.Error,
}

export const SVTYPE019: DiagnosticDef = {
	code: 'SVTYPE019',
	description: 'Unary arithmetic and bitwise operators need a numeric operand.',
	message: "invalid operand to unary '{op}': '{type}'",
	name: 'InvalidUnaryOperand',
	severity: DiagnosticSeverity.Error,
}

export const SVTYPE020: DiagnosticDef = {
	code: 'SVTYPE020',
	description: 'The initializer cannot be assigned to a value of the declared type.',
	message: "cannot initialize '{name}' of type '{left}' with a value of type '{right}'",
	name: 'InitializerTypeMismatch',
	severity: DiagnosticSeverity.Error,
	suggestion: 'Use a cast, or change the declared type.',
}

export const SVTYPE021: DiagnosticDef = {
	code: 'SVTYPE021',
	description:
		'A based literal needs a size of at least one bit, and every digit must belong to its base. A decimal literal is either all digits or a single x or z.',
	message: "invalid literal '{text}': {detail}",
	name: 'InvalidLiteral',
	severity: DiagnosticSeverity.Error,
}

export const SVTYPE022: DiagnosticDef = {
	code: 'SVTYPE022',
	description: 'Packed types and sized literals are limited to 16777215 bits.',
	message: 'packed width of {width} bits exceeds the maximum of {max}',
	name: 'PackedWidthTooLarge',
	severity: DiagnosticSeverity.Error,
}

// =============================================================================
// TYPE NOTES (SVTYPE050-099)
// =============================================================================

export const SVTYPE050: DiagnosticDef = {
	code: 'SVTYPE050',
	description: 'Points at the declaration a previous diagnostic refers to.',
	message: "'{name}' declared here",
	name: 'NoteDeclarationHere',
	severity: DiagnosticSeverity.Note,
}

// =============================================================================
// TIMING CONTROL ERRORS (SVTIME001-049)
// =============================================================================

export const SVTIME001: DiagnosticDef = {
	code: 'SVTIME001',
	description: 'A delay must be a number.',
	message: "delay expression of type '{type}' is not numeric",
	name: 'DelayNotNumeric',
	severity: DiagnosticSeverity.Error,
}

export const SVTIME002: DiagnosticDef = {
	code: 'SVTIME002',
	description: 'Unpacked arrays and structs cannot be waited on directly.',
	message: "invalid event expression of type '{type}'",
	name: 'InvalidEventExpression',
	severity: DiagnosticSeverity.Error,
}

export const SVTIME003: DiagnosticDef = {
	code: 'SVTIME003',
	description: 'Edges (`posedge`, `negedge`, `edge`) only exist on integral values.',
	message: 'edge event expression must be integral',
	name: 'InvalidEdgeEventExpression',
	severity: DiagnosticSeverity.Error,
}

export const SVTIME004: DiagnosticDef = {
	code: 'SVTIME004',
	description: 'A constant never changes, so waiting on it will never trigger.',
	message: 'event expression is constant',
	name: 'EventExpressionConstant',
	severity: DiagnosticSeverity.Warning,
	suggestion: 'Wait on a variable or net instead.',
}

export const SVTIME005: DiagnosticDef = {
	code: 'SVTIME005',
	description: 'This form of timing control is recognized but not elaborated yet.',
	message: '{construct} is not supported yet',
	name: 'TimingNotYetSupported',
	severity: DiagnosticSeverity.Error,
}

// =============================================================================
// CATALOG
// =============================================================================

/**
 * Central catalog of all compiler diagnostics.
 */
export const COMPILER_DIAGNOSTICS = {
	// Parser errors
	SVPARSE001,
	// Timing control errors
	SVTIME001,
	SVTIME002,
	SVTIME003,
	SVTIME004,
	SVTIME005,
	// Type errors
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
	// Type notes
	SVTYPE050,
} as const

/**
 * All valid compiler diagnostic codes.
 */
export type CompilerDiagnosticCode = keyof typeof COMPILER_DIAGNOSTICS
