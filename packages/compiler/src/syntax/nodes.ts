/**
 * Syntax tree for the declaration subset.
 *
 * Every node is a plain immutable object tagged by `kind`. Nodes are compared
 * by identity when two types must be checked for a shared declaration.
 */

import type { SourceLocation } from '../core/context.ts'

export type Signing = 'signed' | 'unsigned'

// =============================================================================
// EXPRESSIONS
// =============================================================================

export type UnaryOperator = '+' | '-' | '~'

export type BinaryOperator = '*' | '/' | '%' | '+' | '-' | '<<' | '>>' | '&' | '^' | '|'

export interface IntegerLiteralSyntax {
	readonly kind: 'IntegerLiteral'
	readonly text: string
	readonly loc: SourceLocation
}

/**
 * A sized or unsized literal with an explicit base, e.g. `8'hff` or `'b1x`.
 */
export interface BasedLiteralSyntax {
	readonly kind: 'BasedLiteral'
	readonly size: number | null
	readonly signed: boolean
	readonly base: 'b' | 'o' | 'd' | 'h'
	/** Digits with underscores removed, lower-cased */
	readonly digits: string
	readonly text: string
	readonly loc: SourceLocation
}

export interface RealLiteralSyntax {
	readonly kind: 'RealLiteral'
	readonly value: number
	readonly text: string
	readonly loc: SourceLocation
}

export interface StringLiteralSyntax {
	readonly kind: 'StringLiteral'
	readonly value: string
	readonly loc: SourceLocation
}

export interface IdentifierSyntax {
	readonly kind: 'Identifier'
	readonly name: string
	readonly loc: SourceLocation
}

export interface UnaryExpressionSyntax {
	readonly kind: 'UnaryExpression'
	readonly op: UnaryOperator
	readonly operand: ExpressionSyntax
	readonly loc: SourceLocation
}

export interface BinaryExpressionSyntax {
	readonly kind: 'BinaryExpression'
	readonly op: BinaryOperator
	readonly left: ExpressionSyntax
	readonly right: ExpressionSyntax
	readonly loc: SourceLocation
}

export type ExpressionSyntax =
	| IntegerLiteralSyntax
	| BasedLiteralSyntax
	| RealLiteralSyntax
	| StringLiteralSyntax
	| IdentifierSyntax
	| UnaryExpressionSyntax
	| BinaryExpressionSyntax

// =============================================================================
// DIMENSIONS
// =============================================================================

/** `[left:right]` */
export interface RangeDimensionSyntax {
	readonly kind: 'RangeDimension'
	readonly left: ExpressionSyntax
	readonly right: ExpressionSyntax
	readonly loc: SourceLocation
}

/** `[size]`, shorthand for `[0:size-1]` on unpacked dimensions */
export interface SizeDimensionSyntax {
	readonly kind: 'SizeDimension'
	readonly size: ExpressionSyntax
	readonly loc: SourceLocation
}

export type DimensionSyntax = RangeDimensionSyntax | SizeDimensionSyntax

// =============================================================================
// DATA TYPES
// =============================================================================

export type IntegerVectorKeyword = 'bit' | 'logic' | 'reg'

export type IntegerAtomKeyword = 'byte' | 'shortint' | 'int' | 'longint' | 'integer' | 'time'

export type NonIntegerKeyword = 'real' | 'realtime' | 'shortreal'

export type SimpleTypeKeyword = 'string' | 'chandle' | 'event' | 'void'

export interface IntegerVectorTypeSyntax {
	readonly kind: 'IntegerVectorType'
	readonly keyword: IntegerVectorKeyword
	readonly signing: Signing | null
	readonly packedDims: readonly DimensionSyntax[]
	readonly loc: SourceLocation
}

export interface IntegerAtomTypeSyntax {
	readonly kind: 'IntegerAtomType'
	readonly keyword: IntegerAtomKeyword
	readonly signing: Signing | null
	/** Never valid; kept so the error can be reported */
	readonly packedDims: readonly DimensionSyntax[]
	readonly loc: SourceLocation
}

export interface NonIntegerTypeSyntax {
	readonly kind: 'NonIntegerType'
	readonly keyword: NonIntegerKeyword
	readonly loc: SourceLocation
}

export interface SimpleTypeSyntax {
	readonly kind: 'SimpleType'
	readonly keyword: SimpleTypeKeyword
	readonly loc: SourceLocation
}

export interface EnumMemberSyntax {
	readonly name: string
	readonly initializer: ExpressionSyntax | null
	readonly loc: SourceLocation
}

export interface EnumTypeSyntax {
	readonly kind: 'EnumType'
	readonly baseType: DataTypeSyntax | null
	readonly members: readonly EnumMemberSyntax[]
	readonly packedDims: readonly DimensionSyntax[]
	readonly loc: SourceLocation
}

/**
 * One name introduced by a declaration, with its unpacked dimensions and
 * optional initializer: `a [3] = 0`.
 */
export interface DeclaratorSyntax {
	readonly name: string
	readonly dims: readonly DimensionSyntax[]
	readonly initializer: ExpressionSyntax | null
	readonly loc: SourceLocation
}

export interface StructMemberSyntax {
	readonly type: DataTypeSyntax
	readonly declarators: readonly DeclaratorSyntax[]
	readonly loc: SourceLocation
}

export interface StructTypeSyntax {
	readonly kind: 'StructType'
	readonly packed: boolean
	readonly signing: Signing | null
	readonly members: readonly StructMemberSyntax[]
	readonly packedDims: readonly DimensionSyntax[]
	readonly loc: SourceLocation
}

export interface NamedTypeSyntax {
	readonly kind: 'NamedType'
	readonly name: string
	readonly packedDims: readonly DimensionSyntax[]
	readonly loc: SourceLocation
}

/** A type written only as signing and/or packed dimensions, or not at all */
export interface ImplicitTypeSyntax {
	readonly kind: 'ImplicitType'
	readonly signing: Signing | null
	readonly packedDims: readonly DimensionSyntax[]
	readonly loc: SourceLocation
}

export type DataTypeSyntax =
	| IntegerVectorTypeSyntax
	| IntegerAtomTypeSyntax
	| NonIntegerTypeSyntax
	| SimpleTypeSyntax
	| EnumTypeSyntax
	| StructTypeSyntax
	| NamedTypeSyntax
	| ImplicitTypeSyntax

// =============================================================================
// TIMING CONTROLS
// =============================================================================

export type EdgeKind = 'none' | 'posedge' | 'negedge' | 'edge'

export interface SignalEventExpressionSyntax {
	readonly kind: 'SignalEventExpression'
	readonly edge: EdgeKind
	readonly expr: ExpressionSyntax
	readonly loc: SourceLocation
}

/** `a or b`, also written `a, b` */
export interface OrEventExpressionSyntax {
	readonly kind: 'OrEventExpression'
	readonly left: EventExpressionSyntax
	readonly right: EventExpressionSyntax
	readonly loc: SourceLocation
}

export type EventExpressionSyntax = SignalEventExpressionSyntax | OrEventExpressionSyntax

/** `#expr` */
export interface DelayControlSyntax {
	readonly kind: 'DelayControl'
	readonly expr: ExpressionSyntax
	readonly loc: SourceLocation
}

/** `##expr` */
export interface CycleDelaySyntax {
	readonly kind: 'CycleDelay'
	readonly expr: ExpressionSyntax
	readonly loc: SourceLocation
}

/** `@name` */
export interface EventControlSyntax {
	readonly kind: 'EventControl'
	readonly name: IdentifierSyntax
	readonly loc: SourceLocation
}

/** `@(event_expression)` */
export interface EventControlWithExpressionSyntax {
	readonly kind: 'EventControlWithExpression'
	readonly expr: EventExpressionSyntax
	readonly loc: SourceLocation
}

/** `@*` or `@(*)` */
export interface ImplicitEventControlSyntax {
	readonly kind: 'ImplicitEventControl'
	readonly loc: SourceLocation
}

export type TimingControlSyntax =
	| DelayControlSyntax
	| CycleDelaySyntax
	| EventControlSyntax
	| EventControlWithExpressionSyntax
	| ImplicitEventControlSyntax

// =============================================================================
// DECLARATIONS
// =============================================================================

export type ForwardTypedefCategory = 'enum' | 'struct' | 'union' | 'class' | 'interface class'

export interface TypedefDeclarationSyntax {
	readonly kind: 'TypedefDeclaration'
	readonly type: DataTypeSyntax
	readonly name: string
	readonly dims: readonly DimensionSyntax[]
	readonly nameLoc: SourceLocation
	readonly loc: SourceLocation
}

export interface ForwardTypedefDeclarationSyntax {
	readonly kind: 'ForwardTypedefDeclaration'
	readonly category: ForwardTypedefCategory | null
	readonly name: string
	readonly nameLoc: SourceLocation
	readonly loc: SourceLocation
}

export interface NetTypeDeclarationSyntax {
	readonly kind: 'NetTypeDeclaration'
	readonly type: DataTypeSyntax
	readonly name: string
	readonly withFunction: IdentifierSyntax | null
	readonly nameLoc: SourceLocation
	readonly loc: SourceLocation
}

export interface ParameterDeclarationSyntax {
	readonly kind: 'ParameterDeclaration'
	readonly keyword: 'parameter' | 'localparam'
	readonly type: DataTypeSyntax
	readonly declarators: readonly DeclaratorSyntax[]
	readonly loc: SourceLocation
}

export interface DataDeclarationSyntax {
	readonly kind: 'DataDeclaration'
	readonly type: DataTypeSyntax
	readonly declarators: readonly DeclaratorSyntax[]
	readonly loc: SourceLocation
}

export type NetKindKeyword =
	| 'wire'
	| 'uwire'
	| 'tri'
	| 'tri0'
	| 'tri1'
	| 'triand'
	| 'trior'
	| 'trireg'
	| 'wand'
	| 'wor'
	| 'supply0'
	| 'supply1'

export interface NetDeclarationSyntax {
	readonly kind: 'NetDeclaration'
	readonly netKind: NetKindKeyword
	readonly type: DataTypeSyntax
	readonly declarators: readonly DeclaratorSyntax[]
	readonly loc: SourceLocation
}

export interface FunctionDeclarationSyntax {
	readonly kind: 'FunctionDeclaration'
	readonly returnType: DataTypeSyntax
	readonly name: string
	readonly nameLoc: SourceLocation
	readonly loc: SourceLocation
}

export interface AlwaysBlockSyntax {
	readonly kind: 'AlwaysBlock'
	readonly timing: TimingControlSyntax
	readonly loc: SourceLocation
}

export type MemberSyntax =
	| TypedefDeclarationSyntax
	| ForwardTypedefDeclarationSyntax
	| NetTypeDeclarationSyntax
	| ParameterDeclarationSyntax
	| DataDeclarationSyntax
	| NetDeclarationSyntax
	| FunctionDeclarationSyntax
	| AlwaysBlockSyntax

export interface SourceFileSyntax {
	readonly kind: 'SourceFile'
	readonly members: readonly MemberSyntax[]
}

/**
 * Any node a type can point back at as its originating declaration.
 */
export type TypeOriginSyntax = DataTypeSyntax | DimensionSyntax | TypedefDeclarationSyntax
