import type { Node } from 'ohm-js'
import type { CompilationContext, SourceLocation } from '../core/context.ts'
import { InternalCompilerError } from '../core/errors.ts'
import { SystemVerilogGrammar } from './grammar.ts'
import type {
	BinaryOperator,
	DataTypeSyntax,
	DeclaratorSyntax,
	DimensionSyntax,
	EdgeKind,
	EnumMemberSyntax,
	EventExpressionSyntax,
	ExpressionSyntax,
	ForwardTypedefCategory,
	IdentifierSyntax,
	IntegerAtomKeyword,
	IntegerVectorKeyword,
	MemberSyntax,
	NetKindKeyword,
	NonIntegerKeyword,
	Signing,
	SimpleTypeKeyword,
	SourceFileSyntax,
	StructMemberSyntax,
	TimingControlSyntax,
	UnaryOperator,
} from './nodes.ts'

const VECTOR_KEYWORDS: readonly IntegerVectorKeyword[] = ['bit', 'logic', 'reg']
const ATOM_KEYWORDS: readonly IntegerAtomKeyword[] = [
	'byte',
	'shortint',
	'int',
	'longint',
	'integer',
	'time',
]
const NON_INTEGER_KEYWORDS: readonly NonIntegerKeyword[] = ['real', 'realtime', 'shortreal']
const SIMPLE_KEYWORDS: readonly SimpleTypeKeyword[] = ['string', 'chandle', 'event', 'void']
const FORWARD_CATEGORIES: readonly ForwardTypedefCategory[] = ['enum', 'struct', 'union', 'class']
const NET_KINDS: readonly NetKindKeyword[] = [
	'wire',
	'uwire',
	'tri',
	'tri0',
	'tri1',
	'triand',
	'trior',
	'trireg',
	'wand',
	'wor',
	'supply0',
	'supply1',
]
const EDGES: readonly EdgeKind[] = ['posedge', 'negedge', 'edge']
const SIGNINGS: readonly Signing[] = ['signed', 'unsigned']
const BINARY_OPERATORS: readonly BinaryOperator[] = [
	'*',
	'/',
	'%',
	'+',
	'-',
	'<<',
	'>>',
	'&',
	'^',
	'|',
]
const UNARY_OPERATORS: readonly UnaryOperator[] = ['+', '-', '~']
const BASES = ['b', 'o', 'd', 'h'] as const

const STRING_ESCAPES: Readonly<Record<string, string>> = {
	'"': '"',
	'\\': '\\',
	n: '\n',
	t: '\t',
}

function oneOf<T extends string>(values: readonly T[], text: string): T {
	const found = values.find((v) => v === text)
	if (found === undefined) {
		throw new InternalCompilerError(`unexpected token '${text}'`)
	}
	return found
}

// =============================================================================
// LOCATIONS
// =============================================================================

/**
 * Maps character offsets to 1-indexed line/column pairs.
 */
export class LineTable {
	private readonly lineStarts: number[] = [0]

	constructor(source: string) {
		for (let i = 0; i < source.length; i++) {
			if (source.charCodeAt(i) === 10) this.lineStarts.push(i + 1)
		}
	}

	locate(offset: number): SourceLocation {
		let lo = 0
		let hi = this.lineStarts.length - 1
		while (lo < hi) {
			const mid = (lo + hi + 1) >> 1
			const start = this.lineStarts[mid] ?? 0
			if (start <= offset) lo = mid
			else hi = mid - 1
		}
		const lineStart = this.lineStarts[lo] ?? 0
		return { column: offset - lineStart + 1, line: lo + 1, offset }
	}

	at(line: number, column: number): SourceLocation {
		const lineStart = this.lineStarts[line - 1] ?? 0
		return { column, line, offset: lineStart + column - 1 }
	}
}

let cachedSource: string | null = null
let cachedTable: LineTable | null = null

function lineTableFor(source: string): LineTable {
	if (cachedTable === null || cachedSource !== source) {
		cachedSource = source
		cachedTable = new LineTable(source)
	}
	return cachedTable
}

function locationOf(node: Node): SourceLocation {
	return lineTableFor(node.source.sourceString).locate(node.source.startIdx)
}

// =============================================================================
// TYPED OPERATION WRAPPERS
// =============================================================================

function child(node: Node, index: number): Node {
	const result = node.children[index]
	if (result === undefined) {
		throw new InternalCompilerError(`missing child ${index} of ${node.ctorName}`)
	}
	return result
}

/** First child of an optional (`x?`) node, if present */
function optional(iter: Node): Node | undefined {
	return iter.children[0]
}

function listOf(list: Node): Node[] {
	return list.asIteration().children
}

function member(node: Node): MemberSyntax {
	return node['toMember']()
}

function dataType(node: Node): DataTypeSyntax {
	return node['toDataType']()
}

function dimension(node: Node): DimensionSyntax {
	return node['toDimension']()
}

function dimensions(iter: Node): DimensionSyntax[] {
	return iter.children.map(dimension)
}

function declarator(node: Node): DeclaratorSyntax {
	return node['toDeclarator']()
}

function expression(node: Node): ExpressionSyntax {
	return node['toExpression']()
}

function timing(node: Node): TimingControlSyntax {
	return node['toTiming']()
}

function eventExpression(node: Node): EventExpressionSyntax {
	return node['toEventExpression']()
}

function signing(iter: Node): Signing | null {
	const node = optional(iter)
	return node ? oneOf(SIGNINGS, node.sourceString) : null
}

/** Expression of an optional `= expr` initializer */
function initializer(iter: Node): ExpressionSyntax | null {
	const node = optional(iter)
	return node ? expression(child(node, 1)) : null
}

function identifier(node: Node): IdentifierSyntax {
	return { kind: 'Identifier', loc: locationOf(node), name: node.sourceString }
}

function binary(node: Node, left: Node, op: Node, right: Node): ExpressionSyntax {
	return {
		kind: 'BinaryExpression',
		left: expression(left),
		loc: locationOf(node),
		op: oneOf(BINARY_OPERATORS, op.sourceString),
		right: expression(right),
	}
}

function parseBasedLiteral(node: Node, size: Node, signedMarker: Node, base: Node, digits: Node) {
	const sizeNode = optional(size)
	return {
		base: oneOf(BASES, base.sourceString.toLowerCase()),
		digits: digits.sourceString.replaceAll('_', '').toLowerCase(),
		kind: 'BasedLiteral' as const,
		loc: locationOf(node),
		signed: optional(signedMarker) !== undefined,
		size: sizeNode ? Number(sizeNode.sourceString.replaceAll('_', '')) : null,
		text: node.sourceString,
	}
}

// =============================================================================
// SEMANTICS
// =============================================================================

const semantics = SystemVerilogGrammar.createSemantics()

semantics.addOperation<SourceFileSyntax>('toSourceFile', {
	SourceFile(members: Node) {
		return { kind: 'SourceFile', members: members.children.map(member) }
	},
})

semantics.addOperation<MemberSyntax>('toMember', {
	AlwaysBlock(_always: Node, control: Node, _semi: Node) {
		return { kind: 'AlwaysBlock', loc: locationOf(this), timing: timing(control) }
	},
	DataDeclaration(type: Node, list: Node, _semi: Node) {
		return {
			declarators: listOf(list).map(declarator),
			kind: 'DataDeclaration',
			loc: locationOf(this),
			type: dataType(type),
		}
	},
	ForwardTypedef(_typedef: Node, category: Node, name: Node, _semi: Node) {
		const categoryNode = optional(category)
		return {
			category: categoryNode ? categoryNode['toCategory']() : null,
			kind: 'ForwardTypedefDeclaration',
			loc: locationOf(this),
			name: name.sourceString,
			nameLoc: locationOf(name),
		}
	},
	FunctionDeclaration(_fn: Node, type: Node, name: Node, _semi: Node, _end: Node) {
		return {
			kind: 'FunctionDeclaration',
			loc: locationOf(this),
			name: name.sourceString,
			nameLoc: locationOf(name),
			returnType: dataType(type),
		}
	},
	NetDeclaration(netKind: Node, type: Node, list: Node, _semi: Node) {
		return {
			declarators: listOf(list).map(declarator),
			kind: 'NetDeclaration',
			loc: locationOf(this),
			netKind: oneOf(NET_KINDS, netKind.sourceString),
			type: dataType(type),
		}
	},
	NetTypeDeclaration(_nettype: Node, type: Node, name: Node, withFn: Node, _semi: Node) {
		const withNode = optional(withFn)
		return {
			kind: 'NetTypeDeclaration',
			loc: locationOf(this),
			name: name.sourceString,
			nameLoc: locationOf(name),
			type: dataType(type),
			withFunction: withNode ? identifier(child(withNode, 1)) : null,
		}
	},
	ParameterDeclaration(keyword: Node, type: Node, list: Node, _semi: Node) {
		return {
			declarators: listOf(list).map(declarator),
			keyword: keyword.sourceString === 'localparam' ? 'localparam' : 'parameter',
			kind: 'ParameterDeclaration',
			loc: locationOf(this),
			type: dataType(type),
		}
	},
	TypedefDeclaration(_typedef: Node, type: Node, name: Node, dims: Node, _semi: Node) {
		return {
			dims: dimensions(dims),
			kind: 'TypedefDeclaration',
			loc: locationOf(this),
			name: name.sourceString,
			nameLoc: locationOf(name),
			type: dataType(type),
		}
	},
})

semantics.addOperation<ForwardTypedefCategory>('toCategory', {
	ForwardCategory_interfaceClass(_interface: Node, _class: Node) {
		return 'interface class'
	},
	ForwardCategory_simple(keyword: Node) {
		return oneOf(FORWARD_CATEGORIES, keyword.sourceString)
	},
})

semantics.addOperation<DataTypeSyntax>('toDataType', {
	DataTypeOrImplicit_explicit(type: Node, _lookahead: Node) {
		return dataType(type)
	},
	EnumType(_enum: Node, base: Node, _open: Node, list: Node, _close: Node, dims: Node) {
		const baseNode = optional(base)
		return {
			baseType: baseNode ? dataType(baseNode) : null,
			kind: 'EnumType',
			loc: locationOf(this),
			members: listOf(list).map((m: Node): EnumMemberSyntax => m['toEnumMember']()),
			packedDims: dimensions(dims),
		}
	},
	ImplicitType(sign: Node, dims: Node) {
		return {
			kind: 'ImplicitType',
			loc: locationOf(this),
			packedDims: dimensions(dims),
			signing: signing(sign),
		}
	},
	IntegerAtomType(keyword: Node, sign: Node, dims: Node) {
		return {
			keyword: oneOf(ATOM_KEYWORDS, keyword.sourceString),
			kind: 'IntegerAtomType',
			loc: locationOf(this),
			packedDims: dimensions(dims),
			signing: signing(sign),
		}
	},
	IntegerVectorType(keyword: Node, sign: Node, dims: Node) {
		return {
			keyword: oneOf(VECTOR_KEYWORDS, keyword.sourceString),
			kind: 'IntegerVectorType',
			loc: locationOf(this),
			packedDims: dimensions(dims),
			signing: signing(sign),
		}
	},
	NamedType(name: Node, dims: Node) {
		return {
			kind: 'NamedType',
			loc: locationOf(this),
			name: name.sourceString,
			packedDims: dimensions(dims),
		}
	},
	NonIntegerType(keyword: Node) {
		return {
			keyword: oneOf(NON_INTEGER_KEYWORDS, keyword.sourceString),
			kind: 'NonIntegerType',
			loc: locationOf(this),
		}
	},
	SimpleType(keyword: Node) {
		return {
			keyword: oneOf(SIMPLE_KEYWORDS, keyword.sourceString),
			kind: 'SimpleType',
			loc: locationOf(this),
		}
	},
	StructType(_struct: Node, packing: Node, _open: Node, members: Node, _close: Node, dims: Node) {
		const packingNode = optional(packing)
		return {
			kind: 'StructType',
			loc: locationOf(this),
			members: members.children.map((m: Node): StructMemberSyntax => m['toStructMember']()),
			packed: packingNode !== undefined,
			packedDims: dimensions(dims),
			signing: packingNode ? signing(child(packingNode, 1)) : null,
		}
	},
})

semantics.addOperation<DimensionSyntax>('toDimension', {
	Dimension_range(_open: Node, left: Node, _colon: Node, right: Node, _close: Node) {
		return {
			kind: 'RangeDimension',
			left: expression(left),
			loc: locationOf(this),
			right: expression(right),
		}
	},
	Dimension_size(_open: Node, size: Node, _close: Node) {
		return { kind: 'SizeDimension', loc: locationOf(this), size: expression(size) }
	},
})

semantics.addOperation<DeclaratorSyntax>('toDeclarator', {
	Declarator(name: Node, dims: Node, init: Node) {
		return {
			dims: dimensions(dims),
			initializer: initializer(init),
			loc: locationOf(this),
			name: name.sourceString,
		}
	},
})

semantics.addOperation<EnumMemberSyntax>('toEnumMember', {
	EnumMember(name: Node, init: Node) {
		return { initializer: initializer(init), loc: locationOf(this), name: name.sourceString }
	},
})

semantics.addOperation<StructMemberSyntax>('toStructMember', {
	StructMember(type: Node, list: Node, _semi: Node) {
		return {
			declarators: listOf(list).map(declarator),
			loc: locationOf(this),
			type: dataType(type),
		}
	},
})

semantics.addOperation<ExpressionSyntax>('toExpression', {
	AddExpr_binary(left: Node, op: Node, right: Node) {
		return binary(this, left, op, right)
	},
	AndExpr_binary(left: Node, op: Node, right: Node) {
		return binary(this, left, op, right)
	},
	MulExpr_binary(left: Node, op: Node, right: Node) {
		return binary(this, left, op, right)
	},
	OrExpr_binary(left: Node, op: Node, right: Node) {
		return binary(this, left, op, right)
	},
	Primary_paren(_open: Node, inner: Node, _close: Node) {
		return expression(inner)
	},
	ShiftExpr_binary(left: Node, op: Node, right: Node) {
		return binary(this, left, op, right)
	},
	UnaryExpr_op(op: Node, operand: Node) {
		return {
			kind: 'UnaryExpression',
			loc: locationOf(this),
			op: oneOf(UNARY_OPERATORS, op.sourceString),
			operand: expression(operand),
		}
	},
	XorExpr_binary(left: Node, op: Node, right: Node) {
		return binary(this, left, op, right)
	},
	basedLiteral(size: Node, _tick: Node, signedMarker: Node, base: Node, digits: Node) {
		return parseBasedLiteral(this, size, signedMarker, base, digits)
	},
	decimalLiteral(_digits: Node) {
		return {
			kind: 'IntegerLiteral',
			loc: locationOf(this),
			text: this.sourceString.replaceAll('_', ''),
		}
	},
	identifier(_start: Node, _rest: Node) {
		return identifier(this)
	},
	realLiteral(_literal: Node) {
		const text = this.sourceString
		return {
			kind: 'RealLiteral',
			loc: locationOf(this),
			text,
			value: Number(text.replaceAll('_', '')),
		}
	},
	stringLiteral(_open: Node, _chars: Node, _close: Node) {
		const raw = this.sourceString.slice(1, -1)
		return {
			kind: 'StringLiteral',
			loc: locationOf(this),
			value: raw.replace(/\\(.)/g, (_match, c: string) => STRING_ESCAPES[c] ?? c),
		}
	},
})

semantics.addOperation<TimingControlSyntax>('toTiming', {
	TimingControl_cycle(_hashes: Node, expr: Node) {
		return { expr: expression(expr), kind: 'CycleDelay', loc: locationOf(this) }
	},
	TimingControl_delay(_hash: Node, expr: Node) {
		return { expr: expression(expr), kind: 'DelayControl', loc: locationOf(this) }
	},
	TimingControl_expression(_at: Node, _open: Node, event: Node, _close: Node) {
		return {
			expr: eventExpression(event),
			kind: 'EventControlWithExpression',
			loc: locationOf(this),
		}
	},
	TimingControl_implicitParen(_at: Node, _open: Node, _star: Node, _close: Node) {
		return { kind: 'ImplicitEventControl', loc: locationOf(this) }
	},
	TimingControl_implicitStar(_at: Node, _star: Node) {
		return { kind: 'ImplicitEventControl', loc: locationOf(this) }
	},
	TimingControl_name(_at: Node, name: Node) {
		return { kind: 'EventControl', loc: locationOf(this), name: identifier(name) }
	},
})

semantics.addOperation<EventExpressionSyntax>('toEventExpression', {
	EventExpression_comma(left: Node, _comma: Node, right: Node) {
		return {
			kind: 'OrEventExpression',
			left: eventExpression(left),
			loc: locationOf(this),
			right: eventExpression(right),
		}
	},
	EventExpression_or(left: Node, _or: Node, right: Node) {
		return {
			kind: 'OrEventExpression',
			left: eventExpression(left),
			loc: locationOf(this),
			right: eventExpression(right),
		}
	},
	EventTerm_edge(edge: Node, expr: Node) {
		return {
			edge: oneOf(EDGES, edge.sourceString),
			expr: expression(expr),
			kind: 'SignalEventExpression',
			loc: locationOf(this),
		}
	},
	EventTerm_paren(_open: Node, inner: Node, _close: Node) {
		return eventExpression(inner)
	},
	EventTerm_signal(expr: Node) {
		return {
			edge: 'none',
			expr: expression(expr),
			kind: 'SignalEventExpression',
			loc: locationOf(this),
		}
	},
})

// =============================================================================
// ENTRY POINTS
// =============================================================================

/**
 * Parses context.source into a syntax tree.
 * On failure reports SVPARSE001 at the furthest point the parser reached.
 */
export function parse(context: CompilationContext): SourceFileSyntax | null {
	const matchResult = SystemVerilogGrammar.match(context.source)

	if (matchResult.failed()) {
		const message = matchResult.shortMessage ?? 'unexpected input'
		const position = /^Line (\d+), col (\d+): /.exec(message)
		const table = new LineTable(context.source)
		const location = position
			? table.at(Number(position[1]), Number(position[2]))
			: table.locate(0)
		context.emit('SVPARSE001', location, { detail: message.slice(position?.[0].length ?? 0) })
		return null
	}

	return semantics(matchResult)['toSourceFile']()
}

/** Checks whether the source parses, without building a tree. */
export function matchOnly(source: string): boolean {
	return SystemVerilogGrammar.match(source).succeeded()
}
