import assert from 'node:assert'
import { describe, it } from 'node:test'
import { CompilationContext } from '../../src/core/context.ts'
import type { MemberSyntax, SourceFileSyntax } from '../../src/syntax/nodes.ts'
import { LineTable, matchOnly, parse } from '../../src/syntax/parser.ts'

function parseOk(source: string): SourceFileSyntax {
	const context = new CompilationContext(source)
	const file = parse(context)
	assert.ok(file, context.formatAllDiagnostics())
	return file
}

function only(source: string): MemberSyntax {
	const [member] = parseOk(source).members
	assert.ok(member)
	return member
}

describe('syntax/parser', () => {
	describe('declarations', () => {
		it('should parse a typedef with its name location', () => {
			const member = only('typedef logic [7:0] byte_t;')
			assert.strictEqual(member.kind, 'TypedefDeclaration')
			if (member.kind !== 'TypedefDeclaration') return
			assert.strictEqual(member.name, 'byte_t')
			assert.deepStrictEqual(member.nameLoc, { column: 21, line: 1, offset: 20 })
			assert.strictEqual(member.type.kind, 'IntegerVectorType')
			assert.strictEqual(member.dims.length, 0)
		})

		it('should parse forward typedefs with and without a category', () => {
			const [plain, iface, enumFwd] = parseOk('typedef T; typedef interface class C; typedef enum E;').members
			assert.strictEqual(plain?.kind === 'ForwardTypedefDeclaration' && plain.category, null)
			assert.strictEqual(iface?.kind === 'ForwardTypedefDeclaration' && iface.category, 'interface class')
			assert.strictEqual(enumFwd?.kind === 'ForwardTypedefDeclaration' && enumFwd.category, 'enum')
		})

		it('should parse an untyped parameter with an implicit type', () => {
			const member = only('parameter P = 1;')
			assert.strictEqual(member.kind, 'ParameterDeclaration')
			if (member.kind !== 'ParameterDeclaration') return
			assert.strictEqual(member.keyword, 'parameter')
			assert.strictEqual(member.type.kind, 'ImplicitType')
			assert.deepStrictEqual(
				member.declarators.map((d) => d.name),
				['P']
			)
		})

		it('should parse a typed localparam list', () => {
			const member = only('localparam int A = 1, B = 2;')
			assert.strictEqual(member.kind, 'ParameterDeclaration')
			if (member.kind !== 'ParameterDeclaration') return
			assert.strictEqual(member.keyword, 'localparam')
			assert.strictEqual(member.type.kind, 'IntegerAtomType')
			assert.deepStrictEqual(
				member.declarators.map((d) => d.name),
				['A', 'B']
			)
		})

		it('should parse net declarations with an implicit type', () => {
			const member = only('wire signed [3:0] w;')
			assert.strictEqual(member.kind, 'NetDeclaration')
			if (member.kind !== 'NetDeclaration') return
			assert.strictEqual(member.netKind, 'wire')
			assert.strictEqual(member.type.kind, 'ImplicitType')
			if (member.type.kind !== 'ImplicitType') return
			assert.strictEqual(member.type.signing, 'signed')
			assert.strictEqual(member.type.packedDims.length, 1)
		})

		it('should parse a nettype with a resolution function', () => {
			const member = only('nettype logic [1:0] bus_t with resolve;')
			assert.strictEqual(member.kind, 'NetTypeDeclaration')
			if (member.kind !== 'NetTypeDeclaration') return
			assert.strictEqual(member.withFunction?.name, 'resolve')
		})

		it('should parse a function prototype', () => {
			const member = only('function int f; endfunction')
			assert.strictEqual(member.kind, 'FunctionDeclaration')
			if (member.kind !== 'FunctionDeclaration') return
			assert.strictEqual(member.name, 'f')
			assert.strictEqual(member.returnType.kind, 'IntegerAtomType')
		})

		it('should parse unpacked dimensions on declarators', () => {
			const member = only('int arr [4][0:1];')
			assert.strictEqual(member.kind, 'DataDeclaration')
			if (member.kind !== 'DataDeclaration') return
			assert.deepStrictEqual(
				member.declarators[0]?.dims.map((d) => d.kind),
				['SizeDimension', 'RangeDimension']
			)
		})

		it('should parse struct packing and members', () => {
			const member = only('typedef struct packed unsigned {bit a, b; int c;} s_t;')
			assert.strictEqual(member.kind, 'TypedefDeclaration')
			if (member.kind !== 'TypedefDeclaration' || member.type.kind !== 'StructType') return
			assert.strictEqual(member.type.packed, true)
			assert.strictEqual(member.type.signing, 'unsigned')
			assert.strictEqual(member.type.members.length, 2)
			assert.deepStrictEqual(
				member.type.members[0]?.declarators.map((d) => d.name),
				['a', 'b']
			)
		})
	})

	describe('keywords', () => {
		it('should not match a keyword at the front of a longer one', () => {
			const member = only('integer i;')
			assert.strictEqual(member.kind, 'DataDeclaration')
			if (member.kind !== 'DataDeclaration' || member.type.kind !== 'IntegerAtomType') return
			assert.strictEqual(member.type.keyword, 'integer')
		})

		it('should read an identifier that starts with a keyword as a name', () => {
			const member = only('typedef int interval; interval x;')
			assert.strictEqual(member.kind, 'TypedefDeclaration')
			if (member.kind !== 'TypedefDeclaration') return
			assert.strictEqual(member.name, 'interval')
		})
	})

	describe('expressions', () => {
		function initializer(source: string) {
			const member = only(`parameter P = ${source};`)
			if (member.kind !== 'ParameterDeclaration') throw new Error('not a parameter')
			const expr = member.declarators[0]?.initializer
			assert.ok(expr)
			return expr
		}

		it('should bind multiplication tighter than addition', () => {
			const expr = initializer('1 + 2 * 3')
			assert.strictEqual(expr.kind, 'BinaryExpression')
			if (expr.kind !== 'BinaryExpression') return
			assert.strictEqual(expr.op, '+')
			assert.strictEqual(expr.right.kind === 'BinaryExpression' && expr.right.op, '*')
		})

		it('should associate to the left', () => {
			const expr = initializer('8 - 2 - 1')
			assert.strictEqual(expr.kind, 'BinaryExpression')
			if (expr.kind !== 'BinaryExpression') return
			assert.strictEqual(expr.left.kind === 'BinaryExpression' && expr.left.op, '-')
			assert.strictEqual(expr.right.kind, 'IntegerLiteral')
		})

		it('should parse based literals', () => {
			const expr = initializer("16'hDE_AD")
			assert.strictEqual(expr.kind, 'BasedLiteral')
			if (expr.kind !== 'BasedLiteral') return
			assert.strictEqual(expr.size, 16)
			assert.strictEqual(expr.base, 'h')
			assert.strictEqual(expr.digits, 'dead')
			assert.strictEqual(expr.signed, false)
		})

		it('should parse signed unsized based literals', () => {
			const expr = initializer("'sd5")
			assert.strictEqual(expr.kind, 'BasedLiteral')
			if (expr.kind !== 'BasedLiteral') return
			assert.strictEqual(expr.size, null)
			assert.strictEqual(expr.signed, true)
		})

		it('should parse real literals', () => {
			const expr = initializer('1.5e2')
			assert.strictEqual(expr.kind === 'RealLiteral' && expr.value, 150)
		})

		it('should unescape string literals', () => {
			const expr = initializer('"a\\tb"')
			assert.strictEqual(expr.kind === 'StringLiteral' && expr.value, 'a\tb')
		})

		it('should drop underscores from decimal literals', () => {
			const expr = initializer('1_000')
			assert.strictEqual(expr.kind === 'IntegerLiteral' && expr.text, '1000')
		})
	})

	describe('timing controls', () => {
		it('should parse an edge list', () => {
			const member = only('always @(posedge clk or negedge rst);')
			assert.strictEqual(member.kind, 'AlwaysBlock')
			if (member.kind !== 'AlwaysBlock') return
			const { timing } = member
			assert.strictEqual(timing.kind, 'EventControlWithExpression')
			if (timing.kind !== 'EventControlWithExpression') return
			assert.strictEqual(timing.expr.kind, 'OrEventExpression')
			if (timing.expr.kind !== 'OrEventExpression') return
			assert.strictEqual(timing.expr.left.kind === 'SignalEventExpression' && timing.expr.left.edge, 'posedge')
			assert.strictEqual(timing.expr.right.kind === 'SignalEventExpression' && timing.expr.right.edge, 'negedge')
		})

		it('should parse the other timing forms', () => {
			const kinds = parseOk('always #5; always ##2; always @*; always @(*); always @clk;').members.map((m) =>
				m.kind === 'AlwaysBlock' ? m.timing.kind : m.kind
			)
			assert.deepStrictEqual(kinds, [
				'DelayControl',
				'CycleDelay',
				'ImplicitEventControl',
				'ImplicitEventControl',
				'EventControl',
			])
		})
	})

	describe('errors', () => {
		it('should report a syntax error and return null', () => {
			const context = new CompilationContext('int x')
			assert.strictEqual(parse(context), null)
			const [diagnostic] = context.getDiagnostics()
			assert.strictEqual(diagnostic?.def.code, 'SVPARSE001')
			assert.strictEqual(diagnostic?.line, 1)
		})

		it('should skip comments', () => {
			assert.strictEqual(matchOnly('// header\nint /* inline */ x;'), true)
		})

		it('should accept an empty file', () => {
			assert.deepStrictEqual(parseOk('').members, [])
		})

		it('should reject unknown statements', () => {
			assert.strictEqual(matchOnly('module m; endmodule'), false)
		})
	})
})

describe('syntax/LineTable', () => {
	it('should locate offsets', () => {
		const table = new LineTable('a\nbc\n')
		assert.deepStrictEqual(table.locate(0), { column: 1, line: 1, offset: 0 })
		assert.deepStrictEqual(table.locate(3), { column: 2, line: 2, offset: 3 })
	})

	it('should map line and column back to an offset', () => {
		const table = new LineTable('a\nbc\n')
		assert.deepStrictEqual(table.at(2, 2), { column: 2, line: 2, offset: 3 })
	})
})
