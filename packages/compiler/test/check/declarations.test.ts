import assert from 'node:assert'
import { describe, it } from 'node:test'
import { SymbolKind } from '../../src/check/stores.ts'
import { NetKind } from '../../src/types/nets.ts'
import { getBitWidth, isSigned } from '../../src/types/queries.ts'
import { constantToString } from '../../src/types/values.ts'
import { codes, run, symbol, textOf, typeOf } from '../helpers.ts'

function parameterValue(source: string, name: string): string | null {
	const info = symbol(run(source), name)
	if (info.kind !== SymbolKind.Parameter) throw new TypeError(`'${name}' is not a parameter`)
	const { value } = info.resolved.get()
	return value === null ? null : constantToString(value)
}

describe('check/declarations', () => {
	describe('packed dimensions', () => {
		it('should share the vector type of a [n:0] range', () => {
			const result = run('logic [7:0] x; logic [7:0] y;')
			assert.deepStrictEqual(codes(result), [])
			assert.strictEqual(textOf(result, 'x'), 'logic[7:0]')
			assert.strictEqual(typeOf(result, 'x'), typeOf(result, 'y'))
		})

		it('should keep an ascending range as written', () => {
			const result = run('logic [0:7] x;')
			assert.strictEqual(textOf(result, 'x'), 'logic[0:7]')
			assert.strictEqual(getBitWidth(result.context.types, typeOf(result, 'x')), 8)
		})

		it('should multiply widths of nested packed dimensions', () => {
			const result = run('logic [3:0][7:0] m;')
			assert.strictEqual(textOf(result, 'm'), 'logic[3:0][7:0]')
			assert.strictEqual(getBitWidth(result.context.types, typeOf(result, 'm')), 32)
		})

		it('should evaluate bounds through parameters', () => {
			const result = run('parameter W = 8; logic [W-1:0] data;')
			assert.deepStrictEqual(codes(result), [])
			assert.strictEqual(textOf(result, 'data'), 'logic[7:0]')
		})

		it('should make signed vectors', () => {
			const result = run('bit signed [3:0] s;')
			assert.strictEqual(textOf(result, 's'), 'bit signed[3:0]')
			assert.strictEqual(isSigned(result.context.types, typeOf(result, 's')), true)
		})

		it('should reject packed dimensions on predefined integers', () => {
			const result = run('int [3:0] x;')
			assert.deepStrictEqual(codes(result), ['SVTYPE001'])
			assert.strictEqual(result.context.getDiagnostics()[0]?.message, "packed dimensions not allowed on predefined integer type 'int'")
			assert.strictEqual(textOf(result, 'x'), 'int')
		})

		it('should require a range for packed dimensions', () => {
			const result = run('logic [8] x;')
			assert.deepStrictEqual(codes(result), ['SVTYPE009'])
			assert.deepStrictEqual(result.context.getDiagnostics()[0]?.args, { msb: 7, size: 8 })
			assert.strictEqual(textOf(result, 'x'), '<error>')
		})

		it('should reject non-constant bounds', () => {
			const result = run('int n; logic [n:0] x;')
			assert.deepStrictEqual(codes(result), ['SVTYPE008'])
		})

		it('should reject a range wider than the packed limit', () => {
			const result = run('logic [4294967296:0] x;')
			assert.deepStrictEqual(codes(result), ['SVTYPE022'])
			assert.deepStrictEqual(result.context.getDiagnostics()[0]?.args, { max: 16777215, width: 4294967297 })
			assert.strictEqual(textOf(result, 'x'), '<error>')
		})

		it('should reject nested dimensions whose product is too wide', () => {
			const result = run('bit [4095:0][4095:0] x;')
			assert.deepStrictEqual(codes(result), ['SVTYPE022'])
			const [diagnostic] = result.context.getDiagnostics()
			assert.deepStrictEqual(diagnostic?.args, { max: 16777215, width: 16777216 })
			assert.strictEqual(diagnostic?.column, 5)
		})

		it('should reject packed dimensions on non-integral aliases', () => {
			const result = run('typedef real r_t; r_t [1:0] x;')
			assert.deepStrictEqual(codes(result), ['SVTYPE010'])
		})
	})

	describe('unpacked dimensions', () => {
		it('should turn a size into a zero-based range', () => {
			const result = run('int arr [4];')
			assert.strictEqual(textOf(result, 'arr'), 'int$[0:3]')
		})

		it('should reject a zero size', () => {
			const result = run('int arr [0];')
			assert.deepStrictEqual(codes(result), ['SVTYPE016'])
			assert.strictEqual(result.context.getDiagnostics()[0]?.message, 'array dimension size 0 must be positive')
		})

		it('should give each declarator its own dimensions', () => {
			const result = run('byte a, b [2];')
			assert.strictEqual(textOf(result, 'a'), 'byte')
			assert.strictEqual(textOf(result, 'b'), 'byte$[0:1]')
		})
	})

	describe('parameters', () => {
		it('should take the type of the initializer when untyped', () => {
			const result = run('parameter P = 1.5;')
			assert.strictEqual(textOf(result, 'P'), 'real')
			assert.strictEqual(parameterValue('parameter P = 1.5;', 'P'), '1.5')
		})

		it('should truncate values to the declared width', () => {
			assert.strictEqual(parameterValue('parameter logic [3:0] P = 20;', 'P'), '4')
		})

		it('should convert integers to real', () => {
			assert.strictEqual(parameterValue('parameter real R = 3;', 'R'), '3.0')
		})

		it('should see earlier parameters of the same list', () => {
			assert.strictEqual(parameterValue('localparam A = 2, B = A * 3;', 'B'), '6')
		})

		it('should have no value without an initializer', () => {
			const result = run('parameter int Q;')
			assert.deepStrictEqual(codes(result), [])
			assert.strictEqual(parameterValue('parameter int Q;', 'Q'), null)
			assert.strictEqual(textOf(result, 'Q'), 'int')
		})

		it('should reject an incompatible initializer', () => {
			const result = run('parameter string S = 5;')
			assert.deepStrictEqual(codes(result), ['SVTYPE020'])
			assert.deepStrictEqual(result.context.getDiagnostics()[0]?.args, { left: 'string', name: 'S', right: 'int' })
		})

		it('should require a constant initializer', () => {
			const result = run('int v; parameter P = v;')
			assert.deepStrictEqual(codes(result), ['SVTYPE008'])
		})
	})

	describe('variables and nets', () => {
		it('should report a redefinition at the second name', () => {
			const result = run('int a; int a;')
			assert.deepStrictEqual(codes(result), ['SVTYPE011'])
			const [diagnostic] = result.context.getDiagnostics()
			assert.strictEqual(diagnostic?.line, 1)
			assert.strictEqual(diagnostic?.column, 12)
		})

		it('should accept a non-constant initializer', () => {
			assert.deepStrictEqual(codes(run('int a; int b = a;')), [])
		})

		it('should check initializers against the declared type', () => {
			const result = run('string s = 1;')
			assert.deepStrictEqual(codes(result), ['SVTYPE020'])
			assert.deepStrictEqual(result.context.getDiagnostics()[0]?.args, { left: 'string', name: 's', right: 'int' })
		})

		it('should default net data types to logic', () => {
			const result = run('wire [3:0] bus; wire w1;')
			assert.strictEqual(textOf(result, 'bus'), 'logic[3:0]')
			assert.strictEqual(textOf(result, 'w1'), 'logic')
		})

		it('should record the built-in net kind', () => {
			const result = run('tri1 t;')
			const info = symbol(result, 't')
			assert.strictEqual(info.kind, SymbolKind.Net)
			if (info.kind !== SymbolKind.Net) return
			assert.strictEqual(result.context.netTypes.get(info.netTypeId).netKind, NetKind.Tri1)
		})
	})

	describe('functions', () => {
		it('should resolve the return type', () => {
			const result = run('function logic [3:0] f; endfunction')
			assert.strictEqual(symbol(result, 'f').kind, SymbolKind.Subroutine)
			assert.strictEqual(textOf(result, 'f'), 'logic[3:0]')
		})

		it('should not be usable as a value', () => {
			const result = run('function int f; endfunction parameter P = f;')
			assert.deepStrictEqual(codes(result), ['SVTYPE017'])
		})
	})
})
