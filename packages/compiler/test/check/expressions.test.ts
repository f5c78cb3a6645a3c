import assert from 'node:assert'
import { describe, it } from 'node:test'
import { SymbolKind } from '../../src/check/stores.ts'
import { constantToString } from '../../src/types/values.ts'
import { codes, run, symbol, textOf } from '../helpers.ts'

/**
 * Binds `expr` as the initializer of an untyped parameter and returns the
 * parameter's type and value.
 */
function evaluate(expr: string): { type: string; value: string | null } {
	const result = run(`parameter P = ${expr};`)
	assert.deepStrictEqual(codes(result), [])
	const info = symbol(result, 'P')
	if (info.kind !== SymbolKind.Parameter) throw new TypeError('P is not a parameter')
	const { value } = info.resolved.get()
	return { type: textOf(result, 'P'), value: value === null ? null : constantToString(value) }
}

function diagnose(expr: string): { codes: string[]; args: unknown } {
	const result = run(`parameter P = ${expr};`)
	return { args: result.context.getDiagnostics()[0]?.args, codes: codes(result) }
}

describe('check/expressions', () => {
	describe('literals', () => {
		it('should type decimal literals as int', () => {
			assert.deepStrictEqual(evaluate('1_000'), { type: 'int', value: '1000' })
		})

		it('should size based literals', () => {
			assert.deepStrictEqual(evaluate("8'hff"), { type: 'bit[7:0]', value: '255' })
		})

		it('should make based literals with unknown digits four-state', () => {
			assert.deepStrictEqual(evaluate("4'b10x1"), { type: 'logic[3:0]', value: "4'b10x1" })
		})

		it('should give unsized based literals 32 bits', () => {
			assert.deepStrictEqual(evaluate("'sd5"), { type: 'bit signed[31:0]', value: '5' })
		})

		it('should widen decimal literals that do not fit in int', () => {
			assert.deepStrictEqual(evaluate('2147483647'), { type: 'int', value: '2147483647' })
			assert.deepStrictEqual(evaluate('2147483648'), { type: 'bit signed[32:0]', value: '2147483648' })
			assert.deepStrictEqual(evaluate('4294967296'), { type: 'bit signed[33:0]', value: '4294967296' })
		})

		it('should keep the value of a wide decimal literal in a longint', () => {
			const result = run('parameter longint P = 4294967296;')
			assert.deepStrictEqual(codes(result), [])
			const info = symbol(result, 'P')
			assert.ok(info.kind === SymbolKind.Parameter)
			const { value } = info.resolved.get()
			assert.strictEqual(value === null ? null : constantToString(value), '4294967296')
		})

		it('should accept a lone x or z decimal digit', () => {
			assert.deepStrictEqual(evaluate("8'dz"), { type: 'logic[7:0]', value: "8'bzzzzzzzz" })
		})

		it('should reject digits outside the base', () => {
			const result = run("parameter P = 8'dff;")
			assert.deepStrictEqual(codes(result), ['SVTYPE021'])
			const [diagnostic] = result.context.getDiagnostics()
			assert.strictEqual(diagnostic?.column, 15)
			assert.strictEqual(diagnostic?.message, "invalid literal '8'dff': 'f' is not a valid decimal digit")
			assert.deepStrictEqual(diagnose("4'b9"), {
				args: { detail: "'9' is not a valid binary digit", text: "4'b9" },
				codes: ['SVTYPE021'],
			})
			assert.deepStrictEqual(diagnose("6'o78"), {
				args: { detail: "'8' is not a valid octal digit", text: "6'o78" },
				codes: ['SVTYPE021'],
			})
		})

		it('should reject decimal digits mixed with x or z', () => {
			assert.deepStrictEqual(diagnose("8'd1z"), {
				args: { detail: 'an x or z decimal digit must stand alone', text: "8'd1z" },
				codes: ['SVTYPE021'],
			})
		})

		it('should reject a zero-width literal', () => {
			assert.deepStrictEqual(diagnose("0'b1"), {
				args: { detail: 'size must be at least one bit', text: "0'b1" },
				codes: ['SVTYPE021'],
			})
		})

		it('should reject a literal wider than the packed limit', () => {
			assert.deepStrictEqual(diagnose("16777216'h1"), {
				args: { max: 16777215, width: 16777216 },
				codes: ['SVTYPE022'],
			})
		})

		it('should type reals and strings', () => {
			assert.deepStrictEqual(evaluate('1.5e2'), { type: 'real', value: '150.0' })
			assert.deepStrictEqual(evaluate('"hi"'), { type: 'string', value: '"hi"' })
		})
	})

	describe('unary operators', () => {
		it('should negate in the operand width', () => {
			assert.deepStrictEqual(evaluate("-8'sd3"), { type: 'bit signed[7:0]', value: '-3' })
		})

		it('should complement the bits', () => {
			assert.deepStrictEqual(evaluate("~4'b0101"), { type: 'bit[3:0]', value: '10' })
		})

		it('should negate reals', () => {
			assert.deepStrictEqual(evaluate('-1.5'), { type: 'real', value: '-1.5' })
		})

		it('should reject complementing a string', () => {
			assert.deepStrictEqual(diagnose('~"s"'), { args: { op: '~', type: 'string' }, codes: ['SVTYPE019'] })
		})
	})

	describe('binary operators', () => {
		it('should respect precedence', () => {
			assert.strictEqual(evaluate('1 + 2 * 3').value, '7')
			assert.strictEqual(evaluate('(1 + 2) * 3').value, '9')
			assert.strictEqual(evaluate('1 | 2 & 3').value, '3')
		})

		it('should shift in the width of the left operand', () => {
			assert.deepStrictEqual(evaluate('1 << 4'), { type: 'bit signed[31:0]', value: '16' })
		})

		it('should shift everything out past the width', () => {
			assert.strictEqual(evaluate('1 << 40').value, '0')
			assert.strictEqual(evaluate("8'hff >> 8").value, '0')
		})

		it('should wrap at the wider operand width', () => {
			assert.deepStrictEqual(evaluate("8'd200 + 8'd100"), { type: 'bit[7:0]', value: '44' })
		})

		it('should be unsigned unless both operands are signed', () => {
			assert.deepStrictEqual(evaluate("4'd15 + 1"), { type: 'bit[31:0]', value: '16' })
		})

		it('should truncate integer division', () => {
			assert.strictEqual(evaluate('7 / 2').value, '3')
			assert.strictEqual(evaluate('-7 % 2').value, '-1')
		})

		it('should fold to X on division by zero', () => {
			assert.strictEqual(evaluate('1 / 0').value, `32'sb${'x'.repeat(32)}`)
		})

		it('should fold to X when an operand has unknown bits', () => {
			assert.strictEqual(evaluate("4'b1x00 + 1").value, `32'b${'x'.repeat(32)}`)
		})

		it('should promote mixed operands to real', () => {
			assert.deepStrictEqual(evaluate('2 + 1.5'), { type: 'real', value: '3.5' })
		})

		it('should reject bitwise operators on reals', () => {
			assert.deepStrictEqual(diagnose('1.5 & 1'), {
				args: { left: 'real', op: '&', right: 'int' },
				codes: ['SVTYPE018'],
			})
		})

		it('should not report again on a bad operand', () => {
			assert.deepStrictEqual(diagnose('Q + 1.5 & 1').codes, ['SVTYPE007'])
		})
	})

	describe('identifiers', () => {
		it('should fold parameters', () => {
			const result = run('parameter A = 4; parameter B = A << 1;')
			const info = symbol(result, 'B')
			assert.ok(info.kind === SymbolKind.Parameter)
			const { value } = info.resolved.get()
			assert.strictEqual(value === null ? null : constantToString(value), '8')
		})

		it('should reject a type name', () => {
			const result = run('typedef int T; parameter V = T;')
			assert.deepStrictEqual(codes(result), ['SVTYPE017'])
			assert.strictEqual(result.context.getDiagnostics()[0]?.message, "'T' cannot be used as a value")
		})

		it('should report an undeclared name', () => {
			assert.deepStrictEqual(diagnose('Q'), { args: { name: 'Q' }, codes: ['SVTYPE007'] })
		})
	})
})
