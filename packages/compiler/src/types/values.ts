/**
 * Constant values produced by evaluation and default-value synthesis.
 */

function maskOf(bitWidth: number): bigint {
	return (1n << BigInt(bitWidth)) - 1n
}

const BITS_PER_DIGIT = { b: 1, h: 4, o: 3 } as const

/**
 * A fixed-width, four-state integer.
 *
 * `value` holds the bit pattern in [0, 2^bitWidth). Bits set in `unknown`
 * are X or Z: for those positions a 0 in `value` means X and a 1 means Z.
 */
export class SVInt {
	private constructor(
		readonly bitWidth: number,
		readonly isSigned: boolean,
		readonly value: bigint,
		readonly unknown: bigint
	) {}

	static from(bitWidth: number, value: bigint | number, isSigned: boolean): SVInt {
		return new SVInt(bitWidth, isSigned, BigInt(value) & maskOf(bitWidth), 0n)
	}

	static zero(bitWidth: number, isSigned: boolean): SVInt {
		return new SVInt(bitWidth, isSigned, 0n, 0n)
	}

	static fillX(bitWidth: number, isSigned: boolean): SVInt {
		return new SVInt(bitWidth, isSigned, 0n, maskOf(bitWidth))
	}

	/**
	 * Builds a value from the digits of a based literal. A leading X or Z digit
	 * extends across the full width.
	 */
	static fromDigits(
		bitWidth: number,
		isSigned: boolean,
		base: 'b' | 'o' | 'd' | 'h',
		digits: string
	): SVInt {
		const mask = maskOf(bitWidth)
		if (base === 'd') {
			if (/^[xz?]+$/.test(digits)) {
				return new SVInt(bitWidth, isSigned, digits.startsWith('x') ? 0n : mask, mask)
			}
			return SVInt.from(bitWidth, BigInt(digits), isSigned)
		}

		const bits = BITS_PER_DIGIT[base]
		const digitMask = maskOf(bits)
		let value = 0n
		let unknown = 0n
		for (const digit of digits) {
			value <<= BigInt(bits)
			unknown <<= BigInt(bits)
			if (digit === 'x') {
				unknown |= digitMask
			} else if (digit === 'z' || digit === '?') {
				unknown |= digitMask
				value |= digitMask
			} else {
				value |= BigInt(Number.parseInt(digit, 16))
			}
		}

		const used = digits.length * bits
		const first = digits[0]
		if (used < bitWidth && (first === 'x' || first === 'z' || first === '?')) {
			const extension = mask & ~maskOf(used)
			unknown |= extension
			if (first !== 'x') value |= extension
		}

		return new SVInt(bitWidth, isSigned, value & mask, unknown & mask)
	}

	get hasUnknown(): boolean {
		return this.unknown !== 0n
	}

	/**
	 * Numeric value under this integer's signedness, or null when any bit is
	 * unknown.
	 */
	toBigInt(): bigint | null {
		if (this.hasUnknown) return null
		if (this.isSigned && this.bitWidth > 0 && this.value >> BigInt(this.bitWidth - 1) === 1n) {
			return this.value - (1n << BigInt(this.bitWidth))
		}
		return this.value
	}

	toNumber(): number | null {
		const value = this.toBigInt()
		return value === null ? null : Number(value)
	}

	/**
	 * Resizes to `bitWidth`, sign-extending when this value is signed.
	 */
	convert(bitWidth: number, isSigned: boolean): SVInt {
		const mask = maskOf(bitWidth)
		if (bitWidth <= this.bitWidth) {
			return new SVInt(bitWidth, isSigned, this.value & mask, this.unknown & mask)
		}

		const topBit = BigInt(this.bitWidth - 1)
		const extension = mask & ~maskOf(this.bitWidth)
		let value = this.value
		let unknown = this.unknown
		if (this.isSigned && (unknown >> topBit) & 1n) {
			unknown |= extension
			if ((value >> topBit) & 1n) value |= extension
		} else if (this.isSigned && (value >> topBit) & 1n) {
			value |= extension
		}
		return new SVInt(bitWidth, isSigned, value, unknown)
	}

	/**
	 * Sum at the wider operand's width; any unknown bit poisons the result.
	 */
	add(other: SVInt): SVInt {
		const bitWidth = Math.max(this.bitWidth, other.bitWidth)
		const isSigned = this.isSigned && other.isSigned
		if (this.hasUnknown || other.hasUnknown) return SVInt.fillX(bitWidth, isSigned)
		const a = this.convert(bitWidth, isSigned)
		const b = other.convert(bitWidth, isSigned)
		return SVInt.from(bitWidth, a.value + b.value, isSigned)
	}

	/**
	 * Bitwise complement. X and Z both invert to X.
	 */
	not(): SVInt {
		const mask = maskOf(this.bitWidth)
		return new SVInt(this.bitWidth, this.isSigned, ~this.value & mask & ~this.unknown, this.unknown)
	}

	equals(other: SVInt): boolean {
		return (
			this.bitWidth === other.bitWidth &&
			this.isSigned === other.isSigned &&
			this.value === other.value &&
			this.unknown === other.unknown
		)
	}

	toString(): string {
		const numeric = this.toBigInt()
		if (numeric !== null) return numeric.toString()

		let bits = ''
		for (let i = this.bitWidth - 1; i >= 0; i--) {
			const bit = 1n << BigInt(i)
			if (this.unknown & bit) bits += this.value & bit ? 'z' : 'x'
			else bits += this.value & bit ? '1' : '0'
		}
		return `${this.bitWidth}'${this.isSigned ? 's' : ''}b${bits}`
	}
}

export type ConstantValue =
	| { readonly kind: 'integer'; readonly value: SVInt }
	| { readonly kind: 'real'; readonly value: number }
	| { readonly kind: 'string'; readonly value: string }
	| { readonly kind: 'null' }
	| { readonly kind: 'unpacked'; readonly elements: readonly ConstantValue[] }

export function constantToString(cv: ConstantValue): string {
	switch (cv.kind) {
		case 'integer':
			return cv.value.toString()
		case 'real':
			return Number.isInteger(cv.value) ? cv.value.toFixed(1) : String(cv.value)
		case 'string':
			return JSON.stringify(cv.value)
		case 'null':
			return 'null'
		case 'unpacked':
			return `'{${cv.elements.map(constantToString).join(',')}}`
	}
}
