/**
 * Type arena with uniquification and canonicalization.
 *
 * Builtins occupy fixed ids. Integral vectors are uniquified by
 * (width, signed, four-state, reg) so identity is a valid matching test.
 */

import type { SourceLocation } from '../core/context.ts'
import { InternalCompilerError } from '../core/errors.ts'
import type {
	ForwardTypedefCategory,
	IntegerAtomKeyword,
	IntegerVectorKeyword,
	NonIntegerKeyword,
	SimpleTypeKeyword,
	TypedefDeclarationSyntax,
} from '../syntax/nodes.ts'
import { Lazy, Memo } from './lazy.ts'
import {
	FloatKind,
	IntegralFlags,
	type IntegralFlagSet,
	MAX_BIT_WIDTH,
	PredefinedIntegerKind,
	ScalarKind,
	type TypeAliasType,
	type TypeId,
	type TypeInfo,
	TypeKind,
	typeId,
} from './types.ts'

/**
 * Fixed ids of the builtin types, in bootstrap order.
 */
export const BuiltinTypeId = {
	Bit: typeId(1),
	Byte: typeId(7),
	CHandle: typeId(14),
	Error: typeId(0),
	Event: typeId(17),
	Int: typeId(5),
	Integer: typeId(8),
	Logic: typeId(2),
	LongInt: typeId(6),
	Null: typeId(16),
	Real: typeId(10),
	RealTime: typeId(11),
	Reg: typeId(3),
	ShortInt: typeId(4),
	ShortReal: typeId(12),
	String: typeId(13),
	Time: typeId(9),
	Void: typeId(15),
} as const

export type BuiltinKeyword =
	| IntegerVectorKeyword
	| IntegerAtomKeyword
	| NonIntegerKeyword
	| SimpleTypeKeyword
	| 'null'

const BUILTIN_BY_KEYWORD: Readonly<Record<BuiltinKeyword, TypeId>> = {
	bit: BuiltinTypeId.Bit,
	byte: BuiltinTypeId.Byte,
	chandle: BuiltinTypeId.CHandle,
	event: BuiltinTypeId.Event,
	int: BuiltinTypeId.Int,
	integer: BuiltinTypeId.Integer,
	logic: BuiltinTypeId.Logic,
	longint: BuiltinTypeId.LongInt,
	null: BuiltinTypeId.Null,
	real: BuiltinTypeId.Real,
	realtime: BuiltinTypeId.RealTime,
	reg: BuiltinTypeId.Reg,
	shortint: BuiltinTypeId.ShortInt,
	shortreal: BuiltinTypeId.ShortReal,
	string: BuiltinTypeId.String,
	time: BuiltinTypeId.Time,
	void: BuiltinTypeId.Void,
}

interface PredefinedShape {
	readonly bitWidth: number
	readonly isSigned: boolean
	readonly isFourState: boolean
}

/**
 * Width, default signedness and four-state-ness of each predefined integer.
 */
export const PREDEFINED_INTEGER_SHAPES: Readonly<Record<PredefinedIntegerKind, PredefinedShape>> = {
	[PredefinedIntegerKind.ShortInt]: { bitWidth: 16, isFourState: false, isSigned: true },
	[PredefinedIntegerKind.Int]: { bitWidth: 32, isFourState: false, isSigned: true },
	[PredefinedIntegerKind.LongInt]: { bitWidth: 64, isFourState: false, isSigned: true },
	[PredefinedIntegerKind.Byte]: { bitWidth: 8, isFourState: false, isSigned: true },
	[PredefinedIntegerKind.Integer]: { bitWidth: 32, isFourState: true, isSigned: true },
	[PredefinedIntegerKind.Time]: { bitWidth: 64, isFourState: true, isSigned: false },
}

function predefined(integerKind: PredefinedIntegerKind): TypeInfo {
	return { integerKind, kind: TypeKind.PredefinedInteger, ...PREDEFINED_INTEGER_SHAPES[integerKind] }
}

function scalar(scalarKind: ScalarKind, isSigned: boolean): TypeInfo {
	return {
		bitWidth: 1,
		isFourState: scalarKind !== ScalarKind.Bit,
		isSigned,
		kind: TypeKind.Scalar,
		scalarKind,
	}
}

/**
 * Builtins in BuiltinTypeId order.
 */
function builtinTypes(): TypeInfo[] {
	return [
		{ kind: TypeKind.Error },
		scalar(ScalarKind.Bit, false),
		scalar(ScalarKind.Logic, false),
		scalar(ScalarKind.Reg, false),
		predefined(PredefinedIntegerKind.ShortInt),
		predefined(PredefinedIntegerKind.Int),
		predefined(PredefinedIntegerKind.LongInt),
		predefined(PredefinedIntegerKind.Byte),
		predefined(PredefinedIntegerKind.Integer),
		predefined(PredefinedIntegerKind.Time),
		{ floatKind: FloatKind.Real, kind: TypeKind.Floating },
		{ floatKind: FloatKind.RealTime, kind: TypeKind.Floating },
		{ floatKind: FloatKind.ShortReal, kind: TypeKind.Floating },
		{ kind: TypeKind.String },
		{ kind: TypeKind.CHandle },
		{ kind: TypeKind.Void },
		{ kind: TypeKind.Null },
		{ kind: TypeKind.Event },
	]
}

/**
 * Everything needed to create a type alias. The target is resolved on first
 * use; `onCycle` supplies the target when resolution re-enters itself.
 */
export interface AliasOptions {
	readonly name: string
	readonly location: SourceLocation
	readonly syntax: TypedefDeclarationSyntax
	readonly resolveTarget: () => TypeId
	readonly onCycle: () => TypeId
}

/**
 * Dense array storage for types.
 * Append-only; entries never change after being added apart from memo cells.
 */
export class TypeStore {
	private readonly types: TypeInfo[] = []
	private readonly vectorCache = new Map<string, TypeId>()
	private readonly signedScalarCache = new Map<ScalarKind, TypeId>()

	constructor() {
		for (const info of builtinTypes()) this.add(info)
	}

	add(info: TypeInfo): TypeId {
		const id = typeId(this.types.length)
		this.types.push(info)
		return id
	}

	get(id: TypeId): TypeInfo {
		const info = this.types[id]
		if (info === undefined) {
			throw new InternalCompilerError(`Invalid TypeId: ${id}`)
		}
		return info
	}

	count(): number {
		return this.types.length
	}

	isValid(id: TypeId): boolean {
		return id >= 0 && id < this.types.length
	}

	*[Symbol.iterator](): Generator<[TypeId, TypeInfo]> {
		for (let i = 0; i < this.types.length; i++) {
			const info = this.types[i]
			if (info !== undefined) yield [typeId(i), info]
		}
	}

	// ===========================================================================
	// UNIQUIFICATION
	// ===========================================================================

	getBuiltin(keyword: BuiltinKeyword): TypeId {
		return BUILTIN_BY_KEYWORD[keyword]
	}

	/**
	 * A predefined integer or scalar keyword with the given signedness. The
	 * default signedness returns the builtin; the other goes through
	 * getScalarType or getType.
	 */
	getPredefinedType(keyword: IntegerVectorKeyword | IntegerAtomKeyword, isSigned: boolean): TypeId {
		const id = this.getBuiltin(keyword)
		const info = this.get(id)
		if (info.kind !== TypeKind.PredefinedInteger && info.kind !== TypeKind.Scalar) {
			throw new InternalCompilerError(`'${keyword}' is not an integral builtin`)
		}
		if (info.isSigned === isSigned) return id

		let flags = this.flagsOf(info)
		flags = isSigned ? flags | IntegralFlags.Signed : flags & ~IntegralFlags.Signed
		if (info.kind === TypeKind.Scalar) return this.getScalarType(flags)
		return this.getType(info.bitWidth, flags)
	}

	/**
	 * The 1-bit scalar with the given flags. Reg wins over FourState.
	 */
	getScalarType(flags: IntegralFlagSet): TypeId {
		const scalarKind =
			flags & IntegralFlags.Reg
				? ScalarKind.Reg
				: flags & IntegralFlags.FourState
					? ScalarKind.Logic
					: ScalarKind.Bit

		if (!(flags & IntegralFlags.Signed)) {
			switch (scalarKind) {
				case ScalarKind.Bit:
					return BuiltinTypeId.Bit
				case ScalarKind.Logic:
					return BuiltinTypeId.Logic
				case ScalarKind.Reg:
					return BuiltinTypeId.Reg
			}
		}

		const cached = this.signedScalarCache.get(scalarKind)
		if (cached !== undefined) return cached
		const id = this.add(scalar(scalarKind, true))
		this.signedScalarCache.set(scalarKind, id)
		return id
	}

	/**
	 * The shared `[width-1:0]` vector with the given flags.
	 */
	getType(bitWidth: number, flags: IntegralFlagSet): TypeId {
		if (!Number.isInteger(bitWidth) || bitWidth <= 0 || bitWidth > MAX_BIT_WIDTH) {
			throw new InternalCompilerError(`invalid vector width ${bitWidth}`)
		}

		const key = `${bitWidth}:${flags}`
		const cached = this.vectorCache.get(key)
		if (cached !== undefined) return cached

		const elementType = this.getScalarType(flags)
		const element = this.get(elementType)
		const id = this.add({
			bitWidth,
			elementType,
			isFourState: element.kind === TypeKind.Scalar && element.isFourState,
			isSigned: (flags & IntegralFlags.Signed) !== 0,
			kind: TypeKind.PackedArray,
			range: { left: bitWidth - 1, right: 0 },
		})
		this.vectorCache.set(key, id)
		return id
	}

	private flagsOf(info: TypeInfo): IntegralFlagSet {
		let flags: IntegralFlagSet = IntegralFlags.None
		if (info.kind !== TypeKind.PredefinedInteger && info.kind !== TypeKind.Scalar) return flags
		if (info.isSigned) flags |= IntegralFlags.Signed
		if (info.isFourState) flags |= IntegralFlags.FourState
		if (info.kind === TypeKind.Scalar && info.scalarKind === ScalarKind.Reg) {
			flags |= IntegralFlags.Reg
		}
		return flags
	}

	// ===========================================================================
	// ALIASES & CANONICALIZATION
	// ===========================================================================

	addAlias(options: AliasOptions): TypeId {
		const alias: TypeAliasType = {
			canonical: new Memo<TypeId>(),
			forwardDecls: [],
			kind: TypeKind.TypeAlias,
			location: options.location,
			name: options.name,
			syntax: options.syntax,
			target: new Lazy(options.resolveTarget, options.onCycle),
		}
		return this.add(alias)
	}

	addForwardDecl(
		aliasId: TypeId,
		category: ForwardTypedefCategory | null,
		location: SourceLocation
	): void {
		const alias = this.get(aliasId)
		if (alias.kind !== TypeKind.TypeAlias) {
			throw new InternalCompilerError(`TypeId ${aliasId} is not an alias`)
		}
		alias.forwardDecls.push({ category, location })
	}

	/**
	 * The non-alias type at the end of `id`'s alias chain. Cached on the
	 * originating alias. A revisited alias is an internal error.
	 */
	getCanonical(id: TypeId): TypeId {
		const origin = this.get(id)
		if (origin.kind !== TypeKind.TypeAlias) return id

		const cached = origin.canonical.peek()
		if (cached !== undefined) return cached

		const visited = new Set<TypeId>([id])
		let current = origin.target.get()
		for (;;) {
			const info = this.get(current)
			if (info.kind !== TypeKind.TypeAlias) break

			const known = info.canonical.peek()
			if (known !== undefined) {
				current = known
				break
			}
			if (visited.has(current)) {
				throw new InternalCompilerError(`type alias cycle through '${info.name}'`)
			}
			visited.add(current)
			current = info.target.get()
		}

		return origin.canonical.set(current)
	}

	/** The canonical entry for `id` */
	canonicalInfo(id: TypeId): TypeInfo {
		return this.get(this.getCanonical(id))
	}
}
