/**
 * Net type arena.
 *
 * The twelve built-in net kinds are resolved at construction with a `logic`
 * data type. User-defined net types start unresolved; their resolution cell
 * is filled on first access by the resolver in check/net-types.ts.
 */

import type { SymbolId } from '../check/stores.ts'
import type { SourceLocation } from '../core/context.ts'
import { InternalCompilerError } from '../core/errors.ts'
import type { NetKindKeyword, NetTypeDeclarationSyntax } from '../syntax/nodes.ts'
import { Lazy } from './lazy.ts'
import { BuiltinTypeId } from './store.ts'
import type { TypeId } from './types.ts'

export type NetTypeId = number & { readonly __brand: 'NetTypeId' }

export function netTypeId(n: number): NetTypeId {
	return n as NetTypeId
}

export const NetKind = {
	Supply0: 10,
	Supply1: 11,
	Tri: 2,
	Tri0: 3,
	Tri1: 4,
	TriAnd: 5,
	TriOr: 6,
	TriReg: 7,
	UserDefined: 12,
	UWire: 1,
	WAnd: 8,
	Wire: 0,
	WOr: 9,
} as const

export type NetKind = (typeof NetKind)[keyof typeof NetKind]

const BUILTIN_NET_KINDS: readonly (readonly [NetKindKeyword, NetKind])[] = [
	['wire', NetKind.Wire],
	['uwire', NetKind.UWire],
	['tri', NetKind.Tri],
	['tri0', NetKind.Tri0],
	['tri1', NetKind.Tri1],
	['triand', NetKind.TriAnd],
	['trior', NetKind.TriOr],
	['trireg', NetKind.TriReg],
	['wand', NetKind.WAnd],
	['wor', NetKind.WOr],
	['supply0', NetKind.Supply0],
	['supply1', NetKind.Supply1],
]

/**
 * What a net type resolves to. `alias` is the net type this one renames;
 * `resolver` is the `with` function.
 */
export interface NetTypeResolution {
	readonly dataType: TypeId
	readonly alias: NetTypeId | null
	readonly resolver: SymbolId | null
}

export interface NetTypeInfo {
	readonly netKind: NetKind
	readonly name: string
	readonly location?: SourceLocation
	readonly syntax?: NetTypeDeclarationSyntax
	readonly resolution: Lazy<NetTypeResolution>
}

export class NetTypeStore {
	private readonly netTypes: NetTypeInfo[] = []
	private readonly builtins = new Map<NetKindKeyword, NetTypeId>()

	constructor() {
		for (const [keyword, netKind] of BUILTIN_NET_KINDS) {
			const id = this.add({
				name: keyword,
				netKind,
				resolution: Lazy.resolved({ alias: null, dataType: BuiltinTypeId.Logic, resolver: null }),
			})
			this.builtins.set(keyword, id)
		}
	}

	add(info: NetTypeInfo): NetTypeId {
		const id = netTypeId(this.netTypes.length)
		this.netTypes.push(info)
		return id
	}

	get(id: NetTypeId): NetTypeInfo {
		const info = this.netTypes[id]
		if (info === undefined) {
			throw new InternalCompilerError(`Invalid NetTypeId: ${id}`)
		}
		return info
	}

	count(): number {
		return this.netTypes.length
	}

	getBuiltin(keyword: NetKindKeyword): NetTypeId {
		const id = this.builtins.get(keyword)
		if (id === undefined) {
			throw new InternalCompilerError(`unknown net kind '${keyword}'`)
		}
		return id
	}

	isResolved(id: NetTypeId): boolean {
		return this.get(id).resolution.isResolved()
	}

	*[Symbol.iterator](): Generator<[NetTypeId, NetTypeInfo]> {
		for (let i = 0; i < this.netTypes.length; i++) {
			const info = this.netTypes[i]
			if (info !== undefined) yield [netTypeId(i), info]
		}
	}
}
