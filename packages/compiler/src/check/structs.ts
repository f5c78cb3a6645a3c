/**
 * Struct type builders.
 */

import type { CompilationContext } from '../core/context.ts'
import type { DeclaratorSyntax, StructMemberSyntax, StructTypeSyntax } from '../syntax/nodes.ts'
import { typeToString } from '../types/printer.ts'
import { getBitWidth, isError, isFourState, isIntegral } from '../types/queries.ts'
import { BuiltinTypeId } from '../types/store.ts'
import { type Field, MAX_BIT_WIDTH, type TypeId, TypeKind } from '../types/types.ts'
import { applyPackedDimensions, applyUnpackedDimensions } from './arrays.ts'
import type { LookupLocation } from './stores.ts'
import { resolveType } from './type-resolution.ts'

/**
 * Reports every member name that repeats an earlier one, in source order.
 */
function checkMemberNames(context: CompilationContext, members: readonly StructMemberSyntax[]): void {
	const seen = new Set<string>()
	for (const member of members) {
		for (const declarator of member.declarators) {
			if (seen.has(declarator.name)) {
				context.emit('SVTYPE011', declarator.loc, { name: declarator.name })
			}
			seen.add(declarator.name)
		}
	}
}

/**
 * `struct packed [signed] { ... }`.
 *
 * Members are laid out from the last declared, at bit 0, to the first, at
 * the most significant end. Fields are kept in declaration order.
 */
export function resolvePackedStruct(
	context: CompilationContext,
	syntax: StructTypeSyntax,
	location: LookupLocation
): TypeId {
	const { types } = context
	checkMemberNames(context, syntax.members)

	const fields: Field[] = []
	let bitWidth = 0
	let fourState = false
	let invalid = false

	for (const member of [...syntax.members].reverse()) {
		const memberType = resolveType(context, member.type, location)
		if (isError(types, memberType)) {
			invalid = true
			continue
		}
		if (!isIntegral(types, memberType)) {
			context.emit('SVTYPE004', member.type.loc, { type: typeToString(types, memberType) })
			invalid = true
			continue
		}
		fourState ||= isFourState(types, memberType)

		for (const declarator of [...member.declarators].reverse()) {
			const fieldType = packedFieldType(context, declarator, memberType, location)
			if (fieldType === null) {
				invalid = true
				continue
			}
			fields.push({ location: declarator.loc, name: declarator.name, offset: bitWidth, typeId: fieldType })
			bitWidth += getBitWidth(types, fieldType)
		}
	}

	if (invalid || bitWidth === 0) return BuiltinTypeId.Error
	if (bitWidth > MAX_BIT_WIDTH) {
		context.emit('SVTYPE022', syntax.loc, { max: MAX_BIT_WIDTH, width: bitWidth })
		return BuiltinTypeId.Error
	}

	const structType = types.add({
		bitWidth,
		fields: fields.reverse(),
		isFourState: fourState,
		isSigned: syntax.signing === 'signed',
		kind: TypeKind.PackedStruct,
		location: syntax.loc,
		syntax,
	})
	return applyPackedDimensions(context, structType, syntax.packedDims, location)
}

/**
 * Packed members may not have unpacked dimensions or initializers. Returns
 * null once the problem is reported.
 */
function packedFieldType(
	context: CompilationContext,
	declarator: DeclaratorSyntax,
	memberType: TypeId,
	location: LookupLocation
): TypeId | null {
	if (declarator.initializer) {
		context.emit('SVTYPE005', declarator.initializer.loc, { name: declarator.name })
	}
	if (declarator.dims.length === 0) return memberType

	const fieldType = applyUnpackedDimensions(context, memberType, declarator.dims, location)
	if (!isError(context.types, fieldType)) {
		context.emit('SVTYPE004', declarator.loc, { type: typeToString(context.types, fieldType) })
	}
	return null
}

/**
 * `struct { ... }`. Field offsets are member indices.
 */
export function resolveUnpackedStruct(
	context: CompilationContext,
	syntax: StructTypeSyntax,
	location: LookupLocation
): TypeId {
	const { types } = context
	checkMemberNames(context, syntax.members)

	const fields: Field[] = []
	let invalid = false
	for (const member of syntax.members) {
		const memberType = resolveType(context, member.type, location)
		for (const declarator of member.declarators) {
			const fieldType = applyUnpackedDimensions(context, memberType, declarator.dims, location)
			if (isError(types, fieldType)) {
				invalid = true
				continue
			}
			fields.push({ location: declarator.loc, name: declarator.name, offset: fields.length, typeId: fieldType })
		}
	}

	if (invalid) return BuiltinTypeId.Error

	const structType = types.add({
		fields,
		kind: TypeKind.UnpackedStruct,
		location: syntax.loc,
		syntax,
	})
	return applyPackedDimensions(context, structType, syntax.packedDims, location)
}
