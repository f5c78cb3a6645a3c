/**
 * Check phase: declaration, name lookup and elaboration.
 */

export { checkForwardDecls, declareForwardTypedef, declareTypeAlias } from './aliases.ts'
export { applyPackedDimensions, applyUnpackedDimensions, makePackedArray, makeUnpackedArray } from './arrays.ts'
export { type CheckResult, check } from './checker.ts'
export {
	convertConstant,
	evalPackedDimension,
	evalUnpackedDimension,
	evaluateConstant,
	evaluateInteger,
} from './constants.ts'
export { declareMembers, type PendingProcess } from './declarations.ts'
export { resolveEnumType } from './enums.ts'
export { type BoundExpression, bindExpression } from './expressions.ts'
export {
	declareSymbol,
	LookupFlags,
	type LookupResult,
	lookupLocal,
	lookupName,
	nextLocation,
} from './lookup.ts'
export {
	declareNetType,
	getCanonicalNetType,
	getNetAliasTarget,
	getNetDataType,
	getResolutionFunction,
} from './net-types.ts'
export {
	type LookupLocation,
	type ParameterValue,
	type Scope,
	type ScopeId,
	ScopeKind,
	ScopeStore,
	type SymbolId,
	type SymbolInfo,
	SymbolKind,
	SymbolStore,
	scopeId,
	symbolId,
} from './stores.ts'
export { resolvePackedStruct, resolveUnpackedStruct } from './structs.ts'
export {
	bindTimingControl,
	isBadTiming,
	type TimingControl,
	TimingControlKind,
} from './timing.ts'
export { lookupNamedType, resolveType } from './type-resolution.ts'
