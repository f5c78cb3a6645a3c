/**
 * Timing control binding for `always` blocks.
 */

import type { CompilationContext } from '../core/context.ts'
import { unreachable } from '../core/errors.ts'
import type {
	DelayControlSyntax,
	EdgeKind,
	EventExpressionSyntax,
	ExpressionSyntax,
	TimingControlSyntax,
} from '../syntax/nodes.ts'
import { typeToString } from '../types/printer.ts'
import { isAggregate, isIntegral, isNumeric } from '../types/queries.ts'
import { type BoundExpression, bindExpression } from './expressions.ts'
import type { LookupLocation } from './stores.ts'

export const TimingControlKind = {
	Delay: 0,
	EventList: 2,
	Invalid: 3,
	SignalEvent: 1,
} as const

export type TimingControlKind = (typeof TimingControlKind)[keyof typeof TimingControlKind]

export interface DelayControl {
	readonly kind: typeof TimingControlKind.Delay
	readonly expr: BoundExpression
	readonly syntax: TimingControlSyntax
}

export interface SignalEventControl {
	readonly kind: typeof TimingControlKind.SignalEvent
	readonly edge: EdgeKind
	readonly expr: BoundExpression
	readonly syntax: TimingControlSyntax | EventExpressionSyntax
}

export interface EventListControl {
	readonly kind: typeof TimingControlKind.EventList
	readonly events: readonly TimingControl[]
	readonly syntax: TimingControlSyntax | EventExpressionSyntax
}

/**
 * A timing control that failed to bind. `child` keeps whatever was bound
 * before the failure.
 */
export interface InvalidTimingControl {
	readonly kind: typeof TimingControlKind.Invalid
	readonly child: TimingControl | null
	readonly syntax: TimingControlSyntax | EventExpressionSyntax
}

export type TimingControl = DelayControl | SignalEventControl | EventListControl | InvalidTimingControl

export function isBadTiming(timing: TimingControl): boolean {
	return timing.kind === TimingControlKind.Invalid
}

function invalid(
	syntax: TimingControlSyntax | EventExpressionSyntax,
	child: TimingControl | null
): InvalidTimingControl {
	return { child, kind: TimingControlKind.Invalid, syntax }
}

export function bindTimingControl(
	context: CompilationContext,
	syntax: TimingControlSyntax,
	location: LookupLocation
): TimingControl {
	switch (syntax.kind) {
		case 'DelayControl':
			return bindDelay(context, syntax, location)
		case 'EventControl':
			return bindSignalEvent(context, syntax, 'none', syntax.name, location)
		case 'EventControlWithExpression':
			return bindEventExpression(context, syntax.expr, location)
		case 'ImplicitEventControl':
			context.emit('SVTIME005', syntax.loc, { construct: 'implicit event control @*' })
			return invalid(syntax, null)
		case 'CycleDelay':
			context.emit('SVTIME005', syntax.loc, { construct: 'cycle delay ##' })
			return invalid(syntax, null)
		default:
			return unreachable(syntax, 'timing control kind')
	}
}

function bindDelay(
	context: CompilationContext,
	syntax: DelayControlSyntax,
	location: LookupLocation
): TimingControl {
	const expr = bindExpression(context, syntax.expr, location)
	const result: DelayControl = { expr, kind: TimingControlKind.Delay, syntax }
	if (expr.bad) return invalid(syntax, result)

	if (!isNumeric(context.types, expr.typeId)) {
		context.emit('SVTIME001', syntax.expr.loc, { type: typeToString(context.types, expr.typeId) })
		return invalid(syntax, result)
	}
	return result
}

function bindSignalEvent(
	context: CompilationContext,
	syntax: TimingControlSyntax | EventExpressionSyntax,
	edge: EdgeKind,
	exprSyntax: ExpressionSyntax,
	location: LookupLocation
): TimingControl {
	const { types } = context
	const expr = bindExpression(context, exprSyntax, location)
	const result: SignalEventControl = { edge, expr, kind: TimingControlKind.SignalEvent, syntax }
	if (expr.bad) return invalid(syntax, result)

	if (edge === 'none') {
		if (isAggregate(types, expr.typeId)) {
			context.emit('SVTIME002', exprSyntax.loc, { type: typeToString(types, expr.typeId) })
			return invalid(syntax, result)
		}
	} else if (!isIntegral(types, expr.typeId)) {
		context.emit('SVTIME003', exprSyntax.loc)
		return invalid(syntax, result)
	}

	if (expr.constant !== null) context.emit('SVTIME004', exprSyntax.loc)
	return result
}

/**
 * Flattens `a or b, c` into one list. A single event is returned as is.
 */
function bindEventExpression(
	context: CompilationContext,
	syntax: EventExpressionSyntax,
	location: LookupLocation
): TimingControl {
	if (syntax.kind === 'SignalEventExpression') {
		return bindSignalEvent(context, syntax, syntax.edge, syntax.expr, location)
	}

	const events: TimingControl[] = []
	collectEvents(context, syntax, location, events)
	const list: EventListControl = { events, kind: TimingControlKind.EventList, syntax }
	return events.some(isBadTiming) ? invalid(syntax, list) : list
}

function collectEvents(
	context: CompilationContext,
	syntax: EventExpressionSyntax,
	location: LookupLocation,
	into: TimingControl[]
): void {
	if (syntax.kind === 'OrEventExpression') {
		collectEvents(context, syntax.left, location, into)
		collectEvents(context, syntax.right, location, into)
		return
	}
	into.push(bindSignalEvent(context, syntax, syntax.edge, syntax.expr, location))
}
