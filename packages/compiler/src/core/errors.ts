/**
 * Error classes thrown by the compiler.
 *
 * User mistakes never throw: they are reported as diagnostics and the
 * offending type becomes the error type. These classes are for the driver
 * and for internal defects.
 */

/**
 * Raised by the high-level entry points when elaboration reported errors.
 */
export class CompileError extends Error {
	constructor(message: string) {
		super(message)
		this.name = 'CompileError'
	}
}

/**
 * An invariant of the compiler itself was violated. Never caught internally.
 */
export class InternalCompilerError extends Error {
	constructor(message: string) {
		super(message)
		this.name = 'InternalCompilerError'
	}
}

/**
 * Marks the end of an exhaustive switch over a closed kind set.
 */
export function unreachable(value: never, what = 'value'): never {
	throw new InternalCompilerError(`unhandled ${what}: ${JSON.stringify(value)}`)
}
