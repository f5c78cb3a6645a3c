/**
 * Write-once memo cells for the lazily computed parts of otherwise
 * immutable nodes.
 */

/**
 * A value computed on first access.
 *
 * Re-entering `get()` while the computation is running calls `onCycle`
 * instead; its result becomes the final value and the outer computation's
 * result is discarded.
 */
export class Lazy<T> {
	private result: { readonly value: T } | null = null
	private resolving = false

	constructor(
		private readonly compute: () => T,
		private readonly onCycle: () => T
	) {}

	static resolved<T>(value: T): Lazy<T> {
		const lazy = new Lazy<T>(
			() => value,
			() => value
		)
		lazy.result = { value }
		return lazy
	}

	get(): T {
		if (this.result) return this.result.value

		if (this.resolving) {
			const value = this.onCycle()
			this.result = { value }
			return value
		}

		this.resolving = true
		try {
			const value = this.compute()
			if (!this.result) this.result = { value }
			return this.result.value
		} finally {
			this.resolving = false
		}
	}

	isResolved(): boolean {
		return this.result !== null
	}

	isResolving(): boolean {
		return this.resolving
	}
}

/**
 * A cell set at most once. Later writes are ignored.
 */
export class Memo<T> {
	private result: { readonly value: T } | null = null

	peek(): T | undefined {
		return this.result?.value
	}

	set(value: T): T {
		if (!this.result) this.result = { value }
		return this.result.value
	}
}
