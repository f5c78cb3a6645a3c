import assert from 'node:assert'
import { describe, it } from 'node:test'
import { Lazy, Memo } from '../../src/types/lazy.ts'

describe('types/Lazy', () => {
	it('should compute once', () => {
		let calls = 0
		const lazy = new Lazy(
			() => ++calls,
			() => -1
		)
		assert.strictEqual(lazy.isResolved(), false)
		assert.strictEqual(lazy.get(), 1)
		assert.strictEqual(lazy.get(), 1)
		assert.strictEqual(calls, 1)
		assert.strictEqual(lazy.isResolved(), true)
	})

	it('should take the cycle value when computing re-enters', () => {
		const lazy: Lazy<string> = new Lazy(
			() => `outer ${lazy.get()}`,
			() => 'cycle'
		)
		assert.strictEqual(lazy.get(), 'cycle')
		assert.strictEqual(lazy.get(), 'cycle')
	})

	it('should report resolving while computing', () => {
		const seen: boolean[] = []
		const lazy: Lazy<number> = new Lazy(
			() => {
				seen.push(lazy.isResolving())
				return 1
			},
			() => 0
		)
		lazy.get()
		assert.deepStrictEqual(seen, [true])
		assert.strictEqual(lazy.isResolving(), false)
	})

	it('should start resolved when built from a value', () => {
		const lazy = Lazy.resolved(7)
		assert.strictEqual(lazy.isResolved(), true)
		assert.strictEqual(lazy.get(), 7)
	})

	it('should stay unresolved when computing throws', () => {
		let fail = true
		const lazy = new Lazy(
			() => {
				if (fail) throw new Error('boom')
				return 2
			},
			() => 0
		)
		assert.throws(() => lazy.get(), /boom/)
		fail = false
		assert.strictEqual(lazy.get(), 2)
	})
})

describe('types/Memo', () => {
	it('should keep the first value', () => {
		const memo = new Memo<number>()
		assert.strictEqual(memo.peek(), undefined)
		assert.strictEqual(memo.set(1), 1)
		assert.strictEqual(memo.set(2), 1)
		assert.strictEqual(memo.peek(), 1)
	})
})
