import { describe, expect, it } from 'vitest'
import { checkWrappable } from './check_wrappable'
import { ConstructionError } from '../errors'

class Tree {
	cleanup() {}
}
class Leaf {}

describe('checkWrappable', () => {
	it('returns the single cleanable argument', () => {
		const tree = new Tree()
		expect(checkWrappable([tree], 'wrap()')).toBe(tree)

		const plain = { cleanup: () => {} }
		expect(checkWrappable([plain], 'wrap()')).toBe(plain)
	})
	it('accepts an array that has a cleanup method', () => {
		const list = Object.assign(['a', 'b'], { cleanup() {} })
		expect(checkWrappable([list], 'wrap()')).toBe(list)
	})

	describe('rejects', () => {
		const cases = [
			{
				label: 'no arguments',
				input: [],
				message:
					'wrap() takes exactly one object to destroy, but received 0 arguments.'
			},
			{
				label: 'extra arguments',
				input: [new Tree(), 'extra'],
				message:
					'wrap() takes exactly one object to destroy, but received 2 arguments.'
			},
			{
				label: 'null',
				input: [null],
				message: 'Did not pass wrap() an object to destroy. Received nothing.'
			},
			{
				label: 'undefined',
				input: [undefined],
				message: 'Did not pass wrap() an object to destroy. Received nothing.'
			},
			{
				label: 'a primitive',
				input: [42],
				message: 'Did not pass wrap() an object to destroy. Received a number.'
			},
			{
				label: 'a function',
				input: [() => {}],
				message:
					'Did not pass wrap() an object to destroy. Received a function.'
			},
			{
				label: 'a plain object without cleanup',
				input: [{}],
				message: 'wrap() requires that Object has a cleanup() method.'
			},
			{
				label: 'a class instance without cleanup',
				input: [new Leaf()],
				message: 'wrap() requires that Leaf has a cleanup() method.'
			},
			{
				label: 'a cleanup that is not a function',
				input: [{ cleanup: 'later' }],
				message: 'wrap() requires that Object has a cleanup() method.'
			}
		]

		for (const { label, input, message } of cases) {
			it(label, () => {
				expect(() => checkWrappable(input, 'wrap()')).toThrow(
					ConstructionError
				)
				expect(() => checkWrappable(input, 'wrap()')).toThrow(message)
			})
		}
	})
})
