import { describe, expect, it } from 'vitest'
import { typeOf } from '@teardown/shared'
import { Tree } from '../testing/cyclic_tree'
import { destroying } from './destroying'
import { isReleased, isWrapped, release, unwrap } from './wrap'

describe('destroying', () => {
	const plantTree = destroying(Tree)

	it('hands out wrapped instances built from the given arguments', () => {
		const wrapper = plantTree('oak')
		expect(isWrapped(wrapper)).toBe(true)
		expect(typeOf(wrapper)).toBe('Destroyer')
		expect(typeOf(unwrap(wrapper))).toBe('Tree')
		expect(wrapper.name).toBe('oak')
	})
	it('hands out a separate wrapper each time', () => {
		const first = plantTree('oak')
		const second = plantTree('elm')
		release(first)
		expect(isReleased(first)).toBe(true)
		expect(second.name).toBe('elm')
		expect(unwrap(second).cleanupCalls).toBe(0)
	})
})
