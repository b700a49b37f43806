import { describe, expect, it } from 'vitest'
import {
	ConstructionError,
	NoSuchOperationError,
	NotWrappedError,
	UseAfterReleaseError
} from '.'

describe('error classes', () => {
	const errorCases = [
		{ ErrorClass: ConstructionError, name: 'ConstructionError' },
		{ ErrorClass: NoSuchOperationError, name: 'NoSuchOperationError' },
		{ ErrorClass: UseAfterReleaseError, name: 'UseAfterReleaseError' },
		{ ErrorClass: NotWrappedError, name: 'NotWrappedError' }
	] as const

	for (const { ErrorClass, name } of errorCases) {
		describe(name, () => {
			it('has correct name', () => {
				const error = new ErrorClass('test message')
				expect(error.name).toBe(name)
			})
			it('preserves message', () => {
				const error = new ErrorClass('test message')
				expect(error.message).toBe('test message')
			})
			it('is instanceof Error', () => {
				const error = new ErrorClass('test message')
				expect(error).toBeInstanceOf(Error)
			})
			it('is instanceof itself', () => {
				const error = new ErrorClass('test message')
				expect(error).toBeInstanceOf(ErrorClass)
			})
			it('has correct prototype chain', () => {
				const error = new ErrorClass('test message')
				expect(Object.getPrototypeOf(error)).toBe(ErrorClass.prototype)
			})
			it('accepts error options', () => {
				const cause = new Error('cause')
				const error = new ErrorClass('test message', { cause })
				expect(error.cause).toBe(cause)
			})
		})
	}
})
