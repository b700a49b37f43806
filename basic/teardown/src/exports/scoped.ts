import {
	brandedLog,
	SCOPED_BODY_AND_CLEANUP_FAILED,
	SCOPED_BODY_RETURNED_PROMISE,
	type Cleanable
} from '@teardown/shared'
import type { Wrapped } from '../types/Wrapped'
import { release, wrap } from './wrap'

const isThenable = (value: unknown): value is PromiseLike<unknown> =>
	typeof value === 'object' &&
	value !== null &&
	'then' in value &&
	typeof value.then === 'function'

/**
 * Run `body` with a wrapper around `inner`, and release it however `body`
 * exits. Returns whatever `body` returns.
 *
 * `body` should be synchronous. The release happens as soon as it returns, so
 * a promise it returns will settle after the object has been cleaned up.
 *
 * If `body` throws and `cleanup()` then throws too, both errors are thrown
 * together as an `AggregateError`, the body error first.
 */
export function scoped<Inner extends Cleanable, Result>(
	inner: Inner,
	body: (wrapper: Wrapped<Inner>) => Result
): Result {
	const wrapper = wrap(inner)
	let result: Result
	try {
		result = body(wrapper)
	} catch (bodyError) {
		try {
			release(wrapper)
		} catch (cleanupError) {
			throw new AggregateError(
				[bodyError, cleanupError],
				SCOPED_BODY_AND_CLEANUP_FAILED
			)
		}
		throw bodyError
	}

	release(wrapper)
	if (isThenable(result)) brandedLog(console.warn, SCOPED_BODY_RETURNED_PROMISE)
	return result
}
