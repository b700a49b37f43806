import {
	checkWrappable,
	notWrapped,
	NotWrappedError,
	typeOf,
	type Cleanable
} from '@teardown/shared'
import { Destroyer } from '../destroyer'
import { createWrapper, destroyerKey, isWrapped } from '../helpers/forwarding'
import type { Wrapped } from '../types/Wrapped'

/**
 * Wrap an object so that it is cleaned up exactly once, when the wrapper is
 * released or leaves a `using` block. The wrapper can be used in place of the
 * object: property reads, writes and method calls all go to the object.
 *
 * Don't store the wrapper anywhere the object itself can reach. If its own
 * `cleanup()` ends up releasing the wrapper again, that call is ignored.
 * @throws {ConstructionError} if `inner` is missing, not an object, or has no
 * `cleanup()` method.
 */
export function wrap<Inner extends Cleanable>(inner: Inner): Wrapped<Inner>
export function wrap(...input: unknown[]): Wrapped<Cleanable> {
	const inner = checkWrappable(input, 'wrap()')
	return createWrapper(new Destroyer(inner))
}

function destroyerFor<Inner extends Cleanable>(
	target: Wrapped<Inner> | Destroyer<Inner>,
	entrypoint: string
): Destroyer<Inner> {
	if (isWrapped(target)) return target[destroyerKey]
	if (target instanceof Destroyer) return target
	throw new NotWrappedError(notWrapped(entrypoint, typeOf(target)))
}

/**
 * Clean up the wrapped object now. Only the first call does anything, however
 * many times this is called and whether or not the wrapper is also disposed.
 */
export function release(target: Wrapped<Cleanable> | Destroyer<Cleanable>) {
	destroyerFor(target, 'release()').release()
}

export function isReleased(
	target: Wrapped<Cleanable> | Destroyer<Cleanable>
): boolean {
	return destroyerFor(target, 'isReleased()').released
}

export function destroyerOf<Inner extends Cleanable>(
	wrapper: Wrapped<Inner>
): Destroyer<Inner> {
	return destroyerFor(wrapper, 'destroyerOf()')
}

/**
 * Get the object behind a wrapper, for the odd case where the wrapper itself
 * won't do (identity checks, `Object.keys`, passing it to code that inspects
 * prototypes).
 * @throws {UseAfterReleaseError} once the wrapper has been released.
 */
export function unwrap<Inner extends Cleanable>(
	target: Wrapped<Inner> | Destroyer<Inner>
): Inner {
	return destroyerFor(target, 'unwrap()').unwrap()
}

export { isWrapped }
