import type { Cleanable } from '@teardown/shared'
import type { Wrapped } from '../types/Wrapped'
import { wrap } from './wrap'

/**
 * Turn a class whose instances always end up in reference cycles into a
 * factory that hands out wrapped instances, so callers never see the bare
 * object.
 *
 * ```ts
 * const openDocument = destroying(Document)
 * using doc = openDocument('notes.md')
 * ```
 */
export function destroying<Args extends unknown[], Inner extends Cleanable>(
	Class: new (...args: Args) => Inner
): (...args: Args) => Wrapped<Inner> {
	return (...args) => wrap(new Class(...args))
}
