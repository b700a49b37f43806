import { typeOf } from '../capabilities'
import { ConstructionError } from '../errors'
import {
	missingCleanup,
	notAnObject,
	nothingToWrap,
	wrongArgumentCount
} from '../errors/messages'
import type { Cleanable } from '../types/Cleanable'
import { isCleanable } from '../zod/Cleanable'

/**
 * Check the full argument list given to a construction entry point and return
 * the single object it is allowed to hold.
 * @param input Everything the caller passed, so extra arguments are caught too.
 * @param entrypoint How the entry point should be named in error messages.
 */
export function checkWrappable(
	input: ArrayLike<unknown>,
	entrypoint: string
): Cleanable {
	if (input.length !== 1)
		throw new ConstructionError(wrongArgumentCount(entrypoint, input.length))

	const candidate = input[0]
	if (candidate === null || candidate === undefined)
		throw new ConstructionError(nothingToWrap(entrypoint))
	if (typeof candidate !== 'object')
		throw new ConstructionError(notAnObject(entrypoint, typeof candidate))
	if (!isCleanable(candidate))
		throw new ConstructionError(missingCleanup(entrypoint, typeOf(candidate)))

	return candidate
}
