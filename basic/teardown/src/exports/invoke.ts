import {
	can,
	noSuchOperation,
	NoSuchOperationError,
	typeOf
} from '@teardown/shared'
import { destroyerKey, isWrapped } from '../helpers/forwarding'

/**
 * Call `operation` by name. On a wrapper the name is looked up on, and called
 * against, the wrapped object; on anything else, against `target` itself. A
 * missing method fails the same way in both cases.
 * @throws {NoSuchOperationError} when there is no such method.
 * @throws {UseAfterReleaseError} when `target` is a released wrapper.
 */
export function invoke(
	target: object,
	operation: PropertyKey,
	...args: unknown[]
): unknown {
	// Same as calling cleanup() on the wrapper: a release, at most once.
	if (isWrapped(target) && operation === 'cleanup')
		return target[destroyerKey].release()

	const receiver: object = isWrapped(target)
		? target[destroyerKey].unwrap(operation)
		: target

	const method = can(receiver, operation)
	if (!method)
		throw new NoSuchOperationError(
			noSuchOperation(String(operation), typeOf(receiver))
		)
	return Reflect.apply(method, receiver, args)
}
