import type { Cleanable, Constructor, Method } from '@teardown/shared'
import type { Destroyer } from '../destroyer'
import type { destroyerKey } from '../helpers/forwarding'

/**
 * What a wrapper adds on top of the object it wraps. `isA` and `can` are only
 * answered by the wrapper when the wrapped object has no methods of those
 * names; otherwise the call goes straight to the wrapped object.
 */
export type WrapperCapabilities<Inner extends Cleanable> = {
	[destroyerKey]: Destroyer<Inner>
	isA(type: Constructor): boolean
	can(name: PropertyKey): Method | undefined
}

export type Wrapped<Inner extends Cleanable> = Inner &
	WrapperCapabilities<Inner> &
	Disposable
