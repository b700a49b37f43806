export { Destroyer } from './destroyer'
export { destroyerKey } from './helpers/forwarding'
export {
	wrap,
	release,
	isReleased,
	isWrapped,
	destroyerOf,
	unwrap
} from './exports/wrap'
export { invoke } from './exports/invoke'
export { scoped } from './exports/scoped'
export { destroying } from './exports/destroying'
export type { Wrapped, WrapperCapabilities } from './types/Wrapped'

export {
	ConstructionError,
	NoSuchOperationError,
	NotWrappedError,
	UseAfterReleaseError,
	DestroyerStatus,
	isA,
	can,
	typeOf,
	isCleanable,
	type Cleanable
} from '@teardown/shared'
