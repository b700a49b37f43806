/* v8 ignore start */

const WRAPPER_CYCLE =
	'This usually means something inside the wrapped object holds a reference back to its own wrapper, which teardown does not support.'

export const RELEASE_DURING_CLEANUP = `release() was called again while the wrapped object was still running cleanup(). The second call was ignored. ${WRAPPER_CYCLE}`
export const SCOPED_BODY_RETURNED_PROMISE =
	'The body passed to scoped() returned a promise. The wrapped object was cleaned up as soon as the body returned, so anything that runs after the promise settles must not use the wrapper.'
export const SCOPED_BODY_AND_CLEANUP_FAILED =
	'The body passed to scoped() threw, and so did cleanup() while releasing afterwards. Both errors are attached, the body error first.'

// @__PURE__
export const wrongArgumentCount = (entrypoint: string, count: number) =>
	`${entrypoint} takes exactly one object to destroy, but received ${count} arguments.`
// @__PURE__
export const nothingToWrap = (entrypoint: string) =>
	`Did not pass ${entrypoint} an object to destroy. Received nothing.`
// @__PURE__
export const notAnObject = (entrypoint: string, received: string) =>
	`Did not pass ${entrypoint} an object to destroy. Received a ${received}.`
// @__PURE__
export const missingCleanup = (entrypoint: string, typeName: string) =>
	`${entrypoint} requires that ${typeName} has a cleanup() method.`
// @__PURE__
export const noSuchOperation = (operation: string, typeName: string) =>
	`Can't locate method "${operation}" via class "${typeName}"`
// @__PURE__
export const useAfterRelease = (operation: string) =>
	`Tried to use "${operation}" through a wrapper whose object has already been cleaned up.`
// @__PURE__
export const notWrapped = (entrypoint: string, typeName: string) =>
	`${entrypoint} expects a wrapper or a Destroyer, but was given something of type ${typeName}.`
// @__PURE__
export const identityOperationRefused = (trap: string) =>
	`${trap}() was attempted on a wrapper. That would change the wrapper itself rather than the wrapped object, so it was refused. Use unwrap() to reach the wrapped object directly.`
