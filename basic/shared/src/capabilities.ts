import type { Constructor, Method } from './types/Cleanable'

// None of these go through a proxy's `get` trap, so asking them about a
// wrapper describes the wrapper itself rather than the object inside it.

export function typeOf(value: unknown): string {
	if (value === null) return 'null'
	if (typeof value !== 'object' && typeof value !== 'function')
		return typeof value

	const prototype: object | null = Object.getPrototypeOf(value)
	if (prototype === null) return 'Object'

	const constructor: unknown = Object.getOwnPropertyDescriptor(
		prototype,
		'constructor'
	)?.value
	if (typeof constructor === 'function' && constructor.name)
		return constructor.name
	return 'Object'
}

export function isA(value: unknown, type: Constructor): boolean {
	return value instanceof type
}

/**
 * Find the method that `value` would run for `name`, looking only at property
 * descriptors along its prototype chain. Getters and plain data properties do
 * not count as methods.
 */
export function can(value: unknown, name: PropertyKey): Method | undefined {
	let current: object | null =
		(typeof value === 'object' || typeof value === 'function') &&
		value !== null
			? value
			: null

	while (current !== null) {
		const descriptor = Object.getOwnPropertyDescriptor(current, name)
		if (descriptor) {
			const method: unknown = descriptor.value
			return isMethod(method) ? method : undefined
		}
		current = Object.getPrototypeOf(current)
	}
	return undefined
}

export const isMethod = (value: unknown): value is Method =>
	typeof value === 'function'
