import {
	brandedLog,
	can,
	identityOperationRefused,
	isMethod,
	type Cleanable,
	type Method
} from '@teardown/shared'
import type { Destroyer } from '../destroyer'
import type { Wrapped } from '../types/Wrapped'

export const destroyerKey = Symbol('teardown.destroyer')

const wrappers = new WeakSet<object>()
export const isWrapped = (value: unknown): value is Wrapped<Cleanable> =>
	typeof value === 'object' && value !== null && wrappers.has(value)

const capabilityQueries: ReadonlySet<PropertyKey> = new Set(['isA', 'can'])

function answeredByDestroyer(
	destroyer: Destroyer<Cleanable>,
	prop: PropertyKey
): boolean {
	if (prop === destroyerKey || prop === Symbol.dispose) return true
	// The wrapped object's own teardown runs through the destroyer, once.
	if (prop === 'cleanup') return true
	if (!capabilityQueries.has(prop)) return false
	// Once released, let the destroyer's own isA/can report the misuse.
	if (destroyer.released) return true
	return !can(destroyer.unwrap(prop), prop)
}

function bindOnce(cache: WeakMap<Method, Method>, fn: Method, to: object) {
	const existing = cache.get(fn)
	if (existing) return existing
	const bound = fn.bind(to)
	cache.set(fn, bound)
	return bound
}

export function createWrapper<Inner extends Cleanable>(
	destroyer: Destroyer<Inner>
): Wrapped<Inner> {
	const boundToDestroyer = new WeakMap<Method, Method>()
	const boundToInner = new WeakMap<Method, Method>()

	// The destroyer is the proxy target, so anything that inspects the wrapper
	// itself (its prototype, instanceof, own keys) sees a Destroyer.
	const target: object = destroyer
	const proxy = new Proxy(target, {
		get(_target, prop) {
			if (answeredByDestroyer(destroyer, prop)) {
				if (prop === destroyerKey) return destroyer
				const own: unknown = Reflect.get(
					destroyer,
					prop === 'cleanup' ? 'release' : prop
				)
				return isMethod(own) ? bindOnce(boundToDestroyer, own, destroyer) : own
			}

			const inner = destroyer.unwrap(prop)
			const value: unknown = Reflect.get(inner, prop, inner)
			// Left unbound so `new wrapper.constructor()` makes a plain object of
			// the wrapped class rather than another wrapper.
			if (prop === 'constructor' || !isMethod(value)) return value
			// Bound straight to the wrapped object: calling it leaves no frame
			// from this file in the callee's stack.
			return bindOnce(boundToInner, value, inner)
		},
		set(_target, prop, newValue) {
			const inner = destroyer.unwrap(prop)
			return Reflect.set(inner, prop, newValue, inner)
		},
		has(_target, prop) {
			if (answeredByDestroyer(destroyer, prop)) return true
			return Reflect.has(destroyer.unwrap(prop), prop)
		},
		deleteProperty(_target, prop) {
			return Reflect.deleteProperty(destroyer.unwrap(prop), prop)
		},
		defineProperty() {
			brandedLog(console.warn, identityOperationRefused('defineProperty'))
			return false
		},
		preventExtensions() {
			brandedLog(console.warn, identityOperationRefused('preventExtensions'))
			return false
		}
	})

	wrappers.add(proxy)
	// Proxy can only describe itself as its target's type.
	return proxy as Wrapped<Inner>
}
