/**
 * Anything that knows how to take itself apart. `cleanup()` is not assumed to
 * be safe to call twice; a `Destroyer` guarantees it runs at most once.
 */
export type Cleanable = {
	cleanup(): unknown
}

export type Method = (...args: never[]) => unknown

export type Constructor<Instance = unknown> = abstract new (
	...args: never[]
) => Instance
