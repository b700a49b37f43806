import {
	brandedLog,
	can,
	checkWrappable,
	DestroyerStatus,
	isA,
	RELEASE_DURING_CLEANUP,
	useAfterRelease,
	UseAfterReleaseError,
	type Cleanable,
	type Constructor,
	type Method
} from '@teardown/shared'

type DestroyerState<Inner extends Cleanable> =
	| {
			status: DestroyerStatus.Live
			inner: Inner
	  }
	| { status: DestroyerStatus.Releasing }
	| { status: DestroyerStatus.Released }

/**
 * Owns the decision to call `cleanup()` on one object, and makes sure that
 * happens at most once.
 *
 * It can be used on its own as a handle that cleans up when it leaves scope:
 *
 * ```ts
 * using cleaner = new Destroyer(tree)
 * ```
 *
 * or sit behind a wrapper created by `wrap()`, which forwards everything else
 * to the object.
 */
export class Destroyer<Inner extends Cleanable> implements Disposable {
	// Private names rather than properties, so a wrapper built over this
	// destroyer has no own keys of its own.
	#state: DestroyerState<Inner>

	constructor(inner: Inner, ...extra: never[]) {
		checkWrappable([inner, ...extra], 'new Destroyer()')
		this.#state = { status: DestroyerStatus.Live, inner }
	}

	public get status(): DestroyerStatus {
		return this.#state.status
	}
	public get released(): boolean {
		return this.#state.status !== DestroyerStatus.Live
	}

	/**
	 * Get the object this destroyer will clean up.
	 * @param operation What the caller wants it for, used in the error message.
	 */
	public unwrap(operation: PropertyKey = 'unwrap'): Inner {
		const state = this.#state
		if (state.status !== DestroyerStatus.Live)
			throw new UseAfterReleaseError(useAfterRelease(String(operation)))
		return state.inner
	}

	public release(): void {
		const state = this.#state
		if (state.status === DestroyerStatus.Released) return
		if (state.status === DestroyerStatus.Releasing) {
			brandedLog(console.warn, RELEASE_DURING_CLEANUP)
			return
		}

		// The status moves on before cleanup() runs, so a cleanup that throws
		// or calls back into release() can't cause a second run.
		this.#state = { status: DestroyerStatus.Releasing }
		try {
			state.inner.cleanup()
		} finally {
			this.#state = { status: DestroyerStatus.Released }
		}
	}

	[Symbol.dispose]() {
		this.release()
	}

	/** Whether the wrapped object is an instance of `type`. */
	public isA(type: Constructor): boolean {
		return isA(this.unwrap('isA'), type)
	}

	/** The method the wrapped object would run for `name`, if it has one. */
	public can(name: PropertyKey): Method | undefined {
		return can(this.unwrap('can'), name)
	}
}
