export class ConstructionError extends Error {
	constructor(...input: ConstructorParameters<typeof Error>) {
		super(...input)
		this.name = 'ConstructionError'

		Object.setPrototypeOf(this, ConstructionError.prototype)
	}
}
export class NoSuchOperationError extends Error {
	constructor(...input: ConstructorParameters<typeof Error>) {
		super(...input)
		this.name = 'NoSuchOperationError'

		Object.setPrototypeOf(this, NoSuchOperationError.prototype)
	}
}
export class UseAfterReleaseError extends Error {
	constructor(...input: ConstructorParameters<typeof Error>) {
		super(...input)
		this.name = 'UseAfterReleaseError'

		Object.setPrototypeOf(this, UseAfterReleaseError.prototype)
	}
}
export class NotWrappedError extends Error {
	constructor(...input: ConstructorParameters<typeof Error>) {
		super(...input)
		this.name = 'NotWrappedError'

		Object.setPrototypeOf(this, NotWrappedError.prototype)
	}
}
