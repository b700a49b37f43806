import { custom } from 'zod'
import type { Cleanable } from '../types/Cleanable'

// Any object counts, arrays and class instances included, as long as a
// cleanup method is reachable on it.
export const CleanableSchema = custom<Cleanable>(
	(value) =>
		typeof value === 'object' &&
		value !== null &&
		'cleanup' in value &&
		typeof value.cleanup === 'function'
)
export const isCleanable = (obj: unknown): obj is Cleanable =>
	CleanableSchema.safeParse(obj).success
