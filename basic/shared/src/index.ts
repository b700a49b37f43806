export * from './errors'
export * from './errors/messages'
export * from './common/branded_log'
export * from './capabilities'
export * from './validation/check_wrappable'
export * from './zod/Cleanable'
export { DestroyerStatus } from './types/DestroyerStatus'
export type { Cleanable, Constructor, Method } from './types/Cleanable'
