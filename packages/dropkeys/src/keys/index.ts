/**
 * Key management barrel export.
 */

export { KeyManager } from './manager.js'
export type { KeyManagerOptions } from './manager.js'
