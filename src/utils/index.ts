/**
 * utils/index.ts: Barrel export for shared utility functions.
 *
 * @example
 *   import { clamp, AsyncMutex } from "../utils/index.js"
 */

export { clamp } from "./number.js"
export { AsyncMutex } from "./mutex.js"
