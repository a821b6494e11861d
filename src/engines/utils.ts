import { TransientBackendError } from "../errors.js"

/**
 * Race a promise against a timeout. The underlying call is not cancelled;
 * it runs to completion in the background and its result is dropped.
 */
export function withTimeout<T>(promise: Promise<T>, ms: number, label: string): Promise<T> {
  return new Promise<T>((resolve, reject) => {
    const timer = setTimeout(() => {
      reject(new TransientBackendError(`${label} timed out after ${ms}ms`, label))
    }, ms)

    promise.then(
      (value) => {
        clearTimeout(timer)
        resolve(value)
      },
      (error: unknown) => {
        clearTimeout(timer)
        reject(error)
      },
    )
  })
}
