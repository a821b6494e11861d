/**
 * Error taxonomy for the completion relay.
 *
 * None of these cross the FallbackCoordinator boundary: configuration errors
 * disable an engine for the process lifetime, transient and empty results
 * move the cascade to the next candidate.
 */

export class RelayError extends Error {
  constructor(
    message: string,
    public readonly backend: string | null,
    options?: { cause?: unknown },
  ) {
    super(message, options)
    this.name = "RelayError"
  }
}

/** Missing credential or local model at construction time. */
export class ConfigurationError extends RelayError {
  constructor(message: string, backend: string, options?: { cause?: unknown }) {
    super(message, backend, options)
    this.name = "ConfigurationError"
  }
}

/** Network failure, timeout, non-2xx status or malformed payload on one call. */
export class TransientBackendError extends RelayError {
  public readonly statusCode: number | undefined

  constructor(message: string, backend: string, options?: { cause?: unknown; statusCode?: number }) {
    super(message, backend, { cause: options?.cause })
    this.name = "TransientBackendError"
    this.statusCode = options?.statusCode
  }
}

/** A syntactically valid completion with no text in it. */
export class EmptyResultError extends RelayError {
  constructor(backend: string) {
    super(`${backend} returned an empty completion`, backend)
    this.name = "EmptyResultError"
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error)
}

/** Pulls an HTTP status off SDK errors, which all expose a numeric `status`. */
export function statusOf(error: unknown): number | undefined {
  if (typeof error === "object" && error !== null && "status" in error && typeof error.status === "number") {
    return error.status
  }
  return undefined
}

export function toTransient(error: unknown, backend: string): TransientBackendError {
  if (error instanceof TransientBackendError) {
    return error
  }
  return new TransientBackendError(`${backend} request failed: ${errorMessage(error)}`, backend, {
    cause: error,
    statusCode: statusOf(error),
  })
}
