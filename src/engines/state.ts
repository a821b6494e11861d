import { AsyncMutex } from "../utils/mutex.js"
import type { BackendId } from "./types.js"

/**
 * Per-orchestrator mutable state. Every read-modify-write goes through
 * exclusive(); network calls never run inside it.
 */
export class OrchestratorState {
  private readonly mutex = new AsyncMutex()
  private lastUsed: BackendId | null = null
  private readonly performance = new Map<BackendId, number>()

  exclusive<T>(fn: () => T | Promise<T>): Promise<T> {
    return this.mutex.runExclusive(fn)
  }

  getLastUsed(): BackendId | null {
    return this.lastUsed
  }

  /** Rolling latency map: one entry per backend, overwritten on each success. */
  getPerformance(): ReadonlyMap<BackendId, number> {
    return new Map(this.performance)
  }

  recordSuccess(backend: BackendId, latencyMs: number): void {
    this.performance.set(backend, latencyMs)
    this.lastUsed = backend
  }
}
