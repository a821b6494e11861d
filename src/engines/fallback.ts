/**
 * FallbackCoordinator: drives one request through the backend cascade.
 *
 *   SELECT → DISPATCH → (SUCCESS | RETRY_NEXT)* → EXHAUSTED
 *
 * Candidates are tried strictly one at a time and each backend at most once
 * per request. A rejected generate() and an empty completion are the same
 * thing here: both move on to the next candidate. When nothing is left a
 * canned reply is returned, so run() always resolves.
 *
 * @module engines/fallback
 */

import { EmptyResultError, errorMessage } from "../errors.js"
import type { FallbackResponseStore } from "../fallback/responses.js"
import { createLogger } from "../logger.js"
import type { RateLimiter } from "./rate-limiter.js"
import type { SelectionPolicy } from "./selection.js"
import type { OrchestratorState } from "./state.js"
import type {
  BackendId,
  Engine,
  EngineAttempt,
  GenerationOutcome,
  GenerationRequest,
  GenerationResult,
  Personality,
} from "./types.js"

const log = createLogger("engines.fallback")

/** Fallback table keys used when the cascade is exhausted. */
export interface ExhaustionKeys {
  /** No backend was eligible at all. */
  noBackend: string
  /** At least one backend was tried and every one failed. */
  allFailed: string
}

export const DEFAULT_EXHAUSTION_KEYS: ExhaustionKeys = {
  noBackend: "unavailable",
  allFailed: "error",
}

export interface FallbackCoordinatorOptions {
  engines: readonly Engine[]
  policy: SelectionPolicy
  state: OrchestratorState
  fallbacks: FallbackResponseStore
  rateLimiter?: RateLimiter | null
  exhaustionKeys?: ExhaustionKeys
  label?: string
}

export class FallbackCoordinator {
  private readonly engines: ReadonlyMap<BackendId, Engine>
  private readonly policy: SelectionPolicy
  private readonly state: OrchestratorState
  private readonly fallbacks: FallbackResponseStore
  private readonly rateLimiter: RateLimiter | null
  private readonly exhaustionKeys: ExhaustionKeys
  private readonly label: string

  constructor(options: FallbackCoordinatorOptions) {
    this.engines = new Map(options.engines.map((engine) => [engine.name, engine]))
    this.policy = options.policy
    this.state = options.state
    this.fallbacks = options.fallbacks
    this.rateLimiter = options.rateLimiter ?? null
    this.exhaustionKeys = options.exhaustionKeys ?? DEFAULT_EXHAUSTION_KEYS
    this.label = options.label ?? "hybrid"
  }

  /** Available engines minus the tried set, filtered by the rate limiter when present. */
  eligible(tried: ReadonlySet<BackendId>, consume = true): BackendId[] {
    const names: BackendId[] = []
    for (const engine of this.engines.values()) {
      if (tried.has(engine.name) || !engine.isAvailable()) {
        continue
      }
      if (this.rateLimiter) {
        const withinLimit = consume ? this.rateLimiter.check(engine.name) : this.rateLimiter.peek(engine.name)
        if (!withinLimit) {
          continue
        }
      }
      names.push(engine.name)
    }
    return names
  }

  /** Selection preview: no dispatch and no rate window changes. */
  preview(personality: Personality): BackendId | null {
    return this.policy.select({
      available: this.eligible(new Set(), false),
      personality,
      lastUsed: this.state.getLastUsed(),
    })
  }

  async run(request: GenerationRequest): Promise<GenerationOutcome> {
    const startedAt = Date.now()
    const tried = new Set<BackendId>()
    const attempts: EngineAttempt[] = []

    for (;;) {
      // Selection and the quota reservation share one critical section so
      // concurrent requests cannot overshoot a backend's limit.
      const candidate = await this.state.exclusive(() => {
        const selected = this.policy.select({
          available: this.eligible(tried),
          personality: request.personality,
          lastUsed: this.state.getLastUsed(),
        })
        if (selected) {
          this.rateLimiter?.reserve(selected)
        }
        return selected
      })
      if (!candidate) {
        break
      }

      tried.add(candidate)
      const engine = this.engines.get(candidate)
      if (!engine) {
        this.rateLimiter?.release(candidate)
        continue
      }

      const result = await this.dispatch(engine, request)
      if (result.success) {
        attempts.push({ backend: candidate, success: true, latencyMs: result.latencyMs })
        await this.state.exclusive(() => {
          this.state.recordSuccess(candidate, result.latencyMs)
          this.rateLimiter?.commit(candidate)
        })

        log.info("request handled", {
          orchestrator: this.label,
          engine: candidate,
          latencyMs: result.latencyMs,
          attempts: attempts.length,
        })

        return {
          response: result.text,
          backendUsed: candidate,
          latencyMs: Date.now() - startedAt,
          attempts,
          fallbackKey: null,
        }
      }

      this.rateLimiter?.release(candidate)
      attempts.push({
        backend: candidate,
        success: false,
        latencyMs: result.latencyMs,
        error: result.error,
      })
      log.warn("engine failed, trying next candidate", {
        orchestrator: this.label,
        engine: candidate,
        error: result.error,
      })
    }

    const defaultKey = attempts.length === 0 ? this.exhaustionKeys.noBackend : this.exhaustionKeys.allFailed
    const reply = this.fallbacks.replyFor(request.message, defaultKey)

    log.warn("all engines exhausted, serving canned reply", {
      orchestrator: this.label,
      key: reply.key,
      attempted: attempts.map((attempt) => attempt.backend),
    })

    return {
      response: reply.text,
      backendUsed: null,
      latencyMs: Date.now() - startedAt,
      attempts,
      fallbackKey: reply.key,
    }
  }

  private async dispatch(
    engine: Engine,
    request: GenerationRequest,
  ): Promise<GenerationResult & { error?: string }> {
    const startedAt = Date.now()
    try {
      const text = await engine.generate(request)
      const latencyMs = Date.now() - startedAt
      if (text.trim().length === 0) {
        return { text: "", backend: engine.name, latencyMs, success: false, error: new EmptyResultError(engine.name).message }
      }
      return { text, backend: engine.name, latencyMs, success: true }
    } catch (error) {
      return {
        text: "",
        backend: engine.name,
        latencyMs: Date.now() - startedAt,
        success: false,
        error: errorMessage(error),
      }
    }
  }
}
