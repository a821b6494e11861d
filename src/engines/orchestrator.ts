/**
 * Orchestrator: the public entry point for completions.
 *
 * Composes selection, the fallback cascade and the canned-reply store:
 *   - generateResponse()       resolves to text, never rejects
 *   - generateResponseAsync()  same contract, cascade deferred to a later turn of the event loop
 *   - generateDetailed()       same cascade, with backend attribution for transports
 *
 * Two flavours are built by the registry: the hybrid orchestrator (local model
 * plus hosted APIs) and the free-tier orchestrator (hosted APIs on cheaper
 * models, gated by a per-minute RateLimiter).
 *
 * After every successful generation the last-used engine and its latency are
 * updated. Callers read getLastUsedEngine() for telemetry; never hardcode
 * provider names in callers.
 *
 * @module engines/orchestrator
 */

import { setImmediate as nextTurn } from "node:timers/promises"

import { errorMessage } from "../errors.js"
import type { FallbackResponseStore } from "../fallback/responses.js"
import { createLogger } from "../logger.js"
import { clamp } from "../utils/index.js"
import { DEFAULT_EXHAUSTION_KEYS, FallbackCoordinator, type ExhaustionKeys } from "./fallback.js"
import { normalizePersonality } from "./personality.js"
import type { RateLimiter } from "./rate-limiter.js"
import { DEFAULT_PRIORITY, SelectionPolicy } from "./selection.js"
import { OrchestratorState } from "./state.js"
import type { BackendId, Engine, GenerationOutcome, GenerationRequest } from "./types.js"

const log = createLogger("engines.orchestrator")

export const DEFAULT_MAX_TOKENS = 150
export const DEFAULT_TEMPERATURE = 0.7

export interface OrchestratorOptions {
  engines: readonly Engine[]
  fallbacks: FallbackResponseStore
  /** Static priority order; externally configurable. */
  priority?: readonly BackendId[]
  rateLimiter?: RateLimiter
  exhaustionKeys?: ExhaustionKeys
  /** Used in log lines to tell orchestrators apart. */
  label?: string
  random?: () => number
}

export interface LastUsedEngine {
  backend: BackendId
  provider: string
  model: string
}

export function buildRequest(
  message: string,
  personality?: string,
  maxTokens?: number,
  temperature?: number,
): GenerationRequest {
  return Object.freeze({
    message,
    personality: normalizePersonality(personality),
    maxTokens:
      maxTokens !== undefined && Number.isFinite(maxTokens) && maxTokens > 0
        ? Math.floor(maxTokens)
        : DEFAULT_MAX_TOKENS,
    temperature:
      temperature !== undefined && Number.isFinite(temperature)
        ? clamp(temperature, 0, 1)
        : DEFAULT_TEMPERATURE,
  })
}

export class Orchestrator {
  readonly label: string
  private readonly engines: readonly Engine[]
  private readonly fallbacks: FallbackResponseStore
  private readonly state = new OrchestratorState()
  private readonly rateLimiter: RateLimiter | null
  private readonly coordinator: FallbackCoordinator

  constructor(options: OrchestratorOptions) {
    this.label = options.label ?? "hybrid"
    this.engines = [...options.engines]
    this.fallbacks = options.fallbacks
    this.rateLimiter = options.rateLimiter ?? null
    this.coordinator = new FallbackCoordinator({
      engines: this.engines,
      policy: new SelectionPolicy(options.priority ?? DEFAULT_PRIORITY, options.random),
      state: this.state,
      fallbacks: this.fallbacks,
      rateLimiter: this.rateLimiter,
      exhaustionKeys: options.exhaustionKeys ?? DEFAULT_EXHAUSTION_KEYS,
      label: this.label,
    })

    const available = this.getAvailableEngines()
    if (available.length > 0) {
      log.info("engines ready", { orchestrator: this.label, engines: available })
    } else {
      log.warn("no engines available", { orchestrator: this.label })
    }
  }

  async generateDetailed(
    message: string,
    personality: string = "helpful",
    maxTokens: number = DEFAULT_MAX_TOKENS,
    temperature: number = DEFAULT_TEMPERATURE,
  ): Promise<GenerationOutcome> {
    const startedAt = Date.now()
    try {
      return await this.coordinator.run(buildRequest(message, personality, maxTokens, temperature))
    } catch (error) {
      log.error("cascade failed unexpectedly", { orchestrator: this.label, error: errorMessage(error) })
      return {
        response: this.fallbacks.get("error"),
        backendUsed: null,
        latencyMs: Date.now() - startedAt,
        attempts: [],
        fallbackKey: "error",
      }
    }
  }

  async generateResponse(
    message: string,
    personality: string = "helpful",
    maxTokens: number = DEFAULT_MAX_TOKENS,
    temperature: number = DEFAULT_TEMPERATURE,
  ): Promise<string> {
    const outcome = await this.generateDetailed(message, personality, maxTokens, temperature)
    return outcome.response
  }

  /**
   * Offloads the whole cascade past the current event-loop turn. Retry
   * semantics are identical to generateResponse(); abandoning the returned
   * promise does not cancel in-flight backend calls.
   */
  async generateResponseAsync(
    message: string,
    personality: string = "helpful",
    maxTokens: number = DEFAULT_MAX_TOKENS,
    temperature: number = DEFAULT_TEMPERATURE,
  ): Promise<string> {
    await nextTurn()
    return this.generateResponse(message, personality, maxTokens, temperature)
  }

  getEngines(): readonly Engine[] {
    return this.engines
  }

  getAvailableEngines(): BackendId[] {
    return this.engines.filter((engine) => engine.isAvailable()).map((engine) => engine.name)
  }

  /** Returns null if no generation has succeeded yet. */
  getLastUsedEngine(): LastUsedEngine | null {
    const backend = this.state.getLastUsed()
    const engine = this.engines.find((candidate) => candidate.name === backend)
    if (!backend || !engine) {
      return null
    }
    return { backend, provider: engine.provider, model: engine.defaultModel }
  }

  getPerformance(): ReadonlyMap<BackendId, number> {
    return this.state.getPerformance()
  }

  getRateLimiter(): RateLimiter | null {
    return this.rateLimiter
  }

  /** The backend the next request with this personality would start on. */
  recommend(personality: string = "helpful"): BackendId | null {
    return this.coordinator.preview(normalizePersonality(personality))
  }
}
