/**
 * Builds engines from configuration, once per process.
 *
 * Engines that fail to construct (missing key, model not installed) are kept
 * in the list so health reports can show them, but stay unavailable until the
 * process restarts.
 *
 * @module engines/registry
 */

import type { Config } from "../config.js"
import { FallbackResponseStore } from "../fallback/responses.js"
import { createLogger } from "../logger.js"
import { AnthropicEngine } from "./anthropic.js"
import { GeminiEngine } from "./gemini.js"
import { HealthMonitor } from "./health.js"
import { LocalEngine, OllamaRuntime, type LocalModelRuntime } from "./local.js"
import { OpenAIEngine } from "./openai.js"
import { Orchestrator } from "./orchestrator.js"
import { RateLimiter } from "./rate-limiter.js"
import type { Engine } from "./types.js"

const log = createLogger("engines.registry")

export type EngineTier = "standard" | "free"

export function createHostedEngines(config: Config, tier: EngineTier): Engine[] {
  const free = tier === "free"
  return [
    new OpenAIEngine({
      apiKey: config.OPENAI_API_KEY,
      model: free ? config.OPENAI_FREE_MODEL : config.OPENAI_MODEL,
      timeoutMs: config.ENGINE_TIMEOUT_MS,
    }),
    new GeminiEngine({
      apiKey: config.GEMINI_API_KEY,
      model: free ? config.GEMINI_FREE_MODEL : config.GEMINI_MODEL,
      timeoutMs: config.ENGINE_TIMEOUT_MS,
    }),
    new AnthropicEngine({
      apiKey: config.ANTHROPIC_API_KEY,
      model: free ? config.ANTHROPIC_FREE_MODEL : config.ANTHROPIC_MODEL,
      timeoutMs: config.ENGINE_TIMEOUT_MS,
    }),
  ]
}

export interface Relay {
  hybrid: Orchestrator
  freeTier: Orchestrator | null
  monitor: HealthMonitor
  fallbacks: FallbackResponseStore
}

export interface RelayOverrides {
  runtime?: LocalModelRuntime
  fallbacks?: FallbackResponseStore
}

export async function createRelay(config: Config, overrides: RelayOverrides = {}): Promise<Relay> {
  const fallbacks = overrides.fallbacks ?? FallbackResponseStore.load(config.FALLBACK_RESPONSES_FILE)

  const local = await LocalEngine.load({
    model: config.LOCAL_MODEL,
    runtime: overrides.runtime ?? new OllamaRuntime(config.OLLAMA_BASE_URL, config.ENGINE_TIMEOUT_MS),
  })
  const engines: Engine[] = [local, ...createHostedEngines(config, "standard")]

  const hybrid = new Orchestrator({
    engines,
    fallbacks,
    priority: config.ENGINE_PRIORITY,
    label: "hybrid",
  })

  let freeTier: Orchestrator | null = null
  if (config.FREE_TIER_ENABLED) {
    freeTier = new Orchestrator({
      engines: createHostedEngines(config, "free"),
      fallbacks,
      priority: config.ENGINE_PRIORITY.filter((name) => name !== "local"),
      rateLimiter: new RateLimiter(config.FREE_TIER_RATE_LIMITS),
      exhaustionKeys: { noBackend: "busy", allFailed: "unavailable" },
      label: "free_tier",
    })
  }

  const monitor = new HealthMonitor(engines, {
    probeTimeoutMs: config.HEALTH_PROBE_TIMEOUT_MS,
    degradedLatencyMs: config.HEALTH_DEGRADED_LATENCY_MS,
  })
  if (freeTier) {
    monitor.watch(freeTier.label, freeTier.getEngines())
  }

  log.info("relay ready", {
    engines: hybrid.getAvailableEngines(),
    freeTier: freeTier?.getAvailableEngines() ?? null,
  })

  return { hybrid, freeTier, monitor, fallbacks }
}
