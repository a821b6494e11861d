/**
 * Gateway server: HTTP transport for the relay.
 *
 * This file is responsible ONLY for:
 *   - HTTP route definitions and request validation
 *   - Mapping orchestrator outcomes onto response bodies
 *   - Trying the free-tier orchestrator when the hybrid one served a canned reply
 *
 * What this file does NOT do:
 *   - Backend selection or fallback (lives in engines/fallback.ts)
 *   - Provider calls (lives in engines/*)
 *   - Health classification (lives in engines/health.ts)
 *
 * Latencies in response bodies are seconds, timestamps are ISO-8601.
 */

import Fastify, { type FastifyInstance } from "fastify"
import { z } from "zod"

import { createLogger } from "../logger.js"
import type { HealthMonitor } from "../engines/health.js"
import type { Orchestrator } from "../engines/orchestrator.js"
import type { GenerationOutcome } from "../engines/types.js"

const logger = createLogger("gateway")

export const SERVICE_NAME = "Hybrid Completion Relay"

const chatBodySchema = z.object({
  message: z.string(),
  personality: z.string().default("helpful"),
  max_tokens: z.number().int().positive().default(150),
  temperature: z.number().min(0).max(1).default(0.7),
})

export interface GatewayDeps {
  hybrid: Orchestrator
  freeTier: Orchestrator | null
  monitor: HealthMonitor
  version: string
}

function seconds(ms: number): number {
  return Math.round(ms) / 1000
}

function errorBody(error: string, detail: unknown): Record<string, unknown> {
  return { error, detail, timestamp: new Date().toISOString() }
}

export class GatewayServer {
  readonly app: FastifyInstance = Fastify({ logger: false })

  constructor(
    private readonly deps: GatewayDeps,
    private readonly port = 8000,
    private readonly host = "127.0.0.1",
  ) {
    this.registerRoutes()
  }

  private registerRoutes(): void {
    this.app.setErrorHandler((error, _req, reply) => {
      logger.error("unhandled request error", error)
      void reply.code(500).send(errorBody("Internal Server Error", "An unexpected error occurred"))
    })

    this.app.get("/", async () => ({
      name: SERVICE_NAME,
      version: this.deps.version,
      services: this.deps.hybrid.getAvailableEngines(),
      health: "/health",
    }))

    this.app.get("/health", async () => {
      const report = await this.deps.monitor.check()
      return {
        status: report.status,
        timestamp: report.timestamp.toISOString(),
        services: report.services.map((service) => ({
          name: service.name,
          status: service.status,
          last_check: service.lastCheck.toISOString(),
          latency: service.latencyMs === null ? null : seconds(service.latencyMs),
          error: service.error,
        })),
        uptime: report.uptimeSeconds,
      }
    })

    this.app.get("/services", async () => ({
      available_services: this.deps.hybrid.getAvailableEngines(),
      recommended: this.deps.hybrid.recommend("helpful"),
      details: this.serviceDetails(),
    }))

    this.app.post("/chat", async (req, reply) => {
      const parsed = chatBodySchema.safeParse(req.body)
      if (!parsed.success) {
        return reply.code(400).send(
          errorBody(
            "Invalid request",
            parsed.error.issues.map((issue) => `${issue.path.join(".") || "body"}: ${issue.message}`),
          ),
        )
      }

      const body = parsed.data
      const outcome = await this.chat(body.message, body.personality, body.max_tokens, body.temperature)

      return {
        response: outcome.response,
        backend_used: outcome.backendUsed ?? "fallback",
        latency: seconds(outcome.latencyMs),
        timestamp: new Date().toISOString(),
      }
    })
  }

  private async chat(
    message: string,
    personality: string,
    maxTokens: number,
    temperature: number,
  ): Promise<GenerationOutcome> {
    const primary = await this.deps.hybrid.generateDetailed(message, personality, maxTokens, temperature)
    if (primary.backendUsed !== null || !this.deps.freeTier) {
      return primary
    }

    logger.info("hybrid orchestrator exhausted, trying free tier")
    const secondary = await this.deps.freeTier.generateDetailed(message, personality, maxTokens, temperature)
    if (secondary.backendUsed === null) {
      return { ...primary, latencyMs: primary.latencyMs + secondary.latencyMs }
    }
    return { ...secondary, latencyMs: primary.latencyMs + secondary.latencyMs }
  }

  private serviceDetails(): Record<string, Record<string, unknown>> {
    const performance = this.deps.hybrid.getPerformance()
    const freeTier = this.deps.freeTier
    const limiter = freeTier?.getRateLimiter() ?? null
    const details: Record<string, Record<string, unknown>> = {}

    for (const engine of this.deps.hybrid.getEngines()) {
      const freeEngine = freeTier?.getEngines().find((candidate) => candidate.name === engine.name)
      const lastLatency = performance.get(engine.name)
      details[engine.name] = {
        type: engine.name === "local" ? "local" : "cloud",
        provider: engine.provider,
        model: engine.defaultModel,
        available: engine.isAvailable(),
        last_latency: lastLatency === undefined ? null : seconds(lastLatency),
        free_tier: freeEngine
          ? {
              model: freeEngine.defaultModel,
              available: freeEngine.isAvailable(),
              rate_limit_per_minute: limiter?.limitFor(engine.name) ?? null,
              remaining: limiter?.remaining(engine.name) ?? null,
            }
          : null,
      }
    }

    return details
  }

  async start(): Promise<void> {
    await this.app.listen({ port: this.port, host: this.host })
    logger.info(`gateway running at http://${this.host}:${this.port}`)
  }

  async stop(): Promise<void> {
    await this.app.close()
  }
}
