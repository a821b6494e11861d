/**
 * HealthMonitor: on-demand probe of every known backend.
 *
 * Probes fan out concurrently, so a full check takes as long as the slowest
 * single probe. Each probe is a tiny request under its own short timeout.
 *
 *   unconfigured / rejected / timed out → unhealthy
 *   empty completion / slower than degradedLatencyMs → degraded
 *   otherwise → healthy
 *
 * The report status is the worst individual status. Probes never touch the
 * orchestrators' selection state or rate windows.
 *
 * Engines passed to the constructor report under their backend id. Extra
 * groups added with watch() report as "<group>.<backend>".
 *
 * @module engines/health
 */

import { errorMessage } from "../errors.js"
import { createLogger } from "../logger.js"
import type { Clock } from "./rate-limiter.js"
import type { Engine, GenerationRequest, HealthReport, HealthStatus, ServiceHealth } from "./types.js"
import { withTimeout } from "./utils.js"

const log = createLogger("engines.health")

const SEVERITY: Record<HealthStatus, number> = {
  healthy: 0,
  degraded: 1,
  unhealthy: 2,
}

const PROBE_REQUEST: GenerationRequest = Object.freeze({
  message: "Hello",
  personality: "helpful",
  maxTokens: 5,
  temperature: 0,
})

export interface HealthMonitorOptions {
  probeTimeoutMs: number
  degradedLatencyMs: number
  now?: Clock
}

/** Worst status wins. No services at all is reported as unhealthy. */
export function aggregateStatus(statuses: readonly HealthStatus[]): HealthStatus {
  if (statuses.length === 0) {
    return "unhealthy"
  }
  return statuses.reduce<HealthStatus>(
    (worst, status) => (SEVERITY[status] > SEVERITY[worst] ? status : worst),
    "healthy",
  )
}

interface HealthTarget {
  name: string
  engine: Engine
}

export class HealthMonitor {
  private readonly now: Clock
  private readonly startedAt: number
  private readonly targets: HealthTarget[]

  constructor(
    engines: readonly Engine[],
    private readonly options: HealthMonitorOptions,
  ) {
    this.now = options.now ?? Date.now
    this.startedAt = this.now()
    this.targets = engines.map((engine) => ({ name: engine.name, engine }))
  }

  /** Adds another set of engines to every later check. */
  watch(group: string, engines: readonly Engine[]): void {
    for (const engine of engines) {
      this.targets.push({ name: `${group}.${engine.name}`, engine })
    }
  }

  async probe(engine: Engine, name: string = engine.name): Promise<ServiceHealth> {
    if (!engine.isAvailable()) {
      return {
        name,
        status: "unhealthy",
        lastCheck: new Date(this.now()),
        latencyMs: null,
        error: engine.unavailableReason ?? "not configured",
      }
    }

    const startedAt = this.now()
    try {
      const text = await withTimeout(engine.generate(PROBE_REQUEST), this.options.probeTimeoutMs, engine.name)
      const latencyMs = this.now() - startedAt

      if (text.trim().length === 0) {
        return { name, status: "degraded", lastCheck: new Date(this.now()), latencyMs, error: "empty completion" }
      }
      if (latencyMs > this.options.degradedLatencyMs) {
        return {
          name,
          status: "degraded",
          lastCheck: new Date(this.now()),
          latencyMs,
          error: `slow response (${latencyMs}ms)`,
        }
      }
      return { name, status: "healthy", lastCheck: new Date(this.now()), latencyMs, error: null }
    } catch (error) {
      log.warn("health probe failed", { service: name, error: errorMessage(error) })
      return {
        name,
        status: "unhealthy",
        lastCheck: new Date(this.now()),
        latencyMs: this.now() - startedAt,
        error: errorMessage(error),
      }
    }
  }

  async check(): Promise<HealthReport> {
    const services = await Promise.all(this.targets.map((target) => this.probe(target.engine, target.name)))
    const status = aggregateStatus(services.map((service) => service.status))

    log.debug("health check complete", {
      status,
      services: services.map((service) => `${service.name}:${service.status}`),
    })

    return {
      status,
      timestamp: new Date(this.now()),
      services,
      uptimeSeconds: (this.now() - this.startedAt) / 1000,
    }
  }
}
