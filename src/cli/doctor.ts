/**
 * doctor: one-shot health check from the command line.
 *
 * Builds the engines exactly as the gateway does, probes them once and prints
 * one line per backend. Exits 1 when the aggregate status is unhealthy.
 */

import config from "../config.js"
import { createRelay } from "../engines/registry.js"
import type { HealthReport, HealthStatus } from "../engines/types.js"
import { closeLogStream, createLogger } from "../logger.js"

const log = createLogger("cli.doctor")

function icon(status: HealthStatus): string {
  if (status === "healthy") return "OK"
  if (status === "degraded") return "WARN"
  return "ERR"
}

export function formatReport(report: HealthReport): string[] {
  const lines = report.services.map((service) => {
    const latency = service.latencyMs === null ? "-" : `${service.latencyMs}ms`
    const detail = service.error ? ` (${service.error})` : ""
    return `[${icon(service.status).padEnd(4)}] ${service.name.padEnd(9)} ${latency}${detail}`
  })
  lines.push(`overall: ${report.status}`)
  return lines
}

export async function runDoctor(): Promise<number> {
  const relay = await createRelay(config)
  const report = await relay.monitor.check()
  for (const line of formatReport(report)) {
    process.stdout.write(`${line}\n`)
  }
  return report.status === "unhealthy" ? 1 : 0
}

if (process.argv[1]?.endsWith("doctor.js") || process.argv[1]?.endsWith("doctor.ts")) {
  runDoctor()
    .then((code) => {
      closeLogStream()
      process.exit(code)
    })
    .catch((error: unknown) => {
      log.error("doctor failed", error)
      process.exit(1)
    })
}
