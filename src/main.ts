/**
 * main.ts: relay entry point.
 *
 * Responsibilities:
 *   - Build engines and orchestrators from configuration (once per process)
 *   - Start the HTTP gateway
 *   - Close the gateway and log stream on SIGINT / SIGTERM
 *
 * This file should remain thin. Cascade logic lives in src/engines/, the
 * transport in src/gateway/server.ts.
 */

import config from "./config.js"
import { createRelay } from "./engines/registry.js"
import { GatewayServer } from "./gateway/server.js"
import { closeLogStream, createLogger } from "./logger.js"

const log = createLogger("main")

export const VERSION = "1.0.0"

async function main(): Promise<void> {
  log.info("starting hybrid-relay", { version: VERSION })

  const relay = await createRelay(config)
  const gateway = new GatewayServer(
    {
      hybrid: relay.hybrid,
      freeTier: relay.freeTier,
      monitor: relay.monitor,
      version: VERSION,
    },
    config.GATEWAY_PORT,
    config.GATEWAY_HOST,
  )

  const shutdown = async (signal: string): Promise<void> => {
    log.info("shutting down", { signal })
    try {
      await gateway.stop()
    } finally {
      closeLogStream()
    }
  }

  for (const signal of ["SIGINT", "SIGTERM"] as const) {
    process.once(signal, () => {
      shutdown(signal)
        .then(() => process.exit(0))
        .catch((error: unknown) => {
          log.error("shutdown failed", error)
          process.exit(1)
        })
    })
  }

  await gateway.start()
}

main().catch((error: unknown) => {
  log.error("fatal startup error", error)
  process.exit(1)
})
