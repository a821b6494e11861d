import { describe, expect, it } from "vitest"

import { parseConfig } from "../../src/config.js"
import type { LocalModelHandle, LocalModelRuntime } from "../../src/engines/local.js"
import { createHostedEngines, createRelay } from "../../src/engines/registry.js"
import { createStore } from "../helpers.js"

const runtime: LocalModelRuntime = {
  async load(model: string): Promise<LocalModelHandle> {
    return { model, generate: async () => "local reply" }
  },
}

describe("createHostedEngines", () => {
  it("uses the cheaper models for the free tier", () => {
    const config = parseConfig({})

    expect(createHostedEngines(config, "standard").map((engine) => engine.defaultModel)).toEqual([
      "gpt-4o",
      "gemini-1.5-pro",
      "claude-3-5-sonnet-20241022",
    ])
    expect(createHostedEngines(config, "free").map((engine) => engine.defaultModel)).toEqual([
      "gpt-4o-mini",
      "gemini-1.5-flash",
      "claude-3-haiku-20240307",
    ])
  })
})

describe("createRelay", () => {
  it("keeps unconfigured engines in the list but unavailable", async () => {
    const relay = await createRelay(parseConfig({ OPENAI_API_KEY: "test-key" }), {
      runtime,
      fallbacks: createStore(),
    })

    expect(relay.hybrid.getEngines().map((engine) => engine.name)).toEqual(["local", "openai", "gemini", "anthropic"])
    expect(relay.hybrid.getAvailableEngines()).toEqual(["openai"])
    expect(relay.freeTier).toBeNull()
  })

  it("loads the local model when one is configured", async () => {
    const relay = await createRelay(parseConfig({ LOCAL_MODEL: "llama3" }), { runtime, fallbacks: createStore() })

    expect(relay.hybrid.getAvailableEngines()).toEqual(["local"])
    await expect(relay.hybrid.generateResponse("hi")).resolves.toBe("local reply")
  })

  it("builds a rate-limited free tier without the local engine", async () => {
    const relay = await createRelay(
      parseConfig({ FREE_TIER_ENABLED: "true", FREE_TIER_RATE_LIMITS: "openai=2", OPENAI_API_KEY: "test-key" }),
      { runtime, fallbacks: createStore() },
    )

    expect(relay.freeTier?.label).toBe("free_tier")
    expect(relay.freeTier?.getEngines().map((engine) => engine.name)).toEqual(["openai", "gemini", "anthropic"])
    expect(relay.freeTier?.getRateLimiter()?.limitFor("openai")).toBe(2)
    expect(relay.freeTier?.getRateLimiter()?.limitFor("gemini")).toBeNull()
  })

  it("includes the free-tier engines in health reports", async () => {
    const relay = await createRelay(parseConfig({ FREE_TIER_ENABLED: "true" }), { runtime, fallbacks: createStore() })

    const report = await relay.monitor.check()

    expect(report.services.map((service) => service.name)).toEqual([
      "local",
      "openai",
      "gemini",
      "anthropic",
      "free_tier.openai",
      "free_tier.gemini",
      "free_tier.anthropic",
    ])
    expect(report.services[4]?.error).toBe("OPENAI_API_KEY is not set")
  })

  it("answers busy from the free tier when nothing is configured", async () => {
    const relay = await createRelay(parseConfig({ FREE_TIER_ENABLED: "1" }), { runtime, fallbacks: createStore() })

    await expect(relay.freeTier?.generateResponse("what is new")).resolves.toBe(
      "I'm currently processing other requests. Please try again in a moment.",
    )
  })
})
