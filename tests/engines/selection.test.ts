import { describe, expect, it } from "vitest"

import { SelectionPolicy } from "../../src/engines/selection.js"

describe("SelectionPolicy", () => {
  const policy = new SelectionPolicy()

  it("returns null when nothing is available", () => {
    expect(policy.select({ available: [], personality: "helpful", lastUsed: "openai" })).toBeNull()
  })

  it("routes creative requests to gemini ahead of the local engine", () => {
    expect(policy.select({ available: ["local", "gemini"], personality: "creative", lastUsed: null })).toBe("gemini")
  })

  it("routes analytical requests to anthropic", () => {
    expect(
      policy.select({ available: ["local", "openai", "anthropic"], personality: "analytical", lastUsed: null }),
    ).toBe("anthropic")
  })

  it("routes fast requests to openai", () => {
    expect(policy.select({ available: ["local", "openai"], personality: "fast", lastUsed: null })).toBe("openai")
  })

  it("ignores a personality override whose backend is unavailable", () => {
    expect(policy.select({ available: ["local", "openai"], personality: "analytical", lastUsed: null })).toBe("local")
  })

  it("prefers a personality override over the last-used backend", () => {
    expect(policy.select({ available: ["local", "gemini"], personality: "creative", lastUsed: "local" })).toBe("gemini")
  })

  it("sticks to the last-used backend before consulting the priority list", () => {
    expect(policy.select({ available: ["local", "anthropic"], personality: "helpful", lastUsed: "anthropic" })).toBe(
      "anthropic",
    )
  })

  it("skips a last-used backend that is no longer available", () => {
    expect(policy.select({ available: ["gemini", "openai"], personality: "funny", lastUsed: "local" })).toBe("openai")
  })

  it("walks the default priority list local, openai, gemini, anthropic", () => {
    expect(policy.select({ available: ["anthropic", "gemini"], personality: "helpful", lastUsed: null })).toBe("gemini")
  })

  it("honours a configured priority order", () => {
    const custom = new SelectionPolicy(["anthropic", "openai"])
    expect(custom.select({ available: ["openai", "anthropic"], personality: "helpful", lastUsed: null })).toBe(
      "anthropic",
    )
  })

  it("picks from the available set when the priority list has no match", () => {
    const high = new SelectionPolicy(["local"], () => 0.99)
    const low = new SelectionPolicy(["local"], () => 0)

    expect(high.select({ available: ["openai", "gemini"], personality: "helpful", lastUsed: null })).toBe("gemini")
    expect(low.select({ available: ["openai", "gemini"], personality: "helpful", lastUsed: null })).toBe("openai")
  })
})
