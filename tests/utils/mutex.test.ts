import { describe, expect, it } from "vitest"

import { AsyncMutex, clamp } from "../../src/utils/index.js"

describe("AsyncMutex", () => {
  it("runs critical sections one at a time in arrival order", async () => {
    const mutex = new AsyncMutex()
    const events: string[] = []

    const section = (name: string) =>
      mutex.runExclusive(async () => {
        events.push(`${name}:start`)
        await new Promise((resolve) => setTimeout(resolve, 1))
        events.push(`${name}:end`)
      })

    await Promise.all([section("a"), section("b"), section("c")])

    expect(events).toEqual(["a:start", "a:end", "b:start", "b:end", "c:start", "c:end"])
  })

  it("releases the lock when the section throws", async () => {
    const mutex = new AsyncMutex()

    await expect(mutex.runExclusive(() => Promise.reject(new Error("boom")))).rejects.toThrow("boom")
    await expect(mutex.runExclusive(() => "next")).resolves.toBe("next")
  })
})

describe("clamp", () => {
  it("bounds values and maps NaN to the minimum", () => {
    expect(clamp(5, 0, 1)).toBe(1)
    expect(clamp(-1, 0, 1)).toBe(0)
    expect(clamp(0.4, 0, 1)).toBe(0.4)
    expect(clamp(Number.NaN, 0, 1)).toBe(0)
  })
})
