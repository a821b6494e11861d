import { beforeEach, describe, expect, it, vi } from "vitest"

const { getGenerativeModel, generateContent, apiKeys } = vi.hoisted(() => {
  const apiKeys: string[] = []
  return { getGenerativeModel: vi.fn(), generateContent: vi.fn(), apiKeys }
})

vi.mock("@google/generative-ai", () => ({
  GoogleGenerativeAI: class {
    getGenerativeModel = getGenerativeModel

    constructor(apiKey: string) {
      apiKeys.push(apiKey)
    }
  },
}))

import { ConfigurationError, TransientBackendError } from "../../src/errors.js"
import { GeminiEngine } from "../../src/engines/gemini.js"
import { buildRequest } from "../../src/engines/orchestrator.js"

const settings = { apiKey: "test-key", model: "gemini-test", timeoutMs: 3_000 }

function replyWith(text: string): void {
  generateContent.mockResolvedValue({ response: { text: () => text } })
}

describe("GeminiEngine", () => {
  beforeEach(() => {
    getGenerativeModel.mockReset()
    generateContent.mockReset()
    getGenerativeModel.mockReturnValue({ generateContent })
    apiKeys.length = 0
  })

  it("stays unavailable without an API key", async () => {
    const engine = new GeminiEngine({ ...settings, apiKey: "" })

    expect(engine.isAvailable()).toBe(false)
    expect(engine.unavailableReason).toBe("GEMINI_API_KEY is not set")
    expect(apiKeys).toEqual([])
    await expect(engine.generate(buildRequest("hi"))).rejects.toBeInstanceOf(ConfigurationError)
  })

  it("configures the model per request and trims the reply", async () => {
    replyWith("\n  a new angle  ")
    const engine = new GeminiEngine(settings)

    const text = await engine.generate(buildRequest("brainstorm names", "creative", 120, 1))

    expect(text).toBe("a new angle")
    expect(apiKeys).toEqual(["test-key"])
    expect(getGenerativeModel).toHaveBeenCalledWith(
      {
        model: "gemini-test",
        systemInstruction: "You are a creative AI assistant who generates innovative ideas.",
        generationConfig: { maxOutputTokens: 120, temperature: 1 },
      },
      { timeout: 3_000 },
    )
    expect(generateContent).toHaveBeenCalledWith("brainstorm names")
  })

  it("treats a blocked candidate as a failure", async () => {
    generateContent.mockResolvedValue({
      response: {
        text: () => {
          throw new Error("Candidate was blocked due to SAFETY")
        },
      },
    })

    await expect(new GeminiEngine(settings).generate(buildRequest("hi"))).rejects.toThrow(
      "gemini request failed: Candidate was blocked due to SAFETY",
    )
  })

  it("wraps transport errors as transient failures", async () => {
    generateContent.mockRejectedValue(new Error("fetch failed"))

    await expect(new GeminiEngine(settings).generate(buildRequest("hi"))).rejects.toBeInstanceOf(
      TransientBackendError,
    )
  })
})
