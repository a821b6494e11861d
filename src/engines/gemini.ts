import { GoogleGenerativeAI, type GenerativeModel } from "@google/generative-ai"

import { ConfigurationError, toTransient } from "../errors.js"
import { createLogger } from "../logger.js"
import { promptFor, type PersonalityTable } from "./personality.js"
import type { Engine, GenerationRequest } from "./types.js"

const log = createLogger("engines.gemini")

const SYSTEM_PROMPTS: PersonalityTable = {
  helpful: "You are a helpful AI assistant.",
  creative: "You are a creative AI assistant who generates innovative ideas.",
  analytical: "You are an analytical AI assistant who provides thorough analysis.",
  funny: "You are a funny AI assistant who adds humor to conversations.",
}

export interface GeminiEngineSettings {
  apiKey: string
  model: string
  timeoutMs: number
}

export class GeminiEngine implements Engine {
  readonly name = "gemini"
  readonly provider = "google"
  readonly defaultModel: string
  readonly unavailableReason: string | null = null
  private readonly genAI: GoogleGenerativeAI | null = null
  private readonly timeoutMs: number

  constructor(settings: GeminiEngineSettings) {
    this.defaultModel = settings.model
    this.timeoutMs = settings.timeoutMs

    if (settings.apiKey.trim().length === 0) {
      this.unavailableReason = "GEMINI_API_KEY is not set"
      log.warn("engine unavailable", { reason: this.unavailableReason })
      return
    }

    this.genAI = new GoogleGenerativeAI(settings.apiKey)
  }

  isAvailable(): boolean {
    return this.genAI !== null
  }

  private modelFor(request: GenerationRequest): GenerativeModel {
    if (!this.genAI) {
      throw new ConfigurationError(this.unavailableReason ?? "gemini is not configured", this.name)
    }

    return this.genAI.getGenerativeModel(
      {
        model: this.defaultModel,
        systemInstruction: promptFor(SYSTEM_PROMPTS, request.personality),
        generationConfig: {
          maxOutputTokens: request.maxTokens,
          temperature: request.temperature,
        },
      },
      { timeout: this.timeoutMs },
    )
  }

  async generate(request: GenerationRequest): Promise<string> {
    const model = this.modelFor(request)

    try {
      const result = await model.generateContent(request.message)
      // text() throws when the candidate was blocked; that is a failure, not an empty reply.
      return result.response.text().trim()
    } catch (error) {
      log.error("generate failed", error)
      throw toTransient(error, this.name)
    }
  }
}
