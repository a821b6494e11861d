import OpenAI from "openai"

import { ConfigurationError, toTransient } from "../errors.js"
import { createLogger } from "../logger.js"
import { promptFor, type PersonalityTable } from "./personality.js"
import type { Engine, GenerationRequest } from "./types.js"

const log = createLogger("engines.openai")

const SYSTEM_PROMPTS: PersonalityTable = {
  helpful: "You are a helpful AI assistant.",
  creative: "You are a creative AI assistant who thinks outside the box.",
  analytical: "You are an analytical AI assistant who provides detailed analysis.",
  funny: "You are a funny AI assistant who uses humor in responses.",
}

export interface OpenAIEngineSettings {
  apiKey: string
  model: string
  timeoutMs: number
}

export class OpenAIEngine implements Engine {
  readonly name = "openai"
  readonly provider = "openai"
  readonly defaultModel: string
  readonly unavailableReason: string | null = null
  private readonly client: OpenAI | null = null

  constructor(settings: OpenAIEngineSettings) {
    this.defaultModel = settings.model

    if (settings.apiKey.trim().length === 0) {
      this.unavailableReason = "OPENAI_API_KEY is not set"
      log.warn("engine unavailable", { reason: this.unavailableReason })
      return
    }

    // The cascade owns retries; the SDK must not retry on its own.
    this.client = new OpenAI({ apiKey: settings.apiKey, timeout: settings.timeoutMs, maxRetries: 0 })
  }

  isAvailable(): boolean {
    return this.client !== null
  }

  async generate(request: GenerationRequest): Promise<string> {
    if (!this.client) {
      throw new ConfigurationError(this.unavailableReason ?? "openai is not configured", this.name)
    }

    try {
      const response = await this.client.chat.completions.create({
        model: this.defaultModel,
        messages: [
          { role: "system", content: promptFor(SYSTEM_PROMPTS, request.personality) },
          { role: "user", content: request.message },
        ],
        max_tokens: request.maxTokens,
        temperature: request.temperature,
      })

      return response.choices[0]?.message?.content?.trim() ?? ""
    } catch (error) {
      log.error("generate failed", error)
      throw toTransient(error, this.name)
    }
  }
}
