import Anthropic from "@anthropic-ai/sdk"

import { ConfigurationError, toTransient } from "../errors.js"
import { createLogger } from "../logger.js"
import { promptFor, type PersonalityTable } from "./personality.js"
import type { Engine, GenerationRequest } from "./types.js"

const log = createLogger("engines.anthropic")

const SYSTEM_PROMPTS: PersonalityTable = {
  helpful: "You are a helpful AI assistant.",
  creative: "You are a creative AI assistant who excels at generating innovative solutions.",
  analytical: "You are an analytical AI assistant who provides detailed, logical analysis.",
  funny: "You are a funny AI assistant who brings humor and wit to conversations.",
}

export interface AnthropicEngineSettings {
  apiKey: string
  model: string
  timeoutMs: number
}

export class AnthropicEngine implements Engine {
  readonly name = "anthropic"
  readonly provider = "anthropic"
  readonly defaultModel: string
  readonly unavailableReason: string | null = null
  private readonly client: Anthropic | null = null

  constructor(settings: AnthropicEngineSettings) {
    this.defaultModel = settings.model

    if (settings.apiKey.trim().length === 0) {
      this.unavailableReason = "ANTHROPIC_API_KEY is not set"
      log.warn("engine unavailable", { reason: this.unavailableReason })
      return
    }

    this.client = new Anthropic({ apiKey: settings.apiKey, timeout: settings.timeoutMs, maxRetries: 0 })
  }

  isAvailable(): boolean {
    return this.client !== null
  }

  async generate(request: GenerationRequest): Promise<string> {
    if (!this.client) {
      throw new ConfigurationError(this.unavailableReason ?? "anthropic is not configured", this.name)
    }

    try {
      const response = await this.client.messages.create({
        model: this.defaultModel,
        max_tokens: request.maxTokens,
        temperature: request.temperature,
        system: promptFor(SYSTEM_PROMPTS, request.personality),
        messages: [{ role: "user", content: request.message }],
      })

      const textBlock = response.content.find((block) => block.type === "text")
      return textBlock?.type === "text" ? textBlock.text.trim() : ""
    } catch (error) {
      log.error("generate failed", error)
      throw toTransient(error, this.name)
    }
  }
}
