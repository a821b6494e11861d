import { z } from "zod"

import { ConfigurationError, TransientBackendError, errorMessage, toTransient } from "../errors.js"
import { createLogger } from "../logger.js"
import { promptFor, type PersonalityTable } from "./personality.js"
import type { Engine, GenerationRequest } from "./types.js"

const log = createLogger("engines.local")

const PROMPT_PREFIXES: PersonalityTable = {
  helpful: "You are a helpful AI assistant. ",
  creative: "You are a creative AI assistant. ",
  analytical: "You are an analytical AI assistant. ",
  funny: "You are a funny AI assistant. ",
}

/** A model loaded once and kept for the process lifetime. */
export interface LocalModelHandle {
  readonly model: string
  generate(prompt: string, maxTokens: number, temperature: number): Promise<string>
}

export interface LocalModelRuntime {
  /** Rejects when the model cannot be loaded. */
  load(model: string): Promise<LocalModelHandle>
}

const tagsSchema = z.object({
  models: z.array(z.object({ name: z.string() })).default([]),
})

const generateSchema = z.object({
  response: z.string(),
})

/**
 * Ollama as the local model runtime. "Loading" resolves the configured model
 * name against the installed tags; generation goes through /api/generate.
 */
export class OllamaRuntime implements LocalModelRuntime {
  constructor(
    private readonly baseUrl: string,
    private readonly timeoutMs: number,
  ) {}

  async load(model: string): Promise<LocalModelHandle> {
    const response = await fetch(`${this.baseUrl}/api/tags`, {
      signal: AbortSignal.timeout(this.timeoutMs),
    })
    if (!response.ok) {
      throw new Error(`ollama /api/tags returned ${response.status}`)
    }

    const tags = tagsSchema.parse(await response.json())
    // Ollama lists "llama3:latest" for a model pulled as "llama3".
    const installed = tags.models.find(
      (entry) => entry.name === model || entry.name === `${model}:latest`,
    )
    if (!installed) {
      throw new Error(`model "${model}" is not installed in ollama`)
    }

    return {
      model: installed.name,
      generate: (prompt, maxTokens, temperature) =>
        this.generate(installed.name, prompt, maxTokens, temperature),
    }
  }

  private async generate(model: string, prompt: string, maxTokens: number, temperature: number): Promise<string> {
    const response = await fetch(`${this.baseUrl}/api/generate`, {
      method: "POST",
      headers: {
        "Content-Type": "application/json",
      },
      body: JSON.stringify({
        model,
        prompt,
        stream: false,
        options: {
          temperature,
          num_predict: maxTokens,
        },
      }),
      signal: AbortSignal.timeout(this.timeoutMs),
    })

    if (!response.ok) {
      throw new TransientBackendError(`ollama /api/generate returned ${response.status}`, "local", {
        statusCode: response.status,
      })
    }

    const payload = generateSchema.safeParse(await response.json())
    if (!payload.success) {
      throw new TransientBackendError("ollama returned a malformed payload", "local", { cause: payload.error })
    }
    return payload.data.response
  }
}

export interface LocalEngineSettings {
  model: string
  runtime: LocalModelRuntime
}

export class LocalEngine implements Engine {
  readonly name = "local"
  readonly provider = "ollama"

  private constructor(
    private readonly handle: LocalModelHandle | null,
    readonly defaultModel: string,
    readonly unavailableReason: string | null,
  ) {}

  /** Loads the model once. Never rejects: a failed load yields an engine that stays unavailable. */
  static async load(settings: LocalEngineSettings): Promise<LocalEngine> {
    const model = settings.model.trim()
    if (model.length === 0) {
      const reason = "LOCAL_MODEL is not set"
      log.warn("engine unavailable", { reason })
      return new LocalEngine(null, "", reason)
    }

    try {
      const handle = await settings.runtime.load(model)
      log.info("local model loaded", { model: handle.model })
      return new LocalEngine(handle, handle.model, null)
    } catch (error) {
      const reason = `failed to load local model "${model}": ${errorMessage(error)}`
      log.error("engine unavailable", { reason })
      return new LocalEngine(null, model, reason)
    }
  }

  isAvailable(): boolean {
    return this.handle !== null
  }

  async generate(request: GenerationRequest): Promise<string> {
    if (!this.handle) {
      throw new ConfigurationError(this.unavailableReason ?? "local model is not loaded", this.name)
    }

    try {
      const prompt = promptFor(PROMPT_PREFIXES, request.personality) + request.message
      const output = await this.handle.generate(prompt, request.maxTokens, request.temperature)
      return output.trim()
    } catch (error) {
      log.error("generate failed", error)
      throw toTransient(error, this.name)
    }
  }
}
