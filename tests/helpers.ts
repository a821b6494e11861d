import { FallbackResponseStore } from "../src/fallback/responses.js"
import type { BackendId, Engine, GenerationRequest } from "../src/engines/types.js"

export type Behaviour = string | Error | ((request: GenerationRequest) => Promise<string>)

/**
 * Scripted engine. Behaviours are consumed one per call; the last one repeats.
 */
export class FakeEngine implements Engine {
  readonly provider: string
  readonly defaultModel: string
  available: boolean
  calls = 0
  requests: GenerationRequest[] = []
  private readonly behaviours: Behaviour[]

  constructor(
    readonly name: BackendId,
    behaviour: Behaviour | Behaviour[],
    options: { available?: boolean; model?: string } = {},
  ) {
    this.behaviours = Array.isArray(behaviour) ? behaviour : [behaviour]
    this.available = options.available ?? true
    this.provider = `${name}-provider`
    this.defaultModel = options.model ?? `${name}-model`
  }

  get unavailableReason(): string | null {
    return this.available ? null : `${this.name} is not configured`
  }

  isAvailable(): boolean {
    return this.available
  }

  async generate(request: GenerationRequest): Promise<string> {
    const behaviour = this.behaviours[Math.min(this.calls, this.behaviours.length - 1)]
    this.calls += 1
    this.requests.push(request)

    if (behaviour instanceof Error) {
      throw behaviour
    }
    if (typeof behaviour === "function") {
      return behaviour(request)
    }
    return behaviour ?? ""
  }
}

export const TEST_REPLIES = {
  greeting: "Hello! I'm your AI assistant. How can I help you today?",
  error: "I'm experiencing some technical difficulties. Please try again later.",
  unavailable: "The AI service is currently unavailable. Please try again later.",
  busy: "I'm currently processing other requests. Please try again in a moment.",
}

export function createStore(table: Record<string, string> = TEST_REPLIES): FallbackResponseStore {
  return new FallbackResponseStore(table)
}

export interface Deferred<T> {
  promise: Promise<T>
  resolve(value: T): void
}

export function deferred<T>(): Deferred<T> {
  let resolve: (value: T) => void = () => undefined
  const promise = new Promise<T>((res) => {
    resolve = res
  })
  return { promise, resolve }
}
