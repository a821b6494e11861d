export const BACKEND_IDS = ["local", "openai", "gemini", "anthropic"] as const

/** Identity of one completion backend. */
export type BackendId = (typeof BACKEND_IDS)[number]

export const PERSONALITIES = ["helpful", "creative", "analytical", "fast", "funny"] as const

export type Personality = (typeof PERSONALITIES)[number]

export type GenerationRequest = Readonly<{
  message: string
  personality: Personality
  maxTokens: number
  temperature: number
}>

export interface GenerationResult {
  text: string
  backend: BackendId
  latencyMs: number
  success: boolean
}

export interface Engine {
  readonly name: BackendId
  readonly provider: string
  /** Model identifier this engine was constructed with (e.g., "gpt-4o") */
  readonly defaultModel: string
  /** Why construction failed, or null when the engine is usable. */
  readonly unavailableReason: string | null
  isAvailable(): boolean
  /**
   * Rejects with a TransientBackendError on transport or payload failure.
   * Resolves "" when the provider answered with an empty completion.
   */
  generate(request: GenerationRequest): Promise<string>
}

export interface EngineAttempt {
  backend: BackendId
  success: boolean
  latencyMs: number
  error?: string
}

export interface GenerationOutcome {
  response: string
  /** null when every candidate failed and a canned reply was served. */
  backendUsed: BackendId | null
  latencyMs: number
  attempts: EngineAttempt[]
  fallbackKey: string | null
}

export type HealthStatus = "healthy" | "degraded" | "unhealthy"

export interface ServiceHealth {
  /** Backend id, prefixed with its group for non-default groups ("free_tier.openai"). */
  name: string
  status: HealthStatus
  lastCheck: Date
  latencyMs: number | null
  error: string | null
}

export interface HealthReport {
  status: HealthStatus
  timestamp: Date
  services: ServiceHealth[]
  uptimeSeconds: number
}
