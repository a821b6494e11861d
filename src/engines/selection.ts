/**
 * Selection policy: picks one backend per attempt.
 *
 * First match wins:
 *   1. creative   → gemini
 *   2. analytical → anthropic
 *   3. fast       → openai
 *   4. the backend that served the previous call (sticky affinity)
 *   5. first available entry of the static priority list
 *   6. any available backend
 *
 * Returns null when nothing is available.
 *
 * @module engines/selection
 */

import type { BackendId, Personality } from "./types.js"

const PERSONALITY_OVERRIDES: Readonly<Partial<Record<Personality, BackendId>>> = {
  creative: "gemini",
  analytical: "anthropic",
  fast: "openai",
}

export const DEFAULT_PRIORITY: readonly BackendId[] = ["local", "openai", "gemini", "anthropic"]

export interface SelectionInput {
  available: readonly BackendId[]
  personality: Personality
  lastUsed: BackendId | null
}

export class SelectionPolicy {
  constructor(
    private readonly priority: readonly BackendId[] = DEFAULT_PRIORITY,
    private readonly random: () => number = Math.random,
  ) {}

  select({ available, personality, lastUsed }: SelectionInput): BackendId | null {
    if (available.length === 0) {
      return null
    }

    const override = PERSONALITY_OVERRIDES[personality]
    if (override && available.includes(override)) {
      return override
    }

    if (lastUsed && available.includes(lastUsed)) {
      return lastUsed
    }

    for (const backend of this.priority) {
      if (available.includes(backend)) {
        return backend
      }
    }

    const index = Math.min(available.length - 1, Math.floor(this.random() * available.length))
    return available[index] ?? null
  }
}
