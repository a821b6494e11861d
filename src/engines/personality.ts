import { PERSONALITIES, type Personality } from "./types.js"

/** Personality -> prompt text. Missing entries fall back to "helpful". */
export type PersonalityTable = Readonly<Partial<Record<Personality, string>>> & { readonly helpful: string }

export function normalizePersonality(value: string | undefined): Personality {
  const normalized = value?.trim().toLowerCase() ?? ""
  return PERSONALITIES.find((personality) => personality === normalized) ?? "helpful"
}

export function promptFor(table: PersonalityTable, personality: Personality): string {
  return table[personality] ?? table.helpful
}
