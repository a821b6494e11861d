import dotenv from "dotenv"
import { z } from "zod"

import { BACKEND_IDS } from "./engines/types.js"

dotenv.config({ path: ".env" })

const boolFromEnv = z.preprocess((value) => {
  if (typeof value === "boolean") {
    return value
  }
  if (typeof value === "string") {
    const normalized = value.trim().toLowerCase()
    return normalized === "true" || normalized === "1" || normalized === "yes"
  }
  return false
}, z.boolean())

const intFromEnv = z.preprocess((value) => {
  if (typeof value === "number") {
    return value
  }
  if (typeof value === "string" && value.trim().length > 0) {
    const parsed = Number.parseInt(value, 10)
    return Number.isNaN(parsed) ? undefined : parsed
  }
  return undefined
}, z.number().int().positive())

const backendIdSchema = z.enum(BACKEND_IDS)

/** "local,openai,gemini" -> ["local", "openai", "gemini"] */
const backendListFromEnv = z.preprocess((value) => {
  if (typeof value === "string") {
    return value
      .split(",")
      .map((item) => item.trim().toLowerCase())
      .filter((item) => item.length > 0)
  }
  return value
}, z.array(backendIdSchema).min(1))

/** "openai=3,gemini=15" -> { openai: 3, gemini: 15 } */
const rateLimitsFromEnv = z.preprocess((value) => {
  if (typeof value !== "string") {
    return value
  }
  const limits: Record<string, number> = {}
  for (const pair of value.split(",")) {
    const [name, limit] = pair.split("=").map((part) => part.trim())
    if (name) {
      limits[name.toLowerCase()] = Number(limit)
    }
  }
  return limits
}, z.record(backendIdSchema, z.number().int().positive()))

const logLevelSchema = z.enum(["debug", "info", "warn", "error"])

const ConfigSchema = z
  .object({
    OPENAI_API_KEY: z.string().default(""),
    GEMINI_API_KEY: z.string().default(""),
    GOOGLE_API_KEY: z.string().default(""),
    ANTHROPIC_API_KEY: z.string().default(""),
    OLLAMA_BASE_URL: z.string().url().default("http://localhost:11434"),
    LOCAL_MODEL: z.string().default(""),
    OPENAI_MODEL: z.string().min(1).default("gpt-4o"),
    GEMINI_MODEL: z.string().min(1).default("gemini-1.5-pro"),
    ANTHROPIC_MODEL: z.string().min(1).default("claude-3-5-sonnet-20241022"),
    OPENAI_FREE_MODEL: z.string().min(1).default("gpt-4o-mini"),
    GEMINI_FREE_MODEL: z.string().min(1).default("gemini-1.5-flash"),
    ANTHROPIC_FREE_MODEL: z.string().min(1).default("claude-3-haiku-20240307"),
    ENGINE_TIMEOUT_MS: intFromEnv.default(30_000),
    ENGINE_PRIORITY: backendListFromEnv.default(["local", "openai", "gemini", "anthropic"]),
    FREE_TIER_ENABLED: boolFromEnv.default(false),
    FREE_TIER_RATE_LIMITS: rateLimitsFromEnv.default({ openai: 3, gemini: 15, anthropic: 5 }),
    HEALTH_PROBE_TIMEOUT_MS: intFromEnv.default(5_000),
    HEALTH_DEGRADED_LATENCY_MS: intFromEnv.default(3_000),
    FALLBACK_RESPONSES_FILE: z.string().default("config/fallback-responses.json"),
    GATEWAY_HOST: z.string().default("127.0.0.1"),
    GATEWAY_PORT: intFromEnv.default(8000),
    LOG_LEVEL: logLevelSchema.default("info"),
    LOG_FILE: z.string().default("logs/relay.log"),
  })
  .transform((value) => ({
    ...value,
    // Google's SDK docs use GOOGLE_API_KEY; accept either.
    GEMINI_API_KEY: value.GEMINI_API_KEY.trim() || value.GOOGLE_API_KEY.trim(),
  }))

export type Config = z.infer<typeof ConfigSchema>

export function parseConfig(env: NodeJS.ProcessEnv): Config {
  return ConfigSchema.parse(env)
}

const parsed = ConfigSchema.safeParse(process.env)

if (!parsed.success) {
  console.error("[Relay Config Error] Invalid environment configuration.")
  for (const issue of parsed.error.issues) {
    const key = issue.path.join(".")
    console.error(`  - ${key}: ${issue.message}`)
  }
  process.exit(1)
}

export const config: Config = parsed.data

export default config
