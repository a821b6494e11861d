/**
 * Canned replies served when no backend could answer.
 *
 * The table is read once at startup and frozen. Each orchestrator owns its
 * own store instance so tests never share hidden state.
 *
 * Lookup order: requested key → "error" → LAST_RESORT_REPLY.
 *
 * @module fallback/responses
 */

import fs from "node:fs"
import path from "node:path"

import { z } from "zod"

import { errorMessage } from "../errors.js"
import { createLogger } from "../logger.js"

const log = createLogger("fallback.responses")

export const LAST_RESORT_REPLY = "Service unavailable"

export const DEFAULT_FALLBACK_RESPONSES: Readonly<Record<string, string>> = {
  greeting: "Hello! I'm your AI assistant. How can I help you today?",
  error: "I'm experiencing some technical difficulties. Please try again later.",
  unavailable: "The AI service is currently unavailable. Please try again later.",
  busy: "I'm currently processing other requests. Please try again in a moment.",
  chat_unavailable: "Chat functionality is temporarily unavailable. Please try again later.",
}

const OFFLINE_RESPONSES: Readonly<Record<string, string>> = {
  error: "System is currently offline. Please try again later.",
}

const GREETING_MARKER = "hello"

const tableSchema = z.record(z.string())

export class FallbackResponseStore {
  private readonly table: Readonly<Record<string, string>>

  constructor(table: Readonly<Record<string, string>>) {
    this.table = Object.freeze({ ...table })
  }

  /**
   * Missing file → built-in defaults. Unreadable or invalid file → a table
   * holding only the offline "error" reply.
   */
  static load(file: string): FallbackResponseStore {
    const target = path.resolve(process.cwd(), file)

    if (!fs.existsSync(target)) {
      log.warn("fallback responses file not found, using defaults", { file: target })
      return new FallbackResponseStore(DEFAULT_FALLBACK_RESPONSES)
    }

    try {
      const raw: unknown = JSON.parse(fs.readFileSync(target, "utf-8"))
      const table = tableSchema.parse(raw)
      log.info("fallback responses loaded", { count: Object.keys(table).length })
      return new FallbackResponseStore(table)
    } catch (error) {
      log.error("failed to load fallback responses", { file: target, error: errorMessage(error) })
      return new FallbackResponseStore(OFFLINE_RESPONSES)
    }
  }

  get(key: string): string {
    return this.table[key] ?? this.table.error ?? LAST_RESORT_REPLY
  }

  keys(): string[] {
    return Object.keys(this.table)
  }

  /**
   * Coarse intent: any message containing "hello" (case-insensitive, also
   * inside "hello!!" or "hellooo") gets the greeting reply, everything else
   * the caller's default.
   */
  resolveIntentKey(message: string, defaultKey: string): string {
    return message.toLowerCase().includes(GREETING_MARKER) ? "greeting" : defaultKey
  }

  replyFor(message: string, defaultKey: string): { key: string; text: string } {
    const key = this.resolveIntentKey(message, defaultKey)
    return { key, text: this.get(key) }
  }
}
