import { readFileSync } from "fs";
import { join } from "path";
import { moduleLogger } from "../logger.js";

const log = moduleLogger("prompts");

// ── Identity ─────────────────────────────────────────────

export const DEFAULT_IDENTITY =
  "You are the assistant built into the user's desktop toolkit. You help with the projects, files and settings the toolkit manages.";

/**
 * Load the identity directive from `assistant.md` in the working directory.
 * Falls back to the built-in identity when the file is absent.
 */
export function loadIdentity(path = join(process.cwd(), "assistant.md")): string {
  try {
    const text = readFileSync(path, "utf-8").trim();
    if (text) {
      log.info({ path }, "🧬 Identity loaded");
      return text;
    }
  } catch {
    log.debug({ path }, "No identity file — using default identity");
  }
  return DEFAULT_IDENTITY;
}

// ── Instructions ─────────────────────────────────────────

export const INSTRUCTIONS = `Operational guidelines:
- You have function-calling tools available via the API. ALWAYS invoke them through the tool-call mechanism — NEVER type tool names as text in your response.
- Use tools silently. Never mention tool names or internal operations in your reply. Just provide the results naturally.
- If a tool result reports an error or a cancellation, explain what happened in plain words and suggest a next step. Do not retry the same call.
- If you already have results from a tool call, synthesize them into a clear answer. Do NOT call the same tool again for the same thing.
- Tools that change files or memory ask the user for confirmation first. A cancelled result means the user declined: respect it.
- Memories listed below were retrieved automatically and may be partial. Prefer what the user says now over an older memory.
- If you don't know something, say so honestly.`;

export const SUMMARY_INSTRUCTIONS =
  "Write a concise, information-dense summary of this conversation in about 100 words. " +
  "Keep decisions made, information shared, open tasks and any user preferences revealed. " +
  "Skip greetings and repetition. Write in third person past tense.";
