#!/usr/bin/env node
import { createInterface, type Interface } from "readline/promises";
import type { AssistantSession } from "./agent/session.js";
import type { TurnHandle } from "./agent/types.js";
import { loadConfig, requireEnv } from "./config.js";
import { errorMessage } from "./errors.js";
import { createAssistant } from "./index.js";
import { log } from "./logger.js";
import type { Confirmer } from "./tools/executor.js";

// ── Terminal host ────────────────────────────────────────
// A thin demonstration surface: one session, one line per message.

const HELP = [
  "Commands:",
  "  /help              this list",
  "  /usage             provider calls, tokens and cost so far",
  "  /cache             prompt cache statistics",
  "  /memories          what is remembered about you",
  "  /remember <text>   store a long-term memory",
  "  /forget <id>       forget one memory",
  "  /clear             drop this conversation (long-term memory stays)",
  "  /quit              exit",
  "Ctrl+C cancels the running answer.",
].join("\n");

function terminalConfirmer(rl: Interface): Confirmer {
  return {
    id: "terminal",
    async confirm(req, signal) {
      const answer = await rl
        .question(`\n⚠️  ${req.tool} wants to: ${req.preview}\n   Allow? [y/N] `, { signal })
        .catch((err: unknown) => {
          log.debug({ err: errorMessage(err) }, "Confirmation prompt aborted");
          return "";
        });
      return /^y(es)?$/i.test(answer.trim()) ? "accepted" : "rejected";
    },
  };
}

async function runTurn(session: AssistantSession, handle: TurnHandle): Promise<void> {
  for await (const event of handle.events) {
    switch (event.type) {
      case "tool_start":
        process.stdout.write(`\n  🔧 ${event.tool}…\n`);
        break;
      case "delta":
        process.stdout.write(event.text);
        break;
      case "failed":
        process.stdout.write(`\n${event.outcome.response}\n`);
        if (event.outcome.retryable) process.stdout.write("   (you can send it again)\n");
        break;
      case "cancelled":
        process.stdout.write("\n🛑 Cancelled.\n");
        break;
      case "done":
        process.stdout.write("\n");
        break;
      default:
        break;
    }
  }
  const outcome = await handle.outcome;
  log.debug(
    {
      state: outcome.state,
      toolCalls: outcome.toolCalls,
      tokens: outcome.inputTokens + outcome.outputTokens,
      latencyMs: outcome.latencyMs,
      calls: session.tracker.getCallCount(),
    },
    "Turn finished",
  );
}

async function handleCommand(session: AssistantSession, line: string): Promise<boolean> {
  const [command = "", ...rest] = line.trim().split(/\s+/);
  const arg = rest.join(" ");

  switch (command) {
    case "/help":
      console.log(HELP);
      return true;
    case "/usage":
      console.log(session.tracker.getSummary());
      return true;
    case "/cache": {
      const s = session.cache.stats();
      console.log(
        `🗃️ Prompt cache: ${s.entries} entries, ${s.hits} hits / ${s.misses} misses, ~${s.tokensSaved} tokens saved`,
      );
      return true;
    }
    case "/memories": {
      const records = session.memory.user.list();
      if (records.length === 0) console.log("Nothing remembered yet.");
      for (const r of records) console.log(`  ${r.id}  ${r.text}`);
      return true;
    }
    case "/remember":
      if (!arg) {
        console.log("Usage: /remember <text>");
        return true;
      }
      console.log(`📌 Remembered (${await session.memory.remember(arg)})`);
      return true;
    case "/forget":
      console.log((await session.memory.forget(arg)) ? "🗑️ Forgotten." : `No memory with id "${arg}".`);
      return true;
    case "/clear":
      await session.memory.clearSession();
      console.log("🧹 Conversation cleared.");
      return true;
    default:
      return false;
  }
}

// ── Main ─────────────────────────────────────────────────

async function main(): Promise<void> {
  requireEnv("OPENROUTER_API_KEY");
  const config = loadConfig();
  const rl = createInterface({ input: process.stdin, output: process.stdout });
  const session = await createAssistant(config, { confirmer: terminalConfirmer(rl) });

  log.info({ model: config.llmModel, user: config.userId }, "🚀 Assistant ready");
  console.log("Type a message, or /help for commands.");

  let active: TurnHandle | undefined;
  let prompt = new AbortController();
  rl.on("SIGINT", () => {
    if (active) {
      active.cancel("Ctrl+C");
    } else {
      prompt.abort();
    }
  });

  const shutdown = async (): Promise<void> => {
    log.info("👋 Shutting down...");
    await session.close();
  };

  try {
    for (;;) {
      prompt = new AbortController();
      const line = await rl.question("\n> ", { signal: prompt.signal }).catch(() => undefined);
      if (line === undefined || line.trim() === "/quit") break;
      if (!line.trim()) continue;
      if (line.startsWith("/") && (await handleCommand(session, line))) continue;

      active = session.send(line);
      try {
        await runTurn(session, active);
      } finally {
        active = undefined;
      }
    }
  } finally {
    rl.close();
    await shutdown();
  }
}

main().catch((error: unknown) => {
  log.fatal({ err: errorMessage(error) }, "💀 Fatal error");
  process.exit(1);
});
