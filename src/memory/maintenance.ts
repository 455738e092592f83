import cron, { type ScheduledTask } from "node-cron";
import { errorMessage } from "../errors.js";
import { moduleLogger } from "../logger.js";
import type { MemoryManager } from "./manager.js";

const log = moduleLogger("maintenance");

// ── Periodic memory maintenance ──────────────────────────

/**
 * Schedule `memory.maintain()` on a cron expression. Each tick only queues
 * work on the memory manager's background queue, so a slow rebuild never
 * delays a turn. Returns the task so the session can stop it on close.
 */
export function startMaintenance(
  memory: MemoryManager,
  expression: string,
): ScheduledTask | undefined {
  if (!cron.validate(expression)) {
    log.warn({ expression }, "⚠️ Invalid maintenance cron — periodic maintenance disabled");
    return undefined;
  }

  const task = cron.schedule(expression, async () => {
    try {
      const report = await memory.maintain();
      const rebuilt = Object.entries(report)
        .filter(([, r]) => r.rebuilt || r.reembedded > 0)
        .map(([tier]) => tier);
      if (rebuilt.length > 0) {
        log.info({ tiers: rebuilt }, "🔧 Memory maintenance finished");
      } else {
        log.debug("Memory maintenance: nothing to do");
      }
    } catch (err) {
      log.error({ err: errorMessage(err) }, "❌ Memory maintenance failed");
    }
  });

  task.start();
  log.info({ expression }, "⏰ Memory maintenance scheduled");
  return task;
}
