import { z } from "zod";
import type { MemoryManager } from "../memory/manager.js";
import type { ToolExecutor } from "./executor.js";

const parameters = z.object({
  query: z.string().min(1).describe("What to look for in long-term memory."),
  limit: z.number().int().min(1).max(20).optional().describe("Max results (default 5)."),
});

export function registerSearchMemory(executor: ToolExecutor, memory: MemoryManager): void {
  executor.register(
    {
      name: "search_memory",
      description:
        "Search what you remember long-term about the user (preferences, facts they asked you to remember). Returns ids you can pass to forget_memory.",
      parameters,
      permission: "read",
      topics: ["remember", "memory", "recall", "forget", "know", "prefer", "favorite"],
    },
    async ({ query, limit = 5 }) => {
      const hits = await memory.user.search(query, { k: limit, minScore: 0.1 });
      return {
        results: hits.map((h) => ({
          id: h.record.id,
          text: h.record.text,
          score: Math.round(h.score * 1000) / 1000,
          createdAt: new Date(h.record.createdAt).toISOString(),
        })),
        degraded: memory.user.isDegraded(),
      };
    },
  );
}
