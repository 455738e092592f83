import { z } from "zod";
import type { MemoryManager } from "../memory/manager.js";
import type { ToolExecutor } from "./executor.js";

const parameters = z.object({
  id: z.string().min(1).describe("Id of the memory, as returned by search_memory."),
});

export function registerForgetMemory(executor: ToolExecutor, memory: MemoryManager): void {
  executor.register(
    {
      name: "forget_memory",
      description:
        "Permanently forget one long-term memory about the user. Look up the id with search_memory first.",
      parameters,
      permission: "write",
      topics: ["forget", "delete", "remove", "memory"],
      preview: ({ id }) => {
        const record = memory.user.get(id);
        return record ? `Forget: "${record.text}"` : `Forget memory ${id}`;
      },
    },
    async ({ id }) => {
      const record = memory.user.get(id);
      if (!record || record.deleted) {
        throw new Error(`No memory with id "${id}"`);
      }
      await memory.user.delete(id);
      return { forgotten: id, text: record.text };
    },
  );
}
