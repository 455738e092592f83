import { mkdir, writeFile } from "fs/promises";
import { basename, join } from "path";
import { z } from "zod";
import { moduleLogger } from "../logger.js";
import type { MemoryManager } from "../memory/manager.js";
import type { ToolExecutor } from "./executor.js";

const log = moduleLogger("export-transcript");

const parameters = z.object({
  filename: z
    .string()
    .regex(/^[\w.-]+\.md$/, "must be a plain file name ending in .md")
    .describe("File name, e.g. 'notes.md'. Written to the export directory."),
  title: z.string().optional().describe("Heading for the transcript."),
});

export function registerExportTranscript(
  executor: ToolExecutor,
  memory: MemoryManager,
  exportDir: string,
): void {
  executor.register(
    {
      name: "export_transcript",
      description:
        "Save the current conversation as a Markdown file. Use when the user asks to export, save or download the chat.",
      parameters,
      permission: "write",
      topics: ["export", "save", "transcript", "download", "file", "markdown"],
      preview: ({ filename }) =>
        `Write ${memory.window.size} turn(s) to ${join(exportDir, basename(filename))}`,
    },
    async ({ filename, title }) => {
      await mkdir(exportDir, { recursive: true });
      const path = join(exportDir, basename(filename));
      const markdown = memory.window.toMarkdown(title);
      await writeFile(path, markdown, "utf-8");
      log.info({ path }, "📎 Transcript exported");
      return { path, turns: memory.window.size, bytes: Buffer.byteLength(markdown) };
    },
  );
}
