import { tokenize } from "../memory/text.js";
import type { ToolInfo } from "../tools/executor.js";

// ── Tool selection — only schemas relevant to the message ─

export interface ToolSelection {
  /** Tool names to offer this turn */
  names: string[];
  /** First topic keyword that matched, if any */
  topic: string | undefined;
}

/**
 * Pick the tools whose topic keywords appear in `text`, plus every tool
 * marked alwaysAvailable. Chit-chat with no matching topic gets only the
 * always-available tools.
 */
export function selectTools(text: string, tools: readonly ToolInfo[]): ToolSelection {
  const words = new Set(tokenize(text));
  const names: string[] = [];
  let topic: string | undefined;

  for (const tool of tools) {
    const hit = (tool.topics ?? []).find((t) => tokenize(t).some((w) => words.has(w)));
    if (hit !== undefined) topic ??= hit;
    if (hit !== undefined || tool.alwaysAvailable) names.push(tool.name);
  }

  return { names, topic };
}
