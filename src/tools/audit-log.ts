import { appendFile, mkdir } from "fs/promises";
import { dirname } from "path";
import { errorMessage } from "../errors.js";
import { moduleLogger } from "../logger.js";
import type { ToolResult } from "./executor.js";

const log = moduleLogger("audit");

// ── Audit log — one JSON line per confirmed WRITE call ───

export interface AuditEntry {
  tool: string;
  arguments: unknown;
  confirmed_by: string;
  timestamp: string; // ISO 8601
  result_summary: string;
}

export interface AuditInput {
  tool: string;
  arguments: unknown;
  confirmedBy: string;
  timestamp: number; // Unix ms
  result: ToolResult;
}

const MAX_SUMMARY_CHARS = 200;

export function summarizeResult(result: ToolResult): string {
  let text: string;
  switch (result.status) {
    case "ok":
      text = `ok: ${typeof result.data === "string" ? result.data : JSON.stringify(result.data ?? null)}`;
      break;
    case "error":
      text = `error: ${result.error.message}`;
      break;
    case "cancelled":
      text = `cancelled: ${result.reason}`;
      break;
  }
  return text.length > MAX_SUMMARY_CHARS ? `${text.slice(0, MAX_SUMMARY_CHARS)}…` : text;
}

/**
 * Append-only audit trail. Entries are kept in memory and, when a path is
 * given, appended to a JSONL file. A failed append is logged, not thrown.
 */
export class AuditLog {
  private readonly entries: AuditEntry[] = [];

  constructor(private readonly path?: string) {}

  async record(input: AuditInput): Promise<AuditEntry> {
    const entry: AuditEntry = {
      tool: input.tool,
      arguments: input.arguments,
      confirmed_by: input.confirmedBy,
      timestamp: new Date(input.timestamp).toISOString(),
      result_summary: summarizeResult(input.result),
    };
    this.entries.push(entry);

    if (this.path) {
      try {
        await mkdir(dirname(this.path), { recursive: true });
        await appendFile(this.path, `${JSON.stringify(entry)}\n`, "utf-8");
      } catch (err) {
        log.error({ path: this.path, err: errorMessage(err) }, "❌ Failed to append audit record");
      }
    }
    return entry;
  }

  list(): readonly AuditEntry[] {
    return this.entries;
  }
}
