import { randomUUID } from "crypto";
import { appendFile, mkdir, readFile, rename, writeFile } from "fs/promises";
import { dirname, join } from "path";
import PQueue from "p-queue";
import { z } from "zod";
import { IndexUnavailableError, ValidationError, errorMessage } from "../errors.js";
import { moduleLogger } from "../logger.js";
import { withDeadline } from "../timeout.js";
import type { EmbeddingProvider } from "./embedder.js";
import { keywordScore } from "./text.js";
import { LshIndex } from "./vector-index.js";
import type {
  AddOptions,
  MemoryRecord,
  SearchHit,
  SearchOptions,
  Tier,
} from "./types.js";

const log = moduleLogger("vector-store");

// ── Importance rules ─────────────────────────────────────

const IMPORTANT_KEYWORDS = [
  "error", "config", "path", "file", "setting", "problem", "password",
  "deadline", "prefer", "always", "never", "allergic",
];

/** 0.5 base, +0.1 per keyword, +0.1 for a 20–200 char text, +0.2 when tagged important. */
export function evaluateImportance(text: string, tags: readonly string[] = []): number {
  const lower = text.toLowerCase();
  let score = 0.5;
  score += IMPORTANT_KEYWORDS.filter((k) => lower.includes(k)).length * 0.1;
  if (text.length > 20 && text.length < 200) score += 0.1;
  if (tags.includes("important")) score += 0.2;
  return Math.min(1, Math.max(0, score));
}

// ── On-disk formats ──────────────────────────────────────

const metadataSchema = z.record(
  z.string(),
  z.union([z.string(), z.number(), z.boolean()]),
);

const storedRecordSchema = z.object({
  id: z.string(),
  text: z.string(),
  importance: z.number(),
  createdAt: z.number(),
  tags: z.array(z.string()),
  metadata: metadataSchema,
  deleted: z.boolean(),
});

const sidecarSchema = z.object({
  version: z.literal(1),
  tier: z.enum(["user", "session", "context"]),
  dimension: z.number().int().positive(),
  records: z.array(storedRecordSchema),
});

const indexSnapshotSchema = z.object({
  version: z.literal(1),
  dimension: z.number().int().positive(),
  tables: z.number().int().positive(),
  bits: z.number().int().positive(),
  seed: z.number().int(),
  entries: z.array(z.tuple([z.string(), z.array(z.number())])),
});

const logLineSchema = z.discriminatedUnion("op", [
  storedRecordSchema.omit({ deleted: true }).extend({ op: z.literal("add") }),
  z.object({ op: z.literal("delete"), id: z.string(), at: z.number() }),
]);

type StoredRecord = z.infer<typeof storedRecordSchema>;
type LogLine = z.infer<typeof logLineSchema>;

// ── VectorMemoryStore ────────────────────────────────────

export interface VectorStoreOptions {
  tier: Tier;
  embedder: EmbeddingProvider;
  /** Directory for the durable files. Only the user tier persists. */
  dir?: string;
  /** File name prefix, usually the user id */
  owner?: string;
  /** Tombstone share that triggers a rebuild during maintain() */
  rebuildRatio?: number;
  /** Flush index and sidecar after this many adds (persistent tier only) */
  flushEvery?: number;
  /** Deadline for one embedding call */
  embedTimeoutMs?: number;
  now?: () => number;
}

export interface MaintenanceReport {
  reembedded: number;
  rebuilt: boolean;
  reclaimed: number;
}

export class VectorMemoryStore {
  readonly tier: Tier;
  private readonly embedder: EmbeddingProvider;
  private readonly paths: { index: string; meta: string; backup: string } | undefined;
  private readonly rebuildRatio: number;
  private readonly flushEvery: number;
  private readonly embedTimeoutMs: number;
  private readonly now: () => number;

  private records = new Map<string, MemoryRecord>();
  private index: LshIndex;
  private degraded = false;
  private addsSinceFlush = 0;

  // Single writer: add, delete, maintain and flush never interleave
  private readonly writer = new PQueue({ concurrency: 1 });

  constructor(opts: VectorStoreOptions) {
    this.tier = opts.tier;
    this.embedder = opts.embedder;
    this.rebuildRatio = opts.rebuildRatio ?? 0.25;
    this.embedTimeoutMs = opts.embedTimeoutMs ?? 30_000;
    this.flushEvery = opts.flushEvery ?? 10;
    this.now = opts.now ?? Date.now;
    this.index = new LshIndex({ dimension: opts.embedder.dimension });

    if (opts.dir && opts.tier === "user") {
      const owner = opts.owner ?? "default";
      this.paths = {
        index: join(opts.dir, `${owner}.index.json`),
        meta: join(opts.dir, `${owner}.meta.json`),
        backup: join(opts.dir, `${owner}.backup.jsonl`),
      };
    }
  }

  get persistent(): boolean {
    return this.paths !== undefined;
  }

  // ── Writes ─────────────────────────────────────────────

  /** Embed and store `text`. Resolves once the record is durable (user tier). */
  add(text: string, opts: AddOptions = {}): Promise<string> {
    return this.write(async () => {
      const tags = opts.tags ?? [];
      const record: MemoryRecord = {
        id: randomUUID(),
        text,
        vector: [],
        tier: this.tier,
        importance: opts.importance ?? evaluateImportance(text, tags),
        createdAt: opts.createdAt ?? this.now(),
        tags,
        metadata: opts.metadata ?? {},
        deleted: false,
      };

      record.vector = await this.tryEmbed(text);

      if (this.paths) {
        await this.appendLog({
          op: "add",
          id: record.id,
          text: record.text,
          importance: record.importance,
          createdAt: record.createdAt,
          tags: record.tags,
          metadata: record.metadata,
        });
      }

      this.records.set(record.id, record);
      if (record.vector.length > 0) {
        this.index.add(record.id, record.vector);
      } else {
        this.degraded = true;
      }

      if (this.paths && ++this.addsSinceFlush >= this.flushEvery) {
        await this.writeSnapshot();
      }

      log.debug({ tier: this.tier, id: record.id }, "🧠 Memory added");
      return record.id;
    });
  }

  /** Tombstone a record. The index keeps its vector until maintain() rebuilds. */
  delete(id: string): Promise<boolean> {
    return this.write(async () => {
      const record = this.records.get(id);
      if (!record || record.deleted) return false;

      if (this.paths) {
        await this.appendLog({ op: "delete", id, at: this.now() });
      }
      record.deleted = true;
      log.debug({ tier: this.tier, id }, "🗑️ Memory tombstoned");
      return true;
    });
  }

  /** Tombstone every live record. */
  clear(): Promise<number> {
    return this.write(async () => {
      let cleared = 0;
      for (const record of this.records.values()) {
        if (record.deleted) continue;
        if (this.paths) {
          await this.appendLog({ op: "delete", id: record.id, at: this.now() });
        }
        record.deleted = true;
        cleared++;
      }
      return cleared;
    });
  }

  // ── Reads ──────────────────────────────────────────────

  /**
   * Top-k live records ranked by cosine similarity. While degraded, ranks by
   * keyword overlap instead and never throws.
   */
  async search(query: string, opts: SearchOptions = {}): Promise<SearchHit[]> {
    const k = opts.k ?? 5;
    const minScore = opts.minScore ?? 0;
    const minImportance = opts.minImportance ?? 0;
    if (k <= 0 || this.count() === 0) return [];

    const accept = (id: string): boolean => {
      const record = this.records.get(id);
      return !!record && !record.deleted && record.importance >= minImportance;
    };

    const given = opts.vector;
    if (!this.degraded && given !== null) {
      try {
        const vector = given ?? (await this.embedWithDeadline(query));
        return this.index
          .search(vector, k, accept)
          .filter((hit) => hit.score >= minScore)
          .flatMap((hit) => {
            const record = this.records.get(hit.id);
            return record ? [{ record, score: hit.score, via: "vector" as const }] : [];
          });
      } catch (err) {
        log.warn(
          { tier: this.tier, err: errorMessage(err) },
          "⚠️ Query embedding failed — falling back to keyword search",
        );
      }
    }

    return this.keywordSearch(query, k, accept);
  }

  get(id: string): MemoryRecord | undefined {
    return this.records.get(id);
  }

  /** Live records, oldest first. */
  list(): MemoryRecord[] {
    return [...this.records.values()]
      .filter((r) => !r.deleted)
      .sort((a, b) => a.createdAt - b.createdAt);
  }

  count(): number {
    let live = 0;
    for (const record of this.records.values()) if (!record.deleted) live++;
    return live;
  }

  tombstoneRatio(): number {
    if (this.records.size === 0) return 0;
    return (this.records.size - this.count()) / this.records.size;
  }

  isDegraded(): boolean {
    return this.degraded;
  }

  // ── Maintenance ────────────────────────────────────────

  /**
   * Re-embed records that lost their vector, then rebuild the index when the
   * tombstone ratio reaches the threshold.
   */
  maintain(): Promise<MaintenanceReport> {
    return this.write(async () => {
      let reembedded = 0;
      let missing = 0;
      for (const record of this.records.values()) {
        if (record.deleted || record.vector.length > 0) continue;
        record.vector = await this.tryEmbed(record.text);
        if (record.vector.length > 0) {
          this.index.add(record.id, record.vector);
          reembedded++;
        } else {
          missing++;
        }
      }
      if (this.degraded && missing === 0) {
        this.degraded = false;
        log.info({ tier: this.tier, reembedded }, "✅ Vector search restored");
      }

      let rebuilt = false;
      let reclaimed = 0;
      if (this.records.size > 0 && this.tombstoneRatio() >= this.rebuildRatio) {
        reclaimed = this.rebuild();
        rebuilt = true;
      }

      if (this.paths && (rebuilt || reembedded > 0)) {
        await this.writeSnapshot();
        if (rebuilt) await this.compactLog();
      }
      return { reembedded, rebuilt, reclaimed };
    });
  }

  // ── Persistence ────────────────────────────────────────

  /** Write index and metadata sidecar. */
  flush(): Promise<void> {
    if (!this.paths) return Promise.resolve();
    return this.write(() => this.writeSnapshot());
  }

  /** Restore state from disk. Never throws on bad files: degrades instead. */
  load(): Promise<void> {
    return this.write(async () => {
      const paths = this.paths;
      if (!paths) return;

      const ops = await this.readLog(paths.backup);
      const sidecar = await readJson(paths.meta, sidecarSchema);
      const snapshot = await readJson(paths.index, indexSnapshotSchema);

      this.records = new Map();
      this.index = new LshIndex({ dimension: this.embedder.dimension });

      let indexProblem: string | undefined;
      if (!sidecar.ok || !snapshot.ok) {
        indexProblem = !sidecar.ok ? sidecar.reason : snapshot.ok ? "" : snapshot.reason;
      } else if (
        sidecar.value.dimension !== this.embedder.dimension ||
        snapshot.value.dimension !== this.embedder.dimension
      ) {
        indexProblem = `dimension ${snapshot.value.dimension} does not match embedder dimension ${this.embedder.dimension}`;
      }

      if (indexProblem === undefined && sidecar.ok && snapshot.ok) {
        const vectors = new Map(snapshot.value.entries);
        for (const stored of sidecar.value.records) {
          const vector = vectors.get(stored.id) ?? [];
          this.records.set(stored.id, this.fromStored(stored, vector));
        }
        this.index = LshIndex.fromJSON({
          ...snapshot.value,
          version: 1,
          entries: snapshot.value.entries.filter(([id]) => this.records.has(id)),
        });
      }

      // The log is authoritative for anything written after the last flush
      for (const op of ops) {
        if (op.op === "add") {
          if (!this.records.has(op.id)) {
            const { op: _op, ...stored } = op;
            this.records.set(op.id, this.fromStored({ ...stored, deleted: false }, []));
          }
        } else {
          const record = this.records.get(op.id);
          if (record) record.deleted = true;
        }
      }

      // A missing snapshot only means nothing was flushed yet: re-embed from the log
      if (indexProblem !== undefined && indexProblem !== "missing") {
        const warning = new IndexUnavailableError(
          `${this.tier} index unavailable (${indexProblem}); replayed ${this.records.size} record(s) from the backup log`,
        );
        log.warn({ tier: this.tier, err: warning.message }, "⚠️ Memory index degraded — keyword search until maintenance");
        this.degraded = true;
        return;
      }

      // Records the log added after the last snapshot still need vectors
      for (const record of this.records.values()) {
        if (record.deleted || record.vector.length > 0) continue;
        record.vector = await this.tryEmbed(record.text);
        if (record.vector.length > 0) this.index.add(record.id, record.vector);
        else this.degraded = true;
      }

      log.info(
        { tier: this.tier, records: this.count(), degraded: this.degraded },
        "📦 Memory tier loaded",
      );
    });
  }

  /** Wait for queued writes to finish. */
  async idle(): Promise<void> {
    await this.writer.onIdle();
  }

  // ── Internals ──────────────────────────────────────────

  private async write<T>(task: () => Promise<T>): Promise<T> {
    const result = await this.writer.add(task, { throwOnTimeout: true });
    return result;
  }

  private embedWithDeadline(text: string): Promise<number[]> {
    return withDeadline((signal) => this.embedder.embed(text, signal), this.embedTimeoutMs, {
      label: "Embedding",
    });
  }

  /** Vector for `text`, or [] when the embedder fails. */
  private async tryEmbed(text: string): Promise<number[]> {
    let vector: number[];
    try {
      vector = await this.embedWithDeadline(text);
    } catch (err) {
      log.warn(
        { tier: this.tier, err: errorMessage(err) },
        "⚠️ Embedding failed — record kept for keyword search",
      );
      return [];
    }
    if (vector.length !== this.embedder.dimension) {
      throw new ValidationError(
        `Embedding dimension ${vector.length} does not match ${this.embedder.dimension}`,
        [`expected ${this.embedder.dimension}`, `got ${vector.length}`],
      );
    }
    return vector;
  }

  private keywordSearch(
    query: string,
    k: number,
    accept: (id: string) => boolean,
  ): SearchHit[] {
    const hits: SearchHit[] = [];
    for (const record of this.records.values()) {
      if (!accept(record.id)) continue;
      const score = keywordScore(query, record.text);
      if (score > 0) hits.push({ record, score, via: "keyword" });
    }
    hits.sort((a, b) => b.score - a.score || b.record.createdAt - a.record.createdAt);
    return hits.slice(0, k);
  }

  /** Drop tombstoned records and rebuild the index from stored vectors. */
  private rebuild(): number {
    const next = new LshIndex({
      dimension: this.index.dimension,
      tables: this.index.tables,
      bits: this.index.bits,
      seed: this.index.seed,
    });
    let reclaimed = 0;
    for (const [id, record] of this.records) {
      if (record.deleted) {
        this.records.delete(id);
        reclaimed++;
      } else if (record.vector.length > 0) {
        next.add(id, record.vector);
      }
    }
    this.index = next;
    log.info({ tier: this.tier, reclaimed, live: this.records.size }, "🧹 Memory index rebuilt");
    return reclaimed;
  }

  private async writeSnapshot(): Promise<void> {
    const paths = this.paths;
    if (!paths) return;
    await mkdir(dirname(paths.index), { recursive: true });

    const sidecar: z.infer<typeof sidecarSchema> = {
      version: 1,
      tier: this.tier,
      dimension: this.embedder.dimension,
      records: [...this.records.values()].map((r) => this.toStored(r)),
    };
    await writeAtomic(paths.meta, JSON.stringify(sidecar));
    await writeAtomic(paths.index, JSON.stringify(this.index.toJSON()));
    this.addsSinceFlush = 0;
  }

  /** Rewrite the backup log so it holds only live records. */
  private async compactLog(): Promise<void> {
    const paths = this.paths;
    if (!paths) return;
    const lines = this.list().map((r) => {
      const { deleted: _deleted, ...stored } = this.toStored(r);
      return JSON.stringify({ op: "add", ...stored });
    });
    await writeAtomic(paths.backup, lines.length > 0 ? `${lines.join("\n")}\n` : "");
  }

  private async appendLog(line: LogLine): Promise<void> {
    const paths = this.paths;
    if (!paths) return;
    await mkdir(dirname(paths.backup), { recursive: true });
    await appendFile(paths.backup, `${JSON.stringify(line)}\n`, "utf-8");
  }

  private async readLog(path: string): Promise<LogLine[]> {
    let raw: string;
    try {
      raw = await readFile(path, "utf-8");
    } catch (err) {
      if (isNotFound(err)) return [];
      throw err;
    }

    const ops: LogLine[] = [];
    raw.split("\n").forEach((line, i) => {
      if (!line.trim()) return;
      try {
        const parsed = logLineSchema.safeParse(JSON.parse(line));
        if (parsed.success) ops.push(parsed.data);
        else log.warn({ line: i + 1 }, "⚠️ Skipping malformed backup log line");
      } catch {
        // A torn final line from a crash mid-append
        log.warn({ line: i + 1 }, "⚠️ Skipping unreadable backup log line");
      }
    });
    return ops;
  }

  private toStored(record: MemoryRecord): StoredRecord {
    return {
      id: record.id,
      text: record.text,
      importance: record.importance,
      createdAt: record.createdAt,
      tags: record.tags,
      metadata: record.metadata,
      deleted: record.deleted,
    };
  }

  private fromStored(stored: StoredRecord, vector: number[]): MemoryRecord {
    return { ...stored, vector, tier: this.tier };
  }
}

// ── File helpers ─────────────────────────────────────────

type ReadOutcome<T> = { ok: true; value: T } | { ok: false; reason: string };

async function readJson<T>(path: string, schema: z.ZodType<T>): Promise<ReadOutcome<T>> {
  let raw: string;
  try {
    raw = await readFile(path, "utf-8");
  } catch (err) {
    if (isNotFound(err)) return { ok: false, reason: "missing" };
    return { ok: false, reason: errorMessage(err) };
  }
  try {
    const parsed = schema.safeParse(JSON.parse(raw));
    return parsed.success
      ? { ok: true, value: parsed.data }
      : { ok: false, reason: "unexpected shape" };
  } catch (err) {
    return { ok: false, reason: `corrupted (${errorMessage(err)})` };
  }
}

async function writeAtomic(path: string, content: string): Promise<void> {
  const tmp = `${path}.tmp`;
  await writeFile(tmp, content, "utf-8");
  await rename(tmp, path);
}

function isNotFound(err: unknown): boolean {
  return typeof err === "object" && err !== null && "code" in err && err.code === "ENOENT";
}
