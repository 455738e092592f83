import { cosineSimilarity } from "./embedder.js";

// ── Approximate nearest-neighbor index ───────────────────
// Random-hyperplane LSH: each table hashes a vector to `bits` sign bits.
// A query probes its own bucket plus every bucket one bit away in each table,
// then re-ranks the candidates by exact cosine. When the probe yields fewer
// than k live candidates the index falls back to a flat scan.

export interface IndexHit {
  id: string;
  score: number;
}

export interface LshIndexOptions {
  dimension: number;
  tables?: number;
  bits?: number;
  seed?: number;
}

export interface IndexSnapshot {
  version: 1;
  dimension: number;
  tables: number;
  bits: number;
  seed: number;
  entries: [string, number[]][];
}

export class LshIndex {
  readonly dimension: number;
  readonly tables: number;
  readonly bits: number;
  readonly seed: number;

  private readonly planes: Float64Array[][];
  private readonly buckets: Map<number, Set<string>>[];
  private readonly vectors = new Map<string, number[]>();
  private readonly signatures = new Map<string, number[]>();

  constructor(opts: LshIndexOptions) {
    this.dimension = opts.dimension;
    this.tables = opts.tables ?? 8;
    this.bits = Math.min(opts.bits ?? 10, 30);
    this.seed = opts.seed ?? 0x5eed;

    const random = gaussian(mulberry32(this.seed));
    this.planes = Array.from({ length: this.tables }, () =>
      Array.from({ length: this.bits }, () => {
        const plane = new Float64Array(this.dimension);
        for (let i = 0; i < this.dimension; i++) plane[i] = random();
        return plane;
      }),
    );
    this.buckets = Array.from({ length: this.tables }, () => new Map());
  }

  get size(): number {
    return this.vectors.size;
  }

  has(id: string): boolean {
    return this.vectors.has(id);
  }

  add(id: string, vector: number[]): void {
    if (vector.length !== this.dimension) {
      throw new RangeError(
        `Vector dimension mismatch: expected ${this.dimension}, got ${vector.length}`,
      );
    }
    if (this.vectors.has(id)) this.remove(id);

    const signature = this.planes.map((table) => this.hash(table, vector));
    signature.forEach((key, t) => {
      const table = this.buckets[t];
      if (!table) return;
      let bucket = table.get(key);
      if (!bucket) {
        bucket = new Set();
        table.set(key, bucket);
      }
      bucket.add(id);
    });
    this.vectors.set(id, vector);
    this.signatures.set(id, signature);
  }

  remove(id: string): boolean {
    const signature = this.signatures.get(id);
    if (!signature) return false;
    signature.forEach((key, t) => {
      const bucket = this.buckets[t]?.get(key);
      bucket?.delete(id);
      if (bucket && bucket.size === 0) this.buckets[t]?.delete(key);
    });
    this.signatures.delete(id);
    return this.vectors.delete(id);
  }

  /**
   * Top-k ids by cosine similarity. `accept` filters ids (tombstones,
   * importance) before ranking.
   */
  search(
    query: number[],
    k: number,
    accept: (id: string) => boolean = () => true,
  ): IndexHit[] {
    if (k <= 0 || this.vectors.size === 0) return [];

    const candidates = new Set<string>();
    this.planes.forEach((table, t) => {
      const key = this.hash(table, query);
      this.collect(t, key, candidates, accept);
      for (let b = 0; b < this.bits; b++) {
        this.collect(t, key ^ (1 << b), candidates, accept);
      }
    });

    const pool =
      candidates.size >= k
        ? candidates
        : [...this.vectors.keys()].filter((id) => accept(id));

    const hits: IndexHit[] = [];
    for (const id of pool) {
      const vector = this.vectors.get(id);
      if (vector) hits.push({ id, score: cosineSimilarity(query, vector) });
    }
    hits.sort((a, b) => b.score - a.score);
    return hits.slice(0, k);
  }

  toJSON(): IndexSnapshot {
    return {
      version: 1,
      dimension: this.dimension,
      tables: this.tables,
      bits: this.bits,
      seed: this.seed,
      entries: [...this.vectors.entries()],
    };
  }

  static fromJSON(snapshot: IndexSnapshot): LshIndex {
    const index = new LshIndex(snapshot);
    for (const [id, vector] of snapshot.entries) index.add(id, vector);
    return index;
  }

  // ── Internals ──────────────────────────────────────────

  private hash(table: Float64Array[], vector: readonly number[]): number {
    let key = 0;
    table.forEach((plane, b) => {
      let dot = 0;
      for (let i = 0; i < plane.length; i++) dot += (plane[i] ?? 0) * (vector[i] ?? 0);
      if (dot >= 0) key |= 1 << b;
    });
    return key;
  }

  private collect(
    table: number,
    key: number,
    into: Set<string>,
    accept: (id: string) => boolean,
  ): void {
    const bucket = this.buckets[table]?.get(key);
    if (!bucket) return;
    for (const id of bucket) {
      if (accept(id)) into.add(id);
    }
  }
}

// ── Seeded randomness so planes survive a restart ───────

function mulberry32(seed: number): () => number {
  let a = seed >>> 0;
  return () => {
    a = (a + 0x6d2b79f5) >>> 0;
    let t = a;
    t = Math.imul(t ^ (t >>> 15), t | 1);
    t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  };
}

function gaussian(uniform: () => number): () => number {
  return () => {
    const u = Math.max(uniform(), Number.EPSILON);
    const v = uniform();
    return Math.sqrt(-2 * Math.log(u)) * Math.cos(2 * Math.PI * v);
  };
}
