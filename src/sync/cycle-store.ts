import PQueue from "p-queue";
import { z } from "zod";
import { cycleFilePath } from "../config/paths.js";
import type { Cycle } from "../types.js";
import { atomicWrite, readFileIfExists } from "../utils/fs.js";
import type { CycleStore, CycleTransaction } from "./types.js";

const cycleSchema = z.object({
  cycleId: z.number().int(),
  date: z.string(),
  strain: z.number(),
  kilojoules: z.number(),
  averageHeartRate: z.number(),
  maxHeartRate: z.number(),
  recoveryScore: z.number(),
  hrvRmssdMilli: z.number(),
  restingHeartRate: z.number(),
  sleepPerformance: z.number(),
  sleepSwsMilli: z.number(),
  sleepRemMilli: z.number(),
  fetchedAt: z.string(),
});

const cycleFileSchema = z.object({
  version: z.literal(1),
  cycles: z.array(cycleSchema),
});

type Clock = () => Date;

/** UTC calendar day (`YYYY-MM-DD`) of an ISO timestamp, or null if unparsable. */
export function utcDay(iso: string) {
  const time = Date.parse(iso);
  if (Number.isNaN(time)) {
    return null;
  }
  return new Date(time).toISOString().slice(0, 10);
}

export function emptyCycle(cycleId: number, now: Date): Cycle {
  const stamp = now.toISOString();
  return {
    cycleId,
    date: stamp,
    strain: 0,
    kilojoules: 0,
    averageHeartRate: 0,
    maxHeartRate: 0,
    recoveryScore: 0,
    hrvRmssdMilli: 0,
    restingHeartRate: 0,
    sleepPerformance: 0,
    sleepSwsMilli: 0,
    sleepRemMilli: 0,
    fetchedAt: stamp,
  };
}

export function sortNewestFirst(cycles: Cycle[]) {
  return [...cycles].sort((a, b) => {
    const byDate = Date.parse(b.date) - Date.parse(a.date);
    return byDate === 0 || Number.isNaN(byDate) ? b.cycleId - a.cycleId : byDate;
  });
}

/** The most recent `fetchedAt` across `cycles`, whatever their dates. */
export function latestFetchedAt(cycles: Cycle[]) {
  let latest: string | null = null;
  for (const cycle of cycles) {
    if (latest === null || Date.parse(cycle.fetchedAt) > Date.parse(latest)) {
      latest = cycle.fetchedAt;
    }
  }
  return latest;
}

class SnapshotTransaction implements CycleTransaction {
  private readonly rows: Map<number, Cycle>;
  private readonly touched = new Set<number>();
  private readonly now: Clock;
  private readonly write: (rows: Cycle[]) => Promise<void>;
  private committed = false;

  constructor(
    snapshot: Cycle[],
    now: Clock,
    write: (rows: Cycle[]) => Promise<void>
  ) {
    this.rows = new Map(snapshot.map((row) => [row.cycleId, { ...row }]));
    this.now = now;
    this.write = write;
  }

  findOrCreate(cycleId: number) {
    let row = this.rows.get(cycleId);
    if (!row) {
      row = emptyCycle(cycleId, this.now());
      this.rows.set(cycleId, row);
    }
    this.touched.add(cycleId);
    return row;
  }

  findByDay(day: string) {
    for (const row of this.rows.values()) {
      if (utcDay(row.date) === day) {
        this.touched.add(row.cycleId);
        return row;
      }
    }
    return null;
  }

  async commit() {
    if (this.committed) {
      throw new Error("Transaction already committed.");
    }
    this.committed = true;
    const rows: Cycle[] = [];
    for (const cycleId of this.touched) {
      const row = this.rows.get(cycleId);
      if (row) {
        rows.push({ ...row });
      }
    }
    if (rows.length > 0) {
      await this.write(rows);
    }
  }
}

export class MemoryCycleStore implements CycleStore {
  private readonly rows = new Map<number, Cycle>();
  private readonly now: Clock;

  constructor(options?: { now?: Clock; initial?: Cycle[] }) {
    this.now = options?.now ?? (() => new Date());
    for (const row of options?.initial ?? []) {
      this.rows.set(row.cycleId, { ...row });
    }
  }

  async begin(): Promise<CycleTransaction> {
    return new SnapshotTransaction(
      Array.from(this.rows.values()),
      this.now,
      async (rows) => {
        for (const row of rows) {
          this.rows.set(row.cycleId, row);
        }
      }
    );
  }

  async list() {
    return sortNewestFirst(
      Array.from(this.rows.values(), (row) => ({ ...row }))
    );
  }
}

/**
 * Cycles persisted as one JSON document. Commits re-read the file under a
 * single-slot queue and overlay only the rows they touched.
 */
export class FileCycleStore implements CycleStore {
  private readonly filePath: string;
  private readonly now: Clock;
  private readonly queue = new PQueue({ concurrency: 1 });

  constructor(options?: { filePath?: string; now?: Clock }) {
    this.filePath = options?.filePath ?? cycleFilePath();
    this.now = options?.now ?? (() => new Date());
  }

  private async load(): Promise<Cycle[]> {
    const raw = await readFileIfExists(this.filePath);
    if (raw === null) {
      return [];
    }
    const parsed = cycleFileSchema.safeParse(JSON.parse(raw));
    if (!parsed.success) {
      throw new Error(
        `Invalid cycle file at ${this.filePath}: ${parsed.error.issues
          .map((issue) => `${issue.path.join(".")} ${issue.message}`)
          .join("; ")}`
      );
    }
    return parsed.data.cycles;
  }

  private async persist(rows: Cycle[]) {
    await this.queue.add(async () => {
      const current = new Map(
        (await this.load()).map((row) => [row.cycleId, row])
      );
      for (const row of rows) {
        current.set(row.cycleId, row);
      }
      const document: z.infer<typeof cycleFileSchema> = {
        version: 1,
        cycles: sortNewestFirst(Array.from(current.values())),
      };
      await atomicWrite(this.filePath, JSON.stringify(document, null, 2));
    });
  }

  async begin(): Promise<CycleTransaction> {
    return new SnapshotTransaction(await this.load(), this.now, (rows) =>
      this.persist(rows)
    );
  }

  async list() {
    return sortNewestFirst(await this.load());
  }
}
