import type { Cycle } from "../types.js";

/**
 * A unit of work against the cycle store. Rows handed out are drafts: edit
 * them in place, then `commit()` writes every touched row at once.
 */
export interface CycleTransaction {
  findOrCreate(cycleId: number): Cycle;
  /** `day` is a UTC calendar day, `YYYY-MM-DD`. */
  findByDay(day: string): Cycle | null;
  commit(): Promise<void>;
}

export interface CycleStore {
  begin(): Promise<CycleTransaction>;
  list(): Promise<Cycle[]>;
}
