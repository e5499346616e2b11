import type {
  RecoveryRecord,
  SleepRecord,
  StrainRecord,
} from "../api/schemas.js";
import type { Cycle } from "../types.js";
import { debug } from "../utils/log.js";
import { utcDay } from "./cycle-store.js";
import type { CycleStore, CycleTransaction } from "./types.js";

export type FetchedRecords = {
  recovery: RecoveryRecord[];
  sleep: SleepRecord[];
  strain: StrainRecord[];
};

export function applyStrain(row: Cycle, record: StrainRecord, stamp: string) {
  const start = Date.parse(record.start);
  if (!Number.isNaN(start)) {
    row.date = new Date(start).toISOString();
  }
  if (record.score) {
    row.strain = record.score.strain;
    row.kilojoules = record.score.kilojoule;
    row.averageHeartRate = record.score.averageHeartRate;
    row.maxHeartRate = record.score.maxHeartRate;
  }
  row.fetchedAt = stamp;
}

export function applyRecovery(
  row: Cycle,
  record: RecoveryRecord,
  stamp: string
) {
  if (record.score) {
    row.recoveryScore = record.score.recoveryScore;
    row.hrvRmssdMilli = record.score.hrvRmssdMilli;
    row.restingHeartRate = record.score.restingHeartRate;
  }
  row.fetchedAt = stamp;
}

export function applySleep(row: Cycle, record: SleepRecord, stamp: string) {
  if (record.score) {
    row.sleepPerformance =
      record.score.sleepPerformancePercentage ?? 0;
    row.sleepSwsMilli = record.score.stageSummary.totalSlowWaveSleepTimeMilli;
    row.sleepRemMilli = record.score.stageSummary.totalRemSleepTimeMilli;
  }
  row.fetchedAt = stamp;
}

function sleepTarget(tx: CycleTransaction, record: SleepRecord) {
  if (record.cycleId !== undefined) {
    return tx.findOrCreate(record.cycleId);
  }
  const day = utcDay(record.end);
  return day === null ? null : tx.findByDay(day);
}

/**
 * Overlays one fetch window onto the store in a single transaction: strain
 * first (it owns `date`), then recovery, then non-nap sleep. Rows are keyed by
 * cycle id, so re-running with overlapping windows never duplicates a cycle.
 *
 * @returns the number of distinct cycles touched by the strain pass
 */
export async function mergeAndPersist(
  store: CycleStore,
  records: FetchedRecords,
  now: Date
) {
  const stamp = now.toISOString();
  const tx = await store.begin();
  const strainCycles = new Set<number>();

  for (const record of records.strain) {
    applyStrain(tx.findOrCreate(record.id), record, stamp);
    strainCycles.add(record.id);
  }
  for (const record of records.recovery) {
    applyRecovery(tx.findOrCreate(record.cycleId), record, stamp);
  }
  for (const record of records.sleep) {
    if (record.nap) {
      continue;
    }
    const row = sleepTarget(tx, record);
    if (!row) {
      debug(`No cycle found for sleep ${String(record.id)}; skipping.`);
      continue;
    }
    applySleep(row, record, stamp);
  }

  await tx.commit();
  return strainCycles.size;
}
