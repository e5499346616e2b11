import { z } from "zod";

const scoreState = z.string();

const recoveryRecordSchema = z
  .object({
    cycle_id: z.number().int(),
    sleep_id: z.union([z.string(), z.number()]),
    user_id: z.number().int(),
    created_at: z.string(),
    updated_at: z.string(),
    score_state: scoreState,
    score: z
      .object({
        user_calibrating: z.boolean(),
        recovery_score: z.number(),
        resting_heart_rate: z.number(),
        hrv_rmssd_milli: z.number(),
        spo2_percentage: z.number().nullish(),
        skin_temp_celsius: z.number().nullish(),
      })
      .nullish(),
  })
  .transform((raw) => ({
    cycleId: raw.cycle_id,
    sleepId: raw.sleep_id,
    userId: raw.user_id,
    createdAt: raw.created_at,
    updatedAt: raw.updated_at,
    scoreState: raw.score_state,
    score: raw.score
      ? {
          userCalibrating: raw.score.user_calibrating,
          recoveryScore: raw.score.recovery_score,
          restingHeartRate: raw.score.resting_heart_rate,
          hrvRmssdMilli: raw.score.hrv_rmssd_milli,
          spo2Percentage: raw.score.spo2_percentage ?? undefined,
          skinTempCelsius: raw.score.skin_temp_celsius ?? undefined,
        }
      : undefined,
  }));

const stageSummarySchema = z
  .object({
    total_in_bed_time_milli: z.number(),
    total_awake_time_milli: z.number(),
    total_no_data_time_milli: z.number(),
    total_light_sleep_time_milli: z.number(),
    total_slow_wave_sleep_time_milli: z.number(),
    total_rem_sleep_time_milli: z.number(),
    sleep_cycle_count: z.number(),
    disturbance_count: z.number(),
  })
  .transform((raw) => ({
    totalInBedTimeMilli: raw.total_in_bed_time_milli,
    totalAwakeTimeMilli: raw.total_awake_time_milli,
    totalNoDataTimeMilli: raw.total_no_data_time_milli,
    totalLightSleepTimeMilli: raw.total_light_sleep_time_milli,
    totalSlowWaveSleepTimeMilli: raw.total_slow_wave_sleep_time_milli,
    totalRemSleepTimeMilli: raw.total_rem_sleep_time_milli,
    sleepCycleCount: raw.sleep_cycle_count,
    disturbanceCount: raw.disturbance_count,
  }));

const sleepNeededSchema = z
  .object({
    baseline_milli: z.number(),
    need_from_sleep_debt_milli: z.number(),
    need_from_recent_strain_milli: z.number(),
    need_from_recent_nap_milli: z.number(),
  })
  .transform((raw) => ({
    baselineMilli: raw.baseline_milli,
    needFromSleepDebtMilli: raw.need_from_sleep_debt_milli,
    needFromRecentStrainMilli: raw.need_from_recent_strain_milli,
    needFromRecentNapMilli: raw.need_from_recent_nap_milli,
  }));

const sleepRecordSchema = z
  .object({
    id: z.union([z.string(), z.number()]),
    cycle_id: z.number().int().nullish(),
    user_id: z.number().int(),
    created_at: z.string(),
    updated_at: z.string(),
    start: z.string(),
    end: z.string(),
    timezone_offset: z.string().nullish(),
    nap: z.boolean(),
    score_state: scoreState,
    score: z
      .object({
        stage_summary: stageSummarySchema,
        sleep_needed: sleepNeededSchema.nullish(),
        respiratory_rate: z.number().nullish(),
        sleep_performance_percentage: z.number().nullish(),
        sleep_consistency_percentage: z.number().nullish(),
        sleep_efficiency_percentage: z.number().nullish(),
      })
      .nullish(),
  })
  .transform((raw) => ({
    id: raw.id,
    cycleId: raw.cycle_id ?? undefined,
    userId: raw.user_id,
    createdAt: raw.created_at,
    updatedAt: raw.updated_at,
    start: raw.start,
    end: raw.end,
    timezoneOffset: raw.timezone_offset ?? undefined,
    nap: raw.nap,
    scoreState: raw.score_state,
    score: raw.score
      ? {
          stageSummary: raw.score.stage_summary,
          sleepNeeded: raw.score.sleep_needed ?? undefined,
          respiratoryRate: raw.score.respiratory_rate ?? undefined,
          sleepPerformancePercentage:
            raw.score.sleep_performance_percentage ?? undefined,
          sleepConsistencyPercentage:
            raw.score.sleep_consistency_percentage ?? undefined,
          sleepEfficiencyPercentage:
            raw.score.sleep_efficiency_percentage ?? undefined,
        }
      : undefined,
  }));

const strainRecordSchema = z
  .object({
    id: z.number().int(),
    user_id: z.number().int(),
    created_at: z.string(),
    updated_at: z.string(),
    start: z.string(),
    end: z.string().nullish(),
    timezone_offset: z.string().nullish(),
    score_state: scoreState,
    score: z
      .object({
        strain: z.number(),
        kilojoule: z.number(),
        average_heart_rate: z.number(),
        max_heart_rate: z.number(),
      })
      .nullish(),
  })
  .transform((raw) => ({
    id: raw.id,
    userId: raw.user_id,
    createdAt: raw.created_at,
    updatedAt: raw.updated_at,
    start: raw.start,
    end: raw.end ?? undefined,
    timezoneOffset: raw.timezone_offset ?? undefined,
    scoreState: raw.score_state,
    score: raw.score
      ? {
          strain: raw.score.strain,
          kilojoule: raw.score.kilojoule,
          averageHeartRate: raw.score.average_heart_rate,
          maxHeartRate: raw.score.max_heart_rate,
        }
      : undefined,
  }));

export type Page<T> = {
  records: T[];
  nextToken: string | null;
};

function toPage<T>(raw: { records: T[]; next_token?: string | null }): Page<T> {
  return { records: raw.records, nextToken: raw.next_token ?? null };
}

const nextToken = z.string().nullish();

export const recoveryPageSchema = z
  .object({ records: z.array(recoveryRecordSchema), next_token: nextToken })
  .transform(toPage);
export const sleepPageSchema = z
  .object({ records: z.array(sleepRecordSchema), next_token: nextToken })
  .transform(toPage);
export const strainPageSchema = z
  .object({ records: z.array(strainRecordSchema), next_token: nextToken })
  .transform(toPage);

export type RecoveryRecord = z.output<typeof recoveryRecordSchema>;
export type SleepRecord = z.output<typeof sleepRecordSchema>;
export type StrainRecord = z.output<typeof strainRecordSchema>;

export type RecoveryPage = Page<RecoveryRecord>;
export type SleepPage = Page<SleepRecord>;
export type StrainPage = Page<StrainRecord>;
