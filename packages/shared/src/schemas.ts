import { z } from 'zod';

export const driveTypeSchema = z.enum(['NVMe', 'SATA']);

export const healthLabelSchema = z.enum(['Excellent', 'Good', 'Fair', 'Poor', 'Critical']);

export const lifeStatusSchema = z.enum(['Excellent', 'Good', 'Fair', 'Replace Soon']);

/** Largest accepted unit size, 1 GiB per count; keeps counter byte totals finite. */
export const MAX_LBA_SIZE_KB = 1024 * 1024;

const counterSchema = z.number().int().nonnegative().refine(Number.isSafeInteger, {
  message: 'Counter exceeds the safe integer range',
});

const optionalCounterSchema = counterSchema.nullable();

const snapshotBaseShape = {
  model: z.string(),
  serial: z.string(),
  capacityBytes: optionalCounterSchema,
  powerOnHours: optionalCounterSchema,
  timestamp: z.date(),
};

export const nvmeSnapshotSchema = z.object({
  ...snapshotBaseShape,
  driveType: z.literal('NVMe'),
  dataUnitsWritten: counterSchema,
  dataUnitsRead: optionalCounterSchema,
  percentageUsed: optionalCounterSchema,
  availableSpare: optionalCounterSchema,
});

export const sataSnapshotSchema = z.object({
  ...snapshotBaseShape,
  driveType: z.literal('SATA'),
  lbaWritten: counterSchema,
});

export const snapshotSchema = z
  .discriminatedUnion('driveType', [nvmeSnapshotSchema, sataSnapshotSchema])
  .readonly();

export const analysisConfigSchema = z
  .object({
    hostLbaSizeKb: z.number().positive().max(MAX_LBA_SIZE_KB),
    flashLbaSizeKb: z.number().positive().max(MAX_LBA_SIZE_KB),
    ratedPeCycles: z.number().int().positive(),
    capacityGb: z.number().positive().finite().nullable().default(null),
  })
  .brand<'AnalysisConfig'>();

export const analysisRequestSchema = z.object({
  snapshot1: z.string().min(1),
  snapshot2: z.string().min(1),
  hostLbaSizeKb: z.coerce.number(),
  flashLbaSizeKb: z.coerce.number(),
  ratedPeCycles: z.coerce.number(),
  capacityGb: z.coerce.number().nullish(),
  format: z.enum(['json', 'text']).default('json'),
});

const snapshotSummarySchema = z.object({
  timestamp: z.date(),
  writeCounter: counterSchema,
  powerOnHours: optionalCounterSchema,
  percentageUsed: optionalCounterSchema,
});

export const reportSchema = z
  .object({
    drive: z.object({
      model: z.string(),
      serial: z.string(),
      driveType: driveTypeSchema,
      capacityBytes: z.number().positive(),
      capacitySource: z.enum(['config', 'snapshot']),
    }),
    parameters: z.object({
      hostLbaSizeKb: z.number(),
      flashLbaSizeKb: z.number(),
      ratedPeCycles: z.number().int(),
      capacityGb: z.number().nullable(),
    }),
    comparison: z.object({
      first: snapshotSummarySchema,
      second: snapshotSummarySchema,
      elapsedDays: z.number().positive(),
      writeCounterDelta: counterSchema,
      powerOnHoursDelta: z.number().int().nullable(),
      percentageUsedDelta: z.number().int().nullable(),
    }),
    waf: z.number(),
    tbwHostBytes: z.number().int().nonnegative(),
    tbwFlashBytes: z.number().int().nonnegative(),
    lifetimeHostBytes: z.number().int().nonnegative(),
    dwpd: z.number().nonnegative(),
    dailyWriteRateBytes: z.number().nonnegative(),
    peCyclesConsumed: z.number().nonnegative(),
    wearPercent: z.number().nonnegative(),
    estimatedRemainingDays: z.number().nonnegative(),
    estimatedRemainingYears: z.number().nonnegative(),
    healthLabel: healthLabelSchema,
    lifeStatus: lifeStatusSchema,
  })
  .readonly();

export type DriveType = z.infer<typeof driveTypeSchema>;
export type HealthLabel = z.infer<typeof healthLabelSchema>;
export type LifeStatus = z.infer<typeof lifeStatusSchema>;
export type NvmeSnapshot = z.infer<typeof nvmeSnapshotSchema>;
export type SataSnapshot = z.infer<typeof sataSnapshotSchema>;
export type Snapshot = z.infer<typeof snapshotSchema>;
export type AnalysisConfig = z.infer<typeof analysisConfigSchema>;
export type AnalysisConfigInput = z.input<typeof analysisConfigSchema>;
export type AnalysisRequest = z.infer<typeof analysisRequestSchema>;
export type SnapshotSummary = z.infer<typeof snapshotSummarySchema>;
export type Report = z.infer<typeof reportSchema>;
