import { reportSchema } from '@flashwear/shared';
import type {
  AnalysisConfig,
  HealthLabel,
  LifeStatus,
  Report,
  Snapshot,
  SnapshotSummary,
} from '@flashwear/shared';
import { ValidationError } from '../../common/errors';
import { writeCounterOf } from '../snapshots/drive-families';

const MS_PER_DAY = 24 * 60 * 60 * 1000;
const BYTES_PER_KB = 1024;
const BYTES_PER_GB = 1e9;
const DAYS_PER_YEAR = 365.25;

const HEALTH_THRESHOLDS: ReadonlyArray<{ below: number; label: HealthLabel }> = [
  { below: 50, label: 'Excellent' },
  { below: 75, label: 'Good' },
  { below: 90, label: 'Fair' },
  { below: 100, label: 'Poor' },
];

const LIFE_THRESHOLDS: ReadonlyArray<{ above: number; status: LifeStatus }> = [
  { above: 3, status: 'Excellent' },
  { above: 1, status: 'Good' },
  { above: 0.5, status: 'Fair' },
];

export function healthLabelForWear(wearPercent: number): HealthLabel {
  return HEALTH_THRESHOLDS.find((threshold) => wearPercent < threshold.below)?.label ?? 'Critical';
}

/** Status from projected remaining years; an indefinite life lands in the top band. */
export function lifeStatusForYears(remainingYears: number): LifeStatus {
  return LIFE_THRESHOLDS.find((threshold) => remainingYears > threshold.above)?.status ?? 'Replace Soon';
}

function identity(snapshot: Snapshot) {
  return { model: snapshot.model, serial: snapshot.serial };
}

function assertComparable(a: Snapshot, b: Snapshot): void {
  const serialsDiffer = a.serial !== '' && b.serial !== '' && a.serial !== b.serial;
  if (a.model !== b.model || serialsDiffer) {
    throw new ValidationError(
      'DifferentDrives',
      `Snapshots are from different drives: ${a.model} (${a.serial || 'no serial'}) vs ${b.model} (${b.serial || 'no serial'})`,
      { first: identity(a), second: identity(b) },
    );
  }

  if (a.timestamp.getTime() >= b.timestamp.getTime()) {
    throw new ValidationError('OutOfOrder', 'Snapshot 1 must be captured before snapshot 2', {
      first: a.timestamp.toISOString(),
      second: b.timestamp.toISOString(),
    });
  }

  if (a.driveType !== b.driveType) {
    throw new ValidationError(
      'MixedFormats',
      `Cannot compare a ${a.driveType} report with a ${b.driveType} report`,
      { first: a.driveType, second: b.driveType },
    );
  }
}

function resolveCapacity(a: Snapshot, config: AnalysisConfig) {
  if (config.capacityGb !== null) {
    return { capacityBytes: config.capacityGb * BYTES_PER_GB, capacitySource: 'config' as const };
  }

  if (a.capacityBytes !== null && a.capacityBytes > 0) {
    return { capacityBytes: a.capacityBytes, capacitySource: 'snapshot' as const };
  }

  throw new ValidationError(
    'MissingCapacity',
    'Drive capacity was not detected in snapshot 1 and no capacity override was given',
  );
}

function percentageUsed(snapshot: Snapshot): number | null {
  return snapshot.driveType === 'NVMe' ? snapshot.percentageUsed : null;
}

function summarize(snapshot: Snapshot): SnapshotSummary {
  return {
    timestamp: snapshot.timestamp,
    writeCounter: writeCounterOf(snapshot).value,
    powerOnHours: snapshot.powerOnHours,
    percentageUsed: percentageUsed(snapshot),
  };
}

function deltaOf(first: number | null, second: number | null): number | null {
  return first === null || second === null ? null : second - first;
}

/**
 * Compares two snapshots of the same drive and derives its endurance metrics.
 *
 * WAF is the configured flash/host unit-size ratio and flash writes are the
 * host write delta scaled by the flash unit size; neither report family exposes
 * an independent flash-write counter.
 *
 * @throws ValidationError when the pair cannot be compared or no capacity is known.
 */
export function analyzeSnapshots(a: Snapshot, b: Snapshot, config: AnalysisConfig): Report {
  assertComparable(a, b);

  const elapsedDays = (b.timestamp.getTime() - a.timestamp.getTime()) / MS_PER_DAY;

  const first = writeCounterOf(a);
  const second = writeCounterOf(b);
  const deltaUnits = second.value - first.value;
  if (deltaUnits < 0) {
    throw new ValidationError(
      'CounterRegression',
      `${second.field} decreased from ${first.value} to ${second.value}`,
      { field: second.field, first: first.value, second: second.value },
    );
  }

  const { capacityBytes, capacitySource } = resolveCapacity(a, config);

  const hostUnitBytes = config.hostLbaSizeKb * BYTES_PER_KB;
  const flashUnitBytes = config.flashLbaSizeKb * BYTES_PER_KB;

  const tbwHostBytes = Math.round(deltaUnits * hostUnitBytes);
  const tbwFlashBytes = Math.round(deltaUnits * flashUnitBytes);
  const dailyWriteRateBytes = tbwHostBytes / elapsedDays;
  const dailyFlashWriteBytes = tbwFlashBytes / elapsedDays;

  const peCyclesConsumed = tbwFlashBytes / capacityBytes;
  const wearPercent = (100 * peCyclesConsumed) / config.ratedPeCycles;
  const remainingPeCycles = config.ratedPeCycles - peCyclesConsumed;

  let estimatedRemainingDays: number;
  if (dailyWriteRateBytes === 0 || dailyFlashWriteBytes === 0) {
    estimatedRemainingDays = Number.POSITIVE_INFINITY;
  } else if (remainingPeCycles <= 0) {
    estimatedRemainingDays = 0;
  } else {
    estimatedRemainingDays = (remainingPeCycles * capacityBytes) / dailyFlashWriteBytes;
  }

  const estimatedRemainingYears = estimatedRemainingDays / DAYS_PER_YEAR;

  return reportSchema.parse({
    drive: {
      model: b.model,
      serial: b.serial,
      driveType: b.driveType,
      capacityBytes,
      capacitySource,
    },
    parameters: {
      hostLbaSizeKb: config.hostLbaSizeKb,
      flashLbaSizeKb: config.flashLbaSizeKb,
      ratedPeCycles: config.ratedPeCycles,
      capacityGb: config.capacityGb,
    },
    comparison: {
      first: summarize(a),
      second: summarize(b),
      elapsedDays,
      writeCounterDelta: deltaUnits,
      powerOnHoursDelta: deltaOf(a.powerOnHours, b.powerOnHours),
      percentageUsedDelta: deltaOf(percentageUsed(a), percentageUsed(b)),
    },
    waf: config.flashLbaSizeKb / config.hostLbaSizeKb,
    tbwHostBytes,
    tbwFlashBytes,
    lifetimeHostBytes: Math.round(second.value * hostUnitBytes),
    dwpd: dailyWriteRateBytes / capacityBytes,
    dailyWriteRateBytes,
    peCyclesConsumed,
    wearPercent,
    estimatedRemainingDays,
    estimatedRemainingYears,
    healthLabel: healthLabelForWear(wearPercent),
    lifeStatus: lifeStatusForYears(estimatedRemainingYears),
  });
}
