import { analysisConfigSchema, snapshotSchema } from '@flashwear/shared';
import type {
  AnalysisConfig,
  AnalysisConfigInput,
  NvmeSnapshot,
  SataSnapshot,
  Snapshot,
} from '@flashwear/shared';
import { ValidationError } from '../src/common/errors';
import type { ValidationErrorKind } from '../src/common/errors';

export interface NvmeReportOptions {
  localTime?: string | null;
  model?: string;
  serial?: string;
  capacity?: string | null;
  unitsWritten?: string | null;
  unitsRead?: string;
  powerOnHours?: string | null;
  percentageUsed?: string;
  availableSpare?: string;
}

export function nvmeReport(options: NvmeReportOptions = {}): string {
  const lines = [
    'smartctl 7.4 2023-08-01 r5530 [x86_64-linux-6.8.0] (local build)',
    '',
    '=== START OF INFORMATION SECTION ===',
    `Model Number:                       ${options.model ?? 'TEST NVME 512GB'}`,
    `Serial Number:                      ${options.serial ?? 'NVME-SN-0001'}`,
    'Firmware Version:                   1B2QEXM7',
  ];

  const capacity = options.capacity === undefined ? '512,110,190,592' : options.capacity;
  if (capacity !== null) {
    lines.push(`Namespace 1 Size/Capacity:          ${capacity} [512 GB]`);
  }

  const localTime = options.localTime === undefined ? 'Thu Jan  1 10:00:00 2026 UTC' : options.localTime;
  if (localTime !== null) {
    lines.push(`Local Time is:                      ${localTime}`);
  }

  lines.push(
    'NVMe Version:                       1.3',
    '',
    '=== START OF SMART DATA SECTION ===',
    'SMART/Health Information (NVMe Log 0x02)',
    'Critical Warning:                   0x00',
    `Available Spare:                    ${options.availableSpare ?? '100'}%`,
    `Percentage Used:                    ${options.percentageUsed ?? '4'}%`,
    `Data Units Read:                    ${options.unitsRead ?? '45,232,156'} [23.1 TB]`,
  );

  const unitsWritten = options.unitsWritten === undefined ? '50,000,000' : options.unitsWritten;
  if (unitsWritten !== null) {
    lines.push(`Data Units Written:                 ${unitsWritten} [25.6 TB]`);
  }

  const powerOnHours = options.powerOnHours === undefined ? '1,200' : options.powerOnHours;
  if (powerOnHours !== null) {
    lines.push(`Power On Hours:                     ${powerOnHours}`);
  }

  return `${lines.join('\n')}\n`;
}

export interface SataReportOptions {
  localTime?: string;
  model?: string;
  serial?: string;
  capacity?: string | null;
  lbaWritten?: string | null;
  powerOnHours?: string;
}

export function sataReport(options: SataReportOptions = {}): string {
  const lines = [
    'smartctl 7.4 2023-08-01 r5530 [x86_64-linux-6.8.0] (local build)',
    '',
    '=== START OF INFORMATION SECTION ===',
    `Device Model:     ${options.model ?? 'TEST SATA 256GB'}`,
    `Serial Number:    ${options.serial ?? 'SATA-SN-0001'}`,
  ];

  const capacity = options.capacity === undefined ? '256,060,514,304' : options.capacity;
  if (capacity !== null) {
    lines.push(`User Capacity:    ${capacity} bytes [256 GB]`);
  }

  lines.push(
    'SATA Version is:  SATA 3.3, 6.0 Gb/s (current: 6.0 Gb/s)',
    `Local Time is:    ${options.localTime ?? 'Thu Jan  1 10:00:00 2026 UTC'}`,
    '',
    '=== START OF READ SMART DATA SECTION ===',
    'SMART Attributes Data Structure revision number: 1',
    'Vendor Specific SMART Attributes with Thresholds:',
    'ID# ATTRIBUTE_NAME          FLAG     VALUE WORST THRESH TYPE      UPDATED  WHEN_FAILED RAW_VALUE',
    `  9 Power_On_Hours          0x0032   099   099   000    Old_age   Always       -       ${options.powerOnHours ?? '1200'}`,
    ' 12 Power_Cycle_Count       0x0032   099   099   000    Old_age   Always       -       87',
  );

  const lbaWritten = options.lbaWritten === undefined ? '97656250' : options.lbaWritten;
  if (lbaWritten !== null) {
    lines.push(
      `241 Total_LBAs_Written      0x0032   099   099   000    Old_age   Always       -       ${lbaWritten}`,
    );
  }

  return `${lines.join('\n')}\n`;
}

export function analysisConfig(overrides: Partial<AnalysisConfigInput> = {}): AnalysisConfig {
  return analysisConfigSchema.parse({
    hostLbaSizeKb: 0.5,
    flashLbaSizeKb: 32,
    ratedPeCycles: 3000,
    capacityGb: 512,
    ...overrides,
  });
}

export function nvmeSnapshot(overrides: Partial<NvmeSnapshot> = {}): Snapshot {
  return snapshotSchema.parse({
    model: 'TEST SSD 512GB',
    serial: 'SN-0001',
    driveType: 'NVMe',
    capacityBytes: 512_000_000_000,
    powerOnHours: 1200,
    timestamp: new Date('2026-01-01T10:00:00Z'),
    dataUnitsWritten: 50_000_000,
    dataUnitsRead: null,
    percentageUsed: 4,
    availableSpare: 100,
    ...overrides,
  });
}

export function sataSnapshot(overrides: Partial<SataSnapshot> = {}): Snapshot {
  return snapshotSchema.parse({
    model: 'TEST SSD 512GB',
    serial: 'SN-0001',
    driveType: 'SATA',
    capacityBytes: 512_000_000_000,
    powerOnHours: 1200,
    timestamp: new Date('2026-01-01T10:00:00Z'),
    lbaWritten: 97_656_250,
    ...overrides,
  });
}

export function validationFailure(run: () => unknown): ValidationError {
  try {
    run();
  } catch (error) {
    if (error instanceof ValidationError) return error;
    throw error;
  }
  throw new Error('expected a ValidationError');
}

export function failureKind(run: () => unknown): ValidationErrorKind {
  return validationFailure(run).kind;
}
