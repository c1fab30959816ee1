import type { DriveType, Snapshot } from '@flashwear/shared';

/** Returns the raw token for a field when the line carries it, otherwise null. */
export type LineExtractor = (line: string) => string | null;

export interface FieldRule {
  field: string;
  extract: LineExtractor;
}

export interface DriveFamily {
  driveType: DriveType;
  /** Any matching line classifies the report as this family. */
  markers: readonly RegExp[];
  writeCounter: FieldRule;
  powerOnHours: LineExtractor;
  extras: readonly FieldRule[];
}

export type WriteCounterField = 'dataUnitsWritten' | 'lbaWritten';

export function labelled(pattern: RegExp): LineExtractor {
  return (line) => pattern.exec(line)?.[1] ?? null;
}

/**
 * Reads the RAW_VALUE column of a row in the ATA attribute table, matched by
 * attribute ID or name. Raw values such as `1200h+05m+10.123s` keep their
 * leading digits only.
 */
export function attribute(id: string, name: string): LineExtractor {
  return (line) => {
    const tokens = line.trim().split(/\s+/);
    if (tokens.length < 10 || !/^0x[0-9a-f]+$/i.test(tokens[2])) {
      return null;
    }

    if (tokens[0] !== id && tokens[1] !== name) {
      return null;
    }

    return /^\d[\d,]*/.exec(tokens[9])?.[0] ?? null;
  };
}

export function firstMatch(lines: readonly string[], extract: LineExtractor): string | null {
  for (const line of lines) {
    const value = extract(line);
    if (value !== null) {
      return value;
    }
  }

  return null;
}

const GROUPED_INTEGER = /^\d{1,3}(?:[,.']\d{3})+$/;

/** Converts a counter token, dropping thousands separators. */
export function toInteger(token: string | null): number | null {
  if (token === null) return null;

  const trimmed = token.trim();
  if (!/^\d+$/.test(trimmed) && !GROUPED_INTEGER.test(trimmed)) {
    return null;
  }

  const value = Number(trimmed.replace(/[,.']/g, ''));
  return Number.isSafeInteger(value) ? value : null;
}

export const MODEL_RULE = labelled(/^\s*(?:Device Model|Model Number|Product):\s+(.+?)\s*$/);

export const SERIAL_RULE = labelled(/^\s*Serial Number:\s+(.+?)\s*$/);

export const CAPACITY_RULES: readonly LineExtractor[] = [
  labelled(/^\s*User Capacity:\s+([\d,.']+)\s+bytes/),
  labelled(/^\s*Namespace 1 Size\/Capacity:\s+([\d,.']+)/),
  labelled(/^\s*Total NVM Capacity:\s+([\d,.']+)/),
];

export const LOCAL_TIME_RULE = labelled(/^\s*Local Time is:\s+(.+?)\s*$/);

export const DRIVE_FAMILIES: readonly DriveFamily[] = [
  {
    driveType: 'NVMe',
    markers: [/NVMe Version:/, /NVMe Log/, /^\s*Data Units (?:Read|Written):/],
    writeCounter: {
      field: 'dataUnitsWritten',
      extract: labelled(/^\s*Data Units Written:\s+([\d,.']+)/),
    },
    powerOnHours: labelled(/^\s*Power On Hours:\s+([\d,.']+)/),
    extras: [
      { field: 'dataUnitsRead', extract: labelled(/^\s*Data Units Read:\s+([\d,.']+)/) },
      { field: 'percentageUsed', extract: labelled(/^\s*Percentage Used:\s+(\d+)%/) },
      { field: 'availableSpare', extract: labelled(/^\s*Available Spare:\s+(\d+)%/) },
    ],
  },
  {
    driveType: 'SATA',
    markers: [
      /Vendor Specific SMART Attributes/,
      /^\s*ID#\s+ATTRIBUTE_NAME/,
      /\bTotal_LBAs_(?:Written|Read)\b/,
      /^\s*SATA Version is:/,
    ],
    writeCounter: {
      field: 'lbaWritten',
      extract: attribute('241', 'Total_LBAs_Written'),
    },
    powerOnHours: attribute('9', 'Power_On_Hours'),
    extras: [],
  },
];

export function detectFamily(lines: readonly string[]): DriveFamily | null {
  return (
    DRIVE_FAMILIES.find((family) =>
      lines.some((line) => family.markers.some((marker) => marker.test(line))),
    ) ?? null
  );
}

export function writeCounterOf(snapshot: Snapshot): { field: WriteCounterField; value: number } {
  switch (snapshot.driveType) {
    case 'NVMe':
      return { field: 'dataUnitsWritten', value: snapshot.dataUnitsWritten };
    case 'SATA':
      return { field: 'lbaWritten', value: snapshot.lbaWritten };
  }
}
