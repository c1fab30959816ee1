import { snapshotSchema } from '@flashwear/shared';
import type { Snapshot } from '@flashwear/shared';
import { ParseError } from '../../common/errors';
import {
  CAPACITY_RULES,
  LOCAL_TIME_RULE,
  MODEL_RULE,
  SERIAL_RULE,
  detectFamily,
  firstMatch,
  toInteger,
} from './drive-families';

const MONTHS = ['jan', 'feb', 'mar', 'apr', 'may', 'jun', 'jul', 'aug', 'sep', 'oct', 'nov', 'dec'];

interface DateParts {
  year: number;
  month: number;
  day: number;
  hour: number;
  minute: number;
  second: number;
}

interface TimestampFormat {
  pattern: RegExp;
  toParts: (match: RegExpExecArray) => DateParts | null;
}

// smartctl prints `Mon Jan  1 10:00:00 2026 EST`; the zone name is dropped.
const TIMESTAMP_FORMATS: readonly TimestampFormat[] = [
  {
    pattern:
      /^(?:[A-Za-z]{3}\s+)?([A-Za-z]{3})\s+(\d{1,2})\s+(\d{1,2}):(\d{2}):(\d{2})\s+(\d{4})(?:\s+[A-Za-z][\w+-]*)?$/,
    toParts: (match) => {
      const month = MONTHS.indexOf(match[1].toLowerCase()) + 1;
      if (month === 0) return null;

      return {
        year: Number(match[6]),
        month,
        day: Number(match[2]),
        hour: Number(match[3]),
        minute: Number(match[4]),
        second: Number(match[5]),
      };
    },
  },
  {
    pattern: /^(\d{4})-(\d{2})-(\d{2})[ T](\d{2}):(\d{2}):(\d{2})$/,
    toParts: (match) => ({
      year: Number(match[1]),
      month: Number(match[2]),
      day: Number(match[3]),
      hour: Number(match[4]),
      minute: Number(match[5]),
      second: Number(match[6]),
    }),
  },
];

/**
 * Builds a timezone-naive instant: the wall-clock fields are stored in the UTC
 * slots, so differences between two naive timestamps are plain subtraction.
 */
function toNaiveDate(parts: DateParts): Date | null {
  const date = new Date(
    Date.UTC(parts.year, parts.month - 1, parts.day, parts.hour, parts.minute, parts.second),
  );

  const roundTrips =
    date.getUTCFullYear() === parts.year &&
    date.getUTCMonth() === parts.month - 1 &&
    date.getUTCDate() === parts.day &&
    date.getUTCHours() === parts.hour &&
    date.getUTCMinutes() === parts.minute &&
    date.getUTCSeconds() === parts.second;

  return roundTrips ? date : null;
}

export function parseLocalTime(value: string): Date | null {
  const trimmed = value.trim();
  for (const format of TIMESTAMP_FORMATS) {
    const match = format.pattern.exec(trimmed);
    if (!match) continue;

    const parts = format.toParts(match);
    const date = parts ? toNaiveDate(parts) : null;
    if (date) return date;
  }

  return null;
}

/**
 * Turns one `smartctl -a` report into a frozen {@link Snapshot}.
 *
 * @throws ParseError when the drive family, the write counter or the capture
 * time cannot be found.
 */
export function parseSnapshot(rawText: string): Snapshot {
  const lines = rawText.split(/\r?\n/);

  const family = detectFamily(lines);
  if (!family) {
    throw new ParseError('UnknownFormat', 'Report matches neither the NVMe nor the SATA layout');
  }

  const writeCounter = toInteger(firstMatch(lines, family.writeCounter.extract));
  if (writeCounter === null) {
    throw new ParseError(
      'MissingField',
      `Could not read ${family.writeCounter.field} from ${family.driveType} report`,
      family.writeCounter.field,
    );
  }

  const localTime = firstMatch(lines, LOCAL_TIME_RULE);
  const timestamp = localTime === null ? null : parseLocalTime(localTime);
  if (!timestamp) {
    throw new ParseError(
      'MissingTimestamp',
      localTime === null
        ? 'Report has no "Local Time is" line'
        : `Unrecognized local time "${localTime}"`,
    );
  }

  const capacityToken = CAPACITY_RULES.map((rule) => firstMatch(lines, rule)).find(
    (token): token is string => token !== null,
  );

  const candidate: Record<string, unknown> = {
    model: firstMatch(lines, MODEL_RULE) ?? '',
    serial: firstMatch(lines, SERIAL_RULE) ?? '',
    driveType: family.driveType,
    capacityBytes: toInteger(capacityToken ?? null),
    powerOnHours: toInteger(firstMatch(lines, family.powerOnHours)),
    timestamp,
    [family.writeCounter.field]: writeCounter,
  };

  for (const rule of family.extras) {
    candidate[rule.field] = toInteger(firstMatch(lines, rule.extract));
  }

  return snapshotSchema.parse(candidate);
}
