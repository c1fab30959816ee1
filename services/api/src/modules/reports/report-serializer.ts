import type { Report, SnapshotSummary } from '@flashwear/shared';

export type Indefinite = 'indefinite';

function serializeSummary(summary: SnapshotSummary) {
  return {
    ...summary,
    timestamp: summary.timestamp.toISOString().slice(0, 19),
  };
}

function finiteOrIndefinite(value: number): number | Indefinite {
  return Number.isFinite(value) ? value : 'indefinite';
}

/** JSON-safe view of a report: naive ISO timestamps and `indefinite` in place of Infinity. */
export function serializeReport(report: Report) {
  return {
    ...report,
    comparison: {
      ...report.comparison,
      first: serializeSummary(report.comparison.first),
      second: serializeSummary(report.comparison.second),
    },
    estimatedRemainingDays: finiteOrIndefinite(report.estimatedRemainingDays),
    estimatedRemainingYears: finiteOrIndefinite(report.estimatedRemainingYears),
  };
}

export type SerializedReport = ReturnType<typeof serializeReport>;
