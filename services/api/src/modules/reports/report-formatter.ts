import type { Report } from '@flashwear/shared';

const WIDTH = 80;
const BYTE_UNITS = ['B', 'KB', 'MB', 'GB', 'TB', 'PB'];
const WRITE_COUNTER_LABELS = {
  NVMe: 'Data Units Written',
  SATA: 'Total LBAs Written',
} as const;

export interface FormatOptions {
  generatedAt: Date;
}

export function formatBytes(bytes: number, precision = 2): string {
  let value = bytes;
  let unitIndex = 0;
  while (value >= 1024 && unitIndex < BYTE_UNITS.length - 1) {
    value /= 1024;
    unitIndex += 1;
  }

  return `${value.toFixed(precision)} ${BYTE_UNITS[unitIndex]}`;
}

export function formatCount(value: number): string {
  return value.toLocaleString('en-US');
}

/** Renders the wall-clock fields of a naive timestamp as `YYYY-MM-DD HH:MM:SS`. */
export function formatTimestamp(date: Date): string {
  return date.toISOString().slice(0, 19).replace('T', ' ');
}

export function createAsciiTable(headers: string[], rows: string[][]): string {
  const widths = headers.map((header, column) =>
    Math.max(header.length, ...rows.map((row) => (row[column] ?? '').length)),
  );

  const separator = `+${widths.map((width) => '-'.repeat(width + 2)).join('+')}+`;
  const renderRow = (cells: string[]) =>
    `|${widths.map((width, column) => ` ${(cells[column] ?? '').padEnd(width)} `).join('|')}|`;

  return [separator, renderRow(headers), separator, ...rows.map(renderRow), separator].join('\n');
}

function center(text: string): string {
  const padding = Math.max(0, WIDTH - text.length);
  return ' '.repeat(Math.floor(padding / 2)) + text;
}

function section(title: string): string[] {
  return [title, '-'.repeat(WIDTH)];
}

function keyValue(label: string, value: string): string {
  return `${label.padEnd(25)}: ${value}`;
}

function optionalCount(value: number | null): string {
  return value === null ? 'N/A' : formatCount(value);
}

function optionalPercent(value: number | null): string {
  return value === null ? 'N/A' : `${value}%`;
}

function capacityGb(report: Report): number {
  return report.drive.capacityBytes / 1e9;
}

function remainingLife(report: Report): { days: string; years: string } {
  if (!Number.isFinite(report.estimatedRemainingDays)) {
    return { days: 'indefinite', years: 'no writes observed' };
  }

  return {
    days: `${formatCount(Math.round(report.estimatedRemainingDays))} days`,
    years: `~${report.estimatedRemainingYears.toFixed(2)} years`,
  };
}

/** Wear above the rated budget is shown as 100.00%; the report keeps the raw value. */
function displayWear(wearPercent: number): string {
  return `${Math.min(wearPercent, 100).toFixed(2)}%`;
}

function driveInformation(report: Report): string[] {
  const { drive } = report;
  const source = drive.capacitySource === 'config' ? 'configured' : 'detected';

  return [
    ...section('DRIVE INFORMATION'),
    keyValue('Model', drive.model || 'Unknown'),
    keyValue('Serial Number', drive.serial || 'Unknown'),
    keyValue('Capacity', `${formatBytes(drive.capacityBytes)} (${source})`),
    keyValue('Drive Type', drive.driveType),
    '',
  ];
}

function analysisParameters(report: Report): string[] {
  const { parameters } = report;

  return [
    ...section('ANALYSIS PARAMETERS'),
    keyValue('Host LBA Size', `${parameters.hostLbaSizeKb} KB per count`),
    keyValue('Flash LBA Size', `${parameters.flashLbaSizeKb} KB per count`),
    keyValue('Rated P/E Cycles', String(parameters.ratedPeCycles)),
    keyValue('Drive Capacity', `${capacityGb(report)} GB`),
    '',
  ];
}

function snapshotComparison(report: Report): string[] {
  const { comparison } = report;
  const rows = [
    [
      'Timestamp',
      formatTimestamp(comparison.first.timestamp),
      formatTimestamp(comparison.second.timestamp),
      `${comparison.elapsedDays.toFixed(2)} days`,
    ],
    [
      WRITE_COUNTER_LABELS[report.drive.driveType],
      formatCount(comparison.first.writeCounter),
      formatCount(comparison.second.writeCounter),
      formatCount(comparison.writeCounterDelta),
    ],
    [
      'Power On Hours',
      optionalCount(comparison.first.powerOnHours),
      optionalCount(comparison.second.powerOnHours),
      optionalCount(comparison.powerOnHoursDelta),
    ],
  ];

  if (comparison.second.percentageUsed !== null) {
    rows.push([
      'Percentage Used',
      optionalPercent(comparison.first.percentageUsed),
      optionalPercent(comparison.second.percentageUsed),
      optionalPercent(comparison.percentageUsedDelta),
    ]);
  }

  return [
    ...section('SNAPSHOT COMPARISON'),
    createAsciiTable(['Metric', 'Snapshot 1', 'Snapshot 2', 'Delta'], rows),
    '',
  ];
}

function enduranceMetrics(report: Report): string[] {
  return [
    ...section('CALCULATED ENDURANCE METRICS'),
    createAsciiTable(
      ['Metric', 'Value', 'Description'],
      [
        ['WAF', report.waf.toFixed(2), 'Write Amplification Factor (configured)'],
        ['TBW (Host)', formatBytes(report.tbwHostBytes), 'Host writes between snapshots'],
        ['TBW (Flash)', formatBytes(report.tbwFlashBytes), 'Flash writes between snapshots'],
        ['DWPD', report.dwpd.toFixed(4), 'Drive Writes Per Day'],
        ['Daily Write Rate', `${formatBytes(report.dailyWriteRateBytes)}/day`, 'Average daily host writes'],
        ['Lifetime Host Writes', formatBytes(report.lifetimeHostBytes), 'Host writes at snapshot 2'],
      ],
    ),
    '',
  ];
}

function wearAnalysis(report: Report): string[] {
  const remaining = remainingLife(report);

  return [
    ...section('WEAR AND LIFETIME ANALYSIS'),
    createAsciiTable(
      ['Metric', 'Value', 'Status'],
      [
        ['P/E Cycles Consumed', report.peCyclesConsumed.toFixed(2), `of ${report.parameters.ratedPeCycles}`],
        ['Wear Percentage', displayWear(report.wearPercent), report.healthLabel],
        ['Estimated Remaining', remaining.days, remaining.years],
        ['Overall Health', '', report.lifeStatus],
      ],
    ),
    '',
  ];
}

function methodology(report: Report): string[] {
  const { parameters } = report;
  const gb = capacityGb(report);
  const dailyFlashGb = (report.dailyWriteRateBytes * report.waf) / 1e9;

  return [
    ...section('CALCULATION METHODOLOGY'),
    '• WAF = Flash LBA Size / Host LBA Size',
    `  = ${parameters.flashLbaSizeKb} KB / ${parameters.hostLbaSizeKb} KB`,
    `  = ${report.waf.toFixed(2)}`,
    '',
    '• DWPD = Daily Write Rate / Drive Capacity',
    `  = ${(report.dailyWriteRateBytes / 1e9).toFixed(2)} GB/day / ${gb} GB`,
    `  = ${report.dwpd.toFixed(4)}`,
    '',
    '• P/E Cycles = Flash Writes / Drive Capacity',
    `  = ${(report.tbwFlashBytes / 1e9).toFixed(2)} GB / ${gb} GB`,
    `  = ${report.peCyclesConsumed.toFixed(2)}`,
    '',
    '• Remaining Lifetime = (Rated P/E - Used P/E) × Capacity / Daily Flash Writes',
    `  = (${parameters.ratedPeCycles} - ${report.peCyclesConsumed.toFixed(2)}) × ${gb} GB / ${dailyFlashGb.toFixed(2)} GB/day`,
    `  = ${remainingLife(report).days}`,
    '',
  ];
}

export function formatAnalysisReport(report: Report, options: FormatOptions): string {
  const rule = '='.repeat(WIDTH);

  return [
    rule,
    center('SSD ENDURANCE ANALYSIS REPORT'),
    rule,
    '',
    ...driveInformation(report),
    ...analysisParameters(report),
    ...snapshotComparison(report),
    ...enduranceMetrics(report),
    ...wearAnalysis(report),
    ...methodology(report),
    rule,
    `Report generated: ${formatTimestamp(options.generatedAt)} UTC`,
    rule,
  ].join('\n');
}
