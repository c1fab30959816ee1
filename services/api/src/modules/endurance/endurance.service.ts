import { Inject, Injectable } from '@nestjs/common';
import type { AnalysisConfig, Report, Snapshot } from '@flashwear/shared';
import { ParseError, SnapshotParseError, ValidationError } from '../../common/errors';
import { LoggerService } from '../../common/logger.service';
import { parseSnapshot } from '../snapshots/snapshot-parser';
import { analyzeSnapshots } from './endurance-engine';

export interface SnapshotInput {
  /** File path or request field the text came from. */
  source: string;
  text: string;
}

@Injectable()
export class EnduranceService {
  constructor(@Inject(LoggerService) private readonly logger: LoggerService) {}

  parse(input: SnapshotInput): Snapshot {
    try {
      return parseSnapshot(input.text);
    } catch (error) {
      if (error instanceof ParseError) {
        throw new SnapshotParseError(input.source, error);
      }
      throw error;
    }
  }

  analyze(first: SnapshotInput, second: SnapshotInput, config: AnalysisConfig): Report {
    const snapshots = [first, second].map((input) => {
      const snapshot = this.parse(input);
      this.logger.info('Snapshot parsed', {
        source: input.source,
        driveType: snapshot.driveType,
        model: snapshot.model,
        timestamp: snapshot.timestamp.toISOString(),
      });
      return snapshot;
    });

    let report: Report;
    try {
      report = analyzeSnapshots(snapshots[0], snapshots[1], config);
    } catch (error) {
      if (error instanceof ValidationError) {
        this.logger.warn('Snapshot pair rejected', { kind: error.kind, ...error.context });
      }
      throw error;
    }

    this.logger.info('Endurance analysis completed', {
      model: report.drive.model,
      elapsedDays: Number(report.comparison.elapsedDays.toFixed(4)),
      wearPercent: Number(report.wearPercent.toFixed(4)),
      healthLabel: report.healthLabel,
    });

    return report;
  }
}
