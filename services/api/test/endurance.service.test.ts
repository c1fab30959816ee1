import { BadRequestException, HttpException, UnprocessableEntityException } from '@nestjs/common';
import { describe, expect, it, vi } from 'vitest';
import { SnapshotParseError, ValidationError } from '../src/common/errors';
import { EnduranceController } from '../src/modules/endurance/endurance.controller';
import { EnduranceService } from '../src/modules/endurance/endurance.service';
import { analysisConfig, nvmeReport } from './fixtures';

const DAY_ONE = nvmeReport();
const DAY_THIRTY = nvmeReport({
  localTime: 'Fri Jan 30 10:00:00 2026 UTC',
  unitsWritten: '52,500,000',
  powerOnHours: '1,896',
  percentageUsed: '5',
});

function createLogger() {
  return {
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
  };
}

function thrownBy(run: () => unknown): unknown {
  try {
    run();
  } catch (error) {
    return error;
  }
  throw new Error('expected an exception');
}

describe('EnduranceService', () => {
  it('parses both snapshots and logs the outcome', () => {
    const logger = createLogger();
    const service = new EnduranceService(logger as never);

    const report = service.analyze(
      { source: 'day1.txt', text: DAY_ONE },
      { source: 'day30.txt', text: DAY_THIRTY },
      analysisConfig(),
    );

    expect(report.tbwHostBytes).toBe(1_280_000_000);
    expect(report.comparison.elapsedDays).toBe(29);
    expect(logger.info).toHaveBeenCalledWith(
      'Snapshot parsed',
      expect.objectContaining({ source: 'day30.txt', driveType: 'NVMe' }),
    );
    expect(logger.info).toHaveBeenLastCalledWith(
      'Endurance analysis completed',
      expect.objectContaining({ model: 'TEST NVME 512GB', healthLabel: 'Excellent' }),
    );
  });

  it('tags parse failures with their source', () => {
    const service = new EnduranceService(createLogger() as never);

    const error = thrownBy(() =>
      service.analyze(
        { source: 'day1.txt', text: DAY_ONE },
        { source: 'day30.txt', text: 'not a smartctl report' },
        analysisConfig(),
      ),
    );

    expect(error).toBeInstanceOf(SnapshotParseError);
    expect(error).toMatchObject({ source: 'day30.txt', parseError: { kind: 'UnknownFormat' } });
  });

  it('logs and rethrows rejected pairs', () => {
    const logger = createLogger();
    const service = new EnduranceService(logger as never);

    const error = thrownBy(() =>
      service.analyze(
        { source: 'day30.txt', text: DAY_THIRTY },
        { source: 'day1.txt', text: DAY_ONE },
        analysisConfig(),
      ),
    );

    expect(error).toBeInstanceOf(ValidationError);
    expect(logger.warn).toHaveBeenCalledWith(
      'Snapshot pair rejected',
      expect.objectContaining({ kind: 'OutOfOrder' }),
    );
  });
});

describe('EnduranceController', () => {
  const body = {
    snapshot1: DAY_ONE,
    snapshot2: DAY_THIRTY,
    hostLbaSizeKb: 0.5,
    flashLbaSizeKb: 32,
    ratedPeCycles: 3000,
    capacityGb: 512,
  };

  function createController() {
    return new EnduranceController(new EnduranceService(createLogger() as never));
  }

  it('returns a JSON-safe report by default', () => {
    const result = createController().analyze(body);

    expect(result).toMatchObject({
      waf: 64,
      tbwHostBytes: 1_280_000_000,
      healthLabel: 'Excellent',
      drive: { driveType: 'NVMe', capacitySource: 'config' },
    });
  });

  it('renders the text report on request', () => {
    const result = createController().analyze({ ...body, format: 'text' });

    expect(result).toEqual({ report: expect.stringContaining('SNAPSHOT COMPARISON') });
  });

  it('rejects an incomplete body', () => {
    const error = thrownBy(() => createController().analyze({ snapshot1: DAY_ONE }));
    expect(error).toBeInstanceOf(BadRequestException);
  });

  it('rejects non-positive scalars', () => {
    const error = thrownBy(() => createController().analyze({ ...body, flashLbaSizeKb: 0 }));
    expect(error).toBeInstanceOf(BadRequestException);
  });

  it('rejects unit sizes too large to total in bytes', () => {
    const error = thrownBy(() => createController().analyze({ ...body, flashLbaSizeKb: 1e306 }));
    expect(error).toBeInstanceOf(BadRequestException);
  });

  it('detects capacity when the override is null', () => {
    const result = createController().analyze({ ...body, capacityGb: null });

    expect(result).toMatchObject({
      drive: { capacityBytes: 512_110_190_592, capacitySource: 'snapshot' },
      parameters: { capacityGb: null },
    });
  });

  it('names the snapshot that failed to parse', () => {
    const error = thrownBy(() => createController().analyze({ ...body, snapshot2: 'not a smartctl report' }));

    expect(error).toBeInstanceOf(BadRequestException);
    expect(error instanceof HttpException && error.getResponse()).toMatchObject({
      snapshot: 'snapshot2',
      kind: 'UnknownFormat',
      field: null,
    });
  });

  it('answers 422 for snapshots of different drives', () => {
    const other = nvmeReport({
      serial: 'NVME-SN-9999',
      localTime: 'Fri Jan 30 10:00:00 2026 UTC',
      unitsWritten: '52,500,000',
    });

    const error = thrownBy(() => createController().analyze({ ...body, snapshot2: other }));

    expect(error).toBeInstanceOf(UnprocessableEntityException);
    expect(error instanceof HttpException && error.getResponse()).toMatchObject({
      kind: 'DifferentDrives',
      context: {
        first: { serial: 'NVME-SN-0001' },
        second: { serial: 'NVME-SN-9999' },
      },
    });
  });
});
