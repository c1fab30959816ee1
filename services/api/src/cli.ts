import { parseArgs } from 'node:util';
import { analysisConfigSchema } from '@flashwear/shared';
import { z } from 'zod';
import { SnapshotParseError, ValidationError } from './common/errors';
import { LoggerService } from './common/logger.service';
import { EnduranceService } from './modules/endurance/endurance.service';
import { formatAnalysisReport } from './modules/reports/report-formatter';
import { serializeReport } from './modules/reports/report-serializer';

export const USAGE = `Usage: flashwear --snapshot1 <file> --snapshot2 <file> \\
    --host-lba-size <kb> --flash-lba-size <kb> --rated-pe-cycles <n> \\
    [--capacity <gb>] [--output <file>] [--format text|json]

  --snapshot1        smartctl output captured first
  --snapshot2        smartctl output captured later
  --host-lba-size    KB per host data unit count (e.g. 0.5)
  --flash-lba-size   KB per flash write unit count (e.g. 32)
  --rated-pe-cycles  rated P/E cycles (e.g. 3000 for TLC)
  --capacity         drive capacity in GB, detected from snapshot 1 when omitted
  --output           write the report to a file instead of stdout
  --format           text (default) or json`;

function requiredNumber(flag: string) {
  return z.string({ required_error: `${flag} is required` }).transform(Number);
}

const cliArgsSchema = z.object({
  snapshot1: z.string({ required_error: '--snapshot1 is required' }).min(1),
  snapshot2: z.string({ required_error: '--snapshot2 is required' }).min(1),
  'host-lba-size': requiredNumber('--host-lba-size'),
  'flash-lba-size': requiredNumber('--flash-lba-size'),
  'rated-pe-cycles': requiredNumber('--rated-pe-cycles'),
  capacity: z.coerce.number().optional(),
  output: z.string().min(1).optional(),
  format: z.enum(['text', 'json']).default('text'),
});

export interface CliDeps {
  readFile: (path: string) => string;
  writeFile: (path: string, content: string) => void;
  stdout: (text: string) => void;
  stderr: (text: string) => void;
  logger: LoggerService;
  now: () => Date;
}

function describeIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => (issue.path.length ? `${issue.path.join('.')}: ${issue.message}` : issue.message))
    .join('; ');
}

export function describeFailure(error: unknown): string {
  if (error instanceof SnapshotParseError) {
    const field = error.parseError.field ? `, field ${error.parseError.field}` : '';
    return `${error.source} (${error.parseError.kind}${field}): ${error.parseError.message}`;
  }

  if (error instanceof ValidationError) {
    return `${error.kind}: ${error.message}`;
  }

  if (error instanceof z.ZodError) {
    return `Invalid arguments: ${describeIssues(error)}`;
  }

  if (error instanceof Error && 'code' in error && error.code === 'ENOENT' && 'path' in error) {
    return `File not found - ${String(error.path)}`;
  }

  return error instanceof Error ? error.message : String(error);
}

export function runCli(argv: string[], deps: CliDeps): number {
  try {
    const { values } = parseArgs({
      args: argv,
      options: {
        snapshot1: { type: 'string' },
        snapshot2: { type: 'string' },
        'host-lba-size': { type: 'string' },
        'flash-lba-size': { type: 'string' },
        'rated-pe-cycles': { type: 'string' },
        capacity: { type: 'string' },
        output: { type: 'string' },
        format: { type: 'string' },
        help: { type: 'boolean', short: 'h' },
      },
      strict: true,
    });

    if (values.help) {
      deps.stdout(`${USAGE}\n`);
      return 0;
    }

    const args = cliArgsSchema.parse(values);
    const config = analysisConfigSchema.parse({
      hostLbaSizeKb: args['host-lba-size'],
      flashLbaSizeKb: args['flash-lba-size'],
      ratedPeCycles: args['rated-pe-cycles'],
      capacityGb: args.capacity ?? null,
    });

    const service = new EnduranceService(deps.logger);
    const report = service.analyze(
      { source: args.snapshot1, text: deps.readFile(args.snapshot1) },
      { source: args.snapshot2, text: deps.readFile(args.snapshot2) },
      config,
    );

    const rendered =
      args.format === 'json'
        ? JSON.stringify(serializeReport(report), null, 2)
        : formatAnalysisReport(report, { generatedAt: deps.now() });

    if (args.output) {
      deps.writeFile(args.output, `${rendered}\n`);
      deps.logger.info('Report saved', { output: args.output });
    } else {
      deps.stdout(`${rendered}\n`);
    }

    return 0;
  } catch (error) {
    deps.stderr(`Error: ${describeFailure(error)}\n`);
    if (error instanceof TypeError && 'code' in error) {
      deps.stderr(`\n${USAGE}\n`);
    }
    return 1;
  }
}
