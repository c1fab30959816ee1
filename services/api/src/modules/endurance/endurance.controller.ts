import { Body, Controller, HttpCode, Inject, Post } from '@nestjs/common';
import { ApiTags } from '@nestjs/swagger';
import { analysisConfigSchema, analysisRequestSchema } from '@flashwear/shared';
import type { AnalysisConfig, AnalysisRequest } from '@flashwear/shared';
import { parseWithSchema, toHttpException } from '../../common/validation';
import { formatAnalysisReport } from '../reports/report-formatter';
import { serializeReport } from '../reports/report-serializer';
import type { SerializedReport } from '../reports/report-serializer';
import { EnduranceService } from './endurance.service';

export interface TextReportResponse {
  report: string;
}

function toAnalysisConfig(request: AnalysisRequest): AnalysisConfig {
  return parseWithSchema(analysisConfigSchema, {
    hostLbaSizeKb: request.hostLbaSizeKb,
    flashLbaSizeKb: request.flashLbaSizeKb,
    ratedPeCycles: request.ratedPeCycles,
    capacityGb: request.capacityGb ?? null,
  });
}

@ApiTags('analyses')
@Controller('analyses')
export class EnduranceController {
  constructor(@Inject(EnduranceService) private readonly enduranceService: EnduranceService) {}

  @Post()
  @HttpCode(200)
  analyze(@Body() body: unknown): SerializedReport | TextReportResponse {
    const request = parseWithSchema(analysisRequestSchema, body ?? {});
    const config = toAnalysisConfig(request);

    try {
      const report = this.enduranceService.analyze(
        { source: 'snapshot1', text: request.snapshot1 },
        { source: 'snapshot2', text: request.snapshot2 },
        config,
      );

      return request.format === 'text'
        ? { report: formatAnalysisReport(report, { generatedAt: new Date() }) }
        : serializeReport(report);
    } catch (error) {
      throw toHttpException(error) ?? error;
    }
  }
}
