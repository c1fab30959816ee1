import { Module } from '@nestjs/common';
import { LoggerService } from '../common/logger.service';
import { EnduranceController } from './endurance/endurance.controller';
import { EnduranceService } from './endurance/endurance.service';
import { HealthController } from './health/health.controller';

@Module({
  controllers: [HealthController, EnduranceController],
  providers: [LoggerService, EnduranceService],
})
export class AppModule {}
