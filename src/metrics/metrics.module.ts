import { Module } from '@nestjs/common';
import { MetricsService } from './metrics.service';
import { MetricsController } from './metrics.controller';
import { MetricsEventsListener } from './metrics-events.listener';

@Module({
  controllers: [MetricsController],
  providers: [MetricsService, MetricsEventsListener],
  exports: [MetricsService],
})
export class MetricsModule {}
