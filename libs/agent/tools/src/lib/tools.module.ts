import { Module } from '@nestjs/common';
import { LogStoreModule } from '@risk-router/persistence/log-store';
import { ScheduleDataService } from './schedule/schedule-data.service';
import { SearxngClient } from './search/searxng.client';
import { ReportWriterService } from './reporting/report-writer.service';
import { ToolRegistry } from './tool-registry';

@Module({
  imports: [LogStoreModule],
  providers: [ScheduleDataService, SearxngClient, ReportWriterService, ToolRegistry],
  exports: [ToolRegistry, ScheduleDataService],
})
export class ToolsModule {}
