import { Module } from '@nestjs/common';
import { TypeOrmModule } from '@nestjs/typeorm';
import { PartyTarget } from './entities/party-target.entity';
import { IngestModule } from '../ingest/ingest.module';
import { ReconciliationModule } from '../reconciliation/reconciliation.module';
import { ReportAggregationService } from './report-aggregation.service';
import { TargetService } from './target.service';
import { CsvExportService } from './csv-export.service';
import { DashboardService } from './dashboard.service';
import { DashboardController } from './dashboard.controller';
import { TargetController } from './target.controller';

@Module({
  imports: [TypeOrmModule.forFeature([PartyTarget]), IngestModule, ReconciliationModule],
  controllers: [DashboardController, TargetController],
  providers: [ReportAggregationService, TargetService, CsvExportService, DashboardService],
  exports: [ReportAggregationService, TargetService],
})
export class ReportModule {}
