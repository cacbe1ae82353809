import { Inject, Injectable } from '@nestjs/common';
import { dashboardConfig, DashboardConfig } from '../../config/dashboard.config';
import { DateRange, toIsoDate } from '../../utils/dates';
import { WithDiagnostics } from '../../utils/diagnostics';
import { UnmappedCity } from '../ingest/ingest.types';
import { SourceService } from '../ingest/source.service';
import { ReconciliationService } from '../reconciliation/reconciliation.service';
import { PendingCnResult } from '../reconciliation/reconciliation.types';
import { CsvExportService } from './csv-export.service';
import { ReportAggregationService } from './report-aggregation.service';
import {
  AvailableFilters,
  DailyLoading,
  LocalLoadGroup,
  MonthSummary,
  TargetVsActualReport,
} from './report.types';
import { TargetService } from './target.service';

/**
 * DashboardService - one request pass per call
 *
 * Reads the sources, normalizes, reconciles and aggregates. Nothing is
 * cached between calls; stores are read once per pass.
 */
@Injectable()
export class DashboardService {
  constructor(
    private readonly sourceService: SourceService,
    private readonly reconciliationService: ReconciliationService,
    private readonly aggregationService: ReportAggregationService,
    private readonly targetService: TargetService,
    private readonly csvExportService: CsvExportService,
    @Inject(dashboardConfig.KEY)
    private readonly config: DashboardConfig,
  ) {}

  async getFilters(): Promise<WithDiagnostics<AvailableFilters>> {
    const snapshot = await this.sourceService.load();
    return {
      data: this.aggregationService.availableFilters(snapshot.trips),
      diagnostics: snapshot.diagnostics,
    };
  }

  async getMonthSummary(month: string, party?: string): Promise<WithDiagnostics<MonthSummary>> {
    const snapshot = await this.sourceService.load();
    return {
      data: this.aggregationService.summarizeMonth(snapshot.trips, month, party),
      diagnostics: snapshot.diagnostics,
    };
  }

  async getTargetVsActual(range: DateRange, compareRange: DateRange): Promise<WithDiagnostics<TargetVsActualReport>> {
    const [snapshot, targets] = await Promise.all([this.sourceService.load(), this.targetService.loadTargets()]);

    const ledger = this.reconciliationService.buildLedger(snapshot, range);
    const compareLedger = this.reconciliationService.buildLedger(snapshot, compareRange);

    return {
      data: this.aggregationService.buildTargetVsActual(ledger, compareLedger, targets.data, range, compareRange),
      diagnostics: [...snapshot.diagnostics, ...targets.diagnostics],
    };
  }

  async getDailyLoading(month: string, party?: string): Promise<WithDiagnostics<DailyLoading[]>> {
    const snapshot = await this.sourceService.load();
    return {
      data: this.aggregationService.dailyLoading(snapshot.trips, month, party),
      diagnostics: snapshot.diagnostics,
    };
  }

  async getLocalLoads(month: string, party?: string): Promise<WithDiagnostics<LocalLoadGroup[]>> {
    const snapshot = await this.sourceService.load();
    return {
      data: this.aggregationService.localLoads(snapshot.trips, month, this.config.localLoadMaxDistanceKm, party),
      diagnostics: snapshot.diagnostics,
    };
  }

  /**
   * @param today YYYY-MM-DD; the server's local date when omitted
   */
  async getPendingCn(today: string = toIsoDate(new Date())): Promise<WithDiagnostics<PendingCnResult>> {
    const snapshot = await this.sourceService.load();
    const pending = await this.reconciliationService.findPendingCn(snapshot, today);
    return {
      data: pending.data,
      diagnostics: [...snapshot.diagnostics, ...pending.diagnostics],
    };
  }

  async getUnmappedCities(): Promise<WithDiagnostics<UnmappedCity[]>> {
    const snapshot = await this.sourceService.load();
    return {
      data: snapshot.unmappedCities,
      diagnostics: snapshot.diagnostics.filter((d) => d.code === 'SOURCE_UNAVAILABLE'),
    };
  }

  async exportCsv(range: DateRange, party?: string): Promise<WithDiagnostics<string>> {
    const snapshot = await this.sourceService.load();
    return {
      data: this.csvExportService.toCsv(snapshot.trips, snapshot.consignments, range, party),
      diagnostics: snapshot.diagnostics,
    };
  }
}
