import { Inject, Injectable, Logger } from '@nestjs/common';
import { dashboardConfig, DashboardConfig } from '../../config/dashboard.config';
import { DateRange } from '../../utils/dates';
import { WithDiagnostics } from '../../utils/diagnostics';
import { SourceSnapshot } from '../ingest/source.service';
import { ExclusionService } from './exclusion.service';
import { buildLedger } from './ledger-builder';
import { PENDING_CN_MATCHERS } from './pending-cn.matchers';
import { findPendingCn } from './pending-cn';
import { LedgerEntry, PendingCnResult, PendingMatcher } from './reconciliation.types';

export type ReconciliationInput = Pick<SourceSnapshot, 'trips' | 'consignments'>;

/**
 * ReconciliationService - own fleet against the vendor ledger
 *
 * Strategy:
 * 1. Ledger: outer join of own trips and vendor activity per party
 * 2. Pending CN: loaded trips without a reference, minus exclusions,
 *    minus whatever each matcher ties to a consignment
 */
@Injectable()
export class ReconciliationService {
  private readonly logger = new Logger(ReconciliationService.name);

  constructor(
    private readonly exclusionService: ExclusionService,
    @Inject(PENDING_CN_MATCHERS)
    private readonly matchers: PendingMatcher[],
    @Inject(dashboardConfig.KEY)
    private readonly config: DashboardConfig,
  ) {}

  buildLedger(input: ReconciliationInput, range: DateRange): LedgerEntry[] {
    const ledger = buildLedger(input.trips, input.consignments, range);

    this.logger.log({
      event: 'ledger_built',
      from: range.from,
      to: range.to,
      parties: ledger.length,
      vendor_only: ledger.filter((row) => row.trip_count === 0).length,
    });

    return ledger;
  }

  /**
   * Pending-CN trips as of `today` (YYYY-MM-DD). Exclusions are read once
   * per call.
   */
  async findPendingCn(input: ReconciliationInput, today: string): Promise<WithDiagnostics<PendingCnResult>> {
    const exclusions = await this.exclusionService.loadIds();

    const result = findPendingCn(input.trips, input.consignments, exclusions.data, this.matchers, {
      today,
      minAgeDays: this.config.pendingCnMinAgeDays,
    });

    this.logger.log({
      event: 'pending_cn_complete',
      today,
      candidates: result.candidates,
      excluded: result.excluded,
      matcher_hits: result.matcher_hits,
      pending: result.trips.length,
    });

    return { data: result, diagnostics: exclusions.diagnostics };
  }
}
