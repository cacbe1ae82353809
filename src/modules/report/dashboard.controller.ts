import { BadRequestException, Controller, Get, Header, Query, ServiceUnavailableException } from '@nestjs/common';
import { DashboardService } from './dashboard.service';
import { ExportQueryDto, MonthQueryDto, TargetVsActualQueryDto } from './dto/report-query.dto';
import { DateRange, isIsoDate } from '../../utils/dates';

/**
 * Checked date range; DTOs only check the shape
 */
export function toDateRange(from: string, to: string, name = 'range'): DateRange {
  if (!isIsoDate(from) || !isIsoDate(to)) {
    throw new BadRequestException(`${name} has an invalid calendar date`);
  }
  if (from > to) {
    throw new BadRequestException(`${name} starts after it ends`);
  }
  return { from, to };
}

/**
 * DashboardController - Dashboard API Endpoints
 *
 * Endpoints:
 * - GET /dashboard/months - Months with data and the party list
 * - GET /dashboard/summary - Month summary cards
 * - GET /dashboard/target-vs-actual - Category table with comparison
 * - GET /dashboard/daily - Daily loading details
 * - GET /dashboard/local-loads - Local/pilot loads per party
 * - GET /dashboard/pending-cn - Trips still waiting for a CN
 * - GET /dashboard/unmapped-cities - Cities missing from the zone lists
 * - GET /dashboard/export - Flat CSV of the period's records
 */
@Controller('dashboard')
export class DashboardController {
  constructor(private readonly dashboardService: DashboardService) {}

  @Get('months')
  async months() {
    const result = await this.dashboardService.getFilters();
    return { success: true, ...result };
  }

  @Get('summary')
  async summary(@Query() query: MonthQueryDto) {
    const result = await this.dashboardService.getMonthSummary(query.month, query.party);
    return { success: true, ...result };
  }

  /**
   * GET /dashboard/target-vs-actual?from=&to=&compareFrom=&compareTo=
   */
  @Get('target-vs-actual')
  async targetVsActual(@Query() query: TargetVsActualQueryDto) {
    const range = toDateRange(query.from, query.to);
    const compareRange = toDateRange(query.compareFrom, query.compareTo, 'compare range');
    const result = await this.dashboardService.getTargetVsActual(range, compareRange);
    return { success: true, ...result };
  }

  @Get('daily')
  async daily(@Query() query: MonthQueryDto) {
    const result = await this.dashboardService.getDailyLoading(query.month, query.party);
    return { success: true, ...result };
  }

  @Get('local-loads')
  async localLoads(@Query() query: MonthQueryDto) {
    const result = await this.dashboardService.getLocalLoads(query.month, query.party);
    return { success: true, ...result };
  }

  /**
   * GET /dashboard/pending-cn?today=YYYY-MM-DD (today defaults to the server date)
   */
  @Get('pending-cn')
  async pendingCn(@Query('today') today?: string) {
    if (today !== undefined && !isIsoDate(today)) {
      throw new BadRequestException('today must be a YYYY-MM-DD date');
    }
    const result = await this.dashboardService.getPendingCn(today);
    return { success: true, ...result };
  }

  @Get('unmapped-cities')
  async unmappedCities() {
    const result = await this.dashboardService.getUnmappedCities();
    return { success: true, ...result };
  }

  @Get('export')
  @Header('Content-Type', 'text/csv; charset=utf-8')
  @Header('Content-Disposition', 'attachment; filename="trip-ledger.csv"')
  async export(@Query() query: ExportQueryDto): Promise<string> {
    const result = await this.dashboardService.exportCsv(toDateRange(query.from, query.to), query.party);

    const unavailable = result.diagnostics.filter((d) => d.code === 'SOURCE_UNAVAILABLE');
    if (unavailable.length > 0) {
      throw new ServiceUnavailableException(unavailable.map((d) => d.message).join('; '));
    }

    return result.data;
  }
}
