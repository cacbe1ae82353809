import { Inject, Injectable, Logger } from '@nestjs/common';
import { dashboardConfig, DashboardConfig } from '../../config/dashboard.config';
import { DatabaseService, RawRow } from '../../database/database.service';
import { Diagnostic, WithDiagnostics, errorMessage } from '../../utils/diagnostics';
import { renameConsignmentColumns } from './column-renames';
import { ConsignmentRecord, TripRecord, UnmappedCity } from './ingest.types';
import { RecordNormalizerService, readText } from './record-normalizer.service';

/**
 * Everything one request pass needs from the upstream tables
 */
export interface SourceSnapshot {
  trips: TripRecord[];
  consignments: ConsignmentRecord[];
  unmappedCities: UnmappedCity[];
  diagnostics: Diagnostic[];
}

/**
 * Consignment notes keyed in for testing the upstream system
 */
export function isSentinelConsignment(row: RawRow): boolean {
  return readText(renameConsignmentColumns(row).cn_no).toUpperCase().startsWith('TEST');
}

/**
 * Combine two unmapped-city reports, summing occurrences
 */
export function mergeUnmappedCities(...reports: UnmappedCity[][]): UnmappedCity[] {
  const counts = new Map<string, number>();
  for (const report of reports) {
    for (const { city, occurrences } of report) {
      counts.set(city, (counts.get(city) ?? 0) + occurrences);
    }
  }
  return [...counts.entries()]
    .map(([city, occurrences]) => ({ city, occurrences }))
    .sort((a, b) => b.occurrences - a.occurrences || a.city.localeCompare(b.city));
}

/**
 * SourceService - reads the trip log and consignment ledger
 *
 * A failed read never throws: the pass continues on an empty row set and
 * the failure travels with the result as SOURCE_UNAVAILABLE.
 */
@Injectable()
export class SourceService {
  private readonly logger = new Logger(SourceService.name);

  constructor(
    private readonly databaseService: DatabaseService,
    private readonly normalizer: RecordNormalizerService,
    @Inject(dashboardConfig.KEY)
    private readonly config: DashboardConfig,
  ) {}

  async readTripRows(): Promise<WithDiagnostics<RawRow[]>> {
    return this.readTable(this.config.tripLogTable);
  }

  async readConsignmentRows(): Promise<WithDiagnostics<RawRow[]>> {
    const { data, diagnostics } = await this.readTable(this.config.consignmentTable);
    const kept = data.filter((row) => !isSentinelConsignment(row));

    if (kept.length !== data.length) {
      this.logger.debug(`Dropped ${data.length - kept.length} test consignment notes`);
    }

    return { data: kept, diagnostics };
  }

  /**
   * Read and normalize both sources
   */
  async load(): Promise<SourceSnapshot> {
    const [tripRows, consignmentRows] = await Promise.all([
      this.readTripRows(),
      this.readConsignmentRows(),
    ]);

    const trips = this.normalizer.normalizeTrips(tripRows.data);
    const consignments = this.normalizer.normalizeConsignments(consignmentRows.data);

    return {
      trips: trips.records,
      consignments: consignments.records,
      unmappedCities: mergeUnmappedCities(trips.unmappedCities, consignments.unmappedCities),
      diagnostics: [
        ...tripRows.diagnostics,
        ...consignmentRows.diagnostics,
        ...trips.diagnostics,
        ...consignments.diagnostics,
      ],
    };
  }

  private async readTable(table: string): Promise<WithDiagnostics<RawRow[]>> {
    const startTime = Date.now();

    try {
      // table names come from validated config, never from a request
      const rows = await this.databaseService.queryRows(`SELECT * FROM ${table}`);

      this.logger.log({
        event: 'source_read_complete',
        table,
        rows: rows.length,
        duration_ms: Date.now() - startTime,
      });

      return { data: rows, diagnostics: [] };
    } catch (error) {
      const message = errorMessage(error);
      this.logger.warn({ event: 'source_unavailable', table, error: message });

      return {
        data: [],
        diagnostics: [
          {
            code: 'SOURCE_UNAVAILABLE',
            message: `Could not read ${table}: ${message}`,
            context: { table },
          },
        ],
      };
    }
  }
}
