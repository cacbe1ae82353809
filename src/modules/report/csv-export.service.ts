import { Injectable, Logger } from '@nestjs/common';
import * as Papa from 'papaparse';
import { ConsignmentRecord, TripRecord } from '../ingest/ingest.types';
import { DateRange, isWithin } from '../../utils/dates';

export const EXPORT_COLUMNS = [
  'source',
  'record_id',
  'date',
  'party',
  'category',
  'route',
  'vehicle_no',
  'cars',
  'freight',
  'zone',
  'status',
  'vendor_activity',
] as const;

type ExportColumn = (typeof EXPORT_COLUMNS)[number];
export type ExportRow = Record<ExportColumn, string | number | boolean>;

function tripRow(trip: TripRecord): ExportRow {
  return {
    source: 'trip',
    record_id: trip.trip_id,
    date: trip.loading_date ?? '',
    party: trip.party.name,
    category: trip.party.category,
    route: trip.route,
    vehicle_no: trip.vehicle_no,
    cars: trip.car_qty,
    freight: trip.freight,
    zone: trip.origin_zone,
    status: trip.trip_status,
    vendor_activity: false,
  };
}

function consignmentRow(cn: ConsignmentRecord): ExportRow {
  return {
    source: 'consignment',
    record_id: cn.cn_no,
    date: cn.cn_date ?? '',
    party: cn.party.name,
    category: cn.party.category,
    route: cn.route,
    vehicle_no: cn.vehicle_no,
    cars: cn.quantity,
    freight: cn.basic_freight,
    zone: cn.origin_zone,
    status: cn.vehicle_class,
    vendor_activity: cn.is_vendor_activity,
  };
}

/**
 * CsvExportService - flat export of every record in a period
 *
 * One line per trip and per consignment note dated in the range, trips
 * first. Empty trips and own-vehicle notes are included; the
 * `vendor_activity` column tells which notes reach the ledger.
 */
@Injectable()
export class CsvExportService {
  private readonly logger = new Logger(CsvExportService.name);

  buildRows(
    trips: ReadonlyArray<TripRecord>,
    consignments: ReadonlyArray<ConsignmentRecord>,
    range: DateRange,
    party?: string,
  ): ExportRow[] {
    const forParty = (name: string): boolean => party === undefined || name === party;

    return [
      ...trips.filter((t) => forParty(t.party.name) && isWithin(t.loading_date, range)).map(tripRow),
      ...consignments.filter((c) => forParty(c.party.name) && isWithin(c.cn_date, range)).map(consignmentRow),
    ];
  }

  toCsv(
    trips: ReadonlyArray<TripRecord>,
    consignments: ReadonlyArray<ConsignmentRecord>,
    range: DateRange,
    party?: string,
  ): string {
    const rows = this.buildRows(trips, consignments, range, party);

    this.logger.log({ event: 'csv_export', from: range.from, to: range.to, party: party ?? null, rows: rows.length });

    // header as the first data row, so an empty export is the header alone
    return Papa.unparse(
      [[...EXPORT_COLUMNS], ...rows.map((row) => EXPORT_COLUMNS.map((column) => row[column]))],
      { newline: '\n' },
    );
  }
}
