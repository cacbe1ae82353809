import { Injectable, Logger } from '@nestjs/common';
import { GazetteerService } from '../gazetteer/gazetteer.service';
import { CanonicalParty, ZoneTag } from '../gazetteer/gazetteer.types';
import { RawRow } from '../../database/database.service';
import { Diagnostic } from '../../utils/diagnostics';
import { parseIsoDate, toIsoDate } from '../../utils/dates';
import {
  ConsignmentField,
  RenamedRow,
  TripField,
  isBlank,
  renameConsignmentColumns,
  renameTripColumns,
} from './column-renames';
import {
  ConsignmentRecord,
  NormalizationResult,
  TripRecord,
  UnmappedCity,
  VEHICLE_CLASS_HIRE,
} from './ingest.types';

type Coerced<T> = { value: T; malformed: boolean };

/**
 * Per-pass bookkeeping: coercion diagnostics plus distinct unclassified
 * parties and cities
 */
class NormalizationTracker {
  readonly diagnostics: Diagnostic[] = [];
  private readonly unmappedCities = new Map<string, number>();
  private readonly unclassifiedParties = new Set<string>();

  constructor(private readonly source: string) {}

  malformed(rowId: string, field: string, value: unknown, fallback: string): void {
    this.diagnostics.push({
      code: 'MALFORMED_ROW',
      message: `Unparsable ${field} "${String(value)}" in ${this.source} row ${rowId || '(no id)'}; using ${fallback}`,
      context: { source: this.source, row_id: rowId || null, field },
    });
  }

  city(city: string, matched: boolean): void {
    if (city === '' || matched) {
      return;
    }
    const key = city.trim().toUpperCase();
    this.unmappedCities.set(key, (this.unmappedCities.get(key) ?? 0) + 1);
  }

  party(party: CanonicalParty): void {
    if (party.name !== '' && party.category === 'Other') {
      this.unclassifiedParties.add(party.name);
    }
  }

  finish<T>(records: T[]): NormalizationResult<T> {
    const unmappedCities: UnmappedCity[] = [...this.unmappedCities.entries()]
      .map(([city, occurrences]) => ({ city, occurrences }))
      .sort((a, b) => b.occurrences - a.occurrences || a.city.localeCompare(b.city));

    const diagnostics = [...this.diagnostics];
    for (const { city, occurrences } of unmappedCities) {
      diagnostics.push({
        code: 'UNCLASSIFIED_ENTITY',
        message: `City "${city}" is not in any zone list; using Other`,
        context: { source: this.source, city, occurrences },
      });
    }
    for (const name of this.unclassifiedParties) {
      diagnostics.push({
        code: 'UNCLASSIFIED_ENTITY',
        message: `Party "${name}" matches no category rule; using Other`,
        context: { source: this.source, party: name },
      });
    }

    return { records, diagnostics, unmappedCities };
  }
}

/**
 * RecordNormalizerService - raw source rows to typed records
 *
 * Never drops a row: unreadable numbers become 0, unreadable dates null,
 * and each substitution is reported as a MALFORMED_ROW diagnostic.
 */
@Injectable()
export class RecordNormalizerService {
  private readonly logger = new Logger(RecordNormalizerService.name);

  constructor(private readonly gazetteer: GazetteerService) {}

  normalizeTrips(rows: RawRow[]): NormalizationResult<TripRecord> {
    const tracker = new NormalizationTracker('trip_log');
    const records = rows.map((row) => this.normalizeTrip(renameTripColumns(row), tracker));
    const result = tracker.finish(records);

    this.logger.log({
      event: 'normalize_trips_complete',
      rows: rows.length,
      diagnostics: result.diagnostics.length,
      unmapped_cities: result.unmappedCities.length,
    });

    return result;
  }

  normalizeConsignments(rows: RawRow[]): NormalizationResult<ConsignmentRecord> {
    const tracker = new NormalizationTracker('consignment_note');
    const records = rows.map((row) => this.normalizeConsignment(renameConsignmentColumns(row), tracker));
    const result = tracker.finish(records);

    this.logger.log({
      event: 'normalize_consignments_complete',
      rows: rows.length,
      vendor_activity: records.filter((r) => r.is_vendor_activity).length,
      diagnostics: result.diagnostics.length,
    });

    return result;
  }

  /**
   * Canonical party for an own-fleet trip. The primary name is the
   * NewPartyName column; for primary names known to be stamped on other
   * customers' trips, the legacy Party column wins when it points at a
   * different named category.
   */
  resolveTripParty(primary: string, alternate: string): { party: CanonicalParty; corrected: boolean } {
    const name = this.gazetteer.normalizePartyAlias(primary);
    const party: CanonicalParty = { name, category: this.gazetteer.classifyCategory(name) };

    if (alternate === '' || !this.gazetteer.isCorrectionTarget(primary)) {
      return { party, corrected: false };
    }

    const alternateName = this.gazetteer.normalizePartyAlias(alternate);
    const alternateCategory = this.gazetteer.classifyCategory(alternateName);
    if (alternateCategory === 'Other' || alternateCategory === party.category) {
      return { party, corrected: false };
    }

    this.logger.debug(`Party "${primary}" corrected to "${alternateName}" from the Party column`);
    return { party: { name: alternateName, category: alternateCategory }, corrected: true };
  }

  private normalizeTrip(row: RenamedRow<TripField>, tracker: NormalizationTracker): TripRecord {
    const tripId = readText(row.trip_id);
    const alternate = readText(row.party);
    const primary = readText(row.new_party_name) || alternate;
    const { party, corrected } = this.resolveTripParty(primary, alternate);
    tracker.party(party);

    const route = readText(row.route);
    const { origin, destination } = splitRoute(route);

    const amount = (field: TripField): number => {
      const coerced = parseAmount(row[field]);
      if (coerced.malformed) tracker.malformed(tripId, field, row[field], '0');
      return coerced.value;
    };

    const cnReference = readText(row.cn_reference);

    return {
      trip_id: tripId,
      loading_date: this.readDate(row.loading_date, tripId, 'loading_date', tracker),
      vehicle_no: readText(row.vehicle_no),
      driver_id: readText(row.driver_id),
      raw_party: primary,
      raw_alternate_party: alternate,
      route,
      origin,
      destination,
      car_qty: Math.round(amount('car_qty')),
      freight: amount('freight'),
      lr_freight: amount('lr_freight'),
      distance_km: amount('distance_km'),
      trip_status: readText(row.trip_status),
      cn_reference: cnReference === '' ? null : cnReference,
      party,
      party_corrected: corrected,
      origin_zone: this.zoneOf(origin, tracker),
      destination_zone: this.zoneOf(destination, tracker),
    };
  }

  private normalizeConsignment(row: RenamedRow<ConsignmentField>, tracker: NormalizationTracker): ConsignmentRecord {
    const cnNo = readText(row.cn_no);
    const route = readText(row.route);
    const origin = readText(row.origin) || splitRoute(route).origin;
    const billingParty = readText(row.billing_party);
    const linkedTripId = readOptionalText(row.linked_trip_id);
    const vehicleClass = readText(row.vehicle_class);

    const name = this.gazetteer.resolveVendorParty(billingParty, origin);
    const party: CanonicalParty = { name, category: this.gazetteer.classifyCategory(name) };
    tracker.party(party);

    const amount = (field: ConsignmentField): number => {
      const coerced = parseAmount(row[field]);
      if (coerced.malformed) tracker.malformed(cnNo, field, row[field], '0');
      return coerced.value;
    };

    return {
      cn_no: cnNo,
      cn_date: this.readDate(row.cn_date, cnNo, 'cn_date', tracker),
      billing_party: billingParty,
      origin,
      route,
      vehicle_no: readText(row.vehicle_no),
      quantity: Math.round(amount('quantity')),
      basic_freight: amount('basic_freight'),
      linked_trip_id: linkedTripId,
      bill_no: readOptionalText(row.bill_no),
      pod_receipt_no: readOptionalText(row.pod_receipt_no),
      eta_date: this.readDate(row.eta_date, cnNo, 'eta_date', tracker),
      vehicle_class: vehicleClass,
      branch: readText(row.branch),
      party,
      origin_zone: this.zoneOf(origin, tracker),
      is_vendor_activity: isVendorActivity(party, linkedTripId, vehicleClass),
    };
  }

  private readDate(value: unknown, rowId: string, field: string, tracker: NormalizationTracker): string | null {
    if (isBlank(value)) {
      return null;
    }
    const parsed = parseIsoDate(value);
    if (parsed === null) {
      tracker.malformed(rowId, field, value, 'no date');
    }
    return parsed;
  }

  private zoneOf(city: string, tracker: NormalizationTracker): ZoneTag {
    const match = this.gazetteer.matchZone(city);
    tracker.city(city, match.matched);
    return match.zone;
  }
}

/**
 * R.sai bills its own linked trips too; only unlinked notes are vendor
 * work. Everyone else counts when the vehicle was hired.
 */
export function isVendorActivity(party: CanonicalParty, linkedTripId: string | null, vehicleClass: string): boolean {
  if (party.category === 'R.sai') {
    return linkedTripId === null;
  }
  return vehicleClass.trim().toUpperCase() === VEHICLE_CLASS_HIRE.toUpperCase();
}

/**
 * `origin - destination`, split on the first hyphen
 */
export function splitRoute(route: string): { origin: string; destination: string } {
  const index = route.indexOf('-');
  if (index === -1) {
    return { origin: route.trim(), destination: '' };
  }
  return {
    origin: route.slice(0, index).trim(),
    destination: route.slice(index + 1).trim(),
  };
}

export function readText(value: unknown): string {
  if (typeof value === 'string') {
    return value.trim();
  }
  if (typeof value === 'number' || typeof value === 'bigint') {
    return value.toString();
  }
  if (value instanceof Date) {
    return isNaN(value.getTime()) ? '' : toIsoDate(value);
  }
  return '';
}

function readOptionalText(value: unknown): string | null {
  const text = readText(value);
  return text === '' ? null : text;
}

/**
 * Non-negative amount from a number or a formatted string
 * ("₹ 1,25,000.50", "Rs. 500", "1.234,56"). Blank is a legitimate 0;
 * anything else unreadable or negative is 0 and flagged malformed.
 */
export function parseAmount(value: unknown): Coerced<number> {
  if (isBlank(value)) {
    return { value: 0, malformed: false };
  }

  let parsed: number;
  if (typeof value === 'number') {
    parsed = value;
  } else if (typeof value === 'string') {
    parsed = parseFormattedNumber(value);
  } else {
    return { value: 0, malformed: true };
  }

  if (!Number.isFinite(parsed) || parsed < 0) {
    return { value: 0, malformed: true };
  }
  return { value: parsed, malformed: false };
}

function parseFormattedNumber(text: string): number {
  // "Rs. 500" leaves a leading dot behind
  let clean = text.replace(/[^\d.,-]/g, '').replace(/^[.,]+/, '');
  if (!/\d/.test(clean)) {
    return NaN;
  }

  const dotPos = clean.lastIndexOf('.');
  const commaPos = clean.lastIndexOf(',');

  if (dotPos > -1 && commaPos > -1) {
    // whichever separator comes last is the decimal point
    clean = dotPos > commaPos
      ? clean.replace(/,/g, '')
      : clean.replace(/\./g, '').replace(',', '.');
  } else if (commaPos > -1) {
    const afterComma = clean.substring(commaPos + 1);
    clean = afterComma.length > 0 && afterComma.length <= 2
      ? clean.replace(',', '.')
      : clean.replace(/,/g, '');
  }

  return Number(clean);
}
