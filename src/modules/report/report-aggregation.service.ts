import { Injectable, Logger } from '@nestjs/common';
import { CATEGORY_ORDER, CATEGORY_PRESENTATION, GRAND_TOTAL_COLOR } from '../gazetteer/category-presentation';
import { CategoryTag } from '../gazetteer/gazetteer.types';
import { TRIP_STATUS_EMPTY, TripRecord } from '../ingest/ingest.types';
import { LedgerEntry } from '../reconciliation/reconciliation.types';
import { DateRange, inclusiveDayCount, isWithin, monthOf, monthRange } from '../../utils/dates';
import { round, sumRounded, toLakhs } from '../../utils/round';
import {
  AvailableFilters,
  ComparisonRow,
  DailyLoading,
  LocalLoadGroup,
  MonthSummary,
  RowType,
  TargetVsActualReport,
} from './report.types';

const LOCAL_ROUTE = /LOCAL|PILOT|YARD/i;

/**
 * Sum of the stored targets among the rows, null when none has one
 */
function sumTargets(rows: ReadonlyArray<ComparisonRow>): number | null {
  const stored = rows.map((row) => row.target).filter((target): target is number => target !== null);
  return stored.length > 0 ? sumRounded(stored) : null;
}

function sumOf(rows: ReadonlyArray<ComparisonRow>, pick: (row: ComparisonRow) => number): number {
  return rows.reduce((sum, row) => sum + pick(row), 0);
}

/**
 * Trips of a month, optionally for one canonical party
 */
function tripsInMonth(trips: ReadonlyArray<TripRecord>, month: string, party?: string): TripRecord[] {
  const range = monthRange(month);
  return trips.filter(
    (trip) => isWithin(trip.loading_date, range) && (party === undefined || trip.party.name === party),
  );
}

function isEmptyTrip(trip: TripRecord): boolean {
  return trip.party.name === '' || trip.trip_status.trim().toUpperCase() === TRIP_STATUS_EMPTY.toUpperCase();
}

/**
 * ReportAggregationService - Data Aggregation Logic
 *
 * Turns ledgers and normalized trips into report tables:
 * - Target vs actual, category-ordered with subtotals and a grand total
 * - Month summary cards
 * - Daily loading details
 * - Local/pilot loads per party
 *
 * Pure: everything it needs comes in as arguments.
 */
@Injectable()
export class ReportAggregationService {
  private readonly logger = new Logger(ReportAggregationService.name);

  /**
   * Category-ordered comparison table.
   *
   * Rows come from the primary ledger; compare figures are joined on
   * party name and are zero for parties absent from the compare ledger.
   * A `<Label> - Total` row follows every category with two or more
   * parties; `Grand Total` closes the table.
   */
  buildTargetVsActual(
    ledger: ReadonlyArray<LedgerEntry>,
    compareLedger: ReadonlyArray<LedgerEntry>,
    targets: ReadonlyMap<string, number>,
    range: DateRange,
    compareRange: DateRange,
  ): TargetVsActualReport {
    const days = inclusiveDayCount(range);
    const compareByParty = new Map(compareLedger.map((entry) => [entry.party, entry]));

    const partyRows = ledger.map((entry) => {
      const compare = compareByParty.get(entry.party);
      const compareFreight = compare?.total_freight ?? 0;
      const row: ComparisonRow = {
        row_type: 'party',
        party: entry.party,
        category: entry.category,
        color: CATEGORY_PRESENTATION[entry.category].color,
        bold: false,
        trip_count: entry.trip_count,
        own_cars: entry.own_cars,
        own_freight: entry.own_freight,
        vendor_cars: entry.vendor_cars,
        vendor_freight: entry.vendor_freight,
        total_cars: entry.total_cars,
        total_freight: entry.total_freight,
        compare_cars: compare?.total_cars ?? 0,
        compare_freight: compareFreight,
        target: targets.get(entry.party) ?? null,
        average_per_day: round(entry.total_freight / days),
        shortfall: round(entry.total_freight - compareFreight),
      };
      return row;
    });

    const rows: ComparisonRow[] = [];
    for (const category of CATEGORY_ORDER) {
      const members = partyRows.filter((row) => row.category === category);
      if (members.length === 0) {
        continue;
      }
      rows.push(...members);
      if (members.length >= 2) {
        const { label, color } = CATEGORY_PRESENTATION[category];
        rows.push(this.totalRow('subtotal', `${label} - Total`, category, color, members, days));
      }
    }
    rows.push(this.totalRow('grand_total', 'Grand Total', null, GRAND_TOTAL_COLOR, partyRows, days));

    this.logger.log({
      event: 'target_vs_actual_built',
      from: range.from,
      to: range.to,
      compare_from: compareRange.from,
      compare_to: compareRange.to,
      parties: partyRows.length,
      rows: rows.length,
    });

    return { range, compare_range: compareRange, days, rows };
  }

  /**
   * Loaded/empty trip counts, cars and freight for a month
   */
  summarizeMonth(trips: ReadonlyArray<TripRecord>, month: string, party?: string): MonthSummary {
    const monthTrips = tripsInMonth(trips, month, party);
    const emptyTrips = monthTrips.filter(isEmptyTrip).length;
    const totalFreight = sumRounded(monthTrips.map((trip) => trip.freight));

    return {
      month,
      party: party ?? null,
      loaded_trips: monthTrips.length - emptyTrips,
      empty_trips: emptyTrips,
      cars_lifted: monthTrips.reduce((sum, trip) => sum + trip.car_qty, 0),
      total_freight: totalFreight,
      freight_lakhs: toLakhs(totalFreight),
    };
  }

  /**
   * Per loading date figures for a month, oldest first
   */
  dailyLoading(trips: ReadonlyArray<TripRecord>, month: string, party?: string): DailyLoading[] {
    const byDate = new Map<string, TripRecord[]>();
    for (const trip of tripsInMonth(trips, month, party)) {
      const date = trip.loading_date ?? '';
      const dayTrips = byDate.get(date);
      if (dayTrips) {
        dayTrips.push(trip);
      } else {
        byDate.set(date, [trip]);
      }
    }

    return [...byDate.entries()]
      .sort(([a], [b]) => a.localeCompare(b))
      .map(([date, dayTrips]) => {
        const freight = sumRounded(dayTrips.map((trip) => trip.freight));
        return {
          date,
          trips: dayTrips.length,
          cars: dayTrips.reduce((sum, trip) => sum + trip.car_qty, 0),
          freight,
          freight_lakhs: toLakhs(freight),
          distance_km: round(dayTrips.reduce((sum, trip) => sum + trip.distance_km, 0)),
        };
      });
  }

  /**
   * Trips on local, pilot or yard routes, or shorter than
   * `maxDistanceKm`, grouped by party in first-appearance order
   */
  localLoads(
    trips: ReadonlyArray<TripRecord>,
    month: string,
    maxDistanceKm: number,
    party?: string,
  ): LocalLoadGroup[] {
    const groups = new Map<string, { category: CategoryTag; trips: TripRecord[] }>();

    for (const trip of tripsInMonth(trips, month, party)) {
      const isLocal = LOCAL_ROUTE.test(trip.route) || trip.distance_km < maxDistanceKm;
      if (!isLocal || trip.party.name === '') {
        continue;
      }
      const group = groups.get(trip.party.name);
      if (group) {
        group.trips.push(trip);
      } else {
        groups.set(trip.party.name, { category: trip.party.category, trips: [trip] });
      }
    }

    return [...groups.entries()].map(([name, group]) => {
      const freight = sumRounded(group.trips.map((trip) => trip.freight));
      return {
        party: name,
        category: group.category,
        trips: group.trips.length,
        cars: group.trips.reduce((sum, trip) => sum + trip.car_qty, 0),
        freight,
        freight_lakhs: toLakhs(freight),
      };
    });
  }

  /**
   * Months with trip data (newest first) and the party filter list
   */
  availableFilters(trips: ReadonlyArray<TripRecord>): AvailableFilters {
    const months = new Set<string>();
    const parties = new Set<string>();

    for (const trip of trips) {
      if (trip.loading_date !== null) {
        months.add(monthOf(trip.loading_date));
      }
      if (trip.party.name !== '') {
        parties.add(trip.party.name);
      }
    }

    return {
      months: [...months].sort().reverse(),
      parties: [...parties].sort((a, b) => a.localeCompare(b)),
    };
  }

  private totalRow(
    rowType: RowType,
    party: string,
    category: CategoryTag | null,
    color: string,
    members: ReadonlyArray<ComparisonRow>,
    days: number,
  ): ComparisonRow {
    const totalFreight = sumRounded(members.map((row) => row.total_freight));
    const compareFreight = sumRounded(members.map((row) => row.compare_freight));

    return {
      row_type: rowType,
      party,
      category,
      color,
      bold: true,
      trip_count: sumOf(members, (row) => row.trip_count),
      own_cars: sumOf(members, (row) => row.own_cars),
      own_freight: sumRounded(members.map((row) => row.own_freight)),
      vendor_cars: sumOf(members, (row) => row.vendor_cars),
      vendor_freight: sumRounded(members.map((row) => row.vendor_freight)),
      total_cars: sumOf(members, (row) => row.total_cars),
      total_freight: totalFreight,
      compare_cars: sumOf(members, (row) => row.compare_cars),
      compare_freight: compareFreight,
      target: sumTargets(members),
      average_per_day: round(totalFreight / days),
      shortfall: round(totalFreight - compareFreight),
    };
  }
}
