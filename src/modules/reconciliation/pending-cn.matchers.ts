import { ConsignmentRecord, TripRecord, VEHICLE_CLASS_OWN } from '../ingest/ingest.types';
import { PendingMatcher } from './reconciliation.types';

/**
 * Injection token for the ordered matcher list
 */
export const PENDING_CN_MATCHERS = 'PENDING_CN_MATCHERS';

export function normalizeKey(value: string | null): string {
  return (value ?? '').trim().toUpperCase();
}

function compositeKey(...parts: Array<string | null>): string | null {
  const normalized = parts.map(normalizeKey);
  return normalized.some((part) => part === '') ? null : normalized.join('|');
}

/**
 * Exact match on a composite key; a blank key part never matches
 */
abstract class KeyMatcher implements PendingMatcher {
  abstract readonly name: string;

  protected abstract tripKey(trip: TripRecord): string | null;
  protected abstract consignmentKey(cn: ConsignmentRecord): string | null;

  match(trips: ReadonlyArray<TripRecord>, consignments: ReadonlyArray<ConsignmentRecord>): Set<string> {
    const covered = new Set<string>();
    for (const cn of consignments) {
      const key = this.consignmentKey(cn);
      if (key !== null) covered.add(key);
    }

    const hits = new Set<string>();
    for (const trip of trips) {
      const key = this.tripKey(trip);
      if (key !== null && covered.has(key)) {
        hits.add(trip.trip_id);
      }
    }
    return hits;
  }
}

/**
 * Same vehicle, consignment dated on the loading day
 */
export class DateVehicleMatcher extends KeyMatcher {
  readonly name = 'date_vehicle';

  protected tripKey(trip: TripRecord): string | null {
    return compositeKey(trip.loading_date, trip.vehicle_no);
  }

  protected consignmentKey(cn: ConsignmentRecord): string | null {
    return compositeKey(cn.cn_date, cn.vehicle_no);
  }
}

/**
 * Same vehicle on the same route, for own-vehicle notes raised without a
 * trip link
 */
export class RouteVehicleMatcher extends KeyMatcher {
  readonly name = 'route_vehicle';

  protected tripKey(trip: TripRecord): string | null {
    return compositeKey(trip.route, trip.vehicle_no);
  }

  protected consignmentKey(cn: ConsignmentRecord): string | null {
    if (cn.linked_trip_id !== null || normalizeKey(cn.vehicle_class) !== normalizeKey(VEHICLE_CLASS_OWN)) {
      return null;
    }
    return compositeKey(cn.route, cn.vehicle_no);
  }
}

export function defaultPendingMatchers(): PendingMatcher[] {
  return [new DateVehicleMatcher(), new RouteVehicleMatcher()];
}
