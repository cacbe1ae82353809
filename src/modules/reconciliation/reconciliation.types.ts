import { CategoryTag } from '../gazetteer/gazetteer.types';
import { ConsignmentRecord, TripRecord } from '../ingest/ingest.types';

/**
 * One party's own-fleet and vendor figures for a period
 */
export interface LedgerEntry {
  party: string;
  category: CategoryTag;
  trip_count: number;
  own_cars: number;
  own_freight: number;
  vendor_cars: number;
  vendor_freight: number;
  total_cars: number;
  total_freight: number;
}

/**
 * Strategy that recognises candidate trips already covered by a
 * consignment note. Matchers run in order; each sees only the trips the
 * previous ones left.
 */
export interface PendingMatcher {
  readonly name: string;
  /** ids of the given trips that some consignment covers */
  match(trips: ReadonlyArray<TripRecord>, consignments: ReadonlyArray<ConsignmentRecord>): Set<string>;
}

export interface PendingCnOptions {
  /** YYYY-MM-DD */
  today: string;
  minAgeDays: number;
}

export interface PendingCnTrip {
  trip_id: string;
  loading_date: string;
  age_days: number;
  vehicle_no: string;
  route: string;
  party: string;
  category: CategoryTag;
  car_qty: number;
  freight: number;
}

export interface MatcherHits {
  matcher: string;
  dropped: number;
}

export interface PendingCnResult {
  trips: PendingCnTrip[];
  /** loaded, unreferenced, old enough, not excluded */
  candidates: number;
  excluded: number;
  matcher_hits: MatcherHits[];
}
