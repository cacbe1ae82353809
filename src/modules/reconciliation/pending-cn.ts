import { ConsignmentRecord, TRIP_STATUS_LOADED, TripRecord } from '../ingest/ingest.types';
import { addDays, inclusiveDayCount } from '../../utils/dates';
import { normalizeKey } from './pending-cn.matchers';
import { MatcherHits, PendingCnOptions, PendingCnResult, PendingCnTrip, PendingMatcher } from './reconciliation.types';

/**
 * Loaded, no consignment reference, and loaded on or before the cutoff
 */
export function isPendingCandidate(trip: TripRecord, cutoff: string): boolean {
  return (
    normalizeKey(trip.trip_status) === normalizeKey(TRIP_STATUS_LOADED) &&
    normalizeKey(trip.cn_reference) === '' &&
    trip.loading_date !== null &&
    trip.loading_date <= cutoff
  );
}

/**
 * Own-fleet trips still waiting for a consignment note.
 *
 * Candidates are narrowed by the exclusion set, then each matcher in turn
 * removes the trips it can tie to a consignment. The result is always a
 * subset of the candidates, oldest first.
 */
export function findPendingCn(
  trips: ReadonlyArray<TripRecord>,
  consignments: ReadonlyArray<ConsignmentRecord>,
  exclusions: ReadonlySet<string>,
  matchers: ReadonlyArray<PendingMatcher>,
  options: PendingCnOptions,
): PendingCnResult {
  const cutoff = addDays(options.today, -options.minAgeDays);

  const eligible = trips.filter((trip) => isPendingCandidate(trip, cutoff));
  let remaining = eligible.filter((trip) => !exclusions.has(trip.trip_id));
  const excluded = eligible.length - remaining.length;

  const matcherHits: MatcherHits[] = [];
  for (const matcher of matchers) {
    const hits = matcher.match(remaining, consignments);
    const before = remaining.length;
    remaining = remaining.filter((trip) => !hits.has(trip.trip_id));
    matcherHits.push({ matcher: matcher.name, dropped: before - remaining.length });
  }

  const pending = remaining
    .map((trip) => toPendingTrip(trip, options.today))
    .sort((a, b) => a.loading_date.localeCompare(b.loading_date) || a.trip_id.localeCompare(b.trip_id));

  return {
    trips: pending,
    candidates: eligible.length - excluded,
    excluded,
    matcher_hits: matcherHits,
  };
}

function toPendingTrip(trip: TripRecord, today: string): PendingCnTrip {
  const loadingDate = trip.loading_date ?? today;
  return {
    trip_id: trip.trip_id,
    loading_date: loadingDate,
    age_days: inclusiveDayCount({ from: loadingDate, to: today }) - 1,
    vehicle_no: trip.vehicle_no,
    route: trip.route,
    party: trip.party.name,
    category: trip.party.category,
    car_qty: trip.car_qty,
    freight: trip.freight,
  };
}
