import { CategoryTag } from '../gazetteer/gazetteer.types';
import { ConsignmentRecord, TripRecord } from '../ingest/ingest.types';
import { DateRange, isWithin } from '../../utils/dates';
import { round } from '../../utils/round';
import { LedgerEntry } from './reconciliation.types';

interface PartyTotals {
  category: CategoryTag;
  count: number;
  cars: number;
  freight: number;
}

function accumulate(
  groups: Map<string, PartyTotals>,
  party: string,
  category: CategoryTag,
  cars: number,
  freight: number,
): void {
  const current = groups.get(party);
  if (current) {
    current.count += 1;
    current.cars += cars;
    current.freight += freight;
  } else {
    groups.set(party, { category, count: 1, cars, freight });
  }
}

/**
 * Unified per-party ledger for a period.
 *
 * Own side: trips with a party, loaded within the range. Vendor side:
 * consignments flagged as vendor activity, dated within the range. The
 * two are outer-joined on canonical party name with zero fill, so every
 * contributing row is counted exactly once. Parties keep first-appearance
 * order, own side first.
 */
export function buildLedger(
  trips: ReadonlyArray<TripRecord>,
  consignments: ReadonlyArray<ConsignmentRecord>,
  range: DateRange,
): LedgerEntry[] {
  const own = new Map<string, PartyTotals>();
  for (const trip of trips) {
    if (trip.party.name === '' || !isWithin(trip.loading_date, range)) {
      continue;
    }
    accumulate(own, trip.party.name, trip.party.category, trip.car_qty, trip.freight);
  }

  const vendor = new Map<string, PartyTotals>();
  for (const cn of consignments) {
    if (!cn.is_vendor_activity || !isWithin(cn.cn_date, range)) {
      continue;
    }
    accumulate(vendor, cn.party.name, cn.party.category, cn.quantity, cn.basic_freight);
  }

  const parties = [...own.keys(), ...[...vendor.keys()].filter((party) => !own.has(party))];

  return parties.map((party) => {
    const ownTotals = own.get(party);
    const vendorTotals = vendor.get(party);
    const ownCars = ownTotals?.cars ?? 0;
    const ownFreight = round(ownTotals?.freight ?? 0);
    const vendorCars = vendorTotals?.cars ?? 0;
    const vendorFreight = round(vendorTotals?.freight ?? 0);

    return {
      party,
      category: ownTotals?.category ?? vendorTotals?.category ?? 'Other',
      trip_count: ownTotals?.count ?? 0,
      own_cars: ownCars,
      own_freight: ownFreight,
      vendor_cars: vendorCars,
      vendor_freight: vendorFreight,
      total_cars: ownCars + vendorCars,
      total_freight: round(ownFreight + vendorFreight),
    };
  });
}
