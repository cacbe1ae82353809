import { RawRow } from '../../database/database.service';

export const TRIP_FIELDS = [
  'trip_id',
  'loading_date',
  'vehicle_no',
  'driver_id',
  'party',
  'new_party_name',
  'route',
  'car_qty',
  'freight',
  'lr_freight',
  'distance_km',
  'trip_status',
  'cn_reference',
] as const;

export type TripField = (typeof TRIP_FIELDS)[number];

export const CONSIGNMENT_FIELDS = [
  'cn_no',
  'cn_date',
  'billing_party',
  'origin',
  'route',
  'vehicle_no',
  'quantity',
  'basic_freight',
  'linked_trip_id',
  'bill_no',
  'pod_receipt_no',
  'eta_date',
  'vehicle_class',
  'branch',
] as const;

export type ConsignmentField = (typeof CONSIGNMENT_FIELDS)[number];

/**
 * Source column names per canonical trip field, across feed revisions.
 * Matching is case-insensitive; the canonical name itself always matches.
 */
export const TRIP_COLUMN_ALIASES: Readonly<Record<TripField, readonly string[]>> = {
  trip_id: ['TLHSNo', 'TripNo', 'Trip_ID'],
  loading_date: ['LoadingDate', 'Loading_Dt', 'LoadDate'],
  vehicle_no: ['VehicleNo', 'Vehicle', 'Vehicle_Number'],
  driver_id: ['DriverCode', 'DriverId', 'Driver'],
  party: ['Party', 'PartyName'],
  new_party_name: ['NewPartyName', 'New_Party'],
  route: ['Route', 'RouteName'],
  car_qty: ['CarQty', 'Qty', 'Cars'],
  freight: ['Freight', 'FreightAmount'],
  lr_freight: ['LRFreight', 'LR_Freight'],
  distance_km: ['Distance', 'DistanceKm', 'KM'],
  trip_status: ['TripStatus', 'Status'],
  cn_reference: ['LRNo', 'CNNo', 'LR_No', 'CN_Ref'],
};

export const CONSIGNMENT_COLUMN_ALIASES: Readonly<Record<ConsignmentField, readonly string[]>> = {
  cn_no: ['CNNo', 'LRNo', 'ConsignmentNo', 'CN_Number'],
  cn_date: ['CNDate', 'CN_Dt', 'LRDate'],
  billing_party: ['BillingParty', 'BillingPartyName', 'Billing_Party_Name'],
  origin: ['Origin', 'FromCity', 'From_Station'],
  route: ['Route', 'RouteName'],
  vehicle_no: ['VehicleNo', 'Vehicle', 'Vehicle_Number'],
  quantity: ['Qty', 'Quantity', 'CarQty'],
  basic_freight: ['BasicFreight', 'Basic_Freight', 'Freight'],
  linked_trip_id: ['TLHSNo', 'TripNo', 'Trip_ID'],
  bill_no: ['BillNo', 'Bill_No', 'InvoiceNo'],
  pod_receipt_no: ['PODReceiptNo', 'PodNo', 'POD_Receipt_No'],
  eta_date: ['ETA', 'ETADate', 'ETA_Date'],
  vehicle_class: ['VehicleType', 'VehicleClass', 'Vehicle_Type'],
  branch: ['Branch', 'BranchName'],
};

export type RenamedRow<F extends string> = Partial<Record<F, unknown>>;

export function renameTripColumns(row: RawRow): RenamedRow<TripField> {
  return applyColumnRenames(row, TRIP_FIELDS, TRIP_COLUMN_ALIASES);
}

export function renameConsignmentColumns(row: RawRow): RenamedRow<ConsignmentField> {
  return applyColumnRenames(row, CONSIGNMENT_FIELDS, CONSIGNMENT_COLUMN_ALIASES);
}

/**
 * Map a raw source row onto canonical field names. The first alias
 * present with a non-blank value wins; unknown columns are dropped.
 */
export function applyColumnRenames<F extends string>(
  row: RawRow,
  fields: readonly F[],
  aliases: Readonly<Record<F, readonly string[]>>,
): RenamedRow<F> {
  const byLowerKey = new Map<string, unknown>();
  for (const [key, value] of Object.entries(row)) {
    const lower = key.trim().toLowerCase();
    if (!byLowerKey.has(lower) || isBlank(byLowerKey.get(lower))) {
      byLowerKey.set(lower, value);
    }
  }

  const renamed: RenamedRow<F> = {};
  for (const field of fields) {
    const candidates = [field, ...aliases[field]];
    for (const candidate of candidates) {
      const value = byLowerKey.get(candidate.toLowerCase());
      if (!isBlank(value)) {
        renamed[field] = value;
        break;
      }
    }
  }
  return renamed;
}

export function isBlank(value: unknown): boolean {
  return value === null || value === undefined || (typeof value === 'string' && value.trim() === '');
}
