import { CanonicalParty, ZoneTag } from '../gazetteer/gazetteer.types';
import { Diagnostic } from '../../utils/diagnostics';

/**
 * Own-fleet trip after normalization
 */
export interface TripRecord {
  trip_id: string;
  /** YYYY-MM-DD, null when the source date was unreadable */
  loading_date: string | null;
  vehicle_no: string;
  driver_id: string;
  /** Display name as the source had it (NewPartyName, else Party) */
  raw_party: string;
  /** Legacy Party column, used by the correction path */
  raw_alternate_party: string;
  route: string;
  origin: string;
  destination: string;
  car_qty: number;
  freight: number;
  lr_freight: number;
  distance_km: number;
  trip_status: string;
  /** null when blank: no consignment raised yet */
  cn_reference: string | null;
  party: CanonicalParty;
  /** true when the canonical name came from the alternate party field */
  party_corrected: boolean;
  origin_zone: ZoneTag;
  destination_zone: ZoneTag;
}

/**
 * Vendor consignment note after normalization
 */
export interface ConsignmentRecord {
  cn_no: string;
  cn_date: string | null;
  billing_party: string;
  origin: string;
  route: string;
  vehicle_no: string;
  quantity: number;
  basic_freight: number;
  linked_trip_id: string | null;
  bill_no: string | null;
  pod_receipt_no: string | null;
  eta_date: string | null;
  vehicle_class: string;
  branch: string;
  party: CanonicalParty;
  origin_zone: ZoneTag;
  /** counts toward vendor figures in the ledger */
  is_vendor_activity: boolean;
}

export interface UnmappedCity {
  city: string;
  occurrences: number;
}

export interface NormalizationResult<T> {
  records: T[];
  diagnostics: Diagnostic[];
  unmappedCities: UnmappedCity[];
}

export const VEHICLE_CLASS_OWN = 'Own Vehicle';
export const VEHICLE_CLASS_HIRE = 'Hire Vehicle';
export const TRIP_STATUS_LOADED = 'Loaded';
export const TRIP_STATUS_EMPTY = 'Empty';
