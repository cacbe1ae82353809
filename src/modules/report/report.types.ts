import { CategoryTag } from '../gazetteer/gazetteer.types';
import { DateRange } from '../../utils/dates';

export type RowType = 'party' | 'subtotal' | 'grand_total';

/**
 * One line of the target-vs-actual table
 */
export interface ComparisonRow {
  row_type: RowType;
  /** party name, `<Label> - Total`, or `Grand Total` */
  party: string;
  /** null on the grand total row */
  category: CategoryTag | null;
  color: string;
  bold: boolean;
  trip_count: number;
  own_cars: number;
  own_freight: number;
  vendor_cars: number;
  vendor_freight: number;
  total_cars: number;
  total_freight: number;
  compare_cars: number;
  compare_freight: number;
  target: number | null;
  average_per_day: number;
  /** total_freight - compare_freight, signed */
  shortfall: number;
}

export interface TargetVsActualReport {
  range: DateRange;
  compare_range: DateRange;
  days: number;
  rows: ComparisonRow[];
}

export interface MonthSummary {
  /** YYYY-MM */
  month: string;
  party: string | null;
  loaded_trips: number;
  empty_trips: number;
  cars_lifted: number;
  total_freight: number;
  freight_lakhs: number;
}

export interface DailyLoading {
  date: string;
  trips: number;
  cars: number;
  freight: number;
  freight_lakhs: number;
  distance_km: number;
}

export interface LocalLoadGroup {
  party: string;
  category: CategoryTag;
  trips: number;
  cars: number;
  freight: number;
  freight_lakhs: number;
}

export interface AvailableFilters {
  /** YYYY-MM, newest first */
  months: string[];
  parties: string[];
}
