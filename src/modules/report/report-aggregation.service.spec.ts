import { Test, TestingModule } from '@nestjs/testing';
import { ReportAggregationService } from './report-aggregation.service';
import { LedgerEntry } from '../reconciliation/reconciliation.types';
import { CategoryTag } from '../gazetteer/gazetteer.types';
import { makeTrip } from '../../../test/utils/test-helpers';

function entry(
  party: string,
  category: CategoryTag,
  own: [number, number, number],
  vendor: [number, number] = [0, 0],
): LedgerEntry {
  const [tripCount, ownCars, ownFreight] = own;
  const [vendorCars, vendorFreight] = vendor;
  return {
    party,
    category,
    trip_count: tripCount,
    own_cars: ownCars,
    own_freight: ownFreight,
    vendor_cars: vendorCars,
    vendor_freight: vendorFreight,
    total_cars: ownCars + vendorCars,
    total_freight: ownFreight + vendorFreight,
  };
}

describe('ReportAggregationService', () => {
  let service: ReportAggregationService;

  beforeEach(async () => {
    const module: TestingModule = await Test.createTestingModule({
      providers: [ReportAggregationService],
    }).compile();

    service = module.get<ReportAggregationService>(ReportAggregationService);
  });

  describe('buildTargetVsActual', () => {
    const range = { from: '2025-03-01', to: '2025-03-10' };
    const compareRange = { from: '2025-01-01', to: '2025-01-10' };

    const ledger = [
      entry('HONDA CARS INDIA LTD', 'Honda', [2, 12, 60000]),
      entry('TATA MOTORS LTD', 'Tata', [1, 5, 25000], [3, 15000]),
      entry('Market Load', 'MarketLoad', [0, 0, 0], [6, 30000]),
      entry('TATA MOTORS PASSENGER VEHICLES LTD', 'Tata', [1, 4, 20000]),
    ];
    const compareLedger = [
      entry('HONDA CARS INDIA LTD', 'Honda', [2, 10, 50000]),
      entry('SPINNY', 'Spinny', [1, 2, 9000]),
    ];
    const targets = new Map([
      ['HONDA CARS INDIA LTD', 70000],
      ['TATA MOTORS LTD', 45000],
    ]);

    it('should order rows by category with subtotals and a grand total', () => {
      const report = service.buildTargetVsActual(ledger, compareLedger, targets, range, compareRange);

      expect(report.days).toBe(10);
      expect(report.rows.map((row) => [row.row_type, row.party])).toEqual([
        ['party', 'HONDA CARS INDIA LTD'],
        ['party', 'TATA MOTORS LTD'],
        ['party', 'TATA MOTORS PASSENGER VEHICLES LTD'],
        ['subtotal', 'Tata - Total'],
        ['party', 'Market Load'],
        ['grand_total', 'Grand Total'],
      ]);
    });

    it('should join comparison figures by party and derive the averages', () => {
      const [honda, tata, tataPv] = service.buildTargetVsActual(ledger, compareLedger, targets, range, compareRange).rows;

      expect(honda).toEqual({
        row_type: 'party',
        party: 'HONDA CARS INDIA LTD',
        category: 'Honda',
        color: '#ff6b35',
        bold: false,
        trip_count: 2,
        own_cars: 12,
        own_freight: 60000,
        vendor_cars: 0,
        vendor_freight: 0,
        total_cars: 12,
        total_freight: 60000,
        compare_cars: 10,
        compare_freight: 50000,
        target: 70000,
        average_per_day: 6000,
        shortfall: 10000,
      });
      expect([tata.compare_cars, tata.compare_freight, tata.target, tata.shortfall]).toEqual([0, 0, 45000, 40000]);
      expect(tataPv.target).toBeNull();
    });

    it('should sum member targets into the subtotal', () => {
      const subtotal = service
        .buildTargetVsActual(ledger, compareLedger, targets, range, compareRange)
        .rows.find((row) => row.row_type === 'subtotal');

      expect(subtotal).toEqual({
        row_type: 'subtotal',
        party: 'Tata - Total',
        category: 'Tata',
        color: '#06b6d4',
        bold: true,
        trip_count: 2,
        own_cars: 9,
        own_freight: 45000,
        vendor_cars: 3,
        vendor_freight: 15000,
        total_cars: 12,
        total_freight: 60000,
        compare_cars: 0,
        compare_freight: 0,
        target: 45000,
        average_per_day: 6000,
        shortfall: 60000,
      });
    });

    it('should total every party row in the grand total', () => {
      const rows = service.buildTargetVsActual(ledger, compareLedger, targets, range, compareRange).rows;
      const grandTotal = rows[rows.length - 1];

      expect(grandTotal).toEqual({
        row_type: 'grand_total',
        party: 'Grand Total',
        category: null,
        color: '#1e3a5f',
        bold: true,
        trip_count: 4,
        own_cars: 21,
        own_freight: 105000,
        vendor_cars: 9,
        vendor_freight: 45000,
        total_cars: 30,
        total_freight: 150000,
        compare_cars: 10,
        compare_freight: 50000,
        target: 115000,
        average_per_day: 15000,
        shortfall: 100000,
      });
    });

    it('should leave a subtotal target null when no member has one', () => {
      const rows = service.buildTargetVsActual(
        [entry('SPINNY', 'Spinny', [1, 2, 9000]), entry('SPINNY AUCTIONS', 'Spinny', [1, 1, 4000])],
        [],
        new Map(),
        range,
        compareRange,
      ).rows;

      expect(rows.map((row) => [row.party, row.target])).toEqual([
        ['SPINNY', null],
        ['SPINNY AUCTIONS', null],
        ['Spinny - Total', null],
        ['Grand Total', null],
      ]);
    });

    it('should close an empty ledger with a zero grand total', () => {
      const rows = service.buildTargetVsActual([], [], new Map(), range, compareRange).rows;

      expect(rows).toHaveLength(1);
      expect(rows[0].row_type).toBe('grand_total');
      expect(rows[0].total_freight).toBe(0);
      expect(rows[0].average_per_day).toBe(0);
    });
  });

  describe('month views', () => {
    const trips = [
      makeTrip({ trip_id: 'a', loading_date: '2025-03-02', car_qty: 8, freight: 40000, distance_km: 1400 }),
      makeTrip({ trip_id: 'b', loading_date: '2025-03-02', trip_status: 'Empty', car_qty: 0, freight: 0, distance_km: 0 }),
      makeTrip({ trip_id: 'c', party: '', category: 'Other', loading_date: '2025-03-01', car_qty: 0, freight: 5000, distance_km: 20 }),
      makeTrip({
        trip_id: 'd',
        party: 'TATA MOTORS LTD',
        category: 'Tata',
        loading_date: '2025-03-05',
        route: 'Pune - Chakan Yard',
        car_qty: 5,
        freight: 25000.25,
        distance_km: 300,
      }),
      makeTrip({ trip_id: 'e', loading_date: '2025-02-27', car_qty: 7, freight: 35000 }),
      makeTrip({ trip_id: 'f', loading_date: null }),
    ];

    it('should summarize loaded and empty trips for a month', () => {
      expect(service.summarizeMonth(trips, '2025-03')).toEqual({
        month: '2025-03',
        party: null,
        loaded_trips: 2,
        empty_trips: 2,
        cars_lifted: 13,
        total_freight: 70000.25,
        freight_lakhs: 0.7,
      });
    });

    it('should filter the summary by party', () => {
      expect(service.summarizeMonth(trips, '2025-03', 'HONDA CARS INDIA LTD')).toEqual({
        month: '2025-03',
        party: 'HONDA CARS INDIA LTD',
        loaded_trips: 1,
        empty_trips: 1,
        cars_lifted: 8,
        total_freight: 40000,
        freight_lakhs: 0.4,
      });
    });

    it('should group daily loading by date', () => {
      expect(service.dailyLoading(trips, '2025-03')).toEqual([
        { date: '2025-03-01', trips: 1, cars: 0, freight: 5000, freight_lakhs: 0.05, distance_km: 20 },
        { date: '2025-03-02', trips: 2, cars: 8, freight: 40000, freight_lakhs: 0.4, distance_km: 1400 },
        { date: '2025-03-05', trips: 1, cars: 5, freight: 25000.25, freight_lakhs: 0.25, distance_km: 300 },
      ]);
    });

    it('should pick local, pilot and yard loads per party', () => {
      expect(service.localLoads(trips, '2025-03', 100)).toEqual([
        { party: 'HONDA CARS INDIA LTD', category: 'Honda', trips: 1, cars: 0, freight: 0, freight_lakhs: 0 },
        { party: 'TATA MOTORS LTD', category: 'Tata', trips: 1, cars: 5, freight: 25000.25, freight_lakhs: 0.25 },
      ]);
    });

    it('should list months newest first and parties alphabetically', () => {
      expect(service.availableFilters(trips)).toEqual({
        months: ['2025-03', '2025-02'],
        parties: ['HONDA CARS INDIA LTD', 'TATA MOTORS LTD'],
      });
    });
  });
});
