import { Test, TestingModule } from '@nestjs/testing';
import { getRepositoryToken } from '@nestjs/typeorm';
import { dashboardConfig } from '../../src/config/dashboard.config';
import { DatabaseService, RawRow } from '../../src/database/database.service';
import { GazetteerModule } from '../../src/modules/gazetteer/gazetteer.module';
import { RecordNormalizerService } from '../../src/modules/ingest/record-normalizer.service';
import { SourceService } from '../../src/modules/ingest/source.service';
import { buildLedger } from '../../src/modules/reconciliation/ledger-builder';
import { PendingCnExclusion } from '../../src/modules/reconciliation/entities/pending-cn-exclusion.entity';
import { ExclusionService } from '../../src/modules/reconciliation/exclusion.service';
import { PENDING_CN_MATCHERS, defaultPendingMatchers } from '../../src/modules/reconciliation/pending-cn.matchers';
import { ReconciliationService } from '../../src/modules/reconciliation/reconciliation.service';
import { CsvExportService } from '../../src/modules/report/csv-export.service';
import { DashboardService } from '../../src/modules/report/dashboard.service';
import { PartyTarget } from '../../src/modules/report/entities/party-target.entity';
import { ReportAggregationService } from '../../src/modules/report/report-aggregation.service';
import { TargetService } from '../../src/modules/report/target.service';

/**
 * In-process stand-in for the exclusion table
 */
function createExclusionStore() {
  const rows = new Map<string, PendingCnExclusion>();
  let sequence = 0;

  return {
    find: async () => [...rows.values()],
    upsert: async (value: { trip_id: string; reason: string | null }) => {
      sequence += 1;
      const createdAt = rows.get(value.trip_id)?.created_at ?? new Date(Date.UTC(2024, 4, 1, 0, 0, sequence));
      rows.set(value.trip_id, Object.assign(new PendingCnExclusion(), { ...value, created_at: createdAt }));
      return { identifiers: [], generatedMaps: [], raw: [] };
    },
    delete: async (where: { trip_id: string }) => {
      const affected = rows.delete(where.trip_id) ? 1 : 0;
      return { raw: [], affected };
    },
  };
}

const TRIP_ROWS: RawRow[] = [
  {
    TLHSNo: 'T-100',
    LoadingDate: '2024-05-01',
    VehicleNo: 'KA01AB1234',
    NewPartyName: 'TOYOTA KIRLOSKAR MOTOR PVT LTD',
    Route: 'Bidadi - Chennai',
    CarQty: 6,
    Freight: 30000,
    Distance: 350,
    TripStatus: 'Loaded',
    LRNo: '',
  },
  {
    TLHSNo: 'T-101',
    LoadingDate: '2024-05-02',
    VehicleNo: 'KA01AB9999',
    NewPartyName: 'HONDA CARS INDIA LTD.',
    Route: 'Tapukara - Pune',
    CarQty: 8,
    Freight: 48000,
    Distance: 1400,
    TripStatus: 'Loaded',
    LRNo: 'LR-1',
  },
  {
    TLHSNo: 'T-102',
    LoadingDate: '2024-05-03',
    VehicleNo: 'KA02CD0002',
    NewPartyName: 'TOYOTA TRANSYSTEM INDIA PVT LTD',
    Route: 'Bidadi - Hosur',
    CarQty: 4,
    Freight: 12000,
    Distance: 60,
    TripStatus: 'Loaded',
  },
];

const CONSIGNMENT_ROWS: RawRow[] = [
  {
    CNNo: 'CN-1',
    CNDate: '2024-05-04',
    BillingParty: 'Glovis India Pvt Ltd - KIA',
    Origin: 'Anantapur',
    Route: 'Anantapur - Chennai',
    VehicleNo: 'AP01XX0001',
    VehicleType: 'Hire Vehicle',
    Qty: 5,
    BasicFreight: 25000,
  },
  {
    CNNo: 'CN-2',
    CNDate: '2024-05-05',
    BillingParty: 'MAHINDRA LOGISTICS LTD.',
    Origin: 'Chakan, Pune',
    VehicleType: 'Hire Vehicle',
    Qty: 7,
    BasicFreight: 35000,
  },
  {
    CNNo: 'CN-3',
    CNDate: '2024-05-05',
    BillingParty: 'MAHINDRA LOGISTICS LTD.',
    Origin: 'Chennai',
    VehicleType: 'Hire Vehicle',
    Qty: 3,
    BasicFreight: 15000,
  },
  {
    CNNo: 'TEST-1',
    CNDate: '2024-05-05',
    BillingParty: 'Glovis India Pvt Ltd - KIA',
    Origin: 'Anantapur',
    VehicleType: 'Hire Vehicle',
    Qty: 99,
    BasicFreight: 999999,
  },
];

describe('Reconciliation scenarios', () => {
  let app: TestingModule;
  let dashboardService: DashboardService;
  let exclusionService: ExclusionService;
  let consignmentRows: RawRow[];

  const may = { from: '2024-05-01', to: '2024-05-31' };
  const april = { from: '2024-04-01', to: '2024-04-30' };
  const today = '2024-05-10';

  beforeEach(async () => {
    consignmentRows = [...CONSIGNMENT_ROWS];

    app = await Test.createTestingModule({
      imports: [GazetteerModule],
      providers: [
        DashboardService,
        SourceService,
        RecordNormalizerService,
        ReconciliationService,
        ExclusionService,
        ReportAggregationService,
        TargetService,
        CsvExportService,
        { provide: PENDING_CN_MATCHERS, useFactory: defaultPendingMatchers },
        {
          provide: DatabaseService,
          useValue: {
            queryRows: async (query: string) => (query.endsWith('trip_log') ? TRIP_ROWS : consignmentRows),
          },
        },
        { provide: getRepositoryToken(PendingCnExclusion), useValue: createExclusionStore() },
        {
          provide: getRepositoryToken(PartyTarget),
          useValue: {
            find: async () => [
              Object.assign(new PartyTarget(), { party_name: 'TOYOTA KIRLOSKAR MOTOR PVT LTD', target: 50000 }),
              Object.assign(new PartyTarget(), { party_name: 'TOYOTA TRANSYSTEM INDIA PVT LTD', target: 20000 }),
            ],
          },
        },
        {
          provide: dashboardConfig.KEY,
          useValue: {
            pendingCnMinAgeDays: 3,
            localLoadMaxDistanceKm: 100,
            tripLogTable: 'trip_log',
            consignmentTable: 'consignment_note',
          },
        },
      ],
    }).compile();

    dashboardService = app.get(DashboardService);
    exclusionService = app.get(ExclusionService);
  });

  afterEach(async () => {
    await app.close();
  });

  it('A: an old loaded trip without any matching consignment is pending', async () => {
    const { data } = await dashboardService.getPendingCn(today);

    expect(data.trips.map((t) => t.trip_id)).toEqual(['T-100', 'T-102']);
    expect(data.trips[0]).toMatchObject({ trip_id: 'T-100', age_days: 9, vehicle_no: 'KA01AB1234' });
  });

  it('B: a consignment on the same date and vehicle clears the trip', async () => {
    consignmentRows.push({
      CNNo: 'CN-9',
      CNDate: '01/05/2024',
      VehicleNo: ' ka01ab1234 ',
      BillingParty: 'Swift Own Fleet',
      VehicleType: 'Own Vehicle',
      TLHSNo: 'T-100',
    });

    const { data } = await dashboardService.getPendingCn(today);

    expect(data.trips.map((t) => t.trip_id)).toEqual(['T-102']);
    expect(data.matcher_hits).toEqual([
      { matcher: 'date_vehicle', dropped: 1 },
      { matcher: 'route_vehicle', dropped: 0 },
    ]);
  });

  it('C: a hired Glovis movement lands on the vendor side of its own party', async () => {
    const { data } = await dashboardService.getTargetVsActual(may, april);
    const glovis = data.rows.find((row) => row.party === 'Glovis India Pvt Ltd - KIA');

    expect(glovis).toMatchObject({
      row_type: 'party',
      category: 'Glovis',
      trip_count: 0,
      vendor_cars: 5,
      vendor_freight: 25000,
      total_cars: 5,
      total_freight: 25000,
    });
  });

  it('D: Mahindra Logistics is split by origin region', async () => {
    const { data } = await dashboardService.getTargetVsActual(may, april);
    const parties = data.rows.filter((row) => row.category === 'M&M').map((row) => [row.party, row.vendor_cars]);

    expect(parties).toEqual([
      ['Mahindra Logistics Ltd - Chakan', 7],
      ['MAHINDRA LOGISTICS LTD', 3],
      ['M & M - Total', 10],
    ]);
  });

  it('E: subtotals appear only for categories with two or more parties', async () => {
    const { data } = await dashboardService.getTargetVsActual(may, april);

    expect(data.rows.map((row) => row.party)).toEqual([
      'HONDA CARS INDIA LTD',
      'Mahindra Logistics Ltd - Chakan',
      'MAHINDRA LOGISTICS LTD',
      'M & M - Total',
      'TOYOTA KIRLOSKAR MOTOR PVT LTD',
      'TOYOTA TRANSYSTEM INDIA PVT LTD',
      'Toyota - Total',
      'Glovis India Pvt Ltd - KIA',
      'Grand Total',
    ]);

    const toyotaTotal = data.rows.find((row) => row.party === 'Toyota - Total');
    expect(toyotaTotal).toMatchObject({
      own_cars: 10,
      own_freight: 42000,
      vendor_cars: 0,
      vendor_freight: 0,
      total_cars: 10,
      total_freight: 42000,
      target: 70000,
    });
  });

  it('should keep every own and vendor party in the ledger', async () => {
    const { data } = await dashboardService.getTargetVsActual(may, april);
    const parties = new Set(data.rows.filter((row) => row.row_type === 'party').map((row) => row.party));

    expect(parties).toEqual(
      new Set([
        'TOYOTA KIRLOSKAR MOTOR PVT LTD',
        'HONDA CARS INDIA LTD',
        'TOYOTA TRANSYSTEM INDIA PVT LTD',
        'Glovis India Pvt Ltd - KIA',
        'Mahindra Logistics Ltd - Chakan',
        'MAHINDRA LOGISTICS LTD',
      ]),
    );
    expect(data.rows[data.rows.length - 1].total_cars).toBe(6 + 8 + 4 + 5 + 7 + 3);
  });

  it('should give identical results on unchanged input', async () => {
    const first = await dashboardService.getPendingCn(today);
    const second = await dashboardService.getPendingCn(today);
    const firstTable = await dashboardService.getTargetVsActual(may, april);
    const secondTable = await dashboardService.getTargetVsActual(may, april);

    expect(second).toEqual(first);
    expect(secondTable).toEqual(firstTable);
  });

  it('should only ever remove trips when an exclusion is added', async () => {
    const before = await dashboardService.getPendingCn(today);

    await expect(exclusionService.add('T-102', 'billed under a manual CN')).resolves.toEqual({ success: true });
    const after = await dashboardService.getPendingCn(today);

    const beforeIds = before.data.trips.map((t) => t.trip_id);
    const afterIds = after.data.trips.map((t) => t.trip_id);
    expect(afterIds).toEqual(['T-100']);
    expect(afterIds.every((id) => beforeIds.includes(id))).toBe(true);
    expect(after.data.excluded).toBe(1);

    await exclusionService.remove('T-102');
    expect((await dashboardService.getPendingCn(today)).data.trips.map((t) => t.trip_id)).toEqual(beforeIds);
  });

  it('should summarize the month from the same pass', async () => {
    const { data, diagnostics } = await dashboardService.getMonthSummary('2024-05');

    expect(data).toEqual({
      month: '2024-05',
      party: null,
      loaded_trips: 3,
      empty_trips: 0,
      cars_lifted: 18,
      total_freight: 90000,
      freight_lakhs: 0.9,
    });
    expect(diagnostics).toEqual([]);
  });
});

describe('Own and vendor activity for the same counterparty', () => {
  let normalizer: RecordNormalizerService;

  beforeEach(async () => {
    const module: TestingModule = await Test.createTestingModule({
      imports: [GazetteerModule],
      providers: [RecordNormalizerService],
    }).compile();

    normalizer = module.get(RecordNormalizerService);
  });

  it('should merge into one ledger row per party', () => {
    const trips = normalizer.normalizeTrips([
      { TLHSNo: 'T-1', LoadingDate: '2025-03-02', NewPartyName: 'GLOVIS INDIA PVT LTD', CarQty: 4, TripStatus: 'Loaded' },
      { TLHSNo: 'T-2', LoadingDate: '2025-03-02', NewPartyName: 'R.SAI LOGISTICS', CarQty: 2, TripStatus: 'Loaded' },
      { TLHSNo: 'T-3', LoadingDate: '2025-03-03', NewPartyName: 'MARKET LOAD', CarQty: 1, TripStatus: 'Loaded' },
    ]).records;
    const consignments = normalizer.normalizeConsignments([
      { CNNo: 'CN-1', CNDate: '2025-03-04', BillingParty: 'GLOVIS INDIA PVT LTD', VehicleType: 'Hire Vehicle', Qty: 5 },
      { CNNo: 'CN-2', CNDate: '2025-03-04', BillingParty: 'R.SAI LOGISTICS', VehicleType: 'Own Vehicle', Qty: 3 },
      { CNNo: 'CN-3', CNDate: '2025-03-05', BillingParty: 'Sharma Roadways', VehicleType: 'Hire Vehicle', Qty: 6 },
    ]).records;

    const ledger = buildLedger(trips, consignments, { from: '2025-03-01', to: '2025-03-31' });

    expect(ledger.map((row) => [row.party, row.category, row.own_cars, row.vendor_cars])).toEqual([
      ['Glovis India Pvt Ltd - Hyundai', 'Glovis', 4, 5],
      ['R.Sai Logistics', 'R.sai', 2, 3],
      ['Market Load', 'MarketLoad', 1, 6],
    ]);
  });
});
