import { describe, expect, it } from 'vitest';
import type {
  Co2Config,
  LogisticsCostInput,
  Material,
  OperationsConfig,
  PackagingConfig,
  PackagingLoop,
  PlantLocation,
  Supplier,
  TransportConfig,
  TransportLane,
  WarehouseConfig,
} from '@/core/types';
import { DEFAULT_CALCULATION_SETTINGS } from './calculationSettings';
import { createDiagnostics, type DiagnosticsCollector } from './diagnostics';
import { resolvePackagingProfile } from './packagingCost';
import { createReferenceLookup } from './referenceLookup';
import { calculateTransportCost, findWeightBracket } from './transportCost';
import { parseReferenceTables } from './referenceData';
import testReferenceTables from './testReferenceTables.json';

const makeMaterial = (overrides: Partial<Material> = {}): Material => ({
  materialNo: 'MAT-100',
  description: 'Bracket',
  weightPerPiece: 0.5,
  annualVolume: 120000,
  dailyDemand: 480,
  lifetimeYears: 5,
  piecePrice: 2,
  ...overrides,
});

const makeSupplier = (overrides: Partial<Supplier> = {}): Supplier => ({
  vendorId: 'V-200',
  vendorName: 'Test Supplier',
  country: 'DE',
  zipCode: '70565',
  deliveriesPerMonth: 4,
  distanceKm: 250,
  ...overrides,
});

const makeLocation = (overrides: Partial<PlantLocation> = {}): PlantLocation => ({
  plant: 'P01',
  country: 'DE',
  zipCode: '80331',
  ...overrides,
});

// 14 days in total
const makeLoop = (overrides: Partial<PackagingLoop> = {}): PackagingLoop => ({
  goodsReceipt: 1,
  rawMaterialStock: 5,
  production: 2,
  emptiesReturn: 2,
  cleaning: 1,
  dispatch: 1,
  emptiesTransitToSupplier: 0,
  emptiesReceiptAtSupplier: 0,
  emptiesStockAtSupplier: 0,
  supplierProduction: 0,
  finishedPartsStock: 0,
  finishedPartsDispatch: 0,
  transitFromSupplier: 2,
  ...overrides,
});

// Cardboard boxes of 50, 20 boxes per pallet
const makePackaging = (overrides: Partial<PackagingConfig> = {}): PackagingConfig => ({
  boxType: 'TEST-BOX',
  fillQtyBox: 50,
  palletType: 'TEST-PALLET',
  overseaFillQtyLu: 1000,
  specialPackagingNeeded: false,
  specialPackagingType: 'none',
  additionalSpecialPackagingNeeded: false,
  fillQtyTray: 0,
  traysPerSpecialPallet: 0,
  specialPalletsPerLu: 0,
  toolingCost: 0,
  additionalPackagingPrice: 0,
  loop: makeLoop(),
  scrapCardboardCost: 0,
  ...overrides,
});

const makeTransport = (overrides: Partial<TransportConfig> = {}): TransportConfig => ({
  mode: 'road',
  costPerLu: 200,
  bondedCost: 0,
  stackabilityFactor: 2,
  automaticCalculation: false,
  bondedWarehouse: false,
  ...overrides,
});

const makeOperations = (overrides: Partial<OperationsConfig> = {}): OperationsConfig => ({
  incoterm: 'DAP',
  leadTimeDays: 10,
  subSupplierUsed: false,
  subSupplierBoxDays: 0,
  ...overrides,
});

const makeWarehouse = (overrides: Partial<WarehouseConfig> = {}): WarehouseConfig => ({
  costPerLocationMonthly: 10,
  ...overrides,
});

const makeCo2 = (overrides: Partial<Co2Config> = {}): Co2Config => ({
  costPerTon: 0,
  conversionFactor: 1,
  ...overrides,
});

const makeInput = (overrides: Partial<LogisticsCostInput> = {}): LogisticsCostInput => ({
  material: makeMaterial(),
  supplier: makeSupplier(),
  location: makeLocation(),
  packaging: makePackaging(),
  transport: makeTransport(),
  operations: makeOperations(),
  warehouse: makeWarehouse(),
  co2: makeCo2(),
  additionalCosts: [],
  ...overrides,
});

const reference = createReferenceLookup(parseReferenceTables(testReferenceTables));

const run = (input: LogisticsCostInput, diagnostics: DiagnosticsCollector = createDiagnostics()) =>
  calculateTransportCost({
    ...input,
    profile: resolvePackagingProfile(input.packaging, reference, diagnostics),
    reference,
    settings: DEFAULT_CALCULATION_SETTINGS,
    diagnostics,
  });

const automatic = (overrides: Partial<LogisticsCostInput> = {}) =>
  makeInput({ transport: makeTransport({ automaticCalculation: true }), ...overrides });

describe('manual transport cost', () => {
  it('divides the LU rate by the standard fill for road and rail', () => {
    expect(run(makeInput()).costPerPiece).toBeCloseTo(0.2, 10);
    expect(run(makeInput({ transport: makeTransport({ mode: 'rail' }) })).costPerPiece).toBeCloseTo(0.2, 10);
  });

  it('adds the bonded leg for sea freight under FOB', () => {
    const result = run(
      makeInput({
        transport: makeTransport({ mode: 'sea', costPerLu: 500, bondedCost: 80 }),
        operations: makeOperations({ incoterm: 'FOB' }),
      })
    );
    expect(result.costPerPiece).toBeCloseTo(0.58, 10);
    expect(result.bondedCostPerPiece).toBeCloseTo(0.08, 10);
    expect(result.costPerLogisticsUnit).toBe(500);
    expect(result.pricingRule).toBe('manual');
  });

  it('costs at least as much under FCA/FOB as under other incoterms', () => {
    const sea = makeTransport({ mode: 'sea', costPerLu: 500, bondedCost: 80 });
    const bonded = ['FCA', 'FOB'] as const;
    const others = ['EXW', 'DAP', 'DDP', 'CIF'] as const;
    for (const incoterm of bonded) {
      const withBonded = run(makeInput({ transport: sea, operations: makeOperations({ incoterm }) })).costPerPiece;
      for (const other of others) {
        const without = run(makeInput({ transport: sea, operations: makeOperations({ incoterm: other }) })).costPerPiece;
        expect(without).toBeCloseTo(0.5, 10);
        expect(withBonded).toBeGreaterThanOrEqual(without);
      }
    }
  });

  it('guards a zero oversea fill quantity', () => {
    const diagnostics = createDiagnostics();
    const result = run(
      makeInput({
        transport: makeTransport({ mode: 'sea', costPerLu: 500 }),
        packaging: makePackaging({ overseaFillQtyLu: 0 }),
      }),
      diagnostics
    );
    expect(result.costPerPiece).toBe(500);
    expect(diagnostics.entries.map((d) => d.message)).toEqual([
      'Oversea fill quantity per LU is 0; using 1 as divisor',
    ]);
  });
});

describe('automatic transport cost', () => {
  it('prices a small domestic shipment by space when that beats the weight bracket', () => {
    const result = run(automatic());

    expect(result.shipment).toMatchObject({
      unitWeightKg: 26.5,
      monthlyDemandPerDelivery: 3600,
      packagingUnitsPerDelivery: 72,
      pallets: 4,
      weightPerPalletKg: 555,
      shipmentWeightKg: 2220,
    });
    expect(result.shipment?.loadingMeters).toBeCloseTo(0.8, 10);
    expect(result.laneId).toBe('DE70-DE80');
    expect(result.international).toBe(false);
    expect(result.pricingRule).toBe('spaceBased');
    expect(result.lanePrice?.weightBracketKg).toBe(2500);
    expect(result.lanePrice?.shipmentPrice).toBeCloseTo(704, 6);
    expect(result.costPerPiece).toBeCloseTo(704 / 3600, 10);
    expect(result.costPerLogisticsUnit).toBeCloseTo(176, 6);
  });

  it('prices by weight when stacking keeps the loading meters low', () => {
    const result = run(automatic({ transport: makeTransport({ automaticCalculation: true, stackabilityFactor: 4 }) }));
    expect(result.pricingRule).toBe('weightBased');
    // 520 + 10 % fuel
    expect(result.lanePrice?.shipmentPrice).toBeCloseTo(572, 6);
    expect(result.costPerPiece).toBeCloseTo(572 / 3600, 10);
  });

  it('adds the excess pallets to a full truck above 34 pallets', () => {
    const result = run(
      automatic({
        material: makeMaterial({ dailyDemand: 4000 }),
        supplier: makeSupplier({ deliveriesPerMonth: 3 }),
      })
    );
    // 40 pallets, 6 excess * 555 kg = 3330 kg -> 800; (2000 + 800) * 1.1
    expect(result.shipment?.pallets).toBe(40);
    expect(result.pricingRule).toBe('fullTruckPlusExcess');
    expect(result.lanePrice?.shipmentPrice).toBeCloseTo(3080, 6);
    expect(result.costPerPiece).toBeCloseTo(0.077, 10);
    expect(result.costPerLogisticsUnit).toBeCloseTo(77, 6);
  });

  it('uses the international space rate and adds bonded warehouse cost for sea FOB', () => {
    const result = run(
      automatic({
        supplier: makeSupplier({ country: 'CN', zipCode: '200000' }),
        transport: makeTransport({
          mode: 'sea',
          automaticCalculation: true,
          bondedWarehouse: true,
          bondedCost: 360,
        }),
        operations: makeOperations({ incoterm: 'FOB' }),
      })
    );
    // 0.8 LM * 1500 = 1200 beats the 520 bracket, no fuel surcharge on this lane
    expect(result.international).toBe(true);
    expect(result.lanePrice?.shipmentPrice).toBeCloseTo(1200, 6);
    expect(result.bondedCostPerPiece).toBeCloseTo(0.1, 10);
    expect(result.costPerPiece).toBeCloseTo(1200 / 3600 + 0.1, 10);
  });

  it('returns 0 with a lookupMiss when no lane exists', () => {
    const diagnostics = createDiagnostics();
    const result = run(automatic({ supplier: makeSupplier({ zipCode: '10115' }) }), diagnostics);

    expect(result.costPerPiece).toBe(0);
    expect(result.pricingRule).toBe('noLane');
    expect(diagnostics.entries).toEqual([
      {
        kind: 'lookupMiss',
        component: 'transport',
        message: 'No transport lane found for DE10-DE80',
      },
    ]);
  });

  it('falls back to the manual rate without a plant location', () => {
    const diagnostics = createDiagnostics();
    const result = run(automatic({ location: undefined }), diagnostics);

    expect(result.pricingRule).toBe('manual');
    expect(result.costPerPiece).toBeCloseTo(0.2, 10);
    expect(diagnostics.entries[0]?.kind).toBe('configMissing');
  });
});

describe('findWeightBracket', () => {
  const lane: TransportLane = {
    ...parseReferenceTables(testReferenceTables).lanes[0],
    pricesByWeight: [
      { maxWeightKg: 5000, price: 800 },
      { maxWeightKg: 1000, price: 300 },
    ],
  };

  it('picks the smallest bracket holding the weight regardless of table order', () => {
    expect(findWeightBracket(lane, 800)?.price).toBe(300);
    expect(findWeightBracket(lane, 1000)?.price).toBe(300);
    expect(findWeightBracket(lane, 1001)?.price).toBe(800);
  });

  it('uses the heaviest bracket beyond the table', () => {
    expect(findWeightBracket(lane, 12000)?.price).toBe(800);
  });

  it('has no bracket for an empty table', () => {
    expect(findWeightBracket({ ...lane, pricesByWeight: [] }, 100)).toBeUndefined();
  });
});
