import { describe, expect, it } from 'vitest';
import type {
  Co2Config,
  LogisticsCostInput,
  LogisticsCostResult,
  Material,
  OperationsConfig,
  PackagingConfig,
  PackagingLoop,
  PlantLocation,
  Supplier,
  TransportConfig,
  WarehouseConfig,
} from '@/core/types';
import { calculateLogisticsCost } from './logisticsCost';
import { createReferenceLookup, type ReferenceLookup } from './referenceLookup';
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

const componentSum = (result: LogisticsCostResult): number =>
  result.packagingCostPerPiece +
  result.repackingCostPerPiece +
  result.customsCostPerPiece +
  result.transportCostPerPiece +
  result.warehouseCostPerPiece +
  result.additionalCostPerPiece +
  result.co2CostPerPiece;

describe('calculateLogisticsCost', () => {
  it('itemizes a standard road supply without duty', () => {
    const result = calculateLogisticsCost(makeInput(), reference);

    expect(result.materialNo).toBe('MAT-100');
    expect(result.vendorId).toBe('V-200');
    expect(result.lifetimeVolume).toBe(600000);
    expect(result.packagingLoopDays).toBe(14);
    expect(result.fillQtyPerLu).toBe(1000);
    expect(result.packagingCostPlant).toBeCloseTo(339.5, 6);
    expect(result.packagingCostCoc).toBe(0);
    expect(result.packagingCostPerPiece).toBe(0.001);
    expect(result.customsCostPerPiece).toBe(0);
    expect(result.transportCostPerPiece).toBeCloseTo(0.2, 10);
    expect(result.warehouseCostPerPiece).toBe(0.008);
    expect(result.co2CostPerPiece).toBe(0);
    expect(result.totalCostPerPiece).toBeCloseTo(0.209, 10);
    expect(result.totalAnnualCost).toBeCloseTo(25080, 6);
    expect(result.diagnostics).toEqual([]);
  });

  it('levies duty on piece price plus transport', () => {
    const result = calculateLogisticsCost(
      makeInput({ customs: { dutyRatePercent: 5, preferenceUsage: false } }),
      reference
    );
    expect(result.customsCostPerPiece).toBeCloseTo(0.05 * (2 + result.transportCostPerPiece), 10);
    expect(result.customsCostPerPiece).toBeCloseTo(0.11, 10);
    expect(result.dutyRatePercent).toBe(5);
  });

  it('adds the bonded leg for sea freight under FOB', () => {
    const result = calculateLogisticsCost(
      makeInput({
        transport: makeTransport({ mode: 'sea', costPerLu: 500, bondedCost: 80 }),
        operations: makeOperations({ incoterm: 'FOB' }),
      }),
      reference
    );
    expect(result.transportMode).toBe('sea');
    expect(result.transportCostPerPiece).toBeCloseTo(0.58, 10);
    expect(result.energyConsumptionFactor).toBe(0.006);
  });

  it('reports a missing repacking operation without failing the pair', () => {
    const result = calculateLogisticsCost(
      makeInput({ repacking: { supplierPackaging: 'Bulk', destinationPackaging: 'KLT' } }),
      reference
    );
    expect(result.repackingCostPerPiece).toBe(0);
    expect(result.diagnostics).toEqual([
      {
        kind: 'lookupMiss',
        component: 'repacking',
        message: 'No repacking operation for heavy parts from "Bulk" to "KLT"',
        materialNo: 'MAT-100',
        vendorId: 'V-200',
      },
    ]);
  });

  it('keeps the total equal to the sum of its components', () => {
    const result = calculateLogisticsCost(
      makeInput({
        material: makeMaterial({ weightPerPiece: 0.03 }),
        repacking: { supplierPackaging: 'One-way tray in box', destinationPackaging: 'Returnable trays' },
        customs: { dutyRatePercent: 3, tariffRatePercent: 2, preferenceUsage: false },
        co2: makeCo2({ costPerTon: 120 }),
        additionalCosts: [{ name: 'Audit', value: 900 }],
      }),
      reference
    );
    expect(result.repackingCostPerPiece).toBe(0.1);
    expect(result.additionalCostPerPiece).toBeCloseTo(0.0015, 10);
    expect(result.co2CostPerPiece).toBeGreaterThan(0);
    expect(result.totalCostPerPiece).toBeCloseTo(componentSum(result), 10);
    expect(result.totalAnnualCost).toBeCloseTo(result.totalCostPerPiece * 120000, 6);
  });

  it('returns 0 for CO₂ and additional costs at zero annual volume', () => {
    const result = calculateLogisticsCost(
      makeInput({
        material: makeMaterial({ annualVolume: 0 }),
        co2: makeCo2({ costPerTon: 120 }),
        additionalCosts: [{ name: 'Audit', value: 900 }],
      }),
      reference
    );
    expect(result.co2CostPerPiece).toBe(0);
    expect(result.additionalCostPerPiece).toBe(0);
    expect(result.packagingCostPerPiece).toBe(0);
    expect(result.totalAnnualCost).toBe(0);
    expect(result.diagnostics[0]).toMatchObject({ kind: 'divisionGuard', component: 'volume' });
  });

  it('drops customs under preference usage', () => {
    const result = calculateLogisticsCost(
      makeInput({ customs: { dutyRatePercent: 8, preferenceUsage: true } }),
      reference
    );
    expect(result.customsCostPerPiece).toBe(0);
  });

  it('turns an engine failure into a zero contribution and a diagnostic', () => {
    const failingLanes: ReferenceLookup = {
      ...reference,
      findLane: () => {
        throw new Error('lane store offline');
      },
    };
    const result = calculateLogisticsCost(
      makeInput({
        transport: makeTransport({ automaticCalculation: true }),
        customs: { dutyRatePercent: 5, preferenceUsage: false },
      }),
      failingLanes
    );

    expect(result.transportCostPerPiece).toBe(0);
    expect(result.transportPricingRule).toBe('noLane');
    expect(result.customsCostPerPiece).toBeCloseTo(0.1, 10);
    expect(result.packagingCostPerPiece).toBe(0.001);
    expect(result.diagnostics).toEqual([
      {
        kind: 'computationException',
        component: 'transport',
        message: 'transport calculation error: lane store offline',
        materialNo: 'MAT-100',
        vendorId: 'V-200',
      },
    ]);
  });

  it('applies settings overrides', () => {
    const result = calculateLogisticsCost(
      makeInput({ transport: makeTransport({ automaticCalculation: true }) }),
      reference,
      { settings: { daysPerMonth: 22 } }
    );
    // 480 * 22 / 4 = 2640 pcs, 3 pallets, 0.6 LM * 800 = 480 < 520 bracket, +10 % fuel
    expect(result.transportPricingRule).toBe('weightBased');
    expect(result.transportCostPerPiece).toBeCloseTo(572 / 2640, 10);
  });

  it('keeps the default for a setting passed as undefined', () => {
    const result = calculateLogisticsCost(makeInput(), reference, { settings: { localSupplyDays: undefined } });
    expect(result.warehouseCostPerPiece).toBe(0.008);
    expect(result.totalCostPerPiece).toBeCloseTo(0.209, 10);
  });

  it('reports an unknown box type named like an object member as a lookup miss', () => {
    const result = calculateLogisticsCost(
      makeInput({ packaging: makePackaging({ boxType: 'constructor' }) }),
      reference
    );
    expect(result.diagnostics[0]).toMatchObject({
      kind: 'lookupMiss',
      component: 'packaging',
      message: 'Box type "constructor" not found in reference tables',
    });
    expect(Number.isFinite(result.transportCostPerPiece)).toBe(true);
    expect(Number.isFinite(result.totalCostPerPiece)).toBe(true);
  });

  it('guards a zero box fill once per pair', () => {
    const result = calculateLogisticsCost(makeInput({ packaging: makePackaging({ fillQtyBox: 0 }) }), reference);
    const guards = result.diagnostics.filter(
      (d) => d.message === 'Fill quantity per box is 0; using 1 as divisor'
    );
    expect(guards).toHaveLength(1);
    expect(guards[0]?.component).toBe('packaging');
  });

  it('stamps the calculation time', () => {
    const result = calculateLogisticsCost(makeInput(), reference, {
      calculatedAt: new Date('2026-01-01T00:00:00.000Z'),
    });
    expect(result.calculatedAt).toBe('2026-01-01T00:00:00.000Z');
  });
});
