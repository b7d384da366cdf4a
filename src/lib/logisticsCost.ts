/**
 * Entry point for one material/supplier pair.
 *
 * Engines run in dependency order:
 *   volume → packaging → repacking → transport → customs → CO₂ → warehouse → additional
 * Each one sits behind a component boundary, so a failure becomes a zero contribution
 * plus a diagnostic instead of an exception out of this function.
 */
import type { LogisticsCostInput, LogisticsCostResult } from '@/core/types';
import { calculateAdditionalCostPerPiece } from './additionalCost';
import { resolveCalculationSettings, type CalculationSettings } from './calculationSettings';
import { calculateCo2Cost, type Co2CostBreakdown } from './co2Cost';
import { calculateCustomsCost, type CustomsCostBreakdown } from './customsCost';
import { createDiagnostics, runComponent } from './diagnostics';
import {
  calculatePackagingCost,
  resolvePackagingProfile,
  type PackagingCostBreakdown,
  type PackagingProfile,
} from './packagingCost';
import { EMPTY_CATALOG_ENTRY, type ReferenceLookup } from './referenceLookup';
import { calculateRepackingCostPerPiece } from './repackingCost';
import { calculateTransportCost, type TransportCostBreakdown } from './transportCost';
import { hasLifetimeVolume, lifetimeVolume } from './volumeModel';
import { calculateWarehouseCost, type WarehouseCostBreakdown } from './warehouseCost';

export interface LogisticsCostOptions {
  settings?: Partial<CalculationSettings>;
  /** Timestamp stamped on the result; defaults to now */
  calculatedAt?: Date;
}

const EMPTY_PROFILE: PackagingProfile = {
  box: EMPTY_CATALOG_ENTRY,
  pallet: EMPTY_CATALOG_ENTRY,
  tray: EMPTY_CATALOG_ENTRY,
  specialPallet: EMPTY_CATALOG_ENTRY,
  cover: EMPTY_CATALOG_ENTRY,
  specialPackagingActive: false,
  fillQtyBox: 1,
  boxesPerLu: 1,
  fillQtyPerLu: 1,
  specialFillQtyPerLu: 0,
  effectiveFillQtyPerLu: 1,
};

const emptyPackagingCost = (volume: number): PackagingCostBreakdown => ({
  loopDays: 0,
  cocLoopDays: 0,
  plant: { boxes: 0, logisticsUnits: 0, cost: 0 },
  coc: { boxes: 0, logisticsUnits: 0, trays: 0, palletCovers: 0, cost: 0 },
  total: 0,
  scrapCardboard: 0,
  scrapWood: 0,
  lifetimeVolume: volume,
  costPerPiece: 0,
});

const EMPTY_CO2_COST: Co2CostBreakdown = {
  energyConsumptionFactor: 0,
  weightPerLuKg: 0,
  totalTons: 0,
  emissionKg: 0,
  costPerPiece: 0,
};

const EMPTY_CUSTOMS_COST: CustomsCostBreakdown = {
  dutyRatePercent: 0,
  dutyCostPerPiece: 0,
  tariffCostPerPiece: 0,
  costPerPiece: 0,
};

const EMPTY_WAREHOUSE_COST: WarehouseCostBreakdown = {
  inventoryDays: 0,
  safetyStockDays: 0,
  storageLocationsLocal: 0,
  storageLocationsTotal: 0,
  costPerPiece: 0,
};

export function calculateLogisticsCost(
  input: LogisticsCostInput,
  reference: ReferenceLookup,
  options?: LogisticsCostOptions
): LogisticsCostResult {
  const settings = resolveCalculationSettings(options?.settings);
  const { material, supplier } = input;
  const diagnostics = createDiagnostics({
    materialNo: material.materialNo,
    vendorId: supplier.vendorId,
  });

  const volume = runComponent('volume', diagnostics, 0, () => lifetimeVolume(material));
  if (!hasLifetimeVolume(volume)) {
    diagnostics.record(
      'divisionGuard',
      'volume',
      `Lifetime volume is ${volume}; packaging and additional costs per piece are 0`
    );
  }

  const profile = runComponent('packaging', diagnostics, EMPTY_PROFILE, () =>
    resolvePackagingProfile(input.packaging, reference, diagnostics)
  );
  const packaging = runComponent('packaging', diagnostics, emptyPackagingCost(volume), () =>
    calculatePackagingCost(material, input.packaging, input.operations, profile, settings, diagnostics)
  );

  const repackingCostPerPiece = runComponent('repacking', diagnostics, 0, () =>
    calculateRepackingCostPerPiece(material, input.repacking, reference, diagnostics)
  );

  const emptyTransport: TransportCostBreakdown = {
    mode: input.transport.mode,
    pricingRule: input.transport.automaticCalculation ? 'noLane' : 'manual',
    costPerPiece: 0,
    costPerLogisticsUnit: 0,
    bondedCostPerPiece: 0,
  };
  const transport = runComponent('transport', diagnostics, emptyTransport, () =>
    calculateTransportCost({
      material,
      supplier,
      location: input.location,
      packaging: input.packaging,
      transport: input.transport,
      operations: input.operations,
      profile,
      reference,
      settings,
      diagnostics,
    })
  );

  const customs = runComponent('customs', diagnostics, EMPTY_CUSTOMS_COST, () =>
    calculateCustomsCost(material, input.customs, transport.costPerPiece)
  );

  const co2 = runComponent('co2', diagnostics, EMPTY_CO2_COST, () =>
    calculateCo2Cost(
      material,
      supplier,
      input.transport.mode,
      input.packaging,
      input.co2,
      profile,
      settings,
      diagnostics
    )
  );

  const warehouse = runComponent('warehouse', diagnostics, EMPTY_WAREHOUSE_COST, () =>
    calculateWarehouseCost(material, input.operations, input.warehouse, profile, settings, diagnostics)
  );

  const additionalCostPerPiece = runComponent('additional', diagnostics, 0, () =>
    calculateAdditionalCostPerPiece(input.additionalCosts, volume)
  );

  const totalCostPerPiece =
    packaging.costPerPiece +
    repackingCostPerPiece +
    customs.costPerPiece +
    transport.costPerPiece +
    warehouse.costPerPiece +
    additionalCostPerPiece +
    co2.costPerPiece;

  return {
    materialNo: material.materialNo,
    materialDescription: material.description,
    vendorId: supplier.vendorId,
    vendorName: supplier.vendorName,
    annualVolume: material.annualVolume,
    lifetimeVolume: volume,
    packagingCostPerPiece: packaging.costPerPiece,
    packagingCostPlant: packaging.plant.cost,
    packagingCostCoc: packaging.coc.cost,
    packagingCostTotal: packaging.total,
    packagingLoopDays: packaging.loopDays,
    fillQtyPerLu: profile.fillQtyPerLu,
    specialFillQtyPerLu: profile.specialFillQtyPerLu,
    repackingCostPerPiece,
    customsCostPerPiece: customs.costPerPiece,
    dutyRatePercent: customs.dutyRatePercent,
    dutyCostPerPiece: customs.dutyCostPerPiece,
    tariffCostPerPiece: customs.tariffCostPerPiece,
    transportMode: transport.mode,
    transportCostPerPiece: transport.costPerPiece,
    transportCostPerLogisticsUnit: transport.costPerLogisticsUnit,
    transportPricingRule: transport.pricingRule,
    co2CostPerPiece: co2.costPerPiece,
    co2EmissionKg: co2.emissionKg,
    co2TotalTons: co2.totalTons,
    energyConsumptionFactor: co2.energyConsumptionFactor,
    warehouseCostPerPiece: warehouse.costPerPiece,
    storageLocationsTotal: warehouse.storageLocationsTotal,
    storageLocationsLocal: warehouse.storageLocationsLocal,
    safetyStockDays: warehouse.safetyStockDays,
    inventoryDays: warehouse.inventoryDays,
    additionalCostPerPiece,
    totalCostPerPiece,
    totalAnnualCost: totalCostPerPiece * material.annualVolume,
    calculatedAt: (options?.calculatedAt ?? new Date()).toISOString(),
    diagnostics: [...diagnostics.entries],
  };
}
