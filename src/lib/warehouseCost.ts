import type { Material, OperationsConfig, WarehouseConfig } from '@/core/types';
import type { CalculationSettings } from './calculationSettings';
import { allocatePerPiece, ceilWhole } from './costMath';
import { guardDivisor, type DiagnosticsCollector } from './diagnostics';
import type { PackagingProfile } from './packagingCost';

const MONTHS_PER_YEAR = 12;

export interface WarehouseCostBreakdown {
  inventoryDays: number;
  safetyStockDays: number;
  storageLocationsLocal: number;
  storageLocationsTotal: number;
  costPerPiece: number;
}

/** Days one LU lasts at the line */
export function inventoryDays(material: Pick<Material, 'dailyDemand'>, profile: PackagingProfile): number {
  if (!(material.dailyDemand > 0)) return 0;
  return profile.effectiveFillQtyPerLu / material.dailyDemand;
}

export function safetyStockDays(
  material: Pick<Material, 'dailyDemand'>,
  operations: Pick<OperationsConfig, 'leadTimeDays'>,
  profile: PackagingProfile,
  diagnostics: DiagnosticsCollector
): number {
  const fill = guardDivisor(diagnostics, 'warehouse', 'Fill quantity per LU', profile.effectiveFillQtyPerLu);
  return ceilWhole((operations.leadTimeDays * material.dailyDemand) / fill);
}

export function localStorageLocations(days: number, settings: CalculationSettings): number {
  if (!(days > 0)) return settings.localSupplyDays;
  return ceilWhole(settings.localSupplyDays / days);
}

export function calculateWarehouseCost(
  material: Material,
  operations: OperationsConfig,
  warehouse: WarehouseConfig,
  profile: PackagingProfile,
  settings: CalculationSettings,
  diagnostics: DiagnosticsCollector
): WarehouseCostBreakdown {
  const days = inventoryDays(material, profile);
  const safety = safetyStockDays(material, operations, profile, diagnostics);
  const local = localStorageLocations(days, settings);
  const total = local + safety;

  return {
    inventoryDays: days,
    safetyStockDays: safety,
    storageLocationsLocal: local,
    storageLocationsTotal: total,
    costPerPiece: allocatePerPiece(
      MONTHS_PER_YEAR * total * warehouse.costPerLocationMonthly,
      material.annualVolume
    ),
  };
}
