import type { Co2Config, Material, PackagingConfig, Supplier, TransportMode } from '@/core/types';
import type { CalculationSettings } from './calculationSettings';
import { allocatePerPiece } from './costMath';
import { guardDivisor, type DiagnosticsCollector } from './diagnostics';
import type { PackagingProfile } from './packagingCost';

export interface Co2CostBreakdown {
  energyConsumptionFactor: number;
  weightPerLuKg: number;
  totalTons: number;
  emissionKg: number;
  costPerPiece: number;
}

export function energyConsumptionFactor(mode: TransportMode, settings: CalculationSettings): number {
  switch (mode) {
    case 'sea':
      return settings.energyConsumptionFactors.sea;
    case 'road':
      return settings.energyConsumptionFactors.road;
    case 'rail':
      return settings.energyConsumptionFactors.rail;
    default: {
      const unhandled: never = mode;
      throw new Error(`Unknown transport mode: ${String(unhandled)}`);
    }
  }
}

/** Gross weight of one logistics unit: parts plus the packaging it travels in */
export function weightPerLogisticsUnit(
  material: Pick<Material, 'weightPerPiece'>,
  packaging: PackagingConfig,
  profile: PackagingProfile,
  diagnostics: DiagnosticsCollector
): number {
  const pieceWeight = material.weightPerPiece;
  const standardWeight =
    pieceWeight * profile.fillQtyPerLu +
    profile.box.unitWeightKg * profile.box.unitsPerLu +
    profile.pallet.unitWeightKg;
  if (!profile.specialPackagingActive) return standardWeight;

  switch (packaging.specialPackagingType) {
    case 'inlayTrayPalletSize': {
      const fillQtyTray = guardDivisor(diagnostics, 'co2', 'Fill quantity per tray', packaging.fillQtyTray);
      return (
        packaging.fillQtyBox * pieceWeight +
        (packaging.fillQtyBox / fillQtyTray) * profile.tray.unitWeightKg +
        profile.box.unitWeightKg
      );
    }
    case 'inlayTray': {
      const fillQtyTray = guardDivisor(diagnostics, 'co2', 'Fill quantity per tray', packaging.fillQtyTray);
      return (
        profile.fillQtyPerLu * pieceWeight +
        (packaging.fillQtyBox / fillQtyTray) * profile.tray.unitWeightKg +
        profile.pallet.unitWeightKg
      );
    }
    case 'standaloneTray':
      return (
        packaging.fillQtyTray * packaging.traysPerSpecialPallet * packaging.specialPalletsPerLu * pieceWeight +
        packaging.specialPalletsPerLu * profile.specialPallet.unitWeightKg
      );
    case 'none':
      return standardWeight;
    default: {
      const unhandled: never = packaging.specialPackagingType;
      throw new Error(`Unknown special packaging type: ${String(unhandled)}`);
    }
  }
}

export function calculateCo2Cost(
  material: Material,
  supplier: Pick<Supplier, 'distanceKm'>,
  mode: TransportMode,
  packaging: PackagingConfig,
  co2: Co2Config,
  profile: PackagingProfile,
  settings: CalculationSettings,
  diagnostics: DiagnosticsCollector
): Co2CostBreakdown {
  const factor = energyConsumptionFactor(mode, settings);
  const weightPerLuKg = weightPerLogisticsUnit(material, packaging, profile, diagnostics);
  const fillPerLu = guardDivisor(diagnostics, 'co2', 'Fill quantity per LU', profile.effectiveFillQtyPerLu);

  const totalTons = (weightPerLuKg * (material.annualVolume / fillPerLu)) / 1000;
  const emissionKg = totalTons * factor * supplier.distanceKm * co2.conversionFactor;

  return {
    energyConsumptionFactor: factor,
    weightPerLuKg,
    totalTons,
    emissionKg,
    costPerPiece: allocatePerPiece(emissionKg * (co2.costPerTon / 1000), material.annualVolume),
  };
}
