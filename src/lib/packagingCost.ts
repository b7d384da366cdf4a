/**
 * Packaging cost: fleet of boxes, pallets and special packaging needed to keep the
 * loop running, at the plant and at the CoC (sub-supplier) stage, spread over the
 * lifetime volume.
 *
 * The resolved catalog entries and fill quantities (`PackagingProfile`) are reused by
 * the transport, CO₂ and warehouse engines so every catalog miss is reported once.
 */
import type {
  CatalogEntry,
  Material,
  OperationsConfig,
  PackagingConfig,
  PackagingLoop,
} from '@/core/types';
import { PACKAGING_LOOP_STAGES } from '@/core/types';
import type { CalculationSettings } from './calculationSettings';
import { allocatePerPiece, ceilToMultiple, ceilWhole, sum } from './costMath';
import { guardDivisor, type DiagnosticsCollector } from './diagnostics';
import { EMPTY_CATALOG_ENTRY, entryOrEmpty, type ReferenceLookup } from './referenceLookup';
import { lifetimeVolume } from './volumeModel';

export interface PackagingProfile {
  box: CatalogEntry;
  pallet: CatalogEntry;
  tray: CatalogEntry;
  specialPallet: CatalogEntry;
  cover: CatalogEntry;
  specialPackagingActive: boolean;
  /** Pieces per box and boxes per LU, guarded once for every divisor use downstream */
  fillQtyBox: number;
  boxesPerLu: number;
  /** Standard pieces per LU, never below 1 */
  fillQtyPerLu: number;
  specialFillQtyPerLu: number;
  /** Special fill when special packaging is active and positive, standard fill otherwise */
  effectiveFillQtyPerLu: number;
}

export interface PlantPackaging {
  boxes: number;
  logisticsUnits: number;
  cost: number;
}

export interface CocPackaging {
  boxes: number;
  logisticsUnits: number;
  trays: number;
  palletCovers: number;
  cost: number;
}

export interface PackagingCostBreakdown {
  loopDays: number;
  cocLoopDays: number;
  plant: PlantPackaging;
  coc: CocPackaging;
  total: number;
  scrapCardboard: number;
  scrapWood: number;
  lifetimeVolume: number;
  costPerPiece: number;
}

export const isSpecialPackagingActive = (packaging: PackagingConfig): boolean =>
  packaging.specialPackagingNeeded && packaging.specialPackagingType !== 'none';

export function packagingLoopDays(loop: PackagingLoop): number {
  return sum(PACKAGING_LOOP_STAGES.map((stage) => Number(loop[stage]) || 0));
}

/** Loop at the CoC stage: plant loop plus the days boxes spend at the sub-supplier */
export function cocLoopDays(loop: PackagingLoop, operations: OperationsConfig): number {
  const subSupplierDays = operations.subSupplierUsed ? operations.subSupplierBoxDays : 0;
  return packagingLoopDays(loop) + subSupplierDays;
}

export function standardFillQtyPerLu(packaging: PackagingConfig, box: CatalogEntry): number {
  return Math.max(1, packaging.fillQtyBox * box.unitsPerLu);
}

export function specialFillQtyPerLu(
  packaging: PackagingConfig,
  box: CatalogEntry,
  diagnostics: DiagnosticsCollector
): number {
  if (!packaging.specialPackagingNeeded) return 0;
  switch (packaging.specialPackagingType) {
    case 'inlayTrayPalletSize': {
      const fillQtyTray = guardDivisor(diagnostics, 'packaging', 'Fill quantity per tray', packaging.fillQtyTray);
      return packaging.fillQtyBox / fillQtyTray ** 2;
    }
    case 'inlayTray':
      return packaging.fillQtyBox * box.unitsPerLu;
    case 'standaloneTray':
      return packaging.fillQtyTray * packaging.traysPerSpecialPallet * packaging.specialPalletsPerLu;
    case 'none':
      return 0;
    default: {
      const unhandled: never = packaging.specialPackagingType;
      throw new Error(`Unknown special packaging type: ${String(unhandled)}`);
    }
  }
}

export function resolvePackagingProfile(
  packaging: PackagingConfig,
  reference: ReferenceLookup,
  diagnostics: DiagnosticsCollector
): PackagingProfile {
  const box = entryOrEmpty(reference.getBox(packaging.boxType), diagnostics, 'packaging', `Box type "${packaging.boxType}"`);
  const pallet = entryOrEmpty(
    reference.getPallet(packaging.palletType),
    diagnostics,
    'packaging',
    `Pallet type "${packaging.palletType}"`
  );

  const specialPackagingActive = isSpecialPackagingActive(packaging);
  const tray = specialPackagingActive
    ? entryOrEmpty(
        reference.getTray(packaging.specialPackagingType),
        diagnostics,
        'packaging',
        `Tray for "${packaging.specialPackagingType}"`
      )
    : EMPTY_CATALOG_ENTRY;

  const needsSpecialPallet =
    specialPackagingActive &&
    (packaging.additionalSpecialPackagingNeeded || packaging.specialPackagingType === 'standaloneTray');
  const specialPallet = needsSpecialPallet
    ? entryOrEmpty(reference.getPalletAccessory('specialPallet'), diagnostics, 'packaging', 'Special pallet')
    : EMPTY_CATALOG_ENTRY;
  const cover =
    specialPackagingActive && packaging.additionalSpecialPackagingNeeded
      ? entryOrEmpty(reference.getPalletAccessory('cover'), diagnostics, 'packaging', 'Pallet cover')
      : EMPTY_CATALOG_ENTRY;

  const fillQtyPerLu = standardFillQtyPerLu(packaging, box);
  const specialFill = specialFillQtyPerLu(packaging, box, diagnostics);

  return {
    box,
    pallet,
    tray,
    specialPallet,
    cover,
    specialPackagingActive,
    fillQtyBox: guardDivisor(diagnostics, 'packaging', 'Fill quantity per box', packaging.fillQtyBox),
    boxesPerLu: guardDivisor(diagnostics, 'packaging', 'Boxes per LU', box.unitsPerLu),
    fillQtyPerLu,
    specialFillQtyPerLu: specialFill,
    effectiveFillQtyPerLu: specialPackagingActive && specialFill > 0 ? specialFill : fillQtyPerLu,
  };
}

export function calculatePlantPackaging(
  material: Material,
  packaging: PackagingConfig,
  profile: PackagingProfile,
  settings: CalculationSettings
): PlantPackaging {
  const { fillQtyBox, boxesPerLu } = profile;

  const boxes = ceilToMultiple(
    (material.dailyDemand * packagingLoopDays(packaging.loop)) / fillQtyBox,
    settings.plantBoxRounding
  );
  const logisticsUnits = ceilWhole(boxes / boxesPerLu);
  const cost =
    boxes * (profile.box.unitPrice + packaging.additionalPackagingPrice) +
    logisticsUnits * profile.pallet.unitPrice;

  return { boxes, logisticsUnits, cost };
}

export function calculateCocPackaging(
  material: Material,
  packaging: PackagingConfig,
  operations: OperationsConfig,
  profile: PackagingProfile,
  diagnostics: DiagnosticsCollector
): CocPackaging {
  const { fillQtyBox, boxesPerLu } = profile;
  const subSupplierDays = operations.subSupplierUsed ? operations.subSupplierBoxDays : 0;

  const boxes = (material.dailyDemand * subSupplierDays) / fillQtyBox;
  const logisticsUnits = ceilWhole(boxes / boxesPerLu);

  let trays = 0;
  let palletCovers = 0;
  if (profile.specialPackagingActive) {
    const trayLoop = guardDivisor(
      diagnostics,
      'packaging',
      'Tray fill quantity × CoC loop days',
      packaging.fillQtyTray * cocLoopDays(packaging.loop, operations)
    );
    trays = ceilWhole(material.dailyDemand / trayLoop);
    if (packaging.additionalSpecialPackagingNeeded) {
      const traysPerPallet = guardDivisor(
        diagnostics,
        'packaging',
        'Trays per special pallet',
        packaging.traysPerSpecialPallet
      );
      palletCovers = ceilWhole(trays / traysPerPallet);
    }
  }

  const cost =
    boxes * profile.box.unitPrice +
    logisticsUnits * profile.pallet.unitPrice +
    trays * profile.tray.unitPrice +
    palletCovers * (profile.specialPallet.unitPrice + profile.cover.unitPrice) +
    (profile.specialPackagingActive ? packaging.toolingCost : 0);

  return { boxes, logisticsUnits, trays, palletCovers, cost };
}

/** Disposal of one-way wooden boxes; 0 for any other box material */
export function scrapWoodCost(
  material: Material,
  packaging: PackagingConfig,
  box: CatalogEntry,
  settings: CalculationSettings
): number {
  if (box.material !== 'wood' || packaging.fillQtyBox <= 0) return 0;
  return (material.annualVolume / packaging.fillQtyBox) * box.unitWeightKg * settings.woodScrapCostFactor;
}

export function calculatePackagingCost(
  material: Material,
  packaging: PackagingConfig,
  operations: OperationsConfig,
  profile: PackagingProfile,
  settings: CalculationSettings,
  diagnostics: DiagnosticsCollector
): PackagingCostBreakdown {
  const plant = calculatePlantPackaging(material, packaging, profile, settings);
  const coc = calculateCocPackaging(material, packaging, operations, profile, diagnostics);
  const total = plant.cost + coc.cost;
  const scrapCardboard = packaging.scrapCardboardCost ?? 0;
  const scrapWood = scrapWoodCost(material, packaging, profile.box, settings);
  const volume = lifetimeVolume(material);

  return {
    loopDays: packagingLoopDays(packaging.loop),
    cocLoopDays: cocLoopDays(packaging.loop, operations),
    plant,
    coc,
    total,
    scrapCardboard,
    scrapWood,
    lifetimeVolume: volume,
    costPerPiece: allocatePerPiece(scrapCardboard + scrapWood + total, volume),
  };
}
