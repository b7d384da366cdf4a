import type { Material, RepackingConfig, RepackingUnit, RepackingWeightCategory } from '@/core/types';
import type { DiagnosticsCollector } from './diagnostics';
import type { ReferenceLookup } from './referenceLookup';

// Upper piece weight (kg) per repacking weight category
const LIGHT_MAX_WEIGHT_KG = 0.05;
const MODERATE_MAX_WEIGHT_KG = 0.15;

export function repackingWeightCategory(weightPerPiece: number): RepackingWeightCategory {
  if (!Number.isFinite(weightPerPiece) || weightPerPiece <= 0) return 'none';
  if (weightPerPiece <= LIGHT_MAX_WEIGHT_KG) return 'light';
  if (weightPerPiece <= MODERATE_MAX_WEIGHT_KG) return 'moderate';
  return 'heavy';
}

const UNIT_LABELS: Record<RepackingUnit, string> = {
  perPart: 'per part',
  perTray: 'per tray',
  perBulkTransfer: 'per bag/bulk transfer',
};

/**
 * Repacking cost per piece from the operation table.
 * Only "per part" prices can be applied directly; tray and bulk prices need the
 * number of parts per tray/bag, which the configuration does not carry.
 */
export function calculateRepackingCostPerPiece(
  material: Pick<Material, 'weightPerPiece'>,
  repacking: RepackingConfig | undefined,
  reference: ReferenceLookup,
  diagnostics: DiagnosticsCollector
): number {
  if (!repacking) return 0;
  const weightCategory = repacking.weightCategory ?? repackingWeightCategory(material.weightPerPiece);
  if (weightCategory === 'none') return 0;

  const operation = reference.findRepackingOperation(
    weightCategory,
    repacking.supplierPackaging,
    repacking.destinationPackaging
  );
  if (!operation) {
    diagnostics.record(
      'lookupMiss',
      'repacking',
      `No repacking operation for ${weightCategory} parts from "${repacking.supplierPackaging}" to "${repacking.destinationPackaging}"`
    );
    return 0;
  }

  if (operation.unit !== 'perPart') {
    diagnostics.record(
      'lookupMiss',
      'repacking',
      `Repacking price unit "${UNIT_LABELS[operation.unit]}" is not supported; only per-part prices are applied`
    );
    return 0;
  }
  return Math.max(0, operation.cost);
}
