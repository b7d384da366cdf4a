import type { CustomsConfig, Material } from '@/core/types';

export interface CustomsCostBreakdown {
  dutyRatePercent: number;
  dutyCostPerPiece: number;
  tariffCostPerPiece: number;
  costPerPiece: number;
}

const NO_CUSTOMS: CustomsCostBreakdown = {
  dutyRatePercent: 0,
  dutyCostPerPiece: 0,
  tariffCostPerPiece: 0,
  costPerPiece: 0,
};

/** Duty is levied on the piece price plus the freight to the border */
export function dutyCostPerPiece(
  dutyRatePercent: number,
  piecePrice: number,
  transportCostPerPiece: number
): number {
  if (!(dutyRatePercent > 0)) return 0;
  return (dutyRatePercent / 100) * (piecePrice + transportCostPerPiece);
}

export function tariffCostPerPiece(tariffRatePercent: number | undefined, piecePrice: number): number {
  const rate = tariffRatePercent ?? 0;
  if (!(rate > 0)) return 0;
  return (rate / 100) * piecePrice;
}

export function calculateCustomsCost(
  material: Pick<Material, 'piecePrice'>,
  customs: CustomsConfig | undefined,
  transportCostPerPiece: number
): CustomsCostBreakdown {
  if (!customs) return NO_CUSTOMS;
  const dutyRatePercent = customs.dutyRatePercent ?? 0;
  // Preferential origin: no duty and no tariff
  if (customs.preferenceUsage) return { ...NO_CUSTOMS, dutyRatePercent };

  const duty = dutyCostPerPiece(dutyRatePercent, material.piecePrice, transportCostPerPiece);
  const tariff = tariffCostPerPiece(customs.tariffRatePercent, material.piecePrice);
  return {
    dutyRatePercent,
    dutyCostPerPiece: duty,
    tariffCostPerPiece: tariff,
    costPerPiece: duty + tariff,
  };
}
