import type { AdditionalCost } from '@/core/types';
import { sum } from './costMath';
import { hasLifetimeVolume } from './volumeModel';

export function totalAdditionalCost(additionalCosts: AdditionalCost[] | undefined): number {
  return sum((additionalCosts ?? []).map((cost) => (Number.isFinite(cost.value) ? cost.value : 0)));
}

/** Flat extra costs amortized over the lifetime volume */
export function calculateAdditionalCostPerPiece(
  additionalCosts: AdditionalCost[] | undefined,
  lifetimeVolume: number
): number {
  if (!hasLifetimeVolume(lifetimeVolume)) return 0;
  return totalAdditionalCost(additionalCosts) / lifetimeVolume;
}
