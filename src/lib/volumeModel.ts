import type { Material } from '@/core/types';

/**
 * Pieces over the whole part lifetime. Denominator for fixed-lot costs
 * (packaging fleet, tooling, additional costs).
 */
export function lifetimeVolume(material: Pick<Material, 'annualVolume' | 'lifetimeYears'>): number {
  const volume = (material.annualVolume ?? 0) * (material.lifetimeYears ?? 0);
  return Number.isFinite(volume) ? volume : 0;
}

export const hasLifetimeVolume = (volume: number): boolean => Number.isFinite(volume) && volume > 0;
