import type { Incoterm, TransportMode } from '@/core/types';

export interface CalculationSettings {
  /** Working days used to turn daily demand into a monthly call-off */
  daysPerMonth: number;
  palletsPerTruck: number;
  palletFootprintLm: number;
  spaceRateInternationalPerLm: number;
  spaceRateDomesticPerLm: number;
  /** Disposal cost per kg of wooden packaging */
  woodScrapCostFactor: number;
  /** Days of local supply covered by the line-side storage locations */
  localSupplyDays: number;
  /** Plant box quantities are rounded up to a multiple of this */
  plantBoxRounding: number;
  /** kg CO₂ per ton-km */
  energyConsumptionFactors: Record<TransportMode, number>;
  /** Incoterms under which sea freight carries the bonded-warehouse leg */
  bondedIncoterms: readonly Incoterm[];
}

export const DEFAULT_CALCULATION_SETTINGS: CalculationSettings = {
  daysPerMonth: 30,
  palletsPerTruck: 34,
  palletFootprintLm: 0.4,
  spaceRateInternationalPerLm: 1500,
  spaceRateDomesticPerLm: 800,
  woodScrapCostFactor: 160,
  localSupplyDays: 5,
  plantBoxRounding: 10,
  energyConsumptionFactors: {
    sea: 0.006,
    road: 0.04415,
    rail: 0.0085,
  },
  bondedIncoterms: ['FCA', 'FOB'],
};

export function resolveCalculationSettings(
  overrides?: Partial<CalculationSettings>
): CalculationSettings {
  if (!overrides) return DEFAULT_CALCULATION_SETTINGS;
  const given: Partial<CalculationSettings> = overrides;
  // A key passed as undefined keeps its default
  const pick = <K extends keyof CalculationSettings>(key: K): CalculationSettings[K] =>
    given[key] ?? DEFAULT_CALCULATION_SETTINGS[key];
  const defaultFactors = DEFAULT_CALCULATION_SETTINGS.energyConsumptionFactors;
  const factors = given.energyConsumptionFactors;

  return {
    daysPerMonth: pick('daysPerMonth'),
    palletsPerTruck: pick('palletsPerTruck'),
    palletFootprintLm: pick('palletFootprintLm'),
    spaceRateInternationalPerLm: pick('spaceRateInternationalPerLm'),
    spaceRateDomesticPerLm: pick('spaceRateDomesticPerLm'),
    woodScrapCostFactor: pick('woodScrapCostFactor'),
    localSupplyDays: pick('localSupplyDays'),
    plantBoxRounding: pick('plantBoxRounding'),
    energyConsumptionFactors: {
      sea: factors?.sea ?? defaultFactors.sea,
      road: factors?.road ?? defaultFactors.road,
      rail: factors?.rail ?? defaultFactors.rail,
    },
    bondedIncoterms: pick('bondedIncoterms'),
  };
}

export const isBondedIncoterm = (settings: CalculationSettings, incoterm: Incoterm): boolean =>
  settings.bondedIncoterms.includes(incoterm);
