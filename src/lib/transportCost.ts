/**
 * Transport cost per piece.
 *
 * Manual mode divides the agreed price per logistics unit by the LU fill quantity.
 * Automatic mode derives the shipment from the call-off (unit weight → pallets →
 * lane → lane price → price per piece) and prices it from the lane table.
 */
import type {
  Material,
  OperationsConfig,
  PackagingConfig,
  PlantLocation,
  Supplier,
  TransportConfig,
  TransportLane,
  TransportMode,
  TransportPricingRule,
  WeightBracket,
} from '@/core/types';
import { isBondedIncoterm, type CalculationSettings } from './calculationSettings';
import { ceilWhole } from './costMath';
import { guardDivisor, type DiagnosticsCollector } from './diagnostics';
import type { PackagingProfile } from './packagingCost';
import { laneKey, type ReferenceLookup } from './referenceLookup';

export interface ShipmentProfile {
  unitWeightKg: number;
  monthlyDemandPerDelivery: number;
  packagingUnitsPerDelivery: number;
  pallets: number;
  weightPerPalletKg: number;
  shipmentWeightKg: number;
  loadingMeters: number;
}

export interface LanePrice {
  pricingRule: Exclude<TransportPricingRule, 'manual' | 'noLane'>;
  weightBracketKg: number | null;
  weightBasedPrice: number;
  spaceBasedPrice: number;
  basePrice: number;
  fuelSurcharge: number;
  shipmentPrice: number;
}

export interface TransportCostBreakdown {
  mode: TransportMode;
  pricingRule: TransportPricingRule;
  costPerPiece: number;
  costPerLogisticsUnit: number;
  shipment?: ShipmentProfile;
  laneId?: string;
  international?: boolean;
  lanePrice?: LanePrice;
  bondedCostPerPiece: number;
}

interface TransportCostParams {
  material: Material;
  supplier: Supplier;
  location?: PlantLocation;
  packaging: PackagingConfig;
  transport: TransportConfig;
  operations: OperationsConfig;
  profile: PackagingProfile;
  reference: ReferenceLookup;
  settings: CalculationSettings;
  diagnostics: DiagnosticsCollector;
}

const appliesBondedLeg = (
  transport: TransportConfig,
  operations: OperationsConfig,
  settings: CalculationSettings
): boolean => transport.mode === 'sea' && isBondedIncoterm(settings, operations.incoterm);

export function calculateManualTransportCost({
  packaging,
  transport,
  operations,
  profile,
  settings,
  diagnostics,
}: Pick<
  TransportCostParams,
  'packaging' | 'transport' | 'operations' | 'profile' | 'settings' | 'diagnostics'
>): TransportCostBreakdown {
  const standardFill = profile.fillQtyPerLu;
  let costPerPiece: number;
  let bondedCostPerPiece = 0;

  switch (transport.mode) {
    case 'sea': {
      const overseaFill = guardDivisor(
        diagnostics,
        'transport',
        'Oversea fill quantity per LU',
        packaging.overseaFillQtyLu
      );
      if (appliesBondedLeg(transport, operations, settings)) {
        bondedCostPerPiece = transport.bondedCost / standardFill;
      }
      costPerPiece = transport.costPerLu / overseaFill + bondedCostPerPiece;
      break;
    }
    case 'road':
    case 'rail':
      costPerPiece = transport.costPerLu / standardFill;
      break;
    default: {
      const unhandled: never = transport.mode;
      throw new Error(`Unknown transport mode: ${String(unhandled)}`);
    }
  }

  return {
    mode: transport.mode,
    pricingRule: 'manual',
    costPerPiece: Math.max(0, costPerPiece),
    costPerLogisticsUnit: transport.costPerLu,
    bondedCostPerPiece,
  };
}

/** Steps 1–2: what one delivery weighs and how much truck space it takes */
export function buildShipmentProfile({
  material,
  supplier,
  transport,
  profile,
  settings,
  diagnostics,
}: Pick<
  TransportCostParams,
  'material' | 'supplier' | 'transport' | 'profile' | 'settings' | 'diagnostics'
>): ShipmentProfile {
  const piecesPerPackaging = profile.fillQtyBox;
  const deliveriesPerMonth = guardDivisor(diagnostics, 'transport', 'Deliveries per month', supplier.deliveriesPerMonth);
  const unitsPerPallet = profile.boxesPerLu;
  const stackability = guardDivisor(diagnostics, 'transport', 'Stackability factor', transport.stackabilityFactor);

  const unitWeightKg = material.weightPerPiece * piecesPerPackaging + profile.box.unitWeightKg;
  const monthlyDemandPerDelivery = (material.dailyDemand * settings.daysPerMonth) / deliveriesPerMonth;
  const packagingUnitsPerDelivery = monthlyDemandPerDelivery / piecesPerPackaging;

  const pallets = ceilWhole(packagingUnitsPerDelivery / unitsPerPallet);
  const weightPerPalletKg = unitsPerPallet * unitWeightKg + profile.pallet.unitWeightKg;

  return {
    unitWeightKg,
    monthlyDemandPerDelivery,
    packagingUnitsPerDelivery,
    pallets,
    weightPerPalletKg,
    shipmentWeightKg: pallets * weightPerPalletKg,
    loadingMeters: (pallets / stackability) * settings.palletFootprintLm,
  };
}

/** Smallest bracket that holds the weight; the heaviest bracket beyond the table */
export function findWeightBracket(lane: TransportLane, weightKg: number): WeightBracket | undefined {
  if (lane.pricesByWeight.length === 0) return undefined;
  const sorted = [...lane.pricesByWeight].sort((a, b) => a.maxWeightKg - b.maxWeightKg);
  return sorted.find((bracket) => weightKg <= bracket.maxWeightKg) ?? sorted[sorted.length - 1];
}

/** Step 4: price one delivery on a lane */
export function priceLane(
  lane: TransportLane,
  shipment: ShipmentProfile,
  international: boolean,
  settings: CalculationSettings
): LanePrice {
  const spaceRate = international ? settings.spaceRateInternationalPerLm : settings.spaceRateDomesticPerLm;
  const spaceBasedPrice = Math.max(0, shipment.loadingMeters) * spaceRate;

  let pricingRule: LanePrice['pricingRule'];
  let bracket: WeightBracket | undefined;
  let weightBasedPrice: number;
  let basePrice: number;

  if (shipment.pallets > settings.palletsPerTruck) {
    const excessPallets = shipment.pallets - settings.palletsPerTruck;
    bracket = findWeightBracket(lane, excessPallets * shipment.weightPerPalletKg);
    weightBasedPrice = bracket?.price ?? 0;
    basePrice = lane.fullTruckPrice + weightBasedPrice;
    pricingRule = 'fullTruckPlusExcess';
  } else {
    bracket = findWeightBracket(lane, shipment.shipmentWeightKg);
    weightBasedPrice = bracket?.price ?? 0;
    basePrice = Math.max(weightBasedPrice, spaceBasedPrice);
    pricingRule = spaceBasedPrice > weightBasedPrice ? 'spaceBased' : 'weightBased';
  }

  const fuelSurcharge = basePrice * ((lane.fuelSurchargePercent ?? 0) / 100);
  return {
    pricingRule,
    weightBracketKg: bracket?.maxWeightKg ?? null,
    weightBasedPrice,
    spaceBasedPrice,
    basePrice,
    fuelSurcharge,
    shipmentPrice: basePrice + fuelSurcharge,
  };
}

export function calculateAutomaticTransportCost(
  params: TransportCostParams & { location: PlantLocation }
): TransportCostBreakdown {
  const { supplier, location, transport, operations, reference, settings, diagnostics } = params;
  const shipment = buildShipmentProfile(params);

  const origin = { country: supplier.country, zipCode: supplier.zipCode };
  const destination = { country: location.country, zipCode: location.zipCode };
  const lane = reference.findLane(origin, destination);
  if (!lane) {
    diagnostics.record('lookupMiss', 'transport', `No transport lane found for ${laneKey(origin, destination)}`);
    return {
      mode: transport.mode,
      pricingRule: 'noLane',
      costPerPiece: 0,
      costPerLogisticsUnit: 0,
      shipment,
      bondedCostPerPiece: 0,
    };
  }

  const international =
    supplier.country.trim().toUpperCase() !== location.country.trim().toUpperCase();
  const lanePrice = priceLane(lane, shipment, international, settings);
  const monthlyDemand = guardDivisor(
    diagnostics,
    'transport',
    'Monthly demand per delivery',
    shipment.monthlyDemandPerDelivery
  );

  const bondedCostPerPiece =
    transport.bondedWarehouse && appliesBondedLeg(transport, operations, settings)
      ? transport.bondedCost / monthlyDemand
      : 0;

  return {
    mode: transport.mode,
    pricingRule: lanePrice.pricingRule,
    costPerPiece: Math.max(0, lanePrice.shipmentPrice / monthlyDemand + bondedCostPerPiece),
    costPerLogisticsUnit: shipment.pallets > 0 ? lanePrice.shipmentPrice / shipment.pallets : 0,
    shipment,
    laneId: lane.laneId,
    international,
    lanePrice,
    bondedCostPerPiece,
  };
}

export function calculateTransportCost(params: TransportCostParams): TransportCostBreakdown {
  if (!params.transport.automaticCalculation) return calculateManualTransportCost(params);

  const { location } = params;
  if (!location) {
    params.diagnostics.record(
      'configMissing',
      'transport',
      'Automatic transport calculation needs a plant location; using the manual rate instead'
    );
    return calculateManualTransportCost(params);
  }
  return calculateAutomaticTransportCost({ ...params, location });
}
