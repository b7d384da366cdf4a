// Primary transport modes supported by the lane and CO₂ tables
export type TransportMode = 'road' | 'rail' | 'sea';

// Incoterms 2020
export type Incoterm =
  | 'EXW'
  | 'FCA'
  | 'FAS'
  | 'FOB'
  | 'CFR'
  | 'CIF'
  | 'CPT'
  | 'CIP'
  | 'DAP'
  | 'DPU'
  | 'DDP';

// Special packaging replaces the standard box/pallet combination
export type SpecialPackagingVariant = 'inlayTray' | 'inlayTrayPalletSize' | 'standaloneTray' | 'none';

export type PackagingMaterial = 'cardboard' | 'wood' | 'plastic' | 'metal';

export type RepackingWeightCategory = 'none' | 'light' | 'moderate' | 'heavy';

export type RepackingUnit = 'perPart' | 'perTray' | 'perBulkTransfer';

export interface Material {
  materialNo: string;
  description: string;
  weightPerPiece: number; // kg
  annualVolume: number; // pcs
  dailyDemand: number; // pcs
  lifetimeYears: number;
  piecePrice: number;
  hsCode?: string;
}

export interface Supplier {
  vendorId: string;
  vendorName: string;
  country: string;
  /** Delivery zip code; lanes are matched on its first two characters */
  zipCode: string;
  city?: string;
  deliveriesPerMonth: number;
  distanceKm: number;
}

/** Receiving plant, destination of every inbound lane */
export interface PlantLocation {
  plant: string;
  country: string;
  zipCode: string;
}

/** Days a logistics unit spends at each stage of the packaging loop */
export interface PackagingLoop {
  goodsReceipt: number;
  rawMaterialStock: number;
  production: number;
  emptiesReturn: number;
  cleaning: number;
  dispatch: number;
  emptiesTransitToSupplier: number;
  emptiesReceiptAtSupplier: number;
  emptiesStockAtSupplier: number;
  supplierProduction: number;
  finishedPartsStock: number;
  finishedPartsDispatch: number;
  transitFromSupplier: number;
}

export const PACKAGING_LOOP_STAGES: readonly (keyof PackagingLoop)[] = [
  'goodsReceipt',
  'rawMaterialStock',
  'production',
  'emptiesReturn',
  'cleaning',
  'dispatch',
  'emptiesTransitToSupplier',
  'emptiesReceiptAtSupplier',
  'emptiesStockAtSupplier',
  'supplierProduction',
  'finishedPartsStock',
  'finishedPartsDispatch',
  'transitFromSupplier',
];

export interface PackagingConfig {
  boxType: string;
  fillQtyBox: number; // pcs per box
  palletType: string;
  /** Pieces per LU on overseas shipments */
  overseaFillQtyLu: number;
  specialPackagingNeeded: boolean;
  specialPackagingType: SpecialPackagingVariant;
  /** Special pallet and cover on top of the trays */
  additionalSpecialPackagingNeeded: boolean;
  fillQtyTray: number;
  traysPerSpecialPallet: number;
  specialPalletsPerLu: number;
  toolingCost: number;
  additionalPackagingPrice: number; // inlays etc., per box
  loop: PackagingLoop;
  scrapCardboardCost: number;
}

export interface TransportConfig {
  mode: TransportMode;
  costPerLu: number;
  bondedCost: number;
  stackabilityFactor: number;
  automaticCalculation: boolean;
  bondedWarehouse: boolean;
}

export interface OperationsConfig {
  incoterm: Incoterm;
  leadTimeDays: number;
  subSupplierUsed: boolean;
  subSupplierBoxDays: number;
}

export interface WarehouseConfig {
  costPerLocationMonthly: number;
}

export interface Co2Config {
  costPerTon: number;
  conversionFactor: number;
}

export interface CustomsConfig {
  dutyRatePercent: number;
  tariffRatePercent?: number;
  preferenceUsage: boolean;
}

export interface RepackingConfig {
  /** Derived from the piece weight when omitted */
  weightCategory?: RepackingWeightCategory;
  supplierPackaging: string;
  destinationPackaging: string;
}

export interface AdditionalCost {
  name: string;
  value: number;
}

// Reference tables

export interface CatalogEntry {
  name: string;
  material: PackagingMaterial;
  unitWeightKg: number;
  unitPrice: number;
  unitsPerLu: number;
  unitsPerLayer: number;
}

export type PalletAccessory = 'specialPallet' | 'cover';

export interface RepackingOperation {
  weightCategory: RepackingWeightCategory;
  supplierPackaging: string;
  operationType: string;
  destinationPackaging: string;
  cost: number;
  unit: RepackingUnit;
}

export interface LaneEndpoint {
  country: string;
  zipCode: string;
  city?: string;
}

export interface WeightBracket {
  maxWeightKg: number;
  price: number;
}

export interface TransportLane {
  laneId: string;
  origin: LaneEndpoint;
  destination: LaneEndpoint;
  /** Sorted ascending by maxWeightKg */
  pricesByWeight: WeightBracket[];
  fullTruckPrice: number;
  fuelSurchargePercent: number;
  leadTimes?: {
    groupage?: string;
    ltl?: string;
    ftl?: string;
  };
}

export interface ReferenceTables {
  boxes: Record<string, CatalogEntry>;
  pallets: Record<string, CatalogEntry>;
  trays: Partial<Record<Exclude<SpecialPackagingVariant, 'none'>, CatalogEntry>>;
  palletAccessories: Partial<Record<PalletAccessory, CatalogEntry>>;
  repackingOperations: RepackingOperation[];
  lanes: TransportLane[];
}

// Diagnostics

export type DiagnosticKind =
  | 'lookupMiss'
  | 'divisionGuard'
  | 'configMissing'
  | 'computationException'
  | 'invalidConfig';

export type CostComponent =
  | 'volume'
  | 'packaging'
  | 'repacking'
  | 'transport'
  | 'co2'
  | 'customs'
  | 'warehouse'
  | 'additional'
  | 'total';

export interface Diagnostic {
  kind: DiagnosticKind;
  component: CostComponent;
  message: string;
  materialNo?: string;
  vendorId?: string;
}

// Calculation input / output

export interface LogisticsCostInput {
  material: Material;
  supplier: Supplier;
  location?: PlantLocation;
  packaging: PackagingConfig;
  transport: TransportConfig;
  operations: OperationsConfig;
  warehouse: WarehouseConfig;
  co2: Co2Config;
  repacking?: RepackingConfig;
  customs?: CustomsConfig;
  additionalCosts: AdditionalCost[];
}

/** Pair input as handed over by the selection layer; any record may still be missing */
export type PairInput = Pick<LogisticsCostInput, 'material' | 'supplier'> &
  Partial<Omit<LogisticsCostInput, 'material' | 'supplier'>>;

export type TransportPricingRule =
  | 'manual'
  | 'weightBased'
  | 'spaceBased'
  | 'fullTruckPlusExcess'
  | 'noLane';

export interface LogisticsCostResult {
  materialNo: string;
  materialDescription: string;
  vendorId: string;
  vendorName: string;
  annualVolume: number;
  lifetimeVolume: number;
  // Packaging
  packagingCostPerPiece: number;
  packagingCostPlant: number;
  packagingCostCoc: number;
  packagingCostTotal: number;
  packagingLoopDays: number;
  fillQtyPerLu: number;
  specialFillQtyPerLu: number;
  // Repacking
  repackingCostPerPiece: number;
  // Customs
  customsCostPerPiece: number;
  dutyRatePercent: number;
  dutyCostPerPiece: number;
  tariffCostPerPiece: number;
  // Transport
  transportMode: TransportMode;
  transportCostPerPiece: number;
  transportCostPerLogisticsUnit: number;
  transportPricingRule: TransportPricingRule;
  // CO₂
  co2CostPerPiece: number;
  co2EmissionKg: number;
  co2TotalTons: number;
  energyConsumptionFactor: number;
  // Warehouse
  warehouseCostPerPiece: number;
  storageLocationsTotal: number;
  storageLocationsLocal: number;
  safetyStockDays: number;
  inventoryDays: number;
  // Additional
  additionalCostPerPiece: number;
  // Totals
  totalCostPerPiece: number;
  totalAnnualCost: number;
  calculatedAt: string;
  diagnostics: Diagnostic[];
}
