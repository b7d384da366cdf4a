export type * from './core/types';
export { PACKAGING_LOOP_STAGES } from './core/types';
export * from './core/validation';
export { calculateLogisticsCost, type LogisticsCostOptions } from './lib/logisticsCost';
export {
  calculateAllCosts,
  completePair,
  type BatchCalculationResult,
  type BatchSummary,
} from './lib/batchCalculation';
export {
  DEFAULT_CALCULATION_SETTINGS,
  resolveCalculationSettings,
  type CalculationSettings,
} from './lib/calculationSettings';
export { createDiagnostics, runComponent, type DiagnosticsCollector } from './lib/diagnostics';
export { createReferenceLookup, laneKey, type ReferenceLookup } from './lib/referenceLookup';
export { defaultReferenceTables, parseReferenceTables } from './lib/referenceData';
export { lifetimeVolume } from './lib/volumeModel';
export { calculatePackagingCost, resolvePackagingProfile, type PackagingProfile } from './lib/packagingCost';
export { calculateRepackingCostPerPiece, repackingWeightCategory } from './lib/repackingCost';
export { calculateTransportCost, type TransportCostBreakdown } from './lib/transportCost';
export { calculateCo2Cost } from './lib/co2Cost';
export { calculateCustomsCost } from './lib/customsCost';
export { calculateWarehouseCost } from './lib/warehouseCost';
export { calculateAdditionalCostPerPiece } from './lib/additionalCost';
export { referenceTablesService } from './services/api/referenceTables';
export { isSupabaseConfigured } from './lib/supabaseEnv';
