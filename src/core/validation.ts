/**
 * Validation utility functions for configuration records
 */
import type {
  AdditionalCost,
  Co2Config,
  CustomsConfig,
  Material,
  OperationsConfig,
  PackagingConfig,
  PairInput,
  Supplier,
  TransportConfig,
  WarehouseConfig,
} from './types';
import { PACKAGING_LOOP_STAGES } from './types';

/** Upper bound for any duration in days */
export const MAX_DAYS = 365;

export interface ValidationResult {
  isValid: boolean;
  errors: string[];
}

/**
 * Validate number range
 */
export const validateNumberRange = (value: number, min: number, max: number): string | null => {
  if (typeof value !== 'number' || isNaN(value)) return 'Must be a number';
  if (value < min) return `Must be at least ${min}`;
  if (value > max) return `Must be at most ${max}`;
  return null;
};

/**
 * Validate required field
 */
export const validateRequired = (value: unknown): string | null => {
  if (value === null || value === undefined || value === '') {
    return 'This field is required';
  }
  if (typeof value === 'string' && value.trim() === '') {
    return 'This field is required';
  }
  return null;
};

/**
 * Combine multiple validation results
 */
export const combineValidations = (...errors: (string | null)[]): string | null => {
  const filtered = errors.filter((e) => e !== null);
  return filtered.length > 0 ? filtered[0] : null;
};

export const validateNonNegative = (value: number): string | null =>
  validateNumberRange(value, 0, Number.POSITIVE_INFINITY);

export const validatePercentage = (value: number): string | null => validateNumberRange(value, 0, 100);

export const validateDays = (value: number): string | null => validateNumberRange(value, 0, MAX_DAYS);

/**
 * Validate country code (two letters, ISO 3166-1 alpha-2)
 */
export const validateCountryCode = (country: string): string | null =>
  combineValidations(
    validateRequired(country),
    /^[A-Z]{2}$/i.test(String(country ?? '').trim()) ? null : 'Country must be a two-letter code'
  );

/**
 * Validate zip code (at least the two characters used for lane matching)
 */
export const validateZipCode = (zipCode: string): string | null =>
  combineValidations(
    validateRequired(zipCode),
    String(zipCode ?? '').trim().length < 2 ? 'Zip code must have at least 2 characters' : null
  );

type FieldCheck = [field: string, error: string | null];

function collectErrors(record: string, checks: FieldCheck[]): string[] {
  return checks
    .filter((check): check is [string, string] => check[1] !== null)
    .map(([field, error]) => `${record}.${field}: ${error}`);
}

export const validateMaterial = (material: Material): string[] =>
  collectErrors('material', [
    ['materialNo', validateRequired(material.materialNo)],
    ['weightPerPiece', validateNonNegative(material.weightPerPiece)],
    ['annualVolume', validateNonNegative(material.annualVolume)],
    ['dailyDemand', validateNonNegative(material.dailyDemand)],
    ['lifetimeYears', validateNonNegative(material.lifetimeYears)],
    ['piecePrice', validateNonNegative(material.piecePrice)],
  ]);

export const validateSupplier = (supplier: Supplier): string[] =>
  collectErrors('supplier', [
    ['vendorId', validateRequired(supplier.vendorId)],
    ['country', validateCountryCode(supplier.country)],
    ['zipCode', validateZipCode(supplier.zipCode)],
    ['deliveriesPerMonth', validateNonNegative(supplier.deliveriesPerMonth)],
    ['distanceKm', validateNonNegative(supplier.distanceKm)],
  ]);

export const validatePackagingConfig = (packaging: PackagingConfig): string[] =>
  collectErrors('packaging', [
    ['boxType', validateRequired(packaging.boxType)],
    ['palletType', validateRequired(packaging.palletType)],
    ['fillQtyBox', validateNonNegative(packaging.fillQtyBox)],
    ['overseaFillQtyLu', validateNonNegative(packaging.overseaFillQtyLu)],
    ['fillQtyTray', validateNonNegative(packaging.fillQtyTray)],
    ['traysPerSpecialPallet', validateNonNegative(packaging.traysPerSpecialPallet)],
    ['specialPalletsPerLu', validateNonNegative(packaging.specialPalletsPerLu)],
    ['toolingCost', validateNonNegative(packaging.toolingCost)],
    ['additionalPackagingPrice', validateNonNegative(packaging.additionalPackagingPrice)],
    ['scrapCardboardCost', validateNonNegative(packaging.scrapCardboardCost)],
    ...PACKAGING_LOOP_STAGES.map((stage): FieldCheck => [`loop.${stage}`, validateDays(packaging.loop[stage])]),
  ]);

export const validateOperationsConfig = (operations: OperationsConfig): string[] =>
  collectErrors('operations', [
    ['incoterm', validateRequired(operations.incoterm)],
    ['leadTimeDays', validateDays(operations.leadTimeDays)],
    ['subSupplierBoxDays', validateDays(operations.subSupplierBoxDays)],
  ]);

export const validateTransportConfig = (transport: TransportConfig): string[] =>
  collectErrors('transport', [
    ['costPerLu', validateNonNegative(transport.costPerLu)],
    ['bondedCost', validateNonNegative(transport.bondedCost)],
    ['stackabilityFactor', validateNonNegative(transport.stackabilityFactor)],
  ]);

export const validateCustomsConfig = (customs: CustomsConfig): string[] =>
  collectErrors('customs', [
    ['dutyRatePercent', validatePercentage(customs.dutyRatePercent)],
    ['tariffRatePercent', validatePercentage(customs.tariffRatePercent ?? 0)],
  ]);

export const validateWarehouseConfig = (warehouse: WarehouseConfig): string[] =>
  collectErrors('warehouse', [
    ['costPerLocationMonthly', validateNonNegative(warehouse.costPerLocationMonthly)],
  ]);

export const validateCo2Config = (co2: Co2Config): string[] =>
  collectErrors('co2', [
    ['costPerTon', validateNonNegative(co2.costPerTon)],
    ['conversionFactor', validateNonNegative(co2.conversionFactor)],
  ]);

export const validateAdditionalCost = (cost: AdditionalCost, index: number): string[] =>
  collectErrors(`additionalCosts[${index}]`, [
    ['name', validateRequired(cost.name)],
    ['value', validateNonNegative(cost.value)],
  ]);

/**
 * Validate every record present on a pair; absent optional records are not errors
 */
export function validateLogisticsInput(input: PairInput): ValidationResult {
  const errors = [
    ...validateMaterial(input.material),
    ...validateSupplier(input.supplier),
    ...(input.packaging ? validatePackagingConfig(input.packaging) : []),
    ...(input.operations ? validateOperationsConfig(input.operations) : []),
    ...(input.transport ? validateTransportConfig(input.transport) : []),
    ...(input.customs ? validateCustomsConfig(input.customs) : []),
    ...(input.warehouse ? validateWarehouseConfig(input.warehouse) : []),
    ...(input.co2 ? validateCo2Config(input.co2) : []),
    ...(input.additionalCosts ?? []).flatMap((cost, index) => validateAdditionalCost(cost, index)),
  ];
  return { isValid: errors.length === 0, errors };
}
