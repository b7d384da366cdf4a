/**
 * Turns untyped reference-table data (bundled JSON, database rows) into typed tables.
 *
 * Catalog entries take their name from their key. Malformed rows are dropped with a
 * warning rather than failing the whole data set.
 */
import type {
  CatalogEntry,
  LaneEndpoint,
  PackagingMaterial,
  PalletAccessory,
  ReferenceTables,
  RepackingOperation,
  RepackingUnit,
  RepackingWeightCategory,
  SpecialPackagingVariant,
  TransportLane,
  WeightBracket,
} from '@/core/types';
import rawDefaultTables from '@/data/referenceTables.json';

type UnknownRecord = Record<string, unknown>;

const PACKAGING_MATERIALS: readonly PackagingMaterial[] = ['cardboard', 'wood', 'plastic', 'metal'];
const TRAY_VARIANTS: readonly Exclude<SpecialPackagingVariant, 'none'>[] = [
  'inlayTray',
  'inlayTrayPalletSize',
  'standaloneTray',
];
const PALLET_ACCESSORIES: readonly PalletAccessory[] = ['specialPallet', 'cover'];
const WEIGHT_CATEGORIES: readonly RepackingWeightCategory[] = ['none', 'light', 'moderate', 'heavy'];
const REPACKING_UNITS: readonly RepackingUnit[] = ['perPart', 'perTray', 'perBulkTransfer'];

export const isRecord = (value: unknown): value is UnknownRecord =>
  typeof value === 'object' && value !== null && !Array.isArray(value);

const oneOf = <T extends string>(allowed: readonly T[], value: unknown): T | undefined =>
  allowed.find((candidate) => candidate === value);

/** Finite number from a number or numeric string; DB drivers hand back numerics as strings */
export function readNumber(value: unknown): number | undefined {
  if (typeof value === 'number') return Number.isFinite(value) ? value : undefined;
  if (typeof value === 'string' && value.trim() !== '') {
    const parsed = Number(value);
    return Number.isFinite(parsed) ? parsed : undefined;
  }
  return undefined;
}

const readString = (value: unknown): string | undefined =>
  typeof value === 'string' && value.trim() !== '' ? value.trim() : undefined;

export function parseCatalogEntry(name: string, raw: unknown): CatalogEntry | null {
  if (!isRecord(raw)) return null;
  const material = oneOf(PACKAGING_MATERIALS, raw.material);
  const unitWeightKg = readNumber(raw.unitWeightKg);
  const unitPrice = readNumber(raw.unitPrice);
  if (!material || unitWeightKg === undefined || unitPrice === undefined) return null;
  return {
    name,
    material,
    unitWeightKg,
    unitPrice,
    unitsPerLu: readNumber(raw.unitsPerLu) ?? 0,
    unitsPerLayer: readNumber(raw.unitsPerLayer) ?? 0,
  };
}

function parseCatalog(table: string, raw: unknown): Record<string, CatalogEntry> {
  if (!isRecord(raw)) return {};
  const entries: [string, CatalogEntry][] = [];
  for (const [name, value] of Object.entries(raw)) {
    const entry = parseCatalogEntry(name, value);
    if (entry) entries.push([name, entry]);
    else console.warn(`parseReferenceTables warning: dropping malformed ${table} entry "${name}"`);
  }
  // fromEntries keeps names such as "__proto__" as own keys
  return Object.fromEntries(entries);
}

function pickKeyed<K extends string>(
  table: string,
  keys: readonly K[],
  raw: unknown
): Partial<Record<K, CatalogEntry>> {
  const catalog = parseCatalog(table, raw);
  const picked: Partial<Record<K, CatalogEntry>> = {};
  for (const key of keys) {
    const entry = Object.hasOwn(catalog, key) ? catalog[key] : undefined;
    if (entry) picked[key] = entry;
  }
  return picked;
}

export function parseRepackingOperation(raw: unknown): RepackingOperation | null {
  if (!isRecord(raw)) return null;
  const weightCategory = oneOf(WEIGHT_CATEGORIES, raw.weightCategory);
  const unit = oneOf(REPACKING_UNITS, raw.unit);
  const supplierPackaging = readString(raw.supplierPackaging);
  const destinationPackaging = readString(raw.destinationPackaging);
  const cost = readNumber(raw.cost);
  if (!weightCategory || !unit || !supplierPackaging || !destinationPackaging || cost === undefined) {
    return null;
  }
  return {
    weightCategory,
    supplierPackaging,
    operationType: readString(raw.operationType) ?? '',
    destinationPackaging,
    cost,
    unit,
  };
}

function parseEndpoint(raw: unknown): LaneEndpoint | null {
  if (!isRecord(raw)) return null;
  const country = readString(raw.country);
  const zipCode = readString(raw.zipCode) ?? (typeof raw.zipCode === 'number' ? String(raw.zipCode) : undefined);
  if (!country || !zipCode) return null;
  const city = readString(raw.city);
  return { country, zipCode, ...(city && { city }) };
}

function parseWeightBracket(raw: unknown): WeightBracket | null {
  if (!isRecord(raw)) return null;
  const maxWeightKg = readNumber(raw.maxWeightKg);
  const price = readNumber(raw.price);
  if (maxWeightKg === undefined || price === undefined) return null;
  return { maxWeightKg, price };
}

export function parseTransportLane(raw: unknown): TransportLane | null {
  if (!isRecord(raw)) return null;
  const laneId = readString(raw.laneId);
  const origin = parseEndpoint(raw.origin);
  const destination = parseEndpoint(raw.destination);
  if (!laneId || !origin || !destination || !Array.isArray(raw.pricesByWeight)) return null;

  const pricesByWeight: WeightBracket[] = [];
  for (const item of raw.pricesByWeight) {
    const bracket = parseWeightBracket(item);
    if (!bracket) return null;
    pricesByWeight.push(bracket);
  }
  pricesByWeight.sort((a, b) => a.maxWeightKg - b.maxWeightKg);

  const lane: TransportLane = {
    laneId,
    origin,
    destination,
    pricesByWeight,
    fullTruckPrice: readNumber(raw.fullTruckPrice) ?? 0,
    fuelSurchargePercent: readNumber(raw.fuelSurchargePercent) ?? 0,
  };
  if (isRecord(raw.leadTimes)) {
    const groupage = readString(raw.leadTimes.groupage);
    const ltl = readString(raw.leadTimes.ltl);
    const ftl = readString(raw.leadTimes.ftl);
    lane.leadTimes = {
      ...(groupage && { groupage }),
      ...(ltl && { ltl }),
      ...(ftl && { ftl }),
    };
  }
  return lane;
}

function parseRows<T>(table: string, raw: unknown, parseRow: (row: unknown) => T | null): T[] {
  if (!Array.isArray(raw)) return [];
  const rows: T[] = [];
  raw.forEach((row, index) => {
    const parsed = parseRow(row);
    if (parsed) rows.push(parsed);
    else console.warn(`parseReferenceTables warning: dropping malformed ${table} row ${index}`);
  });
  return rows;
}

export function parseReferenceTables(raw: unknown): ReferenceTables {
  const source = isRecord(raw) ? raw : {};
  return {
    boxes: parseCatalog('box', source.boxes),
    pallets: parseCatalog('pallet', source.pallets),
    trays: pickKeyed('tray', TRAY_VARIANTS, source.trays),
    palletAccessories: pickKeyed('pallet accessory', PALLET_ACCESSORIES, source.palletAccessories),
    repackingOperations: parseRows('repacking operation', source.repackingOperations, parseRepackingOperation),
    lanes: parseRows('transport lane', source.lanes, parseTransportLane),
  };
}

/** Bundled catalog, lane and repacking data */
export const defaultReferenceTables: ReferenceTables = parseReferenceTables(rawDefaultTables);
