/**
 * Read-only access to the packaging catalogs, the repacking operation table and the
 * transport lane table. Pure lookups: misses come back as `undefined` and the calling
 * engine decides how to degrade.
 */
import type {
  CatalogEntry,
  CostComponent,
  LaneEndpoint,
  PalletAccessory,
  ReferenceTables,
  RepackingOperation,
  RepackingWeightCategory,
  SpecialPackagingVariant,
  TransportLane,
} from '@/core/types';
import type { DiagnosticsCollector } from './diagnostics';

export interface ReferenceLookup {
  getBox(boxType: string): CatalogEntry | undefined;
  getPallet(palletType: string): CatalogEntry | undefined;
  getTray(variant: SpecialPackagingVariant): CatalogEntry | undefined;
  getPalletAccessory(accessory: PalletAccessory): CatalogEntry | undefined;
  findRepackingOperation(
    weightCategory: RepackingWeightCategory,
    supplierPackaging: string,
    destinationPackaging: string
  ): RepackingOperation | undefined;
  findLane(
    origin: Pick<LaneEndpoint, 'country' | 'zipCode'>,
    destination: Pick<LaneEndpoint, 'country' | 'zipCode'>
  ): TransportLane | undefined;
}

export const ZIP_PREFIX_LENGTH = 2;

export const zipPrefix = (zipCode: string): string =>
  String(zipCode ?? '')
    .trim()
    .slice(0, ZIP_PREFIX_LENGTH);

const normalizeCountry = (country: string): string =>
  String(country ?? '')
    .trim()
    .toUpperCase();

export const laneKey = (
  origin: Pick<LaneEndpoint, 'country' | 'zipCode'>,
  destination: Pick<LaneEndpoint, 'country' | 'zipCode'>
): string =>
  `${normalizeCountry(origin.country)}${zipPrefix(origin.zipCode)}-${normalizeCountry(destination.country)}${zipPrefix(destination.zipCode)}`;

const normalizePackagingName = (name: string): string =>
  String(name ?? '')
    .trim()
    .toLowerCase();

const indexCatalog = (catalog: Partial<Record<string, CatalogEntry>>): Map<string, CatalogEntry> => {
  const index = new Map<string, CatalogEntry>();
  for (const [name, entry] of Object.entries(catalog)) {
    if (entry) index.set(name, entry);
  }
  return index;
};

export function createReferenceLookup(tables: ReferenceTables): ReferenceLookup {
  const boxes = indexCatalog(tables.boxes);
  const pallets = indexCatalog(tables.pallets);
  const trays = indexCatalog(tables.trays);
  const accessories = indexCatalog(tables.palletAccessories);
  const lanesByKey = new Map<string, TransportLane>();
  for (const lane of tables.lanes) {
    const key = laneKey(lane.origin, lane.destination);
    // First lane wins when two share a prefix pair
    if (!lanesByKey.has(key)) lanesByKey.set(key, lane);
  }

  return {
    getBox: (boxType) => boxes.get(boxType),
    getPallet: (palletType) => pallets.get(palletType),
    getTray: (variant) => (variant === 'none' ? undefined : trays.get(variant)),
    getPalletAccessory: (accessory) => accessories.get(accessory),

    findRepackingOperation(weightCategory, supplierPackaging, destinationPackaging) {
      const supplierName = normalizePackagingName(supplierPackaging);
      const destinationName = normalizePackagingName(destinationPackaging);
      return tables.repackingOperations.find(
        (op) =>
          op.weightCategory === weightCategory &&
          normalizePackagingName(op.supplierPackaging) === supplierName &&
          normalizePackagingName(op.destinationPackaging) === destinationName
      );
    },

    findLane(origin, destination) {
      return lanesByKey.get(laneKey(origin, destination));
    },
  };
}

/** Zero-valued entry used in place of a catalog miss */
export const EMPTY_CATALOG_ENTRY: CatalogEntry = {
  name: '',
  material: 'cardboard',
  unitWeightKg: 0,
  unitPrice: 0,
  unitsPerLu: 0,
  unitsPerLayer: 0,
};

/** Catalog entry or EMPTY_CATALOG_ENTRY, recording a lookupMiss for the latter */
export function entryOrEmpty(
  entry: CatalogEntry | undefined,
  diagnostics: DiagnosticsCollector,
  component: CostComponent,
  description: string
): CatalogEntry {
  if (entry) return entry;
  diagnostics.record('lookupMiss', component, `${description} not found in reference tables`);
  return EMPTY_CATALOG_ENTRY;
}
