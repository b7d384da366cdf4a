import type { ReferenceTables } from '@/core/types';
import { isRecord, parseReferenceTables } from '@/lib/referenceData';
import { getSupabaseClient } from './supabaseClient';

type RawCatalog = Record<string, Record<string, unknown>>;

const CATALOG_COLUMNS =
  'category, name, material, unit_weight_kg, unit_price, units_per_lu, units_per_layer';
const REPACKING_COLUMNS =
  'weight_category, supplier_packaging, operation_type, destination_packaging, cost, unit';
const LANE_COLUMNS =
  'lane_id, origin_country, origin_zip, origin_city, destination_country, destination_zip, destination_city, full_truck_price, fuel_surcharge_percent, lead_time_groupage, lead_time_ltl, lead_time_ftl';
const LANE_PRICE_COLUMNS = 'lane_id, max_weight_kg, price';

const CATALOG_TABLE_BY_CATEGORY = {
  box: 'boxes',
  pallet: 'pallets',
  tray: 'trays',
  accessory: 'palletAccessories',
} as const;

type CatalogCategory = keyof typeof CATALOG_TABLE_BY_CATEGORY;

const isCatalogCategory = (value: unknown): value is CatalogCategory =>
  typeof value === 'string' && value in CATALOG_TABLE_BY_CATEGORY;

type CatalogTable = (typeof CATALOG_TABLE_BY_CATEGORY)[CatalogCategory];

export function mapCatalogRows(rows: unknown[]): Record<CatalogTable, RawCatalog> {
  const catalogs: Record<CatalogTable, RawCatalog> = {
    boxes: {},
    pallets: {},
    trays: {},
    palletAccessories: {},
  };
  for (const row of rows) {
    if (!isRecord(row) || !isCatalogCategory(row.category) || typeof row.name !== 'string') continue;
    catalogs[CATALOG_TABLE_BY_CATEGORY[row.category]][row.name] = {
      material: row.material,
      unitWeightKg: row.unit_weight_kg,
      unitPrice: row.unit_price,
      unitsPerLu: row.units_per_lu,
      unitsPerLayer: row.units_per_layer,
    };
  }
  return catalogs;
}

export function mapRowToRepackingOperation(row: unknown): Record<string, unknown> | null {
  if (!isRecord(row)) return null;
  return {
    weightCategory: row.weight_category,
    supplierPackaging: row.supplier_packaging,
    operationType: row.operation_type,
    destinationPackaging: row.destination_packaging,
    cost: row.cost,
    unit: row.unit,
  };
}

export function mapRowsToLanes(laneRows: unknown[], priceRows: unknown[]): Record<string, unknown>[] {
  const pricesByLane = new Map<string, Record<string, unknown>[]>();
  for (const row of priceRows) {
    if (!isRecord(row) || typeof row.lane_id !== 'string') continue;
    const prices = pricesByLane.get(row.lane_id) ?? [];
    prices.push({ maxWeightKg: row.max_weight_kg, price: row.price });
    pricesByLane.set(row.lane_id, prices);
  }

  return laneRows.filter(isRecord).map((row) => ({
    laneId: row.lane_id,
    origin: { country: row.origin_country, zipCode: row.origin_zip, city: row.origin_city },
    destination: {
      country: row.destination_country,
      zipCode: row.destination_zip,
      city: row.destination_city,
    },
    pricesByWeight: typeof row.lane_id === 'string' ? (pricesByLane.get(row.lane_id) ?? []) : [],
    fullTruckPrice: row.full_truck_price,
    fuelSurchargePercent: row.fuel_surcharge_percent,
    leadTimes: {
      groupage: row.lead_time_groupage,
      ltl: row.lead_time_ltl,
      ftl: row.lead_time_ftl,
    },
  }));
}

export const referenceTablesService = {
  /** Load every reference table; query errors are logged and rethrown */
  async loadAll(): Promise<ReferenceTables> {
    try {
      const supabase = getSupabaseClient();
      const [catalog, repacking, lanes, lanePrices] = await Promise.all([
        supabase.from('packaging_catalog').select(CATALOG_COLUMNS),
        supabase.from('repacking_operations').select(REPACKING_COLUMNS),
        supabase.from('transport_lanes').select(LANE_COLUMNS),
        supabase.from('transport_lane_prices').select(LANE_PRICE_COLUMNS).order('max_weight_kg'),
      ]);
      for (const { error } of [catalog, repacking, lanes, lanePrices]) {
        if (error) throw error;
      }

      const catalogs = mapCatalogRows(catalog.data ?? []);
      return parseReferenceTables({
        ...catalogs,
        repackingOperations: (repacking.data ?? []).map(mapRowToRepackingOperation),
        lanes: mapRowsToLanes(lanes.data ?? [], lanePrices.data ?? []),
      });
    } catch (error) {
      console.error('Error loading reference tables:', error);
      throw error;
    }
  },
};
