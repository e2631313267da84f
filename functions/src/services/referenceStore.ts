import {
  CropSuitabilityRow,
  DistrictZoneMapping,
  SeedVariety,
  ZoneReference
} from '../types';
import {
  CropSuitabilityRowSchema,
  DistrictZoneMappingSchema,
  SeedVarietySchema,
  ZoneReferenceSchema
} from '../schemas';
import { getFirestoreDb, readCollection } from '../utils/firestore';
import { createLogger } from '../utils/logger';
import {
  SeedVarietyCatalog,
  SuitabilityRepository,
  ZoneLocation,
  ZoneResolution,
  ZoneResolver
} from './sources';
import { createZoneResolver } from './zoneResolver';

const log = createLogger('Reference Data');

export const COLLECTIONS = {
  zones: 'agro_zones',
  districts: 'district_zone_mappings',
  suitability: 'crop_suitability',
  seedVarieties: 'seed_varieties',
  soilHealthCards: 'soil_health_cards',
  fertilizerApplications: 'fertilizer_applications'
} as const;

export type ReferenceData = {
  zones: ZoneReference[];
  districts: DistrictZoneMapping[];
  suitability: CropSuitabilityRow[];
  seedVarieties: SeedVariety[];
};

export class ReferenceStore implements ZoneResolver, SuitabilityRepository, SeedVarietyCatalog {
  private readonly resolver: ZoneResolver;
  private readonly rowsByZone = new Map<string, CropSuitabilityRow[]>();
  private readonly varietiesByCrop = new Map<string, SeedVariety[]>();

  constructor(data: ReferenceData) {
    this.resolver = createZoneResolver(data.zones, data.districts);
    for (const row of data.suitability) {
      const rows = this.rowsByZone.get(row.zoneCode) ?? [];
      rows.push(row);
      this.rowsByZone.set(row.zoneCode, rows);
    }
    for (const v of data.seedVarieties) {
      const code = v.cropCode.toUpperCase();
      const list = this.varietiesByCrop.get(code) ?? [];
      list.push(v);
      this.varietiesByCrop.set(code, list);
    }
  }

  resolve(location: ZoneLocation): ZoneResolution {
    return this.resolver.resolve(location);
  }

  getZone(zoneCode: string): ZoneReference | undefined {
    return this.resolver.getZone(zoneCode);
  }

  findByZone(zoneCode: string): CropSuitabilityRow[] {
    return [...(this.rowsByZone.get(zoneCode) ?? [])];
  }

  findVarieties(cropCode: string, state?: string): SeedVariety[] {
    const all = this.varietiesByCrop.get(cropCode.toUpperCase()) ?? [];
    if (!state) return [...all];
    const wanted = state.trim().toLowerCase();
    const local = all.filter((v) => v.state?.trim().toLowerCase() === wanted);
    // varieties without a state are released nationally
    return local.length ? local : all.filter((v) => !v.state);
  }
}

let storePromise: Promise<ReferenceStore> | undefined;

export function loadReferenceStore(): Promise<ReferenceStore> {
  if (!storePromise) {
    const db = getFirestoreDb();
    storePromise = Promise.all([
      readCollection(db, COLLECTIONS.zones, ZoneReferenceSchema),
      readCollection(db, COLLECTIONS.districts, DistrictZoneMappingSchema),
      readCollection(db, COLLECTIONS.suitability, CropSuitabilityRowSchema),
      readCollection(db, COLLECTIONS.seedVarieties, SeedVarietySchema)
    ])
      .then(([zones, districts, suitability, seedVarieties]) => {
        log.info('reference data loaded', {
          zones: zones.length,
          districts: districts.length,
          suitabilityRows: suitability.length,
          seedVarieties: seedVarieties.length
        });
        return new ReferenceStore({ zones, districts, suitability, seedVarieties });
      })
      .catch((err: unknown) => {
        storePromise = undefined;
        throw err;
      });
  }
  return storePromise;
}
