import {
  CropSuitabilityRow,
  MarketSnapshot,
  SeedVariety,
  ZoneReference
} from '../types';

export type ZoneLocation = {
  district?: string;
  state?: string;
  latitude?: number;
  longitude?: number;
};

export type ZoneResolution =
  | { ok: true; zone: ZoneReference; matchedBy: 'district' | 'coordinates' | 'bounds' }
  | { ok: false; reason: string };

export interface ZoneResolver {
  resolve(location: ZoneLocation): ZoneResolution;
  getZone(zoneCode: string): ZoneReference | undefined;
}

export interface SuitabilityRepository {
  findByZone(zoneCode: string): CropSuitabilityRow[];
}

export interface SeedVarietyCatalog {
  findVarieties(cropCode: string, state?: string): SeedVariety[];
}

export interface MarketSnapshotSource {
  getSnapshot(cropCode: string, state?: string): MarketSnapshot | undefined;
}

export function snapshotSourceFrom(snapshots: Record<string, MarketSnapshot>): MarketSnapshotSource {
  return {
    getSnapshot: (cropCode) => snapshots[cropCode.trim().toUpperCase()]
  };
}
