import { DistrictZoneMapping, ZoneReference } from '../types';
import { ValidationError } from '../utils/errors';
import { createLogger } from '../utils/logger';
import { ZoneLocation, ZoneResolution, ZoneResolver } from './sources';

const log = createLogger('Zone');

// squared-degree distance within which a mapped district counts as "nearest"
const NEAREST_DISTRICT_MAX_DIST2 = 1;

function hasText(value?: string): value is string {
  return typeof value === 'string' && value.trim().length > 0;
}

export function validateCoordinates(location: ZoneLocation): void {
  const { latitude, longitude } = location;
  if (latitude !== undefined && !(latitude >= -90 && latitude <= 90)) {
    throw new ValidationError('Invalid latitude: must be between -90 and 90');
  }
  if (longitude !== undefined && !(longitude >= -180 && longitude <= 180)) {
    throw new ValidationError('Invalid longitude: must be between -180 and 180');
  }
}

/**
 * Rejects requests that cannot be resolved at all. Runs before any lookup.
 */
export function validateLocation(location: ZoneLocation): void {
  validateCoordinates(location);
  const { latitude, longitude } = location;
  const hasCoordinates = latitude !== undefined && longitude !== undefined;
  const hasDistrict = hasText(location.district) && hasText(location.state);
  if (!hasCoordinates && !hasDistrict) {
    throw new ValidationError(
      'insufficient location information: provide district and state, or latitude and longitude'
    );
  }
}

function districtKey(district: string, state: string): string {
  return `${district.trim()}|${state.trim()}`;
}

function inRange(value: number, range?: [number, number]): boolean {
  return range !== undefined && value >= range[0] && value <= range[1];
}

export function createZoneResolver(
  zones: readonly ZoneReference[],
  districts: readonly DistrictZoneMapping[]
): ZoneResolver {
  const zonesByCode = new Map(zones.map((z) => [z.code, z]));
  const exact = new Map<string, string>();
  const lower = new Map<string, string>();
  for (const d of districts) {
    const key = districtKey(d.district, d.state);
    exact.set(key, d.zoneCode);
    lower.set(key.toLowerCase(), d.zoneCode);
  }

  const found = (zoneCode: string, matchedBy: 'district' | 'coordinates' | 'bounds'): ZoneResolution => {
    const zone = zonesByCode.get(zoneCode);
    return zone ? { ok: true, zone, matchedBy } : { ok: false, reason: `Unknown agro-ecological zone: ${zoneCode}` };
  };

  const byDistrict = (district: string, state: string): string | undefined => {
    const key = districtKey(district, state);
    return exact.get(key) ?? lower.get(key.toLowerCase());
  };

  const byCoordinates = (lat: number, lon: number): ZoneResolution | undefined => {
    let best: DistrictZoneMapping | undefined;
    let bestDist = Infinity;
    for (const d of districts) {
      if (d.lat === undefined || d.lon === undefined) continue;
      const dist = (d.lat - lat) ** 2 + (d.lon - lon) ** 2;
      if (dist < bestDist) {
        best = d;
        bestDist = dist;
      }
    }
    if (best && bestDist <= NEAREST_DISTRICT_MAX_DIST2) return found(best.zoneCode, 'coordinates');
    const box = zones.find((z) => inRange(lat, z.latitudeRange) && inRange(lon, z.longitudeRange));
    return box ? { ok: true, zone: box, matchedBy: 'bounds' } : undefined;
  };

  return {
    getZone: (zoneCode) => zonesByCode.get(zoneCode),
    resolve(location) {
      if (hasText(location.district) && hasText(location.state)) {
        const code = byDistrict(location.district, location.state);
        if (code) return found(code, 'district');
      }
      if (location.latitude !== undefined && location.longitude !== undefined) {
        const hit = byCoordinates(location.latitude, location.longitude);
        if (hit) return hit;
      }
      const where =
        hasText(location.district) && hasText(location.state)
          ? `${location.district}, ${location.state}`
          : `${location.latitude}, ${location.longitude}`;
      log.warn('zone not found', { location });
      return { ok: false, reason: `Location not found: ${where}` };
    }
  };
}
