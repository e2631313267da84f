import { z } from 'zod';
import referenceData from '../data/rotationReference.json';
import patternData from '../data/rotationPatterns.json';
import { Season } from '../types';
import { normalizeCropName } from './cropFamily';

const nameList = z.array(z.string().min(1));
const partnerMap = z.record(z.string(), nameList);
const scoreMap = z.record(z.string(), z.number().min(0).max(100));

const reference = z
  .object({
    rootDepthCandidates: nameList,
    legumeCandidates: nameList,
    seasonalCrops: z.object({ KHARIF: nameList, RABI: nameList, ZAID: nameList }),
    riceDiversification: z.object({ pulses: nameList.min(1), oilseeds: nameList.min(1) }),
    relayPartners: partnerMap,
    intercropPartners: partnerMap,
    cropPests: partnerMap,
    climateResilience: scoreMap,
    economicViability: scoreMap
  })
  .parse(referenceData);

const patterns = z
  .object({
    fallbackZone: z.string(),
    zones: z.record(z.string(), z.array(nameList.min(1).max(3)).min(3))
  })
  .parse(patternData);

export const DEFAULT_RESILIENCE_SCORE = 70;
export const DEFAULT_ECONOMIC_SCORE = 70;

export const ROOT_DEPTH_CANDIDATES: readonly string[] = reference.rootDepthCandidates;
export const LEGUME_CANDIDATES: readonly string[] = reference.legumeCandidates;
export const RICE_DIVERSIFICATION = reference.riceDiversification;

export function fitsSeason(cropName: string, season: Season): boolean {
  if (season === 'ALL') return true;
  const name = normalizeCropName(cropName);
  return reference.seasonalCrops[season].some((c) => normalizeCropName(c) === name);
}

/** In-season crops first; order within each group is kept. */
export function preferSeason(crops: readonly string[], season: Season): string[] {
  if (season === 'ALL') return [...crops];
  return [...crops.filter((c) => fitsSeason(c, season)), ...crops.filter((c) => !fitsSeason(c, season))];
}

export function climateResilienceOf(cropName: string): number {
  return reference.climateResilience[normalizeCropName(cropName)] ?? DEFAULT_RESILIENCE_SCORE;
}

export function economicViabilityOf(cropName: string): number {
  return reference.economicViability[normalizeCropName(cropName)] ?? DEFAULT_ECONOMIC_SCORE;
}

export function relayPartnersOf(cropName: string): string[] {
  return [...(reference.relayPartners[normalizeCropName(cropName)] ?? [])];
}

export function intercropPartnersOf(cropName: string): string[] {
  return [...(reference.intercropPartners[normalizeCropName(cropName)] ?? [])];
}

export function pestsOf(cropName: string): string[] {
  return [...(reference.cropPests[normalizeCropName(cropName)] ?? [])];
}

export const FALLBACK_PATTERN_ZONE = patterns.fallbackZone;

export function zonePatterns(zoneName: string): { zoneName: string; sequences: string[][] } {
  const wanted = zoneName.trim().toLowerCase();
  const key = Object.keys(patterns.zones).find((z) => z.toLowerCase() === wanted);
  const own = key ? patterns.zones[key] : undefined;
  if (key && own) return { zoneName: key, sequences: own };
  return { zoneName: FALLBACK_PATTERN_ZONE, sequences: patterns.zones[FALLBACK_PATTERN_ZONE] ?? [] };
}

export function knownPatternZones(): string[] {
  return Object.keys(patterns.zones);
}
