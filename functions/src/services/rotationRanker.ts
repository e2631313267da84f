import { CropFamily, RootDepth, RotationOption } from '../types';
import { familyProfile, resolveCrop } from './cropFamily';
import { rankBy, rankByField } from './ranking';
import { climateResilienceOf, economicViabilityOf, zonePatterns } from './rotationReference';
import { clampScore, round2 } from './suitability';

export const SEQUENCE_SEPARATOR = ' -> ';

export const BENEFIT_WEIGHTS = {
  soilHealth: 0.4,
  climateResilience: 0.3,
  economicViability: 0.3
} as const;

const WATER_USAGE_BY_DEPTH: Record<RootDepth, number> = { DEEP: 70, MEDIUM: 75, SHALLOW: 80 };

export type SeasonScheduleInfo = { plantingMonths: string; harvestMonths: string };

const SEASON_SCHEDULES: Record<string, SeasonScheduleInfo> = {
  KHARIF: { plantingMonths: 'June - July', harvestMonths: 'September - October' },
  RABI: { plantingMonths: 'October - November', harvestMonths: 'March - April' },
  ZAID: { plantingMonths: 'February - March', harvestMonths: 'May - June' }
};

type BenefitComponents = Pick<RotationOption, 'soilHealthBenefit' | 'climateResilience' | 'economicViability'>;

export function overallBenefitScore(option: BenefitComponents | null | undefined): number {
  if (!option) return 0;
  const score =
    (option.soilHealthBenefit ?? 0) * BENEFIT_WEIGHTS.soilHealth +
    (option.climateResilience ?? 0) * BENEFIT_WEIGHTS.climateResilience +
    (option.economicViability ?? 0) * BENEFIT_WEIGHTS.economicViability;
  return clampScore(round2(score));
}

export function rankByOverallBenefit(options: readonly RotationOption[]): RotationOption[];
export function rankByOverallBenefit(options: readonly RotationOption[] | null | undefined): RotationOption[] | null;
export function rankByOverallBenefit(options: readonly RotationOption[] | null | undefined): RotationOption[] | null {
  if (!options) return null;
  const refreshed = options.map((o) => ({ ...o, overallBenefitScore: overallBenefitScore(o) }));
  return rankBy(refreshed, (o) => o.overallBenefitScore);
}

export function rankBySoilHealth(options: readonly RotationOption[] | null | undefined): RotationOption[] | null {
  return rankByField(options, 'soilHealthBenefit');
}

export function rankByClimateResilience(options: readonly RotationOption[] | null | undefined): RotationOption[] | null {
  return rankByField(options, 'climateResilience');
}

export function rankByEconomicViability(options: readonly RotationOption[] | null | undefined): RotationOption[] | null {
  return rankByField(options, 'economicViability');
}

export function splitSequence(sequence: string): string[] {
  return sequence
    .split('->')
    .map((t) => t.trim())
    .filter((t) => t.length > 0);
}

// "Maize + Cowpea (intercropping)" -> ["Maize", "Cowpea"]
export function cropsInSequence(sequence: string): string[] {
  return splitSequence(sequence).flatMap((token) =>
    token
      .replace(/\([^)]*\)/g, '')
      .split('+')
      .map((t) => t.trim())
      .filter((t) => t.length > 0)
  );
}

function withSchedule(option: RotationOption): RotationOption {
  const [kharif, rabi, zaid] = splitSequence(option.cropSequence);
  return { ...option, kharifCrops: kharif, rabiCrops: rabi, zaidCrops: zaid };
}

export function generateSeasonWiseSchedules(options: readonly RotationOption[]): RotationOption[];
export function generateSeasonWiseSchedules(options: readonly RotationOption[] | null | undefined): RotationOption[] | null;
export function generateSeasonWiseSchedules(options: readonly RotationOption[] | null | undefined): RotationOption[] | null {
  return options ? options.map(withSchedule) : null;
}

export function dominantFamilyOf(sequence: string): CropFamily {
  const families = cropsInSequence(sequence).map((c) => resolveCrop(c).family);
  let best: CropFamily = 'OTHER';
  let bestCount = 0;
  for (const family of families) {
    const count = families.filter((f) => f === family).length;
    if (count > bestCount) {
      best = family;
      bestCount = count;
    }
  }
  return best;
}

function withResidueGuidance(option: RotationOption): RotationOption {
  const profile = familyProfile(dominantFamilyOf(option.cropSequence));
  return {
    ...option,
    residueManagementRecommendation: profile.residueManagement,
    organicMatterImpact: profile.organicMatterImpact
  };
}

export function addResidueManagementRecommendations(options: readonly RotationOption[]): RotationOption[];
export function addResidueManagementRecommendations(
  options: readonly RotationOption[] | null | undefined
): RotationOption[] | null;
export function addResidueManagementRecommendations(
  options: readonly RotationOption[] | null | undefined
): RotationOption[] | null {
  return options ? options.map(withResidueGuidance) : null;
}

export function getSeasonScheduleInfo(season: string | null | undefined): SeasonScheduleInfo {
  const info = season ? SEASON_SCHEDULES[season.trim().toUpperCase()] : undefined;
  return info ? { ...info } : { plantingMonths: 'Varies', harvestMonths: 'Varies' };
}

function patternBenefits(families: CropFamily[]): string[] {
  const benefits = [
    'Diverse crop sequence reduces risk of total crop failure',
    'Multiple income sources throughout the year'
  ];
  const hasLegume = families.includes('LEGUMES');
  if (hasLegume) benefits.push('Biological nitrogen fixation improves soil fertility');
  if (hasLegume && families.includes('CEREALS')) benefits.push('Cereal-legume rotation provides balanced nutrition');
  if (families.includes('OILSEEDS')) benefits.push('Oilseed break helps manage pest and disease cycles');
  return benefits;
}

function patternOption(zoneName: string, crops: string[], index: number): RotationOption {
  const resolved = crops.map((c) => resolveCrop(c));
  const families = resolved.map((r) => r.family);
  const depths = resolved.map((r) => r.rootDepth);
  const cropSequence = crops.join(SEQUENCE_SEPARATOR);

  const avgSoil = families.reduce((sum, f) => sum + familyProfile(f).soilHealthScore, 0) / families.length;
  const legumeBonus = families.includes('LEGUMES') ? 5 : 0;
  const deepBonus = depths.includes('DEEP') ? 3 : 0;
  const adjacentSameFamily = families.some((f, i) => i > 0 && f === families[i - 1]);

  const option: RotationOption = {
    id: `${zoneName}:${index}:${cropSequence}`,
    cropSequence,
    description: `Recommended ${zoneName} rotation: ${cropSequence}`,
    soilHealthBenefit: clampScore(round2(avgSoil + legumeBonus + deepBonus)),
    climateResilience: climateResilienceOf(crops[0]),
    economicViability: economicViabilityOf(crops[0]),
    nutrientCyclingScore: new Set(depths).size > 1 ? 85 : 65,
    pestManagementScore: adjacentSameFamily ? 50 : 85,
    waterUsageScore: round2(depths.reduce((sum, d) => sum + WATER_USAGE_BY_DEPTH[d], 0) / depths.length),
    overallBenefitScore: 0,
    benefits: patternBenefits(families),
    considerations: [
      'Adjust sowing dates to local monsoon onset and irrigation availability',
      'Use certified seed of varieties suited to each season',
      'Apply fertilizer based on soil health card recommendations',
      'Check local market demand before committing area to each crop'
    ]
  };
  option.overallBenefitScore = overallBenefitScore(option);
  return withResidueGuidance(withSchedule(option));
}

/** Zone rotation patterns; unknown zone names get the Indo-Gangetic Plains set. */
export function getDefaultRotationPatterns(zoneName: string | null | undefined): RotationOption[] {
  const { zoneName: resolvedZone, sequences } = zonePatterns(zoneName ?? '');
  return sequences.map((crops, i) => patternOption(resolvedZone, crops, i));
}

export type RotationDisplay = {
  zoneName: string;
  options: RotationOption[];
  defaultPatterns: RotationOption[];
  usingDefaultPatterns: boolean;
};

export function createCompleteRotationDisplay(
  options: readonly RotationOption[] | null | undefined,
  zoneName: string | null | undefined,
  hasHistory: boolean
): RotationDisplay {
  const defaultPatterns = getDefaultRotationPatterns(zoneName);
  const supplied = options ?? [];
  if (supplied.length === 0 && !hasHistory) {
    return {
      zoneName: zoneName ?? '',
      options: defaultPatterns,
      defaultPatterns,
      usingDefaultPatterns: true
    };
  }
  return {
    zoneName: zoneName ?? '',
    options: addResidueManagementRecommendations(generateSeasonWiseSchedules(rankByOverallBenefit(supplied))),
    defaultPatterns,
    usingDefaultPatterns: false
  };
}
