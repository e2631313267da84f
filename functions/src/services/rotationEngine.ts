import { CropHistoryEntry, RootDepth, RotationOption, Season } from '../types';
import { isRiceCrop, normalizeCropName, resolveCrop } from './cropFamily';
import {
  analyzeCropHistory,
  annotate,
  AnalyzedEntry,
  CropHistoryAnalysis,
  familyRuns,
  MAX_SEASONS_ANALYZED,
  sortByRecent
} from './cropHistory';
import {
  climateResilienceOf,
  economicViabilityOf,
  intercropPartnersOf,
  LEGUME_CANDIDATES,
  pestsOf,
  preferSeason,
  relayPartnersOf,
  RICE_DIVERSIFICATION,
  ROOT_DEPTH_CANDIDATES
} from './rotationReference';
import { addResidueManagementRecommendations, rankByOverallBenefit, SEQUENCE_SEPARATOR } from './rotationRanker';
import { createLogger } from '../utils/logger';

const log = createLogger('Rotation');

const MAX_CANDIDATES_PER_RULE = 4;
const WATER_USAGE_BY_DEPTH: Record<RootDepth, number> = { DEEP: 70, MEDIUM: 75, SHALLOW: 80 };

export type PestRiskLevel = 'LOW' | 'MEDIUM' | 'HIGH';

export type RotationRecommendationResult = {
  season: Season;
  lastCrop?: string;
  hasRiceBasedSystem: boolean;
  pestRiskLevel: PestRiskLevel;
  options: RotationOption[];
  warnings: string[];
  recommendations: string[];
  historyAnalysis: CropHistoryAnalysis;
};

type OptionDraft = Omit<RotationOption, 'id' | 'overallBenefitScore'>;

const STANDARD_CONSIDERATIONS = [
  'Match varieties and sowing dates to the season',
  'Apply fertilizer based on soil test results'
];

function sequence(...crops: (string | undefined)[]): string {
  return crops.filter((c): c is string => !!c).join(SEQUENCE_SEPARATOR);
}

function depthLabel(depth: RootDepth): string {
  return depth.toLowerCase();
}

function rootDepthOptions(last: AnalyzedEntry, season: Season): OptionDraft[] {
  const wanted: RootDepth = last.rootDepth === 'DEEP' ? 'SHALLOW' : 'DEEP';
  const picks = preferSeason(ROOT_DEPTH_CANDIDATES, season)
    .map((name) => resolveCrop(name))
    .filter((c) => c.rootDepth === wanted && c.family !== last.family && c.normalizedName !== last.normalizedName)
    .slice(0, MAX_CANDIDATES_PER_RULE);
  return picks.map((crop) => ({
    cropSequence: sequence(last.cropName, crop.cropName),
    description: `${crop.cropName} (${depthLabel(wanted)}-rooted) after ${depthLabel(last.rootDepth)}-rooted ${last.cropName} cycles nutrients from a different soil layer`,
    soilHealthBenefit: 80,
    climateResilience: climateResilienceOf(crop.cropName),
    economicViability: economicViabilityOf(crop.cropName),
    nutrientCyclingScore: 85,
    pestManagementScore: 85,
    waterUsageScore: WATER_USAGE_BY_DEPTH[wanted],
    benefits: [
      `${crop.cropName} draws nutrients from the ${wanted === 'DEEP' ? 'subsoil' : 'topsoil'} left by ${last.cropName}`,
      'Different crop family breaks pest and disease carryover'
    ],
    considerations: [...STANDARD_CONSIDERATIONS]
  }));
}

function balancedOption(last?: AnalyzedEntry): OptionDraft {
  return {
    cropSequence: sequence('Sunflower', 'Cabbage', 'Greengram'),
    description: last
      ? `Balanced deep-shallow-legume sequence to follow ${last.cropName}`
      : 'Balanced deep-shallow-legume sequence for a new rotation',
    soilHealthBenefit: 90,
    climateResilience: 85,
    economicViability: 80,
    nutrientCyclingScore: 95,
    pestManagementScore: 85,
    waterUsageScore: 75,
    benefits: [
      'Deep-rooted sunflower recycles nutrients from lower soil layers',
      'Shallow-rooted cabbage uses topsoil nutrients',
      'Greengram fixes atmospheric nitrogen for the next crop'
    ],
    considerations: [...STANDARD_CONSIDERATIONS, 'Needs irrigation for the vegetable season']
  };
}

function legumeOptions(last: AnalyzedEntry | undefined, season: Season): OptionDraft[] {
  const lastName = last?.normalizedName;
  return preferSeason(LEGUME_CANDIDATES, season)
    .filter((l) => normalizeCropName(l) !== lastName)
    .slice(0, MAX_CANDIDATES_PER_RULE)
    .map((legume) => ({
      cropSequence: sequence(last?.cropName, legume),
      description: 'Legume integration for biological nitrogen fixation',
      soilHealthBenefit: 85,
      climateResilience: climateResilienceOf(legume),
      economicViability: economicViabilityOf(legume),
      nutrientCyclingScore: 90,
      pestManagementScore: last ? 85 : 70,
      waterUsageScore: WATER_USAGE_BY_DEPTH[resolveCrop(legume).rootDepth],
      benefits: [
        'Biological nitrogen fixation (40-60 kg N/ha)',
        'Reduces nitrogen fertilizer need of the next crop',
        'Improves soil structure and microbial activity'
      ],
      considerations: [...STANDARD_CONSIDERATIONS, 'Treat seed with Rhizobium culture before sowing']
    }));
}

function riceDiversificationOptions(riceName: string, season: Season): OptionDraft[] {
  const pulses = preferSeason(RICE_DIVERSIFICATION.pulses, season).map((crop) => ({
    cropSequence: sequence(riceName, crop),
    description: `Rice-pulse system: ${crop} on residual moisture after ${riceName}`,
    soilHealthBenefit: 85,
    climateResilience: climateResilienceOf(crop),
    economicViability: economicViabilityOf(crop),
    nutrientCyclingScore: 80,
    pestManagementScore: 85,
    waterUsageScore: 80,
    benefits: [
      'Diversifies the rice-based system',
      'Uses residual soil moisture after rice harvest',
      'Adds nitrogen for the following rice crop'
    ],
    considerations: [...STANDARD_CONSIDERATIONS]
  }));
  const oilseeds = preferSeason(RICE_DIVERSIFICATION.oilseeds, season).map((crop) => ({
    cropSequence: sequence(riceName, crop),
    description: `Rice-oilseed system: ${crop} after ${riceName} for crop diversification`,
    soilHealthBenefit: 80,
    climateResilience: climateResilienceOf(crop),
    economicViability: economicViabilityOf(crop),
    nutrientCyclingScore: 72,
    pestManagementScore: 85,
    waterUsageScore: 78,
    benefits: [
      'Diversifies the rice-based system',
      'Oilseed break interrupts the rice pest cycle',
      'Adds a cash crop in the rabi season'
    ],
    considerations: [...STANDARD_CONSIDERATIONS]
  }));
  return [...pulses, ...oilseeds];
}

function relayOptions(mainCrop: string): OptionDraft[] {
  const paira = isRiceCrop(mainCrop);
  return relayPartnersOf(mainCrop).map((partner) => ({
    cropSequence: `${mainCrop} (relay with ${partner})`,
    description: paira
      ? `Paira/Utera relay cropping: sow ${partner} into maturing ${mainCrop} before harvest`
      : `Relay cropping: sow ${partner} into standing ${mainCrop} before harvest`,
    soilHealthBenefit: 85,
    climateResilience: 80,
    economicViability: 88,
    nutrientCyclingScore: 80,
    pestManagementScore: 80,
    waterUsageScore: 85,
    benefits: [
      'Improves land-use efficiency by adding a crop without extra tillage',
      'Uses residual soil moisture',
      'Saves the turnaround time between seasons'
    ],
    considerations: [...STANDARD_CONSIDERATIONS, `Broadcast ${partner} seed 10-15 days before ${mainCrop} harvest`]
  }));
}

function intercropOptions(mainCrop: string): OptionDraft[] {
  return intercropPartnersOf(mainCrop).map((partner) => ({
    cropSequence: `${mainCrop} + ${partner} (intercropping)`,
    description: `Intercropping ${partner} with ${mainCrop} in paired rows`,
    soilHealthBenefit: 82,
    climateResilience: 78,
    economicViability: 85,
    nutrientCyclingScore: 78,
    pestManagementScore: 80,
    waterUsageScore: 75,
    benefits: [
      'Maximizes land-use efficiency',
      'Spreads weather and price risk across two crops',
      'Ground cover suppresses weeds'
    ],
    considerations: [...STANDARD_CONSIDERATIONS, 'Keep a 2:1 or 4:2 row ratio to limit competition']
  }));
}

function pestWarnings(entries: readonly AnalyzedEntry[]): { level: PestRiskLevel; warnings: string[]; maxRun: number } {
  const runs = familyRuns(entries).filter((r) => r.entries.length >= 2);
  const maxRun = runs.reduce((max, r) => Math.max(max, r.entries.length), 0);
  const warnings = runs.map((run) => {
    const names = [...new Set(run.entries.map((e) => e.cropName))];
    const pests = [...new Set(run.entries.flatMap((e) => pestsOf(e.cropName)))];
    const base = `High pest carryover risk: ${run.entries.length} consecutive ${run.entries[0].familyName} seasons (${names.join(', ')})`;
    return pests.length
      ? `${base}. Watch for ${pests.join(', ')}.`
      : `${base}. Rotate to a different crop family to break pest cycles.`;
  });
  const last = entries[0];
  if (last) {
    const pests = pestsOf(last.cropName);
    if (pests.length) {
      warnings.push(
        `${last.cropName} residues can carry over ${pests.join(', ')}; clear stubble and avoid a related crop next season`
      );
    }
  }
  const level: PestRiskLevel = maxRun >= 3 ? 'HIGH' : maxRun === 2 ? 'MEDIUM' : 'LOW';
  return { level, warnings, maxRun };
}

/**
 * Builds candidate rotations from the crop history. Falls back to a balanced
 * sequence and legume options when there is no history.
 */
export function generateRotationRecommendations(
  history: readonly CropHistoryEntry[] | null | undefined,
  season: Season = 'ALL'
): RotationRecommendationResult {
  const entries = annotate(sortByRecent(history ?? []));
  const last = entries[0];
  const recent = entries.slice(0, MAX_SEASONS_ANALYZED);
  const riceEntry = recent.find((e) => isRiceCrop(e.cropName));

  const drafts: OptionDraft[] = [];
  if (last) drafts.push(...rootDepthOptions(last, season));
  drafts.push(balancedOption(last));
  if (!last || last.family !== 'LEGUMES') drafts.push(...legumeOptions(last, season));

  const warnings: string[] = [];
  if (riceEntry) {
    drafts.push(...riceDiversificationOptions(riceEntry.cropName, season));
    drafts.push(...relayOptions(riceEntry.cropName), ...intercropOptions(riceEntry.cropName));
    warnings.push(
      'Rice-based system detected: continuous rice depletes soil and builds up pests. Diversify with pulses or oilseeds.'
    );
  }
  if (last && !(riceEntry && isRiceCrop(last.cropName))) {
    drafts.push(...relayOptions(last.cropName), ...intercropOptions(last.cropName));
  }

  const pest = pestWarnings(entries);
  warnings.push(...pest.warnings);

  const recommendations: string[] = [];
  if (pest.maxRun >= 2) recommendations.push('Break the monoculture by rotating to a crop from a different family');
  if (riceEntry) {
    recommendations.push('Grow green manure (Sesbania/Crotalaria) before rice to add nitrogen and organic matter');
    recommendations.push('Alternate rice with pulses or oilseeds in the rabi season');
  }
  recommendations.push('Incorporate crop residues instead of burning them');
  recommendations.push('Consider soil testing before each season to adjust fertilizer doses');

  // one option per sequence; the first rule to propose it wins
  const unique = new Map<string, RotationOption>();
  for (const d of drafts) {
    if (!unique.has(d.cropSequence)) {
      unique.set(d.cropSequence, { ...d, id: `${season}:${d.cropSequence}`, overallBenefitScore: 0 });
    }
  }
  const options = addResidueManagementRecommendations(rankByOverallBenefit([...unique.values()]));

  if (warnings.length) log.debug('rotation warnings', { count: warnings.length, pestRisk: pest.level });
  return {
    season,
    lastCrop: last?.cropName,
    hasRiceBasedSystem: riceEntry !== undefined,
    pestRiskLevel: pest.level,
    options,
    warnings,
    recommendations,
    historyAnalysis: analyzeCropHistory(history)
  };
}
