import {
  ClimateRiskLevel,
  IrrigationType,
  MarketSnapshot,
  Season,
  SeedVariety,
  SoilHealthSnapshot,
  ZoneReference
} from '../types';
import { analyzeClimateRisk, climateAdjustedScore, ClimateRiskAssessment } from './climateRisk';
import { estimateInputCostPerAcre } from './fertilizer';
import {
  expectedRevenuePerAcre,
  marketAdjustedScore,
  marketAdviceText,
  MarketSummary,
  summarizeMarket
} from './marketAdjuster';
import { classify, clampScore, round2, ScoredCrop, scoreCrops } from './suitability';
import {
  MarketSnapshotSource,
  SeedVarietyCatalog,
  SuitabilityRepository,
  ZoneLocation,
  ZoneResolver
} from './sources';
import { validateCoordinates, validateLocation } from './zoneResolver';
import { getConfig } from '../utils/config';
import { createLogger } from '../utils/logger';

const log = createLogger('Crop Recommendation');

export const PREFERRED_CROP_BOOST = 5;
const KG_HA_TO_QUINTAL_ACRE = 1 / 2.47 / 100;

const DEFAULT_VARIETIES: Record<string, string[]> = {
  RICE: ['Swarna', 'MTU-1010', 'Pusa Basmati 1121'],
  WHEAT: ['HD-2967', 'PBW-343', 'DBW-187'],
  MAIZE: ['DHM-117', 'Vivek QPM-9'],
  COTTON: ['Suraj', 'RCH-2 Bt'],
  SOYBEAN: ['JS-9560', 'NRC-86'],
  GROUNDNUT: ['TAG-24', 'ICGV-91114'],
  MUSTARD: ['Pusa Bold', 'RH-749'],
  SUGARCANE: ['Co-0238', 'Co-86032'],
  CHICKPEA: ['JG-11', 'Pusa-372'],
  POTATO: ['Kufri Jyoti', 'Kufri Pukhraj']
};

export type RecommendationRequest = ZoneLocation & {
  zoneCode?: string;
  season?: Season;
  irrigationType?: IrrigationType;
  areaAcres?: number;
  soilHealth?: SoilHealthSnapshot | null;
  includeClimateRisk?: boolean;
  includeMarketData?: boolean;
  rainfallDeviation?: number;
  temperatureDeviation?: number;
  excludeCrops?: string[];
  preferredCrops?: string[];
  minScore?: number;
  limit?: number;
  offset?: number;
};

export type RecommendationSources = {
  zones: ZoneResolver;
  suitability: SuitabilityRepository;
  seedVarieties: SeedVarietyCatalog;
  market?: MarketSnapshotSource;
};

export type CropRecommendation = ScoredCrop & {
  rank: number; // 1..N within the returned page
  globalRank: number; // position in the full filtered list
  suitabilityScore: number;
  preferred: boolean;
  climateRisk?: ClimateRiskAssessment;
  market?: MarketSnapshot;
  marketAdvice?: string;
  expectedYieldPerAcre?: number; // quintals
  potentialYieldGap?: number; // quintals per acre
  estimatedInputCost: number;
  expectedRevenue?: number;
  estimatedNetProfit?: number;
  seedVarieties: SeedVariety[];
  recommendedVarieties: string[];
  riskFactors: string[];
  notes: string;
};

export type ClimateRiskSummary = {
  highRisk: number;
  mediumRisk: number;
  lowRisk: number;
  unassessed: number;
  insuranceRecommended: number;
  highRiskCrops: string[];
};

export type RecommendationSuccess = {
  success: true;
  zone: ZoneReference;
  season: Season;
  totalCrops: number;
  recommendations: CropRecommendation[];
  climateRiskSummary: ClimateRiskSummary;
  marketSummary?: MarketSummary;
  generatedAt: string;
};

export type RecommendationFailure = {
  success: false;
  errorMessage: string;
  input: RecommendationRequest;
};

export type RecommendationResponse = RecommendationSuccess | RecommendationFailure;

type ZoneLookup = { zone: ZoneReference } | { error: string };

function lookupZone(request: RecommendationRequest, zones: ZoneResolver): ZoneLookup {
  if (request.zoneCode) {
    return { zone: zones.getZone(request.zoneCode) ?? { code: request.zoneCode, name: request.zoneCode } };
  }
  const resolution = zones.resolve(request);
  return resolution.ok ? { zone: resolution.zone } : { error: resolution.reason };
}

function matches(crop: ScoredCrop, names: readonly string[]): boolean {
  const code = crop.cropCode.toLowerCase();
  const name = crop.cropName.toLowerCase();
  return names.some((n) => {
    const wanted = n.trim().toLowerCase();
    return wanted === code || wanted === name;
  });
}

function toQuintalsPerAcre(kgPerHa: number): number {
  return round2(kgPerHa * KG_HA_TO_QUINTAL_ACRE);
}

function riskLevelOf(rec: CropRecommendation): ClimateRiskLevel | undefined {
  return rec.climateRisk?.riskLevel ?? rec.climateRiskLevel;
}

export function summarizeClimateRisk(recommendations: readonly CropRecommendation[]): ClimateRiskSummary {
  const summary: ClimateRiskSummary = {
    highRisk: 0,
    mediumRisk: 0,
    lowRisk: 0,
    unassessed: 0,
    insuranceRecommended: 0,
    highRiskCrops: []
  };
  for (const rec of recommendations) {
    const level = riskLevelOf(rec);
    if (level === 'HIGH' || level === 'VERY_HIGH') {
      summary.highRisk += 1;
      summary.highRiskCrops.push(rec.cropCode);
    } else if (level === 'MEDIUM') summary.mediumRisk += 1;
    else if (level === 'LOW') summary.lowRisk += 1;
    else summary.unassessed += 1;
    if (rec.climateRisk?.insuranceRecommended) summary.insuranceRecommended += 1;
  }
  return summary;
}

function riskFactorsFor(rec: CropRecommendation, irrigationType?: IrrigationType): string[] {
  const factors: string[] = [];
  if (rec.climateRisk) {
    factors.push(...rec.climateRisk.keyRisks);
    if (rec.climateRisk.rainfallScenario.type !== 'NORMAL') factors.push(rec.climateRisk.rainfallScenario.description);
  }
  if (irrigationType === 'RAINFED' && rec.waterRequirementMm !== undefined && rec.waterRequirementMm > 1000) {
    factors.push(`High water requirement (${rec.waterRequirementMm} mm) under rainfed conditions`);
  }
  factors.push(...rec.soilHealthNotes);
  if (rec.market?.trend === 'DOWN') factors.push('Falling market prices');
  return factors;
}

function notesFor(rec: CropRecommendation, season: Season): string {
  const label: Record<ScoredCrop['classification'], string> = {
    HIGHLY_SUITABLE: 'Highly suitable for this zone',
    SUITABLE: 'Suitable for this zone',
    MARGINALLY_SUITABLE: 'Marginally suitable - expect lower yields',
    NOT_SUITABLE: 'Not recommended for this zone'
  };
  const parts = [label[rec.classification]];
  if (season !== 'ALL') parts.push(`${season.toLowerCase()} season`);
  if (rec.growingSeasonDays) parts.push(`${rec.growingSeasonDays} days to maturity`);
  if (rec.preferred) parts.push('matches your preferred crops');
  return parts.join('; ');
}

/**
 * Scores every crop of the resolved zone and returns them ranked.
 *
 * Throws ValidationError for unusable locations; zone and data lookups that
 * come back empty are reported in the result instead.
 */
export function recommendCrops(request: RecommendationRequest, sources: RecommendationSources): RecommendationResponse {
  if (request.zoneCode) validateCoordinates(request);
  else validateLocation(request);

  const fail = (errorMessage: string): RecommendationFailure => {
    log.info('no recommendation', { errorMessage });
    return { success: false, errorMessage, input: request };
  };

  const lookup = lookupZone(request, sources.zones);
  if ('error' in lookup) return fail(lookup.error);
  const { zone } = lookup;

  const rows = sources.suitability.findByZone(zone.code);
  if (!rows.length) return fail(`No suitability data for zone ${zone.code}`);

  const season = request.season ?? 'ALL';
  const scored = scoreCrops(rows, {
    irrigationType: request.irrigationType,
    soilHealth: request.soilHealth,
    season
  });
  if (!scored.length) return fail('No suitable crops found for the location');

  const config = getConfig();
  const rainfallDeviation = request.rainfallDeviation ?? config.defaultRainfallDeviation;
  const temperatureDeviation = request.temperatureDeviation ?? config.defaultTemperatureDeviation;
  const areaAcres = request.areaAcres ?? 1;
  const state = request.state;

  let candidates: CropRecommendation[] = scored.map((crop) => {
    const rec: CropRecommendation = {
      ...crop,
      rank: 0,
      globalRank: 0,
      suitabilityScore: crop.overallScore,
      preferred: false,
      estimatedInputCost: round2(estimateInputCostPerAcre(crop.cropCode, request.soilHealth) * areaAcres),
      seedVarieties: [],
      recommendedVarieties: [],
      riskFactors: [],
      notes: ''
    };
    if (request.includeClimateRisk) {
      rec.climateRisk = analyzeClimateRisk(crop.cropCode, rainfallDeviation, temperatureDeviation);
      rec.overallScore = climateAdjustedScore(rec.overallScore, rec.climateRisk);
    }
    if (request.includeMarketData) {
      const snapshot = sources.market?.getSnapshot(crop.cropCode, state);
      if (snapshot) {
        rec.market = snapshot;
        rec.marketAdvice = marketAdviceText(snapshot);
        rec.overallScore = marketAdjustedScore(rec.overallScore, snapshot);
      }
    }
    return rec;
  });

  const excluded = request.excludeCrops ?? [];
  if (excluded.length) candidates = candidates.filter((c) => !matches(c, excluded));

  const preferred = request.preferredCrops ?? [];
  for (const c of candidates) {
    if (preferred.length && matches(c, preferred)) {
      c.preferred = true;
      c.overallScore = clampScore(c.overallScore + PREFERRED_CROP_BOOST);
    }
  }

  const minScore = request.minScore;
  if (minScore !== undefined) candidates = candidates.filter((c) => c.overallScore >= minScore);

  candidates.sort((a, b) => b.overallScore - a.overallScore);
  candidates.forEach((c, i) => {
    c.globalRank = i + 1;
    c.classification = classify(c.overallScore);
  });

  const offset = request.offset ?? 0;
  const page = candidates.slice(offset, request.limit !== undefined ? offset + request.limit : undefined);
  page.forEach((c, i) => {
    c.rank = i + 1;
  });

  for (const rec of page) {
    if (rec.expectedYieldExpected !== undefined) {
      rec.expectedYieldPerAcre = toQuintalsPerAcre(rec.expectedYieldExpected);
      if (rec.potentialYield !== undefined) {
        rec.potentialYieldGap = round2(toQuintalsPerAcre(rec.potentialYield) - rec.expectedYieldPerAcre);
      }
    }
    if (request.includeMarketData && rec.market && rec.expectedYieldPerAcre !== undefined) {
      rec.expectedRevenue = round2(expectedRevenuePerAcre(rec.expectedYieldPerAcre, rec.market) * areaAcres);
      rec.estimatedNetProfit = round2(rec.expectedRevenue - rec.estimatedInputCost);
    }
    rec.seedVarieties = sources.seedVarieties.findVarieties(rec.cropCode, state);
    rec.recommendedVarieties = rec.seedVarieties.length
      ? rec.seedVarieties.map((v) => v.name)
      : [...(DEFAULT_VARIETIES[rec.cropCode.toUpperCase()] ?? [])];
    rec.riskFactors = riskFactorsFor(rec, request.irrigationType);
    rec.notes = notesFor(rec, season);
  }

  const response: RecommendationSuccess = {
    success: true,
    zone,
    season,
    totalCrops: candidates.length,
    recommendations: page,
    climateRiskSummary: summarizeClimateRisk(page),
    generatedAt: new Date().toISOString()
  };
  if (request.includeMarketData) {
    response.marketSummary = summarizeMarket(page.flatMap((r) => (r.market ? [r.market] : [])));
  }
  log.debug('recommendations ready', { zone: zone.code, total: candidates.length, returned: page.length });
  return response;
}
