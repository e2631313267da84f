import {
  CropSuitabilityRow,
  IrrigationType,
  Season,
  SoilHealthSnapshot,
  SuitabilityClassification
} from '../types';
import { createLogger } from '../utils/logger';

const log = createLogger('Suitability');

export const MIN_SUITABILITY_THRESHOLD = 40;

export const COMPONENT_WEIGHTS = {
  climate: 0.3,
  soil: 0.25,
  terrain: 0.15,
  water: 0.2
} as const;

const WEIGHT_TOTAL =
  COMPONENT_WEIGHTS.climate + COMPONENT_WEIGHTS.soil + COMPONENT_WEIGHTS.terrain + COMPONENT_WEIGHTS.water;

// Soil health card targets (kg/ha for N/P/K, ppm for Zn).
export const SOIL_TARGETS = {
  nitrogenKgHa: 280,
  phosphorusKgHa: 10,
  potassiumKgHa: 108,
  zincPpm: 0.6,
  phMin: 5.5,
  phMax: 8.0
} as const;

const SOIL_PENALTIES = {
  nitrogen: 5,
  phosphorus: 5,
  potassium: 5,
  zinc: 3,
  ph: 5
} as const;

export type ScoredCrop = {
  cropCode: string;
  cropName: string;
  cropNameLocal?: string;
  climateScore: number;
  soilScore: number;
  terrainScore: number;
  waterScore: number;
  overallScore: number;
  classification: SuitabilityClassification;
  expectedYieldMin?: number; // kg/ha
  expectedYieldExpected?: number;
  expectedYieldMax?: number;
  potentialYield?: number;
  waterRequirementMm?: number;
  growingSeasonDays?: number;
  kharifSuitable: boolean;
  rabiSuitable: boolean;
  zaidSuitable: boolean;
  climateRiskLevel?: CropSuitabilityRow['climateRiskLevel'];
  soilHealthNotes: string[];
};

export type ScoringOptions = {
  irrigationType?: IrrigationType;
  soilHealth?: SoilHealthSnapshot | null;
  season?: Season;
};

export function clampScore(value: number): number {
  return Math.min(100, Math.max(0, value));
}

export function round2(value: number): number {
  return Math.round(value * 100) / 100;
}

export function classify(score: number): SuitabilityClassification {
  if (score >= 80) return 'HIGHLY_SUITABLE';
  if (score >= 60) return 'SUITABLE';
  if (score >= 40) return 'MARGINALLY_SUITABLE';
  return 'NOT_SUITABLE';
}

export function adjustWaterForIrrigation(waterScore: number, irrigationType?: IrrigationType): number {
  switch (irrigationType) {
    case 'DRIP':
      return clampScore(waterScore + 5);
    case 'RAINFED':
      return clampScore(waterScore - 10);
    default:
      return clampScore(waterScore);
  }
}

export type SoilAdjustment = { penalty: number; notes: string[] };

export function soilAdjustment(soil?: SoilHealthSnapshot | null): SoilAdjustment {
  if (!soil) return { penalty: 0, notes: [] };
  let penalty = 0;
  const notes: string[] = [];
  if (soil.nitrogenKgHa !== undefined && soil.nitrogenKgHa < SOIL_TARGETS.nitrogenKgHa) {
    penalty += SOIL_PENALTIES.nitrogen;
    notes.push(`Low nitrogen (${soil.nitrogenKgHa} kg/ha) - apply nitrogen fertilizer`);
  }
  if (soil.phosphorusKgHa !== undefined && soil.phosphorusKgHa < SOIL_TARGETS.phosphorusKgHa) {
    penalty += SOIL_PENALTIES.phosphorus;
    notes.push(`Low phosphorus (${soil.phosphorusKgHa} kg/ha) - apply DAP or SSP`);
  }
  if (soil.potassiumKgHa !== undefined && soil.potassiumKgHa < SOIL_TARGETS.potassiumKgHa) {
    penalty += SOIL_PENALTIES.potassium;
    notes.push(`Low potassium (${soil.potassiumKgHa} kg/ha) - apply MOP`);
  }
  if (soil.zincPpm !== undefined && soil.zincPpm < SOIL_TARGETS.zincPpm) {
    penalty += SOIL_PENALTIES.zinc;
    notes.push(`Zinc deficiency (${soil.zincPpm} ppm) - apply zinc sulfate`);
  }
  if (soil.ph !== undefined && (soil.ph < SOIL_TARGETS.phMin || soil.ph > SOIL_TARGETS.phMax)) {
    penalty += SOIL_PENALTIES.ph;
    notes.push(
      soil.ph < SOIL_TARGETS.phMin
        ? `Acidic soil (pH ${soil.ph}) - consider liming`
        : `Alkaline soil (pH ${soil.ph}) - consider gypsum application`
    );
  }
  return { penalty, notes };
}

/**
 * Weighted mean of the four components. Bounded by the smallest and largest
 * component, rounding included.
 */
export function overallScore(climate: number, soil: number, terrain: number, water: number): number {
  const weighted =
    (climate * COMPONENT_WEIGHTS.climate +
      soil * COMPONENT_WEIGHTS.soil +
      terrain * COMPONENT_WEIGHTS.terrain +
      water * COMPONENT_WEIGHTS.water) /
    WEIGHT_TOTAL;
  const lo = Math.min(climate, soil, terrain, water);
  const hi = Math.max(climate, soil, terrain, water);
  return Math.min(hi, Math.max(lo, round2(weighted)));
}

function fitsSeason(row: CropSuitabilityRow, season?: Season): boolean {
  switch (season) {
    case 'KHARIF':
      return row.kharifSuitable;
    case 'RABI':
      return row.rabiSuitable;
    case 'ZAID':
      return row.zaidSuitable;
    default:
      return true;
  }
}

export function scoreCrop(row: CropSuitabilityRow, options: ScoringOptions = {}): ScoredCrop {
  const climateScore = clampScore(row.climateScore);
  const terrainScore = clampScore(row.terrainScore);
  const waterScore = adjustWaterForIrrigation(row.waterScore, options.irrigationType);
  const soil = soilAdjustment(options.soilHealth);
  const soilScore = clampScore(row.soilScore - soil.penalty);
  const score = overallScore(climateScore, soilScore, terrainScore, waterScore);

  const potentialYield = row.irrigatedPotentialYield ?? row.rainfedPotentialYield;
  const scored: ScoredCrop = {
    cropCode: row.cropCode,
    cropName: row.cropName,
    cropNameLocal: row.cropNameLocal,
    climateScore,
    soilScore,
    terrainScore,
    waterScore,
    overallScore: score,
    classification: classify(score),
    potentialYield,
    waterRequirementMm: row.waterRequirementMm,
    growingSeasonDays: row.growingSeasonDays,
    kharifSuitable: row.kharifSuitable,
    rabiSuitable: row.rabiSuitable,
    zaidSuitable: row.zaidSuitable,
    climateRiskLevel: row.climateRiskLevel,
    soilHealthNotes: soil.notes
  };
  if (potentialYield !== undefined && potentialYield > 0) {
    const attainable = (potentialYield * score) / 100;
    scored.expectedYieldMin = round2(attainable * 0.7);
    scored.expectedYieldExpected = round2(attainable * 0.85);
    scored.expectedYieldMax = round2(attainable);
  }
  return scored;
}

export function scoreCrops(rows: readonly CropSuitabilityRow[], options: ScoringOptions = {}): ScoredCrop[] {
  const scored: ScoredCrop[] = [];
  for (const row of rows) {
    if (!fitsSeason(row, options.season)) continue;
    const crop = scoreCrop(row, options);
    if (crop.overallScore < MIN_SUITABILITY_THRESHOLD) {
      log.debug('dropping crop below threshold', { cropCode: crop.cropCode, score: crop.overallScore });
      continue;
    }
    scored.push(crop);
  }
  return scored.sort((a, b) => b.overallScore - a.overallScore);
}
