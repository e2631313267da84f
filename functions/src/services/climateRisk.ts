import { z } from 'zod';
import profileData from '../data/climateProfiles.json';
import { ClimateRiskLevel } from '../types';
import { isLegume } from './cropFamily';
import { clampScore } from './suitability';
import { createLogger } from '../utils/logger';

const log = createLogger('Climate Risk');

const SensitivitySchema = z.enum(['LOW', 'MODERATE', 'HIGH']);

const ClimateProfileSchema = z.object({
  rainfallMinMm: z.number(),
  rainfallMaxMm: z.number(),
  tempMinC: z.number(),
  tempMaxC: z.number(),
  heatStressThreshold: z.number(),
  coldStressThreshold: z.number(),
  droughtSensitivity: SensitivitySchema,
  floodSensitivity: SensitivitySchema,
  mitigations: z.array(z.string()),
  resilientVarieties: z.array(z.string()).min(1),
  keyRisks: z.array(z.string()),
  optimalPlantingWindow: z.string()
});

export type Sensitivity = z.infer<typeof SensitivitySchema>;
export type ClimateProfile = z.infer<typeof ClimateProfileSchema>;

const profiles = z
  .object({ default: ClimateProfileSchema, crops: z.record(z.string(), ClimateProfileSchema) })
  .parse(profileData);

export const DEFICIT_THRESHOLD = -20;
export const EXCESS_THRESHOLD = 20;
const MAX_STRESS_DAYS = 30;

export type RainfallScenarioType = 'DEFICIT' | 'EXCESS' | 'NORMAL';
export type StressLevel = 'LOW' | 'MEDIUM' | 'HIGH';
export type HazardRisk = 'LOW' | 'MODERATE' | 'HIGH' | 'SEVERE';

export type RainfallScenario = {
  type: RainfallScenarioType;
  deviationPercent: number;
  historicalAverageMm: number;
  projectedRainfallMm: number;
  yieldImpactPercent: number;
  probabilityPercent: number;
  riskLevel: StressLevel;
  description: string;
};

export type TemperatureStress = {
  heatStressDays: number;
  coldStressDays: number;
  level: StressLevel;
};

export type ClimateRiskAssessment = {
  cropCode: string;
  riskLevel: ClimateRiskLevel;
  riskScore: number;
  rainfallScenario: RainfallScenario;
  temperatureStress: TemperatureStress;
  droughtRisk: HazardRisk;
  floodRisk: HazardRisk;
  mitigationStrategies: string[];
  resilientVarieties: string[];
  keyRisks: string[];
  optimalPlantingWindow: string;
  insuranceRecommended: boolean;
};

const RISK_SCORE_ADJUSTMENT: Record<ClimateRiskLevel, number> = {
  LOW: 0,
  MEDIUM: -3,
  HIGH: -7,
  VERY_HIGH: -12
};

const FALLBACK_MITIGATION = 'Monitor local weather advisories and follow the recommended package of practices';

export function getClimateProfile(cropCode: string): ClimateProfile {
  const code = cropCode.trim().toUpperCase();
  const own = profiles.crops[code];
  if (own) return own;
  // pulses share one profile; soybean and groundnut carry their own
  if (isLegume(code)) return profiles.crops.PULSES ?? profiles.default;
  return profiles.default;
}

export function classifyRainfall(deviationPercent: number, profile: ClimateProfile): RainfallScenario {
  const historicalAverageMm = (profile.rainfallMinMm + profile.rainfallMaxMm) / 2;
  const projectedRainfallMm = Math.round(historicalAverageMm * (1 + deviationPercent / 100));
  if (deviationPercent <= DEFICIT_THRESHOLD) {
    return {
      type: 'DEFICIT',
      deviationPercent,
      historicalAverageMm,
      projectedRainfallMm,
      yieldImpactPercent: deviationPercent * 0.5,
      probabilityPercent: 25,
      riskLevel: deviationPercent < -30 ? 'HIGH' : 'MEDIUM',
      description: `Rainfall deficit of ${Math.abs(deviationPercent)}% expected`
    };
  }
  if (deviationPercent >= EXCESS_THRESHOLD) {
    return {
      type: 'EXCESS',
      deviationPercent,
      historicalAverageMm,
      projectedRainfallMm,
      yieldImpactPercent: -deviationPercent * 0.3,
      probabilityPercent: 20,
      riskLevel: deviationPercent > 30 ? 'HIGH' : 'MEDIUM',
      description: `Excess rainfall of ${deviationPercent}% expected`
    };
  }
  return {
    type: 'NORMAL',
    deviationPercent,
    historicalAverageMm,
    projectedRainfallMm,
    yieldImpactPercent: 0,
    probabilityPercent: 55,
    riskLevel: 'LOW',
    description: 'Near-normal rainfall expected'
  };
}

export function temperatureStress(tempDeviation: number, profile: ClimateProfile): TemperatureStress {
  const heatExcess = profile.tempMaxC + tempDeviation - profile.heatStressThreshold;
  const coldExcess = profile.coldStressThreshold - (profile.tempMinC + tempDeviation);
  const heatStressDays = heatExcess > 0 ? Math.min(MAX_STRESS_DAYS, Math.round(heatExcess * 5)) : 0;
  const coldStressDays = coldExcess > 0 ? Math.min(MAX_STRESS_DAYS, Math.round(coldExcess * 3)) : 0;
  let level: StressLevel = 'LOW';
  if (heatStressDays > 10 || coldStressDays > 10) level = 'HIGH';
  else if (heatStressDays > 5 || coldStressDays > 5) level = 'MEDIUM';
  return { heatStressDays, coldStressDays, level };
}

function escalate(sensitivity: Sensitivity): HazardRisk {
  if (sensitivity === 'HIGH') return 'SEVERE';
  if (sensitivity === 'MODERATE') return 'HIGH';
  return 'MODERATE';
}

function sensitivityPoints(sensitivity: Sensitivity): number {
  if (sensitivity === 'HIGH') return 15;
  if (sensitivity === 'MODERATE') return 8;
  return 0;
}

export function riskLevelFor(score: number): ClimateRiskLevel {
  if (score >= 60) return 'VERY_HIGH';
  if (score >= 40) return 'HIGH';
  if (score >= 20) return 'MEDIUM';
  return 'LOW';
}

function mitigationsFor(
  level: ClimateRiskLevel,
  scenario: RainfallScenario,
  stress: TemperatureStress,
  profile: ClimateProfile
): string[] {
  const out = new Set<string>();
  if (level === 'HIGH' || level === 'VERY_HIGH') {
    out.add('Consider climate-resilient varieties');
    out.add('Implement soil moisture conservation techniques');
    out.add('Monitor weather forecasts closely');
  }
  if (scenario.type === 'DEFICIT') {
    out.add('Use drought-tolerant varieties');
    out.add('Apply mulching to conserve soil moisture');
    out.add('Consider supplemental irrigation if available');
    out.add('Adjust planting dates to avoid dry periods');
  } else if (scenario.type === 'EXCESS') {
    out.add('Ensure proper drainage');
    out.add('Use raised bed planting');
    out.add('Avoid waterlogging-sensitive varieties');
  }
  if (stress.heatStressDays > 5) {
    out.add('Apply foliar sprays (potassium nitrate) during heat spells');
    out.add('Choose heat-tolerant varieties');
    out.add('Irrigate during heat waves to cool the canopy');
  }
  if (profile.droughtSensitivity === 'HIGH') {
    profile.mitigations.forEach((m) => out.add(m));
  }
  if (out.size === 0) {
    profile.mitigations.forEach((m) => out.add(m));
  }
  if (out.size === 0) out.add(FALLBACK_MITIGATION);
  return [...out];
}

export function analyzeClimateRisk(
  cropCode: string,
  rainfallDeviationPercent: number,
  temperatureDeviation = 0
): ClimateRiskAssessment {
  const profile = getClimateProfile(cropCode);
  const rainfallScenario = classifyRainfall(rainfallDeviationPercent, profile);
  const stress = temperatureStress(temperatureDeviation, profile);

  let riskScore = 0;
  if (rainfallScenario.riskLevel === 'HIGH') riskScore += 30;
  else if (rainfallScenario.riskLevel === 'MEDIUM') riskScore += 15;
  if (stress.level === 'HIGH') riskScore += 25;
  else if (stress.level === 'MEDIUM') riskScore += 12;
  riskScore += sensitivityPoints(profile.droughtSensitivity);
  riskScore += sensitivityPoints(profile.floodSensitivity);
  riskScore = Math.min(100, riskScore);

  const riskLevel = riskLevelFor(riskScore);
  const droughtRisk: HazardRisk =
    rainfallScenario.type === 'DEFICIT' ? escalate(profile.droughtSensitivity) : profile.droughtSensitivity;
  const floodRisk: HazardRisk =
    rainfallScenario.type === 'EXCESS' ? escalate(profile.floodSensitivity) : profile.floodSensitivity;

  return {
    cropCode,
    riskLevel,
    riskScore,
    rainfallScenario,
    temperatureStress: stress,
    droughtRisk,
    floodRisk,
    mitigationStrategies: mitigationsFor(riskLevel, rainfallScenario, stress, profile),
    resilientVarieties: [...profile.resilientVarieties],
    keyRisks: [...profile.keyRisks],
    optimalPlantingWindow: profile.optimalPlantingWindow,
    insuranceRecommended: riskLevel === 'HIGH' || riskLevel === 'VERY_HIGH'
  };
}

export function climateAdjustedScore(baseScore: number, assessment: ClimateRiskAssessment | null | undefined): number {
  if (!assessment) return baseScore;
  return clampScore(baseScore + RISK_SCORE_ADJUSTMENT[assessment.riskLevel]);
}

export function analyzeClimateRiskBatch(
  cropCodes: readonly string[],
  rainfallDeviationPercent: number,
  temperatureDeviation = 0
): Record<string, ClimateRiskAssessment> {
  const out: Record<string, ClimateRiskAssessment> = {};
  for (const code of cropCodes) {
    out[code] = analyzeClimateRisk(code, rainfallDeviationPercent, temperatureDeviation);
  }
  return out;
}

export function flagHighRiskCrops(assessments: Record<string, ClimateRiskAssessment>): string[] {
  const flagged = Object.entries(assessments)
    .filter(([, a]) => a.riskLevel === 'HIGH' || a.riskLevel === 'VERY_HIGH')
    .map(([code]) => code);
  if (flagged.length) log.info('high risk crops flagged', { crops: flagged });
  return flagged;
}
