import {
  ApplicationRecord,
  FertilizerRecommendation,
  SoilHealthSnapshot
} from '../types';
import { isLegume } from './cropFamily';
import { round2, SOIL_TARGETS } from './suitability';
import { ValidationError } from '../utils/errors';

export type NutrientRequirement = {
  nitrogenKg: number;
  phosphorusKg: number;
  potassiumKg: number;
};

// kg of nutrient per acre
const REQUIREMENTS_PER_ACRE: Record<string, NutrientRequirement> = {
  RICE: { nitrogenKg: 60, phosphorusKg: 30, potassiumKg: 30 },
  WHEAT: { nitrogenKg: 80, phosphorusKg: 40, potassiumKg: 30 },
  COTTON: { nitrogenKg: 100, phosphorusKg: 50, potassiumKg: 50 },
  SOYBEAN: { nitrogenKg: 20, phosphorusKg: 60, potassiumKg: 20 },
  GROUNDNUT: { nitrogenKg: 20, phosphorusKg: 40, potassiumKg: 40 },
  MUSTARD: { nitrogenKg: 40, phosphorusKg: 20, potassiumKg: 20 },
  PULSES: { nitrogenKg: 15, phosphorusKg: 40, potassiumKg: 20 },
  MAIZE: { nitrogenKg: 80, phosphorusKg: 40, potassiumKg: 30 },
  SUGARCANE: { nitrogenKg: 150, phosphorusKg: 50, potassiumKg: 100 },
  POTATO: { nitrogenKg: 100, phosphorusKg: 60, potassiumKg: 100 },
  ONION: { nitrogenKg: 80, phosphorusKg: 40, potassiumKg: 60 },
  TOMATO: { nitrogenKg: 100, phosphorusKg: 50, potassiumKg: 50 }
};

const DEFAULT_REQUIREMENT: NutrientRequirement = { nitrogenKg: 50, phosphorusKg: 25, potassiumKg: 25 };

export type FertilizerComposition = {
  nitrogenPercent: number;
  phosphorusPercent: number;
  potassiumPercent: number;
  sulfurPercent?: number;
  zincPercent?: number;
};

export const FERTILIZER_COMPOSITION: Record<string, FertilizerComposition> = {
  UREA: { nitrogenPercent: 46, phosphorusPercent: 0, potassiumPercent: 0 },
  DAP: { nitrogenPercent: 18, phosphorusPercent: 46, potassiumPercent: 0 },
  MOP: { nitrogenPercent: 0, phosphorusPercent: 0, potassiumPercent: 60 },
  SSP: { nitrogenPercent: 0, phosphorusPercent: 16, potassiumPercent: 0, sulfurPercent: 11 },
  NPK: { nitrogenPercent: 10, phosphorusPercent: 26, potassiumPercent: 26 },
  ZINC_SULFATE: { nitrogenPercent: 0, phosphorusPercent: 0, potassiumPercent: 0, sulfurPercent: 15, zincPercent: 21 }
};

// INR per kg
export const FERTILIZER_PRICES: Record<string, number> = {
  UREA: 6,
  DAP: 27,
  MOP: 18,
  SSP: 12,
  NPK: 25,
  ZINC_SULFATE: 80,
  VERMICOMPOST: 8,
  FYM: 2,
  GREEN_MANURE: 3,
  BIOFERTILIZER: 150
};

const KG_HA_PER_KG_ACRE = 2.47;
const ZINC_SULFATE_KG_PER_ACRE = 10;

export type DeficientNutrient = 'NITROGEN' | 'PHOSPHORUS' | 'POTASSIUM' | 'ZINC';

export type NutrientDeficiency = {
  nutrient: DeficientNutrient;
  currentValue: number;
  targetValue: number;
  deficit: number;
  unit: 'kg/ha' | 'ppm';
  recommendation: string;
};

export type OrganicCategory = 'VERMICOMPOST' | 'FYM' | 'GREEN_MANURE' | 'BIOFERTILIZER';

export type OrganicAlternative = {
  category: OrganicCategory;
  name: string;
  quantityKgPerAcre: number;
  totalQuantityKg: number;
  costPerAcre: number;
  totalCost: number;
  applicationMethod: string;
  benefits: string[];
};

export type ScheduleEntry = {
  name: string;
  stage: string;
  date: string;
  daysAfterSowing: number;
  description: string;
  fertilizers: { fertilizerType: string; quantityKgPerAcre: number }[];
};

export type FertilizerPlanRequest = {
  cropCode: string;
  areaAcres: number;
  soilHealth?: SoilHealthSnapshot | null;
  sowingDate?: string;
  includeOrganicAlternatives?: boolean;
  includeSchedule?: boolean;
};

export type FertilizerPlan = {
  cropCode: string;
  areaAcres: number;
  requirementPerAcre: NutrientRequirement;
  totalRequirement: NutrientRequirement;
  deficiencies: NutrientDeficiency[];
  recommendations: FertilizerRecommendation[];
  organicAlternatives?: OrganicAlternative[];
  schedule?: ScheduleEntry[];
  costPerAcre: number;
  totalCost: number;
};

function round1(value: number): number {
  return Math.round(value * 10) / 10;
}

export function baseRequirement(cropCode: string): NutrientRequirement {
  const code = cropCode.trim().toUpperCase();
  const own = REQUIREMENTS_PER_ACRE[code];
  if (own) return { ...own };
  if (isLegume(code)) return { ...REQUIREMENTS_PER_ACRE.PULSES };
  return { ...DEFAULT_REQUIREMENT };
}

export function detectDeficiencies(soil?: SoilHealthSnapshot | null): NutrientDeficiency[] {
  if (!soil) return [];
  const out: NutrientDeficiency[] = [];
  const check = (
    nutrient: DeficientNutrient,
    value: number | undefined,
    target: number,
    unit: NutrientDeficiency['unit'],
    recommendation: string
  ) => {
    if (value === undefined) return;
    const deficit = Math.max(0, target - value);
    if (deficit > 0) {
      out.push({ nutrient, currentValue: value, targetValue: target, deficit: round2(deficit), unit, recommendation });
    }
  };
  check('NITROGEN', soil.nitrogenKgHa, SOIL_TARGETS.nitrogenKgHa, 'kg/ha', 'Increase nitrogen dose in split applications');
  check('PHOSPHORUS', soil.phosphorusKgHa, SOIL_TARGETS.phosphorusKgHa, 'kg/ha', 'Apply full phosphorus dose as basal');
  check('POTASSIUM', soil.potassiumKgHa, SOIL_TARGETS.potassiumKgHa, 'kg/ha', 'Apply potash in two splits');
  check(
    'ZINC',
    soil.zincPpm,
    SOIL_TARGETS.zincPpm,
    'ppm',
    `Apply zinc sulfate @ ${ZINC_SULFATE_KG_PER_ACRE} kg/acre`
  );
  return out;
}

export function calculateNutrientRequirement(
  cropCode: string,
  soil?: SoilHealthSnapshot | null
): { perAcre: NutrientRequirement; deficiencies: NutrientDeficiency[] } {
  const perAcre = baseRequirement(cropCode);
  const deficiencies = detectDeficiencies(soil);
  for (const d of deficiencies) {
    const extra = d.deficit / KG_HA_PER_KG_ACRE;
    if (d.nutrient === 'NITROGEN') perAcre.nitrogenKg = round2(perAcre.nitrogenKg + extra);
    if (d.nutrient === 'PHOSPHORUS') perAcre.phosphorusKg = round2(perAcre.phosphorusKg + extra);
    if (d.nutrient === 'POTASSIUM') perAcre.potassiumKg = round2(perAcre.potassiumKg + extra);
  }
  return { perAcre, deficiencies };
}

function product(
  fertilizerType: string,
  quantityKgPerAcre: number,
  areaAcres: number,
  fields: Pick<FertilizerRecommendation, 'category' | 'applicationTiming' | 'applicationStage' | 'nutrientContent' | 'notes'>
): FertilizerRecommendation {
  const price = FERTILIZER_PRICES[fertilizerType] ?? 0;
  return {
    fertilizerType,
    quantityKgPerAcre,
    totalQuantityKg: round2(quantityKgPerAcre * areaAcres),
    costPerAcre: round2(quantityKgPerAcre * price),
    ...fields
  };
}

export function recommendProducts(
  perAcre: NutrientRequirement,
  deficiencies: readonly NutrientDeficiency[],
  areaAcres: number
): FertilizerRecommendation[] {
  const out: FertilizerRecommendation[] = [];
  const dapQty = round1(perAcre.phosphorusKg / 0.46);
  const nFromDap = dapQty * 0.18;
  const ureaQty = round1(Math.max(0, perAcre.nitrogenKg - nFromDap) / 0.46);
  const mopQty = round1(perAcre.potassiumKg / 0.6);

  if (dapQty > 0) {
    out.push(
      product('DAP', dapQty, areaAcres, {
        category: 'CHEMICAL',
        applicationTiming: 'Basal application',
        applicationStage: 'At sowing',
        nutrientContent: '18% N, 46% P2O5'
      })
    );
  }
  if (ureaQty > 0) {
    out.push(
      product('UREA', ureaQty, areaAcres, {
        category: 'CHEMICAL',
        applicationTiming: 'Split application - basal and top dressing',
        applicationStage: 'Basal at sowing, Top dressing at tillering',
        nutrientContent: '46% N'
      })
    );
  }
  if (mopQty > 0) {
    out.push(
      product('MOP', mopQty, areaAcres, {
        category: 'CHEMICAL',
        applicationTiming: 'Split application',
        applicationStage: 'Basal and at flowering',
        nutrientContent: '60% K2O'
      })
    );
  }
  if (deficiencies.some((d) => d.nutrient === 'ZINC')) {
    out.push(
      product('ZINC_SULFATE', ZINC_SULFATE_KG_PER_ACRE, areaAcres, {
        category: 'MICRONUTRIENT',
        applicationTiming: 'Basal application',
        applicationStage: 'At sowing',
        nutrientContent: '21% Zn, 15% S',
        notes: 'Do not mix with phosphatic fertilizers'
      })
    );
  }
  return out;
}

const ORGANIC_PER_ACRE: Record<OrganicCategory, Omit<OrganicAlternative, 'totalQuantityKg' | 'totalCost'>> = {
  VERMICOMPOST: {
    category: 'VERMICOMPOST',
    name: 'Vermicompost',
    quantityKgPerAcre: 2000,
    costPerAcre: 16000,
    applicationMethod: 'Broadcast and incorporate 2-3 weeks before sowing',
    benefits: ['Improves soil structure', 'Slow release of nutrients', 'Enhances microbial activity']
  },
  FYM: {
    category: 'FYM',
    name: 'Farm Yard Manure',
    quantityKgPerAcre: 5000,
    costPerAcre: 10000,
    applicationMethod: 'Apply well-decomposed FYM during land preparation',
    benefits: ['Adds organic matter', 'Improves water holding capacity', 'Supplies secondary and micronutrients']
  },
  GREEN_MANURE: {
    category: 'GREEN_MANURE',
    name: 'Green Manure (Dhaincha/Sunhemp seed)',
    quantityKgPerAcre: 20,
    costPerAcre: 600,
    applicationMethod: 'Sow, grow for 45-50 days and incorporate at flowering',
    benefits: ['Fixes 40-60 kg N/ha', 'Suppresses weeds', 'Adds fresh organic matter']
  },
  BIOFERTILIZER: {
    category: 'BIOFERTILIZER',
    name: 'Biofertilizer (Azotobacter/PSB consortium)',
    quantityKgPerAcre: 2,
    costPerAcre: 300,
    applicationMethod: 'Seed treatment or soil application mixed with FYM',
    benefits: ['Fixes atmospheric nitrogen', 'Solubilizes soil phosphorus', 'Low cost input']
  }
};

export function organicAlternatives(areaAcres: number): OrganicAlternative[] {
  return Object.values(ORGANIC_PER_ACRE).map((o) => ({
    ...o,
    benefits: [...o.benefits],
    totalQuantityKg: round2(o.quantityKgPerAcre * areaAcres),
    totalCost: round2(o.costPerAcre * areaAcres)
  }));
}

function parseSowingDate(sowingDate?: string): Date {
  const date = sowingDate ? new Date(sowingDate) : new Date();
  if (Number.isNaN(date.getTime())) throw new ValidationError(`Invalid sowing date: ${sowingDate}`);
  return date;
}

function addDays(date: Date, days: number): string {
  const d = new Date(date.getTime());
  d.setUTCDate(d.getUTCDate() + days);
  return d.toISOString().slice(0, 10);
}

export function splitSchedule(
  recommendations: readonly FertilizerRecommendation[],
  sowingDate?: string
): ScheduleEntry[] {
  const sowing = parseSowingDate(sowingDate);
  const qty = (type: string) => recommendations.find((r) => r.fertilizerType === type)?.quantityKgPerAcre ?? 0;
  const dap = qty('DAP');
  const urea = qty('UREA');
  const mop = qty('MOP');
  const zinc = qty('ZINC_SULFATE');

  const basal: ScheduleEntry['fertilizers'] = [];
  if (dap > 0) basal.push({ fertilizerType: 'DAP', quantityKgPerAcre: dap });
  if (urea > 0) basal.push({ fertilizerType: 'UREA', quantityKgPerAcre: round1(urea / 2) });
  if (mop > 0) basal.push({ fertilizerType: 'MOP', quantityKgPerAcre: round1(mop / 2) });
  if (zinc > 0) basal.push({ fertilizerType: 'ZINC_SULFATE', quantityKgPerAcre: zinc });

  const first: ScheduleEntry['fertilizers'] =
    urea > 0 ? [{ fertilizerType: 'UREA', quantityKgPerAcre: round1(urea - round1(urea / 2)) }] : [];
  const second: ScheduleEntry['fertilizers'] =
    mop > 0 ? [{ fertilizerType: 'MOP', quantityKgPerAcre: round1(mop - round1(mop / 2)) }] : [];

  const entries: ScheduleEntry[] = [];
  if (basal.length) {
    entries.push({
      name: 'Basal Dose',
      stage: 'Sowing',
      date: addDays(sowing, 0),
      daysAfterSowing: 0,
      description: 'Apply full phosphorus, half nitrogen and half potash at sowing',
      fertilizers: basal
    });
  }
  if (first.length) {
    entries.push({
      name: 'First Top Dressing',
      stage: 'Tillering',
      date: addDays(sowing, 25),
      daysAfterSowing: 25,
      description: 'Top dress remaining nitrogen at tillering',
      fertilizers: first
    });
  }
  if (second.length) {
    entries.push({
      name: 'Second Top Dressing',
      stage: 'Flowering',
      date: addDays(sowing, 45),
      daysAfterSowing: 45,
      description: 'Top dress remaining potash at flowering',
      fertilizers: second
    });
  }
  return entries;
}

export function recommendFertilizer(request: FertilizerPlanRequest): FertilizerPlan {
  if (!(request.areaAcres > 0)) throw new ValidationError('areaAcres must be positive');
  const { perAcre, deficiencies } = calculateNutrientRequirement(request.cropCode, request.soilHealth);
  const recommendations = recommendProducts(perAcre, deficiencies, request.areaAcres);
  const costPerAcre = round2(recommendations.reduce((sum, r) => sum + r.costPerAcre, 0));
  const plan: FertilizerPlan = {
    cropCode: request.cropCode,
    areaAcres: request.areaAcres,
    requirementPerAcre: perAcre,
    totalRequirement: {
      nitrogenKg: round2(perAcre.nitrogenKg * request.areaAcres),
      phosphorusKg: round2(perAcre.phosphorusKg * request.areaAcres),
      potassiumKg: round2(perAcre.potassiumKg * request.areaAcres)
    },
    deficiencies,
    recommendations,
    costPerAcre,
    totalCost: Math.max(0, round2(costPerAcre * request.areaAcres))
  };
  if (request.includeOrganicAlternatives) plan.organicAlternatives = organicAlternatives(request.areaAcres);
  if (request.includeSchedule) plan.schedule = splitSchedule(recommendations, request.sowingDate);
  return plan;
}

export function estimateInputCostPerAcre(cropCode: string, soil?: SoilHealthSnapshot | null): number {
  const { perAcre, deficiencies } = calculateNutrientRequirement(cropCode, soil);
  return round2(recommendProducts(perAcre, deficiencies, 1).reduce((sum, r) => sum + r.costPerAcre, 0));
}

export type ApplicationTracking = {
  applications: ApplicationRecord[];
  totalNitrogenKg: number;
  totalPhosphorusKg: number;
  totalPotassiumKg: number;
  totalSulfurKg: number;
  totalZincKg: number;
  totalQuantityKg: number;
  totalCost: number;
  costPerKgNutrient: number;
  firstApplicationDate?: string;
  lastApplicationDate?: string;
};

export function trackApplications(log: readonly ApplicationRecord[] | null | undefined): ApplicationTracking {
  const applications = [...(log ?? [])].sort(
    (a, b) => new Date(a.applicationDate).getTime() - new Date(b.applicationDate).getTime()
  );
  let n = 0;
  let p = 0;
  let k = 0;
  let s = 0;
  let zn = 0;
  let quantity = 0;
  let cost = 0;
  for (const a of applications) {
    n += (a.quantityKg * (a.nitrogenPercent ?? 0)) / 100;
    p += (a.quantityKg * (a.phosphorusPercent ?? 0)) / 100;
    k += (a.quantityKg * (a.potassiumPercent ?? 0)) / 100;
    s += (a.quantityKg * (a.sulfurPercent ?? 0)) / 100;
    zn += (a.quantityKg * (a.zincPercent ?? 0)) / 100;
    quantity += a.quantityKg;
    cost += a.cost ?? 0;
  }
  const nutrients = n + p + k;
  return {
    applications,
    totalNitrogenKg: round2(n),
    totalPhosphorusKg: round2(p),
    totalPotassiumKg: round2(k),
    totalSulfurKg: round2(s),
    totalZincKg: round2(zn),
    totalQuantityKg: round2(quantity),
    totalCost: round2(cost),
    costPerKgNutrient: nutrients > 0 ? round2(cost / nutrients) : 0,
    firstApplicationDate: applications[0]?.applicationDate,
    lastApplicationDate: applications[applications.length - 1]?.applicationDate
  };
}

export type BalanceStatus = 'UNDER' | 'ADEQUATE' | 'OVER';

export type NutrientBalance = {
  nutrient: 'NITROGEN' | 'PHOSPHORUS' | 'POTASSIUM';
  appliedKg: number;
  requiredKg: number;
  percentOfRequirement: number;
  status: BalanceStatus;
};

export function assessApplicationBalance(
  tracking: ApplicationTracking,
  required: NutrientRequirement
): NutrientBalance[] {
  const rows: [NutrientBalance['nutrient'], number, number][] = [
    ['NITROGEN', tracking.totalNitrogenKg, required.nitrogenKg],
    ['PHOSPHORUS', tracking.totalPhosphorusKg, required.phosphorusKg],
    ['POTASSIUM', tracking.totalPotassiumKg, required.potassiumKg]
  ];
  return rows.map(([nutrient, appliedKg, requiredKg]) => {
    const percent = requiredKg > 0 ? round2((appliedKg / requiredKg) * 100) : appliedKg > 0 ? 100 : 0;
    let status: BalanceStatus = 'ADEQUATE';
    if (requiredKg > 0 && percent < 90) status = 'UNDER';
    else if (percent > 120) status = 'OVER';
    return { nutrient, appliedKg, requiredKg, percentOfRequirement: percent, status };
  });
}

/** Fills nutrient percentages the farmer left out from the product's standard grade. */
export function withStandardComposition(record: ApplicationRecord): ApplicationRecord {
  const grade = FERTILIZER_COMPOSITION[record.fertilizerType.trim().toUpperCase().replace(/\s+/g, '_')];
  if (!grade) return { ...record };
  return {
    ...record,
    nitrogenPercent: record.nitrogenPercent ?? grade.nitrogenPercent,
    phosphorusPercent: record.phosphorusPercent ?? grade.phosphorusPercent,
    potassiumPercent: record.potassiumPercent ?? grade.potassiumPercent,
    sulfurPercent: record.sulfurPercent ?? grade.sulfurPercent,
    zincPercent: record.zincPercent ?? grade.zincPercent
  };
}
