export type Season = 'KHARIF' | 'RABI' | 'ZAID' | 'ALL';

export type IrrigationType = 'RAINFED' | 'DRIP' | 'SPRINKLER' | 'CANAL' | 'BOREWELL' | 'MIXED';

export type SuitabilityClassification =
  | 'HIGHLY_SUITABLE'
  | 'SUITABLE'
  | 'MARGINALLY_SUITABLE'
  | 'NOT_SUITABLE';

export type ClimateRiskLevel = 'LOW' | 'MEDIUM' | 'HIGH' | 'VERY_HIGH';

export type RootDepth = 'SHALLOW' | 'MEDIUM' | 'DEEP';

export type CropFamily =
  | 'CEREALS'
  | 'LEGUMES'
  | 'BRASSICAS'
  | 'SOLANACEOUS'
  | 'CUCURBITS'
  | 'ROOT_TUBERS'
  | 'FIBER'
  | 'OILSEEDS'
  | 'SPICES'
  | 'FRUITS'
  | 'GREEN_MANURE'
  | 'FODDER'
  | 'OTHER';

export type ZoneReference = {
  code: string;
  name: string;
  description?: string;
  climateType?: string;
  soilTypes?: string[];
  annualRainfallMm?: [number, number];
  kharifSuitability?: string;
  rabiSuitability?: string;
  zaidSuitability?: string;
  latitudeRange?: [number, number];
  longitudeRange?: [number, number];
};

export type DistrictZoneMapping = {
  district: string;
  state: string;
  zoneCode: string;
  lat?: number;
  lon?: number;
};

export type CropSuitabilityRow = {
  zoneCode: string;
  cropCode: string;
  cropName: string;
  cropNameLocal?: string;
  climateScore: number;
  soilScore: number;
  terrainScore: number;
  waterScore: number;
  overallScore: number;
  classification: SuitabilityClassification;
  rainfedPotentialYield?: number; // kg/ha
  irrigatedPotentialYield?: number; // kg/ha
  waterRequirementMm?: number;
  growingSeasonDays?: number;
  kharifSuitable: boolean;
  rabiSuitable: boolean;
  zaidSuitable: boolean;
  climateRiskLevel?: ClimateRiskLevel;
};

export type SoilHealthSnapshot = {
  farmerId?: string;
  sampleDate?: string;
  nitrogenKgHa?: number;
  phosphorusKgHa?: number;
  potassiumKgHa?: number;
  zincPpm?: number;
  ph?: number;
  sulfurPpm?: number;
  organicCarbonPercent?: number;
};

export type MarketTrend = 'UP' | 'DOWN' | 'STABLE';

export type MarketRecommendation = 'SELL_NOW' | 'HOLD' | 'MONITOR' | 'CONSIDER_STORAGE';

export type MarketSnapshot = {
  cropCode: string;
  cropName?: string;
  state?: string;
  currentPrice: number; // INR/quintal
  minPrice: number;
  maxPrice: number;
  msp?: number;
  trend: MarketTrend;
  priceChange30Days?: number; // percent
};

export type SeedVariety = {
  cropCode: string;
  state?: string;
  name: string;
  characteristics: string;
  diseaseResistance: string;
  seedCostPerKg: number;
  maturityDays: number;
};

export type CropHistoryEntry = {
  cropName: string;
  sowingDate: string; // ISO date
  season?: Season;
  areaAcres?: number;
};

export type NutrientDepletionRisk = {
  family: CropFamily;
  familyName: string;
  consecutiveSeasons: number;
  severityScore: number;
  riskLevel: 'MEDIUM' | 'HIGH' | 'CRITICAL';
  affectedNutrients: string[];
  recommendation: string;
};

export type RotationOption = {
  id: string;
  cropSequence: string;
  description: string;
  soilHealthBenefit?: number;
  climateResilience?: number;
  economicViability?: number;
  nutrientCyclingScore?: number;
  pestManagementScore?: number;
  waterUsageScore?: number;
  overallBenefitScore: number;
  benefits: string[];
  considerations: string[];
  residueManagementRecommendation?: string;
  organicMatterImpact?: string;
  kharifCrops?: string;
  rabiCrops?: string;
  zaidCrops?: string;
};

export type FertilizerCategory = 'CHEMICAL' | 'MICRONUTRIENT' | 'ORGANIC' | 'BIOFERTILIZER';

export type FertilizerRecommendation = {
  fertilizerType: string;
  category: FertilizerCategory;
  quantityKgPerAcre: number;
  totalQuantityKg: number;
  costPerAcre: number;
  applicationTiming: string;
  applicationStage: string;
  nutrientContent: string;
  notes?: string;
};

export type ApplicationRecord = {
  cropId: string;
  fertilizerType: string;
  applicationDate: string; // ISO date
  quantityKg: number;
  cost?: number;
  nitrogenPercent?: number;
  phosphorusPercent?: number;
  potassiumPercent?: number;
  sulfurPercent?: number;
  zincPercent?: number;
};
