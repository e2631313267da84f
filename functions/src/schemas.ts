import { z } from 'zod';
import {
  ApplicationRecord,
  CropHistoryEntry,
  CropSuitabilityRow,
  DistrictZoneMapping,
  SeedVariety,
  SoilHealthSnapshot,
  ZoneReference
} from './types';

const score = z.number().min(0).max(100);
const range = z.tuple([z.number(), z.number()]);

export const SeasonSchema = z.enum(['KHARIF', 'RABI', 'ZAID', 'ALL']);
export const IrrigationTypeSchema = z.enum(['RAINFED', 'DRIP', 'SPRINKLER', 'CANAL', 'BOREWELL', 'MIXED']);
export const ClimateRiskLevelSchema = z.enum(['LOW', 'MEDIUM', 'HIGH', 'VERY_HIGH']);

// Firestore documents

export const ZoneReferenceSchema: z.ZodType<ZoneReference, z.ZodTypeDef, unknown> = z.object({
  code: z.string().min(1),
  name: z.string().min(1),
  description: z.string().optional(),
  climateType: z.string().optional(),
  soilTypes: z.array(z.string()).optional(),
  annualRainfallMm: range.optional(),
  kharifSuitability: z.string().optional(),
  rabiSuitability: z.string().optional(),
  zaidSuitability: z.string().optional(),
  latitudeRange: range.optional(),
  longitudeRange: range.optional()
});

export const DistrictZoneMappingSchema: z.ZodType<DistrictZoneMapping, z.ZodTypeDef, unknown> = z.object({
  district: z.string().min(1),
  state: z.string().min(1),
  zoneCode: z.string().min(1),
  lat: z.number().optional(),
  lon: z.number().optional()
});

export const CropSuitabilityRowSchema: z.ZodType<CropSuitabilityRow, z.ZodTypeDef, unknown> = z.object({
  zoneCode: z.string().min(1),
  cropCode: z.string().min(1),
  cropName: z.string().min(1),
  cropNameLocal: z.string().optional(),
  climateScore: score,
  soilScore: score,
  terrainScore: score,
  waterScore: score,
  overallScore: score,
  classification: z.enum(['HIGHLY_SUITABLE', 'SUITABLE', 'MARGINALLY_SUITABLE', 'NOT_SUITABLE']),
  rainfedPotentialYield: z.number().nonnegative().optional(),
  irrigatedPotentialYield: z.number().nonnegative().optional(),
  waterRequirementMm: z.number().nonnegative().optional(),
  growingSeasonDays: z.number().int().positive().optional(),
  kharifSuitable: z.boolean().default(false),
  rabiSuitable: z.boolean().default(false),
  zaidSuitable: z.boolean().default(false),
  climateRiskLevel: ClimateRiskLevelSchema.optional()
});

export const SeedVarietySchema: z.ZodType<SeedVariety, z.ZodTypeDef, unknown> = z.object({
  cropCode: z.string().min(1),
  state: z.string().optional(),
  name: z.string().min(1),
  characteristics: z.string().min(1),
  diseaseResistance: z.string().min(1),
  seedCostPerKg: z.number().nonnegative(),
  maturityDays: z.number().int().positive()
});

export const SoilHealthSnapshotSchema: z.ZodType<SoilHealthSnapshot, z.ZodTypeDef, unknown> = z.object({
  farmerId: z.string().optional(),
  sampleDate: z.string().optional(),
  nitrogenKgHa: z.number().nonnegative().optional(),
  phosphorusKgHa: z.number().nonnegative().optional(),
  potassiumKgHa: z.number().nonnegative().optional(),
  zincPpm: z.number().nonnegative().optional(),
  ph: z.number().min(0).max(14).optional(),
  sulfurPpm: z.number().nonnegative().optional(),
  organicCarbonPercent: z.number().nonnegative().optional()
});

export const ApplicationRecordSchema: z.ZodType<ApplicationRecord, z.ZodTypeDef, unknown> = z.object({
  cropId: z.string().min(1),
  fertilizerType: z.string().min(1),
  applicationDate: z.string().refine((s) => !Number.isNaN(Date.parse(s)), { message: 'Invalid application date' }),
  quantityKg: z.number().nonnegative(),
  cost: z.number().nonnegative().optional(),
  nitrogenPercent: z.number().min(0).max(100).optional(),
  phosphorusPercent: z.number().min(0).max(100).optional(),
  potassiumPercent: z.number().min(0).max(100).optional(),
  sulfurPercent: z.number().min(0).max(100).optional(),
  zincPercent: z.number().min(0).max(100).optional()
});

export const CropHistoryEntrySchema: z.ZodType<CropHistoryEntry, z.ZodTypeDef, unknown> = z.object({
  cropName: z.string().min(1),
  sowingDate: z.string().min(1),
  season: SeasonSchema.optional(),
  areaAcres: z.number().positive().optional()
});

// Request bodies

export const RecommendCropBodySchema = z.object({
  zoneCode: z.string().min(1).optional(),
  district: z.string().optional(),
  state: z.string().optional(),
  latitude: z.number().optional(),
  longitude: z.number().optional(),
  farmerId: z.string().optional(),
  season: SeasonSchema.optional(),
  irrigationType: IrrigationTypeSchema.optional(),
  areaAcres: z.number().positive().optional(),
  soilHealth: SoilHealthSnapshotSchema.optional(),
  includeClimateRisk: z.boolean().optional(),
  includeMarketData: z.boolean().optional(),
  rainfallDeviation: z.number().optional(),
  temperatureDeviation: z.number().optional(),
  excludeCrops: z.array(z.string()).optional(),
  preferredCrops: z.array(z.string()).optional(),
  minScore: z.number().min(0).max(100).optional(),
  limit: z.number().int().positive().optional(),
  offset: z.number().int().nonnegative().optional()
});

export const ClimateRiskBodySchema = z.object({
  cropCodes: z.array(z.string().min(1)).min(1),
  rainfallDeviation: z.number(),
  temperatureDeviation: z.number().optional()
});

export const RotationBodySchema = z.object({
  history: z.array(CropHistoryEntrySchema).default([]),
  season: SeasonSchema.default('ALL'),
  zoneName: z.string().optional()
});

export const FertilizerBodySchema = z.object({
  cropCode: z.string().min(1),
  areaAcres: z.number().positive(),
  farmerId: z.string().optional(),
  soilHealth: SoilHealthSnapshotSchema.optional(),
  sowingDate: z.string().optional(),
  includeOrganicAlternatives: z.boolean().optional(),
  includeSchedule: z.boolean().optional()
});

export const DetectionsBodySchema = z.object({
  detections: z.array(
    z.object({
      diseaseName: z.string().min(1),
      confidence: z.number().min(0).max(1),
      severity: z.enum(['LOW', 'MEDIUM', 'HIGH', 'CRITICAL']).optional(),
      affectedCrop: z.string().optional(),
      treatment: z.string().optional()
    })
  ),
  threshold: z.number().min(0).max(1).optional()
});

export const SchemesBodySchema = z.object({
  schemes: z.array(
    z.object({
      schemeId: z.string().min(1),
      schemeName: z.string().min(1),
      eligibilityScore: score,
      benefits: z.string().optional(),
      reasons: z.array(z.string()).optional()
    })
  )
});

export const SearchBodySchema = z.object({
  results: z.array(
    z.object({
      id: z.string().min(1),
      title: z.string().min(1),
      similarityScore: z.number().min(0).max(1),
      snippet: z.string().optional()
    })
  ),
  minSimilarity: z.number().min(0).max(1).optional()
});
