import { z } from 'zod';
import cropFamilyData from '../data/cropFamilies.json';
import { CropFamily, RootDepth } from '../types';

const RootDepthSchema = z.enum(['SHALLOW', 'MEDIUM', 'DEEP']);
const CropFamilySchema = z.enum([
  'CEREALS',
  'LEGUMES',
  'BRASSICAS',
  'SOLANACEOUS',
  'CUCURBITS',
  'ROOT_TUBERS',
  'FIBER',
  'OILSEEDS',
  'SPICES',
  'FRUITS',
  'GREEN_MANURE',
  'FODDER',
  'OTHER'
]);

const FamilyProfileSchema = z.object({
  displayName: z.string(),
  rootDepth: RootDepthSchema,
  crops: z.array(z.string()),
  keywords: z.array(z.string()),
  affectedNutrients: z.array(z.string()).min(1),
  recommendation: z.string(),
  residueManagement: z.string(),
  organicMatterImpact: z.string(),
  soilHealthScore: z.number().min(0).max(100)
});

const CropFamilyTableSchema = z.object({
  families: z.record(CropFamilySchema, FamilyProfileSchema),
  rootDepthOverrides: z.record(z.string(), RootDepthSchema)
});

export type FamilyProfile = z.infer<typeof FamilyProfileSchema>;

export type ResolvedCrop = {
  cropName: string;
  normalizedName: string;
  family: CropFamily;
  rootDepth: RootDepth;
  /** false when the family came from a keyword guess or the OTHER fallback */
  exactMatch: boolean;
};

export const ROOT_DEPTH_IMPACT: Readonly<Record<RootDepth, { typicalDepthCm: number; impact: string }>> = {
  SHALLOW: { typicalDepthCm: 30, impact: 'Topsoil nutrient depletion risk' },
  MEDIUM: { typicalDepthCm: 60, impact: 'Balanced nutrient uptake' },
  DEEP: { typicalDepthCm: 120, impact: 'Nutrient cycling from deeper layers' }
};

const table = CropFamilyTableSchema.parse(cropFamilyData);

const FAMILY_ORDER: CropFamily[] = CropFamilySchema.options.filter((f) => f !== 'OTHER');

const OTHER_PROFILE: FamilyProfile = table.families.OTHER ?? {
  displayName: 'Other Crops',
  rootDepth: 'MEDIUM',
  crops: [],
  keywords: [],
  affectedNutrients: ['Nitrogen (N)', 'Phosphorus (P)', 'Potassium (K)'],
  recommendation: 'Rotate with a crop from a different family.',
  residueManagement: 'Incorporate crop residues into soil.',
  organicMatterImpact: 'Expected organic matter increase: 0.2-0.4% per season.',
  soilHealthScore: 65
};

const cropIndex = new Map<string, CropFamily>();
for (const family of FAMILY_ORDER) {
  for (const crop of table.families[family]?.crops ?? []) {
    cropIndex.set(normalizeCropName(crop), family);
  }
}
// longest names first so "sweet potato" wins over "potato"
const knownNames = [...cropIndex.keys()].sort((a, b) => b.length - a.length);

export function normalizeCropName(name: string): string {
  return name.trim().toLowerCase().replace(/\s+/g, ' ');
}

export function familyProfile(family: CropFamily): FamilyProfile {
  return table.families[family] ?? OTHER_PROFILE;
}

function escapeRegExp(s: string): string {
  return s.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

function guessFamily(normalized: string): CropFamily | undefined {
  for (const known of knownNames) {
    if (new RegExp(`\\b${escapeRegExp(known)}\\b`).test(normalized)) {
      return cropIndex.get(known);
    }
  }
  for (const family of FAMILY_ORDER) {
    const keywords = table.families[family]?.keywords ?? [];
    if (keywords.some((k) => normalized.includes(k))) return family;
  }
  return undefined;
}

export function resolveCrop(cropName: string): ResolvedCrop {
  const normalizedName = normalizeCropName(cropName);
  const exact = cropIndex.get(normalizedName);
  const family = exact ?? guessFamily(normalizedName) ?? 'OTHER';
  const rootDepth = table.rootDepthOverrides[normalizedName] ?? familyProfile(family).rootDepth;
  return { cropName, normalizedName, family, rootDepth, exactMatch: exact !== undefined };
}

export function getCropFamily(cropName: string): CropFamily {
  return resolveCrop(cropName).family;
}

export function getRootDepth(cropName: string): RootDepth {
  return resolveCrop(cropName).rootDepth;
}

export function isLegume(cropName: string): boolean {
  return getCropFamily(cropName) === 'LEGUMES';
}

export function isRiceCrop(cropName: string): boolean {
  return /\b(rice|paddy)\b/.test(normalizeCropName(cropName));
}
