import { CropFamily, CropHistoryEntry, NutrientDepletionRisk, RootDepth } from '../types';
import { familyProfile, resolveCrop } from './cropFamily';

export const MAX_SEASONS_ANALYZED = 3;
export const MIN_SEASONS_FOR_ANALYSIS = 2;

const SEVERITY_BASE: Record<NutrientDepletionRisk['riskLevel'], number> = {
  CRITICAL: 90,
  HIGH: 70,
  MEDIUM: 50
};

export type AnalyzedEntry = CropHistoryEntry & {
  normalizedName: string;
  family: CropFamily;
  familyName: string;
  rootDepth: RootDepth;
  seasonOrder: number; // 1 = most recent
};

export type FamilyRun = {
  family: CropFamily;
  entries: AnalyzedEntry[];
};

export type PestDiseaseRisk = 'LOW' | 'MODERATE' | 'HIGH';

export type CropHistoryAnalysis = {
  seasonsAnalyzed: number;
  hasSufficientHistory: boolean;
  entries: AnalyzedEntry[];
  familyHistory: CropFamily[];
  rootDepthHistory: RootDepth[];
  nutrientDepletionRisks: NutrientDepletionRisk[];
  dominantFamily?: CropFamily;
  consecutiveMonocultureCount: number;
  rotationPattern: string;
  nutrientBalance: string;
  pestDiseaseRisk: PestDiseaseRisk;
  hasGoodRotation: boolean;
  recommendations: string[];
};

function sowingTime(entry: CropHistoryEntry): number {
  const t = Date.parse(entry.sowingDate);
  return Number.isNaN(t) ? 0 : t;
}

/** Most recent first; entries sown the same day keep their input order. */
export function sortByRecent<T extends CropHistoryEntry>(history: readonly T[]): T[] {
  return [...history].sort((a, b) => sowingTime(b) - sowingTime(a));
}

export function annotate(history: readonly CropHistoryEntry[]): AnalyzedEntry[] {
  return history.map((entry, i) => {
    const resolved = resolveCrop(entry.cropName);
    return {
      ...entry,
      normalizedName: resolved.normalizedName,
      family: resolved.family,
      familyName: familyProfile(resolved.family).displayName,
      rootDepth: resolved.rootDepth,
      seasonOrder: i + 1
    };
  });
}

// Unresolved crops only group with the same crop.
function sameFamily(a: AnalyzedEntry, b: AnalyzedEntry): boolean {
  if (a.family !== b.family) return false;
  return a.family !== 'OTHER' || a.normalizedName === b.normalizedName;
}

export function familyRuns(entries: readonly AnalyzedEntry[]): FamilyRun[] {
  const runs: FamilyRun[] = [];
  for (const entry of entries) {
    const current = runs[runs.length - 1];
    if (current && sameFamily(current.entries[current.entries.length - 1], entry)) {
      current.entries.push(entry);
    } else {
      runs.push({ family: entry.family, entries: [entry] });
    }
  }
  return runs;
}

function longestRun(runs: readonly FamilyRun[]): number {
  const longest = runs.reduce((max, r) => Math.max(max, r.entries.length), 0);
  return longest >= 2 ? longest : 0;
}

export function maxConsecutiveSeasons(history: readonly CropHistoryEntry[] | null | undefined): number {
  if (!history || history.length < 2) return 0;
  return longestRun(familyRuns(annotate(sortByRecent(history))));
}

export function hasConsecutiveMonoculture(history: readonly CropHistoryEntry[] | null | undefined): boolean {
  return maxConsecutiveSeasons(history) >= 2;
}

function riskFor(run: FamilyRun): NutrientDepletionRisk {
  const count = run.entries.length;
  const sameCrop = run.entries.every((e) => e.normalizedName === run.entries[0].normalizedName);
  const riskLevel: NutrientDepletionRisk['riskLevel'] = count >= 3 ? 'CRITICAL' : sameCrop ? 'HIGH' : 'MEDIUM';
  const profile = familyProfile(run.family);
  return {
    family: run.family,
    familyName: profile.displayName,
    consecutiveSeasons: count,
    severityScore: Math.min(100, SEVERITY_BASE[riskLevel] + 5 * (count - 2)),
    riskLevel,
    affectedNutrients: [...profile.affectedNutrients],
    recommendation:
      count >= 3
        ? `${profile.recommendation} URGENT: Immediate rotation change strongly recommended.`
        : profile.recommendation
  };
}

function dominantFamily(entries: readonly AnalyzedEntry[]): CropFamily | undefined {
  const counts = new Map<CropFamily, number>();
  for (const e of entries) counts.set(e.family, (counts.get(e.family) ?? 0) + 1);
  let best: CropFamily | undefined;
  let bestCount = 0;
  // entries are most recent first, so ties go to the more recent family
  for (const e of entries) {
    const c = counts.get(e.family) ?? 0;
    if (c > bestCount) {
      best = e.family;
      bestCount = c;
    }
  }
  return best;
}

function emptyAnalysis(): CropHistoryAnalysis {
  return {
    seasonsAnalyzed: 0,
    hasSufficientHistory: false,
    entries: [],
    familyHistory: [],
    rootDepthHistory: [],
    nutrientDepletionRisks: [],
    consecutiveMonocultureCount: 0,
    rotationPattern: 'No crop history recorded',
    nutrientBalance: 'Unknown - no crop history',
    pestDiseaseRisk: 'LOW',
    hasGoodRotation: false,
    recommendations: ['Start recording crop history to receive rotation recommendations']
  };
}

export function analyzeCropHistory(history: readonly CropHistoryEntry[] | null | undefined): CropHistoryAnalysis {
  if (!history || history.length === 0) return emptyAnalysis();

  const entries = annotate(sortByRecent(history).slice(0, MAX_SEASONS_ANALYZED));
  const runs = familyRuns(entries);
  const risks = runs.filter((r) => r.entries.length >= 2).map(riskFor);
  const maxRun = longestRun(runs);

  const recommendations: string[] = risks.map((r) => r.recommendation);
  if (maxRun >= 2) {
    recommendations.push('Grow a cover crop such as sunhemp or dhaincha between seasons to restore soil organic matter');
  }
  if (!entries.some((e) => e.family === 'LEGUMES')) {
    recommendations.push(
      'Add legumes (greengram, blackgram, chickpea) to the rotation to fix atmospheric nitrogen'
    );
  }
  const depths = new Set(entries.map((e) => e.rootDepth));
  if (depths.size === 1) {
    const [depth] = [...depths];
    recommendations.push(
      `All recent crops are ${depth.toLowerCase()}-rooted - alternate deep-rooted and shallow-rooted crops to use nutrients from different soil layers`
    );
  }
  if (recommendations.length === 0) {
    recommendations.push('Current rotation pattern appears healthy - continue monitoring');
  }

  let nutrientBalance = 'Good - diverse crop families maintain nutrient balance';
  if (risks.some((r) => r.riskLevel === 'CRITICAL')) {
    nutrientBalance = 'Poor - continuous cropping of one family is depleting specific nutrients';
  } else if (risks.length) {
    nutrientBalance = 'Moderate - repeated crop family is drawing down specific nutrients';
  }

  return {
    seasonsAnalyzed: entries.length,
    hasSufficientHistory: history.length >= MIN_SEASONS_FOR_ANALYSIS,
    entries,
    familyHistory: entries.map((e) => e.family),
    rootDepthHistory: entries.map((e) => e.rootDepth),
    nutrientDepletionRisks: risks,
    dominantFamily: dominantFamily(entries),
    consecutiveMonocultureCount: maxRun,
    rotationPattern: [...entries]
      .reverse()
      .map((e) => e.familyName)
      .join(' -> '),
    nutrientBalance,
    pestDiseaseRisk: maxRun >= 3 ? 'HIGH' : maxRun === 2 ? 'MODERATE' : 'LOW',
    hasGoodRotation: risks.length === 0,
    recommendations
  };
}
