/**
 * Stable descending ranking shared by every list the API returns ranked:
 * rotation options, disease detections, scheme matches and search hits.
 *
 * Contract: null in, null out; empty in, empty out; every element of the
 * input appears exactly once in the output; equal scores keep input order;
 * items without a score sort after all scored items.
 */

export type NumericKey<T> = {
  [K in keyof T]-?: T[K] extends number | null | undefined ? K : never;
}[keyof T];

export function rankBy<T>(items: readonly T[], score: (item: T) => number | null | undefined): T[];
export function rankBy<T>(
  items: readonly T[] | null | undefined,
  score: (item: T) => number | null | undefined
): T[] | null;
export function rankBy<T>(
  items: readonly T[] | null | undefined,
  score: (item: T) => number | null | undefined
): T[] | null {
  if (!items) return null;
  const keyed = items.map((item, index) => {
    const value = score(item);
    return { item, index, value: typeof value === 'number' && !Number.isNaN(value) ? value : -Infinity };
  });
  keyed.sort((a, b) => b.value - a.value || a.index - b.index);
  return keyed.map((k) => k.item);
}

export function rankByField<T, K extends NumericKey<T>>(items: readonly T[], field: K): T[];
export function rankByField<T, K extends NumericKey<T>>(items: readonly T[] | null | undefined, field: K): T[] | null;
export function rankByField<T, K extends NumericKey<T>>(items: readonly T[] | null | undefined, field: K): T[] | null {
  return rankBy(items, (item) => {
    const value = item[field];
    return typeof value === 'number' ? value : undefined;
  });
}

// Disease detections from the image classifier

export type Severity = 'LOW' | 'MEDIUM' | 'HIGH' | 'CRITICAL';

export type DiseaseDetection = {
  diseaseName: string;
  confidence: number; // 0..1
  severity?: Severity;
  affectedCrop?: string;
  treatment?: string;
};

export const DEFAULT_CONFIDENCE_THRESHOLD = 0.5;

export function rankDetectionsByConfidence(detections: readonly DiseaseDetection[] | null | undefined) {
  return rankByField(detections, 'confidence');
}

export function filterDetectionsByConfidence(
  detections: readonly DiseaseDetection[] | null | undefined,
  threshold = DEFAULT_CONFIDENCE_THRESHOLD
): DiseaseDetection[] | null {
  const ranked = rankDetectionsByConfidence(detections);
  return ranked && ranked.filter((d) => d.confidence >= threshold);
}

// Government scheme matches

export type SchemeMatch = {
  schemeId: string;
  schemeName: string;
  eligibilityScore: number; // 0..100
  benefits?: string;
  reasons?: string[];
};

export function rankSchemesByEligibility(schemes: readonly SchemeMatch[] | null | undefined) {
  return rankByField(schemes, 'eligibilityScore');
}

// Semantic search hits

export type SearchResult = {
  id: string;
  title: string;
  similarityScore: number; // 0..1
  snippet?: string;
};

export function rankSearchResults(
  results: readonly SearchResult[] | null | undefined,
  minSimilarity = 0
): SearchResult[] | null {
  const ranked = rankByField(results, 'similarityScore');
  return ranked && ranked.filter((r) => r.similarityScore >= minSimilarity);
}
