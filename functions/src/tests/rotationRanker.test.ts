import {
  addResidueManagementRecommendations,
  createCompleteRotationDisplay,
  cropsInSequence,
  dominantFamilyOf,
  generateSeasonWiseSchedules,
  getDefaultRotationPatterns,
  getSeasonScheduleInfo,
  overallBenefitScore,
  rankByClimateResilience,
  rankByEconomicViability,
  rankByOverallBenefit,
  rankBySoilHealth
} from '../services/rotationRanker';
import { knownPatternZones, zonePatterns } from '../services/rotationReference';
import { RotationOption } from '../types';

function option(id: string, overrides: Partial<RotationOption> = {}): RotationOption {
  return {
    id,
    cropSequence: 'Rice -> Wheat -> Greengram',
    description: id,
    overallBenefitScore: 0,
    benefits: [],
    considerations: [],
    ...overrides
  };
}

describe('rotation ranker', () => {
  it('weights soil health, resilience and economics 40/30/30', () => {
    expect(overallBenefitScore({ soilHealthBenefit: 80, climateResilience: 75, economicViability: 85 })).toBe(80);
    expect(overallBenefitScore({ soilHealthBenefit: 100, climateResilience: 100, economicViability: 100 })).toBe(100);
    expect(overallBenefitScore({ soilHealthBenefit: 0, climateResilience: 0, economicViability: 0 })).toBe(0);
    expect(overallBenefitScore({ soilHealthBenefit: 50 })).toBe(20);
    expect(overallBenefitScore({ economicViability: 50 })).toBe(15);
    expect(overallBenefitScore(null)).toBe(0);
  });

  it('ranks by overall benefit and refreshes stale scores', () => {
    const ranked = rankByOverallBenefit([
      option('low', { soilHealthBenefit: 50, climateResilience: 50, economicViability: 50, overallBenefitScore: 99 }),
      option('high', { soilHealthBenefit: 90, climateResilience: 90, economicViability: 90 })
    ]);
    expect(ranked.map((o) => o.id)).toEqual(['high', 'low']);
    expect(ranked.map((o) => o.overallBenefitScore)).toEqual([90, 50]);
    expect(rankByOverallBenefit(null)).toBeNull();
  });

  it('ranks by a single component with missing values last', () => {
    const options = [
      option('a', { soilHealthBenefit: 70, climateResilience: 60 }),
      option('b'),
      option('c', { soilHealthBenefit: 85, climateResilience: 60 })
    ];
    expect(rankBySoilHealth(options)?.map((o) => o.id)).toEqual(['c', 'a', 'b']);
    expect(rankByClimateResilience(options)?.map((o) => o.id)).toEqual(['a', 'c', 'b']);
    expect(rankByEconomicViability(options)?.map((o) => o.id)).toEqual(['a', 'b', 'c']);
    expect(rankBySoilHealth([])).toEqual([]);
    expect(rankByEconomicViability(undefined)).toBeNull();
  });

  it('splits sequences into season slots', () => {
    const [scheduled] = generateSeasonWiseSchedules([option('x', { cropSequence: 'Maize -> Chickpea' })]);
    expect(scheduled.kharifCrops).toBe('Maize');
    expect(scheduled.rabiCrops).toBe('Chickpea');
    expect(scheduled.zaidCrops).toBeUndefined();
    expect(cropsInSequence('Maize + Cowpea (intercropping)')).toEqual(['Maize', 'Cowpea']);
  });

  it('picks residue guidance from the dominant family', () => {
    expect(dominantFamilyOf('Rice -> Wheat -> Greengram')).toBe('CEREALS');
    expect(dominantFamilyOf('Greengram -> Wheat')).toBe('LEGUMES');
    const [withResidue] = addResidueManagementRecommendations([option('x', { cropSequence: 'Chickpea -> Lentil' })]);
    expect(withResidue.residueManagementRecommendation).toBe(
      'Legume residues are nitrogen-rich and decompose quickly. Incorporate them soon after harvest. Can be used as green manure for next crop.'
    );
  });

  it('describes season windows', () => {
    expect(getSeasonScheduleInfo('kharif')).toEqual({ plantingMonths: 'June - July', harvestMonths: 'September - October' });
    expect(getSeasonScheduleInfo('monsoon')).toEqual({ plantingMonths: 'Varies', harvestMonths: 'Varies' });
    expect(getSeasonScheduleInfo(null)).toEqual({ plantingMonths: 'Varies', harvestMonths: 'Varies' });
  });

  it('builds default patterns for a zone', () => {
    const patterns = getDefaultRotationPatterns('Indo-Gangetic Plains');
    expect(patterns.map((p) => p.cropSequence)).toEqual([
      'Rice -> Wheat -> Greengram',
      'Rice -> Wheat -> Mustard',
      'Maize -> Wheat -> Lentil',
      'Rice -> Potato -> Cowpea'
    ]);
    const [first] = patterns;
    expect(first.soilHealthBenefit).toBe(81.67);
    expect(first.climateResilience).toBe(75);
    expect(first.economicViability).toBe(85);
    expect(first.overallBenefitScore).toBe(80.67);
    expect(first.nutrientCyclingScore).toBe(85);
    expect(first.pestManagementScore).toBe(50);
    expect(first.waterUsageScore).toBe(78.33);
    expect(first.kharifCrops).toBe('Rice');
    expect(first.rabiCrops).toBe('Wheat');
    expect(first.zaidCrops).toBe('Greengram');
    expect(first.benefits).toContain('Cereal-legume rotation provides balanced nutrition');
    expect(first.considerations).toHaveLength(4);
  });

  it('falls back to the Indo-Gangetic set for an unknown zone', () => {
    const fallback = getDefaultRotationPatterns('Nonexistent Zone');
    const igp = getDefaultRotationPatterns('Indo-Gangetic Plains');
    expect(fallback).toEqual(igp);
    expect(fallback[0].id).toBe('Indo-Gangetic Plains:0:Rice -> Wheat -> Greengram');
    expect(fallback.map((p) => p.cropSequence).join(' ')).toContain('Wheat');
    expect(getDefaultRotationPatterns('indo-gangetic plains')).toEqual(igp);
    expect(zonePatterns('Nonexistent Zone').zoneName).toBe('Indo-Gangetic Plains');
    expect(knownPatternZones()).toHaveLength(12);
    expect(knownPatternZones()).toContain('Western Dry Region');
  });

  it('shows zone defaults when there is nothing else to show', () => {
    const display = createCompleteRotationDisplay([], 'Indo-Gangetic Plains', false);
    expect(display.usingDefaultPatterns).toBe(true);
    expect(display.options).toBe(display.defaultPatterns);
  });

  it('ranks supplied options and keeps defaults alongside', () => {
    const display = createCompleteRotationDisplay(
      [
        option('b', { cropSequence: 'Maize -> Chickpea', soilHealthBenefit: 60 }),
        option('a', { cropSequence: 'Rice -> Lentil', soilHealthBenefit: 90 })
      ],
      'Indo-Gangetic Plains',
      true
    );
    expect(display.usingDefaultPatterns).toBe(false);
    expect(display.options.map((o) => o.id)).toEqual(['a', 'b']);
    expect(display.options[0].rabiCrops).toBe('Lentil');
    expect(display.defaultPatterns).toHaveLength(4);
  });
});
