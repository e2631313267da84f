import {
  recommendCrops,
  RecommendationResponse,
  RecommendationSources,
  RecommendationSuccess
} from '../services/recommender';
import { snapshotSourceFrom } from '../services/sources';
import { ValidationError } from '../utils/errors';
import { referenceStore } from './fixtures';

function sources(overrides: Partial<RecommendationSources> = {}): RecommendationSources {
  const store = referenceStore();
  return { zones: store, suitability: store, seedVarieties: store, ...overrides };
}

function expectSuccess(res: RecommendationResponse): RecommendationSuccess {
  if (!res.success) throw new Error(`expected success, got: ${res.errorMessage}`);
  return res;
}

const ludhiana = { district: 'Ludhiana', state: 'Punjab' };

describe('crop recommendation', () => {
  it('ranks suitable crops of the resolved zone', () => {
    const res = expectSuccess(recommendCrops(ludhiana, sources()));
    expect(res.zone.code).toBe('IGP');
    expect(res.totalCrops).toBe(3);
    expect(res.recommendations.map((r) => r.cropCode)).toEqual(['RICE', 'WHEAT', 'MAIZE']);
    expect(res.recommendations.map((r) => r.rank)).toEqual([1, 2, 3]);
    expect(res.recommendations.map((r) => r.classification)).toEqual(['HIGHLY_SUITABLE', 'SUITABLE', 'SUITABLE']);
    expect(res.recommendations[0].overallScore).toBeCloseTo(83.33, 2);
    expect(res.recommendations[2].overallScore).toBeCloseTo(66.39, 2);
    expect(res.climateRiskSummary.unassessed).toBe(3);
  });

  it('keeps scores in descending order', () => {
    const res = expectSuccess(recommendCrops(ludhiana, sources()));
    const scores = res.recommendations.map((r) => r.overallScore);
    expect(scores).toEqual([...scores].sort((a, b) => b - a));
  });

  it('attaches yields, varieties and notes', () => {
    const res = expectSuccess(recommendCrops(ludhiana, sources()));
    const [rice, wheat] = res.recommendations;
    expect(rice.recommendedVarieties).toEqual(['PR-126']);
    expect(wheat.recommendedVarieties).toEqual(['HD-2967', 'PBW-343', 'DBW-187']);
    expect(wheat.expectedYieldPerAcre).toBeCloseTo(13.29, 2);
    expect(wheat.potentialYieldGap).toBeCloseTo(6.95, 2);
    expect(wheat.estimatedInputCost).toBeCloseTo(4088.4, 1);
    expect(rice.notes).toBe('Highly suitable for this zone; 120 days to maturity');
  });

  it('lists national varieties when no state is given', () => {
    const res = expectSuccess(recommendCrops({ zoneCode: 'IGP' }, sources()));
    expect(res.recommendations[0].recommendedVarieties).toEqual(['PR-126', 'Swarna Sub1']);
  });

  it('adjusts for climate risk and summarises it', () => {
    const res = expectSuccess(
      recommendCrops({ ...ludhiana, includeClimateRisk: true, rainfallDeviation: -35, temperatureDeviation: 0 }, sources())
    );
    expect(res.recommendations.map((r) => r.cropCode)).toEqual(['WHEAT', 'RICE', 'MAIZE']);
    expect(res.recommendations[0].overallScore).toBeCloseTo(74.22, 2);
    expect(res.recommendations[1].climateRisk?.riskLevel).toBe('VERY_HIGH');
    expect(res.climateRiskSummary).toEqual({
      highRisk: 2,
      mediumRisk: 1,
      lowRisk: 0,
      unassessed: 0,
      insuranceRecommended: 2,
      highRiskCrops: ['RICE', 'MAIZE']
    });
  });

  it('adjusts for market prices and estimates profit', () => {
    const market = snapshotSourceFrom({
      WHEAT: {
        cropCode: 'WHEAT',
        cropName: 'Wheat',
        currentPrice: 2500,
        minPrice: 2400,
        maxPrice: 2600,
        msp: 2000,
        trend: 'UP',
        priceChange30Days: 8
      }
    });
    const res = expectSuccess(recommendCrops({ ...ludhiana, includeMarketData: true }, sources({ market })));
    const [wheat] = res.recommendations;
    expect(wheat.cropCode).toBe('WHEAT');
    expect(wheat.overallScore).toBeCloseTo(86.22, 2);
    expect(wheat.expectedRevenue).toBeCloseTo(33225, 1);
    expect(wheat.estimatedNetProfit).toBeCloseTo(29136.6, 1);
    expect(res.marketSummary).toEqual({ cropsWithData: 1, risingTrend: 1, fallingTrend: 0, stableTrend: 0, aboveMsp: 1 });
  });

  it('excludes, boosts and filters crops by request', () => {
    const excluded = expectSuccess(recommendCrops({ ...ludhiana, excludeCrops: ['rice'] }, sources()));
    expect(excluded.recommendations.map((r) => [r.cropCode, r.rank])).toEqual([
      ['WHEAT', 1],
      ['MAIZE', 2]
    ]);

    const boosted = expectSuccess(recommendCrops({ ...ludhiana, preferredCrops: ['Maize'] }, sources()));
    const maize = boosted.recommendations[2];
    expect(maize.preferred).toBe(true);
    expect(maize.overallScore).toBeCloseTo(71.39, 2);
    expect(maize.notes).toBe('Suitable for this zone; matches your preferred crops');

    const filtered = expectSuccess(recommendCrops({ ...ludhiana, minScore: 70 }, sources()));
    expect(filtered.totalCrops).toBe(2);
  });

  it('numbers each page from 1 and keeps the overall position', () => {
    const res = expectSuccess(recommendCrops({ ...ludhiana, offset: 1, limit: 1 }, sources()));
    expect(res.totalCrops).toBe(3);
    expect(res.recommendations.map((r) => [r.cropCode, r.rank, r.globalRank])).toEqual([['WHEAT', 1, 2]]);

    const tail = expectSuccess(recommendCrops({ ...ludhiana, offset: 1, limit: 2 }, sources()));
    expect(tail.recommendations.map((r) => r.rank)).toEqual([1, 2]);
    expect(tail.recommendations.map((r) => r.globalRank)).toEqual([2, 3]);
  });

  it('warns about thirsty crops under rainfed conditions', () => {
    const res = expectSuccess(recommendCrops({ ...ludhiana, irrigationType: 'RAINFED' }, sources()));
    const rice = res.recommendations.find((r) => r.cropCode === 'RICE');
    expect(rice?.riskFactors).toContain('High water requirement (1200 mm) under rainfed conditions');
  });

  it('rejects unusable locations', () => {
    expect(() => recommendCrops({ latitude: 100, longitude: 75 }, sources())).toThrow(ValidationError);
    expect(() => recommendCrops({ district: 'Ludhiana' }, sources())).toThrow('insufficient location information');
    expect(() => recommendCrops({ zoneCode: 'IGP', longitude: 200 }, sources())).toThrow('Invalid longitude');
  });

  it('reports lookups that come back empty', () => {
    expect(recommendCrops({ district: 'Nowhere', state: 'Punjab' }, sources())).toMatchObject({
      success: false,
      errorMessage: 'Location not found: Nowhere, Punjab'
    });
    expect(recommendCrops({ zoneCode: 'DEC' }, sources())).toMatchObject({
      success: false,
      errorMessage: 'No suitability data for zone DEC'
    });
    expect(recommendCrops({ ...ludhiana, season: 'ZAID' }, sources())).toMatchObject({
      success: false,
      errorMessage: 'No suitable crops found for the location'
    });
  });
});
