import {
  DiseaseDetection,
  filterDetectionsByConfidence,
  rankBy,
  rankByField,
  rankDetectionsByConfidence,
  rankSchemesByEligibility,
  rankSearchResults
} from '../services/ranking';

describe('generic ranking', () => {
  it('passes null through and returns empty for empty input', () => {
    expect(rankBy(null, (n: number) => n)).toBeNull();
    expect(rankBy([], (n: number) => n)).toEqual([]);
  });

  it('sorts descending and keeps input order for ties', () => {
    const items = [
      { id: 'a', score: 5 },
      { id: 'b', score: 9 },
      { id: 'c', score: 5 },
      { id: 'd', score: 7 }
    ];
    expect(rankByField(items, 'score').map((i) => i.id)).toEqual(['b', 'd', 'a', 'c']);
  });

  it('puts items without a score last', () => {
    const items: { id: string; score?: number }[] = [{ id: 'a' }, { id: 'b', score: 1 }, { id: 'c', score: Number.NaN }];
    expect(rankByField(items, 'score').map((i) => i.id)).toEqual(['b', 'a', 'c']);
  });

  it('does not modify the input', () => {
    const items = [1, 3, 2];
    rankBy(items, (n) => n);
    expect(items).toEqual([1, 3, 2]);
  });
});

describe('domain rankings', () => {
  const detections: DiseaseDetection[] = [
    { diseaseName: 'Leaf Blast', confidence: 0.42 },
    { diseaseName: 'Brown Spot', confidence: 0.91 },
    { diseaseName: 'Sheath Blight', confidence: 0.5 }
  ];

  it('orders detections by confidence', () => {
    expect(rankDetectionsByConfidence(detections)?.map((d) => d.diseaseName)).toEqual([
      'Brown Spot',
      'Sheath Blight',
      'Leaf Blast'
    ]);
  });

  it('drops detections under the threshold', () => {
    expect(filterDetectionsByConfidence(detections)?.map((d) => d.diseaseName)).toEqual(['Brown Spot', 'Sheath Blight']);
    expect(filterDetectionsByConfidence(detections, 0.9)?.map((d) => d.diseaseName)).toEqual(['Brown Spot']);
    expect(filterDetectionsByConfidence(undefined)).toBeNull();
  });

  it('orders schemes by eligibility', () => {
    const ranked = rankSchemesByEligibility([
      { schemeId: 'pm-kisan', schemeName: 'Income Support', eligibilityScore: 70 },
      { schemeId: 'pmfby', schemeName: 'Crop Insurance', eligibilityScore: 95 }
    ]);
    expect(ranked?.map((s) => s.schemeId)).toEqual(['pmfby', 'pm-kisan']);
  });

  it('filters search results by similarity', () => {
    const ranked = rankSearchResults(
      [
        { id: '1', title: 'Drip irrigation subsidy', similarityScore: 0.3 },
        { id: '2', title: 'Soil testing labs', similarityScore: 0.8 }
      ],
      0.5
    );
    expect(ranked?.map((r) => r.id)).toEqual(['2']);
  });
});
