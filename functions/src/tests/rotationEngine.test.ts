import { generateRotationRecommendations } from '../services/rotationEngine';
import { CropHistoryEntry } from '../types';

const entry = (cropName: string, sowingDate: string): CropHistoryEntry => ({ cropName, sowingDate });

describe('rotation recommendation engine', () => {
  it('offers a balanced sequence and legumes when there is no history', () => {
    const result = generateRotationRecommendations([]);
    expect(result.lastCrop).toBeUndefined();
    expect(result.hasRiceBasedSystem).toBe(false);
    expect(result.pestRiskLevel).toBe('LOW');
    expect(result.warnings).toEqual([]);
    expect(result.options.map((o) => o.cropSequence)).toEqual([
      'Sunflower -> Cabbage -> Greengram',
      'Greengram',
      'Blackgram',
      'Chickpea',
      'Lentil'
    ]);
    expect(result.options.map((o) => o.overallBenefitScore)).toEqual([85.5, 82, 80.8, 79, 77.5]);
    expect(result.recommendations).toEqual([
      'Incorporate crop residues instead of burning them',
      'Consider soil testing before each season to adjust fertilizer doses'
    ]);
    expect(result.historyAnalysis.seasonsAnalyzed).toBe(0);
  });

  it('returns the same options for the same history', () => {
    const history = [entry('Rice', '2024-06-15'), entry('Wheat', '2023-11-10')];
    const first = generateRotationRecommendations(history, 'RABI');
    expect(generateRotationRecommendations(history, 'RABI')).toEqual(first);
    expect(generateRotationRecommendations([]).options[0].id).toBe('ALL:Sunflower -> Cabbage -> Greengram');
  });

  it('treats a null history like an empty one', () => {
    expect(generateRotationRecommendations(null).options).toHaveLength(5);
  });

  it('diversifies a rice monoculture', () => {
    const result = generateRotationRecommendations([entry('Rice', '2024-06-15'), entry('Rice', '2023-06-15')]);
    expect(result.lastCrop).toBe('Rice');
    expect(result.hasRiceBasedSystem).toBe(true);
    expect(result.pestRiskLevel).toBe('MEDIUM');
    expect(result.warnings[0]).toBe(
      'Rice-based system detected: continuous rice depletes soil and builds up pests. Diversify with pulses or oilseeds.'
    );
    expect(result.warnings[1]).toBe(
      'High pest carryover risk: 2 consecutive Cereals seasons (Rice). Watch for Blast, Bacterial Leaf Blight, Brown Planthopper, Stem Borer.'
    );
    expect(result.recommendations[0]).toBe('Break the monoculture by rotating to a crop from a different family');

    const sequences = result.options.map((o) => o.cropSequence);
    expect(sequences.slice(0, 5)).toEqual([
      'Sunflower -> Cabbage -> Greengram',
      'Rice (relay with Lentil)',
      'Rice (relay with Chickpea)',
      'Rice (relay with Greengram)',
      'Rice (relay with Blackgram)'
    ]);
    expect(sequences).toEqual(expect.arrayContaining(['Rice -> Mustard', 'Rice -> Sesame', 'Rice + Soybean (intercropping)']));
    expect(new Set(sequences).size).toBe(sequences.length);
    const relay = result.options[1];
    expect(relay.description).toBe('Paira/Utera relay cropping: sow Lentil into maturing Rice before harvest');
    expect(relay.overallBenefitScore).toBe(84.4);
  });

  it('pairs a shallow-rooted crop with deep-rooted crops of other families', () => {
    const result = generateRotationRecommendations([entry('Rice', '2024-06-15')]);
    const deep = result.options.filter((o) => o.description.includes('(deep-rooted) after'));
    // ranked by overall benefit, not by candidate order
    expect(deep.map((o) => o.cropSequence)).toEqual([
      'Rice -> Cotton',
      'Rice -> Sunflower',
      'Rice -> Redgram',
      'Rice -> Carrot'
    ]);
  });

  it('prefers crops that fit the requested season', () => {
    const history = [entry('Wheat', '2024-11-01')];
    const deepAfter = (season: 'ALL' | 'RABI') =>
      generateRotationRecommendations(history, season)
        .options.filter((o) => o.description.includes('(deep-rooted) after'))
        .map((o) => o.cropSequence)
        .sort();
    expect(deepAfter('RABI')).toEqual(['Wheat -> Carrot', 'Wheat -> Cotton', 'Wheat -> Safflower', 'Wheat -> Sunflower']);
    expect(deepAfter('ALL')).toEqual(['Wheat -> Carrot', 'Wheat -> Cotton', 'Wheat -> Redgram', 'Wheat -> Sunflower']);
  });

  it('adds relay and intercrop options for a non-rice crop', () => {
    const result = generateRotationRecommendations([entry('Wheat', '2024-11-01')]);
    const relay = result.options.find((o) => o.cropSequence === 'Wheat (relay with Chickpea)');
    expect(relay?.description).toBe('Relay cropping: sow Chickpea into standing Wheat before harvest');
    expect(result.options.map((o) => o.cropSequence)).toContain('Wheat + Mustard (intercropping)');
    expect(result.hasRiceBasedSystem).toBe(false);
  });

  it('skips legume options right after a legume', () => {
    const result = generateRotationRecommendations([entry('Greengram', '2024-03-01')]);
    expect(result.options.map((o) => o.cropSequence)).toEqual([
      'Sunflower -> Cabbage -> Greengram',
      'Greengram -> Maize',
      'Greengram -> Cotton',
      'Greengram -> Sunflower',
      'Greengram -> Sorghum'
    ]);
  });

  it('attaches residue guidance to every option', () => {
    const result = generateRotationRecommendations([entry('Maize', '2024-06-15')]);
    expect(result.options.every((o) => typeof o.residueManagementRecommendation === 'string')).toBe(true);
  });
});
