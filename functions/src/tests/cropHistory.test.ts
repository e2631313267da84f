import {
  analyzeCropHistory,
  hasConsecutiveMonoculture,
  maxConsecutiveSeasons,
  sortByRecent
} from '../services/cropHistory';
import { CropHistoryEntry } from '../types';

const entry = (cropName: string, sowingDate: string): CropHistoryEntry => ({ cropName, sowingDate });

describe('crop history analysis', () => {
  it('flags three consecutive cereal seasons as critical', () => {
    const analysis = analyzeCropHistory([
      entry('Rice', '2023-06-15'),
      entry('Rice', '2024-06-15'),
      entry('Rice', '2022-06-15')
    ]);
    expect(analysis.nutrientDepletionRisks).toHaveLength(1);
    const [risk] = analysis.nutrientDepletionRisks;
    expect(risk.riskLevel).toBe('CRITICAL');
    expect(risk.consecutiveSeasons).toBe(3);
    expect(risk.severityScore).toBe(95);
    expect(risk.affectedNutrients).toEqual(['Nitrogen (N)', 'Zinc (Zn)']);
    expect(risk.recommendation).toBe(
      'Rotate with legumes to restore nitrogen. Apply zinc sulfate if deficiency symptoms appear. URGENT: Immediate rotation change strongly recommended.'
    );
    expect(analysis.consecutiveMonocultureCount).toBe(3);
    expect(analysis.pestDiseaseRisk).toBe('HIGH');
    expect(analysis.hasGoodRotation).toBe(false);
    expect(analysis.nutrientBalance).toBe('Poor - continuous cropping of one family is depleting specific nutrients');
  });

  it('rates two seasons of the same crop as high risk', () => {
    const analysis = analyzeCropHistory([entry('Rice', '2024-06-15'), entry('Rice', '2023-06-15')]);
    const [risk] = analysis.nutrientDepletionRisks;
    expect(risk.riskLevel).toBe('HIGH');
    expect(risk.consecutiveSeasons).toBe(2);
    expect(risk.severityScore).toBe(70);
    expect(analysis.pestDiseaseRisk).toBe('MODERATE');
  });

  it('rates two different crops of one family as medium risk', () => {
    const analysis = analyzeCropHistory([entry('Wheat', '2024-11-01'), entry('Rice', '2024-06-15')]);
    const [risk] = analysis.nutrientDepletionRisks;
    expect(risk.riskLevel).toBe('MEDIUM');
    expect(risk.consecutiveSeasons).toBe(2);
    expect(risk.severityScore).toBe(50);
  });

  it('accepts an alternating cereal and legume rotation', () => {
    const analysis = analyzeCropHistory([
      entry('Rice', '2023-06-15'),
      entry('Chickpea', '2023-11-01'),
      entry('Rice', '2024-06-15')
    ]);
    expect(analysis.nutrientDepletionRisks).toEqual([]);
    expect(analysis.hasGoodRotation).toBe(true);
    expect(analysis.pestDiseaseRisk).toBe('LOW');
    expect(analysis.consecutiveMonocultureCount).toBe(0);
    expect(analysis.rotationPattern).toBe('Cereals -> Legumes -> Cereals');
    expect(analysis.dominantFamily).toBe('CEREALS');
    expect(analysis.recommendations).toEqual(['Current rotation pattern appears healthy - continue monitoring']);
  });

  it('analyses only the three most recent seasons', () => {
    const history = [
      entry('Rice', '2021-06-15'),
      entry('Rice', '2022-06-15'),
      entry('Rice', '2023-06-15'),
      entry('Rice', '2024-06-15')
    ];
    const analysis = analyzeCropHistory(history);
    expect(analysis.seasonsAnalyzed).toBe(3);
    expect(analysis.entries.map((e) => e.sowingDate)).toEqual(['2024-06-15', '2023-06-15', '2022-06-15']);
    expect(maxConsecutiveSeasons(history)).toBe(4);
  });

  it('asks for more data when no history is recorded', () => {
    const analysis = analyzeCropHistory(null);
    expect(analysis.seasonsAnalyzed).toBe(0);
    expect(analysis.hasGoodRotation).toBe(false);
    expect(analysis.recommendations).toEqual(['Start recording crop history to receive rotation recommendations']);
  });

  it('suggests legumes and mixed root depths for a lone cereal', () => {
    const analysis = analyzeCropHistory([entry('Wheat', '2024-11-01')]);
    expect(analysis.hasSufficientHistory).toBe(false);
    expect(analysis.recommendations).toEqual([
      'Add legumes (greengram, blackgram, chickpea) to the rotation to fix atmospheric nitrogen',
      'All recent crops are shallow-rooted - alternate deep-rooted and shallow-rooted crops to use nutrients from different soil layers'
    ]);
  });

  it('groups unknown crops only with the same crop', () => {
    expect(maxConsecutiveSeasons([entry('Quinoa', '2024-06-15'), entry('Amaranth', '2023-06-15')])).toBe(0);
    expect(hasConsecutiveMonoculture([entry('Quinoa', '2024-06-15'), entry('quinoa', '2023-06-15')])).toBe(true);
    expect(hasConsecutiveMonoculture([entry('Rice', '2024-06-15')])).toBe(false);
  });

  it('sorts most recent first and keeps input order for ties', () => {
    const sorted = sortByRecent([
      entry('A', '2023-01-01'),
      entry('B', '2024-01-01'),
      entry('C', '2023-01-01')
    ]);
    expect(sorted.map((e) => e.cropName)).toEqual(['B', 'A', 'C']);
  });
});
