import { ReferenceData, ReferenceStore } from '../services/referenceStore';
import { CropSuitabilityRow } from '../types';

function suitabilityRow(overrides: Partial<CropSuitabilityRow> & Pick<CropSuitabilityRow, 'cropCode' | 'cropName'>) {
  const row: CropSuitabilityRow = {
    zoneCode: 'IGP',
    climateScore: 70,
    soilScore: 70,
    terrainScore: 70,
    waterScore: 70,
    overallScore: 70,
    classification: 'SUITABLE',
    kharifSuitable: false,
    rabiSuitable: false,
    zaidSuitable: false,
    ...overrides
  };
  return row;
}

export function referenceData(): ReferenceData {
  return {
    zones: [
      { code: 'IGP', name: 'Indo-Gangetic Plains', latitudeRange: [24, 32], longitudeRange: [74, 88] },
      { code: 'DEC', name: 'Deccan Plateau', latitudeRange: [12, 20], longitudeRange: [74, 80] }
    ],
    districts: [
      { district: 'Ludhiana', state: 'Punjab', zoneCode: 'IGP', lat: 30.9, lon: 75.85 },
      { district: 'Pune', state: 'Maharashtra', zoneCode: 'DEC', lat: 18.52, lon: 73.86 },
      { district: 'Leh', state: 'Ladakh', zoneCode: 'THZ' }
    ],
    suitability: [
      suitabilityRow({
        cropCode: 'RICE',
        cropName: 'Rice',
        climateScore: 85,
        soilScore: 80,
        terrainScore: 90,
        waterScore: 80,
        irrigatedPotentialYield: 6000,
        waterRequirementMm: 1200,
        growingSeasonDays: 120,
        kharifSuitable: true
      }),
      suitabilityRow({
        cropCode: 'WHEAT',
        cropName: 'Wheat',
        climateScore: 80,
        soilScore: 75,
        terrainScore: 85,
        waterScore: 70,
        irrigatedPotentialYield: 5000,
        growingSeasonDays: 140,
        rabiSuitable: true
      }),
      suitabilityRow({
        cropCode: 'MAIZE',
        cropName: 'Maize',
        climateScore: 70,
        soilScore: 65,
        terrainScore: 70,
        waterScore: 60,
        kharifSuitable: true
      }),
      suitabilityRow({
        cropCode: 'COTTON',
        cropName: 'Cotton',
        climateScore: 40,
        soilScore: 30,
        terrainScore: 35,
        waterScore: 30,
        kharifSuitable: true
      })
    ],
    seedVarieties: [
      {
        cropCode: 'RICE',
        state: 'Punjab',
        name: 'PR-126',
        characteristics: 'Short duration',
        diseaseResistance: 'Bacterial blight',
        seedCostPerKg: 60,
        maturityDays: 125
      },
      {
        cropCode: 'RICE',
        name: 'Swarna Sub1',
        characteristics: 'Submergence tolerant',
        diseaseResistance: 'Blast',
        seedCostPerKg: 45,
        maturityDays: 145
      }
    ]
  };
}

export function referenceStore(): ReferenceStore {
  return new ReferenceStore(referenceData());
}
