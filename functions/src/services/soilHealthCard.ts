import { z } from 'zod';
import { SoilHealthSnapshot } from '../types';
import { getFirestoreDb, readDocument } from '../utils/firestore';
import { COLLECTIONS } from './referenceStore';

const record = z.record(z.string(), z.unknown());

// Cards come from several state portals: a bare number, a numeric string,
// or an object carrying { value } / { mean }.
function numberFrom(value: unknown): number | undefined {
  const nested = record.safeParse(value);
  const raw = nested.success ? nested.data.value ?? nested.data.mean : value;
  if (typeof raw !== 'number' && typeof raw !== 'string') return undefined;
  if (typeof raw === 'string' && raw.trim() === '') return undefined;
  const n = Number(raw);
  return Number.isFinite(n) ? n : undefined;
}

function pick(fields: Record<string, unknown>, keys: readonly string[]): number | undefined {
  for (const key of keys) {
    const n = numberFrom(fields[key]);
    if (n !== undefined) return n;
  }
  return undefined;
}

function textFrom(fields: Record<string, unknown>, keys: readonly string[]): string | undefined {
  for (const key of keys) {
    const v = fields[key];
    if (typeof v === 'string' && v.trim()) return v.trim();
  }
  return undefined;
}

export function parseSoilHealthCard(data: unknown): SoilHealthSnapshot {
  const outer = record.safeParse(data);
  const top = outer.success ? outer.data : {};
  const inner = record.safeParse(top.properties ?? top.data ?? top.result);
  const fields = inner.success ? inner.data : top;
  return {
    farmerId: textFrom(fields, ['farmerId', 'farmer_id']) ?? textFrom(top, ['farmerId', 'farmer_id']),
    sampleDate: textFrom(fields, ['sampleDate', 'sample_date', 'date']),
    nitrogenKgHa: pick(fields, ['nitrogenKgHa', 'N', 'nitrogen', 'available_n']),
    phosphorusKgHa: pick(fields, ['phosphorusKgHa', 'P', 'phosphorus', 'available_p']),
    potassiumKgHa: pick(fields, ['potassiumKgHa', 'K', 'potassium', 'available_k']),
    zincPpm: pick(fields, ['zincPpm', 'Zn', 'zinc']),
    ph: pick(fields, ['ph', 'pH', 'phh2o']),
    sulfurPpm: pick(fields, ['sulfurPpm', 'S', 'sulphur', 'sulfur']),
    organicCarbonPercent: pick(fields, ['organicCarbonPercent', 'OC', 'organic_carbon', 'soc'])
  };
}

const SoilHealthCardSchema = z.unknown().transform(parseSoilHealthCard);

export async function getSoilHealthCard(farmerId: string): Promise<SoilHealthSnapshot | undefined> {
  const card = await readDocument(getFirestoreDb(), `${COLLECTIONS.soilHealthCards}/${farmerId}`, SoilHealthCardSchema);
  return card && { ...card, farmerId };
}
