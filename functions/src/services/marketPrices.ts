import axios from 'axios';
import { z } from 'zod';
import { MarketSnapshot } from '../types';
import { getConfig } from '../utils/config';
import { createLogger } from '../utils/logger';
import { trendFromChange } from './marketAdjuster';
import { round2 } from './suitability';

const log = createLogger('Market Prices');

// Mandi feeds send prices as strings ("2150") as often as numbers.
const price = z.coerce.number().nonnegative();
const optionalPrice = z.preprocess((v) => (v === null || v === '' || v === 'NA' ? undefined : v), price.optional());

const MandiRecordSchema = z.object({
  commodity: z.string().min(1),
  commodity_code: z.string().optional(),
  state: z.string().optional(),
  modal_price: price,
  min_price: optionalPrice,
  max_price: optionalPrice,
  msp: optionalPrice,
  price_30_days_ago: optionalPrice
});

type MandiRecord = z.infer<typeof MandiRecordSchema>;

function cropCodeOf(record: MandiRecord): string {
  return (record.commodity_code ?? record.commodity).trim().toUpperCase().replace(/\s+/g, '_');
}

function toSnapshot(record: MandiRecord): MarketSnapshot {
  const previous = record.price_30_days_ago;
  const priceChange30Days =
    previous !== undefined && previous > 0 ? round2(((record.modal_price - previous) / previous) * 100) : undefined;
  return {
    cropCode: cropCodeOf(record),
    cropName: record.commodity.trim(),
    state: record.state,
    currentPrice: record.modal_price,
    minPrice: record.min_price ?? record.modal_price,
    maxPrice: record.max_price ?? record.modal_price,
    msp: record.msp,
    trend: trendFromChange(priceChange30Days),
    priceChange30Days
  };
}

/** Snapshots keyed by upper-case crop code; unreadable records are skipped. */
export function parseMarketPriceResponse(data: unknown): Record<string, MarketSnapshot> {
  const body = z.object({ records: z.array(z.unknown()) }).safeParse(data);
  const records: unknown[] = body.success ? body.data.records : Array.isArray(data) ? data : [];
  const out: Record<string, MarketSnapshot> = {};
  let skipped = 0;
  for (const raw of records) {
    const parsed = MandiRecordSchema.safeParse(raw);
    if (!parsed.success) {
      skipped += 1;
      continue;
    }
    const snapshot = toSnapshot(parsed.data);
    // first record per crop wins; feeds list the latest arrival first
    if (!out[snapshot.cropCode]) out[snapshot.cropCode] = snapshot;
  }
  if (skipped) log.warn('skipped unreadable mandi records', { skipped });
  return out;
}

export async function getMarketSnapshots(state?: string): Promise<Record<string, MarketSnapshot>> {
  const config = getConfig();
  if (!config.marketApiKey) {
    throw new Error('MARKET_API_KEY not set');
  }
  const url = `${config.marketApiBaseUrl}/${config.marketResourceId}`;
  const params: Record<string, string> = { 'api-key': config.marketApiKey, format: 'json' };
  if (state) params['filters[state]'] = state;
  const { data } = await axios.get<unknown>(url, { params, timeout: config.requestTimeoutMs });
  return parseMarketPriceResponse(data);
}
