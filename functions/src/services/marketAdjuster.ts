import { MarketRecommendation, MarketSnapshot, MarketTrend } from '../types';
import { clampScore, round2 } from './suitability';

export function trendFromChange(priceChange30Days?: number): MarketTrend {
  if (priceChange30Days === undefined) return 'STABLE';
  if (priceChange30Days > 2) return 'UP';
  if (priceChange30Days < -2) return 'DOWN';
  return 'STABLE';
}

export function sellingRecommendation(snapshot: MarketSnapshot): MarketRecommendation {
  const { currentPrice, msp, trend } = snapshot;
  const change = snapshot.priceChange30Days ?? 0;
  if (msp !== undefined && currentPrice > msp * 1.15) return 'SELL_NOW';
  if (trend === 'UP' && change > 5) return 'HOLD';
  if (trend === 'DOWN' && change < -5) return 'SELL_NOW';
  if (msp !== undefined && currentPrice <= msp * 1.05) return 'MONITOR';
  return 'CONSIDER_STORAGE';
}

export function marketAdjustedScore(baseScore: number, snapshot: MarketSnapshot | null | undefined): number {
  if (!snapshot) return baseScore;
  let adjustment = 0;
  if (snapshot.trend === 'UP') adjustment += 3;
  else if (snapshot.trend === 'DOWN') adjustment -= 3;
  if (snapshot.msp !== undefined && snapshot.msp > 0) {
    if (snapshot.currentPrice >= snapshot.msp) adjustment += 2;
    if (snapshot.currentPrice / snapshot.msp > 1.2) adjustment += 2;
  }
  const advice = sellingRecommendation(snapshot);
  if (advice === 'SELL_NOW') adjustment += 2;
  else if (advice === 'HOLD') adjustment -= 1;
  return clampScore(baseScore + adjustment);
}

/** Revenue per acre in INR from a yield in quintals/acre. */
export function expectedRevenuePerAcre(yieldQuintalsPerAcre: number, snapshot: MarketSnapshot): number {
  return round2(yieldQuintalsPerAcre * snapshot.currentPrice);
}

const ADVICE_TEXT: Record<MarketRecommendation, string> = {
  SELL_NOW: 'Prices are favourable - consider selling at harvest',
  HOLD: 'Prices are rising - holding produce may fetch better returns',
  MONITOR: 'Prices are near MSP - monitor mandi rates and government procurement',
  CONSIDER_STORAGE: 'Consider warehouse storage and sell when prices improve'
};

export function marketAdviceText(snapshot: MarketSnapshot): string {
  const name = snapshot.cropName ?? snapshot.cropCode;
  const mspNote =
    snapshot.msp !== undefined
      ? snapshot.currentPrice >= snapshot.msp
        ? ` (above MSP of Rs ${snapshot.msp}/q)`
        : ` (below MSP of Rs ${snapshot.msp}/q)`
      : '';
  return `${name}: Rs ${snapshot.currentPrice}/q${mspNote}. ${ADVICE_TEXT[sellingRecommendation(snapshot)]}`;
}

export type MarketSummary = {
  cropsWithData: number;
  risingTrend: number;
  fallingTrend: number;
  stableTrend: number;
  aboveMsp: number;
};

export function summarizeMarket(snapshots: readonly MarketSnapshot[]): MarketSummary {
  return {
    cropsWithData: snapshots.length,
    risingTrend: snapshots.filter((s) => s.trend === 'UP').length,
    fallingTrend: snapshots.filter((s) => s.trend === 'DOWN').length,
    stableTrend: snapshots.filter((s) => s.trend === 'STABLE').length,
    aboveMsp: snapshots.filter((s) => s.msp !== undefined && s.currentPrice >= s.msp).length
  };
}
