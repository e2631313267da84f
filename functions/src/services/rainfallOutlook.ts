import axios from 'axios';
import { z } from 'zod';
import { getConfig } from '../utils/config';
import { createLogger } from '../utils/logger';
import { errorMessage } from '../utils/errors';

const log = createLogger('Rainfall Outlook');

export type SeasonalOutlook = {
  rainfallDeviationPercent: number;
  temperatureAnomalyC: number;
  source: 'service' | 'default';
};

const OutlookResponseSchema = z.object({
  rainfallDeviationPercent: z.number(),
  temperatureAnomalyC: z.number().optional()
});

/** Seasonal outlook from the forecast service, or the configured defaults when it is unavailable. */
export async function getSeasonalOutlook(lat: number, lon: number): Promise<SeasonalOutlook> {
  const config = getConfig();
  const url = `${config.rainfallServiceBaseUrl}/outlook`;
  try {
    const { data } = await axios.post<unknown>(url, { lat, lon }, { timeout: config.requestTimeoutMs });
    const outlook = OutlookResponseSchema.parse(data);
    return {
      rainfallDeviationPercent: outlook.rainfallDeviationPercent,
      temperatureAnomalyC: outlook.temperatureAnomalyC ?? config.defaultTemperatureDeviation,
      source: 'service'
    };
  } catch (err) {
    log.warn('outlook unavailable, using defaults', { url, error: errorMessage(err) });
    return {
      rainfallDeviationPercent: config.defaultRainfallDeviation,
      temperatureAnomalyC: config.defaultTemperatureDeviation,
      source: 'default'
    };
  }
}
