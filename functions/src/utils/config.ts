export type AppConfig = {
  marketApiBaseUrl: string;
  marketApiKey?: string;
  marketResourceId: string;
  rainfallServiceBaseUrl: string;
  defaultRainfallDeviation: number;
  defaultTemperatureDeviation: number;
  requestTimeoutMs: number;
};

function numberFromEnv(value: string | undefined, fallback: number): number {
  if (value === undefined || value.trim() === '') return fallback;
  const parsed = Number(value);
  return Number.isFinite(parsed) ? parsed : fallback;
}

// Read at call time so emulator and test overrides of process.env apply.
export function getConfig(): AppConfig {
  return {
    marketApiBaseUrl: process.env.MARKET_API_BASE_URL || 'https://api.data.gov.in/resource',
    marketApiKey: process.env.MARKET_API_KEY || undefined,
    marketResourceId: process.env.MARKET_RESOURCE_ID || 'mandi-daily-prices',
    rainfallServiceBaseUrl: process.env.RAINFALL_SERVICE_BASE_URL || 'http://localhost:8000',
    defaultRainfallDeviation: numberFromEnv(process.env.DEFAULT_RAINFALL_DEVIATION, -10),
    defaultTemperatureDeviation: numberFromEnv(process.env.DEFAULT_TEMPERATURE_DEVIATION, 0),
    requestTimeoutMs: numberFromEnv(process.env.REQUEST_TIMEOUT_MS, 15000)
  };
}
