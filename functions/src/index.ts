import * as functions from 'firebase-functions';
import express, { Response } from 'express';
import {
  ApplicationRecordSchema,
  ClimateRiskBodySchema,
  DetectionsBodySchema,
  FertilizerBodySchema,
  RecommendCropBodySchema,
  RotationBodySchema,
  SchemesBodySchema,
  SearchBodySchema
} from './schemas';
import { analyzeClimateRiskBatch, flagHighRiskCrops } from './services/climateRisk';
import {
  assessApplicationBalance,
  calculateNutrientRequirement,
  recommendFertilizer,
  trackApplications,
  withStandardComposition
} from './services/fertilizer';
import { getMarketSnapshots } from './services/marketPrices';
import { getSeasonalOutlook } from './services/rainfallOutlook';
import { filterDetectionsByConfidence, rankSchemesByEligibility, rankSearchResults } from './services/ranking';
import { recommendCrops } from './services/recommender';
import { COLLECTIONS, loadReferenceStore } from './services/referenceStore';
import { generateRotationRecommendations } from './services/rotationEngine';
import {
  createCompleteRotationDisplay,
  getDefaultRotationPatterns,
  getSeasonScheduleInfo
} from './services/rotationRanker';
import { FALLBACK_PATTERN_ZONE, knownPatternZones, zonePatterns } from './services/rotationReference';
import { getSoilHealthCard } from './services/soilHealthCard';
import { MarketSnapshotSource, snapshotSourceFrom } from './services/sources';
import { validateCoordinates } from './services/zoneResolver';
import { errorMessage, isClientError } from './utils/errors';
import { getFirestoreDb, readQuery } from './utils/firestore';
import { createLogger } from './utils/logger';

const log = createLogger('API');

const app = express();
app.use(express.json({ limit: '1mb' }));

function handleError(res: Response, route: string, err: unknown) {
  if (isClientError(err)) {
    res.status(400).json({ error: errorMessage(err) });
    return;
  }
  log.error('request failed', { route, error: errorMessage(err) });
  res.status(500).json({ error: errorMessage(err) });
}

async function marketSource(state?: string): Promise<MarketSnapshotSource | undefined> {
  try {
    return snapshotSourceFrom(await getMarketSnapshots(state));
  } catch (err) {
    log.warn('market prices unavailable, ranking without them', { state, error: errorMessage(err) });
    return undefined;
  }
}

app.post('/recommendCrop', async (req, res) => {
  try {
    const body = RecommendCropBodySchema.parse(req.body);
    validateCoordinates(body);
    const store = await loadReferenceStore();
    const soilHealth = body.soilHealth ?? (body.farmerId ? await getSoilHealthCard(body.farmerId) : undefined);
    const market = body.includeMarketData ? await marketSource(body.state) : undefined;

    let { rainfallDeviation, temperatureDeviation } = body;
    if (
      body.includeClimateRisk &&
      rainfallDeviation === undefined &&
      body.latitude !== undefined &&
      body.longitude !== undefined
    ) {
      const outlook = await getSeasonalOutlook(body.latitude, body.longitude);
      rainfallDeviation = outlook.rainfallDeviationPercent;
      temperatureDeviation = temperatureDeviation ?? outlook.temperatureAnomalyC;
    }

    const result = recommendCrops(
      { ...body, soilHealth, rainfallDeviation, temperatureDeviation },
      { zones: store, suitability: store, seedVarieties: store, market }
    );
    if (!result.success) return res.status(404).json(result);
    res.json(result);
  } catch (err) {
    handleError(res, '/recommendCrop', err);
  }
});

app.post('/climateRisk', (req, res) => {
  try {
    const body = ClimateRiskBodySchema.parse(req.body);
    const assessments = analyzeClimateRiskBatch(body.cropCodes, body.rainfallDeviation, body.temperatureDeviation);
    res.json({ assessments, highRiskCrops: flagHighRiskCrops(assessments) });
  } catch (err) {
    handleError(res, '/climateRisk', err);
  }
});

app.post('/rotation/analyze', (req, res) => {
  try {
    const body = RotationBodySchema.parse(req.body);
    const hasHistory = body.history.length > 0;
    const rotation = generateRotationRecommendations(body.history, body.season);
    // without history the zone's own patterns stand in for generated options
    const display = createCompleteRotationDisplay(
      hasHistory ? rotation.options : [],
      body.zoneName ?? FALLBACK_PATTERN_ZONE,
      hasHistory
    );
    res.json({ ...rotation, display, seasonSchedule: getSeasonScheduleInfo(body.season) });
  } catch (err) {
    handleError(res, '/rotation/analyze', err);
  }
});

app.get('/rotation/defaults/:zoneName', (req, res) => {
  try {
    const { zoneName } = zonePatterns(req.params.zoneName);
    res.json({
      zoneName,
      requestedZone: req.params.zoneName,
      knownZones: knownPatternZones(),
      patterns: getDefaultRotationPatterns(zoneName),
      seasons: {
        KHARIF: getSeasonScheduleInfo('KHARIF'),
        RABI: getSeasonScheduleInfo('RABI'),
        ZAID: getSeasonScheduleInfo('ZAID')
      }
    });
  } catch (err) {
    handleError(res, '/rotation/defaults', err);
  }
});

app.post('/fertilizer/recommend', async (req, res) => {
  try {
    const body = FertilizerBodySchema.parse(req.body);
    const soilHealth = body.soilHealth ?? (body.farmerId ? await getSoilHealthCard(body.farmerId) : undefined);
    res.json(recommendFertilizer({ ...body, soilHealth }));
  } catch (err) {
    handleError(res, '/fertilizer/recommend', err);
  }
});

app.post('/fertilizer/applications', async (req, res) => {
  try {
    const record = withStandardComposition(ApplicationRecordSchema.parse(req.body));
    const ref = await getFirestoreDb()
      .collection(COLLECTIONS.fertilizerApplications)
      .add({ ...record, recordedAt: Date.now() });
    res.status(201).json({ id: ref.id, application: record });
  } catch (err) {
    handleError(res, '/fertilizer/applications', err);
  }
});

app.get('/fertilizer/tracking/:cropId', async (req, res) => {
  try {
    const { cropId } = req.params;
    const db = getFirestoreDb();
    const applications = await readQuery(
      db.collection(COLLECTIONS.fertilizerApplications).where('cropId', '==', cropId),
      ApplicationRecordSchema,
      COLLECTIONS.fertilizerApplications
    );
    const tracking = trackApplications(applications);
    const cropCode = typeof req.query.cropCode === 'string' ? req.query.cropCode : undefined;
    const areaAcres = Number(req.query.areaAcres ?? 1);
    if (!cropCode || !(areaAcres > 0)) return res.json({ cropId, tracking });

    const { perAcre } = calculateNutrientRequirement(cropCode);
    const balance = assessApplicationBalance(tracking, {
      nitrogenKg: perAcre.nitrogenKg * areaAcres,
      phosphorusKg: perAcre.phosphorusKg * areaAcres,
      potassiumKg: perAcre.potassiumKg * areaAcres
    });
    res.json({ cropId, tracking, balance });
  } catch (err) {
    handleError(res, '/fertilizer/tracking', err);
  }
});

app.post('/rank/detections', (req, res) => {
  try {
    const body = DetectionsBodySchema.parse(req.body);
    res.json({ detections: filterDetectionsByConfidence(body.detections, body.threshold) });
  } catch (err) {
    handleError(res, '/rank/detections', err);
  }
});

app.post('/rank/schemes', (req, res) => {
  try {
    const body = SchemesBodySchema.parse(req.body);
    res.json({ schemes: rankSchemesByEligibility(body.schemes) });
  } catch (err) {
    handleError(res, '/rank/schemes', err);
  }
});

app.post('/rank/search', (req, res) => {
  try {
    const body = SearchBodySchema.parse(req.body);
    res.json({ results: rankSearchResults(body.results, body.minSimilarity) });
  } catch (err) {
    handleError(res, '/rank/search', err);
  }
});

export const api = functions.https.onRequest(app);
