import type { Express, Request, Response } from 'express';
import { buildUVLegend } from '../utils/burn-time.js';
import { isRecord, normalizeEnvironment } from '../utils/environment.js';
import { assessRisk } from '../utils/risk.js';

export const parseUVIndexInput = (value: unknown): number | null => {
  if (value === null || value === undefined || value === '') return null;
  const parsed = Number(value);
  return Number.isFinite(parsed) ? parsed : null;
};

export const registerRiskRoutes = (app: Express) => {
  app.post('/api/risk', (req: Request, res: Response) => {
    const body: Record<string, unknown> = isRecord(req.body) ? req.body : {};
    const uvIndex = parseUVIndexInput(body.uvIndex);
    if (uvIndex === null) {
      return res.status(400).json({ error: 'uvIndex is required and must be a number.' });
    }
    if (body.environment !== undefined && body.environment !== null && !isRecord(body.environment)) {
      return res.status(400).json({ error: 'environment must be an object.' });
    }

    const now = new Date();
    return res.json(assessRisk(uvIndex, normalizeEnvironment(body.environment, now), now));
  });

  app.get('/api/uv-legend', (_req: Request, res: Response) => {
    res.json(buildUVLegend());
  });
};
