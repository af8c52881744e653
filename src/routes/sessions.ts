import type { Express, Request, Response } from 'express';
import type { ExposureSession } from '../utils/exposure-session.js';
import { isRecord } from '../utils/environment.js';
import { SessionLimitError, type SessionRegistry } from '../utils/session-registry.js';
import type { ExposureSnapshot } from '../utils/snapshot.js';
import { parseIsoTimeToMs } from '../utils/time.js';
import { parseUVIndexInput } from './risk.js';

interface RegisterSessionRoutesOptions {
  app: Express;
  registry: SessionRegistry;
}

type SessionAction = 'start' | 'pause' | 'resume' | 'reset' | 'sunscreen';

const SESSION_ACTIONS: Readonly<Record<SessionAction, (session: ExposureSession) => Promise<ExposureSnapshot>>> = {
  start: (session) => session.start(),
  pause: (session) => session.pause(),
  resume: (session) => session.resume(),
  reset: (session) => session.reset(),
  sunscreen: (session) => session.applySunscreen(),
};

const isSessionAction = (value: string): value is SessionAction =>
  Object.prototype.hasOwnProperty.call(SESSION_ACTIONS, value);

const isOptionalObject = (value: unknown): boolean => value === undefined || value === null || isRecord(value);

const sendFailure = (res: Response, context: string, error: unknown) => {
  const details = error instanceof Error ? error.message : String(error);
  console.error(`[session] ${context} failed:`, details);
  return res.status(500).json({ error: `Unable to ${context}.`, details });
};

export const registerSessionRoutes = ({ app, registry }: RegisterSessionRoutesOptions) => {
  const findSession = (req: Request, res: Response): ExposureSession | null => {
    const session = registry.get(String(req.params.id || ''));
    if (!session) {
      res.status(404).json({ error: 'Session not found' });
      return null;
    }
    return session;
  };

  app.post('/api/sessions', async (req: Request, res: Response) => {
    const body: Record<string, unknown> = isRecord(req.body) ? req.body : {};
    const hasUV = body.uvIndex !== undefined && body.uvIndex !== null;
    const uvIndex = parseUVIndexInput(body.uvIndex);
    if (hasUV && uvIndex === null) {
      return res.status(400).json({ error: 'uvIndex must be a number.' });
    }
    if (!isOptionalObject(body.environment) || !isOptionalObject(body.settings)) {
      return res.status(400).json({ error: 'environment and settings must be objects.' });
    }

    try {
      const session = registry.create({ settings: body.settings, environment: body.environment });
      const snapshot = uvIndex === null ? session.snapshot() : (await session.observeUV(uvIndex)).snapshot;
      return res.status(201).json({ id: session.id, snapshot });
    } catch (error) {
      if (error instanceof SessionLimitError) {
        return res.status(503).json({ error: error.message });
      }
      return sendFailure(res, 'create session', error);
    }
  });

  app.get('/api/sessions/:id', (req: Request, res: Response) => {
    const session = findSession(req, res);
    if (!session) return;
    res.json(session.snapshot());
  });

  app.post('/api/sessions/:id/uv', async (req: Request, res: Response) => {
    const session = findSession(req, res);
    if (!session) return;
    const body: Record<string, unknown> = isRecord(req.body) ? req.body : {};
    const uvIndex = parseUVIndexInput(body.uvIndex);
    if (uvIndex === null) {
      return res.status(400).json({ error: 'uvIndex is required and must be a number.' });
    }
    if (body.at !== undefined && (typeof body.at !== 'string' || parseIsoTimeToMs(body.at) === null)) {
      return res.status(400).json({ error: 'at must be an ISO-8601 timestamp.' });
    }
    if (!isOptionalObject(body.environment)) {
      return res.status(400).json({ error: 'environment must be an object.' });
    }

    try {
      const at = typeof body.at === 'string' ? body.at : undefined;
      const result = await session.observeUV(uvIndex, at, body.environment);
      return res.status(result.accepted ? 200 : 409).json({
        accepted: result.accepted,
        snapshot: result.snapshot,
        assessment: result.assessment,
        notifications: result.notifications,
      });
    } catch (error) {
      return sendFailure(res, 'record UV reading', error);
    }
  });

  app.post('/api/sessions/:id/:action', async (req: Request, res: Response) => {
    const action = String(req.params.action || '');
    if (!isSessionAction(action)) {
      return res.status(404).json({ error: `Unknown session action: ${action}` });
    }
    const session = findSession(req, res);
    if (!session) return;

    try {
      return res.json(await SESSION_ACTIONS[action](session));
    } catch (error) {
      return sendFailure(res, `${action} session`, error);
    }
  });

  app.delete('/api/sessions/:id/sunscreen', async (req: Request, res: Response) => {
    const session = findSession(req, res);
    if (!session) return;
    try {
      return res.json(await session.cancelSunscreenTimer());
    } catch (error) {
      return sendFailure(res, 'cancel sunscreen timer', error);
    }
  });

  app.get('/api/sessions/:id/notifications', (req: Request, res: Response) => {
    const session = findSession(req, res);
    if (!session) return;
    res.json(registry.history.list(session.id));
  });

  app.delete('/api/sessions/:id', async (req: Request, res: Response) => {
    try {
      const result = await registry.remove(String(req.params.id || ''));
      if (!result) {
        return res.status(404).json({ error: 'Session not found' });
      }
      return res.json(result);
    } catch (error) {
      return sendFailure(res, 'stop session', error);
    }
  });
};
