import type { Express, Request, Response } from 'express';
import pkg from '../../package.json' with { type: 'json' };

const { name, version } = pkg;

interface RegisterHealthRoutesOptions {
  app: Express;
  activeSessions: () => number;
}

const healthPayload = (activeSessions: number) => {
  const mem = process.memoryUsage();
  return {
    ok: true,
    service: name,
    version,
    env: process.env.NODE_ENV || 'development',
    uptime: Math.floor(process.uptime()),
    nodeVersion: process.version,
    activeSessions,
    memory: {
      heapUsedMb: Math.round(mem.heapUsed / 1024 / 1024),
      rssMb: Math.round(mem.rss / 1024 / 1024),
    },
    timestamp: new Date().toISOString(),
  };
};

export const registerHealthRoutes = ({ app, activeSessions }: RegisterHealthRoutesOptions) => {
  const respond = (_req: Request, res: Response) => {
    res.json(healthPayload(activeSessions()));
  };

  app.get('/healthz', respond);
  app.get('/health', respond);
  app.get('/api/healthz', respond);
  app.get('/api/health', respond);
};
