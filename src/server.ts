// ──────────────────────────────────────────
// Express app: page + API wiring
// ──────────────────────────────────────────

import express, { Express, NextFunction, Request, Response } from 'express';
import path from 'path';
import { fileURLToPath } from 'url';
import { DashboardSession, createDashboardRoutes } from './domains/dashboard';
import { ReportGenerator } from './domains/reports';
import { messageOf } from './shared/errors';

const PAGE_PATH = fileURLToPath(new URL('../dashboard/index.html', import.meta.url));

export function createApp(session: DashboardSession, reports: ReportGenerator): Express {
  const app = express();
  app.use(express.json());

  app.use('/api', createDashboardRoutes(session, reports));

  // Health check
  app.get('/health', (_req, res) => {
    const dataset = session.getDataset();
    res.json({ status: 'ok', dataset: dataset.source, records: dataset.records.length });
  });

  // Serve the dashboard HTML
  app.get('/', (_req, res) => {
    res.sendFile(path.resolve(PAGE_PATH));
  });

  // Body parser failures (bad JSON, oversized upload) carry their own status
  app.use((err: unknown, _req: Request, res: Response, _next: NextFunction) => {
    const status = typeof err === 'object' && err !== null && 'status' in err && typeof err.status === 'number' ? err.status : 500;
    if (status >= 500) console.error('[App] Unhandled request error:', messageOf(err));
    res.status(status).json({ error: messageOf(err) });
  });

  return app;
}
