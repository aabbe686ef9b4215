// ──────────────────────────────────────────
// Dashboard: API routes
// ──────────────────────────────────────────

import express, { Router, Request, Response } from 'express';
import { z } from 'zod';
import { aggregate, hasFilterQuery, parseFilterQuery } from '../analytics';
import { renderChart, renderCharts, renderColumnDistribution } from '../charts';
import { columnDistribution, describeDataset, findColumn } from '../ingestion';
import { ReportGenerator } from '../reports';
import { messageOf, statusFor } from '../../shared/errors';
import { DashboardSession } from './session';

const reportRequest = z.object({ format: z.enum(['pdf', 'docx']) });

// Uploads larger than this are rejected by the body parser with 413
const UPLOAD_LIMIT = '20mb';

export function createDashboardRoutes(session: DashboardSession, reports: ReportGenerator): Router {
  const router = Router();

  // ── Dataset ──

  // GET /dataset: column info + numeric summary
  router.get('/dataset', (_req: Request, res: Response) => {
    try {
      res.json(describeDataset(session.getDataset()));
    } catch (err) {
      sendError(res, err);
    }
  });

  // POST /dataset?name=orders.csv: replace the dataset with an uploaded CSV
  router.post(
    '/dataset',
    express.text({ type: ['text/csv', 'text/plain', 'application/csv'], limit: UPLOAD_LIMIT }),
    (req: Request, res: Response) => {
      try {
        if (typeof req.body !== 'string') {
          res.status(400).json({ error: 'Expected a text/csv request body' });
          return;
        }
        const name =
          typeof req.query.name === 'string' && req.query.name.trim() !== '' ? req.query.name.trim() : 'upload.csv';
        const dataset = session.replaceDataset(req.body, name);
        res.status(201).json(describeDataset(dataset));
      } catch (err) {
        sendError(res, err);
      }
    }
  );

  // ── Filters ──

  // GET /filters: available options + active selection
  router.get('/filters', (_req: Request, res: Response) => {
    try {
      res.json({ options: session.options(), active: session.getFilter() });
    } catch (err) {
      sendError(res, err);
    }
  });

  // PUT /filters { platforms, categories, deliveryTime, orderValue, minRating, from, to }
  router.put('/filters', (req: Request, res: Response) => {
    try {
      const active = session.setFilter(req.body);
      res.json({ active });
    } catch (err) {
      sendError(res, err);
    }
  });

  router.delete('/filters', (_req: Request, res: Response) => {
    try {
      res.json({ active: session.resetFilter() });
    } catch (err) {
      sendError(res, err);
    }
  });

  // ── Summary ──

  // GET /summary?platforms=A,B&minRating=3: query filters apply to this request only
  router.get('/summary', (req: Request, res: Response) => {
    try {
      const query: Record<string, unknown> = req.query;
      const view = hasFilterQuery(query)
        ? aggregate(session.getDataset().records, parseFilterQuery(query))
        : session.view();
      res.json(view);
    } catch (err) {
      sendError(res, err);
    }
  });

  // ── Charts ──

  // GET /charts: chart list for the active filter
  router.get('/charts', (_req: Request, res: Response) => {
    try {
      const charts = renderCharts(session.view(), session.filteredRecords());
      res.json({
        charts: charts.map((c) => ({
          id: c.id,
          title: c.title,
          width: c.width,
          height: c.height,
          url: `/api/charts/${c.id}.svg`,
        })),
      });
    } catch (err) {
      sendError(res, err);
    }
  });

  router.get('/charts/:id.svg', (req: Request, res: Response) => {
    try {
      const chart = renderChart(req.params.id, session.view(), session.filteredRecords());
      if (!chart) {
        res.status(404).json({ error: `Unknown chart: ${req.params.id}` });
        return;
      }
      res.type('image/svg+xml').send(chart.svg);
    } catch (err) {
      sendError(res, err);
    }
  });

  // ── Column explorer ──

  router.get('/columns', (_req: Request, res: Response) => {
    try {
      res.json({ columns: session.getDataset().columns });
    } catch (err) {
      sendError(res, err);
    }
  });

  // GET /columns/:name/distribution: value counts or histogram bins, filtered
  router.get('/columns/:name/distribution', (req: Request, res: Response) => {
    try {
      if (!findColumn(req.params.name)) {
        res.status(404).json({ error: `Unknown column: ${req.params.name}` });
        return;
      }
      res.json(columnDistribution(session.filteredRecords(), req.params.name));
    } catch (err) {
      sendError(res, err);
    }
  });

  router.get('/columns/:name/chart.svg', (req: Request, res: Response) => {
    try {
      if (!findColumn(req.params.name)) {
        res.status(404).json({ error: `Unknown column: ${req.params.name}` });
        return;
      }
      const chart = renderColumnDistribution(columnDistribution(session.filteredRecords(), req.params.name));
      res.type('image/svg+xml').send(chart.svg);
    } catch (err) {
      sendError(res, err);
    }
  });

  // ── Reports ──

  // POST /reports { format: 'pdf' | 'docx' }: generate and download
  router.post('/reports', async (req: Request, res: Response) => {
    try {
      const parsed = reportRequest.safeParse(req.body ?? {});
      if (!parsed.success) {
        res.status(400).json({ error: "format must be 'pdf' or 'docx'" });
        return;
      }

      const report = await reports.generateFor(session, parsed.data.format);
      res.download(report.path, report.fileName, (err) => {
        if (err) console.error(`[Dashboard] Failed to send ${report.fileName}:`, err.message);
      });
    } catch (err) {
      sendError(res, err);
    }
  });

  // GET /reports: generated files, newest first
  router.get('/reports', async (_req: Request, res: Response) => {
    try {
      const list = await reports.list();
      res.json({
        reports: list.map((r) => ({
          format: r.format,
          fileName: r.fileName,
          bytes: r.bytes,
          createdAt: r.createdAt.toISOString(),
        })),
      });
    } catch (err) {
      sendError(res, err);
    }
  });

  return router;
}

function sendError(res: Response, err: unknown): void {
  const status = statusFor(err);
  if (status >= 500) console.error('[Dashboard] Request failed:', messageOf(err));
  res.status(status).json({ error: messageOf(err) });
}

