// ──────────────────────────────────────────
// App entry point: bootstrap + Express server
// ──────────────────────────────────────────
// 1. Load configuration
// 2. Load the dataset (fails fast on schema errors)
// 3. Create the session + report generator
// 4. Listen on the configured host/port

import dotenv from 'dotenv';
dotenv.config();

import { loadConfig } from './config';
import { DashboardSession } from './domains/dashboard';
import { loadDataset } from './domains/ingestion';
import { ReportGenerator } from './domains/reports';
import { createApp } from './server';

async function main() {
  const config = loadConfig();

  const dataset = await loadDataset(config.datasetPath, { missing: config.missingValues });
  const session = new DashboardSession(dataset, config.missingValues);
  const reports = new ReportGenerator({ outputDir: config.reportOutputDir, title: config.reportTitle });

  const app = createApp(session, reports);
  const server = app.listen(config.port, config.host, () => {
    console.log(`[App] Delivery dashboard listening on http://${config.host}:${config.port}`);
  });

  // Graceful shutdown
  const shutdown = () => {
    console.log('[App] Shutting down...');
    server.close(() => process.exit(0));
  };
  process.on('SIGINT', shutdown);
  process.on('SIGTERM', shutdown);
}

main().catch((err) => {
  console.error('[App] Fatal error:', err instanceof Error ? err.message : err);
  process.exit(1);
});
