// ──────────────────────────────────────────
// Dashboard domain: barrel export
// ──────────────────────────────────────────

export { DashboardSession } from './session';
export { createDashboardRoutes } from './routes';
