// ──────────────────────────────────────────
// Configuration: environment → typed AppConfig
// ──────────────────────────────────────────

import path from 'path';
import { z } from 'zod';
import { MissingValueStrategy } from './shared/types';

export interface AppConfig {
  datasetPath: string;
  host: string;
  port: number;
  reportOutputDir: string;
  missingValues: MissingValueStrategy;
  reportTitle: string;
}

const envSchema = z.object({
  DATASET_PATH: z.string().trim().min(1).default('data/delivery_data.csv'),
  DASHBOARD_HOST: z.string().trim().min(1).default('127.0.0.1'),
  DASHBOARD_PORT: z.coerce.number().int().min(0).max(65535).default(8050),
  REPORT_OUTPUT_DIR: z.string().trim().min(1).default('output/reports'),
  MISSING_VALUES: z.enum(['reject', 'drop', 'fill']).default('reject'),
  REPORT_TITLE: z.string().trim().min(1).default('E-commerce Delivery Analytics Report'),
});

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}

/**
 * Blank variables count as unset. Relative paths resolve against `cwd`.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env, cwd = process.cwd()): AppConfig {
  const present: Record<string, string> = {};
  for (const key of Object.keys(envSchema.shape)) {
    const value = env[key];
    if (value !== undefined && value.trim() !== '') present[key] = value;
  }

  const result = envSchema.safeParse(present);
  if (!result.success) {
    const detail = result.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`).join('; ');
    throw new ConfigError(`Invalid configuration: ${detail}`);
  }

  const e = result.data;
  return {
    datasetPath: path.resolve(cwd, e.DATASET_PATH),
    host: e.DASHBOARD_HOST,
    port: e.DASHBOARD_PORT,
    reportOutputDir: path.resolve(cwd, e.REPORT_OUTPUT_DIR),
    missingValues: e.MISSING_VALUES,
    reportTitle: e.REPORT_TITLE,
  };
}
