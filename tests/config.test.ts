import { describe, it, expect } from 'vitest';
import path from 'node:path';
import { ConfigError, loadConfig } from '../src/config';

const CWD = path.resolve('/srv/dashboard');

describe('loadConfig', () => {
  it('falls back to defaults', () => {
    expect(loadConfig({}, CWD)).toEqual({
      datasetPath: path.join(CWD, 'data/delivery_data.csv'),
      host: '127.0.0.1',
      port: 8050,
      reportOutputDir: path.join(CWD, 'output/reports'),
      missingValues: 'reject',
      reportTitle: 'E-commerce Delivery Analytics Report',
    });
  });

  it('reads overrides from the environment', () => {
    const config = loadConfig(
      {
        DATASET_PATH: '/data/orders.csv',
        DASHBOARD_HOST: '0.0.0.0',
        DASHBOARD_PORT: '9000',
        REPORT_OUTPUT_DIR: 'exports',
        MISSING_VALUES: 'fill',
        REPORT_TITLE: 'Weekly Delivery Review',
      },
      CWD
    );

    expect(config.datasetPath).toBe(path.resolve('/data/orders.csv'));
    expect(config.host).toBe('0.0.0.0');
    expect(config.port).toBe(9000);
    expect(config.reportOutputDir).toBe(path.join(CWD, 'exports'));
    expect(config.missingValues).toBe('fill');
    expect(config.reportTitle).toBe('Weekly Delivery Review');
  });

  it('treats blank variables as unset', () => {
    const config = loadConfig({ DASHBOARD_PORT: '  ', MISSING_VALUES: '' }, CWD);

    expect(config.port).toBe(8050);
    expect(config.missingValues).toBe('reject');
  });

  it('names the offending variable', () => {
    expect(() => loadConfig({ DASHBOARD_PORT: 'eighty' }, CWD)).toThrow(ConfigError);
    expect(() => loadConfig({ DASHBOARD_PORT: '70000' }, CWD)).toThrow(/^Invalid configuration: DASHBOARD_PORT: /);
    expect(() => loadConfig({ MISSING_VALUES: 'guess' }, CWD)).toThrow(/MISSING_VALUES/);
  });
});
