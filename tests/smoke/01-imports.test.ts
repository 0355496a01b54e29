/**
 * Smoke Tests: the package entry point exports its documented API.
 *
 * Catches broken re-exports that the unit tests, which import modules
 * directly, would not notice.
 */
import { describe, it, expect } from 'vitest';

describe('package entry point', () => {
  it('exports the engine classes', async () => {
    const mod = await import('../../src/index.js');
    expect(typeof mod.DatasetCatalog).toBe('function');
    expect(typeof mod.MetricsCollector).toBe('function');
    expect(typeof mod.PacingGate).toBe('function');
    expect(typeof mod.Dispatcher).toBe('function');
    expect(typeof mod.LoadDriver).toBe('function');
    expect(typeof mod.DimseProtocolClient).toBe('function');
  });

  it('exports the error hierarchy', async () => {
    const mod = await import('../../src/index.js');
    const errors = [
      new mod.ConfigError('bad', 'targetRate'),
      new mod.CatalogError('empty'),
      new mod.InsufficientDataError(3, 1),
      new mod.ConnectivityError({ host: 'h', port: 1, calledAeTitle: 'A', callingAeTitle: 'B' }),
    ];
    for (const error of errors) {
      expect(error).toBeInstanceOf(mod.LoadTestError);
      expect(error).toBeInstanceOf(Error);
    }
    expect(errors.map(e => e.code)).toEqual(['CONFIG_ERROR', 'CATALOG_ERROR', 'INSUFFICIENT_DATA', 'CONNECTIVITY_ERROR']);
  });

  it('exports config and reporting helpers', async () => {
    const mod = await import('../../src/index.js');
    expect(typeof mod.parseLoadConfig).toBe('function');
    expect(typeof mod.evaluateThresholds).toBe('function');
    expect(typeof mod.formatCsv).toBe('function');
    expect(typeof mod.createLogger).toBe('function');
    expect(mod.DEFAULTS.maxErrorRate).toBe(0.02);
  });
});
