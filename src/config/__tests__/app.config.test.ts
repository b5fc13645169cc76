import { describe, expect, it } from 'vitest';
import { DEFAULT_SEARCH_TUNING, loadAppConfig } from '@/config/app.config';

describe('loadAppConfig', () => {
  it('falls back to defaults', () => {
    const config = loadAppConfig({});
    expect(config.port).toBe(4000);
    expect(config.mcpServerUrl).toBeUndefined();
    expect(config.searchTuning).toEqual(DEFAULT_SEARCH_TUNING);
  });

  it('converts tuning values to milliseconds', () => {
    const config = loadAppConfig({ QUOTE_FRESHNESS_HOURS: '2', SEARCH_SESSION_TTL_MINUTES: '5' });
    expect(config.searchTuning.quoteFreshnessMaxAgeMs).toBe(7_200_000);
    expect(config.searchTuning.sessionTtlMs).toBe(300_000);
  });

  it('rejects invalid values', () => {
    expect(() => loadAppConfig({ PORT: 'abc' })).toThrow(/^Invalid environment configuration: PORT/);
    expect(() => loadAppConfig({ LLM_BASE_URL: 'not a url' })).toThrow(/LLM_BASE_URL/);
  });
});
