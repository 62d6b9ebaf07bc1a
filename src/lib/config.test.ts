import { describe, expect, it } from 'vitest';
import { loadConfig } from './config';
import { ConfigError } from './errors';

const baseEnv = {
  CAPTURES_ROOT: '/data/captures',
  PROMPTS_URL: 'http://127.0.0.1:5001/prompts',
  DETECTION_URL: 'http://127.0.0.1:5002/infer',
};

describe('loadConfig', () => {
  it('applies defaults', () => {
    const config = loadConfig(baseEnv);

    expect(config).toEqual({
      host: '0.0.0.0',
      port: 5050,
      capturesRoot: '/data/captures',
      prompts: { url: 'http://127.0.0.1:5001/prompts', timeoutMs: 20_000, maxAttempts: 3 },
      detection: { url: 'http://127.0.0.1:5002/infer', timeoutMs: 45_000, maxAttempts: 7 },
      backoff: { strategy: 'exponential', baseDelayMs: 500, maxDelayMs: 6_000 },
      annotateInService: false,
      ingest: undefined,
      dashboardRefresh: undefined,
      publishOnlyWithDetections: false,
      maxConcurrentEvents: 4,
      historySize: 200,
      debug: false,
    });
  });

  it('reads numbers, switches and optional sinks from strings', () => {
    const config = loadConfig({
      ...baseEnv,
      RELAY_PORT: '0',
      DETECTION_MAX_ATTEMPTS: '4',
      BACKOFF_STRATEGY: 'fixed',
      ANNOTATE_IN_SERVICE: 'yes',
      DEBUG: 'off',
      INGEST_URL: 'http://127.0.0.1:8000/ingest',
      DASHBOARD_REFRESH_URL: '',
    });

    expect(config.port).toBe(0);
    expect(config.detection.maxAttempts).toBe(4);
    expect(config.backoff.strategy).toBe('fixed');
    expect(config.annotateInService).toBe(true);
    expect(config.debug).toBe(false);
    expect(config.ingest).toEqual({ url: 'http://127.0.0.1:8000/ingest', timeoutMs: 8_000, maxAttempts: 3 });
    expect(config.dashboardRefresh).toBeUndefined();
  });

  it('lets overrides win over the environment', () => {
    const config = loadConfig(
      { ...baseEnv, INGEST_URL: 'http://127.0.0.1:8000/ingest', MAX_CONCURRENT_EVENTS: '2' },
      { INGEST_URL: '', MAX_CONCURRENT_EVENTS: 9, DEBUG: true }
    );

    expect(config.ingest).toBeUndefined();
    expect(config.maxConcurrentEvents).toBe(9);
    expect(config.debug).toBe(true);
  });

  it('ignores unrelated environment variables', () => {
    expect(() => loadConfig({ ...baseEnv, PATH: '/usr/bin', HOME: '/root' })).not.toThrow();
  });

  it('lists every missing required setting', () => {
    const error = (() => {
      try {
        loadConfig({});
      } catch (e) {
        return e;
      }
      return null;
    })();

    expect(error).toBeInstanceOf(ConfigError);
    if (error instanceof ConfigError) {
      expect(error.issues).toEqual([
        'CAPTURES_ROOT: CAPTURES_ROOT is required',
        'PROMPTS_URL: PROMPTS_URL is required',
        'DETECTION_URL: DETECTION_URL is required',
      ]);
    }
  });

  it('rejects bad values', () => {
    expect(() => loadConfig({ ...baseEnv, DETECTION_URL: 'not a url' })).toThrow(ConfigError);
    expect(() => loadConfig({ ...baseEnv, PROMPTS_MAX_ATTEMPTS: '0' })).toThrow(ConfigError);
    expect(() => loadConfig({ ...baseEnv, DETECTION_TIMEOUT_MS: 'soon' })).toThrow(ConfigError);
    expect(() => loadConfig({ ...baseEnv, BACKOFF_STRATEGY: 'random' })).toThrow(ConfigError);
  });

  it('rejects timeouts longer than a timer can wait', () => {
    expect(() => loadConfig({ ...baseEnv, DETECTION_TIMEOUT_MS: '3000000000' })).toThrow(
      'DETECTION_TIMEOUT_MS: Number must be less than or equal to 2147483647'
    );
    expect(loadConfig({ ...baseEnv, PROMPTS_TIMEOUT_MS: '2147483647' }).prompts.timeoutMs).toBe(2_147_483_647);
  });

  it('rejects a backoff cap below the base delay', () => {
    expect(() => loadConfig({ ...baseEnv, BACKOFF_BASE_MS: '2000', BACKOFF_MAX_MS: '1000' })).toThrow(
      'BACKOFF_MAX_MS (1000) must be >= BACKOFF_BASE_MS (2000)'
    );
  });
});
