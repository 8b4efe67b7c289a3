import { describe, it, expect, vi } from 'vitest';
import {
  DEFAULT_GUIDANCE_CONFIG,
  GuidanceConfigError,
  loadGuidanceConfigFromEnv,
  resolveGuidanceConfig,
} from './config';

function spyLogger() {
  return { debug: vi.fn(), info: vi.fn(), warn: vi.fn(), error: vi.fn() };
}

function issuesOf(run: () => unknown): string[] {
  try {
    run();
  } catch (error) {
    if (error instanceof GuidanceConfigError) return error.issues;
    throw error;
  }
  return [];
}

describe('resolveGuidanceConfig', () => {
  it('returns the defaults without overrides', () => {
    expect(resolveGuidanceConfig()).toEqual(DEFAULT_GUIDANCE_CONFIG);
  });

  it('merges overrides section by section', () => {
    const config = resolveGuidanceConfig({ partition: { stopDistanceMeters: 0.8 } });

    expect(config.partition.stopDistanceMeters).toBe(0.8);
    expect(config.partition.alertDistanceMeters).toBe(2.5);
    expect(config.announcement).toEqual(DEFAULT_GUIDANCE_CONFIG.announcement);
  });

  it('normalizes stoplist labels', () => {
    expect(resolveGuidanceConfig({ legacy: { stoplist: [' Umbrella '] } }).legacy.stoplist).toEqual(['umbrella']);
    expect(DEFAULT_GUIDANCE_CONFIG.legacy.stoplist).toContain('cell phone');
  });

  it('rejects out-of-range values', () => {
    expect(issuesOf(() => resolveGuidanceConfig({ filter: { minConfidence: 1.5 } }))).toEqual([
      'filter.minConfidence must be within [0, 1] (got 1.5)',
    ]);
    expect(issuesOf(() => resolveGuidanceConfig({ announcement: { minInterSpeechMs: -1 } }))).toEqual([
      'announcement.minInterSpeechMs must be a non-negative number (got -1)',
    ]);
  });

  it('rejects inconsistent thresholds', () => {
    expect(issuesOf(() => resolveGuidanceConfig({ partition: { largeObjectOccupancy: 0.7 } }))).toEqual([
      'partition.largeObjectOccupancy must not exceed partition.fullBlockOccupancy',
    ]);
    expect(issuesOf(() => resolveGuidanceConfig({ legacy: { closeMeters: 5 } }))).toEqual([
      'legacy distance thresholds must increase: veryCloseMeters < closeMeters < mediumMeters',
    ]);
    expect(issuesOf(() => resolveGuidanceConfig({ depth: { scaleFactor: 0 } }))).toEqual([
      'depth.scaleFactor must be positive (got 0)',
    ]);
  });

  it('lists every issue in the error message', () => {
    expect(() => resolveGuidanceConfig({ scene: { model: ' ' }, speech: { suppressionWindowMs: -5 } })).toThrow(
      'Invalid guidance config: speech.suppressionWindowMs must be a non-negative number (got -5); scene.model must not be empty'
    );
  });
});

describe('loadGuidanceConfigFromEnv', () => {
  it('reads strategy, thresholds and keys', () => {
    const logger = spyLogger();
    const settings = loadGuidanceConfigFromEnv(
      {
        GUIDANCE_STRATEGY: 'legacy',
        GUIDANCE_MIN_CONFIDENCE: '0.5',
        GUIDANCE_HORIZON_METERS: '4',
        GUIDANCE_SUPPRESSION_MS: '2000',
        GUIDANCE_CLOSEST_OBJECT: '0',
        GUIDANCE_SCENE_MODEL: 'gemini-1.5-pro',
        GUIDANCE_DEBUG: '1',
        GEMINI_API_KEY: 'test-key',
      },
      logger
    );

    expect(settings.strategy).toBe('legacy');
    expect(settings.config.filter).toEqual({ minConfidence: 0.5, navigationHorizonMeters: 4 });
    expect(settings.config.speech.suppressionWindowMs).toBe(2000);
    expect(settings.config.closestObject.enabled).toBe(false);
    expect(settings.config.scene.model).toBe('gemini-1.5-pro');
    expect(settings.debug).toBe(true);
    expect(settings.geminiApiKey).toBe('test-key');
    expect(logger.warn).not.toHaveBeenCalled();
  });

  it('falls back to defaults with a warning', () => {
    const logger = spyLogger();
    const settings = loadGuidanceConfigFromEnv({ GUIDANCE_STRATEGY: 'fast', GUIDANCE_DEPTH_SCALE: 'abc' }, logger);

    expect(settings.strategy).toBe('partition');
    expect(settings.config.depth.scaleFactor).toBe(150);
    expect(settings.debug).toBe(false);
    expect(settings.geminiApiKey).toBe('');
    expect(logger.warn.mock.calls).toEqual([
      ['Unknown GUIDANCE_STRATEGY=fast, using partition'],
      ['Ignoring GUIDANCE_DEPTH_SCALE=abc, not a number'],
    ]);
  });

  it('uses the defaults for an empty environment', () => {
    expect(loadGuidanceConfigFromEnv({}, spyLogger()).config).toEqual(DEFAULT_GUIDANCE_CONFIG);
  });
});
