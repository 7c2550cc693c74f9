/**
 * Tests for config parsing and defaults
 */

import { HEATMAP_MODES, parseHeatmapConfig, viewDisplay } from '../src/config';
import { ConfigValidationError } from '../src/errors';

describe('parseHeatmapConfig', () => {
  it('should fill in defaults for an empty config', () => {
    expect(parseHeatmapConfig()).toEqual({
      platform: 'lin',
      theme: 'lime',
      mode: 'year',
      display: {
        deckbrowser: { heatmap: true, stats: true },
        overview: { heatmap: true, stats: true },
        stats: { heatmap: true, stats: true },
      },
      statsAlwaysVisible: true,
    });
  });

  it('should keep built-in views when one view is configured', () => {
    const config = parseHeatmapConfig({
      mode: 'months',
      display: { overview: { heatmap: false } },
    });

    expect(config.mode).toBe('months');
    expect(config.display).toEqual({
      deckbrowser: { heatmap: true, stats: true },
      overview: { heatmap: false, stats: true },
      stats: { heatmap: true, stats: true },
    });
  });

  it('should reject unknown modes', () => {
    expect(() => parseHeatmapConfig({ mode: 'weekly' })).toThrow(
      /^Invalid heatmap config: mode: Invalid enum value/
    );
  });

  it('should report nested issues by path', () => {
    let caught: unknown;
    try {
      parseHeatmapConfig({ display: { overview: { heatmap: 'yes' } } });
    } catch (error) {
      caught = error;
    }

    expect(caught).toBeInstanceOf(ConfigValidationError);
    expect(caught instanceof ConfigValidationError && caught.issues).toBe(
      'display.overview.heatmap: Expected boolean, received string'
    );
  });
});

describe('viewDisplay', () => {
  it('should return flags for configured views', () => {
    const config = parseHeatmapConfig({ display: { overview: { stats: false } } });

    expect(viewDisplay(config, 'overview')).toEqual({ heatmap: true, stats: false });
  });

  it('should fall back to defaults for unconfigured built-in views', () => {
    const config = parseHeatmapConfig({ display: { overview: {} } });

    expect(viewDisplay(config, 'deckbrowser')).toEqual({ heatmap: true, stats: true });
  });

  it('should accept custom views alongside the built-in ones', () => {
    const config = parseHeatmapConfig({ display: { sidebar: { stats: false } } });

    expect(viewDisplay(config, 'sidebar')).toEqual({ heatmap: true, stats: false });
    expect(viewDisplay(config, 'stats')).toEqual({ heatmap: true, stats: true });
  });

  it('should reject views outside the built-in set that are not configured', () => {
    const config = parseHeatmapConfig({ display: { overview: {} } });

    expect(() => viewDisplay(config, 'browser')).toThrow(
      'Invalid heatmap config: display.browser: Unknown view'
    );
  });
});

describe('HEATMAP_MODES', () => {
  it('should describe both presets', () => {
    expect(HEATMAP_MODES.year).toMatchObject({ domain: 'year', subDomain: 'day', range: 1 });
    expect(HEATMAP_MODES.months).toMatchObject({ domain: 'month', subDomain: 'day', range: 9 });
  });
});
