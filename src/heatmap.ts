/**
 * Heatmap and stats payload assembly
 *
 * Design goals:
 * - Pure assembly (same snapshot + config => same payload)
 * - I/O only at the reporter boundary
 * - Rendering left to an external Renderer
 */

import { PerformanceCache } from './cache';
import { classifyStatistic } from './classifier';
import { HEATMAP_MODES, HeatmapConfig, viewDisplay } from './config';
import { MissingStatisticError } from './errors';
import { computeLegends } from './legend';
import { logger } from './logger';
import { hasActivity } from './snapshot';
import {
  ActivityReporter,
  ActivitySnapshot,
  DailyCount,
  HeatmapSection,
  NoDataPayload,
  Renderer,
  RenderPayload,
  StatEntry,
  Statistic,
} from './types';

const DEFAULT_VIEW = 'deckbrowser';

export const NO_DATA_PAYLOAD: NoDataPayload = Object.freeze<NoDataPayload>({ kind: 'no-data' });

export interface PayloadOptions {
  config: HeatmapConfig;
  view?: string;
  whole?: boolean;
}

/**
 * Build the render payload for a snapshot
 */
export function buildHeatmapPayload(
  snapshot: ActivitySnapshot | null,
  options: PayloadOptions
): RenderPayload {
  const { config, view = DEFAULT_VIEW, whole = false } = options;

  if (!hasActivity(snapshot)) {
    return NO_DATA_PAYLOAD;
  }

  const average = requireStatistic(snapshot, 'activity_daily_avg').value;
  const { statsLegend, heatmapLegend } = computeLegends(average);

  const display = viewDisplay(config, view);
  const classes = cssClasses(config, view);

  let heatmap: HeatmapSection | null = null;
  if (display.heatmap) {
    heatmap = heatmapSection(snapshot, config, heatmapLegend, whole);
  } else {
    classes.push('hm-disable-heatmap');
    logger.debug('buildHeatmapPayload', `heatmap disabled for view "${view}"`);
  }

  let stats: Record<string, StatEntry> | null = null;
  if (display.stats || config.statsAlwaysVisible) {
    stats = statsSection(snapshot, statsLegend);
  } else {
    classes.push('hm-disable-stats');
    logger.debug('buildHeatmapPayload', `stats disabled for view "${view}"`);
  }

  return { kind: 'heatmap', classes, heatmap, stats };
}

/**
 * Orchestrates reporter -> payload -> cache -> renderer
 */
export class HeatmapCreator {
  constructor(
    private readonly config: HeatmapConfig,
    private readonly reporter: ActivityReporter,
    private readonly cache: PerformanceCache | null = null,
    private readonly whole: boolean = false
  ) {}

  async generate(
    view: string = DEFAULT_VIEW,
    historyLimit?: number,
    forecastLimit?: number
  ): Promise<RenderPayload> {
    const snapshot = await this.reporter.getData({ historyLimit, forecastLimit });
    const payload = buildHeatmapPayload(snapshot, {
      config: this.config,
      view,
      whole: this.whole,
    });

    if (payload.kind === 'no-data') {
      logger.debug('HeatmapCreator.generate', `no activity data for view "${view}"`);
      return payload;
    }

    if (this.whole && snapshot !== null) {
      this.saveCurrentPerformance(snapshot);
    }

    return payload;
  }

  async render<T>(
    renderer: Renderer<T>,
    view: string = DEFAULT_VIEW,
    historyLimit?: number,
    forecastLimit?: number
  ): Promise<T> {
    const payload = await this.generate(view, historyLimit, forecastLimit);
    return renderer.render(payload);
  }

  /**
   * Expose headline stats to other parts of the host
   */
  private saveCurrentPerformance(snapshot: ActivitySnapshot): void {
    if (!this.cache) {
      return;
    }

    const streakMax = requireStatistic(snapshot, 'streak_max').value;
    const streakCur = requireStatistic(snapshot, 'streak_cur').value;
    const dailyAvg = requireStatistic(snapshot, 'activity_daily_avg').value;

    this.cache.write(streakMax, streakCur, dailyAvg);
    logger.debug('HeatmapCreator.saveCurrentPerformance', { streakMax, streakCur, dailyAvg });
  }
}

function cssClasses(config: HeatmapConfig, view: string): string[] {
  return [
    `hm-platform-${config.platform}`,
    `hm-theme-${config.theme}`,
    `hm-mode-${config.mode}`,
    `hm-view-${view}`,
  ];
}

function heatmapSection(
  snapshot: ActivitySnapshot,
  config: HeatmapConfig,
  legend: number[],
  whole: boolean
): HeatmapSection {
  const mode = HEATMAP_MODES[config.mode];

  return {
    options: {
      domain: mode.domain,
      subdomain: mode.subDomain,
      range: mode.range,
      domLabForm: mode.domLabForm,
      start: snapshot.start,
      stop: snapshot.stop,
      today: snapshot.today,
      offset: snapshot.offset,
      legend,
      whole,
    },
    data: snapshot.dailyCounts.map(([day, count]): DailyCount => [day, count]),
  };
}

function statsSection(
  snapshot: ActivitySnapshot,
  statsLegend: number[]
): Record<string, StatEntry> {
  const stats: Record<string, StatEntry> = {};

  for (const [name, stat] of Object.entries(snapshot.statistics)) {
    stats[name] = classifyStatistic(stat, statsLegend);
  }

  return stats;
}

function requireStatistic(snapshot: ActivitySnapshot, name: string): Statistic {
  const stat = snapshot.statistics[name];

  if (!stat) {
    throw new MissingStatisticError(name);
  }

  return stat;
}
