/**
 * Type definitions for the activity heatmap and stats panel
 * Everything here is transient: rebuilt on every render call
 */

/**
 * Statistic kinds understood by the classifier
 */
export type StatKind = 'streak' | 'percentage' | 'cards';

/**
 * A single summary statistic (as produced by the activity reporter)
 */
export interface Statistic {
  type: StatKind;
  value: number;
}

/**
 * Activity count for one day, as [dayOffset, count]
 * Negative offsets are history, positive offsets are forecast
 */
export type DailyCount = [number, number];

/**
 * Raw activity data for one render (read-only input)
 */
export interface ActivitySnapshot {
  dailyCounts: DailyCount[];
  statistics: Record<string, Statistic>;
  start: number;
  stop: number;
  today: number;
  offset: number; // Day rollover hour
}

/**
 * Bounds passed to the activity reporter
 * Absent limits mean "use the reporter's default range"
 */
export interface ActivityLimits {
  historyLimit?: number;
  forecastLimit?: number;
}

/**
 * Source of activity snapshots (I/O lives here, not in the core)
 */
export interface ActivityReporter {
  getData(limits: ActivityLimits): Promise<ActivitySnapshot | null>;
}

/**
 * Ordered (threshold, cssClass) pairs, ascending by threshold
 */
export type ThresholdTable = ReadonlyArray<readonly [number, string]>;

/**
 * Legends derived from the user's daily average
 */
export interface Legends {
  statsLegend: number[]; // 10 values, starts at 0
  heatmapLegend: number[]; // 19 values, symmetric around 0
}

export interface StatEntry {
  cssClass: string;
  label: string | number;
}

/**
 * Heatmap options; key names are consumed verbatim by the renderer
 */
export interface HeatmapOptions {
  domain: string;
  subdomain: string;
  range: number;
  domLabForm: string;
  start: number;
  stop: number;
  today: number;
  offset: number;
  legend: number[];
  whole: boolean;
}

export interface HeatmapSection {
  options: HeatmapOptions;
  data: DailyCount[];
}

export interface HeatmapPayload {
  kind: 'heatmap';
  classes: string[];
  heatmap: HeatmapSection | null; // null when suppressed
  stats: Record<string, StatEntry> | null; // null when suppressed
}

export interface NoDataPayload {
  kind: 'no-data';
}

export type RenderPayload = HeatmapPayload | NoDataPayload;

/**
 * External rendering surface (templating/markup lives outside this package)
 */
export interface Renderer<T> {
  render(payload: RenderPayload): T;
}
