export * from './types';
export { computeLegends, LEGEND_FACTORS, MIN_LEGEND_AVERAGE } from './legend';
export {
  classify,
  classifyStatistic,
  CSS_COLORS,
  formatLabel,
  levelsFor,
  unitFor,
  zipLevels,
} from './classifier';
export { buildHeatmapPayload, HeatmapCreator, NO_DATA_PAYLOAD } from './heatmap';
export type { PayloadOptions } from './heatmap';
export { DEFAULT_VIEWS, HEATMAP_MODES, parseHeatmapConfig, viewDisplay } from './config';
export type { HeatmapConfig, HeatmapMode, HeatmapModeName, ViewDisplay } from './config';
export { activitySnapshotSchema, hasActivity, parseActivitySnapshot } from './snapshot';
export { InMemoryPerformanceCache } from './cache';
export type { PerformanceCache, PerformanceRecord } from './cache';
export { FirestoreActivityReporter, fetchActivitySnapshot } from './queries';
export type {
  CollectionLike,
  DocumentLike,
  FirestoreLike,
  QueryLike,
  ReportScope,
} from './queries';
export {
  ConfigValidationError,
  HeatmapError,
  MissingStatisticError,
  SnapshotValidationError,
  ThresholdTableError,
} from './errors';
export { logger } from './logger';
export type { LogLevel } from './logger';
