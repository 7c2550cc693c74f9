/**
 * Console logger keyed by call site
 *
 * Usage: logger.warn('HeatmapCreator.generate', 'detail')
 * Threshold comes from HEATMAP_LOG_LEVEL (debug | info | warn | error | silent)
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100,
};

const DEFAULT_LEVEL: LogLevel = 'warn';

function isLogLevel(value: string): value is LogLevel {
  return Object.prototype.hasOwnProperty.call(LEVEL_ORDER, value);
}

function currentLevel(): LogLevel {
  const raw = (process.env.HEATMAP_LOG_LEVEL ?? '').toLowerCase();
  return isLogLevel(raw) ? raw : DEFAULT_LEVEL;
}

function enabled(level: LogLevel): boolean {
  return LEVEL_ORDER[level] >= LEVEL_ORDER[currentLevel()];
}

function format(context: string, detail: unknown): string {
  if (detail instanceof Error) {
    return `[heatmap] ${context}: ${detail.name}: ${detail.message}`;
  }
  return `[heatmap] ${context}: ${typeof detail === 'string' ? detail : JSON.stringify(detail)}`;
}

export const logger = {
  debug(context: string, detail: unknown): void {
    if (enabled('debug')) console.debug(format(context, detail));
  },
  info(context: string, detail: unknown): void {
    if (enabled('info')) console.info(format(context, detail));
  },
  warn(context: string, detail: unknown): void {
    if (enabled('warn')) console.warn(format(context, detail));
  },
  error(context: string, detail: unknown): void {
    if (enabled('error')) console.error(format(context, detail));
  },
};
