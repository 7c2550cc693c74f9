/**
 * Heatmap configuration: schema, defaults and mode presets
 */

import { z } from 'zod';
import { ConfigValidationError, formatZodErrors } from './errors';

export interface HeatmapMode {
  domain: string;
  subDomain: string;
  range: number;
  domLabForm: string;
}

export const HEATMAP_MODES = {
  year: {
    domain: 'year',
    subDomain: 'day',
    range: 1,
    domLabForm: '%Y',
  },
  months: {
    domain: 'month',
    subDomain: 'day',
    range: 9,
    domLabForm: "%b '%y",
  },
} as const satisfies Record<string, HeatmapMode>;

export type HeatmapModeName = keyof typeof HEATMAP_MODES;

export const DEFAULT_VIEWS = ['deckbrowser', 'overview', 'stats'] as const;

const viewDisplaySchema = z.object({
  heatmap: z.boolean().default(true),
  stats: z.boolean().default(true),
});

/**
 * Built-in views are always present; supplied entries override them
 */
function defaultDisplay(): Record<string, ViewDisplay> {
  return Object.fromEntries(DEFAULT_VIEWS.map(view => [view, { heatmap: true, stats: true }]));
}

export const heatmapConfigSchema = z.object({
  platform: z.string().min(1).default('lin'),
  theme: z.string().min(1).default('lime'),
  mode: z.enum(['year', 'months']).default('year'),
  display: z
    .record(z.string(), viewDisplaySchema)
    .default({})
    .transform(display => ({ ...defaultDisplay(), ...display })),
  statsAlwaysVisible: z.boolean().default(true),
});

export type HeatmapConfig = z.infer<typeof heatmapConfigSchema>;
export type ViewDisplay = z.infer<typeof viewDisplaySchema>;

/**
 * Validate raw (user-supplied) config and fill in defaults
 */
export function parseHeatmapConfig(raw: unknown = {}): HeatmapConfig {
  const result = heatmapConfigSchema.safeParse(raw);

  if (!result.success) {
    throw new ConfigValidationError(formatZodErrors(result.error));
  }

  return result.data;
}

/**
 * Display flags for a view; views outside the built-in set must be configured
 */
export function viewDisplay(config: HeatmapConfig, view: string): ViewDisplay {
  const display = config.display[view];

  if (!display) {
    throw new ConfigValidationError(`display.${view}: Unknown view`);
  }

  return display;
}
