/**
 * Dynamic legend generation
 *
 * Breakpoints scale with the user's own daily average instead of fixed
 * absolute values.
 */

import { Legends } from './types';

/**
 * Multipliers applied to the effective average (strictly ascending)
 */
export const LEGEND_FACTORS: readonly number[] = Object.freeze([
  0.125, 0.25, 0.5, 0.75, 1, 1.25, 1.5, 2, 4,
]);

/**
 * Averages below this produce breakpoints too small to be informative
 */
export const MIN_LEGEND_AVERAGE = 20;

/**
 * Compute stats and heatmap legends from the average daily activity
 */
export function computeLegends(average: number): Legends {
  const core = dynamicLegend(average);

  return {
    statsLegend: [0, ...core],
    heatmapLegend: heatmapLegend(core),
  };
}

function dynamicLegend(average: number): number[] {
  const avg = Number.isFinite(average) ? Math.max(MIN_LEGEND_AVERAGE, average) : MIN_LEGEND_AVERAGE;
  return LEGEND_FACTORS.map(factor => factor * avg);
}

/**
 * Mirrored negative half for forecast days, so past and future can use
 * parallel colour ramps on the same scale
 */
function heatmapLegend(core: number[]): number[] {
  const negative = [...core].reverse().map(value => -value);
  return [...negative, 0, ...core];
}
