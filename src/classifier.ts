/**
 * Threshold classification for statistics and daily values
 */

import { ThresholdTableError } from './errors';
import { StatEntry, Statistic, StatKind, ThresholdTable } from './types';

/**
 * Colour classes, lowest to highest intensity
 */
export const CSS_COLORS: readonly string[] = Object.freeze([
  'hm-col0',
  'hm-col11',
  'hm-col12',
  'hm-col13',
  'hm-col14',
  'hm-col15',
  'hm-col16',
  'hm-col17',
  'hm-col18',
  'hm-col19',
  'hm-col20',
]);

const STREAK_THRESHOLDS = [0, 14, 30, 90, 180, 365];
const STREAK_COLOR_INDICES = [0, 2, 4, 6, 9, 10];
const PERCENTAGE_THRESHOLDS = [0, 25, 50, 60, 70, 80, 85, 90, 95, 99];

/**
 * Pair thresholds with colours; the shorter side decides the length
 */
export function zipLevels(
  thresholds: readonly number[],
  colors: readonly string[]
): ThresholdTable {
  const length = Math.min(thresholds.length, colors.length);
  const table: Array<readonly [number, string]> = [];

  for (let i = 0; i < length; i++) {
    table.push([thresholds[i], colors[i]]);
  }

  return Object.freeze(table);
}

const STREAK_LEVELS = zipLevels(
  STREAK_THRESHOLDS,
  STREAK_COLOR_INDICES.map(i => CSS_COLORS[i])
);
const PERCENTAGE_LEVELS = zipLevels(PERCENTAGE_THRESHOLDS, CSS_COLORS);

/**
 * Threshold table for a statistic kind
 * Card tables depend on the user's average, so they are built per call
 */
export function levelsFor(kind: StatKind, statsLegend: readonly number[]): ThresholdTable {
  switch (kind) {
    case 'streak':
      return STREAK_LEVELS;
    case 'percentage':
      return PERCENTAGE_LEVELS;
    case 'cards':
      return zipLevels(statsLegend, CSS_COLORS);
    default:
      return assertNever(kind);
  }
}

/**
 * Unit label for a statistic kind (null renders as a bare number)
 */
export function unitFor(kind: StatKind): string | null {
  switch (kind) {
    case 'streak':
      return 'day';
    case 'percentage':
      return null;
    case 'cards':
      return 'card';
    default:
      return assertNever(kind);
  }
}

/**
 * Classify a value against an ascending threshold table
 *
 * The first entry with value <= threshold wins (inclusive upper bound).
 * Values above every threshold fall into the last entry.
 */
export function classify(value: number, table: ThresholdTable): string {
  if (process.env.NODE_ENV !== 'production') {
    assertAscending(table);
  }

  let label = CSS_COLORS[0];
  for (const [threshold, candidate] of table) {
    label = candidate;
    if (value <= threshold) {
      break;
    }
  }

  return label;
}

/**
 * Format a value with its unit, pluralized unless |value| is exactly 1
 */
export function formatLabel(value: number, unit: string | null): string | number {
  if (!unit) {
    return value;
  }
  return `${value} ${unit}${Math.abs(value) !== 1 ? 's' : ''}`;
}

/**
 * Classify and label a single statistic
 */
export function classifyStatistic(stat: Statistic, statsLegend: readonly number[]): StatEntry {
  return {
    cssClass: classify(stat.value, levelsFor(stat.type, statsLegend)),
    label: formatLabel(stat.value, unitFor(stat.type)),
  };
}

function assertAscending(table: ThresholdTable): void {
  if (table.length === 0) {
    throw new ThresholdTableError('Threshold table is empty');
  }

  for (let i = 1; i < table.length; i++) {
    if (table[i][0] < table[i - 1][0]) {
      throw new ThresholdTableError(
        `Threshold table is not ascending at index ${i} (${table[i - 1][0]} > ${table[i][0]})`
      );
    }
  }
}

function assertNever(value: never): never {
  throw new ThresholdTableError(`Unknown statistic kind: ${String(value)}`);
}
