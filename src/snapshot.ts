/**
 * Validation for activity snapshots coming from outside the process
 */

import { z } from 'zod';
import { formatZodErrors, SnapshotValidationError } from './errors';
import { ActivitySnapshot } from './types';

const statisticSchema = z.object({
  type: z.enum(['streak', 'percentage', 'cards']),
  value: z.number().finite(),
});

const dailyCountSchema = z.tuple([z.number().int(), z.number().finite().nonnegative()]);

export const activitySnapshotSchema = z.object({
  dailyCounts: z.array(dailyCountSchema),
  statistics: z.record(z.string(), statisticSchema),
  start: z.number().int(),
  stop: z.number().int(),
  today: z.number().int(),
  offset: z.number().int().min(0).max(23).default(0),
});

/**
 * Parse raw data into an ActivitySnapshot
 */
export function parseActivitySnapshot(raw: unknown): ActivitySnapshot {
  const result = activitySnapshotSchema.safeParse(raw);

  if (!result.success) {
    throw new SnapshotValidationError(formatZodErrors(result.error));
  }

  return result.data;
}

/**
 * A snapshot without any daily counts is the "no data" state
 */
export function hasActivity(snapshot: ActivitySnapshot | null): snapshot is ActivitySnapshot {
  return snapshot !== null && snapshot.dailyCounts.length > 0;
}
