/**
 * Firestore activity reporter
 *
 * Scope:
 * - Read-only: history is computed and stored elsewhere
 * - One summary document + one bounded range query per render
 */

import { getFirestore } from 'firebase-admin/firestore';
import type { DocumentData, OrderByDirection, WhereFilterOp } from 'firebase-admin/firestore';
import { logger } from './logger';
import { parseActivitySnapshot } from './snapshot';
import { ActivityLimits, ActivityReporter, ActivitySnapshot, DailyCount } from './types';

const MAX_DAYS = 800;

export type ReportScope = 'deck' | 'collection';

/**
 * The slice of the Firestore API the reporter reads through
 * (a firebase-admin Firestore instance satisfies it)
 */
export interface FirestoreLike {
  collection(path: string): CollectionLike;
}

export interface CollectionLike extends QueryLike {
  doc(path: string): DocumentLike;
}

export interface DocumentLike {
  collection(path: string): CollectionLike;
  get(): Promise<{ readonly exists: boolean; data(): DocumentData | undefined }>;
}

export interface QueryLike {
  where(fieldPath: string, opStr: WhereFilterOp, value: unknown): QueryLike;
  orderBy(fieldPath: string, directionStr?: OrderByDirection): QueryLike;
  limit(limit: number): QueryLike;
  get(): Promise<{ docs: Array<{ data(): DocumentData }> }>;
}

/**
 * Fetch the activity snapshot for a user
 *
 * The returned window is the report's [start, stop] narrowed by the limits
 * (relative to today) and capped at MAX_DAYS, counted back from its end.
 *
 * @param db - Firestore instance
 * @param userId - User ID
 * @param scope - Which precomputed report to read
 * @param limits - Days of history/forecast to include (default: full report window)
 */
export async function fetchActivitySnapshot(
  db: FirestoreLike,
  userId: string,
  scope: ReportScope,
  limits: ActivityLimits = {}
): Promise<ActivitySnapshot | null> {
  const userRef = db.collection('users').doc(userId);
  const report = await userRef.collection('heatmapReports').doc(scope).get();

  if (!report.exists) {
    logger.info('fetchActivitySnapshot', `no ${scope} report for user ${userId}`);
    return null;
  }

  const summary = report.data() ?? {};
  const today = Number(summary.today);
  const start = Number(summary.start);
  const stop = Number(summary.stop);

  const last = limits.forecastLimit != null ? Math.min(stop, today + limits.forecastLimit) : stop;
  const first = Math.max(
    limits.historyLimit != null ? Math.max(start, today - limits.historyLimit) : start,
    last - MAX_DAYS + 1
  );

  // Newest first: the cap drops only the oldest days
  const days = await userRef
    .collection('dailyActivity')
    .where('day', '>=', first)
    .where('day', '<=', last)
    .orderBy('day', 'desc')
    .limit(MAX_DAYS)
    .get();

  const dailyCounts = days.docs
    .map((doc): DailyCount => {
      const data = doc.data();
      return [Number(data.day), Number(data.count) || 0];
    })
    .reverse();

  return parseActivitySnapshot({ ...summary, start: first, stop: last, dailyCounts });
}

/**
 * ActivityReporter backed by Firestore
 */
export class FirestoreActivityReporter implements ActivityReporter {
  constructor(
    private readonly db: FirestoreLike,
    private readonly userId: string,
    private readonly whole: boolean = false
  ) {}

  /**
   * Reporter on the default firebase-admin app's Firestore
   */
  static forDefaultApp(userId: string, whole: boolean = false): FirestoreActivityReporter {
    return new FirestoreActivityReporter(getFirestore(), userId, whole);
  }

  getData(limits: ActivityLimits): Promise<ActivitySnapshot | null> {
    return fetchActivitySnapshot(this.db, this.userId, this.whole ? 'collection' : 'deck', limits);
  }
}

/**
 * REQUIRED FIRESTORE INDEX
 *
 * Collection: users/{userId}/dailyActivity
 *
 * Single-field index on `day` covers the range + orderBy.
 * Reads per render are bounded by MAX_DAYS.
 */
