/**
 * Cross-component performance cache
 *
 * The host owns the lifecycle; this package only writes to it.
 */

export interface PerformanceCache {
  write(streakMax: number, streakCur: number, dailyAvg: number): void;
}

export interface PerformanceRecord {
  streakMax: number;
  streakCur: number;
  activityDailyAvg: number;
}

/**
 * Last-writer-wins cache held in memory
 */
export class InMemoryPerformanceCache implements PerformanceCache {
  private record: PerformanceRecord | null = null;

  write(streakMax: number, streakCur: number, dailyAvg: number): void {
    this.record = { streakMax, streakCur, activityDailyAvg: dailyAvg };
  }

  read(): PerformanceRecord | null {
    return this.record;
  }
}
