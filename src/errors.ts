import type { ZodError } from 'zod';

export class HeatmapError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'HeatmapError';
  }
}

export class ConfigValidationError extends HeatmapError {
  readonly issues: string;

  constructor(issues: string) {
    super(`Invalid heatmap config: ${issues}`);
    this.name = 'ConfigValidationError';
    this.issues = issues;
  }
}

export class SnapshotValidationError extends HeatmapError {
  readonly issues: string;

  constructor(issues: string) {
    super(`Invalid activity snapshot: ${issues}`);
    this.name = 'SnapshotValidationError';
    this.issues = issues;
  }
}

export class MissingStatisticError extends HeatmapError {
  readonly statistic: string;

  constructor(statistic: string) {
    super(`Activity snapshot is missing statistic "${statistic}"`);
    this.name = 'MissingStatisticError';
    this.statistic = statistic;
  }
}

export class ThresholdTableError extends HeatmapError {
  constructor(message: string) {
    super(message);
    this.name = 'ThresholdTableError';
  }
}

/**
 * Format Zod validation errors into a single string, grouped by path,
 * e.g. "display.overview.heatmap: Expected boolean, received string"
 */
export function formatZodErrors(error: ZodError): string {
  return error.issues
    .map(issue => `${issue.path.length ? issue.path.join('.') : 'input'}: ${issue.message}`)
    .join('; ');
}
