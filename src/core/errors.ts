/**
 * Engine error taxonomy.
 *
 * Every error carries an issue kind so the scan can record it as a
 * structured issue instead of aborting. Only BenchmarkUnavailableError is
 * fatal, and only for the timeframe it names.
 */

import type { Timeframe } from '@/types/bars';

export type IssueKind =
  | 'insufficient_data'
  | 'undefined_metric'
  | 'data_unavailable'
  | 'degenerate_distribution'
  | 'benchmark_unavailable';

export class EngineError extends Error {
  constructor(
    message: string,
    public readonly kind: IssueKind
  ) {
    super(message);
    this.name = 'EngineError';
  }
}

export class InsufficientDataError extends EngineError {
  constructor(
    public readonly subject: string,
    public readonly required: number,
    public readonly available: number
  ) {
    super(
      `${subject}: needs at least ${required} bars, got ${available}`,
      'insufficient_data'
    );
    this.name = 'InsufficientDataError';
  }
}

export class UndefinedMetricError extends EngineError {
  constructor(
    public readonly subject: string,
    reason: string
  ) {
    super(`${subject}: ${reason}`, 'undefined_metric');
    this.name = 'UndefinedMetricError';
  }
}

export class DataUnavailableError extends EngineError {
  constructor(
    public readonly symbol: string,
    public readonly timeframe: Timeframe,
    reason: string = 'no bars returned'
  ) {
    super(`${symbol} ${timeframe}: ${reason}`, 'data_unavailable');
    this.name = 'DataUnavailableError';
  }
}

export class BenchmarkUnavailableError extends EngineError {
  constructor(
    public readonly benchmark: string,
    public readonly timeframes: readonly Timeframe[]
  ) {
    super(
      `Benchmark ${benchmark} has no bars for ${timeframes.join(', ')}`,
      'benchmark_unavailable'
    );
    this.name = 'BenchmarkUnavailableError';
  }
}

export function isEngineError(error: unknown): error is EngineError {
  return error instanceof EngineError;
}
