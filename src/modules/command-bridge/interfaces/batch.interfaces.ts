import type { DynamicMapping } from './dynamic-value.interfaces';
import type { LiveObjectEntry } from './resolver.interfaces';

/**
 * Pattern match over the live-object graph, after truncation
 */
export interface ResolvedTargets {
  readonly pattern: string;
  readonly targets: LiveObjectEntry[];
  /** Matches before truncation */
  readonly totalCount: number;
  readonly truncated: boolean;
}

export interface BatchItemResult {
  readonly target: string;
  readonly success: boolean;
  readonly result?: DynamicMapping;
  readonly error?: string;
}

export interface BatchError {
  readonly target: string;
  readonly error: string;
}

export interface BatchResult {
  /** Targets handed to the batch */
  readonly totalCount: number;
  readonly successCount: number;
  readonly errorCount: number;
  /** True when `stopOnError` halted the loop before the last target */
  readonly stopped: boolean;
  /** One entry per processed target */
  readonly results: BatchItemResult[];
  readonly errors: BatchError[];
}

export interface BatchRunOptions {
  readonly stopOnError?: boolean;
}

export type BatchOperation = (target: LiveObjectEntry) => DynamicMapping;
