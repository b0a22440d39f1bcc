import { Inject, Injectable, Logger, Optional } from '@nestjs/common';
import { ValidationError, describeError } from '../errors';
import {
  BatchError,
  BatchItemResult,
  BatchOperation,
  BatchResult,
  BatchRunOptions,
  COMMAND_BRIDGE_OPTIONS,
  CommandBridgeOptions,
  DEFAULT_MAX_RESULTS,
  LIVE_OBJECT_RESOLVER,
  LiveObjectEntry,
  LiveObjectResolver,
  ResolvedTargets,
} from '../interfaces';
import { createPathMatcher } from '../utils';

/**
 * Resolves path patterns into ordered target sets and runs single-target
 * operations across them, collecting failures instead of aborting
 */
@Injectable()
export class BatchResolutionService {
  private readonly logger = new Logger(BatchResolutionService.name);

  constructor(
    @Optional()
    @Inject(LIVE_OBJECT_RESOLVER)
    private readonly liveObjects?: LiveObjectResolver,
    @Optional()
    @Inject(COMMAND_BRIDGE_OPTIONS)
    private readonly options: CommandBridgeOptions = {},
  ) {}

  get defaultMaxResults(): number {
    return this.options.defaultMaxResults ?? DEFAULT_MAX_RESULTS;
  }

  /**
   * Every live object whose full path matches, in enumeration order, cut
   * to `maxResults`
   */
  resolveTargets(pattern: string, useRegex = false, maxResults = this.defaultMaxResults): ResolvedTargets {
    if (!pattern || !pattern.trim()) {
      throw new ValidationError('Pattern cannot be null or empty');
    }
    if (!Number.isInteger(maxResults) || maxResults <= 0) {
      throw new ValidationError(`maxResults must be a positive integer, got ${maxResults}`);
    }
    if (!this.liveObjects) {
      throw new ValidationError('No live-object resolver is configured');
    }

    const matches = createPathMatcher(pattern, useRegex);
    const matched: LiveObjectEntry[] = [];
    for (const entry of this.liveObjects.enumerate()) {
      if (matches(entry.path)) {
        matched.push(entry);
      }
    }

    const truncated = matched.length > maxResults;
    if (truncated) {
      this.logger.debug(`Pattern '${pattern}' matched ${matched.length} targets; keeping the first ${maxResults}`);
    }

    return {
      pattern,
      targets: truncated ? matched.slice(0, maxResults) : matched,
      totalCount: matched.length,
      truncated,
    };
  }

  /**
   * Runs `operation` on each target in order. A thrown error is recorded
   * against its target; with `stopOnError` the loop halts right after.
   */
  runBatched(targets: readonly LiveObjectEntry[], operation: BatchOperation, options: BatchRunOptions = {}): BatchResult {
    const results: BatchItemResult[] = [];
    const errors: BatchError[] = [];
    let stopped = false;

    for (const [index, target] of targets.entries()) {
      try {
        results.push({ target: target.path, success: true, result: operation(target) });
      } catch (error: unknown) {
        const message = describeError(error);
        results.push({ target: target.path, success: false, error: message });
        errors.push({ target: target.path, error: message });

        if (options.stopOnError) {
          stopped = index < targets.length - 1;
          this.logger.warn(`Batch stopped at '${target.path}': ${message}`);
          break;
        }
      }
    }

    return {
      totalCount: targets.length,
      successCount: results.length - errors.length,
      errorCount: errors.length,
      stopped,
      results,
      errors,
    };
  }
}
