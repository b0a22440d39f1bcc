import type { DynamicMapping } from './dynamic-value.interfaces';
import type { AssetResolver, LiveObjectResolver, PayloadValidator, SideEffectWaiter, TypeResolver } from './resolver.interfaces';

/**
 * Uniform response envelope. Always carries `success`; on failure also
 * `error`, `errorType` and `category`.
 */
export interface OperationResult {
  success: boolean;
  error?: string;
  errorType?: string;
  category?: string;
  [key: string]: unknown;
}

/**
 * Named strategy for one operation group
 */
export interface OperationHandler {
  readonly category: string;
  readonly version: string;
  readonly supportedOperations: readonly string[];
  /** Never throws; every failure is reported through the envelope */
  execute(payload: DynamicMapping | null | undefined): OperationResult;
}

/**
 * Remote request routed by the dispatcher.
 * `payload.operation`, when present, must equal `operationName`.
 */
export interface OperationRequest {
  readonly handler: string;
  readonly operationName: string;
  readonly payload?: DynamicMapping | null;
}

/**
 * Collaborators shared by handlers built on `BaseCommandHandler`
 */
export interface CommandHandlerContext {
  readonly validator?: PayloadValidator;
  readonly liveObjects?: LiveObjectResolver;
  readonly assets?: AssetResolver;
  readonly types?: TypeResolver;
  readonly sideEffectWaiter?: SideEffectWaiter;
}

export interface HandlerRegistration {
  readonly name: string;
  readonly handler: OperationHandler;
  readonly category: string;
  readonly version: string;
  readonly registeredAt: number;
}

export interface HandlerStatisticsEntry {
  readonly name: string;
  readonly category: string;
  readonly version: string;
  readonly supportedOperations: readonly string[];
}

export interface RegistryStatistics {
  readonly totalHandlers: number;
  readonly entries: readonly HandlerStatisticsEntry[];
}

/**
 * Published once per dispatched request
 */
export interface CommandExecutionRecord {
  readonly executionId: string;
  readonly handler: string;
  readonly operation: string;
  readonly success: boolean;
  readonly errorType?: string;
  readonly durationMs: number;
  readonly timestamp: number;
}

/**
 * Type guard for objects exposing the handler capability
 */
export function isOperationHandler(value: unknown): value is OperationHandler {
  if (!value || typeof value !== 'object') {
    return false;
  }
  return (
    'execute' in value &&
    typeof value.execute === 'function' &&
    'supportedOperations' in value &&
    Array.isArray(value.supportedOperations) &&
    'category' in value &&
    typeof value.category === 'string'
  );
}
