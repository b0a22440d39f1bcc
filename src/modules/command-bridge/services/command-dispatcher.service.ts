import { Injectable, Logger, OnModuleDestroy } from '@nestjs/common';
import { Observable, Subject } from 'rxjs';
import { v4 as uuidv4 } from 'uuid';
import { CommandBridgeError, UnsupportedOperationError, ValidationError, toCommandBridgeError } from '../errors';
import { CommandExecutionRecord, DynamicMapping, OperationRequest, OperationResult } from '../interfaces';
import { CommandRegistryService } from './command-registry.service';

const DISPATCHER_CATEGORY = 'commandBridge';

/**
 * Entry point for remote requests: looks the handler up by name and runs it.
 * Every call yields an envelope; nothing is thrown to the caller.
 */
@Injectable()
export class CommandDispatcherService implements OnModuleDestroy {
  private readonly logger = new Logger(CommandDispatcherService.name);
  private readonly executions$ = new Subject<CommandExecutionRecord>();

  constructor(private readonly registry: CommandRegistryService) {}

  /**
   * Routes a request. The payload's `operation`, when present, must match
   * `operationName`; when absent it is filled in.
   */
  execute(request: OperationRequest): OperationResult {
    const payload: DynamicMapping = { ...(request.payload ?? {}) };
    const declared = payload.operation;

    if (declared !== undefined && declared !== null && declared !== request.operationName) {
      const error = new ValidationError(
        `Payload operation '${String(declared)}' does not match requested operation '${request.operationName}'`,
      );
      return this.record(request.handler, request.operationName, Date.now(), this.toFailure(error));
    }

    payload.operation = request.operationName;
    return this.dispatch(request.handler, payload);
  }

  /**
   * Runs the named handler on a raw payload
   */
  dispatch(handlerName: string, payload: DynamicMapping | null | undefined): OperationResult {
    const startedAt = Date.now();
    const operation = typeof payload?.operation === 'string' ? payload.operation : '';

    const handler = this.registry.tryGetHandler(handlerName);
    if (!handler) {
      const available = this.registry.getRegisteredNames();
      const error = new UnsupportedOperationError(`Unknown handler '${handlerName}'. Available handlers: ${available.join(', ')}`, available);
      this.logger.warn(error.message);
      return this.record(handlerName, operation, startedAt, this.toFailure(error));
    }

    let result: OperationResult;
    try {
      result = handler.execute(payload);
    } catch (error: unknown) {
      // handlers built on BaseCommandHandler never throw; foreign ones may
      const wrapped = toCommandBridgeError(error);
      this.logger.error(`Handler '${handlerName}' threw during '${operation}': ${wrapped.message}`);
      result = { ...this.toFailure(wrapped), category: handler.category };
    }

    return this.record(handlerName, operation, startedAt, result);
  }

  getExecutionResults(): Observable<CommandExecutionRecord> {
    return this.executions$.asObservable();
  }

  onModuleDestroy(): void {
    this.executions$.complete();
  }

  private toFailure(error: CommandBridgeError): OperationResult {
    return { success: false, error: error.message, errorType: error.errorType, category: DISPATCHER_CATEGORY };
  }

  private record(handler: string, operation: string, startedAt: number, result: OperationResult): OperationResult {
    const timestamp = Date.now();
    this.executions$.next({
      executionId: uuidv4(),
      handler,
      operation,
      success: result.success,
      errorType: result.errorType,
      durationMs: timestamp - startedAt,
      timestamp,
    });
    return result;
  }
}
