import { Logger } from '@nestjs/common';
import { HandlerExecutionError, TargetNotFoundError, UnsupportedOperationError, ValidationError, toCommandBridgeError } from '../errors';
import {
  CommandHandlerContext,
  CompositeTypeDescriptor,
  DynamicMapping,
  DynamicValue,
  LiveObjectLocator,
  LiveObjectResolver,
  OperationHandler,
  OperationResult,
  PayloadValidator,
  READ_ONLY_OPERATIONS,
  SIDE_EFFECT_WAIT_KEY,
} from '../interfaces';
import { StandardPayloadValidator } from './standard-payload.validator';

const INTEGER_TEXT = /^[+-]?\d+$/;

/**
 * Shared execution pipeline for operation handlers.
 *
 * `execute` validates the payload, checks the operation against
 * `supportedOperations`, runs `executeOperation`, collects side-effect
 * results for mutating operations and wraps everything in the response
 * envelope. Nothing thrown inside escapes.
 *
 * @example
 * ```typescript
 * @Injectable()
 * @CommandHandler('lightManage')
 * export class LightHandler extends BaseCommandHandler {
 *   readonly category = 'light';
 *   readonly supportedOperations = ['inspect', 'toggle'];
 *
 *   constructor(context: HandlerContextService) {
 *     super(context);
 *   }
 *
 *   protected executeOperation(operation: string, payload: DynamicMapping) {
 *     const light = this.resolveTargetFromPayload(payload);
 *     ...
 *   }
 * }
 * ```
 */
export abstract class BaseCommandHandler implements OperationHandler {
  protected readonly logger: Logger;

  abstract readonly category: string;
  abstract readonly supportedOperations: readonly string[];
  readonly version: string = '1.0.0';

  private payloadValidator?: PayloadValidator;

  constructor(protected readonly context: CommandHandlerContext = {}) {
    this.logger = new Logger(new.target.name);
  }

  /**
   * The bound validator, or this handler's own standard validator
   */
  protected get validator(): PayloadValidator {
    if (!this.payloadValidator) {
      this.payloadValidator = this.context.validator ?? this.createDefaultValidator();
    }
    return this.payloadValidator;
  }

  execute(payload: DynamicMapping | null | undefined): OperationResult {
    let operation = '';

    try {
      if (!payload) {
        throw new ValidationError('Payload cannot be null');
      }

      const requested = payload.operation;
      if (requested === undefined) {
        throw new ValidationError("'operation' parameter is required");
      }
      if (typeof requested !== 'string' || !requested.trim()) {
        throw new ValidationError("'operation' parameter cannot be null or empty");
      }
      operation = requested;

      const validation = this.validator.validate(payload, operation);
      if (!validation.isValid) {
        throw new ValidationError(`Payload validation failed: ${validation.errors.join('; ')}`, validation.errors);
      }
      if (validation.normalizedPayload) {
        for (const [key, value] of Object.entries(validation.normalizedPayload)) {
          payload[key] = value;
        }
      }

      if (!this.supportedOperations.includes(operation)) {
        throw new UnsupportedOperationError(
          `Operation '${operation}' is not supported by ${this.category} handler. Supported operations: ${this.supportedOperations.join(', ')}`,
          this.supportedOperations,
        );
      }

      this.logger.debug(`Executing ${this.category}.${operation}`);
      const response: OperationResult = { success: true, ...this.executeOperation(operation, payload) };

      if (!READ_ONLY_OPERATIONS.has(operation)) {
        const sideEffects = this.waitForSideEffects(operation);
        if (sideEffects !== null) {
          response[SIDE_EFFECT_WAIT_KEY] = sideEffects;
        }
      }

      return response;
    } catch (error: unknown) {
      return this.createErrorResponse(error, operation);
    }
  }

  /**
   * Operation body. Return the result fields; throw to fail.
   */
  protected abstract executeOperation(operation: string, payload: DynamicMapping): Record<string, unknown>;

  protected createDefaultValidator(): PayloadValidator {
    return new StandardPayloadValidator();
  }

  /**
   * Post-mutation hook, skipped for read-only operations
   */
  protected waitForSideEffects(operation: string): DynamicMapping | null {
    return this.context.sideEffectWaiter?.(operation) ?? null;
  }

  protected createErrorResponse(error: unknown, operation: string): OperationResult {
    const wrapped = toCommandBridgeError(error);
    this.logger.error(`${this.category}.${operation || '<none>'} failed: ${wrapped.message}`);
    return {
      success: false,
      error: wrapped.message,
      errorType: wrapped.errorType,
      category: this.category,
    };
  }

  protected createSuccessResponse(data: Record<string, unknown> = {}): OperationResult {
    return { ...data, success: true };
  }

  /**
   * Expected failure reported without throwing
   */
  protected createFailureResponse(message: string, data: Record<string, unknown> = {}, errorType = 'HandlerExecutionError'): OperationResult {
    return { ...data, success: false, error: message, errorType, category: this.category };
  }

  // ---------------------------------------------------------------------------
  // Payload helpers
  // ---------------------------------------------------------------------------

  protected getString(payload: DynamicMapping, key: string): string | undefined;
  protected getString(payload: DynamicMapping, key: string, defaultValue: string): string;
  protected getString(payload: DynamicMapping, key: string, defaultValue?: string): string | undefined {
    const value = payload[key];
    if (typeof value === 'string') {
      return value;
    }
    if (typeof value === 'number' || typeof value === 'boolean') {
      return String(value);
    }
    return defaultValue;
  }

  protected getBool(payload: DynamicMapping, key: string, defaultValue = false): boolean {
    const value = payload[key];
    if (typeof value === 'boolean') {
      return value;
    }
    if (typeof value === 'number') {
      return value !== 0;
    }
    if (typeof value === 'string') {
      const text = value.trim().toLowerCase();
      if (text === 'true') return true;
      if (text === 'false') return false;
    }
    return defaultValue;
  }

  protected getInt(payload: DynamicMapping, key: string): number | undefined;
  protected getInt(payload: DynamicMapping, key: string, defaultValue: number): number;
  protected getInt(payload: DynamicMapping, key: string, defaultValue?: number): number | undefined {
    const value = payload[key];
    if (typeof value === 'number' && Number.isFinite(value)) {
      return Math.trunc(value);
    }
    if (typeof value === 'string' && INTEGER_TEXT.test(value.trim())) {
      return Number.parseInt(value.trim(), 10);
    }
    return defaultValue;
  }

  protected getFloat(payload: DynamicMapping, key: string): number | undefined;
  protected getFloat(payload: DynamicMapping, key: string, defaultValue: number): number;
  protected getFloat(payload: DynamicMapping, key: string, defaultValue?: number): number | undefined {
    const value = payload[key];
    if (typeof value === 'number') {
      return value;
    }
    if (typeof value === 'string' && value.trim() !== '' && !Number.isNaN(Number(value))) {
      return Number(value);
    }
    return defaultValue;
  }

  protected getMapping(payload: DynamicMapping, key: string): DynamicMapping | undefined {
    const value = payload[key];
    return value !== null && typeof value === 'object' && !Array.isArray(value) ? value : undefined;
  }

  protected getSequence(payload: DynamicMapping, key: string): DynamicValue[] | undefined {
    const value = payload[key];
    return Array.isArray(value) ? value : undefined;
  }

  // ---------------------------------------------------------------------------
  // Resolution helpers
  // ---------------------------------------------------------------------------

  protected get liveObjects(): LiveObjectResolver {
    if (!this.context.liveObjects) {
      throw new HandlerExecutionError(`${this.category} handler has no live-object resolver`);
    }
    return this.context.liveObjects;
  }

  protected resolveTarget(identifier: string): object {
    return this.liveObjects.resolve(identifier);
  }

  protected tryResolveTarget(identifier: string): object | undefined {
    return this.context.liveObjects?.tryResolve(identifier);
  }

  /**
   * Target named by `objectId`, or by `objectPath` when no id is given or
   * the id matches nothing
   */
  protected resolveTargetFromPayload(payload: DynamicMapping): object {
    const objectId = this.getString(payload, 'objectId');
    const objectPath = this.getString(payload, 'objectPath');

    if (objectId) {
      const byId = this.liveObjects.tryResolve(objectId);
      if (byId) {
        return byId;
      }
    }
    if (objectPath) {
      return this.resolveTarget(objectPath);
    }
    if (objectId) {
      throw new TargetNotFoundError(`Object not found: ${objectId}`, objectId);
    }
    throw new ValidationError("Either 'objectId' or 'objectPath' is required");
  }

  protected resolveAsset(identifier: string): object {
    if (!this.context.assets) {
      throw new HandlerExecutionError(`${this.category} handler has no asset resolver`);
    }
    return this.context.assets.resolve(identifier);
  }

  protected resolveType(name: string): CompositeTypeDescriptor {
    if (!this.context.types) {
      throw new HandlerExecutionError(`${this.category} handler has no type resolver`);
    }
    return this.context.types.resolve(name);
  }

  protected describeTarget(target: object): LiveObjectLocator | undefined {
    return this.context.liveObjects?.describe(target) ?? this.context.assets?.describe(target);
  }
}
