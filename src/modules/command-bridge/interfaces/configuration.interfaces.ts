import type { ValueConverter } from './converter.interfaces';
import type { OperationHandler } from './handler.interfaces';
import type { AssetResolver, LiveObjectResolver, PayloadValidator, SideEffectWaiter, TypeResolver } from './resolver.interfaces';
import type { CompositeTypeDescriptor, ExposedClass } from './type-descriptor.interfaces';

/**
 * Module configuration for `CommandBridgeModule.forRoot`
 */
export interface CommandBridgeOptions {
  /** Upper bound on batch targets when a request names none (default 1000) */
  defaultMaxResults?: number;
  /** Register the built-in `memberManage` handler (default true) */
  registerBuiltInHandlers?: boolean;
  /** Extra handlers registered during initialization, by name */
  handlers?: Record<string, OperationHandler>;
  /** Live-object graph; an in-memory graph is used when absent */
  liveObjects?: LiveObjectResolver;
  /** Asset store; an in-memory store is used when absent */
  assets?: AssetResolver;
  /** Replaces the built-in type catalog as the type resolver */
  typeResolver?: TypeResolver;
  validator?: PayloadValidator;
  sideEffectWaiter?: SideEffectWaiter;
  /** Added to the coercion chain by priority */
  converters?: ValueConverter[];
  /** Classes or composite descriptors seeding the type catalog */
  exposedTypes?: Array<ExposedClass | CompositeTypeDescriptor>;
}
