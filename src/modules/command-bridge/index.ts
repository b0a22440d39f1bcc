/**
 * @fileoverview Command Bridge - NestJS routing and coercion for remote operations
 *
 * Routes untyped, JSON-like operation requests to named handlers and coerces
 * payload values into the typed members of a live object graph:
 * - `@CommandHandler` discovery into one command registry
 * - Template-method handler pipeline with a uniform response envelope
 * - Priority-ordered value coercion chain
 * - Partial-success member and batch updates
 */

// =============================================================================
// CORE EXPORTS - Module, decorators and handler base
// =============================================================================

export { CommandBridgeModule } from './command-bridge.module';
export { CommandHandler, ExposedType, ExposedProperty, SerializedField } from './decorators';
export type { ExposedTypeOptions, ExposedPropertyOptions, SerializedFieldOptions } from './decorators';
export { BaseCommandHandler, StandardPayloadValidator } from './base';
export type { OperationSchema, ParameterKind, PayloadRule } from './base';

// =============================================================================
// SERVICES - All injectable services
// =============================================================================

export {
  ValueConverterService,
  TypeCatalogService,
  MemberApplierService,
  CommandRegistryService,
  CommandHandlerDiscoveryService,
  CommandDispatcherService,
  BatchResolutionService,
  HandlerContextService,
} from './services';

// =============================================================================
// HANDLERS
// =============================================================================

export { ObjectMemberHandler, OBJECT_MEMBER_HANDLER_NAME } from './handlers';

// =============================================================================
// CONVERTERS
// =============================================================================

export {
  ReferenceValueConverter,
  SequenceValueConverter,
  CompositeValueConverter,
  EnumValueConverter,
  PrimitiveValueConverter,
  StructuralValueConverter,
  createDefaultConverters,
} from './converters';

// =============================================================================
// ERRORS
// =============================================================================

export {
  CommandBridgeError,
  ValidationError,
  UnsupportedOperationError,
  TargetNotFoundError,
  ConversionError,
  HandlerExecutionError,
  toCommandBridgeError,
} from './errors';

// =============================================================================
// TYPE EXPORTS - Interfaces, tokens and constants
// =============================================================================

export * from './interfaces';
export { Types, describeType, defaultValueFor } from './utils';

// =============================================================================
// ADAPTERS
// =============================================================================

export { InMemoryResourceStore, InMemoryObjectGraphAdapter, InMemoryAssetStoreAdapter } from './adapters';
export type { AddResourceOptions } from './adapters';
