// =============================================================================
// VALUE INTERFACES - Wire values and type descriptors
// =============================================================================

export * from './dynamic-value.interfaces';
export * from './type-descriptor.interfaces';

// =============================================================================
// HANDLER INTERFACES - Operation handlers, requests and results
// =============================================================================

export * from './handler.interfaces';

// =============================================================================
// COLLABORATOR INTERFACES - Resolvers, validator and side-effect hook
// =============================================================================

export * from './resolver.interfaces';

// =============================================================================
// COERCION INTERFACES - Converters and member outcomes
// =============================================================================

export * from './converter.interfaces';
export * from './member.interfaces';

// =============================================================================
// BATCH INTERFACES - Pattern resolution and batched execution
// =============================================================================

export * from './batch.interfaces';

// =============================================================================
// CONFIGURATION INTERFACES
// =============================================================================

export * from './configuration.interfaces';

// =============================================================================
// DEPENDENCY INJECTION TOKENS
// =============================================================================

/** DI token for command bridge configuration */
export const COMMAND_BRIDGE_OPTIONS = Symbol('COMMAND_BRIDGE_OPTIONS');

/** DI token for the live-object graph */
export const LIVE_OBJECT_RESOLVER = Symbol('LIVE_OBJECT_RESOLVER');

/** DI token for the asset store */
export const ASSET_RESOLVER = Symbol('ASSET_RESOLVER');

/** DI token for the type resolver */
export const TYPE_RESOLVER = Symbol('TYPE_RESOLVER');

/** DI token for the payload validator */
export const PAYLOAD_VALIDATOR = Symbol('PAYLOAD_VALIDATOR');

/** DI token for the post-mutation hook */
export const SIDE_EFFECT_WAITER = Symbol('SIDE_EFFECT_WAITER');

/** Metadata key for command handler registration */
export const COMMAND_HANDLER_METADATA = Symbol('COMMAND_HANDLER_METADATA');

/** Metadata key for exposed type names */
export const EXPOSED_TYPE_METADATA = Symbol('EXPOSED_TYPE_METADATA');

/** Metadata key for exposed member descriptors */
export const EXPOSED_MEMBERS_METADATA = Symbol('EXPOSED_MEMBERS_METADATA');

// =============================================================================
// RESERVED KEYS AND CONSTANTS
// =============================================================================

/** Result key the side-effect hook output is merged under */
export const SIDE_EFFECT_WAIT_KEY = 'sideEffectWait';

/** Operations that never trigger the side-effect hook */
export const READ_ONLY_OPERATIONS: ReadonlySet<string> = new Set(['inspect', 'list', 'find', 'findMultiple', 'inspectMultiple']);

export const DEFAULT_MAX_RESULTS = 1000;
