import { DynamicModule, Global, Logger, Module, OnModuleInit, Provider } from '@nestjs/common';
import { DiscoveryModule } from '@nestjs/core';
import { InMemoryAssetStoreAdapter, InMemoryObjectGraphAdapter } from './adapters';
import { ObjectMemberHandler } from './handlers';
import {
  ASSET_RESOLVER,
  COMMAND_BRIDGE_OPTIONS,
  CommandBridgeOptions,
  LIVE_OBJECT_RESOLVER,
  PAYLOAD_VALIDATOR,
  SIDE_EFFECT_WAITER,
  TYPE_RESOLVER,
} from './interfaces';
import {
  BatchResolutionService,
  CommandDispatcherService,
  CommandHandlerDiscoveryService,
  CommandRegistryService,
  HandlerContextService,
  MemberApplierService,
  TypeCatalogService,
  ValueConverterService,
} from './services';

/**
 * NestJS module routing remote operation requests to handlers and coercing
 * untyped payload values into typed members.
 *
 * Features:
 * - `@CommandHandler` discovery into a single command registry
 * - Shared validate / dispatch / error-wrap pipeline via `BaseCommandHandler`
 * - Priority-ordered coercion chain for primitives, enumerations, composites,
 *   collections and live-object references
 * - Partial-success member updates and pattern-based batch updates
 *
 * @example
 * ```typescript
 * @Module({
 *   imports: [
 *     CommandBridgeModule.forRoot({
 *       liveObjects: sceneGraph,
 *       exposedTypes: [Light, Camera],
 *       defaultMaxResults: 500,
 *     }),
 *   ],
 *   providers: [LightHandler],
 * })
 * export class AppModule {}
 * ```
 */
@Global()
@Module({})
export class CommandBridgeModule implements OnModuleInit {
  private readonly logger = new Logger(CommandBridgeModule.name);

  static forRoot(options: CommandBridgeOptions = {}): DynamicModule {
    const providers: Provider[] = [
      {
        provide: COMMAND_BRIDGE_OPTIONS,
        useValue: options,
      },
      {
        provide: LIVE_OBJECT_RESOLVER,
        useValue: options.liveObjects ?? new InMemoryObjectGraphAdapter(),
      },
      {
        provide: ASSET_RESOLVER,
        useValue: options.assets ?? new InMemoryAssetStoreAdapter(),
      },
      options.typeResolver ? { provide: TYPE_RESOLVER, useValue: options.typeResolver } : { provide: TYPE_RESOLVER, useExisting: TypeCatalogService },

      // Core services
      ValueConverterService,
      TypeCatalogService,
      MemberApplierService,
      CommandRegistryService,
      CommandHandlerDiscoveryService,
      CommandDispatcherService,
      BatchResolutionService,
      HandlerContextService,
    ];

    if (options.validator) {
      providers.push({ provide: PAYLOAD_VALIDATOR, useValue: options.validator });
    }
    if (options.sideEffectWaiter) {
      providers.push({ provide: SIDE_EFFECT_WAITER, useValue: options.sideEffectWaiter });
    }
    if (options.registerBuiltInHandlers !== false) {
      providers.push(ObjectMemberHandler);
    }

    return {
      module: CommandBridgeModule,
      imports: [DiscoveryModule],
      providers,
      exports: [
        LIVE_OBJECT_RESOLVER,
        ASSET_RESOLVER,
        TYPE_RESOLVER,
        ValueConverterService,
        TypeCatalogService,
        MemberApplierService,
        CommandRegistryService,
        CommandHandlerDiscoveryService,
        CommandDispatcherService,
        BatchResolutionService,
        HandlerContextService,
      ],
    };
  }

  constructor(
    private readonly discovery: CommandHandlerDiscoveryService,
    private readonly registry: CommandRegistryService,
  ) {}

  onModuleInit(): void {
    this.logger.log('Initializing CommandBridge Module ...');

    this.discovery.initializeHandlers();

    const stats = this.registry.getStatistics();
    this.logger.log(`Command handlers registered: ${stats.totalHandlers}`);
    stats.entries.forEach((entry) => {
      this.logger.debug(`  - ${entry.name} (${entry.category} v${entry.version}): ${entry.supportedOperations.join(', ')}`);
    });
  }
}
