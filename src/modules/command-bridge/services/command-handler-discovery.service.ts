import { Inject, Injectable, Logger, Optional } from '@nestjs/common';
import { DiscoveryService, Reflector } from '@nestjs/core';
import { InstanceWrapper } from '@nestjs/core/injector/instance-wrapper';
import { COMMAND_BRIDGE_OPTIONS, COMMAND_HANDLER_METADATA, CommandBridgeOptions, isOperationHandler } from '../interfaces';
import { CommandRegistryService } from './command-registry.service';

/**
 * Populates the command registry once: clears it, then registers every
 * provider decorated with `@CommandHandler` and every handler passed in the
 * module options. Nested and repeated calls are no-ops.
 */
@Injectable()
export class CommandHandlerDiscoveryService {
  private readonly logger = new Logger(CommandHandlerDiscoveryService.name);
  private initializing = false;
  private initialized = false;

  constructor(
    private readonly discoveryService: DiscoveryService,
    private readonly reflector: Reflector,
    private readonly registry: CommandRegistryService,
    @Optional()
    @Inject(COMMAND_BRIDGE_OPTIONS)
    private readonly options: CommandBridgeOptions = {},
  ) {}

  initializeHandlers(): void {
    if (this.initialized || this.initializing) {
      return;
    }

    this.initializing = true;
    try {
      this.registry.clear();
      this.discoverHandlers();
      this.registerConfiguredHandlers();
      this.initialized = true;
      this.logger.log(`Initialized ${this.registry.getRegisteredNames().length} command handlers`);
    } catch (error: unknown) {
      this.logger.error('Failed to initialize command handlers:', error instanceof Error ? error.stack : String(error));
    } finally {
      this.initializing = false;
    }
  }

  /**
   * Runs the initialization pass again, e.g. after providers changed
   */
  reinitialize(): void {
    this.initialized = false;
    this.initializeHandlers();
  }

  isInitialized(): boolean {
    return this.initialized;
  }

  /** Test hook */
  resetInitializationState(): void {
    this.initialized = false;
    this.initializing = false;
  }

  private discoverHandlers(): void {
    const providers = this.discoveryService.getProviders();
    const controllers = this.discoveryService.getControllers();

    [...providers, ...controllers].forEach((wrapper: InstanceWrapper) => {
      const { instance, metatype } = wrapper as { instance: unknown; metatype: unknown };
      if (!instance || typeof instance !== 'object' || typeof metatype !== 'function') {
        return;
      }

      const name = this.reflector.get<string | undefined>(COMMAND_HANDLER_METADATA, metatype);
      if (!name) {
        return;
      }

      if (!isOperationHandler(instance)) {
        this.logger.warn(`${metatype.name} is decorated with @CommandHandler('${name}') but does not implement execute()`);
        return;
      }

      this.registry.register(name, instance);
      this.logger.log(`Registered command handler: ${metatype.name} as '${name}'`);
    });
  }

  private registerConfiguredHandlers(): void {
    for (const [name, handler] of Object.entries(this.options.handlers ?? {})) {
      this.registry.register(name, handler);
      this.logger.log(`Registered configured command handler '${name}'`);
    }
  }
}
