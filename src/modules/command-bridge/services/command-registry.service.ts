import { Injectable, Logger, OnModuleDestroy } from '@nestjs/common';
import { BehaviorSubject, Observable } from 'rxjs';
import { UnsupportedOperationError, ValidationError } from '../errors';
import { HandlerRegistration, OperationHandler, RegistryStatistics } from '../interfaces';

/**
 * Maps operation-group names to handler instances. Written only during the
 * guarded initialization pass, read by the dispatcher afterwards.
 */
@Injectable()
export class CommandRegistryService implements OnModuleDestroy {
  private readonly logger = new Logger(CommandRegistryService.name);
  private readonly handlers = new Map<string, HandlerRegistration>();
  private readonly registrations$ = new BehaviorSubject<HandlerRegistration[]>([]);

  /**
   * Inserts or replaces a handler. Last write wins.
   */
  register(name: string, handler: OperationHandler): void {
    if (!name || !name.trim()) {
      throw new ValidationError('Handler name cannot be null or empty');
    }
    if (!handler) {
      throw new ValidationError(`Handler for '${name}' cannot be null`);
    }

    if (this.handlers.has(name)) {
      this.logger.warn(`Handler '${name}' is already registered. Overwriting...`);
    }

    this.handlers.set(name, {
      name,
      handler,
      category: handler.category,
      version: handler.version,
      registeredAt: Date.now(),
    });
    this.publish();
    this.logger.debug(`Registered handler '${name}' (category: ${handler.category}, version: ${handler.version})`);
  }

  clear(): void {
    this.handlers.clear();
    this.publish();
    this.logger.debug('Cleared all handlers');
  }

  tryGetHandler(name: string): OperationHandler | undefined {
    return this.handlers.get(name)?.handler;
  }

  getHandler(name: string): OperationHandler {
    const handler = this.tryGetHandler(name);
    if (!handler) {
      const available = this.getRegisteredNames();
      throw new UnsupportedOperationError(`No handler registered for '${name}'. Available handlers: ${available.join(', ')}`, available);
    }
    return handler;
  }

  isRegistered(name: string): boolean {
    return this.handlers.has(name);
  }

  getRegisteredNames(): string[] {
    return Array.from(this.handlers.keys());
  }

  getStatistics(): RegistryStatistics {
    const entries = Array.from(this.handlers.values()).map((registration) => ({
      name: registration.name,
      category: registration.category,
      version: registration.version,
      supportedOperations: [...registration.handler.supportedOperations],
    }));
    return { totalHandlers: entries.length, entries };
  }

  getRegistrationsObservable(): Observable<HandlerRegistration[]> {
    return this.registrations$.asObservable();
  }

  onModuleDestroy(): void {
    this.registrations$.complete();
  }

  private publish(): void {
    this.registrations$.next(Array.from(this.handlers.values()));
  }
}
