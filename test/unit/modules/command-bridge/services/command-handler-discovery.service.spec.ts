import 'reflect-metadata';
import type { TestingModule } from '@nestjs/testing';
import { Test } from '@nestjs/testing';
import { Injectable, Logger } from '@nestjs/common';
import { DiscoveryModule } from '@nestjs/core';
import { COMMAND_BRIDGE_OPTIONS, CommandHandler, CommandHandlerDiscoveryService, CommandRegistryService } from '@src/index';
import type { OperationHandler, OperationResult } from '@src/index';

@Injectable()
@CommandHandler('probe')
class ProbeHandler implements OperationHandler {
  readonly category = 'probe';
  readonly version = '2.0.0';
  readonly supportedOperations = ['ping'];

  execute(): OperationResult {
    return { success: true };
  }
}

@Injectable()
@CommandHandler('broken')
class BrokenHandler {
  readonly category = 'broken';
}

@Injectable()
class UnrelatedService {
  readonly category = 'unrelated';
}

const configuredHandler: OperationHandler = {
  category: 'configured',
  version: '1.0.0',
  supportedOperations: ['echo'],
  execute: () => ({ success: true }),
};

describe('CommandHandlerDiscoveryService', () => {
  let module: TestingModule;
  let discovery: CommandHandlerDiscoveryService;
  let registry: CommandRegistryService;

  beforeEach(async () => {
    module = await Test.createTestingModule({
      imports: [DiscoveryModule],
      providers: [
        CommandRegistryService,
        CommandHandlerDiscoveryService,
        ProbeHandler,
        BrokenHandler,
        UnrelatedService,
        {
          provide: COMMAND_BRIDGE_OPTIONS,
          useValue: { handlers: { configured: configuredHandler } },
        },
      ],
    }).compile();

    discovery = module.get(CommandHandlerDiscoveryService);
    registry = module.get(CommandRegistryService);
  });

  afterEach(async () => {
    await module.close();
  });

  it('should be defined', () => {
    expect(discovery).toBeDefined();
    expect(discovery.isInitialized()).toBe(false);
  });

  it('should register decorated providers and configured handlers', () => {
    discovery.initializeHandlers();

    expect(discovery.isInitialized()).toBe(true);
    expect(registry.getRegisteredNames().sort()).toEqual(['configured', 'probe']);
    expect(registry.getHandler('probe')).toBe(module.get(ProbeHandler));
    expect(registry.getHandler('configured')).toBe(configuredHandler);
  });

  it('should warn about decorated classes that cannot execute', () => {
    const warnSpy = jest.spyOn(Logger.prototype, 'warn').mockImplementation();

    discovery.initializeHandlers();

    expect(warnSpy).toHaveBeenCalledWith("BrokenHandler is decorated with @CommandHandler('broken') but does not implement execute()");
    expect(registry.isRegistered('broken')).toBe(false);
  });

  it('should run the initialization pass only once', () => {
    const clearSpy = jest.spyOn(registry, 'clear');

    discovery.initializeHandlers();
    discovery.initializeHandlers();

    expect(clearSpy).toHaveBeenCalledTimes(1);
  });

  it('should start from an empty registry', () => {
    registry.register('stale', configuredHandler);

    discovery.initializeHandlers();

    expect(registry.isRegistered('stale')).toBe(false);
  });

  it('should run again on reinitialize', () => {
    const clearSpy = jest.spyOn(registry, 'clear');

    discovery.initializeHandlers();
    discovery.reinitialize();

    expect(clearSpy).toHaveBeenCalledTimes(2);
    expect(registry.getRegisteredNames().sort()).toEqual(['configured', 'probe']);
  });

  it('should log and stay uninitialized when discovery fails', () => {
    const errorSpy = jest.spyOn(Logger.prototype, 'error').mockImplementation();
    jest.spyOn(registry, 'clear').mockImplementationOnce(() => {
      throw new Error('registry unavailable');
    });

    expect(() => discovery.initializeHandlers()).not.toThrow();
    expect(discovery.isInitialized()).toBe(false);
    expect(errorSpy).toHaveBeenCalledWith('Failed to initialize command handlers:', expect.stringContaining('registry unavailable'));

    discovery.initializeHandlers();
    expect(discovery.isInitialized()).toBe(true);
  });

  it('should allow a fresh pass after resetInitializationState', () => {
    discovery.initializeHandlers();
    discovery.resetInitializationState();

    expect(discovery.isInitialized()).toBe(false);
  });
});
