export { ValueConverterService } from './value-converter.service';
export { TypeCatalogService } from './type-catalog.service';
export { MemberApplierService } from './member-applier.service';
export { CommandRegistryService } from './command-registry.service';
export { CommandHandlerDiscoveryService } from './command-handler-discovery.service';
export { CommandDispatcherService } from './command-dispatcher.service';
export { BatchResolutionService } from './batch-resolution.service';
export { HandlerContextService } from './handler-context.service';
