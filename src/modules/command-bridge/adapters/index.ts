export * from './in-memory-resource.store';
export * from './in-memory-object-graph.adapter';
export * from './in-memory-asset-store.adapter';
