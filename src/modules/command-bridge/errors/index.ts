export * from './command-bridge.errors';
