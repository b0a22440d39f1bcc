export * from './command-handler.decorator';
export * from './exposed-type.decorator';
