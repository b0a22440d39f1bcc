export * from './dynamic-value.utils';
export * from './type-descriptor.utils';
export * from './wildcard.utils';
