import 'reflect-metadata';

export * from './modules/command-bridge';
