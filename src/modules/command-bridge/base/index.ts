export * from './base-command.handler';
export * from './standard-payload.validator';
