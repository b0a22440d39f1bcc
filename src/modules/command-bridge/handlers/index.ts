export * from './object-member.handler';
