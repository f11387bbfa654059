export * from './csv';
export * from './logger';
export * from './notification-event';
export * from './schema-validator';
