export * from './notification-event';
