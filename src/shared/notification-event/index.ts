export * from './decode-notification-event';
export * from './decode-object-key';
