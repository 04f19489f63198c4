export * from './send-notification.use-case';
export * from './get-notification.use-case';
export * from './list-notifications.use-case';
export * from './get-notification-stats.use-case';
export * from './retry-notification.use-case';
