export { default as notificationRoutes } from './notification-routes.js';
export type { NotificationRouteOptions } from './notification-routes.js';
