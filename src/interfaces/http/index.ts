export { default as exchangeRoutes } from './exchange-routes.js';
export { default as notifierRoutes } from './notifier-routes.js';
