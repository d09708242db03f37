export { loadNotifierConfig, createConfiguredNotifier } from './notifier-config.js';
export type { NotifierConfig } from './notifier-config.js';
