export { default as corePlugin } from './core-plugin.js';
export type { CorePluginOptions } from './core-plugin.js';
export { default as ruleRoutes } from './rule-routes.js';
export { default as alertRoutes } from './alert-routes.js';
export { default as metricsRoutes } from './metrics-routes.js';
