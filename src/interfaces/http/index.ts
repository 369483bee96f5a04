export { default as storesPlugin } from './stores-plugin.js';
export type { StoresPluginOptions } from './stores-plugin.js';
export { default as reviewRoutes } from './review-routes.js';
export { buildServer, startServer } from './server.js';
