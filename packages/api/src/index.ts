/**
 * @inkline/api — HTTP surface over the Job Runner.
 */

export { createApp } from './app.js';
export type { AppOptions } from './app.js';
export { createWorkflowRoutes, errorHandler } from './routes.js';
export { startServer } from './server.js';
export type { ServerOptions, RunningServer } from './server.js';
