export { buildApp } from './app.js';
export type { AppOptions } from './app.js';
export { default as outboxPlugin } from './outbox-plugin.js';
export { default as errorHandler, statusForError } from './error-handler.js';
export { default as authPlugin, tenantOf } from './auth.js';
export { default as eventRoutes } from './event-routes.js';
export { default as tenantRoutes } from './tenant-routes.js';
export { default as adminRoutes } from './admin-routes.js';
export { default as healthRoutes } from './health-routes.js';
export { default as metricsRoutes } from './metrics-routes.js';
export type { MetricsRoutesOptions } from './metrics-routes.js';
export { successResponse, errorResponse, createDetail, describeValidationError } from './response.js';
export type { Envelope, ResponseDetail } from './response.js';
