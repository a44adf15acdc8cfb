export * from './types';
export { createApp } from './app';
export { configureMiddleware, configureErrorHandling } from './middleware';
export {
  setupAllRoutes,
  createApplicationRoutes,
  createHealthRoutes,
  createOpportunityRoutes,
  createUserRoutes,
  createWeightsRoutes,
} from './routes';
