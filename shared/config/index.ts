/**
 * Shared configuration for the opportunity pipeline.
 *
 * Re-exports src/index.ts. Add new settings to the matching module in src/
 * and export them from there.
 */

export * from './src/index';
