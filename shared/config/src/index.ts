/**
 * Configuration entry point.
 *
 * - pipeline-config.ts: runtime settings read from the environment
 * - schemas/: zod schemas for configuration and inbound payloads
 * - utils/env-parsing.ts: value-based env parsing helpers
 */

export * from './pipeline-config';
export * from './schemas';
export * from './utils/env-parsing';
