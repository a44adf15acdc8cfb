// Shared domain types for the opportunity pipeline.
// Definitions live in src/; this file only re-exports them.

export * from './src/index';
