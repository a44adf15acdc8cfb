/**
 * Redis Module
 *
 * Client factory and the command wrapper shared by the application
 * repository and the stream publisher.
 */

export * from './client';
export * from './commands';
