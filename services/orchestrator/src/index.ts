/**
 * Orchestrator Service Entry Point & Public API
 */

export { PipelineService } from './service';
export type { PipelineServiceDeps } from './service';
export * from './opportunities';
export * from './scoring';
export * from './submission';
export * from './tracking';
export * from './feedback';
export * from './workflow';
export * from './persistence';
export * from './adapters';
export * from './api';

import { PIPELINE_CONFIG } from '@pipeline/config';
import { createLogger, runServiceMain, setupServiceShutdown } from '@pipeline/core';
import { PipelineService } from './service';

const logger = createLogger('orchestrator');

async function main(): Promise<void> {
  const service = new PipelineService(PIPELINE_CONFIG, { logger });

  setupServiceShutdown({
    logger,
    serviceName: 'orchestrator',
    onShutdown: () => service.stop(),
  });

  await service.start();
}

runServiceMain({ main, serviceName: 'orchestrator', logger });
