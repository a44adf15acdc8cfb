export { WorkflowOrchestrator } from './orchestrator';
export type {
  ApplicationFilter,
  MaintenanceResult,
  OrchestratorConfig,
  OrchestratorDeps,
  RecoveryResult,
} from './orchestrator';
export { InMemoryApplicationRepository, applicationIdFor } from './application-repository';
export type { ApplicationRepository } from './application-repository';
export { InMemoryContentStore } from './content-store';
export type { ContentStore } from './content-store';
export { InMemoryProfileStore } from './profile-store';
export type { ProfileStore } from './profile-store';
export { DailyQuota } from './quota';
export { canTransition, isTerminal, nextStates } from './state-machine';
