export { RedisMock, createRedisMock } from './redis.mock';
export type { RedisMockOptions, RedisOperation, ScriptHandler, StreamEntry } from './redis.mock';
export {
  DEFAULT_DRAFT,
  RecordingLearningSink,
  RecordingNotifier,
  ScriptedGenerator,
  ScriptedPlatformAdapter,
} from './collaborators.mock';
export type { GeneratorStep } from './collaborators.mock';
