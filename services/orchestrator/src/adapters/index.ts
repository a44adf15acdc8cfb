export { HttpGeneratorClient } from './http-generator-client';
export type { HttpGeneratorClientConfig, HttpGeneratorClientDeps } from './http-generator-client';
export { WebhookPlatformAdapter } from './webhook-platform-adapter';
export type { WebhookPlatformAdapterConfig, WebhookPlatformAdapterDeps } from './webhook-platform-adapter';
export { RedisStreamPublisher, WEIGHT_ADJUSTMENT_STREAM, FOLLOW_UP_STREAM } from './redis-stream-publisher';
export type { RedisStreamPublisherOptions } from './redis-stream-publisher';
export { errorForStatus } from './http-errors';
export { TemplateGenerator } from './template-generator';
export { OutboxPlatformAdapter } from './outbox-platform-adapter';
export type { OutboxEntry } from './outbox-platform-adapter';
