import type { ILogger } from '@pipeline/core';
import type { ApplicationPackage, DeliveryReceipt, PlatformAdapter } from '@pipeline/types';

export interface OutboxEntry {
  deliveryId: string;
  idempotencyKey: string;
  package: ApplicationPackage;
  storedAt: number;
}

/**
 * Platform adapter for channels without a webhook: packages are parked in
 * an outbox for manual sending. One entry per idempotency key.
 */
export class OutboxPlatformAdapter implements PlatformAdapter {
  private readonly entries = new Map<string, OutboxEntry>();

  constructor(private readonly platform: string, private readonly logger: ILogger) {}

  async deliver(pkg: ApplicationPackage, idempotencyKey: string): Promise<DeliveryReceipt> {
    const existing = this.entries.get(idempotencyKey);
    if (existing) {
      return { deliveryId: existing.deliveryId };
    }

    const entry: OutboxEntry = {
      deliveryId: `${this.platform}_outbox_${idempotencyKey.slice(0, 16)}`,
      idempotencyKey,
      package: pkg,
      storedAt: Date.now(),
    };
    this.entries.set(idempotencyKey, entry);
    this.logger.info('Application parked in outbox', {
      platform: this.platform,
      applicationId: pkg.applicationId,
      deliveryId: entry.deliveryId,
    });
    return { deliveryId: entry.deliveryId };
  }

  list(): OutboxEntry[] {
    return [...this.entries.values()].sort((a, b) => a.storedAt - b.storedAt);
  }
}
