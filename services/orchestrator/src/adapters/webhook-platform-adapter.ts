/**
 * Platform adapter that POSTs the application package to a webhook.
 *
 * The idempotency key travels in the `Idempotency-Key` header; a receiver
 * that has already seen the key answers 409, which counts as delivered.
 * With `timeoutMs` set the request is aborted after that long and the call
 * fails with a TimeoutError, which the SubmissionEngine retries.
 */

import { z } from 'zod';
import { ErrorCode, TimeoutError } from '@pipeline/core';
import type { ILogger } from '@pipeline/core';
import type { ApplicationPackage, DeliveryReceipt, PlatformAdapter } from '@pipeline/types';
import { errorForStatus, networkError, readBody } from './http-errors';

const ReceiptSchema = z.object({ deliveryId: z.string().min(1) });

export interface WebhookPlatformAdapterConfig {
  platform: string;
  url: string;
  headers?: Record<string, string>;
  timeoutMs?: number;
}

export interface WebhookPlatformAdapterDeps {
  logger: ILogger;
  fetchImpl?: typeof fetch;
}

export class WebhookPlatformAdapter implements PlatformAdapter {
  private readonly fetchImpl: typeof fetch;
  private readonly logger: ILogger;

  constructor(private readonly config: WebhookPlatformAdapterConfig, deps: WebhookPlatformAdapterDeps) {
    this.logger = deps.logger;
    this.fetchImpl = deps.fetchImpl ?? fetch;
  }

  async deliver(pkg: ApplicationPackage, idempotencyKey: string): Promise<DeliveryReceipt> {
    const { timeoutMs } = this.config;
    const signal = timeoutMs === undefined ? undefined : AbortSignal.timeout(timeoutMs);
    let response: Response;
    try {
      response = await this.fetchImpl(this.config.url, {
        method: 'POST',
        headers: {
          'Content-Type': 'application/json',
          'Idempotency-Key': idempotencyKey,
          ...this.config.headers,
        },
        body: JSON.stringify(pkg),
        signal,
      });
    } catch (error) {
      if (signal?.aborted && timeoutMs !== undefined) {
        throw new TimeoutError(timeoutMs, `Delivery to ${this.config.platform}`);
      }
      throw networkError(`Delivery to ${this.config.platform}`, error);
    }

    const text = await readBody(response);
    if (response.status === 409) {
      this.logger.info('Delivery already accepted for idempotency key', {
        platform: this.config.platform,
        applicationId: pkg.applicationId,
      });
      return { deliveryId: this.fallbackDeliveryId(idempotencyKey) };
    }
    if (!response.ok) {
      throw errorForStatus(response.status, `Delivery to ${this.config.platform}`, text, ErrorCode.DELIVERY_REJECTED);
    }

    return { deliveryId: this.parseDeliveryId(text) ?? this.fallbackDeliveryId(idempotencyKey) };
  }

  private parseDeliveryId(text: string): string | undefined {
    if (!text.trim()) return undefined;
    try {
      const parsed = ReceiptSchema.safeParse(JSON.parse(text));
      return parsed.success ? parsed.data.deliveryId : undefined;
    } catch (error) {
      this.logger.debug('Webhook response is not JSON', { platform: this.config.platform, error: String(error) });
      return undefined;
    }
  }

  private fallbackDeliveryId(idempotencyKey: string): string {
    return `${this.config.platform}_${idempotencyKey.slice(0, 16)}`;
  }
}
