/**
 * Redis Command Client
 *
 * The handful of commands the pipeline issues, behind an interface so
 * repositories and publishers can be tested against an in-process stand-in.
 * Every failure is rethrown as a transient RedisOperationError carrying the
 * command and key.
 */

import type Redis from 'ioredis';
import { ErrorCode, TransientError } from '../error-handling';
import type { ILogger } from '../logging';

export interface XAddOptions {
  /** Trim the stream to about this many entries */
  maxLen?: number;
}

export interface RedisCommands {
  /** Run a Lua script; keys and args are passed as KEYS[] and ARGV[] */
  eval(script: string, keys: string[], args: Array<string | number>): Promise<unknown>;
  hget(key: string, field: string): Promise<string | null>;
  /** Set several fields of one hash */
  hset(key: string, fields: Record<string, string>): Promise<number>;
  hdel(key: string, field: string): Promise<number>;
  sadd(key: string, member: string): Promise<number>;
  smembers(key: string): Promise<string[]>;
  /** Append one entry; returns the generated entry id */
  xadd(stream: string, fields: Record<string, string>, options?: XAddOptions): Promise<string>;
  ping(): Promise<string>;
}

export class RedisOperationError extends TransientError {
  constructor(
    public readonly operation: string,
    cause: unknown,
    public readonly key?: string
  ) {
    super(
      `Redis ${operation} failed${key ? ` for key '${key}'` : ''}: ${cause instanceof Error ? cause.message : String(cause)}`,
      { code: ErrorCode.REDIS_OPERATION_ERROR, context: { operation, key }, cause }
    );
    this.name = 'RedisOperationError';
  }
}

export class RedisCommandClient implements RedisCommands {
  constructor(private readonly client: Redis, private readonly logger: ILogger) {}

  async eval(script: string, keys: string[], args: Array<string | number>): Promise<unknown> {
    try {
      return await this.client.eval(script, keys.length, ...keys, ...args);
    } catch (error) {
      throw this.fail('eval', error, keys[0]);
    }
  }

  async hget(key: string, field: string): Promise<string | null> {
    try {
      return await this.client.hget(key, field);
    } catch (error) {
      throw this.fail('hget', error, key);
    }
  }

  async hset(key: string, fields: Record<string, string>): Promise<number> {
    try {
      return await this.client.hset(key, fields);
    } catch (error) {
      throw this.fail('hset', error, key);
    }
  }

  async hdel(key: string, field: string): Promise<number> {
    try {
      return await this.client.hdel(key, field);
    } catch (error) {
      throw this.fail('hdel', error, key);
    }
  }

  async sadd(key: string, member: string): Promise<number> {
    try {
      return await this.client.sadd(key, member);
    } catch (error) {
      throw this.fail('sadd', error, key);
    }
  }

  async smembers(key: string): Promise<string[]> {
    try {
      return await this.client.smembers(key);
    } catch (error) {
      throw this.fail('smembers', error, key);
    }
  }

  async xadd(stream: string, fields: Record<string, string>, options: XAddOptions = {}): Promise<string> {
    const flat = Object.entries(fields).flat();
    try {
      const id = options.maxLen !== undefined
        ? await this.client.xadd(stream, 'MAXLEN', '~', options.maxLen.toString(), '*', ...flat)
        : await this.client.xadd(stream, '*', ...flat);
      if (id === null) {
        throw new Error('XADD returned no entry id');
      }
      return id;
    } catch (error) {
      throw this.fail('xadd', error, stream);
    }
  }

  async ping(): Promise<string> {
    try {
      return await this.client.ping();
    } catch (error) {
      throw this.fail('ping', error);
    }
  }

  private fail(operation: string, error: unknown, key?: string): RedisOperationError {
    const wrapped = new RedisOperationError(operation, error, key);
    this.logger.error(wrapped.message, { operation, key });
    return wrapped;
  }
}
