/**
 * In-process Redis stand-in.
 *
 * Implements RedisCommands over plain maps: hashes, sets and streams. Lua
 * scripts cannot run here, so tests register a JS handler per script text
 * with defineScript(); handlers run synchronously inside eval(), which keeps
 * them atomic the way a script is on a real server.
 */

import type { RedisCommands, XAddOptions } from '@pipeline/core';

export interface RedisMockOptions {
  /** Add artificial latency (ms) to every command */
  latencyMs?: number;
}

export interface RedisOperation {
  command: string;
  args: unknown[];
  timestamp: number;
}

export interface StreamEntry {
  id: string;
  fields: Record<string, string>;
}

export type ScriptHandler = (redis: RedisMock, keys: string[], args: string[]) => unknown;

export class RedisMock implements RedisCommands {
  private readonly hashes = new Map<string, Map<string, string>>();
  private readonly sets = new Map<string, Set<string>>();
  private readonly streams = new Map<string, StreamEntry[]>();
  private readonly streamSequences = new Map<string, number>();
  private readonly scripts = new Map<string, ScriptHandler>();
  private readonly failures = new Map<string, Error>();
  private operations: RedisOperation[] = [];

  constructor(private readonly options: RedisMockOptions = {}) {}

  defineScript(script: string, handler: ScriptHandler): void {
    this.scripts.set(script, handler);
  }

  /** Make every call of `command` reject with `error` until cleared. */
  failCommand(command: string, error: Error): void {
    this.failures.set(command, error);
  }

  clearFailures(): void {
    this.failures.clear();
  }

  // =========================================================================
  // RedisCommands
  // =========================================================================

  async eval(script: string, keys: string[], args: Array<string | number>): Promise<unknown> {
    await this.before('eval', [keys, args]);
    const handler = this.scripts.get(script);
    if (!handler) {
      throw new Error('NOSCRIPT no handler registered for script');
    }
    return handler(this, keys, args.map(String));
  }

  async hget(key: string, field: string): Promise<string | null> {
    await this.before('hget', [key, field]);
    return this.readHash(key, field);
  }

  async hset(key: string, fields: Record<string, string>): Promise<number> {
    await this.before('hset', [key, fields]);
    const added = Object.keys(fields).filter(field => this.readHash(key, field) === null).length;
    this.writeHash(key, fields);
    return added;
  }

  async hdel(key: string, field: string): Promise<number> {
    await this.before('hdel', [key, field]);
    return this.hashes.get(key)?.delete(field) ? 1 : 0;
  }

  async sadd(key: string, member: string): Promise<number> {
    await this.before('sadd', [key, member]);
    const present = this.sets.get(key)?.has(member) ?? false;
    this.addToSet(key, member);
    return present ? 0 : 1;
  }

  async smembers(key: string): Promise<string[]> {
    await this.before('smembers', [key]);
    return [...(this.sets.get(key) ?? [])];
  }

  async xadd(stream: string, fields: Record<string, string>, options: XAddOptions = {}): Promise<string> {
    await this.before('xadd', [stream, fields, options]);
    const seq = (this.streamSequences.get(stream) ?? 0) + 1;
    this.streamSequences.set(stream, seq);

    const id = `${seq}-0`;
    const entries = this.streams.get(stream) ?? [];
    entries.push({ id, fields: { ...fields } });
    if (options.maxLen !== undefined && entries.length > options.maxLen) {
      entries.splice(0, entries.length - options.maxLen);
    }
    this.streams.set(stream, entries);
    return id;
  }

  async ping(): Promise<string> {
    await this.before('ping', []);
    return 'PONG';
  }

  // =========================================================================
  // Synchronous access for script handlers and assertions
  // =========================================================================

  readHash(key: string, field: string): string | null {
    return this.hashes.get(key)?.get(field) ?? null;
  }

  writeHash(key: string, fields: Record<string, string>): void {
    const hash = this.hashes.get(key) ?? new Map<string, string>();
    for (const [field, value] of Object.entries(fields)) {
      hash.set(field, value);
    }
    this.hashes.set(key, hash);
  }

  addToSet(key: string, member: string): void {
    const set = this.sets.get(key) ?? new Set<string>();
    set.add(member);
    this.sets.set(key, set);
  }

  xrange(stream: string): StreamEntry[] {
    return [...(this.streams.get(stream) ?? [])];
  }

  getOperations(command?: string): RedisOperation[] {
    return command === undefined ? [...this.operations] : this.operations.filter(op => op.command === command);
  }

  clear(): void {
    this.hashes.clear();
    this.sets.clear();
    this.streams.clear();
    this.streamSequences.clear();
    this.operations = [];
  }

  private async before(command: string, args: unknown[]): Promise<void> {
    if (this.options.latencyMs) {
      await new Promise(resolve => setTimeout(resolve, this.options.latencyMs));
    }
    this.operations.push({ command, args, timestamp: Date.now() });
    const failure = this.failures.get(command);
    if (failure) {
      throw failure;
    }
  }
}

export function createRedisMock(options?: RedisMockOptions): RedisMock {
  return new RedisMock(options);
}
