/**
 * In-process stand-in for the handful of Redis commands the stores use.
 * Commands in a transaction apply in order; `failNext` simulates an EXEC error.
 */

import type { RedisArg, RedisCommand, RedisCommandRunner } from '../redis-command-runner.js';

export class FakeCommandRunner implements RedisCommandRunner {
  readonly strings = new Map<string, string>();
  readonly hashes = new Map<string, Map<string, string>>();
  readonly zsets = new Map<string, Map<string, number>>();
  readonly lists = new Map<string, string[]>();
  readonly executed: RedisCommand[][] = [];
  private failures = 0;

  failNext(count = 1): void {
    this.failures = count;
  }

  async transaction(commands: RedisCommand[]): Promise<unknown[]> {
    this.executed.push(commands);
    if (this.failures > 0) {
      this.failures--;
      throw new Error('EXECABORT simulated failure');
    }
    return commands.map(command => this.run(command));
  }

  private run([name, ...args]: RedisCommand): unknown {
    const key = String(args[0]);
    switch (name.toUpperCase()) {
      case 'GET':
        return this.strings.get(key) ?? null;
      case 'SET':
        this.strings.set(key, String(args[1]));
        return 'OK';
      case 'HGETALL':
        return Object.fromEntries(this.hashes.get(key) ?? new Map<string, string>());
      case 'HSET': {
        const hash = this.hash(key);
        for (let i = 1; i + 1 < args.length; i += 2) {
          hash.set(String(args[i]), String(args[i + 1]));
        }
        return 1;
      }
      case 'HINCRBY': {
        const hash = this.hash(key);
        const next = Number(hash.get(String(args[1])) ?? '0') + Number(args[2]);
        hash.set(String(args[1]), String(next));
        return next;
      }
      case 'ZADD':
        return this.zadd(key, args.slice(1));
      case 'ZREM': {
        const zset = this.zsets.get(key);
        return zset ? args.slice(1).filter(member => zset.delete(String(member))).length : 0;
      }
      case 'ZRANGE':
        return [...(this.zsets.get(key) ?? new Map<string, number>()).entries()]
          .sort((a, b) => a[1] - b[1] || a[0].localeCompare(b[0]))
          .map(([member]) => member);
      case 'LPUSH': {
        const list = this.list(key);
        for (const item of args.slice(1)) list.unshift(String(item));
        return list.length;
      }
      case 'LTRIM':
        this.list(key).splice(Number(args[2]) + 1);
        return 'OK';
      case 'LRANGE':
        return [...(this.lists.get(key) ?? [])];
      default:
        throw new Error(`FakeCommandRunner: unsupported command ${name}`);
    }
  }

  private zadd(key: string, args: RedisArg[]): number {
    const zset = this.zsets.get(key) ?? new Map<string, number>();
    this.zsets.set(key, zset);
    const onlyNew = args[0] === 'NX';
    const pairs = onlyNew ? args.slice(1) : args;
    let added = 0;
    for (let i = 0; i + 1 < pairs.length; i += 2) {
      const member = String(pairs[i + 1]);
      if (zset.has(member)) {
        if (!onlyNew) zset.set(member, Number(pairs[i]));
        continue;
      }
      zset.set(member, Number(pairs[i]));
      added++;
    }
    return added;
  }

  private hash(key: string): Map<string, string> {
    const hash = this.hashes.get(key) ?? new Map<string, string>();
    this.hashes.set(key, hash);
    return hash;
  }

  private list(key: string): string[] {
    const list = this.lists.get(key) ?? [];
    this.lists.set(key, list);
    return list;
  }
}
