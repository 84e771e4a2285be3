import { Redis } from "ioredis";
import { KeyValueStore } from "./types";

/** Subset of ioredis commands the store issues. */
export interface RedisCommands {
  get(key: string): Promise<string | null>;
  set(key: string, value: string): Promise<unknown>;
  del(key: string): Promise<number>;
  quit(): Promise<unknown>;
}

export class RedisKeyValueStore implements KeyValueStore {
  readonly name = "redis";
  private readonly redis: RedisCommands;
  private readonly prefix: string;

  constructor(redis: RedisCommands, prefix = "calendar-trades:") {
    this.redis = redis;
    this.prefix = prefix;
  }

  static fromUrl(url: string, prefix?: string): RedisKeyValueStore {
    const needsTls = url.startsWith("rediss://");
    const client = new Redis(url, {
      lazyConnect: true,
      enableReadyCheck: false,
      // One attempt per command: a ledger read that cannot reach Redis fails fast.
      maxRetriesPerRequest: 1,
      tls: needsTls ? { servername: new URL(url).hostname } : undefined
    });

    return new RedisKeyValueStore(
      {
        get: (key) => client.get(key),
        set: (key, value) => client.set(key, value),
        del: (key) => client.del(key),
        quit: () => client.quit()
      },
      prefix
    );
  }

  async get(key: string): Promise<string | undefined> {
    const value = await this.redis.get(this.prefix + key);
    return value ?? undefined;
  }

  async set(key: string, value: string): Promise<void> {
    await this.redis.set(this.prefix + key, value);
  }

  async delete(key: string): Promise<void> {
    await this.redis.del(this.prefix + key);
  }

  async close(): Promise<void> {
    await this.redis.quit();
  }
}
