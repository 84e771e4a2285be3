import { KeyValueStore } from "./types";
import { FileKeyValueStore } from "./file-kv-store";
import { MemoryKeyValueStore } from "./memory-kv-store";
import { RedisKeyValueStore } from "./redis-kv-store";
import type { Settings } from "../config/settings";

export function createKeyValueStore(settings: Settings["ledger"]): KeyValueStore {
  switch (settings.store) {
    case "redis":
      return RedisKeyValueStore.fromUrl(settings.redisUrl);
    case "memory":
      return new MemoryKeyValueStore();
    case "file":
    default:
      return new FileKeyValueStore(settings.file);
  }
}
