import { AppConfig } from "../config";
import { ConfigError } from "../core/errors";
import { LocalDirObjectStore } from "./localDirStore";
import { S3ObjectStore } from "./s3Store";
import { ObjectStore } from "./types";

export function createObjectStore(config: Pick<AppConfig, "store">): ObjectStore {
  if (!config.store.container.trim()) {
    throw new ConfigError("Invalid configuration: store.container is required (S3_BUCKET or STORE_CONTAINER)");
  }

  switch (config.store.type) {
    case "s3":
      return new S3ObjectStore({ bucket: config.store.container, region: config.store.region });
    case "local":
      return new LocalDirObjectStore(config.store.container);
    default:
      throw new Error(`Unsupported store type: ${String(config.store.type)}`);
  }
}

export function buildObjectKey(prefix: string, paperId: string): string {
  return `${prefix}${paperId}.pdf`;
}

export * from "./types";
export { InMemoryObjectStore } from "./memoryStore";
export { LocalDirObjectStore } from "./localDirStore";
export { S3ObjectStore } from "./s3Store";
