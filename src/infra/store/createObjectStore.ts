import { AppConfig } from "../../config/env.js";
import { ObjectStore } from "../../domain/ports.js";
import { FileSystemObjectStore } from "./fileSystemObjectStore.js";
import { MemoryObjectStore } from "./memoryObjectStore.js";
import { S3ObjectStore } from "./s3ObjectStore.js";

export interface ObjectStoreBootstrapResult {
  objectStore: ObjectStore;
  close: () => Promise<void>;
}

export function createObjectStore(config: AppConfig): ObjectStoreBootstrapResult {
  if (config.indexStoreBackend === "memory") {
    return {
      objectStore: new MemoryObjectStore(),
      close: async () => {},
    };
  }

  if (config.indexStoreBackend === "fs") {
    return {
      objectStore: new FileSystemObjectStore(config.indexStorePath, {
        timeoutMs: config.storeTimeoutMs,
      }),
      close: async () => {},
    };
  }

  const objectStore = new S3ObjectStore({
    bucket: config.s3Bucket,
    region: config.s3Region,
    endpoint: config.s3Endpoint,
    forcePathStyle: config.s3ForcePathStyle,
    accessKeyId: config.s3AccessKeyId,
    secretAccessKey: config.s3SecretAccessKey,
    timeoutMs: config.storeTimeoutMs,
  });

  return {
    objectStore,
    close: async () => {
      objectStore.destroy();
    },
  };
}
