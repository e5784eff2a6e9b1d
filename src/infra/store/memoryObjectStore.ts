import { ObjectStat, ObjectStore } from "../../domain/ports.js";

export class MemoryObjectStore implements ObjectStore {
  readonly description = "memory://";

  private readonly objects = new Map<string, Buffer>();

  async get(key: string): Promise<Buffer | null> {
    const value = this.objects.get(key);
    return value ? Buffer.from(value) : null;
  }

  async put(key: string, bytes: Buffer): Promise<void> {
    this.objects.set(key, Buffer.from(bytes));
  }

  async stat(key: string): Promise<ObjectStat | null> {
    const value = this.objects.get(key);
    return value ? { sizeBytes: value.byteLength } : null;
  }

  keys(): string[] {
    return [...this.objects.keys()].sort();
  }
}
