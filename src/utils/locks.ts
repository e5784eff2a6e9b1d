type LockMode = "read" | "write";

interface Waiter {
  mode: LockMode;
  grant: () => void;
}

/**
 * Many readers or one writer. Waiters are admitted in arrival order, so a
 * queued writer is not starved by readers that arrive after it.
 */
export class ReadWriteLock {
  private readers = 0;

  private writing = false;

  private readonly waiters: Waiter[] = [];

  read<T>(task: () => T | Promise<T>): Promise<T> {
    return this.run("read", task);
  }

  write<T>(task: () => T | Promise<T>): Promise<T> {
    return this.run("write", task);
  }

  get activeReaders(): number {
    return this.readers;
  }

  get writeLocked(): boolean {
    return this.writing;
  }

  private async run<T>(mode: LockMode, task: () => T | Promise<T>): Promise<T> {
    await this.acquire(mode);
    try {
      return await task();
    } finally {
      this.release(mode);
    }
  }

  private acquire(mode: LockMode): Promise<void> {
    if (this.waiters.length === 0 && this.canEnter(mode)) {
      this.enter(mode);
      return Promise.resolve();
    }
    return new Promise((resolve) => {
      this.waiters.push({ mode, grant: resolve });
    });
  }

  private release(mode: LockMode): void {
    if (mode === "read") {
      this.readers -= 1;
    } else {
      this.writing = false;
    }

    while (this.waiters.length > 0 && this.canEnter(this.waiters[0].mode)) {
      const next = this.waiters.shift();
      if (!next) {
        break;
      }
      this.enter(next.mode);
      next.grant();
    }
  }

  private canEnter(mode: LockMode): boolean {
    return mode === "read" ? !this.writing : !this.writing && this.readers === 0;
  }

  private enter(mode: LockMode): void {
    if (mode === "read") {
      this.readers += 1;
    } else {
      this.writing = true;
    }
  }
}

/** Serializes tasks that share a key; tasks on different keys run freely. */
export class KeyedMutex {
  private readonly tails = new Map<string, Promise<unknown>>();

  run<T>(key: string, task: () => Promise<T>): Promise<T> {
    const previous = this.tails.get(key) ?? Promise.resolve();
    const result = previous.then(task, task);
    const tail = result.catch(() => undefined);
    this.tails.set(key, tail);
    void tail.then(() => {
      if (this.tails.get(key) === tail) {
        this.tails.delete(key);
      }
    });
    return result;
  }

  get pendingKeys(): number {
    return this.tails.size;
  }
}
