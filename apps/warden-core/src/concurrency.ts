import { logError } from "@warden-core/src/logging";

type LockRequest = {
  mode: "read" | "write";
  grant: () => void;
};

/**
 * Async reader/writer lock. Readers share the lock; a writer holds it alone.
 * Requests are granted in arrival order, so a waiting writer is not starved
 * by readers that arrive after it.
 */
export class ReadWriteLock {
  private activeReaders = 0;
  private writerActive = false;
  private readonly waiting: LockRequest[] = [];

  async acquireRead(): Promise<() => void> {
    if (!this.writerActive && this.waiting.length === 0) {
      this.activeReaders += 1;
      return this.releaser("read");
    }
    await new Promise<void>((resolve) =>
      this.waiting.push({ mode: "read", grant: resolve }),
    );
    return this.releaser("read");
  }

  async acquireWrite(): Promise<() => void> {
    if (
      !this.writerActive &&
      this.activeReaders === 0 &&
      this.waiting.length === 0
    ) {
      this.writerActive = true;
      return this.releaser("write");
    }
    await new Promise<void>((resolve) =>
      this.waiting.push({ mode: "write", grant: resolve }),
    );
    return this.releaser("write");
  }

  async withRead<T>(fn: () => T | Promise<T>): Promise<T> {
    const release = await this.acquireRead();
    try {
      return await fn();
    } finally {
      release();
    }
  }

  async withWrite<T>(fn: () => T | Promise<T>): Promise<T> {
    const release = await this.acquireWrite();
    try {
      return await fn();
    } finally {
      release();
    }
  }

  get readers(): number {
    return this.activeReaders;
  }

  get isWriteLocked(): boolean {
    return this.writerActive;
  }

  get pendingCount(): number {
    return this.waiting.length;
  }

  private releaser(mode: "read" | "write"): () => void {
    let released = false;
    return () => {
      if (released) {
        return;
      }
      released = true;
      if (mode === "read") {
        this.activeReaders -= 1;
      } else {
        this.writerActive = false;
      }
      this.grantWaiting();
    };
  }

  private grantWaiting(): void {
    if (this.writerActive) {
      return;
    }

    const head = this.waiting[0];
    if (!head) {
      return;
    }

    if (head.mode === "write") {
      if (this.activeReaders > 0) {
        return;
      }
      this.waiting.shift();
      this.writerActive = true;
      head.grant();
      return;
    }

    while (this.waiting[0]?.mode === "read") {
      const next = this.waiting.shift();
      if (!next) {
        break;
      }
      this.activeReaders += 1;
      next.grant();
    }
  }
}

/**
 * Owns at most one long-lived task for its whole lifetime. The first
 * `start` call launches the task; every later call is ignored, whether the
 * task is still running or has already finished.
 */
export class SingleShot {
  private task: Promise<void> | null = null;

  constructor(private readonly name: string) {}

  start(run: () => Promise<void>): boolean {
    if (this.task) {
      return false;
    }
    this.task = run().catch((error: unknown) => {
      logError("single_shot.task_failed", {
        task: this.name,
        error: String(error),
      });
    });
    return true;
  }

  get started(): boolean {
    return this.task !== null;
  }

  /** Resolves when the task has finished; immediately if never started. */
  whenSettled(): Promise<void> {
    return this.task ?? Promise.resolve();
  }
}
