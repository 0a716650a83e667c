type Release = () => void;

/**
 * Async readers/writer lock. Readers share the lock; a writer waits for them
 * to drain and new readers queue behind a waiting writer.
 */
export class RWLock {
  private readers = 0;
  private writer = false;
  private readQueue: Array<() => void> = [];
  private writeQueue: Array<() => void> = [];

  async readLock(): Promise<Release> {
    await new Promise<void>((resolve) => {
      const attempt = () => {
        if (!this.writer && this.writeQueue.length === 0) {
          this.readers++;
          resolve();
        } else {
          this.readQueue.push(attempt);
        }
      };
      attempt();
    });
    let released = false;
    return () => {
      if (released) return;
      released = true;
      this.readers--;
      if (this.readers === 0) {
        this.writeQueue.shift()?.();
      }
    };
  }

  async writeLock(): Promise<Release> {
    await new Promise<void>((resolve) => {
      const attempt = () => {
        if (!this.writer && this.readers === 0) {
          this.writer = true;
          resolve();
        } else {
          this.writeQueue.push(attempt);
        }
      };
      attempt();
    });
    let released = false;
    return () => {
      if (released) return;
      released = true;
      this.writer = false;
      if (this.writeQueue.length > 0) {
        this.writeQueue.shift()?.();
        return;
      }
      const waiting = this.readQueue.splice(0);
      waiting.forEach((attempt) => attempt());
    };
  }

  async withRead<T>(fn: () => Promise<T>): Promise<T> {
    const release = await this.readLock();
    try {
      return await fn();
    } finally {
      release();
    }
  }

  async withWrite<T>(fn: () => Promise<T>): Promise<T> {
    const release = await this.writeLock();
    try {
      return await fn();
    } finally {
      release();
    }
  }
}
