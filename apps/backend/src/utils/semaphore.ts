type Waiter = {
  resolve: () => void;
  reject: (error: Error) => void;
  timer: NodeJS.Timeout | null;
};

export class SemaphoreTimeoutError extends Error {
  public readonly timeoutMs: number;

  constructor(timeoutMs: number) {
    super(`semaphore acquire timed out after ${timeoutMs}ms`);
    this.name = 'SemaphoreTimeoutError';
    this.timeoutMs = timeoutMs;
  }
}

export class Semaphore {
  private readonly max: number;
  private active = 0;
  private readonly queue: Waiter[] = [];

  constructor(max: number) {
    const n = Number.isFinite(max) ? Math.floor(max) : 1;
    this.max = n > 0 ? n : 1;
  }

  get capacity(): number {
    return this.max;
  }

  get pending(): number {
    return this.queue.length;
  }

  /**
   * Resolves with a release function once a permit is free.
   * With `timeoutMs`, rejects with SemaphoreTimeoutError if no permit frees up in time.
   */
  async acquire(timeoutMs?: number): Promise<() => void> {
    if (this.active < this.max) {
      this.active += 1;
      return this.makeRelease();
    }
    await new Promise<void>((resolve, reject) => {
      const waiter: Waiter = { resolve, reject, timer: null };
      if (timeoutMs !== undefined && Number.isFinite(timeoutMs) && timeoutMs >= 0) {
        waiter.timer = setTimeout(() => {
          const idx = this.queue.indexOf(waiter);
          if (idx >= 0) this.queue.splice(idx, 1);
          reject(new SemaphoreTimeoutError(timeoutMs));
        }, timeoutMs);
        waiter.timer.unref?.();
      }
      this.queue.push(waiter);
    });
    // The releasing holder handed its permit over; `active` is unchanged.
    return this.makeRelease();
  }

  private makeRelease(): () => void {
    let released = false;
    return () => {
      if (released) return;
      released = true;
      this.release();
    };
  }

  private release(): void {
    const next = this.queue.shift();
    if (next) {
      if (next.timer) clearTimeout(next.timer);
      next.resolve();
      return;
    }
    this.active = Math.max(0, this.active - 1);
  }

  async use<T>(fn: () => Promise<T>, timeoutMs?: number): Promise<T> {
    const release = await this.acquire(timeoutMs);
    try {
      return await fn();
    } finally {
      release();
    }
  }
}
