/**
 * FIFO mutex. A top-level transaction holds it for its whole lifetime, so at
 * most one mutator touches storage at a time.
 */
export class Mutex {
  private held = false;
  private readonly waitQueue: (() => void)[] = [];
  private acquisitions = 0;

  get locked(): boolean {
    return this.held;
  }

  get acquisitionCount(): number {
    return this.acquisitions;
  }

  acquire(): Promise<() => void> {
    return new Promise((resolve) => {
      const grant = () => {
        this.held = true;
        this.acquisitions++;
        let released = false;
        resolve(() => {
          if (released) return;
          released = true;
          this.handOff();
        });
      };
      if (this.held) this.waitQueue.push(grant);
      else grant();
    });
  }

  async runExclusive<T>(fn: () => T | Promise<T>): Promise<T> {
    const release = await this.acquire();
    try {
      return await fn();
    } finally {
      release();
    }
  }

  private handOff(): void {
    const next = this.waitQueue.shift();
    if (next) next();
    else this.held = false;
  }
}
