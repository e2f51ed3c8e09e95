import { ConfigError } from "../errors.js";

/** Bounded execution slots, taken without blocking. */
export class WorkerPool {
  readonly size: number;
  private inUse = 0;

  constructor(size: number) {
    if (!Number.isInteger(size) || size < 1) {
      throw new ConfigError(`Worker pool size must be a positive integer, got ${size}`);
    }
    this.size = size;
  }

  get active(): number {
    return this.inUse;
  }

  get available(): number {
    return this.size - this.inUse;
  }

  /** Take a slot if one is free right now. */
  tryAcquire(): boolean {
    if (this.inUse >= this.size) return false;
    this.inUse++;
    return true;
  }

  release(): void {
    if (this.inUse > 0) this.inUse--;
  }
}
