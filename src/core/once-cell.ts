/**
 * Write-once value that readers can wait on.
 *
 * Used for user data produced by the setup callback: events that arrive
 * before setup has finished suspend in `wait()` until `set()` runs.
 */
export class OnceCell<T> {
  private value: { current: T } | null = null;
  private readonly ready: Promise<T>;
  private resolveReady: (value: T) => void = () => {};

  constructor() {
    this.ready = new Promise<T>((resolve) => {
      this.resolveReady = resolve;
    });
  }

  get isSet(): boolean {
    return this.value !== null;
  }

  get(): T | undefined {
    return this.value?.current;
  }

  /** @returns false when the cell already held a value (the new one is discarded) */
  set(value: T): boolean {
    if (this.value) return false;
    this.value = { current: value };
    this.resolveReady(value);
    return true;
  }

  wait(): Promise<T> {
    return this.value ? Promise.resolve(this.value.current) : this.ready;
  }
}
