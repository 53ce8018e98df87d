/**
 * A promise that can be resolved at most once. Later `resolve` calls are
 * ignored and report `false`, so several racing producers can share one
 * result slot.
 */
export class OneShot<T> {
  readonly promise: Promise<T>;
  private readonly settle: (value: T) => void;
  private done = false;

  constructor() {
    let settle: (value: T) => void = () => undefined;
    this.promise = new Promise<T>((resolve) => {
      settle = resolve;
    });
    this.settle = settle;
  }

  get settled(): boolean {
    return this.done;
  }

  resolve(value: T): boolean {
    if (this.done) return false;
    this.done = true;
    this.settle(value);
    return true;
  }
}
